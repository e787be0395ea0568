import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { LanguageModel, PageScrapeTool, PageValidation, ScrapeVariant } from '../types';
import { logger } from '../utils/logger';
import { PAGE_VALIDATION_OUTPUT } from '../research/contracts';
import { ConnectionDroppedError, errorMessage, isConnectionDropped } from '../research/errors';

export interface PageScraperOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  model: string;
}

const namedValue = z.object({ name: z.string().optional(), value: z.string().optional() }).passthrough();

const productSchema = z
  .object({
    name: z.string().optional(),
    description: z.string().optional(),
    brand: z.object({ name: z.string().optional() }).passthrough().optional(),
    sku: z.string().optional(),
    mpn: z.string().optional(),
    gtin: z.array(z.object({ type: z.string().optional(), value: z.string().optional() })).optional(),
    mainImage: z.object({ url: z.string() }).passthrough().optional(),
    images: z.array(z.object({ url: z.string() }).passthrough()).optional(),
    additionalProperties: z.array(namedValue).optional(),
  })
  .passthrough();

const extractResponseSchema = z.object({ url: z.string().optional(), product: productSchema.optional() }).passthrough();

interface ExtractedPage {
  url: string;
  product?: {
    name?: string;
    description?: string;
    brand?: string;
    sku?: string;
    mpn?: string;
    gtin: string[];
    images: string[];
    properties: Record<string, string>;
  };
  error?: string;
}

/**
 * Page-scrape capability: pulls structured product data for each URL from the
 * scraping API, then has the language model judge the pages under the strict
 * validation contract. Marketplace pages are read from the raw HTTP response;
 * other shops usually need the rendered page.
 */
export class PageScraperService implements PageScrapeTool {
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly client: AxiosInstance;

  constructor(
    private readonly options: PageScraperOptions,
    private readonly llm: LanguageModel
  ) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      auth: { username: options.apiKey, password: '' },
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
    });
  }

  async validatePages(urls: string[], instructions: string, variant: ScrapeVariant): Promise<PageValidation> {
    const pages = await Promise.all(urls.map(url => this.extract(url, variant)));
    const user = `Validate these pages. Scraped page data:\n${JSON.stringify(pages, null, 2)}`;
    return this.llm.completeStructured(instructions, user, PAGE_VALIDATION_OUTPUT, { model: this.options.model });
  }

  private async extract(url: string, variant: ScrapeVariant): Promise<ExtractedPage> {
    const extractFrom = variant === 'marketplace' ? 'httpResponseBody' : 'browserHtml';
    try {
      const response = await this.client.post('', { url, product: true, productOptions: { extractFrom } });
      const parsed = extractResponseSchema.safeParse(response.data);
      if (!parsed.success || !parsed.data.product) {
        return { url, error: 'No product data found on page' };
      }

      const product = parsed.data.product;
      const images = [product.mainImage?.url, ...(product.images ?? []).map(image => image.url)].filter(
        (image): image is string => Boolean(image)
      );
      const properties: Record<string, string> = {};
      for (const property of product.additionalProperties ?? []) {
        if (property.name && property.value) {
          properties[property.name] = property.value;
        }
      }

      return {
        url,
        product: {
          name: product.name,
          description: product.description,
          brand: product.brand?.name,
          sku: product.sku,
          mpn: product.mpn,
          gtin: (product.gtin ?? []).map(gtin => gtin.value ?? '').filter(Boolean),
          images: [...new Set(images)],
          properties,
        },
      };
    } catch (error) {
      if (isConnectionDropped(error)) {
        throw new ConnectionDroppedError(`Page scrape connection dropped for ${url}`, error);
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.warn(`Scrape failed for ${url}${status ? ` (status ${status})` : ''}: ${errorMessage(error)}`);
      return { url, error: `Could not load page: ${errorMessage(error)}` };
    }
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
