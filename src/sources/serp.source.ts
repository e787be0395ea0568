import http from 'http';
import https from 'https';
import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import type { SearchEngine, SearchTool } from '../types';
import { logger } from '../utils/logger';
import { ConnectionDroppedError, ProviderError, TimeoutError, isConnectionDropped } from '../research/errors';

export interface SerpSearchOptions {
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
}

const serpResponseSchema = z
  .object({
    error: z.string().optional(),
    search_information: z
      .object({
        total_results: z.number().optional(),
        organic_results_state: z.string().optional(),
      })
      .passthrough()
      .optional(),
    organic_results: z
      .array(
        z
          .object({
            title: z.string().optional(),
            link: z.string().optional(),
            snippet: z.string().optional(),
          })
          .passthrough()
      )
      .optional(),
  })
  .passthrough();

const NO_RESULTS_ERROR = /hasn['’]t returned any results/i;

/**
 * Google and Yahoo web search through the SERP API. Each instance owns its
 * keep-alive agents, so closing it drops the underlying sockets.
 */
export class SerpSearchSource implements SearchTool {
  name = 'serp';
  private readonly httpAgent = new http.Agent({ keepAlive: true });
  private readonly httpsAgent = new https.Agent({ keepAlive: true });
  private readonly client: AxiosInstance;

  constructor(private readonly options: SerpSearchOptions) {
    this.client = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs,
      httpAgent: this.httpAgent,
      httpsAgent: this.httpsAgent,
      validateStatus: () => true,
    });
  }

  async search(engine: SearchEngine, query: string): Promise<string> {
    const params: Record<string, string> = { engine, api_key: this.options.apiKey };
    // Yahoo takes its query as "p".
    params[engine === 'yahoo' ? 'p' : 'q'] = query;

    logger.debug(`SERP ${engine} search: "${query}"`);

    let status: number;
    let data: unknown;
    try {
      const response = await this.client.get('', { params });
      status = response.status;
      data = response.data;
    } catch (error) {
      if (axios.isAxiosError(error) && error.code === 'ECONNABORTED') {
        throw new TimeoutError(`SERP ${engine} search`, this.options.timeoutMs);
      }
      if (isConnectionDropped(error)) {
        throw new ConnectionDroppedError(`SERP ${engine} connection dropped`, error);
      }
      throw error;
    }

    const parsed = serpResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ProviderError(`Unexpected SERP ${engine} response (status ${status})`, this.name, status);
    }

    const body = parsed.data;
    if (body.error) {
      if (NO_RESULTS_ERROR.test(body.error)) {
        return JSON.stringify({ engine, query, total_results: 0, error: body.error, results: [] });
      }
      throw new ProviderError(`SERP ${engine} error: ${body.error}`, this.name, status);
    }
    if (status >= 400) {
      throw new ProviderError(`SERP ${engine} returned status ${status}`, this.name, status);
    }

    const results = (body.organic_results ?? [])
      .filter(result => result.link)
      .map(result => ({
        title: result.title ?? '',
        url: result.link ?? '',
        snippet: result.snippet ?? '',
      }));

    return JSON.stringify({
      engine,
      query,
      total_results: body.search_information?.total_results ?? results.length,
      organic_results_state: body.search_information?.organic_results_state,
      results,
    });
  }

  async close(): Promise<void> {
    this.httpAgent.destroy();
    this.httpsAgent.destroy();
  }
}
