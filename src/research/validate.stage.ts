import type {
  InvalidUrlRecord,
  LanguageModel,
  PageValidation,
  ProductQuery,
  ScrapeVariant,
  SearchType,
  ValidatedPage,
} from '../types';
import type { ResearchToolPool } from '../sources/tool.pool';
import { logger } from '../utils/logger';
import { parseJsonObject } from '../utils/parsing';
import { withTimeout } from '../utils/timeout';
import { chunk, partitionByDomain } from '../utils/url';
import { countImages, type ResearchStage, type RunDelta, type RunState } from './state';
import { validationPrompt } from './prompts';
import { pageValidationParser } from './contracts';
import { ParseError, TimeoutError, errorMessage, isConnectionDropped } from './errors';

export const SKIPPED_REASON = 'Skipped: sufficient images already found';
export const MISSING_REASON = 'No validation result returned';

export interface ValidationStageOptions {
  batchSize: number;
  baseTimeoutMs: number;
  perUrlTimeoutMs: number;
  connectionRetries: number;
  /** Stop after the first batch that yields images and mark the rest skipped. */
  earlyExit: boolean;
  model?: string;
}

interface UrlBatch {
  variant: ScrapeVariant;
  urls: string[];
}

/**
 * Confirms filtered URLs in small batches. Marketplace pages go first and
 * through their own scrape variant. A failed or timed-out batch turns into
 * invalid records; the stage itself never throws for provider trouble.
 */
export class ValidationStage implements ResearchStage {
  constructor(
    private readonly llm: LanguageModel,
    private readonly tools: ResearchToolPool,
    private readonly options: ValidationStageOptions
  ) {}

  async run(state: RunState): Promise<RunDelta> {
    const urls = state.filteredUrls;
    if (!urls.length) {
      return {};
    }

    const { marketplace, general } = partitionByDomain(urls);
    const batches: UrlBatch[] = [
      ...chunk(marketplace, this.options.batchSize).map(batch => ({ variant: 'marketplace' as const, urls: batch })),
      ...chunk(general, this.options.batchSize).map(batch => ({ variant: 'general' as const, urls: batch })),
    ];
    logger.info(
      `Validating ${urls.length} URL(s): ${marketplace.length} marketplace, ${general.length} general, ${batches.length} batch(es)`
    );

    const pages: ValidatedPage[] = [];
    const invalid: InvalidUrlRecord[] = [];
    let images = 0;

    for (let i = 0; i < batches.length; i++) {
      const result = await this.validateBatch(state.query, state.searchType, batches[i]);
      pages.push(...result.validatedPages);
      invalid.push(...result.invalidUrls);
      images += countImages(result.validatedPages);

      const remaining = batches.slice(i + 1).flatMap(batch => batch.urls);
      if (this.options.earlyExit && images > 0 && remaining.length) {
        logger.info(`Found ${images} image(s); skipping ${remaining.length} remaining URL(s)`);
        invalid.push(...remaining.map(url => ({ url, reasoning: SKIPPED_REASON })));
        break;
      }
    }

    return {
      validatedPages: pages,
      invalidUrls: invalid,
      totalChecked: urls.length,
      totalImages: images,
    };
  }

  private async validateBatch(query: ProductQuery, searchType: SearchType, batch: UrlBatch): Promise<PageValidation> {
    const timeoutMs = this.options.baseTimeoutMs + this.options.perUrlTimeoutMs * batch.urls.length;
    const instructions = validationPrompt(query, batch.urls, searchType);

    for (let attempt = 0; ; attempt++) {
      try {
        const result = await withTimeout(
          this.callValidator(batch, instructions),
          timeoutMs,
          `Validation of ${batch.urls.length} ${batch.variant} URL(s)`
        );
        return reconcile(batch.urls, result);
      } catch (error) {
        if (isConnectionDropped(error) && attempt < this.options.connectionRetries) {
          logger.warn(`Validation connection dropped, retrying batch (${attempt + 1}/${this.options.connectionRetries})`);
          await this.tools.invalidate();
          continue;
        }

        const reasoning =
          error instanceof TimeoutError
            ? `Validation timed out after ${timeoutMs / 1000}s`
            : `Validation failed: ${errorMessage(error)}`;
        logger.warn(`${reasoning} for ${batch.urls.join(', ')}`);
        return { validatedPages: [], invalidUrls: batch.urls.map(url => ({ url, reasoning })) };
      }
    }
  }

  private async callValidator(batch: UrlBatch, instructions: string): Promise<PageValidation> {
    const scraper = await this.tools.acquire('scrape');
    if (scraper) {
      return scraper.validatePages(batch.urls, instructions, batch.variant);
    }

    // No page-scrape tool: let the model read the pages through web search.
    const text = await this.llm.complete(instructions, `Validate these URLs:\n${batch.urls.join('\n')}`, {
      model: this.options.model,
      webSearch: true,
    });
    const parsed = pageValidationParser.safeParse(parseJsonObject(text));
    if (!parsed.success) {
      throw new ParseError(`Validation response did not match the expected shape: ${parsed.error.message}`, text);
    }
    return parsed.data;
  }
}

function reconcile(urls: string[], result: PageValidation): PageValidation {
  const answered = new Set([...result.validatedPages.map(page => page.url), ...result.invalidUrls.map(record => record.url)]);
  const missing = urls.filter(url => !answered.has(url)).map(url => ({ url, reasoning: MISSING_REASON }));
  return { validatedPages: result.validatedPages, invalidUrls: [...result.invalidUrls, ...missing] };
}
