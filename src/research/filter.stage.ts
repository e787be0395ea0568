import type { LanguageModel } from '../types';
import { logger } from '../utils/logger';
import { parseJsonObject } from '../utils/parsing';
import { dedupe } from '../utils/url';
import type { ResearchStage, RunDelta, RunState } from './state';
import { filterPrompt } from './prompts';
import { filterParser } from './contracts';
import { errorMessage } from './errors';

const SYSTEM = 'You filter web search results for product research. Answer with JSON only.';

export interface FilterStageOptions {
  model?: string;
}

/** Narrows the raw search hits to URLs worth validating. Any failure means nothing to validate this round. */
export class FilterStage implements ResearchStage {
  constructor(
    private readonly llm: LanguageModel,
    private readonly options: FilterStageOptions = {}
  ) {}

  async run(state: RunState): Promise<RunDelta> {
    if (!state.searchSuccessful || !state.searchResult) {
      return { filteredUrls: [], totalFilteredUrls: 0 };
    }

    try {
      const text = await this.llm.complete(SYSTEM, filterPrompt(state.query, state.searchResult), {
        model: this.options.model,
      });
      const parsed = filterParser.safeParse(parseJsonObject(text));
      if (!parsed.success) {
        logger.warn(`Filter response did not match the expected shape: ${parsed.error.message}`);
        return { filteredUrls: [], totalFilteredUrls: 0 };
      }

      const urls = dedupe(parsed.data.urls.map(url => url.trim()).filter(Boolean));
      logger.info(`Filter kept ${urls.length} URL(s)`);
      return { filteredUrls: urls, totalFilteredUrls: urls.length };
    } catch (error) {
      logger.warn(`Filter failed: ${errorMessage(error)}`);
      return { filteredUrls: [], totalFilteredUrls: 0 };
    }
  }
}
