import type {
  AllFieldsSearchAttempt,
  LanguageModel,
  ResultsSearchAttempt,
  SearchAttemptName,
  SearchOutcome,
  ValidatedPage,
} from '../types';
import type { ResearchToolPool } from '../sources/tool.pool';
import { logger } from '../utils/logger';
import { parseJsonObject, preview } from '../utils/parsing';
import { countImages, type ResearchStage, type RunDelta, type RunState } from './state';
import { formatQuery } from './plan';
import { searchPrompt } from './prompts';
import { ALL_FIELDS_OUTPUT, emptyResultsParser, searchResultsParser } from './contracts';
import { errorMessage, isConnectionDropped } from './errors';

// Stock "nothing found" phrasing from the providers, compared lowercase.
const EMPTY_SIGNATURES = [
  'no results',
  "hasn't returned any results",
  'hasn’t returned any results',
  '"total_results":0',
  '"total_results": 0',
  '"organic_results_state":"fully empty"',
  '"organic_results_state": "fully empty"',
  'your search did not match any documents',
  'did not match any documents',
];

export function isEmptyResult(text: string): boolean {
  const lower = text.toLowerCase();
  return EMPTY_SIGNATURES.some(signature => lower.includes(signature));
}

export type ResponseClass = 'success' | 'empty' | 'unparseable';

/** Zero-result signatures win over the parse; an explicit empty list is empty too. */
export function classifySearchResponse(text: string): ResponseClass {
  if (isEmptyResult(text)) {
    return 'empty';
  }
  try {
    const parsed = parseJsonObject(text);
    if (searchResultsParser.safeParse(parsed).success) {
      return 'success';
    }
    if (emptyResultsParser.safeParse(parsed).success) {
      return 'empty';
    }
  } catch (error) {
    logger.debug(`Search response is not JSON: ${errorMessage(error)}`);
  }
  return 'unparseable';
}

type TryResult<T> = { kind: 'success'; value: T } | { kind: 'empty' } | { kind: 'retry'; reason: string };

interface AttemptOutcome<T> {
  outcome: SearchOutcome;
  retries: number;
  value: T | null;
}

export interface SearchStageOptions {
  maxRetries: number;
  model?: string;
}

export class SearchStage implements ResearchStage {
  constructor(
    private readonly llm: LanguageModel,
    private readonly tools: ResearchToolPool,
    private readonly options: SearchStageOptions
  ) {}

  async run(state: RunState): Promise<RunDelta> {
    const attempt = state.plan[state.attemptIndex];
    if (!attempt) {
      return { searchSuccessful: false, searchResult: null, filteredUrls: [], totalFilteredUrls: 0 };
    }

    const query = formatQuery(attempt.inputTemplate, state.query);
    logger.info(`Search attempt ${state.attemptIndex + 1}/${state.plan.length}: ${attempt.name} "${query}"`);

    switch (attempt.kind) {
      case 'results':
        return this.runResults(state, attempt, query);
      case 'all-fields':
        return this.runAllFields(state, attempt, query);
      default: {
        const unreachable: never = attempt;
        throw new Error(`Unknown search attempt: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  private async runResults(state: RunState, attempt: ResultsSearchAttempt, query: string): Promise<RunDelta> {
    const result = await this.tryRepeatedly<string>(attempt.name, async () => {
      const text = await this.fetchResults(state, attempt, query);
      if (text === null) {
        return { kind: 'retry', reason: 'search tool is not available' };
      }
      switch (classifySearchResponse(text)) {
        case 'success':
          return { kind: 'success', value: text };
        case 'empty':
          return { kind: 'empty' };
        case 'unparseable':
          return { kind: 'retry', reason: `unparseable response: ${preview(text, 200)}` };
      }
    });

    return {
      attemptIndex: state.attemptIndex + 1,
      searchResult: result.value,
      searchSuccessful: result.outcome === 'success',
      lastSearch: { attempt: attempt.name, outcome: result.outcome, retries: result.retries },
      filteredUrls: [],
      totalFilteredUrls: 0,
    };
  }

  private async fetchResults(state: RunState, attempt: ResultsSearchAttempt, query: string): Promise<string | null> {
    const provider = attempt.provider;
    if (provider === 'web') {
      return this.llm.complete(searchPrompt(attempt.promptKey, state.query), query, {
        model: this.options.model,
        webSearch: true,
      });
    }

    const tool = await this.tools.acquire('search');
    if (!tool) {
      return null;
    }
    return tool.search(provider, query);
  }

  // Visits and extracts pages itself, so a hit skips filtering and validation.
  private async runAllFields(state: RunState, attempt: AllFieldsSearchAttempt, query: string): Promise<RunDelta> {
    const result = await this.tryRepeatedly<ValidatedPage[]>(attempt.name, async () => {
      const pages = await this.llm.completeStructured(searchPrompt(attempt.promptKey, state.query), query, ALL_FIELDS_OUTPUT, {
        model: this.options.model,
        webSearch: true,
      });
      return pages.length ? { kind: 'success', value: pages } : { kind: 'empty' };
    });

    const pages = result.value ?? [];
    return {
      attemptIndex: state.attemptIndex + 1,
      searchResult: null,
      searchSuccessful: result.outcome === 'success',
      lastSearch: { attempt: attempt.name, outcome: result.outcome, retries: result.retries },
      filteredUrls: [],
      totalFilteredUrls: 0,
      validatedPages: pages,
      totalChecked: pages.length,
      totalImages: countImages(pages),
    };
  }

  private async tryRepeatedly<T>(name: SearchAttemptName, call: () => Promise<TryResult<T>>): Promise<AttemptOutcome<T>> {
    const maxTries = Math.max(1, this.options.maxRetries);

    for (let tryIndex = 0; tryIndex < maxTries; tryIndex++) {
      let result: TryResult<T>;
      try {
        result = await call();
      } catch (error) {
        const message = errorMessage(error);
        if (isConnectionDropped(error)) {
          await this.tools.invalidate();
        }
        result = isEmptyResult(message) ? { kind: 'empty' } : { kind: 'retry', reason: message };
      }

      switch (result.kind) {
        case 'success':
          logger.info(`${name}: results found`);
          return { outcome: 'success', retries: tryIndex, value: result.value };
        case 'empty':
          logger.info(`${name}: no results`);
          return { outcome: 'empty', retries: tryIndex, value: null };
        case 'retry':
          logger.warn(`${name}: try ${tryIndex + 1}/${maxTries} failed (${result.reason})`);
      }
    }

    logger.warn(`${name}: giving up after ${maxTries} tries`);
    return { outcome: 'failed', retries: maxTries - 1, value: null };
  }
}
