import type { FinalResult } from '../types';
import { logger } from '../utils/logger';
import { normalizeQuery, type ProductQueryInput } from '../research/normalizer';
import { buildSearchPlan } from '../research/plan';
import {
  applyDelta,
  createRunState,
  decideNext,
  type ResearchStage,
  type RunDelta,
  type RunState,
} from '../research/state';
import { finalizeResult } from '../research/finalize';
import { errorMessage } from '../research/errors';
import type { ImageCheckService } from './image-check.service';

export interface ResearchStages {
  search: ResearchStage;
  filter: ResearchStage;
  validate: ResearchStage;
  imageCheck: Pick<ImageCheckService, 'cleanPages'>;
}

export interface ResearchOptions {
  minSkuLength: number;
}

/**
 * Runs one product through search, filter and validation until an attempt
 * yields images or the plan is exhausted, then checks the images and builds
 * the final record.
 */
export class ResearchService {
  constructor(
    private readonly stages: ResearchStages,
    private readonly options: ResearchOptions
  ) {}

  async runSingle(input: ProductQueryInput): Promise<FinalResult> {
    const query = normalizeQuery(input);
    const plan = buildSearchPlan(query, { minSkuLength: this.options.minSkuLength });
    let state = createRunState(query, plan);

    logger.info(
      `Researching barcode="${query.barcode}" sku="${query.sku}" title="${query.title}" (${plan.length} attempts planned)`
    );

    let iteration = 0;
    do {
      iteration++;
      const attempt = state.plan[state.attemptIndex];
      // A search step that blows up still consumes its attempt.
      state = await this.step(state, 'search', this.stages.search, {
        attemptIndex: state.attemptIndex + 1,
        searchResult: null,
        searchSuccessful: false,
        filteredUrls: [],
        totalFilteredUrls: 0,
      });

      if (attempt.kind === 'results') {
        state = await this.step(state, 'filter', this.stages.filter, { filteredUrls: [], totalFilteredUrls: 0 });
        state = await this.step(state, 'validate', this.stages.validate, {});
      }

      logger.info(
        `Iteration ${iteration}: ${state.totalFilteredUrls} URL(s) kept by the filter, ${state.totalImages} image(s), ${state.totalChecked} URL(s) checked, attempt ${state.attemptIndex}/${plan.length}`
      );
    } while (decideNext(state) === 'continue');

    state = await this.checkImages(state);

    const finalResult = finalizeResult(state);
    logger.info(
      `Research finished: ${finalResult.totalValidatedImages} image(s) on ${finalResult.validatedPages.length} page(s)`
    );
    return finalResult;
  }

  private async step(state: RunState, name: string, stage: ResearchStage, fallback: RunDelta): Promise<RunState> {
    try {
      return applyDelta(state, await stage.run(state));
    } catch (error) {
      logger.error(`${name} stage failed: ${errorMessage(error)}`);
      return applyDelta(state, fallback);
    }
  }

  private async checkImages(state: RunState): Promise<RunState> {
    try {
      const cleaned = await this.stages.imageCheck.cleanPages(state.validatedPages);
      return applyDelta(state, { cleanedPages: cleaned.pages, cleanedImageCount: cleaned.totalImages });
    } catch (error) {
      logger.error(`Image check failed, keeping unchecked images: ${errorMessage(error)}`);
      return state;
    }
  }
}
