import { config as defaultConfig, type AppConfig } from '../config';
import type { LanguageModel } from '../types';
import { ToolPool, type ResearchTools } from '../sources/tool.pool';
import { SerpSearchSource } from '../sources/serp.source';
import { SearchStage } from '../research/search.stage';
import { FilterStage } from '../research/filter.stage';
import { ValidationStage } from '../research/validate.stage';
import { GeminiService } from './gemini.service';
import { PageScraperService } from './page-scraper.service';
import { AxiosImageFetcher, ImageCheckService } from './image-check.service';
import { ResearchService } from './research.service';
import { BatchService } from './batch.service';

export interface Services {
  research: ResearchService;
  batch: BatchService;
  tools: ToolPool<ResearchTools>;
}

/** Tools whose key is missing resolve to null and the stages fall back or skip. */
export function createToolPool(cfg: AppConfig, llm: LanguageModel): ToolPool<ResearchTools> {
  return new ToolPool<ResearchTools>({
    search: async () => {
      const apiKey = cfg.serp.apiKey;
      return apiKey ? new SerpSearchSource({ apiKey, baseUrl: cfg.serp.baseUrl, timeoutMs: cfg.serp.timeoutMs }) : null;
    },
    scrape: async () => {
      const apiKey = cfg.pageScrape.apiKey;
      return apiKey
        ? new PageScraperService(
            {
              apiKey,
              baseUrl: cfg.pageScrape.baseUrl,
              timeoutMs: cfg.research.validationBaseTimeoutMs,
              model: cfg.gemini.validationModel,
            },
            llm
          )
        : null;
    },
  });
}

export function createServices(cfg: AppConfig = defaultConfig, llm?: LanguageModel): Services {
  const model =
    llm ??
    new GeminiService({ apiKey: cfg.gemini.apiKey, defaultModel: cfg.gemini.searchModel, timeoutMs: cfg.gemini.timeoutMs });
  const tools = createToolPool(cfg, model);

  const research = new ResearchService(
    {
      search: new SearchStage(model, tools, { maxRetries: cfg.research.searchMaxRetries, model: cfg.gemini.searchModel }),
      filter: new FilterStage(model, { model: cfg.gemini.filterModel }),
      validate: new ValidationStage(model, tools, {
        batchSize: cfg.research.validationBatchSize,
        baseTimeoutMs: cfg.research.validationBaseTimeoutMs,
        perUrlTimeoutMs: cfg.research.validationPerUrlTimeoutMs,
        connectionRetries: cfg.research.connectionRetries,
        earlyExit: cfg.research.earlyExit,
        model: cfg.gemini.validationModel,
      }),
      imageCheck: new ImageCheckService(new AxiosImageFetcher(cfg.imageCheck.userAgent), {
        concurrency: cfg.imageCheck.concurrency,
        timeoutMs: cfg.imageCheck.timeoutMs,
      }),
    },
    { minSkuLength: cfg.research.minSkuLength }
  );

  const batch = new BatchService(research, {
    concurrency: cfg.batch.concurrency,
    maxRetries: cfg.batch.maxRetries,
    retryDelayMs: cfg.batch.retryDelayMs,
    outputDir: cfg.batch.outputDir,
  });

  return { research, batch, tools };
}
