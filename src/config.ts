import dotenv from 'dotenv';
dotenv.config();

const flag = (value: string | undefined, fallback: string): boolean =>
  (value || fallback).toLowerCase() === 'true';

export const config = {
  port: parseInt(process.env.PORT || '3000', 10),
  logLevel: process.env.LOG_LEVEL || 'info',
  gemini: {
    apiKey: process.env.GOOGLE_GENERATIVE_AI_API_KEY,
    searchModel: process.env.RESEARCH_SEARCH_MODEL || 'gemini-1.5-flash',
    filterModel: process.env.RESEARCH_FILTER_MODEL || 'gemini-1.5-flash',
    validationModel: process.env.RESEARCH_VALIDATION_MODEL || 'gemini-1.5-pro',
    timeoutMs: parseInt(process.env.GEMINI_TIMEOUT_MS || '60000', 10),
  },
  serp: {
    apiKey: process.env.SERPAPI_KEY,
    baseUrl: process.env.SERPAPI_BASE_URL || 'https://serpapi.com/search.json',
    timeoutMs: parseInt(process.env.SERPAPI_TIMEOUT_MS || '30000', 10),
  },
  pageScrape: {
    apiKey: process.env.PAGE_SCRAPE_API_KEY,
    baseUrl: process.env.PAGE_SCRAPE_BASE_URL || 'https://api.zyte.com/v1/extract',
  },
  research: {
    minSkuLength: parseInt(process.env.RESEARCH_MIN_SKU_LENGTH || '5', 10),
    searchMaxRetries: parseInt(process.env.RESEARCH_SEARCH_MAX_RETRIES || '3', 10),
    validationBatchSize: parseInt(process.env.RESEARCH_VALIDATION_BATCH_SIZE || '3', 10),
    validationBaseTimeoutMs: parseInt(process.env.RESEARCH_VALIDATION_BASE_TIMEOUT_MS || '60000', 10),
    validationPerUrlTimeoutMs: parseInt(process.env.RESEARCH_VALIDATION_PER_URL_TIMEOUT_MS || '45000', 10),
    connectionRetries: parseInt(process.env.RESEARCH_CONNECTION_RETRIES || '2', 10),
    earlyExit: flag(process.env.RESEARCH_EARLY_EXIT, 'true'),
  },
  imageCheck: {
    concurrency: parseInt(process.env.IMAGE_CHECK_CONCURRENCY || '10', 10),
    timeoutMs: parseInt(process.env.IMAGE_CHECK_TIMEOUT_MS || '10000', 10),
    userAgent: process.env.IMAGE_CHECK_USER_AGENT || 'Mozilla/5.0 (compatible; ProductImageResearch/1.0)',
  },
  batch: {
    concurrency: parseInt(process.env.RESEARCH_BATCH_CONCURRENCY || '3', 10),
    maxRetries: parseInt(process.env.RESEARCH_BATCH_MAX_RETRIES || '1', 10),
    retryDelayMs: parseInt(process.env.RESEARCH_BATCH_RETRY_DELAY_MS || '1000', 10),
    outputDir: process.env.RESEARCH_BATCH_OUTPUT_DIR || process.cwd(),
  },
};

export type AppConfig = typeof config;
