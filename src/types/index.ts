import type { ResponseSchema } from '@google/generative-ai';
import type { z } from 'zod';

export interface ProductQuery {
  barcode: string;
  sku: string;
  title: string;
}

export type SearchType = 'barcode' | 'sku';

/** google and yahoo go through the SERP API; web is the language model's own web search. */
export type SearchProvider = 'google' | 'yahoo' | 'web';

export type SearchEngine = Exclude<SearchProvider, 'web'>;

export type SearchAttemptName =
  | 'barcode_google'
  | 'barcode_yahoo'
  | 'barcode_web'
  | 'sku_google'
  | 'sku_yahoo'
  | 'sku_web'
  | 'title_sku_google'
  | 'all_fields_web';

export type PromptKey = 'barcode' | 'sku' | 'title_sku' | 'all_fields';

interface SearchAttemptBase {
  name: SearchAttemptName;
  promptKey: PromptKey;
  inputTemplate: string;
}

/** Returns raw hits that still go through filtering and validation. */
export interface ResultsSearchAttempt extends SearchAttemptBase {
  kind: 'results';
  provider: SearchProvider;
}

/** Visits pages itself and returns validated pages directly. */
export interface AllFieldsSearchAttempt extends SearchAttemptBase {
  kind: 'all-fields';
  provider: 'web';
}

export type SearchAttempt = ResultsSearchAttempt | AllFieldsSearchAttempt;

export interface Weight {
  unitOfMeasure: string;
  value: number | null;
}

/** Inches. */
export interface Dimensions {
  length: number | null;
  width: number | null;
  height: number | null;
}

export interface ValidatedPage {
  url: string;
  validationMethod: string;
  imageUrls: string[];
  reasoning: string;
  description: string;
  brand: string;
  weight: Weight;
  dimensions: Dimensions;
}

export interface InvalidUrlRecord {
  url: string;
  reasoning: string;
}

export type SearchOutcome = 'success' | 'empty' | 'failed';

export interface SearchDiagnostics {
  attempt: SearchAttemptName;
  outcome: SearchOutcome;
  retries: number;
}

export interface FinalResult {
  product: ProductQuery;
  searchType: SearchType;
  totalChecked: number;
  totalValidatedImages: number;
  validatedPages: ValidatedPage[];
  invalidUrls: InvalidUrlRecord[];
}

export interface BatchSuccess extends ProductQuery {
  status: 'completed';
  result: FinalResult;
}

export interface BatchFailure extends ProductQuery {
  status: 'failed';
  error: string;
}

export type BatchResult = BatchSuccess | BatchFailure;

export interface BatchSummary {
  totalProducts: number;
  successful: number;
  failed: number;
  outputFile: string;
  results: BatchResult[];
}

// --- Capabilities consumed by the research core ---

/**
 * A strict output contract: the schema the provider enforces and the parser that
 * checks and maps what comes back.
 */
export interface StructuredOutput<T> {
  name: string;
  responseSchema: ResponseSchema;
  parser: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export interface CompletionOptions {
  model?: string;
  webSearch?: boolean;
  timeoutMs?: number;
}

export interface LanguageModel {
  complete(system: string, user: string, options?: CompletionOptions): Promise<string>;
  completeStructured<T>(
    system: string,
    user: string,
    output: StructuredOutput<T>,
    options?: CompletionOptions
  ): Promise<T>;
}

export interface SearchTool {
  /** Raw provider text; classification and parsing happen in the search stage. */
  search(engine: SearchEngine, query: string): Promise<string>;
  close?(): Promise<void>;
}

export type ScrapeVariant = 'marketplace' | 'general';

export interface PageValidation {
  validatedPages: ValidatedPage[];
  invalidUrls: InvalidUrlRecord[];
}

export interface PageScrapeTool {
  validatePages(urls: string[], instructions: string, variant: ScrapeVariant): Promise<PageValidation>;
  close?(): Promise<void>;
}

export interface ImageResponse {
  status: number;
  headers: Record<string, string | undefined>;
  body: AsyncIterable<Buffer>;
  /** Releases the underlying connection once enough bytes were read. */
  release(): void;
}

export interface ImageFetcher {
  fetch(url: string, timeoutMs: number): Promise<ImageResponse>;
}
