import path from 'path';
import { Semaphore } from 'async-mutex';
import type { BatchResult, BatchSummary, ProductQuery } from '../types';
import { logger } from '../utils/logger';
import { sleep } from '../utils/timeout';
import type { ProductQueryInput } from '../research/normalizer';
import { errorMessage } from '../research/errors';
import { defaultResultsFilename, writeResultsFile } from '../io/results-file';
import type { ResearchService } from './research.service';

const asGiven = (value: string | number | null | undefined): string =>
  value === null || value === undefined ? '' : String(value);

/** Result rows echo the identifiers the caller sent, not the normalised ones. */
function identifiersOf(input: ProductQueryInput): ProductQuery {
  return { barcode: asGiven(input.barcode), sku: asGiven(input.sku), title: asGiven(input.title) };
}

export interface BatchServiceOptions {
  concurrency: number;
  maxRetries: number;
  retryDelayMs: number;
  outputDir: string;
}

export interface RunBatchOptions {
  concurrency?: number;
  /** Full path of the CSV to write; defaults to a timestamped file in the output directory. */
  outputPath?: string;
}

export class BatchService {
  constructor(
    private readonly research: Pick<ResearchService, 'runSingle'>,
    private readonly options: BatchServiceOptions
  ) {}

  async runBatch(inputs: ProductQueryInput[], options: RunBatchOptions = {}): Promise<BatchSummary> {
    if (!inputs.length) {
      throw new Error('No products to process');
    }

    const concurrency = Math.max(1, options.concurrency ?? this.options.concurrency);
    const semaphore = new Semaphore(concurrency);
    logger.info(`Starting batch of ${inputs.length} product(s) with concurrency ${concurrency}`);

    // Collected by index, so the output keeps input order whatever finishes first.
    const results = await Promise.all(
      inputs.map((input, index) => semaphore.runExclusive(() => this.runOne(input, index, inputs.length)))
    );

    const outputFile = options.outputPath ?? path.join(this.options.outputDir, defaultResultsFilename());
    await writeResultsFile(outputFile, results);

    const successful = results.filter(result => result.status === 'completed').length;
    logger.info(`Batch finished: ${successful}/${results.length} succeeded, results in ${outputFile}`);

    return {
      totalProducts: results.length,
      successful,
      failed: results.length - successful,
      outputFile,
      results,
    };
  }

  private async runOne(input: ProductQueryInput, index: number, total: number): Promise<BatchResult> {
    const given = identifiersOf(input);
    const label = `[${index + 1}/${total}] ${given.barcode || given.sku || given.title}`;
    let lastError = 'Unknown error';

    for (let attempt = 0; attempt <= this.options.maxRetries; attempt++) {
      try {
        const result = await this.research.runSingle(input);
        logger.info(`${label}: ${result.totalValidatedImages} image(s)`);
        return { ...given, status: 'completed', result };
      } catch (error) {
        lastError = errorMessage(error);
        if (attempt < this.options.maxRetries) {
          logger.warn(`${label} failed, retrying in ${this.options.retryDelayMs}ms: ${lastError}`);
          await sleep(this.options.retryDelayMs);
        }
      }
    }

    logger.error(`${label} failed: ${lastError}`);
    return { ...given, status: 'failed', error: lastError };
  }
}
