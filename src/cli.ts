#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { config } from './config';
import { logger } from './utils/logger';
import { startServer } from './server';
import { createServices } from './services/factory';
import { readProductsFile } from './io/products-file';

const positiveInt = (value: string): number => {
  const parsed = parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
};

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('product-image-research')
    .description('Find and validate product images from a barcode, SKU and/or title')
    .version('1.0.0');

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('-p, --port <port>', 'port to listen on', positiveInt, config.port)
    .action((options: { port: number }) => {
      startServer(options.port);
    });

  program
    .command('lookup')
    .description('Research a single product and print the result as JSON')
    .option('-b, --barcode <barcode>', 'UPC/EAN barcode')
    .option('-s, --sku <sku>', 'SKU or part number')
    .option('-t, --title <title>', 'product title')
    .action(async (options: { barcode?: string; sku?: string; title?: string }) => {
      if (!options.barcode && !options.sku && !options.title) {
        throw new InvalidArgumentError('Provide at least one of --barcode, --sku or --title.');
      }
      const { research, tools } = createServices(config);
      try {
        const result = await research.runSingle(options);
        process.stdout.write(`${JSON.stringify(result, null, 2)}\n`);
      } finally {
        await tools.invalidate();
      }
    });

  program
    .command('batch')
    .description('Research every product in a CSV file (barcode, sku, title columns)')
    .argument('<file>', 'CSV file with products')
    .option('-o, --output <path>', 'where to write the results CSV')
    .option('-c, --concurrency <n>', 'products processed at once', positiveInt, config.batch.concurrency)
    .action(async (file: string, options: { output?: string; concurrency: number }) => {
      const products = await readProductsFile(file);
      const { batch, tools } = createServices(config);
      try {
        const summary = await batch.runBatch(products, { concurrency: options.concurrency, outputPath: options.output });
        logger.info(`Processed ${summary.totalProducts} product(s): ${summary.successful} ok, ${summary.failed} failed`);
        process.stdout.write(`${summary.outputFile}\n`);
      } finally {
        await tools.invalidate();
      }
    });

  return program;
}

if (require.main === module) {
  buildProgram()
    .parseAsync(process.argv)
    .catch((error: unknown) => {
      logger.error('Command failed:', error);
      process.exitCode = 1;
    });
}
