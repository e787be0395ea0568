import express, { NextFunction, Request, Response } from 'express';
import path from 'path';
import type { Server } from 'http';
import { z } from 'zod';
import { logger } from './utils/logger';
import { config } from './config';
import { InvalidInputError, parseProductInput } from './io/product-input';
import { createServices } from './services/factory';
import type { ResearchService } from './services/research.service';
import type { BatchService } from './services/batch.service';

export interface AppDependencies {
  research: Pick<ResearchService, 'runSingle'>;
  batch: Pick<BatchService, 'runBatch'>;
  outputDir: string;
}

const batchBodySchema = z.object({
  products: z.array(z.unknown()).min(1, 'products must be a non-empty array'),
  concurrency: z.number().int().positive().optional(),
  outputFilename: z.string().optional(),
});

// Only plain file names, never paths out of the output directory.
const CSV_NAME = /^[\w.-]+\.csv$/;

export function createApp(deps: AppDependencies): express.Express {
  const app = express();
  app.use(express.json({ limit: '5mb' }));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.post('/api/v1/product-images', async (req, res, next) => {
    try {
      const input = parseProductInput(req.body);
      const result = await deps.research.runSingle(input);
      res.json(result);
    } catch (error) {
      next(error);
    }
  });

  app.post('/api/v1/product-images/batch', async (req, res, next) => {
    try {
      const body = batchBodySchema.safeParse(req.body);
      if (!body.success) {
        throw new InvalidInputError(body.error.issues.map(issue => issue.message).join('; '));
      }

      const products = body.data.products.map(parseProductInput);
      const filename = body.data.outputFilename;
      if (filename !== undefined && !CSV_NAME.test(filename)) {
        throw new InvalidInputError('outputFilename must be a plain .csv file name');
      }

      const summary = await deps.batch.runBatch(products, {
        concurrency: body.data.concurrency,
        outputPath: filename ? path.join(deps.outputDir, filename) : undefined,
      });
      res.json(summary);
    } catch (error) {
      next(error);
    }
  });

  app.get('/api/v1/batch-results/:filename', (req, res) => {
    const filename = path.basename(req.params.filename);
    if (!CSV_NAME.test(filename)) {
      res.status(400).json({ success: false, error: 'Invalid file name' });
      return;
    }
    res.download(path.join(deps.outputDir, filename), filename, error => {
      if (error && !res.headersSent) {
        res.status(404).json({ success: false, error: 'File not found' });
      }
    });
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof InvalidInputError) {
      res.status(400).json({ success: false, error: error.message });
      return;
    }
    logger.error('An unhandled error occurred while handling a request:', error);
    res.status(500).json({ success: false, error: 'Internal server error' });
  });

  return app;
}

export function startServer(port: number | string = config.port, onListen?: () => void): Server {
  process.on('unhandledRejection', reason => {
    logger.error('Unhandled Promise Rejection:', reason);
  });
  // Logged, not fatal.
  process.on('uncaughtException', err => {
    logger.error('Uncaught Exception:', err);
  });

  const listenPort: number = typeof port === 'string' ? parseInt(port, 10) : port;
  const { research, batch } = createServices(config);
  const app = createApp({ research, batch, outputDir: config.batch.outputDir });

  const server: Server = app.listen(listenPort, () => {
    const address = server.address();
    const boundPort = typeof address === 'string' ? address : address?.port;
    logger.info(`Server running on http://localhost:${boundPort}`);
    onListen?.();
  });

  return server;
}
