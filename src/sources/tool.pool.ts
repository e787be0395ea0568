import { Mutex } from 'async-mutex';
import { logger } from '../utils/logger';
import { errorMessage } from '../research/errors';
import type { PageScrapeTool, SearchTool } from '../types';

export interface PooledTool {
  close?(): Promise<void>;
}

export type ToolFactories<T> = { [K in keyof T]: () => Promise<T[K] | null> };

type ToolCache<T> = { [K in keyof T]?: T[K] | null };

/**
 * Shared tool/session handles for every concurrent run. Creation and
 * invalidation happen under one lock, so a run that hits a dropped
 * connection replaces the cache wholesale and its siblings never pick up
 * the broken handle. A factory returning null means the tool is not
 * configured; that answer is cached too.
 */
export class ToolPool<T extends { [K in keyof T]: PooledTool }> {
  private readonly mutex = new Mutex();
  private cache: ToolCache<T> = {};
  private created: PooledTool[] = [];
  private generation = 0;

  constructor(private readonly factories: ToolFactories<T>) {}

  async acquire<K extends keyof T>(key: K): Promise<T[K] | null> {
    return this.mutex.runExclusive(async () => {
      const cached = this.cache[key];
      if (cached !== undefined) {
        return cached;
      }

      try {
        const tool = await this.factories[key]();
        this.cache[key] = tool;
        if (tool) {
          this.created.push(tool);
          logger.debug(`Created tool "${String(key)}" (generation ${this.generation})`);
        } else {
          logger.warn(`Tool "${String(key)}" is not configured`);
        }
        return tool;
      } catch (error) {
        // Not cached: the next acquire tries again.
        logger.error(`Failed to create tool "${String(key)}": ${errorMessage(error)}`);
        return null;
      }
    });
  }

  /** Drops every cached handle; later acquires build fresh ones. */
  async invalidate(): Promise<void> {
    await this.mutex.runExclusive(async () => {
      const stale = this.created;
      this.cache = {};
      this.created = [];
      this.generation++;

      for (const tool of stale) {
        if (tool.close) {
          await tool.close().catch((error: unknown) => {
            logger.warn(`Closing stale tool failed: ${errorMessage(error)}`);
          });
        }
      }
      logger.info(`Tool cache invalidated (generation ${this.generation})`);
    });
  }

  get currentGeneration(): number {
    return this.generation;
  }
}

export interface ResearchTools {
  search: SearchTool;
  scrape: PageScrapeTool;
}

export type ResearchToolPool = ToolPool<ResearchTools>;
