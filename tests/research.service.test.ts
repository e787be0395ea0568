import { describe, expect, it, vi } from 'vitest';
import { ResearchService, type ResearchStages } from '../src/services/research.service';
import { ImageCheckService } from '../src/services/image-check.service';
import { SearchStage } from '../src/research/search.stage';
import { FilterStage } from '../src/research/filter.stage';
import { ValidationStage } from '../src/research/validate.stage';
import { countImages, type RunDelta, type RunState } from '../src/research/state';
import { ToolPool, type ResearchTools } from '../src/sources/tool.pool';
import type { PageValidation, ScrapeVariant, SearchEngine, ValidatedPage } from '../src/types';
import { FakeImageFetcher, PNG_BYTES, ScriptedModel, page } from './helpers';

type StageFn = (state: RunState) => Promise<RunDelta>;

const passThroughImages = {
  cleanPages: async (pages: ValidatedPage[]) => ({ pages, totalImages: countImages(pages) }),
};

const advance: StageFn = async state => ({
  attemptIndex: state.attemptIndex + 1,
  searchSuccessful: true,
  searchResult: '{"results": [{}]}',
});

function stages(overrides: Partial<Record<'search' | 'filter' | 'validate', StageFn>> = {}) {
  const search = vi.fn<StageFn>(overrides.search ?? advance);
  const filter = vi.fn<StageFn>(overrides.filter ?? (async () => ({ filteredUrls: ['https://shop.test/a'] })));
  const validate = vi.fn<StageFn>(overrides.validate ?? (async () => ({ totalChecked: 1 })));
  const wired: ResearchStages = {
    search: { run: search },
    filter: { run: filter },
    validate: { run: validate },
    imageCheck: passThroughImages,
  };
  return { search, filter, validate, wired };
}

const QUERY = { barcode: '12345678901', sku: 'TRL-2041', title: 'Trail Runner 2 Shoe' };

describe('ResearchService.runSingle', () => {
  it('finishes after one iteration when it yields an image', async () => {
    const { search, filter, validate, wired } = stages({
      validate: async () => ({
        totalChecked: 1,
        totalImages: 1,
        validatedPages: [page('https://shop.test/a', ['https://cdn.test/a.png'])],
      }),
    });

    const result = await new ResearchService(wired, { minSkuLength: 5 }).runSingle(QUERY);

    expect(search).toHaveBeenCalledTimes(1);
    expect(filter).toHaveBeenCalledTimes(1);
    expect(validate).toHaveBeenCalledTimes(1);
    expect(result.product).toEqual({ barcode: '012345678901', title: 'Trail Runner 2 Shoe', sku: 'TRL-2041' });
    expect(result.totalValidatedImages).toBe(1);
    expect(result.totalChecked).toBe(1);
  });

  it('walks the whole plan when nothing is found', async () => {
    const { search, filter, validate, wired } = stages();

    const result = await new ResearchService(wired, { minSkuLength: 5 }).runSingle(QUERY);

    // 8 attempts; the last one is all-fields and skips filter and validation.
    expect(search).toHaveBeenCalledTimes(8);
    expect(filter).toHaveBeenCalledTimes(7);
    expect(validate).toHaveBeenCalledTimes(7);
    expect(result.totalChecked).toBe(7);
    expect(result.totalValidatedImages).toBe(0);
    expect(result.searchType).toBe('barcode');
  });

  it('still advances when the search stage throws', async () => {
    const { search, wired } = stages({
      search: async () => {
        throw new Error('unexpected');
      },
    });

    const result = await new ResearchService(wired, { minSkuLength: 5 }).runSingle({ title: 'Widget' });

    expect(search).toHaveBeenCalledTimes(2);
    expect(result.validatedPages).toEqual([]);
    expect(result.searchType).toBe('sku');
  });

  it('keeps earlier results when a later stage throws', async () => {
    const { validate, wired } = stages({
      validate: async () => {
        throw new Error('unexpected');
      },
    });

    const result = await new ResearchService(wired, { minSkuLength: 5 }).runSingle({ sku: 'AB12', title: 'Widget' });

    expect(validate).toHaveBeenCalledTimes(1);
    expect(result.totalChecked).toBe(0);
  });

  it('runs the real stages end to end', async () => {
    const serpAnswer = JSON.stringify({
      engine: 'google',
      total_results: 2,
      results: [
        { title: 'Trail Runner 2', url: 'https://shop.test/trail-runner-2', snippet: 'UPC 012345678901' },
        { title: 'Trail Runner 2', url: 'https://www.amazon.com/dp/B0TEST0001', snippet: 'Trail Runner 2 Shoe' },
      ],
    });
    const search = vi.fn(async (_engine: SearchEngine, _query: string) => serpAnswer);
    const validatePages = vi.fn(
      async (urls: string[], _instructions: string, _variant: ScrapeVariant): Promise<PageValidation> => ({
        validatedPages: urls.map(url => page(url, [`https://cdn.test${new URL(url).pathname}.png`])),
        invalidUrls: [],
      })
    );
    const tools = new ToolPool<ResearchTools>({ search: async () => ({ search }), scrape: async () => ({ validatePages }) });
    const model = new ScriptedModel({
      complete: async () =>
        '{"urls": ["https://shop.test/trail-runner-2", "https://www.amazon.com/dp/B0TEST0001"], "total_urls": 2}',
    });
    const fetcher = new FakeImageFetcher({
      'https://cdn.test/dp/B0TEST0001.png': { status: 200, body: PNG_BYTES },
      'https://cdn.test/trail-runner-2.png': { status: 403, body: PNG_BYTES },
    });

    const service = new ResearchService(
      {
        search: new SearchStage(model, tools, { maxRetries: 3 }),
        filter: new FilterStage(model),
        validate: new ValidationStage(model, tools, {
          batchSize: 3,
          baseTimeoutMs: 1000,
          perUrlTimeoutMs: 100,
          connectionRetries: 2,
          earlyExit: true,
        }),
        imageCheck: new ImageCheckService(fetcher, { concurrency: 10, timeoutMs: 1000 }),
      },
      { minSkuLength: 5 }
    );

    const result = await service.runSingle({ barcode: '012345678901', title: 'Trail Runner 2 Shoe' });

    expect(search).toHaveBeenCalledTimes(1);
    expect(search).toHaveBeenCalledWith('google', '012345678901');
    // Marketplace batch first; it yields an image, so the other URL is skipped.
    expect(validatePages).toHaveBeenCalledTimes(1);
    expect(validatePages.mock.calls[0][2]).toBe('marketplace');
    expect(result).toEqual({
      product: { barcode: '012345678901', title: 'Trail Runner 2 Shoe', sku: '' },
      searchType: 'barcode',
      totalChecked: 2,
      totalValidatedImages: 1,
      validatedPages: [page('https://www.amazon.com/dp/B0TEST0001', ['https://cdn.test/dp/B0TEST0001.png'])],
      invalidUrls: [{ url: 'https://shop.test/trail-runner-2', reasoning: 'Skipped: sufficient images already found' }],
    });
  });
});
