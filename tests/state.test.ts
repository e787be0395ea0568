import { describe, expect, it } from 'vitest';
import { applyDelta, createRunState, decideNext, mergeInvalidUrls, type RunDelta } from '../src/research/state';
import { buildSearchPlan } from '../src/research/plan';
import { page, product } from './helpers';

const fresh = () => createRunState(product(), buildSearchPlan(product()));

describe('applyDelta', () => {
  it('adds counters and appends pages', () => {
    const state = applyDelta(fresh(), {
      totalChecked: 3,
      totalImages: 2,
      validatedPages: [page('https://shop.test/a', ['https://cdn.test/1.jpg', 'https://cdn.test/2.jpg'])],
    });
    const next = applyDelta(state, { totalChecked: 2, totalImages: 0, validatedPages: [page('https://shop.test/b')] });

    expect(next.totalChecked).toBe(5);
    expect(next.totalImages).toBe(2);
    expect(next.validatedPages.map(p => p.url)).toEqual(['https://shop.test/a', 'https://shop.test/b']);
  });

  it('sums counters over any number of deltas', () => {
    const deltas: RunDelta[] = [
      { totalChecked: 3, totalImages: 0 },
      { totalChecked: 0 },
      { totalChecked: 4, totalImages: 1 },
      { totalImages: 2 },
    ];
    const state = deltas.reduce(applyDelta, fresh());
    expect(state.totalChecked).toBe(7);
    expect(state.totalImages).toBe(3);
  });

  it('replaces plain fields', () => {
    const state = applyDelta(fresh(), { filteredUrls: ['https://shop.test/a'] });
    expect(applyDelta(state, { filteredUrls: [] }).filteredUrls).toEqual([]);
  });

  it('replaces the filtered URL count each iteration', () => {
    const state = applyDelta(fresh(), {
      filteredUrls: ['https://shop.test/a', 'https://shop.test/b'],
      totalFilteredUrls: 2,
    });
    expect(applyDelta(state, { totalFilteredUrls: 1 }).totalFilteredUrls).toBe(1);
  });

  it('does not mutate the previous state', () => {
    const state = fresh();
    applyDelta(state, { totalChecked: 1, attemptIndex: 1 });
    expect(state.totalChecked).toBe(0);
    expect(state.attemptIndex).toBe(0);
  });

  it('never moves the attempt index backwards', () => {
    const state = applyDelta(fresh(), { attemptIndex: 2 });
    expect(() => applyDelta(state, { attemptIndex: 1 })).toThrow('cannot move backwards');
  });
});

describe('mergeInvalidUrls', () => {
  it('keeps one record per URL with the first reasoning', () => {
    const merged = mergeInvalidUrls(
      [{ url: 'https://shop.test/a', reasoning: 'wrong size' }],
      [
        { url: 'https://shop.test/a', reasoning: 'different product' },
        { url: 'https://shop.test/b', reasoning: 'no barcode' },
        { url: 'https://shop.test/b', reasoning: 'no barcode' },
      ]
    );
    expect(merged).toEqual([
      { url: 'https://shop.test/a', reasoning: 'wrong size' },
      { url: 'https://shop.test/b', reasoning: 'no barcode' },
    ]);
  });

  it('drops records without a URL', () => {
    expect(mergeInvalidUrls([], [{ url: '', reasoning: 'x' }])).toEqual([]);
  });
});

describe('decideNext', () => {
  it('stops once any image is found', () => {
    expect(decideNext(applyDelta(fresh(), { attemptIndex: 1, totalImages: 1 }))).toBe('done');
  });

  it('stops when the plan is exhausted', () => {
    const state = fresh();
    expect(decideNext(applyDelta(state, { attemptIndex: state.plan.length }))).toBe('done');
  });

  it('continues otherwise', () => {
    expect(decideNext(applyDelta(fresh(), { attemptIndex: 1 }))).toBe('continue');
  });
});

describe('createRunState', () => {
  it('picks the identifier family from the barcode', () => {
    expect(fresh().searchType).toBe('barcode');
    const query = product({ barcode: '' });
    expect(createRunState(query, buildSearchPlan(query)).searchType).toBe('sku');
  });
});
