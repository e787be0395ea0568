import { describe, expect, it } from 'vitest';
import { buildSearchPlan, formatQuery, hasUsableSku } from '../src/research/plan';
import { product } from './helpers';

const names = (query = product(), minSkuLength?: number) =>
  buildSearchPlan(query, { minSkuLength }).map(attempt => attempt.name);

describe('buildSearchPlan', () => {
  it('orders barcode, SKU and title groups when every identifier is usable', () => {
    expect(names()).toEqual([
      'barcode_google',
      'barcode_yahoo',
      'barcode_web',
      'sku_google',
      'sku_yahoo',
      'sku_web',
      'title_sku_google',
      'all_fields_web',
    ]);
  });

  it('leaves out SKU attempts for a short SKU but keeps the title group', () => {
    expect(names(product({ sku: 'AB12' }))).toEqual([
      'barcode_google',
      'barcode_yahoo',
      'barcode_web',
      'title_sku_google',
      'all_fields_web',
    ]);
  });

  it('is never empty', () => {
    expect(names(product({ barcode: '', sku: '', title: '' }))).toEqual(['title_sku_google', 'all_fields_web']);
  });

  it('measures the trimmed SKU', () => {
    expect(hasUsableSku('ABCDE')).toBe(true);
    expect(hasUsableSku(' ABCD ')).toBe(false);
  });

  it('honours a custom minimum SKU length', () => {
    expect(names(product({ barcode: '', sku: 'AB1' }), 3)).toEqual([
      'sku_google',
      'sku_yahoo',
      'sku_web',
      'title_sku_google',
      'all_fields_web',
    ]);
  });

  it('returns a frozen plan', () => {
    const plan = buildSearchPlan(product());
    expect(Object.isFrozen(plan)).toBe(true);
    expect(Object.isFrozen(plan[0])).toBe(true);
  });

  it('tags the combined attempt as all-fields', () => {
    const plan = buildSearchPlan(product());
    expect(plan[plan.length - 1].kind).toBe('all-fields');
    expect(plan.slice(0, -1).every(attempt => attempt.kind === 'results')).toBe(true);
  });
});

describe('formatQuery', () => {
  it('fills placeholders and trims', () => {
    expect(formatQuery('{title} {sku}', product({ sku: '' }))).toBe('Trail Runner 2 Shoe');
    expect(formatQuery('Barcode: {barcode}', product())).toBe('Barcode: 012345678901');
  });
});
