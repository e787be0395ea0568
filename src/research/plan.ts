import type { ProductQuery, SearchAttempt } from '../types';

export const BARCODE_ATTEMPTS: readonly SearchAttempt[] = [
  { name: 'barcode_google', kind: 'results', provider: 'google', promptKey: 'barcode', inputTemplate: '{barcode}' },
  { name: 'barcode_yahoo', kind: 'results', provider: 'yahoo', promptKey: 'barcode', inputTemplate: '{barcode}' },
  { name: 'barcode_web', kind: 'results', provider: 'web', promptKey: 'barcode', inputTemplate: 'Barcode: {barcode}' },
];

export const SKU_ATTEMPTS: readonly SearchAttempt[] = [
  { name: 'sku_google', kind: 'results', provider: 'google', promptKey: 'sku', inputTemplate: '{sku}' },
  { name: 'sku_yahoo', kind: 'results', provider: 'yahoo', promptKey: 'sku', inputTemplate: '{sku}' },
  { name: 'sku_web', kind: 'results', provider: 'web', promptKey: 'sku', inputTemplate: 'SKU: {sku}' },
];

// Always tried last, whatever identifiers are available.
export const TITLE_SKU_ATTEMPTS: readonly SearchAttempt[] = [
  { name: 'title_sku_google', kind: 'results', provider: 'google', promptKey: 'title_sku', inputTemplate: '{title} {sku}' },
  {
    name: 'all_fields_web',
    kind: 'all-fields',
    provider: 'web',
    promptKey: 'all_fields',
    inputTemplate: 'This is the product: Barcode/UPC: {barcode}, Product SKU/part number: {sku}, Title: {title}',
  },
];

export const DEFAULT_MIN_SKU_LENGTH = 5;

export function hasUsableSku(sku: string, minLength = DEFAULT_MIN_SKU_LENGTH): boolean {
  return sku.trim().length >= minLength;
}

export interface PlanOptions {
  minSkuLength?: number;
}

/** Ordered, frozen list of attempts for the identifiers this query actually has. */
export function buildSearchPlan(query: ProductQuery, options: PlanOptions = {}): readonly SearchAttempt[] {
  const plan: SearchAttempt[] = [];

  if (query.barcode.trim()) {
    plan.push(...BARCODE_ATTEMPTS);
  }
  if (hasUsableSku(query.sku, options.minSkuLength)) {
    plan.push(...SKU_ATTEMPTS);
  }
  plan.push(...TITLE_SKU_ATTEMPTS);

  return Object.freeze(plan.map(attempt => Object.freeze({ ...attempt })));
}

export function formatQuery(template: string, query: ProductQuery): string {
  return template
    .replace(/\{barcode\}/g, query.barcode)
    .replace(/\{sku\}/g, query.sku)
    .replace(/\{title\}/g, query.title)
    .trim();
}
