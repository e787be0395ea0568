import { z } from 'zod';
import type { ProductQueryInput } from '../research/normalizer';
import { isRecord } from '../utils/parsing';

const scalar = z.union([z.string(), z.number()]).nullish();

const productSchema = z
  .object({ barcode: scalar, upc: scalar, sku: scalar, title: scalar })
  .refine(p => [p.barcode, p.upc, p.sku, p.title].some(value => value !== null && value !== undefined && String(value).trim()), {
    message: 'At least one of barcode, sku or title is required',
  });

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

function lowerKeys(value: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(value).map(([key, entry]) => [key.trim().toLowerCase(), entry]));
}

/**
 * Accepts {barcode, sku, title} in any key casing, optionally wrapped in
 * "product_input". Numeric barcodes are allowed.
 */
export function parseProductInput(body: unknown): ProductQueryInput {
  if (!isRecord(body)) {
    throw new InvalidInputError('Request body must be a JSON object');
  }

  let fields = lowerKeys(body);
  const wrapped = fields.product_input;
  if (isRecord(wrapped)) {
    fields = lowerKeys(wrapped);
  }

  const parsed = productSchema.safeParse(fields);
  if (!parsed.success) {
    throw new InvalidInputError(parsed.error.issues.map(issue => issue.message).join('; '));
  }

  const { barcode, upc, sku, title } = parsed.data;
  return { barcode: barcode ?? upc, sku, title };
}
