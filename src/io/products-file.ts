import fs from 'fs';
import { parse } from 'csv-parse';
import { z } from 'zod';
import type { ProductQueryInput } from '../research/normalizer';

const rowsSchema = z.array(z.record(z.string(), z.string()));

/**
 * Reads a products CSV with barcode, sku and title columns. Header names are
 * matched case-insensitively and every cell is kept as text, so leading
 * zeros in barcodes survive.
 */
export function parseProductsCsv(content: string): Promise<ProductQueryInput[]> {
  return new Promise((resolve, reject) => {
    parse(
      content,
      {
        bom: true,
        columns: (header: string[]) => header.map(name => name.trim().toLowerCase()),
        skip_empty_lines: true,
        trim: true,
      },
      (error, records: unknown) => {
        if (error) {
          reject(error);
          return;
        }
        const rows = rowsSchema.safeParse(records);
        if (!rows.success) {
          reject(new Error(`Unexpected CSV content: ${rows.error.message}`));
          return;
        }
        resolve(
          rows.data
            .map(row => ({ barcode: row.barcode ?? row.upc ?? '', sku: row.sku ?? '', title: row.title ?? '' }))
            .filter(row => row.barcode || row.sku || row.title)
        );
      }
    );
  });
}

export async function readProductsFile(filePath: string): Promise<ProductQueryInput[]> {
  return parseProductsCsv(await fs.promises.readFile(filePath, 'utf8'));
}
