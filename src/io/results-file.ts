import fs from 'fs';
import path from 'path';
import { stringify } from 'csv-stringify';
import type { BatchResult } from '../types';

export const RESULT_COLUMNS = ['barcode', 'sku', 'title', 'result'] as const;

const pad = (value: number) => String(value).padStart(2, '0');

/** batch_results_YYYYMMDD_HHMMSS.csv in local time. */
export function defaultResultsFilename(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `batch_results_${date}_${time}.csv`;
}

export function toResultRow(result: BatchResult): Record<(typeof RESULT_COLUMNS)[number], string> {
  const payload = result.status === 'completed' ? result.result : { error: result.error, status: result.status };
  return {
    barcode: result.barcode,
    sku: result.sku,
    title: result.title,
    result: JSON.stringify(payload),
  };
}

export function resultsToCsv(results: BatchResult[]): Promise<string> {
  return new Promise((resolve, reject) => {
    stringify(results.map(toResultRow), { header: true, columns: [...RESULT_COLUMNS] }, (error, output) => {
      if (error) {
        reject(error);
        return;
      }
      resolve(output);
    });
  });
}

export async function writeResultsFile(filePath: string, results: BatchResult[]): Promise<string> {
  const csv = await resultsToCsv(results);
  await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
  await fs.promises.writeFile(filePath, csv, 'utf8');
  return filePath;
}
