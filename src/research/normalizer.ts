import type { ProductQuery } from '../types';
import { logger } from '../utils/logger';

export type BarcodeStatus =
  | 'upc-a'
  | 'padded'
  | 'ean-13-trimmed'
  | 'ean-13'
  | 'gtin-14-trimmed'
  | 'out-of-range'
  | 'empty';

export interface NormalizedBarcode {
  value: string;
  status: BarcodeStatus;
}

export type RawBarcode = string | number | null | undefined;

// Spreadsheet exports turn numeric cells into "12345678901.0".
const FLOAT_SUFFIX = /^(\d+)\.0+$/;

function toDigitString(raw: RawBarcode): string {
  if (raw === null || raw === undefined) return '';
  if (typeof raw === 'number') {
    return Number.isFinite(raw) ? String(Math.trunc(Math.abs(raw))) : '';
  }
  const trimmed = raw.trim();
  const float = FLOAT_SUFFIX.exec(trimmed);
  return float ? float[1] : trimmed;
}

/**
 * Brings a barcode to its canonical 12-digit UPC-A form where the digit
 * count allows it. Never fails: unknown shapes come back as the cleaned digits.
 */
export function normalizeBarcode(raw: RawBarcode): NormalizedBarcode {
  const digits = toDigitString(raw).replace(/\D/g, '');

  switch (digits.length) {
    case 0:
      return { value: '', status: 'empty' };
    case 12:
      return { value: digits, status: 'upc-a' };
    case 11:
      return { value: `0${digits}`, status: 'padded' };
    case 13:
      if (digits.startsWith('0')) {
        return { value: digits.slice(1), status: 'ean-13-trimmed' };
      }
      logger.info(`Non-standard barcode kept as EAN-13: ${digits}`);
      return { value: digits, status: 'ean-13' };
    case 14:
      // Packaging indicator plus the implied leading zero.
      return { value: digits.slice(2), status: 'gtin-14-trimmed' };
    default:
      logger.warn(`Barcode length ${digits.length} is out of range, keeping cleaned digits: ${digits}`);
      return { value: digits, status: 'out-of-range' };
  }
}

export interface ProductQueryInput {
  barcode?: RawBarcode;
  sku?: string | number | null;
  title?: string | number | null;
}

export function normalizeQuery(input: ProductQueryInput): ProductQuery {
  const text = (value: string | number | null | undefined) =>
    value === null || value === undefined ? '' : String(value).trim();

  return {
    barcode: normalizeBarcode(input.barcode).value,
    sku: text(input.sku),
    title: text(input.title),
  };
}
