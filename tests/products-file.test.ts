import { describe, expect, it } from 'vitest';
import { parseProductsCsv } from '../src/io/products-file';

describe('parseProductsCsv', () => {
  it('reads columns case-insensitively and keeps every cell as text', async () => {
    const csv = 'Barcode,SKU,Title\n012345678901,AB-100,Red Shoe\n,,\n00123,X1,"Blue, Shoe"\n';

    expect(await parseProductsCsv(csv)).toEqual([
      { barcode: '012345678901', sku: 'AB-100', title: 'Red Shoe' },
      { barcode: '00123', sku: 'X1', title: 'Blue, Shoe' },
    ]);
  });

  it('accepts a UPC column and missing columns', async () => {
    expect(await parseProductsCsv('upc,title\n12345678901,Lamp\n')).toEqual([
      { barcode: '12345678901', sku: '', title: 'Lamp' },
    ]);
  });

  it('rejects malformed CSV', async () => {
    await expect(parseProductsCsv('barcode,sku\n"unterminated,1\n')).rejects.toThrow();
  });
});
