import type { ProductQuery, PromptKey, SearchType } from '../types';

const identifiers = ({ barcode, sku, title }: ProductQuery) =>
  `Barcode/UPC: ${barcode || 'N/A'}\nSKU/part number: ${sku || 'N/A'}\nTitle: ${title || 'N/A'}`;

const RESULTS_FORMAT = `Return ONLY a JSON object, no text outside it:
{"results": [{"title": "<result title>", "url": "<result url>", "snippet": "<result snippet>"}]}
If the search returns nothing, return {"total_results": 0, "results": []}.`;

const SEARCH_FOCUS: Record<PromptKey, (query: ProductQuery) => string> = {
  barcode: q => `Search the web using ONLY the barcode value "${q.barcode}" as the query. Do not add words to it.`,
  sku: q => `Search the web using ONLY the SKU value "${q.sku}" as the query. Do not add words to it.`,
  title_sku: q => `Search the web for the product titled "${q.title}" with part number "${q.sku}".`,
  all_fields: q =>
    `Find retailer or manufacturer pages for this exact product, open them, and collect the product image URLs shown on each page.\n${identifiers(q)}`,
};

export function searchPrompt(key: PromptKey, query: ProductQuery): string {
  const focus = SEARCH_FOCUS[key](query);
  if (key === 'all_fields') {
    return `You are a product research assistant with web search.
${focus}

Rules:
- Only include pages that describe this exact product (same barcode or SKU, same variant).
- Only include direct image URLs (jpg, png, gif, webp) of the product itself.
- Never invent URLs.

Return {"items": [{"source_url": "<page url>", "image_urls": ["<image url>"]}]}; use {"items": []} if nothing qualifies.`;
  }

  return `You are a web search specialist locating product information pages.
${focus}

Collect every result exactly as returned (title, url, snippet). Do not invent, summarize or reorder results.

${RESULTS_FORMAT}`;
}

export function filterPrompt(query: ProductQuery, searchResults: string): string {
  return `You review web search results for a product lookup and keep only pages that plausibly describe the requested product.

Product:
${identifiers(query)}

Keep:
- retailer, marketplace and manufacturer product pages mentioning the barcode, SKU or closely matching title
Drop:
- search pages, category listings, blogs, forums, PDFs, image files, barcode lookup aggregators with no product content

Search results:
${searchResults}

Return ONLY: {"urls": ["<url>"]}`;
}

export function validationPrompt(query: ProductQuery, urls: string[], searchType: SearchType): string {
  return `You confirm whether product pages describe EXACTLY the requested product and extract its data.

Product:
${identifiers(query)}
Primary identifier: ${searchType}

For each URL:
1. Open the page content.
2. The page is valid only if it shows the same ${searchType === 'barcode' ? 'barcode/UPC' : 'SKU/part number'} or unambiguously the same product and variant.
3. For valid pages extract: full-size product image URLs (no logos, icons or thumbnails of other products), a short product description, the brand, the weight with its unit, and the dimensions in inches (null when not stated).
4. For invalid pages give a one-sentence reason.

URLs:
${JSON.stringify(urls)}

Return ONLY:
{"validated_pages": [{"url": "", "validation_method": "${searchType}", "image_urls": [], "reasoning": "", "product_description": "", "brand": "", "weight": {"unit_of_measure": "", "value": null}, "product_dimensions": {"length": null, "width": null, "height": null}}],
 "invalid_urls": [{"url": "", "reasoning": ""}],
 "total_validated_images": 0}`;
}
