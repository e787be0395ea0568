const MARKETPLACE_DOMAINS = [
  'amazon.com',
  'amazon.ca',
  'amazon.com.mx',
  'amazon.com.br',
  'amazon.co.uk',
  'amazon.de',
  'amazon.fr',
  'amazon.it',
  'amazon.es',
  'amazon.nl',
  'amazon.pl',
  'amazon.se',
  'amazon.com.be',
  'amazon.ie',
  'amazon.in',
  'amazon.co.jp',
  'amazon.cn',
  'amazon.sg',
  'amazon.sa',
  'amazon.ae',
  'amazon.com.tr',
  'amazon.eg',
  'amazon.co.za',
  'amazon.com.au',
];

const escape = (domain: string) => domain.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// www., m., smile. and other subdomains are allowed in front of the registrable domain.
const MARKETPLACE_HOST = new RegExp(`^(?:[\\w-]+\\.)*(?:${MARKETPLACE_DOMAINS.map(escape).join('|')})$`, 'i');

function hostOf(url: string): string {
  try {
    return new URL(url).hostname;
  } catch {
    // Scheme-less input such as "amazon.com/dp/X".
    return url.split('/')[0].split(':')[0];
  }
}

export function isMarketplaceUrl(url: string): boolean {
  if (!url) return false;
  const host = hostOf(url.trim()).toLowerCase();
  return host.length > 0 && MARKETPLACE_HOST.test(host);
}

export function partitionByDomain(urls: string[]): { marketplace: string[]; general: string[] } {
  const marketplace: string[] = [];
  const general: string[] = [];
  for (const url of urls) {
    (isMarketplaceUrl(url) ? marketplace : general).push(url);
  }
  return { marketplace, general };
}

export function chunk<T>(items: T[], size: number): T[][] {
  const batchSize = Math.max(1, size);
  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

export function dedupe(values: string[]): string[] {
  return [...new Set(values)];
}
