import axios from 'axios';
import type { Readable } from 'stream';
import { Semaphore } from 'async-mutex';
import type { ImageFetcher, ImageResponse, ValidatedPage } from '../types';
import { logger } from '../utils/logger';
import { withTimeout } from '../utils/timeout';
import { dedupe } from '../utils/url';
import { countImages } from '../research/state';
import { errorMessage } from '../research/errors';

const HEAD_BYTES = 16;

const MAGIC_BYTES: Buffer[] = [
  Buffer.from([0xff, 0xd8, 0xff]), // JPEG
  Buffer.from([0x89, 0x50, 0x4e, 0x47]), // PNG
  Buffer.from('GIF87a'),
  Buffer.from('GIF89a'),
  Buffer.from('RIFF'), // WEBP container
];

const IMAGE_CONTENT_TYPES = new Set([
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
  'image/svg+xml',
  'image/bmp',
  'image/tiff',
  'image/x-icon',
]);

export function hasImageSignature(head: Buffer): boolean {
  return MAGIC_BYTES.some(magic => head.subarray(0, magic.length).equals(magic));
}

export function isImageContentType(contentType: string | undefined): boolean {
  if (!contentType) return false;
  return IMAGE_CONTENT_TYPES.has(contentType.split(';')[0].trim().toLowerCase());
}

async function readHead(body: AsyncIterable<Buffer>, size: number): Promise<Buffer> {
  const chunks: Buffer[] = [];
  let length = 0;
  for await (const chunk of body) {
    chunks.push(chunk);
    length += chunk.length;
    if (length >= size) break;
  }
  return Buffer.concat(chunks).subarray(0, size);
}

/** Plain streaming GET; statuses are reported, never thrown. */
export class AxiosImageFetcher implements ImageFetcher {
  constructor(private readonly userAgent: string) {}

  async fetch(url: string, timeoutMs: number): Promise<ImageResponse> {
    const response = await axios.get<Readable>(url, {
      responseType: 'stream',
      timeout: timeoutMs,
      maxRedirects: 5,
      validateStatus: () => true,
      headers: { 'User-Agent': this.userAgent },
    });

    const headers: Record<string, string | undefined> = {};
    for (const [key, value] of Object.entries(response.headers)) {
      headers[key.toLowerCase()] = value === undefined || value === null ? undefined : String(value);
    }

    return {
      status: response.status,
      headers,
      body: response.data,
      release: () => {
        response.data.destroy();
      },
    };
  }
}

export interface ImageCheckOptions {
  concurrency: number;
  timeoutMs: number;
}

export interface CleanedPages {
  pages: ValidatedPage[];
  totalImages: number;
}

/**
 * Confirms that image URLs really serve an image. Pages are never dropped,
 * only their image lists narrowed.
 */
export class ImageCheckService {
  constructor(
    private readonly fetcher: ImageFetcher,
    private readonly options: ImageCheckOptions
  ) {}

  async cleanPages(pages: ValidatedPage[]): Promise<CleanedPages> {
    // One limiter per run, shared by every page of it.
    const semaphore = new Semaphore(Math.max(1, this.options.concurrency));
    const verdicts = new Map<string, Promise<boolean>>();

    const verify = (url: string): Promise<boolean> => {
      let verdict = verdicts.get(url);
      if (!verdict) {
        verdict = semaphore.runExclusive(() => this.isAuthenticImage(url));
        verdicts.set(url, verdict);
      }
      return verdict;
    };

    const cleaned = await Promise.all(
      pages.map(async page => {
        const unique = dedupe(page.imageUrls);
        const accepted = await Promise.all(unique.map(verify));
        const imageUrls = unique.filter((_, index) => accepted[index]);
        if (imageUrls.length < unique.length) {
          logger.info(`Dropped ${unique.length - imageUrls.length} unverified image(s) from ${page.url}`);
        }
        return { ...page, imageUrls };
      })
    );

    return { pages: cleaned, totalImages: countImages(cleaned) };
  }

  async isAuthenticImage(url: string): Promise<boolean> {
    try {
      return await withTimeout(this.inspect(url), this.options.timeoutMs, `Image check of ${url}`);
    } catch (error) {
      logger.debug(`Image check failed for ${url}: ${errorMessage(error)}`);
      return false;
    }
  }

  private async inspect(url: string): Promise<boolean> {
    const response = await this.fetcher.fetch(url, this.options.timeoutMs);
    try {
      if (response.status !== 200) {
        return false;
      }
      const head = await readHead(response.body, HEAD_BYTES);
      if (!head.length) {
        return false;
      }
      return hasImageSignature(head) || isImageContentType(response.headers['content-type']);
    } finally {
      response.release();
    }
  }
}
