import type {
  CompletionOptions,
  ImageFetcher,
  ImageResponse,
  LanguageModel,
  ProductQuery,
  StructuredOutput,
  ValidatedPage,
} from '../src/types';

export interface RecordedCall {
  system: string;
  user: string;
  options?: CompletionOptions;
  output?: string;
}

type CompleteHandler = (system: string, user: string, options?: CompletionOptions) => Promise<string>;
type StructuredHandler = (system: string, user: string, name: string, options?: CompletionOptions) => Promise<unknown>;

/** Language model whose answers come from the test; structured answers go through the real parser. */
export class ScriptedModel implements LanguageModel {
  readonly calls: RecordedCall[] = [];

  constructor(private readonly handlers: { complete?: CompleteHandler; structured?: StructuredHandler } = {}) {}

  async complete(system: string, user: string, options?: CompletionOptions): Promise<string> {
    this.calls.push({ system, user, options });
    if (!this.handlers.complete) {
      throw new Error('unexpected complete() call');
    }
    return this.handlers.complete(system, user, options);
  }

  async completeStructured<T>(
    system: string,
    user: string,
    output: StructuredOutput<T>,
    options?: CompletionOptions
  ): Promise<T> {
    this.calls.push({ system, user, options, output: output.name });
    if (!this.handlers.structured) {
      throw new Error('unexpected completeStructured() call');
    }
    return output.parser.parse(await this.handlers.structured(system, user, output.name, options));
  }
}

export const product = (overrides: Partial<ProductQuery> = {}): ProductQuery => ({
  barcode: '012345678901',
  sku: 'TRL-2041',
  title: 'Trail Runner 2 Shoe',
  ...overrides,
});

export const page = (url: string, imageUrls: string[] = []): ValidatedPage => ({
  url,
  validationMethod: 'barcode',
  imageUrls,
  reasoning: 'Barcode matches',
  description: '',
  brand: '',
  weight: { unitOfMeasure: '', value: null },
  dimensions: { length: null, width: null, height: null },
});

export const PNG_BYTES = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0, 0, 0, 0x0d, 0x49, 0x48, 0x44, 0x52]);

export interface FakeImage {
  status: number;
  contentType?: string;
  body?: Buffer;
}

async function* chunks(body: Buffer): AsyncGenerator<Buffer> {
  // Two chunks so the reader has to join them.
  if (body.length > 4) {
    yield body.subarray(0, 4);
    yield body.subarray(4);
  } else if (body.length) {
    yield body;
  }
}

/** Serves canned responses by URL; unknown URLs fail like a network error. */
export class FakeImageFetcher implements ImageFetcher {
  readonly fetched: string[] = [];
  released = 0;

  constructor(private readonly images: Record<string, FakeImage>) {}

  async fetch(url: string): Promise<ImageResponse> {
    this.fetched.push(url);
    const image = this.images[url];
    if (!image) {
      throw new Error(`getaddrinfo ENOTFOUND ${url}`);
    }
    return {
      status: image.status,
      headers: { 'content-type': image.contentType },
      body: chunks(image.body ?? Buffer.alloc(0)),
      release: () => {
        this.released++;
      },
    };
  }
}
