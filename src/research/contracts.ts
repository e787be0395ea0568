import { ResponseSchema, SchemaType } from '@google/generative-ai';
import { z } from 'zod';
import type { InvalidUrlRecord, PageValidation, StructuredOutput, ValidatedPage } from '../types';

const nullableNumber = z.number().nullable().catch(null);

const rawPageSchema = z.object({
  url: z.string().min(1),
  validation_method: z.string().catch('unknown'),
  image_urls: z.array(z.string()).catch([]),
  reasoning: z.string().catch(''),
  product_description: z.string().catch(''),
  brand: z.string().catch(''),
  weight: z
    .object({ unit_of_measure: z.string().catch(''), value: nullableNumber })
    .catch({ unit_of_measure: '', value: null }),
  product_dimensions: z
    .object({ length: nullableNumber, width: nullableNumber, height: nullableNumber })
    .catch({ length: null, width: null, height: null }),
});

type RawPage = z.infer<typeof rawPageSchema>;

export const toValidatedPage = (raw: RawPage): ValidatedPage => ({
  url: raw.url,
  validationMethod: raw.validation_method,
  imageUrls: raw.image_urls,
  reasoning: raw.reasoning,
  description: raw.product_description,
  brand: raw.brand,
  weight: { unitOfMeasure: raw.weight.unit_of_measure, value: raw.weight.value },
  dimensions: raw.product_dimensions,
});

const invalidUrlSchema = z.union([
  z.object({ url: z.string().min(1), reasoning: z.string().catch('') }),
  // Older prompt versions answered with bare URLs.
  z.string().min(1).transform(url => ({ url, reasoning: '' })),
]);

// One malformed entry should not throw away the rest of the list.
const pagesList = z
  .array(z.unknown())
  .catch([])
  .transform((items): ValidatedPage[] =>
    items.flatMap(item => {
      const parsed = rawPageSchema.safeParse(item);
      return parsed.success ? [toValidatedPage(parsed.data)] : [];
    })
  );

const invalidList = z
  .array(z.unknown())
  .catch([])
  .transform((items): InvalidUrlRecord[] =>
    items.flatMap(item => {
      const parsed = invalidUrlSchema.safeParse(item);
      return parsed.success ? [parsed.data] : [];
    })
  );

export const pageValidationParser = z
  .object({
    validated_pages: pagesList,
    invalid_urls: invalidList,
  })
  .transform((raw): PageValidation => ({ validatedPages: raw.validated_pages, invalidUrls: raw.invalid_urls }));

const nullableNumberSchema: ResponseSchema = { type: SchemaType.NUMBER, nullable: true };

const pageValidationSchema: ResponseSchema = {
  type: SchemaType.OBJECT,
  properties: {
    validated_pages: {
      type: SchemaType.ARRAY,
      items: {
        type: SchemaType.OBJECT,
        properties: {
          url: { type: SchemaType.STRING },
          validation_method: { type: SchemaType.STRING },
          image_urls: { type: SchemaType.ARRAY, items: { type: SchemaType.STRING } },
          reasoning: { type: SchemaType.STRING },
          product_description: { type: SchemaType.STRING },
          brand: { type: SchemaType.STRING },
          weight: {
            type: SchemaType.OBJECT,
            properties: {
              unit_of_measure: { type: SchemaType.STRING },
              value: nullableNumberSchema,
            },
            required: ['unit_of_measure', 'value'],
          },
          product_dimensions: {
            type: SchemaType.OBJECT,
            properties: {
              length: nullableNumberSchema,
              width: nullableNumberSchema,
              height: nullableNumberSchema,
            },
            required: ['length', 'width', 'height'],
          },
        },
        required: [
          'url',
          'validation_method',
          'image_urls',
          'reasoning',
          'product_description',
          'brand',
          'weight',
          'product_dimensions',
        ],
      },
    },
    invalid_urls: {
      type: SchemaType.ARRAY,
      items: {
        type: SchemaType.OBJECT,
        properties: {
          url: { type: SchemaType.STRING },
          reasoning: { type: SchemaType.STRING },
        },
        required: ['url', 'reasoning'],
      },
    },
    total_validated_images: { type: SchemaType.INTEGER },
  },
  required: ['validated_pages', 'invalid_urls', 'total_validated_images'],
};

export const PAGE_VALIDATION_OUTPUT: StructuredOutput<PageValidation> = {
  name: 'page_validation',
  responseSchema: pageValidationSchema,
  parser: pageValidationParser,
};

export const ALL_FIELDS_METHOD = 'all_fields_search';

const allFieldsItem = z.object({
  source_url: z.string().min(1),
  image_urls: z.array(z.string()).catch([]),
});

export const allFieldsParser = z
  .object({ items: z.array(z.unknown()).catch([]) })
  .transform(({ items }): ValidatedPage[] =>
    items.flatMap(item => {
      const parsed = allFieldsItem.safeParse(item);
      if (!parsed.success) return [];
      return [
        {
          url: parsed.data.source_url,
          validationMethod: ALL_FIELDS_METHOD,
          imageUrls: parsed.data.image_urls,
          reasoning: 'Validated via web search with structured output',
          description: '',
          brand: '',
          weight: { unitOfMeasure: '', value: null },
          dimensions: { length: null, width: null, height: null },
        },
      ];
    })
  );

export const ALL_FIELDS_OUTPUT: StructuredOutput<ValidatedPage[]> = {
  name: 'all_fields_search',
  responseSchema: {
    type: SchemaType.OBJECT,
    properties: {
      items: {
        type: SchemaType.ARRAY,
        items: {
          type: SchemaType.OBJECT,
          properties: {
            source_url: { type: SchemaType.STRING },
            image_urls: { type: SchemaType.ARRAY, items: { type: SchemaType.STRING } },
          },
          required: ['source_url', 'image_urls'],
        },
      },
    },
    required: ['items'],
  },
  parser: allFieldsParser,
};

export const filterParser = z.object({
  urls: z.array(z.string()),
});

/** A search response counts as results when it carries a non-empty results or items list. */
export const searchResultsParser = z.union([
  z.object({ results: z.array(z.unknown()).nonempty() }).passthrough(),
  z.object({ items: z.array(z.unknown()).nonempty() }).passthrough(),
]);

export const emptyResultsParser = z.union([
  z.object({ results: z.array(z.unknown()).length(0) }).passthrough(),
  z.object({ items: z.array(z.unknown()).length(0) }).passthrough(),
]);
