import type { FinalResult } from '../types';
import { countImages, mergeInvalidUrls, type RunState } from './state';

/** Builds the public record, preferring the image-checked pages when the checker ran. */
export function finalizeResult(state: RunState): FinalResult {
  const validatedPages = state.cleanedPages ?? state.validatedPages;
  let totalValidatedImages = state.cleanedImageCount ?? state.totalImages;
  if (totalValidatedImages === 0) {
    totalValidatedImages = countImages(validatedPages);
  }

  return {
    product: { barcode: state.query.barcode, title: state.query.title, sku: state.query.sku },
    searchType: state.query.barcode ? 'barcode' : 'sku',
    totalChecked: state.totalChecked,
    totalValidatedImages,
    validatedPages,
    invalidUrls: mergeInvalidUrls([], state.invalidUrls),
  };
}
