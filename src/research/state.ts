import type {
  InvalidUrlRecord,
  ProductQuery,
  SearchAttempt,
  SearchDiagnostics,
  SearchType,
  ValidatedPage,
} from '../types';

/** Accumulator threaded through one product's research run. */
export interface RunState {
  query: ProductQuery;
  plan: readonly SearchAttempt[];
  searchType: SearchType;
  attemptIndex: number;
  searchResult: string | null;
  searchSuccessful: boolean;
  lastSearch: SearchDiagnostics | null;
  filteredUrls: string[];
  totalFilteredUrls: number;
  validatedPages: ValidatedPage[];
  invalidUrls: InvalidUrlRecord[];
  totalImages: number;
  totalChecked: number;
  cleanedPages: ValidatedPage[] | null;
  cleanedImageCount: number | null;
}

/**
 * What a stage hands back. Counter fields are increments, list fields are
 * merged per the reducer table, everything else replaces.
 */
export type RunDelta = Partial<RunState>;

type Reducer<T> = (current: T, update: T) => T;

const replace = <T>(_current: T, update: T): T => update;

const add: Reducer<number> = (current, update) => current + update;

const append = <T>(current: T[], update: T[]): T[] => (update.length ? [...current, ...update] : current);

const advance: Reducer<number> = (current, update) => {
  if (update < current) {
    throw new Error(`Attempt index cannot move backwards (${current} -> ${update})`);
  }
  return update;
};

export function mergeInvalidUrls(current: InvalidUrlRecord[], update: InvalidUrlRecord[]): InvalidUrlRecord[] {
  const seen = new Map<string, InvalidUrlRecord>();
  for (const record of [...current, ...update]) {
    if (record.url && !seen.has(record.url)) {
      seen.set(record.url, record);
    }
  }
  return [...seen.values()];
}

export const reducers: { [K in keyof RunState]: Reducer<RunState[K]> } = {
  query: replace,
  plan: replace,
  searchType: replace,
  attemptIndex: advance,
  searchResult: replace,
  searchSuccessful: replace,
  lastSearch: replace,
  filteredUrls: replace,
  totalFilteredUrls: replace,
  validatedPages: append,
  invalidUrls: mergeInvalidUrls,
  totalImages: add,
  totalChecked: add,
  cleanedPages: replace,
  cleanedImageCount: replace,
};

const FIELDS = [
  'query',
  'plan',
  'searchType',
  'attemptIndex',
  'searchResult',
  'searchSuccessful',
  'lastSearch',
  'filteredUrls',
  'totalFilteredUrls',
  'validatedPages',
  'invalidUrls',
  'totalImages',
  'totalChecked',
  'cleanedPages',
  'cleanedImageCount',
] as const satisfies readonly (keyof RunState)[];

function mergeField<K extends keyof RunState>(target: RunState, key: K, update: RunState[K] | undefined): void {
  if (update === undefined) return;
  target[key] = reducers[key](target[key], update);
}

export function applyDelta(state: RunState, delta: RunDelta): RunState {
  const next: RunState = { ...state };
  for (const key of FIELDS) {
    mergeField(next, key, delta[key]);
  }
  return next;
}

export function createRunState(query: ProductQuery, plan: readonly SearchAttempt[]): RunState {
  return {
    query,
    plan,
    searchType: query.barcode ? 'barcode' : 'sku',
    attemptIndex: 0,
    searchResult: null,
    searchSuccessful: false,
    lastSearch: null,
    filteredUrls: [],
    totalFilteredUrls: 0,
    validatedPages: [],
    invalidUrls: [],
    totalImages: 0,
    totalChecked: 0,
    cleanedPages: null,
    cleanedImageCount: null,
  };
}

export const countImages = (pages: ValidatedPage[]): number =>
  pages.reduce((sum, page) => sum + page.imageUrls.length, 0);

export type LoopDecision = 'continue' | 'done';

export function decideNext(state: RunState): LoopDecision {
  if (state.totalImages >= 1) return 'done';
  if (state.attemptIndex >= state.plan.length) return 'done';
  return 'continue';
}

/** One step of the research loop; never throws for provider trouble, it reports it in the delta. */
export interface ResearchStage {
  run(state: RunState): Promise<RunDelta>;
}
