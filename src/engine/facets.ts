import type { DistinctField, FacetValue, NumericRange, RangeField } from '../core/fields';
import { foldText } from '../core/text';
import type { InventoryStore } from '../store/types';
import { withDeadline } from './deadline';
import { DEFAULT_STORAGE_TIMEOUT_MS } from './search';

export type RangeFacet = NumericRange | { empty: true };

export type FacetCallOptions = {
  signal?: AbortSignal;
};

export type FacetResolver = {
  listDistinct(field: DistinctField, options?: FacetCallOptions): Promise<FacetValue[]>;
  listModels(brands?: readonly string[], options?: FacetCallOptions): Promise<string[]>;
  getRange(field: RangeField, options?: FacetCallOptions): Promise<RangeFacet>;
};

export type FacetResolverOptions = {
  store: InventoryStore;
  timeoutMs?: number;
};

/**
 * Distinct-value and min/max summaries. Each call reads the store afresh.
 */
export function createFacetResolver(options: FacetResolverOptions): FacetResolver {
  const { store, timeoutMs = DEFAULT_STORAGE_TIMEOUT_MS } = options;

  const deadline = (signal: AbortSignal | undefined) => ({
    timeoutMs,
    ...(signal ? { signal } : {}),
  });

  return {
    async listDistinct(field, callOptions = {}) {
      const values = await withDeadline(
        (signal) => store.distinct(field, { signal }),
        deadline(callOptions.signal),
      );
      return sortFacetValues(values);
    },

    async listModels(brands, callOptions = {}) {
      const scope = brands?.map(foldText).filter(Boolean);
      const values = await withDeadline(
        (signal) =>
          store.distinct('model', scope?.length ? { signal, brands: scope } : { signal }),
        deadline(callOptions.signal),
      );
      return sortFacetValues(values).map(String);
    },

    async getRange(field, callOptions = {}) {
      const range = await withDeadline(
        (signal) => store.range(field, { signal }),
        deadline(callOptions.signal),
      );
      return range ?? { empty: true };
    },
  };
}

/** Deduplicated, numbers ascending, then strings in code-point order. */
export function sortFacetValues(values: readonly FacetValue[]): FacetValue[] {
  return [...new Set(values)].sort((a, b) => {
    if (typeof a === 'number' && typeof b === 'number') return a - b;
    if (typeof a === 'number') return -1;
    if (typeof b === 'number') return 1;
    return a < b ? -1 : a > b ? 1 : 0;
  });
}
