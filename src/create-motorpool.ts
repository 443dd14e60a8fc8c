import { createFacetResolver, type FacetResolver } from './engine/facets';
import { createSearchEngine, type SearchEngine } from './engine/search';
import { createGateway, type Gateway } from './gateway/create-gateway';
import { createInventoryOperations } from './operations';
import type { InventoryStore } from './store/types';

export type MotorpoolOptions = {
  store: InventoryStore;
  storageTimeoutMs?: number;
  maxPageSize?: number;
  defaultPageSize?: number;
};

export type Motorpool = {
  gateway: Gateway;
  search: SearchEngine;
  facets: FacetResolver;
};

/**
 * Wires the search engine, the facet resolver and the gateway over one store.
 *
 * @example
 * ```ts
 * const { gateway } = createMotorpool({ store: new MemoryInventoryStore() });
 * const response = await gateway.call({
 *   operation: 'search_records',
 *   arguments: { identityFilters: { brand: 'volkswagen' }, priceMax: 80000 },
 * });
 * ```
 */
export function createMotorpool(options: MotorpoolOptions): Motorpool {
  const { store, storageTimeoutMs, maxPageSize, defaultPageSize } = options;
  const search = createSearchEngine({
    store,
    ...(storageTimeoutMs !== undefined ? { timeoutMs: storageTimeoutMs } : {}),
    ...(maxPageSize !== undefined ? { maxPageSize } : {}),
    ...(defaultPageSize !== undefined ? { defaultPageSize } : {}),
  });
  const facets = createFacetResolver({
    store,
    ...(storageTimeoutMs !== undefined ? { timeoutMs: storageTimeoutMs } : {}),
  });
  const gateway = createGateway({ operations: createInventoryOperations(search, facets) });
  return { gateway, search, facets };
}
