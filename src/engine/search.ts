import { ValidationError } from '../core/errors';
import type { FilterModel } from '../core/filter';
import { decodePageToken, encodePageToken, filterDigest } from '../core/page-token';
import { composeQuery, sortKeyOf, sortModeOf } from '../core/query-plan';
import type { Vehicle } from '../core/record';
import type { InventoryStore } from '../store/types';
import { withDeadline } from './deadline';

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 50;
export const DEFAULT_STORAGE_TIMEOUT_MS = 5_000;

export type SearchEngineOptions = {
  store: InventoryStore;
  timeoutMs?: number;
  maxPageSize?: number;
  defaultPageSize?: number;
};

export type SearchRequest = {
  pageToken?: string;
  pageSize?: number;
  signal?: AbortSignal;
};

export type SearchPage = {
  records: Vehicle[];
  nextPageToken?: string;
};

export type SearchEngine = {
  search(filter: FilterModel, request?: SearchRequest): Promise<SearchPage>;
  resolvePageSize(requested: number | undefined): number;
};

export function createSearchEngine(options: SearchEngineOptions): SearchEngine {
  const {
    store,
    timeoutMs = DEFAULT_STORAGE_TIMEOUT_MS,
    maxPageSize = MAX_PAGE_SIZE,
    defaultPageSize = DEFAULT_PAGE_SIZE,
  } = options;

  function resolvePageSize(requested: number | undefined): number {
    if (requested === undefined) return Math.min(defaultPageSize, maxPageSize);
    if (!Number.isInteger(requested) || requested < 1) {
      throw ValidationError.fromIssues([
        { path: 'pageSize', message: `must be a positive integer, got ${requested}` },
      ]);
    }
    return Math.min(requested, maxPageSize);
  }

  async function search(filter: FilterModel, request: SearchRequest = {}): Promise<SearchPage> {
    const pageSize = resolvePageSize(request.pageSize);
    const mode = sortModeOf(filter);
    const digest = filterDigest(filter);
    const cursor = request.pageToken
      ? decodePageToken(request.pageToken, { mode, digest })
      : undefined;
    const plan = composeQuery(filter, {
      ...(cursor ? { after: cursor.key } : {}),
      limit: pageSize + 1,
    });

    const rows = await withDeadline((signal) => store.scan(plan, { signal }), {
      timeoutMs,
      ...(request.signal ? { signal: request.signal } : {}),
    });

    const page = rows.slice(0, pageSize);
    const last = page.at(-1);
    const result: SearchPage = { records: page.map((row) => row.vehicle) };
    if (rows.length > pageSize && last) {
      result.nextPageToken = encodePageToken(
        { mode, key: sortKeyOf(plan.order, last.vehicle, last.rank) },
        digest,
      );
    }
    return result;
  }

  return { search, resolvePageSize };
}
