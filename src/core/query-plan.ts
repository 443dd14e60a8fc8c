import type { NumericField, TextField } from './fields';
import type { FilterModel } from './filter';
import type { Vehicle } from './record';

export type SortMode = 'relevance' | 'catalog';

export type SortKey = 'rank' | 'createdAt' | 'manufactureYear' | 'price' | 'id';

export type SortTerm = {
  key: SortKey;
  direction: 'asc' | 'desc';
};

/** One position in a sort order; timestamps travel as ISO-8601 text. */
export type SortValue = string | number;

export type Predicate =
  | { kind: 'text'; query: string; terms: readonly string[] }
  | { kind: 'any-of'; field: TextField; values: readonly string[] }
  | { kind: 'range'; field: NumericField; min?: number; max?: number };

/**
 * Index the store draws candidates from before checking the predicates. The memory store follows
 * it; PostgreSQL makes its own choice from the same indexes. Results never depend on it.
 */
export type AccessPath =
  | 'text-index'
  | 'brand-model-index'
  | 'year-index'
  | 'price-index'
  | 'full-scan';

export type QueryPlan = {
  mode: SortMode;
  access: AccessPath;
  predicates: readonly Predicate[];
  order: readonly SortTerm[];
  /** Only rows strictly after this sort key are returned. */
  after?: readonly SortValue[];
  limit: number;
};

export type ComposeOptions = {
  after?: readonly SortValue[];
  limit: number;
};

export const RELEVANCE_ORDER: readonly SortTerm[] = [
  { key: 'rank', direction: 'desc' },
  { key: 'createdAt', direction: 'desc' },
  { key: 'id', direction: 'asc' },
];

export const CATALOG_ORDER: readonly SortTerm[] = [
  { key: 'manufactureYear', direction: 'desc' },
  { key: 'price', direction: 'asc' },
  { key: 'id', direction: 'asc' },
];

// Lower runs earlier. Identity pairs and categorical sets are narrower than open ranges.
const SELECTIVITY: Record<TextField | NumericField, number> = {
  model: 1,
  brand: 2,
  color: 3,
  transmission: 4,
  fuelType: 5,
  doors: 6,
  manufactureYear: 7,
  price: 8,
  mileage: 9,
};

const TEXT_FIELDS: readonly TextField[] = ['brand', 'model', 'fuelType', 'color', 'transmission'];
const NUMERIC_FIELDS: readonly NumericField[] = ['manufactureYear', 'price', 'mileage', 'doors'];

export function sortModeOf(filter: FilterModel): SortMode {
  return filter.freeText ? 'relevance' : 'catalog';
}

export function orderFor(mode: SortMode): readonly SortTerm[] {
  return mode === 'relevance' ? RELEVANCE_ORDER : CATALOG_ORDER;
}

/**
 * Builds the single lookup that answers a filter: a conjunction of predicates, a total order
 * and a keyset cursor. Pure and deterministic for equal inputs.
 */
export function composeQuery(filter: FilterModel, options: ComposeOptions): QueryPlan {
  const mode = sortModeOf(filter);
  const order = orderFor(mode);
  if (options.after && options.after.length !== order.length) {
    throw new RangeError(`Cursor has ${options.after.length} keys, order needs ${order.length}`);
  }

  const constraints: Array<Exclude<Predicate, { kind: 'text' }>> = [];
  for (const field of TEXT_FIELDS) {
    const values = filter.text[field];
    if (values?.length) constraints.push({ kind: 'any-of', field, values });
  }
  for (const field of NUMERIC_FIELDS) {
    const bounds = filter.bounds[field];
    if (!bounds) continue;
    const predicate: Extract<Predicate, { kind: 'range' }> = { kind: 'range', field };
    if (bounds.min !== undefined) predicate.min = bounds.min;
    if (bounds.max !== undefined) predicate.max = bounds.max;
    constraints.push(predicate);
  }
  constraints.sort((a, b) => SELECTIVITY[a.field] - SELECTIVITY[b.field]);

  const predicates: Predicate[] = filter.freeText
    ? [{ kind: 'text', query: filter.freeText.query, terms: filter.freeText.terms }, ...constraints]
    : constraints;

  return {
    mode,
    access: chooseAccessPath(filter),
    predicates,
    order,
    ...(options.after ? { after: [...options.after] } : {}),
    limit: options.limit,
  };
}

export function chooseAccessPath(filter: FilterModel): AccessPath {
  if (filter.freeText) return 'text-index';
  if (filter.text.brand?.length) return 'brand-model-index';
  if (filter.bounds.manufactureYear) return 'year-index';
  if (filter.bounds.price) return 'price-index';
  return 'full-scan';
}

export function sortValueOf(key: SortKey, vehicle: Vehicle, rank: number): SortValue {
  switch (key) {
    case 'rank':
      return rank;
    case 'createdAt':
      return vehicle.createdAt.toISOString();
    case 'manufactureYear':
      return vehicle.manufactureYear;
    case 'price':
      return vehicle.price;
    case 'id':
      return vehicle.id;
  }
}

export function sortKeyOf(
  order: readonly SortTerm[],
  vehicle: Vehicle,
  rank: number,
): SortValue[] {
  return order.map((term) => sortValueOf(term.key, vehicle, rank));
}

/** Negative when `a` sorts before `b` under `order`. */
export function compareSortKeys(
  order: readonly SortTerm[],
  a: readonly SortValue[],
  b: readonly SortValue[],
): number {
  for (let index = 0; index < order.length; index += 1) {
    const term = order[index];
    const left = a[index];
    const right = b[index];
    if (!term || left === undefined || right === undefined) continue;
    const delta = compareValues(left, right);
    if (delta !== 0) return term.direction === 'asc' ? delta : -delta;
  }
  return 0;
}

function compareValues(left: SortValue, right: SortValue): number {
  if (typeof left === 'number' && typeof right === 'number') {
    return left === right ? 0 : left < right ? -1 : 1;
  }
  const a = String(left);
  const b = String(right);
  return a === b ? 0 : a < b ? -1 : 1;
}
