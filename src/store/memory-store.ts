import { randomUUID } from 'node:crypto';

import { ConstraintViolation, StorageError } from '../core/errors';
import {
  DISTINCT_FIELD_ATTRIBUTE,
  type DistinctField,
  type FacetValue,
  type NumericRange,
  RANGE_FIELD_ATTRIBUTE,
  type RangeField,
  type TextField,
} from '../core/fields';
import {
  type AccessPath,
  compareSortKeys,
  type Predicate,
  type QueryPlan,
  sortKeyOf,
  type SortValue,
} from '../core/query-plan';
import {
  assertVehicleConstraints,
  deriveSearchVector,
  type NewVehicle,
  type SearchVector,
  type Vehicle,
} from '../core/record';
import { foldText } from '../core/text';
import type {
  DistinctOptions,
  InventoryStore,
  ScoredVehicle,
  StoreCallOptions,
} from './types';

export type MemoryInventoryStoreOptions = {
  clock?: () => Date;
  generateId?: () => string;
};

type SortedField = 'manufactureYear' | 'price';

type StoredVehicle = {
  vehicle: Vehicle;
  vector: SearchVector;
  length: number;
  folded: Record<TextField, string>;
};

// Term-frequency saturation against a fixed reference length. No corpus statistics, so a
// record's rank never moves when other records are written.
const K1 = 1.2;
const B = 0.75;
const REFERENCE_LENGTH = 4;

/**
 * In-process inventory. Keeps the derived search vector next to each record and rebuilds it
 * inside the same synchronous step as the write, so readers never see one without the other.
 *
 * Mirrors the table's indexes: an inverted term index, a folded brand index and year- and
 * price-ordered lists. `scan` draws its candidates from the one the plan's access path names
 * and checks every predicate on them afterwards.
 */
export class MemoryInventoryStore implements InventoryStore {
  private readonly rows: StoredVehicle[] = [];
  private readonly ids = new Set<string>();
  private readonly postings = new Map<string, Set<StoredVehicle>>();
  private readonly byBrand = new Map<string, StoredVehicle[]>();
  private readonly sorted: Record<SortedField, StoredVehicle[]> = {
    manufactureYear: [],
    price: [],
  };
  private readonly clock: () => Date;
  private readonly generateId: () => string;

  constructor(options: MemoryInventoryStoreOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
  }

  get size(): number {
    return this.rows.length;
  }

  async insert(
    vehicles: readonly NewVehicle[],
    options: StoreCallOptions = {},
  ): Promise<Vehicle[]> {
    assertNotAborted(options.signal);
    const now = this.clock();
    const pending = new Set<string>();
    for (const candidate of vehicles) {
      assertVehicleConstraints(candidate, now);
      if (candidate.id !== undefined) {
        if (this.ids.has(candidate.id) || pending.has(candidate.id)) {
          throw new ConstraintViolation(`Vehicle id ${candidate.id} already exists`);
        }
        pending.add(candidate.id);
      }
    }

    const written: Vehicle[] = [];
    for (const candidate of vehicles) {
      const vehicle: Vehicle = {
        ...candidate,
        id: candidate.id ?? this.generateId(),
        createdAt: candidate.createdAt ?? this.clock(),
      };
      this.index(toStored(vehicle));
      written.push(vehicle);
    }
    return written;
  }

  async scan(plan: QueryPlan, options: StoreCallOptions = {}): Promise<ScoredVehicle[]> {
    assertNotAborted(options.signal);
    const matches: Array<ScoredVehicle & { key: SortValue[] }> = [];
    for (const row of this.candidates(plan.access, plan.predicates)) {
      const rank = evaluate(row, plan.predicates);
      if (rank === undefined) continue;
      const key = sortKeyOf(plan.order, row.vehicle, rank);
      if (plan.after && compareSortKeys(plan.order, key, plan.after) <= 0) continue;
      matches.push({ vehicle: row.vehicle, rank, key });
    }
    matches.sort((a, b) => compareSortKeys(plan.order, a.key, b.key));
    return matches.slice(0, plan.limit).map(({ vehicle, rank }) => ({ vehicle, rank }));
  }

  async distinct(field: DistinctField, options: DistinctOptions = {}): Promise<FacetValue[]> {
    assertNotAborted(options.signal);
    const attribute = DISTINCT_FIELD_ATTRIBUTE[field];
    const brands = options.brands ? new Set(options.brands) : undefined;
    const values = new Set<FacetValue>();
    for (const row of this.rows) {
      if (brands && !brands.has(row.folded.brand)) continue;
      values.add(row.vehicle[attribute]);
    }
    return [...values];
  }

  async range(
    field: RangeField,
    options: StoreCallOptions = {},
  ): Promise<NumericRange | undefined> {
    assertNotAborted(options.signal);
    const attribute = RANGE_FIELD_ATTRIBUTE[field];
    let range: NumericRange | undefined;
    for (const { vehicle } of this.rows) {
      const value = vehicle[attribute];
      range = range
        ? { min: Math.min(range.min, value), max: Math.max(range.max, value) }
        : { min: value, max: value };
    }
    return range;
  }

  private index(row: StoredVehicle): void {
    this.rows.push(row);
    this.ids.add(row.vehicle.id);
    for (const term of row.vector.keys()) {
      const posting = this.postings.get(term) ?? new Set<StoredVehicle>();
      posting.add(row);
      this.postings.set(term, posting);
    }
    const brand = this.byBrand.get(row.folded.brand) ?? [];
    brand.push(row);
    this.byBrand.set(row.folded.brand, brand);
    for (const field of ['manufactureYear', 'price'] as const) {
      const list = this.sorted[field];
      list.splice(upperBound(list, field, row.vehicle[field]), 0, row);
    }
  }

  /** Rows that may satisfy the predicates; a superset of the matches, never a subset. */
  private candidates(
    access: AccessPath,
    predicates: readonly Predicate[],
  ): Iterable<StoredVehicle> {
    switch (access) {
      case 'text-index': {
        const text = predicates.find((predicate) => predicate.kind === 'text');
        if (text?.kind !== 'text' || text.terms.length === 0) return this.rows;
        return this.intersectPostings(text.terms);
      }
      case 'brand-model-index': {
        const brand = predicates.find(
          (predicate) => predicate.kind === 'any-of' && predicate.field === 'brand',
        );
        if (brand?.kind !== 'any-of') return this.rows;
        return new Set(brand.values.flatMap((value) => this.byBrand.get(value) ?? []));
      }
      case 'year-index':
        return this.slice('manufactureYear', predicates);
      case 'price-index':
        return this.slice('price', predicates);
      case 'full-scan':
        return this.rows;
    }
  }

  private intersectPostings(terms: readonly string[]): StoredVehicle[] {
    const postings = [...new Set(terms)].map((term) => this.postings.get(term));
    if (postings.some((posting) => posting === undefined)) return [];
    const [smallest, ...rest] = postings
      .filter((posting): posting is Set<StoredVehicle> => posting !== undefined)
      .sort((a, b) => a.size - b.size);
    if (!smallest) return [];
    return [...smallest].filter((row) => rest.every((posting) => posting.has(row)));
  }

  private slice(field: SortedField, predicates: readonly Predicate[]): StoredVehicle[] {
    const range = predicates.find(
      (predicate) => predicate.kind === 'range' && predicate.field === field,
    );
    const list = this.sorted[field];
    if (range?.kind !== 'range') return list;
    const start = range.min === undefined ? 0 : lowerBound(list, field, range.min);
    const end = range.max === undefined ? list.length : upperBound(list, field, range.max);
    return list.slice(start, end);
  }
}

/** First position whose value is not below `value`. */
function lowerBound(list: readonly StoredVehicle[], field: SortedField, value: number): number {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const row = list[middle];
    if (row && row.vehicle[field] < value) low = middle + 1;
    else high = middle;
  }
  return low;
}

/** First position whose value is above `value`. */
function upperBound(list: readonly StoredVehicle[], field: SortedField, value: number): number {
  let low = 0;
  let high = list.length;
  while (low < high) {
    const middle = (low + high) >>> 1;
    const row = list[middle];
    if (row && row.vehicle[field] <= value) low = middle + 1;
    else high = middle;
  }
  return low;
}

function toStored(vehicle: Vehicle): StoredVehicle {
  const vector = deriveSearchVector(vehicle);
  let length = 0;
  for (const count of vector.values()) length += count;
  return {
    vehicle,
    vector,
    length,
    folded: {
      brand: foldText(vehicle.brand),
      model: foldText(vehicle.model),
      fuelType: foldText(vehicle.fuelType),
      color: foldText(vehicle.color),
      transmission: foldText(vehicle.transmission),
    },
  };
}

/** Rank of the row when every predicate holds, otherwise `undefined`. */
function evaluate(row: StoredVehicle, predicates: readonly Predicate[]): number | undefined {
  let rank = 0;
  for (const predicate of predicates) {
    switch (predicate.kind) {
      case 'text': {
        const score = scoreText(row, predicate.terms);
        if (score === undefined) return undefined;
        rank = score;
        break;
      }
      case 'any-of': {
        if (!predicate.values.includes(row.folded[predicate.field])) return undefined;
        break;
      }
      case 'range': {
        const value = row.vehicle[predicate.field];
        if (predicate.min !== undefined && value < predicate.min) return undefined;
        if (predicate.max !== undefined && value > predicate.max) return undefined;
        break;
      }
    }
  }
  return rank;
}

function scoreText(row: StoredVehicle, terms: readonly string[]): number | undefined {
  let score = 0;
  const norm = K1 * (1 - B + (B * row.length) / REFERENCE_LENGTH);
  for (const term of new Set(terms)) {
    const frequency = row.vector.get(term) ?? 0;
    if (frequency === 0) return undefined;
    score += (frequency * (K1 + 1)) / (frequency + norm);
  }
  return score;
}

function assertNotAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new StorageError('cancelled', 'Inventory read was cancelled');
  }
}
