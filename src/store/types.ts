import type {
  DistinctField,
  FacetValue,
  NumericRange,
  RangeField,
} from '../core/fields';
import type { QueryPlan } from '../core/query-plan';
import type { NewVehicle, Vehicle } from '../core/record';

export type StoreCallOptions = {
  /** Aborted when the caller gives up or the deadline passes. */
  signal?: AbortSignal;
};

export type DistinctOptions = StoreCallOptions & {
  /** Folded brand names restricting the rows considered. */
  brands?: readonly string[];
};

export type ScoredVehicle = {
  vehicle: Vehicle;
  /** Text-search rank; 0 when the plan has no text predicate. */
  rank: number;
};

/**
 * The storage boundary. Implementations enforce Record invariants on `insert`, keep the search
 * vector in step with every write, and answer reads against their current state.
 */
export interface InventoryStore {
  scan(plan: QueryPlan, options?: StoreCallOptions): Promise<ScoredVehicle[]>;
  distinct(field: DistinctField, options?: DistinctOptions): Promise<FacetValue[]>;
  range(field: RangeField, options?: StoreCallOptions): Promise<NumericRange | undefined>;
  insert(vehicles: readonly NewVehicle[], options?: StoreCallOptions): Promise<Vehicle[]>;
}
