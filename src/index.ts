export {
  ConstraintViolation,
  type ErrorCategory,
  type ErrorCode,
  type ErrorPayload,
  InvalidPageToken,
  isErrorPayload,
  MotorpoolError,
  StorageError,
  type StorageFailure,
  toErrorPayload,
  UnknownOperation,
  ValidationError,
  type ValidationIssue,
} from './core/errors';
export {
  DISTINCT_FIELDS,
  type DistinctField,
  type FacetValue,
  type NumericRange,
  RANGE_FIELDS,
  type RangeField,
} from './core/fields';
export {
  type Bounds,
  buildFilter,
  type BuildFilterResult,
  type FilterArguments,
  filterArgumentsSchema,
  type FilterModel,
  isUnconstrained,
} from './core/filter';
export { decodePageToken, encodePageToken, filterDigest, type PageCursor } from './core/page-token';
export {
  type AccessPath,
  composeQuery,
  type Predicate,
  type QueryPlan,
  type SortMode,
} from './core/query-plan';
export {
  assertVehicleConstraints,
  deriveSearchVector,
  type NewVehicle,
  type SearchVector,
  toVehicleJson,
  type Vehicle,
  type VehicleJson,
} from './core/record';
export { foldText, tokenize } from './core/text';
export { type Config, ConfigError, loadConfig } from './config';
export { createMotorpool, type Motorpool, type MotorpoolOptions } from './create-motorpool';
export { withDeadline } from './engine/deadline';
export { createFacetResolver, type FacetResolver, type RangeFacet } from './engine/facets';
export {
  createSearchEngine,
  type SearchEngine,
  type SearchPage,
  type SearchRequest,
} from './engine/search';
export { errorString, normalizeError } from './errors';
export { createGateway, type Gateway, type GatewayOptions } from './gateway/create-gateway';
export {
  defineOperation,
  type Operation,
  type OperationContext,
  parseWith,
} from './gateway/define-operation';
export type { InputSchema } from './gateway/json-schema';
export type {
  CallRequest,
  CallResponse,
  CallState,
  GatewayEvents,
  OperationDescription,
} from './gateway/types';
export { configureLogging, getLogger, type LoggingOptions } from './logger';
export { createInventoryOperations } from './operations';
export { MemoryInventoryStore, type MemoryInventoryStoreOptions } from './store/memory-store';
export {
  type ConnectionPool,
  fromPool,
  PostgresInventoryStore,
  type SqlClient,
} from './store/postgres-store';
export { compileScan, type CompiledQuery } from './store/sql';
export type { InventoryStore, ScoredVehicle } from './store/types';
