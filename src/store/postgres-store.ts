import { z } from 'zod';

import { ConstraintViolation, MotorpoolError, StorageError } from '../core/errors';
import type { DistinctField, FacetValue, NumericRange, RangeField } from '../core/fields';
import type { QueryPlan } from '../core/query-plan';
import { assertVehicleConstraints, type NewVehicle, type Vehicle } from '../core/record';
import { errorString, normalizeError } from '../errors';
import { getLogger } from '../logger';
import {
  compileDistinct,
  compileInsert,
  compileRange,
  compileScan,
  type CompiledQuery,
  type SqlValue,
} from './sql';
import type {
  DistinctOptions,
  InventoryStore,
  ScoredVehicle,
  StoreCallOptions,
} from './types';

const logger = getLogger('store', 'postgres');

/** The statement runner the store needs. */
export interface SqlClient {
  /** `signal` aborts when the caller stops waiting; the client must drop the statement then. */
  query(
    text: string,
    values: readonly SqlValue[],
    signal?: AbortSignal,
  ): Promise<{ rows: unknown[] }>;
}

/** The slice of a pg `Pool` that `fromPool` uses. */
export interface ConnectionPool {
  connect(): Promise<{
    query(text: string, values: SqlValue[]): Promise<{ rows: unknown[] }>;
    release(error?: Error | boolean): void;
  }>;
}

/**
 * Runs each statement on its own pooled connection. An abort destroys that connection, which
 * ends the backend running the statement and keeps the slot from being held by a dead call.
 * Pair it with `statement_timeout` on the pool so the server stops the statement too.
 */
export function fromPool(pool: ConnectionPool): SqlClient {
  return {
    query: async (text, values, signal) => {
      const connection = await pool.connect();
      let destroyed = false;
      const onAbort = () => {
        destroyed = true;
        connection.release(new Error('Inventory statement aborted'));
      };
      if (signal?.aborted) onAbort();
      else signal?.addEventListener('abort', onAbort, { once: true });
      try {
        const result = await connection.query(text, [...values]);
        return { rows: result.rows };
      } finally {
        signal?.removeEventListener('abort', onAbort);
        if (!destroyed) connection.release();
      }
    },
  };
}

// Check violations, NOT NULL, unique key and numeric overflow.
const CONSTRAINT_SQLSTATES = new Set(['23514', '23502', '23505', '22003']);
const QUERY_CANCELED = '57014';

const vehicleRowSchema = z.object({
  id: z.string(),
  brand: z.string(),
  model: z.string(),
  manufacture_year: z.coerce.number().int(),
  model_year: z.coerce.number().int(),
  engine_size: z.coerce.number(),
  fuel_type: z.string(),
  color: z.string(),
  mileage: z.coerce.number().int(),
  doors: z.coerce.number().int(),
  transmission: z.string(),
  price: z.coerce.number(),
  created_at: z.coerce.date(),
});

const scoredRowSchema = vehicleRowSchema.extend({ rank: z.coerce.number() });

const distinctRowSchema = z.object({
  value: z.union([z.string(), z.number()]),
});

const rangeRowSchema = z.object({
  min: z.coerce.number().nullable(),
  max: z.coerce.number().nullable(),
});

type VehicleRow = z.infer<typeof vehicleRowSchema>;

function toVehicle(row: VehicleRow): Vehicle {
  return {
    id: row.id,
    brand: row.brand,
    model: row.model,
    manufactureYear: row.manufacture_year,
    modelYear: row.model_year,
    engineSize: row.engine_size,
    fuelType: row.fuel_type,
    color: row.color,
    mileage: row.mileage,
    doors: row.doors,
    transmission: row.transmission,
    price: row.price,
    createdAt: row.created_at,
  };
}

/**
 * Inventory backed by the `vehicle` table. The search vector is a generated column, so the
 * database keeps it consistent with every write.
 */
export class PostgresInventoryStore implements InventoryStore {
  constructor(
    private readonly client: SqlClient,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async scan(plan: QueryPlan, options: StoreCallOptions = {}): Promise<ScoredVehicle[]> {
    const rows = await this.run('scan', compileScan(plan), options);
    return rows.map((row) => {
      const parsed = scoredRowSchema.parse(row);
      return { vehicle: toVehicle(parsed), rank: parsed.rank };
    });
  }

  async distinct(field: DistinctField, options: DistinctOptions = {}): Promise<FacetValue[]> {
    const rows = await this.run('distinct', compileDistinct(field, options.brands), options);
    return rows.map((row) => {
      const { value } = distinctRowSchema.parse(row);
      // numeric columns arrive as text from pg
      return field === 'engine_size' ? Number(value) : value;
    });
  }

  async range(
    field: RangeField,
    options: StoreCallOptions = {},
  ): Promise<NumericRange | undefined> {
    const [row] = await this.run('range', compileRange(field), options);
    if (row === undefined) return undefined;
    const { min, max } = rangeRowSchema.parse(row);
    return min === null || max === null ? undefined : { min, max };
  }

  async insert(
    vehicles: readonly NewVehicle[],
    options: StoreCallOptions = {},
  ): Promise<Vehicle[]> {
    if (vehicles.length === 0) return [];
    const now = this.clock();
    for (const vehicle of vehicles) {
      assertVehicleConstraints(vehicle, now);
    }
    const rows = await this.run('insert', compileInsert(vehicles), options);
    return rows.map((row) => toVehicle(vehicleRowSchema.parse(row)));
  }

  private async run(
    operation: string,
    query: CompiledQuery,
    options: StoreCallOptions,
  ): Promise<unknown[]> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new StorageError('cancelled', `Inventory ${operation} was cancelled`);
    }
    try {
      const result = await this.client.query(query.text, query.values, signal);
      return result.rows;
    } catch (error) {
      // The connection went down because of the abort; the caller already has its answer.
      if (signal?.aborted) {
        throw new StorageError('cancelled', `Inventory ${operation} was cancelled`, { cause: error });
      }
      throw this.translate(operation, error);
    }
  }

  private translate(operation: string, error: unknown): MotorpoolError {
    const normalized = normalizeError(error);
    if (operation === 'insert' && normalized.code && CONSTRAINT_SQLSTATES.has(normalized.code)) {
      return new ConstraintViolation(`Vehicle violates inventory constraints (${normalized.message})`, {
        cause: error,
      });
    }
    if (normalized.code === QUERY_CANCELED || normalized.message === 'Query read timeout') {
      logger.warn`Inventory ${operation} timed out: ${errorString(normalized)}`;
      return new StorageError('timeout', 'The inventory did not answer in time', { cause: error });
    }
    logger.error`Inventory ${operation} failed: ${errorString(normalized)}`;
    return new StorageError('unavailable', 'The inventory could not be queried; try again', {
      cause: error,
    });
  }
}
