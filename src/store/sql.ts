import {
  DISTINCT_FIELD_ATTRIBUTE,
  type DistinctField,
  RANGE_FIELD_ATTRIBUTE,
  type RangeField,
} from '../core/fields';
import type { Predicate, QueryPlan, SortKey, SortTerm, SortValue } from '../core/query-plan';
import type { NewVehicle, Vehicle } from '../core/record';

export type SqlValue = string | number | boolean | null | Date | readonly string[];

export type CompiledQuery = {
  text: string;
  values: SqlValue[];
};

export const VEHICLE_COLUMN = {
  id: 'id',
  brand: 'brand',
  model: 'model',
  manufactureYear: 'manufacture_year',
  modelYear: 'model_year',
  engineSize: 'engine_size',
  fuelType: 'fuel_type',
  color: 'color',
  mileage: 'mileage',
  doors: 'doors',
  transmission: 'transmission',
  price: 'price',
  createdAt: 'created_at',
} as const satisfies Record<keyof Vehicle, string>;

const SELECT_LIST = Object.values(VEHICLE_COLUMN)
  .map((column) => `vehicle.${column}`)
  .join(', ');

const RETURNING_LIST = Object.values(VEHICLE_COLUMN).join(', ');

const SORT_COLUMN: Record<SortKey, { column: string; cast: string }> = {
  rank: { column: 'rank', cast: 'real' },
  createdAt: { column: 'created_at', cast: 'timestamptz' },
  manufactureYear: { column: 'manufacture_year', cast: 'integer' },
  price: { column: 'price', cast: 'numeric' },
  id: { column: 'id', cast: 'uuid' },
};

const RANGE_CAST = {
  manufactureYear: 'integer',
  price: 'numeric',
  mileage: 'integer',
  doors: 'integer',
} as const;

/** Collects positional parameters; every placeholder carries an explicit cast. */
class Parameters {
  readonly values: SqlValue[] = [];

  add(value: SqlValue, cast: string): string {
    this.values.push(value);
    return `$${this.values.length}::${cast}`;
  }
}

const folded = (column: string) => `lower(f_unaccent(vehicle.${column}))`;

/**
 * Renders a plan as one parameterised statement. Filtering and ranking happen in an inner
 * select so the keyset condition and ORDER BY can address the computed rank by name.
 */
export function compileScan(plan: QueryPlan): CompiledQuery {
  const params = new Parameters();
  const conditions: string[] = [];
  let source = 'vehicle';
  let rank = '0::real';

  for (const predicate of plan.predicates) {
    if (predicate.kind === 'text') {
      const query = params.add(predicate.query, 'text');
      source = `vehicle CROSS JOIN plainto_tsquery('portuguese', f_unaccent(${query})) AS query`;
      rank = 'ts_rank(vehicle.search_vector, query)';
      conditions.push('vehicle.search_vector @@ query');
    } else {
      conditions.push(...compileConstraint(predicate, params));
    }
  }

  const where = conditions.length ? ` WHERE ${conditions.join(' AND ')}` : '';
  const inner = `SELECT ${SELECT_LIST}, ${rank} AS rank FROM ${source}${where}`;
  const keyset = plan.after ? ` WHERE ${compileKeyset(plan.order, plan.after, params)}` : '';
  const orderBy = plan.order
    .map((term) => `candidate.${SORT_COLUMN[term.key].column} ${term.direction.toUpperCase()}`)
    .join(', ');
  const limit = params.add(plan.limit, 'integer');

  return {
    text: `SELECT * FROM (${inner}) AS candidate${keyset} ORDER BY ${orderBy} LIMIT ${limit}`,
    values: params.values,
  };
}

function compileConstraint(
  predicate: Exclude<Predicate, { kind: 'text' }>,
  params: Parameters,
): string[] {
  switch (predicate.kind) {
    case 'any-of':
      return [
        `${folded(VEHICLE_COLUMN[predicate.field])} = ANY(${params.add([...predicate.values], 'text[]')})`,
      ];
    case 'range': {
      const column = `vehicle.${VEHICLE_COLUMN[predicate.field]}`;
      const cast = RANGE_CAST[predicate.field];
      const parts: string[] = [];
      if (predicate.min !== undefined) parts.push(`${column} >= ${params.add(predicate.min, cast)}`);
      if (predicate.max !== undefined) parts.push(`${column} <= ${params.add(predicate.max, cast)}`);
      return parts;
    }
  }
}

/**
 * Row-value comparison expanded by hand, because the sort mixes directions:
 * `(k1 > c1) OR (k1 = c1 AND k2 > c2) OR ...` with `<` for descending keys.
 */
function compileKeyset(
  order: readonly SortTerm[],
  after: readonly SortValue[],
  params: Parameters,
): string {
  const placeholders: string[] = [];
  order.forEach((term, index) => {
    const value = after[index];
    if (value === undefined) {
      throw new RangeError(`Cursor is missing a value for ${term.key}`);
    }
    placeholders.push(params.add(value, SORT_COLUMN[term.key].cast));
  });

  const branches = order.map((term, index) => {
    const equalities = order
      .slice(0, index)
      .map((previous, position) => `candidate.${SORT_COLUMN[previous.key].column} = ${placeholders[position]}`);
    const operator = term.direction === 'asc' ? '>' : '<';
    const strict = `candidate.${SORT_COLUMN[term.key].column} ${operator} ${placeholders[index]}`;
    return `(${[...equalities, strict].join(' AND ')})`;
  });
  return `(${branches.join(' OR ')})`;
}

export function compileDistinct(
  field: DistinctField,
  brands?: readonly string[],
): CompiledQuery {
  const params = new Parameters();
  const column = VEHICLE_COLUMN[DISTINCT_FIELD_ATTRIBUTE[field]];
  const where = brands ? ` WHERE ${folded('brand')} = ANY(${params.add([...brands], 'text[]')})` : '';
  return {
    text: `SELECT DISTINCT vehicle.${column} AS value FROM vehicle${where} ORDER BY value`,
    values: params.values,
  };
}

export function compileRange(field: RangeField): CompiledQuery {
  const column = VEHICLE_COLUMN[RANGE_FIELD_ATTRIBUTE[field]];
  return {
    text: `SELECT min(vehicle.${column}) AS min, max(vehicle.${column}) AS max FROM vehicle`,
    values: [],
  };
}

/** Multi-row insert; ids and timestamps the caller leaves out come from the database. */
export function compileInsert(vehicles: readonly NewVehicle[]): CompiledQuery {
  const params = new Parameters();
  const rows = vehicles.map((vehicle) => {
    const cells = [
      `COALESCE(${params.add(vehicle.id ?? null, 'uuid')}, gen_random_uuid())`,
      params.add(vehicle.brand, 'text'),
      params.add(vehicle.model, 'text'),
      params.add(vehicle.manufactureYear, 'integer'),
      params.add(vehicle.modelYear, 'integer'),
      params.add(vehicle.engineSize, 'numeric'),
      params.add(vehicle.fuelType, 'text'),
      params.add(vehicle.color, 'text'),
      params.add(vehicle.mileage, 'integer'),
      params.add(vehicle.doors, 'integer'),
      params.add(vehicle.transmission, 'text'),
      params.add(vehicle.price, 'numeric'),
      `COALESCE(${params.add(vehicle.createdAt ?? null, 'timestamptz')}, now())`,
    ];
    return `(${cells.join(', ')})`;
  });
  return {
    text: `INSERT INTO vehicle (${RETURNING_LIST}) VALUES ${rows.join(', ')} RETURNING ${RETURNING_LIST}`,
    values: params.values,
  };
}
