import { z } from 'zod';

import { ConstraintViolation } from './errors';
import { tokenize } from './text';

export const MIN_MANUFACTURE_YEAR = 1990;
export const DOOR_COUNTS = [2, 3, 4, 5] as const;

export type Vehicle = {
  id: string;
  brand: string;
  model: string;
  manufactureYear: number;
  modelYear: number;
  engineSize: number;
  fuelType: string;
  color: string;
  mileage: number;
  doors: number;
  transmission: string;
  price: number;
  createdAt: Date;
};

/** What a writer supplies; the store assigns `id` and `createdAt` when they are absent. */
export type NewVehicle = Omit<Vehicle, 'id' | 'createdAt'> & {
  id?: string;
  createdAt?: Date;
};

/** Wire form of a vehicle: the timestamp travels as ISO-8601 text. */
export type VehicleJson = Omit<Vehicle, 'createdAt'> & { createdAt: string };

/** Lexeme to occurrence count, derived from the four searchable fields. */
export type SearchVector = ReadonlyMap<string, number>;

export const SEARCH_VECTOR_FIELDS = ['brand', 'model', 'color', 'fuelType'] as const;

export type SearchableFields = Pick<Vehicle, (typeof SEARCH_VECTOR_FIELDS)[number]>;

const identityText = z.string().trim().min(1).max(100);
const categoryText = z.string().trim().min(1).max(50);

function hasScale(value: number, digits: number): boolean {
  const scaled = value * 10 ** digits;
  return Math.abs(scaled - Math.round(scaled)) < 1e-6;
}

export function vehicleConstraints(now: Date = new Date()) {
  const maxModelYear = now.getUTCFullYear() + 1;
  return z
    .object({
      brand: identityText,
      model: identityText,
      manufactureYear: z.number().int().min(MIN_MANUFACTURE_YEAR),
      modelYear: z.number().int().max(maxModelYear),
      engineSize: z
        .number()
        .min(0)
        .max(9.9)
        .refine((value) => hasScale(value, 1), 'must have at most one decimal place'),
      fuelType: categoryText,
      color: categoryText,
      mileage: z.number().int().min(0),
      doors: z
        .number()
        .int()
        .refine(
          (value) => DOOR_COUNTS.some((count) => count === value),
          `must be one of ${DOOR_COUNTS.join(', ')}`,
        ),
      transmission: categoryText,
      price: z
        .number()
        .positive()
        .max(99_999_999.99)
        .refine((value) => hasScale(value, 2), 'must have at most two decimal places'),
    })
    .refine((vehicle) => vehicle.modelYear >= vehicle.manufactureYear, {
      message: 'modelYear must not be earlier than manufactureYear',
      path: ['modelYear'],
    });
}

/**
 * Checks every Record invariant. All failures surface as one `ConstraintViolation`.
 */
export function assertVehicleConstraints(vehicle: NewVehicle, now: Date = new Date()): void {
  const outcome = vehicleConstraints(now).safeParse(vehicle);
  if (outcome.success) return;
  const details = outcome.error.issues
    .map((issue) => `${issue.path.map(String).join('.')}: ${issue.message}`)
    .join('; ');
  throw new ConstraintViolation(`Vehicle violates inventory constraints (${details})`, {
    cause: outcome.error,
  });
}

export function deriveSearchVector(fields: SearchableFields): SearchVector {
  const vector = new Map<string, number>();
  for (const field of SEARCH_VECTOR_FIELDS) {
    for (const lexeme of tokenize(fields[field])) {
      vector.set(lexeme, (vector.get(lexeme) ?? 0) + 1);
    }
  }
  return vector;
}

export function toVehicleJson(vehicle: Vehicle): VehicleJson {
  return {
    id: vehicle.id,
    brand: vehicle.brand,
    model: vehicle.model,
    manufactureYear: vehicle.manufactureYear,
    modelYear: vehicle.modelYear,
    engineSize: vehicle.engineSize,
    fuelType: vehicle.fuelType,
    color: vehicle.color,
    mileage: vehicle.mileage,
    doors: vehicle.doors,
    transmission: vehicle.transmission,
    price: vehicle.price,
    createdAt: vehicle.createdAt.toISOString(),
  };
}
