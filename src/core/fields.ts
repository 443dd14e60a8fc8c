import type { Vehicle } from './record';

/** Vehicle attributes compared as folded text. */
export type TextField = 'brand' | 'model' | 'fuelType' | 'color' | 'transmission';

/** Vehicle attributes filtered by inclusive ranges. */
export type NumericField = 'manufactureYear' | 'price' | 'mileage' | 'doors';

export const DISTINCT_FIELDS = [
  'brand',
  'model',
  'fuel_type',
  'color',
  'transmission',
  'doors',
  'engine_size',
] as const;

export type DistinctField = (typeof DISTINCT_FIELDS)[number];

export const RANGE_FIELDS = ['year', 'price', 'mileage'] as const;

export type RangeField = (typeof RANGE_FIELDS)[number];

export const DISTINCT_FIELD_ATTRIBUTE = {
  brand: 'brand',
  model: 'model',
  fuel_type: 'fuelType',
  color: 'color',
  transmission: 'transmission',
  doors: 'doors',
  engine_size: 'engineSize',
} as const satisfies Record<DistinctField, keyof Vehicle>;

export const RANGE_FIELD_ATTRIBUTE = {
  year: 'manufactureYear',
  price: 'price',
  mileage: 'mileage',
} as const satisfies Record<RangeField, NumericField>;

export type FacetValue = string | number;

export type NumericRange = {
  min: number;
  max: number;
};
