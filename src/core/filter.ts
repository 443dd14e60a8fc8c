import { z } from 'zod';

import { ValidationError, type ValidationIssue } from './errors';
import type { NumericField, TextField } from './fields';
import { isPlainObject, type JsonObject } from './serialization/json';
import { foldText, tokenize } from './text';

export type Bounds = {
  min?: number;
  max?: number;
};

export type FreeTextQuery = {
  query: string;
  terms: readonly string[];
};

/**
 * Validated, call-scoped search criteria. Text constraints hold folded values and mean
 * "equals any of"; bounds are inclusive and already known to satisfy `min <= max`.
 */
export type FilterModel = {
  readonly freeText?: FreeTextQuery;
  readonly text: Readonly<Partial<Record<TextField, readonly string[]>>>;
  readonly bounds: Readonly<Partial<Record<NumericField, Bounds>>>;
};

export type BuildFilterResult =
  | { success: true; filter: FilterModel }
  | { success: false; error: ValidationError };

const textConstraint = z.union([z.string(), z.array(z.string())]);

export const filterArgumentsShape = {
  freeText: z
    .string()
    .max(200)
    .optional()
    .describe('Words to look for in brand, model, color and fuel type, e.g. "gol flex preto".'),
  identityFilters: z
    .strictObject({
      brand: textConstraint.optional().describe('Brand, or list of brands (any of).'),
      model: textConstraint.optional().describe('Model, or list of models (any of).'),
    })
    .optional()
    .describe('Exact brand/model constraints; case and accents are ignored.'),
  yearMin: z.number().int().optional().describe('Earliest manufacture year, inclusive.'),
  yearMax: z.number().int().optional().describe('Latest manufacture year, inclusive.'),
  priceMin: z.number().optional().describe('Lowest price, inclusive.'),
  priceMax: z.number().optional().describe('Highest price, inclusive.'),
  mileageMin: z.number().int().optional().describe('Lowest mileage in km, inclusive.'),
  mileageMax: z.number().int().optional().describe('Highest mileage in km, inclusive.'),
  doorsMin: z.number().int().optional().describe('Fewest doors, inclusive.'),
  doorsMax: z.number().int().optional().describe('Most doors, inclusive.'),
  fuelType: textConstraint.optional().describe('Fuel type, or list of fuel types (any of).'),
  color: textConstraint.optional().describe('Color, or list of colors (any of).'),
  transmission: textConstraint
    .optional()
    .describe('Transmission, or list of transmissions (any of).'),
};

export const filterArgumentsSchema = z.strictObject(filterArgumentsShape);

export type FilterArguments = z.infer<typeof filterArgumentsSchema>;

const BOUND_KEYS = [
  ['manufactureYear', 'yearMin', 'yearMax'],
  ['price', 'priceMin', 'priceMax'],
  ['mileage', 'mileageMin', 'mileageMax'],
  ['doors', 'doorsMin', 'doorsMax'],
] as const satisfies ReadonlyArray<
  readonly [NumericField, keyof FilterArguments, keyof FilterArguments]
>;

/**
 * Turns untrusted arguments into a `FilterModel`. Pure: no storage access.
 *
 * `null`, empty strings, empty lists and empty objects are treated as absent, so a caller that
 * fills every slot with blanks gets an unconstrained filter rather than an empty result.
 */
export function buildFilter(rawArgs: unknown): BuildFilterResult {
  const stripped = stripUnset(rawArgs ?? {});
  if (!isPlainObject(stripped)) {
    return failure([{ path: '', message: 'arguments must be an object' }]);
  }
  const parsed = filterArgumentsSchema.safeParse(stripped);
  if (!parsed.success) {
    return failure(toValidationIssues(parsed.error));
  }

  const args = parsed.data;
  const issues: ValidationIssue[] = [];
  const bounds: Partial<Record<NumericField, Bounds>> = {};
  for (const [field, minKey, maxKey] of BOUND_KEYS) {
    const min = args[minKey];
    const max = args[maxKey];
    if (typeof min === 'number' && typeof max === 'number' && min > max) {
      issues.push({
        path: minKey,
        message: `${minKey} (${min}) must be less than or equal to ${maxKey} (${max})`,
      });
      continue;
    }
    const range: Bounds = {};
    if (typeof min === 'number') range.min = min;
    if (typeof max === 'number') range.max = max;
    if (range.min !== undefined || range.max !== undefined) bounds[field] = range;
  }
  if (issues.length) {
    return failure(issues);
  }

  const text: Partial<Record<TextField, readonly string[]>> = {};
  const assign = (field: TextField, value: string | string[] | undefined) => {
    const values = foldValues(value);
    if (values.length) text[field] = values;
  };
  assign('brand', args.identityFilters?.brand);
  assign('model', args.identityFilters?.model);
  assign('fuelType', args.fuelType);
  assign('color', args.color);
  assign('transmission', args.transmission);

  const filter: {
    freeText?: FreeTextQuery;
    text: typeof text;
    bounds: typeof bounds;
  } = { text, bounds };
  if (args.freeText !== undefined) {
    const terms = tokenize(args.freeText);
    if (terms.length) filter.freeText = { query: args.freeText.trim(), terms };
  }
  return { success: true, filter };
}

/** Canonical JSON form of a filter; equal filters produce equal objects. */
export function filterToJson(filter: FilterModel): JsonObject {
  const json: JsonObject = {};
  if (filter.freeText) json['freeText'] = [...filter.freeText.terms];
  const text: JsonObject = {};
  for (const [field, values] of Object.entries(filter.text)) {
    if (values) text[field] = [...values];
  }
  const bounds: JsonObject = {};
  for (const [field, range] of Object.entries(filter.bounds)) {
    if (!range) continue;
    bounds[field] = { min: range.min ?? null, max: range.max ?? null };
  }
  json['text'] = text;
  json['bounds'] = bounds;
  return json;
}

export function isUnconstrained(filter: FilterModel): boolean {
  return (
    !filter.freeText &&
    Object.keys(filter.text).length === 0 &&
    Object.keys(filter.bounds).length === 0
  );
}

/**
 * Removes blank values recursively. Non-object input is returned untouched so the schema can
 * report it.
 */
export function stripUnset(value: unknown): unknown {
  if (!isPlainObject(value)) return value;
  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    const cleaned = stripEntry(entry);
    if (cleaned !== undefined) result[key] = cleaned;
  }
  return result;
}

function stripEntry(entry: unknown): unknown {
  if (entry === null || entry === undefined) return undefined;
  if (typeof entry === 'string') return entry.trim() === '' ? undefined : entry;
  if (Array.isArray(entry)) {
    const kept = entry.filter((item) => !(typeof item === 'string' && item.trim() === ''));
    return kept.length ? kept : undefined;
  }
  if (isPlainObject(entry)) {
    const nested = stripUnset(entry);
    return isPlainObject(nested) && Object.keys(nested).length ? nested : undefined;
  }
  return entry;
}

function foldValues(value: string | string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  const list = Array.isArray(value) ? value : [value];
  const folded = new Set<string>();
  for (const item of list) {
    const normalized = foldText(item);
    if (normalized) folded.add(normalized);
  }
  return [...folded].sort();
}

export function toValidationIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.map(String).join('.'),
    message: issue.message,
  }));
}

function failure(issues: ValidationIssue[]): BuildFilterResult {
  return { success: false, error: ValidationError.fromIssues(issues) };
}
