import { z } from 'zod';

import { isPlainObject } from '../core/serialization/json';

export type JsonSchema = { [key: string]: unknown };

/** Object-typed JSON Schema, the shape tool protocols expect for arguments. */
export type InputSchema = JsonSchema & {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required?: string[];
};

export function toInputSchema(schema: z.ZodType): InputSchema {
  const generated: Array<[string, unknown]> = Object.entries(
    z.toJSONSchema(schema, { io: 'input', unrepresentable: 'any' }),
  );
  const rest: JsonSchema = {};
  const properties: Record<string, JsonSchema> = {};
  let required: string[] | undefined;
  for (const [key, value] of generated) {
    if (key === '$schema' || key === 'type') continue;
    if (key === 'properties' && isPlainObject(value)) {
      for (const [property, definition] of Object.entries(value)) {
        if (isPlainObject(definition)) properties[property] = definition;
      }
      continue;
    }
    if (key === 'required' && Array.isArray(value)) {
      required = value.filter((entry): entry is string => typeof entry === 'string');
      continue;
    }
    rest[key] = value;
  }
  return {
    ...rest,
    type: 'object',
    properties,
    ...(required?.length ? { required } : {}),
  };
}
