import type { z } from 'zod';

import { ValidationError } from '../core/errors';
import { stripUnset, toValidationIssues } from '../core/filter';
import type { JsonValue } from '../core/serialization/json';

export type ParseOutcome<T> =
  | { success: true; value: T }
  | { success: false; error: ValidationError };

export type OperationContext = {
  callId: string;
  signal?: AbortSignal;
};

/** Arguments already validated; running it only touches storage. */
export type PreparedCall = (context: OperationContext) => Promise<JsonValue>;

export type Operation = {
  name: string;
  title?: string;
  description: string;
  readOnly: boolean;
  /** Advertised input contract. `prepare` is the authority on what is accepted. */
  schema: z.ZodType;
  prepare(rawArgs: unknown): ParseOutcome<PreparedCall>;
};

export type DefineOperationOptions<TArgs> = {
  name: string;
  title?: string;
  description: string;
  readOnly?: boolean;
  schema: z.ZodType;
  parse: (rawArgs: unknown) => ParseOutcome<TArgs>;
  execute: (args: TArgs, context: OperationContext) => Promise<JsonValue>;
};

const OPERATION_NAME = /^[a-z][a-z0-9]*(?:_[a-z0-9]+)*$/;

export function assertSnakeCaseName(name: string): void {
  if (!OPERATION_NAME.test(name)) {
    throw new Error(`Operation names must be snake_case, got "${name}"`);
  }
}

export function defineOperation<TArgs>(options: DefineOperationOptions<TArgs>): Operation {
  const { name, title, description, readOnly = true, schema, parse, execute } = options;
  assertSnakeCaseName(name);
  const operation: Operation = {
    name,
    description,
    readOnly,
    schema,
    prepare(rawArgs) {
      const parsed = parse(rawArgs);
      if (!parsed.success) return parsed;
      const args = parsed.value;
      return { success: true, value: (context) => execute(args, context) };
    },
  };
  if (title !== undefined) operation.title = title;
  return operation;
}

/** Parser for operations whose arguments are exactly their schema's output. */
export function parseWith<S extends z.ZodType>(
  schema: S,
): (rawArgs: unknown) => ParseOutcome<z.output<S>> {
  return (rawArgs) => {
    const parsed = schema.safeParse(stripUnset(rawArgs ?? {}));
    if (parsed.success) return { success: true, value: parsed.data };
    return {
      success: false,
      error: ValidationError.fromIssues(toValidationIssues(parsed.error)),
    };
  };
}
