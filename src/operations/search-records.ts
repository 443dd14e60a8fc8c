import { z } from 'zod';

import { ValidationError, type ValidationIssue } from '../core/errors';
import {
  buildFilter,
  filterArgumentsShape,
  type FilterModel,
  stripUnset,
  toValidationIssues,
} from '../core/filter';
import { toVehicleJson } from '../core/record';
import { isPlainObject } from '../core/serialization/json';
import type { SearchEngine } from '../engine/search';
import { defineOperation, type Operation, type ParseOutcome } from '../gateway/define-operation';

const pagingShape = {
  pageToken: z
    .string()
    .optional()
    .describe('nextPageToken from the previous page of the same search; omit for the first page.'),
  pageSize: z
    .number()
    .int()
    .min(1)
    .optional()
    .describe('Records per page. Larger values than the server maximum are truncated.'),
};

const pagingSchema = z.object(pagingShape);

export const searchRecordsSchema = z.strictObject({ ...filterArgumentsShape, ...pagingShape });

export type SearchRecordsArguments = {
  filter: FilterModel;
  pageToken?: string;
  pageSize?: number;
};

/** Splits paging from filter criteria and validates both, reporting every issue at once. */
export function parseSearchArguments(rawArgs: unknown): ParseOutcome<SearchRecordsArguments> {
  const stripped = stripUnset(rawArgs ?? {});
  if (!isPlainObject(stripped)) {
    return {
      success: false,
      error: ValidationError.fromIssues([{ path: '', message: 'arguments must be an object' }]),
    };
  }
  const { pageToken, pageSize, ...criteria } = stripped;
  const paging = pagingSchema.safeParse({ pageToken, pageSize });
  const built = buildFilter(criteria);

  const issues: ValidationIssue[] = [];
  if (!paging.success) issues.push(...toValidationIssues(paging.error));
  if (!built.success) issues.push(...built.error.issues);
  if (!paging.success || !built.success) {
    return { success: false, error: ValidationError.fromIssues(issues) };
  }

  const args: SearchRecordsArguments = { filter: built.filter };
  if (paging.data.pageToken !== undefined) args.pageToken = paging.data.pageToken;
  if (paging.data.pageSize !== undefined) args.pageSize = paging.data.pageSize;
  return { success: true, value: args };
}

export function createSearchRecordsOperation(engine: SearchEngine): Operation {
  return defineOperation({
    name: 'search_records',
    title: 'Search vehicles',
    description:
      'Finds vehicles in stock. Every criterion is optional and all given criteria must hold. ' +
      'With freeText the results are ranked by relevance; otherwise newest year first, then ' +
      'cheapest. Call list_distinct or get_range first to learn which values exist.',
    schema: searchRecordsSchema,
    parse: parseSearchArguments,
    async execute({ filter, pageToken, pageSize }, context) {
      const page = await engine.search(filter, {
        ...(pageToken !== undefined ? { pageToken } : {}),
        ...(pageSize !== undefined ? { pageSize } : {}),
        ...(context.signal ? { signal: context.signal } : {}),
      });
      return {
        records: page.records.map(toVehicleJson),
        ...(page.nextPageToken ? { nextPageToken: page.nextPageToken } : {}),
      };
    },
  });
}
