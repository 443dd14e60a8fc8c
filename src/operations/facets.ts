import { z } from 'zod';

import { DISTINCT_FIELDS, RANGE_FIELDS } from '../core/fields';
import type { FacetResolver } from '../engine/facets';
import { defineOperation, type Operation, parseWith } from '../gateway/define-operation';

export const listDistinctSchema = z.strictObject({
  field: z.enum(DISTINCT_FIELDS).describe('Attribute whose values to list.'),
});

export const getRangeSchema = z.strictObject({
  field: z.enum(RANGE_FIELDS).describe('Numeric attribute to summarise; year is manufacture year.'),
});

export const listModelsSchema = z.strictObject({
  brands: z
    .union([z.string(), z.array(z.string())])
    .optional()
    .describe('Only list models of these brands; case and accents are ignored.'),
});

export function createListDistinctOperation(facets: FacetResolver): Operation {
  return defineOperation<z.output<typeof listDistinctSchema>>({
    name: 'list_distinct',
    title: 'List available values',
    description:
      'Lists the distinct values currently in stock for one attribute, e.g. every fuel type.',
    schema: listDistinctSchema,
    parse: parseWith(listDistinctSchema),
    async execute({ field }, context) {
      const values = await facets.listDistinct(field, context);
      return { values };
    },
  });
}

export function createGetRangeOperation(facets: FacetResolver): Operation {
  return defineOperation<z.output<typeof getRangeSchema>>({
    name: 'get_range',
    title: 'Get value range',
    description:
      'Returns the lowest and highest year, price or mileage in stock, or { empty: true } when ' +
      'the inventory has no vehicles.',
    schema: getRangeSchema,
    parse: parseWith(getRangeSchema),
    async execute({ field }, context) {
      return facets.getRange(field, context);
    },
  });
}

export function createListModelsOperation(facets: FacetResolver): Operation {
  return defineOperation<z.output<typeof listModelsSchema>>({
    name: 'list_models',
    title: 'List models',
    description: 'Lists the models in stock, optionally only those of the given brands.',
    schema: listModelsSchema,
    parse: parseWith(listModelsSchema),
    async execute({ brands }, context) {
      const scope = brands === undefined ? undefined : Array.isArray(brands) ? brands : [brands];
      const models = await facets.listModels(scope, context);
      return { models };
    },
  });
}
