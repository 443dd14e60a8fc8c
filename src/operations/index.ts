import type { FacetResolver } from '../engine/facets';
import type { SearchEngine } from '../engine/search';
import type { Operation } from '../gateway/define-operation';
import {
  createGetRangeOperation,
  createListDistinctOperation,
  createListModelsOperation,
} from './facets';
import { createSearchRecordsOperation } from './search-records';

export {
  createGetRangeOperation,
  createListDistinctOperation,
  createListModelsOperation,
  getRangeSchema,
  listDistinctSchema,
  listModelsSchema,
} from './facets';
export {
  createSearchRecordsOperation,
  parseSearchArguments,
  searchRecordsSchema,
  type SearchRecordsArguments,
} from './search-records';

export function createInventoryOperations(
  engine: SearchEngine,
  facets: FacetResolver,
): Operation[] {
  return [
    createSearchRecordsOperation(engine),
    createListDistinctOperation(facets),
    createGetRangeOperation(facets),
    createListModelsOperation(facets),
  ];
}
