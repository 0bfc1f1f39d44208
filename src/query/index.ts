/**
 * Query entrypoint: exports the search query builder and filter helpers.
 * @module
 */
export {
  type Clause,
  Filter,
  FilterGroup,
  type FilterOptions,
  type FilterValue,
  type Operator,
} from './filter.js';
export { QueryBuilder, type SearchQueryParams } from './queryBuilder.js';
