/**
 * Search module exports
 */

export {
  QuoteSearch,
  type AdvancedSearchCriteria,
  type SearchAllResult,
  type AuthorWithQuotes,
} from './QuoteSearch.js'
export {
  toIdSet,
  intersect,
  intersectAll,
  unionAll,
  toSortedList,
  type IdSet,
  type Identified,
} from './set-algebra.js'
