/**
 * Persistence module.
 * Accumulating CSV store keyed by item id, rewritten whole on every save.
 */

export {
  STORE_COLUMNS,
  StoreParseError,
  listingToRow,
  mergeListings,
  readListingStore,
  writeListingStore,
} from './listingStore.js';
export type { StoreColumn } from './listingStore.js';
export { parseCsv, stringifyCsv, escapeCsvValue, CsvSyntaxError } from './csv.js';
export type { CsvRecord } from './csv.js';
