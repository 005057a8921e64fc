/**
 * Extraction module.
 * Pure markup → data transforms driven by ordered selector-fallback catalogs.
 * No browser access.
 */

export { extractListings, parseItemId } from './listings.js';
export type { ExtractOptions } from './listings.js';
export { extractItemDetails, extractDescriptionDocument } from './details.js';
export type { ItemDetails } from './details.js';
export { readAvailableFunds, readStatText, readStatCount } from './stats.js';
export type { StatField } from './stats.js';
export { parseCount } from './counts.js';
export * from './catalog.js';
