import type { KnownItemStatus } from './types/inventory.js';

export const ITEM_STATUS_IN_STOCK: KnownItemStatus = 'In Stock';
export const ITEM_STATUS_SOLD: KnownItemStatus = 'Sold';

/** Sold marker used by the legacy stock sheet */
export const LEGACY_SOLD_STATUS = 'OO Stock';

/** Default number of rows returned by in-stock product searches */
export const DEFAULT_SEARCH_LIMIT = 10;
export const MAX_SEARCH_LIMIT = 100;

/** Cell values the stock sheet uses to mean "no value" (compared lower-cased) */
export const IMPORT_NULL_TOKENS: readonly string[] = ['', 'na', 'n/a', 'nan', 'none', 'null'];

/** Sale date layouts accepted on import, tried in order */
export const IMPORT_DATE_FORMATS: readonly string[] = [
  'yyyy-MM-dd',
  'dd/MM/yyyy',
  'MM/dd/yyyy',
  'yyyy.MM.dd',
  'dd-MM-yyyy',
  'MM-dd-yyyy',
];
