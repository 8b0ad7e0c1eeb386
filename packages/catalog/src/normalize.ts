import { format, getYear, isValid, parse } from 'date-fns';
import {
  IMPORT_DATE_FORMATS,
  IMPORT_NULL_TOKENS,
  ITEM_STATUS_IN_STOCK,
  ITEM_STATUS_SOLD,
  LEGACY_SOLD_STATUS,
  type HistoricalItemInput,
  type ItemStatus,
} from '@stockroom/shared';

/** One already-read row of the stock sheet, keyed by its column headers. */
export type ImportRecord = Record<string, string | number | null | undefined>;

/** Column headers of the legacy stock sheet */
export const IMPORT_COLUMNS = {
  serialLabel: 'SL',
  sku: 'SKU Number',
  category: 'Category',
  subcategory: 'Subcategory',
  weight: 'Weight',
  dimensions: 'Dimensions',
  stone: 'Stones',
  color: 'Color',
  finish: 'Finish',
  yearOfPurchase: 'Year of Purchase',
  unitPrice: 'Unit Price',
  costPrice: 'Cost price',
  threadWork: 'Thread work',
  gstOnCost: 'GST on Cost price',
  packagingCost: 'Packaging cost',
  finalCostPrice: 'Final Cost price',
  spMargin: 'SP - Margin',
  taxesPercent: 'Taxes',
  sellingPrice: 'SP',
  finalSellingPrice: 'Final SP',
  status: 'Status',
  customerName: 'CUSTOMER NAME',
  saleAmount: 'SALE AMOUNT',
  dateOfSale: 'DOP',
} as const;

/**
 * Trimmed text, or null for a missing cell or a placeholder such as "N/A".
 */
export function cleanText(value: string | number | null | undefined): string | null {
  if (value === null || value === undefined) return null;
  const text = String(value).trim();
  return IMPORT_NULL_TOKENS.includes(text.toLowerCase()) ? null : text;
}

/**
 * Number from a loosely formatted cell ("₹1,250.00" -> 1250).
 * Everything except digits, '.' and '-' is dropped first.
 */
export function cleanAmount(value: string | number | null | undefined): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  const text = cleanText(value);
  if (text === null) return null;

  const stripped = text.replace(/[^\d.-]/g, '');
  if (stripped === '' || stripped === '.' || stripped === '-') return null;

  const parsed = Number(stripped);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * "18 x 4.5" -> { length: 18, width: 4.5 }. A single number is the length.
 */
export function parseDimensions(value: string | number | null | undefined): {
  length: number | null;
  width: number | null;
} {
  const text = cleanText(value);
  if (text === null || text === '0') return { length: null, width: null };

  const parts = text.replace(/\s+/g, '').split(/[xX×]/).filter((part) => part !== '');
  return {
    length: cleanAmount(parts[0]),
    width: cleanAmount(parts[1]),
  };
}

/**
 * Normalise a sale date to YYYY-MM-DD, trying each accepted layout in order.
 * Day-first wins over month-first for ambiguous dates such as 01/02/2024.
 * Two-digit years ("15/01/24") are rejected rather than read as year 24.
 */
export function parseSaleDate(
  value: string | number | null | undefined,
  referenceDate: Date = new Date(2000, 0, 1)
): string | null {
  const text = cleanText(value);
  if (text === null) return null;

  for (const layout of IMPORT_DATE_FORMATS) {
    const parsed = parse(text, layout, referenceDate);
    if (isValid(parsed) && getYear(parsed) >= 1000) {
      return format(parsed, 'yyyy-MM-dd');
    }
  }
  return null;
}

export function normalizeStatus(value: string | number | null | undefined): ItemStatus {
  const text = cleanText(value);
  if (text === null) return ITEM_STATUS_IN_STOCK;
  if (text.toLowerCase() === LEGACY_SOLD_STATUS.toLowerCase()) return ITEM_STATUS_SOLD;
  return text;
}

function wholeNumber(value: string | number | null | undefined): number | null {
  const amount = cleanAmount(value);
  return amount === null ? null : Math.trunc(amount);
}

/**
 * Turn one stock-sheet row into a historical item. Returns null for rows
 * without a SKU, which the importer skips.
 */
export function normalizeImportRecord(record: ImportRecord): HistoricalItemInput | null {
  const cell = (column: keyof typeof IMPORT_COLUMNS) => record[IMPORT_COLUMNS[column]];

  const sku = cleanText(cell('sku'))?.toUpperCase();
  if (!sku) return null;

  const { length, width } = parseDimensions(cell('dimensions'));

  return {
    serialLabel: cleanText(cell('serialLabel')),
    sku,
    category: cleanText(cell('category')) ?? '',
    subcategory: cleanText(cell('subcategory')),
    stone: cleanText(cell('stone')),
    color: cleanText(cell('color')),
    finish: cleanText(cell('finish')),
    weight: cleanAmount(cell('weight')),
    length,
    width,
    yearOfPurchase: wholeNumber(cell('yearOfPurchase')),
    pricing: {
      unitPrice: cleanAmount(cell('unitPrice')),
      costPrice: cleanAmount(cell('costPrice')),
      threadWork: cleanAmount(cell('threadWork')),
      gstOnCost: cleanAmount(cell('gstOnCost')),
      packagingCost: cleanAmount(cell('packagingCost')),
      finalCostPrice: cleanAmount(cell('finalCostPrice')),
      spMargin: cleanText(cell('spMargin')),
      taxesPercent: cleanAmount(cell('taxesPercent')),
      sellingPrice: cleanAmount(cell('sellingPrice')),
      finalSellingPrice: cleanAmount(cell('finalSellingPrice')),
    },
    status: normalizeStatus(cell('status')),
    customerName: cleanText(cell('customerName')),
    saleAmount: cleanAmount(cell('saleAmount')),
    dateOfSale: parseSaleDate(cell('dateOfSale')),
  };
}
