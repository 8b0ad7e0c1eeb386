import type { FullBreakdownInputs, PricingInputs } from './pricing.js';

/** Known lifecycle states; stored as free text so legacy values survive. */
export type KnownItemStatus = 'In Stock' | 'Sold';
export type ItemStatus = KnownItemStatus | (string & {});

export interface InventoryItem {
  id: number;
  serialLabel: string | null;
  sku: string;
  categoryId: number;
  stoneId: number | null;
  colorId: number | null;
  finishId: number | null;
  weight: number | null;
  length: number | null;
  width: number | null;
  yearOfPurchase: number | null;
  status: ItemStatus;
  customerName: string | null;
  saleAmount: number | null;
  /** YYYY-MM-DD */
  dateOfSale: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface ItemAttributes {
  serialLabel?: string | null;
  sku: string;
  category: string;
  subcategory?: string | null;
  stone?: string | null;
  color?: string | null;
  finish?: string | null;
  weight?: number | null;
  length?: number | null;
  width?: number | null;
  yearOfPurchase?: number | null;
}

export interface SaleDetails {
  customerName: string;
  saleAmount: number;
  /** YYYY-MM-DD */
  dateOfSale: string;
}

/** A fresh item priced from raw cost inputs. */
export interface NewItemInput extends ItemAttributes {
  pricing: PricingInputs;
}

/** A historical item whose breakdown and sale facts are already known. */
export interface HistoricalItemInput extends ItemAttributes {
  pricing: FullBreakdownInputs;
  status?: ItemStatus;
  customerName?: string | null;
  saleAmount?: number | null;
  dateOfSale?: string | null;
}

/** Row shape handed to the catalog table once dimensions are resolved. */
export interface NewInventoryItemRow {
  serialLabel: string | null;
  sku: string;
  categoryId: number;
  stoneId: number | null;
  colorId: number | null;
  finishId: number | null;
  weight: number | null;
  length: number | null;
  width: number | null;
  yearOfPurchase: number | null;
  status: ItemStatus;
  customerName: string | null;
  saleAmount: number | null;
  dateOfSale: string | null;
  recordedAt: Date;
}
