import type { ItemStatus } from './inventory.js';

export interface InventoryOverviewRow {
  id: number;
  serialLabel: string | null;
  sku: string;
  categoryName: string | null;
  subcategoryName: string | null;
  weight: number | null;
  length: number | null;
  width: number | null;
  stoneName: string | null;
  colorName: string | null;
  finishName: string | null;
  yearOfPurchase: number | null;
  unitPrice: number | null;
  costPrice: number | null;
  threadWork: number | null;
  gstOnCost: number | null;
  packagingCost: number | null;
  finalCostPrice: number | null;
  spMargin: string | null;
  taxesPercent: number | null;
  sellingPrice: number | null;
  finalSellingPrice: number | null;
  status: ItemStatus;
  customerName: string | null;
  saleAmount: number | null;
  dateOfSale: string | null;
}

export interface OverviewFilter {
  status?: ItemStatus;
  skus?: string[];
}

export interface InStockSearch {
  skus?: string[];
  /** Matched case-insensitively against category and subcategory names */
  categoryKeyword?: string;
  /** Upper bound on final selling price, inclusive */
  maxPrice?: number;
  limit?: number;
}

export interface StockStatusRow {
  categoryName: string;
  subcategoryName: string | null;
  totalItems: number;
  inStock: number;
  sold: number;
  totalInventoryCost: number;
  totalExpectedValue: number;
  /** Sale amount where sold and known, final selling price otherwise */
  totalActualValue: number;
  avgMarginPercent: number | null;
  avgTaxesPercent: number | null;
}

export interface SalesReportRow {
  sku: string;
  categoryName: string;
  subcategoryName: string | null;
  customerName: string | null;
  saleAmount: number | null;
  dateOfSale: string;
  finalCostPrice: number | null;
  spMargin: string | null;
  taxesPercent: number | null;
  sellingPrice: number | null;
  finalSellingPrice: number | null;
  /** saleAmount - finalCostPrice */
  actualProfit: number | null;
  /** finalSellingPrice - finalCostPrice */
  expectedProfit: number | null;
  /** sellingPrice - finalCostPrice, before taxes */
  expectedPreTaxProfit: number | null;
}
