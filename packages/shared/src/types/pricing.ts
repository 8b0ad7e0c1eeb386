/**
 * Raw cost inputs for the calculator. Absent amounts count as zero.
 */
export interface PricingInputs {
  unitPrice?: number | null;
  threadWork?: number | null;
  /** Flat currency amount, not a rate */
  gstOnCost?: number | null;
  packagingCost?: number | null;
  /** Percent string such as "40%" */
  spMargin?: string | null;
  /** Percent as a number, 5 meaning 5% */
  taxesPercent?: number | null;
}

/** Inputs of a record that already carries its full breakdown. */
export interface FullBreakdownInputs extends PricingInputs {
  costPrice?: number | null;
  finalCostPrice?: number | null;
  sellingPrice?: number | null;
  finalSellingPrice?: number | null;
}

export interface PricingBreakdown {
  unitPrice: number | null;
  threadWork: number | null;
  gstOnCost: number | null;
  packagingCost: number | null;
  spMargin: string | null;
  taxesPercent: number | null;
  costPrice: number | null;
  finalCostPrice: number | null;
  sellingPrice: number | null;
  finalSellingPrice: number | null;
}

export interface StoredPricingBreakdown extends PricingBreakdown {
  id: number;
  inventoryItemId: number;
  sku: string;
  createdAt: Date;
}
