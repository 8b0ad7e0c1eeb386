import {
  ItemNotFoundError,
  SkuMismatchError,
  parseNumeric,
  type PricingBreakdown,
  type StoredPricingBreakdown,
} from '@stockroom/shared';
import { defaultDb, type Queryable } from '../client.js';

interface PricingRow {
  id: number;
  inventory_item_id: number;
  sku: string;
  unit_price: string | null;
  cost_price: string | null;
  thread_work: string | null;
  gst_on_cost: string | null;
  packaging_cost: string | null;
  final_cost_price: string | null;
  sp_margin: string | null;
  taxes_percent: string | null;
  selling_price: string | null;
  final_selling_price: string | null;
  created_at: Date;
}

function mapRowToBreakdown(row: PricingRow): StoredPricingBreakdown {
  return {
    id: row.id,
    inventoryItemId: row.inventory_item_id,
    sku: row.sku,
    unitPrice: parseNumeric(row.unit_price),
    costPrice: parseNumeric(row.cost_price),
    threadWork: parseNumeric(row.thread_work),
    gstOnCost: parseNumeric(row.gst_on_cost),
    packagingCost: parseNumeric(row.packaging_cost),
    finalCostPrice: parseNumeric(row.final_cost_price),
    spMargin: row.sp_margin,
    taxesPercent: parseNumeric(row.taxes_percent),
    sellingPrice: parseNumeric(row.selling_price),
    finalSellingPrice: parseNumeric(row.final_selling_price),
    createdAt: row.created_at,
  };
}

/**
 * Store the breakdown of a just-created item. The row references the item by
 * id and by SKU, so the caller's SKU must match the item's own.
 * A second breakdown for the same item fails on pricing_inventory_item_key.
 */
export async function recordBreakdown(
  itemId: number,
  sku: string,
  breakdown: PricingBreakdown,
  recordedAt: Date,
  db: Queryable = defaultDb
): Promise<number> {
  const item = await db.query<{ sku: string }>(
    `SELECT sku FROM inventory_items WHERE id = $1`,
    [itemId]
  );

  const owner = item.rows[0];
  if (!owner) {
    throw new ItemNotFoundError(itemId);
  }
  if (owner.sku !== sku) {
    throw new SkuMismatchError(itemId, owner.sku, sku);
  }

  const result = await db.query<{ id: number }>(
    `INSERT INTO pricing (
      inventory_item_id, sku, unit_price, cost_price, thread_work, gst_on_cost,
      packaging_cost, final_cost_price, sp_margin, taxes_percent,
      selling_price, final_selling_price, created_at
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13)
    RETURNING id`,
    [
      itemId,
      sku,
      breakdown.unitPrice,
      breakdown.costPrice,
      breakdown.threadWork,
      breakdown.gstOnCost,
      breakdown.packagingCost,
      breakdown.finalCostPrice,
      breakdown.spMargin,
      breakdown.taxesPercent,
      breakdown.sellingPrice,
      breakdown.finalSellingPrice,
      recordedAt,
    ]
  );

  const row = result.rows[0];
  if (!row) {
    throw new Error(`Insert of breakdown for item ${itemId} returned no id`);
  }
  return row.id;
}

export async function getBreakdownByItemId(
  itemId: number,
  db: Queryable = defaultDb
): Promise<StoredPricingBreakdown | null> {
  const result = await db.query<PricingRow>(
    `SELECT * FROM pricing WHERE inventory_item_id = $1`,
    [itemId]
  );
  const row = result.rows[0];
  return row ? mapRowToBreakdown(row) : null;
}
