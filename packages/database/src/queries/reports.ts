import { z } from 'zod';
import {
  DEFAULT_SEARCH_LIMIT,
  isCalendarDate,
  ITEM_STATUS_IN_STOCK,
  ITEM_STATUS_SOLD,
  MAX_SEARCH_LIMIT,
  parseNumeric,
  roundMoney,
  type InStockSearch,
  type InventoryOverviewRow,
  type OverviewFilter,
  type SalesReportRow,
  type StockStatusRow,
} from '@stockroom/shared';
import { defaultDb, type Queryable } from '../client.js';

// ============================================================================
// Row shapes
// ============================================================================

interface OverviewRow {
  id: number;
  serial_label: string | null;
  sku: string;
  category_name: string | null;
  subcategory_name: string | null;
  weight: string | null;
  length: string | null;
  width: string | null;
  stone_name: string | null;
  color_name: string | null;
  finish_name: string | null;
  year_of_purchase: number | null;
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
  status: string;
  customer_name: string | null;
  sale_amount: string | null;
  date_of_sale: string | null;
}

interface StockStatusQueryRow {
  category_name: string;
  subcategory_name: string | null;
  total_items: number;
  in_stock: number;
  sold: number;
  total_inventory_cost: string;
  total_expected_value: string;
  total_actual_value: string;
  avg_margin_percent: string | null;
  avg_taxes_percent: string | null;
}

interface SalesQueryRow {
  sku: string;
  category_name: string;
  subcategory_name: string | null;
  customer_name: string | null;
  sale_amount: string | null;
  date_of_sale: string;
  final_cost_price: string | null;
  sp_margin: string | null;
  taxes_percent: string | null;
  selling_price: string | null;
  final_selling_price: string | null;
}

function mapOverviewRow(row: OverviewRow): InventoryOverviewRow {
  return {
    id: row.id,
    serialLabel: row.serial_label,
    sku: row.sku,
    categoryName: row.category_name,
    subcategoryName: row.subcategory_name,
    weight: parseNumeric(row.weight),
    length: parseNumeric(row.length),
    width: parseNumeric(row.width),
    stoneName: row.stone_name,
    colorName: row.color_name,
    finishName: row.finish_name,
    yearOfPurchase: row.year_of_purchase,
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
    status: row.status,
    customerName: row.customer_name,
    saleAmount: parseNumeric(row.sale_amount),
    dateOfSale: row.date_of_sale,
  };
}

function difference(minuend: number | null, subtrahend: number | null): number | null {
  if (minuend === null || subtrahend === null) return null;
  return roundMoney(minuend - subtrahend);
}

// ============================================================================
// Overview
// ============================================================================

/**
 * One row per item. Every join is a LEFT JOIN, so an item missing a
 * dimension or a breakdown still shows up with nulls.
 */
export async function getInventoryOverview(
  filter: OverviewFilter = {},
  db: Queryable = defaultDb
): Promise<InventoryOverviewRow[]> {
  const conditions: string[] = [];
  const values: unknown[] = [];
  let paramIndex = 1;

  if (filter.status !== undefined) {
    conditions.push(`status = $${paramIndex++}`);
    values.push(filter.status);
  }
  if (filter.skus !== undefined) {
    conditions.push(`sku = ANY($${paramIndex++})`);
    values.push(filter.skus);
  }

  const whereClause = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';

  const result = await db.query<OverviewRow>(
    `SELECT * FROM inventory_overview ${whereClause} ORDER BY id ASC`,
    values
  );
  return result.rows.map(mapOverviewRow);
}

const inStockSearchSchema = z.object({
  skus: z.array(z.string().min(1)).optional(),
  categoryKeyword: z.string().trim().min(1).optional(),
  maxPrice: z.number().nonnegative().optional(),
  limit: z.number().int().positive().max(MAX_SEARCH_LIMIT).default(DEFAULT_SEARCH_LIMIT),
});

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (ch) => `\\${ch}`);
}

/**
 * In Stock products narrowed by SKU list, category keyword and price
 * ceiling, cheapest first.
 */
export async function findInStockProducts(
  search: InStockSearch,
  db: Queryable = defaultDb
): Promise<InventoryOverviewRow[]> {
  const params = inStockSearchSchema.parse(search);

  const conditions: string[] = ['status = $1'];
  const values: unknown[] = [ITEM_STATUS_IN_STOCK];
  let paramIndex = 2;

  if (params.skus !== undefined) {
    conditions.push(`sku = ANY($${paramIndex++})`);
    values.push(params.skus);
  }
  if (params.categoryKeyword !== undefined) {
    const placeholder = `$${paramIndex++}`;
    conditions.push(`(category_name ILIKE ${placeholder} OR subcategory_name ILIKE ${placeholder})`);
    values.push(`%${escapeLike(params.categoryKeyword)}%`);
  }
  if (params.maxPrice !== undefined) {
    conditions.push(`final_selling_price <= $${paramIndex++}`);
    values.push(params.maxPrice);
  }

  values.push(params.limit);

  const result = await db.query<OverviewRow>(
    `SELECT * FROM inventory_overview
     WHERE ${conditions.join(' AND ')}
     ORDER BY final_selling_price ASC NULLS LAST, id ASC
     LIMIT $${paramIndex}`,
    values
  );
  return result.rows.map(mapOverviewRow);
}

// ============================================================================
// Stock status
// ============================================================================

/**
 * Per (category, subcategory) counts and value totals. Inner-joins pricing,
 * so items without a breakdown are left out.
 */
export async function getStockStatusSummary(
  db: Queryable = defaultDb
): Promise<StockStatusRow[]> {
  const result = await db.query<StockStatusQueryRow>(
    `SELECT
       c.category_name,
       c.subcategory_name,
       COUNT(*)::int AS total_items,
       (COUNT(*) FILTER (WHERE i.status = $1))::int AS in_stock,
       (COUNT(*) FILTER (WHERE i.status = $2))::int AS sold,
       COALESCE(SUM(p.final_cost_price), 0) AS total_inventory_cost,
       COALESCE(SUM(p.final_selling_price), 0) AS total_expected_value,
       COALESCE(SUM(CASE WHEN i.status = $2 THEN COALESCE(i.sale_amount, p.final_selling_price) ELSE p.final_selling_price END), 0) AS total_actual_value,
       ROUND(AVG(CAST(NULLIF(TRIM(regexp_replace(TRIM(p.sp_margin), '%$', '')), '') AS NUMERIC)), 2) AS avg_margin_percent,
       ROUND(AVG(p.taxes_percent), 2) AS avg_taxes_percent
     FROM inventory_items i
     JOIN categories c ON i.category_id = c.id
     JOIN pricing p ON i.id = p.inventory_item_id
     GROUP BY c.category_name, c.subcategory_name
     ORDER BY c.category_name ASC, c.subcategory_name ASC NULLS FIRST`,
    [ITEM_STATUS_IN_STOCK, ITEM_STATUS_SOLD]
  );

  return result.rows.map((row) => ({
    categoryName: row.category_name,
    subcategoryName: row.subcategory_name,
    totalItems: row.total_items,
    inStock: row.in_stock,
    sold: row.sold,
    totalInventoryCost: parseNumeric(row.total_inventory_cost) ?? 0,
    totalExpectedValue: parseNumeric(row.total_expected_value) ?? 0,
    totalActualValue: parseNumeric(row.total_actual_value) ?? 0,
    avgMarginPercent: parseNumeric(row.avg_margin_percent),
    avgTaxesPercent: parseNumeric(row.avg_taxes_percent),
  }));
}

// ============================================================================
// Sales
// ============================================================================

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a YYYY-MM-DD date')
  .refine(isCalendarDate, 'Not a calendar date');

export const salesReportRangeSchema = z
  .object({ startDate: isoDate, endDate: isoDate })
  .refine((range) => range.startDate <= range.endDate, {
    message: 'startDate must not be after endDate',
    path: ['startDate'],
  });

/**
 * Sold items with a sale date in [startDate, endDate], oldest sale first.
 */
export async function getSalesReport(
  startDate: string,
  endDate: string,
  db: Queryable = defaultDb
): Promise<SalesReportRow[]> {
  const range = salesReportRangeSchema.parse({ startDate, endDate });

  const result = await db.query<SalesQueryRow>(
    `SELECT
       i.sku,
       c.category_name,
       c.subcategory_name,
       i.customer_name,
       i.sale_amount,
       to_char(i.date_of_sale, 'YYYY-MM-DD') AS date_of_sale,
       p.final_cost_price,
       p.sp_margin,
       p.taxes_percent,
       p.selling_price,
       p.final_selling_price
     FROM inventory_items i
     JOIN categories c ON i.category_id = c.id
     JOIN pricing p ON i.id = p.inventory_item_id
     WHERE i.status = $1
       AND i.date_of_sale BETWEEN $2 AND $3
     ORDER BY i.date_of_sale ASC, i.id ASC`,
    [ITEM_STATUS_SOLD, range.startDate, range.endDate]
  );

  return result.rows.map((row) => {
    const saleAmount = parseNumeric(row.sale_amount);
    const finalCostPrice = parseNumeric(row.final_cost_price);
    const sellingPrice = parseNumeric(row.selling_price);
    const finalSellingPrice = parseNumeric(row.final_selling_price);

    return {
      sku: row.sku,
      categoryName: row.category_name,
      subcategoryName: row.subcategory_name,
      customerName: row.customer_name,
      saleAmount,
      dateOfSale: row.date_of_sale,
      finalCostPrice,
      spMargin: row.sp_margin,
      taxesPercent: parseNumeric(row.taxes_percent),
      sellingPrice,
      finalSellingPrice,
      actualProfit: difference(saleAmount, finalCostPrice),
      expectedProfit: difference(finalSellingPrice, finalCostPrice),
      expectedPreTaxProfit: difference(sellingPrice, finalCostPrice),
    };
  });
}
