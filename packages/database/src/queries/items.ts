import {
  DuplicateSkuError,
  InvalidTransitionError,
  ItemNotFoundError,
  ITEM_STATUS_IN_STOCK,
  ITEM_STATUS_SOLD,
  parseNumeric,
  type InventoryItem,
  type NewInventoryItemRow,
  type SaleDetails,
} from '@stockroom/shared';
import { defaultDb, isUniqueViolation, type Queryable } from '../client.js';

interface InventoryItemRow {
  id: number;
  serial_label: string | null;
  sku: string;
  category_id: number;
  stone_id: number | null;
  color_id: number | null;
  finish_id: number | null;
  weight: string | null;
  length: string | null;
  width: string | null;
  year_of_purchase: number | null;
  status: string;
  customer_name: string | null;
  sale_amount: string | null;
  date_of_sale: string | null;
  created_at: Date;
  updated_at: Date;
}

// DATE comes back as text so no timezone shift can move a sale across days
const ITEM_COLUMNS = `id, serial_label, sku, category_id, stone_id, color_id, finish_id,
  weight, length, width, year_of_purchase, status, customer_name, sale_amount,
  to_char(date_of_sale, 'YYYY-MM-DD') AS date_of_sale, created_at, updated_at`;

function mapRowToItem(row: InventoryItemRow): InventoryItem {
  return {
    id: row.id,
    serialLabel: row.serial_label,
    sku: row.sku,
    categoryId: row.category_id,
    stoneId: row.stone_id,
    colorId: row.color_id,
    finishId: row.finish_id,
    weight: parseNumeric(row.weight),
    length: parseNumeric(row.length),
    width: parseNumeric(row.width),
    yearOfPurchase: row.year_of_purchase,
    status: row.status,
    customerName: row.customer_name,
    saleAmount: parseNumeric(row.sale_amount),
    dateOfSale: row.date_of_sale,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * Insert one catalog row. A clash on the SKU constraint becomes
 * DuplicateSkuError; every other datastore failure propagates unchanged.
 */
export async function insertItem(
  item: NewInventoryItemRow,
  db: Queryable = defaultDb
): Promise<number> {
  try {
    const result = await db.query<{ id: number }>(
      `INSERT INTO inventory_items (
        serial_label, sku, category_id, stone_id, color_id, finish_id,
        weight, length, width, year_of_purchase,
        status, customer_name, sale_amount, date_of_sale,
        created_at, updated_at
      ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $15)
      RETURNING id`,
      [
        item.serialLabel,
        item.sku,
        item.categoryId,
        item.stoneId,
        item.colorId,
        item.finishId,
        item.weight,
        item.length,
        item.width,
        item.yearOfPurchase,
        item.status,
        item.customerName,
        item.saleAmount,
        item.dateOfSale,
        item.recordedAt,
      ]
    );

    const row = result.rows[0];
    if (!row) {
      throw new Error(`Insert of item '${item.sku}' returned no id`);
    }
    return row.id;
  } catch (error) {
    if (isUniqueViolation(error, 'inventory_items_sku_key')) {
      throw new DuplicateSkuError(item.sku);
    }
    throw error;
  }
}

export async function getItemById(
  id: number,
  db: Queryable = defaultDb
): Promise<InventoryItem | null> {
  const result = await db.query<InventoryItemRow>(
    `SELECT ${ITEM_COLUMNS} FROM inventory_items WHERE id = $1`,
    [id]
  );
  const row = result.rows[0];
  return row ? mapRowToItem(row) : null;
}

export async function getItemBySku(
  sku: string,
  db: Queryable = defaultDb
): Promise<InventoryItem | null> {
  const result = await db.query<InventoryItemRow>(
    `SELECT ${ITEM_COLUMNS} FROM inventory_items WHERE sku = $1`,
    [sku]
  );
  const row = result.rows[0];
  return row ? mapRowToItem(row) : null;
}

/**
 * Move an item from In Stock to Sold and record the sale.
 * The status check and the update are one conditional statement, so two
 * concurrent sales of the same piece cannot both succeed.
 */
export async function markItemSold(
  id: number,
  sale: SaleDetails,
  updatedAt: Date,
  db: Queryable = defaultDb
): Promise<InventoryItem> {
  const result = await db.query<InventoryItemRow>(
    `UPDATE inventory_items
     SET status = $2, customer_name = $3, sale_amount = $4, date_of_sale = $5, updated_at = $6
     WHERE id = $1 AND status = $7
     RETURNING ${ITEM_COLUMNS}`,
    [id, ITEM_STATUS_SOLD, sale.customerName, sale.saleAmount, sale.dateOfSale, updatedAt, ITEM_STATUS_IN_STOCK]
  );

  const updated = result.rows[0];
  if (updated) {
    return mapRowToItem(updated);
  }

  const current = await getItemById(id, db);
  if (!current) {
    throw new ItemNotFoundError(id);
  }
  throw new InvalidTransitionError(id, current.status, ITEM_STATUS_SOLD);
}
