import {
  ITEM_STATUS_IN_STOCK,
  ItemNotFoundError,
  createLogger,
  isInventoryError,
  type HistoricalItemInput,
  type InventoryItem,
  type ItemStatus,
  type Logger,
  type NewItemInput,
  type PricingBreakdown,
  type SaleDetails,
} from '@stockroom/shared';
import {
  getItemBySku,
  insertItem,
  markItemSold,
  recordBreakdown,
  resolveCategory,
  resolveDimension,
  transaction,
} from '@stockroom/database';
import {
  computeFromFullBreakdown,
  computePricing,
  findBreakdownDrift,
} from '@stockroom/pricing-engine';
import {
  historicalItemSchema,
  newItemSchema,
  saleDetailsSchema,
  type ValidatedItemAttributes,
} from './validators.js';

let defaultLogger: Logger | null = null;

function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ service: 'catalog' });
  }
  return defaultLogger;
}

export interface CatalogOptions {
  logger?: Logger;
}

export interface CreateItemOptions extends CatalogOptions {
  /** Creation timestamp written to the item and its breakdown */
  recordedAt: Date;
}

export interface MarkSoldOptions extends CatalogOptions {
  /** Timestamp of the status change */
  soldAt: Date;
}

export interface CreatedItem {
  itemId: number;
  sku: string;
  breakdown: PricingBreakdown;
}

interface SaleColumns {
  status: ItemStatus;
  customerName: string | null;
  saleAmount: number | null;
  dateOfSale: string | null;
}

const IN_STOCK: SaleColumns = {
  status: ITEM_STATUS_IN_STOCK,
  customerName: null,
  saleAmount: null,
  dateOfSale: null,
};

/**
 * Resolve dimensions, insert the item and record its breakdown in one
 * transaction. Nothing is left behind if any step throws.
 */
async function insertWithBreakdown(
  attrs: ValidatedItemAttributes,
  sale: SaleColumns,
  breakdown: PricingBreakdown,
  recordedAt: Date,
  log: Logger
): Promise<CreatedItem> {
  try {
    const itemId = await transaction(async (db) => {
      const categoryId = await resolveCategory(attrs.category, attrs.subcategory ?? null, db);
      const stoneId = await resolveDimension('stone', attrs.stone, db);
      const colorId = await resolveDimension('color', attrs.color, db);
      const finishId = await resolveDimension('finish', attrs.finish, db);

      const id = await insertItem(
        {
          serialLabel: attrs.serialLabel ?? null,
          sku: attrs.sku,
          categoryId,
          stoneId,
          colorId,
          finishId,
          weight: attrs.weight ?? null,
          length: attrs.length ?? null,
          width: attrs.width ?? null,
          yearOfPurchase: attrs.yearOfPurchase ?? null,
          ...sale,
          recordedAt,
        },
        db
      );

      await recordBreakdown(id, attrs.sku, breakdown, recordedAt, db);
      return id;
    });

    log.info('Item created', { itemId, status: sale.status, finalSellingPrice: breakdown.finalSellingPrice });
    return { itemId, sku: attrs.sku, breakdown };
  } catch (error) {
    if (isInventoryError(error)) {
      log.warn('Item rejected', { code: error.code, message: error.message });
    } else {
      log.error('Item creation failed', error);
    }
    throw error;
  }
}

/**
 * Create a fresh In Stock item priced from raw cost inputs.
 *
 * The breakdown is computed before anything is written, so a malformed
 * margin aborts with no rows touched.
 */
export async function createItem(
  input: NewItemInput,
  options: CreateItemOptions
): Promise<CreatedItem> {
  const { pricing, ...attrs } = newItemSchema.parse(input);
  const log = (options.logger ?? getDefaultLogger()).child({ component: 'catalog', sku: attrs.sku });

  const breakdown = computePricing(pricing);
  return insertWithBreakdown(attrs, IN_STOCK, breakdown, options.recordedAt, log);
}

/**
 * Create an item whose breakdown (and possibly sale) is already known,
 * storing the supplied prices verbatim. Prices that disagree with the
 * formula are logged but kept.
 */
export async function importHistoricalItem(
  input: HistoricalItemInput,
  options: CreateItemOptions
): Promise<CreatedItem> {
  const { pricing, status, customerName, saleAmount, dateOfSale, ...attrs } = historicalItemSchema.parse(input);
  const log = (options.logger ?? getDefaultLogger()).child({ component: 'catalog', sku: attrs.sku });

  const breakdown = computeFromFullBreakdown(pricing);
  const drift = findBreakdownDrift(breakdown);
  if (drift.length > 0) {
    log.warn('Supplied breakdown differs from formula', { drift });
  }

  const sale: SaleColumns = {
    status: status ?? ITEM_STATUS_IN_STOCK,
    customerName: customerName ?? null,
    saleAmount: saleAmount ?? null,
    dateOfSale: dateOfSale ?? null,
  };

  return insertWithBreakdown(attrs, sale, breakdown, options.recordedAt, log);
}

/**
 * Record the sale of an In Stock item.
 * Throws ItemNotFoundError for an unknown id and InvalidTransitionError
 * when the item is not In Stock.
 */
export async function markSold(
  itemId: number,
  sale: SaleDetails,
  options: MarkSoldOptions
): Promise<InventoryItem> {
  const details = saleDetailsSchema.parse(sale);
  const log = (options.logger ?? getDefaultLogger()).child({ component: 'catalog', itemId: String(itemId) });

  try {
    const item = await markItemSold(itemId, details, options.soldAt);
    log.info('Item sold', { sku: item.sku, saleAmount: details.saleAmount, dateOfSale: details.dateOfSale });
    return item;
  } catch (error) {
    if (isInventoryError(error)) {
      log.warn('Sale rejected', { code: error.code, message: error.message });
    } else {
      log.error('Sale failed', error);
    }
    throw error;
  }
}

export async function markSoldBySku(
  sku: string,
  sale: SaleDetails,
  options: MarkSoldOptions
): Promise<InventoryItem> {
  const item = await getItemBySku(sku);
  if (!item) {
    throw new ItemNotFoundError(sku);
  }
  return markSold(item.id, sale, options);
}
