import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ZodError } from 'zod';

vi.mock('@stockroom/database', async () => {
  const { inMemoryDatabase } = await import('./support/in-memory-database.js');
  return inMemoryDatabase.module;
});

import { inMemoryDatabase } from './support/in-memory-database.js';
import { createItem, importHistoricalItem, markSold, markSoldBySku } from '../src/catalog.js';
import {
  DuplicateSkuError,
  InvalidMarginFormatError,
  InvalidTransitionError,
  ItemNotFoundError,
} from '@stockroom/shared';
import {
  createMockBreakdown,
  createMockItemInput,
  createMockLogger,
  createMockPricingInputs,
  type MockLogger,
} from '@stockroom/shared/testing';

const recordedAt = new Date('2024-01-02T10:00:00Z');
const soldAt = new Date('2024-01-15T16:30:00Z');

let logger: MockLogger;

beforeEach(() => {
  inMemoryDatabase.reset();
  logger = createMockLogger();
});

describe('createItem', () => {
  it('creates an In Stock item and its breakdown', async () => {
    const result = await createItem(createMockItemInput({ sku: 'NK-001' }), { recordedAt, logger });

    expect(result.sku).toBe('NK-001');
    expect(result.breakdown.finalCostPrice).toBe(580);
    expect(result.breakdown.sellingPrice).toBe(812);
    expect(result.breakdown.finalSellingPrice).toBe(852.6);

    const item = inMemoryDatabase.itemBySku('NK-001');
    expect(item).toMatchObject({
      id: result.itemId,
      status: 'In Stock',
      customerName: null,
      saleAmount: null,
      dateOfSale: null,
      createdAt: recordedAt,
    });

    const stored = inMemoryDatabase.breakdownFor(result.itemId);
    expect(stored).toMatchObject({ sku: 'NK-001', finalSellingPrice: 852.6, spMargin: '40%' });
  });

  it('resolves every dimension to a reference id', async () => {
    const { itemId } = await createItem(createMockItemInput({ sku: 'NK-002' }), { recordedAt, logger });

    const item = inMemoryDatabase.itemBySku('NK-002');
    expect(item?.id).toBe(itemId);
    expect(inMemoryDatabase.categoryById(item?.categoryId ?? -1)).toMatchObject({
      name: 'Necklace',
      subcategory: 'Choker',
    });
    expect(item?.stoneId).not.toBeNull();
    expect(item?.colorId).not.toBeNull();
    expect(item?.finishId).not.toBeNull();
  });

  it('reuses existing dimension entities', async () => {
    await createItem(createMockItemInput({ sku: 'NK-003' }), { recordedAt, logger });
    await createItem(createMockItemInput({ sku: 'NK-004' }), { recordedAt, logger });

    const first = inMemoryDatabase.itemBySku('NK-003');
    const second = inMemoryDatabase.itemBySku('NK-004');
    expect(second?.categoryId).toBe(first?.categoryId);
    expect(second?.stoneId).toBe(first?.stoneId);
    expect(inMemoryDatabase.state.categories).toHaveLength(1);
    expect(inMemoryDatabase.state.named.stone).toHaveLength(1);
  });

  it('leaves blank stone, color and finish unset', async () => {
    await createItem(
      createMockItemInput({ sku: 'RG-001', stone: '', color: null, finish: undefined }),
      { recordedAt, logger }
    );

    const item = inMemoryDatabase.itemBySku('RG-001');
    expect(item?.stoneId).toBeNull();
    expect(item?.colorId).toBeNull();
    expect(item?.finishId).toBeNull();
    expect(inMemoryDatabase.state.named).toEqual({ stone: [], color: [], finish: [] });
  });

  it('keeps a null subcategory apart from a named one', async () => {
    await createItem(createMockItemInput({ sku: 'BG-001', category: 'Bangle', subcategory: null }), { recordedAt, logger });
    await createItem(createMockItemInput({ sku: 'BG-002', category: 'Bangle', subcategory: 'Kada' }), { recordedAt, logger });
    await createItem(createMockItemInput({ sku: 'BG-003', category: 'Bangle', subcategory: null }), { recordedAt, logger });

    expect(inMemoryDatabase.state.categories.map((c) => c.subcategory)).toEqual([null, 'Kada']);
    expect(inMemoryDatabase.itemBySku('BG-003')?.categoryId).toBe(
      inMemoryDatabase.itemBySku('BG-001')?.categoryId
    );
  });

  it('keeps null, empty and named subcategories as separate categories', async () => {
    await createItem(createMockItemInput({ sku: 'BG-010', category: 'Bangle', subcategory: null }), { recordedAt, logger });
    await createItem(createMockItemInput({ sku: 'BG-011', category: 'Bangle', subcategory: '' }), { recordedAt, logger });
    await createItem(createMockItemInput({ sku: 'BG-012', category: 'Bangle', subcategory: 'Kada' }), { recordedAt, logger });

    expect(inMemoryDatabase.state.categories.map((c) => c.subcategory)).toEqual([null, '', 'Kada']);
    const categoryIds = ['BG-010', 'BG-011', 'BG-012'].map((sku) => inMemoryDatabase.itemBySku(sku)?.categoryId);
    expect(new Set(categoryIds).size).toBe(3);
  });

  it('rejects a duplicate SKU and leaves the first item untouched', async () => {
    const first = await createItem(createMockItemInput({ sku: 'NK-005' }), { recordedAt, logger });

    await expect(
      createItem(
        createMockItemInput({ sku: 'NK-005', stone: 'Ruby', pricing: createMockPricingInputs({ unitPrice: 9000 }) }),
        { recordedAt, logger }
      )
    ).rejects.toThrow(DuplicateSkuError);

    expect(inMemoryDatabase.state.items).toHaveLength(1);
    expect(inMemoryDatabase.breakdownFor(first.itemId)?.unitPrice).toBe(500);
    expect(inMemoryDatabase.state.named.stone.map((s) => s.name)).toEqual(['Kundan']);
    expect(inMemoryDatabase.transactions).toEqual({ committed: 1, rolledBack: 1 });
  });

  it('rejects a malformed margin before writing anything', async () => {
    await expect(
      createItem(
        createMockItemInput({ sku: 'NK-006', pricing: createMockPricingInputs({ spMargin: 'abc%' }) }),
        { recordedAt, logger }
      )
    ).rejects.toThrow(InvalidMarginFormatError);

    expect(inMemoryDatabase.state.items).toHaveLength(0);
    expect(inMemoryDatabase.state.breakdowns).toHaveLength(0);
    expect(inMemoryDatabase.transactions).toEqual({ committed: 0, rolledBack: 0 });
  });

  it('rolls the item back when the breakdown cannot be stored', async () => {
    const failure = new Error('Connection terminated unexpectedly');
    inMemoryDatabase.breakdownFailure = failure;

    await expect(
      createItem(createMockItemInput({ sku: 'NK-007' }), { recordedAt, logger })
    ).rejects.toBe(failure);

    expect(inMemoryDatabase.itemBySku('NK-007')).toBeUndefined();
    expect(inMemoryDatabase.state.categories).toHaveLength(0);
    expect(logger.hasLog('error', 'Item creation failed')).toBe(true);
  });

  it('rejects a blank SKU', async () => {
    await expect(
      createItem(createMockItemInput({ sku: '   ' }), { recordedAt, logger })
    ).rejects.toThrow(ZodError);
  });

  it('rejects a missing category', async () => {
    await expect(
      createItem(createMockItemInput({ sku: 'NK-008', category: '' }), { recordedAt, logger })
    ).rejects.toThrow(ZodError);
  });

  it('logs the created item with its SKU', async () => {
    await createItem(createMockItemInput({ sku: 'NK-009' }), { recordedAt, logger });

    const [entry] = logger.getLogsByLevel('info');
    expect(entry?.message).toBe('Item created');
    expect(entry?.data).toMatchObject({ sku: 'NK-009', component: 'catalog', finalSellingPrice: 852.6 });
  });

  it('logs a rejected item as a warning with its code', async () => {
    await createItem(createMockItemInput({ sku: 'NK-010' }), { recordedAt, logger });
    await createItem(createMockItemInput({ sku: 'NK-010' }), { recordedAt, logger }).catch(() => undefined);

    const [warning] = logger.getLogsByLevel('warn');
    expect(warning?.message).toBe('Item rejected');
    expect(warning?.data).toMatchObject({ code: 'DUPLICATE_SKU', sku: 'NK-010' });
  });
});

describe('importHistoricalItem', () => {
  it('stores a sold item with its supplied breakdown verbatim', async () => {
    const { itemId, breakdown } = await importHistoricalItem(
      {
        sku: 'ER-001',
        category: 'Earring',
        subcategory: 'Jhumka',
        stone: 'Pearl',
        pricing: createMockBreakdown(),
        status: 'Sold',
        customerName: 'Test Customer',
        saleAmount: 900,
        dateOfSale: '2024-01-15',
      },
      { recordedAt, logger }
    );

    expect(breakdown).toEqual(createMockBreakdown());
    expect(inMemoryDatabase.itemBySku('ER-001')).toMatchObject({
      id: itemId,
      status: 'Sold',
      customerName: 'Test Customer',
      saleAmount: 900,
      dateOfSale: '2024-01-15',
    });
    expect(logger.getLogsByLevel('warn')).toHaveLength(0);
  });

  it('defaults to In Stock', async () => {
    await importHistoricalItem(
      { sku: 'ER-002', category: 'Earring', pricing: createMockBreakdown() },
      { recordedAt, logger }
    );

    expect(inMemoryDatabase.itemBySku('ER-002')?.status).toBe('In Stock');
  });

  it('keeps prices that disagree with the formula but warns about them', async () => {
    const { breakdown } = await importHistoricalItem(
      { sku: 'ER-003', category: 'Earring', pricing: createMockBreakdown({ finalSellingPrice: 999 }) },
      { recordedAt, logger }
    );

    expect(breakdown.finalSellingPrice).toBe(999);
    expect(logger.hasLog('warn', 'Supplied breakdown differs from formula')).toBe(true);
  });

  it('rejects a malformed stored margin', async () => {
    await expect(
      importHistoricalItem(
        { sku: 'ER-004', category: 'Earring', pricing: createMockBreakdown({ spMargin: 'abc%' }) },
        { recordedAt, logger }
      )
    ).rejects.toThrow(InvalidMarginFormatError);
    expect(inMemoryDatabase.state.items).toHaveLength(0);
  });
});

describe('markSold', () => {
  const sale = { customerName: 'Test Customer', saleAmount: 900, dateOfSale: '2024-01-15' };

  it('moves an In Stock item to Sold and records the sale', async () => {
    const { itemId } = await createItem(createMockItemInput({ sku: 'NK-020' }), { recordedAt, logger });

    const sold = await markSold(itemId, sale, { soldAt, logger });

    expect(sold).toMatchObject({
      status: 'Sold',
      customerName: 'Test Customer',
      saleAmount: 900,
      dateOfSale: '2024-01-15',
      updatedAt: soldAt,
    });
  });

  it('refuses to sell an item twice', async () => {
    const { itemId } = await createItem(createMockItemInput({ sku: 'NK-021' }), { recordedAt, logger });
    await markSold(itemId, sale, { soldAt, logger });

    await expect(markSold(itemId, sale, { soldAt, logger })).rejects.toThrow(InvalidTransitionError);
    expect(logger.hasLog('warn', 'Sale rejected')).toBe(true);
  });

  it('reports an unknown item', async () => {
    await expect(markSold(404, sale, { soldAt, logger })).rejects.toThrow(ItemNotFoundError);
  });

  it('validates the sale date', async () => {
    await expect(
      markSold(1, { ...sale, dateOfSale: '15/01/2024' }, { soldAt, logger })
    ).rejects.toThrow(ZodError);
  });

  it('rejects a sale date that is not a real day', async () => {
    const { itemId } = await createItem(createMockItemInput({ sku: 'NK-023' }), { recordedAt, logger });

    await expect(
      markSold(itemId, { ...sale, dateOfSale: '2024-02-30' }, { soldAt, logger })
    ).rejects.toThrow(ZodError);
    expect(inMemoryDatabase.itemBySku('NK-023')?.status).toBe('In Stock');
  });

  it('sells by SKU', async () => {
    await createItem(createMockItemInput({ sku: 'NK-022' }), { recordedAt, logger });

    const sold = await markSoldBySku('NK-022', sale, { soldAt, logger });

    expect(sold.sku).toBe('NK-022');
    expect(inMemoryDatabase.itemBySku('NK-022')?.status).toBe('Sold');
  });

  it('reports an unknown SKU', async () => {
    await expect(markSoldBySku('NOPE-1', sale, { soldAt, logger })).rejects.toThrow(
      new ItemNotFoundError('NOPE-1')
    );
  });
});
