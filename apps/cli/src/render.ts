import {
  formatMoney,
  roundMoney,
  type InventoryOverviewRow,
  type SalesReportRow,
  type StockStatusRow,
} from '@stockroom/shared';

function money(value: number | null): string {
  return value === null ? '-' : formatMoney(value);
}

function categoryLabel(name: string | null, subcategory: string | null): string {
  if (name === null) return '-';
  return subcategory === null ? name : `${name} / ${subcategory}`;
}

/**
 * Left-aligned columns two spaces apart, with a dashed rule under the header.
 */
export function renderTable(headers: string[], rows: string[][]): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? '').length))
  );

  const line = (cells: string[]) =>
    widths.map((width, column) => (cells[column] ?? '').padEnd(width)).join('  ').trimEnd();

  return [
    line(headers),
    widths.map((width) => '-'.repeat(width)).join('  '),
    ...rows.map(line),
  ];
}

export function renderOverview(rows: InventoryOverviewRow[]): string[] {
  return renderTable(
    ['SKU', 'Category', 'Stone', 'Status', 'Final cost', 'Final SP'],
    rows.map((row) => [
      row.sku,
      categoryLabel(row.categoryName, row.subcategoryName),
      row.stoneName ?? '-',
      row.status,
      money(row.finalCostPrice),
      money(row.finalSellingPrice),
    ])
  );
}

export function renderStockSummary(rows: StockStatusRow[]): string[] {
  return renderTable(
    ['Category', 'Items', 'In stock', 'Sold', 'Cost', 'Expected', 'Actual', 'Avg margin %'],
    rows.map((row) => [
      categoryLabel(row.categoryName, row.subcategoryName),
      String(row.totalItems),
      String(row.inStock),
      String(row.sold),
      formatMoney(row.totalInventoryCost),
      formatMoney(row.totalExpectedValue),
      formatMoney(row.totalActualValue),
      money(row.avgMarginPercent),
    ])
  );
}

function total(values: Array<number | null>): number {
  return roundMoney(values.reduce<number>((sum, value) => sum + (value ?? 0), 0));
}

export function renderSalesReport(rows: SalesReportRow[]): string[] {
  const table = renderTable(
    ['Date', 'SKU', 'Customer', 'Sale', 'Final cost', 'Actual profit', 'Expected profit'],
    rows.map((row) => [
      row.dateOfSale,
      row.sku,
      row.customerName ?? '-',
      money(row.saleAmount),
      money(row.finalCostPrice),
      money(row.actualProfit),
      money(row.expectedProfit),
    ])
  );

  return [
    ...table,
    '',
    `Sales: ${rows.length}  Revenue: ${formatMoney(total(rows.map((row) => row.saleAmount)))}  ` +
      `Actual profit: ${formatMoney(total(rows.map((row) => row.actualProfit)))}`,
  ];
}
