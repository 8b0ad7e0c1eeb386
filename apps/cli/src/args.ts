import type { SaleDetails } from '@stockroom/shared';

export type CliCommand =
  | { name: 'init-db' }
  | { name: 'overview'; status?: string }
  | { name: 'stock-summary' }
  | { name: 'sales'; startDate: string; endDate: string }
  | { name: 'sell'; sku: string; sale: SaleDetails }
  | { name: 'search'; keyword: string; maxPrice?: number }
  | { name: 'import'; file: string };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

function requireArg(args: string[], index: number, label: string): string {
  const value = args[index]?.trim();
  if (!value) {
    throw new UsageError(`Missing argument: ${label}`);
  }
  return value;
}

function parseAmount(value: string, label: string): number {
  const amount = Number(value);
  if (!Number.isFinite(amount)) {
    throw new UsageError(`${label} must be a number, got '${value}'`);
  }
  return amount;
}

/**
 * Turn `process.argv.slice(2)` into a command. Dates and amounts are only
 * checked for shape here; the core validates them again.
 */
export function parseCommand(args: string[]): CliCommand {
  const [name] = args;

  switch (name) {
    case 'init-db':
      return { name: 'init-db' };
    case 'overview': {
      const status = args[1]?.trim();
      return status ? { name: 'overview', status } : { name: 'overview' };
    }
    case 'stock-summary':
      return { name: 'stock-summary' };
    case 'sales':
      return {
        name: 'sales',
        startDate: requireArg(args, 1, 'start date'),
        endDate: requireArg(args, 2, 'end date'),
      };
    case 'sell':
      return {
        name: 'sell',
        sku: requireArg(args, 1, 'sku').toUpperCase(),
        sale: {
          customerName: requireArg(args, 2, 'customer'),
          saleAmount: parseAmount(requireArg(args, 3, 'amount'), 'amount'),
          dateOfSale: requireArg(args, 4, 'date'),
        },
      };
    case 'search': {
      const keyword = requireArg(args, 1, 'keyword');
      const maxPrice = args[2];
      return maxPrice === undefined
        ? { name: 'search', keyword }
        : { name: 'search', keyword, maxPrice: parseAmount(maxPrice, 'maxPrice') };
    }
    case 'import':
      return { name: 'import', file: requireArg(args, 1, 'file') };
    case undefined:
      throw new UsageError('No command given');
    default:
      throw new UsageError(`Unknown command: ${name}`);
  }
}
