// Only load dotenv outside production - deployed runs use real env vars
if (process.env.NODE_ENV !== 'production') {
  const { config } = await import('dotenv');
  const { fileURLToPath } = await import('node:url');
  const { dirname, resolve } = await import('node:path');

  const __dirname = dirname(fileURLToPath(import.meta.url));
  const rootDir = resolve(__dirname, '../../..');

  config({ path: resolve(rootDir, '.env.local') });
  config({ path: resolve(rootDir, '.env') });
}

import { readFile } from 'node:fs/promises';
import { z, ZodError } from 'zod';
import { createLogger, isInventoryError } from '@stockroom/shared';
import {
  applySchema,
  closePool,
  findInStockProducts,
  getInventoryOverview,
  getSalesReport,
  getStockStatusSummary,
} from '@stockroom/database';
import { importRecords, markSoldBySku } from '@stockroom/catalog';
import { parseCommand, UsageError, type CliCommand } from './args.js';
import { renderOverview, renderSalesReport, renderStockSummary } from './render.js';

const logger = createLogger({ service: 'cli' });

const importFileSchema = z.array(
  z.record(z.union([z.string(), z.number(), z.null()]))
);

function printUsage(): void {
  console.log(`
Stockroom CLI

Usage:
  npm run cli -- <command> [arguments]

Commands:
  init-db                                 Create tables, indexes and the overview view
  overview [status]                       List every item, optionally of one status
  stock-summary                           Counts and values per category
  sales <start> <end>                     Sales between two YYYY-MM-DD dates
  sell <sku> <customer> <amount> <date>   Record the sale of an In Stock item
  search <keyword> [maxPrice]             Cheapest In Stock items in matching categories
  import <file.json>                      Import stock-sheet rows from a JSON array

Examples:
  npm run cli -- sales 2024-01-01 2024-01-31
  npm run cli -- sell NK-0042 "A Customer" 900 2024-01-15
  npm run cli -- search necklace 1000
`);
}

function print(lines: string[]): void {
  console.log(lines.join('\n'));
}

async function run(command: CliCommand): Promise<void> {
  const log = logger.child({ component: command.name });

  switch (command.name) {
    case 'init-db':
      await applySchema();
      log.info('Schema applied');
      break;
    case 'overview':
      print(renderOverview(await getInventoryOverview(command.status ? { status: command.status } : {})));
      break;
    case 'stock-summary':
      print(renderStockSummary(await getStockStatusSummary()));
      break;
    case 'sales':
      print(renderSalesReport(await getSalesReport(command.startDate, command.endDate)));
      break;
    case 'sell': {
      const item = await markSoldBySku(command.sku, command.sale, { soldAt: new Date(), logger: log });
      console.log(`${item.sku} sold to ${command.sale.customerName} on ${command.sale.dateOfSale}`);
      break;
    }
    case 'search':
      print(renderOverview(await findInStockProducts({
        categoryKeyword: command.keyword,
        maxPrice: command.maxPrice,
      })));
      break;
    case 'import': {
      const records = importFileSchema.parse(JSON.parse(await readFile(command.file, 'utf8')));
      const summary = await importRecords(records, { recordedAt: new Date(), logger: log });

      console.log(`Imported ${summary.imported}, skipped ${summary.skipped}, failed ${summary.failed.length}`);
      for (const failure of summary.failed) {
        console.log(`  row ${failure.index + 1} (${failure.sku ?? 'no SKU'}): ${failure.code} ${failure.message}`);
      }
      if (summary.failed.length > 0) {
        process.exitCode = 1;
      }
      break;
    }
  }
}

async function main(): Promise<void> {
  let command: CliCommand;
  try {
    command = parseCommand(process.argv.slice(2));
  } catch (error) {
    if (!(error instanceof UsageError)) throw error;
    console.error(error.message);
    printUsage();
    process.exitCode = 1;
    return;
  }

  try {
    await run(command);
  } catch (error) {
    if (isInventoryError(error)) {
      logger.warn('Command rejected', { command: command.name, code: error.code, message: error.message });
    } else if (error instanceof ZodError) {
      logger.warn('Invalid input', { command: command.name, issues: error.issues });
    } else {
      logger.error('Command failed', error, { command: command.name });
    }
    process.exitCode = 1;
  } finally {
    await closePool();
  }
}

main().catch((error: unknown) => {
  logger.fatal('Unexpected failure', error);
  process.exitCode = 1;
});
