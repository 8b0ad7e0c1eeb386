import {
  DimensionResolutionConflictError,
  type Category,
  type DimensionKind,
  type DimensionRef,
  type NamedDimension,
  type NamedDimensionKind,
} from '@stockroom/shared';
import { defaultDb, type Queryable } from '../client.js';

interface DimensionTable {
  table: string;
  column: string;
  constraint: string;
}

/** Fixed table map; dimension kinds never reach SQL as free text. */
const NAMED_DIMENSION_TABLES: Record<NamedDimensionKind, DimensionTable> = {
  stone: { table: 'stones', column: 'stone_name', constraint: 'stones_name_key' },
  color: { table: 'colors', column: 'color_name', constraint: 'colors_name_key' },
  finish: { table: 'finishes', column: 'finish_name', constraint: 'finishes_name_key' },
};

interface IdRow {
  id: number;
}

interface CategoryRow {
  id: number;
  category_name: string;
  subcategory_name: string | null;
}

interface NamedDimensionRow {
  id: number;
  name: string;
}

/**
 * Get-or-create a category keyed by (name, subcategory).
 * A null subcategory matches only a null subcategory.
 *
 * Insert-first: the unique constraint decides, and a conflicting insert
 * returns no row, so the existing row is re-read once.
 */
export async function resolveCategory(
  name: string,
  subcategory: string | null,
  db: Queryable = defaultDb
): Promise<number> {
  const inserted = await db.query<IdRow>(
    `INSERT INTO categories (category_name, subcategory_name)
     VALUES ($1, $2)
     ON CONFLICT ON CONSTRAINT categories_name_subcategory_key DO NOTHING
     RETURNING id`,
    [name, subcategory]
  );

  const created = inserted.rows[0];
  if (created) {
    return created.id;
  }

  const existing = await db.query<IdRow>(
    `SELECT id FROM categories
     WHERE category_name = $1 AND subcategory_name IS NOT DISTINCT FROM $2`,
    [name, subcategory]
  );

  const found = existing.rows[0];
  if (!found) {
    throw new DimensionResolutionConflictError('category', subcategory === null ? name : `${name}/${subcategory}`);
  }
  return found.id;
}

/**
 * Get-or-create a stone, color or finish by exact, case-sensitive name.
 * Blank or absent values resolve to null and touch nothing.
 */
export async function resolveDimension(
  kind: NamedDimensionKind,
  value: string | null | undefined,
  db: Queryable = defaultDb
): Promise<number | null> {
  if (value === null || value === undefined || value === '') {
    return null;
  }

  const { table, column, constraint } = NAMED_DIMENSION_TABLES[kind];

  const inserted = await db.query<IdRow>(
    `INSERT INTO ${table} (${column}) VALUES ($1)
     ON CONFLICT ON CONSTRAINT ${constraint} DO NOTHING
     RETURNING id`,
    [value]
  );

  const created = inserted.rows[0];
  if (created) {
    return created.id;
  }

  const existing = await db.query<IdRow>(
    `SELECT id FROM ${table} WHERE ${column} = $1`,
    [value]
  );

  const found = existing.rows[0];
  if (!found) {
    throw new DimensionResolutionConflictError(kind, value);
  }
  return found.id;
}

export function resolveOrCreate(
  ref: Extract<DimensionRef, { kind: 'category' }>,
  db?: Queryable
): Promise<number>;
export function resolveOrCreate(ref: DimensionRef, db?: Queryable): Promise<number | null>;
export function resolveOrCreate(ref: DimensionRef, db: Queryable = defaultDb): Promise<number | null> {
  if (ref.kind === 'category') {
    return resolveCategory(ref.name, ref.subcategory, db);
  }
  return resolveDimension(ref.kind, ref.name, db);
}

export async function listCategories(db: Queryable = defaultDb): Promise<Category[]> {
  const result = await db.query<CategoryRow>(
    `SELECT id, category_name, subcategory_name FROM categories
     ORDER BY category_name ASC, subcategory_name ASC NULLS FIRST`
  );
  return result.rows.map((row) => ({
    id: row.id,
    name: row.category_name,
    subcategory: row.subcategory_name,
  }));
}

/**
 * All canonical values of one dimension, for pick lists.
 */
export async function listDimensionValues(
  kind: DimensionKind,
  db: Queryable = defaultDb
): Promise<Array<Category | NamedDimension>> {
  if (kind === 'category') {
    return listCategories(db);
  }

  const { table, column } = NAMED_DIMENSION_TABLES[kind];
  const result = await db.query<NamedDimensionRow>(
    `SELECT id, ${column} AS name FROM ${table} ORDER BY ${column} ASC`
  );
  return result.rows.map((row) => ({ id: row.id, name: row.name }));
}
