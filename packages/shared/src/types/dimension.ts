export type DimensionKind = 'category' | 'stone' | 'color' | 'finish';

/** Dimensions keyed by name alone. */
export type NamedDimensionKind = Exclude<DimensionKind, 'category'>;

export interface Category {
  id: number;
  name: string;
  /** null is a canonical value of its own, distinct from '' */
  subcategory: string | null;
}

export interface NamedDimension {
  id: number;
  name: string;
}

/** A raw value to resolve against one dimension. */
export type DimensionRef =
  | { kind: 'category'; name: string; subcategory: string | null }
  | { kind: NamedDimensionKind; name: string | null | undefined };
