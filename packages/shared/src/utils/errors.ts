export type InventoryErrorCode =
  | 'DUPLICATE_SKU'
  | 'INVALID_PERCENT_FORMAT'
  | 'INVALID_MARGIN_FORMAT'
  | 'SKU_MISMATCH'
  | 'DIMENSION_RESOLUTION_CONFLICT'
  | 'INVALID_TRANSITION'
  | 'ITEM_NOT_FOUND';

/**
 * Base class for failures raised by the inventory core.
 * `retryable` tells callers whether repeating the same call can succeed.
 */
export class InventoryError extends Error {
  readonly code: InventoryErrorCode;
  readonly retryable: boolean;

  constructor(message: string, code: InventoryErrorCode, retryable = false) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.retryable = retryable;
  }
}

export class DuplicateSkuError extends InventoryError {
  constructor(readonly sku: string) {
    super(`An item with SKU '${sku}' already exists`, 'DUPLICATE_SKU');
  }
}

export class InvalidPercentFormatError extends InventoryError {
  constructor(
    readonly field: string,
    readonly value: string,
    code: Extract<InventoryErrorCode, 'INVALID_PERCENT_FORMAT' | 'INVALID_MARGIN_FORMAT'> = 'INVALID_PERCENT_FORMAT',
  ) {
    super(`Invalid percent for ${field}: '${value}'`, code);
  }
}

/** A margin typo must never price an item at cost, so it gets its own code. */
export class InvalidMarginFormatError extends InvalidPercentFormatError {
  constructor(value: string) {
    super('spMargin', value, 'INVALID_MARGIN_FORMAT');
  }
}

export class SkuMismatchError extends InventoryError {
  constructor(
    readonly itemId: number,
    readonly expectedSku: string,
    readonly actualSku: string,
  ) {
    super(
      `SKU '${actualSku}' does not match item ${itemId} (SKU '${expectedSku}')`,
      'SKU_MISMATCH',
    );
  }
}

export class DimensionResolutionConflictError extends InventoryError {
  constructor(
    readonly dimension: string,
    readonly value: string,
  ) {
    super(`Could not resolve ${dimension} '${value}' after insert conflict`, 'DIMENSION_RESOLUTION_CONFLICT', true);
  }
}

export class InvalidTransitionError extends InventoryError {
  constructor(
    readonly itemId: number,
    readonly fromStatus: string,
    readonly toStatus: string,
  ) {
    super(`Item ${itemId} cannot move from '${fromStatus}' to '${toStatus}'`, 'INVALID_TRANSITION');
  }
}

export class ItemNotFoundError extends InventoryError {
  constructor(readonly reference: number | string) {
    super(`Inventory item not found: ${reference}`, 'ITEM_NOT_FOUND');
  }
}

export function isInventoryError(error: unknown): error is InventoryError {
  return error instanceof InventoryError;
}
