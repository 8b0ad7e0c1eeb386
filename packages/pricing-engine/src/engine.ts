import type { FullBreakdownInputs, PricingBreakdown, PricingInputs } from '@stockroom/shared';
import { InvalidMarginFormatError, InvalidPercentFormatError, roundMoney } from '@stockroom/shared';
import { parsePercent, type Percent } from './percent.js';

function amount(value: number | null | undefined): number {
  return value ?? 0;
}

function nullable<T>(value: T | null | undefined): T | null {
  return value ?? null;
}

/**
 * Parses the SP margin, reporting a malformed value as a margin error
 * rather than a generic percent error.
 */
export function parseMargin(spMargin: string | null | undefined): Percent {
  try {
    return parsePercent(spMargin, 'spMargin');
  } catch (error) {
    if (error instanceof InvalidPercentFormatError) {
      throw new InvalidMarginFormatError(error.value);
    }
    throw error;
  }
}

/**
 * Derives the full breakdown from raw cost inputs.
 *
 *   costPrice      = unitPrice
 *   finalCost      = costPrice + threadWork + gstOnCost + packagingCost
 *   sellingPrice   = finalCost * (1 + margin)
 *   finalSP        = sellingPrice * (1 + taxesPercent / 100)
 *
 * Each step is rounded to cents before the next one reads it, the same
 * values a DECIMAL(10,2) ledger would hold at every stage.
 */
export function computePricing(inputs: PricingInputs): PricingBreakdown {
  const margin = parseMargin(inputs.spMargin);

  const costPrice = roundMoney(amount(inputs.unitPrice));
  const finalCostPrice = roundMoney(
    costPrice + amount(inputs.threadWork) + amount(inputs.gstOnCost) + amount(inputs.packagingCost)
  );
  const sellingPrice = roundMoney(finalCostPrice * (1 + margin.fraction));
  const finalSellingPrice = roundMoney(sellingPrice * (1 + amount(inputs.taxesPercent) / 100));

  return {
    unitPrice: nullable(inputs.unitPrice),
    threadWork: nullable(inputs.threadWork),
    gstOnCost: nullable(inputs.gstOnCost),
    packagingCost: nullable(inputs.packagingCost),
    spMargin: nullable(inputs.spMargin),
    taxesPercent: nullable(inputs.taxesPercent),
    costPrice,
    finalCostPrice,
    sellingPrice,
    finalSellingPrice,
  };
}

/**
 * Builds a breakdown from a record that already carries every derived
 * value. Nothing is recomputed; the margin is still parsed so a malformed
 * string never reaches the ledger, where reports re-parse it.
 */
export function computeFromFullBreakdown(inputs: FullBreakdownInputs): PricingBreakdown {
  parseMargin(inputs.spMargin);

  return {
    unitPrice: nullable(inputs.unitPrice),
    threadWork: nullable(inputs.threadWork),
    gstOnCost: nullable(inputs.gstOnCost),
    packagingCost: nullable(inputs.packagingCost),
    spMargin: nullable(inputs.spMargin),
    taxesPercent: nullable(inputs.taxesPercent),
    costPrice: nullable(inputs.costPrice),
    finalCostPrice: nullable(inputs.finalCostPrice),
    sellingPrice: nullable(inputs.sellingPrice),
    finalSellingPrice: nullable(inputs.finalSellingPrice),
  };
}

const DERIVED_FIELDS = ['costPrice', 'finalCostPrice', 'sellingPrice', 'finalSellingPrice'] as const;

export type DerivedField = (typeof DERIVED_FIELDS)[number];

export interface BreakdownDrift {
  field: DerivedField;
  supplied: number | null;
  computed: number | null;
}

/**
 * Compares a supplied breakdown against one recomputed from its raw inputs
 * and lists the derived fields that differ by more than `tolerance`.
 * Imports use it to flag historical rows priced by a different formula.
 */
export function findBreakdownDrift(
  supplied: PricingBreakdown,
  tolerance = 0.01
): BreakdownDrift[] {
  const computed = computePricing(supplied);
  const drift: BreakdownDrift[] = [];

  for (const field of DERIVED_FIELDS) {
    const a = supplied[field];
    const b = computed[field];
    if (a === null || b === null) {
      if (a !== b) drift.push({ field, supplied: a, computed: b });
      continue;
    }
    if (Math.abs(a - b) > tolerance + 1e-9) {
      drift.push({ field, supplied: a, computed: b });
    }
  }

  return drift;
}
