import type { FieldError } from '../types/common.types';
import type { NormalizedPayload, TransactionPayloads, TransactionType } from '../types/request.types';

/**
 * Marks outcomes produced by validatePayload. Kept out of the package entry, so
 * callers cannot build a ValidOutcome of their own.
 */
export const VALID_OUTCOME: unique symbol = Symbol('ValidOutcome');

export interface ValidOutcome<K extends TransactionType = TransactionType> {
  readonly isValid: true;
  readonly [VALID_OUTCOME]: true;
  readonly transactionType: K;
  /** Deep-frozen copy; schema fields first, then pass-through fields by name */
  readonly payload: NormalizedPayload<TransactionPayloads[K]>;
}

export interface InvalidOutcome {
  readonly isValid: false;
  readonly transactionType: TransactionType;
  readonly missingFields: readonly string[];
  readonly malformedFields: readonly FieldError[];
}

export type ValidationOutcome<K extends TransactionType = TransactionType> = ValidOutcome<K> | InvalidOutcome;
