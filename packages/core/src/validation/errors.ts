/**
 * Request validation error types.
 * Both are raised synchronously, before any request object exists.
 */

import { LedgerRequestError } from '../types/common.types';
import type { FieldError } from '../types/common.types';

export { LedgerRequestError };

/**
 * The payload (or an identifier) does not satisfy the transaction's schema.
 * Carries the complete set of problems so callers can react without
 * re-parsing their input.
 */
export class InvalidStructureError extends LedgerRequestError {
  constructor(
    public readonly transactionType: string,
    public readonly missingFields: readonly string[],
    public readonly malformedFields: readonly FieldError[]
  ) {
    super(
      `${transactionType} request has invalid structure: ${summarize(missingFields, malformedFields)}`,
      'INVALID_STRUCTURE'
    );
  }
}

/**
 * No schema is registered for the requested transaction type.
 */
export class UnknownTransactionTypeError extends LedgerRequestError {
  constructor(public readonly transactionType: string) {
    super(`Unknown transaction type: ${transactionType}`, 'UNKNOWN_TRANSACTION_TYPE');
  }
}

function summarize(missingFields: readonly string[], malformedFields: readonly FieldError[]): string {
  const parts: string[] = [];
  if (missingFields.length > 0) {
    parts.push(`missing ${missingFields.join(', ')}`);
  }
  for (const problem of malformedFields) {
    parts.push(`${problem.field} ${problem.message}`);
  }
  return parts.join('; ');
}
