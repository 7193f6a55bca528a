/**
 * Schema-specific error types.
 * These errors are thrown while compiling request schemas at startup.
 */

import { LedgerRequestError } from '../types/common.types';

/**
 * A request schema could not be compiled. Raised when the registry loads, so a
 * broken schema stops the process instead of validating nothing.
 */
export class SchemaCompilationError extends LedgerRequestError {
  constructor(
    public readonly schemaId: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Schema ${schemaId} failed to compile: ${reason}`, 'SCHEMA_COMPILATION_FAILED');
  }
}
