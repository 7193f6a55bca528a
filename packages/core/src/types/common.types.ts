/**
 * Opaque actor or target reference on the ledger (a DID). Issued by the identity
 * subsystem; this layer only requires it to be a non-empty string.
 */
export type Identifier = string;

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * A single problem found while checking a request field.
 */
export interface FieldError {
  field: string;
  message: string;
  value: unknown;
}

/**
 * Base class for all errors raised by the request kit.
 */
export class LedgerRequestError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}
