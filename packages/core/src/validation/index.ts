export {
  validatePayload,
  validateIdentifiers,
  isNodeData,
  PAYLOAD_FIELD,
  RESERVED_OPERATION_FIELDS
} from './payload_validator';
export type { ValidationOutcome, ValidOutcome, InvalidOutcome } from './payload_validator.types';
export { LedgerRequestError, InvalidStructureError, UnknownTransactionTypeError } from './errors';
