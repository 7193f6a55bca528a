/**
 * Schema Registry
 *
 * Maps each supported transaction type to its payload schema and wire code.
 * The table is built once when this module loads, then frozen; lookups never
 * mutate it, so it can be shared by any number of concurrent builders.
 *
 * Unknown transaction types fail closed: callers get an
 * {@link UnknownTransactionTypeError} (or `null` from {@link schemaFor}), never
 * an empty schema that would accept anything.
 */

import { Schemas, compileTransactionSchema } from "../request_schemas";
import type { TransactionSchema } from "../request_schemas";
import type { TransactionCodes, TransactionPayloads, TransactionType } from "../types/request.types";
import { deepFreeze } from "../utils/deep_freeze";
import { UnknownTransactionTypeError } from "../validation/errors";
import type { TransactionDefinition, TransactionDefinitionTable } from "./transaction_registry.types";

const TRANSACTION_CODES: TransactionCodes = {
  NODE: "0",
};

function defineTransaction<K extends TransactionType>(
  type: K,
  schema: TransactionSchema
): TransactionDefinition<K> {
  const fieldOrder = [...Object.keys(schema.properties)];
  for (const field of schema.required) {
    if (!fieldOrder.includes(field)) {
      fieldOrder.push(field);
    }
  }

  return {
    type,
    code: TRANSACTION_CODES[type],
    schema,
    fieldOrder,
    requiredFields: [...schema.required],
    validate: compileTransactionSchema<TransactionPayloads[K]>(schema),
  };
}

const TRANSACTION_DEFINITIONS: TransactionDefinitionTable = deepFreeze({
  NODE: defineTransaction("NODE", Schemas.NodeRequest),
});

/**
 * Type guard for transaction type names coming from untyped input.
 */
export function isTransactionType(name: string): name is TransactionType {
  return Object.prototype.hasOwnProperty.call(TRANSACTION_DEFINITIONS, name);
}

export function getTransactionDefinition<K extends TransactionType>(type: K): TransactionDefinition<K> {
  return TRANSACTION_DEFINITIONS[type];
}

/**
 * Resolves a transaction type name, failing closed for anything unregistered.
 * @throws UnknownTransactionTypeError
 */
export function resolveTransactionType(name: string): TransactionType {
  if (!isTransactionType(name)) {
    throw new UnknownTransactionTypeError(name);
  }
  return name;
}

/**
 * Returns the payload schema for a transaction type, or null when none is registered.
 */
export function schemaFor(name: string): TransactionSchema | null {
  return isTransactionType(name) ? TRANSACTION_DEFINITIONS[name].schema : null;
}

export function listTransactionTypes(): TransactionType[] {
  return Object.keys(TRANSACTION_DEFINITIONS).filter(isTransactionType);
}

/**
 * Reverse lookup from the wire code found in `operation.type`.
 */
export function findTransactionTypeByCode(code: string): TransactionType | null {
  return listTransactionTypes().find(type => TRANSACTION_DEFINITIONS[type].code === code) ?? null;
}
