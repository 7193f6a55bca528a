/**
 * Request payload schemas, one JSON Schema document per transaction type.
 */

import nodeRequestSchema from "./node_request_schema.json";

export const Schemas = {
  NodeRequest: nodeRequestSchema,
} as const;

export { compileTransactionSchema } from "./schema_compiler";
export type { TransactionSchema } from "./schema_compiler";
export { SchemaCompilationError } from "./errors";
