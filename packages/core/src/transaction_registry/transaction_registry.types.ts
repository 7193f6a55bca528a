import type { ValidateFunction } from "ajv";
import type { TransactionSchema } from "../request_schemas/schema_compiler";
import type { TransactionCode, TransactionPayloads, TransactionType } from "../types/request.types";

/**
 * Everything the builders need to know about one transaction type.
 * Definitions are frozen once the registry has loaded.
 */
export interface TransactionDefinition<K extends TransactionType = TransactionType> {
  readonly type: K;
  readonly code: TransactionCode<K>;
  readonly schema: TransactionSchema;
  /** Schema fields in the order they appear in the canonical operation */
  readonly fieldOrder: readonly string[];
  readonly requiredFields: readonly string[];
  readonly validate: ValidateFunction<TransactionPayloads[K]>;
}

export type TransactionDefinitionTable = {
  [K in TransactionType]: TransactionDefinition<K>;
};
