import Ajv from "ajv";
import type { ValidateFunction } from "ajv";
import { SchemaCompilationError } from "./errors";

/**
 * Declarative description of a transaction payload (a JSON Schema document).
 */
export type TransactionSchema = {
  readonly $id: string;
  readonly title: string;
  readonly type: string;
  readonly required: readonly string[];
  readonly properties: { readonly [field: string]: object };
  readonly additionalProperties?: boolean;
  readonly [keyword: string]: unknown;
};

let ajv: Ajv | null = null;

function getAjv(): Ajv {
  if (!ajv) {
    // allErrors: report every missing field, not just the first one
    ajv = new Ajv({ allErrors: true });
  }
  return ajv;
}

/**
 * Compiles a request schema into a validator that doubles as a type guard.
 *
 * The `$id` is stripped before compiling so the same document can be compiled
 * more than once without colliding in the shared AJV instance.
 */
export function compileTransactionSchema<T>(schema: TransactionSchema): ValidateFunction<T> {
  const { $id, ...body } = schema;
  try {
    return getAjv().compile<T>(body);
  } catch (error) {
    throw new SchemaCompilationError($id, error);
  }
}
