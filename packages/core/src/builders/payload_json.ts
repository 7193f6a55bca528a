import type { TransactionType } from '../types/request.types';
import { InvalidStructureError } from '../validation/errors';

/** Field name reported when the payload text itself cannot be parsed */
export const PAYLOAD_JSON_FIELD = 'data';

/**
 * Parses payload JSON as handed over by language bindings.
 * @throws InvalidStructureError when the text is not valid JSON
 */
export function parsePayloadJson(type: TransactionType, json: string): unknown {
  try {
    return JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidStructureError(type, [], [
      { field: PAYLOAD_JSON_FIELD, message: `must be valid JSON (${reason})`, value: json }
    ]);
  }
}
