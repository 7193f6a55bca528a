/**
 * Request Canonicalizer
 *
 * Lays a validated payload out as the canonical request:
 *
 * ```json
 * { "identifier": "<actor>", "operation": { "type": "0", "dest": "<target>", ...payload } }
 * ```
 *
 * Only a {@link ValidOutcome} produced by validatePayload is accepted, so an
 * unvalidated mapping cannot reach this point. Internal to the builders; the
 * package entry does not export it. The result is deep-frozen; identical inputs
 * give identical output.
 */

import type { Identifier } from '../types/common.types';
import type { CanonicalRequest, TransactionCode, TransactionType } from '../types/request.types';
import { deepFreeze } from '../utils/deep_freeze';
import { InvalidStructureError } from '../validation/errors';
import { PAYLOAD_FIELD } from '../validation/payload_validator';
import { VALID_OUTCOME } from '../validation/payload_validator.types';
import type { ValidOutcome } from '../validation/payload_validator.types';

export function canonicalize<K extends TransactionType>(
  actor: Identifier,
  destination: Identifier,
  code: TransactionCode<K>,
  outcome: ValidOutcome<K>
): CanonicalRequest<K> {
  if (outcome[VALID_OUTCOME] !== true) {
    throw new InvalidStructureError(outcome.transactionType, [], [
      { field: PAYLOAD_FIELD, message: 'has not been validated', value: outcome.payload }
    ]);
  }

  return deepFreeze({
    identifier: actor,
    operation: {
      type: code,
      dest: destination,
      ...outcome.payload
    }
  });
}
