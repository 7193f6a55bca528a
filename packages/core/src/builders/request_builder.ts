/**
 * Request Builder
 *
 * Entry point shared by every transaction type: resolve the definition,
 * validate identifiers and payload, then canonicalize. Any problem is raised
 * as an {@link InvalidStructureError} before a request object exists.
 *
 * Builders are synchronous and never touch the network, a wallet or storage.
 */

import type { FieldError, Identifier } from '../types/common.types';
import type { CanonicalRequest, TransactionType } from '../types/request.types';
import { canonicalize } from '../canonical/canonicalizer';
import { createLogger } from '../logger';
import { getTransactionDefinition, resolveTransactionType } from '../transaction_registry/transaction_registry';
import { InvalidStructureError } from '../validation/errors';
import { validateIdentifiers, validatePayload } from '../validation/payload_validator';

const logger = createLogger('[RequestBuilder] ');

export type RequestBuilder<K extends TransactionType = TransactionType> = (
  actor: Identifier,
  destination: Identifier,
  payload: unknown
) => CanonicalRequest<K>;

/**
 * Builds the canonical request for a transaction type.
 *
 * @param payload - Deserialized payload; validated here, never retained
 * @throws InvalidStructureError when the payload or an identifier is invalid
 */
export function buildRequest<K extends TransactionType>(
  type: K,
  actor: Identifier,
  destination: Identifier,
  payload: unknown
): CanonicalRequest<K> {
  const definition = getTransactionDefinition(type);
  const identifierErrors = validateIdentifiers(actor, destination);
  const outcome = validatePayload(definition, payload);

  if (!outcome.isValid) {
    throw reject(type, outcome.missingFields, [...identifierErrors, ...outcome.malformedFields]);
  }
  if (identifierErrors.length > 0) {
    throw reject(type, [], identifierErrors);
  }

  const request = canonicalize(actor, destination, definition.code, outcome);
  logger.debug(`Built ${type} request for ${destination}`);
  return request;
}

/**
 * Returns the builder for a transaction type named at runtime.
 * @throws UnknownTransactionTypeError when no schema is registered for the name
 */
export function getRequestBuilder(name: string): RequestBuilder {
  const type = resolveTransactionType(name);
  return (actor, destination, payload) => buildRequest(type, actor, destination, payload);
}

function reject(
  type: TransactionType,
  missingFields: readonly string[],
  malformedFields: readonly FieldError[]
): InvalidStructureError {
  const error = new InvalidStructureError(type, missingFields, malformedFields);
  logger.warn(
    `Rejected ${type} request`,
    { missingFields, malformedFields: malformedFields.map(problem => problem.field) }
  );
  return error;
}
