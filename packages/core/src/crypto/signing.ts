import { LedgerRequestError } from "../types/common.types";
import type { CanonicalRequest, SignedRequest, TransactionType } from "../types/request.types";
import { createLogger } from "../logger";
import { serializeRequest } from "./checksum";

const logger = createLogger("[RequestSigning] ");

/**
 * Holder of the actor's signing key (a wallet or key service). Receives the
 * canonical serialization of a request and returns an encoded signature.
 */
export interface Signer {
  sign(message: string): Promise<string>;
}

export class SigningError extends LedgerRequestError {
  constructor(message: string) {
    super(message, 'SIGNING_FAILED');
  }
}

/**
 * Signs a canonical request and returns a new request carrying the signature.
 * The input request is left as it was; errors thrown by the signer propagate.
 *
 * @throws SigningError if the signer returns an empty signature
 */
export async function signRequest<K extends TransactionType>(
  request: CanonicalRequest<K>,
  signer: Signer
): Promise<SignedRequest<K>> {
  const signature = await signer.sign(serializeRequest(request));
  if (!signature) {
    throw new SigningError(`Signer returned an empty signature for ${request.identifier}`);
  }

  logger.debug(`Signed request from ${request.identifier}`);

  const signed: SignedRequest<K> = { ...request, signature };
  Object.freeze(signed);
  return signed;
}
