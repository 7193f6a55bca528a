import type { Identifier } from "./common.types";
import type { NodeData } from "./node.types";

/**
 * Payload shape for every supported transaction type. Adding a key here without
 * registering a definition for it is a compile error in the registry.
 */
export interface TransactionPayloads {
  NODE: NodeData;
}

export type TransactionType = keyof TransactionPayloads;

/**
 * Wire code written to `operation.type` for each transaction type.
 */
export interface TransactionCodes {
  NODE: "0";
}

export type TransactionCode<K extends TransactionType = TransactionType> = TransactionCodes[K];

/**
 * A validated payload: the schema fields plus any pass-through fields.
 */
export type NormalizedPayload<T> = T & { readonly [field: string]: unknown };

export type CanonicalOperation<K extends TransactionType> = {
  readonly type: TransactionCode<K>;
  readonly dest: Identifier;
} & NormalizedPayload<TransactionPayloads[K]>;

/**
 * Unsigned request as handed to a signer and then to the transport layer.
 */
export interface CanonicalRequest<K extends TransactionType = TransactionType> {
  readonly identifier: Identifier;
  readonly operation: CanonicalOperation<K>;
}

export type NodeRequest = CanonicalRequest<"NODE">;

export type SignedRequest<K extends TransactionType = TransactionType> = CanonicalRequest<K> & {
  readonly signature: string;
};
