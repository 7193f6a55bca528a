export * as Builders from "./builders";
export * as Config from "./config";
export * as Crypto from "./crypto";
export * as Logger from "./logger";
export * as Registry from "./transaction_registry";
export * as Schemas from "./request_schemas";
// Type system exports
export * as Validation from "./validation";
export * as Requests from "./types";

// Entry points most callers need
export { buildNodeRequest, buildNodeRequestJson, buildRequest, getRequestBuilder } from "./builders";
export { InvalidStructureError, UnknownTransactionTypeError, LedgerRequestError } from "./validation";
export type { CanonicalRequest, NodeRequest, NodeData, SignedRequest } from "./types";
