export { LedgerRequestError } from "./common.types";
export type { Identifier, JsonValue, FieldError } from "./common.types";
export type { NodeData, NodeService } from "./node.types";
export type {
  TransactionPayloads,
  TransactionType,
  TransactionCodes,
  TransactionCode,
  NormalizedPayload,
  CanonicalOperation,
  CanonicalRequest,
  NodeRequest,
  SignedRequest
} from "./request.types";
