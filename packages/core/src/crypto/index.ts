export { canonicalJson, serializeRequest, calculateRequestDigest } from "./checksum";
export { signRequest, SigningError } from "./signing";
export type { Signer } from "./signing";
