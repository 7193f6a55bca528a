export { buildRequest, getRequestBuilder } from './request_builder';
export type { RequestBuilder } from './request_builder';
export { buildNodeRequest, buildNodeRequestJson } from './node_request_builder';
export { parsePayloadJson, PAYLOAD_JSON_FIELD } from './payload_json';
