import type { Identifier } from '../types/common.types';
import type { NodeRequest } from '../types/request.types';
import { parsePayloadJson } from './payload_json';
import { buildRequest } from './request_builder';

/**
 * Builds a NODE (type "0") request announcing a node's network configuration.
 *
 * @param actor - Identifier of the submitting actor (usually a steward or trustee)
 * @param destination - Identifier of the node being configured
 * @param payload - Node data: node_ip, node_port, client_ip, client_port, alias, services, blskey
 * @throws InvalidStructureError when any required field is missing or malformed
 */
export function buildNodeRequest(actor: Identifier, destination: Identifier, payload: unknown): NodeRequest {
  return buildRequest('NODE', actor, destination, payload);
}

/**
 * JSON-in, JSON-out variant of {@link buildNodeRequest}.
 */
export function buildNodeRequestJson(actor: Identifier, destination: Identifier, dataJson: string): string {
  const request = buildNodeRequest(actor, destination, parsePayloadJson('NODE', dataJson));
  return JSON.stringify(request);
}
