/**
 * Roles a node can announce in its configuration.
 */
export type NodeService = "VALIDATOR";

/**
 * Network configuration carried by a NODE transaction.
 */
export interface NodeData {
  node_ip: string;
  node_port: number;
  client_ip: string;
  client_port: number;
  alias: string;
  services: NodeService[];
  /** BLS public key, base58 encoded */
  blskey: string;
}
