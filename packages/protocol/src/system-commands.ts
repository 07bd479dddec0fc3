/**
 * System command names. These are part of the external wire contract.
 */

export const REGISTER_AGENT = 'register_agent';
export const LIST_AGENTS = 'list_agents';
export const LIST_PROTOCOLS = 'list_protocols';
export const GET_PROTOCOL_MANIFEST = 'get_protocol_manifest';

export type SystemCommand =
  | typeof REGISTER_AGENT
  | typeof LIST_AGENTS
  | typeof LIST_PROTOCOLS
  | typeof GET_PROTOCOL_MANIFEST;

export const SYSTEM_COMMANDS: readonly SystemCommand[] = [
  REGISTER_AGENT,
  LIST_AGENTS,
  LIST_PROTOCOLS,
  GET_PROTOCOL_MANIFEST,
];
