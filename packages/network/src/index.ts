/**
 * @agent-mesh/network
 *
 * Network-side protocol contract, the per-network protocol host and the
 * built-in simple messaging protocol.
 */

export type { NetworkProtocol, OutboundSender, ProtocolState } from './protocol.js';
export {
  ProtocolHost,
  type DeliverFn,
  type ProtocolHostOptions,
  type ShutdownFailure,
} from './protocol-host.js';
export * from './simple-messaging/index.js';
