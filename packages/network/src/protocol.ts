/**
 * Network protocol contract.
 *
 * A network protocol is attached once per network instance and sees every
 * agent (un)registration and the messages routed to it. It emits messages
 * only through the OutboundSender it receives at registration.
 */

import type {
  BroadcastMessage,
  DirectMessage,
  ProtocolMessage,
} from '@agent-mesh/protocol';

/**
 * The one capability a protocol holds on its network: sending protocol
 * messages back out.
 */
export interface OutboundSender {
  /** Sender ID used on messages the network emits itself */
  readonly networkId: string;
  sendProtocolMessage(message: ProtocolMessage): Promise<boolean>;
}

/** Read-only diagnostic snapshot of a protocol */
export type ProtocolState = Readonly<Record<string, unknown>>;

export interface NetworkProtocol {
  /** Unique per network instance */
  readonly name: string;

  initialize(): Promise<boolean>;
  /** Release every owned resource. Safe to call more than once. */
  shutdown(): Promise<boolean>;

  registerAgent(agentId: string, metadata: Record<string, unknown>): Promise<boolean>;
  /** Unregistering an unknown agent is a no-op that succeeds. */
  unregisterAgent(agentId: string): Promise<boolean>;

  /**
   * Generic entry point for protocol-addressed messages not covered by the
   * typed hooks below. May return a response message record.
   */
  handleMessage(message: Record<string, unknown>): Promise<Record<string, unknown> | undefined>;

  /** Must not mutate state. */
  getState(): ProtocolState;

  /** Accepts exactly one sender; later calls return false. */
  registerWithNetwork(sender: OutboundSender): boolean;

  /** Returns the message to keep routing, or undefined when consumed. */
  processDirectMessage?(message: DirectMessage): Promise<DirectMessage | undefined>;
  processBroadcastMessage?(message: BroadcastMessage): Promise<BroadcastMessage | undefined>;
  processProtocolMessage?(message: ProtocolMessage): Promise<void>;
}
