/**
 * Per-network protocol registry.
 *
 * Attaches protocols to a network instance, fans agent lifecycle events out
 * to them and routes messages through their hooks. Outbound protocol
 * messages leave through the `deliver` callback supplied by the network.
 */

import {
  parseMessage,
  type BroadcastMessage,
  type DirectMessage,
  type Message,
  type ProtocolMessage,
} from '@agent-mesh/protocol';
import { ProtocolRegistrationError, errorMessage } from '@agent-mesh/utils/errors';
import { networkLog as log } from '@agent-mesh/utils/logger';
import type { NetworkProtocol, OutboundSender, ProtocolState } from './protocol.js';

export type DeliverFn = (message: ProtocolMessage) => Promise<void> | void;

export interface ProtocolHostOptions {
  networkId: string;
  deliver: DeliverFn;
}

export interface ShutdownFailure {
  protocol: string;
  error: string;
}

export class ProtocolHost implements OutboundSender {
  readonly networkId: string;

  private readonly deliver: DeliverFn;
  private readonly protocols = new Map<string, NetworkProtocol>();
  private started = false;

  constructor(options: ProtocolHostOptions) {
    this.networkId = options.networkId;
    this.deliver = options.deliver;
  }

  get isStarted(): boolean {
    return this.started;
  }

  get protocolNames(): string[] {
    return [...this.protocols.keys()];
  }

  getProtocol(name: string): NetworkProtocol | undefined {
    return this.protocols.get(name);
  }

  registerProtocol(protocol: NetworkProtocol): void {
    if (this.started) {
      throw new ProtocolRegistrationError(protocol.name, 'network already started');
    }
    if (this.protocols.has(protocol.name)) {
      throw new ProtocolRegistrationError(protocol.name, 'name already registered');
    }
    this.protocols.set(protocol.name, protocol);
    log.debug('Protocol registered', { protocol: protocol.name });
  }

  /**
   * Hand each protocol its outbound sender, then initialize in registration
   * order. Returns false if any protocol refused the network or failed to
   * initialize.
   */
  async start(): Promise<boolean> {
    if (this.started) return true;
    this.started = true;

    let ok = true;
    for (const protocol of this.protocols.values()) {
      if (!protocol.registerWithNetwork(this)) {
        log.error('Protocol refused network registration', { protocol: protocol.name });
        ok = false;
      }
      const initialized = await protocol.initialize();
      if (!initialized) {
        log.error('Protocol failed to initialize', { protocol: protocol.name });
        ok = false;
      }
    }
    log.info(`Network ${this.networkId} started`, { protocols: this.protocols.size });
    return ok;
  }

  async registerAgent(agentId: string, metadata: Record<string, unknown> = {}): Promise<boolean> {
    let ok = true;
    for (const protocol of this.protocols.values()) {
      if (!(await protocol.registerAgent(agentId, metadata))) {
        log.warn('Protocol rejected agent registration', { protocol: protocol.name, agentId });
        ok = false;
      }
    }
    return ok;
  }

  async unregisterAgent(agentId: string): Promise<boolean> {
    let ok = true;
    for (const protocol of this.protocols.values()) {
      if (!(await protocol.unregisterAgent(agentId))) {
        ok = false;
      }
    }
    return ok;
  }

  /**
   * Pass a message through the protocol hooks. Returns the message to
   * deliver, or undefined when there is nothing left to forward. A reply
   * record from `handleMessage` leaves through `deliver`.
   */
  async routeMessage(message: Message): Promise<Message | undefined> {
    switch (message.message_type) {
      case 'direct_message':
        return this.routeDirect(message);
      case 'broadcast_message':
        return this.routeBroadcast(message);
      case 'protocol_message':
        await this.routeProtocol(message);
        return undefined;
    }
  }

  async sendProtocolMessage(message: ProtocolMessage): Promise<boolean> {
    try {
      await this.deliver(message);
      return true;
    } catch (err) {
      log.error('Failed to deliver protocol message', {
        protocol: message.protocol,
        to: message.relevant_agent_id,
        error: errorMessage(err),
      });
      return false;
    }
  }

  getState(): Record<string, ProtocolState> {
    const state: Record<string, ProtocolState> = {};
    for (const [name, protocol] of this.protocols) {
      state[name] = protocol.getState();
    }
    return state;
  }

  /** Shut down every protocol; failures are collected, never thrown. */
  async shutdown(): Promise<ShutdownFailure[]> {
    const failures: ShutdownFailure[] = [];
    for (const [name, protocol] of this.protocols) {
      try {
        if (!(await protocol.shutdown())) {
          failures.push({ protocol: name, error: 'shutdown returned false' });
        }
      } catch (err) {
        failures.push({ protocol: name, error: errorMessage(err) });
      }
    }
    for (const failure of failures) {
      log.error('Protocol shutdown failed', { ...failure });
    }
    this.started = false;
    return failures;
  }

  private async routeDirect(message: DirectMessage): Promise<DirectMessage | undefined> {
    let current: DirectMessage | undefined = message;
    for (const protocol of this.protocols.values()) {
      if (!current) break;
      if (protocol.processDirectMessage) {
        current = await protocol.processDirectMessage(current);
      }
    }
    return current;
  }

  private async routeBroadcast(message: BroadcastMessage): Promise<BroadcastMessage | undefined> {
    let current: BroadcastMessage | undefined = message;
    for (const protocol of this.protocols.values()) {
      if (!current) break;
      if (protocol.processBroadcastMessage) {
        current = await protocol.processBroadcastMessage(current);
      }
    }
    return current;
  }

  private async routeProtocol(message: ProtocolMessage): Promise<void> {
    const protocol = this.protocols.get(message.protocol);
    if (!protocol) {
      log.debug('Dropping message for unknown protocol', { protocol: message.protocol });
      return;
    }
    if (protocol.processProtocolMessage) {
      await protocol.processProtocolMessage(message);
      return;
    }

    const record = await protocol.handleMessage({ ...message });
    if (!record) return;

    const parsed = parseMessage(record);
    if (!parsed.ok) {
      log.warn('Dropping invalid protocol reply', { protocol: protocol.name, error: parsed.error });
      return;
    }
    const reply = parsed.value;
    if (reply.message_type !== 'protocol_message') {
      log.warn('Dropping protocol reply that is not a protocol message', {
        protocol: protocol.name,
        messageType: reply.message_type,
      });
      return;
    }
    await this.sendProtocolMessage(reply);
  }
}
