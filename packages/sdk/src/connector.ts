/**
 * NetworkConnector - Agent Mesh SDK
 * @agent-mesh/sdk
 *
 * Owns one network connection per agent: registration handshake, a single
 * sequential receive loop, and dispatch of inbound envelopes to handlers
 * keyed by message type or system command.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import {
  decodeEnvelope,
  encodeEnvelope,
  parseMessage,
  toMessageEnvelope,
  isProtocolMessage,
  REGISTER_AGENT,
  LIST_AGENTS,
  LIST_PROTOCOLS,
  GET_PROTOCOL_MANIFEST,
  type Message,
  type MessageType,
  type DirectMessage,
  type BroadcastMessage,
  type ProtocolMessage,
  type SystemResponseEnvelope,
} from '@agent-mesh/protocol';
import { ConnectorConfigSchema, DEFAULT_CONNECTOR_CONFIG, type ConnectorConfig } from '@agent-mesh/config';
import {
  ConnectionError,
  NotConnectedError,
  TimeoutError,
  TransportClosedError,
  errorMessage,
} from '@agent-mesh/utils/errors';
import { connectorLog as log } from '@agent-mesh/utils/logger';
import { openWebSocketTransport, type Transport, type TransportFactory } from './transport.js';
import { sendSystemRequest as sendSystemRequestImpl } from './system-requests.js';

export type ConnectorState = 'DISCONNECTED' | 'CONNECTING' | 'HANDSHAKING' | 'READY';

/** Why the receive loop ended: a closed transport, or any other failure. */
export type LoopExitReason = 'closed' | 'error';

export type MessageHandler = (message: Message) => void | Promise<void>;
export type SystemResponseHandler = (response: SystemResponseEnvelope) => void | Promise<void>;

export interface ConnectorOptions extends Partial<ConnectorConfig> {
  agentId: string;
  /** Opens the underlying transport (default: WebSocket) */
  transportFactory?: TransportFactory;
}

const NOOP_MESSAGE_HANDLER: MessageHandler = () => {};
const NOOP_SYSTEM_HANDLER: SystemResponseHandler = () => {};

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(operation, timeoutMs)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Connects one agent to a network server.
 *
 * Public operations report failure as `false` and log; they do not throw.
 */
export class NetworkConnector {
  private readonly config: ConnectorConfig;
  private readonly transportFactory: TransportFactory;
  private transport?: Transport;
  private receiveLoop?: Promise<LoopExitReason>;
  /** Transport whose receive loop is running the current handler */
  private readonly handlerScope = new AsyncLocalStorage<Transport>();
  private _state: ConnectorState = 'DISCONNECTED';
  private _networkName?: string;

  private readonly messageHandlers = new Map<string, MessageHandler>();
  private readonly systemHandlers = new Map<string, SystemResponseHandler>();

  onStateChange?: (state: ConnectorState) => void;

  constructor(options: ConnectorOptions) {
    const { transportFactory, ...config } = options;
    this.config = ConnectorConfigSchema.parse({ ...DEFAULT_CONNECTOR_CONFIG, ...config });
    this.transportFactory = transportFactory ?? openWebSocketTransport;
  }

  get state(): ConnectorState {
    return this._state;
  }

  get isConnected(): boolean {
    return this._state === 'READY';
  }

  get agentId(): string {
    return this.config.agentId;
  }

  /** Network name reported by the server at registration */
  get networkName(): string | undefined {
    return this._networkName;
  }

  get url(): string {
    return `ws://${this.config.host}:${this.config.port}`;
  }

  /**
   * Open the transport and register with the server. Waits for exactly one
   * response envelope; no retries.
   */
  async connect(): Promise<boolean> {
    if (this._state === 'READY') {
      return true;
    }
    if (this._state !== 'DISCONNECTED') {
      log.warn('Connect already in progress', { agentId: this.agentId });
      return false;
    }

    this.setState('CONNECTING');
    let transport: Transport | undefined;

    try {
      transport = await this.transportFactory(this.url, { timeoutMs: this.config.connectTimeoutMs });
      this.setState('HANDSHAKING');

      const sent = await sendSystemRequestImpl(transport, REGISTER_AGENT, {
        agent_id: this.agentId,
        metadata: this.config.metadata,
      });
      if (!sent) {
        throw new ConnectionError('failed to send registration request');
      }

      const reply = await withTimeout(transport.receive(), this.config.connectTimeoutMs, 'registration response');
      const decoded = decodeEnvelope(reply);
      if (
        decoded.ok &&
        decoded.value.type === 'system_response' &&
        decoded.value.command === REGISTER_AGENT &&
        decoded.value.success
      ) {
        const networkName = decoded.value.network_name;
        this._networkName = typeof networkName === 'string' ? networkName : undefined;
        this.transport = transport;
        this.setState('READY');
        log.info('Connected to network', { agentId: this.agentId, network: this._networkName });
        this.receiveLoop = this.runReceiveLoop(transport);
        return true;
      }

      log.warn('Registration rejected', {
        agentId: this.agentId,
        reason: decoded.ok ? decoded.value.type : decoded.error,
      });
      await this.closeTransport(transport);
      this.setState('DISCONNECTED');
      return false;
    } catch (err) {
      log.error('Connection error', { agentId: this.agentId, error: errorMessage(err) });
      if (transport) {
        await this.closeTransport(transport);
      }
      this.setState('DISCONNECTED');
      return false;
    }
  }

  /**
   * Close the connection and wait for the receive loop to finish.
   * Returns false when there was no open connection.
   */
  async disconnect(): Promise<boolean> {
    const transport = this.transport;
    if (!transport) {
      return false;
    }

    this.transport = undefined;
    this.setState('DISCONNECTED');

    try {
      await transport.close();
    } catch (err) {
      log.error('Error disconnecting', { agentId: this.agentId, error: errorMessage(err) });
      return false;
    }

    // A handler of this connection's own loop cannot wait for that loop
    const loop = this.receiveLoop;
    if (loop && this.handlerScope.getStore() !== transport) {
      await loop;
    }

    log.info(`Agent ${this.agentId} disconnected from network`);
    return true;
  }

  /**
   * Resolves when the current receive loop ends; 'closed' if none is running.
   */
  waitUntilClosed(): Promise<LoopExitReason> {
    return this.receiveLoop ?? Promise.resolve('closed');
  }

  /** Last registration for a message type wins. */
  registerMessageHandler(messageType: MessageType, handler: MessageHandler): void {
    this.messageHandlers.set(messageType, handler);
    log.debug('Registered handler for message type', { messageType });
  }

  /** Last registration for a command wins. */
  registerSystemHandler(command: string, handler: SystemResponseHandler): void {
    this.systemHandlers.set(command, handler);
    log.debug('Registered handler for system command', { command });
  }

  /**
   * Deliver a message to the agent-side handler for its type. Protocol
   * messages are stamped inbound for this agent first.
   */
  async consumeMessage(message: Message): Promise<void> {
    if (isProtocolMessage(message)) {
      message.direction = 'inbound';
      message.relevant_agent_id = this.agentId;
    }
    await this.resolveMessageHandler(message.message_type)(message);
  }

  /**
   * Send a message. Returns false when not connected or the write fails.
   */
  async sendMessage(message: Message): Promise<boolean> {
    const transport = this.transport;
    if (!transport || this._state !== 'READY') {
      log.warn(new NotConnectedError(this.agentId).message, { messageId: message.message_id });
      return false;
    }

    try {
      if (!message.sender_id) {
        message.sender_id = this.agentId;
      }
      if (isProtocolMessage(message)) {
        message.direction = 'outbound';
        message.relevant_agent_id = this.agentId;
      }

      await transport.send(encodeEnvelope(toMessageEnvelope(message)));
      log.debug('Message sent', { messageId: message.message_id });
      return true;
    } catch (err) {
      log.error('Failed to send message', { messageId: message.message_id, error: errorMessage(err) });
      return false;
    }
  }

  sendDirectMessage(message: DirectMessage): Promise<boolean> {
    return this.sendMessage(message);
  }

  sendBroadcastMessage(message: BroadcastMessage): Promise<boolean> {
    return this.sendMessage(message);
  }

  sendProtocolMessage(message: ProtocolMessage): Promise<boolean> {
    return this.sendMessage(message);
  }

  /**
   * Fire-and-forget system request. Register a system handler for the
   * command to receive the response.
   */
  async sendSystemRequest(command: string, params: Record<string, unknown> = {}): Promise<boolean> {
    const transport = this.transport;
    if (!transport || this._state !== 'READY') {
      log.warn(new NotConnectedError(this.agentId).message, { command });
      return false;
    }
    return sendSystemRequestImpl(transport, command, params);
  }

  listAgents(): Promise<boolean> {
    return this.sendSystemRequest(LIST_AGENTS);
  }

  listProtocols(): Promise<boolean> {
    return this.sendSystemRequest(LIST_PROTOCOLS);
  }

  getProtocolManifest(protocolName: string): Promise<boolean> {
    return this.sendSystemRequest(GET_PROTOCOL_MANIFEST, { protocol_name: protocolName });
  }

  // Private methods

  private setState(state: ConnectorState): void {
    if (this._state === state) return;
    this._state = state;
    if (this.onStateChange) {
      this.onStateChange(state);
    }
  }

  private resolveMessageHandler(messageType: string): MessageHandler {
    return this.messageHandlers.get(messageType) ?? NOOP_MESSAGE_HANDLER;
  }

  private resolveSystemHandler(command: string): SystemResponseHandler {
    const handler = this.systemHandlers.get(command);
    if (!handler) {
      log.debug('Received system response without handler', { command });
      return NOOP_SYSTEM_HANDLER;
    }
    return handler;
  }

  /**
   * One frame at a time: a slow handler delays every later receive on this
   * connection.
   */
  private async runReceiveLoop(transport: Transport): Promise<LoopExitReason> {
    try {
      while (this.transport === transport) {
        const frame = await transport.receive();
        await this.processFrame(transport, frame);
      }
      return 'closed';
    } catch (err) {
      if (err instanceof TransportClosedError) {
        log.info('Disconnected from server', { agentId: this.agentId });
        this.markDisconnected(transport);
        return 'closed';
      }
      log.error('Error in message listener', { agentId: this.agentId, error: errorMessage(err) });
      this.markDisconnected(transport);
      return 'error';
    }
  }

  private async processFrame(transport: Transport, frame: string): Promise<void> {
    const decoded = decodeEnvelope(frame);
    if (!decoded.ok) {
      log.debug('Ignoring malformed envelope', { error: decoded.error });
      return;
    }

    const envelope = decoded.value;
    switch (envelope.type) {
      case 'message': {
        const parsed = parseMessage(envelope.data);
        if (!parsed.ok) {
          log.debug('Ignoring invalid message', { error: parsed.error });
          return;
        }
        const message = parsed.value;
        log.debug('Received message', { from: message.sender_id, messageId: message.message_id });
        await this.runHandler(transport, () => this.consumeMessage(message));
        break;
      }

      case 'system_response':
        await this.runHandler(transport, () => this.resolveSystemHandler(envelope.command)(envelope));
        break;

      default:
        log.debug('Ignoring envelope', { type: envelope.type });
    }
  }

  private async runHandler(transport: Transport, invoke: () => void | Promise<void>): Promise<void> {
    try {
      await this.handlerScope.run(transport, invoke);
    } catch (err) {
      log.error('Handler failed', { agentId: this.agentId, error: errorMessage(err) });
    }
  }

  private markDisconnected(transport: Transport): void {
    if (this.transport !== transport) return;
    this.transport = undefined;
    this.setState('DISCONNECTED');
  }

  private async closeTransport(transport: Transport): Promise<void> {
    try {
      await transport.close();
    } catch (err) {
      log.warn('Failed to close transport', { error: errorMessage(err) });
    }
  }
}
