/**
 * @agent-mesh/sdk
 *
 * Agent-side connector for joining an Agent Mesh network.
 *
 * ```typescript
 * import { NetworkConnector } from '@agent-mesh/sdk';
 * import { createDirectMessage } from '@agent-mesh/protocol';
 *
 * const connector = new NetworkConnector({ host: 'localhost', port: 8570, agentId: 'A1' });
 * connector.registerMessageHandler('direct_message', (msg) => console.log(msg.content));
 *
 * if (await connector.connect()) {
 *   await connector.sendDirectMessage(createDirectMessage({ target_agent_id: 'B1', content: { text: 'hi' } }));
 * }
 * ```
 */

export {
  NetworkConnector,
  type ConnectorState,
  type ConnectorOptions,
  type LoopExitReason,
  type MessageHandler,
  type SystemResponseHandler,
} from './connector.js';

export {
  WebSocketTransport,
  openWebSocketTransport,
  type Transport,
  type TransportFactory,
  type TransportOptions,
} from './transport.js';

export { sendSystemRequest } from './system-requests.js';

export {
  MeshError,
  ConnectionError,
  TransportClosedError,
  NotConnectedError,
  TimeoutError,
  ProtocolRegistrationError,
} from './errors.js';
