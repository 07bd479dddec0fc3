/**
 * Error Types for Agent Mesh
 *
 * Re-exports error classes from @agent-mesh/utils so SDK consumers can import
 * them from either '@agent-mesh/sdk' or '@agent-mesh/sdk/errors'.
 */

export {
  MeshError,
  ConnectionError,
  TransportClosedError,
  NotConnectedError,
  TimeoutError,
  ProtocolRegistrationError,
} from '@agent-mesh/utils/errors';
