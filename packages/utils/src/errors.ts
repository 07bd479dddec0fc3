/**
 * Error types for Agent Mesh
 *
 * Single source of truth for typed error classes shared by the SDK and the
 * network-side protocol host.
 */

export class MeshError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MeshError';
  }
}

export class ConnectionError extends MeshError {
  constructor(message: string) {
    super(`Connection error: ${message}`);
    this.name = 'ConnectionError';
  }
}

export class TransportClosedError extends MeshError {
  constructor(reason?: string) {
    super(reason ? `Transport closed: ${reason}` : 'Transport closed');
    this.name = 'TransportClosedError';
  }
}

export class NotConnectedError extends MeshError {
  constructor(agentId: string) {
    super(`Agent ${agentId} is not connected to a network`);
    this.name = 'NotConnectedError';
  }
}

export class TimeoutError extends MeshError {
  constructor(operation: string, timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms: ${operation}`);
    this.name = 'TimeoutError';
  }
}

export class ProtocolRegistrationError extends MeshError {
  constructor(protocolName: string, reason: string) {
    super(`Cannot register protocol "${protocolName}": ${reason}`);
    this.name = 'ProtocolRegistrationError';
  }
}

/**
 * Render an unknown thrown value as a message string.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
