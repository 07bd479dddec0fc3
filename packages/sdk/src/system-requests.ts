import { encodeEnvelope, type SystemRequestEnvelope } from '@agent-mesh/protocol';
import { errorMessage } from '@agent-mesh/utils/errors';
import { transportLog } from '@agent-mesh/utils/logger';
import type { Transport } from './transport.js';

/**
 * Write a system request envelope. Fire-and-forget: the response, if any,
 * arrives later through the receive loop.
 */
export async function sendSystemRequest(
  transport: Transport,
  command: string,
  params: Record<string, unknown> = {}
): Promise<boolean> {
  const envelope: SystemRequestEnvelope = { ...params, type: 'system_request', command };
  try {
    await transport.send(encodeEnvelope(envelope));
    transportLog.debug('System request sent', { command });
    return true;
  } catch (err) {
    transportLog.error('Failed to send system request', { command, error: errorMessage(err) });
    return false;
  }
}
