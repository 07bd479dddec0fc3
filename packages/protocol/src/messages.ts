/**
 * Message and envelope codec helpers.
 */

import {
  EnvelopeSchema,
  MessageSchema,
  DirectMessageSchema,
  BroadcastMessageSchema,
  ProtocolMessageSchema,
  type Envelope,
  type Message,
  type MessageEnvelope,
  type DirectMessage,
  type BroadcastMessage,
  type ProtocolMessage,
} from './types.js';

export type DecodeResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: string };

/**
 * Parse one wire frame into an envelope.
 */
export function decodeEnvelope(text: string): DecodeResult<Envelope> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, error: `Invalid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }

  const parsed = EnvelopeSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => i.message).join('; ') };
  }
  return { ok: true, value: parsed.data };
}

export function encodeEnvelope(envelope: Envelope): string {
  return JSON.stringify(envelope);
}

/**
 * Validate a message record (e.g. the `data` of a message envelope) into a
 * typed message, filling `message_id`, `timestamp` and `content` when absent.
 */
export function parseMessage(data: unknown): DecodeResult<Message> {
  const parsed = MessageSchema.safeParse(data);
  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ') };
  }
  return { ok: true, value: parsed.data };
}

export function toMessageEnvelope(message: Message): MessageEnvelope {
  return { type: 'message', data: { ...message } };
}

export function isProtocolMessage(message: Message): message is ProtocolMessage {
  return message.message_type === 'protocol_message';
}

export function createDirectMessage(
  params: Omit<Partial<DirectMessage>, 'message_type'> & Pick<DirectMessage, 'target_agent_id'>
): DirectMessage {
  return DirectMessageSchema.parse({ ...params, message_type: 'direct_message' });
}

export function createBroadcastMessage(
  params: Omit<Partial<BroadcastMessage>, 'message_type'> = {}
): BroadcastMessage {
  return BroadcastMessageSchema.parse({ ...params, message_type: 'broadcast_message' });
}

export function createProtocolMessage(
  params: Omit<Partial<ProtocolMessage>, 'message_type'> & Pick<ProtocolMessage, 'protocol'>
): ProtocolMessage {
  return ProtocolMessageSchema.parse({ ...params, message_type: 'protocol_message' });
}
