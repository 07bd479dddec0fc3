/**
 * Agent Mesh Wire Types
 * @agent-mesh/protocol
 *
 * Envelopes and messages exchanged between agents and a network server.
 * Field names are snake_case because they are the JSON wire format.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';

// =============================================================================
// Messages
// =============================================================================


export const MessageDirectionSchema = z.enum(['inbound', 'outbound']);
export type MessageDirection = z.infer<typeof MessageDirectionSchema>;

const baseMessageShape = {
  /** Unique message ID */
  message_id: z.string().min(1).default(() => randomUUID()),
  /** Sending agent; the connector fills it when empty */
  sender_id: z.string().default(''),
  /** Creation time (Unix ms) */
  timestamp: z.number().default(() => Date.now()),
  /** Structured message body */
  content: z.record(z.unknown()).default({}),
  metadata: z.record(z.unknown()).optional(),
  text_representation: z.string().optional(),
  requires_response: z.boolean().optional(),
};

export const DirectMessageSchema = z.object({
  ...baseMessageShape,
  message_type: z.literal('direct_message'),
  /** Recipient agent ID */
  target_agent_id: z.string().min(1),
});
export type DirectMessage = z.infer<typeof DirectMessageSchema>;

export const BroadcastMessageSchema = z.object({
  ...baseMessageShape,
  message_type: z.literal('broadcast_message'),
  /** Agents that should not receive the broadcast */
  exclude_agent_ids: z.array(z.string()).optional(),
});
export type BroadcastMessage = z.infer<typeof BroadcastMessageSchema>;

export const ProtocolMessageSchema = z.object({
  ...baseMessageShape,
  message_type: z.literal('protocol_message'),
  /** Name of the network protocol handling this message */
  protocol: z.string().min(1),
  /** Set once per hop: outbound when sent, inbound when consumed */
  direction: MessageDirectionSchema.optional(),
  /** Agent on whose behalf the hop happens */
  relevant_agent_id: z.string().optional(),
});
export type ProtocolMessage = z.infer<typeof ProtocolMessageSchema>;

export const MessageSchema = z.discriminatedUnion('message_type', [
  DirectMessageSchema,
  BroadcastMessageSchema,
  ProtocolMessageSchema,
]);
export type Message = z.infer<typeof MessageSchema>;
export type MessageType = Message['message_type'];

// =============================================================================
// File attachments
// =============================================================================

/** Attachment as sent by an agent: inline base64 content */
export const FileAttachmentSchema = z.object({
  content: z.string(),
  filename: z.string(),
  mime_type: z.string().nullish(),
});
export type FileAttachment = z.infer<typeof FileAttachmentSchema>;

/** Attachment after the network stored it: a reference instead of content */
export const StoredFileAttachmentSchema = z.object({
  file_id: z.string(),
  filename: z.string(),
  size: z.number().int().nonnegative(),
  mime_type: z.string(),
});
export type StoredFileAttachment = z.infer<typeof StoredFileAttachmentSchema>;

export const DEFAULT_MIME_TYPE = 'application/octet-stream';

// =============================================================================
// Envelopes
// =============================================================================

export const MessageEnvelopeSchema = z.object({
  type: z.literal('message'),
  data: z.record(z.unknown()),
});
export type MessageEnvelope = z.infer<typeof MessageEnvelopeSchema>;

/** Control-plane request; command parameters sit beside `command` */
export const SystemRequestEnvelopeSchema = z
  .object({
    type: z.literal('system_request'),
    command: z.string(),
  })
  .passthrough();
export type SystemRequestEnvelope = z.infer<typeof SystemRequestEnvelopeSchema>;

/** Control-plane response; echoes the command, extra fields vary per command */
export const SystemResponseEnvelopeSchema = z
  .object({
    type: z.literal('system_response'),
    command: z.string(),
    success: z.boolean(),
  })
  .passthrough();
export type SystemResponseEnvelope = z.infer<typeof SystemResponseEnvelopeSchema>;

export const EnvelopeSchema = z.discriminatedUnion('type', [
  MessageEnvelopeSchema,
  SystemRequestEnvelopeSchema,
  SystemResponseEnvelopeSchema,
]);
export type Envelope = z.infer<typeof EnvelopeSchema>;
export type EnvelopeKind = Envelope['type'];
