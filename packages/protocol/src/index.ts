/**
 * @agent-mesh/protocol
 *
 * Wire envelopes, the message model and system command names shared by the
 * SDK connector and network-side protocols.
 */

export {
  DEFAULT_MIME_TYPE,
  MessageDirectionSchema,
  DirectMessageSchema,
  BroadcastMessageSchema,
  ProtocolMessageSchema,
  MessageSchema,
  FileAttachmentSchema,
  StoredFileAttachmentSchema,
  MessageEnvelopeSchema,
  SystemRequestEnvelopeSchema,
  SystemResponseEnvelopeSchema,
  EnvelopeSchema,
  type MessageType,
  type MessageDirection,
  type DirectMessage,
  type BroadcastMessage,
  type ProtocolMessage,
  type Message,
  type FileAttachment,
  type StoredFileAttachment,
  type MessageEnvelope,
  type SystemRequestEnvelope,
  type SystemResponseEnvelope,
  type Envelope,
  type EnvelopeKind,
} from './types.js';

export {
  decodeEnvelope,
  encodeEnvelope,
  parseMessage,
  toMessageEnvelope,
  isProtocolMessage,
  createDirectMessage,
  createBroadcastMessage,
  createProtocolMessage,
  type DecodeResult,
} from './messages.js';

export {
  REGISTER_AGENT,
  LIST_AGENTS,
  LIST_PROTOCOLS,
  GET_PROTOCOL_MANIFEST,
  SYSTEM_COMMANDS,
  type SystemCommand,
} from './system-commands.js';
