/**
 * Simple messaging network protocol.
 *
 * Records direct, broadcast and protocol messages in a bounded history,
 * turns inline base64 attachments into stored files, and answers file
 * download/deletion requests. It does not deliver messages to recipients;
 * the network routes whatever this protocol returns.
 */

import {
  FileAttachmentSchema,
  createProtocolMessage,
  parseMessage,
  type BroadcastMessage,
  type DirectMessage,
  type Message,
  type ProtocolMessage,
  type StoredFileAttachment,
} from '@agent-mesh/protocol';
import { resolveSimpleMessagingConfig, type SimpleMessagingConfig } from '@agent-mesh/config';
import { errorMessage } from '@agent-mesh/utils/errors';
import { createLogger } from '@agent-mesh/utils/logger';
import type { NetworkProtocol, OutboundSender } from '../protocol.js';
import { FileStore } from './file-store.js';
import { MessageHistory } from './message-history.js';
import {
  DELETE_FILE,
  FILE_DELETION_RESPONSE,
  FILE_DOWNLOAD_RESPONSE,
  FILE_NOT_FOUND,
  GET_FILE,
  SIMPLE_MESSAGING_PROTOCOL,
  type FileResponseContent,
  type SimpleMessagingState,
} from './types.js';

const log = createLogger('simple-messaging');

export interface SimpleMessagingOptions extends Partial<SimpleMessagingConfig> {
  /** Parent directory for the storage root (default: OS temp dir) */
  baseDir?: string;
}

interface PendingResponse {
  agentId: string;
  content: FileResponseContent;
}

export class SimpleMessagingProtocol implements NetworkProtocol {
  readonly name = SIMPLE_MESSAGING_PROTOCOL;

  private readonly activeAgents = new Set<string>();
  private readonly history: MessageHistory;
  private readonly files: FileStore;
  private sender?: OutboundSender;
  private lock: Promise<void> = Promise.resolve();

  constructor(options: SimpleMessagingOptions = {}) {
    const { baseDir, ...overrides } = options;
    const config = resolveSimpleMessagingConfig(overrides);
    this.history = new MessageHistory({ maxSize: config.maxHistorySize, trimBatch: config.historyTrimBatch });
    this.files = new FileStore({ baseDir, prefix: config.storagePrefix });
  }

  async initialize(): Promise<boolean> {
    try {
      const root = await this.files.open();
      log.info('Initialized file storage', { path: root });
      return true;
    } catch (err) {
      log.error('Failed to initialize file storage', { error: errorMessage(err) });
      return false;
    }
  }

  async shutdown(): Promise<boolean> {
    return this.exclusive(async () => {
      this.activeAgents.clear();
      this.history.clear();
      try {
        await this.files.destroy();
        log.info('Cleaned up file storage');
      } catch (err) {
        log.error('Error cleaning up file storage', { error: errorMessage(err) });
      }
      return true;
    });
  }

  registerWithNetwork(sender: OutboundSender): boolean {
    if (this.sender) {
      log.warn('Already registered with a network', { network: this.sender.networkId });
      return false;
    }
    this.sender = sender;
    log.info(`Protocol ${this.name} registered with network ${sender.networkId}`);
    return true;
  }

  async registerAgent(agentId: string, _metadata: Record<string, unknown>): Promise<boolean> {
    return this.exclusive(async () => {
      this.activeAgents.add(agentId);
      try {
        await this.files.ensureAgentDir(agentId);
      } catch (err) {
        log.warn('Could not create agent storage directory', { agentId, error: errorMessage(err) });
      }
      log.info(`Registered agent ${agentId} with Simple Messaging protocol`);
      return true;
    });
  }

  async unregisterAgent(agentId: string): Promise<boolean> {
    return this.exclusive(async () => {
      if (this.activeAgents.delete(agentId)) {
        log.info(`Unregistered agent ${agentId} from Simple Messaging protocol`);
      }
      return true;
    });
  }

  async processDirectMessage(message: DirectMessage): Promise<DirectMessage> {
    return this.exclusive(async () => {
      this.history.add(message);
      await this.processFileAttachments(message);
      log.debug('Processing direct message', { from: message.sender_id, to: message.target_agent_id });
      return message;
    });
  }

  async processBroadcastMessage(message: BroadcastMessage): Promise<BroadcastMessage> {
    return this.exclusive(async () => {
      this.history.add(message);
      await this.processFileAttachments(message);
      log.debug('Processing broadcast message', { from: message.sender_id });
      return message;
    });
  }

  async processProtocolMessage(message: ProtocolMessage): Promise<void> {
    const response = await this.exclusive(async (): Promise<PendingResponse | undefined> => {
      this.history.add(message);
      log.debug('Processing protocol message', { from: message.sender_id });

      const action = message.content.action;
      const fileId = message.content.file_id;
      if (typeof fileId !== 'string' || fileId === '') {
        return undefined;
      }
      if (action === GET_FILE) {
        return { agentId: message.sender_id, content: await this.downloadFile(fileId, message) };
      }
      if (action === DELETE_FILE) {
        return { agentId: message.sender_id, content: await this.deleteFile(fileId, message) };
      }
      return undefined;
    });

    // Sent outside the lock so a sender that routes back here cannot deadlock
    if (response) {
      await this.respond(response);
    }
  }

  async handleMessage(message: Record<string, unknown>): Promise<Record<string, unknown> | undefined> {
    const parsed = parseMessage(message);
    if (!parsed.ok) {
      log.debug('Ignoring invalid message', { error: parsed.error });
      return undefined;
    }
    if (parsed.value.message_type === 'protocol_message' && parsed.value.protocol === this.name) {
      await this.processProtocolMessage(parsed.value);
    }
    return undefined;
  }

  getState(): SimpleMessagingState {
    return {
      active_agents: this.activeAgents.size,
      message_history_size: this.history.size,
      stored_files: this.files.countFiles(),
      file_storage_path: this.files.rootPath,
    };
  }

  /** Snapshot of the recorded messages, oldest insert first */
  getMessageHistory(): Message[] {
    return this.history.values();
  }

  getActiveAgents(): string[] {
    return [...this.activeAgents];
  }

  // Private methods

  /**
   * Serialize access to history, agent set and storage; keep the chain alive
   * even if a single operation fails.
   */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const run = this.lock.then(fn);
    this.lock = run.then(() => undefined, () => undefined);
    return run;
  }

  /**
   * Best effort per file: a bad entry is logged and left out of the result.
   */
  private async processFileAttachments(message: DirectMessage | BroadcastMessage): Promise<void> {
    const files = message.content.files;
    if (!Array.isArray(files) || files.length === 0) {
      return;
    }

    const processed: StoredFileAttachment[] = [];
    for (const entry of files) {
      const attachment = FileAttachmentSchema.safeParse(entry);
      if (!attachment.success) {
        continue;
      }
      try {
        const stored = await this.files.storeAttachment(attachment.data);
        processed.push(stored);
        log.debug('Saved file attachment', { filename: stored.filename, fileId: stored.file_id });
      } catch (err) {
        log.error('Error saving file attachment', {
          filename: attachment.data.filename,
          error: errorMessage(err),
        });
      }
    }

    if (processed.length > 0) {
      message.content.files = processed;
    }
  }

  private async downloadFile(fileId: string, request: ProtocolMessage): Promise<FileResponseContent> {
    if (!(await this.files.exists(fileId))) {
      return { action: FILE_DOWNLOAD_RESPONSE, success: false, error: FILE_NOT_FOUND, request_id: request.message_id };
    }

    try {
      const data = await this.files.read(fileId);
      log.debug('Sending file', { fileId, agentId: request.sender_id });
      return {
        action: FILE_DOWNLOAD_RESPONSE,
        success: true,
        file_id: fileId,
        content: data.toString('base64'),
        request_id: request.message_id,
      };
    } catch (err) {
      log.error('Error reading file', { fileId, agentId: request.sender_id, error: errorMessage(err) });
      return {
        action: FILE_DOWNLOAD_RESPONSE,
        success: false,
        error: `Error reading file: ${errorMessage(err)}`,
        request_id: request.message_id,
      };
    }
  }

  private async deleteFile(fileId: string, request: ProtocolMessage): Promise<FileResponseContent> {
    if (!(await this.files.exists(fileId))) {
      return { action: FILE_DELETION_RESPONSE, success: false, error: FILE_NOT_FOUND, request_id: request.message_id };
    }

    try {
      await this.files.remove(fileId);
      log.debug('Deleted file', { fileId, agentId: request.sender_id });
      return { action: FILE_DELETION_RESPONSE, success: true, file_id: fileId, request_id: request.message_id };
    } catch (err) {
      log.error('Error deleting file', { fileId, agentId: request.sender_id, error: errorMessage(err) });
      return {
        action: FILE_DELETION_RESPONSE,
        success: false,
        error: `Error deleting file: ${errorMessage(err)}`,
        request_id: request.message_id,
      };
    }
  }

  private async respond({ agentId, content }: PendingResponse): Promise<void> {
    const sender = this.sender;
    if (!sender) {
      log.warn('No network registered, dropping response', { action: content.action, agentId });
      return;
    }

    const response = createProtocolMessage({
      sender_id: sender.networkId,
      protocol: this.name,
      content: { ...content },
      direction: 'outbound',
      relevant_agent_id: agentId,
    });
    const sent = await sender.sendProtocolMessage(response);
    if (!sent) {
      log.warn('Failed to send response', { action: content.action, agentId });
    }
  }
}
