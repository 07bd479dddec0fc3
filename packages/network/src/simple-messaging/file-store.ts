/**
 * Attachment storage for the simple messaging protocol: one private temp
 * directory, one file per attachment named by its file_id, plus one empty
 * directory per registered agent.
 */

import fs from 'node:fs';
import fsp from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import {
  DEFAULT_MIME_TYPE,
  type FileAttachment,
  type StoredFileAttachment,
} from '@agent-mesh/protocol';
import { MeshError } from '@agent-mesh/utils/errors';

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;
// file_id values arrive from peers; only plain tokens may become paths
const FILE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * Decode standard base64, rejecting characters outside the alphabet and bad
 * padding instead of silently skipping them.
 */
export function decodeBase64(text: string): Buffer {
  const compact = text.replace(/\s+/g, '');
  if (compact.length % 4 !== 0 || !BASE64_PATTERN.test(compact)) {
    throw new MeshError('Invalid base64 content');
  }
  return Buffer.from(compact, 'base64');
}

export function isValidFileId(fileId: string): boolean {
  return FILE_ID_PATTERN.test(fileId);
}

export interface FileStoreOptions {
  /** Parent directory of the storage root (default: OS temp dir) */
  baseDir?: string;
  /** Prefix of the generated storage root directory name */
  prefix: string;
}

export class FileStore {
  private readonly baseDir: string;
  private readonly prefix: string;
  private rootDir?: string;

  constructor(options: FileStoreOptions) {
    this.baseDir = options.baseDir ?? os.tmpdir();
    this.prefix = options.prefix;
  }

  get isOpen(): boolean {
    return this.rootDir !== undefined;
  }

  /** Storage root, or '' before open() */
  get rootPath(): string {
    return this.rootDir ?? '';
  }

  async open(): Promise<string> {
    if (!this.rootDir) {
      this.rootDir = await fsp.mkdtemp(path.join(this.baseDir, this.prefix));
    }
    return this.rootDir;
  }

  async ensureAgentDir(agentId: string): Promise<string> {
    const root = this.requireRoot();
    if (agentId === '.' || agentId === '..' || path.basename(agentId) !== agentId) {
      throw new MeshError(`Invalid agent ID for storage: ${agentId}`);
    }
    const dir = path.join(root, agentId);
    await fsp.mkdir(dir, { recursive: true });
    return dir;
  }

  /**
   * Decode and write one attachment under a fresh file_id.
   */
  async storeAttachment(attachment: FileAttachment): Promise<StoredFileAttachment> {
    const root = this.requireRoot();
    const data = decodeBase64(attachment.content);
    const fileId = randomUUID();
    await fsp.writeFile(path.join(root, fileId), data, { flag: 'wx' });
    return {
      file_id: fileId,
      filename: attachment.filename,
      size: data.length,
      mime_type: attachment.mime_type ?? DEFAULT_MIME_TYPE,
    };
  }

  async exists(fileId: string): Promise<boolean> {
    const filePath = this.pathFor(fileId);
    if (!filePath) return false;
    try {
      const stat = await fsp.stat(filePath);
      return stat.isFile();
    } catch {
      return false;
    }
  }

  async read(fileId: string): Promise<Buffer> {
    return fsp.readFile(this.requirePath(fileId));
  }

  async remove(fileId: string): Promise<void> {
    await fsp.unlink(this.requirePath(fileId));
  }

  /** Number of stored attachments (agent directories excluded) */
  countFiles(): number {
    if (!this.rootDir || !fs.existsSync(this.rootDir)) return 0;
    return fs.readdirSync(this.rootDir, { withFileTypes: true }).filter((entry) => entry.isFile()).length;
  }

  /** Remove the storage root and everything under it. */
  async destroy(): Promise<void> {
    const root = this.rootDir;
    if (!root) return;
    this.rootDir = undefined;
    await fsp.rm(root, { recursive: true, force: true });
  }

  private requireRoot(): string {
    if (!this.rootDir) {
      throw new MeshError('File store is not open');
    }
    return this.rootDir;
  }

  private pathFor(fileId: string): string | undefined {
    if (!this.rootDir || !isValidFileId(fileId)) return undefined;
    return path.join(this.rootDir, fileId);
  }

  private requirePath(fileId: string): string {
    const filePath = this.pathFor(fileId);
    if (!filePath) {
      throw new MeshError(`Invalid file ID: ${fileId}`);
    }
    return filePath;
  }
}
