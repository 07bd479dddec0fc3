import type { Message } from '@agent-mesh/protocol';

export interface MessageHistoryOptions {
  maxSize: number;
  /** How many of the oldest entries to evict once maxSize is exceeded */
  trimBatch: number;
}

/**
 * Bounded message_id -> message cache.
 *
 * Eviction is batched: the first insert past maxSize drops the oldest
 * `trimBatch` entries by timestamp, so the size stays within
 * [maxSize - trimBatch + 1, maxSize] after any trim.
 */
export class MessageHistory {
  private readonly entries = new Map<string, Message>();
  private readonly maxSize: number;
  private readonly trimBatch: number;

  constructor(options: MessageHistoryOptions) {
    this.maxSize = options.maxSize;
    this.trimBatch = options.trimBatch;
  }

  get size(): number {
    return this.entries.size;
  }

  get capacity(): number {
    return this.maxSize;
  }

  /**
   * Insert or replace by message_id. Returns how many entries were evicted.
   */
  add(message: Message): number {
    this.entries.set(message.message_id, message);
    if (this.entries.size <= this.maxSize) {
      return 0;
    }

    const oldest = [...this.entries.values()]
      .sort((a, b) => a.timestamp - b.timestamp)
      .slice(0, this.trimBatch);
    for (const entry of oldest) {
      this.entries.delete(entry.message_id);
    }
    return oldest.length;
  }

  get(messageId: string): Message | undefined {
    return this.entries.get(messageId);
  }

  has(messageId: string): boolean {
    return this.entries.has(messageId);
  }

  /** Snapshot in insertion order */
  values(): Message[] {
    return [...this.entries.values()];
  }

  clear(): void {
    this.entries.clear();
  }
}
