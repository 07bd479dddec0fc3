/**
 * Transport layer for the Agent Mesh SDK.
 *
 * A transport is a pull-based text channel: the connector reads one frame at
 * a time from its receive loop, so frames arriving in between are buffered.
 */

import { WebSocket, type RawData } from 'ws';
import { ConnectionError, TimeoutError, TransportClosedError, errorMessage } from '@agent-mesh/utils/errors';
import { transportLog } from '@agent-mesh/utils/logger';

export interface Transport {
  readonly isOpen: boolean;
  /** Write one text frame. Rejects if the transport is closed or the write fails. */
  send(data: string): Promise<void>;
  /**
   * Resolve with the next frame in arrival order. Once the peer has closed and
   * the buffer is drained, rejects with TransportClosedError.
   */
  receive(): Promise<string>;
  /** Close the transport; safe to call more than once. */
  close(): Promise<void>;
}

export interface TransportOptions {
  timeoutMs: number;
}

export type TransportFactory = (url: string, options: TransportOptions) => Promise<Transport>;

interface PendingReceive {
  resolve: (frame: string) => void;
  reject: (err: Error) => void;
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf-8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf-8');
  return Buffer.from(data).toString('utf-8');
}

/**
 * Transport over a `ws` WebSocket client.
 */
export class WebSocketTransport implements Transport {
  private readonly socket: WebSocket;
  private inbox: string[] = [];
  private waiters: PendingReceive[] = [];
  private failure?: Error;
  private closePromise?: Promise<void>;

  constructor(socket: WebSocket) {
    this.socket = socket;

    socket.on('message', (data: RawData) => this.handleFrame(rawDataToString(data)));

    socket.on('error', (err: Error) => {
      transportLog.debug('WebSocket error', { error: err.message });
      this.fail(new ConnectionError(err.message));
    });

    socket.on('close', (code: number) => {
      this.fail(new TransportClosedError(`code ${code}`));
    });
  }

  get isOpen(): boolean {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(data: string): Promise<void> {
    if (!this.isOpen) {
      return Promise.reject(this.failure ?? new TransportClosedError());
    }
    return new Promise((resolve, reject) => {
      this.socket.send(data, (err?: Error) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  receive(): Promise<string> {
    const frame = this.inbox.shift();
    if (frame !== undefined) {
      return Promise.resolve(frame);
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  close(): Promise<void> {
    if (this.closePromise) return this.closePromise;

    if (this.socket.readyState === WebSocket.CLOSED) {
      this.closePromise = Promise.resolve();
      return this.closePromise;
    }

    this.closePromise = new Promise((resolve) => {
      this.socket.once('close', () => resolve());
    });
    if (this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.terminate();
    } else {
      this.socket.close(1000);
    }
    return this.closePromise;
  }

  private handleFrame(frame: string): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(frame);
    } else {
      this.inbox.push(frame);
    }
  }

  /** First failure wins; an error followed by a close keeps the error. */
  private fail(err: Error): void {
    if (!this.failure) {
      this.failure = err;
    }
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter.reject(this.failure);
    }
  }
}

/**
 * Open a WebSocket and resolve once it is ready for traffic.
 */
export function openWebSocketTransport(url: string, options: TransportOptions): Promise<Transport> {
  return new Promise((resolve, reject) => {
    const socket = new WebSocket(url);
    const transport = new WebSocketTransport(socket);
    let settled = false;

    const timeout = setTimeout(() => {
      if (settled) return;
      settled = true;
      socket.terminate();
      reject(new TimeoutError(`open ${url}`, options.timeoutMs));
    }, options.timeoutMs);

    socket.once('open', () => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      resolve(transport);
    });

    socket.once('error', (err: Error) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      reject(new ConnectionError(`${url}: ${errorMessage(err)}`));
    });
  });
}
