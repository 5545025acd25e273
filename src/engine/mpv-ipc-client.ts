/**
 * mpv JSON IPC client
 * One persistent Unix socket connection carrying line-delimited JSON requests,
 * their responses (matched by request_id) and asynchronous event messages.
 */

import * as net from 'net';
import { EventEmitter } from 'events';
import { Logger } from '@nestjs/common';
import { EngineCommandFailedError, errorMessage } from '../common/errors';

export interface MpvEventMessage {
  event: string;
  reason?: string;
  name?: string;
  id?: number;
  data?: unknown;
}

export interface MpvResponseMessage {
  requestId: number;
  error: string;
  data?: unknown;
}

export type MpvMessage = { type: 'event'; event: MpvEventMessage } | { type: 'response'; response: MpvResponseMessage };

export interface MpvConnectOptions {
  timeoutMs: number;
  pollMs: number;
  requestTimeoutMs: number;
  // Aborted when the engine process dies while we are still waiting for its socket
  signal?: AbortSignal;
}

interface PendingRequest {
  command: unknown[];
  resolve: (data: unknown) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

const RETRYABLE_CONNECT_ERRORS = new Set(['ENOENT', 'ECONNREFUSED', 'EAGAIN']);

/**
 * Parse one line from the socket. Returns null for anything that is not an mpv message.
 */
export function parseMpvMessage(line: string): MpvMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch {
    return null;
  }

  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }

  if ('event' in parsed && typeof parsed.event === 'string') {
    const event: MpvEventMessage = { event: parsed.event };
    if ('reason' in parsed && typeof parsed.reason === 'string') event.reason = parsed.reason;
    if ('name' in parsed && typeof parsed.name === 'string') event.name = parsed.name;
    if ('id' in parsed && typeof parsed.id === 'number') event.id = parsed.id;
    if ('data' in parsed) event.data = parsed.data;
    return { type: 'event', event };
  }

  if ('request_id' in parsed && typeof parsed.request_id === 'number' && 'error' in parsed && typeof parsed.error === 'string') {
    return {
      type: 'response',
      response: {
        requestId: parsed.request_id,
        error: parsed.error,
        data: 'data' in parsed ? parsed.data : undefined,
      },
    };
  }

  return null;
}

export class MpvIpcClient extends EventEmitter {
  private readonly logger = new Logger(MpvIpcClient.name);
  private buffer = '';
  private nextRequestId = 1;
  private readonly pending = new Map<number, PendingRequest>();
  private closed = false;

  private constructor(
    private readonly socket: net.Socket,
    private readonly requestTimeoutMs: number,
  ) {
    super();

    socket.setEncoding('utf8');
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (err) => {
      this.logger.warn(`Socket error: ${err.message}`);
    });
    socket.on('close', () => {
      this.failPending(new Error('mpv IPC socket closed'));
      this.closed = true;
      this.emit('close');
    });
  }

  /**
   * Connect to the socket, polling until mpv has created it or the timeout expires
   */
  static async connect(socketPath: string, options: MpvConnectOptions): Promise<MpvIpcClient> {
    const deadline = Date.now() + options.timeoutMs;
    let lastError = 'timed out';

    while (Date.now() < deadline) {
      if (options.signal?.aborted) {
        throw new Error('engine process exited before its control socket was ready');
      }

      try {
        const socket = await MpvIpcClient.openSocket(socketPath);
        return new MpvIpcClient(socket, options.requestTimeoutMs);
      } catch (error) {
        const code =
          typeof error === 'object' && error !== null && 'code' in error ? String(error.code) : '';
        if (!RETRYABLE_CONNECT_ERRORS.has(code)) {
          throw error;
        }
        lastError = errorMessage(error);
      }

      await new Promise((resolve) => setTimeout(resolve, options.pollMs));
    }

    throw new Error(`control socket ${socketPath} not ready after ${options.timeoutMs}ms (${lastError})`);
  }

  private static openSocket(socketPath: string): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection(socketPath);
      const onError = (err: Error) => {
        socket.destroy();
        reject(err);
      };
      socket.once('error', onError);
      socket.once('connect', () => {
        socket.off('error', onError);
        resolve(socket);
      });
    });
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Send a command and wait for mpv's reply. Resolves with the reply's data.
   */
  request(command: unknown[]): Promise<unknown> {
    if (this.closed) {
      return Promise.reject(new Error('mpv IPC socket is closed'));
    }

    const requestId = this.nextRequestId++;
    const payload = JSON.stringify({ command, request_id: requestId }) + '\n';

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new Error(`mpv did not answer ${JSON.stringify(command)} within ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);

      this.pending.set(requestId, { command, resolve, reject, timer });
      this.socket.write(payload);
    });
  }

  /**
   * Ask mpv to push property-change events for a property
   */
  async observeProperty(id: number, name: string): Promise<void> {
    await this.request(['observe_property', id, name]);
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.failPending(new Error('mpv IPC client closed'));
    this.socket.destroy();
  }

  private onData(chunk: string): void {
    this.buffer += chunk;

    let newline = this.buffer.indexOf('\n');
    while (newline !== -1) {
      const line = this.buffer.slice(0, newline).trim();
      this.buffer = this.buffer.slice(newline + 1);
      if (line) {
        this.onLine(line);
      }
      newline = this.buffer.indexOf('\n');
    }
  }

  private onLine(line: string): void {
    const message = parseMpvMessage(line);
    if (!message) {
      this.logger.debug(`Ignoring unrecognized IPC line: ${line.substring(0, 200)}`);
      return;
    }

    if (message.type === 'event') {
      this.emit('event', message.event);
      return;
    }

    const { response } = message;
    const pending = this.pending.get(response.requestId);
    if (!pending) {
      return;
    }

    this.pending.delete(response.requestId);
    clearTimeout(pending.timer);

    if (response.error === 'success') {
      pending.resolve(response.data);
    } else {
      pending.reject(new EngineCommandFailedError(JSON.stringify(pending.command), response.error));
    }
  }

  private failPending(error: Error): void {
    for (const pending of this.pending.values()) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
    this.pending.clear();
  }
}
