/**
 * Connection
 *
 * Turns a duplex byte channel (socket, or a read pipe plus a write pipe) into
 * a MessageTransport: one read loop decoding Content-Length frames, one
 * serialized write path, an optional idle timeout, and an explicit state
 * machine that never leaves `closed` or `failed`.
 *
 * ESM module — use .js extensions on imports.
 */

import type { Readable, Writable } from 'stream';
import { ConnectionLostError, type BuildLinkError } from '../common/errors.js';
import type { JsonRpcMessage, MessageTransport } from '../common/types/protocol.js';
import type { ConnectionState, ConnectionStatus } from '../common/types/transport.js';
import { encodeFrame, FrameDecoder } from './framing.js';

/** The raw bytes underneath a Connection. */
export interface ByteChannel {
  readonly readable: Readable;
  readonly writable: Writable;
  /** Release the OS resources behind the channel. Called at most once. */
  destroy(): void;
}

export interface ConnectionOptions {
  /** Human-readable address for logs and errors */
  label: string;
  /** Fail the connection after this long without traffic in either direction (0 = never) */
  idleTimeoutMs?: number;
}

const ORDER: Record<ConnectionStatus, number> = {
  disconnected: 0,
  connecting: 1,
  handshaking: 2,
  ready: 3,
  closed: 4,
  failed: 4,
};

type CloseHandler = (error?: Error) => void;

export class Connection implements MessageTransport {
  readonly label: string;
  private state: ConnectionState = { status: 'disconnected' };
  private channel: ByteChannel | null = null;
  private decoder = new FrameDecoder();
  private messageHandlers: Array<(message: JsonRpcMessage) => void> = [];
  private closeHandlers: CloseHandler[] = [];
  private idleTimeoutMs: number;
  private idleTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(options: ConnectionOptions) {
    this.label = options.label;
    this.idleTimeoutMs = options.idleTimeoutMs ?? 0;
  }

  get status(): ConnectionStatus {
    return this.state.status;
  }

  get currentState(): ConnectionState {
    return this.state;
  }

  get isOpen(): boolean {
    return this.state.status === 'handshaking' || this.state.status === 'ready';
  }

  /** Mark that an open attempt is underway. */
  markConnecting(): void {
    this.transition({ status: 'connecting' });
  }

  /** Bind the opened channel and start the read loop. */
  attach(channel: ByteChannel): void {
    if (this.channel) {
      throw new Error(`Connection ${this.label} already has a channel`);
    }
    if (this.isTerminal()) {
      channel.destroy();
      return;
    }
    this.channel = channel;
    this.transition({ status: 'handshaking' });

    channel.readable.on('data', (chunk: Buffer | string) => {
      this.onData(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    });
    channel.readable.on('end', () => {
      this.fail(new ConnectionLostError(`Peer closed connection ${this.label}`));
    });
    channel.readable.on('close', () => {
      this.fail(new ConnectionLostError(`Connection ${this.label} closed`));
    });
    channel.readable.on('error', (err: Error) => {
      this.fail(new ConnectionLostError(`Read failed on ${this.label}: ${err.message}`, { cause: err }));
    });
    channel.writable.on('error', (err: Error) => {
      this.fail(new ConnectionLostError(`Write failed on ${this.label}: ${err.message}`, { cause: err }));
    });

    this.touch();
  }

  /** The protocol handshake completed. */
  markReady(): void {
    this.transition({ status: 'ready' });
  }

  /**
   * Write one frame. Throws ConnectionLostError once the connection is
   * closed or failed.
   */
  send(message: JsonRpcMessage): void {
    if (!this.channel || !this.isOpen) {
      throw this.closedError();
    }
    this.channel.writable.write(encodeFrame(message));
    this.touch();
  }

  onMessage(handler: (message: JsonRpcMessage) => void): void {
    this.messageHandlers.push(handler);
  }

  onClose(handler: CloseHandler): void {
    if (this.isTerminal()) {
      const reason = this.state.status === 'failed' ? this.state.reason : undefined;
      queueMicrotask(() => handler(reason));
      return;
    }
    this.closeHandlers.push(handler);
  }

  /** Close the connection. Calling it again has no further effect. */
  close(): void {
    if (this.isTerminal()) {
      return;
    }
    this.state = { status: 'closed' };
    this.release();
    this.emitClose(undefined);
  }

  /** Transition to `failed` and release everything. No-op once terminal. */
  fail(reason: BuildLinkError | Error): void {
    if (this.isTerminal()) {
      return;
    }
    console.warn(`[Connection] ${this.label} failed: ${reason.message}`);
    this.state = { status: 'failed', reason };
    this.release();
    this.emitClose(reason);
  }

  private onData(chunk: Buffer): void {
    if (this.isTerminal()) {
      return;
    }
    this.touch();
    let messages: JsonRpcMessage[];
    try {
      messages = this.decoder.push(chunk);
    } catch (err) {
      // A malformed frame leaves the stream unrecoverable
      this.fail(err instanceof Error ? err : new Error(String(err)));
      return;
    }
    for (const message of messages) {
      if (this.isTerminal()) {
        return;
      }
      for (const handler of this.messageHandlers) {
        handler(message);
      }
    }
  }

  private touch(): void {
    if (this.idleTimeoutMs <= 0 || this.isTerminal()) {
      return;
    }
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
    }
    this.idleTimer = setTimeout(() => {
      this.fail(new ConnectionLostError(`No traffic on ${this.label} for ${this.idleTimeoutMs}ms`));
    }, this.idleTimeoutMs);
    this.idleTimer.unref?.();
  }

  private release(): void {
    if (this.idleTimer) {
      clearTimeout(this.idleTimer);
      this.idleTimer = null;
    }
    const channel = this.channel;
    this.channel = null;
    channel?.destroy();
  }

  private emitClose(reason: Error | undefined): void {
    const handlers = this.closeHandlers;
    this.closeHandlers = [];
    this.messageHandlers = [];
    for (const handler of handlers) {
      handler(reason);
    }
  }

  private transition(next: ConnectionState): void {
    if (this.isTerminal()) {
      return;
    }
    if (ORDER[next.status] < ORDER[this.state.status]) {
      throw new Error(
        `Illegal connection transition ${this.state.status} -> ${next.status} (${this.label})`,
      );
    }
    this.state = next;
  }

  private isTerminal(): boolean {
    return this.state.status === 'closed' || this.state.status === 'failed';
  }

  private closedError(): ConnectionLostError {
    if (this.state.status === 'failed') {
      return new ConnectionLostError(`Connection ${this.label} failed: ${this.state.reason.message}`, {
        cause: this.state.reason,
      });
    }
    return new ConnectionLostError(`Connection ${this.label} is ${this.state.status}`);
  }
}
