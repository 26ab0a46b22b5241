/**
 * Content-Length framing.
 *
 * Implements the base protocol shared with LSP: each message is a header
 * block (`Content-Length: N`, optionally `Content-Type`) terminated by
 * `\r\n\r\n`, followed by N bytes of UTF-8 JSON.
 */

import { ProtocolError } from '../common/errors.js';
import { jsonRpcMessageSchema } from '../common/schemas.js';
import type { JsonRpcMessage } from '../common/types/protocol.js';

const HEADER_SEPARATOR = Buffer.from('\r\n\r\n', 'ascii');
const CONTENT_LENGTH = /^content-length:\s*(\d+)\s*$/i;

/** Largest header block we accept before declaring the stream malformed. */
const MAX_HEADER_BYTES = 8 * 1024;

export function encodeFrame(message: JsonRpcMessage): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, body]);
}

/**
 * Incremental decoder. Feed it chunks as they arrive; it returns every
 * complete message and keeps the remainder buffered.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  /** Bytes received but not yet decoded into a message. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  /**
   * Append a chunk and drain complete frames.
   * @throws ProtocolError when a header or body is malformed
   */
  push(chunk: Buffer): JsonRpcMessage[] {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const messages: JsonRpcMessage[] = [];

    while (this.buffer.length > 0) {
      const headerEnd = this.buffer.indexOf(HEADER_SEPARATOR);
      if (headerEnd === -1) {
        if (this.buffer.length > MAX_HEADER_BYTES) {
          throw new ProtocolError('malformedFrame', 'Frame header exceeds maximum size');
        }
        break;
      }

      const contentLength = parseContentLength(this.buffer.subarray(0, headerEnd).toString('ascii'));
      const contentStart = headerEnd + HEADER_SEPARATOR.length;
      const contentEnd = contentStart + contentLength;

      if (this.buffer.length < contentEnd) {
        // Not enough data yet
        break;
      }

      const body = this.buffer.subarray(contentStart, contentEnd).toString('utf8');
      this.buffer = this.buffer.subarray(contentEnd);
      messages.push(parseBody(body));
    }

    return messages;
  }
}

function parseContentLength(header: string): number {
  for (const line of header.split('\r\n')) {
    const match = CONTENT_LENGTH.exec(line);
    if (match) {
      return Number.parseInt(match[1], 10);
    }
  }
  throw new ProtocolError('malformedFrame', `Missing Content-Length header: ${JSON.stringify(header)}`);
}

function parseBody(body: string): JsonRpcMessage {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err) {
    throw new ProtocolError('malformedFrame', 'Frame body is not valid JSON', { cause: err });
  }
  const parsed = jsonRpcMessageSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProtocolError('malformedFrame', 'Frame body is not a JSON-RPC 2.0 message', {
      cause: parsed.error,
    });
  }
  return parsed.data;
}
