/**
 * In-Process Transport
 *
 * A MessageTransport pair that passes messages between a client and a server
 * living in the same process. Delivery is deferred to a microtask and every
 * message is copied, so neither side can observe the other's objects or
 * re-enter its own handler.
 *
 * ESM module — use .js extensions on imports.
 */

import type { JsonRpcMessage, MessageTransport } from '../common/types/protocol.js';

type MessageHandler = (message: JsonRpcMessage) => void;
type CloseHandler = (error?: Error) => void;

interface Side {
  messageHandlers: MessageHandler[];
  closeHandlers: CloseHandler[];
}

/**
 * Creates a pair of linked in-process transports.
 * Messages sent on one side are received on the other; closing either side
 * closes both.
 */
export function createInProcessTransportPair(): {
  serverTransport: MessageTransport;
  clientTransport: MessageTransport;
} {
  const server: Side = { messageHandlers: [], closeHandlers: [] };
  const client: Side = { messageHandlers: [], closeHandlers: [] };
  let closed = false;

  const closeBoth = (): void => {
    if (closed) {
      return;
    }
    closed = true;
    const handlers = [...server.closeHandlers, ...client.closeHandlers];
    for (const side of [server, client]) {
      side.messageHandlers.length = 0;
      side.closeHandlers.length = 0;
    }
    for (const handler of handlers) {
      handler(undefined);
    }
  };

  const makeTransport = (self: Side, peer: Side): MessageTransport => ({
    send(message: JsonRpcMessage): void {
      if (closed) {
        return;
      }
      const copy = structuredClone(message);
      queueMicrotask(() => {
        if (closed) {
          return;
        }
        for (const handler of peer.messageHandlers) {
          handler(copy);
        }
      });
    },
    onMessage(handler: MessageHandler): void {
      self.messageHandlers.push(handler);
    },
    onClose(handler: CloseHandler): void {
      if (closed) {
        queueMicrotask(() => handler(undefined));
        return;
      }
      self.closeHandlers.push(handler);
    },
    close: closeBoth,
  });

  return {
    serverTransport: makeTransport(server, client),
    clientTransport: makeTransport(client, server),
  };
}
