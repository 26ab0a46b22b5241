/**
 * Factory functions for opening and serving transports.
 *
 * Picks the implementation from the endpoint kind.
 */

import type { TransportEndpoint } from '../common/types/transport.js';
import type { Connection } from '../transport/connection.js';
import { listenPipes, openPipes } from '../transport/pipes.js';
import {
  listenSocket,
  openSocket,
  type ListenOptions,
  type OpenOptions,
  type TransportServer,
} from '../transport/sockets.js';

export type OpenTransportOptions = OpenOptions & { platform?: NodeJS.Platform };

export type OpenTransport = (
  endpoint: TransportEndpoint,
  options: OpenTransportOptions,
) => Promise<Connection>;

export const openTransport: OpenTransport = (endpoint, options) => {
  switch (endpoint.kind) {
    case 'tcp':
    case 'local':
      return openSocket(endpoint, options);
    case 'pipe':
      return openPipes(endpoint, options);
  }
};

export function listenTransport(
  endpoint: TransportEndpoint,
  onConnection: (connection: Connection) => void,
  options: ListenOptions = {},
): Promise<TransportServer> {
  switch (endpoint.kind) {
    case 'tcp':
    case 'local':
      return listenSocket(endpoint, onConnection, options);
    case 'pipe':
      return listenPipes(endpoint, onConnection, options);
  }
}
