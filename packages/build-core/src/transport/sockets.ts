/**
 * TCP and local-socket transports.
 *
 * Local sockets are Unix domain sockets on POSIX and named pipes
 * (`\\.\pipe\name`) on Windows; `net` treats both as a path.
 */

import fs from 'fs';
import net from 'net';
import { TransportError, toTransportError } from '../common/errors.js';
import type { LocalEndpoint, TcpEndpoint, TransportEndpoint } from '../common/types/transport.js';
import { Connection, type ByteChannel } from './connection.js';
import { assertValidEndpoint, describeEndpoint } from './endpoint.js';

export interface OpenOptions {
  /** Give up connecting after this long */
  timeoutMs: number;
  idleTimeoutMs?: number;
}

export function socketChannel(socket: net.Socket): ByteChannel {
  return {
    readable: socket,
    writable: socket,
    destroy: () => socket.destroy(),
  };
}

function connectOptions(endpoint: TcpEndpoint | LocalEndpoint): net.NetConnectOpts {
  return endpoint.kind === 'tcp' ? { host: endpoint.host, port: endpoint.port } : { path: endpoint.path };
}

/**
 * Open a socket and wrap it in a Connection in the `handshaking` state.
 * @throws TransportError
 */
export function openSocket(endpoint: TcpEndpoint | LocalEndpoint, options: OpenOptions): Promise<Connection> {
  try {
    assertValidEndpoint(endpoint);
  } catch (err) {
    return Promise.reject(err);
  }
  const label = describeEndpoint(endpoint);
  const connection = new Connection({ label, idleTimeoutMs: options.idleTimeoutMs });
  connection.markConnecting();

  return new Promise<Connection>((resolve, reject) => {
    let socket: net.Socket;
    try {
      socket = net.connect(connectOptions(endpoint));
    } catch (err) {
      const error = toTransportError(err, label);
      connection.fail(error);
      reject(error);
      return;
    }

    const timer = setTimeout(() => {
      socket.destroy();
      const error = new TransportError('timeout', `Timed out connecting to ${label} after ${options.timeoutMs}ms`);
      connection.fail(error);
      reject(error);
    }, options.timeoutMs);

    const onError = (err: Error): void => {
      clearTimeout(timer);
      socket.destroy();
      const error = toTransportError(err, label);
      connection.fail(error);
      reject(error);
    };

    socket.once('error', onError);
    socket.once('connect', () => {
      clearTimeout(timer);
      socket.removeListener('error', onError);
      connection.attach(socketChannel(socket));
      resolve(connection);
    });
  });
}

/** Whether something accepts connections on a local socket path. */
export function isSocketAlive(socketPath: string, timeoutMs = 500): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const socket = net.connect({ path: socketPath });
    const done = (alive: boolean): void => {
      clearTimeout(timer);
      socket.destroy();
      resolve(alive);
    };
    const timer = setTimeout(() => done(false), timeoutMs);
    socket.once('connect', () => done(true));
    socket.once('error', () => done(false));
  });
}

export interface TransportServer {
  /** The bound endpoint (for tcp with port 0, the actual port) */
  readonly endpoint: TransportEndpoint;
  close(): Promise<void>;
}

export interface ListenOptions {
  idleTimeoutMs?: number;
  platform?: NodeJS.Platform;
}

/**
 * Accept connections on a TCP port or local socket. A stale socket file left
 * behind by a dead server is removed first; a live one is an error.
 */
export async function listenSocket(
  endpoint: TcpEndpoint | LocalEndpoint,
  onConnection: (connection: Connection) => void,
  options: ListenOptions = {},
): Promise<TransportServer> {
  assertValidEndpoint(endpoint);
  const platform = options.platform ?? process.platform;

  if (endpoint.kind === 'local' && platform !== 'win32' && fs.existsSync(endpoint.path)) {
    if (await isSocketAlive(endpoint.path)) {
      throw new TransportError('refused', `Another server is already listening on ${endpoint.path}`);
    }
    console.log('[Transport] Removing stale socket:', endpoint.path);
    fs.rmSync(endpoint.path, { force: true });
  }

  const sockets = new Set<net.Socket>();
  const server = net.createServer((socket) => {
    sockets.add(socket);
    socket.once('close', () => sockets.delete(socket));
    const connection = new Connection({
      label: `${describeEndpoint(endpoint)}#${socket.remotePort ?? 'local'}`,
      idleTimeoutMs: options.idleTimeoutMs,
    });
    connection.markConnecting();
    connection.attach(socketChannel(socket));
    onConnection(connection);
  });

  await new Promise<void>((resolve, reject) => {
    server.once('error', (err) => reject(toTransportError(err, describeEndpoint(endpoint))));
    server.listen(connectOptions(endpoint), () => resolve());
  });

  const address = server.address();
  const bound: TcpEndpoint | LocalEndpoint =
    endpoint.kind === 'tcp' && address !== null && typeof address === 'object'
      ? { kind: 'tcp', host: endpoint.host, port: address.port }
      : endpoint;

  return {
    endpoint: bound,
    close: () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
        for (const socket of sockets) {
          socket.destroy();
        }
      }),
  };
}
