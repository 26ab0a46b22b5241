/**
 * Pipe-pair transport: one pipe per direction.
 *
 * On POSIX the pipes are FIFOs. Each side opens its read end O_RDWR so the
 * read loop never sees EOF while the peer is between opens; the write end is
 * opened O_NONBLOCK, which fails with ENXIO when nobody is reading. Once a
 * client's first bytes arrive the server swaps its O_RDWR reader for an
 * O_RDONLY one, so the client closing its write end shows up as EOF. On
 * Windows both pipes are named pipes served by `net`.
 *
 * The server serves one client at a time and re-arms after it goes away.
 */

import { execFile } from 'child_process';
import fs from 'fs';
import net from 'net';
import { promisify } from 'util';
import { TransportError, toTransportError } from '../common/errors.js';
import type { PipeEndpoint } from '../common/types/transport.js';
import { Connection, type ByteChannel } from './connection.js';
import { assertValidEndpoint, describeEndpoint } from './endpoint.js';
import type { ListenOptions, OpenOptions, TransportServer } from './sockets.js';

const execFileAsync = promisify(execFile);

const READ_FLAGS = fs.constants.O_RDWR | fs.constants.O_NONBLOCK;
const WRITE_FLAGS = fs.constants.O_WRONLY | fs.constants.O_NONBLOCK;
/** Server-side reader of a connected client: EOF once the client's writer closes. */
const CLIENT_READ_FLAGS = fs.constants.O_RDONLY | fs.constants.O_NONBLOCK;

/** Combine a read stream and a write stream into one channel. */
export function pipeChannel(readable: net.Socket, writable: net.Socket): ByteChannel {
  return {
    readable,
    writable,
    destroy: () => {
      readable.destroy();
      writable.destroy();
    },
  };
}

function openFd(filePath: string, flags: number): Promise<number> {
  return new Promise<number>((resolve, reject) => {
    fs.open(filePath, flags, (err, fd) => (err ? reject(err) : resolve(fd)));
  });
}

function fdSocket(fd: number, direction: 'read' | 'write'): net.Socket {
  return new net.Socket({ fd, readable: direction === 'read', writable: direction === 'write' });
}

function connectNamedPipe(pipePath: string): Promise<net.Socket> {
  return new Promise<net.Socket>((resolve, reject) => {
    const socket = net.connect({ path: pipePath });
    socket.once('error', reject);
    socket.once('connect', () => {
      socket.removeListener('error', reject);
      resolve(socket);
    });
  });
}

async function openPosixPair(endpoint: PipeEndpoint): Promise<ByteChannel> {
  const readFd = await openFd(endpoint.readPath, READ_FLAGS);
  let writeFd: number;
  try {
    writeFd = await openFd(endpoint.writePath, WRITE_FLAGS);
  } catch (err) {
    fs.closeSync(readFd);
    throw err;
  }
  return pipeChannel(fdSocket(readFd, 'read'), fdSocket(writeFd, 'write'));
}

async function openWindowsPair(endpoint: PipeEndpoint): Promise<ByteChannel> {
  const readable = await connectNamedPipe(endpoint.readPath);
  try {
    const writable = await connectNamedPipe(endpoint.writePath);
    return pipeChannel(readable, writable);
  } catch (err) {
    readable.destroy();
    throw err;
  }
}

/**
 * Open the client side of a pipe pair.
 * @throws TransportError
 */
export async function openPipes(
  endpoint: PipeEndpoint,
  options: OpenOptions & { platform?: NodeJS.Platform },
): Promise<Connection> {
  assertValidEndpoint(endpoint);
  const label = describeEndpoint(endpoint);
  const connection = new Connection({ label, idleTimeoutMs: options.idleTimeoutMs });
  connection.markConnecting();
  const platform = options.platform ?? process.platform;

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new TransportError('timeout', `Timed out opening ${label} after ${options.timeoutMs}ms`)),
      options.timeoutMs,
    );
  });

  const opening = platform === 'win32' ? openWindowsPair(endpoint) : openPosixPair(endpoint);
  try {
    const channel = await Promise.race([opening, timeout]);
    connection.attach(channel);
    return connection;
  } catch (err) {
    const error = err instanceof TransportError ? err : toTransportError(err, label);
    // A late open after the timeout must not leak descriptors
    opening.then((channel) => channel.destroy()).catch(() => undefined);
    connection.fail(error);
    throw error;
  } finally {
    clearTimeout(timer);
  }
}

/** Open the reader of a connected client and the response writer. */
async function openServerEnds(endpoint: PipeEndpoint): Promise<[number, number]> {
  const readFd = await openFd(endpoint.readPath, CLIENT_READ_FLAGS);
  try {
    return [readFd, await openFd(endpoint.writePath, WRITE_FLAGS)];
  } catch (err) {
    fs.closeSync(readFd);
    throw err;
  }
}

async function ensureFifo(fifoPath: string): Promise<void> {
  if (fs.existsSync(fifoPath)) {
    if (!fs.statSync(fifoPath).isFIFO()) {
      throw new TransportError('malformedAddress', `${fifoPath} exists and is not a FIFO`);
    }
    return;
  }
  await execFileAsync('mkfifo', ['-m', '600', fifoPath]);
}

/**
 * Serve a pipe pair. `endpoint` is the server's view: it reads requests
 * from `readPath` and writes responses to `writePath`.
 */
export async function listenPipes(
  endpoint: PipeEndpoint,
  onConnection: (connection: Connection) => void,
  options: ListenOptions = {},
): Promise<TransportServer> {
  assertValidEndpoint(endpoint);
  const platform = options.platform ?? process.platform;
  return platform === 'win32'
    ? listenWindowsPipes(endpoint, onConnection, options)
    : listenPosixPipes(endpoint, onConnection, options);
}

async function listenPosixPipes(
  endpoint: PipeEndpoint,
  onConnection: (connection: Connection) => void,
  options: ListenOptions,
): Promise<TransportServer> {
  const label = describeEndpoint(endpoint);
  await ensureFifo(endpoint.readPath);
  await ensureFifo(endpoint.writePath);

  let stopped = false;
  let reader: net.Socket | null = null;
  let current: Connection | null = null;

  const rearm = (): void => {
    if (!stopped) {
      arm().catch((err: unknown) => console.error('[Transport] Failed to re-arm pipes:', err));
    }
  };

  const arm = async (): Promise<void> => {
    const waitFd = await openFd(endpoint.readPath, READ_FLAGS);
    const waiter = fdSocket(waitFd, 'read');
    reader = waiter;
    waiter.once('data', (first: Buffer) => {
      waiter.pause();
      // The client opens its read end before writing, so this cannot ENXIO.
      // Its write end is open too, so a plain reader does not see EOF yet.
      openServerEnds(endpoint)
        .then(([readFd, writeFd]) => {
          const buffered: Buffer[] = [first];
          let chunk: unknown;
          while ((chunk = waiter.read()) !== null) {
            if (Buffer.isBuffer(chunk)) {
              buffered.push(chunk);
            }
          }
          // Dropping the O_RDWR descriptor leaves the client as the only
          // writer, so its departure reaches the new reader as EOF
          waiter.destroy();
          const socket = fdSocket(readFd, 'read');
          socket.unshift(Buffer.concat(buffered));
          reader = socket;

          const connection = new Connection({ label, idleTimeoutMs: options.idleTimeoutMs });
          connection.markConnecting();
          connection.attach(pipeChannel(socket, fdSocket(writeFd, 'write')));
          current = connection;
          connection.onClose(() => {
            current = null;
            reader = null;
            console.log(`[Transport] Client left ${label}, waiting for the next one`);
            rearm();
          });
          onConnection(connection);
        })
        .catch((err: unknown) => {
          console.error('[Transport] Client went away before the pipe pair opened:', err);
          waiter.destroy();
          rearm();
        });
    });
  };

  await arm();

  return {
    endpoint,
    close: async () => {
      stopped = true;
      current?.close();
      reader?.destroy();
    },
  };
}

async function listenWindowsPipes(
  endpoint: PipeEndpoint,
  onConnection: (connection: Connection) => void,
  options: ListenOptions,
): Promise<TransportServer> {
  const label = describeEndpoint(endpoint);
  // The client reads what we write, so it connects to our write pipe first
  const waitingWriters: net.Socket[] = [];
  const sockets = new Set<net.Socket>();

  const track = (socket: net.Socket): void => {
    sockets.add(socket);
    socket.once('close', () => sockets.delete(socket));
  };

  const writeServer = net.createServer((socket) => {
    track(socket);
    waitingWriters.push(socket);
  });
  const readServer = net.createServer((socket) => {
    track(socket);
    const writable = waitingWriters.shift();
    if (!writable) {
      console.warn('[Transport] Request pipe opened without a response pipe; dropping');
      socket.destroy();
      return;
    }
    const connection = new Connection({ label, idleTimeoutMs: options.idleTimeoutMs });
    connection.markConnecting();
    connection.attach(pipeChannel(socket, writable));
    onConnection(connection);
  });

  const listen = (server: net.Server, pipePath: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      server.once('error', (err) => reject(toTransportError(err, pipePath)));
      server.listen({ path: pipePath }, () => resolve());
    });

  await listen(writeServer, endpoint.writePath);
  await listen(readServer, endpoint.readPath);

  const closeServer = (server: net.Server): Promise<void> =>
    new Promise<void>((resolve) => {
      server.close(() => resolve());
    });

  return {
    endpoint,
    close: async () => {
      const closing = Promise.all([closeServer(readServer), closeServer(writeServer)]);
      for (const socket of sockets) {
        socket.destroy();
      }
      await closing;
    },
  };
}
