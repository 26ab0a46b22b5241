/**
 * Endpoint helpers: stable keys, display strings and command-line encoding.
 */

import { TransportError } from '../common/errors.js';
import type { TransportEndpoint } from '../common/types/transport.js';

export function describeEndpoint(endpoint: TransportEndpoint): string {
  switch (endpoint.kind) {
    case 'tcp':
      return `tcp://${endpoint.host}:${endpoint.port}`;
    case 'local':
      return `local:${endpoint.path}`;
    case 'pipe':
      return `pipe:${endpoint.readPath}|${endpoint.writePath}`;
  }
}

/** Key used to serialize launches against the same endpoint. */
export function endpointKey(endpoint: TransportEndpoint): string {
  return describeEndpoint(endpoint);
}

/**
 * Validate an endpoint before touching the OS.
 * @throws TransportError('malformedAddress')
 */
export function assertValidEndpoint(endpoint: TransportEndpoint): void {
  switch (endpoint.kind) {
    case 'tcp':
      if (!endpoint.host || !Number.isInteger(endpoint.port) || endpoint.port < 0 || endpoint.port > 65535) {
        throw new TransportError('malformedAddress', `Malformed TCP address: ${describeEndpoint(endpoint)}`);
      }
      return;
    case 'local':
      if (!endpoint.path) {
        throw new TransportError('malformedAddress', 'Local socket path is empty');
      }
      return;
    case 'pipe':
      if (!endpoint.readPath || !endpoint.writePath || endpoint.readPath === endpoint.writePath) {
        throw new TransportError(
          'malformedAddress',
          `Pipe endpoint needs two distinct paths: ${describeEndpoint(endpoint)}`,
        );
      }
      return;
  }
}

/**
 * Encode an endpoint as server command-line arguments.
 *
 * The server sees its own perspective, so a pipe pair is mirrored: the
 * client's read pipe is the server's write pipe.
 */
export function endpointToArgs(endpoint: TransportEndpoint): string[] {
  switch (endpoint.kind) {
    case 'tcp':
      return ['--protocol', 'tcp', '--host', endpoint.host, '--port', String(endpoint.port)];
    case 'local':
      return ['--protocol', 'local', '--socket', endpoint.path];
    case 'pipe':
      return ['--protocol', 'pipe', '--pipe-in', endpoint.writePath, '--pipe-out', endpoint.readPath];
  }
}

function flag(args: string[], name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  if (i === -1 || i + 1 >= args.length) {
    return undefined;
  }
  return args[i + 1];
}

/**
 * Decode the server-side view of `endpointToArgs` output: for a pipe pair,
 * `readPath` is the pipe the server reads requests from.
 */
export function endpointFromArgs(args: string[]): TransportEndpoint {
  const protocol = flag(args, 'protocol');
  switch (protocol) {
    case 'tcp': {
      const port = Number.parseInt(flag(args, 'port') ?? '', 10);
      const endpoint: TransportEndpoint = { kind: 'tcp', host: flag(args, 'host') ?? '127.0.0.1', port };
      assertValidEndpoint(endpoint);
      return endpoint;
    }
    case 'local': {
      const endpoint: TransportEndpoint = { kind: 'local', path: flag(args, 'socket') ?? '' };
      assertValidEndpoint(endpoint);
      return endpoint;
    }
    case 'pipe': {
      const endpoint: TransportEndpoint = {
        kind: 'pipe',
        readPath: flag(args, 'pipe-in') ?? '',
        writePath: flag(args, 'pipe-out') ?? '',
      };
      assertValidEndpoint(endpoint);
      return endpoint;
    }
    default:
      throw new TransportError('malformedAddress', `Unknown --protocol: ${protocol ?? '(missing)'}`);
  }
}
