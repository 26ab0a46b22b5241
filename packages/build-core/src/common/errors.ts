/**
 * Error taxonomy.
 *
 * Every failure carries a `kind` discriminant so callers can branch on it,
 * plus a human-readable message. `toExitStatus` maps any of them onto the
 * stable exit codes printed by the CLI.
 */

export abstract class BuildLinkError extends Error {
  abstract readonly kind: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type TransportErrorKind =
  | 'refused'
  | 'timeout'
  | 'permissionDenied'
  | 'malformedAddress'
  | 'closed';

export class TransportError extends BuildLinkError {
  constructor(
    readonly kind: TransportErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

/** A live connection went away (peer closed, idle timeout, protocol failure). */
export class ConnectionLostError extends BuildLinkError {
  readonly kind = 'connectionLost';
}

export type LauncherErrorKind =
  | 'connectionRefused'
  | 'spawnFailed'
  | 'readinessTimeout'
  | 'versionMismatch';

export class LauncherError extends BuildLinkError {
  constructor(
    readonly kind: LauncherErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ProtocolErrorKind = 'versionIncompatible' | 'malformedHandshake' | 'malformedFrame';

export class ProtocolError extends BuildLinkError {
  constructor(
    readonly kind: ProtocolErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type RequestErrorKind = 'unknownTarget' | 'badArguments' | 'cancelled' | 'timeout' | 'remote';

export class RequestError extends BuildLinkError {
  constructor(
    readonly kind: RequestErrorKind,
    message: string,
    /** JSON-RPC error code when the error came from the peer */
    readonly code?: number,
  ) {
    super(message);
  }
}

export type CacheErrorKind = 'notFound' | 'timeout' | 'decodeFailed' | 'cancelled';

export class CacheError extends BuildLinkError {
  constructor(
    readonly kind: CacheErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type ExitStatus =
  | 'ok'
  | 'compile-failed'
  | 'connection-refused'
  | 'spawn-failed'
  | 'readiness-timeout'
  | 'version-incompatible'
  | 'unknown-target'
  | 'protocol-error'
  | 'decode-failed'
  | 'timeout'
  | 'connection-lost'
  | 'unexpected-error';

export function toExitStatus(error: unknown): ExitStatus {
  if (error instanceof LauncherError) {
    switch (error.kind) {
      case 'connectionRefused':
        return 'connection-refused';
      case 'spawnFailed':
        return 'spawn-failed';
      case 'readinessTimeout':
        return 'readiness-timeout';
      case 'versionMismatch':
        return 'version-incompatible';
    }
  }
  if (error instanceof TransportError) {
    return error.kind === 'timeout' ? 'timeout' : 'connection-refused';
  }
  if (error instanceof ConnectionLostError) {
    return 'connection-lost';
  }
  if (error instanceof ProtocolError) {
    return error.kind === 'versionIncompatible' ? 'version-incompatible' : 'protocol-error';
  }
  if (error instanceof RequestError) {
    if (error.kind === 'unknownTarget') {
      return 'unknown-target';
    }
    return error.kind === 'timeout' ? 'timeout' : 'protocol-error';
  }
  if (error instanceof CacheError) {
    if (error.kind === 'decodeFailed') {
      return 'decode-failed';
    }
    return error.kind === 'timeout' ? 'timeout' : 'unexpected-error';
  }
  return 'unexpected-error';
}

/** Numeric process exit codes, one per status. */
export const EXIT_CODES: Record<ExitStatus, number> = {
  ok: 0,
  'unexpected-error': 1,
  'compile-failed': 2,
  'connection-refused': 10,
  'spawn-failed': 11,
  'readiness-timeout': 12,
  'version-incompatible': 13,
  'unknown-target': 20,
  'protocol-error': 21,
  'decode-failed': 22,
  timeout: 23,
  'connection-lost': 24,
};

/** Map a Node system error (ECONNREFUSED, EACCES, …) to a TransportError. */
export function toTransportError(err: unknown, address: string): TransportError {
  const code = err instanceof Error && 'code' in err ? String(err.code) : undefined;
  switch (code) {
    case 'ECONNREFUSED':
    case 'ENOENT':
    case 'ECONNRESET':
    case 'ENXIO':
      return new TransportError('refused', `Connection refused: ${address}`, { cause: err });
    case 'EACCES':
    case 'EPERM':
      return new TransportError('permissionDenied', `Permission denied: ${address}`, {
        cause: err,
      });
    case 'ETIMEDOUT':
      return new TransportError('timeout', `Timed out connecting to ${address}`, { cause: err });
    case 'EINVAL':
    case 'ENOTFOUND':
    case 'ERR_INVALID_ARG_VALUE':
    case 'ERR_SOCKET_BAD_PORT':
      return new TransportError('malformedAddress', `Malformed address: ${address}`, {
        cause: err,
      });
    default: {
      const message = err instanceof Error ? err.message : String(err);
      return new TransportError('refused', `Could not connect to ${address}: ${message}`, {
        cause: err,
      });
    }
  }
}
