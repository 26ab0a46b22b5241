/**
 * Configuration defaults and environment overrides.
 *
 * This file MUST use `path.join()` for all file paths (Windows CI compatibility).
 */

import crypto from 'crypto';
import os from 'os';
import path from 'path';
import type { TransportEndpoint } from './types/transport.js';

/** Protocol version this package speaks (major must match the peer's). */
export const BSP_VERSION = '2.1.0';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;
export const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;
export const DEFAULT_READINESS_TIMEOUT_MS = 10_000;
export const DEFAULT_BACKOFF_INITIAL_MS = 50;
export const DEFAULT_BACKOFF_MAX_MS = 1_000;
export const DEFAULT_DECODE_CONCURRENCY = 4;
export const DEFAULT_MAX_DECODED_ENTRIES = 64;

/** Line the server prints once it accepts connections. */
export const READY_SENTINEL = 'buildlink server listening';

/** Directory (under the workspace root) holding project definitions and analyses. */
export const WORKSPACE_DIR_NAME = '.buildlink';

export type ReadinessMode = 'sentinel' | 'poll';

export interface BuildLinkConfig {
  workspaceRoot: string;
  endpoint: TransportEndpoint;
  requestTimeoutMs: number;
  connectTimeoutMs: number;
  readinessTimeoutMs: number;
  readiness: ReadinessMode;
  /** Idle timeout for a connection; 0 disables it. */
  idleTimeoutMs: number;
  decodeConcurrency: number;
  maxDecodedEntries: number;
}

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const value = Number.parseInt(raw, 10);
  if (Number.isNaN(value) || value < 0) {
    console.warn(`[Config] Ignoring invalid ${name}=${raw}`);
    return fallback;
  }
  return value;
}

function workspaceHash(workspaceRoot: string): string {
  return crypto.createHash('sha256').update(path.resolve(workspaceRoot)).digest('hex').slice(0, 12);
}

/**
 * Default local endpoint for a workspace: one socket per workspace, so
 * concurrent clients of the same workspace share one server.
 */
export function defaultLocalEndpoint(
  workspaceRoot: string,
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
): TransportEndpoint {
  const name = `buildlink-${workspaceHash(workspaceRoot)}`;
  if (platform === 'win32') {
    return { kind: 'local', path: `\\\\.\\pipe\\${name}` };
  }
  const runtimeDir = env.XDG_RUNTIME_DIR || os.tmpdir();
  return { kind: 'local', path: path.join(runtimeDir, `${name}.sock`) };
}

function resolveEndpoint(workspaceRoot: string, env: Env, platform: NodeJS.Platform): TransportEndpoint {
  const kind = env.BUILDLINK_TRANSPORT ?? 'local';
  switch (kind) {
    case 'tcp':
      return {
        kind: 'tcp',
        host: env.BUILDLINK_HOST || '127.0.0.1',
        port: readInt(env, 'BUILDLINK_PORT', 8212),
      };
    case 'pipe': {
      const base = defaultLocalEndpoint(workspaceRoot, env, platform);
      const stem = base.kind === 'local' ? base.path.replace(/\.sock$/, '') : 'buildlink';
      return { kind: 'pipe', readPath: `${stem}.out`, writePath: `${stem}.in` };
    }
    case 'local':
      if (env.BUILDLINK_SOCKET) {
        return { kind: 'local', path: env.BUILDLINK_SOCKET };
      }
      return defaultLocalEndpoint(workspaceRoot, env, platform);
    default:
      console.warn(`[Config] Unknown BUILDLINK_TRANSPORT=${kind}, using local socket`);
      return defaultLocalEndpoint(workspaceRoot, env, platform);
  }
}

/**
 * Resolve the effective configuration for a workspace from defaults and
 * `BUILDLINK_*` environment variables.
 */
export function resolveConfig(
  workspaceRoot: string,
  env: Env = process.env,
  platform: NodeJS.Platform = process.platform,
): BuildLinkConfig {
  const readiness = env.BUILDLINK_READINESS === 'poll' ? 'poll' : 'sentinel';
  return {
    workspaceRoot: path.resolve(workspaceRoot),
    endpoint: resolveEndpoint(workspaceRoot, env, platform),
    requestTimeoutMs: readInt(env, 'BUILDLINK_REQUEST_TIMEOUT_MS', DEFAULT_REQUEST_TIMEOUT_MS),
    connectTimeoutMs: readInt(env, 'BUILDLINK_CONNECT_TIMEOUT_MS', DEFAULT_CONNECT_TIMEOUT_MS),
    readinessTimeoutMs: readInt(
      env,
      'BUILDLINK_READINESS_TIMEOUT_MS',
      DEFAULT_READINESS_TIMEOUT_MS,
    ),
    readiness,
    idleTimeoutMs: readInt(env, 'BUILDLINK_IDLE_TIMEOUT_MS', 0),
    decodeConcurrency: Math.max(
      1,
      readInt(env, 'BUILDLINK_DECODE_CONCURRENCY', DEFAULT_DECODE_CONCURRENCY),
    ),
    maxDecodedEntries: readInt(env, 'BUILDLINK_MAX_DECODED_ENTRIES', DEFAULT_MAX_DECODED_ENTRIES),
  };
}
