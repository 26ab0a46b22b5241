/**
 * Launcher
 *
 * Makes "a build server is reachable on this endpoint" true: connects to a
 * running server, or spawns one, waits for it to become ready and connects.
 * A process this launcher spawned is killed on every failure path.
 *
 * ESM module — use .js extensions on imports.
 */

import { spawn } from 'child_process';
import net from 'net';
import { LauncherError, TransportError } from '../common/errors.js';
import {
  BSP_VERSION,
  DEFAULT_BACKOFF_INITIAL_MS,
  DEFAULT_BACKOFF_MAX_MS,
  DEFAULT_CONNECT_TIMEOUT_MS,
  DEFAULT_READINESS_TIMEOUT_MS,
  READY_SENTINEL,
  type ReadinessMode,
} from '../common/config.js';
import type { TransportEndpoint } from '../common/types/transport.js';
import { openTransport as defaultOpenTransport, type OpenTransport } from '../factories/transport.js';
import type { Connection } from '../transport/connection.js';
import { describeEndpoint, endpointToArgs } from '../transport/endpoint.js';
import {
  OutputTail,
  pollEndpoint,
  waitForSentinel,
  watchLines,
  type BackoffOptions,
  type ServerProcess,
} from './readiness.js';

/** Starts the server process with the given endpoint arguments. */
export type SpawnServer = (args: string[]) => ServerProcess;

export interface LauncherOptions {
  endpoint: TransportEndpoint;
  spawnServer: SpawnServer;
  openTransport?: OpenTransport;
  /** Protocol version token passed to the server */
  protocolVersion?: string;
  readiness?: ReadinessMode;
  connectTimeoutMs?: number;
  readinessTimeoutMs?: number;
  idleTimeoutMs?: number;
  backoff?: BackoffOptions;
  /** Time to wait for a killed server to exit */
  killGraceMs?: number;
}

export interface ConnectOptions {
  /** Replace the server this launcher started, even if it answers */
  restart?: boolean;
}

export interface LaunchResult {
  connection: Connection;
  /** Whether a new server process was started */
  spawned: boolean;
}

/**
 * Spawn a server command detached from this process, with stdout and stderr
 * piped for readiness detection.
 */
export function createProcessSpawner(command: string, baseArgs: string[] = [], cwd?: string): SpawnServer {
  return (args) =>
    spawn(command, [...baseArgs, ...args], {
      cwd,
      detached: true,
      stdio: ['ignore', 'pipe', 'pipe'],
      windowsHide: true,
    });
}

export class Launcher {
  readonly endpoint: TransportEndpoint;
  private readonly options: Required<Omit<LauncherOptions, 'idleTimeoutMs'>> & { idleTimeoutMs?: number };
  private process: ServerProcess | null = null;

  constructor(options: LauncherOptions) {
    this.endpoint = options.endpoint;
    this.options = {
      endpoint: options.endpoint,
      spawnServer: options.spawnServer,
      openTransport: options.openTransport ?? defaultOpenTransport,
      protocolVersion: options.protocolVersion ?? BSP_VERSION,
      readiness: options.readiness ?? 'sentinel',
      connectTimeoutMs: options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS,
      readinessTimeoutMs: options.readinessTimeoutMs ?? DEFAULT_READINESS_TIMEOUT_MS,
      idleTimeoutMs: options.idleTimeoutMs,
      backoff: options.backoff ?? {
        initialDelayMs: DEFAULT_BACKOFF_INITIAL_MS,
        maxDelayMs: DEFAULT_BACKOFF_MAX_MS,
      },
      killGraceMs: options.killGraceMs ?? 2_000,
    };
  }

  /** The process this launcher started, if it is still tracked. */
  get serverProcess(): ServerProcess | null {
    return this.process;
  }

  /**
   * Connect to the endpoint, starting a server if nothing answers.
   * @throws LauncherError
   */
  async connect(options: ConnectOptions = {}): Promise<LaunchResult> {
    const label = describeEndpoint(this.endpoint);

    if (options.restart) {
      console.log(`[Launcher] Restart requested for ${label}`);
      await this.stop();
    } else {
      try {
        const connection = await this.open();
        console.log(`[Launcher] Connected to running server at ${label}`);
        return { connection, spawned: false };
      } catch (err) {
        if (err instanceof TransportError && (err.kind === 'malformedAddress' || err.kind === 'permissionDenied')) {
          throw new LauncherError('connectionRefused', `Cannot connect to ${label}: ${err.message}`, { cause: err });
        }
        console.log(`[Launcher] No server at ${label}, starting one`);
      }
    }

    return this.spawnAndConnect();
  }

  /** Kill the process this launcher started, if any, and wait for it to exit. */
  async stop(): Promise<void> {
    const child = this.process;
    this.process = null;
    if (!child || child.exitCode !== null) {
      return;
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        child.kill('SIGKILL');
        resolve();
      }, this.options.killGraceMs);
      child.once('exit', () => {
        clearTimeout(timer);
        resolve();
      });
      child.kill('SIGTERM');
    });
    console.log('[Launcher] Stopped build server, pid:', child.pid);
  }

  private open(): Promise<Connection> {
    return this.options.openTransport(this.endpoint, {
      timeoutMs: this.options.connectTimeoutMs,
      idleTimeoutMs: this.options.idleTimeoutMs,
    });
  }

  private async spawnAndConnect(): Promise<LaunchResult> {
    const args = [...endpointToArgs(this.endpoint), '--protocol-version', this.options.protocolVersion];

    let child: ServerProcess;
    try {
      child = this.options.spawnServer(args);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new LauncherError('spawnFailed', `Failed to start build server: ${message}`, { cause: err });
    }
    this.process = child;
    console.log('[Launcher] Spawned build server, pid:', child.pid);

    const tail = new OutputTail();
    try {
      let connection: Connection;
      if (this.options.readiness === 'sentinel') {
        await waitForSentinel(child, READY_SENTINEL, this.options.readinessTimeoutMs, tail);
        connection = await this.open();
      } else {
        connection = await pollEndpoint(
          () => this.open(),
          this.options.readinessTimeoutMs,
          this.options.backoff,
          child,
          tail,
        );
      }
      this.release(child);
      return { connection, spawned: true };
    } catch (err) {
      console.error('[Launcher] Build server did not come up, killing pid:', child.pid);
      this.process = null;
      child.kill('SIGKILL');
      if (err instanceof LauncherError) {
        throw err;
      }
      const message = err instanceof Error ? err.message : String(err);
      throw new LauncherError('connectionRefused', `Build server started but refused the connection: ${message}`, {
        cause: err,
      });
    }
  }

  /**
   * Keep forwarding server output while this process lives, without
   * holding the event loop open for it.
   */
  private release(child: ServerProcess): void {
    for (const [stream, tag] of [
      [child.stdout, '[BuildServer]'],
      [child.stderr, '[BuildServer:err]'],
    ] as const) {
      if (!stream) {
        continue;
      }
      watchLines(stream, (line) => console.log(tag, line));
      if (stream instanceof net.Socket) {
        stream.unref();
      }
    }
    child.once('exit', (code) => {
      console.log(`[Launcher] Build server exited with code ${code}`);
      if (this.process === child) {
        this.process = null;
      }
    });
    child.unref();
  }
}
