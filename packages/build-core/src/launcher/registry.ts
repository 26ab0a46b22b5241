/**
 * Build Server Registry
 *
 * One initialized client per endpoint. Concurrent `acquire` calls for the
 * same endpoint share one launch, and concurrent restarts share one restart; a client whose connection dropped is
 * forgotten, so the next `acquire` launches again.
 *
 * ESM module — use .js extensions on imports.
 */

import type { CompileResultCache } from '../cache/compile-result-cache.js';
import { BSP_VERSION } from '../common/config.js';
import type { TransportEndpoint } from '../common/types/transport.js';
import { BuildClient, type BuildClientHandlers } from '../session/client.js';
import { endpointKey } from '../transport/endpoint.js';
import type { Launcher } from './launcher.js';

export interface ClientIdentity {
  displayName: string;
  version: string;
  /** Workspace root as a file uri */
  rootUri: string;
  languageIds?: string[];
  bspVersion?: string;
}

export interface BuildServerRegistryOptions {
  createLauncher: (endpoint: TransportEndpoint) => Launcher;
  client: ClientIdentity;
  requestTimeoutMs?: number;
  handlers?: BuildClientHandlers;
  /** Cache for each new client (default: one with default limits) */
  createCache?: () => CompileResultCache;
}

export interface AcquireOptions {
  /** Replace the server this registry started for the endpoint */
  restart?: boolean;
}

interface InFlightLaunch {
  promise: Promise<BuildClient>;
  restart: boolean;
}

interface RegisteredServer {
  launcher: Launcher;
  client: BuildClient | null;
}

export class BuildServerRegistry {
  private servers = new Map<string, RegisteredServer>();
  private launches = new Map<string, InFlightLaunch>();
  private readonly options: BuildServerRegistryOptions;

  constructor(options: BuildServerRegistryOptions) {
    this.options = options;
  }

  /**
   * An initialized client for the endpoint, launching the server when needed.
   * @throws LauncherError | ProtocolError | TransportError
   */
  async acquire(endpoint: TransportEndpoint, options: AcquireOptions = {}): Promise<BuildClient> {
    const key = endpointKey(endpoint);
    // At most one launch per endpoint. A restart joins a restart already in
    // flight and waits out any other launch, checking again after each wait.
    let inFlight = this.launches.get(key);
    while (inFlight) {
      if (!options.restart || inFlight.restart) {
        return inFlight.promise;
      }
      await inFlight.promise.catch(() => undefined);
      inFlight = this.launches.get(key);
    }

    const current = this.servers.get(key)?.client;
    if (current && current.sessionState === 'active' && !options.restart) {
      return current;
    }

    const launch: InFlightLaunch = { promise: this.launch(key, endpoint, options), restart: options.restart ?? false };
    this.launches.set(key, launch);
    try {
      return await launch.promise;
    } finally {
      if (this.launches.get(key) === launch) {
        this.launches.delete(key);
      }
    }
  }

  /** The registered client of an endpoint, if one is active. */
  get(endpoint: TransportEndpoint): BuildClient | null {
    const client = this.servers.get(endpointKey(endpoint))?.client;
    return client && client.sessionState === 'active' ? client : null;
  }

  get size(): number {
    let count = 0;
    for (const server of this.servers.values()) {
      if (server.client) {
        count++;
      }
    }
    return count;
  }

  /**
   * Shut down every client. With `stopServers`, also stop the processes this
   * registry started.
   */
  async closeAll(options: { stopServers?: boolean } = {}): Promise<void> {
    await Promise.allSettled([...this.launches.values()].map((launch) => launch.promise));
    const servers = [...this.servers.values()];
    this.servers.clear();
    await Promise.all(
      servers.map(async (server) => {
        if (server.client) {
          await server.client.shutdown();
          server.client = null;
        }
        if (options.stopServers) {
          await server.launcher.stop();
        }
      }),
    );
  }

  private async launch(key: string, endpoint: TransportEndpoint, options: AcquireOptions): Promise<BuildClient> {
    let server = this.servers.get(key);
    if (!server) {
      server = { launcher: this.options.createLauncher(endpoint), client: null };
      this.servers.set(key, server);
    }
    const registered = server;

    if (registered.client) {
      registered.client.close();
      registered.client = null;
    }

    const { connection, spawned } = await registered.launcher.connect({ restart: options.restart });
    const client = new BuildClient({
      transport: connection,
      timeout: this.options.requestTimeoutMs,
      handlers: this.options.handlers,
      cache: this.options.createCache?.(),
    });
    const identity = this.options.client;
    await client.initialize({
      displayName: identity.displayName,
      version: identity.version,
      bspVersion: identity.bspVersion ?? BSP_VERSION,
      rootUri: identity.rootUri,
      capabilities: { languageIds: identity.languageIds ?? ['scala', 'java'] },
    });
    connection.markReady();

    registered.client = client;
    connection.onClose(() => {
      if (registered.client === client) {
        registered.client = null;
        console.log(`[Registry] Connection to ${key} closed`);
      }
    });
    console.log(`[Registry] ${spawned ? 'Started' : 'Connected to'} build server on ${key}`);
    return client;
  }
}
