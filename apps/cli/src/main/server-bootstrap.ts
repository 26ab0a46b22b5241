/**
 * Server Bootstrap
 *
 * Wires the launcher and registry to this package's server entry: the
 * server runs as a detached Node.js process with tsx loading its
 * TypeScript sources, one process per workspace endpoint.
 *
 * This file MUST use `path.join()` for all file paths (Windows CI compatibility).
 */

import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import {
  BuildServerRegistry,
  CompileResultCache,
  DecodePool,
  Launcher,
  createProcessSpawner,
  readAnalysis,
  type BuildClientHandlers,
  type BuildLinkConfig,
  type SpawnServer,
  type TransportEndpoint,
} from '@buildlink/core';

export const CLI_NAME = 'buildlink-cli';
export const CLI_VERSION = '0.1.0';

const here = path.dirname(fileURLToPath(import.meta.url));

/** Resolve the path to the server entry script. */
export function getServerEntryPath(): string {
  return path.join(here, 'server-entry.ts');
}

/** Package directory, where tsx resolves from. */
function getPackageRoot(): string {
  return path.join(here, '..', '..');
}

/**
 * Spawner for the server entry. Endpoint arguments come from the launcher.
 */
export function createServerSpawner(workspaceRoot: string): SpawnServer {
  return createProcessSpawner(
    process.execPath,
    ['--import', 'tsx', getServerEntryPath(), '--workspace', workspaceRoot],
    getPackageRoot(),
  );
}

export function createLauncherFor(
  config: BuildLinkConfig,
  endpoint: TransportEndpoint,
  spawnServer: SpawnServer = createServerSpawner(config.workspaceRoot),
): Launcher {
  return new Launcher({
    endpoint,
    spawnServer,
    readiness: config.readiness,
    connectTimeoutMs: config.connectTimeoutMs,
    readinessTimeoutMs: config.readinessTimeoutMs,
    idleTimeoutMs: config.idleTimeoutMs || undefined,
  });
}

export interface RegistryOverrides {
  handlers?: BuildClientHandlers;
  spawnServer?: SpawnServer;
}

export function createRegistry(config: BuildLinkConfig, overrides: RegistryOverrides = {}): BuildServerRegistry {
  return new BuildServerRegistry({
    createLauncher: (endpoint) => createLauncherFor(config, endpoint, overrides.spawnServer),
    client: {
      displayName: CLI_NAME,
      version: CLI_VERSION,
      rootUri: pathToFileURL(config.workspaceRoot).href,
    },
    requestTimeoutMs: config.requestTimeoutMs,
    handlers: overrides.handlers,
    createCache: () =>
      new CompileResultCache({
        pool: new DecodePool(readAnalysis, config.decodeConcurrency),
        maxDecodedEntries: config.maxDecodedEntries,
        defaultTimeoutMs: config.requestTimeoutMs,
      }),
  });
}
