import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { BuildServerRegistry } from '../../src/launcher/registry.js';
import { Launcher, type SpawnServer } from '../../src/launcher/launcher.js';
import { startBuildServer, SERVER_NAME, type RunningBuildServer } from '../../src/server/build-server.js';
import { CompileResultCache } from '../../src/cache/compile-result-cache.js';
import { LauncherError } from '../../src/common/errors.js';
import type { TransportEndpoint } from '../../src/common/types/transport.js';

describe('BuildServerRegistry', () => {
  let workspace: string;
  let server: RunningBuildServer | null;
  let registry: BuildServerRegistry;
  let spawnServer: Mock<SpawnServer>;
  let createLauncher: Mock<(endpoint: TransportEndpoint) => Launcher>;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    workspace = fs.mkdtempSync(path.join(os.tmpdir(), 'buildlink-registry-'));
    fs.mkdirSync(path.join(workspace, '.buildlink'));
    fs.writeFileSync(
      path.join(workspace, '.buildlink', 'core.json'),
      JSON.stringify({ name: 'core', directory: 'core', classesDir: 'out/core' }),
    );

    server = await startBuildServer({ workspaceRoot: workspace, endpoint: { kind: 'tcp', host: '127.0.0.1', port: 0 } });
    spawnServer = vi.fn<SpawnServer>(() => {
      throw new Error('spawning is not available in tests');
    });
    createLauncher = vi.fn((endpoint: TransportEndpoint) => new Launcher({ endpoint, spawnServer, connectTimeoutMs: 2_000 }));
    registry = new BuildServerRegistry({
      createLauncher,
      client: { displayName: 'test-client', version: '0.0.1', rootUri: `file://${workspace}/` },
      createCache: () => new CompileResultCache({ maxDecodedEntries: 2 }),
    });
  });

  afterEach(async () => {
    await registry.closeAll();
    await server?.close();
    fs.rmSync(workspace, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  function runningEndpoint(): TransportEndpoint {
    if (!server) {
      throw new Error('server is not running');
    }
    return server.endpoint;
  }

  it('should share one launch between concurrent callers', async () => {
    const endpoint = runningEndpoint();

    const [first, second] = await Promise.all([registry.acquire(endpoint), registry.acquire(endpoint)]);

    expect(first).toBe(second);
    expect(first.sessionState).toBe('active');
    expect(first.serverInfo?.displayName).toBe(SERVER_NAME);
    expect(createLauncher).toHaveBeenCalledTimes(1);
    expect(spawnServer).not.toHaveBeenCalled();
    expect(registry.size).toBe(1);
    expect(registry.get(endpoint)).toBe(first);
  });

  it('should return the registered client while it is active', async () => {
    const endpoint = runningEndpoint();
    const first = await registry.acquire(endpoint);

    await expect(registry.acquire(endpoint)).resolves.toBe(first);
    await expect(first.listBuildTargets()).resolves.toHaveLength(1);
  });

  it('should forget a client whose server went away', async () => {
    const endpoint = runningEndpoint();
    const client = await registry.acquire(endpoint);

    await server?.close();
    server = null;

    await vi.waitFor(() => expect(registry.get(endpoint)).toBeNull());
    expect(client.sessionState).toBe('closed');
    expect(registry.size).toBe(0);
  });

  it('should surface a failed launch', async () => {
    const endpoint = runningEndpoint();
    await server?.close();
    server = null;

    const error = await registry.acquire(endpoint).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LauncherError);
    expect(error).toMatchObject({ kind: 'spawnFailed' });
    expect(registry.get(endpoint)).toBeNull();
  });

  /** Launchers that reconnect to the running server and count overlapping launches. */
  function countLaunches(): { calls: number; maxActive: number } {
    const counts = { calls: 0, maxActive: 0 };
    let active = 0;
    createLauncher.mockImplementation((target: TransportEndpoint) => {
      const launcher = new Launcher({ endpoint: target, spawnServer, connectTimeoutMs: 2_000 });
      const connect = launcher.connect.bind(launcher);
      // The server is already up, so a restart reconnects instead of spawning
      vi.spyOn(launcher, 'connect').mockImplementation(async () => {
        counts.calls++;
        active++;
        counts.maxActive = Math.max(counts.maxActive, active);
        try {
          return await connect();
        } finally {
          active--;
        }
      });
      return launcher;
    });
    return counts;
  }

  it('should run concurrent restarts as one launch', async () => {
    const endpoint = runningEndpoint();
    const counts = countLaunches();

    const clients = await Promise.all([
      registry.acquire(endpoint, { restart: true }),
      registry.acquire(endpoint, { restart: true }),
      registry.acquire(endpoint, { restart: true }),
    ]);

    expect(new Set(clients).size).toBe(1);
    expect(counts).toEqual({ calls: 1, maxActive: 1 });
    expect(registry.get(endpoint)).toBe(clients[0]);
  });

  it('should start a restart only after the running launch settled', async () => {
    const endpoint = runningEndpoint();
    const counts = countLaunches();

    const [first, restarted] = await Promise.all([
      registry.acquire(endpoint),
      registry.acquire(endpoint, { restart: true }),
    ]);

    expect(counts).toEqual({ calls: 2, maxActive: 1 });
    expect(restarted).not.toBe(first);
    expect(first.sessionState).toBe('closed');
    expect(registry.get(endpoint)).toBe(restarted);
  });

  it('should shut every client down on closeAll', async () => {
    const client = await registry.acquire(runningEndpoint());

    await registry.closeAll();

    expect(client.sessionState).toBe('closed');
    expect(registry.size).toBe(0);
  });
});
