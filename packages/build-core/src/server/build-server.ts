/**
 * Build Server
 *
 * Listens on one endpoint and gives every accepted connection its own
 * BuildServerSession, all served by one BuildService.
 *
 * ESM module — use .js extensions on imports.
 */

import { BSP_VERSION } from '../common/config.js';
import type { MessageTransport } from '../common/types/protocol.js';
import type { TransportEndpoint } from '../common/types/transport.js';
import type { CompileEngine } from '../engine/types.js';
import { listenTransport } from '../factories/transport.js';
import { BuildServerSession } from '../session/server.js';
import { Connection } from '../transport/connection.js';
import { BuildService } from './build-service.js';

export const SERVER_NAME = 'buildlink';
export const SERVER_VERSION = '0.1.0';

export interface BuildServerOptions {
  workspaceRoot: string;
  endpoint: TransportEndpoint;
  engine?: CompileEngine;
  /** Protocol version announced in the handshake (default: BSP_VERSION) */
  bspVersion?: string;
  idleTimeoutMs?: number;
}

export interface RunningBuildServer {
  /** The bound endpoint (for tcp with port 0, the actual port) */
  readonly endpoint: TransportEndpoint;
  readonly service: BuildService;
  close(): Promise<void>;
}

/**
 * Open a session on an accepted transport and attach it to the service.
 */
export function serveTransport(
  service: BuildService,
  transport: MessageTransport,
  bspVersion: string = BSP_VERSION,
): BuildServerSession {
  const session = new BuildServerSession({
    transport,
    displayName: SERVER_NAME,
    version: SERVER_VERSION,
    bspVersion,
    capabilities: {
      compileProvider: { languageIds: ['scala', 'java'] },
      dependencySourcesProvider: true,
      buildTargetChangedProvider: true,
      canReload: true,
    },
    onInitialized: () => {
      if (transport instanceof Connection) {
        transport.markReady();
      }
    },
  });
  service.attach(session);
  return session;
}

/**
 * Load the workspace and start accepting clients.
 * @throws TransportError when the endpoint cannot be bound
 */
export async function startBuildServer(options: BuildServerOptions): Promise<RunningBuildServer> {
  const service = await BuildService.create({ workspaceRoot: options.workspaceRoot, engine: options.engine });
  const sessions = new Set<BuildServerSession>();

  const server = await listenTransport(
    options.endpoint,
    (connection) => {
      console.log(`[BuildServer] Accepted connection ${connection.label}`);
      const session = serveTransport(service, connection, options.bspVersion);
      sessions.add(session);
      session.onClose(() => {
        sessions.delete(session);
        console.log(`[BuildServer] Connection ${connection.label} closed`);
      });
    },
    { idleTimeoutMs: options.idleTimeoutMs },
  );

  return {
    endpoint: server.endpoint,
    service,
    close: async () => {
      for (const session of sessions) {
        session.close();
      }
      await server.close();
    },
  };
}
