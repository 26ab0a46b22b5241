/**
 * Build Server Process Entry Point
 *
 * Spawned by the launcher with the endpoint on its command line:
 *   1. Checks the requested protocol version against its own
 *   2. Loads the workspace graph and binds the endpoint
 *   3. Prints the readiness sentinel to stderr
 *   4. Serves clients until SIGTERM or SIGINT
 *
 * The launcher detaches from this process once it is ready, so stdout and
 * stderr may be closed under us at any time.
 *
 * ESM module — use .js extensions on imports.
 */

import path from 'path';
import { fileURLToPath } from 'url';
import {
  BSP_VERSION,
  EXIT_CODES,
  READY_SENTINEL,
  describeEndpoint,
  endpointFromArgs,
  startBuildServer,
  toExitStatus,
  type RunningBuildServer,
} from '@buildlink/core';

export interface ServerArgs {
  workspaceRoot: string;
  protocolVersion: string;
}

function flag(args: string[], name: string): string | undefined {
  const i = args.indexOf(`--${name}`);
  return i === -1 ? undefined : args[i + 1];
}

export function parseServerArgs(args: string[], cwd: string = process.cwd()): ServerArgs {
  return {
    workspaceRoot: path.resolve(cwd, flag(args, 'workspace') ?? '.'),
    protocolVersion: flag(args, 'protocol-version') ?? BSP_VERSION,
  };
}

/** Whether a client speaking `requested` can talk to this server. */
export function isSupportedProtocol(requested: string): boolean {
  return requested.split('.')[0] === BSP_VERSION.split('.')[0];
}

function tolerateClosedOutput(stream: NodeJS.WriteStream): void {
  stream.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code !== 'EPIPE') {
      throw err;
    }
  });
}

async function main(args: string[]): Promise<void> {
  tolerateClosedOutput(process.stdout);
  tolerateClosedOutput(process.stderr);

  const { workspaceRoot, protocolVersion } = parseServerArgs(args);
  if (!isSupportedProtocol(protocolVersion)) {
    console.error(`[Server] Protocol ${protocolVersion} requested, this server speaks ${BSP_VERSION}`);
    process.exit(EXIT_CODES['version-incompatible']);
  }

  const endpoint = endpointFromArgs(args);
  console.log('[Server] Process started, pid:', process.pid);

  let server: RunningBuildServer;
  try {
    server = await startBuildServer({ workspaceRoot, endpoint });
  } catch (err) {
    console.error('[Server] Boot failed:', err instanceof Error ? err.message : err);
    process.exit(EXIT_CODES[toExitStatus(err)]);
  }

  const shutdown = (signal: string): void => {
    console.log(`[Server] Received ${signal}, shutting down`);
    server.close().then(
      () => process.exit(0),
      (err: unknown) => {
        console.error('[Server] Shutdown failed:', err);
        process.exit(1);
      },
    );
  };
  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  process.stderr.write(`${READY_SENTINEL} on ${describeEndpoint(server.endpoint)}\n`);
}

if (process.argv[1] && path.resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main(process.argv.slice(2)).catch((err: unknown) => {
    console.error('[Server] Fatal:', err);
    process.exit(1);
  });
}
