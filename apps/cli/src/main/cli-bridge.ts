/**
 * CLI Bridge
 *
 * Maps command-line commands 1:1 onto build-client operations:
 *
 *   buildlink targets
 *   buildlink compile core app
 *   buildlink sources core
 *   buildlink options core [--java]
 *   buildlink dependency-sources core
 *   buildlink ping
 *
 * Global flags: `--workspace <dir>` (default: cwd) and `--restart`.
 * Every failure maps to one exit code through toExitStatus.
 */

import {
  EXIT_CODES,
  RequestError,
  STATUS_CODE,
  resolveConfig,
  toExitStatus,
  type BuildClient,
  type BuildServerRegistry,
  type BuildTarget,
  type BuildLinkConfig,
  type CompileOutcome,
} from '@buildlink/core';
import { createRegistry } from './server-bootstrap.js';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export interface RunCliOptions {
  cwd?: string;
  env?: Record<string, string | undefined>;
  io?: CliIO;
  createRegistry?: (config: BuildLinkConfig) => BuildServerRegistry;
}

interface GlobalArgs {
  workspace: string | undefined;
  restart: boolean;
  rest: string[];
}

export function splitGlobalArgs(args: string[]): GlobalArgs {
  const rest: string[] = [];
  let workspace: string | undefined;
  let restart = false;
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--workspace') {
      workspace = args[++i];
    } else if (arg === '--restart') {
      restart = true;
    } else {
      rest.push(arg);
    }
  }
  return { workspace, restart, rest };
}

/** Find targets by display name or uri. */
export function resolveTargets(available: BuildTarget[], names: string[]): BuildTarget[] {
  return names.map((name) => {
    const target = available.find((candidate) => candidate.displayName === name || candidate.id.uri === name);
    if (!target) {
      throw new RequestError('unknownTarget', `Unknown build target: ${name}`);
    }
    return target;
  });
}

function formatOutcome(outcome: CompileOutcome, names: Map<string, string | undefined>): string[] {
  const name = names.get(outcome.target.uri) ?? outcome.target.uri;
  const lines = [`${name}: ${outcome.status} (${outcome.errors} errors, ${outcome.warnings} warnings)`];
  for (const diagnostic of outcome.diagnostics) {
    const severity = diagnostic.severity === 1 ? 'error' : diagnostic.severity === 2 ? 'warning' : 'info';
    const line = diagnostic.range.start.line + 1;
    lines.push(`  ${severity} [${line}:${diagnostic.range.start.character + 1}] ${diagnostic.message}`);
  }
  return lines;
}

async function singleTarget(client: BuildClient, args: string[]): Promise<BuildTarget | null> {
  const [name] = args.filter((arg) => !arg.startsWith('--'));
  if (!name) {
    return null;
  }
  const [target] = resolveTargets(await client.listBuildTargets(), [name]);
  return target ?? null;
}

/**
 * Run one command against an initialized client. Returns the exit code.
 */
export async function handleCliCommand(args: string[], client: BuildClient, io: CliIO = consoleIO): Promise<number> {
  const [command, ...rest] = args;

  switch (command) {
    case undefined:
    case 'help':
      printUsage(io);
      return EXIT_CODES.ok;

    case 'targets': {
      const targets = await client.listBuildTargets();
      if (targets.length === 0) {
        io.out('No build targets.');
      }
      for (const target of targets) {
        const deps = target.dependencies.length;
        io.out(`${target.displayName}\t${target.id.uri}${deps > 0 ? `\t(${deps} dependencies)` : ''}`);
      }
      return EXIT_CODES.ok;
    }

    case 'compile': {
      if (rest.length === 0) {
        io.err('Usage: compile <target>...');
        return EXIT_CODES['unexpected-error'];
      }
      const available = await client.listBuildTargets();
      const targets = resolveTargets(available, rest);
      const ack = await client.compile(targets.map((target) => target.id));
      const names = new Map(available.map((target) => [target.id.uri, target.displayName]));
      for (const outcome of client.cache.outcomes(ack.originId)) {
        for (const line of formatOutcome(outcome, names)) {
          io.out(line);
        }
      }
      client.cache.evict(ack.originId);
      return ack.statusCode === STATUS_CODE.OK ? EXIT_CODES.ok : EXIT_CODES['compile-failed'];
    }

    case 'sources': {
      const target = await singleTarget(client, rest);
      if (!target) {
        io.err('Usage: sources <target>');
        return EXIT_CODES['unexpected-error'];
      }
      for (const source of await client.getSources(target.id)) {
        io.out(source.generated ? `${source.uri} (generated)` : source.uri);
      }
      return EXIT_CODES.ok;
    }

    case 'options': {
      const target = await singleTarget(client, rest);
      if (!target) {
        io.err('Usage: options <target> [--java]');
        return EXIT_CODES['unexpected-error'];
      }
      const item = await client.getCompilerOptions(target.id, rest.includes('--java') ? 'java' : 'scala');
      io.out(`classDirectory: ${item.classDirectory}`);
      io.out(`options: ${item.options.join(' ')}`);
      io.out('classpath:');
      for (const entry of item.classpath) {
        io.out(`  ${entry}`);
      }
      return EXIT_CODES.ok;
    }

    case 'dependency-sources': {
      const target = await singleTarget(client, rest);
      if (!target) {
        io.err('Usage: dependency-sources <target>');
        return EXIT_CODES['unexpected-error'];
      }
      for (const uri of await client.getDependencySources(target.id)) {
        io.out(uri);
      }
      return EXIT_CODES.ok;
    }

    case 'ping': {
      const info = client.serverInfo;
      io.out(info ? `${info.displayName} ${info.version} (protocol ${info.bspVersion})` : 'Not connected');
      return info ? EXIT_CODES.ok : EXIT_CODES['connection-lost'];
    }

    default:
      io.err(`Unknown command: ${command}`);
      printUsage(io);
      return EXIT_CODES['unexpected-error'];
  }
}

/**
 * Parse global flags, acquire a client for the workspace and run the
 * command. Returns the process exit code.
 */
export async function runCli(args: string[], options: RunCliOptions = {}): Promise<number> {
  const io = options.io ?? consoleIO;
  const { workspace, restart, rest } = splitGlobalArgs(args);
  if (rest.length === 0 || rest[0] === 'help') {
    printUsage(io);
    return EXIT_CODES.ok;
  }

  const config = resolveConfig(workspace ?? options.cwd ?? process.cwd(), options.env ?? process.env);
  const registry = (options.createRegistry ?? createRegistry)(config);
  try {
    const client = await registry.acquire(config.endpoint, { restart });
    return await handleCliCommand(rest, client, io);
  } catch (err) {
    const status = toExitStatus(err);
    io.err(`error (${status}): ${err instanceof Error ? err.message : String(err)}`);
    return EXIT_CODES[status];
  } finally {
    await registry.closeAll();
  }
}

function printUsage(io: CliIO): void {
  io.out(
    `
buildlink

Usage:
  targets                        List build targets
  compile <target>...            Compile targets and their dependencies
  sources <target>               List source files and directories
  options <target> [--java]      Show compiler options and classpath
  dependency-sources <target>    List dependency source archives
  ping                           Check the build server

Flags:
  --workspace <dir>              Workspace root (default: current directory)
  --restart                      Restart the build server first
`.trim(),
  );
}
