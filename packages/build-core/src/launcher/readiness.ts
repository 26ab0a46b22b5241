/**
 * Readiness detection for a freshly spawned build server.
 *
 * Two strategies: watch the process output for the sentinel line, or poll
 * the endpoint with bounded exponential backoff. Both settle a OneShot, so
 * a timeout is always in effect, and both fail fast when the process exits.
 */

import type { Readable } from 'stream';
import { EXIT_CODES, LauncherError } from '../common/errors.js';
import type { Connection } from '../transport/connection.js';
import { OneShot } from './one-shot.js';

/** The parts of a child process the launcher relies on. */
export interface ServerProcess {
  readonly pid?: number;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  kill(signal?: NodeJS.Signals): boolean;
  unref(): void;
  once(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  once(event: 'error', listener: (err: Error) => void): this;
  off(event: 'exit', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
  off(event: 'error', listener: (err: Error) => void): this;
}

/** Keeps the last few output lines for error messages. */
export class OutputTail {
  private lines: string[] = [];

  constructor(private readonly limit = 20) {}

  push(line: string): void {
    this.lines.push(line);
    if (this.lines.length > this.limit) {
      this.lines.shift();
    }
  }

  toString(): string {
    return this.lines.join('\n');
  }
}

/** Split a stream into lines and hand each to `onLine`. Returns an unsubscribe. */
export function watchLines(stream: Readable, onLine: (line: string) => void): () => void {
  let partial = '';
  const onData = (chunk: Buffer | string): void => {
    partial += chunk.toString();
    const lines = partial.split(/\r?\n/);
    partial = lines.pop() ?? '';
    for (const line of lines) {
      onLine(line);
    }
  };
  stream.on('data', onData);
  return () => {
    stream.off('data', onData);
  };
}

function exitError(code: number | null, signal: NodeJS.Signals | null, tail: OutputTail): LauncherError {
  const output = tail.toString();
  const suffix = output ? `\n${output}` : '';
  if (code === EXIT_CODES['version-incompatible']) {
    return new LauncherError('versionMismatch', `Build server rejected the protocol version${suffix}`);
  }
  const how = signal ? `signal ${signal}` : `code ${code ?? 'unknown'}`;
  return new LauncherError('spawnFailed', `Build server exited with ${how} before becoming ready${suffix}`);
}

/**
 * Fail the one-shot when the process errors or exits. Returns a detach
 * function.
 */
function watchExit<T>(child: ServerProcess, signal: OneShot<T>, tail: OutputTail): () => void {
  const onExit = (code: number | null, exitSignal: NodeJS.Signals | null): void => {
    signal.reject(exitError(code, exitSignal, tail));
  };
  const onError = (err: Error): void => {
    signal.reject(new LauncherError('spawnFailed', `Failed to start build server: ${err.message}`, { cause: err }));
  };
  child.once('exit', onExit);
  child.once('error', onError);
  return () => {
    child.off('exit', onExit);
    child.off('error', onError);
  };
}

/**
 * Resolve once a line containing `sentinel` appears on stdout or stderr.
 * @throws LauncherError('readinessTimeout' | 'spawnFailed' | 'versionMismatch')
 */
export async function waitForSentinel(
  child: ServerProcess,
  sentinel: string,
  timeoutMs: number,
  tail: OutputTail = new OutputTail(),
): Promise<void> {
  const ready = new OneShot<void>(
    timeoutMs,
    () =>
      new LauncherError(
        'readinessTimeout',
        `Build server did not print "${sentinel}" within ${timeoutMs}ms`,
      ),
  );

  const onLine = (line: string): void => {
    tail.push(line);
    if (line.includes(sentinel)) {
      ready.resolve();
    }
  };
  const unwatch = [child.stdout, child.stderr]
    .filter((stream): stream is Readable => stream !== null)
    .map((stream) => watchLines(stream, onLine));
  const detachExit = watchExit(child, ready, tail);

  try {
    await ready.promise;
  } finally {
    detachExit();
    for (const stop of unwatch) {
      stop();
    }
  }
}

export interface BackoffOptions {
  initialDelayMs: number;
  maxDelayMs: number;
}

/**
 * Try `open` until it succeeds, doubling the delay between attempts up to
 * `maxDelayMs`, for at most `timeoutMs` overall.
 * @throws LauncherError('readinessTimeout' | 'spawnFailed' | 'versionMismatch')
 */
export async function pollEndpoint(
  open: () => Promise<Connection>,
  timeoutMs: number,
  backoff: BackoffOptions,
  child?: ServerProcess,
  tail: OutputTail = new OutputTail(),
): Promise<Connection> {
  let lastError: unknown;
  const ready = new OneShot<Connection>(
    timeoutMs,
    () =>
      new LauncherError('readinessTimeout', `Build server did not accept connections within ${timeoutMs}ms`, {
        cause: lastError,
      }),
  );
  const detachExit = child ? watchExit(child, ready, tail) : () => undefined;

  const attempt = async (delayMs: number): Promise<void> => {
    while (!ready.isSettled) {
      try {
        const connection = await open();
        if (!ready.resolve(connection)) {
          // Timed out while this attempt was in flight
          connection.close();
        }
        return;
      } catch (err) {
        lastError = err;
      }
      await new Promise<void>((resolve) => setTimeout(resolve, delayMs));
      delayMs = Math.min(delayMs * 2, backoff.maxDelayMs);
    }
  };

  attempt(backoff.initialDelayMs).catch((err: unknown) => {
    ready.reject(err instanceof Error ? err : new Error(String(err)));
  });

  try {
    return await ready.promise;
  } finally {
    detachExit();
  }
}
