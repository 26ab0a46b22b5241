import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import type { ServerProcess } from '../../src/launcher/readiness.js';

/** Stand-in for a spawned server: writable output streams, recorded signals. */
export class FakeServerProcess extends EventEmitter implements ServerProcess {
  readonly pid = 4242;
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  readonly signals: NodeJS.Signals[] = [];
  unrefCalls = 0;
  private exited = false;

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    setImmediate(() => this.exit(null, signal));
    return true;
  }

  unref(): void {
    this.unrefCalls++;
  }

  printStdout(line: string): void {
    this.stdout.write(`${line}\n`);
  }

  printStderr(line: string): void {
    this.stderr.write(`${line}\n`);
  }

  exit(code: number | null, signal: NodeJS.Signals | null = null): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    this.exitCode = code ?? 128;
    this.emit('exit', code, signal);
  }
}
