import { PassThrough } from 'stream';
import { describe, it, expect, vi, afterEach } from 'vitest';
import { OneShot } from '../../../src/launcher/one-shot.js';
import { OutputTail, pollEndpoint, waitForSentinel, watchLines } from '../../../src/launcher/readiness.js';
import { Connection } from '../../../src/transport/connection.js';
import { LauncherError, TransportError } from '../../../src/common/errors.js';
import { FakeServerProcess } from '../../helpers/fake-process.js';

const backoff = { initialDelayMs: 5, maxDelayMs: 20 };

describe('OneShot', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should settle once and ignore later calls', async () => {
    const shot = new OneShot<number>(1_000, () => new Error('timeout'));
    expect(shot.resolve(1)).toBe(true);
    expect(shot.resolve(2)).toBe(false);
    expect(shot.reject(new Error('late'))).toBe(false);
    expect(shot.isSettled).toBe(true);
    await expect(shot.promise).resolves.toBe(1);
  });

  it('should reject with the timeout error', async () => {
    vi.useFakeTimers();
    const shot = new OneShot<void>(100, () => new Error('too slow'));
    const settled = expect(shot.promise).rejects.toThrow('too slow');
    vi.advanceTimersByTime(100);
    await settled;
    expect(shot.resolve()).toBe(false);
  });
});

describe('OutputTail', () => {
  it('should keep only the last lines', () => {
    const tail = new OutputTail(2);
    tail.push('a');
    tail.push('b');
    tail.push('c');
    expect(tail.toString()).toBe('b\nc');
  });
});

describe('watchLines', () => {
  const flush = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

  it('should split chunks into lines and hold a partial line', async () => {
    const stream = new PassThrough();
    const lines: string[] = [];
    const stop = watchLines(stream, (line) => lines.push(line));

    stream.write('one\r\ntw');
    stream.write('o\nthree');
    await flush();
    expect(lines).toEqual(['one', 'two']);

    stop();
    stream.write('\nfour\n');
    await flush();
    expect(lines).toEqual(['one', 'two']);
  });
});

describe('waitForSentinel', () => {
  it('should resolve when the sentinel appears on stderr', async () => {
    const child = new FakeServerProcess();
    const ready = waitForSentinel(child, 'server listening', 1_000);
    child.printStdout('loading workspace');
    child.printStderr('server listening on local:/tmp/b.sock');
    await expect(ready).resolves.toBeUndefined();
  });

  it('should time out with readinessTimeout', async () => {
    const child = new FakeServerProcess();
    await expect(waitForSentinel(child, 'server listening', 20)).rejects.toMatchObject({
      kind: 'readinessTimeout',
    });
  });

  it('should fail with spawnFailed and the output tail when the process exits', async () => {
    const child = new FakeServerProcess();
    const tail = new OutputTail();
    const ready = waitForSentinel(child, 'server listening', 1_000, tail);
    child.printStderr('cannot read workspace');
    await new Promise((resolve) => setImmediate(resolve));
    child.exit(1);

    const error = await ready.catch((err: unknown) => err);
    expect(error).toBeInstanceOf(LauncherError);
    expect(error).toMatchObject({ kind: 'spawnFailed' });
    expect(error instanceof Error ? error.message : '').toBe(
      'Build server exited with code 1 before becoming ready\ncannot read workspace',
    );
  });

  it('should map exit code 13 to versionMismatch', async () => {
    const child = new FakeServerProcess();
    const ready = waitForSentinel(child, 'server listening', 1_000);
    child.exit(13);
    await expect(ready).rejects.toMatchObject({ kind: 'versionMismatch' });
  });

  it('should map a spawn error to spawnFailed', async () => {
    const child = new FakeServerProcess();
    const ready = waitForSentinel(child, 'server listening', 1_000);
    child.emit('error', new Error('spawn node ENOENT'));
    await expect(ready).rejects.toMatchObject({ kind: 'spawnFailed' });
  });
});

describe('pollEndpoint', () => {
  it('should retry until the endpoint accepts', async () => {
    const connection = new Connection({ label: 'fake' });
    const open = vi
      .fn<() => Promise<Connection>>()
      .mockRejectedValueOnce(new TransportError('refused', 'refused'))
      .mockRejectedValueOnce(new TransportError('refused', 'refused'))
      .mockResolvedValue(connection);

    await expect(pollEndpoint(open, 1_000, backoff)).resolves.toBe(connection);
    expect(open).toHaveBeenCalledTimes(3);
  });

  it('should give up with readinessTimeout carrying the last error', async () => {
    const refused = new TransportError('refused', 'still refused');
    const open = vi.fn<() => Promise<Connection>>().mockRejectedValue(refused);
    const error = await pollEndpoint(open, 40, backoff).catch((err: unknown) => err);
    expect(error).toMatchObject({ kind: 'readinessTimeout' });
    expect(error instanceof Error ? error.cause : undefined).toBe(refused);
  });

  it('should stop polling when the process exits', async () => {
    const child = new FakeServerProcess();
    const open = vi.fn<() => Promise<Connection>>().mockRejectedValue(new TransportError('refused', 'refused'));
    const ready = pollEndpoint(open, 1_000, backoff, child);
    setTimeout(() => child.exit(2), 10);
    await expect(ready).rejects.toMatchObject({ kind: 'spawnFailed' });
  });
});
