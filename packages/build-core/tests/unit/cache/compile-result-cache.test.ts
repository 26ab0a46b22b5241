import { describe, it, expect, vi, beforeEach, afterEach, type Mock } from 'vitest';
import { CompileResultCache } from '../../../src/cache/compile-result-cache.js';
import { DecodePool, type AnalysisDecoder } from '../../../src/cache/decode-pool.js';
import { CacheError, ConnectionLostError, RequestError } from '../../../src/common/errors.js';
import type { AnalysisContents, Diagnostic } from '../../../src/common/types/build.js';

const core = { uri: 'file:///w/?id=core' };
const app = { uri: 'file:///w/?id=app' };

function analysisOf(location: string): AnalysisContents {
  return {
    target: core,
    originId: 'o1',
    classDirectory: 'file:///w/out/core/',
    sources: [{ uri: location, digest: 'abc123' }],
    producedAt: 1,
  };
}

const unusedVar: Diagnostic = {
  range: { start: { line: 2, character: 4 }, end: { line: 2, character: 9 } },
  severity: 2,
  message: 'unused value',
};

describe('CompileResultCache', () => {
  let decode: Mock<AnalysisDecoder>;
  let cache: CompileResultCache;

  beforeEach(() => {
    decode = vi.fn<AnalysisDecoder>(async (location) => analysisOf(location));
    cache = new CompileResultCache({ pool: new DecodePool(decode, 2), defaultTimeoutMs: 1_000 });
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('outcomes', () => {
    it('should publish an outcome with the diagnostics recorded before it', async () => {
      cache.expect('o1', [core]);
      cache.recordTaskStart('o1', core);
      cache.recordDiagnostics({ originId: 'o1', target: core, file: 'file:///w/a.scala', diagnostics: [unusedVar], reset: true });
      expect(cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 1 })).toBe(true);

      await expect(cache.awaitOutcome('o1', core)).resolves.toEqual({
        originId: 'o1',
        target: core,
        status: 'ok',
        diagnostics: [unusedVar],
        errors: 0,
        warnings: 1,
      });
    });

    it('should replace a file diagnostics on reset and append otherwise', async () => {
      const other: Diagnostic = { ...unusedVar, message: 'shadowed name' };
      cache.recordTaskStart('o1', core);
      cache.recordDiagnostics({ originId: 'o1', target: core, file: 'file:///w/a.scala', diagnostics: [unusedVar], reset: true });
      cache.recordDiagnostics({ originId: 'o1', target: core, file: 'file:///w/a.scala', diagnostics: [other], reset: true });
      cache.recordDiagnostics({ originId: 'o1', target: core, file: 'file:///w/b.scala', diagnostics: [unusedVar], reset: false });
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 2 });

      const outcome = await cache.awaitOutcome('o1', core);
      expect(outcome.diagnostics).toEqual([other, unusedVar]);
    });

    it('should park a finish that arrives before its start', async () => {
      cache.expect('o1', [core]);
      cache.publish({ originId: 'o1', target: core, status: 'failed', errors: 1, warnings: 0 });
      expect(cache.outcomes('o1')).toEqual([]);

      const waiting = cache.awaitOutcome('o1', core);
      cache.recordTaskStart('o1', core);

      await expect(waiting).resolves.toMatchObject({ status: 'failed', errors: 1 });
    });

    it('should keep the first final outcome of a pair', async () => {
      cache.recordTaskStart('o1', core);
      expect(cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0 })).toBe(true);
      expect(cache.publish({ originId: 'o1', target: core, status: 'failed', errors: 3, warnings: 0 })).toBe(false);

      await expect(cache.awaitOutcome('o1', core)).resolves.toMatchObject({ status: 'ok', errors: 0 });
    });

    it('should keep outcomes of different origin ids apart', async () => {
      for (const [originId, status] of [
        ['o1', 'ok'],
        ['o2', 'failed'],
      ] as const) {
        cache.recordTaskStart(originId, core);
        cache.publish({ originId, target: core, status, errors: status === 'ok' ? 0 : 1, warnings: 0 });
      }

      await expect(cache.awaitOutcome('o1', core)).resolves.toMatchObject({ originId: 'o1', status: 'ok' });
      await expect(cache.awaitOutcome('o2', core)).resolves.toMatchObject({ originId: 'o2', status: 'failed' });
    });

    it('should list outcomes in order of arrival', () => {
      cache.recordTaskStart('o1', core);
      cache.recordTaskStart('o1', app);
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0 });
      cache.publish({ originId: 'o1', target: app, status: 'cancelled', errors: 0, warnings: 0 });

      expect(cache.outcomes('o1').map((o) => [o.target.uri, o.status])).toEqual([
        [core.uri, 'ok'],
        [app.uri, 'cancelled'],
      ]);
      expect(cache.outcomes('missing')).toEqual([]);
    });
  });

  describe('waiting', () => {
    it('should fail with notFound for an unknown origin id', async () => {
      await expect(cache.awaitOutcome('nope', core)).rejects.toMatchObject({ kind: 'notFound' });
    });

    it('should time out when no outcome arrives', async () => {
      cache.expect('o1', [core]);
      const error = await cache.awaitOutcome('o1', core, 20).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CacheError);
      expect(error).toMatchObject({ kind: 'timeout' });
    });

    it('should fail pending waits with notFound once the compile completed', async () => {
      cache.expect('o1', [core, app]);
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0 });
      const waiting = cache.awaitOutcome('o1', app);

      cache.complete('o1');

      await expect(waiting).rejects.toMatchObject({ kind: 'notFound' });
      await expect(cache.awaitOutcome('o1', app)).rejects.toMatchObject({ kind: 'notFound' });
      await expect(cache.awaitOutcome('o1', core)).resolves.toMatchObject({ status: 'ok' });
    });

    it('should fail pending waits with cancelled on cancel', async () => {
      cache.expect('o1', [core]);
      const waiting = cache.awaitOutcome('o1', core);
      cache.cancel('o1');
      await expect(waiting).rejects.toMatchObject({ kind: 'cancelled' });
    });

    it('should fail every pending wait with the connection error', async () => {
      cache.expect('o1', [core]);
      cache.expect('o2', [app]);
      const first = cache.awaitOutcome('o1', core);
      const second = cache.awaitOutcome('o2', app);
      const lost = new ConnectionLostError('Connection closed by peer');

      cache.failAll(lost);

      await expect(first).rejects.toBe(lost);
      await expect(second).rejects.toBe(lost);
      await expect(cache.awaitOutcome('o1', core)).rejects.toBe(lost);
    });
  });

  describe('origin ids', () => {
    it('should reject an origin id that is still running', () => {
      cache.expect('o1', [core]);
      expect(() => cache.expect('o1', [core])).toThrow(RequestError);
    });

    it('should adopt an origin first seen through a notification', () => {
      cache.recordTaskStart('o1', core);
      expect(() => cache.expect('o1', [core])).not.toThrow();
      expect(cache.stats().entries).toBe(1);
    });

    it('should start over when a finished origin id is reused', async () => {
      cache.expect('o1', [core]);
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'failed', errors: 1, warnings: 0 });
      cache.complete('o1');

      cache.expect('o1', [core]);
      expect(cache.outcomes('o1')).toEqual([]);
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0 });

      await expect(cache.awaitOutcome('o1', core)).resolves.toMatchObject({ status: 'ok' });
    });

    it('should drop everything on evict', async () => {
      cache.expect('o1', [core]);
      const waiting = cache.awaitOutcome('o1', core);

      expect(cache.evict('o1')).toBe(true);
      expect(cache.evict('o1')).toBe(false);
      expect(cache.has('o1')).toBe(false);
      await expect(waiting).rejects.toMatchObject({ kind: 'cancelled' });
    });
  });

  describe('analyses', () => {
    it('should decode the analysis of an outcome', async () => {
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0, analysisLocation: 'file:///w/a.gz' });

      await expect(cache.awaitAnalysis('o1', core)).resolves.toEqual(analysisOf('file:///w/a.gz'));
      await expect(cache.awaitAnalysis('o1', core)).resolves.toEqual(analysisOf('file:///w/a.gz'));
      expect(decode).toHaveBeenCalledTimes(1);
      expect(cache.stats()).toEqual({ origins: 1, entries: 1, decoded: 1 });
    });

    it('should resolve undefined when the compile wrote no analysis', async () => {
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'failed', errors: 1, warnings: 0 });

      await expect(cache.awaitAnalysis('o1', core)).resolves.toBeUndefined();
      expect(decode).not.toHaveBeenCalled();
    });

    it('should wait for the outcome before decoding', async () => {
      cache.expect('o1', [core]);
      const analysis = cache.awaitAnalysis('o1', core);
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0, analysisLocation: 'file:///w/b.gz' });

      await expect(analysis).resolves.toEqual(analysisOf('file:///w/b.gz'));
    });

    it('should report a failed decode as decodeFailed', async () => {
      decode.mockRejectedValue(new Error('incorrect header check'));
      cache.recordTaskStart('o1', core);
      cache.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0, analysisLocation: 'file:///w/bad.gz' });

      const error = await cache.awaitAnalysis('o1', core).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(CacheError);
      expect(error).toMatchObject({ kind: 'decodeFailed' });
    });

    it('should drop the least recently used decoded analysis and decode it again on demand', async () => {
      const small = new CompileResultCache({ pool: new DecodePool(decode, 1), maxDecodedEntries: 1 });
      small.recordTaskStart('o1', core);
      small.publish({ originId: 'o1', target: core, status: 'ok', errors: 0, warnings: 0, analysisLocation: 'file:///w/core.gz' });
      await small.awaitAnalysis('o1', core);

      small.recordTaskStart('o1', app);
      small.publish({ originId: 'o1', target: app, status: 'ok', errors: 0, warnings: 0, analysisLocation: 'file:///w/app.gz' });
      await small.awaitAnalysis('o1', app);
      expect(small.stats().decoded).toBe(1);

      await expect(small.awaitAnalysis('o1', core)).resolves.toEqual(analysisOf('file:///w/core.gz'));
      expect(decode).toHaveBeenCalledTimes(3);
      expect(small.stats().decoded).toBe(1);
    });
  });
});
