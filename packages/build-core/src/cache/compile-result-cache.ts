/**
 * Compile-Result Cache
 *
 * Correlates the task notifications of compile requests into one outcome per
 * (originId, target) pair, and exposes each outcome and its decoded analysis
 * as something a caller can await.
 *
 * Rules:
 * - An outcome is published only after the target's task start was seen; a
 *   finish that arrives first is parked until the start shows up.
 * - The first final outcome for a pair wins. Later ones are logged and kept
 *   out.
 * - Decoded analyses are bounded by `maxDecodedEntries`. The least recently
 *   used one that nobody is awaiting gives up its decoded value and keeps its
 *   location, so the next await decodes it again.
 *
 * ESM module — use .js extensions on imports.
 */

import { DEFAULT_MAX_DECODED_ENTRIES, DEFAULT_REQUEST_TIMEOUT_MS } from '../common/config.js';
import { CacheError, RequestError } from '../common/errors.js';
import type {
  AnalysisContents,
  BuildTargetIdentifier,
  CompileOutcome,
  CompileStatus,
  Diagnostic,
} from '../common/types/build.js';
import { DecodePool } from './decode-pool.js';

/** A target's task finish, as extracted from a compile report. */
export interface FinishedTask {
  originId: string;
  target: BuildTargetIdentifier;
  status: CompileStatus;
  errors: number;
  warnings: number;
  analysisLocation?: string;
}

export interface DiagnosticsBatch {
  originId: string;
  target: BuildTargetIdentifier;
  /** Source file the diagnostics belong to */
  file: string;
  diagnostics: Diagnostic[];
  /** Replace earlier diagnostics for this file instead of appending */
  reset: boolean;
}

export interface CompileResultCacheOptions {
  pool?: DecodePool;
  maxDecodedEntries?: number;
  defaultTimeoutMs?: number;
}

type AnalysisSlot =
  | { state: 'none' }
  | { state: 'decoding'; promise: Promise<AnalysisContents> }
  | { state: 'decoded'; value: AnalysisContents }
  | { state: 'failed'; error: CacheError };

interface Waiter {
  resolve(outcome: CompileOutcome): void;
  reject(error: Error): void;
}

interface Entry {
  readonly originId: string;
  readonly target: BuildTargetIdentifier;
  started: boolean;
  parked: FinishedTask | null;
  diagnostics: Array<{ file: string; diagnostic: Diagnostic }>;
  outcome: CompileOutcome | null;
  analysis: AnalysisSlot;
  waiters: Set<Waiter>;
  /** Callers currently inside awaitAnalysis for this entry */
  readers: number;
}

type OriginState = 'running' | 'completed' | 'cancelled';

interface OriginRecord {
  entries: Map<string, Entry>;
  /** Targets named by `expect`, or null when first seen via a notification. Dependencies compiled along with them are not listed. */
  expected: Set<string> | null;
  state: OriginState;
}

export interface CacheStats {
  origins: number;
  entries: number;
  decoded: number;
}

function toCacheError(err: unknown): CacheError {
  if (err instanceof CacheError) {
    return err;
  }
  const message = err instanceof Error ? err.message : String(err);
  return new CacheError('decodeFailed', `Analysis decoding failed: ${message}`, { cause: err });
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  if (timeoutMs <= 0) {
    return Promise.reject(onTimeout());
  }
  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise.then(
      (value) => {
        clearTimeout(timer);
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        reject(err);
      },
    );
  });
}

export class CompileResultCache {
  private origins = new Map<string, OriginRecord>();
  /** Entries holding a decoded analysis, least recently used first */
  private decoded = new Set<Entry>();
  private lost: Error | null = null;
  private readonly pool: DecodePool;
  private readonly maxDecodedEntries: number;
  private readonly defaultTimeoutMs: number;

  constructor(options: CompileResultCacheOptions = {}) {
    this.pool = options.pool ?? new DecodePool();
    this.maxDecodedEntries = options.maxDecodedEntries ?? DEFAULT_MAX_DECODED_ENTRIES;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Register a compile about to be sent.
   *
   * An origin id still running is rejected. One whose compile already
   * finished starts over: its old entries are evicted first.
   * @throws RequestError('badArguments')
   */
  expect(originId: string, targets: BuildTargetIdentifier[]): void {
    const existing = this.origins.get(originId);
    if (existing) {
      if (existing.state === 'running' && existing.expected !== null) {
        throw new RequestError('badArguments', `Origin id ${originId} belongs to a compile that is still running`);
      }
      if (existing.state === 'running') {
        existing.expected = new Set(targets.map((t) => t.uri));
        return;
      }
      console.log(`[CompileResultCache] Origin id ${originId} reused, dropping the previous results`);
      this.evict(originId);
    }
    this.origins.set(originId, {
      entries: new Map(),
      expected: new Set(targets.map((t) => t.uri)),
      state: 'running',
    });
  }

  recordTaskStart(originId: string, target: BuildTargetIdentifier): void {
    const entry = this.entryFor(originId, target);
    if (entry.started) {
      return;
    }
    entry.started = true;
    const parked = entry.parked;
    if (parked) {
      entry.parked = null;
      this.finish(entry, parked);
    }
  }

  recordDiagnostics(batch: DiagnosticsBatch): void {
    const entry = this.entryFor(batch.originId, batch.target);
    if (entry.outcome) {
      console.warn(
        `[CompileResultCache] Diagnostics for ${batch.file} arrived after ${batch.target.uri} finished (origin ${batch.originId}); not recorded`,
      );
      return;
    }
    if (batch.reset) {
      entry.diagnostics = entry.diagnostics.filter((d) => d.file !== batch.file);
    }
    for (const diagnostic of batch.diagnostics) {
      entry.diagnostics.push({ file: batch.file, diagnostic });
    }
  }

  /**
   * Record a target's final outcome. Returns false when it was kept out
   * because the pair already has one.
   */
  publish(task: FinishedTask): boolean {
    const entry = this.entryFor(task.originId, task.target);
    if (entry.outcome || entry.parked) {
      console.warn(
        `[CompileResultCache] Duplicate final outcome for ${task.target.uri} (origin ${task.originId}, status ${task.status}); keeping the first`,
      );
      return false;
    }
    if (!entry.started) {
      entry.parked = task;
      return true;
    }
    this.finish(entry, task);
    return true;
  }

  /**
   * Wait for a target's outcome.
   * @throws CacheError('notFound' | 'timeout' | 'cancelled') or the connection-lost error
   */
  async awaitOutcome(
    originId: string,
    target: BuildTargetIdentifier,
    timeoutMs = this.defaultTimeoutMs,
  ): Promise<CompileOutcome> {
    const entry = this.lookup(originId, target);
    return entry.outcome ?? this.waitForOutcome(entry, timeoutMs);
  }

  /**
   * Wait for a target's outcome and its decoded analysis. Resolves to
   * undefined when the compile produced no analysis.
   * @throws CacheError('notFound' | 'timeout' | 'decodeFailed' | 'cancelled') or the connection-lost error
   */
  async awaitAnalysis(
    originId: string,
    target: BuildTargetIdentifier,
    timeoutMs = this.defaultTimeoutMs,
  ): Promise<AnalysisContents | undefined> {
    const startedAt = Date.now();
    const entry = this.lookup(originId, target);
    entry.readers++;
    try {
      const outcome = entry.outcome ?? (await this.waitForOutcome(entry, timeoutMs));
      if (!outcome.analysisLocation) {
        return undefined;
      }
      const remaining = timeoutMs - (Date.now() - startedAt);
      return await withTimeout(
        this.analysisFor(entry, outcome.analysisLocation),
        remaining,
        () => new CacheError('timeout', `Timed out decoding analysis of ${target.uri} (origin ${originId})`),
      );
    } finally {
      entry.readers--;
    }
  }

  /** Published outcomes of an origin id, in target order of arrival. */
  outcomes(originId: string): CompileOutcome[] {
    const record = this.origins.get(originId);
    if (!record) {
      return [];
    }
    const result: CompileOutcome[] = [];
    for (const entry of record.entries.values()) {
      if (entry.outcome) {
        result.push(entry.outcome);
      }
    }
    return result;
  }

  has(originId: string): boolean {
    return this.origins.has(originId);
  }

  /**
   * The compile request returned. Waits on targets that never got an
   * outcome fail with notFound.
   */
  complete(originId: string): void {
    const record = this.origins.get(originId);
    if (!record || record.state !== 'running') {
      return;
    }
    record.state = 'completed';
    for (const entry of record.entries.values()) {
      if (entry.parked) {
        console.warn(
          `[CompileResultCache] ${entry.target.uri} finished without a task start (origin ${originId}); outcome not published`,
        );
      }
      this.rejectWaiters(
        entry,
        new CacheError('notFound', `Compile ${originId} finished without an outcome for ${entry.target.uri}`),
      );
    }
  }

  /**
   * Stop waiting for outcomes of an origin id. Outcomes already published
   * stay available.
   */
  cancel(originId: string): void {
    const record = this.origins.get(originId);
    if (!record || record.state !== 'running') {
      return;
    }
    record.state = 'cancelled';
    for (const entry of record.entries.values()) {
      this.rejectWaiters(entry, new CacheError('cancelled', `Compile ${originId} was cancelled`));
    }
  }

  /**
   * Drop everything recorded for an origin id. Decodes still running finish
   * and their results are discarded.
   */
  evict(originId: string): boolean {
    const record = this.origins.get(originId);
    if (!record) {
      return false;
    }
    this.origins.delete(originId);
    for (const entry of record.entries.values()) {
      this.decoded.delete(entry);
      entry.analysis = { state: 'none' };
      this.rejectWaiters(entry, new CacheError('cancelled', `Results of ${originId} were evicted`));
    }
    return true;
  }

  /** The connection went away: every wait without an outcome fails with `error`. */
  failAll(error: Error): void {
    this.lost = error;
    for (const record of this.origins.values()) {
      for (const entry of record.entries.values()) {
        this.rejectWaiters(entry, error);
      }
    }
  }

  stats(): CacheStats {
    let entries = 0;
    for (const record of this.origins.values()) {
      entries += record.entries.size;
    }
    return { origins: this.origins.size, entries, decoded: this.decoded.size };
  }

  private entryFor(originId: string, target: BuildTargetIdentifier): Entry {
    let record = this.origins.get(originId);
    if (!record) {
      record = { entries: new Map(), expected: null, state: 'running' };
      this.origins.set(originId, record);
    }
    let entry = record.entries.get(target.uri);
    if (!entry) {
      entry = {
        originId,
        target,
        started: false,
        parked: null,
        diagnostics: [],
        outcome: null,
        analysis: { state: 'none' },
        waiters: new Set(),
        readers: 0,
      };
      record.entries.set(target.uri, entry);
    }
    return entry;
  }

  /** Find the entry to wait on, or fail at once when waiting is pointless. */
  private lookup(originId: string, target: BuildTargetIdentifier): Entry {
    const record = this.origins.get(originId);
    if (!record) {
      throw new CacheError('notFound', `No compile with origin id ${originId}`);
    }
    const existing = record.entries.get(target.uri);
    if (existing?.outcome) {
      return existing;
    }
    if (this.lost) {
      throw this.lost;
    }
    switch (record.state) {
      case 'completed':
        throw new CacheError('notFound', `Compile ${originId} finished without an outcome for ${target.uri}`);
      case 'cancelled':
        throw new CacheError('cancelled', `Compile ${originId} was cancelled`);
      case 'running':
        return existing ?? this.entryFor(originId, target);
    }
  }

  private waitForOutcome(entry: Entry, timeoutMs: number): Promise<CompileOutcome> {
    return new Promise<CompileOutcome>((resolve, reject) => {
      const timer = setTimeout(() => {
        entry.waiters.delete(waiter);
        reject(
          new CacheError(
            'timeout',
            `Timed out after ${timeoutMs}ms waiting for ${entry.target.uri} (origin ${entry.originId})`,
          ),
        );
      }, timeoutMs);
      const waiter: Waiter = {
        resolve: (outcome) => {
          clearTimeout(timer);
          resolve(outcome);
        },
        reject: (error) => {
          clearTimeout(timer);
          reject(error);
        },
      };
      entry.waiters.add(waiter);
    });
  }

  private finish(entry: Entry, task: FinishedTask): void {
    const outcome: CompileOutcome = {
      originId: task.originId,
      target: task.target,
      status: task.status,
      diagnostics: entry.diagnostics.map((d) => d.diagnostic),
      errors: task.errors,
      warnings: task.warnings,
      analysisLocation: task.analysisLocation,
    };
    entry.outcome = outcome;
    if (task.analysisLocation) {
      this.startDecode(entry, task.analysisLocation);
    }
    const waiters = [...entry.waiters];
    entry.waiters.clear();
    for (const waiter of waiters) {
      waiter.resolve(outcome);
    }
  }

  private rejectWaiters(entry: Entry, error: Error): void {
    if (entry.outcome) {
      return;
    }
    const waiters = [...entry.waiters];
    entry.waiters.clear();
    for (const waiter of waiters) {
      waiter.reject(error);
    }
  }

  private isLive(entry: Entry): boolean {
    return this.origins.get(entry.originId)?.entries.get(entry.target.uri) === entry;
  }

  private startDecode(entry: Entry, location: string): Promise<AnalysisContents> {
    const promise = this.pool.submit(location);
    entry.analysis = { state: 'decoding', promise };
    const current = (): boolean =>
      this.isLive(entry) && entry.analysis.state === 'decoding' && entry.analysis.promise === promise;

    promise.then(
      (value) => {
        if (!current()) {
          return;
        }
        entry.analysis = { state: 'decoded', value };
        this.touch(entry);
        this.enforceLimit();
      },
      (err: unknown) => {
        if (!current()) {
          return;
        }
        const error = toCacheError(err);
        console.warn(`[CompileResultCache] ${error.message}`);
        entry.analysis = { state: 'failed', error };
      },
    );
    return promise;
  }

  private async analysisFor(entry: Entry, location: string): Promise<AnalysisContents> {
    const slot = entry.analysis;
    switch (slot.state) {
      case 'decoded':
        this.touch(entry);
        return slot.value;
      case 'failed':
        throw slot.error;
      case 'decoding':
        return this.settleDecode(entry, slot.promise);
      case 'none':
        if (!this.isLive(entry)) {
          throw new CacheError('cancelled', `Results of ${entry.originId} were evicted`);
        }
        return this.settleDecode(entry, this.startDecode(entry, location));
    }
  }

  private async settleDecode(entry: Entry, promise: Promise<AnalysisContents>): Promise<AnalysisContents> {
    let value: AnalysisContents;
    try {
      value = await promise;
    } catch (err) {
      throw toCacheError(err);
    }
    if (!this.isLive(entry)) {
      throw new CacheError('cancelled', `Results of ${entry.originId} were evicted`);
    }
    return value;
  }

  private touch(entry: Entry): void {
    this.decoded.delete(entry);
    this.decoded.add(entry);
  }

  private enforceLimit(): void {
    let excess = this.decoded.size - this.maxDecodedEntries;
    for (const entry of this.decoded) {
      if (excess <= 0) {
        return;
      }
      if (entry.readers > 0) {
        continue;
      }
      entry.analysis = { state: 'none' };
      this.decoded.delete(entry);
      excess--;
    }
  }
}
