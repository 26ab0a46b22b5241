/**
 * Bounded pool for analysis decoding.
 *
 * Decodes are async file reads plus zlib, so they never block the read loop;
 * the limit bounds how many run (and hold decompressed buffers) at once.
 */

import pLimit from 'p-limit';
import { DEFAULT_DECODE_CONCURRENCY } from '../common/config.js';
import type { AnalysisContents } from '../common/types/build.js';
import { readAnalysis } from '../storage/analysis-store.js';

export type AnalysisDecoder = (location: string) => Promise<AnalysisContents>;

export class DecodePool {
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly decode: AnalysisDecoder = readAnalysis,
    concurrency = DEFAULT_DECODE_CONCURRENCY,
  ) {
    this.limit = pLimit(Math.max(1, concurrency));
  }

  submit(location: string): Promise<AnalysisContents> {
    return this.limit(() => this.decode(location));
  }

  /** Decodes currently running. */
  get activeCount(): number {
    return this.limit.activeCount;
  }

  /** Decodes waiting for a slot. */
  get pendingCount(): number {
    return this.limit.pendingCount;
  }
}
