/**
 * Analysis store: gzip-compressed JSON files, one per target per compile,
 * under `<workspace>/.buildlink/analysis/<target>/<originId>.json.gz`.
 *
 * This file MUST use `path.join()` for all file paths (Windows CI compatibility).
 */

import fs from 'fs/promises';
import path from 'path';
import { fileURLToPath, pathToFileURL } from 'url';
import { promisify } from 'util';
import zlib from 'zlib';
import { CacheError } from '../common/errors.js';
import { analysisContentsSchema } from '../common/schemas.js';
import type { AnalysisContents } from '../common/types/build.js';
import { WORKSPACE_DIR_NAME } from '../common/config.js';

const gzip = promisify(zlib.gzip);
const gunzip = promisify(zlib.gunzip);

const ANALYSIS_DIR = 'analysis';
const ANALYSIS_SUFFIX = '.json.gz';

/** Analyses kept per target; older ones are pruned after each write. */
export const DEFAULT_RETAINED_ANALYSES = 8;

function safeSegment(value: string): string {
  return value.replace(/[^A-Za-z0-9._-]/g, '_');
}

export function analysisDirectory(workspaceRoot: string, targetName: string): string {
  return path.join(workspaceRoot, WORKSPACE_DIR_NAME, ANALYSIS_DIR, safeSegment(targetName));
}

export function analysisPath(workspaceRoot: string, targetName: string, originId: string): string {
  return path.join(analysisDirectory(workspaceRoot, targetName), `${safeSegment(originId)}${ANALYSIS_SUFFIX}`);
}

/** Accepts a `file://` uri or a plain path. */
export function analysisLocationToPath(location: string): string {
  return location.startsWith('file:') ? fileURLToPath(location) : location;
}

/**
 * Write an analysis atomically and return its `file://` uri.
 */
export async function writeAnalysis(filePath: string, contents: AnalysisContents): Promise<string> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const payload = await gzip(Buffer.from(JSON.stringify(contents), 'utf8'));
  const temp = `${filePath}.${process.pid}.tmp`;
  await fs.writeFile(temp, payload);
  await fs.rename(temp, filePath);
  return pathToFileURL(filePath).href;
}

/**
 * Read, decompress and validate an analysis.
 * @throws CacheError('decodeFailed')
 */
export async function readAnalysis(location: string): Promise<AnalysisContents> {
  const filePath = analysisLocationToPath(location);
  let json: unknown;
  try {
    const raw = await fs.readFile(filePath);
    json = JSON.parse((await gunzip(raw)).toString('utf8'));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new CacheError('decodeFailed', `Cannot decode analysis ${filePath}: ${message}`, { cause: err });
  }
  const parsed = analysisContentsSchema.safeParse(json);
  if (!parsed.success) {
    throw new CacheError('decodeFailed', `Analysis ${filePath} has an unexpected shape`, {
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Delete all but the `keep` most recently written analyses in a target's
 * directory. Returns the number removed.
 */
export async function pruneAnalyses(directory: string, keep = DEFAULT_RETAINED_ANALYSES): Promise<number> {
  let names: string[];
  try {
    names = (await fs.readdir(directory)).filter((name) => name.endsWith(ANALYSIS_SUFFIX));
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return 0;
    }
    throw err;
  }
  if (names.length <= keep) {
    return 0;
  }
  const stats = await Promise.all(
    names.map(async (name) => {
      const filePath = path.join(directory, name);
      return { filePath, mtimeMs: (await fs.stat(filePath)).mtimeMs };
    }),
  );
  stats.sort((a, b) => b.mtimeMs - a.mtimeMs);
  const stale = stats.slice(keep);
  await Promise.all(stale.map(({ filePath }) => fs.rm(filePath, { force: true })));
  return stale.length;
}
