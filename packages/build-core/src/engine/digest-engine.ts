/**
 * Reference compile engine.
 *
 * Does not translate anything: it digests every source file, reports
 * `// error: …` and `// warning: …` marker comments as diagnostics, reports
 * missing sources as errors, and writes the digests as the target's
 * analysis. Enough to drive the whole protocol end to end.
 */

import crypto from 'crypto';
import type { Stats } from 'fs';
import fs from 'fs/promises';
import path from 'path';
import { pathToFileURL } from 'url';
import type { AnalyzedSource, Diagnostic, DiagnosticSeverity } from '../common/types/build.js';
import { writeAnalysis } from '../storage/analysis-store.js';
import type { CompileEngine, CompileInputs, CompileReporter, EngineResult } from './types.js';

const MARKER = /\/\/\s*(error|warning):\s*(.*)$/;

interface SourceFile {
  path: string;
  missing: boolean;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

async function walk(directory: string): Promise<string[]> {
  const files: string[] = [];
  for (const entry of await fs.readdir(directory, { withFileTypes: true })) {
    const full = path.join(directory, entry.name);
    if (entry.isDirectory()) {
      files.push(...(await walk(full)));
    } else if (entry.isFile()) {
      files.push(full);
    }
  }
  return files;
}

/** Expand source directories into files. Entries that do not exist are kept and flagged. */
export async function collectSourceFiles(entries: string[]): Promise<SourceFile[]> {
  const files = new Map<string, SourceFile>();
  for (const entry of entries) {
    let stat: Stats;
    try {
      stat = await fs.stat(entry);
    } catch (err) {
      if (!isMissing(err)) {
        throw err;
      }
      files.set(entry, { path: entry, missing: true });
      continue;
    }
    const found = stat.isDirectory() ? await walk(entry) : [entry];
    for (const file of found) {
      files.set(file, { path: file, missing: false });
    }
  }
  return [...files.values()].sort((a, b) => a.path.localeCompare(b.path));
}

/** Diagnostics for marker comments in one file. */
export function scanMarkers(content: string): Diagnostic[] {
  const diagnostics: Diagnostic[] = [];
  content.split(/\r?\n/).forEach((line, index) => {
    const match = MARKER.exec(line);
    if (!match) {
      return;
    }
    const severity: DiagnosticSeverity = match[1] === 'error' ? 1 : 2;
    diagnostics.push({
      range: {
        start: { line: index, character: match.index },
        end: { line: index, character: line.length },
      },
      severity,
      source: 'buildlink',
      message: match[2].trim(),
    });
  });
  return diagnostics;
}

export class DigestCompileEngine implements CompileEngine {
  async compile(inputs: CompileInputs, reporter: CompileReporter): Promise<EngineResult> {
    const files = await collectSourceFiles(inputs.sources);
    await fs.mkdir(inputs.classDirectory, { recursive: true });

    let errors = 0;
    let warnings = 0;
    const analyzed: AnalyzedSource[] = [];

    for (const [index, file] of files.entries()) {
      if (inputs.signal.aborted) {
        reporter.log(`Compilation of ${inputs.name} cancelled`);
        return { status: 'cancelled', errors, warnings };
      }
      const uri = pathToFileURL(file.path).href;

      let content: string | null = null;
      if (!file.missing) {
        try {
          content = await fs.readFile(file.path, 'utf8');
        } catch (err) {
          if (!isMissing(err)) {
            throw err;
          }
        }
      }

      if (content === null) {
        errors++;
        reporter.diagnostics(uri, [
          {
            range: { start: { line: 0, character: 0 }, end: { line: 0, character: 0 } },
            severity: 1,
            source: 'buildlink',
            message: `Source file not found: ${file.path}`,
          },
        ]);
      } else {
        const diagnostics = scanMarkers(content);
        errors += diagnostics.filter((d) => d.severity === 1).length;
        warnings += diagnostics.filter((d) => d.severity === 2).length;
        if (diagnostics.length > 0) {
          reporter.diagnostics(uri, diagnostics);
        }
        analyzed.push({ uri, digest: crypto.createHash('sha256').update(content).digest('hex') });
      }
      reporter.progress(index + 1, files.length);
    }

    if (errors > 0) {
      return { status: 'failed', errors, warnings };
    }

    const analysisOut = await writeAnalysis(inputs.analysisOut, {
      target: inputs.target.id,
      originId: inputs.originId,
      classDirectory: pathToFileURL(inputs.classDirectory).href,
      sources: analyzed,
      producedAt: Date.now(),
    });
    return { status: 'ok', errors, warnings, analysisOut };
  }
}
