/**
 * Compile engine boundary.
 *
 * The engine does the actual compilation of one target; the server only
 * orchestrates engines and ferries their reports.
 */

import type { BuildTarget, CompileStatus, Diagnostic } from '../common/types/build.js';

export interface CompileInputs {
  originId: string;
  name: string;
  target: BuildTarget;
  /** Absolute source files and directories */
  sources: string[];
  /** Classpath entries as file uris, own classes directory first */
  classpath: string[];
  options: string[];
  /** Absolute path of the classes directory */
  classDirectory: string;
  /** Absolute path the analysis must be written to */
  analysisOut: string;
  /** Extra arguments from the compile request */
  arguments: string[];
  signal: AbortSignal;
}

export interface CompileReporter {
  /** Replace the diagnostics of one source file (file uri) */
  diagnostics(file: string, diagnostics: Diagnostic[]): void;
  progress(done: number, total: number): void;
  log(message: string): void;
}

export interface EngineResult {
  status: CompileStatus;
  errors: number;
  warnings: number;
  /** File uri of the analysis written, if any */
  analysisOut?: string;
}

export interface CompileEngine {
  compile(inputs: CompileInputs, reporter: CompileReporter): Promise<EngineResult>;
}
