/**
 * Build target, compile and task payload types.
 *
 * Field names follow the Build Server Protocol wire format exactly; uris are
 * `file://` strings.
 */

export interface BuildTargetIdentifier {
  uri: string;
}

export interface BuildTargetCapabilities {
  canCompile: boolean;
  canTest: boolean;
  canRun: boolean;
  canDebug: boolean;
}

/** BSP ScalaPlatform: 1 = JVM, 2 = JS, 3 = Native */
export const SCALA_PLATFORM = {
  JVM: 1,
  JS: 2,
  NATIVE: 3,
} as const;

export type ScalaPlatform = (typeof SCALA_PLATFORM)[keyof typeof SCALA_PLATFORM];

/** Platform variant carried by a target (`data` with `dataKind: 'scala'`). */
export interface ScalaBuildTarget {
  scalaOrganization: string;
  scalaVersion: string;
  scalaBinaryVersion: string;
  platform: ScalaPlatform;
  jars: string[];
}

export interface BuildTarget {
  id: BuildTargetIdentifier;
  displayName?: string;
  baseDirectory?: string;
  tags: string[];
  languageIds: string[];
  dependencies: BuildTargetIdentifier[];
  capabilities: BuildTargetCapabilities;
  dataKind?: 'scala';
  data?: ScalaBuildTarget;
}

// =============================================================================
// Lifecycle
// =============================================================================

export interface BuildClientCapabilities {
  languageIds: string[];
}

export interface InitializeBuildParams {
  displayName: string;
  version: string;
  bspVersion: string;
  rootUri: string;
  capabilities: BuildClientCapabilities;
}

export interface BuildServerCapabilities {
  compileProvider?: { languageIds: string[] };
  dependencySourcesProvider?: boolean;
  buildTargetChangedProvider?: boolean;
  canReload?: boolean;
}

export interface InitializeBuildResult {
  displayName: string;
  version: string;
  bspVersion: string;
  capabilities: BuildServerCapabilities;
}

// =============================================================================
// Target queries
// =============================================================================

export interface CompilerOptionsParams {
  targets: BuildTargetIdentifier[];
}

export interface CompilerOptionsItem {
  target: BuildTargetIdentifier;
  options: string[];
  /** Ordered classpath entries as file uris. */
  classpath: string[];
  classDirectory: string;
}

export interface ScalacOptionsResult {
  items: CompilerOptionsItem[];
}

export interface JavacOptionsResult {
  items: CompilerOptionsItem[];
}

/** BSP SourceItemKind: 1 = file, 2 = directory */
export type SourceItemKind = 1 | 2;

export interface SourceItem {
  uri: string;
  kind: SourceItemKind;
  generated: boolean;
}

export interface SourcesItem {
  target: BuildTargetIdentifier;
  sources: SourceItem[];
}

export interface SourcesResult {
  items: SourcesItem[];
}

export interface DependencySourcesItem {
  target: BuildTargetIdentifier;
  sources: string[];
}

export interface DependencySourcesResult {
  items: DependencySourcesItem[];
}

// =============================================================================
// Compile
// =============================================================================

export const STATUS_CODE = {
  OK: 1,
  ERROR: 2,
  CANCELLED: 3,
} as const;

export type StatusCode = (typeof STATUS_CODE)[keyof typeof STATUS_CODE];

export interface CompileParams {
  targets: BuildTargetIdentifier[];
  originId?: string;
  arguments?: string[];
}

export interface CompileResult {
  originId?: string;
  statusCode: StatusCode;
}

// =============================================================================
// Tasks and notifications
// =============================================================================

export interface TaskId {
  id: string;
  parents?: string[];
}

export const TASK_DATA_KIND = {
  COMPILE_TASK: 'compile-task',
  COMPILE_REPORT: 'compile-report',
} as const;

export interface CompileTask {
  target: BuildTargetIdentifier;
}

export interface CompileReport {
  target: BuildTargetIdentifier;
  originId?: string;
  errors: number;
  warnings: number;
  time?: number;
  noOp?: boolean;
  /** File uri of the analysis written for this compile. */
  analysisOut?: string;
}

export interface TaskStartParams {
  taskId: TaskId;
  originId?: string;
  eventTime?: number;
  message?: string;
  dataKind?: string;
  data?: unknown;
}

export interface TaskProgressParams {
  taskId: TaskId;
  originId?: string;
  eventTime?: number;
  message?: string;
  total?: number;
  progress?: number;
  unit?: string;
  dataKind?: string;
  data?: unknown;
}

export interface TaskFinishParams {
  taskId: TaskId;
  originId?: string;
  eventTime?: number;
  message?: string;
  status: StatusCode;
  dataKind?: string;
  data?: unknown;
}

/** BSP MessageType: 1 = error, 2 = warning, 3 = info, 4 = log */
export const MESSAGE_TYPE = {
  ERROR: 1,
  WARNING: 2,
  INFO: 3,
  LOG: 4,
} as const;

export type MessageType = (typeof MESSAGE_TYPE)[keyof typeof MESSAGE_TYPE];

export interface LogMessageParams {
  type: MessageType;
  task?: TaskId;
  originId?: string;
  message: string;
}

export interface ShowMessageParams {
  type: MessageType;
  task?: TaskId;
  originId?: string;
  message: string;
}

export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

/** LSP DiagnosticSeverity: 1 = error, 2 = warning, 3 = information, 4 = hint */
export type DiagnosticSeverity = 1 | 2 | 3 | 4;

export interface Diagnostic {
  range: Range;
  severity?: DiagnosticSeverity;
  code?: string;
  source?: string;
  message: string;
}

export interface PublishDiagnosticsParams {
  textDocument: { uri: string };
  buildTarget: BuildTargetIdentifier;
  originId?: string;
  diagnostics: Diagnostic[];
  reset: boolean;
}

/** BSP BuildTargetEventKind: 1 = created, 2 = changed, 3 = deleted */
export interface BuildTargetEvent {
  target: BuildTargetIdentifier;
  kind?: 1 | 2 | 3;
}

export interface DidChangeBuildTarget {
  changes: BuildTargetEvent[];
}

// =============================================================================
// Cache-facing types
// =============================================================================

export type CompileStatus = 'ok' | 'failed' | 'cancelled';

export interface CompileOutcome {
  originId: string;
  target: BuildTargetIdentifier;
  status: CompileStatus;
  /** Diagnostics published for this target under this origin, in arrival order. */
  diagnostics: Diagnostic[];
  errors: number;
  warnings: number;
  analysisLocation?: string;
}

export interface AnalyzedSource {
  uri: string;
  digest: string;
}

/** Decoded incremental-compilation state for one target and one compile. */
export interface AnalysisContents {
  target: BuildTargetIdentifier;
  originId: string;
  classDirectory: string;
  sources: AnalyzedSource[];
  producedAt: number;
}
