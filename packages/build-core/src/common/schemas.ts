/**
 * Runtime schemas for everything that crosses a process boundary: frames,
 * server notifications, the handshake result, workspace project files and
 * analysis payloads.
 */

import { z } from 'zod';
import type {
  AnalysisContents,
  BuildTarget,
  CompileParams,
  CompileReport,
  CompileResult,
  CompilerOptionsItem,
  DependencySourcesResult,
  InitializeBuildParams,
  CompileTask,
  Diagnostic,
  InitializeBuildResult,
  LogMessageParams,
  PublishDiagnosticsParams,
  SourcesResult,
  TaskFinishParams,
  TaskProgressParams,
  TaskStartParams,
} from './types/build.js';
import type { BuildMethod, BuildMethodMap, JsonRpcMessage } from './types/protocol.js';

const idSchema = z.union([z.string(), z.number()]);

export const jsonRpcMessageSchema: z.ZodType<JsonRpcMessage> = z.union([
  z.object({
    jsonrpc: z.literal('2.0'),
    id: idSchema,
    method: z.string(),
    params: z.unknown().optional(),
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    id: idSchema.nullable(),
    result: z.unknown().optional(),
    error: z
      .object({ code: z.number(), message: z.string(), data: z.unknown().optional() })
      .optional(),
  }),
  z.object({
    jsonrpc: z.literal('2.0'),
    method: z.string(),
    params: z.unknown().optional(),
  }),
]);

export const targetIdSchema = z.object({ uri: z.string() });

const statusCodeSchema = z.union([z.literal(1), z.literal(2), z.literal(3)]);
const messageTypeSchema = z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]);
const taskIdSchema = z.object({ id: z.string(), parents: z.array(z.string()).optional() });

export const taskStartSchema: z.ZodType<TaskStartParams> = z.object({
  taskId: taskIdSchema,
  originId: z.string().optional(),
  eventTime: z.number().optional(),
  message: z.string().optional(),
  dataKind: z.string().optional(),
  data: z.unknown().optional(),
});

export const taskProgressSchema: z.ZodType<TaskProgressParams> = z.object({
  taskId: taskIdSchema,
  originId: z.string().optional(),
  eventTime: z.number().optional(),
  message: z.string().optional(),
  total: z.number().optional(),
  progress: z.number().optional(),
  unit: z.string().optional(),
  dataKind: z.string().optional(),
  data: z.unknown().optional(),
});

export const taskFinishSchema: z.ZodType<TaskFinishParams> = z.object({
  taskId: taskIdSchema,
  originId: z.string().optional(),
  eventTime: z.number().optional(),
  message: z.string().optional(),
  status: statusCodeSchema,
  dataKind: z.string().optional(),
  data: z.unknown().optional(),
});

export const compileTaskSchema: z.ZodType<CompileTask> = z.object({ target: targetIdSchema });

export const compileReportSchema: z.ZodType<CompileReport> = z.object({
  target: targetIdSchema,
  originId: z.string().optional(),
  errors: z.number(),
  warnings: z.number(),
  time: z.number().optional(),
  noOp: z.boolean().optional(),
  analysisOut: z.string().optional(),
});

export const logMessageSchema: z.ZodType<LogMessageParams> = z.object({
  type: messageTypeSchema,
  task: taskIdSchema.optional(),
  originId: z.string().optional(),
  message: z.string(),
});

const positionSchema = z.object({ line: z.number(), character: z.number() });

export const diagnosticSchema: z.ZodType<Diagnostic> = z.object({
  range: z.object({ start: positionSchema, end: positionSchema }),
  severity: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]).optional(),
  code: z.string().optional(),
  source: z.string().optional(),
  message: z.string(),
});

export const publishDiagnosticsSchema: z.ZodType<PublishDiagnosticsParams> = z.object({
  textDocument: z.object({ uri: z.string() }),
  buildTarget: targetIdSchema,
  originId: z.string().optional(),
  diagnostics: z.array(diagnosticSchema),
  reset: z.boolean(),
});

export const didChangeBuildTargetSchema = z.object({
  changes: z.array(
    z.object({
      target: targetIdSchema,
      kind: z.union([z.literal(1), z.literal(2), z.literal(3)]).optional(),
    }),
  ),
});

export const initializeBuildResultSchema: z.ZodType<InitializeBuildResult> = z.object({
  displayName: z.string(),
  version: z.string(),
  bspVersion: z.string(),
  capabilities: z.object({
    compileProvider: z.object({ languageIds: z.array(z.string()) }).optional(),
    dependencySourcesProvider: z.boolean().optional(),
    buildTargetChangedProvider: z.boolean().optional(),
    canReload: z.boolean().optional(),
  }),
});

export const buildTargetSchema: z.ZodType<BuildTarget> = z.object({
  id: targetIdSchema,
  displayName: z.string().optional(),
  baseDirectory: z.string().optional(),
  tags: z.array(z.string()),
  languageIds: z.array(z.string()),
  dependencies: z.array(targetIdSchema),
  capabilities: z.object({
    canCompile: z.boolean(),
    canTest: z.boolean(),
    canRun: z.boolean(),
    canDebug: z.boolean(),
  }),
  dataKind: z.literal('scala').optional(),
  data: z
    .object({
      scalaOrganization: z.string(),
      scalaVersion: z.string(),
      scalaBinaryVersion: z.string(),
      platform: z.union([z.literal(1), z.literal(2), z.literal(3)]),
      jars: z.array(z.string()),
    })
    .optional(),
});

export const analysisContentsSchema: z.ZodType<AnalysisContents> = z.object({
  target: targetIdSchema,
  originId: z.string(),
  classDirectory: z.string(),
  sources: z.array(z.object({ uri: z.string(), digest: z.string() })),
  producedAt: z.number(),
});

// =============================================================================
// Request params and results, per method
// =============================================================================

/** Schema whose input is whatever arrived on the wire. */
type WireSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const noParams: WireSchema<undefined> = z.unknown().transform(() => undefined);
const nullResult: WireSchema<null> = z.unknown().transform(() => null);

const targetsParamsSchema = z.object({ targets: z.array(targetIdSchema) });

export const initializeBuildParamsSchema: z.ZodType<InitializeBuildParams> = z.object({
  displayName: z.string(),
  version: z.string(),
  bspVersion: z.string(),
  rootUri: z.string(),
  capabilities: z.object({ languageIds: z.array(z.string()) }),
});

export const compileParamsSchema: z.ZodType<CompileParams> = z.object({
  targets: z.array(targetIdSchema),
  originId: z.string().optional(),
  arguments: z.array(z.string()).optional(),
});

const compilerOptionsItemSchema: z.ZodType<CompilerOptionsItem> = z.object({
  target: targetIdSchema,
  options: z.array(z.string()),
  classpath: z.array(z.string()),
  classDirectory: z.string(),
});

const sourcesResultSchema: z.ZodType<SourcesResult> = z.object({
  items: z.array(
    z.object({
      target: targetIdSchema,
      sources: z.array(
        z.object({ uri: z.string(), kind: z.union([z.literal(1), z.literal(2)]), generated: z.boolean() }),
      ),
    }),
  ),
});

const dependencySourcesResultSchema: z.ZodType<DependencySourcesResult> = z.object({
  items: z.array(z.object({ target: targetIdSchema, sources: z.array(z.string()) })),
});

const compileResultSchema: z.ZodType<CompileResult> = z.object({
  originId: z.string().optional(),
  statusCode: statusCodeSchema,
});

export const requestParamsSchemas: { [M in BuildMethod]: WireSchema<BuildMethodMap[M]['params']> } = {
  'build/initialize': initializeBuildParamsSchema,
  'build/shutdown': noParams,
  'workspace/buildTargets': noParams,
  'workspace/reload': noParams,
  'buildTarget/scalacOptions': targetsParamsSchema,
  'buildTarget/javacOptions': targetsParamsSchema,
  'buildTarget/sources': targetsParamsSchema,
  'buildTarget/dependencySources': targetsParamsSchema,
  'buildTarget/compile': compileParamsSchema,
};

export const requestResultSchemas: { [M in BuildMethod]: WireSchema<BuildMethodMap[M]['result']> } = {
  'build/initialize': initializeBuildResultSchema,
  'build/shutdown': nullResult,
  'workspace/buildTargets': z.object({ targets: z.array(buildTargetSchema) }),
  'workspace/reload': nullResult,
  'buildTarget/scalacOptions': z.object({ items: z.array(compilerOptionsItemSchema) }),
  'buildTarget/javacOptions': z.object({ items: z.array(compilerOptionsItemSchema) }),
  'buildTarget/sources': sourcesResultSchema,
  'buildTarget/dependencySources': dependencySourcesResultSchema,
  'buildTarget/compile': compileResultSchema,
};

export const cancelRequestSchema = z.object({ id: z.union([z.string(), z.number()]) });

// =============================================================================
// Workspace project files (.buildlink/<name>.json)
// =============================================================================

const artifactSchema = z.object({
  name: z.string(),
  classifier: z.string().optional(),
  path: z.string(),
});

export const projectDefinitionSchema = z.object({
  name: z.string().min(1),
  directory: z.string(),
  sources: z.array(z.string()).default([]),
  generatedSources: z.array(z.string()).default([]),
  dependencies: z.array(z.string()).default([]),
  classesDir: z.string(),
  classpath: z.array(z.string()).default([]),
  scalacOptions: z.array(z.string()).default([]),
  javacOptions: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  scala: z
    .object({
      organization: z.string().default('org.scala-lang'),
      version: z.string(),
      jars: z.array(z.string()).default([]),
    })
    .optional(),
  platform: z.enum(['jvm', 'js', 'native']).default('jvm'),
  resolution: z
    .object({
      modules: z.array(
        z.object({
          organization: z.string(),
          name: z.string(),
          version: z.string(),
          artifacts: z.array(artifactSchema),
        }),
      ),
    })
    .optional(),
});

/** A project definition after defaults are applied. */
export type ProjectDefinition = z.output<typeof projectDefinitionSchema>;

/** What a project file may contain before defaults are applied. */
export type ProjectDefinitionInput = z.input<typeof projectDefinitionSchema>;
