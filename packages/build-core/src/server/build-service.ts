/**
 * Build Service
 *
 * Request handlers behind every server session of one workspace. Holds the
 * live target graph, runs compiles through the compile engine, and streams
 * task, diagnostic and log notifications to the session that asked.
 *
 * Compiles of the same target are serialized across sessions; compiles of
 * different targets run concurrently.
 *
 * This file MUST use `path.join()` for all file paths (Windows CI compatibility).
 */

import crypto from 'crypto';
import path from 'path';
import {
  MESSAGE_TYPE,
  STATUS_CODE,
  TASK_DATA_KIND,
  type BuildTargetEvent,
  type CompileParams,
  type CompileReport,
  type CompileResult,
  type CompileStatus,
  type CompileTask,
  type DidChangeBuildTarget,
  type StatusCode,
  type TaskId,
} from '../common/types/build.js';
import { DigestCompileEngine } from '../engine/digest-engine.js';
import type { CompileEngine, EngineResult } from '../engine/types.js';
import { BuildTargetGraph, type ProjectNode } from '../graph/build-target-graph.js';
import { loadWorkspaceGraph } from '../graph/workspace-loader.js';
import type { BuildServerSession } from '../session/server.js';
import { analysisDirectory, analysisPath, DEFAULT_RETAINED_ANALYSES, pruneAnalyses } from '../storage/analysis-store.js';

export interface BuildServiceOptions {
  workspaceRoot: string;
  engine?: CompileEngine;
  /** Analyses kept per target (default: 8) */
  retainedAnalyses?: number;
  loadGraph?: (workspaceRoot: string) => Promise<BuildTargetGraph>;
}

const STATUS_CODES: Record<CompileStatus, StatusCode> = {
  ok: STATUS_CODE.OK,
  failed: STATUS_CODE.ERROR,
  cancelled: STATUS_CODE.CANCELLED,
};

function overallStatus(statuses: CompileStatus[]): StatusCode {
  if (statuses.includes('failed')) {
    return STATUS_CODE.ERROR;
  }
  if (statuses.includes('cancelled')) {
    return STATUS_CODE.CANCELLED;
  }
  return STATUS_CODE.OK;
}

/** Created, changed and deleted targets between two graphs. */
export function diffGraphs(previous: BuildTargetGraph, next: BuildTargetGraph): BuildTargetEvent[] {
  const before = new Map(previous.targets().map((target) => [target.id.uri, target]));
  const events: BuildTargetEvent[] = [];
  for (const target of next.targets()) {
    const old = before.get(target.id.uri);
    if (!old) {
      events.push({ target: target.id, kind: 1 });
    } else if (JSON.stringify(old) !== JSON.stringify(target)) {
      events.push({ target: target.id, kind: 2 });
    }
    before.delete(target.id.uri);
  }
  for (const target of before.values()) {
    events.push({ target: target.id, kind: 3 });
  }
  return events;
}

export class BuildService {
  readonly workspaceRoot: string;
  private graph: BuildTargetGraph;
  private readonly engine: CompileEngine;
  private readonly retainedAnalyses: number;
  private readonly loadGraph: (workspaceRoot: string) => Promise<BuildTargetGraph>;
  private sessions = new Set<BuildServerSession>();
  private targetLocks = new Map<string, Promise<void>>();

  constructor(options: BuildServiceOptions, graph?: BuildTargetGraph) {
    this.workspaceRoot = path.resolve(options.workspaceRoot);
    this.engine = options.engine ?? new DigestCompileEngine();
    this.retainedAnalyses = options.retainedAnalyses ?? DEFAULT_RETAINED_ANALYSES;
    this.loadGraph = options.loadGraph ?? loadWorkspaceGraph;
    this.graph = graph ?? BuildTargetGraph.empty(this.workspaceRoot);
  }

  /** Create a service with the workspace graph already loaded. */
  static async create(options: BuildServiceOptions): Promise<BuildService> {
    const service = new BuildService(options);
    await service.reload();
    return service;
  }

  get targetGraph(): BuildTargetGraph {
    return this.graph;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /**
   * Serve a session's requests from this service.
   */
  attach(session: BuildServerSession): void {
    this.sessions.add(session);
    session.onClose(() => {
      this.sessions.delete(session);
    });

    session.registerMethod('workspace/buildTargets', () => ({ targets: this.graph.targets() }));
    session.registerMethod('workspace/reload', async () => {
      await this.reload();
      return null;
    });
    session.registerMethod('buildTarget/scalacOptions', (params) => ({
      items: params.targets.map((id) => this.graph.compilerOptions(id, 'scala')),
    }));
    session.registerMethod('buildTarget/javacOptions', (params) => ({
      items: params.targets.map((id) => this.graph.compilerOptions(id, 'java')),
    }));
    session.registerMethod('buildTarget/sources', (params) => ({
      items: params.targets.map((id) => this.graph.sources(id)),
    }));
    session.registerMethod('buildTarget/dependencySources', (params) => ({
      items: params.targets.map((id) => this.graph.dependencySources(id)),
    }));
    session.registerMethod('buildTarget/compile', (params, context) =>
      this.compile(session, params, context.signal),
    );
  }

  /**
   * Reload the graph from disk and tell every session what changed.
   */
  async reload(): Promise<DidChangeBuildTarget> {
    const next = await this.loadGraph(this.workspaceRoot);
    const changes = diffGraphs(this.graph, next);
    this.graph = next;
    const event: DidChangeBuildTarget = { changes };
    if (changes.length > 0) {
      console.log(`[BuildService] Reload changed ${changes.length} target(s)`);
      for (const session of this.sessions) {
        session.notify('buildTarget/didChange', event);
      }
    }
    return event;
  }

  /**
   * Compile the requested targets and their dependencies, dependencies
   * first. A target whose dependency did not compile is reported cancelled
   * without being compiled.
   * @throws RequestError('unknownTarget')
   */
  async compile(session: BuildServerSession, params: CompileParams, signal: AbortSignal): Promise<CompileResult> {
    const graph = this.graph;
    const order = graph.compileOrder(params.targets);
    const originId = params.originId ?? crypto.randomUUID();
    const statuses = new Map<string, CompileStatus>();

    console.log(`[BuildService] Compile ${originId}: ${order.map((node) => node.name).join(', ')}`);
    for (const node of order) {
      const blockedBy = graph.dependenciesOf(node).find((dependency) => statuses.get(dependency.name) !== 'ok');
      let status: CompileStatus;
      if (blockedBy || signal.aborted) {
        status = 'cancelled';
        const reason = blockedBy ? `dependency ${blockedBy.name} did not compile` : 'request cancelled';
        this.reportSkipped(session, originId, node, reason);
      } else {
        status = await this.withTargetLock(node.name, () =>
          this.compileTarget(session, graph, node, originId, params.arguments ?? [], signal),
        );
      }
      statuses.set(node.name, status);
    }

    return { originId, statusCode: overallStatus([...statuses.values()]) };
  }

  private async compileTarget(
    session: BuildServerSession,
    graph: BuildTargetGraph,
    node: ProjectNode,
    originId: string,
    args: string[],
    signal: AbortSignal,
  ): Promise<CompileStatus> {
    const taskId = this.taskIdFor(originId, node);
    const startedAt = Date.now();
    this.startTask(session, taskId, originId, node);

    const options = graph.compilerOptions(node.id);
    let result: EngineResult;
    try {
      result = await this.engine.compile(
        {
          originId,
          name: node.name,
          target: node.target,
          sources: graph.sourcePaths(node.id),
          classpath: options.classpath,
          options: options.options,
          classDirectory: node.classesDir,
          analysisOut: analysisPath(this.workspaceRoot, node.name, originId),
          arguments: args,
          signal,
        },
        {
          diagnostics: (file, diagnostics) => {
            session.notify('build/publishDiagnostics', {
              textDocument: { uri: file },
              buildTarget: node.id,
              originId,
              diagnostics,
              reset: true,
            });
          },
          progress: (done, total) => {
            session.notify('build/taskProgress', {
              taskId,
              originId,
              eventTime: Date.now(),
              progress: done,
              total,
              unit: 'files',
            });
          },
          log: (message) => {
            session.notify('build/logMessage', { type: MESSAGE_TYPE.LOG, task: taskId, originId, message });
          },
        },
      );
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[BuildService] Engine failed on ${node.name}:`, message);
      session.notify('build/logMessage', {
        type: MESSAGE_TYPE.ERROR,
        task: taskId,
        originId,
        message: `Compilation of ${node.name} failed: ${message}`,
      });
      result = { status: 'failed', errors: 1, warnings: 0 };
    }

    if (result.analysisOut) {
      await pruneAnalyses(analysisDirectory(this.workspaceRoot, node.name), this.retainedAnalyses).catch(
        (err: unknown) => {
          console.warn(`[BuildService] Could not prune analyses of ${node.name}:`, err instanceof Error ? err.message : err);
        },
      );
    }

    this.finishTask(session, taskId, originId, node, result, Date.now() - startedAt);
    return result.status;
  }

  private reportSkipped(session: BuildServerSession, originId: string, node: ProjectNode, reason: string): void {
    const taskId = this.taskIdFor(originId, node);
    this.startTask(session, taskId, originId, node);
    session.notify('build/logMessage', {
      type: MESSAGE_TYPE.WARNING,
      task: taskId,
      originId,
      message: `Skipping ${node.name}: ${reason}`,
    });
    this.finishTask(session, taskId, originId, node, { status: 'cancelled', errors: 0, warnings: 0 }, 0);
  }

  private taskIdFor(originId: string, node: ProjectNode): TaskId {
    return { id: `${originId}/${node.name}` };
  }

  private startTask(session: BuildServerSession, taskId: TaskId, originId: string, node: ProjectNode): void {
    const data: CompileTask = { target: node.id };
    session.notify('build/taskStart', {
      taskId,
      originId,
      eventTime: Date.now(),
      message: `Compiling ${node.name}`,
      dataKind: TASK_DATA_KIND.COMPILE_TASK,
      data,
    });
  }

  private finishTask(
    session: BuildServerSession,
    taskId: TaskId,
    originId: string,
    node: ProjectNode,
    result: EngineResult,
    time: number,
  ): void {
    const data: CompileReport = {
      target: node.id,
      originId,
      errors: result.errors,
      warnings: result.warnings,
      time,
      analysisOut: result.analysisOut,
    };
    session.notify('build/taskFinish', {
      taskId,
      originId,
      eventTime: Date.now(),
      message: `Compiled ${node.name} (${result.status})`,
      status: STATUS_CODES[result.status],
      dataKind: TASK_DATA_KIND.COMPILE_REPORT,
      data,
    });
  }

  /** Run `work` after every earlier compile of the same target settled. */
  private withTargetLock<T>(name: string, work: () => Promise<T>): Promise<T> {
    const previous = this.targetLocks.get(name) ?? Promise.resolve();
    const run = previous.then(work);
    const settled = run.then(
      () => undefined,
      () => undefined,
    );
    this.targetLocks.set(name, settled);
    void settled.then(() => {
      if (this.targetLocks.get(name) === settled) {
        this.targetLocks.delete(name);
      }
    });
    return run;
  }
}
