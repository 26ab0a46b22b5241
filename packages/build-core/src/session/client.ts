/**
 * Build Client
 *
 * Client end of a build-server session. Sends JSON-RPC 2.0 requests over a
 * MessageTransport, validates every result, and routes server notifications
 * into the compile-result cache and the registered handlers.
 *
 * Lifecycle: uninitialized → initializing → active → shuttingDown → closed.
 * Operations issued before the session is active wait in a queue and go out
 * in arrival order once initialization succeeds.
 *
 * ESM module — use .js extensions on imports.
 */

import crypto from 'crypto';
import { CompileResultCache } from '../cache/compile-result-cache.js';
import { BSP_VERSION, DEFAULT_REQUEST_TIMEOUT_MS } from '../common/config.js';
import { ConnectionLostError, ProtocolError, RequestError } from '../common/errors.js';
import {
  compileReportSchema,
  compileTaskSchema,
  initializeBuildResultSchema,
  requestResultSchemas,
} from '../common/schemas.js';
import {
  STATUS_CODE,
  TASK_DATA_KIND,
  type BuildTarget,
  type BuildTargetIdentifier,
  type CompileStatus,
  type CompilerOptionsItem,
  type DidChangeBuildTarget,
  type InitializeBuildParams,
  type InitializeBuildResult,
  type LogMessageParams,
  type PublishDiagnosticsParams,
  type ShowMessageParams,
  type SourceItem,
  type StatusCode,
  type TaskFinishParams,
  type TaskProgressParams,
  type TaskStartParams,
} from '../common/types/build.js';
import {
  isNotification,
  isRequest,
  isResponse,
  JSON_RPC_ERRORS,
  type BuildMethod,
  type BuildMethodMap,
  type ClientNotification,
  type ClientNotificationMap,
  type JsonRpcError,
  type JsonRpcMessage,
  type JsonRpcResponse,
  type MessageTransport,
} from '../common/types/protocol.js';
import { decodeServerNotification, type ServerEvent } from './notifications.js';

/** Sink for server notifications the client does not consume itself. */
export interface BuildClientHandlers {
  onLogMessage?(params: LogMessageParams): void;
  onShowMessage?(params: ShowMessageParams): void;
  onDiagnostics?(params: PublishDiagnosticsParams): void;
  onTargetsChanged?(params: DidChangeBuildTarget): void;
  onTaskStart?(params: TaskStartParams): void;
  onTaskProgress?(params: TaskProgressParams): void;
  onTaskFinish?(params: TaskFinishParams): void;
}

export type SessionState = 'uninitialized' | 'initializing' | 'active' | 'shuttingDown' | 'closed';

export interface BuildClientOptions {
  transport: MessageTransport;
  /** Request timeout in milliseconds (default: 30000) */
  timeout?: number;
  handlers?: BuildClientHandlers;
  cache?: CompileResultCache;
  /** Origin id for compiles that do not name one */
  generateOriginId?: () => string;
}

export interface RequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface CompileOptions extends RequestOptions {
  originId?: string;
  arguments?: string[];
}

export interface CompileAck {
  originId: string;
  statusCode: StatusCode;
}

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  cleanup: () => void;
}

interface QueuedCall {
  release: () => void;
  fail: (error: Error) => void;
}

export function statusFromCode(code: StatusCode): CompileStatus {
  switch (code) {
    case STATUS_CODE.OK:
      return 'ok';
    case STATUS_CODE.ERROR:
      return 'failed';
    case STATUS_CODE.CANCELLED:
      return 'cancelled';
  }
}

function protocolMajor(version: string): number {
  return Number.parseInt(version.split('.')[0] ?? '', 10);
}

function toRequestError(method: string, error: JsonRpcError): RequestError {
  switch (error.code) {
    case JSON_RPC_ERRORS.UNKNOWN_TARGET:
      return new RequestError('unknownTarget', error.message, error.code);
    case JSON_RPC_ERRORS.INVALID_PARAMS:
      return new RequestError('badArguments', error.message, error.code);
    case JSON_RPC_ERRORS.REQUEST_CANCELLED:
      return new RequestError('cancelled', `${method} was cancelled by the server`, error.code);
    default:
      return new RequestError('remote', `${method} failed: ${error.message}`, error.code);
  }
}

export class BuildClient {
  readonly cache: CompileResultCache;
  private transport: MessageTransport;
  private timeout: number;
  private handlers: BuildClientHandlers;
  private generateOriginId: () => string;
  private state: SessionState = 'uninitialized';
  private nextId = 1;
  private pending = new Map<number, PendingRequest>();
  private queue: QueuedCall[] = [];
  private closedReason: Error | null = null;
  private initializeResult: InitializeBuildResult | null = null;

  constructor(options: BuildClientOptions) {
    this.transport = options.transport;
    this.timeout = options.timeout ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.handlers = options.handlers ?? {};
    this.cache = options.cache ?? new CompileResultCache({ defaultTimeoutMs: this.timeout });
    this.generateOriginId = options.generateOriginId ?? (() => crypto.randomUUID());

    this.transport.onMessage((msg) => {
      this.handleMessage(msg);
    });
    this.transport.onClose((error) => {
      this.handleClose(error);
    });
  }

  get sessionState(): SessionState {
    return this.state;
  }

  /** The server's handshake answer, once active. */
  get serverInfo(): InitializeBuildResult | null {
    return this.initializeResult;
  }

  /**
   * Perform the handshake. Must complete before anything else is sent.
   * @throws ProtocolError('versionIncompatible' | 'malformedHandshake')
   */
  async initialize(params: InitializeBuildParams): Promise<InitializeBuildResult> {
    if (this.state !== 'uninitialized') {
      throw new RequestError('badArguments', `Cannot initialize a session that is ${this.state}`);
    }
    this.state = 'initializing';

    try {
      const result = await this.handshake(params);
      this.sendNotification('build/initialized', undefined);
      this.initializeResult = result;
      this.state = 'active';
      console.log(`[BuildClient] Connected to ${result.displayName} ${result.version} (protocol ${result.bspVersion})`);
      const queued = this.queue;
      this.queue = [];
      for (const call of queued) {
        call.release();
      }
      return result;
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      console.error('[BuildClient] Initialization failed:', error.message);
      this.shutdownLocally(error);
      throw error;
    }
  }

  async listBuildTargets(options: RequestOptions = {}): Promise<BuildTarget[]> {
    const result = await this.request('workspace/buildTargets', undefined, options);
    return result.targets;
  }

  /**
   * Compiler options for one target.
   * @throws RequestError('unknownTarget')
   */
  async getCompilerOptions(
    target: BuildTargetIdentifier,
    language: 'scala' | 'java' = 'scala',
    options: RequestOptions = {},
  ): Promise<CompilerOptionsItem> {
    const method = language === 'scala' ? 'buildTarget/scalacOptions' : 'buildTarget/javacOptions';
    const result = await this.request(method, { targets: [target] }, options);
    const item = result.items.find((candidate) => candidate.target.uri === target.uri);
    if (!item) {
      throw new RequestError('unknownTarget', `No compiler options for ${target.uri}`);
    }
    return item;
  }

  async getSources(target: BuildTargetIdentifier, options: RequestOptions = {}): Promise<SourceItem[]> {
    const result = await this.request('buildTarget/sources', { targets: [target] }, options);
    const item = result.items.find((candidate) => candidate.target.uri === target.uri);
    if (!item) {
      throw new RequestError('unknownTarget', `No sources for ${target.uri}`);
    }
    return item.sources;
  }

  async getDependencySources(target: BuildTargetIdentifier, options: RequestOptions = {}): Promise<string[]> {
    const result = await this.request('buildTarget/dependencySources', { targets: [target] }, options);
    const item = result.items.find((candidate) => candidate.target.uri === target.uri);
    if (!item) {
      throw new RequestError('unknownTarget', `No dependency sources for ${target.uri}`);
    }
    return [...new Set(item.sources)];
  }

  /**
   * Start a compile. Per-target outcomes arrive as notifications and are
   * awaited through `cache`.
   */
  async compile(targets: BuildTargetIdentifier[], options: CompileOptions = {}): Promise<CompileAck> {
    await this.whenActive();
    const originId = options.originId ?? this.generateOriginId();
    this.cache.expect(originId, targets);

    try {
      const result = await this.exchange(
        'buildTarget/compile',
        { targets, originId, arguments: options.arguments },
        options,
      );
      this.cache.complete(originId);
      return { originId, statusCode: result.statusCode };
    } catch (err) {
      if (err instanceof RequestError && (err.kind === 'cancelled' || err.kind === 'timeout')) {
        this.cache.cancel(originId);
      } else if (!(err instanceof ConnectionLostError)) {
        this.cache.complete(originId);
      }
      throw err;
    }
  }

  /** Ask the server to reload its target graph. */
  async reload(options: RequestOptions = {}): Promise<void> {
    await this.request('workspace/reload', undefined, options);
  }

  /** Orderly shutdown: `build/shutdown`, then `build/exit`, then close. */
  async shutdown(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }
    if (this.state === 'active') {
      this.state = 'shuttingDown';
      try {
        await this.send('build/shutdown', undefined, {});
        this.sendNotification('build/exit', undefined);
      } catch (err) {
        console.warn('[BuildClient] Shutdown request failed:', err instanceof Error ? err.message : err);
      }
    }
    this.close();
  }

  /**
   * Close the client and reject all pending requests.
   */
  close(): void {
    this.shutdownLocally(new ConnectionLostError('Client closed'));
  }

  private async handshake(params: InitializeBuildParams): Promise<InitializeBuildResult> {
    let raw: unknown;
    try {
      raw = await this.send('build/initialize', params, {});
    } catch (err) {
      if (err instanceof RequestError && err.code === JSON_RPC_ERRORS.VERSION_INCOMPATIBLE) {
        throw new ProtocolError('versionIncompatible', err.message, { cause: err });
      }
      throw err;
    }

    const parsed = initializeBuildResultSchema.safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError('malformedHandshake', 'Server sent a malformed initialize result', {
        cause: parsed.error,
      });
    }
    const clientMajor = protocolMajor(params.bspVersion || BSP_VERSION);
    const serverMajor = protocolMajor(parsed.data.bspVersion);
    if (Number.isNaN(serverMajor)) {
      throw new ProtocolError('malformedHandshake', `Server reported protocol version "${parsed.data.bspVersion}"`);
    }
    if (serverMajor !== clientMajor) {
      throw new ProtocolError(
        'versionIncompatible',
        `Server speaks protocol ${parsed.data.bspVersion}, client speaks ${params.bspVersion}`,
      );
    }
    return parsed.data;
  }

  /** Wait until the session is active; queued callers resume in arrival order. */
  private whenActive(): Promise<void> {
    switch (this.state) {
      case 'active':
        return Promise.resolve();
      case 'uninitialized':
      case 'initializing':
        return new Promise<void>((resolve, reject) => {
          this.queue.push({ release: resolve, fail: reject });
        });
      case 'shuttingDown':
      case 'closed':
        return Promise.reject(this.closedReason ?? new ConnectionLostError(`Session is ${this.state}`));
    }
  }

  /**
   * Send a typed request once active and validate its result.
   */
  private async request<M extends BuildMethod>(
    method: M,
    params: BuildMethodMap[M]['params'],
    options: RequestOptions,
  ): Promise<BuildMethodMap[M]['result']> {
    await this.whenActive();
    return this.exchange(method, params, options);
  }

  /** Send now and validate the result. Callers must already be active. */
  private async exchange<M extends BuildMethod>(
    method: M,
    params: BuildMethodMap[M]['params'],
    options: RequestOptions,
  ): Promise<BuildMethodMap[M]['result']> {
    const raw = await this.send(method, params, options);
    const parsed = requestResultSchemas[method].safeParse(raw);
    if (!parsed.success) {
      throw new ProtocolError('malformedFrame', `Malformed ${method} result: ${parsed.error.message}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private send(method: BuildMethod, params: unknown, options: RequestOptions): Promise<unknown> {
    const id = this.nextId++;
    const timeoutMs = options.timeoutMs ?? this.timeout;
    const signal = options.signal;

    return new Promise<unknown>((resolve, reject) => {
      if (this.state === 'closed') {
        reject(this.closedReason ?? new ConnectionLostError('Session is closed'));
        return;
      }
      if (signal?.aborted) {
        reject(new RequestError('cancelled', `${method} was cancelled before it was sent`));
        return;
      }

      const abandon = (error: RequestError): void => {
        const pending = this.pending.get(id);
        if (!pending) {
          return;
        }
        this.pending.delete(id);
        pending.cleanup();
        this.cancelRemote(id);
        reject(error);
      };

      const timer = setTimeout(() => {
        abandon(new RequestError('timeout', `RPC timeout: ${method} (${timeoutMs}ms)`));
      }, timeoutMs);
      const onAbort = (): void => {
        abandon(new RequestError('cancelled', `${method} was cancelled`));
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      this.pending.set(id, {
        method,
        resolve,
        reject,
        cleanup: () => {
          clearTimeout(timer);
          signal?.removeEventListener('abort', onAbort);
        },
      });

      try {
        this.transport.send({ jsonrpc: '2.0', id, method, params });
      } catch (err) {
        const pending = this.pending.get(id);
        this.pending.delete(id);
        pending?.cleanup();
        reject(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }

  private sendNotification<N extends ClientNotification>(method: N, params: ClientNotificationMap[N]): void {
    this.transport.send({ jsonrpc: '2.0', method, params });
  }

  private cancelRemote(id: number): void {
    try {
      this.sendNotification('$/cancelRequest', { id });
    } catch (err) {
      console.warn(`[BuildClient] Could not send cancellation for request ${id}:`, err instanceof Error ? err.message : err);
    }
  }

  private handleMessage(message: JsonRpcMessage): void {
    if (isRequest(message)) {
      // Server-to-client requests are not part of this protocol
      this.transport.send({
        jsonrpc: '2.0',
        id: message.id,
        error: { code: JSON_RPC_ERRORS.METHOD_NOT_FOUND, message: `Method not found: ${message.method}` },
      });
      return;
    }
    if (isResponse(message)) {
      this.handleResponse(message);
    } else if (isNotification(message)) {
      this.handleNotification(decodeServerNotification(message));
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    if (typeof response.id !== 'number') {
      console.warn('[BuildClient] Response with unexpected id:', response.id);
      return;
    }
    const pending = this.pending.get(response.id);
    if (!pending) {
      return;
    }
    this.pending.delete(response.id);
    pending.cleanup();

    if (response.error) {
      pending.reject(toRequestError(pending.method, response.error));
    } else {
      pending.resolve(response.result);
    }
  }

  private handleNotification(event: ServerEvent): void {
    switch (event.kind) {
      case 'taskStart': {
        const { params } = event;
        if (params.dataKind === TASK_DATA_KIND.COMPILE_TASK && params.originId) {
          const task = compileTaskSchema.safeParse(params.data);
          if (task.success) {
            this.cache.recordTaskStart(params.originId, task.data.target);
          } else {
            console.warn('[BuildClient] Ignoring malformed compile-task data:', task.error.message);
          }
        }
        this.handlers.onTaskStart?.(params);
        return;
      }
      case 'taskProgress':
        this.handlers.onTaskProgress?.(event.params);
        return;
      case 'taskFinish': {
        const { params } = event;
        if (params.dataKind === TASK_DATA_KIND.COMPILE_REPORT) {
          this.recordCompileReport(params);
        }
        this.handlers.onTaskFinish?.(params);
        return;
      }
      case 'publishDiagnostics': {
        const { params } = event;
        if (params.originId) {
          this.cache.recordDiagnostics({
            originId: params.originId,
            target: params.buildTarget,
            file: params.textDocument.uri,
            diagnostics: params.diagnostics,
            reset: params.reset,
          });
        }
        this.handlers.onDiagnostics?.(params);
        return;
      }
      case 'logMessage':
        this.handlers.onLogMessage?.(event.params);
        return;
      case 'showMessage':
        this.handlers.onShowMessage?.(event.params);
        return;
      case 'didChangeBuildTarget':
        this.handlers.onTargetsChanged?.(event.params);
        return;
      case 'unrecognized':
        return;
    }
  }

  private recordCompileReport(params: TaskFinishParams): void {
    const report = compileReportSchema.safeParse(params.data);
    if (!report.success) {
      console.warn('[BuildClient] Ignoring malformed compile-report data:', report.error.message);
      return;
    }
    const originId = params.originId ?? report.data.originId;
    if (!originId) {
      console.warn(`[BuildClient] Compile report for ${report.data.target.uri} has no origin id`);
      return;
    }
    this.cache.publish({
      originId,
      target: report.data.target,
      status: statusFromCode(params.status),
      errors: report.data.errors,
      warnings: report.data.warnings,
      analysisLocation: report.data.analysisOut,
    });
  }

  private handleClose(error?: Error): void {
    if (this.state === 'closed') {
      return;
    }
    const reason =
      error instanceof ConnectionLostError
        ? error
        : new ConnectionLostError(error ? `Connection lost: ${error.message}` : 'Connection closed', { cause: error });
    if (this.state !== 'shuttingDown') {
      console.warn('[BuildClient]', reason.message);
    }
    this.shutdownLocally(reason);
  }

  private shutdownLocally(reason: Error): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.closedReason = reason;

    for (const [id, pending] of this.pending) {
      pending.cleanup();
      pending.reject(reason);
      this.pending.delete(id);
    }
    const queued = this.queue;
    this.queue = [];
    for (const call of queued) {
      call.fail(reason);
    }
    this.cache.failAll(
      reason instanceof ConnectionLostError ? reason : new ConnectionLostError(reason.message, { cause: reason }),
    );
    this.transport.close();
  }
}
