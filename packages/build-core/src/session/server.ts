/**
 * Build Server Session
 *
 * Server end of one connection. Listens for JSON-RPC 2.0 requests on a
 * MessageTransport, enforces the initialize handshake, dispatches requests
 * to registered method handlers, and pushes notifications to the client.
 *
 * ESM module — use .js extensions on imports.
 */

import { BSP_VERSION } from '../common/config.js';
import { BuildLinkError, RequestError } from '../common/errors.js';
import { cancelRequestSchema, requestParamsSchemas } from '../common/schemas.js';
import type { BuildServerCapabilities, InitializeBuildParams, InitializeBuildResult } from '../common/types/build.js';
import {
  isNotification,
  isRequest,
  JSON_RPC_ERRORS,
  type BuildMethod,
  type BuildMethodMap,
  type JsonRpcError,
  type JsonRpcMessage,
  type JsonRpcNotification,
  type JsonRpcRequest,
  type MessageTransport,
  type ServerNotification,
  type ServerNotificationMap,
} from '../common/types/protocol.js';

/** Methods a service may register; the lifecycle ones belong to the session. */
export type ServiceMethod = Exclude<BuildMethod, 'build/initialize' | 'build/shutdown'>;

export interface RequestContext {
  requestId: string | number;
  /** Aborted when the client sends `$/cancelRequest` or the session closes */
  signal: AbortSignal;
}

type MethodHandler<M extends ServiceMethod> = (
  params: BuildMethodMap[M]['params'],
  context: RequestContext,
) => Promise<BuildMethodMap[M]['result']> | BuildMethodMap[M]['result'];

type ErasedHandler = (params: unknown, context: RequestContext) => Promise<unknown>;

export type ServerSessionState = 'uninitialized' | 'active' | 'shutdown' | 'closed';

export interface BuildServerSessionOptions {
  transport: MessageTransport;
  displayName: string;
  version: string;
  bspVersion?: string;
  capabilities?: BuildServerCapabilities;
  /** Called once the client completed the handshake */
  onInitialized?: (params: InitializeBuildParams) => void;
}

function protocolMajor(version: string): number {
  return Number.parseInt(version.split('.')[0] ?? '', 10);
}

function toJsonRpcError(err: unknown): JsonRpcError {
  if (err instanceof RequestError) {
    switch (err.kind) {
      case 'unknownTarget':
        return { code: JSON_RPC_ERRORS.UNKNOWN_TARGET, message: err.message };
      case 'badArguments':
        return { code: JSON_RPC_ERRORS.INVALID_PARAMS, message: err.message };
      case 'cancelled':
        return { code: JSON_RPC_ERRORS.REQUEST_CANCELLED, message: err.message };
      default:
        return { code: err.code ?? JSON_RPC_ERRORS.INTERNAL_ERROR, message: err.message };
    }
  }
  if (err instanceof BuildLinkError) {
    return { code: JSON_RPC_ERRORS.INTERNAL_ERROR, message: err.message, data: { kind: err.kind } };
  }
  return { code: JSON_RPC_ERRORS.INTERNAL_ERROR, message: err instanceof Error ? err.message : String(err) };
}

export class BuildServerSession {
  private transport: MessageTransport;
  private handlers = new Map<string, ErasedHandler>();
  private running = new Map<string | number, AbortController>();
  private closeListeners: Array<() => void> = [];
  private state: ServerSessionState = 'uninitialized';
  private readonly info: Omit<InitializeBuildResult, 'capabilities'>;
  private readonly capabilities: BuildServerCapabilities;
  private readonly onInitialized?: (params: InitializeBuildParams) => void;

  constructor(options: BuildServerSessionOptions) {
    this.transport = options.transport;
    this.info = {
      displayName: options.displayName,
      version: options.version,
      bspVersion: options.bspVersion ?? BSP_VERSION,
    };
    this.capabilities = options.capabilities ?? {};
    this.onInitialized = options.onInitialized;

    this.transport.onMessage((msg) => {
      this.handleMessage(msg).catch((err: unknown) => {
        console.error('[BuildServer] Failed to handle message:', err);
      });
    });
    this.transport.onClose(() => {
      this.teardown();
    });
  }

  get sessionState(): ServerSessionState {
    return this.state;
  }

  /**
   * Register a handler for an RPC method. Params are validated before the
   * handler sees them.
   */
  registerMethod<M extends ServiceMethod>(method: M, handler: MethodHandler<M>): void {
    const schema = requestParamsSchemas[method];
    this.handlers.set(method, async (raw, context) => {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        throw new RequestError('badArguments', `Invalid params for ${method}: ${parsed.error.message}`);
      }
      return handler(parsed.data, context);
    });
  }

  /**
   * Push a notification to the connected client. Dropped once the session
   * has closed.
   */
  notify<N extends ServerNotification>(method: N, params: ServerNotificationMap[N]): void {
    if (this.state === 'closed') {
      return;
    }
    const notification: JsonRpcNotification<ServerNotificationMap[N]> = {
      jsonrpc: '2.0',
      method,
      params,
    };
    this.send(notification);
  }

  onClose(listener: () => void): void {
    if (this.state === 'closed') {
      queueMicrotask(listener);
      return;
    }
    this.closeListeners.push(listener);
  }

  /**
   * Shut down the session and close the transport.
   */
  close(): void {
    this.transport.close();
    this.teardown();
  }

  private async handleMessage(message: JsonRpcMessage): Promise<void> {
    if (isNotification(message)) {
      this.handleNotification(message);
      return;
    }
    if (!isRequest(message)) {
      return;
    }

    const request: JsonRpcRequest = message;
    switch (request.method) {
      case 'build/initialize':
        this.handleInitialize(request);
        return;
      case 'build/shutdown':
        this.state = this.state === 'closed' ? 'closed' : 'shutdown';
        this.sendResult(request.id, null);
        return;
    }

    if (this.state === 'uninitialized') {
      this.sendError(request.id, {
        code: JSON_RPC_ERRORS.SERVER_NOT_INITIALIZED,
        message: `${request.method} before build/initialize`,
      });
      return;
    }
    if (this.state !== 'active') {
      this.sendError(request.id, {
        code: JSON_RPC_ERRORS.INVALID_REQUEST,
        message: `${request.method} after build/shutdown`,
      });
      return;
    }

    const handler = this.handlers.get(request.method);
    if (!handler) {
      this.sendError(request.id, {
        code: JSON_RPC_ERRORS.METHOD_NOT_FOUND,
        message: `Method not found: ${request.method}`,
      });
      return;
    }

    const controller = new AbortController();
    this.running.set(request.id, controller);
    try {
      const result = await handler(request.params, { requestId: request.id, signal: controller.signal });
      this.sendResult(request.id, result ?? null);
    } catch (err) {
      const error = toJsonRpcError(err);
      if (error.code === JSON_RPC_ERRORS.INTERNAL_ERROR) {
        console.error(`[BuildServer] Handler error for ${request.method}:`, error.message);
      }
      this.sendError(request.id, error);
    } finally {
      this.running.delete(request.id);
    }
  }

  private handleInitialize(request: JsonRpcRequest): void {
    if (this.state !== 'uninitialized') {
      this.sendError(request.id, {
        code: JSON_RPC_ERRORS.INVALID_REQUEST,
        message: 'build/initialize was already received',
      });
      return;
    }
    const parsed = requestParamsSchemas['build/initialize'].safeParse(request.params);
    if (!parsed.success) {
      this.sendError(request.id, {
        code: JSON_RPC_ERRORS.INVALID_PARAMS,
        message: `Invalid params for build/initialize: ${parsed.error.message}`,
      });
      return;
    }
    const params = parsed.data;
    const clientMajor = protocolMajor(params.bspVersion);
    if (clientMajor !== protocolMajor(this.info.bspVersion)) {
      console.warn(`[BuildServer] Rejecting client ${params.displayName} speaking protocol ${params.bspVersion}`);
      this.sendError(request.id, {
        code: JSON_RPC_ERRORS.VERSION_INCOMPATIBLE,
        message: `Protocol ${params.bspVersion} is not compatible with ${this.info.bspVersion}`,
      });
      return;
    }

    this.state = 'active';
    console.log(`[BuildServer] Client ${params.displayName} ${params.version} initialized (root ${params.rootUri})`);
    const result: InitializeBuildResult = { ...this.info, capabilities: this.capabilities };
    this.sendResult(request.id, result);
    this.onInitialized?.(params);
  }

  private handleNotification(notification: JsonRpcNotification): void {
    switch (notification.method) {
      case 'build/initialized':
        return;
      case 'build/exit':
        console.log('[BuildServer] Client sent build/exit');
        this.close();
        return;
      case '$/cancelRequest': {
        const parsed = cancelRequestSchema.safeParse(notification.params);
        if (parsed.success) {
          this.running.get(parsed.data.id)?.abort();
        }
        return;
      }
      default:
        // Unknown notifications are ignored
        return;
    }
  }

  private teardown(): void {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    for (const controller of this.running.values()) {
      controller.abort();
    }
    this.running.clear();
    const listeners = this.closeListeners;
    this.closeListeners = [];
    for (const listener of listeners) {
      listener();
    }
  }

  private send(message: JsonRpcMessage): void {
    if (this.state === 'closed') {
      return;
    }
    try {
      this.transport.send(message);
    } catch (err) {
      console.warn('[BuildServer] Could not send to client:', err instanceof Error ? err.message : err);
    }
  }

  private sendResult(id: string | number, result: unknown): void {
    this.send({ jsonrpc: '2.0', id, result });
  }

  private sendError(id: string | number, error: JsonRpcError): void {
    this.send({ jsonrpc: '2.0', id, error });
  }
}
