/**
 * Build Server Protocol Types
 *
 * JSON-RPC 2.0 message types and the method/notification maps spoken between
 * a build client (editor, build tool) and a build server.
 *
 * ESM module — use .js extensions on imports.
 */

import type {
  BuildTarget,
  BuildTargetIdentifier,
  CompileParams,
  CompileResult,
  CompilerOptionsParams,
  DependencySourcesResult,
  DidChangeBuildTarget,
  InitializeBuildParams,
  InitializeBuildResult,
  JavacOptionsResult,
  LogMessageParams,
  PublishDiagnosticsParams,
  ScalacOptionsResult,
  ShowMessageParams,
  SourcesResult,
  TaskFinishParams,
  TaskProgressParams,
  TaskStartParams,
} from './build.js';

// =============================================================================
// JSON-RPC 2.0 Base Types
// =============================================================================

export interface JsonRpcRequest<TParams = unknown> {
  jsonrpc: '2.0';
  id: string | number;
  method: string;
  params?: TParams;
}

export interface JsonRpcResponse<TResult = unknown> {
  jsonrpc: '2.0';
  id: string | number | null;
  result?: TResult;
  error?: JsonRpcError;
}

export interface JsonRpcNotification<TParams = unknown> {
  jsonrpc: '2.0';
  method: string;
  params?: TParams;
}

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

/** Union of all JSON-RPC message types. */
export type JsonRpcMessage = JsonRpcRequest | JsonRpcResponse | JsonRpcNotification;

export const isRequest = (msg: JsonRpcMessage): msg is JsonRpcRequest =>
  'id' in msg && 'method' in msg;

export const isResponse = (msg: JsonRpcMessage): msg is JsonRpcResponse =>
  'id' in msg && !('method' in msg);

export const isNotification = (msg: JsonRpcMessage): msg is JsonRpcNotification =>
  !('id' in msg) && 'method' in msg;

// =============================================================================
// Error Codes
// =============================================================================

export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  /** Custom: build target is not part of the current graph */
  UNKNOWN_TARGET: -32000,
  /** Custom: client and server protocol majors differ */
  VERSION_INCOMPATIBLE: -32001,
  SERVER_NOT_INITIALIZED: -32002,
  REQUEST_CANCELLED: -32800,
} as const;

// =============================================================================
// Method Map: maps request method names to { params, result } types
// =============================================================================

export interface BuildMethodMap {
  // Lifecycle
  'build/initialize': { params: InitializeBuildParams; result: InitializeBuildResult };
  'build/shutdown': { params: undefined; result: null };

  // Workspace
  'workspace/buildTargets': { params: undefined; result: { targets: BuildTarget[] } };
  'workspace/reload': { params: undefined; result: null };

  // Build targets
  'buildTarget/scalacOptions': { params: CompilerOptionsParams; result: ScalacOptionsResult };
  'buildTarget/javacOptions': { params: CompilerOptionsParams; result: JavacOptionsResult };
  'buildTarget/sources': { params: { targets: BuildTargetIdentifier[] }; result: SourcesResult };
  'buildTarget/dependencySources': {
    params: { targets: BuildTargetIdentifier[] };
    result: DependencySourcesResult;
  };
  'buildTarget/compile': { params: CompileParams; result: CompileResult };
}

/** All valid request method names. */
export type BuildMethod = keyof BuildMethodMap;

// =============================================================================
// Notification Definitions
// =============================================================================

/** Client → server notifications. */
export interface ClientNotificationMap {
  'build/initialized': undefined;
  'build/exit': undefined;
  '$/cancelRequest': { id: string | number };
}

export type ClientNotification = keyof ClientNotificationMap;

/** Server → client push events. */
export interface ServerNotificationMap {
  'build/taskStart': TaskStartParams;
  'build/taskProgress': TaskProgressParams;
  'build/taskFinish': TaskFinishParams;
  'build/logMessage': LogMessageParams;
  'build/showMessage': ShowMessageParams;
  'build/publishDiagnostics': PublishDiagnosticsParams;
  'buildTarget/didChange': DidChangeBuildTarget;
}

export type ServerNotification = keyof ServerNotificationMap;

// =============================================================================
// Message Transport Abstraction
// =============================================================================

/** A bidirectional message channel (socket, pipe pair, in-process, etc.) */
export interface MessageTransport {
  /** Send a JSON-RPC message to the other end. */
  send(message: JsonRpcMessage): void;

  /** Register a handler for incoming messages. */
  onMessage(handler: (message: JsonRpcMessage) => void): void;

  /** Register a handler invoked once when the channel closes or fails. */
  onClose(handler: (error?: Error) => void): void;

  /** Close the transport. Safe to call more than once. */
  close(): void;
}
