/**
 * Server notification decoding.
 *
 * Every incoming notification becomes one variant of a closed union. Known
 * methods whose params fail validation, and methods we do not know, both
 * become `unrecognized`; callers ignore those.
 */

import type { z } from 'zod';
import {
  didChangeBuildTargetSchema,
  logMessageSchema,
  publishDiagnosticsSchema,
  taskFinishSchema,
  taskProgressSchema,
  taskStartSchema,
} from '../common/schemas.js';
import type {
  DidChangeBuildTarget,
  LogMessageParams,
  PublishDiagnosticsParams,
  ShowMessageParams,
  TaskFinishParams,
  TaskProgressParams,
  TaskStartParams,
} from '../common/types/build.js';
import type { JsonRpcNotification, ServerNotification } from '../common/types/protocol.js';

export type ServerEvent =
  | { kind: 'taskStart'; params: TaskStartParams }
  | { kind: 'taskProgress'; params: TaskProgressParams }
  | { kind: 'taskFinish'; params: TaskFinishParams }
  | { kind: 'logMessage'; params: LogMessageParams }
  | { kind: 'showMessage'; params: ShowMessageParams }
  | { kind: 'publishDiagnostics'; params: PublishDiagnosticsParams }
  | { kind: 'didChangeBuildTarget'; params: DidChangeBuildTarget }
  | { kind: 'unrecognized'; method: string; reason: 'unknownMethod' | 'invalidParams' };

function decodeWith<T, E extends ServerEvent>(
  schema: z.ZodType<T>,
  notification: JsonRpcNotification,
  wrap: (params: T) => E,
): E | ServerEvent {
  const parsed = schema.safeParse(notification.params);
  if (!parsed.success) {
    console.warn(`[BuildClient] Ignoring ${notification.method} with invalid params:`, parsed.error.message);
    return { kind: 'unrecognized', method: notification.method, reason: 'invalidParams' };
  }
  return wrap(parsed.data);
}

const DECODERS: Record<ServerNotification, (notification: JsonRpcNotification) => ServerEvent> = {
  'build/taskStart': (n) => decodeWith(taskStartSchema, n, (params) => ({ kind: 'taskStart', params })),
  'build/taskProgress': (n) => decodeWith(taskProgressSchema, n, (params) => ({ kind: 'taskProgress', params })),
  'build/taskFinish': (n) => decodeWith(taskFinishSchema, n, (params) => ({ kind: 'taskFinish', params })),
  'build/logMessage': (n) => decodeWith(logMessageSchema, n, (params) => ({ kind: 'logMessage', params })),
  'build/showMessage': (n) => decodeWith(logMessageSchema, n, (params) => ({ kind: 'showMessage', params })),
  'build/publishDiagnostics': (n) =>
    decodeWith(publishDiagnosticsSchema, n, (params) => ({ kind: 'publishDiagnostics', params })),
  'buildTarget/didChange': (n) =>
    decodeWith(didChangeBuildTargetSchema, n, (params) => ({ kind: 'didChangeBuildTarget', params })),
};

function isServerNotification(method: string): method is ServerNotification {
  return Object.prototype.hasOwnProperty.call(DECODERS, method);
}

export function decodeServerNotification(notification: JsonRpcNotification): ServerEvent {
  if (!isServerNotification(notification.method)) {
    return { kind: 'unrecognized', method: notification.method, reason: 'unknownMethod' };
  }
  return DECODERS[notification.method](notification);
}
