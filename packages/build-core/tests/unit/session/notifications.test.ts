import { describe, it, expect, vi, afterEach } from 'vitest';
import { decodeServerNotification } from '../../../src/session/notifications.js';

describe('decodeServerNotification', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should decode a known notification', () => {
    expect(
      decodeServerNotification({
        jsonrpc: '2.0',
        method: 'build/taskProgress',
        params: { taskId: { id: 't1' }, progress: 3, total: 10, unit: 'files' },
      }),
    ).toEqual({ kind: 'taskProgress', params: { taskId: { id: 't1' }, progress: 3, total: 10, unit: 'files' } });
  });

  it('should decode showMessage with the log message shape', () => {
    expect(
      decodeServerNotification({ jsonrpc: '2.0', method: 'build/showMessage', params: { type: 1, message: 'broken' } }),
    ).toEqual({ kind: 'showMessage', params: { type: 1, message: 'broken' } });
  });

  it('should mark unknown methods as unrecognized', () => {
    expect(decodeServerNotification({ jsonrpc: '2.0', method: 'build/somethingNew', params: {} })).toEqual({
      kind: 'unrecognized',
      method: 'build/somethingNew',
      reason: 'unknownMethod',
    });
  });

  it('should mark known methods with invalid params as unrecognized', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(
      decodeServerNotification({ jsonrpc: '2.0', method: 'build/taskFinish', params: { taskId: { id: 't1' }, status: 7 } }),
    ).toEqual({ kind: 'unrecognized', method: 'build/taskFinish', reason: 'invalidParams' });
  });
});
