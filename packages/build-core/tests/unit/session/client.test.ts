import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BuildClient, statusFromCode, type BuildClientHandlers } from '../../../src/session/client.js';
import { BuildServerSession } from '../../../src/session/server.js';
import { createInProcessTransportPair } from '../../../src/transport/in-process.js';
import { ConnectionLostError, ProtocolError, RequestError } from '../../../src/common/errors.js';
import type { BuildTarget, CompileResult, InitializeBuildParams } from '../../../src/common/types/build.js';
import { isRequest } from '../../../src/common/types/protocol.js';

const core = { uri: 'file:///w/?id=core' };

const coreTarget: BuildTarget = {
  id: core,
  displayName: 'core',
  tags: ['library'],
  languageIds: ['scala'],
  dependencies: [],
  capabilities: { canCompile: true, canTest: false, canRun: true, canDebug: false },
};

const initializeParams: InitializeBuildParams = {
  displayName: 'test-client',
  version: '0.0.1',
  bspVersion: '2.1.0',
  rootUri: 'file:///w/',
  capabilities: { languageIds: ['scala'] },
};

describe('statusFromCode', () => {
  it('should map status codes to compile statuses', () => {
    expect([statusFromCode(1), statusFromCode(2), statusFromCode(3)]).toEqual(['ok', 'failed', 'cancelled']);
  });
});

describe('BuildClient', () => {
  let session: BuildServerSession;
  let client: BuildClient;
  let wire: string[];

  function connect(serverVersion = '2.1.0', handlers: BuildClientHandlers = {}): void {
    const { serverTransport, clientTransport } = createInProcessTransportPair();
    wire = [];
    serverTransport.onMessage((message) => {
      if (isRequest(message)) {
        wire.push(message.method);
      }
    });
    session = new BuildServerSession({
      transport: serverTransport,
      displayName: 'test-server',
      version: '1.0.0',
      bspVersion: serverVersion,
    });
    session.registerMethod('workspace/buildTargets', () => ({ targets: [coreTarget] }));
    client = new BuildClient({
      transport: clientTransport,
      timeout: 1_000,
      handlers,
      generateOriginId: () => 'generated-origin',
    });
  }

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    client.close();
    session.close();
    vi.restoreAllMocks();
  });

  describe('lifecycle', () => {
    it('should become active after the handshake', async () => {
      connect();
      expect(client.sessionState).toBe('uninitialized');

      const result = await client.initialize(initializeParams);

      expect(result).toEqual({ displayName: 'test-server', version: '1.0.0', bspVersion: '2.1.0', capabilities: {} });
      expect(client.sessionState).toBe('active');
      expect(client.serverInfo).toEqual(result);
    });

    it('should hold requests issued before the handshake until it completes', async () => {
      connect();
      const targets = client.listBuildTargets();

      await client.initialize(initializeParams);

      await expect(targets).resolves.toEqual([coreTarget]);
    });

    it('should send queued operations in the order they were issued', async () => {
      connect();
      session.registerMethod('buildTarget/compile', (params): CompileResult => ({ originId: params.originId ?? 'missing', statusCode: 1 }));
      session.registerMethod('buildTarget/sources', () => ({ items: [{ target: core, sources: [] }] }));

      const compile = client.compile([core], { originId: 'queued' });
      const targets = client.listBuildTargets();
      const sources = client.getSources(core);
      await client.initialize(initializeParams);

      await expect(Promise.all([compile, targets, sources])).resolves.toEqual([
        { originId: 'queued', statusCode: 1 },
        [coreTarget],
        [],
      ]);
      expect(wire).toEqual(['build/initialize', 'buildTarget/compile', 'workspace/buildTargets', 'buildTarget/sources']);
    });

    it('should fail with versionIncompatible when the server rejects the protocol', async () => {
      connect('3.0.0');
      const queued = client.listBuildTargets();

      const error = await client.initialize(initializeParams).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(ProtocolError);
      expect(error).toMatchObject({ kind: 'versionIncompatible' });
      expect(client.sessionState).toBe('closed');
      await expect(queued).rejects.toBeInstanceOf(ProtocolError);
    });

    it('should forward notifications to the registered handlers', async () => {
      const onLogMessage = vi.fn();
      const onTargetsChanged = vi.fn();
      connect('2.1.0', { onLogMessage, onTargetsChanged });
      await client.initialize(initializeParams);

      session.notify('build/logMessage', { type: 4, message: 'resolving' });
      session.notify('buildTarget/didChange', { changes: [{ target: core, kind: 2 }] });

      await vi.waitFor(() => expect(onTargetsChanged).toHaveBeenCalledWith({ changes: [{ target: core, kind: 2 }] }));
      expect(onLogMessage).toHaveBeenCalledWith({ type: 4, message: 'resolving' });
    });

    it('should refuse to initialize twice', async () => {
      connect();
      await client.initialize(initializeParams);
      await expect(client.initialize(initializeParams)).rejects.toMatchObject({ kind: 'badArguments' });
    });

    it('should shut down in order and close the session', async () => {
      connect();
      await client.initialize(initializeParams);
      const closed = vi.fn();
      session.onClose(closed);

      await client.shutdown();

      expect(client.sessionState).toBe('closed');
      await vi.waitFor(() => expect(closed).toHaveBeenCalled());
      await expect(client.listBuildTargets()).rejects.toBeInstanceOf(ConnectionLostError);
    });

    it('should fail pending requests when the connection drops', async () => {
      connect();
      const started = vi.fn();
      session.registerMethod('workspace/reload', () => {
        started();
        return new Promise<null>(() => {});
      });
      await client.initialize(initializeParams);

      const reload = client.reload();
      await vi.waitFor(() => expect(started).toHaveBeenCalled());
      session.close();

      await expect(reload).rejects.toBeInstanceOf(ConnectionLostError);
      expect(client.sessionState).toBe('closed');
    });
  });

  describe('requests', () => {
    beforeEach(async () => {
      connect();
      await client.initialize(initializeParams);
    });

    it('should map an unknown target error', async () => {
      session.registerMethod('buildTarget/sources', () => {
        throw new RequestError('unknownTarget', 'Unknown build target: file:///w/?id=ghost');
      });

      const error = await client.getSources({ uri: 'file:///w/?id=ghost' }).catch((err: unknown) => err);
      expect(error).toBeInstanceOf(RequestError);
      expect(error).toMatchObject({ kind: 'unknownTarget', code: -32000 });
    });

    it('should pick the item of the requested target', async () => {
      session.registerMethod('buildTarget/scalacOptions', () => ({
        items: [{ target: core, options: ['-deprecation'], classpath: ['file:///w/out/core'], classDirectory: 'file:///w/out/core/' }],
      }));
      session.registerMethod('buildTarget/dependencySources', () => ({
        items: [{ target: core, sources: ['file:///m/a-sources.jar', 'file:///m/a-sources.jar'] }],
      }));

      await expect(client.getCompilerOptions(core)).resolves.toMatchObject({ options: ['-deprecation'] });
      await expect(client.getDependencySources(core)).resolves.toEqual(['file:///m/a-sources.jar']);
      await expect(client.getCompilerOptions({ uri: 'file:///w/?id=app' })).rejects.toMatchObject({
        kind: 'unknownTarget',
      });
    });

    it('should time out and cancel the request on the server', async () => {
      const aborted = vi.fn();
      session.registerMethod(
        'workspace/reload',
        (_params, context) =>
          new Promise<null>(() => {
            context.signal.addEventListener('abort', aborted);
          }),
      );

      await expect(client.reload({ timeoutMs: 20 })).rejects.toMatchObject({ kind: 'timeout' });
      await vi.waitFor(() => expect(aborted).toHaveBeenCalled());
    });

    it('should cancel through an abort signal', async () => {
      session.registerMethod('workspace/reload', () => new Promise<null>(() => {}));
      const controller = new AbortController();

      const reload = client.reload({ signal: controller.signal });
      controller.abort();

      await expect(reload).rejects.toMatchObject({ kind: 'cancelled' });
    });
  });

  describe('compile', () => {
    beforeEach(async () => {
      connect();
      await client.initialize(initializeParams);
    });

    function registerCompile(status: 1 | 2): void {
      session.registerMethod('buildTarget/compile', (params): CompileResult => {
        const originId = params.originId ?? 'missing';
        const taskId = { id: `${originId}/core` };
        session.notify('build/taskStart', { taskId, originId, dataKind: 'compile-task', data: { target: core } });
        session.notify('build/publishDiagnostics', {
          textDocument: { uri: 'file:///w/core/A.scala' },
          buildTarget: core,
          originId,
          reset: true,
          diagnostics: [
            {
              range: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } },
              severity: status === 1 ? 2 : 1,
              message: status === 1 ? 'deprecated' : 'not found: value x',
            },
          ],
        });
        session.notify('build/taskFinish', {
          taskId,
          originId,
          status,
          dataKind: 'compile-report',
          data: { target: core, originId, errors: status === 1 ? 0 : 1, warnings: status === 1 ? 1 : 0 },
        });
        return { originId, statusCode: status };
      });
    }

    it('should correlate task notifications into an outcome', async () => {
      registerCompile(1);

      const ack = await client.compile([core], { originId: 'origin-1' });

      expect(ack).toEqual({ originId: 'origin-1', statusCode: 1 });
      expect(client.cache.outcomes('origin-1')).toEqual([
        {
          originId: 'origin-1',
          target: core,
          status: 'ok',
          diagnostics: [
            {
              range: { start: { line: 0, character: 0 }, end: { line: 0, character: 4 } },
              severity: 2,
              message: 'deprecated',
            },
          ],
          errors: 0,
          warnings: 1,
          analysisLocation: undefined,
        },
      ]);
    });

    it('should generate an origin id when none is given', async () => {
      registerCompile(2);

      const ack = await client.compile([core]);

      expect(ack).toEqual({ originId: 'generated-origin', statusCode: 2 });
      await expect(client.cache.awaitOutcome('generated-origin', core)).resolves.toMatchObject({
        status: 'failed',
        errors: 1,
      });
    });

    it('should refuse an origin id that is still compiling', async () => {
      session.registerMethod('buildTarget/compile', () => new Promise<CompileResult>(() => {}));

      const first = client.compile([core], { originId: 'busy', timeoutMs: 200 });
      await expect(client.compile([core], { originId: 'busy' })).rejects.toMatchObject({ kind: 'badArguments' });
      await expect(first).rejects.toMatchObject({ kind: 'timeout' });
    });
  });
});

describe('BuildClient against a misbehaving server', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  /** Answers initialize normally and every other request with `result`. */
  function rawServer(initializeResult: unknown, result: unknown): BuildClient {
    const { serverTransport, clientTransport } = createInProcessTransportPair();
    serverTransport.onMessage((message) => {
      if (!isRequest(message)) {
        return;
      }
      serverTransport.send({
        jsonrpc: '2.0',
        id: message.id,
        result: message.method === 'build/initialize' ? initializeResult : result,
      });
    });
    return new BuildClient({ transport: clientTransport, timeout: 1_000 });
  }

  const goodHandshake = { displayName: 'raw', version: '0', bspVersion: '2.0.0', capabilities: {} };

  it('should reject a result of the wrong shape', async () => {
    const client = rawServer(goodHandshake, { items: [{ target: core, sources: 'none' }] });
    await client.initialize(initializeParams);

    await expect(client.getSources(core)).rejects.toMatchObject({ kind: 'malformedFrame' });
    client.close();
  });

  it('should reject a malformed handshake', async () => {
    const client = rawServer({ displayName: 'raw' }, null);

    await expect(client.initialize(initializeParams)).rejects.toMatchObject({ kind: 'malformedHandshake' });
    expect(client.sessionState).toBe('closed');
  });

  it('should reject a server that announces another protocol major', async () => {
    const client = rawServer({ ...goodHandshake, bspVersion: '1.4.0' }, null);

    await expect(client.initialize(initializeParams)).rejects.toMatchObject({ kind: 'versionIncompatible' });
  });
});
