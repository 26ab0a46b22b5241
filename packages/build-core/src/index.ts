/**
 * @buildlink/core — public exports
 *
 * Client and server ends of the build-server protocol: transports, the
 * launcher and registry, the sessions, the compile-result cache and the
 * target graph.
 */

export * from './common/types/protocol.js';
export * from './common/types/build.js';
export * from './common/types/transport.js';
export * from './common/errors.js';
export * from './common/config.js';
export { projectDefinitionSchema, analysisContentsSchema } from './common/schemas.js';
export type { ProjectDefinition } from './common/schemas.js';

export { encodeFrame, FrameDecoder } from './transport/framing.js';
export { Connection } from './transport/connection.js';
export type { ByteChannel, ConnectionOptions } from './transport/connection.js';
export {
  assertValidEndpoint,
  describeEndpoint,
  endpointFromArgs,
  endpointKey,
  endpointToArgs,
} from './transport/endpoint.js';
export { isSocketAlive } from './transport/sockets.js';
export type { ListenOptions, OpenOptions, TransportServer } from './transport/sockets.js';
export { createInProcessTransportPair } from './transport/in-process.js';
export { listenTransport, openTransport } from './factories/transport.js';
export type { OpenTransport, OpenTransportOptions } from './factories/transport.js';

export { Launcher, createProcessSpawner } from './launcher/launcher.js';
export type { ConnectOptions, LaunchResult, LauncherOptions, SpawnServer } from './launcher/launcher.js';
export type { BackoffOptions, ServerProcess } from './launcher/readiness.js';
export { BuildServerRegistry } from './launcher/registry.js';
export type { AcquireOptions, BuildServerRegistryOptions, ClientIdentity } from './launcher/registry.js';

export { BuildClient, statusFromCode } from './session/client.js';
export type {
  BuildClientHandlers,
  BuildClientOptions,
  CompileAck,
  CompileOptions,
  RequestOptions,
  SessionState,
} from './session/client.js';
export { decodeServerNotification } from './session/notifications.js';
export type { ServerEvent } from './session/notifications.js';
export { BuildServerSession } from './session/server.js';
export type { BuildServerSessionOptions, RequestContext, ServerSessionState } from './session/server.js';

export { CompileResultCache } from './cache/compile-result-cache.js';
export type { CacheStats, CompileResultCacheOptions, DiagnosticsBatch, FinishedTask } from './cache/compile-result-cache.js';
export { DecodePool } from './cache/decode-pool.js';
export type { AnalysisDecoder } from './cache/decode-pool.js';

export { BuildTargetGraph, findResolutionProblem, targetUri } from './graph/build-target-graph.js';
export type { CompilerLanguage, ProjectNode } from './graph/build-target-graph.js';
export { loadWorkspaceGraph, readProjectDefinitions, workspaceConfigDir } from './graph/workspace-loader.js';

export {
  analysisDirectory,
  analysisLocationToPath,
  analysisPath,
  pruneAnalyses,
  readAnalysis,
  writeAnalysis,
} from './storage/analysis-store.js';
export { DigestCompileEngine, collectSourceFiles, scanMarkers } from './engine/digest-engine.js';
export type { CompileEngine, CompileInputs, CompileReporter, EngineResult } from './engine/types.js';

export { BuildService, diffGraphs } from './server/build-service.js';
export type { BuildServiceOptions } from './server/build-service.js';
export { SERVER_NAME, SERVER_VERSION, serveTransport, startBuildServer } from './server/build-server.js';
export type { BuildServerOptions, RunningBuildServer } from './server/build-server.js';
