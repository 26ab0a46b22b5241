/**
 * Transport endpoint and connection state types.
 */

/** TCP socket on host:port */
export interface TcpEndpoint {
  readonly kind: 'tcp';
  readonly host: string;
  readonly port: number;
}

/** Unix domain socket path, or `\\.\pipe\name` on Windows */
export interface LocalEndpoint {
  readonly kind: 'local';
  readonly path: string;
}

/** Two one-directional pipes (FIFOs, or named pipes on Windows) */
export interface PipeEndpoint {
  readonly kind: 'pipe';
  /** Pipe the client reads server output from */
  readonly readPath: string;
  /** Pipe the client writes requests to */
  readonly writePath: string;
}

export type TransportEndpoint = TcpEndpoint | LocalEndpoint | PipeEndpoint;

export type EndpointKind = TransportEndpoint['kind'];

/** Connection lifecycle. `failed` carries the reason it failed. */
export type ConnectionState =
  | { status: 'disconnected' }
  | { status: 'connecting' }
  | { status: 'handshaking' }
  | { status: 'ready' }
  | { status: 'closed' }
  | { status: 'failed'; reason: Error };

export type ConnectionStatus = ConnectionState['status'];
