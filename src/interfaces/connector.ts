/**
 * Storage connector and server configuration types
 */

export type ConnectorKind = 'local' | 'ftp';

/**
 * Capability set over one mod directory. `list` and `read` never mutate;
 * `write` and `delete` do. Nothing is cached between calls.
 */
export interface ModConnector {
  readonly kind: ConnectorKind;
  /** Human readable location, e.g. a path or ftp://host/path */
  readonly location: string;
  /** Largest number of concurrent calls this connector tolerates while scanning */
  readonly scanConcurrency: number;
  list(): Promise<string[]>;
  read(name: string): Promise<Buffer>;
  write(name: string, data: Buffer): Promise<void>;
  delete(name: string): Promise<void>;
  close(): Promise<void>;
}

export interface LocalConnection {
  type: 'local';
  root: string;
  modsDir: string;
}

export interface FtpConnection {
  type: 'ftp';
  host: string;
  port: number;
  username: string;
  password: string;
  remoteRoot: string;
  modsDir: string;
  secure: boolean;
  timeoutMs: number;
  atomicWrites: boolean;
}

export interface ServerConfig {
  name: string;
  connection: LocalConnection | FtpConnection;
}
