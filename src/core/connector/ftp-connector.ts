import { Readable, Writable } from 'node:stream';
import { Client, FTPError, type AccessOptions } from 'basic-ftp';
import type { FtpConnection, ModConnector } from '../../interfaces/connector';
import {
  ConnectorError,
  isConnectionLevel,
  type ConnectorErrorKind,
} from '../../utils/errors';
import {
  Verbosity,
  verbose as logVerbose,
  error as logError,
} from '../../utils/logger';
import { assertEntryName, joinRemotePath, PARTIAL_SUFFIX } from './entry-name';

export const FTP_SCAN_CONCURRENCY = 1;
export const PREVIOUS_SUFFIX = '.previous';

const SOCKET_ERROR_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'EPIPE',
  'ECONNREFUSED',
  'ENOTFOUND',
  'EHOSTUNREACH',
]);

export interface RemoteEntry {
  name: string;
  isFile: boolean;
}

/**
 * The part of the basic-ftp Client the connector relies on.
 */
export interface FtpSession {
  readonly closed: boolean;
  access(options: AccessOptions): Promise<unknown>;
  pwd(): Promise<string>;
  list(path?: string): Promise<RemoteEntry[]>;
  downloadTo(destination: Writable, fromRemotePath: string): Promise<unknown>;
  uploadFrom(source: Readable, toRemotePath: string): Promise<unknown>;
  rename(path: string, newPath: string): Promise<unknown>;
  remove(path: string): Promise<unknown>;
  size(path: string): Promise<number>;
  ensureDir(remoteDirPath: string): Promise<void>;
  close(): void;
}

export interface FtpConnectorDependencies {
  createClient?: (timeoutMs: number) => FtpSession;
}

export function classifyFtpError(
  error: unknown,
  sessionClosed: boolean = false,
): ConnectorErrorKind {
  if (error instanceof FTPError) {
    switch (error.code) {
      case 530:
        return 'auth-failure';
      case 421:
        return 'connection-lost';
      case 550:
        return 'not-found';
      case 553:
      case 532:
        return 'permission-denied';
      case 450:
      case 451:
      case 452:
      case 552:
        return 'io-error';
      default:
        return 'protocol-error';
    }
  }

  if (error instanceof Error) {
    const code = 'code' in error ? String(error.code) : '';
    if (SOCKET_ERROR_CODES.has(code)) {
      return 'connection-lost';
    }
    if (/timeout|closed|closing connection/i.test(error.message)) {
      return 'connection-lost';
    }
  }

  return sessionClosed ? 'connection-lost' : 'protocol-error';
}

export function createFtpConnector(
  connection: FtpConnection,
  verbosity: number = Verbosity.Normal,
  deps: FtpConnectorDependencies = {},
) {
  const createClient =
    deps.createClient ?? ((timeoutMs: number) => new Client(timeoutMs));
  const location = `ftp://${connection.host}:${connection.port}${joinRemotePath(
    '/',
    connection.remoteRoot,
    connection.modsDir,
  )}`;

  let session: FtpSession | null = null;
  let modsPath = '';
  let modsDirEnsured = false;
  let queue: Promise<unknown> = Promise.resolve();

  // One control connection, so commands never interleave
  const serialize = <T>(task: () => Promise<T>): Promise<T> => {
    const run = queue.then(task, task);
    queue = run.catch(() => undefined);
    return run;
  };

  const dropSession = (): void => {
    if (session) {
      session.close();
    }
    session = null;
    modsDirEnsured = false;
  };

  const toConnectorError = (
    error: unknown,
    operation: string,
    entry?: string,
  ): ConnectorError => {
    if (error instanceof ConnectorError) {
      return error;
    }
    const kind = classifyFtpError(error, session?.closed ?? true);
    const message = error instanceof Error ? error.message : String(error);
    const connectorError = new ConnectorError(kind, operation, message, entry);
    if (connectorError.connectionLevel) {
      dropSession();
    }
    return connectorError;
  };

  const getSession = async (): Promise<FtpSession> => {
    if (session && !session.closed) {
      return session;
    }
    dropSession();

    const client = createClient(connection.timeoutMs);
    try {
      await client.access({
        host: connection.host,
        port: connection.port,
        user: connection.username,
        password: connection.password,
        secure: connection.secure,
      });
      const baseDir = connection.remoteRoot.startsWith('/')
        ? '/'
        : await client.pwd();
      modsPath = joinRemotePath(baseDir, connection.remoteRoot, connection.modsDir);
    } catch (error) {
      client.close();
      const kind = classifyFtpError(error, true);
      const message = error instanceof Error ? error.message : String(error);
      throw new ConnectorError(
        isConnectionLevel(kind) ? kind : 'protocol-error',
        'connect',
        `Could not connect to ${connection.host}:${connection.port}: ${message}`,
      );
    }

    logVerbose(`Connected to ${location}`, verbosity);
    session = client;
    return client;
  };

  const entryPath = (name: string): string => joinRemotePath(modsPath, name);

  const list = (): Promise<string[]> =>
    serialize(async () => {
      const client = await getSession();
      try {
        const entries = await client.list(modsPath);
        return entries.filter((entry) => entry.isFile).map((entry) => entry.name);
      } catch (error) {
        const connectorError = toConnectorError(error, 'list');
        if (connectorError.kind === 'not-found') {
          logVerbose(`Remote directory ${modsPath} does not exist yet`, verbosity);
          return [];
        }
        throw connectorError;
      }
    });

  const read = (name: string): Promise<Buffer> =>
    serialize(async () => {
      const safeName = assertEntryName(name, 'read');
      const client = await getSession();
      const chunks: Buffer[] = [];
      const sink = new Writable({
        write(chunk: Buffer, _encoding, callback) {
          chunks.push(chunk);
          callback();
        },
      });
      try {
        await client.downloadTo(sink, entryPath(safeName));
        return Buffer.concat(chunks);
      } catch (error) {
        throw toConnectorError(error, 'read', name);
      }
    });

  const exists = async (client: FtpSession, remotePath: string): Promise<boolean> => {
    try {
      await client.size(remotePath);
      return true;
    } catch (error) {
      if (classifyFtpError(error, client.closed) === 'not-found') {
        return false;
      }
      throw error;
    }
  };

  const removeIfPresent = async (client: FtpSession, remotePath: string): Promise<void> => {
    try {
      await client.remove(remotePath);
    } catch (error) {
      if (classifyFtpError(error, client.closed) !== 'not-found') {
        throw error;
      }
    }
  };

  const discardQuietly = async (client: FtpSession, remotePath: string): Promise<void> => {
    try {
      await removeIfPresent(client, remotePath);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logVerbose(`Could not remove ${remotePath}: ${reason}`, verbosity);
    }
  };

  /**
   * Move `from` onto `to`. Servers that refuse to rename onto an existing
   * file get the old target moved aside first; it is put back if the second
   * rename fails too, so the target is never lost.
   */
  const renameOver = async (
    client: FtpSession,
    from: string,
    to: string,
  ): Promise<void> => {
    const previousPath = to + PREVIOUS_SUFFIX;
    try {
      await client.rename(from, to);
      return;
    } catch (error) {
      if (isConnectionLevel(classifyFtpError(error, client.closed))) {
        throw error;
      }
      if (!(await exists(client, to))) {
        throw error;
      }
      await removeIfPresent(client, previousPath);
      try {
        await client.rename(to, previousPath);
      } catch {
        throw error;
      }
    }

    try {
      await client.rename(from, to);
    } catch (retryError) {
      try {
        await client.rename(previousPath, to);
      } catch (restoreError) {
        const reason =
          restoreError instanceof Error ? restoreError.message : String(restoreError);
        logError(`Could not restore ${to} from ${previousPath}: ${reason}`);
      }
      throw retryError;
    }
    await discardQuietly(client, previousPath);
  };

  const write = (name: string, data: Buffer): Promise<void> =>
    serialize(async () => {
      const safeName = assertEntryName(name, 'write');
      const client = await getSession();
      const targetPath = entryPath(safeName);
      const partialPath = targetPath + PARTIAL_SUFFIX;
      let partialStarted = false;
      try {
        if (!modsDirEnsured) {
          await client.ensureDir(modsPath);
          modsDirEnsured = true;
        }
        if (connection.atomicWrites) {
          partialStarted = true;
          await client.uploadFrom(Readable.from(data), partialPath);
          await renameOver(client, partialPath, targetPath);
        } else {
          await client.uploadFrom(Readable.from(data), targetPath);
        }
        logVerbose(`Uploaded ${data.length} bytes to ${targetPath}`, verbosity);
      } catch (error) {
        const connectorError = toConnectorError(error, 'write', name);
        if (partialStarted && !connectorError.connectionLevel) {
          await discardQuietly(client, partialPath);
        }
        throw connectorError;
      }
    });

  const remove = (name: string): Promise<void> =>
    serialize(async () => {
      const safeName = assertEntryName(name, 'delete');
      const client = await getSession();
      try {
        await client.remove(entryPath(safeName));
        logVerbose(`Deleted ${entryPath(safeName)}`, verbosity);
      } catch (error) {
        throw toConnectorError(error, 'delete', name);
      }
    });

  const close = (): Promise<void> =>
    serialize(async () => {
      dropSession();
    });

  const connector: ModConnector = {
    kind: 'ftp',
    location,
    scanConcurrency: FTP_SCAN_CONCURRENCY,
    list,
    read,
    write,
    delete: remove,
    close,
  };
  return connector;
}

export type FtpConnector = ReturnType<typeof createFtpConnector>;
