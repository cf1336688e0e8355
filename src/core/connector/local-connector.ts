import fs from 'node:fs';
import path from 'node:path';
import type { LocalConnection, ModConnector } from '../../interfaces/connector';
import { ConnectorError, type ConnectorErrorKind } from '../../utils/errors';
import { Verbosity, verbose as logVerbose } from '../../utils/logger';
import { assertEntryName, PARTIAL_SUFFIX } from './entry-name';

export const LOCAL_SCAN_CONCURRENCY = 4;

function errorCode(error: unknown): string {
  return error instanceof Error && 'code' in error ? String(error.code) : '';
}

function classifyFsError(error: unknown): ConnectorErrorKind {
  switch (errorCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'not-found';
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return 'permission-denied';
    default:
      return 'io-error';
  }
}

function toConnectorError(
  error: unknown,
  operation: string,
  entry?: string,
): ConnectorError {
  if (error instanceof ConnectorError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new ConnectorError(classifyFsError(error), operation, message, entry);
}

export function createLocalConnector(
  connection: LocalConnection,
  verbosity: number = Verbosity.Normal,
) {
  const modsPath = path.resolve(connection.root, connection.modsDir);
  const entryPath = (name: string): string => path.join(modsPath, name);

  const list = async (): Promise<string[]> => {
    try {
      const entries = await fs.promises.readdir(modsPath, {
        withFileTypes: true,
      });
      return entries
        .filter((entry) => entry.isFile())
        .map((entry) => entry.name);
    } catch (error) {
      // Only a missing directory counts as empty; ENOTDIR means a file is in the way
      if (errorCode(error) === 'ENOENT') {
        logVerbose(`Mods directory ${modsPath} does not exist yet`, verbosity);
        return [];
      }
      throw toConnectorError(error, 'list');
    }
  };

  const read = async (name: string): Promise<Buffer> => {
    const safeName = assertEntryName(name, 'read');
    try {
      return await fs.promises.readFile(entryPath(safeName));
    } catch (error) {
      throw toConnectorError(error, 'read', name);
    }
  };

  const write = async (name: string, data: Buffer): Promise<void> => {
    const safeName = assertEntryName(name, 'write');
    const targetPath = entryPath(safeName);
    const partialPath = targetPath + PARTIAL_SUFFIX;
    try {
      await fs.promises.mkdir(modsPath, { recursive: true });
      await fs.promises.writeFile(partialPath, data);
      await fs.promises.rename(partialPath, targetPath);
      logVerbose(`Wrote ${data.length} bytes to ${targetPath}`, verbosity);
    } catch (error) {
      await fs.promises.rm(partialPath, { force: true }).catch(() => undefined);
      throw toConnectorError(error, 'write', name);
    }
  };

  const remove = async (name: string): Promise<void> => {
    const safeName = assertEntryName(name, 'delete');
    try {
      await fs.promises.unlink(entryPath(safeName));
      logVerbose(`Deleted ${entryPath(safeName)}`, verbosity);
    } catch (error) {
      throw toConnectorError(error, 'delete', name);
    }
  };

  const close = async (): Promise<void> => {};

  const connector: ModConnector = {
    kind: 'local',
    location: modsPath,
    scanConcurrency: LOCAL_SCAN_CONCURRENCY,
    list,
    read,
    write,
    delete: remove,
    close,
  };
  return connector;
}

export type LocalConnector = ReturnType<typeof createLocalConnector>;
