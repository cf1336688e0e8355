/**
 * Consolidated Test Helpers
 *
 * Fakes return the same shape as the real factory functions,
 * enabling direct dependency injection without type casting.
 */

import { PassThrough } from 'node:stream';
import crypto from 'node:crypto';
import archiver from 'archiver';
import { vi, type Mock } from 'vitest';
import type { ModConnector, ConnectorKind } from '../../src/interfaces/connector';
import type {
  MinecraftStructure,
  ModConflict,
  ModInfo,
  ScanError,
} from '../../src/interfaces/mod-info';
import { ConnectorError } from '../../src/utils/errors';

/**
 * Build an in-memory zip archive from entry names and contents
 */
export function buildZip(entries: Record<string, string | Buffer>): Promise<Buffer> {
  return new Promise((resolve, reject) => {
    const output = new PassThrough();
    const chunks: Buffer[] = [];
    const archive = archiver('zip', { zlib: { level: 0 } });

    output.on('data', (chunk: Buffer) => chunks.push(chunk));
    output.on('end', () => resolve(Buffer.concat(chunks)));
    archive.on('error', reject);

    archive.pipe(output);
    for (const [name, content] of Object.entries(entries)) {
      archive.append(content, { name });
    }
    archive.finalize().catch(reject);
  });
}

/**
 * A Fabric mod jar with the given id, version and environment
 */
export function buildFabricJar(
  id: string,
  version: string,
  environment?: string,
  extra: Record<string, string | Buffer> = {},
): Promise<Buffer> {
  const metadata: Record<string, string> = { id, version };
  if (environment !== undefined) {
    metadata.environment = environment;
  }
  return buildZip({
    'fabric.mod.json': JSON.stringify(metadata),
    ...extra,
  });
}

export function sha256(content: string | Buffer): string {
  return crypto.createHash('sha256').update(content).digest('hex');
}

/**
 * Creates a ModInfo with sensible defaults; the hash derives from id and version
 */
export function createModInfo(overrides: Partial<ModInfo> & { modId: string }): ModInfo {
  const version = overrides.version ?? '1.0.0';
  return {
    name: overrides.modId,
    version,
    filename: `${overrides.modId}-${version}.jar`,
    contentHash: sha256(`${overrides.modId}@${version}`),
    size: 1024,
    sideSupport: 'both',
    format: 'fabric-json',
    loader: 'fabric',
    ...overrides,
  };
}

/**
 * Creates a structure holding the given mods, keyed by mod id
 */
export function createStructure(
  mods: ModInfo[],
  extras: { conflicts?: ModConflict[]; errors?: ScanError[]; root?: string } = {},
): MinecraftStructure {
  return {
    root: extras.root ?? '/test/mods',
    scannedAt: '2026-01-01T00:00:00.000Z',
    mods: new Map(mods.map((mod) => [mod.modId, mod])),
    conflicts: extras.conflicts ?? [],
    errors: extras.errors ?? [],
  };
}

export interface MemoryConnector extends ModConnector {
  files: Map<string, Buffer>;
  /** Operation log such as `read:a.jar`, in call order */
  calls: string[];
  /** Errors to throw, keyed by `operation:name` (or `list`) */
  failures: Map<string, Error>;
  list: Mock<() => Promise<string[]>>;
  read: Mock<(name: string) => Promise<Buffer>>;
  write: Mock<(name: string, data: Buffer) => Promise<void>>;
  delete: Mock<(name: string) => Promise<void>>;
  close: Mock<() => Promise<void>>;
}

/**
 * Creates an in-memory connector matching the ModConnector interface
 */
export function createMemoryConnector(
  initialFiles: Record<string, string | Buffer> = {},
  options: { kind?: ConnectorKind; scanConcurrency?: number } = {},
): MemoryConnector {
  const files = new Map<string, Buffer>(
    Object.entries(initialFiles).map(([name, content]) => [
      name,
      Buffer.isBuffer(content) ? content : Buffer.from(content),
    ]),
  );
  const calls: string[] = [];
  const failures = new Map<string, Error>();

  const record = (key: string): void => {
    calls.push(key);
    const failure = failures.get(key);
    if (failure) {
      throw failure;
    }
  };

  return {
    kind: options.kind ?? 'local',
    location: 'memory://mods',
    scanConcurrency: options.scanConcurrency ?? 4,
    files,
    calls,
    failures,
    list: vi.fn(async () => {
      record('list');
      return [...files.keys()];
    }),
    read: vi.fn(async (name: string) => {
      record(`read:${name}`);
      const data = files.get(name);
      if (!data) {
        throw new ConnectorError('not-found', 'read', `No such entry: ${name}`, name);
      }
      return data;
    }),
    write: vi.fn(async (name: string, data: Buffer) => {
      record(`write:${name}`);
      files.set(name, data);
    }),
    delete: vi.fn(async (name: string) => {
      record(`delete:${name}`);
      if (!files.delete(name)) {
        throw new ConnectorError('not-found', 'delete', `No such entry: ${name}`, name);
      }
    }),
    close: vi.fn(async () => {
      calls.push('close');
    }),
  };
}
