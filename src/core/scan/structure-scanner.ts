import type { ModConnector } from '../../interfaces/connector';
import type {
  MinecraftStructure,
  ModConflict,
  ModInfo,
  ScanError,
} from '../../interfaces/mod-info';
import {
  ConnectorError,
  ExtractionError,
  OperationCancelledError,
} from '../../utils/errors';
import * as logger from '../../utils/logger';
import { extractMetadata, hashContent, toModInfo } from '../archive/mod-extractor';
import { anonymousMetadata } from '../archive/metadata-formats';
import { processPool } from '../pool/work-pool';
import type { MetadataCache } from './metadata-cache';

export interface ScanProgress {
  stage: 'scan';
  completed: number;
  total: number;
  filename: string;
}

export interface ScanOptions {
  signal?: AbortSignal;
  /** Upper bound on concurrent reads; never above the connector's own limit */
  concurrency?: number;
  cache?: MetadataCache;
  verbosity?: number;
  onProgress?: (progress: ScanProgress) => void;
}

export function isModArchive(name: string): boolean {
  return name.toLowerCase().endsWith('.jar');
}

function toScanError(filename: string, error: Error): ScanError {
  if (error instanceof ExtractionError) {
    return { filename, kind: error.kind, message: error.message };
  }
  if (error instanceof ConnectorError) {
    switch (error.kind) {
      case 'not-found':
      case 'permission-denied':
      case 'io-error':
        return { filename, kind: error.kind, message: error.message };
      default:
        break;
    }
  }
  return { filename, kind: 'io-error', message: error.message };
}

/**
 * Fold scanned archives into a structure in entry-name order. A later archive
 * with an id already taken is either a harmless copy (same hash, dropped) or
 * a conflict; the first archive stays in `mods` either way.
 */
export function foldModInfos(
  root: string,
  infos: readonly ModInfo[],
  errors: readonly ScanError[],
  verbosity: number = logger.Verbosity.Normal,
  scannedAt: string = new Date().toISOString(),
): MinecraftStructure {
  const mods = new Map<string, ModInfo>();
  const conflicts = new Map<string, ModConflict>();

  for (const info of infos) {
    const existing = mods.get(info.modId);
    if (!existing) {
      mods.set(info.modId, info);
      continue;
    }

    if (existing.contentHash === info.contentHash) {
      logger.verbose(
        `Dropping ${info.filename}: same content as ${existing.filename}`,
        verbosity,
      );
      continue;
    }

    const conflict = conflicts.get(info.modId) ?? {
      modId: info.modId,
      filenames: [existing.filename],
      contentHashes: [existing.contentHash],
    };
    if (!conflict.contentHashes.includes(info.contentHash)) {
      conflict.filenames.push(info.filename);
      conflict.contentHashes.push(info.contentHash);
    }
    conflicts.set(info.modId, conflict);
  }

  for (const conflict of conflicts.values()) {
    logger.warning(
      `Mod id "${conflict.modId}" is claimed by ${conflict.filenames.join(', ')} with different content`,
      verbosity,
    );
  }

  return Object.freeze({
    root,
    scannedAt,
    mods,
    conflicts: Object.freeze([...conflicts.values()]),
    errors: Object.freeze([...errors]),
  });
}

export async function scanStructure(
  connector: ModConnector,
  options: ScanOptions = {},
): Promise<MinecraftStructure> {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const signal = options.signal;
  if (signal?.aborted) {
    throw new OperationCancelledError('Scan cancelled');
  }

  const names = (await connector.list()).filter(isModArchive).sort();
  const concurrency = Math.min(
    options.concurrency ?? connector.scanConcurrency,
    connector.scanConcurrency,
  );
  logger.verbose(
    `Scanning ${names.length} archives in ${connector.location} (concurrency ${concurrency})`,
    verbosity,
  );

  const failure: { fatal?: ConnectorError } = {};
  let completed = 0;

  const scanEntry = async (filename: string): Promise<ModInfo> => {
    try {
      const bytes = await connector.read(filename);
      const contentHash = hashContent(bytes);
      let metadata = options.cache?.get(contentHash);
      if (metadata?.format === 'anonymous') {
        // Anonymous ids come from the file name, not the bytes
        metadata = anonymousMetadata(filename);
      } else if (metadata) {
        logger.verbose(`Cache hit for ${filename}`, verbosity);
      } else {
        metadata = await extractMetadata(bytes, filename);
        if (metadata.format !== 'anonymous') {
          options.cache?.set(contentHash, metadata);
        }
      }
      logger.verbose(
        `${filename}: ${metadata.modId} ${metadata.version} (${metadata.format}, ${metadata.sideSupport})`,
        verbosity,
      );
      return toModInfo(metadata, filename, contentHash, bytes.length);
    } catch (error) {
      if (error instanceof ConnectorError && error.connectionLevel) {
        failure.fatal = failure.fatal ?? error;
      }
      throw error;
    } finally {
      completed++;
      options.onProgress?.({
        stage: 'scan',
        completed,
        total: names.length,
        filename,
      });
    }
  };

  const results = await processPool(names, scanEntry, concurrency, {
    shouldStop: () => failure.fatal !== undefined || signal?.aborted === true,
  });

  if (failure.fatal) {
    throw failure.fatal;
  }
  if (signal?.aborted) {
    throw new OperationCancelledError('Scan cancelled');
  }

  const infos: ModInfo[] = [];
  const errors: ScanError[] = [];
  for (const result of results) {
    if (result.status === 'fulfilled') {
      infos.push(result.value);
    } else if (result.status === 'rejected') {
      const scanError = toScanError(result.item, result.error);
      logger.warning(`Skipping ${result.item}: ${scanError.message}`, verbosity);
      errors.push(scanError);
    }
  }

  return foldModInfos(connector.location, infos, errors, verbosity);
}
