import crypto from 'node:crypto';
import type { ModInfo, ModMetadata } from '../../interfaces/mod-info';
import { corruptArchive } from '../../utils/errors';
import { readArchive, type ArchiveContents } from './archive-reader';
import { METADATA_ENTRIES, resolveMetadata } from './metadata-formats';

export function hashContent(bytes: Buffer): string {
  return crypto.createHash('sha256').update(bytes).digest('hex');
}

export function toModInfo(
  metadata: ModMetadata,
  filename: string,
  contentHash: string,
  size: number,
): ModInfo {
  return { ...metadata, filename, contentHash, size };
}

/**
 * Read only the metadata of an archive. Throws ExtractionError with kind
 * `corrupt-archive` when the bytes are not a zip, or `metadata-parse-error`
 * when a recognized metadata entry is malformed.
 */
export async function extractMetadata(
  bytes: Buffer,
  filename: string,
): Promise<ModMetadata> {
  let contents: ArchiveContents;
  try {
    contents = await readArchive(bytes, METADATA_ENTRIES);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw corruptArchive(filename, reason);
  }

  return resolveMetadata(contents, filename);
}

export async function extractModInfo(
  bytes: Buffer,
  filename: string,
): Promise<ModInfo> {
  const metadata = await extractMetadata(bytes, filename);
  return toModInfo(metadata, filename, hashContent(bytes), bytes.length);
}
