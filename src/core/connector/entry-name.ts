import path from 'node:path';
import { ConnectorError } from '../../utils/errors';

export const PARTIAL_SUFFIX = '.partial';

/**
 * Entry names are single path segments inside the mod directory.
 * Anything that could resolve elsewhere is refused before any I/O.
 */
export function assertEntryName(name: string, operation: string): string {
  const normalizedName = name.replace(/\\/g, '/');

  if (
    normalizedName === '' ||
    normalizedName === '.' ||
    normalizedName === '..' ||
    normalizedName.includes('/') ||
    normalizedName.includes('\0') ||
    path.posix.isAbsolute(normalizedName)
  ) {
    throw new ConnectorError(
      'io-error',
      operation,
      `Invalid entry name: ${name}`,
      name,
    );
  }

  return normalizedName;
}

/**
 * Join remote path segments with forward slashes, dropping empty ones and
 * duplicate separators. A leading slash on the first segment is kept.
 */
export function joinRemotePath(...segments: string[]): string {
  const parts = segments
    .map((segment) => segment.replace(/\\/g, '/'))
    .filter((segment) => segment !== '' && segment !== '.');
  if (parts.length === 0) {
    return '.';
  }

  const absolute = parts[0].startsWith('/');
  const joined = parts
    .flatMap((segment) => segment.split('/'))
    .filter((segment) => segment !== '')
    .join('/');
  return absolute ? `/${joined}` : joined || '.';
}
