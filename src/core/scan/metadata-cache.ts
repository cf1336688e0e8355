import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import type { ModMetadata } from '../../interfaces/mod-info';
import {
  Verbosity,
  verbose as logVerbose,
  error as logError,
} from '../../utils/logger';

const CACHE_VERSION = 1;

const metadataSchema = z.object({
  modId: z.string(),
  name: z.string(),
  version: z.string(),
  sideSupport: z.enum(['client-only', 'server-only', 'both', 'unknown']),
  format: z.enum(['forge-toml', 'fabric-json', 'legacy-mcmod', 'manifest', 'anonymous']),
  loader: z.enum(['neoforge', 'forge', 'fabric', 'unknown']),
});

const cacheFileSchema = z.object({
  version: z.literal(CACHE_VERSION),
  entries: z.record(z.unknown()),
});

/**
 * Content hash → extracted metadata. Archives with identical bytes carry
 * identical metadata, so entries never go stale; only the file name is
 * taken from the current scan.
 */
export function createMetadataCache(
  cachePath: string,
  verbosity: number = Verbosity.Normal,
) {
  const cache = new Map<string, ModMetadata>();
  let dirty = false;

  const load = async (): Promise<boolean> => {
    try {
      if (!fs.existsSync(cachePath)) {
        return false;
      }
      const data = await fs.promises.readFile(cachePath, 'utf8');
      const parsed = cacheFileSchema.safeParse(JSON.parse(data));
      if (!parsed.success) {
        logVerbose(`Ignoring metadata cache with unknown layout at ${cachePath}`, verbosity);
        return false;
      }

      for (const [hash, value] of Object.entries(parsed.data.entries)) {
        const entry = metadataSchema.safeParse(value);
        if (entry.success) {
          cache.set(hash, entry.data);
        }
      }
      logVerbose(`Loaded ${cache.size} cached metadata entries from ${cachePath}`, verbosity);
      return true;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      logError(`Error loading metadata cache: ${errorMessage}`);
      return false;
    }
  };

  const save = async (): Promise<boolean> => {
    if (!dirty) {
      return true;
    }
    try {
      await fs.promises.mkdir(path.dirname(cachePath), { recursive: true });
      const body = {
        version: CACHE_VERSION,
        entries: Object.fromEntries(cache),
      };
      await fs.promises.writeFile(cachePath, JSON.stringify(body, null, 2));
      await fs.promises.chmod(cachePath, 0o600);
      dirty = false;
      logVerbose(`Saved metadata cache to ${cachePath}`, verbosity);
      return true;
    } catch (error) {
      const errorMessage =
        error instanceof Error ? error.message : String(error);
      logVerbose(`Error saving metadata cache: ${errorMessage}`, verbosity);
      return false;
    }
  };

  const get = (contentHash: string): ModMetadata | undefined =>
    cache.get(contentHash);

  const set = (contentHash: string, metadata: ModMetadata): void => {
    cache.set(contentHash, metadata);
    dirty = true;
  };

  return {
    load,
    save,
    get,
    set,
    get size() {
      return cache.size;
    },
  };
}

export type MetadataCache = ReturnType<typeof createMetadataCache>;
