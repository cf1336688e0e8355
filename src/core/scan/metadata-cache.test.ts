/**
 * Tests for createMetadataCache factory function
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { createMetadataCache } from './metadata-cache';
import { Verbosity } from '../../interfaces/logger';
import type { ModMetadata } from '../../interfaces/mod-info';

const sodium: ModMetadata = {
  modId: 'sodium',
  name: 'Sodium',
  version: '0.5.8',
  sideSupport: 'client-only',
  format: 'fabric-json',
  loader: 'fabric',
};

describe('createMetadataCache', () => {
  let tempDir: string;
  let cachePath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'craftsync-cache-test-'));
    cachePath = path.join(tempDir, 'state', 'metadata-cache.json');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should start empty when no cache file exists', async () => {
    const cache = createMetadataCache(cachePath, Verbosity.Quiet);

    expect(await cache.load()).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should round-trip entries through the cache file', async () => {
    const cache = createMetadataCache(cachePath, Verbosity.Quiet);
    cache.set('abc123', sodium);

    expect(await cache.save()).toBe(true);
    expect(fs.statSync(cachePath).mode & 0o777).toBe(0o600);

    const reloaded = createMetadataCache(cachePath, Verbosity.Quiet);
    expect(await reloaded.load()).toBe(true);
    expect(reloaded.get('abc123')).toEqual(sodium);
    expect(reloaded.get('other')).toBeUndefined();
  });

  it('should skip writing when nothing changed', async () => {
    const cache = createMetadataCache(cachePath, Verbosity.Quiet);

    expect(await cache.save()).toBe(true);
    expect(fs.existsSync(cachePath)).toBe(false);
  });

  it('should drop malformed entries and keep valid ones', async () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(
      cachePath,
      JSON.stringify({
        version: 1,
        entries: { good: sodium, bad: { modId: 'x', sideSupport: 'sideways' } },
      }),
    );
    const cache = createMetadataCache(cachePath, Verbosity.Quiet);

    expect(await cache.load()).toBe(true);
    expect(cache.size).toBe(1);
    expect(cache.get('good')).toEqual(sodium);
  });

  it('should ignore a cache written with another layout', async () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(cachePath, JSON.stringify({ 'file1.txt': 'hash1' }));
    const cache = createMetadataCache(cachePath, Verbosity.Quiet);

    expect(await cache.load()).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('should log and recover from an unreadable cache file', async () => {
    fs.mkdirSync(path.dirname(cachePath), { recursive: true });
    fs.writeFileSync(cachePath, '{ truncated');
    const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
    const cache = createMetadataCache(cachePath, Verbosity.Quiet);

    expect(await cache.load()).toBe(false);
    expect(stderr).toHaveBeenCalledTimes(1);
    expect(String(stderr.mock.calls[0][0])).toContain('Error loading metadata cache:');
  });
});
