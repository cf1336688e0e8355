import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { loadServerRegistry, defaultConfigPath } from './server-config';
import { ConfigError } from '../utils/errors';

const SAMPLE_CONFIG = `
[sync]
ignore = ["journeymap"]

[sync.sides]
jei = "both"
spark = "server-only"

[servers.survival]
type = "ftp"
host = "ftp.example.test"
port = 2121
username = "mc"
password_env = "SURVIVAL_FTP_PASSWORD"
remote_root = "/minecraft"

[servers.client]
type = "local"
root = "instances/main"
mods_dir = "mods"
`;

function captureError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('loadServerRegistry', () => {
  let tempDir: string;
  let configPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'craftsync-config-test-'));
    configPath = path.join(tempDir, 'servers.toml');
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should return an empty registry when the file is missing', () => {
    const registry = loadServerRegistry(configPath, {});

    expect(registry.list()).toEqual([]);
    expect(registry.ignore).toEqual([]);
    expect(registry.sides).toEqual({});
    expect(captureError(() => registry.get('survival')).message).toBe(
      `Unknown server "survival". No servers are configured in ${configPath}`,
    );
  });

  it('should load local and ftp servers with defaults applied', () => {
    fs.writeFileSync(configPath, SAMPLE_CONFIG);

    const registry = loadServerRegistry(configPath, {
      SURVIVAL_FTP_PASSWORD: 'test-secret',
    });

    expect(registry.ignore).toEqual(['journeymap']);
    expect(registry.sides).toEqual({ jei: 'both', spark: 'server-only' });
    expect(registry.get('survival')).toEqual({
      name: 'survival',
      connection: {
        type: 'ftp',
        host: 'ftp.example.test',
        port: 2121,
        username: 'mc',
        password: 'test-secret',
        remoteRoot: '/minecraft',
        modsDir: 'mods',
        secure: false,
        timeoutMs: 30000,
        atomicWrites: true,
      },
    });
    expect(registry.get('client')).toEqual({
      name: 'client',
      connection: {
        type: 'local',
        root: path.join(tempDir, 'instances', 'main'),
        modsDir: 'mods',
      },
    });
  });

  it('should list servers sorted by name', () => {
    fs.writeFileSync(configPath, SAMPLE_CONFIG);

    const registry = loadServerRegistry(configPath, {
      SURVIVAL_FTP_PASSWORD: 'test-secret',
    });

    expect(registry.list()).toEqual([
      {
        name: 'client',
        type: 'local',
        location: path.join(tempDir, 'instances', 'main', 'mods'),
      },
      {
        name: 'survival',
        type: 'ftp',
        location: 'ftp://mc@ftp.example.test:2121/minecraft/mods',
      },
    ]);
  });

  it('should name the known servers when asked for an unknown one', () => {
    fs.writeFileSync(configPath, SAMPLE_CONFIG);
    const registry = loadServerRegistry(configPath, {
      SURVIVAL_FTP_PASSWORD: 'test-secret',
    });

    expect(captureError(() => registry.get('creative')).message).toBe(
      'Unknown server "creative". Known servers: client, survival',
    );
  });

  it('should fail only the server whose password variable is missing', () => {
    fs.writeFileSync(configPath, SAMPLE_CONFIG);

    const registry = loadServerRegistry(configPath, {});

    expect(registry.get('client').connection.type).toBe('local');
    const error = captureError(() => registry.get('survival'));
    expect(error.message).toBe(
      'Server "survival" reads its password from SURVIVAL_FTP_PASSWORD, which is not set',
    );
    expect(error.field).toBe('servers.survival.password_env');
  });

  it('should prefer an inline password over the environment', () => {
    fs.writeFileSync(
      configPath,
      '[servers.box]\ntype = "ftp"\nhost = "h.example.test"\npassword = "inline-secret"\npassword_env = "UNUSED"\n',
    );

    const registry = loadServerRegistry(configPath, { UNUSED: 'env-secret' });
    const connection = registry.get('box').connection;

    expect(connection.type === 'ftp' && connection.password).toBe('inline-secret');
    expect(connection.type === 'ftp' && connection.port).toBe(21);
  });

  it('should reject invalid TOML', () => {
    fs.writeFileSync(configPath, '[servers.survival\ntype = ');

    const error = captureError(() => loadServerRegistry(configPath, {}));

    expect(error.message.startsWith(`Invalid TOML in ${configPath}:`)).toBe(true);
  });

  it('should reject an unknown server type with the offending field', () => {
    fs.writeFileSync(configPath, '[servers.survival]\ntype = "sftp"\nhost = "h"\n');

    const error = captureError(() => loadServerRegistry(configPath, {}));

    expect(error.field).toBe('servers.survival.type');
  });

  it('should reject a port outside the valid range', () => {
    fs.writeFileSync(configPath, '[servers.survival]\ntype = "ftp"\nhost = "h"\nport = 70000\n');

    const error = captureError(() => loadServerRegistry(configPath, {}));

    expect(error.field).toBe('servers.survival.port');
  });

  it('should reject a side override it does not know', () => {
    fs.writeFileSync(configPath, '[sync.sides]\njei = "unknown"\n');

    const error = captureError(() => loadServerRegistry(configPath, {}));

    expect(error.field).toBe('sync.sides.jei');
  });

  it('should reject server names that are unsafe as lock names', () => {
    fs.writeFileSync(configPath, '[servers."my server"]\ntype = "local"\nroot = "/srv"\n');

    const error = captureError(() => loadServerRegistry(configPath, {}));

    expect(error.field).toBe('servers.my server');
  });
});

describe('defaultConfigPath', () => {
  it('should place servers.toml in the state directory', () => {
    expect(defaultConfigPath('/home/me/.craftsync')).toBe('/home/me/.craftsync/servers.toml');
  });
});
