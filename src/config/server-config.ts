import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';
import { parse as parseToml } from 'smol-toml';
import type { ServerConfig } from '../interfaces/connector';
import type { SideSupport } from '../interfaces/mod-info';
import { ConfigError } from '../utils/errors';

export const CONFIG_FILE_NAME = 'servers.toml';
export const DEFAULT_FTP_PORT = 21;
export const DEFAULT_FTP_TIMEOUT_MS = 30_000;

const serverNameSchema = z
  .string()
  .regex(/^[A-Za-z0-9._-]+$/, 'server names may only use letters, digits, ".", "_" and "-"');

const localServerSchema = z.object({
  type: z.literal('local'),
  root: z.string().min(1),
  mods_dir: z.string().min(1).default('mods'),
});

const ftpServerSchema = z.object({
  type: z.literal('ftp'),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535).default(DEFAULT_FTP_PORT),
  username: z.string().default('anonymous'),
  password: z.string().optional(),
  password_env: z.string().min(1).optional(),
  remote_root: z.string().default(''),
  mods_dir: z.string().min(1).default('mods'),
  secure: z.boolean().default(false),
  timeout_ms: z.number().int().positive().default(DEFAULT_FTP_TIMEOUT_MS),
  atomic_writes: z.boolean().default(true),
});

const configFileSchema = z.object({
  sync: z
    .object({
      ignore: z.array(z.string()).default([]),
      sides: z.record(z.enum(['client-only', 'server-only', 'both'])).default({}),
    })
    .default({}),
  servers: z
    .record(z.discriminatedUnion('type', [localServerSchema, ftpServerSchema]))
    .default({}),
});

type LocalServerEntry = z.infer<typeof localServerSchema>;
type FtpServerEntry = z.infer<typeof ftpServerSchema>;

export interface ServerSummary {
  name: string;
  type: ServerConfig['connection']['type'];
  location: string;
}

export interface ServerRegistry {
  /** File the registry was loaded from; it may not exist */
  readonly path: string;
  /** Mod ids the comparator must leave alone */
  readonly ignore: readonly string[];
  /** Side declarations that replace what the archives say, by mod id */
  readonly sides: Readonly<Record<string, SideSupport>>;
  get(name: string): ServerConfig;
  list(): ServerSummary[];
}

export function defaultConfigPath(stateDir: string): string {
  return path.join(stateDir, CONFIG_FILE_NAME);
}

function expandHome(target: string): string {
  if (target === '~') {
    return os.homedir();
  }
  if (target.startsWith('~/')) {
    return path.join(os.homedir(), target.slice(2));
  }
  return target;
}

function toLocalConfig(
  name: string,
  entry: LocalServerEntry,
  baseDir: string,
): ServerConfig {
  return {
    name,
    connection: {
      type: 'local',
      root: path.resolve(baseDir, expandHome(entry.root)),
      modsDir: entry.mods_dir,
    },
  };
}

function toFtpConfig(
  name: string,
  entry: FtpServerEntry,
  env: NodeJS.ProcessEnv,
): ServerConfig | ConfigError {
  let password = entry.password;
  if (password === undefined && entry.password_env) {
    password = env[entry.password_env];
    if (password === undefined) {
      return new ConfigError(
        `Server "${name}" reads its password from ${entry.password_env}, which is not set`,
        `servers.${name}.password_env`,
      );
    }
  }

  return {
    name,
    connection: {
      type: 'ftp',
      host: entry.host,
      port: entry.port,
      username: entry.username,
      password: password ?? '',
      remoteRoot: entry.remote_root,
      modsDir: entry.mods_dir,
      secure: entry.secure,
      timeoutMs: entry.timeout_ms,
      atomicWrites: entry.atomic_writes,
    },
  };
}

function describeLocation(config: ServerConfig): string {
  const connection = config.connection;
  if (connection.type === 'local') {
    return path.join(connection.root, connection.modsDir);
  }
  const remote = [connection.remoteRoot, connection.modsDir]
    .filter((segment) => segment !== '')
    .join('/')
    .replace(/\/+/g, '/')
    .replace(/^\//, '');
  return `ftp://${connection.username}@${connection.host}:${connection.port}/${remote}`;
}

function parseConfigText(text: string, configPath: string): z.infer<typeof configFileSchema> {
  let document: unknown;
  try {
    document = parseToml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Invalid TOML in ${configPath}: ${reason}`);
  }

  const parsed = configFileSchema.safeParse(document);
  if (!parsed.success) {
    const [issue] = parsed.error.issues;
    const field = issue.path.join('.');
    throw new ConfigError(`Invalid configuration in ${configPath}: ${field}: ${issue.message}`, field);
  }

  for (const name of Object.keys(parsed.data.servers)) {
    const validName = serverNameSchema.safeParse(name);
    if (!validName.success) {
      throw new ConfigError(
        `Invalid server name "${name}" in ${configPath}: ${validName.error.issues[0].message}`,
        `servers.${name}`,
      );
    }
  }

  return parsed.data;
}

/**
 * Load the server registry from a TOML file. A missing file is an empty
 * registry. Relative local roots resolve against the file's directory.
 */
export function loadServerRegistry(
  configPath: string,
  env: NodeJS.ProcessEnv = process.env,
): ServerRegistry {
  const resolvedPath = path.resolve(configPath);
  if (!fs.existsSync(resolvedPath)) {
    return createServerRegistry(resolvedPath, new Map(), []);
  }

  const text = fs.readFileSync(resolvedPath, 'utf8');
  const data = parseConfigText(text, resolvedPath);
  const baseDir = path.dirname(resolvedPath);

  const servers = new Map<string, ServerConfig | ConfigError>();
  for (const [name, entry] of Object.entries(data.servers)) {
    servers.set(
      name,
      entry.type === 'local'
        ? toLocalConfig(name, entry, baseDir)
        : toFtpConfig(name, entry, env),
    );
  }

  return createServerRegistry(resolvedPath, servers, data.sync.ignore, data.sync.sides);
}

export function createServerRegistry(
  configPath: string,
  servers: ReadonlyMap<string, ServerConfig | ConfigError>,
  ignore: readonly string[],
  sides: Readonly<Record<string, SideSupport>> = {},
): ServerRegistry {
  const get = (name: string): ServerConfig => {
    const config = servers.get(name);
    if (!config) {
      const known = [...servers.keys()].sort();
      throw new ConfigError(
        known.length > 0
          ? `Unknown server "${name}". Known servers: ${known.join(', ')}`
          : `Unknown server "${name}". No servers are configured in ${configPath}`,
      );
    }
    if (config instanceof ConfigError) {
      throw config;
    }
    return config;
  };

  const list = (): ServerSummary[] =>
    [...servers.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([name, config]): ServerSummary => {
        if (config instanceof ConfigError) {
          return { name, type: 'ftp', location: `unavailable: ${config.message}` };
        }
        return {
          name,
          type: config.connection.type,
          location: describeLocation(config),
        };
      });

  return {
    path: configPath,
    ignore: [...ignore],
    sides: { ...sides },
    get,
    list,
  };
}
