import path from 'node:path';
import * as logger from './utils/logger';
import {
  loadServerRegistry,
  defaultConfigPath,
  type ServerRegistry,
  type ServerSummary,
} from './config/server-config';
import { createConnector } from './core/connector/connector-factory';
import { createMetadataCache, type MetadataCache } from './core/scan/metadata-cache';
import { scanStructure, type ScanProgress } from './core/scan/structure-scanner';
import { comparePlan } from './core/compare/comparator';
import { runPlan } from './core/execute/plan-executor';
import { createProgressTracker } from './core/execute/progress-tracker';
import { formatPlan, formatReport, formatResult } from './core/execute/sync-summary';
import type { ModConnector } from './interfaces/connector';
import type { MinecraftStructure } from './interfaces/mod-info';
import type { ExecutionReport, SyncPlan } from './interfaces/sync-plan';
import { getStateDir } from './utils/state-dir';
import { acquireLock, releaseLock } from './utils/lock';

export const METADATA_CACHE_FILE = 'metadata-cache.json';

export interface SyncOptions {
  /** Execute the plan; without it the run only prints what would change */
  apply?: boolean;
  configPath?: string;
  quiet?: boolean;
  verbose?: boolean;
  signal?: AbortSignal;
}

export interface SyncDependencies {
  loadServerRegistry?: typeof loadServerRegistry;
  createConnector?: typeof createConnector;
  createMetadataCache?: typeof createMetadataCache;
  createProgressTracker?: typeof createProgressTracker;
  getStateDir?: typeof getStateDir;
  acquireLock?: typeof acquireLock;
  releaseLock?: typeof releaseLock;
}

export interface SyncOutcome {
  plan: SyncPlan;
  /** Present only when the plan was applied */
  report?: ExecutionReport;
}

interface Session {
  verbosity: number;
  stateDir: string;
  registry: ServerRegistry;
  cache: MetadataCache;
}

async function openSession(
  options: SyncOptions,
  dependencies: SyncDependencies,
): Promise<Session> {
  const resolveStateDir = dependencies.getStateDir ?? getStateDir;
  const loadRegistry = dependencies.loadServerRegistry ?? loadServerRegistry;
  const makeMetadataCache = dependencies.createMetadataCache ?? createMetadataCache;

  const verbosity = logger.verbosityFromFlags(options);
  const stateDir = resolveStateDir();
  const registry = loadRegistry(options.configPath ?? defaultConfigPath(stateDir));
  const cache = makeMetadataCache(path.join(stateDir, METADATA_CACHE_FILE), verbosity);
  await cache.load();

  return { verbosity, stateDir, registry, cache };
}

async function closeConnectors(
  connectors: readonly ModConnector[],
  verbosity: number,
): Promise<void> {
  const results = await Promise.allSettled(connectors.map((connector) => connector.close()));
  results.forEach((result, index) => {
    if (result.status === 'rejected') {
      const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
      logger.verbose(`Error closing ${connectors[index].location}: ${reason}`, verbosity);
    }
  });
}

/**
 * Scan both sides at once. Both scans settle before the first failure is
 * rethrown.
 */
async function scanBoth(
  client: ModConnector,
  server: ModConnector,
  session: Session,
  options: SyncOptions,
  dependencies: SyncDependencies,
): Promise<[MinecraftStructure, MinecraftStructure]> {
  const makeProgressTracker = dependencies.createProgressTracker ?? createProgressTracker;
  const progress = makeProgressTracker(session.verbosity);
  const seen = new Map<string, ScanProgress>();
  const track = (side: string) => (update: ScanProgress) => {
    seen.set(side, update);
    let completed = 0;
    let total = 0;
    for (const entry of seen.values()) {
      completed += entry.completed;
      total += entry.total;
    }
    progress.update(completed, total);
  };

  progress.start('Scanning', 0);
  const settled = await Promise.allSettled([
    scanStructure(client, {
      signal: options.signal,
      cache: session.cache,
      verbosity: session.verbosity,
      onProgress: track('client'),
    }),
    scanStructure(server, {
      signal: options.signal,
      cache: session.cache,
      verbosity: session.verbosity,
      onProgress: track('server'),
    }),
  ]);
  progress.finish();

  const [clientResult, serverResult] = settled;
  if (clientResult.status === 'rejected') {
    throw clientResult.reason;
  }
  if (serverResult.status === 'rejected') {
    throw serverResult.reason;
  }
  return [clientResult.value, serverResult.value];
}

function reportScanIssues(structure: MinecraftStructure, label: string, verbosity: number): void {
  if (structure.errors.length > 0) {
    logger.warning(
      `${structure.errors.length} archives on the ${label} could not be read and were ignored`,
      verbosity,
    );
  }
}

export interface ServerListing {
  configPath: string;
  servers: ServerSummary[];
}

export function listServers(
  options: Pick<SyncOptions, 'configPath'> = {},
  dependencies: Pick<SyncDependencies, 'getStateDir' | 'loadServerRegistry'> = {},
): ServerListing {
  const resolveStateDir = dependencies.getStateDir ?? getStateDir;
  const loadRegistry = dependencies.loadServerRegistry ?? loadServerRegistry;
  const registry = loadRegistry(options.configPath ?? defaultConfigPath(resolveStateDir()));
  return { configPath: registry.path, servers: registry.list() };
}

/**
 * Scan one configured instance.
 */
export async function scanServer(
  name: string,
  options: SyncOptions = {},
  dependencies: SyncDependencies = {},
): Promise<MinecraftStructure> {
  const makeConnector = dependencies.createConnector ?? createConnector;
  const session = await openSession(options, dependencies);
  const connector = makeConnector(session.registry.get(name), session.verbosity);

  try {
    logger.info(`Scanning ${name} (${connector.location})...`, session.verbosity);
    return await scanStructure(connector, {
      signal: options.signal,
      cache: session.cache,
      verbosity: session.verbosity,
    });
  } finally {
    await session.cache.save();
    await closeConnectors([connector], session.verbosity);
  }
}

/**
 * Build the plan that would bring `serverName` in line with `clientName`,
 * without touching either side.
 */
export async function compareServers(
  clientName: string,
  serverName: string,
  options: SyncOptions = {},
  dependencies: SyncDependencies = {},
): Promise<SyncPlan> {
  const makeConnector = dependencies.createConnector ?? createConnector;
  const session = await openSession(options, dependencies);
  const client = makeConnector(session.registry.get(clientName), session.verbosity);
  const server = makeConnector(session.registry.get(serverName), session.verbosity);

  try {
    const [clientStructure, serverStructure] = await scanBoth(
      client,
      server,
      session,
      options,
      dependencies,
    );
    reportScanIssues(clientStructure, 'client', session.verbosity);
    reportScanIssues(serverStructure, 'server', session.verbosity);
    return comparePlan(clientStructure, serverStructure, {
      ignore: session.registry.ignore,
      sides: session.registry.sides,
    });
  } finally {
    await session.cache.save();
    await closeConnectors([client, server], session.verbosity);
  }
}

export async function syncServers(
  clientName: string,
  serverName: string,
  options: SyncOptions = {},
  dependencies: SyncDependencies = {},
): Promise<SyncOutcome> {
  const lock = dependencies.acquireLock ?? acquireLock;
  const unlock = dependencies.releaseLock ?? releaseLock;
  const makeConnector = dependencies.createConnector ?? createConnector;
  const makeProgressTracker = dependencies.createProgressTracker ?? createProgressTracker;

  const session = await openSession(options, dependencies);
  const verbosity = session.verbosity;
  const clientConfig = session.registry.get(clientName);
  const serverConfig = session.registry.get(serverName);
  if (clientName === serverName) {
    throw new Error(`Client and server are the same instance: ${clientName}`);
  }

  const client = makeConnector(clientConfig, verbosity);
  const server = makeConnector(serverConfig, verbosity);
  let lockPath: string | undefined;

  try {
    if (options.apply) {
      lockPath = lock(serverName, session.stateDir);
    }
    logger.info(
      `Comparing ${clientName} (${client.location}) with ${serverName} (${server.location})...`,
      verbosity,
    );
    const [clientStructure, serverStructure] = await scanBoth(
      client,
      server,
      session,
      options,
      dependencies,
    );
    reportScanIssues(clientStructure, 'client', verbosity);
    reportScanIssues(serverStructure, 'server', verbosity);
    await session.cache.save();

    const plan = comparePlan(clientStructure, serverStructure, {
      ignore: session.registry.ignore,
      sides: session.registry.sides,
    });
    for (const line of formatPlan(plan)) {
      logger.always(line);
    }

    if (!options.apply) {
      if (plan.actions.some((action) => action.type !== 'skip')) {
        logger.info('Dry run: re-run with --apply to make these changes.', verbosity);
      }
      return { plan };
    }

    const progress = makeProgressTracker(verbosity);
    progress.start('Syncing', plan.actions.length);
    const report = await runPlan(plan, server, client, {
      signal: options.signal,
      verbosity,
      onResult: (result) => {
        switch (result.status) {
          case 'succeeded':
            progress.recordSuccess();
            break;
          case 'failed':
            progress.recordFailure();
            break;
          default:
            progress.recordSkip();
        }
      },
    });
    progress.finish();

    for (const result of report.results) {
      if (result.status === 'failed') {
        logger.always(formatResult(result));
      } else {
        logger.verbose(formatResult(result), verbosity);
      }
    }
    for (const line of formatReport(report)) {
      logger.always(line);
    }

    return { plan, report };
  } finally {
    await closeConnectors([client, server], verbosity);
    if (lockPath) {
      unlock(lockPath);
    }
  }
}
