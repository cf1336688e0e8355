import type { ModConnector } from '../../interfaces/connector';
import type {
  AbortInfo,
  ActionResult,
  ExecutionCounts,
  ExecutionReport,
  SyncAction,
  SyncPlan,
} from '../../interfaces/sync-plan';
import { ConnectorError } from '../../utils/errors';
import * as logger from '../../utils/logger';

export interface ExecuteOptions {
  signal?: AbortSignal;
  verbosity?: number;
}

async function applyAction(
  action: Exclude<SyncAction, { type: 'skip' }>,
  server: ModConnector,
  client: ModConnector,
): Promise<void> {
  switch (action.type) {
    case 'upload': {
      const bytes = await client.read(action.source.filename);
      await server.write(action.source.filename, bytes);
      return;
    }
    case 'remove':
      await server.delete(action.target.filename);
      return;
    case 'replace': {
      const bytes = await client.read(action.source.filename);
      await server.write(action.source.filename, bytes);
      if (action.target.filename !== action.source.filename) {
        await server.delete(action.target.filename);
      }
      return;
    }
  }
}

export function describeAction(action: SyncAction): string {
  switch (action.type) {
    case 'upload':
      return `upload ${action.modId} (${action.source.filename})`;
    case 'remove':
      return `remove ${action.modId} (${action.target.filename})`;
    case 'replace':
      return `replace ${action.modId} ${action.fromVersion} → ${action.toVersion}`;
    case 'skip':
      return `skip ${action.modId} (${action.reason})`;
  }
}

export function countResults(results: readonly ActionResult[]): ExecutionCounts {
  const counts: ExecutionCounts = {
    succeeded: 0,
    failed: 0,
    skipped: 0,
    notAttempted: 0,
  };
  for (const result of results) {
    switch (result.status) {
      case 'succeeded':
        counts.succeeded++;
        break;
      case 'failed':
        counts.failed++;
        break;
      case 'skipped':
        counts.skipped++;
        break;
      case 'not-attempted':
        counts.notAttempted++;
        break;
    }
  }
  return counts;
}

/**
 * Apply a plan to the server one action at a time, in plan order, yielding
 * each result as it settles. The generator's return value is the report.
 *
 * A per-file failure only fails its own action. A connection-level failure
 * fails its action and leaves every later action not attempted. Cancellation
 * is honoured between actions, never in the middle of one.
 */
export async function* executePlan(
  plan: SyncPlan,
  server: ModConnector,
  client: ModConnector,
  options: ExecuteOptions = {},
): AsyncGenerator<ActionResult, ExecutionReport, undefined> {
  const verbosity = options.verbosity ?? logger.Verbosity.Normal;
  const results: ActionResult[] = [];
  let aborted: AbortInfo | undefined;

  for (const action of plan.actions) {
    if (!aborted && options.signal?.aborted) {
      aborted = { reason: 'cancelled' };
      logger.warning('Sync cancelled; remaining actions were not attempted', verbosity);
    }

    let result: ActionResult;
    if (aborted) {
      result = { action, status: 'not-attempted' };
    } else if (action.type === 'skip') {
      result = { action, status: 'skipped' };
    } else {
      try {
        await applyAction(action, server, client);
        result = { action, status: 'succeeded' };
        logger.verbose(`Done: ${describeAction(action)}`, verbosity);
      } catch (error) {
        const connectorError =
          error instanceof ConnectorError
            ? error
            : new ConnectorError(
                'io-error',
                action.type,
                error instanceof Error ? error.message : String(error),
              );
        result = {
          action,
          status: 'failed',
          error: { kind: connectorError.kind, message: connectorError.message },
        };
        logger.warning(
          `Failed to ${describeAction(action)}: ${connectorError.message}`,
          verbosity,
        );
        if (connectorError.connectionLevel) {
          aborted = {
            reason: 'connection',
            kind: connectorError.kind,
            message: connectorError.message,
          };
        }
      }
    }

    results.push(result);
    yield result;
  }

  const report: ExecutionReport = { results, counts: countResults(results) };
  if (aborted) {
    report.aborted = aborted;
  }
  return report;
}

/**
 * Drain executePlan, optionally observing each result, and return the report.
 */
export async function runPlan(
  plan: SyncPlan,
  server: ModConnector,
  client: ModConnector,
  options: ExecuteOptions & { onResult?: (result: ActionResult) => void } = {},
): Promise<ExecutionReport> {
  const execution = executePlan(plan, server, client, options);
  while (true) {
    const next = await execution.next();
    if (next.done) {
      return next.value;
    }
    options.onResult?.(next.value);
  }
}
