import chalk from 'chalk';
import type {
  ActionResult,
  ExecutionReport,
  SyncAction,
  SyncPlan,
} from '../../interfaces/sync-plan';
import type { MinecraftStructure } from '../../interfaces/mod-info';
import { describeAction } from './plan-executor';

function actionMarker(type: SyncAction['type']): string {
  switch (type) {
    case 'upload':
      return chalk.green('+');
    case 'remove':
      return chalk.red('-');
    case 'replace':
      return chalk.yellow('~');
    case 'skip':
      return chalk.dim('=');
  }
}

export function formatAction(action: SyncAction): string {
  return `  ${actionMarker(action.type)} ${describeAction(action)}`;
}

export function formatPlan(plan: SyncPlan): string[] {
  if (plan.actions.length === 0 && plan.conflicts.length === 0) {
    return [chalk.green('Server is already in sync with the client.')];
  }

  const lines = plan.actions.map(formatAction);
  for (const modId of plan.conflicts) {
    lines.push(`  ${chalk.red('!')} ${modId} has conflicting archives and was left out`);
  }

  const { uploads, removals, replacements, skips } = plan.summary;
  lines.push(
    chalk.bold(
      `Plan: ${uploads} to upload, ${replacements} to replace, ${removals} to remove, ${skips} skipped`,
    ),
  );
  return lines;
}

export function formatResult(result: ActionResult): string {
  const description = describeAction(result.action);
  switch (result.status) {
    case 'succeeded':
      return `  ${chalk.green('✓')} ${description}`;
    case 'skipped':
      return `  ${chalk.dim('-')} ${description}`;
    case 'not-attempted':
      return `  ${chalk.dim('·')} ${description} (not attempted)`;
    case 'failed': {
      const reason = result.error
        ? `${result.error.kind}: ${result.error.message}`
        : 'failed';
      return `  ${chalk.red('✗')} ${description} (${reason})`;
    }
  }
}

export function formatReport(report: ExecutionReport): string[] {
  const { succeeded, failed, skipped, notAttempted } = report.counts;
  const line = `${succeeded} succeeded, ${failed} failed, ${skipped} skipped, ${notAttempted} not attempted`;
  const lines: string[] = [];

  if (report.aborted?.reason === 'connection') {
    lines.push(
      chalk.red(`Sync aborted: ${report.aborted.kind} (${report.aborted.message})`),
    );
  } else if (report.aborted?.reason === 'cancelled') {
    lines.push(chalk.yellow('Sync cancelled.'));
  }

  lines.push(
    failed === 0 && !report.aborted
      ? chalk.green(`Sync completed: ${line}.`)
      : chalk.yellow(`Sync completed with issues: ${line}.`),
  );
  return lines;
}

export function formatStructure(structure: MinecraftStructure): string[] {
  const mods = [...structure.mods.values()].sort((a, b) =>
    a.modId < b.modId ? -1 : a.modId > b.modId ? 1 : 0,
  );
  const lines = mods.map(
    (mod) =>
      `  ${mod.modId} ${chalk.dim(mod.version)} ${mod.sideSupport} ${chalk.dim(`${mod.filename}, ${mod.format}`)}`,
  );
  for (const conflict of structure.conflicts) {
    lines.push(
      chalk.red(`  ! ${conflict.modId}: conflicting archives ${conflict.filenames.join(', ')}`),
    );
  }
  for (const error of structure.errors) {
    lines.push(chalk.yellow(`  ? ${error.filename}: ${error.kind} ${error.message}`));
  }
  lines.push(
    chalk.bold(
      `${structure.mods.size} mods, ${structure.conflicts.length} conflicts, ${structure.errors.length} unreadable`,
    ),
  );
  return lines;
}
