/**
 * ProgressTracker
 * Draws a single-line progress bar for scans and plan execution
 */

import chalk from 'chalk';
import * as logger from '../../utils/logger';

const BAR_WIDTH = 40;

export interface ProgressStream {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

/**
 * Render the progress bar string (pure computation, no I/O)
 */
export function renderBar(
  label: string,
  processed: number,
  total: number,
  failed: number = 0,
): string {
  const percentage = total > 0 ? Math.floor((processed / total) * 100) : 0;
  const completeWidth = Math.floor((percentage / 100) * BAR_WIDTH);
  const bar = '█'.repeat(completeWidth) + '░'.repeat(BAR_WIDTH - completeWidth);
  const failures = failed > 0 ? chalk.red(` | ${failed} failed`) : '';
  return `${label} [${bar}] ${percentage}% | ${processed}/${total}${failures}`;
}

export function createProgressTracker(
  verbosity: number = logger.Verbosity.Normal,
  stream: ProgressStream = process.stdout,
) {
  let label = '';
  let total = 0;
  let completed = 0;
  let skipped = 0;
  let failed = 0;
  let hasDrawnBar = false;

  // Bar is redrawn on interactive terminals only
  const enabled = (): boolean =>
    verbosity >= logger.Verbosity.Normal && stream.isTTY === true;

  const draw = (): void => {
    if (!enabled()) {
      return;
    }
    stream.write('\r' + renderBar(label, completed + skipped + failed, total, failed) + '\x1B[K');
    hasDrawnBar = true;
  };

  const clear = (): void => {
    if (hasDrawnBar) {
      stream.write('\r\x1B[K');
      hasDrawnBar = false;
    }
  };

  const start = (stageLabel: string, totalItems: number): void => {
    clear();
    label = stageLabel;
    total = totalItems;
    completed = 0;
    skipped = 0;
    failed = 0;
    draw();
  };

  const update = (processed: number, totalItems: number = total): void => {
    total = totalItems;
    completed = Math.max(0, processed - skipped - failed);
    draw();
  };

  const recordSuccess = (): void => {
    completed++;
    draw();
  };

  /** Advance the bar for an item that neither succeeded nor failed */
  const recordSkip = (): void => {
    skipped++;
    draw();
  };

  const recordFailure = (): void => {
    failed++;
    draw();
  };

  const finish = (): void => {
    if (hasDrawnBar) {
      stream.write('\n');
      hasDrawnBar = false;
    }
  };

  return {
    start,
    update,
    recordSuccess,
    recordSkip,
    recordFailure,
    finish,
  };
}

export type ProgressTracker = ReturnType<typeof createProgressTracker>;
