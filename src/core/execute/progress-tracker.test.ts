/**
 * Tests for createProgressTracker factory function
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import chalk from 'chalk';
import { createProgressTracker, renderBar, type ProgressStream } from './progress-tracker';
import { Verbosity } from '../../interfaces/logger';

function createStream(isTTY: boolean): ProgressStream & { output: string[] } {
  const output: string[] = [];
  return {
    isTTY,
    output,
    write: (chunk: string) => {
      output.push(chunk);
      return true;
    },
  };
}

describe('renderBar', () => {
  let originalLevel: typeof chalk.level;

  beforeEach(() => {
    originalLevel = chalk.level;
    chalk.level = 0;
  });

  afterEach(() => {
    chalk.level = originalLevel;
  });

  it('should render an empty bar for nothing processed', () => {
    expect(renderBar('Scan', 0, 4)).toBe(`Scan [${'░'.repeat(40)}] 0% | 0/4`);
  });

  it('should render a half-filled bar with failures', () => {
    expect(renderBar('Sync', 2, 4, 1)).toBe(
      `Sync [${'█'.repeat(20)}${'░'.repeat(20)}] 50% | 2/4 | 1 failed`,
    );
  });

  it('should treat an empty total as zero percent', () => {
    expect(renderBar('Scan', 0, 0)).toBe(`Scan [${'░'.repeat(40)}] 0% | 0/0`);
  });
});

describe('createProgressTracker', () => {
  it('should advance for skips without counting them as failures', () => {
    const stream = createStream(true);
    const tracker = createProgressTracker(Verbosity.Normal, stream);
    tracker.start('Sync', 4);

    tracker.recordSuccess();
    tracker.recordSkip();
    tracker.recordFailure();

    expect(stream.output.slice(-3)).toEqual([
      '\r' + renderBar('Sync', 1, 4) + '\x1B[K',
      '\r' + renderBar('Sync', 2, 4) + '\x1B[K',
      '\r' + renderBar('Sync', 3, 4, 1) + '\x1B[K',
    ]);
  });

  it('should clear the previous bar when a new stage starts', () => {
    const stream = createStream(true);
    const tracker = createProgressTracker(Verbosity.Normal, stream);

    tracker.start('Scan', 2);
    tracker.start('Sync', 1);

    expect(stream.output).toEqual([
      '\r' + renderBar('Scan', 0, 2) + '\x1B[K',
      '\r\x1B[K',
      '\r' + renderBar('Sync', 0, 1) + '\x1B[K',
    ]);
  });

  it('should stay silent when the stream is not a terminal', () => {
    const stream = createStream(false);
    const tracker = createProgressTracker(Verbosity.Normal, stream);

    tracker.start('Scan', 2);
    tracker.recordSuccess();
    tracker.finish();

    expect(stream.output).toEqual([]);
  });

  it('should stay silent in quiet mode', () => {
    const stream = createStream(true);
    const tracker = createProgressTracker(Verbosity.Quiet, stream);

    tracker.start('Scan', 2);
    tracker.recordSuccess();

    expect(stream.output).toEqual([]);
  });

  it('should redraw the bar in place on a terminal and end with a newline', () => {
    const stream = createStream(true);
    const tracker = createProgressTracker(Verbosity.Normal, stream);

    tracker.start('Scan', 1);
    tracker.recordSuccess();
    tracker.finish();

    expect(stream.output).toHaveLength(3);
    expect(stream.output[0].startsWith('\rScan [')).toBe(true);
    expect(stream.output[1]).toBe('\r' + renderBar('Scan', 1, 1) + '\x1B[K');
    expect(stream.output[2]).toBe('\n');
  });
});
