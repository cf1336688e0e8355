import fs from 'node:fs';
import path from 'node:path';
import { getStateDir } from './state-dir';
import * as logger from './logger';

const activeLocks = new Set<string>();
let cleanupRegistered = false;

function removeOwnLock(lockPath: string): void {
  try {
    if (!fs.existsSync(lockPath)) {
      return;
    }

    const content = fs.readFileSync(lockPath, 'utf8').trim();
    const pid = Number.parseInt(content, 10);
    if (!Number.isNaN(pid) && pid !== process.pid) {
      return;
    }

    fs.unlinkSync(lockPath);
  } catch (error) {
    // Leftover locks are taken over as stale on the next run
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Could not remove lock ${lockPath}: ${errorMessage}`);
  } finally {
    activeLocks.delete(lockPath);
  }
}

function cleanupAllLocks(): void {
  for (const lockPath of [...activeLocks]) {
    removeOwnLock(lockPath);
  }
}

function registerCleanupHandler(): void {
  if (cleanupRegistered) {
    return;
  }
  process.once('exit', cleanupAllLocks);
  cleanupRegistered = true;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    return (e as NodeJS.ErrnoException).code === 'EPERM';
  }
}

function tryCreateLockFile(lockPath: string): boolean {
  try {
    const fd = fs.openSync(lockPath, 'wx', 0o600);
    try {
      fs.writeFileSync(fd, String(process.pid));
    } finally {
      fs.closeSync(fd);
    }
    return true;
  } catch (e) {
    const errorCode = (e as NodeJS.ErrnoException).code;
    if (errorCode === 'EEXIST') {
      return false;
    }
    throw e;
  }
}

function readLockOwner(lockPath: string): number | null | 'gone' {
  try {
    const content = fs.readFileSync(lockPath, 'utf8').trim();
    const parsedPid = Number.parseInt(content, 10);
    return Number.isNaN(parsedPid) ? null : parsedPid;
  } catch (e) {
    if ((e as NodeJS.ErrnoException).code === 'ENOENT') {
      return 'gone';
    }
    throw e;
  }
}

export function lockPathFor(name: string, stateDir: string): string {
  const safeName = name.replace(/[^A-Za-z0-9._-]/g, '_');
  return path.join(stateDir, `${safeName}.lock`);
}

/**
 * Take the per-server lock that keeps two executions from writing to the
 * same mod directory. Stale locks left by dead processes are replaced.
 */
export function acquireLock(
  name: string,
  stateDir: string = getStateDir(),
): string {
  registerCleanupHandler();

  const lockPath = lockPathFor(name, stateDir);
  if (activeLocks.has(lockPath)) {
    return lockPath;
  }

  for (let attempts = 0; attempts < 3; attempts++) {
    if (tryCreateLockFile(lockPath)) {
      activeLocks.add(lockPath);
      return lockPath;
    }

    const owner = readLockOwner(lockPath);
    if (owner === 'gone') {
      continue;
    }

    if (owner === process.pid) {
      activeLocks.add(lockPath);
      return lockPath;
    }

    if (owner !== null && isProcessAlive(owner)) {
      throw new Error(
        `Another sync is already running against "${name}" (PID: ${owner}). ` +
          `Delete ${lockPath} if the process is no longer running.`,
      );
    }

    try {
      fs.unlinkSync(lockPath);
    } catch (e) {
      if ((e as NodeJS.ErrnoException).code !== 'ENOENT') {
        throw e;
      }
    }
  }

  if (tryCreateLockFile(lockPath)) {
    activeLocks.add(lockPath);
    return lockPath;
  }

  throw new Error(
    `Failed to acquire lock at ${lockPath}. Please retry the sync command.`,
  );
}

export function releaseLock(lockPath: string): void {
  removeOwnLock(lockPath);
}
