import os from 'node:os';
import path from 'node:path';
import fs from 'node:fs';

export const STATE_DIR_ENV = 'CRAFTSYNC_HOME';

export function getStateDir(env: NodeJS.ProcessEnv = process.env): string {
  const dir = env[STATE_DIR_ENV] || path.join(os.homedir(), '.craftsync');
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
  const stats = fs.statSync(dir);
  if (!stats.isDirectory()) {
    throw new Error(`State path is not a directory: ${dir}`);
  }
  fs.chmodSync(dir, 0o700);
  return dir;
}
