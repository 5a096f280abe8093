/**
 * @fileoverview Temporary config directories for loader tests
 */

import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';

export async function createConfigDir(prefix = 'kgo-config-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

/**
 * Write `lines` joined with newlines; returns the absolute file path.
 */
export async function writeConfigFile(dir: string, name: string, lines: string[]): Promise<string> {
  const file = path.join(dir, name);
  await fs.writeFile(file, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf8');
  return file;
}

export async function removeConfigDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}
