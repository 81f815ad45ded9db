/**
 * @fileoverview Filesystem helpers used by the stages
 */

import type { Stats } from 'node:fs';
import * as fs from 'node:fs/promises';

export async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * True when `target` is missing or an empty directory.
 * A regular file at `target` counts as non-empty.
 */
export async function isEmptyOrMissing(target: string): Promise<boolean> {
  let stats: Stats;
  try {
    stats = await fs.stat(target);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return true;
    throw error;
  }
  if (!stats.isDirectory()) return false;
  const entries = await fs.readdir(target);
  return entries.length === 0;
}

export async function readFileIfExists(target: string): Promise<string | null> {
  try {
    return await fs.readFile(target, 'utf8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
