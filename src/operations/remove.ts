// This module removes files and directories, expanding a glob in the last path component.

import { lstat, rm, rmdir, unlink } from 'node:fs/promises';
import { failedPathResult, settlePath } from '../mcp/results.js';
import type { PathResult } from '../types/domain.js';
import { DomainError, errnoCode } from '../utils/errors.js';
import { resolveTargets, type ResolvedTarget } from './glob.js';

export interface RemoveOptions {
  recursive: boolean;
  force: boolean;
}

export type RemovalRecord = PathResult<{ removed: boolean }>;

function notRemoved(): { removed: boolean } {
  return { removed: false };
}

async function removeTarget(target: string, options: RemoveOptions): Promise<{ exists: boolean; payload: { removed: boolean } }> {
  try {
    const info = await lstat(target);
    if (info.isDirectory()) {
      if (options.recursive) {
        await rm(target, { recursive: true });
      } else {
        // Only an empty directory can go without recursive; otherwise the OS reports NotEmpty.
        await rmdir(target);
      }
    } else {
      await unlink(target);
    }
  } catch (error) {
    if (options.force && errnoCode(error) === 'ENOENT') {
      return { exists: false, payload: notRemoved() };
    }
    throw error;
  }

  return { exists: true, payload: { removed: true } };
}

async function removeOne(rawPath: string, options: RemoveOptions): Promise<RemovalRecord[]> {
  let targets: ResolvedTarget[];
  try {
    targets = await resolveTargets(rawPath);
  } catch (error) {
    return [failedPathResult(rawPath, error, notRemoved())];
  }

  if (targets.length === 0) {
    if (options.force) {
      return [{ path: rawPath, status: 'ok', exists: false, removed: false }];
    }
    return [failedPathResult(rawPath, new DomainError('NotFound', undefined, rawPath), notRemoved())];
  }

  const records: RemovalRecord[] = [];
  for (const { display, target } of targets) {
    records.push(await settlePath(display, () => removeTarget(target, options), notRemoved));
  }
  return records;
}

// With force, missing paths and empty globs are reported as ok so repeated calls converge.
export async function removePaths(paths: readonly string[], options: RemoveOptions): Promise<RemovalRecord[]> {
  const records: RemovalRecord[] = [];
  for (const rawPath of paths) {
    records.push(...(await removeOne(rawPath, options)));
  }
  return records;
}
