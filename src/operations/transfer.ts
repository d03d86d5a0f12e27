// This module copies and moves entries, fanning multiple sources into a destination directory.

import { cp, lstat, rename, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import { failedPathResult, settlePath } from '../mcp/results.js';
import type { PathResult } from '../types/domain.js';
import { DomainError, errnoCode } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';
import { resolveTargets, type ResolvedTarget } from './glob.js';

export type TransferRecord = PathResult<{ destination: string | null }>;

type TransferStep = (source: string, destination: string) => Promise<void>;

interface SourceGroup {
  rawPath: string;
  targets: ResolvedTarget[];
  failure?: unknown;
}

function noDestination(): { destination: string | null } {
  return { destination: null };
}

async function isExistingDirectory(target: string): Promise<boolean> {
  try {
    return (await stat(target)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return false;
    }
    throw error;
  }
}

// This function resolves every source first so the destination rule can see the total source count.
async function transfer(
  sources: readonly string[],
  rawDestination: string,
  step: TransferStep
): Promise<TransferRecord[]> {
  const destination = expandPath(rawDestination);
  const groups: SourceGroup[] = [];
  for (const rawPath of sources) {
    try {
      groups.push({ rawPath, targets: await resolveTargets(rawPath) });
    } catch (error) {
      groups.push({ rawPath, targets: [], failure: error });
    }
  }

  const sourceCount = groups.reduce((total, group) => total + Math.max(group.targets.length, 1), 0);
  const intoDirectory = await isExistingDirectory(destination);
  if (sourceCount > 1 && !intoDirectory) {
    throw new DomainError('Unsupported', 'multiple sources require an existing destination directory', rawDestination);
  }

  const records: TransferRecord[] = [];
  for (const group of groups) {
    if (group.failure !== undefined) {
      records.push(failedPathResult(group.rawPath, group.failure, noDestination()));
      continue;
    }

    if (group.targets.length === 0) {
      records.push(failedPathResult(group.rawPath, new DomainError('NotFound', undefined, group.rawPath), noDestination()));
      continue;
    }

    for (const { display, target } of group.targets) {
      const finalDestination = intoDirectory ? join(destination, basename(target)) : destination;
      records.push(
        await settlePath(
          display,
          async () => {
            await step(target, finalDestination);
            return { exists: true, payload: { destination: finalDestination } };
          },
          noDestination
        )
      );
    }
  }

  return records;
}

export async function copyPaths(sources: readonly string[], destination: string, recursive: boolean): Promise<TransferRecord[]> {
  return transfer(sources, destination, async (source, target) => {
    const info = await lstat(source);
    if (info.isDirectory() && !recursive) {
      throw new DomainError('Unsupported', 'source is a directory; set recursive to copy it', source);
    }
    await cp(source, target, { recursive, force: true, errorOnExist: false, verbatimSymlinks: true });
  });
}

// A rename across filesystems surfaces as CrossDevice instead of silently copying.
export async function movePaths(sources: readonly string[], destination: string): Promise<TransferRecord[]> {
  return transfer(sources, destination, async (source, target) => {
    await rename(source, target);
  });
}
