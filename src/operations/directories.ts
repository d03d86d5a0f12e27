// This module creates, removes and lists directories.

import { lstat, mkdir, rm, rmdir, stat } from 'node:fs/promises';
import { relative } from 'node:path';
import type { DirectoryEntry } from '../types/domain.js';
import { DomainError, errnoCode } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';
import { walk } from './walk.js';

// An existing directory is not an error; the result says whether anything was created.
export async function makeDirectory(rawPath: string, recursive: boolean): Promise<boolean> {
  const target = expandPath(rawPath);

  try {
    const info = await stat(target);
    if (info.isDirectory()) {
      return false;
    }
    throw new DomainError('AlreadyExists', 'a non-directory entry exists at this path', rawPath);
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }

  await mkdir(target, { recursive });
  return true;
}

export async function removeDirectory(rawPath: string, recursive: boolean): Promise<void> {
  const target = expandPath(rawPath);
  const info = await lstat(target);
  if (!info.isDirectory()) {
    throw new DomainError('Unsupported', 'not a directory', rawPath);
  }

  if (recursive) {
    await rm(target, { recursive: true });
    return;
  }

  await rmdir(target);
}

export interface ListDirectoryOptions {
  recursive: boolean;
  includeHidden: boolean;
}

// A missing directory lists as empty; a path that is not a directory is rejected.
export async function listDirectory(rawPath: string, options: ListDirectoryOptions): Promise<DirectoryEntry[]> {
  const target = expandPath(rawPath);

  let isDirectory: boolean;
  try {
    isDirectory = (await stat(target)).isDirectory();
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  if (!isDirectory) {
    throw new DomainError('Unsupported', 'not a directory', rawPath);
  }

  const entries: DirectoryEntry[] = [];
  for await (const entry of walk(target, {
    maxDepth: options.recursive ? undefined : 1,
    includeHidden: options.includeHidden
  })) {
    if (entry.depth === 0) {
      continue;
    }

    const info = await lstat(entry.path);
    entries.push({
      name: options.recursive ? relative(target, entry.path) : entry.name,
      path: entry.path,
      entry_type: entry.entryType,
      ...(entry.entryType === 'file' ? { size: info.size } : {}),
      modified: info.mtimeMs > 0 ? Math.floor(info.mtimeMs / 1000) : null
    });
  }

  return entries;
}
