// This module walks a directory tree depth-first in name order without following symlinks.

import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { basename, join } from 'node:path';
import type { EntryType } from '../types/domain.js';

export interface WalkEntry {
  path: string;
  name: string;
  depth: number;
  entryType: EntryType;
}

export interface WalkOptions {
  maxDepth?: number;
  includeHidden: boolean;
  // Returning false skips the entry and, for directories, everything below it.
  descend?: (entry: WalkEntry) => boolean;
}

export function isHiddenName(name: string): boolean {
  return name.startsWith('.') && name !== '.' && name !== '..';
}

export function entryTypeOf(entry: Pick<Dirent, 'isFile' | 'isDirectory' | 'isSymbolicLink'>): EntryType {
  if (entry.isSymbolicLink()) {
    return 'symlink';
  }
  if (entry.isDirectory()) {
    return 'directory';
  }
  if (entry.isFile()) {
    return 'file';
  }
  return 'other';
}

// The root itself is yielded first at depth 0 and is followed when it is a symlink.
export async function* walk(root: string, options: WalkOptions): AsyncGenerator<WalkEntry> {
  const rootInfo = await stat(root);
  const rootEntry: WalkEntry = { path: root, name: basename(root), depth: 0, entryType: entryTypeOf(rootInfo) };
  yield rootEntry;

  if (rootEntry.entryType !== 'directory') {
    return;
  }

  yield* walkChildren(root, 1, options);
}

async function* walkChildren(directory: string, depth: number, options: WalkOptions): AsyncGenerator<WalkEntry> {
  if (options.maxDepth !== undefined && depth > options.maxDepth) {
    return;
  }

  const children = await readdir(directory, { withFileTypes: true });
  // Code-unit order keeps listings identical across locales.
  children.sort((left, right) => (left.name < right.name ? -1 : left.name > right.name ? 1 : 0));

  for (const child of children) {
    if (!options.includeHidden && isHiddenName(child.name)) {
      continue;
    }

    const entry: WalkEntry = {
      path: join(directory, child.name),
      name: child.name,
      depth,
      entryType: entryTypeOf(child)
    };

    if (options.descend && !options.descend(entry)) {
      continue;
    }

    yield entry;

    if (entry.entryType === 'directory') {
      yield* walkChildren(entry.path, depth + 1, options);
    }
  }
}
