// This module resolves a glob in the last path component against the directory that holds it.

import { readdir } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { minimatch } from 'minimatch';
import { errnoCode } from '../utils/errors.js';
import { expandPath, hasGlobMagic } from '../utils/paths.js';

export interface ResolvedTarget {
  // The path as it should be reported back: the caller's text, or the concrete match of a glob.
  display: string;
  target: string;
}

// This function returns the concrete targets for one user path; an unmatched glob yields an empty list.
export async function resolveTargets(rawPath: string): Promise<ResolvedTarget[]> {
  const expanded = expandPath(rawPath);
  const pattern = basename(expanded);
  if (!hasGlobMagic(pattern)) {
    return [{ display: rawPath, target: expanded }];
  }

  const directory = dirname(expanded);
  let names: string[];
  try {
    names = await readdir(directory);
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return names
    .filter((name) => minimatch(name, pattern, { dot: false }))
    .sort()
    .map((name) => ({ display: join(dirname(rawPath), name), target: join(directory, name) }));
}
