// This module answers path questions: names, canonical forms, temp entries and the working directory.

import { mkdtemp, open, realpath } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { expandPath } from '../utils/paths.js';

const TEMP_PREFIX = 'fileio-';

// Trailing separators are ignored, matching the shell utilities of the same name.
export function getBasename(rawPath: string): string {
  return basename(expandPath(rawPath));
}

export function getDirname(rawPath: string): string {
  return dirname(expandPath(rawPath));
}

export async function getCanonicalPath(rawPath: string): Promise<string> {
  return realpath(expandPath(rawPath));
}

export type TemporaryKind = 'file' | 'dir';

// This function creates a uniquely named entry in the given directory, or the OS temp directory.
export async function createTemporary(kind: TemporaryKind, template?: string): Promise<string> {
  const parent = template ? expandPath(template) : tmpdir();
  if (kind === 'dir') {
    return mkdtemp(join(parent, TEMP_PREFIX));
  }

  const target = join(parent, `${TEMP_PREFIX}${randomUUID()}`);
  const handle = await open(target, 'wx', 0o600);
  await handle.close();
  return target;
}

export function getCurrentDirectory(): string {
  return process.cwd();
}
