// This module reads and changes file metadata: stat, permission bits, ownership and timestamps.

import type { Stats } from 'node:fs';
import { chmod, chown, lstat, mkdir, open, stat, utimes } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { EntryType } from '../types/domain.js';
import { DomainError, errnoCode } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';
import { entryTypeOf } from './walk.js';

export interface StatInfo {
  entry_type: EntryType;
  size: number;
  mode: string;
  modified: number | null;
  accessed: number | null;
  created: number | null;
  is_file: boolean;
  is_dir: boolean;
  is_symlink: boolean;
}

export interface OwnershipInfo {
  uid: number;
  gid: number;
}

// This helper renders permission bits the way chmod takes them, for example 0755.
export function formatMode(mode: number): string {
  return (mode & 0o7777).toString(8).padStart(4, '0');
}

export function parseMode(mode: string): number {
  if (!/^0?[0-7]{3,4}$/.test(mode)) {
    throw new DomainError('InvalidInput', `invalid octal mode ${mode}`);
  }
  return Number.parseInt(mode, 8);
}

function epochSeconds(milliseconds: number): number | null {
  return milliseconds > 0 ? Math.floor(milliseconds / 1000) : null;
}

function toStatInfo(info: Stats): StatInfo {
  return {
    entry_type: entryTypeOf(info),
    size: info.size,
    mode: formatMode(info.mode),
    modified: epochSeconds(info.mtimeMs),
    accessed: epochSeconds(info.atimeMs),
    created: epochSeconds(info.birthtimeMs),
    is_file: info.isFile(),
    is_dir: info.isDirectory(),
    is_symlink: info.isSymbolicLink()
  };
}

// Symlinks are described, not followed.
export async function statPath(rawPath: string): Promise<StatInfo> {
  return toStatInfo(await lstat(expandPath(rawPath)));
}

export async function getPermissions(rawPath: string): Promise<string> {
  const info = await stat(expandPath(rawPath));
  return formatMode(info.mode);
}

export async function setPermissions(rawPath: string, mode: string): Promise<string> {
  const target = expandPath(rawPath);
  await chmod(target, parseMode(mode));
  return formatMode((await stat(target)).mode);
}

// Only numeric ids are accepted; -1 leaves that half of the ownership unchanged.
export async function changeOwnership(rawPath: string, uid?: number, gid?: number): Promise<OwnershipInfo> {
  const target = expandPath(rawPath);
  await chown(target, uid ?? -1, gid ?? -1);
  const info = await stat(target);
  return { uid: info.uid, gid: info.gid };
}

// This function creates a missing file (and its parents) or bumps the timestamps of an existing one.
export async function touch(rawPath: string): Promise<boolean> {
  const target = expandPath(rawPath);
  const now = new Date();

  try {
    await utimes(target, now, now);
    return false;
  } catch (error) {
    if (errnoCode(error) !== 'ENOENT') {
      throw error;
    }
  }

  await mkdir(dirname(target), { recursive: true });
  const handle = await open(target, 'a');
  await handle.close();
  return true;
}
