// This module creates and reads hard and symbolic links.

import { link, readlink, symlink } from 'node:fs/promises';
import { expandPath } from '../utils/paths.js';

export type LinkKind = 'hard' | 'symbolic';

export interface LinkOutcome {
  target: string;
  link_path: string;
  kind: LinkKind;
}

export async function createHardLink(target: string, linkPath: string): Promise<LinkOutcome> {
  await link(expandPath(target), expandPath(linkPath));
  return { target, link_path: linkPath, kind: 'hard' };
}

// The target is stored as given after expansion, so relative targets stay relative to the link.
export async function createSymbolicLink(target: string, linkPath: string): Promise<LinkOutcome> {
  await symlink(expandPath(target), expandPath(linkPath));
  return { target, link_path: linkPath, kind: 'symbolic' };
}

export async function readSymbolicLink(rawPath: string): Promise<string> {
  return readlink(expandPath(rawPath));
}
