// This module expands user-supplied paths before they reach the filesystem.

import { homedir } from 'node:os';
import { DomainError } from './errors.js';

const VARIABLE_PATTERN = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}|\$([A-Za-z_][A-Za-z0-9_]*)/g;

// This helper resolves a leading tilde and $VAR / ${VAR} references; unset variables are rejected.
export function expandPath(input: string, env: NodeJS.ProcessEnv = process.env): string {
  if (input.length === 0) {
    throw new DomainError('InvalidInput', 'path must not be empty', input);
  }

  let expanded = input;
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = `${homedir()}${expanded.slice(1)}`;
  }

  return expanded.replace(VARIABLE_PATTERN, (_match: string, braced: string | undefined, bare: string | undefined) => {
    const name = braced ?? bare ?? '';
    const value = env[name];
    if (value === undefined) {
      throw new DomainError('InvalidInput', `environment variable ${name} is not set`, input);
    }
    return value;
  });
}

// This helper reports whether the final path component carries glob syntax.
export function hasGlobMagic(component: string): boolean {
  return /[*?[]/.test(component);
}
