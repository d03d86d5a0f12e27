// This module finds entries by name and text by pattern beneath a root directory.

import { readFile } from 'node:fs/promises';
import { TextDecoder } from 'node:util';
import { minimatch } from 'minimatch';
import { RE2JS } from 're2js';
import type { TextMatch } from '../types/domain.js';
import { expandPath } from '../utils/paths.js';
import { compilePattern, matchAll, type CompiledPattern } from './pattern.js';
import { splitLines } from './read-write.js';
import { walk, type WalkEntry } from './walk.js';

const strictUtf8 = new TextDecoder('utf-8', { fatal: true });

export type FileTypeFilter = 'file' | 'dir' | 'directory' | 'symlink';

export interface FindFilesOptions {
  root?: string;
  maxDepth?: number;
  fileType?: FileTypeFilter;
}

// Wildcard patterns must match the whole name; anything else is a substring test.
export function buildNameMatcher(pattern: string): (name: string) => boolean {
  if (pattern.includes('*') || pattern.includes('?')) {
    const source = Array.from(pattern)
      .map((char) => (char === '*' ? '.*' : char === '?' ? '.' : RE2JS.quote(char)))
      .join('');
    const compiled = RE2JS.compile(`^${source}$`, RE2JS.DOTALL);
    return (name) => compiled.matcher(name).find();
  }

  return (name) => name.includes(pattern);
}

function matchesFileType(entry: WalkEntry, fileType: FileTypeFilter | undefined): boolean {
  switch (fileType) {
    case undefined:
      return true;
    case 'file':
      return entry.entryType === 'file';
    case 'dir':
    case 'directory':
      return entry.entryType === 'directory';
    case 'symlink':
      return entry.entryType === 'symlink';
  }
}

// Hidden entries are included; the root counts as depth 0.
export async function findFiles(pattern: string, options: FindFilesOptions = {}): Promise<string[]> {
  const root = expandPath(options.root ?? '.');
  const matchesName = buildNameMatcher(pattern);
  const found: string[] = [];

  for await (const entry of walk(root, { maxDepth: options.maxDepth, includeHidden: true })) {
    if (matchesName(entry.name) && matchesFileType(entry, options.fileType)) {
      found.push(entry.path);
    }
  }

  return found;
}

export interface FindInFilesOptions {
  caseSensitive: boolean;
  useRegex: boolean;
  maxCount?: number;
  maxDepth?: number;
  includeHidden: boolean;
  fileGlob?: string;
  excludeGlob?: string;
  wholeWord: boolean;
  multiline: boolean;
}

// Returns null for files that are not text: invalid UTF-8 or containing NUL bytes.
function decodeText(bytes: Buffer): string | null {
  if (bytes.includes(0)) {
    return null;
  }

  try {
    return strictUtf8.decode(bytes);
  } catch {
    return null;
  }
}

function matchLines(filePath: string, content: string, pattern: CompiledPattern, maxCount: number | undefined): TextMatch[] {
  const matches: TextMatch[] = [];
  const lines = splitLines(content);

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? '';
    for (const match of matchAll(pattern, line)) {
      if (maxCount !== undefined && matches.length >= maxCount) {
        return matches;
      }

      matches.push({
        file_path: filePath,
        line_number: index + 1,
        column_start: match.start,
        column_end: match.end,
        matched_text: match.text
      });
    }
  }

  return matches;
}

// Columns are 0-based offsets into the line with an exclusive end.
export async function findInFiles(pattern: string, rawPath: string, options: FindInFilesOptions): Promise<TextMatch[]> {
  const root = expandPath(rawPath);
  const compiled = compilePattern(pattern, options);
  const { fileGlob, excludeGlob } = options;
  const results: TextMatch[] = [];

  const entries = walk(root, {
    maxDepth: options.maxDepth,
    includeHidden: options.includeHidden,
    descend: (entry) => !(excludeGlob && minimatch(entry.name, excludeGlob, { dot: true }))
  });

  for await (const entry of entries) {
    if (entry.entryType !== 'file') {
      continue;
    }
    if (entry.depth > 0 && fileGlob && !minimatch(entry.name, fileGlob, { dot: true })) {
      continue;
    }

    const content = decodeText(await readFile(entry.path));
    if (content === null) {
      continue;
    }

    results.push(...matchLines(entry.path, content, compiled, options.maxCount));
  }

  return results;
}
