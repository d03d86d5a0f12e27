// This module reads line windows from files and writes whole files atomically.

import { randomUUID } from 'node:crypto';
import { appendFile, mkdir, readFile, rename, rm, writeFile as writeFileContent } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import type { LineRecord } from '../types/domain.js';
import { DomainError } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';

export interface LineWindow {
  start_line?: number;
  end_line?: number;
  line_count?: number;
  start_offset?: number;
}

// This helper splits text into lines the way line-oriented tools do: no phantom line after a final newline.
export function splitLines(content: string): string[] {
  if (content.length === 0) {
    return [];
  }

  const lines = content.split('\n');
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

function invalidWindow(detail: string, rawPath: string): DomainError {
  return new DomainError('InvalidInput', detail, rawPath);
}

// start_line wins over start_offset (0-based); end_line wins over line_count; line numbers start at 1.
export async function readLines(rawPath: string, window: LineWindow): Promise<LineRecord[]> {
  const target = expandPath(rawPath);
  const lines = splitLines(await readFile(target, 'utf8'));

  let start = 0;
  if (window.start_line !== undefined) {
    if (window.start_line === 0) {
      throw invalidWindow('line numbers start at 1', rawPath);
    }
    start = window.start_line - 1;
  } else if (window.start_offset !== undefined) {
    start = window.start_offset;
  }

  let end = lines.length;
  if (window.end_line !== undefined) {
    if (window.end_line === 0) {
      throw invalidWindow('line numbers start at 1', rawPath);
    }
    if (window.end_line < (window.start_line ?? 1)) {
      throw invalidWindow('end_line must be >= start_line', rawPath);
    }
    end = window.end_line;
  } else if (window.line_count !== undefined) {
    end = start + window.line_count;
  }

  if (start > lines.length) {
    throw invalidWindow(`start_line ${start + 1} exceeds file length ${lines.length}`, rawPath);
  }

  end = Math.min(end, lines.length);
  return lines.slice(start, end).map((content, index) => ({ line_number: start + index + 1, content }));
}

export interface WriteOutcome {
  path: string;
  bytes_written: number;
  append: boolean;
}

// This function writes through a sibling temp file and a rename so readers never see a partial file.
export async function atomicWrite(target: string, content: string): Promise<void> {
  await mkdir(dirname(target), { recursive: true });
  const temporary = join(dirname(target), `.${basename(target)}.${randomUUID()}.tmp`);
  try {
    await writeFileContent(temporary, content, 'utf8');
    await rename(temporary, target);
  } catch (error) {
    await rm(temporary, { force: true });
    throw error;
  }
}

export async function writeFile(rawPath: string, content: string, append: boolean): Promise<WriteOutcome> {
  const target = expandPath(rawPath);
  if (append) {
    await mkdir(dirname(target), { recursive: true });
    await appendFile(target, content, 'utf8');
  } else {
    await atomicWrite(target, content);
  }

  return { path: rawPath, bytes_written: Buffer.byteLength(content, 'utf8'), append };
}
