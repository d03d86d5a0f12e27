// This module counts lines and words of regular files.

import { open, readFile, stat } from 'node:fs/promises';
import { DomainError } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';

const READ_CHUNK_BYTES = 64 * 1024;
const LF = 0x0a;

async function requireRegularFile(rawPath: string): Promise<string> {
  const target = expandPath(rawPath);
  const info = await stat(target);
  if (info.isDirectory()) {
    throw new DomainError('Unsupported', 'is a directory', rawPath);
  }
  return target;
}

// A final line without a trailing newline still counts; an empty file has zero lines.
export async function countLines(rawPath: string): Promise<number> {
  const target = await requireRegularFile(rawPath);
  const handle = await open(target, 'r');
  const buffer = Buffer.alloc(READ_CHUNK_BYTES);
  let newlines = 0;
  let totalBytes = 0;
  let lastByte = LF;

  try {
    for (;;) {
      const { bytesRead } = await handle.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) {
        break;
      }

      for (let index = 0; index < bytesRead; index += 1) {
        if (buffer[index] === LF) {
          newlines += 1;
        }
      }
      totalBytes += bytesRead;
      lastByte = buffer[bytesRead - 1] ?? LF;
    }
  } finally {
    await handle.close();
  }

  return totalBytes > 0 && lastByte !== LF ? newlines + 1 : newlines;
}

export async function countWords(rawPath: string): Promise<number> {
  const target = await requireRegularFile(rawPath);
  const content = await readFile(target, 'utf8');
  return content.split(/\s+/).filter((word) => word.length > 0).length;
}
