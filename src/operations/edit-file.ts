// This module applies ordered, anchor- or line-based edits to one text file.

import { readFile } from 'node:fs/promises';
import type { EditFileOutcome } from '../types/domain.js';
import { DomainError, errnoCode } from '../utils/errors.js';
import { expandPath } from '../utils/paths.js';
import { compilePattern, matchAll } from './pattern.js';
import { atomicWrite } from './read-write.js';

interface AnchorFields {
  search: string;
  use_regex: boolean;
  occurrence: number;
  require_match: boolean;
}

export type EditOperation =
  | ({ op: 'insert_after'; text: string } & AnchorFields)
  | ({ op: 'insert_before'; text: string } & AnchorFields)
  | ({ op: 'replace'; text: string } & AnchorFields)
  | ({ op: 'delete' } & AnchorFields)
  | { op: 'insert_at_line'; line: number; text: string }
  | { op: 'replace_lines'; start_line: number; end_line: number; text: string }
  | { op: 'delete_lines'; start_line: number; end_line: number };

export interface EditFileRequest {
  path: string;
  edits: EditOperation[];
  create_if_missing: boolean;
  dry_run: boolean;
  return_content: boolean;
}

interface Span {
  start: number;
  end: number;
}

// This helper finds the nth (1-based) non-overlapping match of a literal or regex anchor.
function findNthSpan(content: string, anchor: AnchorFields): Span | null {
  if (anchor.occurrence < 1) {
    throw new DomainError('InvalidInput', 'occurrence must be >= 1');
  }
  if (anchor.search.length === 0) {
    throw new DomainError('InvalidInput', 'search must not be empty');
  }

  let seen = 0;
  for (const match of matchAll(compilePattern(anchor.search, { useRegex: anchor.use_regex }), content)) {
    seen += 1;
    if (seen === anchor.occurrence) {
      return { start: match.start, end: match.end };
    }
  }
  return null;
}

function lineStarts(content: string): number[] {
  const starts = [0];
  for (let index = 0; index < content.length; index += 1) {
    if (content.charCodeAt(index) === 0x0a) {
      starts.push(index + 1);
    }
  }
  return starts;
}

// An empty file counts as one empty line so line edits can seed it.
function effectiveLineCount(content: string): number {
  return content.length === 0 ? 1 : lineStarts(content).length;
}

function lineStartOffset(content: string, line: number): number {
  if (line < 1) {
    throw new DomainError('InvalidInput', 'line must be >= 1');
  }

  const count = effectiveLineCount(content);
  if (line > count + 1) {
    throw new DomainError('InvalidInput', `invalid line number ${line} (file has ${count} lines)`);
  }
  if (line === count + 1) {
    return content.length;
  }
  if (content.length === 0) {
    return 0;
  }
  return lineStarts(content)[line - 1] ?? content.length;
}

function lineRangeOffsets(content: string, startLine: number, endLine: number): Span {
  if (startLine < 1 || endLine < 1) {
    throw new DomainError('InvalidInput', 'line numbers must be >= 1');
  }
  if (startLine > endLine) {
    throw new DomainError('InvalidInput', `start_line (${startLine}) must be <= end_line (${endLine})`);
  }

  const count = effectiveLineCount(content);
  if (startLine > count || endLine > count) {
    throw new DomainError('InvalidInput', `invalid line range ${startLine}..${endLine} (file has ${count} lines)`);
  }
  if (content.length === 0) {
    return { start: 0, end: 0 };
  }

  const starts = lineStarts(content);
  const start = starts[startLine - 1] ?? content.length;
  const end = endLine < starts.length ? starts[endLine] ?? content.length : content.length;
  return { start, end };
}

function splice(content: string, span: Span, text: string): string {
  return `${content.slice(0, span.start)}${text}${content.slice(span.end)}`;
}

// This function returns the edited content, or null when an optional anchor did not match.
function applyEdit(content: string, edit: EditOperation): string | null {
  switch (edit.op) {
    case 'insert_after':
    case 'insert_before':
    case 'replace':
    case 'delete': {
      const span = findNthSpan(content, edit);
      if (!span) {
        if (edit.require_match) {
          throw new DomainError('InvalidInput', `search pattern not found (${edit.op}): ${edit.search}`);
        }
        return null;
      }

      if (edit.op === 'insert_after') {
        return splice(content, { start: span.end, end: span.end }, edit.text);
      }
      if (edit.op === 'insert_before') {
        return splice(content, { start: span.start, end: span.start }, edit.text);
      }
      return splice(content, span, edit.op === 'replace' ? edit.text : '');
    }

    case 'insert_at_line': {
      const offset = lineStartOffset(content, edit.line);
      return splice(content, { start: offset, end: offset }, edit.text);
    }

    case 'replace_lines': {
      const span = lineRangeOffsets(content, edit.start_line, edit.end_line);
      const removed = content.slice(span.start, span.end);
      // Keep the line structure intact when the replaced block ended with a newline.
      const replacement = removed.endsWith('\n') && !edit.text.endsWith('\n') ? `${edit.text}\n` : edit.text;
      return splice(content, span, replacement);
    }

    case 'delete_lines':
      return splice(content, lineRangeOffsets(content, edit.start_line, edit.end_line), '');
  }
}

// Edits apply in order to the evolving content; nothing is written on dry runs or when the content is unchanged.
export async function editFile(request: EditFileRequest): Promise<EditFileOutcome> {
  const target = expandPath(request.path);

  let original: string;
  try {
    original = await readFile(target, 'utf8');
  } catch (error) {
    if (!(request.create_if_missing && errnoCode(error) === 'ENOENT')) {
      throw error;
    }
    original = '';
  }

  let content = original;
  let applied = 0;
  for (const edit of request.edits) {
    const next = applyEdit(content, edit);
    if (next !== null && next !== content) {
      content = next;
      applied += 1;
    }
  }

  const changed = content !== original;
  if (changed && !request.dry_run) {
    await atomicWrite(target, content);
  }

  return {
    path: request.path,
    changed,
    applied_edits: applied,
    dry_run: request.dry_run,
    ...(request.return_content || request.dry_run ? { content } : {})
  };
}
