// This module compiles client-supplied search patterns with RE2, whose matching time is linear in the input.

import { RE2JS } from 're2js';
import { DomainError } from '../utils/errors.js';

export interface PatternOptions {
  useRegex: boolean;
  caseSensitive?: boolean;
  wholeWord?: boolean;
  multiline?: boolean;
}

export interface PatternMatch {
  start: number;
  end: number;
  text: string;
}

export type CompiledPattern = RE2JS;

// Literal patterns are quoted, so only use_regex patterns can fail to compile.
export function compilePattern(pattern: string, options: PatternOptions): CompiledPattern {
  const body = options.useRegex ? pattern : RE2JS.quote(pattern);
  const source = options.wholeWord ? `\\b(?:${body})\\b` : body;
  const flags = (options.caseSensitive === false ? RE2JS.CASE_INSENSITIVE : 0) | (options.multiline ? RE2JS.MULTILINE : 0);

  try {
    return RE2JS.compile(source, flags);
  } catch (error) {
    throw new DomainError('InvalidInput', `invalid regular expression: ${error instanceof Error ? error.message : pattern}`);
  }
}

// Offsets are UTF-16 indices into the input; matches do not overlap.
export function* matchAll(pattern: CompiledPattern, input: string): Generator<PatternMatch> {
  const matcher = pattern.matcher(input);
  while (matcher.find()) {
    const start = matcher.start();
    const end = matcher.end();
    yield { start, end, text: input.slice(start, end) };
  }
}
