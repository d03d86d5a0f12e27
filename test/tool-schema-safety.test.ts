// This test suite verifies strict argument contracts and safe defaults of the filesystem tools.

import { describe, expect, it } from 'vitest';
import {
  changeOwnershipSchema,
  copySchema,
  editFileSchema,
  findInFilesSchema,
  makeDirectorySchema,
  pathsOnlySchema,
  readLinesSchema,
  removeSchema,
  setPermissionsSchema,
  writeFileSchema
} from '../src/mcp/tool-schemas.js';

describe('tool schema safety', () => {
  it('accepts the legacy singular path key and bare strings for multi-path tools', () => {
    expect(pathsOnlySchema.parse({ path: 'notes.txt' })).toEqual({ paths: ['notes.txt'] });
    expect(pathsOnlySchema.parse({ paths: 'notes.txt' })).toEqual({ paths: ['notes.txt'] });
    expect(pathsOnlySchema.parse({ paths: ['a', 'b'] })).toEqual({ paths: ['a', 'b'] });
  });

  it('rejects empty path lists and empty paths', () => {
    expect(() => pathsOnlySchema.parse({ paths: [] })).toThrow();
    expect(() => pathsOnlySchema.parse({ paths: [''] })).toThrow();
    expect(() => pathsOnlySchema.parse({})).toThrow();
  });

  it('defaults removal to non-recursive and non-forced', () => {
    expect(removeSchema.parse({ paths: ['build'] })).toEqual({ paths: ['build'], recursive: false, force: false });
  });

  it('defaults directory creation to creating parents', () => {
    expect(makeDirectorySchema.parse({ path: 'a/b/c' })).toEqual({ paths: ['a/b/c'], recursive: true });
  });

  it('accepts only octal permission modes', () => {
    expect(setPermissionsSchema.parse({ paths: ['run.sh'], mode: '0755' })).toMatchObject({ mode: '0755' });
    expect(setPermissionsSchema.parse({ paths: ['run.sh'], mode: '644' })).toMatchObject({ mode: '644' });
    expect(() => setPermissionsSchema.parse({ paths: ['run.sh'], mode: '999' })).toThrow();
    expect(() => setPermissionsSchema.parse({ paths: ['run.sh'], mode: 'u+x' })).toThrow();
  });

  it('requires a user or a group for ownership changes', () => {
    expect(() => changeOwnershipSchema.parse({ paths: ['data'] })).toThrow('At least one of user or group is required.');
    expect(changeOwnershipSchema.parse({ paths: ['data'], group: 100 })).toEqual({ paths: ['data'], group: 100 });
    expect(() => changeOwnershipSchema.parse({ paths: ['data'], user: -1 })).toThrow();
  });

  it('does not coerce numeric strings in line windows', () => {
    expect(() => readLinesSchema.parse({ path: 'a.txt', start_line: '5' })).toThrow();
    expect(readLinesSchema.parse({ path: 'a.txt', start_line: 5 })).toEqual({ path: 'a.txt', start_line: 5 });
  });

  it('defaults writes to replace and copies to non-recursive', () => {
    expect(writeFileSchema.parse({ path: 'a.txt', content: '' })).toEqual({ path: 'a.txt', content: '', append: false });
    expect(copySchema.parse({ sources: ['a'], destination: 'b' })).toEqual({
      sources: ['a'],
      destination: 'b',
      recursive: false
    });
  });

  it('fills anchor edit defaults and rejects unknown operations', () => {
    const parsed = editFileSchema.parse({
      path: 'config.toml',
      edits: [{ op: 'replace', search: 'old', text: 'new' }]
    });

    expect(parsed).toEqual({
      path: 'config.toml',
      edits: [{ op: 'replace', search: 'old', text: 'new', use_regex: false, occurrence: 1, require_match: true }],
      create_if_missing: false,
      dry_run: false,
      return_content: false
    });
    expect(() => editFileSchema.parse({ path: 'a', edits: [{ op: 'append', text: 'x' }] })).toThrow();
    expect(() => editFileSchema.parse({ path: 'a', edits: [{ op: 'replace', search: 'x', text: 'y', occurrence: 0 }] })).toThrow();
    expect(() => editFileSchema.parse({ path: 'a', edits: [] })).toThrow();
  });

  it('defaults text search to case-sensitive literal matching', () => {
    expect(findInFilesSchema.parse({ pattern: 'TODO', path: 'src' })).toEqual({
      pattern: 'TODO',
      path: 'src',
      case_sensitive: true,
      use_regex: false,
      include_hidden: false,
      whole_word: false,
      multiline: false
    });
  });
});
