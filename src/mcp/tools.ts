// This module wires every filesystem tool to its schema, handler and danger tag.

import { countLines, countWords } from '../operations/counting.js';
import { listDirectory, makeDirectory, removeDirectory } from '../operations/directories.js';
import { editFile } from '../operations/edit-file.js';
import { createHardLink, createSymbolicLink, readSymbolicLink } from '../operations/links.js';
import {
  changeOwnership,
  getPermissions,
  setPermissions,
  statPath,
  touch,
  type StatInfo
} from '../operations/metadata.js';
import {
  createTemporary,
  getBasename,
  getCanonicalPath,
  getCurrentDirectory,
  getDirname
} from '../operations/path-info.js';
import { readLines, writeFile } from '../operations/read-write.js';
import { removePaths } from '../operations/remove.js';
import { findFiles, findInFiles } from '../operations/search.js';
import { copyPaths, movePaths } from '../operations/transfer.js';
import { collectPathResults, jsonResult, textResult } from './results.js';
import { createToolRegistry, defineTool, type ToolDefinition, type ToolRegistry } from './registry.js';
import {
  changeOwnershipSchema,
  copySchema,
  createTemporarySchema,
  editFileSchema,
  emptySchema,
  findFilesSchema,
  findInFilesSchema,
  linkSchema,
  listDirectorySchema,
  makeDirectorySchema,
  moveSchema,
  pathsOnlySchema,
  readLinesSchema,
  removeDirectorySchema,
  removeSchema,
  setPermissionsSchema,
  singlePathSchema,
  writeFileSchema
} from './tool-schemas.js';

type NullableStat = { [K in keyof StatInfo]: StatInfo[K] | null };

// This helper keeps the stat payload shape stable on failed paths.
function emptyStat(): NullableStat {
  return {
    entry_type: null,
    size: null,
    mode: null,
    modified: null,
    accessed: null,
    created: null,
    is_file: null,
    is_dir: null,
    is_symlink: null
  };
}

const setPermissionsDefinition = {
  description: 'Set octal permission bits on one or more paths.',
  schema: setPermissionsSchema,
  dangerous: true,
  handler: async (args: { paths: string[]; mode: string }) =>
    jsonResult(
      await collectPathResults<{ mode: string | null }>(
        args.paths,
        async (path) => ({ exists: true, payload: { mode: await setPermissions(path, args.mode) } }),
        () => ({ mode: null })
      )
    )
};

// Registration order is the order clients see in tools/list.
export const fileioTools: readonly ToolDefinition[] = [
  defineTool({
    name: 'fileio_count_lines',
    description: 'Count lines in one or more files; each path reports its own status.',
    schema: pathsOnlySchema,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ lines: number | null }>(
          args.paths,
          async (path) => ({ exists: true, payload: { lines: await countLines(path) } }),
          () => ({ lines: null })
        )
      )
  }),
  defineTool({
    name: 'fileio_count_words',
    description: 'Count whitespace-separated words in one or more files.',
    schema: pathsOnlySchema,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ words: number | null }>(
          args.paths,
          async (path) => ({ exists: true, payload: { words: await countWords(path) } }),
          () => ({ words: null })
        )
      )
  }),
  defineTool({
    name: 'fileio_stat',
    description: 'Describe type, size, mode and timestamps of one or more paths without following symlinks.',
    schema: pathsOnlySchema,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<NullableStat>(
          args.paths,
          async (path) => ({ exists: true, payload: await statPath(path) }),
          emptyStat
        )
      )
  }),
  defineTool({
    name: 'fileio_get_permissions',
    description: 'Return the octal permission bits of one or more paths.',
    schema: pathsOnlySchema,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ mode: string | null }>(
          args.paths,
          async (path) => ({ exists: true, payload: { mode: await getPermissions(path) } }),
          () => ({ mode: null })
        )
      )
  }),
  defineTool({ name: 'fileio_set_permissions', ...setPermissionsDefinition }),
  defineTool({ name: 'fileio_set_mode', ...setPermissionsDefinition }),
  defineTool({
    name: 'fileio_change_ownership',
    description: 'Change the numeric owner and/or group of one or more paths.',
    schema: changeOwnershipSchema,
    dangerous: true,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ uid: number | null; gid: number | null }>(
          args.paths,
          async (path) => ({ exists: true, payload: await changeOwnership(path, args.user, args.group) }),
          () => ({ uid: null, gid: null })
        )
      )
  }),
  defineTool({
    name: 'fileio_touch',
    description: 'Create empty files (and missing parents) or refresh timestamps of existing ones.',
    schema: pathsOnlySchema,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ created: boolean }>(
          args.paths,
          async (path) => ({ exists: true, payload: { created: await touch(path) } }),
          () => ({ created: false })
        )
      )
  }),
  defineTool({
    name: 'fileio_make_directory',
    description: 'Create directories; existing directories are reported with created=false.',
    schema: makeDirectorySchema,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ created: boolean }>(
          args.paths,
          async (path) => ({ exists: true, payload: { created: await makeDirectory(path, args.recursive) } }),
          () => ({ created: false })
        )
      )
  }),
  defineTool({
    name: 'fileio_remove',
    description: 'Remove files or directories; the last path component may be a glob. force makes missing paths succeed.',
    schema: removeSchema,
    dangerous: true,
    handler: async (args) => jsonResult(await removePaths(args.paths, { recursive: args.recursive, force: args.force }))
  }),
  defineTool({
    name: 'fileio_remove_directory',
    description: 'Remove directories; recursive removes their contents too.',
    schema: removeDirectorySchema,
    dangerous: true,
    handler: async (args) =>
      jsonResult(
        await collectPathResults<{ removed: boolean }>(
          args.paths,
          async (path) => {
            await removeDirectory(path, args.recursive);
            return { exists: true, payload: { removed: true } };
          },
          () => ({ removed: false })
        )
      )
  }),
  defineTool({
    name: 'fileio_copy',
    description: 'Copy sources (globs allowed) to a destination; several sources need a destination directory.',
    schema: copySchema,
    handler: async (args) => jsonResult(await copyPaths(args.sources, args.destination, args.recursive))
  }),
  defineTool({
    name: 'fileio_move',
    description: 'Move or rename sources (globs allowed) to a destination on the same filesystem.',
    schema: moveSchema,
    handler: async (args) => jsonResult(await movePaths(args.sources, args.destination))
  }),
  defineTool({
    name: 'fileio_read_lines',
    description: 'Read a window of lines from a text file with 1-based line numbers.',
    schema: readLinesSchema,
    handler: async (args) => jsonResult(await readLines(args.path, args))
  }),
  defineTool({
    name: 'fileio_write_file',
    description: 'Write text to a file atomically, or append to it; parent directories are created.',
    schema: writeFileSchema,
    handler: async (args) => jsonResult(await writeFile(args.path, args.content, args.append))
  }),
  defineTool({
    name: 'fileio_edit_file',
    description: 'Apply ordered anchor-based or line-based edits to a text file, with dry-run support.',
    schema: editFileSchema,
    handler: async (args) => jsonResult(await editFile(args))
  }),
  defineTool({
    name: 'fileio_list_directory',
    description: 'List directory entries with type, size and modification time; a missing directory lists as empty.',
    schema: listDirectorySchema,
    handler: async (args) =>
      jsonResult(await listDirectory(args.path, { recursive: args.recursive, includeHidden: args.include_hidden }))
  }),
  defineTool({
    name: 'fileio_find_files',
    description: 'Find entries by name beneath a root; * and ? match whole names, other patterns match substrings.',
    schema: findFilesSchema,
    handler: async (args) =>
      jsonResult(await findFiles(args.pattern, { root: args.root, maxDepth: args.max_depth, fileType: args.file_type }))
  }),
  defineTool({
    name: 'fileio_find_in_files',
    description: 'Search text files for a literal or regex pattern and report line and column of each match.',
    schema: findInFilesSchema,
    handler: async (args) =>
      jsonResult(
        await findInFiles(args.pattern, args.path, {
          caseSensitive: args.case_sensitive,
          useRegex: args.use_regex,
          maxCount: args.max_count,
          maxDepth: args.max_depth,
          includeHidden: args.include_hidden,
          fileGlob: args.file_glob,
          excludeGlob: args.exclude_glob,
          wholeWord: args.whole_word,
          multiline: args.multiline
        })
      )
  }),
  defineTool({
    name: 'fileio_create_hard_link',
    description: 'Create a hard link at link_path pointing to target.',
    schema: linkSchema,
    handler: async (args) => jsonResult(await createHardLink(args.target, args.link_path))
  }),
  defineTool({
    name: 'fileio_create_symbolic_link',
    description: 'Create a symbolic link at link_path pointing to target.',
    schema: linkSchema,
    handler: async (args) => jsonResult(await createSymbolicLink(args.target, args.link_path))
  }),
  defineTool({
    name: 'fileio_get_basename',
    description: 'Return the final component of a path.',
    schema: singlePathSchema,
    handler: async (args) => textResult(getBasename(args.path))
  }),
  defineTool({
    name: 'fileio_get_dirname',
    description: 'Return a path without its final component.',
    schema: singlePathSchema,
    handler: async (args) => textResult(getDirname(args.path))
  }),
  defineTool({
    name: 'fileio_get_canonical_path',
    description: 'Resolve a path to its absolute form with symlinks followed.',
    schema: singlePathSchema,
    handler: async (args) => textResult(await getCanonicalPath(args.path))
  }),
  defineTool({
    name: 'fileio_read_symbolic_link',
    description: 'Return the stored target of a symbolic link.',
    schema: singlePathSchema,
    handler: async (args) => textResult(await readSymbolicLink(args.path))
  }),
  defineTool({
    name: 'fileio_create_temporary',
    description: 'Create a uniquely named temporary file or directory and return its path.',
    schema: createTemporarySchema,
    handler: async (args) => textResult(await createTemporary(args.type, args.template))
  }),
  defineTool({
    name: 'fileio_get_current_directory',
    description: "Return the server process's working directory.",
    schema: emptySchema,
    handler: async () => textResult(getCurrentDirectory())
  })
];

// This helper builds the shared registry once at startup.
export function buildFileioRegistry(): ToolRegistry {
  return createToolRegistry(fileioTools);
}
