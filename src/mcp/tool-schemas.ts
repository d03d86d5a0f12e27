// This module defines the argument contracts of every filesystem tool.

import { z } from 'zod';
import { isJsonObject } from '../utils/json.js';

const MAX_PATH_LENGTH = 4096;
const MAX_PATHS_PER_CALL = 1000;
const MAX_EDITS_PER_CALL = 200;

export const pathSchema = z.string().min(1).max(MAX_PATH_LENGTH);

const pathListSchema = z.array(pathSchema).min(1).max(MAX_PATHS_PER_CALL);

// This helper accepts the legacy singular key and a bare string for multi-path tools before validation.
export function normalizePathsInput(input: unknown): unknown {
  if (!isJsonObject(input)) {
    return input;
  }

  const normalized: Record<string, unknown> = { ...input };
  if (normalized.paths === undefined && normalized.path !== undefined) {
    normalized.paths = normalized.path;
    delete normalized.path;
  }
  if (typeof normalized.paths === 'string') {
    normalized.paths = [normalized.paths];
  }
  return normalized;
}

function withLegacyPaths<T extends z.ZodTypeAny>(schema: T): z.ZodEffects<T, z.output<T>, unknown> {
  return z.preprocess(normalizePathsInput, schema);
}

export const pathsOnlySchema = withLegacyPaths(
  z.object({
    paths: pathListSchema
  })
);

// This schema keeps permission changes to plain octal modes such as 755 or 0644.
export const setPermissionsSchema = withLegacyPaths(
  z.object({
    paths: pathListSchema,
    mode: z.string().regex(/^0?[0-7]{3,4}$/, 'mode must be an octal string such as 0755')
  })
);

export const changeOwnershipSchema = withLegacyPaths(
  z
    .object({
      paths: pathListSchema,
      user: z.number().int().min(0).optional(),
      group: z.number().int().min(0).optional()
    })
    .refine((payload) => payload.user !== undefined || payload.group !== undefined, {
      message: 'At least one of user or group is required.',
      path: ['user']
    })
);

export const makeDirectorySchema = withLegacyPaths(
  z.object({
    paths: pathListSchema,
    recursive: z.boolean().default(true)
  })
);

export const removeSchema = withLegacyPaths(
  z.object({
    paths: pathListSchema,
    recursive: z.boolean().default(false),
    force: z.boolean().default(false)
  })
);

export const removeDirectorySchema = withLegacyPaths(
  z.object({
    paths: pathListSchema,
    recursive: z.boolean().default(false)
  })
);

export const copySchema = z.object({
  sources: pathListSchema,
  destination: pathSchema,
  recursive: z.boolean().default(false)
});

export const moveSchema = z.object({
  sources: pathListSchema,
  destination: pathSchema
});

export const readLinesSchema = z.object({
  path: pathSchema,
  start_line: z.number().int().min(0).optional(),
  end_line: z.number().int().min(0).optional(),
  line_count: z.number().int().min(0).optional(),
  start_offset: z.number().int().min(0).optional()
});

export const writeFileSchema = z.object({
  path: pathSchema,
  content: z.string(),
  append: z.boolean().default(false)
});

const anchorFields = {
  search: z.string().min(1),
  use_regex: z.boolean().default(false),
  occurrence: z.number().int().min(1).default(1),
  require_match: z.boolean().default(true)
};

// This schema models one edit; edits are applied in array order to the evolving content.
export const editOperationSchema = z.discriminatedUnion('op', [
  z.object({ op: z.literal('insert_after'), text: z.string(), ...anchorFields }),
  z.object({ op: z.literal('insert_before'), text: z.string(), ...anchorFields }),
  z.object({ op: z.literal('replace'), text: z.string(), ...anchorFields }),
  z.object({ op: z.literal('delete'), ...anchorFields }),
  z.object({ op: z.literal('insert_at_line'), line: z.number().int().min(1), text: z.string() }),
  z.object({
    op: z.literal('replace_lines'),
    start_line: z.number().int().min(1),
    end_line: z.number().int().min(1),
    text: z.string()
  }),
  z.object({ op: z.literal('delete_lines'), start_line: z.number().int().min(1), end_line: z.number().int().min(1) })
]);

export const editFileSchema = z.object({
  path: pathSchema,
  edits: z.array(editOperationSchema).min(1).max(MAX_EDITS_PER_CALL),
  create_if_missing: z.boolean().default(false),
  dry_run: z.boolean().default(false),
  return_content: z.boolean().default(false)
});

export const listDirectorySchema = z.object({
  path: pathSchema,
  recursive: z.boolean().default(false),
  include_hidden: z.boolean().default(false)
});

export const findFilesSchema = z.object({
  pattern: z.string().min(1).max(1024),
  root: pathSchema.default('.'),
  max_depth: z.number().int().min(0).optional(),
  file_type: z.enum(['file', 'dir', 'directory', 'symlink']).optional()
});

export const findInFilesSchema = z.object({
  pattern: z.string().min(1).max(4096),
  path: pathSchema,
  case_sensitive: z.boolean().default(true),
  use_regex: z.boolean().default(false),
  max_count: z.number().int().min(1).optional(),
  max_depth: z.number().int().min(0).optional(),
  include_hidden: z.boolean().default(false),
  file_glob: z.string().min(1).max(1024).optional(),
  exclude_glob: z.string().min(1).max(1024).optional(),
  whole_word: z.boolean().default(false),
  multiline: z.boolean().default(false)
});

export const linkSchema = z.object({
  target: pathSchema,
  link_path: pathSchema
});

export const singlePathSchema = z.object({
  path: pathSchema
});

export const createTemporarySchema = z.object({
  type: z.enum(['file', 'dir']).default('file'),
  template: pathSchema.optional()
});

export const emptySchema = z.object({});
