// This file defines the filesystem-facing domain types shared by tool handlers and result envelopes.

export type DomainErrorKind =
  | 'NotFound'
  | 'PermissionDenied'
  | 'AlreadyExists'
  | 'NotEmpty'
  | 'CrossDevice'
  | 'Unsupported'
  | 'InvalidInput';

export type PathStatus = 'ok' | `error: ${string}`;

// One record per input path; operation-specific fields are appended by each tool.
export type PathResult<TPayload extends object = object> = {
  path: string;
  status: PathStatus;
  exists: boolean;
} & TPayload;

export type EntryType = 'file' | 'directory' | 'symlink' | 'other';

export interface LineRecord {
  line_number: number;
  content: string;
}

export interface DirectoryEntry {
  name: string;
  path: string;
  entry_type: EntryType;
  size?: number;
  modified: number | null;
}

export interface TextMatch {
  file_path: string;
  line_number: number;
  column_start: number;
  column_end: number;
  matched_text: string;
}

export interface EditFileOutcome {
  path: string;
  changed: boolean;
  applied_edits: number;
  dry_run: boolean;
  content?: string;
}
