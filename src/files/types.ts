import type { EditAction } from '../agents/tool-schemas';

export interface LineRange {
  startLine?: number;
  endLine?: number;
}

export interface ReadResult {
  path: string;
  content: string;
  totalLines: number;
  startLine: number;
  endLine: number;
}

export interface WriteResult {
  path: string;
  bytes: number;
}

export interface EditRequest {
  action: EditAction;
  /** Whole line to match, compared after trimming */
  search: string;
  replace?: string;
}

export interface EditResult {
  path: string;
  matches: number;
}

export interface CopyResult {
  source: string;
  destination: string;
}

export interface DeleteResult {
  path: string;
  backupPath?: string;
}

export type EntryType = 'file' | 'directory' | 'other';

export interface DirectoryEntry {
  /** Path relative to the listed directory */
  path: string;
  name: string;
  type: EntryType;
  size?: number;
}

export interface ListOptions {
  recursive?: boolean;
  /** Glob matched against entry names (`*`, `?`, `**`) */
  pattern?: string;
}

export interface ListResult {
  path: string;
  entries: DirectoryEntry[];
}

/**
 * File-system primitives used by the tool dispatcher. Confirmation is the
 * dispatcher's job; implementations just perform the operation or throw
 * FileOperationError.
 */
export interface FileOperator {
  read(path: string, range?: LineRange): Promise<ReadResult>;
  write(path: string, content: string): Promise<WriteResult>;
  edit(path: string, request: EditRequest): Promise<EditResult>;
  copy(source: string, destination: string, options?: { overwrite?: boolean }): Promise<CopyResult>;
  delete(path: string, options?: { backup?: boolean }): Promise<DeleteResult>;
  list(path: string, options?: ListOptions): Promise<ListResult>;
}
