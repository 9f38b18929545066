import { FileOperationError } from './errors';
import type { DirectoryEntry, EditRequest, LineRange } from './types';

/** Slice 1-based inclusive line ranges out of a text */
export function sliceLines(filePath: string, content: string, range: LineRange = {}): { content: string; totalLines: number; startLine: number; endLine: number } {
  const lines = splitLines(content);
  const totalLines = lines.length;
  const startLine = range.startLine ?? 1;
  const endLine = Math.min(range.endLine ?? totalLines, totalLines);

  if (totalLines === 0) {
    return { content: '', totalLines, startLine: 0, endLine: 0 };
  }
  if (startLine > totalLines) {
    throw new FileOperationError(`start_line ${startLine} is past the end of ${filePath} (${totalLines} lines)`, filePath);
  }
  if (endLine < startLine) {
    throw new FileOperationError(`end_line ${endLine} is before start_line ${startLine}`, filePath);
  }

  return { content: lines.slice(startLine - 1, endLine).join('\n'), totalLines, startLine, endLine };
}

/**
 * Apply a line edit. `search` must equal a whole line once both are trimmed;
 * every matching line is affected.
 */
export function applyLineEdit(filePath: string, content: string, request: EditRequest): { content: string; matches: number } {
  const lines = splitLines(content);
  const target = request.search.trim();
  const replacement = request.replace === undefined ? [] : request.replace.split('\n');
  const output: string[] = [];
  let matches = 0;

  for (const line of lines) {
    if (line.trim() !== target) {
      output.push(line);
      continue;
    }
    matches++;
    switch (request.action) {
      case 'replace':
        output.push(...replacement);
        break;
      case 'insert_after':
        output.push(line, ...replacement);
        break;
      case 'insert_before':
        output.push(...replacement, line);
        break;
      case 'delete_line':
        break;
    }
  }

  if (matches === 0) {
    throw new FileOperationError(`No line in ${filePath} matches "${target}"`, filePath);
  }

  const trailingNewline = content.endsWith('\n') ? '\n' : '';
  return { content: output.join('\n') + trailingNewline, matches };
}

function splitLines(content: string): string[] {
  if (content === '') return [];
  const body = content.endsWith('\n') ? content.slice(0, -1) : content;
  return body.split('\n');
}

/** `<path>.backup_YYYYMMDD_HHMMSS` in local time */
export function backupPathFor(filePath: string, now: Date = new Date()): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const stamp = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `${filePath}.backup_${stamp}`;
}

export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern.charAt(i);
    if (ch === '*') {
      if (pattern.charAt(i + 1) === '*') {
        source += '.*';
        i++;
      } else {
        source += '[^/]*';
      }
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}

/** Filter by name glob, then order directories first and by path */
export function arrangeEntries(entries: DirectoryEntry[], pattern?: string): DirectoryEntry[] {
  const matcher = pattern ? globToRegExp(pattern) : undefined;
  return entries
    .filter((e) => !matcher || matcher.test(e.name))
    .sort((a, b) => {
      if (a.type === 'directory' && b.type !== 'directory') return -1;
      if (b.type === 'directory' && a.type !== 'directory') return 1;
      return a.path < b.path ? -1 : a.path > b.path ? 1 : 0;
    });
}
