import path from 'path';
import { FileOperationError } from './errors';
import { applyLineEdit, arrangeEntries, backupPathFor, sliceLines } from './text-ops';
import type { CopyResult, DeleteResult, DirectoryEntry, EditRequest, EditResult, EntryType, FileOperator, LineRange, ListOptions, ListResult, ReadResult, WriteResult } from './types';
import type { ExecutionBackend, ExecutionTarget } from '../execution/types';

export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * File operations on a remote host, carried out as shell commands over the
 * session's execution backend. Paths are used as given (relative paths are
 * relative to the remote login directory).
 */
export class RemoteFileOperator implements FileOperator {
  constructor(
    private backend: ExecutionBackend,
    private target: ExecutionTarget,
    private timeoutMs: number,
    private now: () => Date = () => new Date(),
  ) {}

  async read(filePath: string, range?: LineRange): Promise<ReadResult> {
    const content = await this.exec(filePath, 'read', `cat -- ${shellQuote(filePath)}`);
    return { path: filePath, ...sliceLines(filePath, content, range) };
  }

  async write(filePath: string, content: string): Promise<WriteResult> {
    const dir = path.posix.dirname(filePath);
    await this.exec(filePath, 'write', `mkdir -p -- ${shellQuote(dir)} && cat > ${shellQuote(filePath)}`, content);
    return { path: filePath, bytes: Buffer.byteLength(content, 'utf8') };
  }

  async edit(filePath: string, request: EditRequest): Promise<EditResult> {
    const original = await this.exec(filePath, 'read', `cat -- ${shellQuote(filePath)}`);
    const edited = applyLineEdit(filePath, original, request);
    await this.exec(filePath, 'write', `cat > ${shellQuote(filePath)}`, edited.content);
    return { path: filePath, matches: edited.matches };
  }

  async copy(source: string, destination: string, options: { overwrite?: boolean } = {}): Promise<CopyResult> {
    const guard = options.overwrite ? '' : `if [ -e ${shellQuote(destination)} ]; then echo 'destination already exists (set overwrite to replace it)' >&2; exit 1; fi; `;
    await this.exec(source, 'copy', `${guard}mkdir -p -- ${shellQuote(path.posix.dirname(destination))} && cp -- ${shellQuote(source)} ${shellQuote(destination)}`);
    return { source, destination };
  }

  async delete(filePath: string, options: { backup?: boolean } = {}): Promise<DeleteResult> {
    const quoted = shellQuote(filePath);
    const backupPath = options.backup ? backupPathFor(filePath, this.now()) : undefined;
    const backup = backupPath ? `cp -p -- ${quoted} ${shellQuote(backupPath)} && ` : '';
    await this.exec(filePath, 'delete', `if [ ! -f ${quoted} ]; then echo 'no such file' >&2; exit 1; fi; ${backup}rm -f -- ${quoted}`);
    return backupPath ? { path: filePath, backupPath } : { path: filePath };
  }

  async list(dirPath: string, options: ListOptions = {}): Promise<ListResult> {
    const depth = options.recursive ? '' : ' -maxdepth 1';
    const output = await this.exec(dirPath, 'list', `find ${shellQuote(dirPath)} -mindepth 1${depth} -printf '%y\\t%s\\t%P\\n'`);
    const entries = output
      .split('\n')
      .filter(Boolean)
      .map((line): DirectoryEntry => {
        const [kind = '', size = '0', rel = ''] = line.split('\t');
        const type: EntryType = kind === 'd' ? 'directory' : kind === 'f' ? 'file' : 'other';
        return type === 'file' ? { path: rel, name: path.posix.basename(rel), type, size: Number(size) } : { path: rel, name: path.posix.basename(rel), type };
      });
    return { path: dirPath, entries: arrangeEntries(entries, options.pattern) };
  }

  private async exec(filePath: string, verb: string, command: string, input?: string): Promise<string> {
    const result = await this.backend.run(command, { timeoutMs: this.timeoutMs, target: this.target, input });
    if (result.timedOut) {
      throw new FileOperationError(`Failed to ${verb} ${filePath}: timed out after ${this.timeoutMs}ms`, filePath);
    }
    if (result.exitCode !== 0) {
      throw new FileOperationError(`Failed to ${verb} ${filePath}: ${result.stderr.trim() || `exit code ${result.exitCode ?? 'unknown'}`}`, filePath);
    }
    return result.stdout;
  }
}
