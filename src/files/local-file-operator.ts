import fs from 'fs/promises';
import path from 'path';
import { FileOperationError } from './errors';
import { applyLineEdit, arrangeEntries, backupPathFor, sliceLines } from './text-ops';
import type { CopyResult, DeleteResult, DirectoryEntry, EditRequest, EditResult, FileOperator, LineRange, ListOptions, ListResult, ReadResult, WriteResult } from './types';

/** File operations on the local machine; relative paths resolve against `baseDir` */
export class LocalFileOperator implements FileOperator {
  constructor(
    private baseDir: string = process.cwd(),
    private now: () => Date = () => new Date(),
  ) {}

  async read(filePath: string, range?: LineRange): Promise<ReadResult> {
    const resolved = this.resolve(filePath);
    const content = await this.guard(resolved, 'read', () => fs.readFile(resolved, 'utf8'));
    return { path: resolved, ...sliceLines(resolved, content, range) };
  }

  async write(filePath: string, content: string): Promise<WriteResult> {
    const resolved = this.resolve(filePath);
    await this.guard(resolved, 'write', async () => {
      await fs.mkdir(path.dirname(resolved), { recursive: true });
      await fs.writeFile(resolved, content, 'utf8');
    });
    return { path: resolved, bytes: Buffer.byteLength(content, 'utf8') };
  }

  async edit(filePath: string, request: EditRequest): Promise<EditResult> {
    const resolved = this.resolve(filePath);
    const original = await this.guard(resolved, 'read', () => fs.readFile(resolved, 'utf8'));
    const edited = applyLineEdit(resolved, original, request);
    await this.guard(resolved, 'write', () => fs.writeFile(resolved, edited.content, 'utf8'));
    return { path: resolved, matches: edited.matches };
  }

  async copy(source: string, destination: string, options: { overwrite?: boolean } = {}): Promise<CopyResult> {
    const from = this.resolve(source);
    const to = this.resolve(destination);

    if (!options.overwrite && (await exists(to))) {
      throw new FileOperationError(`Destination ${to} already exists (set overwrite to replace it)`, to);
    }

    await this.guard(from, 'copy', async () => {
      await fs.mkdir(path.dirname(to), { recursive: true });
      await fs.copyFile(from, to);
    });
    return { source: from, destination: to };
  }

  async delete(filePath: string, options: { backup?: boolean } = {}): Promise<DeleteResult> {
    const resolved = this.resolve(filePath);
    const stat = await this.guard(resolved, 'stat', () => fs.stat(resolved));
    if (stat.isDirectory()) {
      throw new FileOperationError(`${resolved} is a directory; use execute_command to remove directories`, resolved);
    }

    let backupPath: string | undefined;
    if (options.backup) {
      backupPath = backupPathFor(resolved, this.now());
      const target = backupPath;
      await this.guard(resolved, 'back up', () => fs.copyFile(resolved, target));
    }

    await this.guard(resolved, 'delete', () => fs.unlink(resolved));
    return backupPath ? { path: resolved, backupPath } : { path: resolved };
  }

  async list(dirPath: string, options: ListOptions = {}): Promise<ListResult> {
    const resolved = this.resolve(dirPath);
    const entries: DirectoryEntry[] = [];
    await this.walk(resolved, '', Boolean(options.recursive), entries);
    return { path: resolved, entries: arrangeEntries(entries, options.pattern) };
  }

  private async walk(root: string, relative: string, recursive: boolean, out: DirectoryEntry[]): Promise<void> {
    const dir = path.join(root, relative);
    const dirents = await this.guard(dir, 'list', () => fs.readdir(dir, { withFileTypes: true }));

    for (const dirent of dirents) {
      const entryPath = relative ? path.join(relative, dirent.name) : dirent.name;
      if (dirent.isDirectory()) {
        out.push({ path: entryPath, name: dirent.name, type: 'directory' });
        if (recursive) await this.walk(root, entryPath, recursive, out);
      } else if (dirent.isFile()) {
        const stat = await fs.stat(path.join(root, entryPath));
        out.push({ path: entryPath, name: dirent.name, type: 'file', size: stat.size });
      } else {
        out.push({ path: entryPath, name: dirent.name, type: 'other' });
      }
    }
  }

  private resolve(filePath: string): string {
    return path.resolve(this.baseDir, filePath);
  }

  private async guard<T>(filePath: string, verb: string, op: () => Promise<T>): Promise<T> {
    try {
      return await op();
    } catch (err) {
      if (err instanceof FileOperationError) throw err;
      const code = isErrnoException(err) ? err.code : undefined;
      const reason = code === 'ENOENT' ? 'no such file or directory' : code === 'EACCES' ? 'permission denied' : err instanceof Error ? err.message : String(err);
      throw new FileOperationError(`Failed to ${verb} ${filePath}: ${reason}`, filePath, err);
    }
  }
}

async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}
