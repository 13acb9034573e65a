import { open, readdir, stat } from 'node:fs/promises';
import path from 'node:path';

export async function pathExists(targetPath: string): Promise<boolean> {
  try {
    await stat(targetPath);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(targetPath: string): Promise<boolean> {
  try {
    return (await stat(targetPath)).isDirectory();
  } catch {
    return false;
  }
}

/** True for the error fs raises when a path does not exist. */
export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/** True for the error fs raises when an exclusive create finds the path taken. */
export function isFileExistsError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'EEXIST';
}

/**
 * Reserve the first free rotation name next to `filePath`: `context.jsonl` becomes
 * `context_1.jsonl`, then `context_2.jsonl`, ... The name is claimed with an exclusive
 * create, so concurrent callers never get the same path. The reserved file is empty.
 */
export async function nextRotationPath(filePath: string): Promise<string> {
  const ext = path.extname(filePath);
  const stem = path.basename(filePath, ext);
  const dir = path.dirname(filePath);
  for (let n = 1; ; n++) {
    const candidate = path.join(dir, `${stem}_${n}${ext}`);
    try {
      const handle = await open(candidate, 'wx');
      await handle.close();
      return candidate;
    } catch (error) {
      if (!isFileExistsError(error)) {
        throw error;
      }
    }
  }
}

/**
 * Top-level entries of `dir`, directories first, one per line. Directories end in `/`.
 * Longer listings are cut at `limit` entries with a note of how many were left out.
 */
export async function listDirectory(dir: string, limit = 100): Promise<string> {
  const entries = await readdir(dir, { withFileTypes: true });
  const names = entries
    .map((entry) => (entry.isDirectory() ? `${entry.name}/` : entry.name))
    .sort((a, b) => {
      const aDir = a.endsWith('/');
      if (aDir !== b.endsWith('/')) {
        return aDir ? -1 : 1;
      }
      return a.localeCompare(b);
    });
  const shown = names.slice(0, limit);
  if (names.length > limit) {
    shown.push(`... (${names.length - limit} more)`);
  }
  return shown.join('\n');
}

/** True when `target` is `dir` or lies inside it. Both must be absolute. */
export function isWithinDirectory(target: string, dir: string): boolean {
  const relative = path.relative(dir, target);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}
