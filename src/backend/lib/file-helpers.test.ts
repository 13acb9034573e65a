import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  isDirectory,
  isMissingFileError,
  isWithinDirectory,
  listDirectory,
  nextRotationPath,
  pathExists,
} from './file-helpers';

describe('file-helpers', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'loom-file-helpers-'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('detects existing paths and directories', async () => {
    const file = path.join(dir, 'a.txt');
    await fs.writeFile(file, 'x', 'utf-8');

    expect(await pathExists(file)).toBe(true);
    expect(await pathExists(path.join(dir, 'missing'))).toBe(false);
    expect(await isDirectory(dir)).toBe(true);
    expect(await isDirectory(file)).toBe(false);
  });

  it('recognizes missing-file errors', async () => {
    const error = await fs.readFile(path.join(dir, 'missing')).catch((caught: unknown) => caught);

    expect(isMissingFileError(error)).toBe(true);
    expect(isMissingFileError(new Error('other'))).toBe(false);
  });

  it('picks the first free rotation name', async () => {
    const target = path.join(dir, 'context.jsonl');
    await fs.writeFile(path.join(dir, 'context_1.jsonl'), '', 'utf-8');

    expect(await nextRotationPath(target)).toBe(path.join(dir, 'context_2.jsonl'));
  });

  it('hands concurrent callers distinct rotation names', async () => {
    const target = path.join(dir, 'context_sub.jsonl');

    const reserved = await Promise.all([nextRotationPath(target), nextRotationPath(target)]);

    expect([...reserved].sort()).toEqual([
      path.join(dir, 'context_sub_1.jsonl'),
      path.join(dir, 'context_sub_2.jsonl'),
    ]);
    expect(await fs.readFile(path.join(dir, 'context_sub_1.jsonl'), 'utf-8')).toBe('');
  });

  it('lists directories first, then files', async () => {
    await fs.mkdir(path.join(dir, 'src'));
    await fs.writeFile(path.join(dir, 'b.txt'), '', 'utf-8');
    await fs.writeFile(path.join(dir, 'a.txt'), '', 'utf-8');

    expect(await listDirectory(dir)).toBe('src/\na.txt\nb.txt');
    expect(await listDirectory(dir, 1)).toBe('src/\n... (2 more)');
  });

  it('checks directory containment', () => {
    expect(isWithinDirectory('/work/project/src', '/work/project')).toBe(true);
    expect(isWithinDirectory('/work/project', '/work/project')).toBe(true);
    expect(isWithinDirectory('/work/project-two', '/work/project')).toBe(false);
    expect(isWithinDirectory('/work', '/work/project')).toBe(false);
  });
});
