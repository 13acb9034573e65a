import { randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export interface WriteFileAtomicOptions {
  encoding?: BufferEncoding;
  mode?: number;
  /** Flush the temp file to disk before it is renamed into place. */
  fsync?: boolean;
}

/**
 * Atomically write content by writing to a temp file in the same directory
 * and renaming it into place.
 */
export async function writeFileAtomic(
  targetPath: string,
  content: string | Buffer,
  options: WriteFileAtomicOptions = {}
): Promise<void> {
  const directory = path.dirname(targetPath);
  await fs.mkdir(directory, { recursive: true });

  const tmpPath = path.join(directory, `.tmp-${randomUUID()}`);

  const handle = await fs.open(tmpPath, 'w', options.mode);
  try {
    if (typeof content === 'string') {
      await handle.writeFile(content, { encoding: options.encoding ?? 'utf-8' });
    } else {
      await handle.writeFile(content);
    }
    if (options.fsync) {
      await handle.sync();
    }
  } finally {
    await handle.close();
  }

  try {
    await fs.rename(tmpPath, targetPath);
  } catch (error) {
    await fs.unlink(tmpPath).catch(() => {
      // Best-effort cleanup; ignore if already removed.
    });
    throw error;
  }
}
