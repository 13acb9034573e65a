import * as fs from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { toError } from '../lib/error-utils';
import { isMissingFileError, nextRotationPath } from '../lib/file-helpers';
import { type Message, MessageSchema, serializeMessage, systemPart } from '../llm/message';
import { createLogger } from '../services/logger.service';

const logger = createLogger('context');

const UsageRecordSchema = z.object({ role: z.literal('_usage'), token_count: z.number() });
const CheckpointRecordSchema = z.object({ role: z.literal('_checkpoint'), id: z.number().int() });

type ContextRecord =
  | { kind: 'usage'; tokenCount: number }
  | { kind: 'checkpoint'; id: number }
  | { kind: 'message'; message: Message };

function parseRecord(line: string): ContextRecord | null {
  const value: unknown = JSON.parse(line);
  const usageRecord = UsageRecordSchema.safeParse(value);
  if (usageRecord.success) {
    return { kind: 'usage', tokenCount: usageRecord.data.token_count };
  }
  const checkpoint = CheckpointRecordSchema.safeParse(value);
  if (checkpoint.success) {
    return { kind: 'checkpoint', id: checkpoint.data.id };
  }
  const message = MessageSchema.safeParse(value);
  return message.success ? { kind: 'message', message: message.data } : null;
}

/**
 * Conversation history backed by an append-only `context.jsonl`. Besides messages the
 * file carries `_usage` (token count) and `_checkpoint` records.
 */
export class Context {
  private _history: Message[] = [];
  private _tokenCount = 0;
  private nextCheckpointId = 0;

  constructor(readonly file: string) {}

  get history(): readonly Message[] {
    return this._history;
  }

  get tokenCount(): number {
    return this._tokenCount;
  }

  get checkpointCount(): number {
    return this.nextCheckpointId;
  }

  /** Load the file into memory. Returns false when there was nothing to restore. */
  async restore(): Promise<boolean> {
    if (this._history.length > 0) {
      throw new Error('The context is already populated');
    }
    let raw: string;
    try {
      raw = await fs.readFile(this.file, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return false;
      }
      throw error;
    }
    if (!raw.trim()) {
      return false;
    }

    for (const [index, line] of raw.split('\n').entries()) {
      if (!line.trim()) {
        continue;
      }
      let record: ContextRecord | null;
      try {
        record = parseRecord(line);
      } catch (error) {
        logger.warn('Skipping unparsable context line', {
          file: this.file,
          line: index + 1,
          error: toError(error).message,
        });
        continue;
      }
      if (!record) {
        logger.warn('Skipping invalid context record', { file: this.file, line: index + 1 });
        continue;
      }
      this.apply(record);
    }
    return true;
  }

  async appendMessage(...messages: Message[]): Promise<void> {
    if (messages.length === 0) {
      return;
    }
    await this.appendLines(messages.map((message) => serializeMessage(message)));
    this._history.push(...messages);
  }

  async updateTokenCount(tokenCount: number): Promise<void> {
    await this.appendLines([{ role: '_usage', token_count: tokenCount }]);
    this._tokenCount = tokenCount;
  }

  /**
   * Mark the current position. With `addUserMessage`, a `CHECKPOINT n` notice is appended
   * so the model can refer to it.
   */
  async checkpoint(addUserMessage = false): Promise<number> {
    const id = this.nextCheckpointId;
    await this.appendLines([{ role: '_checkpoint', id }]);
    this.nextCheckpointId = id + 1;
    if (addUserMessage) {
      await this.appendMessage({ role: 'user', content: [systemPart(`CHECKPOINT ${id}`)] });
    }
    return id;
  }

  /** Drop everything from checkpoint `id` on. The old file is kept as a rotation. */
  async revertTo(id: number): Promise<void> {
    if (id < 0 || id >= this.nextCheckpointId) {
      throw new Error(`Checkpoint ${id} does not exist`);
    }
    const rotated = await this.rotate();
    const raw = rotated ? await fs.readFile(rotated, 'utf-8') : '';

    this.reset();
    const kept: string[] = [];
    for (const line of raw.split('\n')) {
      if (!line.trim()) {
        continue;
      }
      let record: ContextRecord | null = null;
      try {
        record = parseRecord(line);
      } catch (error) {
        logger.warn('Dropping unparsable context line while reverting', {
          file: this.file,
          error: toError(error).message,
        });
        continue;
      }
      if (record?.kind === 'checkpoint' && record.id === id) {
        break;
      }
      kept.push(line);
      if (record) {
        this.apply(record);
      }
    }
    await fs.writeFile(this.file, kept.map((line) => `${line}\n`).join(''), 'utf-8');
  }

  /** Start over with an empty history. The old file is kept as a rotation. */
  async clear(): Promise<void> {
    await this.rotate();
    await fs.mkdir(dirname(this.file), { recursive: true });
    await fs.writeFile(this.file, '', 'utf-8');
    this.reset();
  }

  /**
   * Replace the whole history, e.g. with a compaction result. The new file starts with a
   * checkpoint so the replacement counts as content.
   */
  async replace(messages: readonly Message[], tokenCount: number): Promise<void> {
    await this.clear();
    await this.checkpoint();
    await this.appendMessage(...messages);
    await this.updateTokenCount(tokenCount);
  }

  private apply(record: ContextRecord): void {
    switch (record.kind) {
      case 'usage':
        this._tokenCount = record.tokenCount;
        break;
      case 'checkpoint':
        this.nextCheckpointId = record.id + 1;
        break;
      case 'message':
        this._history.push(record.message);
        break;
    }
  }

  private reset(): void {
    this._history = [];
    this._tokenCount = 0;
    this.nextCheckpointId = 0;
  }

  private async rotate(): Promise<string | null> {
    const target = await nextRotationPath(this.file);
    try {
      await fs.rename(this.file, target);
    } catch (error) {
      if (isMissingFileError(error)) {
        await fs.rm(target, { force: true });
        return null;
      }
      throw error;
    }
    logger.debug('Rotated context file', { from: this.file, to: target });
    return target;
  }

  private async appendLines(records: Record<string, unknown>[]): Promise<void> {
    await fs.mkdir(dirname(this.file), { recursive: true });
    const data = records.map((record) => `${JSON.stringify(record)}\n`).join('');
    await fs.appendFile(this.file, data, 'utf-8');
  }
}
