import * as fs from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { toError } from '../lib/error-utils';
import { isMissingFileError } from '../lib/file-helpers';
import { createLogger } from '../services/logger.service';
import { deserializeWireMessage, serializeWireMessage, type WireEnvelope } from './serde';
import type { WireMessage } from './types';

const logger = createLogger('wire-file');

export const WIRE_PROTOCOL_VERSION = '1.1';

const MetadataRecordSchema = z.object({
  type: z.literal('metadata'),
  protocol_version: z.string(),
});

const MessageRecordSchema = z.object({
  timestamp: z.number(),
  message: z.object({
    type: z.string(),
    payload: z.record(z.string(), z.unknown()).default({}),
  }),
});

export interface WireRecord {
  timestamp: number;
  message: WireEnvelope;
}

export interface WireLog {
  /** `null` when the file has no metadata header (or does not exist). */
  protocolVersion: string | null;
  records: WireRecord[];
}

/**
 * Append-only `wire.jsonl`: a metadata header line followed by one
 * `{timestamp, message}` record per line.
 */
export class WireFile {
  private headerChecked = false;

  constructor(readonly path: string) {}

  async read(): Promise<WireLog> {
    let raw: string;
    try {
      raw = await fs.readFile(this.path, 'utf-8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return { protocolVersion: null, records: [] };
      }
      throw error;
    }

    let protocolVersion: string | null = null;
    const records: WireRecord[] = [];
    const lines = raw.split('\n');
    for (const [index, line] of lines.entries()) {
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }
      let parsed: unknown;
      try {
        parsed = JSON.parse(trimmed);
      } catch (error) {
        logger.warn('Skipping unparsable wire log line', {
          path: this.path,
          line: index + 1,
          error: toError(error).message,
        });
        continue;
      }
      const metadata = MetadataRecordSchema.safeParse(parsed);
      if (metadata.success) {
        protocolVersion = metadata.data.protocol_version;
        continue;
      }
      const record = MessageRecordSchema.safeParse(parsed);
      if (!record.success) {
        logger.warn('Skipping invalid wire log record', { path: this.path, line: index + 1 });
        continue;
      }
      records.push(record.data);
    }
    return { protocolVersion, records };
  }

  /** Every persisted message in order; records that no longer deserialize are skipped. */
  async readMessages(): Promise<WireMessage[]> {
    const { records } = await this.read();
    const messages: WireMessage[] = [];
    for (const record of records) {
      try {
        messages.push(deserializeWireMessage(record.message));
      } catch (error) {
        logger.warn('Skipping undecodable wire log message', {
          path: this.path,
          type: record.message.type,
          error: toError(error).message,
        });
      }
    }
    return messages;
  }

  async append(message: WireMessage, timestamp = Date.now() / 1000): Promise<void> {
    await this.ensureHeader();
    const record: WireRecord = { timestamp, message: serializeWireMessage(message) };
    await fs.appendFile(this.path, `${JSON.stringify(record)}\n`, 'utf-8');
  }

  private async ensureHeader(): Promise<void> {
    if (this.headerChecked) {
      return;
    }
    await fs.mkdir(dirname(this.path), { recursive: true });
    let size = 0;
    try {
      size = (await fs.stat(this.path)).size;
    } catch (error) {
      if (!isMissingFileError(error)) {
        throw error;
      }
    }
    if (size === 0) {
      const header = { type: 'metadata', protocol_version: WIRE_PROTOCOL_VERSION };
      await fs.writeFile(this.path, `${JSON.stringify(header)}\n`, 'utf-8');
    }
    this.headerChecked = true;
  }
}
