import { createHash, randomUUID } from 'node:crypto';
import * as fs from 'node:fs/promises';
import { join, resolve } from 'node:path';
import pLimit from 'p-limit';
import { toError } from '../lib/error-utils';
import { isDirectory } from '../lib/file-helpers';
import { extractText, toContentParts } from '../llm/message';
import { configService } from '../services/config.service';
import { createLogger } from '../services/logger.service';
import { WireFile } from '../wire/wire-file';
import {
  loadSessionState,
  STATE_FILE_NAME,
  type SessionState,
  saveSessionState,
} from './session-state';

const logger = createLogger('session');

const TITLE_MAX_LENGTH = 50;

export interface SessionLocation {
  /** Root holding one directory per working directory. Defaults to the configured one. */
  sessionsDir?: string;
}

/** Directory holding every session of `workDir`. */
export function workDirSessionsDir(workDir: string, sessionsDir?: string): string {
  const digest = createHash('md5').update(resolve(workDir)).digest('hex');
  return join(sessionsDir ?? configService.getSessionsDir(), digest);
}

function shorten(text: string, width: number): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length <= width ? flat : `${flat.slice(0, width - 3)}...`;
}

/**
 * One conversation in a working directory: `context.jsonl`, `wire.jsonl` and `state.json`
 * under `<sessionsDir>/<md5(workDir)>/<id>`.
 */
export class Session {
  readonly contextFile: string;
  readonly wireFile: WireFile;
  readonly stateFile: string;

  private readonly writer = pLimit(1);

  private constructor(
    readonly id: string,
    readonly workDir: string,
    readonly dir: string,
    public state: SessionState
  ) {
    this.contextFile = join(dir, 'context.jsonl');
    this.wireFile = new WireFile(join(dir, 'wire.jsonl'));
    this.stateFile = join(dir, STATE_FILE_NAME);
  }

  /** Create a session, or open it when `id` already exists. */
  static async create(
    workDir: string,
    options: SessionLocation & { id?: string } = {}
  ): Promise<Session> {
    const absWorkDir = resolve(workDir);
    const id = options.id ?? randomUUID();
    const dir = join(workDirSessionsDir(absWorkDir, options.sessionsDir), id);
    await fs.mkdir(dir, { recursive: true });
    const state = await loadSessionState(join(dir, STATE_FILE_NAME));
    const session = new Session(id, absWorkDir, dir, state);
    logger.debug('Session ready', { sessionId: id, workDir: absWorkDir, dir });
    return session;
  }

  /** Open an existing session, or null when `id` has no directory. */
  static async find(
    workDir: string,
    id: string,
    options: SessionLocation = {}
  ): Promise<Session | null> {
    const absWorkDir = resolve(workDir);
    const dir = join(workDirSessionsDir(absWorkDir, options.sessionsDir), id);
    if (!(await isDirectory(dir))) {
      logger.debug('Session not found', { sessionId: id, workDir: absWorkDir });
      return null;
    }
    return new Session(id, absWorkDir, dir, await loadSessionState(join(dir, STATE_FILE_NAME)));
  }

  /** Persist `state`. Writes are serialized so the last call wins on disk. */
  saveState(): Promise<void> {
    const snapshot = structuredClone(this.state);
    return this.writer(() => saveSessionState(this.stateFile, snapshot));
  }

  /** Persist `state` without waiting; failures are logged. */
  scheduleSave(): void {
    this.saveState().catch((error: unknown) => {
      logger.error('Failed to save session state', toError(error), {
        sessionId: this.id,
        file: this.stateFile,
      });
    });
  }

  /** Resolves once every scheduled state write has finished. */
  async flush(): Promise<void> {
    await this.writer(() => Promise.resolve());
  }

  /** Title from the first user input in the wire log. */
  async title(): Promise<string> {
    for (const message of await this.wireFile.readMessages()) {
      if (message.type === 'TurnBegin') {
        const text = extractText({ content: toContentParts(message.payload.user_input) }, ' ');
        return `${shorten(text, TITLE_MAX_LENGTH)} (${this.id})`;
      }
    }
    return `Untitled (${this.id})`;
  }
}
