import { join, resolve } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import { Chalk, type ChalkInstance } from 'chalk';
import { createAppContext } from '@/backend/app-context';
import { toErrorMessage } from '@/backend/lib/error-utils';
import type { LLM } from '@/backend/llm/provider';
import { configService } from '@/backend/services/config.service';
import { createLogger } from '@/backend/services/logger.service';
import { MaxStepsReached, RunCancelled } from '@/backend/soul/errors';
import { runSoul } from '@/backend/soul/run-soul';
import type { WireEnvelope } from '@/backend/wire/serde';
import { WireServer } from '@/backend/wire/server';
import { isRequest, QuestionNotSupported } from '@/backend/wire/types';
import { type WireRecord, WireFile } from '@/backend/wire/wire-file';

const logger = createLogger('cli');

export interface SessionOptions {
  workDir?: string;
  session?: string;
  yolo?: boolean;
  /** Overrides the configured model. */
  llm?: LLM | null;
  sessionsDir?: string;
}

export interface CommandIO {
  stdout: Writable;
  stderr: Writable;
  chalk?: ChalkInstance;
}

function openApp(options: SessionOptions) {
  return createAppContext({
    workDir: resolve(options.workDir ?? process.cwd()),
    sessionId: options.session,
    sessionsDir: options.sessionsDir,
    yolo: options.yolo,
    llm: options.llm,
  });
}

// ============================================================================
// wire
// ============================================================================

/** Serve the JSON-RPC protocol on `input`/`output` until `input` ends. */
export async function runWireCommand(
  options: SessionOptions,
  streams: { input: Readable; output: Writable }
): Promise<void> {
  const app = await openApp(options);
  logger.info('Serving wire protocol', { sessionId: app.session.id });
  const server = new WireServer({
    soul: app.soul,
    input: streams.input,
    output: streams.output,
    wireFile: app.session.wireFile,
    version: configService.getVersion(),
  });
  await server.serve();
  await app.session.flush();
}

// ============================================================================
// prompt
// ============================================================================

/**
 * Run a single turn, streaming the assistant's text to stdout. Approvals are rejected
 * unless the session is in yolo mode. Resolves with the process exit code.
 */
export async function runPromptCommand(
  text: string,
  options: SessionOptions,
  io: CommandIO,
  signal?: AbortSignal
): Promise<number> {
  const chalk = io.chalk ?? new Chalk();
  const app = await openApp(options);

  try {
    await runSoul(
      app.soul,
      text,
      async (wire) => {
        for await (const message of wire.attach()) {
          if (message.type === 'ContentPart' && message.payload.type === 'text') {
            io.stdout.write(message.payload.text);
          } else if (message.type === 'QuestionRequest') {
            message.setException(new QuestionNotSupported());
          } else if (isRequest(message)) {
            io.stderr.write(chalk.yellow(`Declined ${message.type} in one-shot mode\n`));
            message.resolveDefault();
          }
        }
      },
      signal,
      app.session.wireFile
    );
    io.stdout.write('\n');
    return 0;
  } catch (error) {
    io.stdout.write('\n');
    if (error instanceof RunCancelled) {
      io.stderr.write(chalk.yellow('Cancelled\n'));
    } else if (error instanceof MaxStepsReached) {
      io.stderr.write(chalk.red(`Stopped after ${error.steps} steps\n`));
    } else {
      logger.error('Prompt failed', error instanceof Error ? error : undefined);
      io.stderr.write(chalk.red(`Error: ${toErrorMessage(error)}\n`));
    }
    return 1;
  } finally {
    await app.session.flush();
  }
}

// ============================================================================
// replay
// ============================================================================

const PREVIEW_LENGTH = 120;

function preview(value: string): string {
  const flat = value.replace(/\s+/g, ' ').trim();
  return flat.length <= PREVIEW_LENGTH ? flat : `${flat.slice(0, PREVIEW_LENGTH - 3)}...`;
}

function summarize(message: WireEnvelope): string {
  const { payload } = message;
  switch (message.type) {
    case 'ContentPart':
      if (typeof payload.text === 'string') {
        return preview(payload.text);
      }
      if (typeof payload.think === 'string') {
        return preview(`(thinking) ${payload.think}`);
      }
      return String(payload.type);
    case 'StepBegin':
      return `step ${String(payload.n)}`;
    case 'TurnEnd':
    case 'StepInterrupted':
    case 'CompactionBegin':
    case 'CompactionEnd':
      return '';
    default:
      return preview(JSON.stringify(payload));
  }
}

function typeColor(type: string, chalk: ChalkInstance): ChalkInstance {
  if (type.endsWith('Request')) {
    return chalk.magenta;
  }
  if (type.startsWith('Turn')) {
    return chalk.green;
  }
  return chalk.cyan;
}

/** One colored line per record: time, message type, short summary. */
export function formatWireRecord(record: WireRecord, chalk: ChalkInstance): string {
  const time = new Date(record.timestamp * 1000).toISOString().slice(11, 23);
  const { type } = record.message;
  const summary = summarize(record.message);
  return `${chalk.gray(time)} ${typeColor(type, chalk)(type)}${summary ? ` ${summary}` : ''}`;
}

/** Print the wire log of a session directory. Resolves with the process exit code. */
export async function runReplayCommand(sessionDir: string, io: CommandIO): Promise<number> {
  const chalk = io.chalk ?? new Chalk();
  const log = await new WireFile(join(sessionDir, 'wire.jsonl')).read();
  if (log.protocolVersion === null && log.records.length === 0) {
    io.stderr.write(chalk.red(`No wire log found in ${sessionDir}\n`));
    return 1;
  }
  for (const record of log.records) {
    io.stdout.write(`${formatWireRecord(record, chalk)}\n`);
  }
  return 0;
}
