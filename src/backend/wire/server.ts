import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import pLimit from 'p-limit';
import type { z } from 'zod';
import { isRecord, toError } from '../lib/error-utils';
import { ChatProviderError } from '../llm/errors';
import type { UserInput } from '../llm/message';
import { toolError } from '../llm/tooling';
import { createLogger } from '../services/logger.service';
import {
  LLMNotSet,
  LLMNotSupported,
  MaxStepsReached,
  NoActiveTurnError,
  RunCancelled,
  TurnInProgressError,
} from '../soul/errors';
import { runSoul } from '../soul/run-soul';
import type { Soul } from '../soul/soul';
import { ExternalTool } from '../soul/toolset';
import {
  ApprovalAnswerSchema,
  ErrorCodes,
  errorResponse,
  InitializeParamsSchema,
  type JsonRpcErrorObject,
  JsonRpcError,
  type JsonRpcId,
  type JsonRpcRequest,
  JsonRpcRequestSchema,
  type JsonRpcResponse,
  JsonRpcResponseSchema,
  notification,
  PromptParamsSchema,
  QuestionAnswerSchema,
  request,
  successResponse,
  ToolCallAnswerSchema,
} from './jsonrpc';
import { serializeWireMessage } from './serde';
import {
  isRequest,
  QuestionNotSupported,
  type WireMessage,
  type WireMessageType,
  type WireRequestMessage,
} from './types';
import type { Wire } from './wire';
import { WIRE_PROTOCOL_VERSION, type WireFile } from './wire-file';

const logger = createLogger('wire-server');

export const SERVER_NAME = 'loom';

export interface WireServerOptions {
  soul: Soul;
  input: Readable;
  output: Writable;
  /** The session's wire log: turns are recorded to it and `replay` reads it. */
  wireFile?: WireFile;
  version: string;
}

export type PromptStatus =
  | { status: 'finished' }
  | { status: 'cancelled' }
  | { status: 'max_steps_reached'; steps: number };

const REQUEST_TYPES: ReadonlySet<string> = new Set<WireMessageType>([
  'ApprovalRequest',
  'QuestionRequest',
  'ToolCallRequest',
]);

function invalidParams(method: string): JsonRpcError {
  return new JsonRpcError({
    code: ErrorCodes.INVALID_PARAMS,
    message: `Invalid parameters for method \`${method}\``,
  });
}

function parseParams<TSchema extends z.ZodTypeAny>(
  method: string,
  schema: TSchema,
  params: unknown
): z.output<TSchema> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw invalidParams(method);
  }
  return parsed.data;
}

function toErrorObject(error: unknown): JsonRpcErrorObject {
  if (error instanceof JsonRpcError) {
    return error.toObject();
  }
  if (error instanceof TurnInProgressError || error instanceof NoActiveTurnError) {
    return { code: ErrorCodes.INVALID_STATE, message: error.message };
  }
  if (error instanceof LLMNotSet) {
    return { code: ErrorCodes.LLM_NOT_SET, message: error.message };
  }
  if (error instanceof LLMNotSupported) {
    return {
      code: ErrorCodes.LLM_NOT_SUPPORTED,
      message: error.message,
      data: { model: error.modelName, capabilities: error.capabilities },
    };
  }
  if (error instanceof ChatProviderError) {
    return { code: ErrorCodes.CHAT_PROVIDER_ERROR, message: error.message };
  }
  logger.error('Unhandled error in wire request', toError(error));
  return { code: ErrorCodes.INTERNAL_ERROR, message: toError(error).message };
}

/** Answer a request whose client went away. */
function resolveDisconnected(pending: WireRequestMessage): void {
  switch (pending.type) {
    case 'ApprovalRequest':
      pending.resolve('reject');
      break;
    case 'QuestionRequest':
      pending.resolve({});
      break;
    case 'ToolCallRequest':
      pending.resolve(
        toolError({
          message: 'Wire connection closed before tool result was received.',
          brief: 'Wire closed',
        })
      );
      break;
  }
}

interface ActiveTurn {
  controller: AbortController;
}

/**
 * JSON-RPC 2.0 over newline-delimited JSON. Clients drive turns with `prompt`, `steer` and
 * `cancel`; the server streams wire events as `event` notifications and forwards wire
 * requests as `request` calls whose answers resolve them.
 */
export class WireServer {
  private readonly soul: Soul;
  private readonly input: Readable;
  private readonly output: Writable;
  private readonly wireFile: WireFile | undefined;
  private readonly version: string;

  private readonly writer = pLimit(1);
  private readonly pending = new Map<string, WireRequestMessage>();
  private readonly inflight = new Set<Promise<void>>();
  private turn: ActiveTurn | null = null;
  private supportsQuestion = false;
  private closing = false;

  constructor(options: WireServerOptions) {
    this.soul = options.soul;
    this.input = options.input;
    this.output = options.output;
    this.wireFile = options.wireFile;
    this.version = options.version;
  }

  /** Serve until the input stream ends. Resolves once everything is answered and written. */
  async serve(): Promise<void> {
    const lineReader = createInterface({
      input: this.input,
      crlfDelay: Number.POSITIVE_INFINITY,
    });
    const closed = new Promise<void>((resolve) => lineReader.once('close', resolve));
    lineReader.on('line', (line) => this.handleLine(line));

    await closed;
    logger.info('Input closed, wire server exiting');
    await this.shutdown();
  }

  private async shutdown(): Promise<void> {
    this.closing = true;
    for (const pending of this.pending.values()) {
      resolveDisconnected(pending);
    }
    this.pending.clear();
    this.turn?.controller.abort();
    await Promise.all([...this.inflight]);
    await this.drain();
  }

  // ===========================================================================
  // Inbound
  // ===========================================================================

  private handleLine(line: string): void {
    if (!line.trim()) {
      return;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(line);
    } catch {
      logger.warn('Invalid JSON line', { line });
      this.write(
        errorResponse(null, { code: ErrorCodes.PARSE_ERROR, message: 'Invalid JSON format' })
      );
      return;
    }

    if (isRecord(parsed) && !Object.hasOwn(parsed, 'method') && Object.hasOwn(parsed, 'id')) {
      const response = JsonRpcResponseSchema.safeParse(parsed);
      if (!response.success) {
        logger.warn('Invalid JSON-RPC response', { payload: parsed });
        this.write(
          errorResponse(null, { code: ErrorCodes.INVALID_REQUEST, message: 'Invalid response' })
        );
        return;
      }
      this.handleResponse(response.data);
      return;
    }

    const message = JsonRpcRequestSchema.safeParse(parsed);
    if (!message.success) {
      logger.warn('Invalid JSON-RPC message', { payload: parsed });
      this.write(
        errorResponse(null, { code: ErrorCodes.INVALID_REQUEST, message: 'Invalid request' })
      );
      return;
    }
    this.handleRequest(message.data);
  }

  private handleRequest(message: JsonRpcRequest): void {
    const { id } = message;
    const task = this.dispatch(message).then(
      (result) => {
        if (id !== undefined) {
          this.write(successResponse(id, result));
        }
      },
      (error: unknown) => {
        if (id !== undefined) {
          this.write(errorResponse(id, toErrorObject(error)));
        }
      }
    );
    this.inflight.add(task);
    void task.finally(() => this.inflight.delete(task));
  }

  private async dispatch(message: JsonRpcRequest): Promise<unknown> {
    switch (message.method) {
      case 'initialize':
        return this.initialize(message.params);
      case 'prompt':
        return await this.prompt(
          parseParams('prompt', PromptParamsSchema, message.params).user_input
        );
      case 'steer':
        return this.steer(parseParams('steer', PromptParamsSchema, message.params).user_input);
      case 'cancel':
        return this.cancel();
      case 'replay':
        return await this.replay();
      default:
        throw new JsonRpcError({
          code: ErrorCodes.METHOD_NOT_FOUND,
          message: `Unexpected method received: ${message.method}`,
        });
    }
  }

  private handleResponse(response: JsonRpcResponse): void {
    const id = String(response.id);
    const pending = this.pending.get(id);
    if (!pending) {
      logger.warn('No pending request for response', { id });
      return;
    }
    this.pending.delete(id);

    switch (pending.type) {
      case 'ApprovalRequest': {
        const answer = ApprovalAnswerSchema.safeParse(response.result);
        if (response.error || !answer.success) {
          pending.resolve('reject');
          return;
        }
        pending.resolve(answer.data.response);
        return;
      }
      case 'QuestionRequest': {
        const answer = QuestionAnswerSchema.safeParse(response.result);
        if (response.error || !answer.success) {
          pending.resolve({});
          return;
        }
        pending.resolve(answer.data.answers);
        return;
      }
      case 'ToolCallRequest': {
        if (response.error) {
          pending.resolve(
            toolError({ message: response.error.message, brief: 'External tool error' })
          );
          return;
        }
        const answer = ToolCallAnswerSchema.safeParse(response.result);
        if (!answer.success) {
          logger.warn('Invalid tool result from client', { id });
          pending.resolve(
            toolError({
              message: 'Invalid tool result payload from client.',
              brief: 'Invalid tool result',
            })
          );
          return;
        }
        if (answer.data.tool_call_id !== pending.payload.id) {
          logger.warn('Tool result id mismatch', {
            request: pending.payload.id,
            result: answer.data.tool_call_id,
          });
        }
        pending.resolve(answer.data.return_value);
        return;
      }
    }
  }

  // ===========================================================================
  // Methods
  // ===========================================================================

  private initialize(params: unknown): Record<string, unknown> {
    if (this.turn) {
      throw new TurnInProgressError();
    }
    const parsed = parseParams('initialize', InitializeParamsSchema, params);
    this.supportsQuestion = parsed.capabilities?.supports_question ?? false;

    const accepted: string[] = [];
    const rejected: Array<{ name: string; reason: string }> = [];
    const toolset = this.soul.agent.toolset;
    for (const tool of parsed.external_tools ?? []) {
      if (toolset.isBuiltin(tool.name)) {
        rejected.push({ name: tool.name, reason: 'conflicts with builtin tool' });
        continue;
      }
      toolset.addExternal(new ExternalTool(tool.name, tool.description, tool.parameters));
      accepted.push(tool.name);
    }
    logger.info('Client initialized', {
      client: parsed.client?.name,
      supportsQuestion: this.supportsQuestion,
      externalTools: accepted.length,
    });

    return {
      protocol_version: WIRE_PROTOCOL_VERSION,
      server: { name: SERVER_NAME, version: this.version },
      slash_commands: this.soul.availableSlashCommands.map((command) => ({
        name: command.name,
        description: command.description,
        aliases: command.aliases,
      })),
      capabilities: { supports_question: true },
      ...(accepted.length > 0 || rejected.length > 0
        ? { external_tools: { accepted, rejected } }
        : {}),
    };
  }

  private async prompt(userInput: UserInput): Promise<PromptStatus> {
    if (this.turn || this.soul.isRunning) {
      throw new TurnInProgressError();
    }
    const turn: ActiveTurn = { controller: new AbortController() };
    this.turn = turn;
    try {
      await runSoul(
        this.soul,
        userInput,
        (wire) => this.forward(wire),
        turn.controller.signal,
        this.wireFile
      );
      return { status: 'finished' };
    } catch (error) {
      if (error instanceof RunCancelled) {
        return { status: 'cancelled' };
      }
      if (error instanceof MaxStepsReached) {
        return { status: 'max_steps_reached', steps: error.steps };
      }
      throw error;
    } finally {
      this.turn = null;
    }
  }

  private steer(userInput: UserInput): { status: 'steered' } {
    if (!this.turn) {
      throw new NoActiveTurnError();
    }
    this.soul.steer(userInput);
    return { status: 'steered' };
  }

  private cancel(): Record<string, never> {
    if (!this.turn) {
      throw new NoActiveTurnError();
    }
    this.turn.controller.abort();
    return {};
  }

  private async replay(): Promise<{ status: 'finished'; events: number; requests: number }> {
    if (this.turn) {
      throw new TurnInProgressError();
    }
    let events = 0;
    let requests = 0;
    const log = this.wireFile ? await this.wireFile.read() : { records: [] };
    for (const { message } of log.records) {
      const requestId = message.payload.id;
      if (REQUEST_TYPES.has(message.type) && typeof requestId === 'string') {
        // Historical copy: answers to it are not expected.
        this.write(request(requestId, 'request', message));
        requests += 1;
      } else {
        this.write(notification('event', message));
        events += 1;
      }
    }
    return { status: 'finished', events, requests };
  }

  // ===========================================================================
  // Outbound
  // ===========================================================================

  /** UI loop of a turn: relays everything on the wire to the client. */
  private async forward(wire: Wire): Promise<void> {
    for await (const message of wire.attach()) {
      this.send(message);
    }
  }

  private send(message: WireMessage): void {
    if (!isRequest(message)) {
      this.write(notification('event', serializeWireMessage(message)));
      return;
    }
    if (message.type === 'QuestionRequest' && !this.supportsQuestion) {
      message.setException(new QuestionNotSupported());
      return;
    }
    if (this.closing) {
      resolveDisconnected(message);
      return;
    }
    const id: JsonRpcId = message.payload.id;
    this.pending.set(id, message);
    const forget = () => {
      if (this.pending.get(id) === message) {
        this.pending.delete(id);
      }
    };
    message.wait().then(forget, forget);
    this.write(request(id, 'request', serializeWireMessage(message)));
  }

  private write(payload: Record<string, unknown>): void {
    const line = `${JSON.stringify(payload)}\n`;
    this.writer(
      () =>
        new Promise<void>((resolve, reject) => {
          this.output.write(line, (error) => (error ? reject(error) : resolve()));
        })
    ).catch((error: unknown) => {
      logger.error('Failed to write to client', toError(error));
    });
  }

  private async drain(): Promise<void> {
    await this.writer(() => Promise.resolve());
  }
}
