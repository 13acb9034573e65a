import { toErrorMessage } from '../lib/error-utils';
import { APIEmptyResponseError } from './errors';
import {
  type ContentPart,
  type Message,
  mergeContentPart,
  type TokenUsage,
  type ToolCall,
} from './message';
import {
  type ChatProvider,
  isToolCall,
  isToolCallPart,
  type StreamedMessagePart,
} from './provider';
import { type ToolDefinition, type ToolResult, toolRuntimeError } from './tooling';

export interface GenerateResult {
  id: string | null;
  message: Message;
  usage: TokenUsage | null;
}

export interface GenerateOptions {
  onMessagePart?: (part: StreamedMessagePart) => void;
  signal?: AbortSignal;
}

/**
 * Call the provider and fold the stream into one assistant message. Adjacent text and
 * think deltas are merged; argument fragments are appended to the tool call before them.
 */
export async function generate(
  provider: ChatProvider,
  systemPrompt: string,
  tools: readonly ToolDefinition[],
  history: readonly Message[],
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const stream = await provider.generate(systemPrompt, tools, history, options.signal);
  const content: ContentPart[] = [];
  const toolCalls: ToolCall[] = [];

  for await (const part of stream) {
    options.signal?.throwIfAborted();
    options.onMessagePart?.(part);

    if (isToolCall(part)) {
      toolCalls.push({ ...part, function: { ...part.function } });
      continue;
    }
    if (isToolCallPart(part)) {
      const current = toolCalls.at(-1);
      if (current && part.arguments_part) {
        current.function.arguments = (current.function.arguments ?? '') + part.arguments_part;
      }
      continue;
    }
    const previous = content.at(-1);
    if (previous && mergeContentPart(previous, part)) {
      continue;
    }
    content.push({ ...part });
  }

  if (content.length === 0 && toolCalls.length === 0) {
    throw new APIEmptyResponseError();
  }

  const message: Message = { role: 'assistant', content };
  if (toolCalls.length > 0) {
    message.tool_calls = toolCalls;
  }
  return { id: stream.id, message, usage: stream.usage };
}

export interface ToolDispatcher {
  readonly tools: readonly ToolDefinition[];
  handle(toolCall: ToolCall): ToolResult | Promise<ToolResult>;
}

export interface StepCallbacks extends Pick<GenerateOptions, 'onMessagePart'> {
  onToolResult?: (result: ToolResult) => void;
}

export class StepResult {
  constructor(
    readonly id: string | null,
    readonly message: Message,
    readonly usage: TokenUsage | null,
    readonly toolCalls: readonly ToolCall[],
    private readonly results: readonly Promise<ToolResult>[],
    private readonly settled: ReadonlyMap<number, ToolResult>
  ) {}

  /** Resolves once every dispatched tool call has produced its result, in call order. */
  toolResults(): Promise<ToolResult[]> {
    return Promise.all(this.results);
  }

  /** Results that arrived so far, in call order; null where the call is still running. */
  settledToolResults(): Array<ToolResult | null> {
    return this.toolCalls.map((_, index) => this.settled.get(index) ?? null);
  }
}

/**
 * One step: generate, then dispatch every tool call of the completed message. Tool calls
 * run concurrently; `onToolResult` fires as each one completes.
 */
export async function step(
  provider: ChatProvider,
  systemPrompt: string,
  toolset: ToolDispatcher,
  history: readonly Message[],
  callbacks: StepCallbacks = {},
  signal?: AbortSignal
): Promise<StepResult> {
  const generated = await generate(provider, systemPrompt, toolset.tools, history, {
    onMessagePart: callbacks.onMessagePart,
    signal,
  });
  const toolCalls = generated.message.tool_calls ?? [];
  const settled = new Map<number, ToolResult>();

  const results = toolCalls.map(async (toolCall, index) => {
    let result: ToolResult;
    try {
      result = await toolset.handle(toolCall);
    } catch (error) {
      result = { tool_call_id: toolCall.id, return_value: toolRuntimeError(toErrorMessage(error)) };
    }
    settled.set(index, result);
    callbacks.onToolResult?.(result);
    return result;
  });

  return new StepResult(
    generated.id,
    generated.message,
    generated.usage,
    toolCalls,
    results,
    settled
  );
}
