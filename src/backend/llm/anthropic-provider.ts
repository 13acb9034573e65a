import Anthropic from '@anthropic-ai/sdk';
import { createLogger } from '../services/logger.service';
import {
  APIConnectionError,
  APIStatusError,
  APITimeoutError,
  ChatProviderError,
} from './errors';
import type { ContentPart, Message, TokenUsage, ToolCall } from './message';
import type { ChatProvider, StreamedMessage, StreamedMessagePart } from './provider';
import type { ToolDefinition } from './tooling';

const logger = createLogger('anthropic-provider');

/** The slice of the SDK client the provider uses. */
export interface AnthropicMessagesClient {
  create(
    params: Anthropic.MessageCreateParamsStreaming,
    options?: { signal?: AbortSignal }
  ): Promise<AsyncIterable<Anthropic.RawMessageStreamEvent>>;
}

export interface AnthropicProviderOptions {
  model: string;
  maxOutputTokens: number;
  apiKey?: string;
  baseURL?: string;
  /** Enables extended thinking with this token budget. */
  thinkingBudget?: number;
  createClient?: (options: { apiKey?: string; baseURL?: string }) => AnthropicMessagesClient;
}

type ImageMediaType = 'image/jpeg' | 'image/png' | 'image/gif' | 'image/webp';

const IMAGE_MEDIA_TYPES: readonly ImageMediaType[] = [
  'image/jpeg',
  'image/png',
  'image/gif',
  'image/webp',
];

const DATA_URL_PATTERN = /^data:([^;,]+);base64,(.*)$/s;

function isImageMediaType(value: string): value is ImageMediaType {
  return IMAGE_MEDIA_TYPES.some((type) => type === value);
}

function imageBlock(url: string): Anthropic.ImageBlockParam | Anthropic.TextBlockParam {
  const match = DATA_URL_PATTERN.exec(url);
  const mediaType = match?.[1];
  const data = match?.[2];
  if (mediaType && data !== undefined && isImageMediaType(mediaType)) {
    return { type: 'image', source: { type: 'base64', media_type: mediaType, data } };
  }
  return { type: 'text', text: `[image: ${url}]` };
}

function userBlocks(parts: readonly ContentPart[]): Anthropic.ContentBlockParam[] {
  const blocks: Anthropic.ContentBlockParam[] = [];
  for (const part of parts) {
    switch (part.type) {
      case 'text':
        if (part.text) {
          blocks.push({ type: 'text', text: part.text });
        }
        break;
      case 'image_url':
        blocks.push(imageBlock(part.image_url.url));
        break;
      case 'audio_url':
        blocks.push({ type: 'text', text: `[audio: ${part.audio_url.url}]` });
        break;
      case 'think':
        break;
    }
  }
  return blocks;
}

function parseToolInput(toolCall: ToolCall): unknown {
  const raw = toolCall.function.arguments;
  if (!raw?.trim()) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    logger.warn('Sending unparsable tool arguments as an empty object', {
      toolCallId: toolCall.id,
    });
    return {};
  }
}

function assistantBlocks(message: Message): Anthropic.ContentBlockParam[] {
  const blocks: Anthropic.ContentBlockParam[] = [];
  for (const part of message.content) {
    if (part.type === 'think') {
      // Thinking without its signature cannot be sent back.
      if (part.encrypted && part.think) {
        blocks.push({ type: 'thinking', thinking: part.think, signature: part.encrypted });
      } else if (part.encrypted) {
        blocks.push({ type: 'redacted_thinking', data: part.encrypted });
      }
    } else if (part.type === 'text') {
      if (part.text) {
        blocks.push({ type: 'text', text: part.text });
      }
    }
  }
  for (const toolCall of message.tool_calls ?? []) {
    blocks.push({
      type: 'tool_use',
      id: toolCall.id,
      name: toolCall.function.name,
      input: parseToolInput(toolCall),
    });
  }
  return blocks;
}

function toolResultBlock(message: Message): Anthropic.ToolResultBlockParam {
  const content: Array<Anthropic.TextBlockParam | Anthropic.ImageBlockParam> = [];
  for (const block of userBlocks(message.content)) {
    if (block.type === 'text' || block.type === 'image') {
      content.push(block);
    }
  }
  return { type: 'tool_result', tool_use_id: message.tool_call_id ?? '', content };
}

function messageBlocks(message: Message): Anthropic.ContentBlockParam[] {
  switch (message.role) {
    case 'assistant':
      return assistantBlocks(message);
    case 'tool':
      return [toolResultBlock(message)];
    case 'user':
    case 'system':
      return userBlocks(message.content);
  }
}

/**
 * Messages API history. Tool results become user turns; consecutive turns of the same role
 * are merged since the API expects roles to alternate.
 */
export function toAnthropicMessages(history: readonly Message[]): Anthropic.MessageParam[] {
  const params: Array<{ role: 'user' | 'assistant'; content: Anthropic.ContentBlockParam[] }> =
    [];
  for (const message of history) {
    const role = message.role === 'assistant' ? 'assistant' : 'user';
    const blocks = messageBlocks(message);
    if (blocks.length === 0) {
      continue;
    }
    const previous = params.at(-1);
    if (previous?.role === role) {
      previous.content.push(...blocks);
    } else {
      params.push({ role, content: blocks });
    }
  }
  return params;
}

export function toAnthropicTools(tools: readonly ToolDefinition[]): Anthropic.Tool[] {
  return tools.map((tool) => ({
    name: tool.name,
    description: tool.description,
    input_schema: { ...tool.parameters, type: 'object' },
  }));
}

/** Map SDK failures onto the provider error taxonomy. Aborts pass through unchanged. */
export function convertAnthropicError(error: unknown): unknown {
  if (error instanceof Anthropic.APIUserAbortError || error instanceof ChatProviderError) {
    return error;
  }
  if (error instanceof Anthropic.APIConnectionTimeoutError) {
    return new APITimeoutError(error.message, { cause: error });
  }
  if (error instanceof Anthropic.APIConnectionError) {
    return new APIConnectionError(error.message, { cause: error });
  }
  if (error instanceof Anthropic.APIError && typeof error.status === 'number') {
    return new APIStatusError(error.status, error.message, { cause: error });
  }
  return error;
}

function usageOf(usage: Anthropic.Usage): TokenUsage {
  return {
    input_other: usage.input_tokens,
    output: usage.output_tokens,
    input_cache_read: usage.cache_read_input_tokens ?? 0,
    input_cache_creation: usage.cache_creation_input_tokens ?? 0,
  };
}

function startPart(block: Anthropic.ContentBlock): StreamedMessagePart | null {
  switch (block.type) {
    case 'text':
      return block.text ? { type: 'text', text: block.text } : null;
    case 'thinking':
      return { type: 'think', think: block.thinking };
    case 'redacted_thinking':
      return { type: 'think', think: '', encrypted: block.data };
    case 'tool_use':
      return {
        type: 'function',
        id: block.id,
        function: { name: block.name, arguments: null },
        extras: null,
      };
    default:
      return null;
  }
}

function deltaPart(
  delta: Anthropic.RawContentBlockDeltaEvent['delta']
): StreamedMessagePart | null {
  switch (delta.type) {
    case 'text_delta':
      return { type: 'text', text: delta.text };
    case 'thinking_delta':
      return { type: 'think', think: delta.thinking };
    case 'signature_delta':
      return { type: 'think', think: '', encrypted: delta.signature };
    case 'input_json_delta':
      return { arguments_part: delta.partial_json };
    default:
      return null;
  }
}

class AnthropicStreamedMessage implements StreamedMessage {
  id: string | null = null;
  usage: TokenUsage | null = null;

  constructor(private readonly events: AsyncIterable<Anthropic.RawMessageStreamEvent>) {}

  async *[Symbol.asyncIterator](): AsyncIterator<StreamedMessagePart> {
    try {
      for await (const event of this.events) {
        const part = this.handle(event);
        if (part) {
          yield part;
        }
      }
    } catch (error) {
      throw convertAnthropicError(error);
    }
  }

  private handle(event: Anthropic.RawMessageStreamEvent): StreamedMessagePart | null {
    switch (event.type) {
      case 'message_start':
        this.id = event.message.id;
        this.usage = usageOf(event.message.usage);
        return null;
      case 'message_delta':
        if (this.usage) {
          this.usage = { ...this.usage, output: event.usage.output_tokens };
        }
        return null;
      case 'content_block_start':
        return startPart(event.content_block);
      case 'content_block_delta':
        return deltaPart(event.delta);
      case 'content_block_stop':
      case 'message_stop':
        return null;
    }
  }
}

/** ChatProvider over the Anthropic Messages API with streaming. */
export class AnthropicChatProvider implements ChatProvider {
  readonly name = 'anthropic';
  readonly modelName: string;

  private client: AnthropicMessagesClient;

  constructor(private readonly options: AnthropicProviderOptions) {
    this.modelName = options.model;
    this.client = this.createClient();
  }

  async generate(
    systemPrompt: string,
    tools: readonly ToolDefinition[],
    history: readonly Message[],
    signal?: AbortSignal
  ): Promise<StreamedMessage> {
    const params: Anthropic.MessageCreateParamsStreaming = {
      model: this.modelName,
      max_tokens: this.options.maxOutputTokens,
      messages: toAnthropicMessages(history),
      stream: true,
    };
    if (systemPrompt) {
      params.system = systemPrompt;
    }
    if (tools.length > 0) {
      params.tools = toAnthropicTools(tools);
    }
    if (this.options.thinkingBudget) {
      params.thinking = { type: 'enabled', budget_tokens: this.options.thinkingBudget };
    }

    try {
      const events = await this.client.create(params, { signal });
      return new AnthropicStreamedMessage(events);
    } catch (error) {
      throw convertAnthropicError(error);
    }
  }

  onRetryableError(error: Error): boolean {
    logger.warn('Rebuilding Anthropic client after connection error', {
      model: this.modelName,
      error: error.message,
    });
    this.client = this.createClient();
    return true;
  }

  private createClient(): AnthropicMessagesClient {
    const clientOptions = { apiKey: this.options.apiKey, baseURL: this.options.baseURL };
    if (this.options.createClient) {
      return this.options.createClient(clientOptions);
    }
    return new Anthropic(clientOptions).messages;
  }
}
