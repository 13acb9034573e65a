import type { ContentPart, Message, TokenUsage, ToolCall, ToolCallPart } from './message';
import type { ToolDefinition } from './tooling';

export type StreamedMessagePart = ContentPart | ToolCall | ToolCallPart;

/**
 * One assistant response as it streams in. `id` and `usage` are filled in while the
 * stream is consumed and are final once iteration completes.
 */
export interface StreamedMessage extends AsyncIterable<StreamedMessagePart> {
  readonly id: string | null;
  readonly usage: TokenUsage | null;
}

export interface ChatProvider {
  readonly name: string;
  readonly modelName: string;

  generate(
    systemPrompt: string,
    tools: readonly ToolDefinition[],
    history: readonly Message[],
    signal?: AbortSignal
  ): Promise<StreamedMessage>;

  /**
   * Rebuild the transport after a connection error. Resolves true when the provider
   * believes a retry can succeed.
   */
  onRetryableError?(error: Error): boolean | Promise<boolean>;
}

export type ModelCapability = 'image_in' | 'audio_in' | 'thinking';

export interface LLM {
  readonly provider: ChatProvider;
  readonly maxContextSize: number;
  readonly capabilities: ReadonlySet<ModelCapability>;
}

export function createLLM(
  provider: ChatProvider,
  options: { maxContextSize: number; capabilities?: readonly ModelCapability[] }
): LLM {
  return {
    provider,
    maxContextSize: options.maxContextSize,
    capabilities: new Set(options.capabilities ?? []),
  };
}

export function isToolCall(part: StreamedMessagePart): part is ToolCall {
  return 'type' in part && part.type === 'function';
}

export function isToolCallPart(part: StreamedMessagePart): part is ToolCallPart {
  return 'arguments_part' in part;
}
