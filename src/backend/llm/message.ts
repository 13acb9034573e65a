import { z } from 'zod';

// =============================================================================
// Content parts
// =============================================================================

export const TextPartSchema = z.object({
  type: z.literal('text'),
  text: z.string(),
});

export const ThinkPartSchema = z.object({
  type: z.literal('think'),
  think: z.string(),
  encrypted: z.string().nullish(),
});

const MediaURLSchema = z.object({
  url: z.string(),
  id: z.string().nullish(),
});

export const ImageURLPartSchema = z.object({
  type: z.literal('image_url'),
  image_url: MediaURLSchema,
});

export const AudioURLPartSchema = z.object({
  type: z.literal('audio_url'),
  audio_url: MediaURLSchema,
});

export const ContentPartSchema = z.discriminatedUnion('type', [
  TextPartSchema,
  ThinkPartSchema,
  ImageURLPartSchema,
  AudioURLPartSchema,
]);

export type TextPart = z.infer<typeof TextPartSchema>;
export type ThinkPart = z.infer<typeof ThinkPartSchema>;
export type ImageURLPart = z.infer<typeof ImageURLPartSchema>;
export type AudioURLPart = z.infer<typeof AudioURLPartSchema>;
export type ContentPart = z.infer<typeof ContentPartSchema>;

// =============================================================================
// Tool calls
// =============================================================================

export const ToolCallSchema = z.object({
  type: z.literal('function'),
  id: z.string(),
  function: z.object({
    name: z.string(),
    arguments: z.string().nullable(),
  }),
  extras: z.record(z.string(), z.unknown()).nullish(),
});

/** A streamed fragment of the arguments of the tool call emitted just before it. */
export const ToolCallPartSchema = z.object({
  arguments_part: z.string().nullable(),
});

export type ToolCall = z.infer<typeof ToolCallSchema>;
export type ToolCallPart = z.infer<typeof ToolCallPartSchema>;

// =============================================================================
// Messages
// =============================================================================

export const RoleSchema = z.enum(['system', 'user', 'assistant', 'tool']);
export type Role = z.infer<typeof RoleSchema>;

export const MessageSchema = z.object({
  role: RoleSchema,
  content: z.preprocess(
    (value) => (typeof value === 'string' ? [{ type: 'text', text: value }] : value),
    z.array(ContentPartSchema)
  ),
  name: z.string().nullish(),
  tool_calls: z.array(ToolCallSchema).nullish(),
  tool_call_id: z.string().nullish(),
});

export type Message = z.infer<typeof MessageSchema>;

/** What the user typed: plain text or structured parts. */
export const UserInputSchema = z.union([z.string(), z.array(ContentPartSchema)]);
export type UserInput = z.infer<typeof UserInputSchema>;

// =============================================================================
// Token usage
// =============================================================================

export const TokenUsageSchema = z.object({
  input_other: z.number().int().nonnegative(),
  output: z.number().int().nonnegative(),
  input_cache_read: z.number().int().nonnegative().default(0),
  input_cache_creation: z.number().int().nonnegative().default(0),
});

export type TokenUsage = z.infer<typeof TokenUsageSchema>;

export function inputTokens(usage: TokenUsage): number {
  return usage.input_other + usage.input_cache_read + usage.input_cache_creation;
}

export function totalTokens(usage: TokenUsage): number {
  return inputTokens(usage) + usage.output;
}

// =============================================================================
// Helpers
// =============================================================================

export function textPart(text: string): TextPart {
  return { type: 'text', text };
}

/** A text part carrying a runtime notice rather than something a person wrote. */
export function systemPart(text: string): TextPart {
  return textPart(`<system>${text}</system>`);
}

export function toContentParts(input: UserInput): ContentPart[] {
  return typeof input === 'string' ? [textPart(input)] : input;
}

export function userMessage(input: UserInput): Message {
  return { role: 'user', content: toContentParts(input) };
}

export function extractText(message: Pick<Message, 'content'>, separator = ''): string {
  return message.content
    .filter((part): part is TextPart => part.type === 'text')
    .map((part) => part.text)
    .join(separator);
}

export function withoutThinkParts(parts: readonly ContentPart[]): ContentPart[] {
  return parts.filter((part) => part.type !== 'think');
}

/**
 * Merge a streamed delta into the previous part of the same kind.
 * Returns false when the two parts cannot be merged.
 */
export function mergeContentPart(target: ContentPart, source: ContentPart): boolean {
  if (target.type === 'text' && source.type === 'text') {
    target.text += source.text;
    return true;
  }
  if (target.type === 'think' && source.type === 'think') {
    if (target.encrypted) {
      return false;
    }
    target.think += source.think;
    if (source.encrypted) {
      target.encrypted = source.encrypted;
    }
    return true;
  }
  return false;
}

/**
 * Serialize a message for persistence, dropping absent optional fields.
 */
export function serializeMessage(message: Message): Record<string, unknown> {
  const record: Record<string, unknown> = { role: message.role, content: message.content };
  if (message.name != null) {
    record.name = message.name;
  }
  if (message.tool_calls != null && message.tool_calls.length > 0) {
    record.tool_calls = message.tool_calls;
  }
  if (message.tool_call_id != null) {
    record.tool_call_id = message.tool_call_id;
  }
  return record;
}
