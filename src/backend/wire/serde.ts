import { z } from 'zod';
import {
  ContentPartSchema,
  TokenUsageSchema,
  ToolCallPartSchema,
  ToolCallSchema,
  UserInputSchema,
} from '../llm/message';
import { DisplayBlockSchema, ToolResultSchema } from '../llm/tooling';
import {
  ApprovalRequest,
  isRequest,
  QuestionRequest,
  ToolCallRequest,
  type WireMessage,
} from './types';

/** The persisted/transmitted shape of any wire message. */
export interface WireEnvelope {
  type: string;
  payload: Record<string, unknown>;
}

export const WireEnvelopeSchema = z.object({
  type: z.string(),
  payload: z.record(z.string(), z.unknown()).default({}),
});

export class WireSerdeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'WireSerdeError';
  }
}

export const ApprovalResponseKindSchema = z.enum(['approve', 'approve_for_session', 'reject']);

const TurnBeginSchema = z.object({ user_input: UserInputSchema });
const StepBeginSchema = z.object({ n: z.number().int() });
const StatusUpdateSchema = z.object({
  context_usage: z.number().nullable().default(null),
  token_usage: TokenUsageSchema.nullable().default(null),
  message_id: z.string().nullable().default(null),
});
const ApprovalResponseSchema = z.object({
  request_id: z.string(),
  response: ApprovalResponseKindSchema,
});
const SubagentEventSchema = z.object({
  task_tool_call_id: z.string(),
  event: WireEnvelopeSchema,
});

const ApprovalRequestSchema = z.object({
  id: z.string(),
  tool_call_id: z.string(),
  sender: z.string(),
  action: z.string(),
  description: z.string(),
  display: z.array(DisplayBlockSchema).default([]),
});
const QuestionRequestSchema = z.object({
  id: z.string(),
  tool_call_id: z.string(),
  questions: z.array(
    z.object({
      question: z.string(),
      header: z.string().default(''),
      options: z.array(z.object({ label: z.string(), description: z.string().default('') })),
      multi_select: z.boolean().default(false),
    })
  ),
});
const ToolCallRequestSchema = z.object({
  id: z.string(),
  name: z.string(),
  arguments: z.string().nullable(),
});

function parsePayload<T extends z.ZodTypeAny>(
  schema: T,
  type: string,
  payload: unknown
): z.output<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    throw new WireSerdeError(`Invalid payload for ${type}: ${result.error.message}`, {
      cause: result.error,
    });
  }
  return result.data;
}

export function serializeWireMessage(message: WireMessage): WireEnvelope {
  if (isRequest(message)) {
    return { type: message.type, payload: { ...message.payload } };
  }
  if (message.type === 'SubagentEvent') {
    return {
      type: message.type,
      payload: {
        task_tool_call_id: message.payload.task_tool_call_id,
        event: serializeWireMessage(message.payload.event),
      },
    };
  }
  return { type: message.type, payload: { ...message.payload } };
}

/**
 * Rebuild a wire message from its envelope. Unknown types and invalid payloads throw
 * `WireSerdeError`. The legacy `ApprovalRequestResolved` type reads as `ApprovalResponse`.
 */
export function deserializeWireMessage(data: unknown): WireMessage {
  const envelope = WireEnvelopeSchema.safeParse(data);
  if (!envelope.success) {
    throw new WireSerdeError('Invalid wire message envelope', { cause: envelope.error });
  }
  const { type, payload } = envelope.data;

  switch (type) {
    case 'TurnBegin':
      return { type, payload: parsePayload(TurnBeginSchema, type, payload) };
    case 'TurnEnd':
    case 'StepInterrupted':
    case 'CompactionBegin':
    case 'CompactionEnd':
      return { type, payload: {} };
    case 'StepBegin':
      return { type, payload: parsePayload(StepBeginSchema, type, payload) };
    case 'StatusUpdate':
      return { type, payload: parsePayload(StatusUpdateSchema, type, payload) };
    case 'ContentPart':
      return { type, payload: parsePayload(ContentPartSchema, type, payload) };
    case 'ToolCall':
      return { type, payload: parsePayload(ToolCallSchema, type, payload) };
    case 'ToolCallPart':
      return { type, payload: parsePayload(ToolCallPartSchema, type, payload) };
    case 'ToolResult':
      return { type, payload: parsePayload(ToolResultSchema, type, payload) };
    case 'ApprovalResponse':
    case 'ApprovalRequestResolved':
      return {
        type: 'ApprovalResponse',
        payload: parsePayload(ApprovalResponseSchema, type, payload),
      };
    case 'SubagentEvent': {
      const parsed = parsePayload(SubagentEventSchema, type, payload);
      const inner = deserializeWireMessage(parsed.event);
      if (isRequest(inner)) {
        throw new WireSerdeError('SubagentEvent must wrap an event, not a request');
      }
      return {
        type,
        payload: { task_tool_call_id: parsed.task_tool_call_id, event: inner },
      };
    }
    case 'ApprovalRequest':
      return new ApprovalRequest(parsePayload(ApprovalRequestSchema, type, payload));
    case 'QuestionRequest':
      return new QuestionRequest(parsePayload(QuestionRequestSchema, type, payload));
    case 'ToolCallRequest':
      return new ToolCallRequest(parsePayload(ToolCallRequestSchema, type, payload));
    default:
      throw new WireSerdeError(`Unknown wire message type: ${type}`);
  }
}

