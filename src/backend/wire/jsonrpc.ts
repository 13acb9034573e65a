import { z } from 'zod';
import { UserInputSchema } from '../llm/message';
import { ToolReturnValueSchema } from '../llm/tooling';
import { ApprovalResponseKindSchema } from './serde';

export const JSONRPC_VERSION = '2.0';

export const ErrorCodes = {
  PARSE_ERROR: -32_700,
  INVALID_REQUEST: -32_600,
  METHOD_NOT_FOUND: -32_601,
  INVALID_PARAMS: -32_602,
  INTERNAL_ERROR: -32_603,
  INVALID_STATE: -32_000,
  LLM_NOT_SET: -32_001,
  LLM_NOT_SUPPORTED: -32_002,
  CHAT_PROVIDER_ERROR: -32_003,
} as const;

export type JsonRpcId = string | number;

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export class JsonRpcError extends Error {
  readonly code: number;
  readonly data: unknown;

  constructor(params: { code: number; message: string; data?: unknown }) {
    super(params.message);
    this.name = 'JsonRpcError';
    this.code = params.code;
    this.data = params.data;
  }

  toObject(): JsonRpcErrorObject {
    return {
      code: this.code,
      message: this.message,
      ...(this.data === undefined ? {} : { data: this.data }),
    };
  }
}

// =============================================================================
// Inbound envelopes
// =============================================================================

const JsonRpcIdSchema = z.union([z.string(), z.number()]);

const JsonRpcErrorObjectSchema = z.object({
  code: z.number(),
  message: z.string(),
  data: z.unknown().optional(),
});

export const JsonRpcRequestSchema = z.object({
  jsonrpc: z.literal(JSONRPC_VERSION),
  id: JsonRpcIdSchema.optional(),
  method: z.string(),
  params: z.unknown().optional(),
});

export type JsonRpcRequest = z.infer<typeof JsonRpcRequestSchema>;

export const JsonRpcResponseSchema = z
  .object({
    jsonrpc: z.literal(JSONRPC_VERSION),
    id: JsonRpcIdSchema,
    result: z.unknown().optional(),
    error: JsonRpcErrorObjectSchema.optional(),
  })
  .refine((response) => response.result !== undefined || response.error !== undefined);

export type JsonRpcResponse = z.infer<typeof JsonRpcResponseSchema>;

// =============================================================================
// Method params
// =============================================================================

export const ExternalToolSpecSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  parameters: z.record(z.string(), z.unknown()),
});

export const InitializeParamsSchema = z.object({
  protocol_version: z.string(),
  client: z.object({ name: z.string(), version: z.string().optional() }).optional(),
  capabilities: z.object({ supports_question: z.boolean().optional() }).optional(),
  external_tools: z.array(ExternalToolSpecSchema).optional(),
});

export const PromptParamsSchema = z.object({ user_input: UserInputSchema });


// =============================================================================
// Client answers to server requests
// =============================================================================

export const ApprovalAnswerSchema = z.object({
  request_id: z.string(),
  response: ApprovalResponseKindSchema,
});

export const QuestionAnswerSchema = z.object({
  request_id: z.string(),
  answers: z.record(z.string(), z.string()),
});

export const ToolCallAnswerSchema = z.object({
  tool_call_id: z.string(),
  return_value: ToolReturnValueSchema,
});

// =============================================================================
// Outbound messages
// =============================================================================

export function successResponse(id: JsonRpcId, result: unknown): Record<string, unknown> {
  return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorResponse(
  id: JsonRpcId | null,
  error: JsonRpcErrorObject
): Record<string, unknown> {
  return { jsonrpc: JSONRPC_VERSION, id, error };
}

export function notification(method: string, params: unknown): Record<string, unknown> {
  return { jsonrpc: JSONRPC_VERSION, method, params };
}

export function request(id: JsonRpcId, method: string, params: unknown): Record<string, unknown> {
  return { jsonrpc: JSONRPC_VERSION, method, id, params };
}
