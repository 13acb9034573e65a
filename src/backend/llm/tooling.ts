import { z } from 'zod';
import { ContentPartSchema } from './message';

/**
 * Free-form block a client may render next to a tool result (diffs, shell commands, ...).
 * Only `type` is fixed; the `brief` block carries a one-line summary in `text`.
 */
export const DisplayBlockSchema = z.object({ type: z.string() }).passthrough();
export type DisplayBlock = z.infer<typeof DisplayBlockSchema>;

export const ToolReturnValueSchema = z.object({
  is_error: z.boolean(),
  output: z.union([z.string(), z.array(ContentPartSchema)]),
  message: z.string(),
  display: z.array(DisplayBlockSchema).default([]),
  extras: z.record(z.string(), z.unknown()).nullish(),
});

export type ToolReturnValue = z.infer<typeof ToolReturnValueSchema>;

export const ToolResultSchema = z.object({
  tool_call_id: z.string(),
  return_value: ToolReturnValueSchema,
});

export type ToolResult = z.infer<typeof ToolResultSchema>;

/** What the model sees of a tool. `parameters` is a JSON schema object. */
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

interface ReturnValueFields {
  output?: ToolReturnValue['output'];
  message?: string;
  brief?: string;
  extras?: Record<string, unknown> | null;
}

function briefDisplay(brief: string | undefined): DisplayBlock[] {
  return brief ? [{ type: 'brief', text: brief }] : [];
}

export function toolOk(fields: ReturnValueFields = {}): ToolReturnValue {
  return {
    is_error: false,
    output: fields.output ?? '',
    message: fields.message ?? '',
    display: briefDisplay(fields.brief),
    extras: fields.extras ?? null,
  };
}

export function toolError(fields: ReturnValueFields & { message: string }): ToolReturnValue {
  return {
    is_error: true,
    output: fields.output ?? '',
    message: fields.message,
    display: briefDisplay(fields.brief),
    extras: fields.extras ?? null,
  };
}

export function toolNotFound(name: string): ToolReturnValue {
  return toolError({ message: `Tool \`${name}\` not found`, brief: `Tool \`${name}\` not found` });
}

export function toolParseError(detail: string): ToolReturnValue {
  return toolError({
    message: `Error parsing JSON arguments: ${detail}`,
    brief: 'Invalid arguments',
  });
}

export function toolValidateError(detail: string): ToolReturnValue {
  return toolError({
    message: `Error validating JSON arguments: ${detail}`,
    brief: 'Invalid arguments',
  });
}

export function toolRuntimeError(detail: string): ToolReturnValue {
  return toolError({
    message: `Error running tool: ${detail}`,
    brief: 'Tool runtime error',
  });
}

export function toolRejected(): ToolReturnValue {
  return toolError({
    message:
      'The tool call is rejected by the user. Stop what you are doing and wait for the user to tell you how to proceed.',
    brief: 'Rejected by user',
    extras: { rejected: true },
  });
}

export function toolInterrupted(): ToolReturnValue {
  return toolError({
    message: 'The tool call was interrupted before it finished.',
    brief: 'Interrupted',
    extras: { interrupted: true },
  });
}

export function isToolRejected(value: ToolReturnValue): boolean {
  return value.is_error && value.extras?.rejected === true;
}
