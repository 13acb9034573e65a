/**
 * Tool registry and dispatch.
 *
 * `Toolset.handle` turns a model tool call into a `ToolResult`: unknown tools and
 * unparsable arguments are answered immediately; everything else runs inside a scope
 * that exposes the current tool call (and the wire) to whatever the tool awaits.
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import type { z } from 'zod';
import { toErrorMessage } from '../lib/error-utils';
import type { ToolCall } from '../llm/message';
import {
  type ToolDefinition,
  type ToolResult,
  type ToolReturnValue,
  toolError,
  toolNotFound,
  toolParseError,
  toolRuntimeError,
  toolValidateError,
} from '../llm/tooling';
import { createLogger } from '../services/logger.service';
import { ToolCallRequest, type WireMessage } from '../wire/types';

const logger = createLogger('toolset');

/** Where a tool can send wire messages (requests and events). */
export interface WireSink {
  send(message: WireMessage): void;
}

export interface ToolCallScope {
  toolCall: ToolCall;
  wire: WireSink | null;
  signal?: AbortSignal;
}

const scopeStorage = new AsyncLocalStorage<ToolCallScope>();

export function currentToolCall(): ToolCall | null {
  return scopeStorage.getStore()?.toolCall ?? null;
}

/** Run `fn` as if it were executing for `toolCall`. */
export function runInToolScope<T>(scope: ToolCallScope, fn: () => T): T {
  return scopeStorage.run(scope, fn);
}

export interface Tool {
  readonly name: string;
  readonly description: string;
  /** JSON schema of the arguments object. */
  readonly parameters: Record<string, unknown>;
  call(args: unknown, scope: ToolCallScope): Promise<ToolReturnValue>;
}

/**
 * Tool whose arguments are validated with a zod schema before `execute` runs.
 * `parameters` is the JSON schema the model sees and should describe the same shape.
 */
export abstract class ZodTool<TSchema extends z.ZodTypeAny> implements Tool {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly parameters: Record<string, unknown>;
  protected abstract readonly schema: TSchema;

  async call(args: unknown, scope: ToolCallScope): Promise<ToolReturnValue> {
    const parsed = this.schema.safeParse(args);
    if (!parsed.success) {
      return toolValidateError(parsed.error.issues.map((issue) => issue.message).join('; '));
    }
    return this.execute(parsed.data, scope);
  }

  protected abstract execute(
    params: z.output<TSchema>,
    scope: ToolCallScope
  ): Promise<ToolReturnValue>;
}

/** A tool implemented by the connected client; calls are forwarded as ToolCallRequests. */
export class ExternalTool implements Tool {
  constructor(
    readonly name: string,
    readonly description: string,
    readonly parameters: Record<string, unknown>
  ) {}

  async call(_args: unknown, scope: ToolCallScope): Promise<ToolReturnValue> {
    if (!scope.wire) {
      return toolError({
        message: `External tool \`${this.name}\` needs a connected client.`,
        brief: 'No client connected',
      });
    }
    const request = new ToolCallRequest({
      id: scope.toolCall.id,
      name: this.name,
      arguments: scope.toolCall.function.arguments,
    });
    scope.wire.send(request);
    return request.wait();
  }
}

function parseArguments(raw: string | null): unknown {
  if (raw === null || raw.trim() === '') {
    return {};
  }
  return JSON.parse(raw);
}

export class Toolset {
  private readonly tools = new Map<string, Tool>();
  private readonly external = new Set<string>();

  constructor(tools: readonly Tool[] = []) {
    for (const tool of tools) {
      this.add(tool);
    }
  }

  add(tool: Tool): void {
    this.tools.set(tool.name, tool);
  }

  addExternal(tool: ExternalTool): void {
    this.tools.set(tool.name, tool);
    this.external.add(tool.name);
  }

  remove(name: string): boolean {
    this.external.delete(name);
    return this.tools.delete(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  isBuiltin(name: string): boolean {
    return this.tools.has(name) && !this.external.has(name);
  }

  get definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => ({
      name: tool.name,
      description: tool.description,
      parameters: tool.parameters,
    }));
  }

  /**
   * Resolve a tool call. Failures that need no tool (unknown name, bad JSON) come back
   * synchronously; everything else is a promise that never rejects.
   */
  handle(
    toolCall: ToolCall,
    context: { wire: WireSink | null; signal?: AbortSignal }
  ): ToolResult | Promise<ToolResult> {
    const name = toolCall.function.name;
    const tool = this.tools.get(name);
    if (!tool) {
      return { tool_call_id: toolCall.id, return_value: toolNotFound(name) };
    }

    let args: unknown;
    try {
      args = parseArguments(toolCall.function.arguments);
    } catch (error) {
      return { tool_call_id: toolCall.id, return_value: toolParseError(toErrorMessage(error)) };
    }

    const scope: ToolCallScope = { toolCall, wire: context.wire, signal: context.signal };
    return runInToolScope(scope, async () => {
      try {
        return { tool_call_id: toolCall.id, return_value: await tool.call(args, scope) };
      } catch (error) {
        logger.warn('Tool failed', {
          tool: name,
          toolCallId: toolCall.id,
          error: toErrorMessage(error),
        });
        return { tool_call_id: toolCall.id, return_value: toolRuntimeError(toErrorMessage(error)) };
      }
    });
  }
}
