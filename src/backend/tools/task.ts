import { join } from 'node:path';
import { z } from 'zod';
import { nextRotationPath } from '../lib/file-helpers';
import { type ToolReturnValue, toolError } from '../llm/tooling';
import type { Runtime } from '../soul/agent';
import { runSubagent } from '../soul/subagent';
import { type ToolCallScope, ZodTool } from '../soul/toolset';

const TaskParamsSchema = z.object({
  description: z.string().min(1),
  subagent_name: z.string().min(1),
  prompt: z.string().min(1),
});

/** Delegate a task to a subagent running in its own context. */
export class TaskTool extends ZodTool<typeof TaskParamsSchema> {
  readonly name = 'Task';
  readonly parameters = {
    type: 'object',
    properties: {
      description: {
        type: 'string',
        description: 'A short (3-5 word) description of the task',
      },
      subagent_name: {
        type: 'string',
        description: 'The name of the specialized subagent to use for this task',
      },
      prompt: {
        type: 'string',
        description:
          'The task for the subagent to perform. Include all necessary background: the ' +
          'subagent cannot see anything in your context.',
      },
    },
    required: ['description', 'subagent_name', 'prompt'],
  };
  protected readonly schema = TaskParamsSchema;

  constructor(private readonly runtime: Runtime) {
    super();
  }

  get description(): string {
    const available = this.runtime.subagents.describe() || '(none yet)';
    return (
      'Spawn a subagent to perform a focused task in a fresh context. Only its final ' +
      `message comes back to you.\n\nAvailable subagents:\n${available}`
    );
  }

  protected async execute(
    params: z.output<typeof TaskParamsSchema>,
    scope: ToolCallScope
  ): Promise<ToolReturnValue> {
    const agent = this.runtime.subagents.get(params.subagent_name);
    if (!agent) {
      return toolError({
        message: `Subagent not found: ${params.subagent_name}`,
        brief: 'Subagent not found',
      });
    }
    if (!scope.wire) {
      return toolError({
        message: 'Wire is not available for subagent execution.',
        brief: 'Wire unavailable',
      });
    }

    const contextFile = await nextRotationPath(
      join(this.runtime.session.dir, 'context_sub.jsonl')
    );
    return runSubagent(agent, params.prompt, {
      parent: scope.wire,
      taskToolCallId: scope.toolCall.id,
      contextFile,
      signal: scope.signal,
    });
  }
}
