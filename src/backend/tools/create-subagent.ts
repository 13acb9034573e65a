import { z } from 'zod';
import { type ToolReturnValue, toolError, toolOk } from '../llm/tooling';
import { dynamicSubagent, type Runtime } from '../soul/agent';
import { type Toolset, ZodTool } from '../soul/toolset';

const CreateSubagentParamsSchema = z.object({
  name: z.string().min(1),
  system_prompt: z.string().min(1),
});

/** Define a new subagent for the Task tool. The definition is kept in the session state. */
export class CreateSubagentTool extends ZodTool<typeof CreateSubagentParamsSchema> {
  readonly name = 'CreateSubagent';
  readonly description =
    'Create a custom subagent with its own system prompt. Use it later with the Task tool ' +
    'by name. Subagents share your tools but not your context.';
  readonly parameters = {
    type: 'object',
    properties: {
      name: {
        type: 'string',
        description:
          "Unique name for this agent (e.g. 'summarizer', 'code_reviewer'). " +
          'The Task tool refers to the agent by this name.',
      },
      system_prompt: {
        type: 'string',
        description: "System prompt defining the agent's role, capabilities, and boundaries.",
      },
    },
    required: ['name', 'system_prompt'],
  };
  protected readonly schema = CreateSubagentParamsSchema;

  constructor(
    private readonly runtime: Runtime,
    private readonly toolset: Toolset
  ) {
    super();
  }

  protected async execute(
    params: z.output<typeof CreateSubagentParamsSchema>
  ): Promise<ToolReturnValue> {
    const { subagents, session } = this.runtime;
    if (subagents.has(params.name)) {
      return toolError({
        message: `Subagent with name '${params.name}' already exists.`,
        brief: 'Subagent already exists',
      });
    }

    subagents.addDynamic(params.name, dynamicSubagent(this.runtime, this.toolset, params));
    session.state.dynamic_subagents.push({
      name: params.name,
      system_prompt: params.system_prompt,
    });
    await session.saveState();

    return toolOk({
      output: `Available subagents: ${[...subagents.names].sort().join(', ')}`,
      message: `Subagent '${params.name}' created successfully.`,
    });
  }
}
