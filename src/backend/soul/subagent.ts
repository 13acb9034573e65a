import { toErrorMessage } from '../lib/error-utils';
import { extractText } from '../llm/message';
import { type ToolReturnValue, toolError, toolOk } from '../llm/tooling';
import { createLogger } from '../services/logger.service';
import { isRequest } from '../wire/types';
import type { Agent } from './agent';
import { Context } from './context';
import { MaxStepsReached } from './errors';
import { runSoul, type UILoop } from './run-soul';
import { Soul } from './soul';
import type { WireSink } from './toolset';

const logger = createLogger('subagent');

/** Final answers shorter than this get one follow-up asking for more detail. */
const BRIEF_ANSWER_LENGTH = 200;

export const CONTINUE_PROMPT = `Your previous response was too brief. Please provide a more comprehensive summary that includes:

1. Specific technical details and implementations
2. Complete code examples if relevant
3. Detailed findings and analysis
4. All important information that should be aware of by the caller`;

export interface RunSubagentOptions {
  /** Wire of the parent's running turn. */
  parent: WireSink;
  /** Id of the parent's tool call that started the subagent. */
  taskToolCallId: string;
  contextFile: string;
  signal?: AbortSignal;
}

/**
 * Relay a child wire to the parent: requests and approval answers pass through unwrapped
 * so the parent's client can answer them; every other event is wrapped in a SubagentEvent.
 */
export function relayToParent(parent: WireSink, taskToolCallId: string): UILoop {
  return async (wire) => {
    const side = wire.attach();
    for await (const message of side) {
      if (isRequest(message) || message.type === 'ApprovalResponse') {
        parent.send(message);
      } else {
        parent.send({
          type: 'SubagentEvent',
          payload: { task_tool_call_id: taskToolCallId, event: message },
        });
      }
    }
  };
}

function finalText(soul: Soul): string {
  const last = soul.context.history.at(-1);
  return last?.role === 'assistant' ? extractText(last, '\n') : '';
}

const notRunProperly = (): ToolReturnValue =>
  toolError({
    message: 'The subagent seemed not to run properly. Maybe you have to do the task yourself.',
    brief: 'Failed to run subagent',
  });

/** Run `agent` on `prompt` in a fresh context and return its final answer as a tool result. */
export async function runSubagent(
  agent: Agent,
  prompt: string,
  options: RunSubagentOptions
): Promise<ToolReturnValue> {
  const soul = new Soul(agent, new Context(options.contextFile));
  const relay = relayToParent(options.parent, options.taskToolCallId);

  try {
    await runSoul(soul, prompt, relay, options.signal);
    const first = finalText(soul);
    if (first && first.length < BRIEF_ANSWER_LENGTH) {
      logger.debug('Subagent answer is brief, asking for more detail', { agent: agent.name });
      await runSoul(soul, CONTINUE_PROMPT, relay, options.signal);
    }
  } catch (error) {
    if (error instanceof MaxStepsReached) {
      return toolError({
        message:
          `Max steps ${error.steps} reached when running subagent. ` +
          'Please try splitting the task into smaller subtasks.',
        brief: 'Max steps reached',
      });
    }
    if (options.signal?.aborted) {
      throw error;
    }
    logger.warn('Subagent failed', { agent: agent.name, error: toErrorMessage(error) });
    return toolError({
      message: `Failed to run subagent: ${toErrorMessage(error)}`,
      brief: 'Failed to run subagent',
    });
  }

  const text = finalText(soul);
  return text ? toolOk({ output: text }) : notRunProperly();
}
