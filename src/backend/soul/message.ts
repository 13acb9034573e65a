import { type ContentPart, type Message, systemPart, textPart } from '../llm/message';
import type { ModelCapability } from '../llm/provider';
import type { ToolResult, ToolReturnValue } from '../llm/tooling';

function outputParts(output: ToolReturnValue['output']): ContentPart[] {
  if (typeof output === 'string') {
    return output ? [textPart(output)] : [];
  }
  return [...output];
}

function isRuntimeError(value: ToolReturnValue): boolean {
  return value.display.some(
    (block) => block.type === 'brief' && block.text === 'Tool runtime error'
  );
}

/** The tool message the model sees for a tool result. */
export function toolResultToMessage(result: ToolResult): Message {
  const value = result.return_value;
  const content: ContentPart[] = [];

  if (value.is_error) {
    let message = value.message;
    if (message && isRuntimeError(value)) {
      message += '\nThis is an unexpected error and the tool is probably not working.';
    }
    if (message) {
      content.push(systemPart(`ERROR: ${message}`));
    }
    content.push(...outputParts(value.output));
  } else {
    if (value.message) {
      content.push(systemPart(value.message));
    }
    content.push(...outputParts(value.output));
    if (content.length === 0) {
      content.push(systemPart('Tool output is empty.'));
    }
  }

  return { role: 'tool', content, tool_call_id: result.tool_call_id };
}

/** Capabilities `message` needs that the model does not have. */
export function missingCapabilities(
  message: Pick<Message, 'content'>,
  capabilities: ReadonlySet<ModelCapability>
): ModelCapability[] {
  const needed = new Set<ModelCapability>();
  for (const part of message.content) {
    if (part.type === 'image_url') {
      needed.add('image_in');
    } else if (part.type === 'audio_url') {
      needed.add('audio_in');
    } else if (part.type === 'think') {
      needed.add('thinking');
    }
  }
  return [...needed].filter((capability) => !capabilities.has(capability));
}
