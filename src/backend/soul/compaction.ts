import {
  type ContentPart,
  type Message,
  systemPart,
  type TextPart,
  type TokenUsage,
  textPart,
  withoutThinkParts,
} from '../llm/message';
import type { LLM } from '../llm/provider';
import { generate } from '../llm/step';
import {
  buildCustomInstructionBlock,
  COMPACTION_INSTRUCTION,
  COMPACTION_NOTICE,
  COMPACTION_SYSTEM_PROMPT,
} from '../prompts/compaction';
import { createLogger } from '../services/logger.service';

const logger = createLogger('compaction');

export class CompactionResult {
  constructor(
    readonly messages: Message[],
    readonly usage: TokenUsage | null
  ) {}

  /**
   * Token estimate of `messages` until the next provider call reports the real count.
   * With usage, the summary (first message) counts its exact output tokens.
   */
  get estimatedTokenCount(): number {
    if (this.usage && this.messages.length > 0) {
      return this.usage.output + estimateTextTokens(this.messages.slice(1));
    }
    return estimateTextTokens(this.messages);
  }
}

/** About four characters per token; only text parts count. */
export function estimateTextTokens(messages: readonly Message[]): number {
  let chars = 0;
  for (const message of messages) {
    for (const part of message.content) {
      if (part.type === 'text') {
        chars += part.text.length;
      }
    }
  }
  return Math.floor(chars / 4);
}

export function shouldAutoCompact(
  tokensUsed: number,
  maxContextSize: number,
  triggerRatio: number,
  reservedContextSize: number
): boolean {
  if (tokensUsed <= 0) {
    return false;
  }
  return (
    tokensUsed >= maxContextSize * triggerRatio ||
    tokensUsed >= maxContextSize - reservedContextSize
  );
}

export interface PrepareResult {
  compactMessage: Message | null;
  toPreserve: Message[];
}

export interface CompactOptions {
  customInstruction?: string;
  signal?: AbortSignal;
}

export interface Compaction {
  compact(
    messages: readonly Message[],
    llm: LLM,
    options?: CompactOptions
  ): Promise<CompactionResult>;
}

/**
 * Folds everything but the last `maxPreservedMessages` user/assistant messages into one
 * summary produced by a single provider call.
 */
export class SimpleCompaction implements Compaction {
  constructor(readonly maxPreservedMessages = 2) {}

  prepare(messages: readonly Message[], customInstruction?: string): PrepareResult {
    if (messages.length === 0 || this.maxPreservedMessages <= 0) {
      return { compactMessage: null, toPreserve: [...messages] };
    }

    let preserveStart = messages.length;
    let preserved = 0;
    for (let index = messages.length - 1; index >= 0; index--) {
      const role = messages[index]?.role;
      if (role === 'user' || role === 'assistant') {
        preserved += 1;
        if (preserved === this.maxPreservedMessages) {
          preserveStart = index;
          break;
        }
      }
    }
    if (preserved < this.maxPreservedMessages) {
      return { compactMessage: null, toPreserve: [...messages] };
    }

    const toCompact = messages.slice(0, preserveStart);
    const toPreserve = messages.slice(preserveStart);
    if (toCompact.length === 0) {
      return { compactMessage: null, toPreserve };
    }

    const content: ContentPart[] = [];
    toCompact.forEach((message, index) => {
      content.push(textPart(`## Message ${index + 1}\nRole: ${message.role}\nContent:\n`));
      content.push(...withoutThinkParts(message.content));
    });
    const instruction: TextPart = textPart(`\n${COMPACTION_INSTRUCTION}`);
    if (customInstruction?.trim()) {
      instruction.text += buildCustomInstructionBlock(customInstruction.trim());
    }
    content.push(instruction);

    return { compactMessage: { role: 'user', content }, toPreserve };
  }

  async compact(
    messages: readonly Message[],
    llm: LLM,
    options: CompactOptions = {}
  ): Promise<CompactionResult> {
    const { compactMessage, toPreserve } = this.prepare(messages, options.customInstruction);
    if (!compactMessage) {
      return new CompactionResult(toPreserve, null);
    }

    logger.debug('Compacting context', {
      compacted: messages.length - toPreserve.length,
      preserved: toPreserve.length,
    });
    const result = await generate(llm.provider, COMPACTION_SYSTEM_PROMPT, [], [compactMessage], {
      signal: options.signal,
    });
    if (result.usage) {
      logger.debug('Compaction finished', {
        inputTokens: result.usage.input_other,
        outputTokens: result.usage.output,
      });
    }

    const summary: Message = {
      role: 'user',
      content: [systemPart(COMPACTION_NOTICE), ...withoutThinkParts(result.message.content)],
    };
    return new CompactionResult([summary, ...toPreserve], result.usage);
  }
}
