/**
 * The agent loop.
 *
 * A turn appends the user's message and runs steps until the model stops calling tools.
 * Each step generates one assistant message through the retry policy, dispatches its tool
 * calls concurrently and grows the context with the message and the tool results. Every
 * intermediate event is sent to the wire the turn runs on.
 */

import { raceAbort } from '../lib/abort';
import { toErrorMessage } from '../lib/error-utils';
import {
  extractText,
  inputTokens,
  type Message,
  totalTokens,
  type UserInput,
  userMessage,
} from '../llm/message';
import {
  isToolCall,
  isToolCallPart,
  type LLM,
  type StreamedMessagePart,
} from '../llm/provider';
import { type StepResult, step, type ToolDispatcher } from '../llm/step';
import { isToolRejected, type ToolResult, toolInterrupted } from '../llm/tooling';
import { createLogger } from '../services/logger.service';
import type { WireEvent } from '../wire/types';
import type { Wire } from '../wire/wire';
import type { Agent, Runtime } from './agent';
import { type Compaction, SimpleCompaction, shouldAutoCompact } from './compaction';
import type { Context } from './context';
import {
  LLMNotSet,
  LLMNotSupported,
  MaxStepsReached,
  NoActiveTurnError,
  RunCancelled,
  TurnInProgressError,
} from './errors';
import { missingCapabilities, toolResultToMessage } from './message';
import { withRetry } from './retry';
import {
  parseSlashCommand,
  type SlashCommandInfo,
  type SlashCommandRegistry,
  sendText,
  soulSlashCommands,
} from './slash-commands';
import type { WireSink } from './toolset';

const logger = createLogger('soul');

export type TurnStopReason = 'no_tool_calls' | 'tool_rejected';

export interface TurnOutcome {
  stopReason: TurnStopReason;
  /** The last assistant message of the turn. */
  finalMessage: Message;
  stepCount: number;
}

type StepOutcome = Omit<TurnOutcome, 'stepCount'>;

export interface SoulStatus {
  /** Fraction of the model's context window in use; 0 without a model. */
  contextUsage: number;
  yolo: boolean;
}

export interface SoulOptions {
  compaction?: Compaction;
  slashCommands?: SlashCommandRegistry;
  /** Backoff sleep of the retry policy. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

function partEvent(part: StreamedMessagePart): WireEvent {
  if (isToolCall(part)) {
    return { type: 'ToolCall', payload: part };
  }
  if (isToolCallPart(part)) {
    return { type: 'ToolCallPart', payload: part };
  }
  return { type: 'ContentPart', payload: part };
}

export class Soul {
  readonly compaction: Compaction;
  private readonly slashCommands: SlashCommandRegistry;
  private readonly sleep: SoulOptions['sleep'];
  private running = false;
  private steers: Message[] = [];

  constructor(
    readonly agent: Agent,
    readonly context: Context,
    options: SoulOptions = {}
  ) {
    this.compaction =
      options.compaction ?? new SimpleCompaction(agent.runtime.loopControl.maxPreservedMessages);
    this.slashCommands = options.slashCommands ?? soulSlashCommands;
    this.sleep = options.sleep;
  }

  get name(): string {
    return this.agent.name;
  }

  get runtime(): Runtime {
    return this.agent.runtime;
  }

  get modelName(): string {
    return this.runtime.llm?.provider.modelName ?? '';
  }

  get isRunning(): boolean {
    return this.running;
  }

  get status(): SoulStatus {
    const llm = this.runtime.llm;
    return {
      contextUsage: llm ? this.context.tokenCount / llm.maxContextSize : 0,
      yolo: this.runtime.approval.isYolo,
    };
  }

  get availableSlashCommands(): SlashCommandInfo[] {
    return this.slashCommands.list();
  }

  /**
   * Run one turn. Resolves with the turn's outcome, or null when the input was a slash
   * command. Rejects with RunCancelled when `signal` aborts; no TurnEnd is sent then.
   */
  async run(userInput: UserInput, wire: Wire, signal?: AbortSignal): Promise<TurnOutcome | null> {
    if (this.running) {
      throw new TurnInProgressError();
    }
    this.running = true;
    this.steers = [];
    const sink = wire.soulSide;

    try {
      const message = userMessage(userInput);
      sink.send({ type: 'TurnBegin', payload: { user_input: userInput } });

      let outcome: TurnOutcome | null = null;
      const command = parseSlashCommand(extractText(message, ' '));
      if (command) {
        const handler = this.slashCommands.find(command.name);
        if (handler) {
          await handler.run({ soul: this, args: command.args, wire: sink, signal });
        } else {
          sendText(sink, `Unknown slash command "/${command.name}".`);
        }
      } else {
        outcome = await this.turn(message, wire, signal);
      }

      sink.send({ type: 'TurnEnd', payload: {} });
      return outcome;
    } catch (error) {
      if (signal?.aborted && !(error instanceof RunCancelled)) {
        this.cancelPending(wire);
        throw new RunCancelled();
      }
      throw error;
    } finally {
      this.running = false;
      this.steers = [];
    }
  }

  /** Queue user input for the next step of the running turn. */
  steer(input: UserInput): void {
    if (!this.running) {
      throw new NoActiveTurnError();
    }
    const message = userMessage(input);
    const llm = this.runtime.llm;
    if (llm) {
      const missing = missingCapabilities(message, llm.capabilities);
      if (missing.length > 0) {
        throw new LLMNotSupported(llm.provider.modelName, missing);
      }
    }
    this.steers.push(message);
    logger.debug('Steer queued', { pending: this.steers.length });
  }

  /** Summarize the context through the retry policy and replace it with the result. */
  async compactContext(
    wire: WireSink,
    signal?: AbortSignal,
    customInstruction?: string
  ): Promise<void> {
    const llm = this.requireLLM();
    wire.send({ type: 'CompactionBegin', payload: {} });
    const history = [...this.context.history];
    const result = await withRetry({
      call: () => this.compaction.compact(history, llm, { customInstruction, signal }),
      provider: llm.provider,
      maxAttempts: this.runtime.loopControl.maxRetriesPerStep,
      signal,
      sleep: this.sleep,
    });
    await this.context.replace(result.messages, result.estimatedTokenCount);
    logger.info('Context compacted', {
      before: history.length,
      after: result.messages.length,
      tokenCount: this.context.tokenCount,
    });
    wire.send({ type: 'CompactionEnd', payload: {} });
  }

  private requireLLM(): LLM {
    const llm = this.runtime.llm;
    if (!llm) {
      throw new LLMNotSet();
    }
    return llm;
  }

  private async turn(message: Message, wire: Wire, signal?: AbortSignal): Promise<TurnOutcome> {
    const llm = this.requireLLM();
    const missing = missingCapabilities(message, llm.capabilities);
    if (missing.length > 0) {
      throw new LLMNotSupported(llm.provider.modelName, missing);
    }

    await this.context.checkpoint();
    await this.context.appendMessage(message);
    return this.agentLoop(wire, signal);
  }

  private async agentLoop(wire: Wire, signal?: AbortSignal): Promise<TurnOutcome> {
    const { loopControl } = this.runtime;
    let stepNo = 0;

    while (true) {
      if (signal?.aborted) {
        this.interrupt(wire);
      }
      stepNo += 1;
      if (stepNo > loopControl.maxStepsPerTurn) {
        throw new MaxStepsReached(loopControl.maxStepsPerTurn);
      }

      wire.soulSide.send({ type: 'StepBegin', payload: { n: stepNo } });
      const pipe = this.pipeApprovals(wire);
      let outcome: StepOutcome | null;
      try {
        await this.autoCompact(wire, signal);
        await this.context.checkpoint();
        await this.foldSteers();
        outcome = await this.step(wire, signal);
      } catch (error) {
        if (signal?.aborted) {
          this.interrupt(wire);
        }
        wire.soulSide.send({ type: 'StepInterrupted', payload: {} });
        throw error;
      } finally {
        await pipe.stop();
      }

      if (outcome) {
        return { ...outcome, stepCount: stepNo };
      }
    }
  }

  private async autoCompact(wire: Wire, signal?: AbortSignal): Promise<void> {
    const llm = this.requireLLM();
    const { loopControl } = this.runtime;
    if (
      shouldAutoCompact(
        this.context.tokenCount,
        llm.maxContextSize,
        loopControl.compactionTriggerRatio,
        loopControl.reservedContextSize
      )
    ) {
      logger.info('Context is near the model limit, compacting', {
        tokenCount: this.context.tokenCount,
        maxContextSize: llm.maxContextSize,
      });
      await this.compactContext(wire.soulSide, signal);
    }
  }

  private async foldSteers(): Promise<void> {
    const steers = this.steers.splice(0);
    if (steers.length > 0) {
      await this.context.appendMessage(...steers);
    }
  }

  private async step(wire: Wire, signal?: AbortSignal): Promise<StepOutcome | null> {
    const llm = this.requireLLM();
    const sink = wire.soulSide;
    const { toolset } = this.agent;
    let interrupted = false;

    const dispatcher: ToolDispatcher = {
      tools: toolset.definitions,
      handle: (toolCall) => toolset.handle(toolCall, { wire: sink, signal }),
    };
    const history = [...this.context.history];
    const result = await raceAbort(
      withRetry({
        call: () =>
          step(
            llm.provider,
            this.agent.systemPrompt,
            dispatcher,
            history,
            {
              onMessagePart: (part) => sink.send(partEvent(part)),
              onToolResult: (toolResult) => {
                if (interrupted) {
                  return;
                }
                sink.send({ type: 'ToolResult', payload: toolResult });
              },
            },
            signal
          ),
        provider: llm.provider,
        maxAttempts: this.runtime.loopControl.maxRetriesPerStep,
        signal,
        sleep: this.sleep,
      }),
      signal
    );
    logger.debug('Step generated', { messageId: result.id, toolCalls: result.toolCalls.length });

    if (result.usage) {
      await this.context.updateTokenCount(inputTokens(result.usage));
    }
    sink.send({
      type: 'StatusUpdate',
      payload: {
        context_usage: result.usage ? this.status.contextUsage : null,
        token_usage: result.usage,
        message_id: result.id,
      },
    });

    let toolResults: ToolResult[];
    try {
      toolResults = await raceAbort(result.toolResults(), signal);
    } catch (error) {
      if (signal?.aborted) {
        interrupted = true;
        const settled = result.settledToolResults();
        const finalized = result.toolCalls.map((toolCall, index) => {
          const arrived = settled[index];
          if (arrived) {
            return arrived;
          }
          const synthetic: ToolResult = {
            tool_call_id: toolCall.id,
            return_value: toolInterrupted(),
          };
          sink.send({ type: 'ToolResult', payload: synthetic });
          return synthetic;
        });
        await this.growContext(llm, result, finalized);
      }
      throw error;
    }

    await this.growContext(llm, result, toolResults);

    if (toolResults.some((toolResult) => isToolRejected(toolResult.return_value))) {
      return { stopReason: 'tool_rejected', finalMessage: result.message };
    }
    if (result.toolCalls.length > 0 || this.steers.length > 0) {
      return null;
    }
    return { stopReason: 'no_tool_calls', finalMessage: result.message };
  }

  private async growContext(
    llm: LLM,
    result: StepResult,
    toolResults: readonly ToolResult[]
  ): Promise<void> {
    const toolMessages = toolResults.map((toolResult) => toolResultToMessage(toolResult));
    for (const message of toolMessages) {
      const missing = missingCapabilities(message, llm.capabilities);
      if (missing.length > 0) {
        logger.warn('Tool result needs capabilities the model lacks', { missing });
        throw new LLMNotSupported(llm.provider.modelName, missing);
      }
    }

    await this.context.appendMessage(result.message);
    if (result.usage) {
      await this.context.updateTokenCount(totalTokens(result.usage));
    }
    await this.context.appendMessage(...toolMessages);
  }

  /** Answer every outstanding request with its default and reject pending approvals. */
  private cancelPending(wire: Wire): void {
    wire.resolvePendingRequests();
    this.runtime.approval.rejectAll();
  }

  private interrupt(wire: Wire): never {
    this.cancelPending(wire);
    wire.soulSide.send({ type: 'StepInterrupted', payload: {} });
    throw new RunCancelled();
  }

  /**
   * For the duration of a step, forward approval requests raised by tools to the wire and
   * publish each answer.
   */
  private pipeApprovals(wire: Wire): { stop(): Promise<void> } {
    const controller = new AbortController();
    const { approval } = this.runtime;

    const task = (async () => {
      while (!controller.signal.aborted) {
        const request = await approval.fetchRequest(controller.signal);
        // The wire carries the approval's own request object, so the answer settles it.
        wire.soulSide.send(request);
        const response = await raceAbort(request.wait(), controller.signal);
        wire.soulSide.send({
          type: 'ApprovalResponse',
          payload: { request_id: request.id, response },
        });
      }
    })().catch((error: unknown) => {
      if (!controller.signal.aborted) {
        logger.error('Approval pipe failed', { error: toErrorMessage(error) });
      }
    });

    return {
      stop: async () => {
        controller.abort();
        await task;
      },
    };
  }
}
