/**
 * Messages exchanged on the wire between the agent loop and its consumers.
 *
 * Every message is `{ type, payload }`. Events are plain data broadcast to every side.
 * Requests are class instances carrying a single-assignment resolution slot; exactly one
 * side answers them.
 */

import type {
  ContentPart,
  TokenUsage,
  ToolCall,
  ToolCallPart,
  UserInput,
} from '../llm/message';
import {
  type DisplayBlock,
  type ToolResult,
  type ToolReturnValue,
  toolInterrupted,
} from '../llm/tooling';

// =============================================================================
// Event payloads
// =============================================================================

export type EmptyPayload = Record<string, never>;

export interface TurnBeginPayload {
  user_input: UserInput;
}

export interface StepBeginPayload {
  n: number;
}

export interface StatusUpdatePayload {
  context_usage: number | null;
  token_usage: TokenUsage | null;
  message_id: string | null;
}

export type ApprovalResponseKind = 'approve' | 'approve_for_session' | 'reject';

export interface ApprovalResponsePayload {
  request_id: string;
  response: ApprovalResponseKind;
}

export interface SubagentEventPayload {
  task_tool_call_id: string;
  event: WireEvent;
}

// =============================================================================
// Events
// =============================================================================

export type WireEvent =
  | { type: 'TurnBegin'; payload: TurnBeginPayload }
  | { type: 'TurnEnd'; payload: EmptyPayload }
  | { type: 'StepBegin'; payload: StepBeginPayload }
  | { type: 'StepInterrupted'; payload: EmptyPayload }
  | { type: 'CompactionBegin'; payload: EmptyPayload }
  | { type: 'CompactionEnd'; payload: EmptyPayload }
  | { type: 'StatusUpdate'; payload: StatusUpdatePayload }
  | { type: 'ContentPart'; payload: ContentPart }
  | { type: 'ToolCall'; payload: ToolCall }
  | { type: 'ToolCallPart'; payload: ToolCallPart }
  | { type: 'ToolResult'; payload: ToolResult }
  | { type: 'ApprovalResponse'; payload: ApprovalResponsePayload }
  | { type: 'SubagentEvent'; payload: SubagentEventPayload };

export type WireEventType = WireEvent['type'];

// =============================================================================
// Requests
// =============================================================================

type Slot<T> =
  | { state: 'pending' }
  | { state: 'resolved'; value: T }
  | { state: 'failed'; error: Error };

/**
 * Base for messages that need exactly one answer. The first `resolve` or `setException`
 * wins; later calls are ignored.
 */
abstract class WireRequest<TPayload extends { id: string }, TResult> {
  #slot: Slot<TResult> = { state: 'pending' };
  #waiters: Array<{ resolve: (value: TResult) => void; reject: (error: Error) => void }> = [];

  constructor(readonly payload: TPayload) {}

  get id(): string {
    return this.payload.id;
  }

  get resolved(): boolean {
    return this.#slot.state !== 'pending';
  }

  resolve(value: TResult): void {
    if (this.#slot.state !== 'pending') {
      return;
    }
    this.#slot = { state: 'resolved', value };
    for (const waiter of this.#waiters.splice(0)) {
      waiter.resolve(value);
    }
  }

  setException(error: Error): void {
    if (this.#slot.state !== 'pending') {
      return;
    }
    this.#slot = { state: 'failed', error };
    for (const waiter of this.#waiters.splice(0)) {
      waiter.reject(error);
    }
  }

  wait(): Promise<TResult> {
    const slot = this.#slot;
    switch (slot.state) {
      case 'resolved':
        return Promise.resolve(slot.value);
      case 'failed':
        return Promise.reject(slot.error);
      case 'pending':
        return new Promise<TResult>((resolve, reject) => {
          this.#waiters.push({ resolve, reject });
        });
    }
  }

  /** Answer with the value used when nobody is left to answer. */
  abstract resolveDefault(): void;
}

export interface ApprovalRequestPayload {
  id: string;
  tool_call_id: string;
  sender: string;
  action: string;
  description: string;
  display: DisplayBlock[];
}

export class ApprovalRequest extends WireRequest<ApprovalRequestPayload, ApprovalResponseKind> {
  readonly type = 'ApprovalRequest' as const;

  resolveDefault(): void {
    this.resolve('reject');
  }
}

export interface QuestionOption {
  label: string;
  description: string;
}

export interface QuestionItem {
  question: string;
  header: string;
  options: QuestionOption[];
  multi_select: boolean;
}

export interface QuestionRequestPayload {
  id: string;
  tool_call_id: string;
  questions: QuestionItem[];
}

/** Answers keyed by question text. */
export type QuestionAnswers = Record<string, string>;

export class QuestionRequest extends WireRequest<QuestionRequestPayload, QuestionAnswers> {
  readonly type = 'QuestionRequest' as const;

  resolveDefault(): void {
    this.resolve({});
  }
}

export interface ToolCallRequestPayload {
  id: string;
  name: string;
  arguments: string | null;
}

export class ToolCallRequest extends WireRequest<ToolCallRequestPayload, ToolReturnValue> {
  readonly type = 'ToolCallRequest' as const;

  resolveDefault(): void {
    this.resolve(toolInterrupted());
  }
}

/** Set on a QuestionRequest when the connected client cannot present questions. */
export class QuestionNotSupported extends Error {
  constructor(message = 'The connected client does not support interactive questions.') {
    super(message);
    this.name = 'QuestionNotSupported';
  }
}

export type WireRequestMessage = ApprovalRequest | QuestionRequest | ToolCallRequest;

export type WireMessage = WireEvent | WireRequestMessage;

export type WireMessageType = WireMessage['type'];

export function isRequest(message: WireMessage): message is WireRequestMessage {
  return (
    message instanceof ApprovalRequest ||
    message instanceof QuestionRequest ||
    message instanceof ToolCallRequest
  );
}
