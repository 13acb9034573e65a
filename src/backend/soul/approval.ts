import { randomUUID } from 'node:crypto';
import { AsyncQueue } from '../lib/async-queue';
import type { DisplayBlock } from '../llm/tooling';
import { createLogger } from '../services/logger.service';
import { ApprovalRequest, type ApprovalResponseKind } from '../wire/types';
import { currentToolCall } from './toolset';

const logger = createLogger('approval');

export interface ApprovalStateInit {
  yolo?: boolean;
  autoApproveActions?: Iterable<string>;
  onChange?: () => void;
}

/**
 * Approval decisions shared by a main agent and all of its subagents. Every mutation
 * calls `onChange` synchronously.
 */
export class ApprovalState {
  private _yolo: boolean;
  private readonly actions: Set<string>;
  onChange: (() => void) | undefined;

  constructor(init: ApprovalStateInit = {}) {
    this._yolo = init.yolo ?? false;
    this.actions = new Set(init.autoApproveActions ?? []);
    this.onChange = init.onChange;
  }

  get yolo(): boolean {
    return this._yolo;
  }

  get autoApproveActions(): ReadonlySet<string> {
    return this.actions;
  }

  setYolo(yolo: boolean): void {
    this._yolo = yolo;
    this.onChange?.();
  }

  /** Returns false when the action was already auto-approved. */
  addAutoApproveAction(action: string): boolean {
    if (this.actions.has(action)) {
      return false;
    }
    this.actions.add(action);
    this.onChange?.();
    return true;
  }

  isAutoApproved(action: string): boolean {
    return this._yolo || this.actions.has(action);
  }
}

export class ApprovalNotFoundError extends Error {
  constructor(id: string) {
    super(`Approval request not found: ${id}`);
    this.name = 'ApprovalNotFoundError';
  }
}

/**
 * Human gating for tool actions. Tools call `request()` from inside their tool scope;
 * whoever presents approvals pulls them with `fetchRequest()` and answers with
 * `resolveRequest()`.
 */
export class Approval {
  private readonly queue = new AsyncQueue<ApprovalRequest>();
  private readonly requests = new Map<string, ApprovalRequest>();

  constructor(readonly state: ApprovalState = new ApprovalState()) {}

  /** A new Approval bound to the same state. */
  share(): Approval {
    return new Approval(this.state);
  }

  get isYolo(): boolean {
    return this.state.yolo;
  }

  setYolo(yolo: boolean): void {
    this.state.setYolo(yolo);
  }

  /**
   * Ask whether the current tool may perform `action`. Resolves true when approved.
   */
  async request(
    sender: string,
    action: string,
    description: string,
    display: DisplayBlock[] = []
  ): Promise<boolean> {
    const toolCall = currentToolCall();
    if (!toolCall) {
      throw new Error('Approval must be requested from within a tool call');
    }
    if (this.state.isAutoApproved(action)) {
      return true;
    }

    const request = new ApprovalRequest({
      id: randomUUID(),
      tool_call_id: toolCall.id,
      sender,
      action,
      description,
      display,
    });
    this.requests.set(request.id, request);
    this.queue.put(request);
    logger.debug('Approval requested', { id: request.id, sender, action });

    let response: ApprovalResponseKind;
    try {
      response = await request.wait();
    } finally {
      this.requests.delete(request.id);
    }
    switch (response) {
      case 'approve':
        return true;
      case 'approve_for_session':
        this.state.addAutoApproveAction(action);
        return true;
      case 'reject':
        return false;
    }
  }

  /**
   * The next request that still needs an answer. Requests whose action became
   * auto-approved while queued are approved on the way.
   */
  async fetchRequest(signal?: AbortSignal): Promise<ApprovalRequest> {
    while (true) {
      const request = await this.queue.get(signal);
      if (request.resolved) {
        continue;
      }
      if (this.state.isAutoApproved(request.payload.action)) {
        request.resolve('approve');
        continue;
      }
      return request;
    }
  }

  /** Answer a request by id. Settled requests are forgotten, so their ids are unknown. */
  resolveRequest(id: string, response: ApprovalResponseKind): void {
    const request = this.requests.get(id);
    if (!request) {
      throw new ApprovalNotFoundError(id);
    }
    this.requests.delete(id);
    request.resolve(response);
  }

  /** Reject every request that has not been answered yet. */
  rejectAll(): void {
    for (const request of this.requests.values()) {
      request.resolve('reject');
    }
    this.requests.clear();
  }
}
