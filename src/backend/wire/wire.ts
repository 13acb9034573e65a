import pLimit from 'p-limit';
import { type AsyncQueue, BroadcastQueue, QueueShutDownError } from '../lib/async-queue';
import { toError } from '../lib/error-utils';
import { createLogger } from '../services/logger.service';
import { isRequest, type WireEvent, type WireMessage, type WireRequestMessage } from './types';
import type { WireFile } from './wire-file';

const logger = createLogger('wire');

export interface WireOptions {
  /** Persist every message to this log and allow replay attaches. */
  file?: WireFile;
}

export interface AttachOptions {
  /** Replace each SubagentEvent with the event it wraps. */
  merge?: boolean;
  /** Yield everything already persisted before live messages. */
  replay?: boolean;
  /** Route requests to this side. Defaults to true while no other side handles them. */
  handlesRequests?: boolean;
}

/**
 * The bus between the agent loop and its consumers.
 *
 * Events are broadcast to every attached side. Requests go to the single side that handles
 * them, or wait in a buffer until one attaches. Every message is appended to the wire log
 * in publish order by a single-slot recorder.
 */
export class Wire {
  readonly soulSide: WireSoulSide;

  private readonly broadcast = new BroadcastQueue<WireMessage>();
  private readonly recorder = pLimit(1);
  private readonly unrouted: WireRequestMessage[] = [];
  private readonly outstanding = new Set<WireRequestMessage>();
  private handler: WireUISide | null = null;
  private closed = false;

  constructor(private readonly options: WireOptions = {}) {
    this.soulSide = new WireSoulSide(this);
  }

  get isShutDown(): boolean {
    return this.closed;
  }

  publish(event: WireEvent): void {
    if (this.closed) {
      logger.debug('Dropping event published after shutdown', { type: event.type });
      return;
    }
    this.record(event);
    this.broadcast.publish(event);
  }

  /** Hand a request to the handling side. The caller awaits `request.wait()`. */
  request(request: WireRequestMessage): void {
    if (this.closed) {
      request.resolveDefault();
      return;
    }
    this.record(request);
    this.outstanding.add(request);
    const handler = this.handler;
    if (handler) {
      handler.deliver(request);
    } else {
      this.unrouted.push(request);
    }
  }

  attach(options: AttachOptions = {}): WireUISide {
    const handlesRequests = (options.handlesRequests ?? this.handler === null) && !this.closed;
    const routed = handlesRequests
      ? this.unrouted.splice(0).filter((request) => !request.resolved)
      : [];
    const replayed = options.replay ? this.readBacklog() : null;
    // A buffered request is already in the log: the handler gets the live object in the
    // copy's place, once.
    const backlog = replayed?.then((messages) => withLiveRequests(messages, routed)) ?? null;
    const side = new WireUISide(this, this.broadcast.subscribe(), {
      merge: options.merge ?? false,
      backlog,
    });

    if (handlesRequests) {
      this.handler = side;
      if (!backlog) {
        for (const request of routed) {
          side.deliver(request);
        }
      }
    }
    return side;
  }

  /** Answer every request still waiting with its default. */
  resolvePendingRequests(): void {
    for (const request of [...this.unrouted, ...this.outstanding]) {
      if (!request.resolved) {
        request.resolveDefault();
      }
    }
    this.unrouted.length = 0;
    this.outstanding.clear();
  }

  /**
   * Close the bus. Sides still drain what was already queued, then observe
   * `QueueShutDownError`. Requests nobody received are answered with their default.
   */
  shutdown(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    for (const request of this.unrouted.splice(0)) {
      request.resolveDefault();
    }
    this.broadcast.shutdown();
    this.handler = null;
  }

  /** Resolves once every message published so far has been written to the log. */
  async join(): Promise<void> {
    await this.recorder(() => Promise.resolve());
  }

  /** @internal */
  detach(side: WireUISide, queue: AsyncQueue<WireMessage>): void {
    this.broadcast.unsubscribe(queue);
    if (this.handler === side) {
      this.handler = null;
    }
  }

  private record(message: WireMessage): void {
    const file = this.options.file;
    if (!file) {
      return;
    }
    const timestamp = Date.now() / 1000;
    this.recorder(() => file.append(message, timestamp)).catch((error: unknown) => {
      logger.error('Failed to record wire message', toError(error), {
        path: file.path,
        type: message.type,
      });
    });
  }

  private readBacklog(): Promise<WireMessage[]> {
    const file = this.options.file;
    if (!file) {
      return Promise.resolve([]);
    }
    // Queued behind pending writes: the log then holds exactly what was published before
    // the attach, and the live queue holds everything after it.
    return this.recorder(() => file.readMessages()).catch((error: unknown) => {
      logger.error('Failed to read wire log for replay', toError(error), { path: file.path });
      return [];
    });
  }
}

function withLiveRequests(
  messages: WireMessage[],
  live: readonly WireRequestMessage[]
): WireMessage[] {
  const pending = new Map<string, WireRequestMessage>(live.map((request) => [request.id, request]));
  const merged = messages.map((message) => {
    if (!isRequest(message)) {
      return message;
    }
    const request = pending.get(message.id);
    if (!request) {
      return message;
    }
    pending.delete(message.id);
    return request;
  });
  return [...merged, ...pending.values()];
}

/** The agent loop's end of the wire. */
export class WireSoulSide {
  constructor(private readonly wire: Wire) {}

  send(message: WireMessage): void {
    if (isRequest(message)) {
      this.wire.request(message);
    } else {
      this.wire.publish(message);
    }
  }
}

/** A consumer's end of the wire. */
export class WireUISide implements AsyncIterable<WireMessage> {
  private readonly merge: boolean;
  private backlog: Promise<WireMessage[]> | null;
  private closed = false;

  constructor(
    private readonly wire: Wire,
    private readonly queue: AsyncQueue<WireMessage>,
    options: { merge: boolean; backlog: Promise<WireMessage[]> | null }
  ) {
    this.merge = options.merge;
    this.backlog = options.backlog;
  }

  /**
   * Next message for this side. Rejects with `QueueShutDownError` once the wire is shut
   * down and everything queued has been received.
   */
  async receive(signal?: AbortSignal): Promise<WireMessage> {
    if (this.backlog) {
      const backlog = await this.backlog;
      const next = backlog.shift();
      if (next) {
        return this.present(next);
      }
      this.backlog = null;
    }
    return this.present(await this.queue.get(signal));
  }

  async *[Symbol.asyncIterator](): AsyncIterator<WireMessage> {
    while (true) {
      try {
        yield await this.receive();
      } catch (error) {
        if (error instanceof QueueShutDownError) {
          return;
        }
        throw error;
      }
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.wire.detach(this, this.queue);
    this.queue.shutdown();
  }

  /** @internal */
  deliver(request: WireRequestMessage): void {
    if (this.queue.isShutDown) {
      request.resolveDefault();
      return;
    }
    this.queue.put(request);
  }

  private present(message: WireMessage): WireMessage {
    if (this.merge && message.type === 'SubagentEvent') {
      return message.payload.event;
    }
    return message;
  }
}
