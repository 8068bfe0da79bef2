import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import {
  ALL_EVENT_KINDS,
  SessionEvent,
  SessionEventKind,
  SessionEventPayload,
  SubscribeOptions,
  Timeline,
} from './types';
import { Store } from '../infra/store';

type EventOf<K extends SessionEventKind> = Extract<SessionEvent, { type: K }>;

function isKind<K extends SessionEventKind>(event: SessionEvent, kind: K): event is EventOf<K> {
  return event.type === kind;
}

/**
 * Broadcast channel for one session (or one pool). Every event gets a monotonic `seq`, a unique
 * id and a timestamp; the recent timeline is kept in memory for replay and, when a store is
 * attached, appended to it.
 */
export class EventBus extends EventEmitter {
  private seq = 0;
  private timeline: Timeline[] = [];
  private subscribers = new Set<EventSubscriber>();
  private store?: Store;

  constructor(private readonly sessionId: string) {
    super();
  }

  setStore(store: Store) {
    this.store = store;
  }

  /** Continue numbering after events persisted by an earlier run. */
  continueFrom(nextSeq: number) {
    if (nextSeq > this.seq) this.seq = nextSeq;
  }

  emitEvent(payload: SessionEventPayload): SessionEvent {
    const meta = { seq: this.seq++, eventId: randomUUID(), timestamp: Date.now(), sessionId: this.sessionId };
    const event: SessionEvent = { ...payload, ...meta };
    const entry: Timeline = { seq: event.seq, event };

    this.timeline.push(entry);

    // keep only the most recent events in memory
    if (this.timeline.length > 10000) {
      this.timeline = this.timeline.slice(-5000);
    }

    if (this.store) {
      this.store.appendEvent(this.sessionId, entry).catch((err) => {
        console.error(`[events:${this.sessionId}] Failed to persist event:`, err);
      });
    }

    for (const subscriber of this.subscribers) {
      if (subscriber.accepts(event.type)) {
        subscriber.push(event);
      }
    }

    if (this.listenerCount(event.type) > 0) {
      try {
        this.emit(event.type, event);
      } catch (err) {
        console.error(`[events:${this.sessionId}] Listener for "${event.type}" failed:`, err);
      }
    }

    return event;
  }

  /** Typed listener; returns a function that removes it. */
  onEvent<K extends SessionEventKind>(kind: K, listener: (event: EventOf<K>) => void): () => void {
    const wrapped = (event: SessionEvent) => {
      if (isKind(event, kind)) listener(event);
    };
    this.on(kind, wrapped);
    return () => {
      this.off(kind, wrapped);
    };
  }

  /**
   * Async stream of events. With `since`, events still in memory with `seq >= since` are
   * replayed first. Breaking out of a `for await` loop unsubscribes.
   */
  subscribe(opts: SubscribeOptions = {}): AsyncIterable<SessionEvent> {
    const subscriber = new EventSubscriber(opts.kinds ?? ALL_EVENT_KINDS);
    this.subscribers.add(subscriber);

    const since = opts.since;
    if (since !== undefined) {
      for (const entry of this.timeline) {
        if (entry.seq >= since && subscriber.accepts(entry.event.type)) {
          subscriber.push(entry.event);
        }
      }
    }

    const detach = () => {
      subscriber.close();
      this.subscribers.delete(subscriber);
    };

    return {
      [Symbol.asyncIterator]: () => ({
        next: async (): Promise<IteratorResult<SessionEvent>> => {
          const event = await subscriber.next();
          if (!event) {
            detach();
            return { done: true, value: undefined };
          }
          return { done: false, value: event };
        },
        return: async (): Promise<IteratorResult<SessionEvent>> => {
          detach();
          return { done: true, value: undefined };
        },
      }),
    };
  }

  getTimeline(since?: number): Timeline[] {
    return since !== undefined ? this.timeline.filter((t) => t.seq >= since) : [...this.timeline];
  }

  getSeq(): number {
    return this.seq;
  }

  /** End every open subscription. */
  close() {
    for (const subscriber of this.subscribers) {
      subscriber.close();
    }
    this.subscribers.clear();
  }
}

class EventSubscriber {
  private queue: SessionEvent[] = [];
  private waiting: ((event: SessionEvent | null) => void) | null = null;
  private closed = false;

  constructor(private kinds: SessionEventKind[]) {}

  accepts(kind: SessionEventKind): boolean {
    return this.kinds.includes(kind);
  }

  push(event: SessionEvent) {
    if (this.closed) return;

    if (this.waiting) {
      this.waiting(event);
      this.waiting = null;
    } else {
      this.queue.push(event);
    }
  }

  async next(): Promise<SessionEvent | null> {
    const queued = this.queue.shift();
    if (queued) return queued;
    if (this.closed) return null;

    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close() {
    this.closed = true;
    if (this.waiting) {
      this.waiting(null);
      this.waiting = null;
    }
  }
}
