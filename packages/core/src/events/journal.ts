/**
 * Event Journal
 *
 * Append-only record of committed settlement events.
 *
 * Events emitted inside atomic() are staged and only reach the journal (and its
 * subscribers) once the outermost atomic() returns. A throwing body discards
 * whatever it staged, nested bodies included.
 */

import { describeError } from "../errors";
import { log as defaultLog, type Logger } from "../logger";
import type { Clock } from "../types";
import type { EventOfType, SettlementEvent, SettlementEventBody, SettlementEventType } from "./types";

export type EventListener = (event: SettlementEvent) => void;

type Staged = { body: SettlementEventBody; ts_ms: number };

export class EventJournal {
  private committed: SettlementEvent[] = [];
  private staged: Staged[] = [];
  private depth = 0;
  private listeners = new Set<EventListener>();

  constructor(
    private readonly now: Clock,
    private readonly log: Logger = defaultLog
  ) {}

  emit(body: SettlementEventBody): void {
    this.staged.push({ body, ts_ms: this.now() });
    if (this.depth === 0) this.flush();
  }

  atomic<T>(fn: () => T): T {
    const mark = this.staged.length;
    this.depth++;
    let result: T;
    try {
      result = fn();
    } catch (error) {
      this.staged.length = mark;
      throw error;
    } finally {
      this.depth--;
    }
    if (this.depth === 0) this.flush();
    return result;
  }

  subscribe(listener: EventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  list(): SettlementEvent[] {
    return [...this.committed];
  }

  ofType<K extends SettlementEventType>(type: K): EventOfType<K>[] {
    return this.committed.filter((event): event is EventOfType<K> => event.type === type);
  }

  private flush(): void {
    const pending = this.staged;
    this.staged = [];
    for (const { body, ts_ms } of pending) {
      const event: SettlementEvent = { ...body, seq: this.committed.length + 1, ts_ms };
      this.committed.push(event);
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (error) {
          // Already committed; the sink failure is only reported.
          this.log("warn", "Event listener failed", { seq: event.seq, type: event.type, error: describeError(error) });
        }
      }
    }
  }
}
