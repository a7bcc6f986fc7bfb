/**
 * Event log writer — in-memory append-only store.
 *
 * The pool appends the events of an operation only after the operation has
 * committed, so the log never shows a rejected call.
 */

import type { EventEnvelope } from "./schemas.js";

export class EventLog {
  private readonly events: EventEnvelope[] = [];

  append(batch: readonly Omit<EventEnvelope, "seq">[]): EventEnvelope[] {
    const base = this.events.length;
    const appended = batch.map((event, i) => ({ ...event, seq: base + i }));
    this.events.push(...appended);
    return appended;
  }

  getEvents(fromSeq: number = 0): EventEnvelope[] {
    return this.events.filter((e) => e.seq >= fromSeq);
  }

  getEventsByType(type: string): EventEnvelope[] {
    return this.events.filter((e) => e.type === type);
  }

  getEventCount(): number {
    return this.events.length;
  }
}
