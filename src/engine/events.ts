import type { EventType, SimEvent } from './types';

export const SIM_EVENT = 'sim:event';

export class SimEventNotice extends Event {
  readonly detail: SimEvent;

  constructor(detail: SimEvent) {
    super(SIM_EVENT);
    this.detail = detail;
  }
}

// Append-only diagnostic trail. Every entry is also broadcast on the bus.
export default class EventLog {
  private bus: EventTarget;
  private entries: SimEvent[] = [];

  constructor(bus: EventTarget) {
    this.bus = bus;
  }

  log(step: number, type: EventType, message: string): SimEvent {
    const ev: SimEvent = { step, type, message };
    this.entries.push(ev);
    this.bus.dispatchEvent(new SimEventNotice(ev));
    return ev;
  }

  // Newest first.
  recent(limit = 50): SimEvent[] {
    if (limit <= 0) return [];
    return this.entries.slice(-limit).reverse().map((e) => ({ ...e }));
  }
}
