import { Notification, NotificationBody, NotificationFamily } from '../../shared/notifications';
import { ValidationError } from './errors';
import { hashObject } from './hash';

export interface LedgerIntegrityReport {
  ok: boolean;
  errors: string[];
}

function stripEventHash(event: Notification): unknown {
  const { event_hash, ...rest } = event;
  return rest;
}

/** Append-only, hash-chained list of published notifications. */
export class Ledger {
  private events: Notification[] = [];

  constructor(initialEvents?: Notification[]) {
    if (initialEvents && initialEvents.length > 0) {
      this.events = [...initialEvents];
    }
  }

  getEvents(): Notification[] {
    return [...this.events];
  }

  size(): number {
    return this.events.length;
  }

  since(sequence: number): Notification[] {
    return this.events.slice(sequence);
  }

  byFamily(family: NotificationFamily): Notification[] {
    return this.events.filter((event) => event.family === family);
  }

  getLatestHash(): string {
    if (this.events.length === 0) {
      return 'GENESIS';
    }
    return this.events[this.events.length - 1].event_hash;
  }

  append(body: NotificationBody, timestamp: number): Notification {
    const latest = this.events[this.events.length - 1];
    if (latest && timestamp < latest.timestamp) {
      throw new ValidationError('notification timestamp precedes the previous notification', {
        previous: latest.timestamp,
        timestamp,
      });
    }

    const prev_hash = this.getLatestHash();
    const sequence = this.events.length;
    const id = hashObject({ prev_hash, sequence, family: body.family, operation: body.operation });

    const eventBase: Notification = {
      ...body,
      id,
      sequence,
      timestamp,
      prev_hash,
      event_hash: '',
    };
    const event: Notification = { ...eventBase, event_hash: hashObject(stripEventHash(eventBase)) };

    this.events.push(event);
    return event;
  }

  /** Drops notifications appended by an operation that did not commit. */
  truncate(length: number): void {
    if (length < this.events.length) {
      this.events = this.events.slice(0, length);
    }
  }

  verifyIntegrity(): LedgerIntegrityReport {
    const errors: string[] = [];
    for (let i = 0; i < this.events.length; i += 1) {
      const event = this.events[i];
      const expectedPrev = i === 0 ? 'GENESIS' : this.events[i - 1].event_hash;
      if (event.prev_hash !== expectedPrev) {
        errors.push(`event ${event.id} has invalid prev_hash`);
      }
      if (event.sequence !== i) {
        errors.push(`event ${event.id} has invalid sequence`);
      }

      const expectedHash = hashObject(stripEventHash(event));
      if (event.event_hash !== expectedHash) {
        errors.push(`event ${event.id} has invalid event_hash`);
      }
    }

    return { ok: errors.length === 0, errors };
  }
}
