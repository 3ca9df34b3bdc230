/**
 * Ticket Store
 * Ticket records keyed by id. Guards the status transition table and the
 * claimedBy invariant on every write; tickets are never deleted.
 */

import type { Ticket, TicketStatus } from '@sme-hunt/shared';
import type { SnapshotStorage } from '../../lib/storage/snapshotStorage.js';
import { InvariantViolationError, NotFoundError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import { canTransition, type TicketsDocument } from '../../models/Ticket.js';

const log = createLogger('ticketStore');

export interface TicketListOptions {
  status?: TicketStatus;
  requesterId?: string;
}

export class TicketStore {
  private tickets = new Map<string, Ticket>();

  constructor(private readonly storage: SnapshotStorage<TicketsDocument>) {}

  load(): void {
    const doc = this.storage.load();
    this.tickets = new Map(Object.values(doc?.ticketsById ?? {}).map((ticket) => [ticket.id, ticket]));
    log.info({ tickets: this.tickets.size }, 'Tickets loaded');
  }

  get(id: string): Ticket | null {
    const ticket = this.tickets.get(id);
    return ticket ? structuredClone(ticket) : null;
  }

  /**
   * Oldest first
   */
  listAll(options: TicketListOptions = {}): Ticket[] {
    return [...this.tickets.values()]
      .filter((t) => !options.status || t.status === options.status)
      .filter((t) => !options.requesterId || t.requesterId === options.requesterId)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt) || a.id.localeCompare(b.id))
      .map((t) => structuredClone(t));
  }

  /**
   * Insert or replace. Durable before it returns; the in-memory view only
   * changes if the flush succeeds.
   */
  put(ticket: Ticket): void {
    const previous = this.tickets.get(ticket.id);
    this.assertWritable(previous, ticket);

    this.tickets.set(ticket.id, structuredClone(ticket));
    try {
      this.flush();
    } catch (error) {
      if (previous) this.tickets.set(ticket.id, previous);
      else this.tickets.delete(ticket.id);
      throw error;
    }
  }

  /**
   * Read, apply `change`, stamp lastActivityAt and write back
   */
  update(id: string, change: (ticket: Ticket) => Ticket, now: Date = new Date()): Ticket {
    const current = this.get(id);
    if (!current) {
      throw new NotFoundError('Ticket', id);
    }
    const next = { ...change(current), id, lastActivityAt: now.toISOString() };
    this.put(next);
    return next;
  }

  private assertWritable(previous: Ticket | undefined, next: Ticket): void {
    const claimed = next.status === 'claimed' || next.status === 'resolved';
    if (claimed !== (next.claimedBy !== null)) {
      throw new InvariantViolationError('claimedBy must be set exactly when claimed or resolved', {
        ticketId: next.id,
        status: next.status,
        claimedBy: next.claimedBy,
      });
    }

    if (!previous) return;

    if (previous.status === 'resolved' || previous.status === 'expired') {
      throw new InvariantViolationError(`Ticket ${next.id} is ${previous.status} and can no longer change`, {
        ticketId: next.id,
      });
    }

    if (previous.status !== next.status && !canTransition(previous.status, next.status)) {
      throw new InvariantViolationError(`Illegal status change ${previous.status} -> ${next.status}`, {
        ticketId: next.id,
        from: previous.status,
        to: next.status,
      });
    }

    if (previous.claimedBy !== null && previous.claimedBy !== next.claimedBy) {
      throw new InvariantViolationError('claimedBy cannot be reassigned', {
        ticketId: next.id,
        claimedBy: previous.claimedBy,
      });
    }
  }

  private flush(): void {
    const ticketsById: Record<string, Ticket> = {};
    for (const [id, ticket] of this.tickets) {
      ticketsById[id] = ticket;
    }
    this.storage.save({
      version: 1,
      updatedAt: new Date().toISOString(),
      ticketsById,
    });
  }
}
