/**
 * Claim Resolver
 * The synchronized read-modify-write behind claiming and resolving tickets.
 *
 * Lock order is always ticket scope, then expert scope.
 */

import type { ClaimResult, Expert, ResolveResult, Ticket } from '@sme-hunt/shared';
import { KeyedMutex } from '../../lib/keyedMutex.js';
import { createLogger } from '../../lib/logger.js';
import { isEligible } from '../../models/Expert.js';
import type { DirectoryStore } from '../directory/directoryStore.js';
import type { TicketStore } from '../tickets/ticketStore.js';

const log = createLogger('claimResolver');

// =============================================================================
// Types
// =============================================================================

export type ClaimResolution =
  | { result: 'accepted'; ticket: Ticket; expert: Expert }
  | { result: Exclude<ClaimResult, 'accepted'>; ticket: Ticket | null };

export type ResolveResolution =
  | { result: 'resolved'; ticket: Ticket }
  | { result: Exclude<ResolveResult, 'resolved'>; ticket: Ticket | null };

export interface ClaimLocks {
  tickets: KeyedMutex;
  experts: KeyedMutex;
}

export function createClaimLocks(): ClaimLocks {
  return {
    tickets: new KeyedMutex('ticket'),
    experts: new KeyedMutex('expert'),
  };
}

// =============================================================================
// Resolver
// =============================================================================

export class ClaimResolver {
  constructor(
    private readonly tickets: TicketStore,
    private readonly directory: DirectoryStore,
    private readonly locks: ClaimLocks
  ) {}

  /**
   * At most one `accepted` per ticket. StoreUnavailableError propagates and
   * leaves both records as they were.
   */
  async claim(ticketId: string, expertId: string): Promise<ClaimResolution> {
    return this.locks.tickets.runExclusive<ClaimResolution>(ticketId, () => {
      const ticket = this.tickets.get(ticketId);
      if (!ticket) {
        return { result: 'unknownTicket', ticket: null };
      }

      if (ticket.status === 'claimed' || ticket.status === 'resolved') {
        return { result: 'alreadyClaimed', ticket };
      }

      // Nothing to claim before the hunt starts or after it expired
      if (ticket.status !== 'hunting') {
        return { result: 'notEligible', ticket };
      }

      if (!ticket.notifiedExpertIds.includes(expertId)) {
        log.info({ ticketId, expertId }, 'Claim from an expert who was never paged');
        return { result: 'notEligible', ticket };
      }

      return this.locks.experts.runExclusive<ClaimResolution>(expertId, () => {
        const expert = this.directory.getExpert(expertId);
        if (!expert || !isEligible(expert)) {
          log.info({ ticketId, expertId, load: expert?.currentLoad }, 'Claim rejected, expert not eligible');
          return { result: 'notEligible', ticket };
        }

        const loaded: Expert = { ...expert, currentLoad: expert.currentLoad + 1 };
        this.directory.putExpert(loaded);

        let claimed: Ticket;
        try {
          claimed = this.tickets.update(ticketId, (current) => ({
            ...current,
            status: 'claimed',
            claimedBy: expertId,
            waveDeadline: null,
          }));
        } catch (error) {
          this.revertLoad(expert, error);
          throw error;
        }

        log.info({ ticketId, expertId, load: loaded.currentLoad }, 'Ticket claimed');
        return { result: 'accepted', ticket: claimed, expert: loaded };
      });
    });
  }

  /**
   * claimed -> resolved, releasing one unit of the claimant's load
   */
  async resolve(ticketId: string): Promise<ResolveResolution> {
    return this.locks.tickets.runExclusive<ResolveResolution>(ticketId, () => {
      const ticket = this.tickets.get(ticketId);
      if (!ticket) {
        return { result: 'unknownTicket', ticket: null };
      }
      if (ticket.status === 'resolved') {
        return { result: 'alreadyResolved', ticket };
      }
      if (ticket.status !== 'claimed' || ticket.claimedBy === null) {
        return { result: 'notClaimed', ticket };
      }

      const expertId = ticket.claimedBy;
      return this.locks.experts.runExclusive<ResolveResolution>(expertId, () => {
        // Load first, restored if the ticket write fails
        const expert = this.directory.getExpert(expertId);
        if (expert) {
          this.directory.putExpert({ ...expert, currentLoad: Math.max(0, expert.currentLoad - 1) });
        } else {
          log.warn({ ticketId, expertId }, 'Claimant no longer in directory, load not released');
        }

        const now = new Date();
        let resolved: Ticket;
        try {
          resolved = this.tickets.update(
            ticketId,
            (current) => ({ ...current, status: 'resolved', resolvedAt: now.toISOString() }),
            now
          );
        } catch (error) {
          if (expert) this.revertLoad(expert, error);
          throw error;
        }

        log.info({ ticketId, expertId }, 'Ticket resolved');
        return { result: 'resolved', ticket: resolved };
      });
    });
  }

  private revertLoad(original: Expert, cause: unknown): void {
    try {
      this.directory.putExpert(original);
    } catch (revertError) {
      log.error({ expertId: original.id, cause, revertError }, 'Could not restore expert load after failed ticket write');
    }
  }
}
