/**
 * Hunt Engine
 * Runs one hunt task per ticket: pages ranked experts in waves, reacts to
 * claims, escalates to the fallback channel when nobody answers, and stops
 * on cancellation.
 *
 * Every read-modify-write of a ticket happens inside the ticket scope of the
 * shared claim locks, so the hunt path and the claim command path never
 * interleave on the same ticket.
 */

import type { CancelResult, Expert, Ticket } from '@sme-hunt/shared';
import type pino from 'pino';
import type { HuntSettings } from '../../config/settings.js';
import { isIntegrityError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import type { DirectoryStore } from '../directory/directoryStore.js';
import type { TicketStore } from '../tickets/ticketStore.js';
import {
  describeRecipient,
  userRecipient,
  type HuntOutcome,
  type Notifier,
  type Recipient,
} from '../notifications/notifier.js';
import type { ClaimLocks, ClaimResolution, ClaimResolver, ResolveResolution } from './claimResolver.js';
import { rank } from './matcher.js';
import { fallbackMessage, pageMessage } from './messages.js';

const log = createLogger('huntEngine');

// =============================================================================
// Types
// =============================================================================

export interface HuntEngineDeps {
  tickets: TicketStore;
  directory: DirectoryStore;
  notifier: Notifier;
  resolver: ClaimResolver;
  locks: ClaimLocks;
  settings: HuntSettings;
  fallbackChannel: string;
}

type ExpiryReason = 'exhausted' | 'no_candidates' | 'hunt_timeout';

type WakeReason =
  /** The wave (or the whole hunt) ran out of time */
  | { kind: 'deadline' }
  /** Claimed or cancelled from outside; the ticket is already terminal */
  | { kind: 'closed' }
  /** Engine shutdown; ticket state is left for the next start */
  | { kind: 'stopped' };

type WaveIssue =
  | { kind: 'issued'; ticket: Ticket; wave: string[]; reminder: boolean; deadline: number }
  | { kind: 'exhausted'; reason: ExpiryReason }
  | { kind: 'closed' };

// =============================================================================
// Hunt Task
// =============================================================================

/**
 * In-memory state of one running hunt. Wake-ups that arrive while the task
 * is busy (e.g. sending pages) are kept and returned by the next wait.
 */
class HuntTask {
  rankedCandidates: string[] = [];
  done: Promise<void> = Promise.resolve();

  private pending: WakeReason | null = null;
  private waiter: ((reason: WakeReason) => void) | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    readonly ticketId: string,
    readonly log: pino.Logger
  ) {}

  /**
   * True once the ticket was claimed or cancelled from outside. A shutdown
   * does not count: pages already recorded as sent still go out.
   */
  get closed(): boolean {
    return this.pending !== null && this.pending.kind === 'closed';
  }

  wait(until: number): Promise<WakeReason> {
    if (this.pending) {
      const reason = this.pending;
      this.pending = null;
      return Promise.resolve(reason);
    }

    return new Promise<WakeReason>((resolve) => {
      this.waiter = resolve;
      this.timer = setTimeout(() => this.wake({ kind: 'deadline' }), Math.max(0, until - Date.now()));
    });
  }

  wake(reason: WakeReason): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(reason);
      return;
    }

    if (!this.pending || this.pending.kind === 'deadline' || reason.kind === 'closed') {
      this.pending = reason;
    }
  }
}

// =============================================================================
// Policy
// =============================================================================

/**
 * One expert at a time, or a wider parallel wave for VIP and urgent tickets
 */
export function computeWaveSize(ticket: Pick<Ticket, 'userPriority' | 'urgencyScore'>, settings: HuntSettings): number {
  const widened = ticket.userPriority === 'vip' || ticket.urgencyScore >= settings.highUrgencyThreshold;
  return widened ? settings.vipWaveWidth : 1;
}

// =============================================================================
// Engine
// =============================================================================

export class HuntEngine {
  private readonly tasks = new Map<string, HuntTask>();

  constructor(private readonly deps: HuntEngineDeps) {}

  // ===========================================================================
  // Lifecycle
  // ===========================================================================

  /**
   * Start (or resume) the hunt for a ticket. No-op if one is already running.
   */
  startHunt(ticketId: string): void {
    if (this.tasks.has(ticketId)) return;

    const task = new HuntTask(ticketId, log.child({ ticketId }));
    this.tasks.set(ticketId, task);
    task.done = this.runHunt(task).finally(() => {
      this.tasks.delete(ticketId);
    });
  }

  /**
   * Pick up every ticket a previous process left open or hunting
   */
  resumeInterrupted(): string[] {
    const resumable = [
      ...this.deps.tickets.listAll({ status: 'open' }),
      ...this.deps.tickets.listAll({ status: 'hunting' }),
    ];

    for (const ticket of resumable) {
      this.startHunt(ticket.id);
    }

    if (resumable.length > 0) {
      log.info({ count: resumable.length }, 'Resumed interrupted hunts');
    }
    return resumable.map((t) => t.id);
  }

  /**
   * Abort every wait without touching ticket state
   */
  async stop(): Promise<void> {
    const running = [...this.tasks.values()];
    running.forEach((task) => task.wake({ kind: 'stopped' }));
    await Promise.all(running.map((task) => task.done));
  }

  activeHunts(): string[] {
    return [...this.tasks.keys()].sort();
  }

  /**
   * Resolves when the ticket's hunt task (if any) has finished
   */
  async settled(ticketId: string): Promise<void> {
    await this.tasks.get(ticketId)?.done;
  }

  // ===========================================================================
  // Commands
  // ===========================================================================

  async claim(ticketId: string, expertId: string): Promise<ClaimResolution> {
    const resolution = await this.deps.resolver.claim(ticketId, expertId);

    if (resolution.result === 'accepted') {
      this.tasks.get(ticketId)?.wake({ kind: 'closed' });
      await this.announceClaim(resolution.ticket, resolution.expert);
    }

    return resolution;
  }

  async resolve(ticketId: string): Promise<ResolveResolution> {
    const resolution = await this.deps.resolver.resolve(ticketId);

    if (resolution.result === 'resolved' && resolution.ticket.claimedBy !== null) {
      await this.announce(
        resolution.ticket,
        { kind: 'resolved', expertId: resolution.ticket.claimedBy },
        [{ kind: 'thread', ref: resolution.ticket.threadRef }]
      );
    }

    return resolution;
  }

  /**
   * Stop the hunt and expire the ticket. Sends nothing.
   */
  async cancel(ticketId: string, reason = 'cancelled'): Promise<CancelResult> {
    const result = await this.deps.locks.tickets.runExclusive<CancelResult>(ticketId, () => {
      const ticket = this.deps.tickets.get(ticketId);
      if (!ticket) return 'unknownTicket';
      if (ticket.status !== 'open' && ticket.status !== 'hunting') return 'alreadyClosed';

      this.deps.tickets.update(ticketId, (current) => ({
        ...current,
        status: 'expired',
        closedReason: 'cancelled',
        waveDeadline: null,
      }));
      return 'cancelled';
    });

    if (result === 'cancelled') {
      log.info({ ticketId, reason }, 'Hunt cancelled');
      this.tasks.get(ticketId)?.wake({ kind: 'closed' });
    }
    return result;
  }

  // ===========================================================================
  // Hunt Loop
  // ===========================================================================

  private async runHunt(task: HuntTask): Promise<void> {
    try {
      const ticket = await this.beginHunt(task);
      if (!ticket) return;

      const huntDeadline = Date.parse(ticket.createdAt) + this.deps.settings.huntExpiryMs;
      let waveDeadline = ticket.waveDeadline ? Date.parse(ticket.waveDeadline) : null;

      if (waveDeadline !== null) {
        task.log.info({ wave: ticket.huntWave, waveDeadline: ticket.waveDeadline }, 'Resuming hunt mid-wave');
      }

      for (;;) {
        if (waveDeadline === null) {
          const issue = await this.issueNextWave(task);
          if (issue.kind === 'closed') return;
          if (issue.kind === 'exhausted') {
            await this.expire(task, issue.reason);
            return;
          }

          await this.sendPages(task, issue.ticket, issue.wave, issue.reminder);
          waveDeadline = issue.deadline;
        }

        const wake = await task.wait(Math.min(waveDeadline, huntDeadline));
        if (wake.kind !== 'deadline') {
          task.log.debug({ wake: wake.kind }, 'Hunt task ending');
          return;
        }

        if (Date.now() >= huntDeadline) {
          await this.expire(task, 'hunt_timeout');
          return;
        }

        task.log.info('Wave timed out without a claim');
        waveDeadline = null;
      }
    } catch (error) {
      await this.failHunt(task, error);
    }
  }

  /**
   * open -> hunting. Returns the ticket if there is a hunt to run.
   */
  private beginHunt(task: HuntTask): Promise<Ticket | null> {
    return this.deps.locks.tickets.runExclusive<Ticket | null>(task.ticketId, () => {
      const ticket = this.deps.tickets.get(task.ticketId);
      if (!ticket) {
        task.log.warn('Hunt requested for unknown ticket');
        return null;
      }
      if (ticket.status === 'hunting') return ticket;
      if (ticket.status !== 'open') return null;

      task.log.info(
        { tags: ticket.expertiseTags, priority: ticket.userPriority, urgency: ticket.urgencyScore },
        'Starting hunt'
      );
      return this.deps.tickets.update(task.ticketId, (current) => ({ ...current, status: 'hunting' }));
    });
  }

  /**
   * Choose the next wave and persist it before anyone is paged
   */
  private issueNextWave(task: HuntTask): Promise<WaveIssue> {
    const { settings } = this.deps;

    return this.deps.locks.tickets.runExclusive<WaveIssue>(task.ticketId, () => {
      const ticket = this.deps.tickets.get(task.ticketId);
      if (!ticket || ticket.status !== 'hunting') return { kind: 'closed' };

      const ranked = rank(ticket.expertiseTags, this.deps.directory.listExperts(), ticket.userPriority);
      task.rankedCandidates = ranked;

      if (ranked.length === 0 && ticket.huntWave === 0) {
        return { kind: 'exhausted', reason: 'no_candidates' };
      }
      if (ticket.huntWave >= settings.maxWaves) {
        task.log.info({ waves: ticket.huntWave }, 'Wave limit reached');
        return { kind: 'exhausted', reason: 'exhausted' };
      }

      const notified = new Set(ticket.notifiedExpertIds);
      const unnotified = ranked.filter((id) => !notified.has(id));

      let wave: string[];
      let reminder = false;
      if (unnotified.length > 0) {
        wave = unnotified.slice(0, computeWaveSize(ticket, settings));
      } else if (settings.rebroadcastOnExhaustion && !ticket.rebroadcast && ranked.length > 0) {
        wave = ranked;
        reminder = true;
      } else {
        return { kind: 'exhausted', reason: 'exhausted' };
      }

      const deadline = Date.now() + settings.waveTimeoutMs;
      const updated = this.deps.tickets.update(task.ticketId, (current) => ({
        ...current,
        notifiedExpertIds: [...current.notifiedExpertIds, ...wave.filter((id) => !notified.has(id))],
        huntWave: current.huntWave + 1,
        waveDeadline: new Date(deadline).toISOString(),
        rebroadcast: current.rebroadcast || reminder,
      }));

      task.log.info({ wave: updated.huntWave, experts: wave, reminder }, 'Issuing wave');
      return { kind: 'issued', ticket: updated, wave, reminder, deadline };
    });
  }

  /**
   * Page each expert of a wave. One failed page never stops the rest; a claim
   * or cancel stops the pages not yet sent.
   */
  private async sendPages(task: HuntTask, ticket: Ticket, wave: string[], reminder: boolean): Promise<void> {
    const message = pageMessage(ticket, { reminder });

    for (const expertId of wave) {
      if (task.closed) {
        task.log.info({ skipped: wave.slice(wave.indexOf(expertId)) }, 'Ticket closed, remaining pages skipped');
        return;
      }
      await this.safeNotify(userRecipient(expertId), ticket.id, message);
    }
  }

  /**
   * hunting -> expired, then exactly one fallback broadcast
   */
  private async expire(task: HuntTask, reason: ExpiryReason): Promise<void> {
    const expired = await this.deps.locks.tickets.runExclusive<Ticket | null>(task.ticketId, () => {
      const ticket = this.deps.tickets.get(task.ticketId);
      if (!ticket || (ticket.status !== 'hunting' && ticket.status !== 'open')) return null;

      return this.deps.tickets.update(task.ticketId, (current) => ({
        ...current,
        status: 'expired',
        closedReason: reason,
        waveDeadline: null,
      }));
    });

    if (!expired) return;

    task.log.warn({ reason, waves: expired.huntWave }, 'Hunt expired, escalating to fallback channel');

    await this.safeNotify(
      { kind: 'channel', id: this.deps.fallbackChannel },
      expired.id,
      fallbackMessage(expired, reason)
    );
    await this.announce(expired, { kind: 'expired', reason }, [{ kind: 'thread', ref: expired.threadRef }]);
  }

  /**
   * A data-integrity failure ends this ticket's hunt; the requester is asked to retry
   */
  private async failHunt(task: HuntTask, error: unknown): Promise<void> {
    task.log.error({ error, integrity: isIntegrityError(error) }, 'Hunt task failed');

    const ticket = this.deps.tickets.get(task.ticketId);
    if (!ticket || (ticket.status !== 'hunting' && ticket.status !== 'open')) return;

    try {
      await this.deps.locks.tickets.runExclusive(task.ticketId, () => {
        const current = this.deps.tickets.get(task.ticketId);
        if (!current || (current.status !== 'hunting' && current.status !== 'open')) return;
        this.deps.tickets.update(task.ticketId, (t) => ({
          ...t,
          status: 'expired',
          closedReason: 'failed',
          waveDeadline: null,
        }));
      });
    } catch (markError) {
      task.log.error({ error: markError }, 'Could not mark failed hunt, it will resume on next start');
    }

    await this.announce(ticket, { kind: 'failed' }, [{ kind: 'thread', ref: ticket.threadRef }]);
  }

  // ===========================================================================
  // Notifications
  // ===========================================================================

  private async announceClaim(ticket: Ticket, expert: Expert): Promise<void> {
    await this.announce(
      ticket,
      { kind: 'claimed', expertId: expert.id, expertName: expert.name },
      [{ kind: 'thread', ref: ticket.threadRef }]
    );

    const others = ticket.notifiedExpertIds.filter((id) => id !== expert.id).map(userRecipient);
    if (others.length > 0) {
      await this.announce(
        ticket,
        { kind: 'already_handled', expertId: expert.id, expertName: expert.name },
        others
      );
    }
  }

  private async announce(ticket: Ticket, outcome: HuntOutcome, recipients: Recipient[]): Promise<void> {
    try {
      await this.deps.notifier.announceOutcome(ticket.id, outcome, recipients);
    } catch (error) {
      log.error({ ticketId: ticket.id, outcome: outcome.kind, error }, 'Outcome announcement failed');
    }
  }

  private async safeNotify(recipient: Recipient, ticketId: string, message: string): Promise<void> {
    try {
      const result = await this.deps.notifier.notify(recipient, ticketId, message);
      if (!result.ok) {
        log.warn({ ticketId, recipient: describeRecipient(recipient), error: result.error }, 'Notification failed');
      }
    } catch (error) {
      log.warn({ ticketId, recipient: describeRecipient(recipient), error }, 'Notification threw');
    }
  }
}
