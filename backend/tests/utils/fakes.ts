/**
 * In-process stand-ins for storage, chat transport and classifier
 */

import type { Classification } from '@sme-hunt/shared';
import { StoreUnavailableError } from '../../src/lib/errors.js';
import type { SnapshotStorage } from '../../src/lib/storage/snapshotStorage.js';
import { ClassificationUnavailableError } from '../../src/lib/errors.js';
import type { UrgencyClassifier } from '../../src/services/classifier/urgencyClassifier.js';
import type {
  HuntOutcome,
  Notifier,
  NotifyResult,
  Recipient,
} from '../../src/services/notifications/notifier.js';

// =============================================================================
// Storage
// =============================================================================

/**
 * Keeps the last saved snapshot as JSON text, like a file would
 */
export class InMemoryStorage<T> implements SnapshotStorage<T> {
  readonly name: string;
  saves = 0;
  failSaves = false;
  private text: string | null;

  constructor(name: string, initial: T | null = null) {
    this.name = name;
    this.text = initial === null ? null : JSON.stringify(initial);
  }

  load(): T | null {
    if (this.text === null) return null;
    const data: T = JSON.parse(this.text);
    return data;
  }

  save(data: T): void {
    if (this.failSaves) {
      throw new StoreUnavailableError(this.name, 'disk full');
    }
    this.text = JSON.stringify(data);
    this.saves += 1;
  }
}

// =============================================================================
// Notifier
// =============================================================================

export interface SentNotification {
  recipient: Recipient;
  ticketId: string;
  message: string;
}

export interface SentOutcome {
  ticketId: string;
  outcome: HuntOutcome;
  recipients: Recipient[];
}

export class RecordingNotifier implements Notifier {
  readonly notifications: SentNotification[] = [];
  readonly outcomes: SentOutcome[] = [];
  /** User ids whose pages fail */
  readonly failingUsers = new Set<string>();
  private readonly held = new Map<string, Promise<void>>();

  /**
   * Pages to this user are recorded but do not complete until the returned
   * release function is called
   */
  hold(userId: string): () => void {
    let release: () => void = () => undefined;
    this.held.set(userId, new Promise<void>((resolve) => {
      release = resolve;
    }));
    return release;
  }

  async notify(recipient: Recipient, ticketId: string, message: string): Promise<NotifyResult> {
    this.notifications.push({ recipient, ticketId, message });
    if (recipient.kind === 'user') {
      await this.held.get(recipient.id);
    }
    if (recipient.kind === 'user' && this.failingUsers.has(recipient.id)) {
      return { ok: false, error: 'user_not_found' };
    }
    return { ok: true };
  }

  async announceOutcome(ticketId: string, outcome: HuntOutcome, recipients: Recipient[]): Promise<void> {
    this.outcomes.push({ ticketId, outcome, recipients });
  }

  /** Ids of experts paged, in order */
  pagedUsers(): string[] {
    return this.notifications.flatMap((n) => (n.recipient.kind === 'user' ? [n.recipient.id] : []));
  }

  channelPosts(): SentNotification[] {
    return this.notifications.filter((n) => n.recipient.kind === 'channel');
  }
}

// =============================================================================
// Classifier
// =============================================================================

export class StubClassifier implements UrgencyClassifier {
  calls: Array<{ text: string; requesterId: string }> = [];

  constructor(private result: Classification | 'unavailable') {}

  respondWith(result: Classification | 'unavailable'): void {
    this.result = result;
  }

  async classify(text: string, requesterId: string): Promise<Classification> {
    this.calls.push({ text, requesterId });
    if (this.result === 'unavailable') {
      throw new ClassificationUnavailableError('model timed out');
    }
    return { ...this.result, expertiseTags: [...this.result.expertiseTags] };
  }
}
