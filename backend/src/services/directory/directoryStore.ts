/**
 * Directory Store
 * Expert and requester-priority records. Accessor only, no business rules.
 */

import type { Expert, UserPriority } from '@sme-hunt/shared';
import type { SnapshotStorage } from '../../lib/storage/snapshotStorage.js';
import { NotFoundError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import {
  defaultUserPriority,
  type ExpertsDocument,
  type UserPrioritiesDocument,
} from '../../models/Expert.js';

const log = createLogger('directoryStore');

export class DirectoryStore {
  private experts = new Map<string, Expert>();
  private priorities = new Map<string, UserPriority>();

  constructor(
    private readonly expertStorage: SnapshotStorage<ExpertsDocument>,
    private readonly priorityStorage: SnapshotStorage<UserPrioritiesDocument>
  ) {}

  /**
   * (Re)load both collections from storage
   */
  load(): void {
    const experts = this.expertStorage.load()?.experts ?? [];
    this.experts = new Map(experts.map((expert) => [expert.id, expert]));

    const priorities = this.priorityStorage.load() ?? {};
    this.priorities = new Map(
      Object.entries(priorities).map(([userId, record]) => [
        userId,
        { userId, level: record.level, tags: record.tags },
      ])
    );

    log.info({ experts: this.experts.size, priorities: this.priorities.size }, 'Directory loaded');
  }

  // ===========================================================================
  // Experts
  // ===========================================================================

  getExpert(id: string): Expert | null {
    const expert = this.experts.get(id);
    return expert ? structuredClone(expert) : null;
  }

  listExperts(): Expert[] {
    return [...this.experts.values()]
      .sort((a, b) => a.id.localeCompare(b.id))
      .map((expert) => structuredClone(expert));
  }

  /**
   * Durable before it returns. On a failed flush the in-memory view is left unchanged.
   */
  putExpert(expert: Expert): void {
    const previous = this.experts.get(expert.id);
    this.experts.set(expert.id, structuredClone(expert));
    try {
      this.flushExperts();
    } catch (error) {
      if (previous) this.experts.set(expert.id, previous);
      else this.experts.delete(expert.id);
      throw error;
    }
  }

  setAvailability(expertId: string, available: boolean): Expert {
    const expert = this.getExpert(expertId);
    if (!expert) {
      throw new NotFoundError('Expert', expertId);
    }
    const updated = { ...expert, available };
    this.putExpert(updated);
    return updated;
  }

  /**
   * Every tag some expert holds, sorted
   */
  allExpertiseTags(): string[] {
    const tags = new Set<string>();
    for (const expert of this.experts.values()) {
      expert.expertiseTags.forEach((tag) => tags.add(tag));
    }
    return [...tags].sort();
  }

  // ===========================================================================
  // Requester Priority
  // ===========================================================================

  /**
   * Unknown users are regular
   */
  getUserPriority(userId: string): UserPriority {
    const record = this.priorities.get(userId);
    return record ? structuredClone(record) : defaultUserPriority(userId);
  }

  listUserPriorities(): UserPriority[] {
    return [...this.priorities.values()]
      .sort((a, b) => a.userId.localeCompare(b.userId))
      .map((record) => structuredClone(record));
  }

  putUserPriority(priority: UserPriority): void {
    const previous = this.priorities.get(priority.userId);
    this.priorities.set(priority.userId, structuredClone(priority));
    try {
      this.flushPriorities();
    } catch (error) {
      if (previous) this.priorities.set(priority.userId, previous);
      else this.priorities.delete(priority.userId);
      throw error;
    }
  }

  // ===========================================================================
  // Persistence
  // ===========================================================================

  private flushExperts(): void {
    this.expertStorage.save({ experts: this.listExperts() });
  }

  private flushPriorities(): void {
    const doc: UserPrioritiesDocument = {};
    for (const record of this.listUserPriorities()) {
      doc[record.userId] = { level: record.level, tags: record.tags };
    }
    this.priorityStorage.save(doc);
  }
}
