/**
 * Matcher
 * Ranks experts for a request's expertise tags. Pure; never mutates input.
 */

import type { Expert, PriorityLevel } from '@sme-hunt/shared';
import { isAtCapacity, isEligible, normalizeTags } from '../../models/Expert.js';

// =============================================================================
// Types
// =============================================================================

export type CandidateTier = 'under_capacity' | 'last_resort';

export interface CandidateMatch {
  expertId: string;
  score: number;
  matchedTags: string[];
  currentLoad: number;
  tier: CandidateTier;
}

// =============================================================================
// Scoring
// =============================================================================

/**
 * Sum of the expert's ratings over the required tags they hold
 */
export function scoreExpert(expert: Expert, requiredTags: readonly string[]): { score: number; matchedTags: string[] } {
  const held = new Set(expert.expertiseTags);
  const matchedTags = requiredTags.filter((tag) => held.has(tag));
  const score = matchedTags.reduce((sum, tag) => sum + (expert.skillRating[tag] ?? 0), 0);
  return { score, matchedTags };
}

function compareCandidates(a: CandidateMatch, b: CandidateMatch): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.currentLoad !== b.currentLoad) return a.currentLoad - b.currentLoad;
  return a.expertId < b.expertId ? -1 : a.expertId > b.expertId ? 1 : 0;
}

// =============================================================================
// Ranking
// =============================================================================

/**
 * Ranked candidates with their scores. Eligible experts come first; for VIP
 * requests available experts at full load follow as a last-resort tier.
 * Empty when nobody holds any required tag.
 */
export function rankCandidates(
  requiredTags: Iterable<string>,
  experts: readonly Expert[],
  priority: PriorityLevel
): CandidateMatch[] {
  const tags = normalizeTags(requiredTags);
  if (tags.length === 0) return [];

  const underCapacity: CandidateMatch[] = [];
  const lastResort: CandidateMatch[] = [];

  for (const expert of experts) {
    const { score, matchedTags } = scoreExpert(expert, tags);
    if (matchedTags.length === 0) continue;

    const base = { expertId: expert.id, score, matchedTags, currentLoad: expert.currentLoad };

    if (isEligible(expert)) {
      underCapacity.push({ ...base, tier: 'under_capacity' });
    } else if (priority === 'vip' && expert.available && isAtCapacity(expert)) {
      lastResort.push({ ...base, tier: 'last_resort' });
    }
  }

  return [...underCapacity.sort(compareCandidates), ...lastResort.sort(compareCandidates)];
}

/**
 * Ranked expert ids
 */
export function rank(
  requiredTags: Iterable<string>,
  experts: readonly Expert[],
  priority: PriorityLevel
): string[] {
  return rankCandidates(requiredTags, experts, priority).map((c) => c.expertId);
}
