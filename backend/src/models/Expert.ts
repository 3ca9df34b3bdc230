/**
 * Expert Model
 * Persisted shape and eligibility rules for subject-matter experts
 */

import { z } from 'zod';
import type { Expert, PriorityLevel, UserPriority } from '@sme-hunt/shared';

export const PRIORITY_LEVELS = ['vip', 'standard', 'regular'] as const satisfies readonly PriorityLevel[];

// =============================================================================
// Helpers
// =============================================================================

export function normalizeTag(tag: string): string {
  return tag.trim().toLowerCase();
}

/**
 * Lower-case, trim and de-duplicate, keeping first-seen order
 */
export function normalizeTags(tags: Iterable<string>): string[] {
  const seen = new Set<string>();
  for (const tag of tags) {
    const normalized = normalizeTag(tag);
    if (normalized) seen.add(normalized);
  }
  return [...seen];
}

/**
 * Eligible for a new assignment: available and under capacity
 */
export function isEligible(expert: Expert): boolean {
  return expert.available && expert.currentLoad < expert.maxConcurrent;
}

export function isAtCapacity(expert: Expert): boolean {
  return expert.currentLoad >= expert.maxConcurrent;
}

// =============================================================================
// Schemas
// =============================================================================

export const ExpertSchema: z.ZodType<Expert, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    name: z.string().min(1),
    expertiseTags: z.array(z.string()).default([]),
    skillRating: z.record(z.number().int().min(1).max(5)).default({}),
    available: z.boolean().default(true),
    currentLoad: z.number().int().min(0).default(0),
    maxConcurrent: z.number().int().positive().default(3),
  })
  .transform((raw) => {
    const expertiseTags = normalizeTags(raw.expertiseTags);
    const held = new Set(expertiseTags);
    const skillRating: Record<string, number> = {};
    for (const [tag, rating] of Object.entries(raw.skillRating)) {
      const normalized = normalizeTag(tag);
      if (held.has(normalized)) skillRating[normalized] = rating;
    }
    return { ...raw, expertiseTags, skillRating };
  })
  .refine((expert) => expert.currentLoad <= expert.maxConcurrent, {
    message: 'currentLoad exceeds maxConcurrent',
  });

export const ExpertsDocumentSchema = z
  .object({ experts: z.array(ExpertSchema) })
  .refine(
    (doc) => new Set(doc.experts.map((e) => e.id)).size === doc.experts.length,
    { message: 'duplicate expert id' }
  );

export type ExpertsDocument = z.infer<typeof ExpertsDocumentSchema>;

const PriorityRecordSchema = z.object({
  level: z.preprocess(
    (value) => (typeof value === 'string' ? value.toLowerCase() : value),
    z.enum(PRIORITY_LEVELS)
  ),
  tags: z.array(z.string()).default([]),
});

export const UserPrioritiesDocumentSchema = z.record(PriorityRecordSchema);

export type UserPrioritiesDocument = z.infer<typeof UserPrioritiesDocumentSchema>;

export function defaultUserPriority(userId: string): UserPriority {
  return { userId, level: 'regular', tags: [] };
}
