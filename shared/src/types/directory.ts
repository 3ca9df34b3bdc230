/**
 * Directory Types
 * Experts and requester priority tiers
 */

// =============================================================================
// Experts
// =============================================================================

export interface Expert {
  /** Chat-platform user ID, stable across restarts */
  id: string;
  name: string;
  /** Lower-cased expertise tags */
  expertiseTags: string[];
  /** Tag -> rating 1-5, only for tags the expert holds */
  skillRating: Record<string, number>;
  available: boolean;
  currentLoad: number;
  maxConcurrent: number;
}

// =============================================================================
// Requester Priority
// =============================================================================

export type PriorityLevel = 'vip' | 'standard' | 'regular';

export interface UserPriority {
  userId: string;
  level: PriorityLevel;
  /** Informational only */
  tags: string[];
}
