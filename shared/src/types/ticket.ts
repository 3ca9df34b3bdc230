/**
 * Ticket Types
 * Support tickets tracked through the expert hunt
 */

import type { PriorityLevel } from './directory.js';

// =============================================================================
// Classification
// =============================================================================

export type RequestCategory =
  | 'general_question'
  | 'technical_issue'
  | 'urgent_issue'
  | 'access_request'
  | 'feature_request'
  | 'feedback'
  | 'other';

export type ResponseKind =
  | 'direct_answer'
  | 'request_more_info'
  | 'escalate_to_human'
  | 'acknowledge';

export interface Classification {
  /** 0-100 */
  urgencyScore: number;
  expertiseTags: string[];
  category: RequestCategory;
  responseKind: ResponseKind;
  draftReply: string;
}

// =============================================================================
// Tickets
// =============================================================================

export type TicketStatus = 'open' | 'hunting' | 'claimed' | 'resolved' | 'expired';

export type ClosedReason =
  | 'exhausted'
  | 'no_candidates'
  | 'hunt_timeout'
  | 'cancelled'
  | 'failed';

export interface Ticket {
  id: string;
  requesterId: string;
  /** Opaque handle back to the originating conversation */
  threadRef: string;
  summary: string;
  category: RequestCategory;
  expertiseTags: string[];
  /** 0-100 */
  urgencyScore: number;
  /** Copied at creation; later directory edits do not apply */
  userPriority: PriorityLevel;
  status: TicketStatus;
  claimedBy: string | null;
  /** Every expert paged in any wave so far */
  notifiedExpertIds: string[];
  huntWave: number;
  waveDeadline: string | null;
  rebroadcast: boolean;
  closedReason: ClosedReason | null;
  createdAt: string;
  lastActivityAt: string;
  resolvedAt: string | null;
}

// =============================================================================
// Command Results
// =============================================================================

export type ClaimResult = 'accepted' | 'alreadyClaimed' | 'notEligible' | 'unknownTicket';

export type ResolveResult = 'resolved' | 'notClaimed' | 'alreadyResolved' | 'unknownTicket';

export type CancelResult = 'cancelled' | 'alreadyClosed' | 'unknownTicket';

export interface CommandResponse<TOutcome extends string> {
  outcome: TOutcome;
  /** Short sentence suitable for posting back to the chat */
  message: string;
}

// =============================================================================
// Intake
// =============================================================================

export interface SupportRequest {
  requesterId: string;
  text: string;
  threadRef: string;
}

export type IntakeResult =
  | { kind: 'answered'; reply: string; classification: Classification }
  | { kind: 'escalated'; reply: string; ticketId: string; classification: Classification }
  | { kind: 'failed'; reply: string };
