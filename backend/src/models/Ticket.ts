/**
 * Ticket Model
 * Persisted shape, creation and the status transition table
 */

import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type {
  Classification,
  ClosedReason,
  PriorityLevel,
  RequestCategory,
  ResponseKind,
  Ticket,
  TicketStatus,
} from '@sme-hunt/shared';
import { PRIORITY_LEVELS, normalizeTags } from './Expert.js';

export const TICKET_STATUSES = [
  'open',
  'hunting',
  'claimed',
  'resolved',
  'expired',
] as const satisfies readonly TicketStatus[];

export const REQUEST_CATEGORIES = [
  'general_question',
  'technical_issue',
  'urgent_issue',
  'access_request',
  'feature_request',
  'feedback',
  'other',
] as const satisfies readonly RequestCategory[];

export const RESPONSE_KINDS = [
  'direct_answer',
  'request_more_info',
  'escalate_to_human',
  'acknowledge',
] as const satisfies readonly ResponseKind[];

const CLOSED_REASONS = [
  'exhausted',
  'no_candidates',
  'hunt_timeout',
  'cancelled',
  'failed',
] as const satisfies readonly ClosedReason[];

// =============================================================================
// Transitions
// =============================================================================

/**
 * Allowed status moves. Field updates that keep the status are checked elsewhere.
 */
const TRANSITIONS: Record<TicketStatus, readonly TicketStatus[]> = {
  open: ['hunting', 'expired'],
  hunting: ['claimed', 'expired'],
  claimed: ['resolved'],
  resolved: [],
  expired: [],
};

export function canTransition(from: TicketStatus, to: TicketStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

// =============================================================================
// Creation
// =============================================================================

export interface CreateTicketInput {
  requesterId: string;
  threadRef: string;
  text: string;
  classification: Classification;
  userPriority: PriorityLevel;
}

export function generateTicketId(): string {
  return `ticket-${uuidv4().replace(/-/g, '').slice(0, 8)}`;
}

export function summarize(text: string, maxLength = 80): string {
  const firstLine = text.trim().split('\n')[0]?.replace(/\s+/g, ' ') ?? '';
  if (!firstLine) return 'Support request';
  return firstLine.length > maxLength ? `${firstLine.slice(0, maxLength)}...` : firstLine;
}

export function createTicket(input: CreateTicketInput, now: Date = new Date()): Ticket {
  const timestamp = now.toISOString();
  return {
    id: generateTicketId(),
    requesterId: input.requesterId,
    threadRef: input.threadRef,
    summary: summarize(input.text),
    category: input.classification.category,
    expertiseTags: normalizeTags(input.classification.expertiseTags),
    urgencyScore: input.classification.urgencyScore,
    userPriority: input.userPriority,
    status: 'open',
    claimedBy: null,
    notifiedExpertIds: [],
    huntWave: 0,
    waveDeadline: null,
    rebroadcast: false,
    closedReason: null,
    createdAt: timestamp,
    lastActivityAt: timestamp,
    resolvedAt: null,
  };
}

// =============================================================================
// Schemas
// =============================================================================

export const TicketSchema: z.ZodType<Ticket, z.ZodTypeDef, unknown> = z
  .object({
    id: z.string().min(1),
    requesterId: z.string().min(1),
    threadRef: z.string(),
    summary: z.string(),
    category: z.enum(REQUEST_CATEGORIES),
    expertiseTags: z.array(z.string()),
    urgencyScore: z.number().min(0).max(100),
    userPriority: z.enum(PRIORITY_LEVELS),
    status: z.enum(TICKET_STATUSES),
    claimedBy: z.string().nullable(),
    notifiedExpertIds: z.array(z.string()),
    huntWave: z.number().int().min(0),
    waveDeadline: z.string().datetime().nullable(),
    rebroadcast: z.boolean(),
    closedReason: z.enum(CLOSED_REASONS).nullable(),
    createdAt: z.string().datetime(),
    lastActivityAt: z.string().datetime(),
    resolvedAt: z.string().datetime().nullable(),
  })
  .refine(
    (ticket) => (ticket.claimedBy !== null) === (ticket.status === 'claimed' || ticket.status === 'resolved'),
    { message: 'claimedBy must be set exactly when the ticket is claimed or resolved' }
  );

export const TicketsDocumentSchema = z.object({
  version: z.literal(1),
  updatedAt: z.string().datetime(),
  ticketsById: z.record(TicketSchema),
});

export type TicketsDocument = z.infer<typeof TicketsDocumentSchema>;
