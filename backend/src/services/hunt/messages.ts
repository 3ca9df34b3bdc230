/**
 * Hunt Messages
 * Plain-language text for pages, announcements and command replies
 */

import type { CancelResult, ClaimResult, ResolveResult, Ticket } from '@sme-hunt/shared';
import type { HuntOutcome } from '../notifications/notifier.js';

export const RETRY_MESSAGE =
  "Sorry, something went wrong while handling your request. Please try again in a few minutes.";

export function pageMessage(ticket: Ticket, options: { reminder: boolean }): string {
  const tags = ticket.expertiseTags.length > 0 ? ticket.expertiseTags.join(', ') : 'general';
  const prefix = options.reminder ? 'Still looking for help' : 'New support request';
  return `${prefix} (${tags}, urgency ${Math.round(ticket.urgencyScore)}): "${ticket.summary}". ` +
    `Reply with /claim ${ticket.id} to take it.`;
}

export function fallbackMessage(ticket: Ticket, reason: 'exhausted' | 'no_candidates' | 'hunt_timeout'): string {
  const why = reason === 'no_candidates'
    ? 'No expert holds the needed expertise'
    : 'No expert has claimed it yet';
  return `${why} for ticket ${ticket.id} ("${ticket.summary}"). Can anyone here help? ` +
    `Thread: ${ticket.threadRef}`;
}

/**
 * Text a notifier posts for an outcome
 */
export function outcomeMessage(ticketId: string, outcome: HuntOutcome): string {
  switch (outcome.kind) {
    case 'claimed':
      return `Good news! ${outcome.expertName} will be assisting you with this request.`;
    case 'already_handled':
      return `Ticket ${ticketId} has already been picked up by ${outcome.expertName}. No action needed.`;
    case 'expired':
      return "I couldn't reach an available expert directly, so I've posted your request to the wider support channel. Someone will respond as soon as possible.";
    case 'resolved':
      return `Ticket ${ticketId} has been marked as resolved.`;
    case 'failed':
      return RETRY_MESSAGE;
  }
}

export function claimReply(ticketId: string, result: ClaimResult): string {
  switch (result) {
    case 'accepted':
      return `You have successfully claimed ticket ${ticketId}.`;
    case 'alreadyClaimed':
      return `Ticket ${ticketId} has already been handled by someone else.`;
    case 'notEligible':
      return `You can't claim ticket ${ticketId} right now. It may not be open to you, or you are at capacity.`;
    case 'unknownTicket':
      return `I couldn't find a ticket called ${ticketId}.`;
  }
}

export function resolveReply(ticketId: string, result: ResolveResult): string {
  switch (result) {
    case 'resolved':
      return `Ticket ${ticketId} is now resolved. Thanks!`;
    case 'notClaimed':
      return `Ticket ${ticketId} hasn't been claimed, so it can't be resolved yet.`;
    case 'alreadyResolved':
      return `Ticket ${ticketId} was already resolved.`;
    case 'unknownTicket':
      return `I couldn't find a ticket called ${ticketId}.`;
  }
}

export function cancelReply(ticketId: string, result: CancelResult): string {
  switch (result) {
    case 'cancelled':
      return `The search for an expert on ticket ${ticketId} has been stopped.`;
    case 'alreadyClosed':
      return `Ticket ${ticketId} is no longer being worked on by the hunt.`;
    case 'unknownTicket':
      return `I couldn't find a ticket called ${ticketId}.`;
  }
}
