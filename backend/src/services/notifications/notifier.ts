/**
 * Notifier Port
 * How the hunt engine reaches experts, requesters and the fallback channel.
 * Implemented by the chat transport.
 */

// =============================================================================
// Types
// =============================================================================

export type Recipient =
  /** A person, paged directly */
  | { kind: 'user'; id: string }
  /** The conversation a request came from */
  | { kind: 'thread'; ref: string }
  /** A shared channel, e.g. the fallback */
  | { kind: 'channel'; id: string };

export type HuntOutcome =
  | { kind: 'claimed'; expertId: string; expertName: string }
  | { kind: 'already_handled'; expertId: string; expertName: string }
  | { kind: 'expired'; reason: 'exhausted' | 'no_candidates' | 'hunt_timeout' }
  | { kind: 'resolved'; expertId: string }
  | { kind: 'failed' };

export type NotifyResult = { ok: true } | { ok: false; error: string };

export interface Notifier {
  notify(recipient: Recipient, ticketId: string, message: string): Promise<NotifyResult>;
  announceOutcome(ticketId: string, outcome: HuntOutcome, recipients: Recipient[]): Promise<void>;
}

// =============================================================================
// Helpers
// =============================================================================

export function userRecipient(id: string): Recipient {
  return { kind: 'user', id };
}

export function describeRecipient(recipient: Recipient): string {
  switch (recipient.kind) {
    case 'user':
      return `user:${recipient.id}`;
    case 'thread':
      return `thread:${recipient.ref}`;
    case 'channel':
      return `channel:${recipient.id}`;
  }
}
