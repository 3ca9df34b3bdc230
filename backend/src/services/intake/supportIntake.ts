/**
 * Support Intake
 * Entry point for a new support message: classify, then either answer
 * directly or open a ticket and start hunting for an expert.
 */

import type { Classification, IntakeResult, SupportRequest } from '@sme-hunt/shared';
import { ClassificationUnavailableError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import { createTicket } from '../../models/Ticket.js';
import type { UrgencyClassifier } from '../classifier/urgencyClassifier.js';
import { DEFAULT_CLASSIFICATION } from '../classifier/urgencyClassifier.js';
import type { DirectoryStore } from '../directory/directoryStore.js';
import type { HuntEngine } from '../hunt/huntEngine.js';
import { RETRY_MESSAGE } from '../hunt/messages.js';
import type { TicketStore } from '../tickets/ticketStore.js';

const log = createLogger('supportIntake');

export interface SupportIntakeDeps {
  classifier: UrgencyClassifier;
  directory: DirectoryStore;
  tickets: TicketStore;
  engine: Pick<HuntEngine, 'startHunt'>;
  highUrgencyThreshold: number;
}

/**
 * Whether a classified request needs a human
 */
export function needsEscalation(classification: Classification, highUrgencyThreshold: number): boolean {
  return (
    classification.category === 'urgent_issue' ||
    classification.responseKind === 'escalate_to_human' ||
    classification.urgencyScore >= highUrgencyThreshold
  );
}

export function escalationReply(draftReply: string, ticketId: string): string {
  return `${draftReply}\n\nI've opened ticket ${ticketId} and I'm finding an expert to help you.`;
}

export class SupportIntake {
  constructor(private readonly deps: SupportIntakeDeps) {}

  async submit(request: SupportRequest): Promise<IntakeResult> {
    const classification = await this.classify(request);

    if (!needsEscalation(classification, this.deps.highUrgencyThreshold)) {
      log.info({ requesterId: request.requesterId, category: classification.category }, 'Answered without escalation');
      return { kind: 'answered', reply: classification.draftReply, classification };
    }

    try {
      const priority = this.deps.directory.getUserPriority(request.requesterId);
      const ticket = createTicket({
        requesterId: request.requesterId,
        threadRef: request.threadRef,
        text: request.text,
        classification,
        userPriority: priority.level,
      });

      this.deps.tickets.put(ticket);
      this.deps.engine.startHunt(ticket.id);

      log.info(
        { ticketId: ticket.id, requesterId: request.requesterId, tags: ticket.expertiseTags, priority: priority.level },
        'Request escalated'
      );
      return {
        kind: 'escalated',
        reply: escalationReply(classification.draftReply, ticket.id),
        ticketId: ticket.id,
        classification,
      };
    } catch (error) {
      log.error({ requesterId: request.requesterId, error }, 'Could not open ticket');
      return { kind: 'failed', reply: RETRY_MESSAGE };
    }
  }

  private async classify(request: SupportRequest): Promise<Classification> {
    try {
      return await this.deps.classifier.classify(request.text, request.requesterId);
    } catch (error) {
      if (!(error instanceof ClassificationUnavailableError)) throw error;

      log.warn({ requesterId: request.requesterId }, 'Classifier unavailable, using default classification');
      return { ...DEFAULT_CLASSIFICATION, expertiseTags: [...DEFAULT_CLASSIFICATION.expertiseTags] };
    }
  }
}
