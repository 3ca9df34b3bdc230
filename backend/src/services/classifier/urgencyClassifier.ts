/**
 * Urgency Classifier
 * Turns raw request text into urgency, expertise tags, a category and a draft
 * reply. The Claude adapter prompts with the directory's tag vocabulary.
 */

import type { Classification } from '@sme-hunt/shared';
import { z } from 'zod';
import { generateStructuredOutput } from '../../lib/anthropic.js';
import { ClassificationUnavailableError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';
import { normalizeTags } from '../../models/Expert.js';
import { REQUEST_CATEGORIES, RESPONSE_KINDS } from '../../models/Ticket.js';

const log = createLogger('urgencyClassifier');

// =============================================================================
// Port
// =============================================================================

export interface UrgencyClassifier {
  /**
   * @throws ClassificationUnavailableError when no classification can be produced
   */
  classify(text: string, requesterId: string): Promise<Classification>;
}

/**
 * Used when the classifier is down: treat the request as urgent and let a human look
 */
export const DEFAULT_CLASSIFICATION: Readonly<Classification> = Object.freeze({
  urgencyScore: 100,
  expertiseTags: [],
  category: 'urgent_issue',
  responseKind: 'escalate_to_human',
  draftReply: "Thanks for reaching out. I'm connecting you with a support specialist who can help.",
});

// =============================================================================
// Claude Adapter
// =============================================================================

const ClassificationResponseSchema = z.object({
  urgency_score: z.coerce.number(),
  expertise_tags: z.array(z.string()).default([]),
  category: z.string().default('other'),
  response_kind: z.string().default('escalate_to_human'),
  draft_reply: z.string().default(''),
});

function buildSystemPrompt(knownTags: readonly string[], botName: string): string {
  const vocabulary = knownTags.length > 0 ? knownTags.join(', ') : '(none)';

  return `You are ${botName}, an assistant that triages internal support requests.

Analyze the request and return:
1. An urgency score from 0 (not urgent) to 100 (production down, blocking many people)
2. The expertise tags needed to handle it, chosen ONLY from this list: ${vocabulary}
3. The category: ${REQUEST_CATEGORIES.join(', ')}
4. How to respond: ${RESPONSE_KINDS.join(', ')}
5. A short, friendly first reply to the requester

Use "direct_answer" only when you can fully answer without a human.
Use "escalate_to_human" when a specialist must act (access changes, outages, anything you cannot verify).

Return your analysis as JSON with this structure:
{
  "urgency_score": 0-100,
  "expertise_tags": ["tag"],
  "category": "technical_issue",
  "response_kind": "escalate_to_human",
  "draft_reply": "..."
}`;
}

function pickCategory(value: string): Classification['category'] {
  const normalized = value.trim().toLowerCase();
  return REQUEST_CATEGORIES.find((c) => c === normalized) ?? 'other';
}

function pickResponseKind(value: string): Classification['responseKind'] {
  const normalized = value.trim().toLowerCase();
  return RESPONSE_KINDS.find((k) => k === normalized) ?? 'escalate_to_human';
}

export interface ClaudeClassifierOptions {
  model: string;
  botName: string;
  /** Current tag vocabulary; read on every call so directory edits show up */
  knownTags: () => string[];
}

export class ClaudeUrgencyClassifier implements UrgencyClassifier {
  constructor(private readonly options: ClaudeClassifierOptions) {}

  async classify(text: string, requesterId: string): Promise<Classification> {
    const knownTags = this.options.knownTags();

    let response: z.output<typeof ClassificationResponseSchema>;
    try {
      response = await generateStructuredOutput(
        buildSystemPrompt(knownTags, this.options.botName),
        text,
        ClassificationResponseSchema,
        { model: this.options.model, maxTokens: 600 }
      );
    } catch (error) {
      log.error({ requesterId, error }, 'Classification failed');
      throw new ClassificationUnavailableError('Urgency classifier unavailable', error);
    }

    const vocabulary = new Set(knownTags);
    const classification: Classification = {
      urgencyScore: clampScore(response.urgency_score),
      expertiseTags: normalizeTags(response.expertise_tags).filter((tag) => vocabulary.has(tag)),
      category: pickCategory(response.category),
      responseKind: pickResponseKind(response.response_kind),
      draftReply: response.draft_reply.trim() || DEFAULT_CLASSIFICATION.draftReply,
    };

    log.debug(
      { requesterId, urgency: classification.urgencyScore, tags: classification.expertiseTags, category: classification.category },
      'Request classified'
    );
    return classification;
  }
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 100;
  return Math.max(0, Math.min(100, score));
}
