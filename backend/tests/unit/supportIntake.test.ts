// =============================================================================
// Support Intake Tests
// =============================================================================

import { describe, it, expect, vi } from 'vitest';
import { DEFAULT_CLASSIFICATION } from '../../src/services/classifier/urgencyClassifier.js';
import { RETRY_MESSAGE } from '../../src/services/hunt/messages.js';
import { needsEscalation, SupportIntake } from '../../src/services/intake/supportIntake.js';
import { StubClassifier } from '../utils/fakes.js';
import { createHuntHarness, makeClassification, makeExpert } from '../utils/testHelpers.js';

const request = { requesterId: 'U-ceo', text: 'VPN is down for the whole floor', threadRef: 'C1:1700000000.000200' };

function buildIntake(classifier: StubClassifier) {
  const h = createHuntHarness([makeExpert({ id: 'E1', expertiseTags: ['vpn'], skillRating: { vpn: 4 } })], {
    priorities: { 'U-ceo': { level: 'vip', tags: [] } },
  });
  const engine = { startHunt: vi.fn() };
  const intake = new SupportIntake({
    classifier,
    directory: h.directory,
    tickets: h.tickets,
    engine,
    highUrgencyThreshold: 80,
  });
  return { h, engine, intake };
}

describe('needsEscalation', () => {
  it('should escalate urgent issues, explicit escalations and high scores', () => {
    expect(needsEscalation(makeClassification({ category: 'urgent_issue', responseKind: 'direct_answer', urgencyScore: 0 }), 80)).toBe(true);
    expect(needsEscalation(makeClassification({ responseKind: 'escalate_to_human', urgencyScore: 0 }), 80)).toBe(true);
    expect(needsEscalation(makeClassification({ responseKind: 'direct_answer', urgencyScore: 80 }), 80)).toBe(true);
  });

  it('should not escalate a low-urgency question the bot can answer', () => {
    expect(
      needsEscalation(makeClassification({ category: 'general_question', responseKind: 'direct_answer', urgencyScore: 20 }), 80)
    ).toBe(false);
  });
});

describe('SupportIntake', () => {
  it('should answer directly without opening a ticket', async () => {
    const classification = makeClassification({
      category: 'general_question',
      responseKind: 'direct_answer',
      urgencyScore: 10,
      draftReply: 'The VPN guide is on the wiki.',
    });
    const { h, engine, intake } = buildIntake(new StubClassifier(classification));

    const result = await intake.submit(request);

    expect(result).toEqual({ kind: 'answered', reply: 'The VPN guide is on the wiki.', classification });
    expect(h.tickets.listAll()).toEqual([]);
    expect(engine.startHunt).not.toHaveBeenCalled();
  });

  it('should open a ticket with the requester priority and start the hunt', async () => {
    const classifier = new StubClassifier(
      makeClassification({ expertiseTags: ['vpn'], urgencyScore: 90, draftReply: 'Sorry about that.' })
    );
    const { h, engine, intake } = buildIntake(classifier);

    const result = await intake.submit(request);

    if (result.kind !== 'escalated') throw new Error(`expected escalation, got ${result.kind}`);
    expect(result.reply).toBe(
      `Sorry about that.\n\nI've opened ticket ${result.ticketId} and I'm finding an expert to help you.`
    );
    expect(h.tickets.get(result.ticketId)).toMatchObject({
      requesterId: 'U-ceo',
      threadRef: 'C1:1700000000.000200',
      summary: 'VPN is down for the whole floor',
      expertiseTags: ['vpn'],
      urgencyScore: 90,
      userPriority: 'vip',
      status: 'open',
    });
    expect(engine.startHunt).toHaveBeenCalledWith(result.ticketId);
    expect(classifier.calls).toEqual([{ text: request.text, requesterId: 'U-ceo' }]);
  });

  it('should fall back to the default classification when the classifier is down', async () => {
    const { h, intake } = buildIntake(new StubClassifier('unavailable'));

    const result = await intake.submit(request);

    expect(result.kind).toBe('escalated');
    if (result.kind !== 'escalated') return;
    expect(result.classification).toEqual(DEFAULT_CLASSIFICATION);
    expect(h.tickets.get(result.ticketId)).toMatchObject({ urgencyScore: 100, category: 'urgent_issue', expertiseTags: [] });
  });

  it('should ask the requester to retry when the ticket cannot be stored', async () => {
    const { h, engine, intake } = buildIntake(new StubClassifier(makeClassification({ urgencyScore: 95 })));
    h.ticketStorage.failSaves = true;

    const result = await intake.submit(request);

    expect(result).toEqual({ kind: 'failed', reply: RETRY_MESSAGE });
    expect(h.tickets.listAll()).toEqual([]);
    expect(engine.startHunt).not.toHaveBeenCalled();
  });
});
