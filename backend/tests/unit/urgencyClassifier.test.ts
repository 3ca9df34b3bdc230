// =============================================================================
// Urgency Classifier Tests
// =============================================================================

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../../src/lib/anthropic.js', () => ({
  generateStructuredOutput: vi.fn(),
}));

import { generateStructuredOutput } from '../../src/lib/anthropic.js';
import { ClassificationUnavailableError } from '../../src/lib/errors.js';
import { ClaudeUrgencyClassifier, clampScore } from '../../src/services/classifier/urgencyClassifier.js';

const mockGenerate = vi.mocked(generateStructuredOutput);

function classifier(knownTags: string[] = ['dns', 'vpn']) {
  return new ClaudeUrgencyClassifier({
    model: 'claude-3-5-haiku-20241022',
    botName: 'Atlas Support',
    knownTags: () => knownTags,
  });
}

describe('ClaudeUrgencyClassifier', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('should clamp the score and keep only known tags', async () => {
    mockGenerate.mockResolvedValue({
      urgency_score: 140,
      expertise_tags: ['VPN', 'kubernetes', 'vpn'],
      category: 'Technical_Issue',
      response_kind: 'escalate_to_human',
      draft_reply: '  On it.  ',
    });

    const result = await classifier().classify('VPN down', 'U1');

    expect(result).toEqual({
      urgencyScore: 100,
      expertiseTags: ['vpn'],
      category: 'technical_issue',
      responseKind: 'escalate_to_human',
      draftReply: 'On it.',
    });
  });

  it('should map unknown kinds to safe defaults', async () => {
    mockGenerate.mockResolvedValue({
      urgency_score: -5,
      expertise_tags: [],
      category: 'billing',
      response_kind: 'shrug',
      draft_reply: '',
    });

    const result = await classifier().classify('hmm', 'U1');

    expect(result).toEqual({
      urgencyScore: 0,
      expertiseTags: [],
      category: 'other',
      responseKind: 'escalate_to_human',
      draftReply: "Thanks for reaching out. I'm connecting you with a support specialist who can help.",
    });
  });

  it('should prompt with the current tag vocabulary and model', async () => {
    mockGenerate.mockResolvedValue({
      urgency_score: 10,
      expertise_tags: [],
      category: 'general_question',
      response_kind: 'direct_answer',
      draft_reply: 'Hi!',
    });

    await classifier(['dns', 'vpn']).classify('How do I reset DNS cache?', 'U1');

    const [systemPrompt, userPrompt, , options] = mockGenerate.mock.calls[0] ?? [];
    expect(systemPrompt).toContain('You are Atlas Support');
    expect(systemPrompt).toContain('chosen ONLY from this list: dns, vpn');
    expect(userPrompt).toBe('How do I reset DNS cache?');
    expect(options).toEqual({ model: 'claude-3-5-haiku-20241022', maxTokens: 600 });
  });

  it('should raise ClassificationUnavailableError when the model call fails', async () => {
    mockGenerate.mockRejectedValue(new Error('overloaded'));

    await expect(classifier().classify('VPN down', 'U1')).rejects.toBeInstanceOf(ClassificationUnavailableError);
  });
});

describe('clampScore', () => {
  it('should keep scores within 0-100', () => {
    expect(clampScore(55.5)).toBe(55.5);
    expect(clampScore(101)).toBe(100);
    expect(clampScore(-1)).toBe(0);
    expect(clampScore(Number.NaN)).toBe(100);
  });
});
