import { describe, it, expect } from 'vitest';
import { ComplexityScorer } from '../../src/routing/complexity-scorer.js';
import { createContext, type ConversationContext, type Message } from '../../src/context/types.js';

function turns(count: number, role: Message['role'] = 'user'): Message[] {
  return Array.from({ length: count }, (_, i) => ({
    role,
    content: `turn ${i}`,
    timestamp: new Date('2025-01-01T00:00:00Z'),
  }));
}

function context(overrides: Partial<ConversationContext> = {}): ConversationContext {
  return { ...createContext('call-1', 'tenant-1', 'agent-1'), ...overrides };
}

describe('ComplexityScorer', () => {
  const scorer = new ComplexityScorer();

  it('scores a long plain utterance at exactly the word weight', () => {
    const utterance = Array.from({ length: 60 }, () => 'hello').join(' ');
    expect(scorer.score(utterance, context())).toBe(0.3);
  });

  it('scores a short confirmation from its word count alone', () => {
    const breakdown = scorer.explain('Can you quickly confirm my appointment?', context());
    expect(breakdown.wordCount).toBe(6);
    expect(breakdown.matchedPatterns).toEqual([]);
    expect(breakdown.score).toBeCloseTo(0.036, 10);
  });

  it('adds the share of matched reasoning phrases', () => {
    const breakdown = scorer.explain(
      'Can you compare these plans and walk me through the pros and cons step by step?',
      context()
    );
    expect(breakdown.matchedPatterns).toEqual(['compare', 'step by step', 'pros and cons', 'walk me through']);
    expect(breakdown.patternFactor).toBe(0.4);
    expect(breakdown.score).toBeCloseTo(0.3 * 16 / 50 + 0.2, 10);
  });

  it('matches phrases case-insensitively on word boundaries only', () => {
    expect(scorer.explain('ANALYZE my bill', context()).matchedPatterns).toEqual(['analyze']);
    expect(scorer.explain('it was reanalyzed', context()).matchedPatterns).toEqual([]);
    expect(scorer.explain('step  by\tstep', context()).matchedPatterns).toEqual(['step by step']);
  });

  it('takes the first applicable context factor by default', () => {
    const ctx = context({ turns: turns(6), anticipatesTools: true, multiTurn: true });
    expect(scorer.explain('hi', ctx).contextFactor).toBe(0.3);

    const toolsOnly = context({ anticipatesTools: true, multiTurn: true });
    expect(scorer.explain('hi', toolsOnly).contextFactor).toBe(0.4);
  });

  it('sums context factors under the additive policy', () => {
    const additive = new ComplexityScorer({ contextPolicy: 'additive' });
    const ctx = context({ turns: turns(6), anticipatesTools: true });
    expect(additive.explain('hi', ctx).contextFactor).toBeCloseTo(0.7, 10);
  });

  it('does not count system turns toward history length', () => {
    const ctx = context({ turns: [...turns(5), ...turns(3, 'system')] });
    expect(scorer.explain('hi', ctx).contextFactor).toBe(0);
  });

  it('clamps the score to 1', () => {
    const additive = new ComplexityScorer({ contextPolicy: 'additive' });
    const ctx = context({ turns: turns(8), anticipatesTools: true, multiTurn: true });
    const utterance = Array.from({ length: 60 }, () => 'analyze').join(' ');
    expect(additive.score(utterance, ctx)).toBe(1);
  });

  it('scores an empty utterance with an empty context as zero', () => {
    expect(scorer.score('', context())).toBe(0);
    expect(scorer.score('   ', context())).toBe(0);
  });

  it('uses a custom pattern list', () => {
    const custom = new ComplexityScorer({ patterns: ['refund', 'escalate'] });
    const breakdown = custom.explain('I want to escalate this', context());
    expect(breakdown.matchedPatterns).toEqual(['escalate']);
    expect(breakdown.patternFactor).toBe(0.5);
  });
});
