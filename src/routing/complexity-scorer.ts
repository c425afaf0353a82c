import type { ConversationContext } from '../context/types.js';

export type ContextPolicy = 'first-match' | 'additive';

export interface ComplexityScorerOptions {
  /** Phrases that indicate multi-step reasoning. Matched case-insensitively on word boundaries. */
  patterns?: string[];
  contextPolicy?: ContextPolicy;
}

export interface ComplexityBreakdown {
  wordCount: number;
  wordFactor: number;
  matchedPatterns: string[];
  patternFactor: number;
  contextFactor: number;
  score: number;
}

export const DEFAULT_COMPLEXITY_PATTERNS = [
  'analyze',
  'troubleshoot',
  'compare',
  'step by step',
  'explain why',
  'difference between',
  'calculate',
  'evaluate',
  'pros and cons',
  'walk me through',
];

const WORD_WEIGHT = 0.3;
const PATTERN_WEIGHT = 0.5;
const WORDS_FOR_FULL_FACTOR = 50;
const LONG_HISTORY_TURNS = 5;

const LONG_HISTORY_FACTOR = 0.3;
const TOOLS_FACTOR = 0.4;
const MULTI_TURN_FACTOR = 0.2;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export class ComplexityScorer {
  private patterns: Array<{ phrase: string; regex: RegExp }>;
  private contextPolicy: ContextPolicy;

  constructor(options: ComplexityScorerOptions = {}) {
    const phrases = options.patterns ?? DEFAULT_COMPLEXITY_PATTERNS;
    this.patterns = phrases.map(phrase => ({
      phrase,
      regex: new RegExp(`\\b${escapeRegExp(phrase.trim()).replace(/\s+/g, '\\s+')}\\b`, 'i'),
    }));
    this.contextPolicy = options.contextPolicy ?? 'first-match';
  }

  score(utterance: string, context: ConversationContext): number {
    return this.explain(utterance, context).score;
  }

  explain(utterance: string, context: ConversationContext): ComplexityBreakdown {
    const text = typeof utterance === 'string' ? utterance : '';
    const wordCount = text.split(/\s+/).filter(word => word.length > 0).length;
    const wordFactor = Math.min(wordCount / WORDS_FOR_FULL_FACTOR, 1.0);

    const matchedPatterns = this.patterns
      .filter(({ regex }) => regex.test(text))
      .map(({ phrase }) => phrase);
    const patternFactor = this.patterns.length > 0
      ? matchedPatterns.length / this.patterns.length
      : 0;

    const contextFactor = this.contextFactor(context);
    const raw = WORD_WEIGHT * wordFactor + PATTERN_WEIGHT * patternFactor + contextFactor;

    return {
      wordCount,
      wordFactor,
      matchedPatterns,
      patternFactor,
      contextFactor,
      score: Math.max(0, Math.min(raw, 1.0)),
    };
  }

  private contextFactor(context: ConversationContext): number {
    const applicable: number[] = [];
    const priorTurns = context.turns.filter(turn => turn.role !== 'system').length;

    if (priorTurns > LONG_HISTORY_TURNS) applicable.push(LONG_HISTORY_FACTOR);
    if (context.anticipatesTools) applicable.push(TOOLS_FACTOR);
    if (context.multiTurn) applicable.push(MULTI_TURN_FACTOR);

    if (applicable.length === 0) {
      return 0;
    }

    return this.contextPolicy === 'additive'
      ? applicable.reduce((sum, factor) => sum + factor, 0)
      : applicable[0];
  }
}
