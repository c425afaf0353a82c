import { describe, it, expect } from 'vitest';
import { TurnRequestBuilder, VOICE_GUIDELINES } from '../../src/generation/request-builder.js';
import { createContext, type ModelProfile, type RoutingDecision } from '../../src/context/types.js';
import { RequestInvalidError } from '../../src/resilience/errors.js';
import type { ToolSpec } from '../../src/generation/types.js';

const reasoner: ModelProfile = {
  id: 'reasoner',
  tier: 'frontier',
  intelligenceRank: 5,
  speedRank: 1,
  costRank: 5,
  maxOutputTokens: 1000,
  maxReasoningTokens: 2000,
  supportsTools: true,
  supportsExtendedReasoning: true,
  supportsVision: false,
};

const quick: ModelProfile = {
  id: 'quick',
  tier: 'fast',
  intelligenceRank: 1,
  speedRank: 5,
  costRank: 1,
  maxOutputTokens: 200,
  supportsTools: false,
  supportsExtendedReasoning: false,
  supportsVision: false,
};

const table = new Map([reasoner, quick].map(profile => [profile.id, profile]));
const builder = new TurnRequestBuilder(id => table.get(id));

const lookupTool: ToolSpec = {
  name: 'lookup_appointment',
  description: 'Find the caller appointment',
  parameters: { type: 'object', properties: { date: { type: 'string' } } },
};

function routing(modelId: string, reasoningBudget = 0): RoutingDecision {
  return { modelId, region: 'us-east-1', reasoningBudget, rule: 'test', degraded: false, regionFallback: false };
}

describe('TurnRequestBuilder', () => {
  it('builds a request with history, guidelines and defaults', () => {
    const context = createContext('call-1', 'tenant-1', 'agent-1');
    const at = new Date('2025-01-01T00:00:00Z');
    context.turns.push(
      { role: 'system', content: 'Caller is a premium member.', timestamp: at },
      { role: 'user', content: 'Hi', timestamp: at },
      { role: 'assistant', content: 'Hello, how can I help?', timestamp: at }
    );

    const result = builder.build('  Move my appointment  ', context, routing('reasoner'), {
      systemPrompt: 'You are the front desk of a dental clinic.',
    });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.request).toEqual({
      model: 'reasoner',
      region: 'us-east-1',
      system: `You are the front desk of a dental clinic.\n\nCaller is a premium member.\n\n${VOICE_GUIDELINES}`,
      messages: [
        { role: 'user', content: 'Hi' },
        { role: 'assistant', content: 'Hello, how can I help?' },
        { role: 'user', content: 'Move my appointment' },
      ],
      temperature: 0.3,
      maxTokens: 300,
    });
  });

  it('caps max tokens at the model ceiling', () => {
    const result = builder.build('hello', createContext('c', 't', 'a'), routing('quick'), { maxTokens: 500 });
    expect(result.ok && result.request.maxTokens).toBe(200);
  });

  it('attaches tools only for tool-capable models', () => {
    const context = createContext('c', 't', 'a');
    const withTools = builder.build('hello', context, routing('reasoner'), { tools: [lookupTool] });
    const without = builder.build('hello', context, routing('quick'), { tools: [lookupTool] });

    expect(withTools.ok && withTools.request.tools).toEqual([lookupTool]);
    expect(without.ok && without.request.tools).toBeUndefined();
  });

  it('clamps the reasoning budget to the model maximum', () => {
    const result = builder.build('hello', createContext('c', 't', 'a'), routing('reasoner', 4096));
    expect(result.ok && result.request.reasoning).toEqual({ budgetTokens: 2000 });
  });

  it('omits reasoning when the budget is zero or the model cannot reason', () => {
    const context = createContext('c', 't', 'a');
    const none = builder.build('hello', context, routing('reasoner', 0));
    const unsupported = builder.build('hello', context, routing('quick', 4096));

    expect(none.ok && none.request.reasoning).toBeUndefined();
    expect(unsupported.ok && unsupported.request.reasoning).toBeUndefined();
  });

  it('returns an error for a model missing from the table', () => {
    const result = builder.build('hello', createContext('c', 't', 'a'), routing('retired-model'));
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(RequestInvalidError);
    expect(result.error.message).toBe('Model retired-model is not in the model table');
  });

  it('returns an error for an empty utterance', () => {
    const result = builder.build('   ', createContext('c', 't', 'a'), routing('quick'));
    expect(result.ok).toBe(false);
  });

  it('does not modify the conversation context', () => {
    const context = createContext('c', 't', 'a');
    builder.build('hello', context, routing('quick'));
    expect(context.turns).toEqual([]);
  });
});
