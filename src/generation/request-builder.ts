import type { ConversationContext, ModelProfile, RoutingDecision } from '../context/types.js';
import { RequestInvalidError } from '../resilience/errors.js';
import type { GenerationMessage, GenerationRequest, ToolSpec } from './types.js';

export const VOICE_GUIDELINES = [
  'You are speaking on a live phone call. Your reply is converted to speech sentence by sentence.',
  '- Keep responses short: one to three sentences.',
  '- Use natural contractions and plain spoken language; no lists, markdown, or emoji.',
  '- End with a clear question when you need something from the caller.',
].join('\n');

export interface BuildOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  tools?: ToolSpec[];
}

export interface RequestBuilderDefaults {
  temperature: number;
  maxTokens: number;
}

export type BuildResult =
  | { ok: true; request: GenerationRequest }
  | { ok: false; error: RequestInvalidError };

export class TurnRequestBuilder {
  private defaults: RequestBuilderDefaults;

  constructor(
    private lookup: (modelId: string) => ModelProfile | undefined,
    defaults: Partial<RequestBuilderDefaults> = {}
  ) {
    this.defaults = {
      temperature: defaults.temperature ?? 0.3,
      maxTokens: defaults.maxTokens ?? 300,
    };
  }

  build(
    utterance: string,
    context: ConversationContext,
    routing: RoutingDecision,
    options: BuildOptions = {}
  ): BuildResult {
    const profile = this.lookup(routing.modelId);
    if (!profile) {
      return {
        ok: false,
        error: new RequestInvalidError(`Model ${routing.modelId} is not in the model table`, routing.modelId),
      };
    }

    if (utterance.trim().length === 0) {
      return {
        ok: false,
        error: new RequestInvalidError('Cannot build a request for an empty utterance', routing.modelId),
      };
    }

    const { messages, systemNotes } = this.convertTurns(context);
    messages.push({ role: 'user', content: utterance.trim() });

    const request: GenerationRequest = {
      model: profile.id,
      region: routing.region,
      system: this.systemPrompt(options.systemPrompt, systemNotes),
      messages,
      temperature: options.temperature ?? this.defaults.temperature,
      maxTokens: Math.min(options.maxTokens ?? this.defaults.maxTokens, profile.maxOutputTokens),
    };

    if (profile.supportsTools && options.tools && options.tools.length > 0) {
      request.tools = options.tools;
    }

    if (routing.reasoningBudget > 0 && profile.supportsExtendedReasoning) {
      const ceiling = profile.maxReasoningTokens ?? routing.reasoningBudget;
      request.reasoning = { budgetTokens: Math.min(routing.reasoningBudget, ceiling) };
    }

    return { ok: true, request };
  }

  private systemPrompt(agentPrompt: string | undefined, notes: string[]): string {
    return [agentPrompt?.trim(), ...notes, VOICE_GUIDELINES]
      .filter((part): part is string => Boolean(part))
      .join('\n\n');
  }

  private convertTurns(context: ConversationContext): {
    messages: GenerationMessage[];
    systemNotes: string[];
  } {
    const messages: GenerationMessage[] = [];
    const systemNotes: string[] = [];

    for (const turn of context.turns) {
      if (turn.role === 'system') {
        systemNotes.push(turn.content);
      } else {
        messages.push({ role: turn.role, content: turn.content });
      }
    }

    return { messages, systemNotes };
  }
}
