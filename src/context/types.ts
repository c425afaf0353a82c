export interface Message {
  role: 'user' | 'assistant' | 'system';
  content: string;
  tokens?: number;
  timestamp: Date;
  metadata?: Record<string, unknown>;
}

/**
 * Everything the pipeline knows about the call a turn belongs to.
 * Owned by the call session; turns are only ever appended.
 */
export interface ConversationContext {
  callId: string;
  tenantId: string;
  agentConfigId: string;
  regionHint?: string;
  turns: Message[];
  anticipatesTools?: boolean;
  multiTurn?: boolean;
}

export type ModelTier = 'frontier' | 'advanced' | 'balanced' | 'fast';

/**
 * Static descriptor of a generation model. Ranks are relative within the
 * configured table: higher intelligence/speed is better, higher cost is
 * more expensive.
 */
export interface ModelProfile {
  id: string;
  tier: ModelTier;
  intelligenceRank: number;
  speedRank: number;
  costRank: number;
  maxOutputTokens: number;
  maxReasoningTokens?: number;
  supportsTools: boolean;
  supportsExtendedReasoning: boolean;
  supportsVision: boolean;
  costPerInputToken?: number;
  costPerOutputToken?: number;
}

export interface RoutingDecision {
  modelId: string;
  region: string;
  reasoningBudget: number;
  /** Name of the selection rule that fired. */
  rule: string;
  /** The model is available in neither the preferred nor any fallback region. */
  degraded: boolean;
  regionFallback: boolean;
}

export function createContext(
  callId: string,
  tenantId: string,
  agentConfigId: string,
  regionHint?: string
): ConversationContext {
  return {
    callId,
    tenantId,
    agentConfigId,
    regionHint,
    turns: [],
  };
}
