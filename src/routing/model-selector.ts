import type { ModelProfile, ModelTier, RoutingDecision } from '../context/types.js';
import { ConfigurationError } from '../resilience/errors.js';

export interface SelectionInput {
  score: number;
  latencyBudgetMs: number;
  costSensitive: boolean;
  needsTools: boolean;
  preferredRegion: string;
}

type Ranking = (a: ModelProfile, b: ModelProfile) => number;

export interface SelectionRule {
  name: string;
  matches: (input: SelectionInput) => boolean;
  tier: ModelTier;
  /** Models the rule may pick from; the whole tier when omitted. */
  eligible?: (profile: ModelProfile) => boolean;
  rank: (input: SelectionInput) => Ranking;
  reasoning?: boolean;
}

export interface ModelSelectorOptions {
  models: ModelProfile[];
  /** Model id to the regions serving it. */
  availability: Record<string, string[]>;
  /** Regions probed, in order, when the preferred one lacks the model. */
  fallbackRegions: string[];
  reasoningBudgetTokens?: number;
  rules?: SelectionRule[];
}

const mostCapable: Ranking = (a, b) =>
  b.intelligenceRank - a.intelligenceRank || b.speedRank - a.speedRank;
const cheapest: Ranking = (a, b) =>
  a.costRank - b.costRank || b.speedRank - a.speedRank;
const fastest: Ranking = (a, b) =>
  b.speedRank - a.speedRank || a.costRank - b.costRank;

export const DEFAULT_SELECTION_RULES: SelectionRule[] = [
  {
    name: 'deep-reasoning',
    matches: ({ score, latencyBudgetMs }) => score > 0.9 && latencyBudgetMs > 1000,
    tier: 'frontier',
    rank: () => mostCapable,
    reasoning: true,
  },
  {
    name: 'instant-reply',
    matches: ({ score, latencyBudgetMs }) => score < 0.3 && latencyBudgetMs < 150,
    tier: 'fast',
    rank: ({ costSensitive }) => (costSensitive ? cheapest : mostCapable),
  },
  {
    name: 'fast-reply',
    matches: ({ score, latencyBudgetMs }) => score < 0.6 && latencyBudgetMs < 200,
    tier: 'fast',
    rank: () => fastest,
  },
  {
    name: 'tool-use',
    matches: ({ needsTools }) => needsTools,
    tier: 'balanced',
    eligible: profile => profile.supportsTools,
    rank: () => mostCapable,
  },
  {
    name: 'complex',
    matches: ({ score }) => score > 0.7,
    tier: 'advanced',
    rank: () => mostCapable,
  },
  {
    name: 'balanced',
    matches: () => true,
    tier: 'balanced',
    rank: () => mostCapable,
  },
];

/**
 * Maps a turn's complexity and constraints to a (model, region) pair.
 * Rules are tried top to bottom and the first match wins. The selector
 * holds only the static tables it was built with, so identical input
 * always yields an identical decision.
 */
export class ModelSelector {
  private models: Map<string, ModelProfile>;
  private availability: Map<string, ReadonlySet<string>>;
  private fallbackRegions: string[];
  private reasoningBudgetTokens: number;
  private rules: SelectionRule[];

  constructor(options: ModelSelectorOptions) {
    if (options.models.length === 0) {
      throw new ConfigurationError('Model table is empty');
    }
    this.models = new Map(options.models.map(profile => [profile.id, profile]));
    this.availability = new Map(
      Object.entries(options.availability).map(([id, regions]) => [id, new Set(regions)])
    );
    this.fallbackRegions = [...options.fallbackRegions];
    this.reasoningBudgetTokens = options.reasoningBudgetTokens ?? 4096;
    this.rules = options.rules ?? DEFAULT_SELECTION_RULES;
  }

  select(input: SelectionInput): RoutingDecision {
    const rule = this.rules.find(candidate => candidate.matches(input));
    if (!rule) {
      throw new ConfigurationError('No selection rule matched; the rule list needs a catch-all');
    }

    const model = this.pickModel(rule, input);
    const reasoningBudget = rule.reasoning && model.supportsExtendedReasoning
      ? this.reasoningBudgetTokens
      : 0;

    return {
      modelId: model.id,
      rule: rule.name,
      reasoningBudget,
      ...this.resolveRegion(model.id, input.preferredRegion),
    };
  }

  /**
   * Regions that serve `modelId`, preferred region first, then the
   * fallback regions in configured order.
   */
  regionsFor(modelId: string, preferredRegion: string): string[] {
    const served = this.availability.get(modelId);
    if (!served) {
      return [];
    }
    const order = [preferredRegion, ...this.fallbackRegions.filter(r => r !== preferredRegion)];
    return order.filter(region => served.has(region));
  }

  getModel(modelId: string): ModelProfile | undefined {
    return this.models.get(modelId);
  }

  getModels(): ModelProfile[] {
    return Array.from(this.models.values());
  }

  private pickModel(rule: SelectionRule, input: SelectionInput): ModelProfile {
    const all = Array.from(this.models.values());
    const eligible = rule.eligible ?? (() => true);
    const ranking = rule.rank(input);

    const inTier = all.filter(profile => profile.tier === rule.tier && eligible(profile));
    const pool = inTier.length > 0 ? inTier : all.filter(eligible);
    const ranked = [...(pool.length > 0 ? pool : all)].sort(ranking);

    if (inTier.length === 0) {
      console.warn(`[Selector] No ${rule.tier} model configured for rule ${rule.name}, using ${ranked[0].id}`);
    }

    return ranked[0];
  }

  private resolveRegion(
    modelId: string,
    preferredRegion: string
  ): Pick<RoutingDecision, 'region' | 'degraded' | 'regionFallback'> {
    const [first] = this.regionsFor(modelId, preferredRegion);

    if (first === undefined) {
      return { region: preferredRegion, degraded: true, regionFallback: false };
    }

    return { region: first, degraded: false, regionFallback: first !== preferredRegion };
  }
}
