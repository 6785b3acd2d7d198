/**
 * Specialization Router
 * Picks the specialist whose focus keywords best overlap the symptom text.
 * Ambiguous or weak matches go to the general profile rather than a guess.
 */

import { GENERAL_SPECIALIZATION, RouteDecision } from '../types/triage';
import { KeywordIndex, tokenize } from './keywordIndex';
import { ProtocolMatcher } from './protocolMatcher';
import { SpecializationRegistry } from './specializationRegistry';

export interface RouterOptions {
  /** Normalized confidence the winner must reach; 0 means any keyword match routes */
  minConfidence: number;
}

const DEFAULT_ROUTER_OPTIONS: RouterOptions = {
  minConfidence: 0,
};

// Ties are broken against the matcher's top result only
const TIE_BREAK_DEPTH = 1;

const SCORE_EPSILON = 1e-9;

const GENERAL_ROUTE: RouteDecision = { specialization: GENERAL_SPECIALIZATION, confidence: 0 };

export class SpecializationRouter {
  private readonly index: KeywordIndex;
  private readonly options: RouterOptions;

  constructor(
    private readonly registry: SpecializationRegistry,
    private readonly matcher: ProtocolMatcher,
    options: Partial<RouterOptions> = {}
  ) {
    this.options = { ...DEFAULT_ROUTER_OPTIONS, ...options };
    this.index = new KeywordIndex(
      registry.specialists().map(p => [p.id, p.focusKeywords] as [string, Iterable<string>])
    );
  }

  route(symptomText: string): RouteDecision {
    const tokens = tokenize(symptomText);
    if (tokens.size === 0 || this.index.size === 0) {
      return { ...GENERAL_ROUTE };
    }

    let best = 0;
    let leaders: string[] = [];
    for (const id of this.index.ids()) {
      const { score } = this.index.score(id, tokens);
      if (score > best + SCORE_EPSILON) {
        best = score;
        leaders = [id];
      } else if (score > 0 && Math.abs(score - best) <= SCORE_EPSILON) {
        leaders.push(id);
      }
    }

    if (best <= 0 || leaders.length === 0) {
      return { ...GENERAL_ROUTE };
    }

    const winner = leaders.length === 1 ? leaders[0] : this.breakTie(symptomText, leaders);
    if (!winner) {
      return { ...GENERAL_ROUTE };
    }

    const max = this.index.maxScore(winner);
    const confidence = max > 0 ? Math.min(1, best / max) : 0;
    if (confidence < this.options.minConfidence) {
      return { ...GENERAL_ROUTE };
    }

    return { specialization: winner, confidence };
  }

  /**
   * Prefer the tied profile whose focus protocols contain the matcher's top
   * result; a remaining tie yields undefined (general).
   */
  private breakTie(symptomText: string, leaders: string[]): string | undefined {
    const top = this.matcher.match(symptomText, TIE_BREAK_DEPTH);
    if (top.length === 0) return undefined;

    let bestOverlap = 0;
    let preferred: string[] = [];
    for (const id of leaders) {
      const focus = this.registry.get(id).focusProtocolIds;
      const overlap = top.filter(protocolId => focus.has(protocolId)).length;
      if (overlap > bestOverlap) {
        bestOverlap = overlap;
        preferred = [id];
      } else if (overlap === bestOverlap && overlap > 0) {
        preferred.push(id);
      }
    }

    return preferred.length === 1 ? preferred[0] : undefined;
  }
}
