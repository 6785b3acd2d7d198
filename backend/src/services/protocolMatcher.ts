/**
 * Protocol Matcher
 * Ranks clinical protocols by IDF-weighted keyword overlap with symptom text.
 * Statistics are computed once per corpus; reloading the corpus means building
 * a new matcher.
 */

import { Protocol, ProtocolContext } from '../types/triage';
import { KeywordIndex, tokenize } from './keywordIndex';

export const DEFAULT_EXCERPT_CHARS = 600;

export interface ProtocolMatch {
  id: string;
  score: number;
  matchedKeywords: string[];
}

export class ProtocolMatcher {
  private readonly protocols: ReadonlyMap<string, Protocol>;
  private readonly index: KeywordIndex;

  constructor(corpus: Iterable<Protocol>) {
    const protocols = new Map<string, Protocol>();
    for (const protocol of corpus) {
      protocols.set(protocol.id, protocol);
    }
    this.protocols = protocols;
    this.index = new KeywordIndex(
      Array.from(protocols.values(), p => [p.id, p.keywords] as [string, Iterable<string>])
    );
  }

  get size(): number {
    return this.protocols.size;
  }

  protocol(id: string): Protocol | undefined {
    return this.protocols.get(id);
  }

  /**
   * Ranked matches with scores. An empty or absent scope means the whole corpus.
   */
  rank(symptomText: string, topK: number, scope?: ReadonlySet<string>): ProtocolMatch[] {
    if (topK <= 0) return [];

    const tokens = tokenize(symptomText);
    if (tokens.size === 0) return [];

    const candidates = scope && scope.size > 0
      ? this.index.ids().filter(id => scope.has(id))
      : this.index.ids();

    const matches: ProtocolMatch[] = [];
    for (const id of candidates) {
      const { score, matched } = this.index.score(id, tokens);
      if (score > 0) {
        matches.push({ id, score, matchedKeywords: matched });
      }
    }

    matches.sort((a, b) => b.score - a.score || (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    return matches.slice(0, topK);
  }

  /**
   * Protocol ids, most relevant first. Empty when nothing shares a keyword.
   */
  match(symptomText: string, topK: number, scope?: ReadonlySet<string>): string[] {
    return this.rank(symptomText, topK, scope).map(m => m.id);
  }

  /**
   * Title and leading body excerpt for each id, in the given order
   */
  contextFor(ids: readonly string[], excerptChars = DEFAULT_EXCERPT_CHARS): ProtocolContext[] {
    const context: ProtocolContext[] = [];
    for (const id of ids) {
      const protocol = this.protocols.get(id);
      if (protocol) {
        context.push({ title: protocol.title, excerpt: excerpt(protocol.body, excerptChars) });
      }
    }
    return context;
  }
}

function excerpt(body: string, maxChars: number): string {
  const trimmed = body.trim();
  if (trimmed.length <= maxChars) return trimmed;
  return `${trimmed.slice(0, maxChars).trimEnd()}...`;
}
