/**
 * Keyword overlap scoring weighted by inverse document frequency.
 * Shared by the protocol matcher (documents = protocols) and the
 * specialization router (documents = profiles).
 */

const PUNCTUATION = /[^\p{L}\p{N}\s]+/gu;

/**
 * Lowercase, strip punctuation and split into a set of tokens
 */
export function tokenize(text: string): Set<string> {
  const tokens = text.toLowerCase().replace(PUNCTUATION, ' ').split(/\s+/);
  return new Set(tokens.filter(t => t.length > 0));
}

/**
 * Normalize a keyword the same way symptom text is normalized.
 * "Chest-Pain!" -> "chest pain"
 */
export function normalizeKeyword(keyword: string): string {
  return Array.from(tokenize(keyword)).join(' ');
}

interface IndexedKeyword {
  keyword: string;
  tokens: string[];
}

export interface KeywordScore {
  score: number;
  matched: string[];
}

export class KeywordIndex {
  private readonly documents = new Map<string, IndexedKeyword[]>();
  private readonly idf = new Map<string, number>();

  constructor(entries: Iterable<[id: string, keywords: Iterable<string>]>) {
    const documentFrequency = new Map<string, number>();

    for (const [id, keywords] of entries) {
      const unique = new Map<string, IndexedKeyword>();
      for (const raw of keywords) {
        const keyword = normalizeKeyword(raw);
        if (keyword && !unique.has(keyword)) {
          unique.set(keyword, { keyword, tokens: keyword.split(' ') });
        }
      }
      this.documents.set(id, Array.from(unique.values()));
      for (const keyword of unique.keys()) {
        documentFrequency.set(keyword, (documentFrequency.get(keyword) ?? 0) + 1);
      }
    }

    const total = this.documents.size;
    for (const [keyword, df] of documentFrequency) {
      this.idf.set(keyword, Math.log(1 + total / df));
    }
  }

  get size(): number {
    return this.documents.size;
  }

  ids(): string[] {
    return Array.from(this.documents.keys());
  }

  /**
   * Sum of IDF over the document's keywords present in `tokens`.
   * A multi-word keyword counts when every one of its tokens is present.
   */
  score(id: string, tokens: ReadonlySet<string>): KeywordScore {
    const keywords = this.documents.get(id);
    if (!keywords) {
      return { score: 0, matched: [] };
    }

    let score = 0;
    const matched: string[] = [];
    for (const { keyword, tokens: parts } of keywords) {
      if (parts.every(part => tokens.has(part))) {
        score += this.idf.get(keyword) ?? 0;
        matched.push(keyword);
      }
    }
    return { score, matched };
  }

  /**
   * Highest score a document can reach (all of its keywords matched)
   */
  maxScore(id: string): number {
    const keywords = this.documents.get(id) ?? [];
    return keywords.reduce((sum, { keyword }) => sum + (this.idf.get(keyword) ?? 0), 0);
  }
}
