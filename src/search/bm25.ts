import { tokenize, tokenizeKeywords } from "./tokenize";

/** Term frequency saturation */
export const BM25_K1 = 1.5;
/** Length normalization */
export const BM25_B = 0.75;

/**
 * Mean token count across the corpus (0 for an empty corpus).
 */
export function averageDocumentLength(corpus: readonly string[]): number {
  if (corpus.length === 0) return 0;
  const total = corpus.reduce((sum, doc) => sum + tokenize(doc).length, 0);
  return total / corpus.length;
}

/**
 * Okapi BM25 over a fixed, in-memory corpus of per-conversation texts.
 * One instance per search call.
 */
export class BM25Scorer {
  readonly corpusSize: number;
  readonly avgDocLength: number;
  private idf: Map<string, number>;

  constructor(corpus: readonly string[], avgDocLength: number) {
    if (corpus.length === 0) {
      throw new Error("BM25Scorer requires a non-empty corpus");
    }
    this.corpusSize = corpus.length;
    this.avgDocLength = avgDocLength;
    this.idf = this.calculateIdf(corpus);
  }

  /**
   * idf = ln((N - df + 0.5) / (df + 0.5) + 1), always positive for terms in the corpus.
   */
  private calculateIdf(corpus: readonly string[]): Map<string, number> {
    const documentFrequency = new Map<string, number>();
    for (const doc of corpus) {
      for (const term of new Set(tokenize(doc))) {
        documentFrequency.set(term, (documentFrequency.get(term) || 0) + 1);
      }
    }

    const n = this.corpusSize;
    const idf = new Map<string, number>();
    for (const [term, df] of documentFrequency) {
      idf.set(term, Math.log((n - df + 0.5) / (df + 0.5) + 1));
    }
    return idf;
  }

  idfOf(term: string): number {
    return this.idf.get(term) ?? 0;
  }

  /**
   * Sum of BM25 term scores over the unique keyword tokens.
   * Terms missing from the document contribute nothing.
   */
  score(document: string, keywords: readonly string[]): number {
    const keywordTokens = new Set(tokenizeKeywords(keywords));
    if (keywordTokens.size === 0) return 0;

    const docTerms = tokenize(document);
    const termFrequency = new Map<string, number>();
    for (const term of docTerms) {
      termFrequency.set(term, (termFrequency.get(term) || 0) + 1);
    }

    const lengthRatio = this.avgDocLength > 0 ? docTerms.length / this.avgDocLength : 1;
    const lengthNorm = BM25_K1 * (1 - BM25_B + BM25_B * lengthRatio);

    let score = 0;
    for (const token of keywordTokens) {
      const tf = termFrequency.get(token) || 0;
      if (tf === 0) continue;
      score += this.idfOf(token) * ((tf * (BM25_K1 + 1)) / (tf + lengthNorm));
    }
    return score;
  }
}

/**
 * Map an unbounded raw score into [0, 1) preserving order: s / (s + 1).
 */
export function normalizeScore(rawScore: number): number {
  return rawScore > 0 ? rawScore / (rawScore + 1) : 0;
}
