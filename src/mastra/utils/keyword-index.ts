/**
 * In-process BM25 keyword index.
 *
 * score(D, Q) = Σ idf(t) · tf(t, D) · (k1 + 1) / (tf(t, D) + k1 · (1 - b + b · |D| / avgdl))
 * idf(t)      = ln(1 + (N - n(t) + 0.5) / (n(t) + 0.5))
 *
 * The idf form never goes negative, so a document sharing a term with the
 * query always scores above zero, even in a one-document corpus.
 */

import type {
  KeywordHit,
  KeywordIndexStats,
  PointId,
  SearchDocument,
  SearchLogger,
} from '../../types/hybrid-search.types';
import { createConsoleLogger } from './logger';

export const BM25_K1 = 1.5;
export const BM25_B = 0.75;

export interface KeywordIndexOptions {
  k1?: number;
  b?: number;
  logger?: SearchLogger;
}

interface IndexedDocument {
  id: PointId;
  length: number;
  termFrequencies: Map<string, number>;
}

export const tokenize = (text: string): string[] =>
  text
    .toLowerCase()
    .replace(/[^a-z0-9\s]/g, ' ')
    .split(/\s+/)
    .filter((token) => token.length > 0);

export class KeywordIndex {
  private readonly k1: number;
  private readonly b: number;
  private readonly logger: SearchLogger;

  private documents: IndexedDocument[] = [];
  private idf = new Map<string, number>();
  private avgDocLength = 0;
  private ready = false;

  constructor(options: KeywordIndexOptions = {}) {
    this.k1 = options.k1 ?? BM25_K1;
    this.b = options.b ?? BM25_B;
    this.logger = options.logger ?? createConsoleLogger('KeywordIndex');
  }

  get isReady(): boolean {
    return this.ready;
  }

  /** Replaces any previous state with statistics for `documents`. */
  build(documents: SearchDocument[]): void {
    const indexed: IndexedDocument[] = documents.map((document) => {
      const tokens = tokenize(document.text);
      const termFrequencies = new Map<string, number>();
      for (const token of tokens) {
        termFrequencies.set(token, (termFrequencies.get(token) ?? 0) + 1);
      }
      return { id: document.id, length: tokens.length, termFrequencies };
    });

    const documentFrequencies = new Map<string, number>();
    let totalLength = 0;
    for (const document of indexed) {
      totalLength += document.length;
      for (const term of document.termFrequencies.keys()) {
        documentFrequencies.set(term, (documentFrequencies.get(term) ?? 0) + 1);
      }
    }

    const corpusSize = indexed.length;
    const idf = new Map<string, number>();
    for (const [term, frequency] of documentFrequencies) {
      idf.set(term, Math.log(1 + (corpusSize - frequency + 0.5) / (frequency + 0.5)));
    }

    this.documents = indexed;
    this.idf = idf;
    this.avgDocLength = corpusSize > 0 ? totalLength / corpusSize : 0;
    this.ready = true;

    if (corpusSize === 0) {
      this.logger.warn('Keyword index built from an empty corpus');
    } else {
      this.logger.info(`Keyword index built with ${corpusSize} documents`, {
        terms: idf.size,
        avg_doc_length: Number(this.avgDocLength.toFixed(2)),
      });
    }
  }

  /**
   * Top `topK` documents by BM25 score, best first. Documents scoring zero are
   * left out. An index that was never built returns an empty list.
   */
  search(query: string, topK: number): KeywordHit[] {
    if (!this.ready) {
      this.logger.warn('Keyword index not built yet, returning no keyword hits');
      return [];
    }

    const queryTokens = tokenize(query);
    if (queryTokens.length === 0 || topK <= 0) {
      return [];
    }

    const hits: KeywordHit[] = [];
    for (const document of this.documents) {
      const score = this.score(document, queryTokens);
      if (score > 0) {
        hits.push({ id: document.id, score });
      }
    }

    // Array.prototype.sort is stable: equal scores keep corpus order
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, topK);
  }

  stats(): KeywordIndexStats {
    return {
      ready: this.ready,
      total_documents: this.documents.length,
      avg_doc_length: this.avgDocLength,
    };
  }

  private score(document: IndexedDocument, queryTokens: string[]): number {
    const lengthNorm = this.avgDocLength > 0 ? document.length / this.avgDocLength : 0;
    let score = 0;

    for (const token of queryTokens) {
      const frequency = document.termFrequencies.get(token);
      if (!frequency) {
        continue;
      }
      const idf = this.idf.get(token) ?? 0;
      score += (idf * frequency * (this.k1 + 1)) / (frequency + this.k1 * (1 - this.b + this.b * lengthNorm));
    }

    return score;
  }
}
