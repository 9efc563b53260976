/**
 * TF-IDF vectorizer
 * Word n-gram counts weighted by smoothed inverse document frequency, L2-normalised per row
 */

import { tokenize } from '../text/preprocess';
import { serializedVectorizerSchema, type SerializedVectorizer } from './schemas';

export interface TfidfOptions {
  maxFeatures: number;
  ngramRange: [number, number];
  /** Minimum number of documents a term must appear in */
  minDf?: number;
}

export class TfidfVectorizer {
  private vocabulary = new Map<string, number>();
  private idf: number[] = [];
  private readonly maxFeatures: number;
  private readonly ngramMin: number;
  private readonly ngramMax: number;
  private readonly minDf: number;

  constructor(options: TfidfOptions) {
    const [ngramMin, ngramMax] = options.ngramRange;
    if (ngramMin < 1 || ngramMax < ngramMin) {
      throw new RangeError(`Invalid n-gram range [${ngramMin}, ${ngramMax}]`);
    }
    if (options.maxFeatures < 1) {
      throw new RangeError(`maxFeatures must be positive, got ${options.maxFeatures}`);
    }
    this.maxFeatures = options.maxFeatures;
    this.ngramMin = ngramMin;
    this.ngramMax = ngramMax;
    this.minDf = options.minDf ?? 1;
  }

  get isFitted(): boolean {
    return this.idf.length > 0;
  }

  /** Number of columns produced by transform */
  get size(): number {
    return this.idf.length;
  }

  getVocabulary(): ReadonlyMap<string, number> {
    return this.vocabulary;
  }

  /**
   * Learn the vocabulary: the maxFeatures most frequent terms across the corpus
   * (ties alphabetical), indexed alphabetically
   */
  fit(documents: string[]): this {
    if (documents.length === 0) {
      throw new Error('Cannot fit a vectorizer on an empty corpus');
    }

    const termCounts = new Map<string, number>();
    const documentFrequency = new Map<string, number>();

    for (const doc of documents) {
      const terms = this.extractTerms(doc);
      for (const term of terms) {
        termCounts.set(term, (termCounts.get(term) ?? 0) + 1);
      }
      for (const term of new Set(terms)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const selected = [...termCounts.entries()]
      .filter(([term]) => (documentFrequency.get(term) ?? 0) >= this.minDf)
      .sort((a, b) => b[1] - a[1] || compareTerms(a[0], b[0]))
      .slice(0, this.maxFeatures)
      .map(([term]) => term)
      .sort(compareTerms);

    if (selected.length === 0) {
      throw new Error('No terms survived vocabulary selection; the corpus has no tokens');
    }

    const n = documents.length;
    this.vocabulary = new Map(selected.map((term, index) => [term, index]));
    this.idf = selected.map(term => Math.log((1 + n) / (1 + (documentFrequency.get(term) ?? 0))) + 1);

    return this;
  }

  /**
   * Dense TF-IDF rows; terms outside the vocabulary are ignored
   */
  transform(documents: string[]): number[][] {
    if (!this.isFitted) {
      throw new Error('Vectorizer must be fitted before transform');
    }

    return documents.map(doc => {
      const row = new Array<number>(this.idf.length).fill(0);
      for (const term of this.extractTerms(doc)) {
        const column = this.vocabulary.get(term);
        if (column !== undefined) {
          row[column] += 1;
        }
      }

      let sumSquares = 0;
      for (let i = 0; i < row.length; i++) {
        row[i] *= this.idf[i];
        sumSquares += row[i] * row[i];
      }

      if (sumSquares > 0) {
        const norm = Math.sqrt(sumSquares);
        for (let i = 0; i < row.length; i++) {
          row[i] /= norm;
        }
      }
      return row;
    });
  }

  fitTransform(documents: string[]): number[][] {
    return this.fit(documents).transform(documents);
  }

  toJSON(): SerializedVectorizer {
    return {
      kind: 'tfidf',
      ngramRange: [this.ngramMin, this.ngramMax],
      maxFeatures: this.maxFeatures,
      minDf: this.minDf,
      vocabulary: Object.fromEntries(this.vocabulary),
      idf: [...this.idf],
    };
  }

  static fromJSON(value: unknown): TfidfVectorizer {
    const data = serializedVectorizerSchema.parse(value);
    const entries = Object.entries(data.vocabulary);

    if (entries.length !== data.idf.length) {
      throw new Error(`Vocabulary has ${entries.length} terms but idf has ${data.idf.length} weights`);
    }
    if (entries.some(([, column]) => column >= data.idf.length)) {
      throw new Error('Vocabulary column index out of range');
    }

    const vectorizer = new TfidfVectorizer({
      maxFeatures: data.maxFeatures,
      ngramRange: data.ngramRange,
      minDf: data.minDf,
    });
    vectorizer.vocabulary = new Map(entries);
    vectorizer.idf = data.idf;
    return vectorizer;
  }

  private extractTerms(doc: string): string[] {
    const tokens = tokenize(doc);
    const terms: string[] = [];
    for (let n = this.ngramMin; n <= this.ngramMax; n++) {
      for (let i = 0; i + n <= tokens.length; i++) {
        terms.push(tokens.slice(i, i + n).join(' '));
      }
    }
    return terms;
  }
}

function compareTerms(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
