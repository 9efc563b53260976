import { TfidfVectorizer } from '../../src/ml/vectorizer';

describe('TfidfVectorizer', () => {
  const corpus = ['good movie', 'bad movie', 'good good film'];

  it('should index the vocabulary alphabetically', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 1] }).fit(corpus);

    expect([...vectorizer.getVocabulary().entries()]).toEqual([
      ['bad', 0],
      ['film', 1],
      ['good', 2],
      ['movie', 3],
    ]);
    expect(vectorizer.size).toBe(4);
  });

  it('should weight terms by smoothed idf and normalise rows', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 1] }).fit(corpus);
    const [row] = vectorizer.transform(['good movie']);

    expect(row[0]).toBe(0);
    expect(row[1]).toBe(0);
    expect(row[2]).toBeCloseTo(Math.SQRT1_2, 10);
    expect(row[3]).toBeCloseTo(Math.SQRT1_2, 10);

    const json = vectorizer.toJSON();
    expect(json.idf[0]).toBeCloseTo(Math.log(4 / 2) + 1, 10);
    expect(json.idf[2]).toBeCloseTo(Math.log(4 / 3) + 1, 10);
  });

  it('should keep only the most frequent terms', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 2, ngramRange: [1, 1] }).fit(corpus);

    expect([...vectorizer.getVocabulary().keys()]).toEqual(['good', 'movie']);
  });

  it('should count n-grams across the configured range', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 2] }).fit(['good movie']);

    expect([...vectorizer.getVocabulary().keys()]).toEqual(['good', 'good movie', 'movie']);
  });

  it('should map unknown text to the zero vector', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 1] }).fit(corpus);

    expect(vectorizer.transform(['terrible'])).toEqual([[0, 0, 0, 0]]);
  });

  it('should refuse to transform before fitting', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 1] });

    expect(() => vectorizer.transform(['good'])).toThrow('Vectorizer must be fitted before transform');
  });

  it('should restore from its JSON form', () => {
    const vectorizer = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 2] }).fit(corpus);
    const restored = TfidfVectorizer.fromJSON(JSON.parse(JSON.stringify(vectorizer)));

    expect(restored.transform(['bad film'])).toEqual(vectorizer.transform(['bad film']));
  });

  it('should reject JSON whose idf does not match the vocabulary', () => {
    const json = new TfidfVectorizer({ maxFeatures: 10, ngramRange: [1, 1] }).fit(corpus).toJSON();

    expect(() => TfidfVectorizer.fromJSON({ ...json, idf: [1] })).toThrow(
      'Vocabulary has 4 terms but idf has 1 weights'
    );
  });
});
