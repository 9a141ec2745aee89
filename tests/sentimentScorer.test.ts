import { LexiconSentimentScorer } from '../src/infrastructure/nlp/LexiconSentimentScorer.js';
import { ValidationError } from '../src/core/errors.js';

describe('LexiconSentimentScorer', () => {
  const scorer = new LexiconSentimentScorer();

  it('scores empty and blank text as neutral and objective', () => {
    expect(scorer.score('')).toEqual({ polarity: 0, subjectivity: 0 });
    expect(scorer.score('   \n ')).toEqual({ polarity: 0, subjectivity: 0 });
  });

  it('rejects missing text', () => {
    // null arriving from untyped JSON
    expect(() => scorer.score(JSON.parse('null'))).toThrow(ValidationError);
  });

  it('gives positive text a positive polarity', () => {
    expect(scorer.score('I am happy').polarity).toBeGreaterThan(0);
  });

  it('gives negative text a negative polarity', () => {
    expect(scorer.score('this is terrible').polarity).toBeLessThan(0);
  });

  it('measures subjectivity as the share of opinion words', () => {
    // one opinion word out of three tokens
    expect(scorer.score('I am happy').subjectivity).toBe(0.3333);
    expect(scorer.score('the bus leaves at noon').subjectivity).toBe(0);
  });

  it('keeps both scores in range', () => {
    const samples = ['good good good good', 'awful horrible terrible', 'plain words here', '我很焦虑'];
    for (const text of samples) {
      const { polarity, subjectivity } = scorer.score(text);
      expect(polarity).toBeGreaterThanOrEqual(-1);
      expect(polarity).toBeLessThanOrEqual(1);
      expect(subjectivity).toBeGreaterThanOrEqual(0);
      expect(subjectivity).toBeLessThanOrEqual(1);
    }
  });

  it('scores text outside the lexicon as neutral', () => {
    expect(scorer.score('我很焦虑')).toEqual({ polarity: 0, subjectivity: 0 });
  });

  it('is deterministic', () => {
    expect(scorer.score('I love this city but miss home')).toEqual(
      scorer.score('I love this city but miss home')
    );
  });
});
