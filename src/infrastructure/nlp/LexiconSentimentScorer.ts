import Sentiment from 'sentiment';
import type { ISentimentScorer, SentimentScore } from '../../core/interfaces/ISentimentScorer.js';
import { ValidationError } from '../../core/errors.js';

// AFINN word scores lie in [-5, 5]
const AFINN_MAX = 5;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function round(value: number): number {
  return Math.round(value * 10000) / 10000;
}

/**
 * Lexicon-based scorer on top of the AFINN analyzer from `sentiment`.
 *
 * polarity     = comparative score / 5, clamped to [-1, 1]
 * subjectivity = share of tokens carrying any sentiment
 */
export class LexiconSentimentScorer implements ISentimentScorer {
  private analyzer = new Sentiment();

  score(text: string): SentimentScore {
    if (text === null || text === undefined) {
      throw new ValidationError('Cannot score missing text', 'text');
    }
    if (text.trim() === '') {
      return { polarity: 0, subjectivity: 0 };
    }

    const result = this.analyzer.analyze(text);
    const tokenCount = result.tokens.filter((token) => token !== '').length;
    if (tokenCount === 0) {
      return { polarity: 0, subjectivity: 0 };
    }

    const opinionated = result.positive.length + result.negative.length;

    return {
      polarity: round(clamp(result.score / tokenCount / AFINN_MAX, -1, 1)),
      subjectivity: round(clamp(opinionated / tokenCount, 0, 1)),
    };
  }
}
