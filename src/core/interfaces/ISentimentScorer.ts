export interface SentimentScore {
  /** -1 (negative) .. 1 (positive) */
  polarity: number;
  /** 0 (objective) .. 1 (subjective) */
  subjectivity: number;
}

export interface ISentimentScorer {
  score(text: string): SentimentScore;
}
