import { UnknownMoodError } from '../errors.js';

/**
 * One entry of the fixed mood vocabulary
 */
export interface MoodEntry {
  name: string;
  emoji: string;
  /** Display label, also the value stored with a post */
  label: string;
  color: string;
  /** 0-100 */
  score: number;
}

function entry(name: string, emoji: string, score: number, color: string): MoodEntry {
  return Object.freeze({ name, emoji, label: `${name} ${emoji}`, color, score });
}

// Order drives the mood picker, nothing else.
export const MOOD_VOCABULARY: readonly MoodEntry[] = Object.freeze([
  entry('非常开心', '😄', 100, '#FFD700'),
  entry('心情不错', '🙂', 75, '#98FB98'),
  entry('一般般', '😐', 50, '#87CEEB'),
  entry('有点低落', '😔', 25, '#DDA0DD'),
  entry('很难过', '😢', 0, '#CD5C5C'),
]);

export const NEUTRAL_MOOD_SCORE = 50;

/** Calendar cells and trend points without a mood */
export const NO_DATA_COLOR = '#EBEDF0';

export const MOOD_SCORE_RANGE: readonly [number, number] = [0, 100];

/**
 * Resolve a mood by its full label ("很难过 😢") or bare name ("很难过")
 */
export function resolveMood(label: string): MoodEntry {
  const key = typeof label === 'string' ? label.trim() : '';
  const found = MOOD_VOCABULARY.find((m) => m.label === key || m.name === key);
  if (!found) {
    throw new UnknownMoodError(String(label));
  }
  return found;
}

export function findMoodByScore(score: number): MoodEntry | undefined {
  return MOOD_VOCABULARY.find((m) => m.score === score);
}
