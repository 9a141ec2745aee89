import { MOOD_VOCABULARY, NO_DATA_COLOR, findMoodByScore, resolveMood } from '../src/core/entities/Mood.js';
import { UnknownMoodError } from '../src/core/errors.js';

describe('Mood vocabulary', () => {
  it('has five moods from happiest to saddest', () => {
    expect(MOOD_VOCABULARY.map((m) => m.score)).toEqual([100, 75, 50, 25, 0]);
    expect(MOOD_VOCABULARY.map((m) => m.color)).toEqual([
      '#FFD700',
      '#98FB98',
      '#87CEEB',
      '#DDA0DD',
      '#CD5C5C',
    ]);
  });

  it('builds labels from name and emoji', () => {
    expect(MOOD_VOCABULARY[4].label).toBe('很难过 😢');
  });

  it('resolves a full label', () => {
    const mood = resolveMood('很难过 😢');
    expect(mood.color).toBe('#CD5C5C');
    expect(mood.score).toBe(0);
  });

  it('resolves a bare name and trims whitespace', () => {
    expect(resolveMood('  心情不错 ').score).toBe(75);
  });

  it('rejects labels outside the vocabulary', () => {
    expect(() => resolveMood('超级开心')).toThrow(UnknownMoodError);
    expect(() => resolveMood('')).toThrow('Unknown mood label: ');
  });

  it('finds moods by score', () => {
    expect(findMoodByScore(50)?.name).toBe('一般般');
    expect(findMoodByScore(60)).toBeUndefined();
  });

  it('is frozen', () => {
    expect(Object.isFrozen(MOOD_VOCABULARY)).toBe(true);
    expect(Object.isFrozen(MOOD_VOCABULARY[0])).toBe(true);
  });

  it('uses a distinct colour for days without data', () => {
    expect(MOOD_VOCABULARY.some((m) => m.color === NO_DATA_COLOR)).toBe(false);
  });
});
