import { POST_CATEGORIES, isPostCategory } from '../../core/entities/Post.js';
import type { NewPostRecord, Post, PublishPostInput } from '../../core/entities/Post.js';
import { NEUTRAL_MOOD_SCORE, resolveMood } from '../../core/entities/Mood.js';
import type { IPostRepository } from '../../core/interfaces/IPostRepository.js';
import type { ISentimentScorer } from '../../core/interfaces/ISentimentScorer.js';
import { ValidationError } from '../../core/errors.js';
import { parseDateString, systemClock, toDateString } from '../../utils/dates.js';
import type { Clock } from '../../utils/dates.js';

/**
 * Append-only store of anonymous posts
 */
export class PostService {
  constructor(
    private repository: IPostRepository,
    private scorer: ISentimentScorer,
    private clock: Clock = systemClock
  ) {}

  /**
   * Validate, derive scores and persist one post. Nothing is written when
   * validation or mood resolution fails.
   */
  save(input: PublishPostInput): Post {
    const content = typeof input.content === 'string' ? input.content.trim() : '';
    if (!content) {
      throw new ValidationError('Post content must not be empty', 'content');
    }
    if (!isPostCategory(input.category)) {
      throw new ValidationError(
        `Category must be one of ${POST_CATEGORIES.join(', ')}`,
        'category'
      );
    }
    if (input.postDate !== undefined && parseDateString(input.postDate) === null) {
      throw new ValidationError(`Invalid post date: ${input.postDate}`, 'postDate');
    }

    const mood = input.mood ? resolveMood(input.mood) : undefined;
    const sentiment = this.scorer.score(content);
    const now = this.clock();

    const record: NewPostRecord = {
      content,
      category: input.category,
      ...(mood ? { mood: mood.label, moodColor: mood.color } : {}),
      moodScore: mood ? mood.score : NEUTRAL_MOOD_SCORE,
      textPolarity: sentiment.polarity,
      textSubjectivity: sentiment.subjectivity,
      postDate: input.postDate ?? toDateString(now),
      createdAt: now,
    };

    return this.repository.insert(record);
  }

  /**
   * Every post, newest first
   */
  listAll(): Post[] {
    return Array.from(this.repository.iterateAll());
  }

  iterateAll(): IterableIterator<Post> {
    return this.repository.iterateAll();
  }

  get(id: number): Post | null {
    return this.repository.findById(id);
  }

  countByCategory(): Record<string, number> {
    const counts = this.repository.countByCategory();
    return Object.fromEntries(POST_CATEGORIES.map((category) => [category, counts[category] ?? 0]));
  }
}
