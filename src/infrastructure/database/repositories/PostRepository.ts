import Database from 'better-sqlite3';
import type { IPostRepository } from '../../../core/interfaces/IPostRepository.js';
import { isPostCategory } from '../../../core/entities/Post.js';
import type { NewPostRecord, Post, PostCategory, PostRecord } from '../../../core/entities/Post.js';
import { NEUTRAL_MOOD_SCORE } from '../../../core/entities/Mood.js';
import { StorageError, errorMessage } from '../../../core/errors.js';

/**
 * Map a stored row to a Post. Rows written before the mood columns existed
 * fall back to neutral defaults.
 */
export function toPost(row: PostRecord): Post {
  const category: PostCategory = isPostCategory(row.category) ? row.category : '其他';
  const createdAt = parseTimestamp(row.timestamp);

  return {
    id: row.id,
    content: row.content,
    category,
    ...(row.mood ? { mood: row.mood } : {}),
    ...(row.mood_color ? { moodColor: row.mood_color } : {}),
    moodScore: row.mood_score ?? NEUTRAL_MOOD_SCORE,
    textPolarity: row.sentiment_score ?? 0,
    textSubjectivity: row.subjectivity ?? 0,
    postDate: row.post_date ?? createdAt.toISOString().slice(0, 10),
    createdAt,
  };
}

// CURRENT_TIMESTAMP defaults are "YYYY-MM-DD HH:MM:SS" in UTC
function parseTimestamp(value: string): Date {
  return new Date(value.includes('T') ? value : `${value.replace(' ', 'T')}Z`);
}

/**
 * SQLite implementation of the anonymous post store
 */
export class PostRepository implements IPostRepository {
  constructor(private db: Database.Database) {}

  insert(record: NewPostRecord): Post {
    try {
      const stmt = this.db.prepare(`
        INSERT INTO anonymous_posts
          (content, category, mood, mood_color, mood_score, post_date, sentiment_score, subjectivity, timestamp)
        VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
      `);

      const result = stmt.run(
        record.content,
        record.category,
        record.mood ?? null,
        record.moodColor ?? null,
        record.moodScore,
        record.postDate,
        record.textPolarity,
        record.textSubjectivity,
        record.createdAt.toISOString()
      );

      return { id: Number(result.lastInsertRowid), ...record };
    } catch (error) {
      throw new StorageError(`Failed to save post: ${errorMessage(error)}`, error);
    }
  }

  findById(id: number): Post | null {
    try {
      const row = this.db
        .prepare<[number], PostRecord>('SELECT * FROM anonymous_posts WHERE id = ?')
        .get(id);
      return row ? toPost(row) : null;
    } catch (error) {
      throw new StorageError(`Failed to load post ${id}: ${errorMessage(error)}`, error);
    }
  }

  *iterateAll(): IterableIterator<Post> {
    let rows: IterableIterator<PostRecord>;
    try {
      rows = this.db
        .prepare<[], PostRecord>('SELECT * FROM anonymous_posts ORDER BY julianday(timestamp) DESC, id DESC')
        .iterate();
    } catch (error) {
      throw new StorageError(`Failed to list posts: ${errorMessage(error)}`, error);
    }

    while (true) {
      let next: IteratorResult<PostRecord>;
      try {
        next = rows.next();
      } catch (error) {
        throw new StorageError(`Failed to list posts: ${errorMessage(error)}`, error);
      }
      if (next.done) {
        return;
      }
      yield toPost(next.value);
    }
  }

  countByCategory(): Record<string, number> {
    try {
      const rows = this.db
        .prepare<[], { category: string | null; count: number }>(
          'SELECT category, COUNT(*) as count FROM anonymous_posts GROUP BY category'
        )
        .all();

      const counts: Record<string, number> = {};
      for (const row of rows) {
        const category = isPostCategory(row.category) ? row.category : '其他';
        counts[category] = (counts[category] ?? 0) + row.count;
      }
      return counts;
    } catch (error) {
      throw new StorageError(`Failed to count posts: ${errorMessage(error)}`, error);
    }
  }
}
