import type { NewPostRecord, Post } from '../entities/Post.js';

/**
 * Interface for anonymous post persistence (append-only)
 */
export interface IPostRepository {
  insert(record: NewPostRecord): Post;

  findById(id: number): Post | null;

  /** Newest first: createdAt descending, then id descending */
  iterateAll(): IterableIterator<Post>;

  countByCategory(): Record<string, number>;
}
