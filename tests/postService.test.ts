import { DatabaseConnection, IN_MEMORY } from '../src/infrastructure/database/DatabaseConnection.js';
import { PostRepository } from '../src/infrastructure/database/repositories/PostRepository.js';
import { LexiconSentimentScorer } from '../src/infrastructure/nlp/LexiconSentimentScorer.js';
import { PostService } from '../src/application/services/PostService.js';
import { StorageError, UnknownMoodError, ValidationError } from '../src/core/errors.js';
import type { PublishPostInput } from '../src/core/entities/Post.js';

describe('PostService', () => {
  let connection: DatabaseConnection;
  let service: PostService;
  let now: Date;

  beforeEach(() => {
    connection = new DatabaseConnection(IN_MEMORY);
    now = new Date(2026, 2, 10, 12, 0, 0);
    service = new PostService(
      new PostRepository(connection.getDatabase()),
      new LexiconSentimentScorer(),
      () => now
    );
  });

  afterEach(() => {
    connection.close();
  });

  it('saves a mood-tagged post with the mood colour and score', () => {
    const post = service.save({
      content: '今天考试没考好',
      category: '学业压力',
      mood: '很难过 😢',
      postDate: '2026-03-01',
    });

    expect(post.id).toBeGreaterThan(0);
    expect(post.mood).toBe('很难过 😢');
    expect(post.moodColor).toBe('#CD5C5C');
    expect(post.moodScore).toBe(0);
    expect(post.postDate).toBe('2026-03-01');
    expect(post.textPolarity).toBeGreaterThanOrEqual(-1);
    expect(post.textPolarity).toBeLessThanOrEqual(1);

    const all = service.listAll();
    expect(all).toHaveLength(1);
    expect(all[0]).toEqual(post);
  });

  it('stores the full label when given a bare mood name', () => {
    expect(service.save({ content: 'ok day', category: '其他', mood: '一般般' }).mood).toBe('一般般 😐');
  });

  it('defaults a post without mood to a neutral score and today', () => {
    const post = service.save({ content: 'I made a new friend', category: '人际关系' });

    expect(post.mood).toBeUndefined();
    expect(post.moodColor).toBeUndefined();
    expect(post.moodScore).toBe(50);
    expect(post.postDate).toBe('2026-03-10');
    expect(post.createdAt).toEqual(now);
  });

  it('trims content', () => {
    expect(service.save({ content: '  hello  ', category: '其他' }).content).toBe('hello');
  });

  const invalidInputs: Array<[PublishPostInput, string]> = [
    [{ content: '   ', category: '其他' }, 'content'],
    [{ content: 'text', category: '天气' }, 'category'],
    [{ content: 'text', category: '其他', postDate: '2026-02-30' }, 'postDate'],
    [{ content: 'text', category: '其他', postDate: '10/03/2026' }, 'postDate'],
  ];

  it.each(invalidInputs)('rejects invalid input %j', (input, field) => {
    try {
      service.save(input);
      throw new Error('expected a ValidationError');
    } catch (error) {
      expect(error).toBeInstanceOf(ValidationError);
      expect(error).toMatchObject({ field });
    }
    expect(service.listAll()).toEqual([]);
  });

  it('rejects an unknown mood without writing anything', () => {
    expect(() => service.save({ content: 'text', category: '其他', mood: '超级开心' })).toThrow(UnknownMoodError);
    expect(service.listAll()).toEqual([]);
  });

  it('lists newest first and reads the same twice', () => {
    const first = service.save({ content: 'first', category: '其他' });
    now = new Date(2026, 2, 11, 8, 0, 0);
    const second = service.save({ content: 'second', category: '其他' });
    const third = service.save({ content: 'third', category: '其他' });

    const ids = service.listAll().map((p) => p.id);
    expect(ids).toEqual([third.id, second.id, first.id]);
    expect(service.listAll()).toEqual(service.listAll());
  });

  it('orders legacy and current timestamps by time, not by text', () => {
    connection
      .getDatabase()
      .prepare('INSERT INTO anonymous_posts (content, category, timestamp) VALUES (?, ?, ?)')
      .run('legacy at eleven', '其他', '2026-03-10 11:00:00');
    now = new Date('2026-03-10T09:00:00.000Z');
    service.save({ content: 'current at nine', category: '其他' });

    expect(service.listAll().map((p) => p.content)).toEqual(['legacy at eleven', 'current at nine']);
  });

  it('reports storage failures as StorageError', () => {
    connection.close();

    expect(() => service.save({ content: 'text', category: '其他' })).toThrow(StorageError);
    expect(() => service.save({ content: 'text', category: '其他' })).toThrow(/^Failed to save post: /);
    expect(() => service.listAll()).toThrow(StorageError);
    expect(() => service.get(1)).toThrow('Failed to load post 1');
  });

  it('finds a post by id', () => {
    const post = service.save({ content: 'find me', category: '文化适应' });
    expect(service.get(post.id)).toEqual(post);
    expect(service.get(post.id + 100)).toBeNull();
  });

  it('counts posts for every category', () => {
    service.save({ content: 'a', category: '学业压力' });
    service.save({ content: 'b', category: '学业压力' });
    service.save({ content: 'c', category: '其他' });

    expect(service.countByCategory()).toEqual({ 学业压力: 2, 文化适应: 0, 人际关系: 0, 其他: 1 });
  });

  it('reads rows written before the mood columns were used', () => {
    connection
      .getDatabase()
      .prepare("INSERT INTO anonymous_posts (content, category, sentiment_score, timestamp) VALUES (?, ?, ?, ?)")
      .run('old post', null, 0.4, '2025-12-31 23:30:00');

    const [post] = service.listAll();
    expect(post).toMatchObject({
      content: 'old post',
      category: '其他',
      moodScore: 50,
      textPolarity: 0.4,
      textSubjectivity: 0,
      postDate: '2025-12-31',
    });
    expect(post.createdAt.toISOString()).toBe('2025-12-31T23:30:00.000Z');
  });
});
