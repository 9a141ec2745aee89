/**
 * Anonymous post domain entities
 */
export const POST_CATEGORIES = ['学业压力', '文化适应', '人际关系', '其他'] as const;

export type PostCategory = (typeof POST_CATEGORIES)[number];

export function isPostCategory(value: unknown): value is PostCategory {
  return typeof value === 'string' && (POST_CATEGORIES as readonly string[]).includes(value);
}

export interface Post {
  id: number;
  content: string;
  category: PostCategory;
  /** Canonical mood label, absent when the author picked none */
  mood?: string;
  moodColor?: string;
  /** Mood slider value, 0-100 */
  moodScore: number;
  /** Polarity derived from the content, -1..1 */
  textPolarity: number;
  textSubjectivity: number;
  /** Date chosen by the author, YYYY-MM-DD */
  postDate: string;
  createdAt: Date;
}

export interface PublishPostInput {
  content: string;
  category: string;
  mood?: string;
  postDate?: string;
}

/**
 * A fully derived row, ready to insert
 */
export type NewPostRecord = Omit<Post, 'id'>;

/**
 * Raw row of the anonymous_posts table
 */
export interface PostRecord {
  id: number;
  content: string;
  category: string | null;
  mood: string | null;
  mood_color: string | null;
  mood_score: number | null;
  post_date: string | null;
  sentiment_score: number | null;
  subjectivity: number | null;
  timestamp: string;
}
