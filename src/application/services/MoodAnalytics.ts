import {
  addDays,
  differenceInCalendarISOWeeks,
  getDaysInMonth,
  getISODay,
  getISOWeek,
} from 'date-fns';
import { MOOD_SCORE_RANGE, MOOD_VOCABULARY, NO_DATA_COLOR } from '../../core/entities/Mood.js';
import type { Post } from '../../core/entities/Post.js';
import type {
  AxisTick,
  CalendarCell,
  CalendarView,
  MoodSummary,
  TrendMetric,
  TrendView,
} from '../../core/entities/Analytics.js';
import { ValidationError } from '../../core/errors.js';
import { monthOf, parseMonthString, systemClock, toDateString } from '../../utils/dates.js';
import type { Clock } from '../../utils/dates.js';
import type { PostService } from './PostService.js';

const POLARITY_TICKS: AxisTick[] = [
  { value: -1, label: '负面' },
  { value: 0, label: '中性' },
  { value: 1, label: '正面' },
];

const MOOD_TICKS: AxisTick[] = MOOD_VOCABULARY.map((m) => ({ value: m.score, label: m.label }));

// Later created wins; ids break timestamp ties
function isNewer(a: Post, b: Post): boolean {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  return diff !== 0 ? diff > 0 : a.id > b.id;
}

function requireMonth(month: string): Date {
  const start = parseMonthString(month);
  if (!start) {
    throw new ValidationError(`Month must be YYYY-MM, got ${month}`, 'month');
  }
  return start;
}

/**
 * Pick the month a calendar shows when none is asked for:
 * the post date of the most recently created post
 */
export function defaultCalendarMonth(posts: readonly Post[], now: Date): string {
  let latest: Post | undefined;
  for (const post of posts) {
    if (!latest || isNewer(post, latest)) latest = post;
  }
  return latest ? monthOf(latest.postDate) : monthOf(toDateString(now));
}

/**
 * One cell per day of `month`, coloured by the latest mood-tagged post of that day
 */
export function buildCalendarView(posts: readonly Post[], month: string): CalendarView {
  const start = requireMonth(month);

  const latestByDate = new Map<string, Post>();
  for (const post of posts) {
    // Posts without a mood never replace a mood-tagged post of the same date
    if (!post.moodColor || monthOf(post.postDate) !== month) continue;
    const current = latestByDate.get(post.postDate);
    if (!current || isNewer(post, current)) {
      latestByDate.set(post.postDate, post);
    }
  }

  const cells: CalendarCell[] = [];
  const days = getDaysInMonth(start);
  for (let i = 0; i < days; i++) {
    const day = addDays(start, i);
    const date = toDateString(day);
    const post = latestByDate.get(date);

    cells.push({
      date,
      dayOfMonth: i + 1,
      weekday: getISODay(day),
      isoWeek: getISOWeek(day),
      column: differenceInCalendarISOWeeks(day, start),
      row: i,
      color: post?.moodColor ?? NO_DATA_COLOR,
      ...(post ? { mood: post.mood, postId: post.id } : {}),
    });
  }

  return {
    month,
    weekCount: cells[cells.length - 1].column + 1,
    cells,
    legend: MOOD_VOCABULARY,
  };
}

export interface TrendOptions {
  metric?: TrendMetric;
  /** Restrict to one YYYY-MM month */
  month?: string;
}

/**
 * Posts as a line in post-date order
 */
export function buildTrendView(posts: readonly Post[], options: TrendOptions = {}): TrendView {
  const metric = options.metric ?? 'moodScore';
  const month = options.month;
  if (month !== undefined) {
    requireMonth(month);
  }

  const points = posts
    .filter((post) => month === undefined || monthOf(post.postDate) === month)
    .slice()
    .sort(
      (a, b) =>
        a.postDate.localeCompare(b.postDate) ||
        a.createdAt.getTime() - b.createdAt.getTime() ||
        a.id - b.id
    )
    .map((post) => ({
      postId: post.id,
      postDate: post.postDate,
      value: metric === 'moodScore' ? post.moodScore : post.textPolarity,
      color: post.moodColor ?? NO_DATA_COLOR,
      ...(post.mood ? { mood: post.mood } : {}),
    }));

  const yAxis =
    metric === 'moodScore'
      ? { min: MOOD_SCORE_RANGE[0], max: MOOD_SCORE_RANGE[1], ticks: MOOD_TICKS }
      : { min: -1, max: 1, ticks: POLARITY_TICKS };

  return { metric, points, yAxis };
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  const sum = values.reduce((total, value) => total + value, 0);
  return Math.round((sum / values.length) * 100) / 100;
}

export function summarize(posts: readonly Post[]): MoodSummary {
  const moodCounts: Record<string, number> = {};
  for (const entry of MOOD_VOCABULARY) {
    moodCounts[entry.label] = 0;
  }
  for (const post of posts) {
    if (post.mood) {
      moodCounts[post.mood] = (moodCounts[post.mood] ?? 0) + 1;
    }
  }

  return {
    totalPosts: posts.length,
    averageMoodScore: average(posts.map((p) => p.moodScore)),
    averagePolarity: average(posts.map((p) => p.textPolarity)),
    moodCounts,
  };
}

/**
 * Read-side views over the post store, recomputed on every call
 */
export class MoodAnalytics {
  constructor(
    private posts: Pick<PostService, 'listAll'>,
    private clock: Clock = systemClock
  ) {}

  calendar(month?: string): CalendarView {
    const all = this.posts.listAll();
    return buildCalendarView(all, month ?? defaultCalendarMonth(all, this.clock()));
  }

  trend(options: TrendOptions = {}): TrendView {
    return buildTrendView(this.posts.listAll(), options);
  }

  summary(): MoodSummary {
    return summarize(this.posts.listAll());
  }
}
