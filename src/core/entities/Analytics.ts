import type { MoodEntry } from './Mood.js';

export interface CalendarCell {
  /** YYYY-MM-DD */
  date: string;
  dayOfMonth: number;
  /** ISO weekday, Monday = 1 */
  weekday: number;
  isoWeek: number;
  /** Weeks since the week holding the 1st of the month */
  column: number;
  /** Day of month, zero-based */
  row: number;
  color: string;
  mood?: string;
  postId?: number;
}

export interface CalendarView {
  /** YYYY-MM */
  month: string;
  weekCount: number;
  cells: CalendarCell[];
  legend: readonly MoodEntry[];
}

export type TrendMetric = 'moodScore' | 'textPolarity';

export interface TrendPoint {
  postId: number;
  postDate: string;
  value: number;
  color: string;
  mood?: string;
}

export interface AxisTick {
  value: number;
  label: string;
}

export interface TrendView {
  metric: TrendMetric;
  points: TrendPoint[];
  yAxis: {
    min: number;
    max: number;
    ticks: AxisTick[];
  };
}

export interface MoodSummary {
  totalPosts: number;
  averageMoodScore: number | null;
  averagePolarity: number | null;
  moodCounts: Record<string, number>;
}
