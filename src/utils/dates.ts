import { format, isValid, parse } from 'date-fns';

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_PATTERN = /^\d{4}-\d{2}$/;

/**
 * Local calendar date as YYYY-MM-DD
 */
export function toDateString(date: Date): string {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parse a YYYY-MM-DD string as a local date; null when it is not a real date
 */
export function parseDateString(value: string): Date | null {
  if (!DATE_PATTERN.test(value)) return null;
  const date = parse(value, 'yyyy-MM-dd', new Date(0));
  return isValid(date) ? date : null;
}

/**
 * Parse a YYYY-MM month; null when malformed
 */
export function parseMonthString(value: string): Date | null {
  if (!MONTH_PATTERN.test(value)) return null;
  const date = parse(value, 'yyyy-MM', new Date(0));
  return isValid(date) ? date : null;
}

export function monthOf(dateString: string): string {
  return dateString.slice(0, 7);
}
