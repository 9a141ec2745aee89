import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { MoodAnalytics } from '../../application/services/MoodAnalytics.js';
import { formatCalendar, formatTrend } from '../formatters.js';
import { errorResult, textResult } from './results.js';

/**
 * Register mood-calendar and mood-trend
 */
export function registerAnalyticsTools(server: McpServer, analytics: MoodAnalytics) {
  server.tool(
    'mood-calendar',
    'Show the mood calendar of one month (one coloured cell per day)',
    {
      month: z.string().optional().describe('YYYY-MM; defaults to the month of the latest post'),
    },
    async ({ month }) => {
      try {
        return textResult(formatCalendar(analytics.calendar(month)));
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'mood-trend',
    'Show mood over time, ordered by post date',
    {
      metric: z
        .enum(['moodScore', 'textPolarity'])
        .optional()
        .describe("'moodScore' (selected mood, default) or 'textPolarity' (text sentiment)"),
      month: z.string().optional().describe('Restrict to one YYYY-MM month'),
    },
    async ({ metric, month }) => {
      try {
        const summary = analytics.summary();
        const header =
          `Posts: ${summary.totalPosts}, average mood ${summary.averageMoodScore ?? '-'}, ` +
          `average polarity ${summary.averagePolarity ?? '-'}`;
        return textResult(`${formatTrend(analytics.trend({ metric, month }))}\n\n${header}`);
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
