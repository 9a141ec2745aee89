import type { BoundaryError } from '../core/errors.js';
import type { Message } from '../core/entities/Conversation.js';
import type { Post } from '../core/entities/Post.js';
import type { CalendarView, TrendView } from '../core/entities/Analytics.js';

/**
 * Chat-visible text for a failed boundary call
 */
export function formatBoundaryFailure(error: BoundaryError): string {
  return `发生错误：${error.message}`;
}

export function formatHistory(messages: readonly Message[]): string {
  return messages
    .map((msg, idx) => {
      const role = msg.role === 'user' ? '👤 User' : msg.role === 'assistant' ? '🤖 Assistant' : '⚙️ System';
      return `${idx}. **${role}**\n${msg.content}\n`;
    })
    .join('\n---\n\n');
}

export function formatPost(post: Post): string {
  const mood = post.mood ? ` ${post.mood}` : '';
  return `#${post.id} [${post.category}]${mood} ${post.postDate} (polarity ${post.textPolarity.toFixed(2)})\n${post.content}`;
}

export function formatCalendar(view: CalendarView): string {
  const lines = [`# Mood calendar ${view.month} (${view.weekCount} weeks)`, ''];
  for (const cell of view.cells) {
    const mood = cell.mood ? ` ${cell.mood}` : '';
    lines.push(`${cell.date} w${cell.column} ${cell.color}${mood}`);
  }
  return lines.join('\n');
}

export function formatTrend(view: TrendView): string {
  const lines = [`# Mood trend (${view.metric}, ${view.yAxis.min}..${view.yAxis.max})`, ''];
  for (const point of view.points) {
    lines.push(`${point.postDate} ${point.value} ${point.color}`);
  }
  if (view.points.length === 0) {
    lines.push('No posts yet.');
  }
  return lines.join('\n');
}
