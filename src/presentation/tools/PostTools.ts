import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { MOOD_VOCABULARY } from '../../core/entities/Mood.js';
import { POST_CATEGORIES } from '../../core/entities/Post.js';
import type { AdvisorService } from '../../application/services/AdvisorService.js';
import type { PostService } from '../../application/services/PostService.js';
import { formatPost } from '../formatters.js';
import { errorResult, failureResult, textResult } from './results.js';

/**
 * Register publish-post, list-posts and support-post
 */
export function registerPostTools(server: McpServer, posts: PostService, advisor: AdvisorService) {
  server.tool(
    'publish-post',
    'Publish an anonymous post to the shared wall',
    {
      content: z.string().describe('Post text'),
      category: z.string().describe(`One of: ${POST_CATEGORIES.join(', ')}`),
      mood: z
        .string()
        .optional()
        .describe(`Optional mood: ${MOOD_VOCABULARY.map((m) => m.label).join(', ')}`),
      post_date: z.string().optional().describe('YYYY-MM-DD; defaults to today'),
    },
    async ({ content, category, mood, post_date }) => {
      try {
        const post = posts.save({ content, category, mood, postDate: post_date });
        return textResult(`✓ Post published\n\n${formatPost(post)}`);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'list-posts',
    'List anonymous posts, newest first',
    {
      limit: z.number().int().min(1).optional().describe('Show at most this many posts'),
    },
    async ({ limit }) => {
      try {
        const all = posts.listAll();
        const shown = limit === undefined ? all : all.slice(0, limit);
        if (shown.length === 0) {
          return textResult('No posts yet.');
        }
        return textResult(`# Posts (${shown.length} of ${all.length})\n\n${shown.map(formatPost).join('\n\n')}`);
      } catch (error) {
        return errorResult(error);
      }
    }
  );

  server.tool(
    'support-post',
    'Generate a supportive reply to an anonymous post',
    {
      post_id: z.number().int().describe('ID of the post'),
    },
    async ({ post_id }) => {
      try {
        const post = posts.get(post_id);
        if (!post) {
          return failureResult(`Post not found: ${post_id}`);
        }
        const result = await advisor.supportPost(post);
        if (!result.ok) {
          return errorResult(result.error);
        }
        return textResult(result.reply);
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
