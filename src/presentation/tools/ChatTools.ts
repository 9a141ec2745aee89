import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { AdvisorService, ChatKind } from '../../application/services/AdvisorService.js';
import type { SessionRegistry } from '../../application/session/SessionRegistry.js';
import { errorResult, inSession, sessionIdParam, textResult } from './results.js';

const CHAT_TOOLS: Array<{ name: string; kind: ChatKind; description: string }> = [
  {
    name: 'cultural-advice',
    kind: 'cultural_advice',
    description:
      'Ask for cultural adaptation advice. Uses the saved profile and the recent cultural conversation.',
  },
  {
    name: 'emotional-support',
    kind: 'emotion_support',
    description: 'Talk to the emotional support companion. Keeps its own conversation per session.',
  },
];

/**
 * Register the cultural-advice and emotional-support tools
 */
export function registerChatTools(server: McpServer, sessions: SessionRegistry, advisor: AdvisorService) {
  for (const tool of CHAT_TOOLS) {
    server.tool(
      tool.name,
      tool.description,
      {
        message: z.string().describe('What the user wants to say'),
        session_id: sessionIdParam,
      },
      async ({ message, session_id }) =>
        inSession(sessions, session_id, async (session) => {
          const result = await advisor.ask(session, tool.kind, message);
          if (!result.ok) {
            return errorResult(result.error);
          }
          return textResult(result.reply);
        })
    );
  }
}
