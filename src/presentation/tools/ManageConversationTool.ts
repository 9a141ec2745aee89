import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { ValidationError } from '../../core/errors.js';
import type { SessionRegistry } from '../../application/session/SessionRegistry.js';
import { formatHistory } from '../formatters.js';
import { inSession, sessionIdParam, textResult } from './results.js';

/**
 * Register the manage-conversation tool
 */
export function registerManageConversationTool(server: McpServer, sessions: SessionRegistry) {
  server.tool(
    'manage-conversation',
    'Manage a conversation - view it, delete one message, clear it, or view the context window sent to the model',
    {
      topic: z.enum(['cultural', 'emotional']).describe("Which conversation: 'cultural' or 'emotional'"),
      action: z
        .enum(['view', 'delete', 'clear', 'window'])
        .describe("'view' full history, 'delete' one message by index, 'clear' everything, 'window' recent context"),
      index: z.number().int().optional().describe("0-based message index for 'delete'"),
      count: z.number().int().optional().describe("Number of messages for 'window'; defaults to the context window"),
      session_id: sessionIdParam,
    },
    async ({ topic, action, index, count, session_id }) =>
      inSession(sessions, session_id, (session) => {
        const history = session.history(topic);

        switch (action) {
          case 'view': {
            const messages = history.messages();
            return textResult(
              messages.length > 0
                ? `# ${topic} conversation (${session.id})\n\n${formatHistory(messages)}`
                : `No ${topic} conversation history for session ${session.id}`
            );
          }
          case 'delete': {
            if (index === undefined) {
              throw new ValidationError("index is required for 'delete'", 'index');
            }
            const removed = history.deleteAt(index);
            return textResult(`✓ Deleted message ${index} (${removed.role}); ${history.length} remaining`);
          }
          case 'clear':
            session.clearHistory(topic);
            return textResult(`✓ ${topic} conversation cleared for session ${session.id}`);
          case 'window': {
            const messages = history.window(count);
            return textResult(
              messages.length > 0 ? formatHistory(messages) : 'The context window is empty'
            );
          }
        }
      })
  );
}
