import { z } from 'zod';
import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { EMOTIONAL_STATES, SITUATION_TYPES } from '../../core/entities/Profile.js';
import type { ProfileService } from '../../application/services/ProfileService.js';
import type { SessionRegistry } from '../../application/session/SessionRegistry.js';
import { buildCulturalContext } from '../../application/services/ProfileService.js';
import { inSession, sessionIdParam, textResult } from './results.js';

/**
 * Register the save-profile tool
 */
export function registerProfileTool(server: McpServer, sessions: SessionRegistry, profiles: ProfileService) {
  server.tool(
    'save-profile',
    'Save the background used for cultural advice in this session',
    {
      situation_type: z
        .string()
        .describe(`One of: ${SITUATION_TYPES.map((s) => s.value).join(', ')}`),
      other_situation: z.string().optional().describe('Required when situation_type is 其他'),
      current_status: z.string().optional().describe('Free-text description of the current situation'),
      emotional_state: z.string().optional().describe(`One of: ${EMOTIONAL_STATES.join(', ')}`),
      session_id: sessionIdParam,
    },
    async ({ situation_type, other_situation, current_status, emotional_state, session_id }) =>
      inSession(sessions, session_id, (session) => {
        const profile = profiles.save(session, {
          situationType: situation_type,
          otherSituation: other_situation,
          currentStatus: current_status,
          emotionalState: emotional_state,
        });
        return textResult(`✓ Profile saved\n\n${buildCulturalContext(profile)}`);
      })
  );
}
