import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { HealthService } from '../../application/services/HealthService.js';
import { errorResult, textResult } from './results.js';

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, health: HealthService) {
  server.tool(
    'health-check',
    'Check the health of the server and its components (database, LLM endpoint, circuit breaker, sessions)',
    {},
    async () => {
      try {
        const report = await health.check();
        return textResult(`# System Health Check\n\n\`\`\`json\n${JSON.stringify(report, null, 2)}\n\`\`\``);
      } catch (error) {
        return errorResult(error);
      }
    }
  );
}
