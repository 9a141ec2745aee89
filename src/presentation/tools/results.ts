import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { BoundaryError, errorMessage } from '../../core/errors.js';
import type { SessionRegistry } from '../../application/session/SessionRegistry.js';
import type { SessionContext } from '../../application/session/SessionContext.js';
import { formatBoundaryFailure } from '../formatters.js';

/** Session used by tool calls that name none */
export const DEFAULT_TOOL_SESSION = 'stdio';

export const sessionIdParam = z
  .string()
  .optional()
  .describe(`Session ID; defaults to "${DEFAULT_TOOL_SESSION}"`);

export function textResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }] };
}

export function failureResult(text: string): CallToolResult {
  return { isError: true, content: [{ type: 'text', text }] };
}

export function errorResult(error: unknown): CallToolResult {
  return failureResult(
    error instanceof BoundaryError ? formatBoundaryFailure(error) : `Error: ${errorMessage(error)}`
  );
}

/**
 * Run a tool body against a session (created on first use), turning thrown errors into tool errors
 */
export async function inSession(
  sessions: SessionRegistry,
  sessionId: string | undefined,
  body: (session: SessionContext) => CallToolResult | Promise<CallToolResult>
): Promise<CallToolResult> {
  try {
    const session = sessions.getOrCreate(sessionId ?? DEFAULT_TOOL_SESSION);
    return await session.run(body);
  } catch (error) {
    return errorResult(error);
  }
}
