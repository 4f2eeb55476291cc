import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { QueryRouterService } from '../../application/services/QueryRouterService.js';
import { DOMAIN_LABELS } from '../../core/entities/Domain.js';
import { toUserMessage } from '../../core/errors.js';
import { ToolTextResult, textResult } from './types.js';

/**
 * Handler for the ask tool: full pipeline, upstream failures reported as a generic message
 */
export function createAskHandler(router: QueryRouterService) {
  return async ({ query }: { query: string }, signal?: AbortSignal): Promise<ToolTextResult> => {
    try {
      const result = await router.handle(query, { signal });
      return textResult(
        `**Domain**: ${DOMAIN_LABELS[result.domain]} (\`${result.domain}\`)\n\n${result.response}`
      );
    } catch (error) {
      return textResult(toUserMessage(error), true);
    }
  };
}

const AskInputShape = {
  query: z.string().max(4000).describe('The question to answer, in the user’s own words'),
};

/**
 * Register the ask tool
 */
export function registerAskTool(server: McpServer, router: QueryRouterService) {
  const handler = createAskHandler(router);

  server.registerTool(
    'ask',
    {
      description:
        'Answer a question about government schemes, health, education or the environment. The question is classified into a domain and answered by Gemini with domain-specific guidance.',
      inputSchema: AskInputShape,
    },
    async ({ query }: { query: string }, extra: { signal: AbortSignal }): Promise<ToolTextResult> =>
      handler({ query }, extra.signal)
  );
}
