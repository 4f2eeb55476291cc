import { z } from 'zod';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { QueryRouterService } from '../../application/services/QueryRouterService.js';
import { ToolTextResult, textResult } from './types.js';

export function createClassifyHandler(router: QueryRouterService) {
  return ({ query }: { query: string }): ToolTextResult => {
    const { domain, matchedKeyword } = router.classify(query);
    return textResult(JSON.stringify({ domain, matchedKeyword }, null, 2));
  };
}

const ClassifyInputShape = {
  query: z.string().max(4000).describe('The question to classify'),
};

/**
 * Register the classify-query tool (no model call)
 */
export function registerClassifyQueryTool(server: McpServer, router: QueryRouterService) {
  const handler = createClassifyHandler(router);

  server.registerTool(
    'classify-query',
    {
      description:
        'Show which domain a question would be routed to, and the keyword that decided it, without calling the model',
      inputSchema: ClassifyInputShape,
    },
    async ({ query }: { query: string }): Promise<ToolTextResult> => handler({ query })
  );
}
