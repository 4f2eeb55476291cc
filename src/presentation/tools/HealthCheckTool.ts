import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { QueryRouterService } from '../../application/services/QueryRouterService.js';
import { ToolTextResult, textResult } from './types.js';

export function createHealthCheckHandler(router: QueryRouterService, version: string) {
  return async (): Promise<ToolTextResult> => {
    const upstreamReachable = await router.checkUpstream();
    const health = {
      timestamp: new Date().toISOString(),
      status: upstreamReachable ? 'healthy' : 'degraded',
      version,
      components: {
        gemini: {
          status: upstreamReachable ? 'healthy' : 'error',
          model: router.model,
        },
        domains: router.describeDomains(),
      },
    };

    return textResult(`# System Health Check\n\n\`\`\`json\n${JSON.stringify(health, null, 2)}\n\`\`\``);
  };
}

/**
 * Register the health-check tool
 */
export function registerHealthCheckTool(server: McpServer, router: QueryRouterService, version: string) {
  const handler = createHealthCheckHandler(router, version);

  server.registerTool(
    'health-check',
    { description: 'Check Gemini connectivity and list the configured domains' },
    async (): Promise<ToolTextResult> => handler()
  );
}
