import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Config } from '../config.js';
import { QueryRouterService } from '../application/services/QueryRouterService.js';
import { Logger } from '../utils/logger.js';
import { registerAskTool } from './tools/AskTool.js';
import { registerClassifyQueryTool } from './tools/ClassifyQueryTool.js';
import { registerHealthCheckTool } from './tools/HealthCheckTool.js';

/**
 * MCP stdio server exposing the query router as tools
 */
export class McpServer {
  private server: BaseMcpServer;
  private transport: StdioServerTransport | null = null;

  constructor(
    private config: Config,
    router: QueryRouterService,
    private logger: Logger
  ) {
    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });

    registerAskTool(this.server, router);
    registerClassifyQueryTool(this.server, router);
    registerHealthCheckTool(this.server, router, config.server.version);
  }

  async start(): Promise<void> {
    this.transport = new StdioServerTransport();
    await this.server.connect(this.transport);
    this.logger.info('MCP server running on stdio', { name: this.config.server.name });
  }

  async shutdown(): Promise<void> {
    if (this.transport) {
      await this.server.close();
      this.transport = null;
    }
  }
}
