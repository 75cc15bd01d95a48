import { McpServer as BaseMcpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { VideoJobService } from '../application/services/VideoJobService.js';
import type { Config } from '../config.js';
import { createLogger } from '../utils/logger.js';
import { createVideoToolHandlers, registerVideoJobTools } from './tools/VideoJobTools.js';

/**
 * MCP server exposing the video job operations as tools over stdio
 */
export class VideoMcpServer {
  private server: BaseMcpServer;
  private logger = createLogger('MCP');

  constructor(
    private config: Config,
    service: VideoJobService
  ) {
    this.server = new BaseMcpServer({
      name: config.server.name,
      version: config.server.version,
    });

    const handlers = createVideoToolHandlers(service, {
      defaultDirectory: config.output.directory ?? process.cwd(),
      requestTimeoutMs: config.listTimeoutMs,
    });
    registerVideoJobTools(this.server, handlers);
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();

    process.stdin.on('error', (error) => {
      this.logger.warn('stdin error (non-fatal)', error);
    });
    process.stdin.on('end', () => {
      this.logger.warn('stdin ended - client may have disconnected');
    });

    await this.server.connect(transport);
    this.logger.info(`${this.config.server.name} running on stdio`);
  }

  async shutdown(): Promise<void> {
    await this.server.close();
    this.logger.debug('server closed');
  }
}
