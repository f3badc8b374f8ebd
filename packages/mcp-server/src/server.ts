import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Implementation } from "@modelcontextprotocol/sdk/types.js";
import { type LoggerMethods, silentLogger } from "@newsdoc/engine";

import { registerConfigDefaultsResource } from "./resources/config-defaults";
import { registerOutlineTool } from "./tools/outline";
import { registerRenderMarkdownTool } from "./tools/render-markdown";
import { registerRenderReportTool } from "./tools/render-report";

const SERVER_INFO: Implementation = {
  name: "newsdoc-mcp-server",
  version: "0.1.0",
};

export interface NewsdocMcpServer {
  start(): Promise<void>;
  close(): Promise<void>;
}

export interface NewsdocMcpServerOptions {
  readonly transportFactory?: () => Transport;
  readonly logger?: LoggerMethods;
}

class DefaultNewsdocMcpServer implements NewsdocMcpServer {
  private readonly mcpServer: McpServer;
  private readonly transportFactory: () => Transport;
  private readonly logger: LoggerMethods;
  private started = false;

  constructor(options: NewsdocMcpServerOptions = {}) {
    this.mcpServer = new McpServer(SERVER_INFO);
    this.transportFactory = options.transportFactory ?? createStdioTransport;
    this.logger = options.logger ?? silentLogger;

    registerRenderMarkdownTool(this.mcpServer, this.logger);
    registerRenderReportTool(this.mcpServer, this.logger);
    registerOutlineTool(this.mcpServer, this.logger);
    registerConfigDefaultsResource(this.mcpServer);
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    await this.mcpServer.connect(this.transportFactory());
    this.started = true;
    this.logger.info(
      `[McpServer] ${SERVER_INFO.name} ${SERVER_INFO.version} connected`,
    );
  }

  async close(): Promise<void> {
    if (!this.started) {
      return;
    }

    await this.mcpServer.close();
    this.started = false;
  }
}

export function createServer(
  options: NewsdocMcpServerOptions = {},
): NewsdocMcpServer {
  return new DefaultNewsdocMcpServer(options);
}

export function createStdioTransport(): Transport {
  return new StdioServerTransport();
}
