import type { DocumentStore } from "@handbook/docstore";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";
import type { Implementation } from "@modelcontextprotocol/sdk/types.js";

import { registerHandbookResources } from "./resources/handbook";
import type { HandbookLogger } from "./shared";
import { registerDocumentTools } from "./tools/document";
import { registerSearchTools } from "./tools/search";

const SERVER_INFO: Implementation = {
  name: "handbook-mcp-server",
  version: "0.1.0",
};

export interface HandbookMcpServer {
  start(): Promise<void>;
  close(): Promise<void>;
}

export interface HandbookMcpServerOptions {
  readonly store: DocumentStore;
  readonly transportFactory?: () => Transport;
  readonly logger?: HandbookLogger;
}

class DefaultHandbookMcpServer implements HandbookMcpServer {
  private readonly mcpServer: McpServer;
  private readonly transportFactory: () => Transport;
  private started = false;

  constructor(options: HandbookMcpServerOptions) {
    this.mcpServer = new McpServer(SERVER_INFO);
    this.transportFactory = options.transportFactory ?? createStdioTransport;
    const logger = options.logger ?? console;

    registerHandbookResources(this.mcpServer, options.store);
    registerDocumentTools(this.mcpServer, options.store, logger);
    registerSearchTools(this.mcpServer, options.store, logger);
  }

  async start(): Promise<void> {
    if (this.started) {
      return;
    }

    await this.mcpServer.connect(this.transportFactory());
    this.started = true;
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
  options: HandbookMcpServerOptions,
): HandbookMcpServer {
  return new DefaultHandbookMcpServer(options);
}

export function createStdioTransport(): Transport {
  return new StdioServerTransport();
}

export type { HandbookLogger } from "./shared";
