import { DocumentInvalidError, loadDocumentStore } from "@handbook/docstore";
import type { ValidationIssue } from "@handbook/shared";
import type { Transport } from "@modelcontextprotocol/sdk/shared/transport.js";

import { type EnvRecord, resolveServerConfig } from "./config";
import { createServer, type HandbookMcpServer } from "./server";
import type { HandbookLogger } from "./shared";

export interface StartHandbookServerOptions {
  readonly env?: EnvRecord;
  readonly logger?: HandbookLogger;
  readonly transportFactory?: () => Transport;
}

export function formatIssue(path: string, issue: ValidationIssue): string {
  const anchor = issue.anchor === undefined ? "" : ` (#${issue.anchor})`;
  return `${path}:${issue.line} ${issue.severity} ${issue.code}${anchor}: ${issue.message}`;
}

export async function startHandbookServer(
  options: StartHandbookServerOptions = {},
): Promise<HandbookMcpServer> {
  const logger = options.logger ?? console;
  const config = resolveServerConfig(options.env);
  const store = await loadDocumentStore(config.documentPath);

  const report = store.validate();
  for (const issue of report.issues) {
    const line = `[handbook-mcp] ${formatIssue(config.documentPath, issue)}`;
    if (issue.severity === "error") {
      logger.error(line);
    } else {
      logger.warn(line);
    }
  }

  if (!report.valid && config.strict) {
    throw new DocumentInvalidError(report.issues);
  }

  const server = createServer({
    store,
    logger,
    transportFactory: options.transportFactory,
  });
  await server.start();
  return server;
}
