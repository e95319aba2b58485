import {
  type DocumentStore,
  InvalidAnchorError,
} from "@handbook/docstore";
import type { Section } from "@handbook/shared";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import {
  type HandbookLogger,
  makeToolResult,
  toSectionPayload,
  toTocPayload,
  toValidationPayload,
} from "../shared";
import { runDocumentTool } from "./run";

const SECTION_TOOL_INPUT_SCHEMA = {
  anchor: z
    .string()
    .optional()
    .describe('Section anchor, with or without the leading "#".'),
  path: z
    .string()
    .optional()
    .describe('Heading path such as "Key Concepts > Hooks".'),
  include_subsections: z
    .boolean()
    .optional()
    .describe("Include nested subsections in the Markdown (default true)."),
};

function resolveSection(
  store: DocumentStore,
  anchor: string | undefined,
  path: string | undefined,
): Section {
  if (anchor !== undefined && anchor.trim().length > 0) {
    return store.getSection(anchor);
  }
  if (path !== undefined && path.trim().length > 0) {
    return store.getSectionByPath(path);
  }
  throw new InvalidAnchorError(
    anchor ?? "",
    "provide an anchor or a heading path",
  );
}

export function registerDocumentTools(
  server: McpServer,
  store: DocumentStore,
  logger: HandbookLogger,
): void {
  server.registerTool(
    "handbook_toc",
    {
      description:
        "List the handbook's table of contents as (title, anchor, depth) entries in document order.",
    },
    async () => {
      const items = store.tableOfContents().map(toTocPayload);
      return makeToolResult({
        title: store.title,
        items,
        total: items.length,
      });
    },
  );

  server.registerTool(
    "handbook_section",
    {
      description:
        "Read one handbook section by anchor or heading path. Returns its metadata, code examples and Markdown text.",
      inputSchema: SECTION_TOOL_INPUT_SCHEMA,
    },
    async ({ anchor, path, include_subsections }) =>
      runDocumentTool("handbook_section", logger, () => {
        const section = resolveSection(store, anchor, path);
        const markdown = store.renderSection(section.anchor, {
          includeSubsections: include_subsections ?? true,
        });
        return makeToolResult({
          ...toSectionPayload(section, markdown),
          breadcrumbs: store.breadcrumbs(section.anchor).map(toTocPayload),
        });
      }),
  );

  server.registerTool(
    "handbook_validate",
    {
      description:
        "Check the handbook for dead links, skipped heading levels and other structural problems.",
    },
    async () => makeToolResult(toValidationPayload(store.validate())),
  );
}
