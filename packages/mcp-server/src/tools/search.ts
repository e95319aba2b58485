import type { DocumentStore } from "@handbook/docstore";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";

import {
  type HandbookLogger,
  makeToolResult,
  toCodeExamplePayload,
} from "../shared";
import { runDocumentTool } from "./run";

const SEARCH_TOOL_INPUT_SCHEMA = {
  query: z.string().min(1).describe("Words that must all appear in a section."),
  limit: z
    .number()
    .int()
    .positive()
    .optional()
    .describe("Maximum number of matches (default 20)."),
};

const CODE_EXAMPLES_TOOL_INPUT_SCHEMA = {
  language: z
    .string()
    .optional()
    .describe('Fence language hint to match, such as "tsx".'),
  anchor: z
    .string()
    .optional()
    .describe("Only return examples that belong to this section."),
};

export function registerSearchTools(
  server: McpServer,
  store: DocumentStore,
  logger: HandbookLogger,
): void {
  server.registerTool(
    "handbook_search",
    {
      description:
        "Find handbook sections containing every query word. Title matches come first.",
      inputSchema: SEARCH_TOOL_INPUT_SCHEMA,
    },
    async ({ query, limit }) => {
      const matches = store.search(query, { limit }).map((match) => ({
        anchor: match.section.anchor,
        title: match.section.title,
        depth: match.section.depth,
        heading_path: match.section.headingPath,
        matched_title: match.matchedTitle,
      }));
      return makeToolResult({ query, matches, total: matches.length });
    },
  );

  server.registerTool(
    "handbook_code_examples",
    {
      description:
        "List fenced code examples from the handbook, optionally filtered by language or section.",
      inputSchema: CODE_EXAMPLES_TOOL_INPUT_SCHEMA,
    },
    async ({ language, anchor }) =>
      runDocumentTool("handbook_code_examples", logger, () => {
        const sectionAnchor =
          anchor === undefined ? undefined : store.getSection(anchor).anchor;
        const examples = store
          .codeExamples({ language, sectionAnchor })
          .map(toCodeExamplePayload);
        return makeToolResult({ examples, total: examples.length });
      }),
  );
}
