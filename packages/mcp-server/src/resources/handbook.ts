import type { DocumentStore } from "@handbook/docstore";
import {
  ResourceTemplate,
  type McpServer,
} from "@modelcontextprotocol/sdk/server/mcp.js";

import {
  DOCUMENT_HTML_RESOURCE_URI,
  makeHtmlResourceResult,
  makeResourceResult,
  parseResourceVariable,
  SECTION_RESOURCE_TEMPLATE,
  sectionResourceUri,
  TOC_RESOURCE_URI,
  toSectionPayload,
  toTocPayload,
} from "../shared";

export function registerHandbookResources(
  server: McpServer,
  store: DocumentStore,
): void {
  server.registerResource(
    "handbook-toc",
    TOC_RESOURCE_URI,
    {
      title: "Table of Contents",
      description: "Every section of the handbook in document order.",
      mimeType: "application/json",
    },
    async (uri) => {
      const items = store.tableOfContents().map(toTocPayload);
      return makeResourceResult(uri, {
        title: store.title,
        items,
        total: items.length,
      });
    },
  );

  server.registerResource(
    "handbook-section",
    new ResourceTemplate(SECTION_RESOURCE_TEMPLATE, {
      list: async () => ({
        resources: store.sections.map((section) => ({
          uri: sectionResourceUri(section.anchor),
          name: section.anchor,
          title: section.title,
          mimeType: "application/json",
        })),
      }),
    }),
    {
      title: "Handbook Section",
      description: "Read one section, with its subsections, by anchor.",
      mimeType: "application/json",
    },
    async (uri, variables) => {
      const anchor = parseResourceVariable(variables, "anchor");
      const section = store.getSection(anchor);
      return makeResourceResult(
        uri,
        toSectionPayload(section, store.renderSection(section.anchor)),
      );
    },
  );

  server.registerResource(
    "handbook-document-html",
    DOCUMENT_HTML_RESOURCE_URI,
    {
      title: "Handbook (HTML)",
      description: "The whole handbook rendered as a standalone HTML page.",
      mimeType: "text/html",
    },
    async (uri) => makeHtmlResourceResult(uri, store.renderHtml()),
  );
}
