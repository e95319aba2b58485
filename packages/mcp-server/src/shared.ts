import type { DocumentStoreError } from "@handbook/docstore";
import type {
  CodeExample,
  Section,
  TocEntry,
  ValidationReport,
} from "@handbook/shared";
import type { Variables } from "@modelcontextprotocol/sdk/shared/uriTemplate.js";

export const RESOURCE_URI_SCHEME = "handbook://";
export const TOC_RESOURCE_URI = `${RESOURCE_URI_SCHEME}toc`;
export const DOCUMENT_HTML_RESOURCE_URI = `${RESOURCE_URI_SCHEME}document.html`;
export const SECTION_RESOURCE_TEMPLATE = `${RESOURCE_URI_SCHEME}sections/{anchor}`;

export type HandbookLogger = Pick<Console, "error" | "warn">;

export function sectionResourceUri(anchor: string): string {
  return `${RESOURCE_URI_SCHEME}sections/${encodeURIComponent(anchor)}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value != null && typeof value === "object" && !Array.isArray(value);
}

export function makeToolResult(payload: unknown) {
  const text = JSON.stringify(payload ?? null);
  return {
    content: [{ type: "text" as const, text }],
    structuredContent: isRecord(payload) ? payload : undefined,
  };
}

export function makeToolErrorResult(error: DocumentStoreError) {
  const payload = { error: { code: error.code, message: error.message } };
  return {
    content: [{ type: "text" as const, text: JSON.stringify(payload) }],
    isError: true,
  };
}

export function parseResourceVariable(
  variables: Variables,
  key: string,
): string {
  const value = variables[key];
  const raw =
    typeof value === "string"
      ? value
      : Array.isArray(value)
        ? value[0]
        : undefined;
  if (!raw) {
    throw new Error(`resource URI is missing required variable: ${key}`);
  }

  const normalized = raw.trim();
  if (!normalized) {
    throw new Error(`resource URI variable ${key} must not be empty`);
  }

  return normalized;
}

export function makeResourceResult(uri: URL, payload: unknown) {
  const normalizedPayload = payload ?? null;
  return {
    contents: [
      {
        uri: uri.toString(),
        mimeType: "application/json",
        text: JSON.stringify(normalizedPayload),
      },
    ],
  };
}

export function makeHtmlResourceResult(uri: URL, html: string) {
  return {
    contents: [
      {
        uri: uri.toString(),
        mimeType: "text/html",
        text: html,
      },
    ],
  };
}

export function toTocPayload(entry: TocEntry) {
  return {
    title: entry.title,
    anchor: entry.anchor,
    depth: entry.depth,
  };
}

export function toCodeExamplePayload(example: CodeExample) {
  return {
    language: example.language,
    code: example.code,
    section_anchor: example.sectionAnchor,
    start_line: example.startLine,
    end_line: example.endLine,
  };
}

export function toSectionPayload(section: Section, markdown: string) {
  return {
    anchor: section.anchor,
    title: section.title,
    depth: section.depth,
    heading_path: section.headingPath,
    parent_anchor: section.parentAnchor,
    child_anchors: section.childAnchors,
    start_line: section.startLine,
    end_line: section.endLine,
    code_examples: section.codeExamples.map(toCodeExamplePayload),
    markdown,
  };
}

export function toValidationPayload(report: ValidationReport) {
  return {
    valid: report.valid,
    error_count: report.issues.filter((issue) => issue.severity === "error")
      .length,
    warning_count: report.issues.filter(
      (issue) => issue.severity === "warning",
    ).length,
    issues: report.issues,
  };
}
