import {
  VALIDATION_CODES,
  VALIDATION_SEVERITIES,
  type ValidationCode,
  type ValidationIssue,
  type ValidationReport,
} from "@handbook/shared";
import { DocumentInvalidError } from "./errors";
import type { ParsedDocument } from "./parse";

function issue(
  code: ValidationCode,
  message: string,
  line: number,
  anchor?: string,
): ValidationIssue {
  return {
    code,
    severity: VALIDATION_SEVERITIES[code],
    message,
    line,
    ...(anchor === undefined ? {} : { anchor }),
  };
}

function compareIssues(left: ValidationIssue, right: ValidationIssue): number {
  if (left.line !== right.line) {
    return left.line - right.line;
  }
  return left.code.localeCompare(right.code);
}

export function validateDocument(document: ParsedDocument): ValidationReport {
  const issues: ValidationIssue[] = [];
  const anchorCounts = new Map<string, number>();
  for (const section of document.sections) {
    anchorCounts.set(section.anchor, (anchorCounts.get(section.anchor) ?? 0) + 1);
  }

  for (const link of document.links) {
    const matches = anchorCounts.get(link.anchor) ?? 0;
    if (matches !== 1) {
      issues.push(
        issue(
          VALIDATION_CODES.DEAD_LINK,
          `link "${link.text}" points to ${link.href}, which matches no section`,
          link.line,
          link.anchor,
        ),
      );
    }
  }

  let previousDepth: number | null = null;
  const siblingTitles = new Map<string, Set<string>>();
  for (const section of document.sections) {
    if (section.title.length === 0) {
      issues.push(
        issue(
          VALIDATION_CODES.EMPTY_HEADING,
          "heading has no text",
          section.headingLine,
          section.anchor,
        ),
      );
    }

    if (previousDepth !== null && section.depth > previousDepth + 1) {
      issues.push(
        issue(
          VALIDATION_CODES.SKIPPED_HEADING_LEVEL,
          `heading "${section.title}" jumps from level ${previousDepth} to ${section.depth}`,
          section.headingLine,
          section.anchor,
        ),
      );
    }
    previousDepth = section.depth;

    const siblingsKey = section.parentAnchor ?? "";
    const seen = siblingTitles.get(siblingsKey) ?? new Set<string>();
    const normalizedTitle = section.title.toLowerCase();
    if (normalizedTitle.length > 0 && seen.has(normalizedTitle)) {
      issues.push(
        issue(
          VALIDATION_CODES.DUPLICATE_TITLE,
          `heading "${section.title}" repeats a sibling heading; it is reachable as #${section.anchor}`,
          section.headingLine,
          section.anchor,
        ),
      );
    }
    seen.add(normalizedTitle);
    siblingTitles.set(siblingsKey, seen);
  }

  for (const example of document.codeExamples) {
    if (example.language === null) {
      issues.push(
        issue(
          VALIDATION_CODES.UNLABELED_CODE_BLOCK,
          "fenced code block has no language hint",
          example.startLine,
          example.sectionAnchor ?? undefined,
        ),
      );
    }
  }

  if (
    document.sections.length > 0 &&
    !document.sections.some((section) => section.depth === 1)
  ) {
    issues.push(
      issue(
        VALIDATION_CODES.MISSING_TITLE,
        "document has no level 1 heading",
        document.sections[0].headingLine,
      ),
    );
  }

  issues.sort(compareIssues);

  return {
    valid: issues.every((entry) => entry.severity !== "error"),
    issues,
  };
}

export function assertValidDocument(document: ParsedDocument): void {
  const report = validateDocument(document);
  if (!report.valid) {
    throw new DocumentInvalidError(report.issues);
  }
}
