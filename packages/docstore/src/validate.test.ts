import { describe, expect, it } from "vitest";
import { DocumentInvalidError } from "./errors";
import { parseMarkdown } from "./parse";
import { BROKEN_SOURCE, GUIDE_SOURCE } from "./test/fixtures";
import { assertValidDocument, validateDocument } from "./validate";

describe("validateDocument", () => {
  it("accepts a well-formed document", () => {
    expect(validateDocument(parseMarkdown(GUIDE_SOURCE))).toEqual({
      valid: true,
      issues: [],
    });
  });

  it("reports dead links, skipped levels, duplicates and unlabeled code", () => {
    const report = validateDocument(parseMarkdown(BROKEN_SOURCE));

    expect(report.valid).toBe(false);
    expect(
      report.issues.map(({ code, severity, line, anchor }) => ({
        code,
        severity,
        line,
        anchor,
      })),
    ).toEqual([
      { code: "DEAD_LINK", severity: "error", line: 3, anchor: "nowhere" },
      {
        code: "SKIPPED_HEADING_LEVEL",
        severity: "error",
        line: 7,
        anchor: "deep",
      },
      {
        code: "DUPLICATE_TITLE",
        severity: "warning",
        line: 9,
        anchor: "setup-1",
      },
      {
        code: "UNLABELED_CODE_BLOCK",
        severity: "warning",
        line: 11,
        anchor: "setup-1",
      },
    ]);
    expect(report.issues[0].message).toBe(
      'link "missing" points to #nowhere, which matches no section',
    );
    expect(report.issues[1].message).toBe(
      'heading "Deep" jumps from level 2 to 4',
    );
  });

  it("reports dead reference-style links", () => {
    const report = validateDocument(
      parseMarkdown(
        [
          "# Doc",
          "",
          "See [Hooks][h] and [Other][o].",
          "",
          "[h]: #hooks",
          "[o]: #nowhere",
          "",
          "## Hooks",
        ].join("\n"),
      ),
    );

    expect(report).toEqual({
      valid: false,
      issues: [
        {
          code: "DEAD_LINK",
          severity: "error",
          message: 'link "Other" points to #nowhere, which matches no section',
          line: 3,
          anchor: "nowhere",
        },
      ],
    });
  });

  it("finds the title of a document saved with a byte order mark", () => {
    expect(
      validateDocument(parseMarkdown("\uFEFF# Title\n\n## Part\n")),
    ).toEqual({ valid: true, issues: [] });
  });

  it("warns when the document has no level 1 heading", () => {
    expect(validateDocument(parseMarkdown("## Only\n\ntext\n"))).toEqual({
      valid: true,
      issues: [
        {
          code: "MISSING_TITLE",
          severity: "warning",
          message: "document has no level 1 heading",
          line: 1,
        },
      ],
    });
  });

  it("rejects headings without text", () => {
    const report = validateDocument(parseMarkdown("# Title\n\n##\n"));

    expect(report.valid).toBe(false);
    expect(report.issues).toEqual([
      {
        code: "EMPTY_HEADING",
        severity: "error",
        message: "heading has no text",
        line: 3,
        anchor: "section",
      },
    ]);
  });

  it("does not constrain the level of the first heading", () => {
    const report = validateDocument(parseMarkdown("### Deep start\n\n# Title\n"));

    expect(report.valid).toBe(true);
  });
});

describe("assertValidDocument", () => {
  it("throws with the collected issues when the document is invalid", () => {
    try {
      assertValidDocument(parseMarkdown(BROKEN_SOURCE));
      expect.unreachable("expected assertValidDocument to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(DocumentInvalidError);
      expect(error).toMatchObject({
        code: "DOCUMENT_INVALID",
        message: "document failed validation with 2 error(s)",
      });
      expect(error).toHaveProperty("issues.length", 4);
    }
  });

  it("passes valid documents through", () => {
    expect(() => assertValidDocument(parseMarkdown(GUIDE_SOURCE))).not.toThrow();
  });
});
