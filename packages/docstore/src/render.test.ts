import { describe, expect, it } from "vitest";
import { parseMarkdown } from "./parse";
import {
  escapeHtml,
  renderDocumentHtml,
  renderSectionMarkdown,
  renderTableOfContentsHtml,
  sanitizeHref,
} from "./render";
import { GUIDE_SOURCE } from "./test/fixtures";

const SMALL_SOURCE = [
  "# Title",
  "Some *em* and **strong** with `code` and [link](#sub).",
  "",
  "## Sub",
  "```js",
  "a < b",
  "```",
].join("\n");

function bodyOf(html: string): string {
  const start = html.indexOf("<main>\n") + "<main>\n".length;
  const end = html.indexOf("\n</main>");
  return html.slice(start, end);
}

describe("renderSectionMarkdown", () => {
  it("renders a section with its subsections", () => {
    const document = parseMarkdown(GUIDE_SOURCE);

    expect(renderSectionMarkdown(document, document.sections[1])).toBe(
      [
        "## Key Concepts",
        "",
        "### Hooks",
        "",
        "Hooks let components use state.",
        "",
        "```tsx",
        "const [count, setCount] = useState(0);",
        "```",
      ].join("\n"),
    );
  });

  it("stops at the first subsection when asked to", () => {
    const document = parseMarkdown(GUIDE_SOURCE);

    expect(
      renderSectionMarkdown(document, document.sections[1], {
        includeSubsections: false,
      }),
    ).toBe("## Key Concepts");
    expect(
      renderSectionMarkdown(document, document.sections[0], {
        includeSubsections: false,
      }),
    ).toBe("# Guide\n\nWelcome text.");
  });
});

describe("renderDocumentHtml", () => {
  it("renders headings with anchors, inline markup and code", () => {
    const html = renderDocumentHtml(parseMarkdown(SMALL_SOURCE));

    expect(bodyOf(html)).toBe(
      [
        '<h1 id="title">Title</h1>',
        '<p>Some <em>em</em> and <strong>strong</strong> with <code>code</code> and <a href="#sub">link</a>.</p>',
        '<h2 id="sub">Sub</h2>',
        '<pre><code class="language-js">a &lt; b</code></pre>',
      ].join("\n"),
    );
  });

  it("wraps the body in a complete document titled after the first heading", () => {
    const html = renderDocumentHtml(parseMarkdown(SMALL_SOURCE), {
      includeToc: false,
    });

    expect(html.startsWith("<!DOCTYPE html>\n")).toBe(true);
    expect(html).toContain("\n<title>Title</title>\n");
    expect(html).not.toContain('<nav class="toc"');
    expect(html.endsWith("</html>\n")).toBe(true);
  });

  it("prefers an explicit title", () => {
    const html = renderDocumentHtml(parseMarkdown(SMALL_SOURCE), {
      title: "Notes & Tips",
    });

    expect(html).toContain("\n<title>Notes &amp; Tips</title>\n");
  });

  it("produces byte-identical output for the same source", () => {
    const first = renderDocumentHtml(parseMarkdown(GUIDE_SOURCE));
    const second = renderDocumentHtml(parseMarkdown(GUIDE_SOURCE));

    expect(second).toBe(first);
  });

  it("escapes raw HTML blocks and inline tags", () => {
    const html = renderDocumentHtml(
      parseMarkdown("<script>alert(1)</script>\n\na <b>bold</b> move\n"),
    );

    expect(bodyOf(html)).toBe(
      [
        "<p>&lt;script&gt;alert(1)&lt;/script&gt;</p>",
        "<p>a &lt;b&gt;bold&lt;/b&gt; move</p>",
      ].join("\n"),
    );
  });

  it("drops links with unsafe schemes but keeps their text", () => {
    const html = renderDocumentHtml(
      parseMarkdown("[click](javascript:alert(1)) and [docs](https://react.dev)\n"),
    );

    expect(bodyOf(html)).toBe(
      '<p>click and <a href="https://react.dev">docs</a></p>',
    );
  });

  it("renders lists, entities and rules", () => {
    const html = renderDocumentHtml(
      parseMarkdown("- one\n- two\n\n---\n\nTom &amp; Jerry\n"),
    );

    expect(bodyOf(html)).toBe(
      [
        "<ul>",
        "<li>one</li>",
        "<li>two</li>",
        "</ul>",
        "<hr />",
        "<p>Tom &amp; Jerry</p>",
      ].join("\n"),
    );
  });

  it("renders reference links and images through their definitions", () => {
    const html = renderDocumentHtml(
      parseMarkdown(
        [
          "# Doc",
          "",
          "See [Hooks][h] and [Other][o].",
          "",
          "![Logo][logo]",
          "",
          "[h]: #hooks",
          "[o]: #nowhere",
          "[logo]: https://example.com/logo.png",
          "",
          "## Hooks",
        ].join("\n"),
      ),
      { includeToc: false },
    );

    expect(bodyOf(html)).toBe(
      [
        '<h1 id="doc">Doc</h1>',
        '<p>See <a href="#hooks">Hooks</a> and <a href="#nowhere">Other</a>.</p>',
        '<p><img src="https://example.com/logo.png" alt="Logo" /></p>',
        '<h2 id="hooks">Hooks</h2>',
      ].join("\n"),
    );
  });

  it("keeps brackets that refer to no definition as text", () => {
    const html = renderDocumentHtml(
      parseMarkdown("Marked [Draft] and [x][nope].\n"),
    );

    expect(bodyOf(html)).toBe("<p>Marked [Draft] and [x][nope].</p>");
  });

  it("keeps empty table cells in their columns", () => {
    const html = renderDocumentHtml(
      parseMarkdown(
        "| a | b | c |\n| --- | --- | --- |\n| 1 |   | 3 |\n| x |\n",
      ),
    );

    expect(bodyOf(html)).toBe(
      [
        "<table>",
        "<thead>",
        "<tr><th>a</th><th>b</th><th>c</th></tr>",
        "</thead>",
        "<tbody>",
        "<tr><td>1</td><td></td><td>3</td></tr>",
        "<tr><td>x</td><td></td><td></td></tr>",
        "</tbody>",
        "</table>",
      ].join("\n"),
    );
  });

  it("renders tables", () => {
    const html = renderDocumentHtml(
      parseMarkdown("| a | b |\n| --- | --- |\n| 1 | 2 |\n"),
    );

    expect(bodyOf(html)).toBe(
      [
        "<table>",
        "<thead>",
        "<tr><th>a</th><th>b</th></tr>",
        "</thead>",
        "<tbody>",
        "<tr><td>1</td><td>2</td></tr>",
        "</tbody>",
        "</table>",
      ].join("\n"),
    );
  });
});

describe("renderTableOfContentsHtml", () => {
  it("renders a nested list of anchor links", () => {
    expect(renderTableOfContentsHtml(parseMarkdown(SMALL_SOURCE))).toBe(
      [
        '<nav class="toc" aria-label="Table of contents">',
        "<ul>",
        '<li><a href="#title">Title</a>',
        "<ul>",
        '<li><a href="#sub">Sub</a></li>',
        "</ul>",
        "</li>",
        "</ul>",
        "</nav>",
      ].join("\n"),
    );
  });

  it("renders nothing for a document without headings", () => {
    expect(renderTableOfContentsHtml(parseMarkdown("just text\n"))).toBe("");
  });
});

describe("html helpers", () => {
  it("escapes markup-significant characters", () => {
    expect(escapeHtml(`<a href="x">'&'</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;&#39;&amp;&#39;&lt;/a&gt;",
    );
  });

  it("keeps relative and safe absolute hrefs only", () => {
    expect(sanitizeHref("#hooks", "link")).toBe("#hooks");
    expect(sanitizeHref("/docs/intro", "link")).toBe("/docs/intro");
    expect(sanitizeHref("mailto:team@example.com", "link")).toBe(
      "mailto:team@example.com",
    );
    expect(sanitizeHref("JavaScript:alert(1)", "link")).toBe("");
    expect(sanitizeHref("blob:abc", "image")).toBe("blob:abc");
    expect(sanitizeHref("blob:abc", "link")).toBe("");
  });
});
