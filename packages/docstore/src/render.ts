import type { CodeExample, Section } from "@handbook/shared";
import type { SyntaxNode } from "@lezer/common";
import {
  createLineIndex,
  decodeEntity,
  headingDepth,
  inlinePlainText,
  type LineIndex,
  linkDestination,
  linkLabelRange,
  resolveLinkDestination,
  topLevelNodes,
} from "./markdown-tree";
import { type ParsedDocument, trimBlankLines } from "./parse";
import { buildTableOfContents, nestTableOfContents, type TocNode } from "./toc";

export interface RenderSectionOptions {
  readonly includeSubsections?: boolean;
}

export interface RenderHtmlOptions {
  readonly title?: string;
  readonly includeToc?: boolean;
}

const SKIPPED_BLOCKS = new Set([
  "LinkReference",
  "CommentBlock",
  "ProcessingInstructionBlock",
]);
const INLINE_MARKS = new Set([
  "CodeMark",
  "EmphasisMark",
  "HeaderMark",
  "LinkMark",
  "LinkTitle",
  "LinkLabel",
  "QuoteMark",
  "StrikethroughMark",
  "SubscriptMark",
  "SuperscriptMark",
  "TaskMarker",
  "ListMark",
]);
const INLINE_WRAPPERS: Record<string, string> = {
  Emphasis: "em",
  StrongEmphasis: "strong",
  Strikethrough: "del",
  Subscript: "sub",
  Superscript: "sup",
};

export function escapeHtml(value: string): string {
  return value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");
}

export function sanitizeHref(rawHref: string, kind: "image" | "link"): string {
  const href = rawHref.trim();
  if (!href) {
    return "";
  }

  const lowered = href.toLowerCase();
  const schemeMatch = lowered.match(/^([a-z][a-z0-9+.-]*):/);
  if (!schemeMatch) {
    return href;
  }

  const scheme = schemeMatch[1];
  if (
    scheme === "http" ||
    scheme === "https" ||
    scheme === "mailto" ||
    scheme === "tel"
  ) {
    return href;
  }

  if (kind === "image" && scheme === "blob") {
    return href;
  }

  return "";
}

export function renderSectionMarkdown(
  document: ParsedDocument,
  section: Section,
  options: RenderSectionOptions = {},
): string {
  const includeSubsections = options.includeSubsections ?? true;
  let endLine = section.endLine;

  if (!includeSubsections && section.childAnchors.length > 0) {
    const firstChild = document.sections.find(
      (candidate) => candidate.anchor === section.childAnchors[0],
    );
    if (firstChild) {
      endLine = firstChild.headingLine - 1;
    }
  }

  return trimBlankLines(
    document.lines.slice(section.startLine - 1, endLine),
  ).join("\n");
}

class HtmlRenderer {
  private readonly source: string;
  private readonly lines: readonly string[];
  private readonly sectionsByLine: Map<number, Section>;
  private readonly examplesByLine: Map<number, CodeExample>;
  private readonly lineIndex: LineIndex;

  constructor(private readonly document: ParsedDocument) {
    this.source = document.source;
    this.lines = document.lines;
    this.sectionsByLine = new Map(
      document.sections.map((section) => [section.headingLine, section]),
    );
    this.examplesByLine = new Map(
      document.codeExamples.map((example) => [example.startLine, example]),
    );
    this.lineIndex = createLineIndex(document.source);
  }

  renderBody(): string {
    return topLevelNodes(this.document.tree)
      .map((node) => this.renderBlock(node, true))
      .filter((html) => html.length > 0)
      .join("\n");
  }

  private renderBlocks(container: SyntaxNode): string {
    const parts: string[] = [];
    for (let child = container.firstChild; child; child = child.nextSibling) {
      if (INLINE_MARKS.has(child.name)) {
        continue;
      }
      const html = this.renderBlock(child, false);
      if (html.length > 0) {
        parts.push(html);
      }
    }
    return parts.join("\n");
  }

  private renderBlock(node: SyntaxNode, topLevel: boolean): string {
    const depth = headingDepth(node);
    if (depth !== null) {
      const section = topLevel
        ? this.sectionsByLine.get(this.lineIndex.lineAt(node.from))
        : undefined;
      const id = section ? ` id="${escapeHtml(section.anchor)}"` : "";
      return `<h${depth}${id}>${this.renderInline(node).trim()}</h${depth}>`;
    }

    switch (node.name) {
      case "Paragraph":
        return `<p>${this.renderInline(node).trim()}</p>`;
      case "FencedCode":
        return this.renderFencedCode(node);
      case "CodeBlock":
        return this.renderIndentedCode(node);
      case "BulletList":
        return `<ul>\n${this.renderBlocks(node)}\n</ul>`;
      case "OrderedList":
        return `<ol>\n${this.renderBlocks(node)}\n</ol>`;
      case "ListItem":
        return this.renderListItem(node);
      case "Blockquote":
        return `<blockquote>\n${this.renderBlocks(node)}\n</blockquote>`;
      case "HorizontalRule":
        return "<hr />";
      case "Table":
        return this.renderTable(node);
      case "Task":
        return this.renderTask(node);
      case "HTMLBlock":
        return `<p>${escapeHtml(this.source.slice(node.from, node.to).trimEnd())}</p>`;
      default:
        if (SKIPPED_BLOCKS.has(node.name)) {
          return "";
        }
        return `<p>${escapeHtml(this.source.slice(node.from, node.to).trim())}</p>`;
    }
  }

  private renderListItem(node: SyntaxNode): string {
    const blocks: SyntaxNode[] = [];
    for (let child = node.firstChild; child; child = child.nextSibling) {
      if (!INLINE_MARKS.has(child.name)) {
        blocks.push(child);
      }
    }

    if (blocks.length === 1 && blocks[0].name === "Paragraph") {
      return `<li>${this.renderInline(blocks[0]).trim()}</li>`;
    }
    if (blocks.length === 1 && blocks[0].name === "Task") {
      return `<li>${this.renderTask(blocks[0])}</li>`;
    }

    return `<li>\n${this.renderBlocks(node)}\n</li>`;
  }

  private renderTask(node: SyntaxNode): string {
    const marker = node.getChild("TaskMarker");
    const checked =
      marker !== null &&
      /\[[xX]\]/.test(this.source.slice(marker.from, marker.to));
    const checkbox = checked
      ? '<input type="checkbox" checked disabled />'
      : '<input type="checkbox" disabled />';
    return `${checkbox} ${this.renderInline(node).trim()}`;
  }

  private renderFencedCode(node: SyntaxNode): string {
    const example = this.examplesByLine.get(this.lineIndex.lineAt(node.from));
    const code = example?.code ?? "";
    const language = example?.language ?? null;
    const className = language
      ? ` class="language-${escapeHtml(sanitizeLanguageClass(language))}"`
      : "";
    return `<pre><code${className}>${escapeHtml(code)}</code></pre>`;
  }

  private renderIndentedCode(node: SyntaxNode): string {
    const startLine = this.lineIndex.lineAt(node.from);
    const endLine = this.lineIndex.lineAt(node.to);
    const indent = this.lineIndex.columnAt(node.from);
    const code = this.lines
      .slice(startLine - 1, endLine)
      .map((line) => line.slice(Math.min(indent, leadingSpaces(line))))
      .join("\n");
    return `<pre><code>${escapeHtml(code)}</code></pre>`;
  }

  private renderTable(node: SyntaxNode): string {
    const header = node.getChild("TableHeader");
    const columns = header ? tableRowCells(header).length : 0;
    const rows: string[] = [];
    for (let child = node.firstChild; child; child = child.nextSibling) {
      if (child.name === "TableHeader") {
        rows.push(
          `<thead>\n<tr>${this.renderCells(child, "th", columns)}</tr>\n</thead>`,
        );
      } else if (child.name === "TableRow") {
        rows.push(`<tr>${this.renderCells(child, "td", columns)}</tr>`);
      }
    }

    const [head, ...body] = rows;
    const bodyHtml =
      body.length > 0 ? `\n<tbody>\n${body.join("\n")}\n</tbody>` : "";
    return `<table>\n${head ?? ""}${bodyHtml}\n</table>`;
  }

  private renderCells(
    row: SyntaxNode,
    tag: "td" | "th",
    columns: number,
  ): string {
    const cells = tableRowCells(row);
    // body rows are padded or cut to the header's width
    const width = columns > 0 ? columns : cells.length;
    return Array.from({ length: width }, (_, index) => {
      const cell = cells[index];
      const html = cell ? this.renderInline(cell).trim() : "";
      return `<${tag}>${html}</${tag}>`;
    }).join("");
  }

  private renderInline(
    node: SyntaxNode,
    from: number = node.from,
    to: number = node.to,
  ): string {
    let html = "";
    let cursor = from;

    for (let child = node.firstChild; child; child = child.nextSibling) {
      if (child.to <= from || child.from >= to) {
        continue;
      }

      html += this.renderText(this.source.slice(cursor, child.from));
      html += this.renderInlineNode(child);
      cursor = child.to;
    }

    html += this.renderText(this.source.slice(cursor, to));
    return html;
  }

  private renderText(text: string): string {
    return escapeHtml(text.replace(/\n[ \t]+/g, "\n"));
  }

  private renderInlineNode(node: SyntaxNode): string {
    const wrapper = INLINE_WRAPPERS[node.name];
    if (wrapper) {
      return `<${wrapper}>${this.renderInline(node)}</${wrapper}>`;
    }

    switch (node.name) {
      case "InlineCode":
        return `<code>${escapeHtml(this.inlineCodeText(node))}</code>`;
      case "Link":
        return this.renderLink(node);
      case "Image":
        return this.renderImage(node);
      case "Autolink":
        return this.renderAutolink(linkDestination(node, this.source));
      case "URL":
        return this.renderAutolink(this.source.slice(node.from, node.to));
      case "Escape":
        return escapeHtml(this.source.slice(node.from + 1, node.to));
      case "Entity":
        return escapeHtml(decodeEntity(this.source.slice(node.from, node.to)));
      case "HardBreak":
        return "<br />\n";
      case "HTMLTag":
        return escapeHtml(this.source.slice(node.from, node.to));
      default:
        return INLINE_MARKS.has(node.name) ? "" : this.renderInline(node);
    }
  }

  private inlineCodeText(node: SyntaxNode): string {
    const marks = node.getChildren("CodeMark");
    if (marks.length < 2) {
      return this.source.slice(node.from, node.to);
    }

    const raw = this.source
      .slice(marks[0].to, marks[marks.length - 1].from)
      .replace(/\n/g, " ");
    if (raw.length > 2 && raw.startsWith(" ") && raw.endsWith(" ") && raw.trim()) {
      return raw.slice(1, -1);
    }
    return raw;
  }

  private renderLink(node: SyntaxNode): string {
    const label = linkLabelRange(node);
    const inner = label
      ? this.renderInline(node, label.from, label.to)
      : this.renderInline(node);
    const destination = resolveLinkDestination(
      node,
      this.source,
      this.document.linkDefinitions,
    );
    if (destination === null) {
      return this.renderUndefinedReference(node, inner);
    }

    const href = sanitizeHref(destination, "link");
    if (!href) {
      return inner;
    }
    return `<a href="${escapeHtml(href)}">${inner}</a>`;
  }

  private renderImage(node: SyntaxNode): string {
    const label = linkLabelRange(node);
    const alt = label
      ? inlinePlainText(node, this.source, label.from, label.to)
      : "";
    const destination = resolveLinkDestination(
      node,
      this.source,
      this.document.linkDefinitions,
    );
    if (destination === null) {
      return this.renderUndefinedReference(node, escapeHtml(alt), "!");
    }

    const src = sanitizeHref(destination, "image");
    return `<img src="${escapeHtml(src)}" alt="${escapeHtml(alt)}" />`;
  }

  /** A reference to a label nothing defines stays literal text. */
  private renderUndefinedReference(
    node: SyntaxNode,
    inner: string,
    prefix = "",
  ): string {
    const reference = node.getChild("LinkLabel");
    const suffix = reference
      ? escapeHtml(this.source.slice(reference.from, reference.to))
      : "";
    return `${prefix}[${inner}]${suffix}`;
  }

  private renderAutolink(rawUrl: string): string {
    const target =
      rawUrl.includes("@") && !/^[a-z][a-z0-9+.-]*:/i.test(rawUrl)
        ? `mailto:${rawUrl}`
        : rawUrl;
    const href = sanitizeHref(target, "link");
    if (!href) {
      return escapeHtml(rawUrl);
    }
    return `<a href="${escapeHtml(href)}">${escapeHtml(rawUrl)}</a>`;
  }
}

/**
 * Cells of a table row by column. The GFM parser emits no `TableCell` for
 * an empty cell, so columns are counted between `TableDelimiter` pipes.
 */
function tableRowCells(row: SyntaxNode): (SyntaxNode | null)[] {
  const slots: (SyntaxNode | null)[] = [null];
  const first = row.firstChild;
  let last: SyntaxNode | null = null;

  for (let child = first; child; child = child.nextSibling) {
    if (child.name === "TableDelimiter") {
      slots.push(null);
    } else if (child.name === "TableCell") {
      slots[slots.length - 1] = child;
    }
    last = child;
  }

  const start = first?.name === "TableDelimiter" ? 1 : 0;
  const end =
    last?.name === "TableDelimiter" && slots.length > start + 1
      ? slots.length - 1
      : slots.length;
  return slots.slice(start, end);
}

function leadingSpaces(line: string): number {
  return line.length - line.trimStart().length;
}

function sanitizeLanguageClass(language: string): string {
  return language.replaceAll(/[^a-z0-9_-]/gi, "-").toLowerCase();
}

function renderTocList(nodes: readonly TocNode[]): string {
  const items = nodes.map((node) => {
    const link = `<a href="#${escapeHtml(node.anchor)}">${escapeHtml(node.title)}</a>`;
    if (node.children.length === 0) {
      return `<li>${link}</li>`;
    }
    return `<li>${link}\n${renderTocList(node.children)}\n</li>`;
  });
  return `<ul>\n${items.join("\n")}\n</ul>`;
}

export function renderTableOfContentsHtml(document: ParsedDocument): string {
  const nodes = nestTableOfContents(buildTableOfContents(document.sections));
  if (nodes.length === 0) {
    return "";
  }
  return `<nav class="toc" aria-label="Table of contents">\n${renderTocList(nodes)}\n</nav>`;
}

function renderBodyHtml(document: ParsedDocument): string {
  return new HtmlRenderer(document).renderBody();
}

export function renderDocumentHtml(
  document: ParsedDocument,
  options: RenderHtmlOptions = {},
): string {
  const includeToc = options.includeToc ?? true;
  const title =
    options.title ??
    document.sections.find((section) => section.depth === 1)?.title ??
    "Document";
  const toc = includeToc ? renderTableOfContentsHtml(document) : "";
  const body = renderBodyHtml(document);

  const parts = [
    "<!DOCTYPE html>",
    '<html lang="en">',
    "<head>",
    '<meta charset="utf-8" />',
    `<title>${escapeHtml(title)}</title>`,
    "</head>",
    "<body>",
    ...(toc ? [toc] : []),
    "<main>",
    ...(body ? [body] : []),
    "</main>",
    "</body>",
    "</html>",
  ];

  return `${parts.join("\n")}\n`;
}
