import type { CodeExample, InDocumentLink, Section } from "@handbook/shared";
import type { SyntaxNode, Tree } from "@lezer/common";
import { AnchorRegistry } from "./anchors";
import {
  collapseWhitespace,
  collectLinkDefinitions,
  createLineIndex,
  headingDepth,
  headingPlainText,
  inlinePlainText,
  type LineIndex,
  type LinkDefinitions,
  linkLabelRange,
  parseMarkdownTree,
  resolveLinkDestination,
  topLevelNodes,
} from "./markdown-tree";

export interface ParsedDocument {
  readonly source: string;
  readonly lines: readonly string[];
  readonly tree: Tree;
  readonly sections: readonly Section[];
  readonly links: readonly InDocumentLink[];
  readonly linkDefinitions: LinkDefinitions;
  readonly codeExamples: readonly CodeExample[];
  readonly preamble: string;
}

type CodeExampleDraft = Omit<CodeExample, "sectionAnchor">;

interface SectionDraft
  extends Omit<Section, "headingPath" | "childAnchors" | "codeExamples"> {
  readonly headingPath: string[];
  readonly childAnchors: string[];
  readonly codeExamples: CodeExample[];
}

interface HeadingNode {
  readonly node: SyntaxNode;
  readonly depth: number;
  readonly title: string;
  readonly headingLine: number;
  readonly contentLine: number;
}

export function normalizeLineEndings(source: string): string {
  return source.replace(/\r\n?/g, "\n");
}

export function stripByteOrderMark(source: string): string {
  return source.startsWith("\uFEFF") ? source.slice(1) : source;
}

export function splitLines(source: string): string[] {
  if (source.length === 0) {
    return [];
  }

  const lines = source.split("\n");
  if (lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
}

export function trimBlankLines(lines: readonly string[]): string[] {
  let start = 0;
  let end = lines.length;
  while (start < end && lines[start].trim() === "") {
    start += 1;
  }
  while (end > start && lines[end - 1].trim() === "") {
    end -= 1;
  }
  return lines.slice(start, end);
}

export function parseMarkdown(rawSource: string): ParsedDocument {
  const source = normalizeLineEndings(stripByteOrderMark(rawSource));
  const lines = splitLines(source);
  const tree = parseMarkdownTree(source);
  const lineIndex = createLineIndex(source);
  const linkDefinitions = collectLinkDefinitions(tree, source);

  const headings = collectHeadings(tree, source, lineIndex);
  const { sections, codeExamples } = buildSections(
    headings,
    lines,
    collectCodeExamples(tree, source, lines, lineIndex),
  );
  const firstHeadingLine = headings[0]?.headingLine ?? lines.length + 1;

  return {
    source,
    lines: Object.freeze(lines),
    tree,
    sections,
    links: collectInDocumentLinks(tree, source, lineIndex, linkDefinitions),
    linkDefinitions,
    codeExamples,
    preamble: trimBlankLines(lines.slice(0, firstHeadingLine - 1)).join("\n"),
  };
}

function collectHeadings(
  tree: Tree,
  source: string,
  lineIndex: LineIndex,
): HeadingNode[] {
  const headings: HeadingNode[] = [];

  for (const node of topLevelNodes(tree)) {
    const depth = headingDepth(node);
    if (depth === null) {
      continue;
    }

    headings.push({
      node,
      depth,
      title: headingPlainText(node, source),
      headingLine: lineIndex.lineAt(node.from),
      // setext headings span their underline too
      contentLine: lineIndex.lineAt(node.to) + 1,
    });
  }

  return headings;
}

/**
 * Sections, and the code examples they own, come back frozen: the store
 * hands them out directly.
 */
function buildSections(
  headings: readonly HeadingNode[],
  lines: readonly string[],
  exampleDrafts: readonly CodeExampleDraft[],
): {
  readonly sections: readonly Section[];
  readonly codeExamples: readonly CodeExample[];
} {
  const registry = new AnchorRegistry();
  const drafts: SectionDraft[] = [];
  const stack: SectionDraft[] = [];

  headings.forEach((heading, index) => {
    const nextHeading = headings[index + 1];
    const ownEndLine = nextHeading ? nextHeading.headingLine - 1 : lines.length;
    const closingHeading = headings
      .slice(index + 1)
      .find((candidate) => candidate.depth <= heading.depth);
    const endLine = closingHeading
      ? closingHeading.headingLine - 1
      : lines.length;

    while (stack.length > 0 && stack[stack.length - 1].depth >= heading.depth) {
      stack.pop();
    }
    const parent = stack[stack.length - 1];
    const anchor = registry.claim(heading.title);

    const section: SectionDraft = {
      anchor,
      title: heading.title,
      depth: heading.depth,
      headingPath: [...(parent?.headingPath ?? []), heading.title],
      parentAnchor: parent?.anchor ?? null,
      childAnchors: [],
      headingLine: heading.headingLine,
      startLine: heading.headingLine,
      endLine,
      body: trimBlankLines(
        lines.slice(heading.contentLine - 1, ownEndLine),
      ).join("\n"),
      codeExamples: [],
    };

    parent?.childAnchors.push(anchor);
    stack.push(section);
    drafts.push(section);
  });

  const codeExamples = exampleDrafts.map((draft) => {
    const owner = findLast(
      drafts,
      (section) => section.headingLine <= draft.startLine,
    );
    const example: CodeExample = Object.freeze({
      ...draft,
      sectionAnchor: owner?.anchor ?? null,
    });
    owner?.codeExamples.push(example);
    return example;
  });

  const sections = drafts.map(
    (draft): Section =>
      Object.freeze({
        ...draft,
        headingPath: Object.freeze(draft.headingPath),
        childAnchors: Object.freeze(draft.childAnchors),
        codeExamples: Object.freeze(draft.codeExamples),
      }),
  );

  return {
    sections: Object.freeze(sections),
    codeExamples: Object.freeze(codeExamples),
  };
}

function findLast<T>(
  items: readonly T[],
  predicate: (item: T) => boolean,
): T | undefined {
  for (let index = items.length - 1; index >= 0; index -= 1) {
    if (predicate(items[index])) {
      return items[index];
    }
  }
  return undefined;
}

export function detectCodeLanguage(rawInfo: string): string | null {
  const firstToken = rawInfo.trim().split(/\s+/)[0] ?? "";
  if (firstToken.length === 0) {
    return null;
  }
  return firstToken.toLowerCase();
}

function stripIndent(line: string, indent: number): string {
  let removed = 0;
  while (removed < indent && line[removed] === " ") {
    removed += 1;
  }
  return line.slice(removed);
}

function collectCodeExamples(
  tree: Tree,
  source: string,
  lines: readonly string[],
  lineIndex: LineIndex,
): CodeExampleDraft[] {
  const examples: CodeExampleDraft[] = [];

  tree.iterate({
    enter(ref) {
      if (ref.name !== "FencedCode") {
        return undefined;
      }

      const node = ref.node;
      const openLine = lineIndex.lineAt(node.from);
      const closeLine = Math.min(lineIndex.lineAt(node.to), lines.length);
      const marks = node.getChildren("CodeMark");
      const closingMark = marks.length >= 2 ? marks[marks.length - 1] : null;
      const hasClosingFence =
        closingMark !== null &&
        closeLine > openLine &&
        lineIndex.lineAt(closingMark.from) === closeLine;
      const info = node.getChild("CodeInfo");
      const indent = lineIndex.columnAt(node.from);

      examples.push({
        language: info
          ? detectCodeLanguage(source.slice(info.from, info.to))
          : null,
        code: lines
          .slice(openLine, hasClosingFence ? closeLine - 1 : closeLine)
          .map((line) => stripIndent(line, indent))
          .join("\n"),
        startLine: openLine,
        endLine: closeLine,
      });
      return false;
    },
  });

  return examples;
}

function anchorFromHref(href: string): string {
  const bare = href.slice(1);
  try {
    return decodeURIComponent(bare);
  } catch {
    // kept verbatim so validation reports it as a dead link
    return bare;
  }
}

function collectInDocumentLinks(
  tree: Tree,
  source: string,
  lineIndex: LineIndex,
  definitions: LinkDefinitions,
): readonly InDocumentLink[] {
  const links: InDocumentLink[] = [];

  tree.iterate({
    enter(ref) {
      if (ref.name !== "Link") {
        return undefined;
      }

      const node = ref.node;
      const href = resolveLinkDestination(node, source, definitions);
      if (href?.startsWith("#")) {
        const label = linkLabelRange(node);
        links.push(Object.freeze({
          text: collapseWhitespace(
            label
              ? inlinePlainText(node, source, label.from, label.to)
              : inlinePlainText(node, source),
          ),
          href,
          anchor: anchorFromHref(href),
          line: lineIndex.lineAt(node.from),
        }));
      }
      return false;
    },
  });

  return Object.freeze(links);
}
