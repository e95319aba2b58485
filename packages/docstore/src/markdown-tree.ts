import { markdownLanguage } from "@codemirror/lang-markdown";
import type { SyntaxNode, Tree } from "@lezer/common";

const HEADING_NODE_PATTERN = /^(?:ATX|Setext)Heading([1-6])$/;
const MARK_NODES = new Set([
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
]);
const NAMED_ENTITIES: Record<string, string> = {
  "&amp;": "&",
  "&lt;": "<",
  "&gt;": ">",
  "&quot;": '"',
  "&apos;": "'",
  "&nbsp;": " ",
};

export function parseMarkdownTree(source: string): Tree {
  return markdownLanguage.parser.parse(source);
}

export function headingDepth(node: Pick<SyntaxNode, "name">): number | null {
  const match = HEADING_NODE_PATTERN.exec(node.name);
  if (!match) {
    return null;
  }

  return Number.parseInt(match[1], 10);
}

export function topLevelNodes(tree: Tree): SyntaxNode[] {
  const nodes: SyntaxNode[] = [];
  let node = tree.topNode.firstChild;

  while (node) {
    nodes.push(node);
    node = node.nextSibling;
  }

  return nodes;
}

export function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, " ").trim();
}

export function decodeEntity(raw: string): string {
  const named = NAMED_ENTITIES[raw];
  if (named !== undefined) {
    return named;
  }

  const numeric = /^&#(x[0-9a-f]+|[0-9]+);$/i.exec(raw);
  if (!numeric) {
    return raw;
  }

  const body = numeric[1];
  const codePoint =
    body[0] === "x" || body[0] === "X"
      ? Number.parseInt(body.slice(1), 16)
      : Number.parseInt(body, 10);
  if (!Number.isFinite(codePoint) || codePoint <= 0 || codePoint > 0x10ffff) {
    return "�";
  }

  return String.fromCodePoint(codePoint);
}

/** Delimiters of a link or image label (`[`, `]`), when the node has them. */
export function linkLabelRange(
  node: SyntaxNode,
): { readonly from: number; readonly to: number } | null {
  const marks = node.getChildren("LinkMark");
  if (marks.length < 2) {
    return null;
  }

  return { from: marks[0].to, to: marks[1].from };
}

export function linkDestination(node: SyntaxNode, source: string): string {
  const url = node.getChild("URL");
  if (!url) {
    return "";
  }

  const raw = source.slice(url.from, url.to);
  return raw.startsWith("<") && raw.endsWith(">") ? raw.slice(1, -1) : raw;
}

/** Link reference definitions keyed by normalized label. */
export type LinkDefinitions = ReadonlyMap<string, string>;

export function normalizeLinkLabel(label: string): string {
  return collapseWhitespace(label).toLowerCase();
}

export function collectLinkDefinitions(
  tree: Tree,
  source: string,
): LinkDefinitions {
  const definitions = new Map<string, string>();

  tree.iterate({
    enter(ref) {
      if (ref.name !== "LinkReference") {
        return undefined;
      }

      const label = ref.node.getChild("LinkLabel");
      if (label) {
        const key = normalizeLinkLabel(
          source.slice(label.from + 1, label.to - 1),
        );
        // first definition wins
        if (key.length > 0 && !definitions.has(key)) {
          definitions.set(key, linkDestination(ref.node, source));
        }
      }
      return false;
    },
  });

  return definitions;
}

/**
 * Destination of an inline, full, collapsed or shortcut reference link.
 * `null` when the link refers to a label nothing defines.
 */
export function resolveLinkDestination(
  node: SyntaxNode,
  source: string,
  definitions: LinkDefinitions,
): string | null {
  if (node.getChild("URL")) {
    return linkDestination(node, source);
  }

  const reference = node.getChild("LinkLabel");
  if (!reference && node.getChildren("LinkMark").length > 2) {
    // inline link with an empty destination: `[text]()`
    return "";
  }

  const text = linkLabelRange(node);
  const label =
    reference && reference.to - reference.from > 2
      ? source.slice(reference.from + 1, reference.to - 1)
      : text
        ? source.slice(text.from, text.to)
        : "";
  return definitions.get(normalizeLinkLabel(label)) ?? null;
}

/**
 * Text a reader sees for an inline range: markup delimiters dropped,
 * escapes and entities resolved, links reduced to their labels.
 */
export function inlinePlainText(
  node: SyntaxNode,
  source: string,
  from: number = node.from,
  to: number = node.to,
): string {
  let text = "";
  let cursor = from;

  for (let child = node.firstChild; child; child = child.nextSibling) {
    if (child.to <= from || child.from >= to) {
      continue;
    }

    text += source.slice(cursor, child.from);
    text += inlineNodeText(child, source);
    cursor = child.to;
  }

  text += source.slice(cursor, to);
  return text;
}

function inlineNodeText(node: SyntaxNode, source: string): string {
  switch (node.name) {
    case "Escape":
      return source.slice(node.from + 1, node.to);
    case "Entity":
      return decodeEntity(source.slice(node.from, node.to));
    case "HardBreak":
      return " ";
    case "URL":
      return source.slice(node.from, node.to);
    case "Autolink":
      return linkDestination(node, source);
    case "Link":
    case "Image": {
      const label = linkLabelRange(node);
      return label
        ? inlinePlainText(node, source, label.from, label.to)
        : inlinePlainText(node, source);
    }
    default:
      return MARK_NODES.has(node.name) ? "" : inlinePlainText(node, source);
  }
}

export function headingPlainText(node: SyntaxNode, source: string): string {
  return collapseWhitespace(inlinePlainText(node, source));
}

export interface LineIndex {
  lineAt(offset: number): number;
  columnAt(offset: number): number;
}

export function createLineIndex(source: string): LineIndex {
  const lineStarts = [0];
  for (let index = 0; index < source.length; index += 1) {
    if (source[index] === "\n") {
      lineStarts.push(index + 1);
    }
  }

  const lineAt = (offset: number): number => {
    let low = 0;
    let high = lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return low + 1;
  };

  return {
    lineAt,
    columnAt: (offset) => offset - lineStarts[lineAt(offset) - 1],
  };
}
