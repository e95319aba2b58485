import type { Section, TocEntry } from "@handbook/shared";

export interface TocNode extends TocEntry {
  children: TocNode[];
}

export function buildTableOfContents(
  sections: readonly Section[],
): TocEntry[] {
  return sections.map(({ title, anchor, depth }) => ({ title, anchor, depth }));
}

export function nestTableOfContents(entries: readonly TocEntry[]): TocNode[] {
  const roots: TocNode[] = [];
  const stack: TocNode[] = [];

  for (const entry of entries) {
    const node: TocNode = { ...entry, children: [] };
    while (stack.length > 0 && stack[stack.length - 1].depth >= entry.depth) {
      stack.pop();
    }

    const parent = stack[stack.length - 1];
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    stack.push(node);
  }

  return roots;
}

export function resolveLink(
  href: string,
  sections: readonly Section[],
): Section | undefined {
  if (!href.startsWith("#")) {
    return undefined;
  }

  let anchor = href.slice(1);
  try {
    anchor = decodeURIComponent(anchor);
  } catch {
    return undefined;
  }

  return sections.find((section) => section.anchor === anchor);
}
