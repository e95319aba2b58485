import type {
  CodeExample,
  InDocumentLink,
  Section,
  TocEntry,
  ValidationReport,
} from "@handbook/shared";
import { normalizeAnchor } from "./anchors";
import { SectionNotFoundError, SectionPathNotFoundError } from "./errors";
import { type ParsedDocument, parseMarkdown } from "./parse";
import {
  type RenderHtmlOptions,
  type RenderSectionOptions,
  renderDocumentHtml,
  renderSectionMarkdown,
} from "./render";
import {
  buildTableOfContents,
  nestTableOfContents,
  resolveLink as resolveLinkTarget,
  type TocNode,
} from "./toc";
import { validateDocument } from "./validate";

export const HEADING_PATH_SEPARATOR = ">";
const DEFAULT_SEARCH_LIMIT = 20;

export interface DocumentStoreOptions {
  readonly name?: string;
}

export interface CodeExampleFilter {
  readonly language?: string;
  readonly sectionAnchor?: string;
}

export interface SearchOptions {
  readonly limit?: number;
}

export interface SearchMatch {
  readonly section: Section;
  readonly matchedTitle: boolean;
}

export function parseHeadingPath(path: string): string[] {
  return path
    .split(HEADING_PATH_SEPARATOR)
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0);
}

function normalizeTitle(value: string): string {
  return value.trim().toLowerCase();
}

// titles may themselves contain the separator, so paths compare as text
function headingPathKey(path: string): string {
  return parseHeadingPath(path).map(normalizeTitle).join(HEADING_PATH_SEPARATOR);
}

function toTocEntry({ title, anchor, depth }: Section): TocEntry {
  return { title, anchor, depth };
}

/**
 * Read-only view over one Markdown document. Sections are addressed by
 * anchor; the table of contents lists them in document order.
 */
export class DocumentStore {
  readonly name: string;
  readonly document: ParsedDocument;
  private readonly sectionsByAnchor: Map<string, Section>;

  constructor(document: ParsedDocument, options: DocumentStoreOptions = {}) {
    this.document = document;
    this.name = options.name ?? "document";
    this.sectionsByAnchor = new Map(
      document.sections.map((section) => [section.anchor, section]),
    );
  }

  static fromSource(
    source: string,
    options: DocumentStoreOptions = {},
  ): DocumentStore {
    return new DocumentStore(parseMarkdown(source), options);
  }

  get title(): string {
    return (
      this.document.sections.find((section) => section.depth === 1)?.title ??
      this.name
    );
  }

  get sections(): readonly Section[] {
    return this.document.sections;
  }

  tableOfContents(): TocEntry[] {
    return buildTableOfContents(this.document.sections);
  }

  nestedTableOfContents(): TocNode[] {
    return nestTableOfContents(this.tableOfContents());
  }

  findSection(anchor: string): Section | undefined {
    return this.sectionsByAnchor.get(normalizeAnchor(anchor));
  }

  hasSection(anchor: string): boolean {
    return this.findSection(anchor) !== undefined;
  }

  getSection(anchor: string): Section {
    const normalized = normalizeAnchor(anchor);
    const section = this.sectionsByAnchor.get(normalized);
    if (!section) {
      throw new SectionNotFoundError(normalized);
    }
    return section;
  }

  renderSection(anchor: string, options: RenderSectionOptions = {}): string {
    return renderSectionMarkdown(this.document, this.getSection(anchor), options);
  }

  getSectionByPath(path: string): Section {
    const key = headingPathKey(path);
    if (key.length === 0) {
      throw new SectionPathNotFoundError(path, 0);
    }

    const matches = this.document.sections.filter((section) =>
      section.headingPath.some(
        (_, index) =>
          headingPathKey(
            section.headingPath.slice(index).join(HEADING_PATH_SEPARATOR),
          ) === key,
      ),
    );

    if (matches.length !== 1) {
      throw new SectionPathNotFoundError(path, matches.length);
    }
    return matches[0];
  }

  parent(anchor: string): Section | undefined {
    const { parentAnchor } = this.getSection(anchor);
    return parentAnchor === null
      ? undefined
      : this.sectionsByAnchor.get(parentAnchor);
  }

  children(anchor: string): Section[] {
    return this.getSection(anchor)
      .childAnchors.map((child) => this.sectionsByAnchor.get(child))
      .filter((section): section is Section => section !== undefined);
  }

  breadcrumbs(anchor: string): TocEntry[] {
    const trail: TocEntry[] = [];
    let current: Section | undefined = this.getSection(anchor);
    while (current) {
      trail.unshift(toTocEntry(current));
      current =
        current.parentAnchor === null
          ? undefined
          : this.sectionsByAnchor.get(current.parentAnchor);
    }
    return trail;
  }

  codeExamples(filter: CodeExampleFilter = {}): CodeExample[] {
    const language = filter.language?.trim().toLowerCase();
    const sectionAnchor =
      filter.sectionAnchor === undefined
        ? undefined
        : normalizeAnchor(filter.sectionAnchor);

    return this.document.codeExamples.filter(
      (example) =>
        (language === undefined || example.language === language) &&
        (sectionAnchor === undefined || example.sectionAnchor === sectionAnchor),
    );
  }

  search(query: string, options: SearchOptions = {}): SearchMatch[] {
    const terms = query
      .toLowerCase()
      .split(/\s+/)
      .filter((term) => term.length > 0);
    if (terms.length === 0) {
      return [];
    }

    const titleMatches: SearchMatch[] = [];
    const bodyMatches: SearchMatch[] = [];
    for (const section of this.document.sections) {
      const title = section.title.toLowerCase();
      const haystack = `${title}\n${section.body.toLowerCase()}`;
      if (!terms.every((term) => haystack.includes(term))) {
        continue;
      }

      if (terms.every((term) => title.includes(term))) {
        titleMatches.push({ section, matchedTitle: true });
      } else {
        bodyMatches.push({ section, matchedTitle: false });
      }
    }

    const limit = Math.max(0, options.limit ?? DEFAULT_SEARCH_LIMIT);
    return [...titleMatches, ...bodyMatches].slice(0, limit);
  }

  links(): readonly InDocumentLink[] {
    return this.document.links;
  }

  resolveLink(href: string): Section | undefined {
    return resolveLinkTarget(href.trim(), this.document.sections);
  }

  validate(): ValidationReport {
    return validateDocument(this.document);
  }

  renderHtml(options: RenderHtmlOptions = {}): string {
    return renderDocumentHtml(this.document, options);
  }
}
