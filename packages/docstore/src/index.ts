export {
  AnchorRegistry,
  DEFAULT_ANCHOR,
  normalizeAnchor,
  slugifyHeading,
} from "./anchors";
export {
  DocumentInvalidError,
  DocumentNotFoundError,
  DocumentStoreError,
  DocumentUnreadableError,
  InvalidAnchorError,
  isDocumentStoreError,
  SectionNotFoundError,
  SectionPathNotFoundError,
} from "./errors";
export {
  BUNDLED_DOCUMENT_PATH,
  loadDocumentStore,
  readDocumentSource,
} from "./load";
export {
  detectCodeLanguage,
  type ParsedDocument,
  parseMarkdown,
} from "./parse";
export {
  escapeHtml,
  type RenderHtmlOptions,
  type RenderSectionOptions,
  renderDocumentHtml,
  renderSectionMarkdown,
  renderTableOfContentsHtml,
  sanitizeHref,
} from "./render";
export {
  type CodeExampleFilter,
  DocumentStore,
  type DocumentStoreOptions,
  HEADING_PATH_SEPARATOR,
  parseHeadingPath,
  type SearchMatch,
  type SearchOptions,
} from "./store";
export {
  buildTableOfContents,
  nestTableOfContents,
  resolveLink,
  type TocNode,
} from "./toc";
export { assertValidDocument, validateDocument } from "./validate";
