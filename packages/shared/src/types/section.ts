import type { CodeExample } from "./code-example";

export interface Section {
  readonly anchor: string;
  readonly title: string;
  readonly depth: number;
  readonly headingPath: readonly string[];
  readonly parentAnchor: string | null;
  readonly childAnchors: readonly string[];
  readonly headingLine: number;
  readonly startLine: number;
  readonly endLine: number;
  readonly body: string;
  readonly codeExamples: readonly CodeExample[];
}

export interface TocEntry {
  readonly title: string;
  readonly anchor: string;
  readonly depth: number;
}
