export interface CodeExample {
  readonly language: string | null;
  readonly code: string;
  readonly startLine: number;
  readonly endLine: number;
  readonly sectionAnchor: string | null;
}
