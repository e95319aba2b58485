export interface InDocumentLink {
  readonly text: string;
  readonly href: string;
  readonly anchor: string;
  readonly line: number;
}
