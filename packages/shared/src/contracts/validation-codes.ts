export const VALIDATION_CODES = {
  DEAD_LINK: "DEAD_LINK",
  SKIPPED_HEADING_LEVEL: "SKIPPED_HEADING_LEVEL",
  EMPTY_HEADING: "EMPTY_HEADING",
  DUPLICATE_TITLE: "DUPLICATE_TITLE",
  UNLABELED_CODE_BLOCK: "UNLABELED_CODE_BLOCK",
  MISSING_TITLE: "MISSING_TITLE",
} as const;

export type ValidationCode =
  (typeof VALIDATION_CODES)[keyof typeof VALIDATION_CODES];

export const VALIDATION_SEVERITIES: Record<
  ValidationCode,
  "error" | "warning"
> = {
  DEAD_LINK: "error",
  SKIPPED_HEADING_LEVEL: "error",
  EMPTY_HEADING: "error",
  DUPLICATE_TITLE: "warning",
  UNLABELED_CODE_BLOCK: "warning",
  MISSING_TITLE: "warning",
};
