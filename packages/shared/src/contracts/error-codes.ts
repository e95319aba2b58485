export const ERROR_CODES = {
  SECTION_NOT_FOUND: "SECTION_NOT_FOUND",
  SECTION_PATH_NOT_FOUND: "SECTION_PATH_NOT_FOUND",
  DOCUMENT_NOT_FOUND: "DOCUMENT_NOT_FOUND",
  DOCUMENT_UNREADABLE: "DOCUMENT_UNREADABLE",
  DOCUMENT_INVALID: "DOCUMENT_INVALID",
  INVALID_ANCHOR: "INVALID_ANCHOR",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];
