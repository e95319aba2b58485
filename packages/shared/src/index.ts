export {
  ERROR_CODES,
  type ErrorCode,
  VALIDATION_CODES,
  VALIDATION_SEVERITIES,
  type ValidationCode,
} from "./contracts";
export type { CodeExample } from "./types/code-example";
export type { InDocumentLink } from "./types/link";
export type { Section, TocEntry } from "./types/section";
export type {
  ValidationIssue,
  ValidationReport,
  ValidationSeverity,
} from "./types/validation";
