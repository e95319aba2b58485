import {
  ERROR_CODES,
  type ErrorCode,
  type ValidationIssue,
} from "@handbook/shared";

export class DocumentStoreError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "DocumentStoreError";
    this.code = code;
  }
}

export class SectionNotFoundError extends DocumentStoreError {
  readonly anchor: string;

  constructor(anchor: string) {
    super(ERROR_CODES.SECTION_NOT_FOUND, `section not found: #${anchor}`);
    this.name = "SectionNotFoundError";
    this.anchor = anchor;
  }
}

export class SectionPathNotFoundError extends DocumentStoreError {
  readonly path: string;
  readonly matches: number;

  constructor(path: string, matches: number) {
    super(
      ERROR_CODES.SECTION_PATH_NOT_FOUND,
      matches === 0
        ? `no section matches heading path "${path}"`
        : `heading path "${path}" is ambiguous (${matches} sections match)`,
    );
    this.name = "SectionPathNotFoundError";
    this.path = path;
    this.matches = matches;
  }
}

export class InvalidAnchorError extends DocumentStoreError {
  readonly value: string;

  constructor(value: string, reason: string, options?: ErrorOptions) {
    super(
      ERROR_CODES.INVALID_ANCHOR,
      `invalid anchor "${value}": ${reason}`,
      options,
    );
    this.name = "InvalidAnchorError";
    this.value = value;
  }
}

export class DocumentNotFoundError extends DocumentStoreError {
  readonly path: string;

  constructor(path: string, cause: Error) {
    super(ERROR_CODES.DOCUMENT_NOT_FOUND, `document not found at ${path}`, {
      cause,
    });
    this.name = "DocumentNotFoundError";
    this.path = path;
  }
}

export class DocumentUnreadableError extends DocumentStoreError {
  readonly path: string;

  constructor(path: string, cause: Error) {
    super(ERROR_CODES.DOCUMENT_UNREADABLE, `failed to read document ${path}`, {
      cause,
    });
    this.name = "DocumentUnreadableError";
    this.path = path;
  }
}

export class DocumentInvalidError extends DocumentStoreError {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    const errors = issues.filter((issue) => issue.severity === "error");
    super(
      ERROR_CODES.DOCUMENT_INVALID,
      `document failed validation with ${errors.length} error(s)`,
    );
    this.name = "DocumentInvalidError";
    this.issues = issues;
  }
}

export function isDocumentStoreError(
  error: unknown,
): error is DocumentStoreError {
  return error instanceof DocumentStoreError;
}
