import type { ValidationCode } from "../contracts/validation-codes";

export type ValidationSeverity = "error" | "warning";

export interface ValidationIssue {
  code: ValidationCode;
  severity: ValidationSeverity;
  message: string;
  line: number;
  anchor?: string;
}

export interface ValidationReport {
  valid: boolean;
  issues: ValidationIssue[];
}
