/**
 * Error types raised by the optimizer core and its configuration layer.
 */

export type ValidationIssue = {
  path: string;
  message: string;
};

function formatIssues(issues: ValidationIssue[]): string {
  return issues.map((i) => (i.path ? `${i.path}: ${i.message}` : i.message)).join("; ");
}

/** A resource sample or threshold set failed its structural invariants. */
export class ValidationError extends Error {
  readonly code = "VALIDATION";
  readonly issues: ValidationIssue[];
  readonly resourceId?: string;

  constructor(issues: ValidationIssue[], resourceId?: string) {
    const prefix = resourceId ? `Invalid sample "${resourceId}"` : "Invalid input";
    super(`${prefix}: ${formatIssues(issues)}`);
    this.name = "ValidationError";
    this.issues = issues;
    this.resourceId = resourceId;
  }
}

/** The resolved configuration did not pass schema validation. */
export class ConfigError extends Error {
  readonly code = "CONFIG";
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[], source?: string) {
    super(`Invalid configuration${source ? ` (${source})` : ""}: ${formatIssues(issues)}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
