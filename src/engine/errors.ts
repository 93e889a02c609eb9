import type { ValidationIssue } from "./types";

export class InvalidConfigError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(`Invalid search config: ${issues.map((i) => i.message).join("; ")}`);
    this.name = "InvalidConfigError";
    this.issues = issues;
  }
}

export class ProblemParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProblemParseError";
  }
}
