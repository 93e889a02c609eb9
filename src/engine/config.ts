import type { SearchConfig, ValidationIssue, ValidationReport } from "./types";
import { InvalidConfigError } from "./errors";

function report(issues: ValidationIssue[]): ValidationReport {
  return { ok: !issues.some((i) => i.level === "error"), issues };
}

// Checks every enumeration needs, whatever the predicate
export function validateShape(candidates: readonly number[], size: number): ValidationReport {
  const issues: ValidationIssue[] = [];
  if (!Number.isInteger(size) || size <= 0) {
    issues.push({ level: "error", message: `size must be a positive integer (got ${size})` });
  }
  if (candidates.length === 0) {
    issues.push({ level: "error", message: "candidates must not be empty" });
  }
  return report(issues);
}

/** Full check for the sum-bounded problem. */
export function validateConfig(config: SearchConfig): ValidationReport {
  const { candidates, bound, size } = config;
  const issues = [...validateShape(candidates, size).issues];

  const seen = new Set<number>();
  for (const v of candidates) {
    if (!Number.isInteger(v)) {
      issues.push({ level: "error", message: `candidate ${v} is not an integer` });
    } else if (v < 0) {
      // Sum pruning is unsound once a later slot can lower the total
      issues.push({ level: "error", message: `candidate ${v} is negative` });
    }
    if (seen.has(v)) {
      issues.push({ level: "warning", message: `candidate ${v} is listed more than once` });
    }
    seen.add(v);
  }

  if (!Number.isInteger(bound)) {
    issues.push({ level: "error", message: `bound must be an integer (got ${bound})` });
  } else if (bound < 0) {
    issues.push({ level: "warning", message: `bound ${bound} is negative, no vector can satisfy it` });
  }

  return report(issues);
}

/** Logs warnings and throws the errors, if any, as one {@link InvalidConfigError} */
export function assertValid(result: ValidationReport): void {
  for (const issue of result.issues) {
    if (issue.level === "warning") console.warn(`Search config: ${issue.message}`);
  }
  if (result.ok) return;
  throw new InvalidConfigError(result.issues.filter((i) => i.level === "error"));
}

export function assertValidConfig(config: SearchConfig): void {
  assertValid(validateConfig(config));
}
