export { enumerate, enumerateBounded } from "./enumerator";
export { partialSum, sumWithinBound } from "./predicate";
export {
  validateShape,
  validateConfig,
  assertValidConfig,
} from "./config";
export { parseProblem } from "./problem";
export type { ParsedProblem } from "./problem";
export { BoundedSearch } from "./search";
export { InvalidConfigError, ProblemParseError } from "./errors";
export type {
  Slot,
  PartialAssignment,
  Solution,
  Feasible,
  SearchStats,
  EnumerateOptions,
  SearchConfig,
  ValidationIssue,
  ValidationReport,
} from "./types";
export { DEFAULT_CONFIG, UNASSIGNED, createStats } from "./types";
