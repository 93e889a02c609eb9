export type Slot =
  | { readonly kind: "assigned"; readonly value: number }
  | { readonly kind: "unassigned" };

export type PartialAssignment = readonly Slot[];

// Fully assigned, frozen copy handed to the caller
export type Solution = readonly number[];

/** Decides whether a partial assignment can still extend to a full solution */
export type Feasible = (assignment: PartialAssignment) => boolean;

export interface SearchStats {
  nodes: number;     // predicate calls
  prunes: number;    // extensions the predicate rejected
  solutions: number;
}

export interface EnumerateOptions {
  stats?: SearchStats;
}

export interface SearchConfig {
  candidates: number[];
  bound: number;
  size: number;
}

export interface ValidationIssue {
  level: "warning" | "error";
  message: string;
}

export interface ValidationReport {
  ok: boolean;
  issues: ValidationIssue[];
}

// Shared by every buffer, so it must stay frozen
export const UNASSIGNED: Slot = Object.freeze({ kind: "unassigned" });

/** Default config: up to ten events spread over a week, 0..9 per day */
export const DEFAULT_CONFIG: SearchConfig = {
  candidates: [0, 1, 2, 3, 4, 5, 6, 7, 8, 9],
  bound: 10,
  size: 7,
};

export function createStats(): SearchStats {
  return { nodes: 0, prunes: 0, solutions: 0 };
}
