import type { Feasible, PartialAssignment } from "./types";

/** Sum of the assigned slots; unassigned slots contribute nothing */
export function partialSum(assignment: PartialAssignment): number {
  let sum = 0;
  for (const slot of assignment) {
    if (slot.kind === "assigned") sum += slot.value;
  }
  return sum;
}

/**
 * Feasibility predicate for the sum-bounded problem: true while the assigned
 * prefix sums to at most `bound`.
 *
 * Pruning on this predicate is only sound for non-negative candidates. A
 * prefix that already exceeds the bound can never come back under it when
 * every later addition is >= 0.
 */
export function sumWithinBound(bound: number): Feasible {
  return (assignment) => partialSum(assignment) <= bound;
}
