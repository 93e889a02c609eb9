import type {
  EnumerateOptions,
  Feasible,
  SearchStats,
  Slot,
  Solution,
} from "./types";
import { UNASSIGNED, createStats } from "./types";
import { assertValid, validateConfig, validateShape } from "./config";
import { sumWithinBound } from "./predicate";

// One buffer per top-level enumeration; never shared between calls
class SearchState {
  readonly candidates: readonly number[];
  readonly feasible: Feasible;
  readonly size: number;
  readonly stats: SearchStats;
  readonly slots: Slot[];

  constructor(candidates: readonly number[], feasible: Feasible, size: number, stats: SearchStats) {
    this.candidates = candidates;
    this.feasible = feasible;
    this.size = size;
    this.stats = stats;
    this.slots = new Array<Slot>(size).fill(UNASSIGNED);
  }

  snapshot(): Solution {
    const values: number[] = [];
    for (const slot of this.slots) {
      if (slot.kind === "assigned") values.push(slot.value);
    }
    return Object.freeze(values);
  }
}

// Explicit stack: cursor[p] is the index of the next candidate to try at p
function* extend(state: SearchState): Generator<Solution, void, undefined> {
  const { candidates, slots, stats } = state;
  const last = state.size - 1;
  const cursor: number[] = [0];

  while (cursor.length > 0) {
    const position = cursor.length - 1;
    const index = cursor[position];

    if (index >= candidates.length) {
      // Backing out: everything at or after this depth reads as unassigned again
      slots[position] = UNASSIGNED;
      cursor.pop();
      continue;
    }
    cursor[position] = index + 1;

    slots[position] = { kind: "assigned", value: candidates[index] };
    stats.nodes++;
    if (!state.feasible(slots)) {
      stats.prunes++;
      continue;
    }

    if (position === last) {
      stats.solutions++;
      yield state.snapshot();
    } else {
      cursor.push(0);
    }
  }
}

/**
 * Depth-first enumeration of every full assignment the predicate accepts at
 * each prefix length.
 *
 * Candidates are tried in order, so solutions come out in the lexicographic
 * order that order induces. Input is checked immediately, not on first pull:
 * an empty candidate list or a non-positive size throws
 * {@link InvalidConfigError}. Errors raised by `feasible` propagate out of
 * the iterator and end the search.
 */
export function enumerate(
  candidates: readonly number[],
  feasible: Feasible,
  size: number,
  options: EnumerateOptions = {},
): Generator<Solution, void, undefined> {
  assertValid(validateShape(candidates, size));
  const state = new SearchState([...candidates], feasible, size, options.stats ?? createStats());
  return extend(state);
}

/** All length-`size` vectors over `candidates` whose sum is at most `bound`. */
export function enumerateBounded(
  candidates: readonly number[],
  bound: number,
  size: number,
  options: EnumerateOptions = {},
): Generator<Solution, void, undefined> {
  assertValid(validateConfig({ candidates: [...candidates], bound, size }));
  return enumerate(candidates, sumWithinBound(bound), size, options);
}
