import type { SearchConfig, SearchStats, Solution } from "./types";
import { DEFAULT_CONFIG, createStats } from "./types";
import { assertValidConfig } from "./config";
import { enumerate } from "./enumerator";
import { sumWithinBound } from "./predicate";

export class BoundedSearch {
  readonly config: SearchConfig;
  private stats: SearchStats = createStats();

  constructor(config: Partial<SearchConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config = { ...merged, candidates: [...merged.candidates] };
    assertValidConfig(this.config);
  }

  /** Counters from the most recent run, including one abandoned part way */
  get lastStats(): SearchStats {
    return { ...this.stats };
  }

  // Fresh search per call; the config was already checked (and warned about) once
  solutions(): Generator<Solution, void, undefined> {
    this.stats = createStats();
    const { candidates, bound, size } = this.config;
    return enumerate(candidates, sumWithinBound(bound), size, { stats: this.stats });
  }

  collect(): Solution[] {
    return [...this.solutions()];
  }

  count(): number {
    let total = 0;
    for (const _ of this.solutions()) total++;
    return total;
  }

  /** First `limit` solutions; the rest of the tree is never visited. A limit that is not a positive integer takes none. */
  take(limit: number): Solution[] {
    const out: Solution[] = [];
    if (!Number.isInteger(limit) || limit <= 0) return out;
    for (const solution of this.solutions()) {
      out.push(solution);
      if (out.length >= limit) break;
    }
    return out;
  }
}
