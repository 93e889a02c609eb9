import YAML from "yaml";
import type { SearchConfig } from "./types";
import { DEFAULT_CONFIG } from "./types";
import { ProblemParseError } from "./errors";

export interface ParsedProblem {
  name?: string;
  config: SearchConfig;
}

const KNOWN_KEYS = new Set(["name", "days", "maxTotal", "perSlot", "perSlotMax"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readInteger(raw: Record<string, unknown>, key: string, fallback: number): number {
  const value = raw[key];
  if (value === undefined) return fallback;
  if (typeof value !== "number" || !Number.isInteger(value)) {
    throw new ProblemParseError(`${key} must be an integer`);
  }
  return value;
}

function readCandidates(raw: Record<string, unknown>): number[] {
  const list = raw.perSlot;
  const max = raw.perSlotMax;
  if (list !== undefined && max !== undefined) {
    throw new ProblemParseError("perSlot and perSlotMax are mutually exclusive");
  }

  if (list !== undefined) {
    if (!Array.isArray(list)) {
      throw new ProblemParseError("perSlot must be a list of integers");
    }
    return list.map((v: unknown, i) => {
      if (typeof v !== "number" || !Number.isInteger(v)) {
        throw new ProblemParseError(`perSlot[${i}] must be an integer`);
      }
      return v;
    });
  }

  if (max !== undefined) {
    const top = readInteger(raw, "perSlotMax", 0);
    return Array.from({ length: Math.max(top + 1, 0) }, (_, i) => i);
  }

  return [...DEFAULT_CONFIG.candidates];
}

/**
 * Reads a schedule problem from YAML.
 *
 * `days` becomes the vector size, `maxTotal` the bound, and `perSlot` (or
 * `0..perSlotMax`) the candidate values. Missing fields take their defaults.
 * Only the shape is checked here; value rules live in `validateConfig`.
 */
export function parseProblem(text: string): ParsedProblem {
  let raw: unknown;
  try {
    raw = YAML.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ProblemParseError(`Invalid YAML: ${reason}`);
  }
  if (raw === null || raw === undefined) raw = {};
  if (!isRecord(raw)) {
    throw new ProblemParseError("Problem must be a mapping");
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) console.warn(`Ignoring unknown problem key "${key}"`);
  }

  const name = raw.name;
  if (name !== undefined && typeof name !== "string") {
    throw new ProblemParseError("name must be a string");
  }

  return {
    name,
    config: {
      candidates: readCandidates(raw),
      bound: readInteger(raw, "maxTotal", DEFAULT_CONFIG.bound),
      size: readInteger(raw, "days", DEFAULT_CONFIG.size),
    },
  };
}
