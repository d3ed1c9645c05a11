// ─── Seeded Random Source ───────────────────────────────────────────────────
// Every sampling call in the generator takes its random source as an argument;
// nothing reads a process-wide generator.

import { v4 as uuidv4 } from "uuid";

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  pick<T>(arr: readonly T[]): T;
  bytes(n: number): number[];
}

/** Park–Miller minimal standard generator. */
export class SeededRNG implements RandomSource {
  private s: number;
  constructor(seed: number) { this.s = Math.abs(Math.floor(seed)) % 2147483647 || 1; }
  next(): number { this.s = (this.s * 16807) % 2147483647; return (this.s - 1) / 2147483646; }
  int(min: number, max: number): number { return Math.floor(this.next() * (max - min + 1)) + min; }
  pick<T>(arr: readonly T[]): T {
    if (arr.length === 0) throw new RangeError("Cannot pick from an empty list");
    return arr[Math.floor(this.next() * arr.length)];
  }
  bytes(n: number): number[] { return Array.from({ length: n }, () => this.int(0, 255)); }
}

export function clamp(x: number, a = 0, b = 1): number { return Math.max(a, Math.min(b, x)); }

// ─── Weighted sampling ──────────────────────────────────────────────────────

/** Outcome → weight entries. Weights need not sum to 1. */
export type Weighted<T> = ReadonlyArray<readonly [outcome: T, weight: number]>;

export function weightedChoice<T>(rng: RandomSource, table: Weighted<T>): T {
  const total = table.reduce((s, [, w]) => s + Math.max(0, w), 0);
  if (table.length === 0 || total <= 0) throw new RangeError("Weighted table has no positive weight");
  const r = rng.next() * total;
  let cum = 0;
  for (const [outcome, w] of table) {
    if (w <= 0) continue;
    cum += w;
    if (r < cum) return outcome;
  }
  // float drift on the last bucket
  for (let i = table.length - 1; i >= 0; i--) {
    if (table[i][1] > 0) return table[i][0];
  }
  return table[table.length - 1][0];
}

/** Bernoulli draw; the probability is clamped to [0, 1] first. */
export function chance(rng: RandomSource, p: number): boolean {
  return rng.next() < clamp(p);
}

// ─── Identifiers ────────────────────────────────────────────────────────────

/** 32 hex chars of a v4 UUID built from the source's bytes, so ids replay with the seed. */
export function randomHexId(rng: RandomSource): string {
  return uuidv4({ random: rng.bytes(16) }).replace(/-/g, "");
}
