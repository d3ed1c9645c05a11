import { describe, it, expect } from "@jest/globals";
import { SeededRNG, chance, clamp, randomHexId, weightedChoice } from "@/lib/rng";
import { CHANNEL_WEIGHTS } from "@/lib/funnel-tables";

describe("SeededRNG", () => {
  it("follows the Park–Miller recurrence", () => {
    const rng = new SeededRNG(42);
    expect(rng.next()).toBeCloseTo((42 * 16807 - 1) / 2147483646, 12);
  });

  it("replays the same sequence for the same seed", () => {
    const a = new SeededRNG(7);
    const b = new SeededRNG(7);
    const seqA = Array.from({ length: 50 }, () => a.next());
    const seqB = Array.from({ length: 50 }, () => b.next());
    expect(seqA).toEqual(seqB);
  });

  it("maps a zero seed onto a usable state", () => {
    expect(new SeededRNG(0).next()).toBe(new SeededRNG(1).next());
  });

  it("keeps int() within inclusive bounds and reaches both ends", () => {
    const rng = new SeededRNG(3);
    const seen = new Set<number>();
    for (let i = 0; i < 2000; i++) {
      const v = rng.int(3, 7);
      expect(v).toBeGreaterThanOrEqual(3);
      expect(v).toBeLessThanOrEqual(7);
      seen.add(v);
    }
    expect([...seen].sort()).toEqual([3, 4, 5, 6, 7]);
  });

  it("returns byte values from bytes()", () => {
    const bytes = new SeededRNG(9).bytes(64);
    expect(bytes).toHaveLength(64);
    expect(bytes.every(b => Number.isInteger(b) && b >= 0 && b <= 255)).toBe(true);
  });

  it("refuses to pick from an empty list", () => {
    expect(() => new SeededRNG(1).pick([])).toThrow(RangeError);
  });
});

describe("weightedChoice", () => {
  it("never returns a zero-weight outcome", () => {
    const rng = new SeededRNG(11);
    for (let i = 0; i < 500; i++) {
      expect(weightedChoice(rng, [["never", 0], ["always", 1]])).toBe("always");
    }
  });

  it("tracks the table's proportions", () => {
    const rng = new SeededRNG(2024);
    const n = 20000;
    let organic = 0;
    for (let i = 0; i < n; i++) {
      if (weightedChoice(rng, CHANNEL_WEIGHTS) === "organic") organic++;
    }
    expect(organic / n).toBeGreaterThan(0.28);
    expect(organic / n).toBeLessThan(0.32);
  });

  it("throws on a table without positive weight", () => {
    const rng = new SeededRNG(1);
    expect(() => weightedChoice(rng, [])).toThrow(RangeError);
    expect(() => weightedChoice(rng, [["a", 0]])).toThrow(RangeError);
  });
});

describe("chance / clamp", () => {
  it("clamps probabilities before drawing", () => {
    const rng = new SeededRNG(5);
    for (let i = 0; i < 200; i++) {
      expect(chance(rng, 1)).toBe(true);
      expect(chance(rng, 1.7)).toBe(true);
      expect(chance(rng, 0)).toBe(false);
      expect(chance(rng, -0.3)).toBe(false);
    }
  });

  it("clamps to [0, 1] by default", () => {
    expect(clamp(-0.2)).toBe(0);
    expect(clamp(0.4)).toBe(0.4);
    expect(clamp(1.2)).toBe(1);
    expect(clamp(15, 0, 10)).toBe(10);
  });
});

describe("randomHexId", () => {
  it("produces a 32-char v4 hex id that replays with the seed", () => {
    const id = randomHexId(new SeededRNG(42));
    expect(id).toMatch(/^[0-9a-f]{32}$/);
    expect(id[12]).toBe("4");
    expect(randomHexId(new SeededRNG(42))).toBe(id);
  });
});
