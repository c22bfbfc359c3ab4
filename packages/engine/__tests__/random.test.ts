import { describe, it, expect } from "vitest";
import { createDiceRoller, createMatchRandomness, mulberry32, randomInt } from "../src/random";
import { SeedDeriver, randomBatchSeed } from "../src/SeedDeriver";
import { GameConfigurationError } from "../src/errors";

const SEED = "0x" + "ab".repeat(32);

describe("mulberry32", () => {
  it("should repeat the same stream for the same seed", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    for (let i = 0; i < 100; i++) {
      expect(a()).toBe(b());
    }
  });

  it("should stay within [0, 1)", () => {
    const rng = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("randomInt", () => {
  it("should map the extremes of the source onto the closed range", () => {
    expect(randomInt(() => 0, 10, 20)).toBe(10);
    expect(randomInt(() => 0.999999, 10, 20)).toBe(20);
  });
});

describe("createDiceRoller", () => {
  it("should roll every face of a six-sided die and nothing else", () => {
    const roll = createDiceRoller(mulberry32(99));
    const seen = new Set<number>();
    for (let i = 0; i < 1000; i++) {
      const r = roll();
      expect(Number.isInteger(r)).toBe(true);
      expect(r).toBeGreaterThanOrEqual(1);
      expect(r).toBeLessThanOrEqual(6);
      seen.add(r);
    }
    expect(seen.size).toBe(6);
  });
});

describe("createMatchRandomness", () => {
  it("should be deterministic per seed", () => {
    const a = createMatchRandomness(5);
    const b = createMatchRandomness(5);
    for (let i = 0; i < 20; i++) {
      expect(a.rollDie()).toBe(b.rollDie());
      expect(a.randomInt(50, 200)).toBe(b.randomInt(50, 200));
      expect(a.chance()).toBe(b.chance());
    }
  });

  it("should keep dice independent of the other streams", () => {
    const plain = createMatchRandomness(5);
    const busy = createMatchRandomness(5);
    for (let i = 0; i < 10; i++) {
      busy.chance();
      busy.randomInt(1, 10);
    }
    for (let i = 0; i < 20; i++) {
      expect(busy.rollDie()).toBe(plain.rollDie());
    }
  });
});

describe("SeedDeriver", () => {
  it("should reject invalid seeds", () => {
    expect(() => new SeedDeriver("bad")).toThrow(GameConfigurationError);
    expect(() => new SeedDeriver("0x123")).toThrow(GameConfigurationError);
  });

  it("should normalise the seed to lowercase", () => {
    const upper = new SeedDeriver("0x" + "AB".repeat(32));
    expect(upper.seed).toBe(SEED);
    expect(upper.matchSeed(3)).toBe(new SeedDeriver(SEED).matchSeed(3));
  });

  it("should derive deterministic uint32 match seeds", () => {
    const a = new SeedDeriver(SEED);
    const b = new SeedDeriver(SEED);
    for (let i = 0; i < 50; i++) {
      const s = a.matchSeed(i);
      expect(s).toBe(b.matchSeed(i));
      expect(Number.isInteger(s)).toBe(true);
      expect(s).toBeGreaterThanOrEqual(0);
      expect(s).toBeLessThanOrEqual(0xffffffff);
    }
    expect(a.matchSeed(0)).not.toBe(a.matchSeed(1));
  });

  it("should reject a negative or fractional index", () => {
    const d = new SeedDeriver(SEED);
    expect(() => d.matchSeed(-1)).toThrow(GameConfigurationError);
    expect(() => d.matchSeed(0.5)).toThrow(GameConfigurationError);
  });

  it("should produce valid random batch seeds", () => {
    const seed = randomBatchSeed();
    expect(seed).toMatch(/^0x[0-9a-f]{64}$/);
    expect(() => new SeedDeriver(seed)).not.toThrow();
  });
});
