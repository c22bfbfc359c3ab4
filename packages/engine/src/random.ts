import { DIE_FACES, type DiceRoller, type IntegerDraw, type RandomSource } from "./types";

/**
 * Seeded 32-bit PRNG. Same seed, same stream.
 */
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0;
  return function () {
    t += 0x6d2b79f5;
    let x = t;
    x = Math.imul(x ^ (x >>> 15), x | 1);
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: RandomSource, min: number, max: number): number {
  return min + Math.floor(rng() * (max - min + 1));
}

export function createDiceRoller(rng: RandomSource, faces: number = DIE_FACES): DiceRoller {
  return () => randomInt(rng, 1, faces);
}

/** The three random capabilities a match consumes. */
export interface MatchRandomness {
  rollDie: DiceRoller;
  randomInt: IntegerDraw;
  chance: RandomSource;
}

// Stream offsets keep board draws, dice and buy decisions independent of each other.
const BOARD_STREAM = 0x9e3779b9;
const DICE_STREAM = 0x85ebca6b;
const CHANCE_STREAM = 0xc2b2ae35;

export function createMatchRandomness(seed: number): MatchRandomness {
  const boardRng = mulberry32(seed ^ BOARD_STREAM);
  const diceRng = mulberry32(seed ^ DICE_STREAM);
  return {
    rollDie: createDiceRoller(diceRng),
    randomInt: (min, max) => randomInt(boardRng, min, max),
    chance: mulberry32(seed ^ CHANCE_STREAM),
  };
}
