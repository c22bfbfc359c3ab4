import { GameConfigurationError } from "./errors";
import { Board, Property } from "./models";
import {
  BOARD_SIZE, type IntegerDraw,
  MAX_PROPERTY_COST, MAX_PROPERTY_RENT, MIN_PROPERTY_COST, MIN_PROPERTY_RENT,
} from "./types";

export type Range = readonly [min: number, max: number];

export interface BoardOptions {
  size?: number;
  costRange?: Range;
  rentRange?: Range;
}

export interface PropertySpec {
  cost: number;
  rent: number;
}

/**
 * Generate a fresh board: `size` properties whose cost and rent are drawn
 * independently and uniformly from the closed ranges.
 */
export function generateBoard(draw: IntegerDraw, options: BoardOptions = {}): Board {
  const size = options.size ?? BOARD_SIZE;
  const [minCost, maxCost] = options.costRange ?? [MIN_PROPERTY_COST, MAX_PROPERTY_COST];
  const [minRent, maxRent] = options.rentRange ?? [MIN_PROPERTY_RENT, MAX_PROPERTY_RENT];

  if (!Number.isInteger(size) || size < 1) {
    throw new GameConfigurationError(`Board size must be a positive integer, got ${size}`);
  }
  checkRange("cost", minCost, maxCost, 1);
  checkRange("rent", minRent, maxRent, 0);

  const specs: PropertySpec[] = [];
  for (let i = 0; i < size; i++) {
    specs.push({ cost: draw(minCost, maxCost), rent: draw(minRent, maxRent) });
  }
  return createBoard(specs);
}

/** Build a board from fixed cost/rent pairs, in position order. */
export function createBoard(specs: PropertySpec[]): Board {
  return new Board(specs.map((s, i) => new Property(i, s.cost, s.rent)));
}

function checkRange(label: string, min: number, max: number, floor: number): void {
  if (!Number.isInteger(min) || !Number.isInteger(max)) {
    throw new GameConfigurationError(`${label} range bounds must be integers, got [${min}, ${max}]`);
  }
  if (min < floor) {
    throw new GameConfigurationError(`${label} range minimum must be at least ${floor}, got ${min}`);
  }
  if (min > max) {
    throw new GameConfigurationError(`${label} range is empty: [${min}, ${max}]`);
  }
}
