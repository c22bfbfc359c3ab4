import { describe, it, expect } from "vitest";
import { createBoard, generateBoard } from "../src/BoardGenerator";
import { createMatchRandomness } from "../src/random";
import { GameConfigurationError } from "../src/errors";

describe("generateBoard", () => {
  it("should draw 20 properties within the default ranges", () => {
    for (let seed = 1; seed <= 20; seed++) {
      const board = generateBoard(createMatchRandomness(seed).randomInt);
      expect(board.size).toBe(20);
      board.properties.forEach((p, i) => {
        expect(p.position).toBe(i);
        expect(p.cost).toBeGreaterThanOrEqual(50);
        expect(p.cost).toBeLessThanOrEqual(200);
        expect(p.rent).toBeGreaterThanOrEqual(10);
        expect(p.rent).toBeLessThanOrEqual(100);
        expect(p.owner).toBeNull();
      });
    }
  });

  it("should draw cost then rent for each property in order", () => {
    const calls: Array<[number, number]> = [];
    const board = generateBoard((min, max) => {
      calls.push([min, max]);
      return min;
    }, { size: 2 });

    expect(calls).toEqual([[50, 200], [10, 100], [50, 200], [10, 100]]);
    expect(board.properties.map(p => [p.cost, p.rent])).toEqual([[50, 10], [50, 10]]);
  });

  it("should honour custom sizes and ranges", () => {
    const board = generateBoard((min, max) => max, { size: 5, costRange: [10, 20], rentRange: [0, 3] });
    expect(board.size).toBe(5);
    expect(board.propertyAt(4).cost).toBe(20);
    expect(board.propertyAt(4).rent).toBe(3);
  });

  it("should reject invalid options", () => {
    const draw = (min: number) => min;
    expect(() => generateBoard(draw, { size: 0 })).toThrow(GameConfigurationError);
    expect(() => generateBoard(draw, { costRange: [0, 10] })).toThrow(GameConfigurationError);
    expect(() => generateBoard(draw, { costRange: [20, 10] })).toThrow(GameConfigurationError);
    expect(() => generateBoard(draw, { rentRange: [-1, 10] })).toThrow(GameConfigurationError);
    expect(() => generateBoard(draw, { rentRange: [1.5, 10] })).toThrow(GameConfigurationError);
  });
});

describe("createBoard", () => {
  it("should place fixed specs in position order", () => {
    const board = createBoard([{ cost: 60, rent: 5 }, { cost: 70, rent: 6 }]);
    expect(board.propertyAt(0).cost).toBe(60);
    expect(board.propertyAt(1).rent).toBe(6);
  });
});
