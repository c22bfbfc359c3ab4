import { describe, it, expect } from "vitest";
import { StrategyKind, type GameEvent } from "@propertysim/engine";
import { MatchProcess, createDefaultPlayers, runMatch } from "../src/MatchProcess";

describe("createDefaultPlayers", () => {
  it("should seat one player per strategy in declaration order", () => {
    const players = createDefaultPlayers(() => 0);
    expect(players.map(p => p.name)).toEqual([
      "Impulsive Player",
      "Demanding Player",
      "Cautious Player",
      "Random Player",
    ]);
    expect(players.map(p => p.id)).toEqual([0, 1, 2, 3]);
    expect(players.every(p => p.balance === 300 && p.position === 0)).toBe(true);
  });

  it("should follow a custom order", () => {
    const players = createDefaultPlayers(() => 0, [StrategyKind.CAUTIOUS, StrategyKind.IMPULSIVE]);
    expect(players.map(p => p.strategy.kind)).toEqual([StrategyKind.CAUTIOUS, StrategyKind.IMPULSIVE]);
  });
});

describe("MatchProcess", () => {
  it("should build the whole match from its seed", () => {
    const a = new MatchProcess({ seed: 99 });
    const b = new MatchProcess({ seed: 99 });
    expect(a.engine.state.board.properties.map(p => [p.cost, p.rent]))
      .toEqual(b.engine.state.board.properties.map(p => [p.cost, p.rent]));
    expect(a.run().players).toEqual(b.run().players);
  });

  it("should forward events to onEvent", () => {
    const types: GameEvent["type"][] = [];
    new MatchProcess({ seed: 5, maxRounds: 1, onEvent: e => types.push(e.type) }).run();
    expect(types[0]).toBe("gameStarted");
    expect(types[types.length - 1]).toBe("gameEnded");
  });
});

describe("runMatch", () => {
  it("should reduce a match to its record", () => {
    const record = runMatch(1234);
    const result = new MatchProcess({ seed: 1234 }).run();
    expect(record).toEqual({
      seed: 1234,
      winnerStrategy: result.winnerStrategy,
      rounds: result.rounds,
      timedOut: result.timedOut,
    });
  });
});
