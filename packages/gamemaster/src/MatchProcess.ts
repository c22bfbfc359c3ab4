import {
  MatchEngine, Player, STARTING_BALANCE, STRATEGY_ORDER, StrategyKind,
  createMatchRandomness, createStrategy, generateBoard,
  type BoardOptions, type GameEvent, type MatchResult, type RandomSource,
} from "@propertysim/engine";

const PLAYER_NAMES: Record<StrategyKind, string> = {
  [StrategyKind.IMPULSIVE]: "Impulsive Player",
  [StrategyKind.DEMANDING]: "Demanding Player",
  [StrategyKind.CAUTIOUS]: "Cautious Player",
  [StrategyKind.RANDOM]: "Random Player",
};

/** The outcome of one match, reduced to what aggregation needs. */
export interface MatchRecord {
  seed: number;
  winnerStrategy: StrategyKind | null;
  rounds: number;
  timedOut: boolean;
}

export interface MatchProcessConfig {
  seed: number;
  maxRounds?: number;
  board?: BoardOptions;
  /** Turn order; defaults to one player per strategy in declaration order */
  order?: readonly StrategyKind[];
  recordEvents?: boolean;
  onEvent?: (event: GameEvent) => void;
}

/** One player per strategy kind, in `order`, each with the starting balance. */
export function createDefaultPlayers(chance: RandomSource, order: readonly StrategyKind[] = STRATEGY_ORDER): Player[] {
  return order.map((kind, i) => new Player(i, PLAYER_NAMES[kind], createStrategy(kind, chance), STARTING_BALANCE));
}

/**
 * A single match built entirely from one uint32 seed: the board, the dice
 * and the random strategy's coin all come from streams of that seed.
 */
export class MatchProcess {
  readonly seed: number;
  readonly engine: MatchEngine;

  constructor(config: MatchProcessConfig) {
    this.seed = config.seed;
    const random = createMatchRandomness(config.seed);
    const board = generateBoard(random.randomInt, config.board);
    const players = createDefaultPlayers(random.chance, config.order);
    this.engine = new MatchEngine(players, board, random.rollDie, {
      maxRounds: config.maxRounds,
      recordEvents: config.recordEvents,
      onEvent: config.onEvent,
    });
  }

  run(): MatchResult {
    return this.engine.run();
  }
}

/** Play the match for `seed` to the end and reduce it to a record. */
export function runMatch(seed: number, options: Omit<MatchProcessConfig, "seed"> = {}): MatchRecord {
  const result = new MatchProcess({ ...options, seed }).run();
  return {
    seed,
    winnerStrategy: result.winnerStrategy,
    rounds: result.rounds,
    timedOut: result.timedOut,
  };
}
