import { STRATEGY_ORDER, StrategyKind } from "@propertysim/engine";
import type { MatchRecord } from "./MatchProcess";

// ========== TALLY ==========

export interface StrategyTally {
  wins: number;
  /** Wins decided by the round cap rather than by elimination */
  timeoutWins: number;
  /** Sum of match lengths over the matches this strategy won */
  roundsWhenWon: number;
}

/**
 * Mergeable partial aggregate of a set of matches. Every field is a plain
 * sum, so tallies from any split of a batch merge to the same totals.
 */
export interface BatchTally {
  matches: number;
  timeouts: number;
  totalRounds: number;
  noWinner: number;
  strategies: Record<StrategyKind, StrategyTally>;
}

function perStrategy(make: (kind: StrategyKind) => StrategyTally): Record<StrategyKind, StrategyTally> {
  return {
    [StrategyKind.IMPULSIVE]: make(StrategyKind.IMPULSIVE),
    [StrategyKind.DEMANDING]: make(StrategyKind.DEMANDING),
    [StrategyKind.CAUTIOUS]: make(StrategyKind.CAUTIOUS),
    [StrategyKind.RANDOM]: make(StrategyKind.RANDOM),
  };
}

export function emptyTally(): BatchTally {
  return {
    matches: 0,
    timeouts: 0,
    totalRounds: 0,
    noWinner: 0,
    strategies: perStrategy(() => ({ wins: 0, timeoutWins: 0, roundsWhenWon: 0 })),
  };
}

/** Returns a new tally with `record` counted in. */
export function recordMatch(tally: BatchTally, record: MatchRecord): BatchTally {
  const winner = record.winnerStrategy;
  return {
    matches: tally.matches + 1,
    timeouts: tally.timeouts + (record.timedOut ? 1 : 0),
    totalRounds: tally.totalRounds + record.rounds,
    noWinner: tally.noWinner + (winner === null ? 1 : 0),
    strategies: perStrategy(kind => {
      const s = tally.strategies[kind];
      if (kind !== winner) return { ...s };
      return {
        wins: s.wins + 1,
        timeoutWins: s.timeoutWins + (record.timedOut ? 1 : 0),
        roundsWhenWon: s.roundsWhenWon + record.rounds,
      };
    }),
  };
}

export function mergeTallies(a: BatchTally, b: BatchTally): BatchTally {
  return {
    matches: a.matches + b.matches,
    timeouts: a.timeouts + b.timeouts,
    totalRounds: a.totalRounds + b.totalRounds,
    noWinner: a.noWinner + b.noWinner,
    strategies: perStrategy(kind => ({
      wins: a.strategies[kind].wins + b.strategies[kind].wins,
      timeoutWins: a.strategies[kind].timeoutWins + b.strategies[kind].timeoutWins,
      roundsWhenWon: a.strategies[kind].roundsWhenWon + b.strategies[kind].roundsWhenWon,
    })),
  };
}

export function tallyRecords(records: Iterable<MatchRecord>): BatchTally {
  let tally = emptyTally();
  for (const record of records) {
    tally = recordMatch(tally, record);
  }
  return tally;
}

// ========== SUMMARY ==========

export interface StrategyStatistics {
  strategy: StrategyKind;
  wins: number;
  winRate: number;
  /** Batch-wide timed-out matches, repeated on every row */
  timeouts: number;
  /** This strategy's wins that were decided by timeout */
  timeoutWins: number;
  /** 0 when the strategy never won */
  avgRoundsWhenWon: number;
}

export interface BatchResult {
  totalSimulations: number;
  timeouts: number;
  timeoutRate: number;
  avgRounds: number;
  noWinnerMatches: number;
  strategyStatistics: StrategyStatistics[];
  mostWinningStrategy: StrategyKind | null;
  executionTimeSeconds: number;
  simulationsPerSecond: number;
  parallelizationEnabled: boolean;
  numWorkers: number;
  seed: string;
}

export interface RunInfo {
  executionTimeSeconds: number;
  parallelizationEnabled: boolean;
  numWorkers: number;
  seed: string;
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function summarizeTally(tally: BatchTally, run: RunInfo): BatchResult {
  const total = tally.matches;

  const strategyStatistics = STRATEGY_ORDER.map(strategy => {
    const s = tally.strategies[strategy];
    return {
      strategy,
      wins: s.wins,
      winRate: ratio(s.wins, total),
      timeouts: tally.timeouts,
      timeoutWins: s.timeoutWins,
      avgRoundsWhenWon: ratio(s.roundsWhenWon, s.wins),
    };
  });

  // Strictly more wins to take the lead: ties stay with the earlier strategy
  let mostWinningStrategy: StrategyKind | null = null;
  let mostWins = 0;
  for (const stats of strategyStatistics) {
    if (stats.wins > mostWins) {
      mostWins = stats.wins;
      mostWinningStrategy = stats.strategy;
    }
  }

  return {
    totalSimulations: total,
    timeouts: tally.timeouts,
    timeoutRate: ratio(tally.timeouts, total),
    avgRounds: ratio(tally.totalRounds, total),
    noWinnerMatches: tally.noWinner,
    strategyStatistics,
    mostWinningStrategy,
    executionTimeSeconds: run.executionTimeSeconds,
    simulationsPerSecond: ratio(total, run.executionTimeSeconds),
    parallelizationEnabled: run.parallelizationEnabled,
    numWorkers: run.numWorkers,
    seed: run.seed,
  };
}
