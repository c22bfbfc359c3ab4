import { StrategyKind } from "@propertysim/engine";
import { z } from "zod";

// IPC messages between the Simulator and its forked workers

const strategyTallySchema = z.object({
  wins: z.number().int().nonnegative(),
  timeoutWins: z.number().int().nonnegative(),
  roundsWhenWon: z.number().int().nonnegative(),
});

export const batchTallySchema = z.object({
  matches: z.number().int().nonnegative(),
  timeouts: z.number().int().nonnegative(),
  totalRounds: z.number().int().nonnegative(),
  noWinner: z.number().int().nonnegative(),
  strategies: z.object({
    [StrategyKind.IMPULSIVE]: strategyTallySchema,
    [StrategyKind.DEMANDING]: strategyTallySchema,
    [StrategyKind.CAUTIOUS]: strategyTallySchema,
    [StrategyKind.RANDOM]: strategyTallySchema,
  }),
});

/** Play matches `start` (inclusive) to `end` (exclusive) of the batch. */
const runBatchRequestSchema = z.object({
  type: z.literal("run_batch"),
  batchSeed: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
  maxRounds: z.number().int().positive().optional(),
});

const shutdownRequestSchema = z.object({
  type: z.literal("shutdown"),
});

export const workerRequestSchema = z.discriminatedUnion("type", [runBatchRequestSchema, shutdownRequestSchema]);

export const workerResponseSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("batch_complete"), tally: batchTallySchema }),
  z.object({ type: z.literal("error"), error: z.string() }),
]);

export type RunBatchRequest = z.infer<typeof runBatchRequestSchema>;
export type WorkerRequest = z.infer<typeof workerRequestSchema>;
export type WorkerResponse = z.infer<typeof workerResponseSchema>;
