import type { ChildProcess } from "node:child_process";
import { fork } from "node:child_process";
import { randomInt } from "node:crypto";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import {
  GameConfigurationError, SeedDeriver, randomBatchSeed,
  type EndReason, type PlayerSummary, type StrategyKind,
} from "@propertysim/engine";
import { emptyTally, mergeTallies, recordMatch, summarizeTally, type BatchResult, type BatchTally } from "./aggregate";
import { SimulationError } from "./errors";
import type { Logger } from "./logger";
import { MatchProcess, runMatch } from "./MatchProcess";
import { workerResponseSchema, type RunBatchRequest, type WorkerRequest } from "./protocol";

const SHUTDOWN_GRACE_MS = 500;
const CHUNKS_PER_WORKER = 4;

// Resolve the worker script beside this file; the TypeScript source needs the tsx loader
const __filename = fileURLToPath(import.meta.url);
const sourceExt = path.extname(__filename);
const forkWorkerPath = path.join(path.dirname(__filename), `forkWorker${sourceExt}`);
const workerExecArgv = sourceExt === ".ts" ? ["--import", "tsx"] : [];

export interface SimulatorOptions {
  parallel: {
    enabled: boolean;
    maxWorkers: number;
    minSimulations: number;
  };
  maxRounds?: number;
  logger: Logger;
}

export interface BatchOptions {
  /** bytes32 hex; a random one is drawn when omitted */
  seed?: string;
  /** Overrides the configured worker count for this batch */
  workers?: number;
}

export interface SingleMatchResult {
  winnerStrategy: StrategyKind | null;
  rounds: number;
  timedOut: boolean;
  /** Strategies in turn order */
  players: StrategyKind[];
  endReason: EndReason | null;
  seed: number;
  standings: PlayerSummary[];
}

/**
 * Simulator: runs single matches in-process and batches either in-process
 * or across a pool of forked workers. A batch's aggregates depend only on
 * its seed and size, never on how it was split.
 */
export class Simulator {
  private options: SimulatorOptions;
  private logger: Logger;

  constructor(options: SimulatorOptions) {
    this.options = options;
    this.logger = options.logger;
  }

  get parallel(): SimulatorOptions["parallel"] {
    return this.options.parallel;
  }

  runSingleMatch(seed: number = randomInt(0, 0x100000000)): SingleMatchResult {
    if (!Number.isInteger(seed) || seed < 0 || seed > 0xffffffff) {
      throw new GameConfigurationError(`Match seed must be a uint32, got ${seed}`);
    }
    const result = new MatchProcess({ seed, maxRounds: this.options.maxRounds }).run();
    this.logger.debug(
      `Match seed=${seed} ended after ${result.rounds} rounds, winner=${result.winnerStrategy ?? "none"}`,
    );
    return {
      winnerStrategy: result.winnerStrategy,
      rounds: result.rounds,
      timedOut: result.timedOut,
      players: result.players.map(p => p.strategy),
      endReason: result.endReason,
      seed,
      standings: result.players,
    };
  }

  async runBatch(count: number, options: BatchOptions = {}): Promise<BatchResult> {
    if (!Number.isInteger(count) || count <= 0) {
      throw new GameConfigurationError(`Number of simulations must be a positive integer, got ${count}`);
    }
    const deriver = new SeedDeriver(options.seed ?? randomBatchSeed());
    const workers = this.resolveWorkers(count, options.workers);
    const mode = workers > 1 ? `parallel (${workers} workers)` : "sequential";

    this.logger.info(`Running ${count} matches in ${mode} mode, seed ${deriver.seed}`);
    const started = performance.now();

    const tally = workers > 1
      ? await this.runParallel(deriver.seed, count, workers)
      : this.runSequential(deriver, count);

    const result = summarizeTally(tally, {
      executionTimeSeconds: (performance.now() - started) / 1000,
      parallelizationEnabled: workers > 1,
      numWorkers: workers,
      seed: deriver.seed,
    });

    this.logger.info(
      `Completed ${result.totalSimulations} matches in ${result.executionTimeSeconds.toFixed(2)}s` +
      ` (most wins: ${result.mostWinningStrategy ?? "none"}, timeout rate ${result.timeoutRate.toFixed(3)})`,
    );
    return result;
  }

  // ========== PRIVATE ==========

  private resolveWorkers(count: number, requested?: number): number {
    if (requested !== undefined && (!Number.isInteger(requested) || requested < 1)) {
      throw new GameConfigurationError(`Worker count must be a positive integer, got ${requested}`);
    }
    const { enabled, maxWorkers, minSimulations } = this.options.parallel;
    const workers = requested ?? maxWorkers;
    if (!enabled || workers <= 1 || count < minSimulations) return 1;
    return Math.min(workers, count);
  }

  private runSequential(deriver: SeedDeriver, count: number): BatchTally {
    let tally = emptyTally();
    for (let i = 0; i < count; i++) {
      tally = recordMatch(tally, runMatch(deriver.matchSeed(i), { maxRounds: this.options.maxRounds }));
    }
    return tally;
  }

  private async runParallel(batchSeed: string, count: number, workers: number): Promise<BatchTally> {
    const chunkSize = Math.max(1, Math.ceil(count / (workers * CHUNKS_PER_WORKER)));
    const chunks: Array<{ start: number; end: number }> = [];
    for (let start = 0; start < count; start += chunkSize) {
      chunks.push({ start, end: Math.min(start + chunkSize, count) });
    }

    const pool: ChildProcess[] = [];
    for (let i = 0; i < workers; i++) {
      pool.push(fork(forkWorkerPath, [], { execArgv: workerExecArgv, stdio: "inherit" }));
    }

    // Chunks are handed out round-robin as workers free up
    let nextChunk = 0;
    let failed = false;
    let tally = emptyTally();

    try {
      await Promise.all(
        pool.map(async (worker, w) => {
          while (!failed && nextChunk < chunks.length) {
            const chunk = chunks[nextChunk++];
            try {
              const part = await runWorkerChunk(worker, {
                type: "run_batch",
                batchSeed,
                start: chunk.start,
                end: chunk.end,
                maxRounds: this.options.maxRounds,
              });
              tally = mergeTallies(tally, part);
            } catch (error) {
              failed = true;
              this.logger.error(`Worker ${w} failed on matches ${chunk.start}-${chunk.end - 1}:`, error);
              throw error;
            }
          }
        }),
      );
    } finally {
      await shutdownWorkers(pool);
    }

    return tally;
  }
}

function runWorkerChunk(worker: ChildProcess, request: RunBatchRequest): Promise<BatchTally> {
  return new Promise((resolve, reject) => {
    const cleanup = () => {
      worker.off("message", onMessage);
      worker.off("error", onError);
      worker.off("exit", onExit);
    };

    const onMessage = (msg: unknown) => {
      cleanup();
      const parsed = workerResponseSchema.safeParse(msg);
      if (!parsed.success) {
        reject(new SimulationError(`Malformed worker response: ${parsed.error.message}`));
      } else if (parsed.data.type === "error") {
        reject(new SimulationError(parsed.data.error));
      } else {
        resolve(parsed.data.tally);
      }
    };

    const onError = (err: Error) => {
      cleanup();
      reject(new SimulationError(`Worker error: ${err.message}`));
    };

    const onExit = (code: number | null, signal: NodeJS.Signals | null) => {
      cleanup();
      reject(new SimulationError(`Worker exited before finishing its chunk (code ${code}, signal ${signal})`));
    };

    worker.on("message", onMessage);
    worker.on("error", onError);
    worker.on("exit", onExit);
    send(worker, request);
  });
}

function send(worker: ChildProcess, request: WorkerRequest): void {
  worker.send(request);
}

/** Ask every worker to exit, then kill whatever is still running after the grace period. */
async function shutdownWorkers(workers: ChildProcess[]): Promise<void> {
  await Promise.all(
    workers.map(worker => new Promise<void>(resolve => {
      if (worker.exitCode !== null || worker.signalCode !== null) {
        resolve();
        return;
      }
      const timer = setTimeout(() => worker.kill(), SHUTDOWN_GRACE_MS);
      worker.once("exit", () => {
        clearTimeout(timer);
        resolve();
      });
      if (worker.connected) {
        send(worker, { type: "shutdown" });
      }
    })),
  );
}
