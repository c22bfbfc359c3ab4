/**
 * Worker script for parallel batches. Runs as a child process via
 * child_process.fork(); the Simulator adds the tsx loader when it forks the
 * TypeScript source.
 */

import { SeedDeriver } from "@propertysim/engine";
import { emptyTally, recordMatch } from "./aggregate";
import { runMatch } from "./MatchProcess";
import { workerRequestSchema, type RunBatchRequest, type WorkerResponse } from "./protocol";

function reply(message: WorkerResponse): void {
  process.send?.(message);
}

function runChunk(request: RunBatchRequest): WorkerResponse {
  try {
    const deriver = new SeedDeriver(request.batchSeed);
    let tally = emptyTally();
    for (let i = request.start; i < request.end; i++) {
      tally = recordMatch(tally, runMatch(deriver.matchSeed(i), { maxRounds: request.maxRounds }));
    }
    return { type: "batch_complete", tally };
  } catch (error) {
    return { type: "error", error: error instanceof Error ? error.message : String(error) };
  }
}

process.on("message", (msg: unknown) => {
  const parsed = workerRequestSchema.safeParse(msg);
  if (!parsed.success) {
    reply({ type: "error", error: `Malformed request: ${parsed.error.message}` });
    return;
  }

  if (parsed.data.type === "shutdown") {
    process.exit(0);
  } else {
    reply(runChunk(parsed.data));
  }
});
