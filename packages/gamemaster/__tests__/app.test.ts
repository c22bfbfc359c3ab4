import type { Server } from "node:http";
import { once } from "node:events";
import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { createApp } from "../src/app";
import { loadConfig } from "../src/config";
import { createLogger } from "../src/logger";
import { Simulator } from "../src/Simulator";

const SEED = "0x" + "cd".repeat(32);

const config = loadConfig({
  ENABLE_PARALLEL: "false",
  DEFAULT_BATCH_SIZE: "20",
  MAX_BATCH_SIZE: "50",
  RATE_LIMIT_ENABLED: "false",
});
const logger = createLogger("test", "error");
const simulator = new Simulator({ parallel: config.parallel, logger });

let server: Server;
let baseUrl: string;

async function listen(target: Server): Promise<string> {
  await once(target, "listening");
  const address = target.address();
  if (address === null || typeof address === "string") throw new Error("Server has no TCP address");
  return `http://127.0.0.1:${address.port}`;
}

beforeAll(async () => {
  server = createApp(simulator, config, logger).listen(0, "127.0.0.1");
  baseUrl = await listen(server);
});

afterAll(async () => {
  server.close();
  await once(server, "close");
});

function post(path: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("GET /health", () => {
  it("should report the service and its parallel settings", async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "ok",
      service: "propertysim-gamemaster",
      version: "1.0.0",
      parallel: { enabled: false, maxWorkers: config.parallel.maxWorkers },
    });
  });
});

describe("POST /game/simulate", () => {
  it("should play the match for a given seed", async () => {
    const res = await post("/game/simulate", { seed: 42 });
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual(JSON.parse(JSON.stringify(simulator.runSingleMatch(42))));
  });

  it("should play a match without a body", async () => {
    const res = await fetch(`${baseUrl}/game/simulate`, { method: "POST" });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ players: ["impulsive", "demanding", "cautious", "random"] });
  });

  it("should reject an invalid seed", async () => {
    const res = await post("/game/simulate", { seed: -1 });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ error: "ValidationError", message: "Invalid request body" });
  });
});

describe("POST /game/stats", () => {
  it("should run a batch with the given size and seed", async () => {
    const res = await post("/game/stats", { numSimulations: 5, seed: SEED });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      totalSimulations: 5,
      seed: SEED,
      numWorkers: 1,
      parallelizationEnabled: false,
    });
  });

  it("should fall back to the default batch size", async () => {
    const res = await post("/game/stats", {});
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ totalSimulations: 20 });
  });

  it("should reject sizes outside 1..MAX_BATCH_SIZE", async () => {
    for (const numSimulations of [0, 51, 2.5]) {
      const res = await post("/game/stats", { numSimulations });
      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "ValidationError" });
    }
  });

  it("should reject a seed that is not bytes32 hex", async () => {
    const res = await post("/game/stats", { numSimulations: 1, seed: "0x12" });
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      error: "ValidationError",
      issues: [{ path: ["seed"], message: "seed must be a bytes32 hex string" }],
    });
  });

  it("should reject malformed JSON", async () => {
    const res = await fetch(`${baseUrl}/game/stats`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: "ValidationError", message: "Malformed JSON body", issues: [] });
  });
});

describe("unknown routes", () => {
  it("should answer 404", async () => {
    const res = await fetch(`${baseUrl}/nope`);
    expect(res.status).toBe(404);
    expect(await res.json()).toMatchObject({ error: "NotFound" });
  });
});

describe("rate limiting", () => {
  const limited = loadConfig({ ENABLE_PARALLEL: "false", RATE_LIMIT_REQUESTS: "2", RATE_LIMIT_WINDOW_SECONDS: "60" });
  let limitedServer: Server;
  let limitedUrl: string;

  beforeAll(async () => {
    limitedServer = createApp(simulator, limited, logger).listen(0, "127.0.0.1");
    limitedUrl = await listen(limitedServer);
  });

  afterAll(async () => {
    limitedServer.close();
    await once(limitedServer, "close");
  });

  it("should answer 429 once a client exceeds its window", async () => {
    expect((await fetch(`${limitedUrl}/health`)).status).toBe(200);
    expect((await fetch(`${limitedUrl}/health`)).status).toBe(200);

    const res = await fetch(`${limitedUrl}/health`);
    expect(res.status).toBe(429);
    expect(await res.json()).toEqual({
      error: "RateLimitExceeded",
      detail: "Too many requests. Limit is 2 per 60s.",
      retry_after: 60,
    });
  });
});
