import { readFileSync } from "node:fs";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { rateLimit } from "express-rate-limit";
import { z, ZodError } from "zod";
import { GameConfigurationError, InvalidGameStateError } from "@propertysim/engine";
import type { GameMasterConfig } from "./config";
import type { Logger } from "./logger";
import type { Simulator } from "./Simulator";

const SERVICE_NAME = "propertysim-gamemaster";

const packageSchema = z.object({ version: z.string() });
const { version: SERVICE_VERSION } = packageSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")),
);

const simulateBodySchema = z.object({
  seed: z.number().int().min(0).max(0xffffffff).optional(),
});

function statsBodySchema(config: GameMasterConfig) {
  return z.object({
    numSimulations: z.number().int().min(1).max(config.batch.maxSize).default(config.batch.defaultSize),
    seed: z.string().regex(/^0x[0-9a-fA-F]{64}$/, "seed must be a bytes32 hex string").optional(),
  });
}

/**
 * Build the HTTP app around a simulator. Does not listen; index.ts does.
 */
export function createApp(simulator: Simulator, config: GameMasterConfig, logger: Logger): Express {
  const statsBody = statsBodySchema(config);
  const app = express();
  app.use(express.json());

  // CORS for local development
  app.use((req, res, next) => {
    res.header("Access-Control-Allow-Origin", "*");
    res.header("Access-Control-Allow-Headers", "Content-Type");
    res.header("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    if (req.method === "OPTIONS") { res.sendStatus(200); return; }
    next();
  });

  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`);
    next();
  });

  if (config.rateLimit.enabled) {
    const { requests, windowSeconds } = config.rateLimit;
    app.use(rateLimit({
      windowMs: windowSeconds * 1000,
      limit: requests,
      standardHeaders: true,
      legacyHeaders: false,
      handler: (req, res) => {
        logger.warn(`${req.method} ${req.path} rate limited for ${req.ip}`);
        res.status(429).json({
          error: "RateLimitExceeded",
          detail: `Too many requests. Limit is ${requests} per ${windowSeconds}s.`,
          retry_after: windowSeconds,
        });
      },
    }));
  }

  app.get("/health", (_req, res) => {
    res.json({
      status: "ok",
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      parallel: {
        enabled: simulator.parallel.enabled,
        maxWorkers: simulator.parallel.maxWorkers,
      },
    });
  });

  // Play one match and return its outcome and final standings
  app.post("/game/simulate", (req, res, next) => {
    try {
      const body = simulateBodySchema.parse(req.body);
      res.json(simulator.runSingleMatch(body.seed));
    } catch (err) {
      next(err);
    }
  });

  // Play a batch and return aggregate statistics per strategy
  app.post("/game/stats", async (req, res, next) => {
    try {
      const body = statsBody.parse(req.body);
      const result = await simulator.runBatch(body.numSimulations, { seed: body.seed });
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  app.use((req, res) => {
    res.status(404).json({ error: "NotFound", message: `No route for ${req.method} ${req.path}` });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof ZodError) {
      logger.warn(`${req.method} ${req.path} rejected: ${err.message}`);
      res.status(400).json({ error: "ValidationError", message: "Invalid request body", issues: err.issues });
      return;
    }
    if (err instanceof SyntaxError) {
      logger.warn(`${req.method} ${req.path} rejected: malformed JSON`);
      res.status(400).json({ error: "ValidationError", message: "Malformed JSON body", issues: [] });
      return;
    }
    if (err instanceof GameConfigurationError) {
      logger.warn(`${req.method} ${req.path} rejected: ${err.message}`);
      res.status(400).json({ error: err.name, message: err.message });
      return;
    }
    if (err instanceof InvalidGameStateError) {
      logger.warn(`${req.method} ${req.path} conflict: ${err.message}`);
      res.status(409).json({ error: err.name, message: err.message });
      return;
    }
    logger.error(`${req.method} ${req.path} failed:`, err);
    res.status(500).json({ error: "InternalError", message: err instanceof Error ? err.message : "Unexpected error" });
  });

  return app;
}
