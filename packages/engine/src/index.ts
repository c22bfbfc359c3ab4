export * from "./types";
export * from "./errors";
export * from "./models";
export * from "./random";
export * from "./strategies";
export * from "./BoardGenerator";
export * from "./MatchEngine";
export { SeedDeriver, randomBatchSeed } from "./SeedDeriver";
