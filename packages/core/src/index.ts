/**
 * Shared contracts, configuration and logging for the intraday strategy
 * packages. Everything else in the monorepo depends on these primitives.
 */
export * from "./types";
export * from "./time";
export * from "./context";
export * from "./errors";
export * from "./events";
export * from "./config";
export * from "./env";
export * from "./utils/logger";
