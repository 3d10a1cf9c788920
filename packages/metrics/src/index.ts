export * from "./metricsSchema";
export * from "./tradeStats";
export * from "./performanceTracker";
export * from "./formatCSV";
