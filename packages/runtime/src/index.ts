export * from "./types";
export * from "./loop/buildIndicatorSnapshot";
export * from "./intradayStrategyRuntime";
export * from "./runtimeFactory";
export * from "./replay/replaySchema";
export * from "./replay/replayTypes";
export * from "./replay/replayRunner";
