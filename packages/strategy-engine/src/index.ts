export * from "./signalEngine";
export * from "./positionTracker";
