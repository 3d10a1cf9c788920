export * from "./riskManager";
