import { createLogger } from "@intraday/core";

export const runtimeLogger = createLogger("runtime");
