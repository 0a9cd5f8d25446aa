import { createLogger } from "@sigflow/core";

export const runtimeLogger = createLogger("signal-runtime");
