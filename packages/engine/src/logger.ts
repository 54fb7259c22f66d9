import { pino, type Logger } from "pino";

export type { Logger };

const root = pino({
  name: "blockduel",
  level: process.env.LOG_LEVEL ?? "info",
});

/** Child logger tagged with the component name. */
export function createLogger(component: string): Logger {
  return root.child({ component });
}
