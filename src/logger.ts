import pino, { type Logger } from "pino";

// ── Structured Logger (pino) ─────────────────────────────
// JSON output in production and tests. Pretty output otherwise,
// or whenever LOG_PRETTY=true.

const isProduction = process.env.NODE_ENV === "production";
const isTest = process.env.NODE_ENV === "test";
const isPretty =
  process.env.LOG_PRETTY === "true" ||
  (process.env.LOG_PRETTY !== "false" && !isProduction && !isTest);

export const log = pino({
  name: "chat-memory",
  level: process.env.LOG_LEVEL || "info",
  ...(isPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

export type { Logger };

/** Child logger tagged with the component that emits it. */
export function componentLogger(component: string): Logger {
  return log.child({ component });
}
