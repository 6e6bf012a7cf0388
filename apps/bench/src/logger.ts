import { pino, type Logger } from "pino";

export type BenchLogger = Pick<Logger, "info" | "warn" | "error" | "debug">;

export function createLogger(level: string = "info"): Logger {
  return pino({
    name: "bench",
    level: process.env.NODE_ENV === "test" ? "silent" : level
  });
}
