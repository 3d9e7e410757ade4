import { pino } from "pino";

export type TriageLogger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
};

export type TriageLogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export function createTriageLogger(params: { level?: TriageLogLevel } = {}): TriageLogger {
  return pino({
    name: "healthbud",
    level: params.level ?? "info",
    redact: {
      // keys travel in headers and, for gemini, in the request URL
      paths: ["apiKey", "*.apiKey", "headers.authorization", "headers.Authorization", "url"],
      censor: "[REDACTED]",
    },
  });
}

export const silentTriageLogger: TriageLogger = {
  info() {},
  warn() {},
  error() {},
};
