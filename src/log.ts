import pino from "pino";

export type PipelineLogger = {
  debug: (obj: Record<string, unknown>, msg?: string) => void;
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
};

export function createLogger(name?: string): pino.Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const isTest = process.env.NODE_ENV === "test";
  return pino({
    ...(name ? { name } : {}),
    level: process.env.LOG_LEVEL ?? (isTest ? "silent" : isDev ? "debug" : "info"),
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDev && !isTest && process.env.PINO_PRETTY === "1"
      ? {
          transport: {
            target: "pino-pretty",
            options: {
              colorize: true,
              singleLine: true,
              translateTime: "SYS:standard",
              ignore: "pid,hostname",
            },
          },
        }
      : {}),
  });
}

export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
