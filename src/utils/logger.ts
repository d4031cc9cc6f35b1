import pino from "pino";
import type { LevelWithSilent, Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: LevelWithSilent;
  pretty?: boolean;
}

/**
 * Creates the process logger. Output goes to stderr so the MCP stdio transport
 * keeps stdout for protocol frames.
 */
export function createLogger(options: LoggerOptions): Logger {
  const base = {
    level: options.level,
    base: { service: "adaptive-answer-agent" },
    formatters: {
      level: (label: string) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
  };

  if (options.pretty) {
    return pino({
      ...base,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,service",
          destination: 2,
        },
      },
    });
  }

  return pino(base, pino.destination(2));
}

export function createComponentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

export const silentLogger: Logger = pino({ level: "silent" });
