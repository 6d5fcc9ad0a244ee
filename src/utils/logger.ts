import pino, { type Logger, type LevelWithSilent } from "pino";

export type { Logger };

export interface LoggerOptions {
  level?: LevelWithSilent;
  name?: string;
}

/**
 * Logs go to stderr: stdout carries the MCP stdio transport.
 */
export function createLogger({ level = "info", name = "k8s-fleet-mcp" }: LoggerOptions = {}): Logger {
  return pino({ name, level }, pino.destination({ dest: 2, sync: true }));
}

export const silentLogger: Logger = pino({ level: "silent" });
