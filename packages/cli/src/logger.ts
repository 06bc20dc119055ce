/**
 * Structured logging with pino. Log lines go to stderr so stdout only ever
 * carries the rendered schema.
 */

import pino, { type Logger } from "pino";

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

const LEVELS: readonly LogLevel[] = ["trace", "debug", "info", "warn", "error", "fatal", "silent"];

function isLogLevel(value: string): value is LogLevel {
  return (LEVELS as readonly string[]).includes(value);
}

/**
 * Level from LOG_LEVEL, falling back to "warn".
 */
export function getLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) return envLevel;
  return "warn";
}

export function createLogger(component: string, level: LogLevel = getLogLevel()): Logger {
  return pino({ name: component, level }, pino.destination(2));
}
