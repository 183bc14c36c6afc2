import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";

import type { EmojiMap } from "./Logger";
import { LoggerConsole } from "./LoggerConsole";
import { RfsTransport } from "./RfsTransport";

export * from "./Logger";
export { LoggerConsole } from "./LoggerConsole";
export { RfsTransport } from "./RfsTransport";

export const defaultEmojiMap: EmojiMap = {
  start: "🏁",
  done: "✅",
  trace: "🔍",
  debug: "🐛",
  info: "ℹ️",
  warn: "⚠️",
  error: "❌",
};

const getLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "info" }
    ),
    LOG_FILE: t.Optional(t.String()),
  })
);

export function createDefaultLoggerFromEnv() {
  const { LOG_LEVEL, LOG_FILE } = getLoggerConfig();
  const logger = new LoggerConsole(LOG_LEVEL, [], {}, defaultEmojiMap);
  if (LOG_FILE) {
    logger.attachTransport(new RfsTransport({ filename: LOG_FILE }));
  }
  return logger;
}
