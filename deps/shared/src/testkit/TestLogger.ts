import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";
import { LoggerConsole, defaultEmojiMap } from "~shared/Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
      ],
      { default: "error" }
    ),
  })
);

/** 測試預設只印 error，需要時以 TEST_LOG_LEVEL 打開 */
export function buildTestLogger() {
  const { TEST_LOG_LEVEL } = getTestLoggerConfig();
  return new LoggerConsole(TEST_LOG_LEVEL, [], {}, defaultEmojiMap);
}
