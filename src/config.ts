import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const getRenameConfig = buildConfigFactoryEnv(
  t.Object({
    RENAME_ROOT: t.Optional(t.String()),
    RENAME_DEFAULT_STATUS: t.Optional(
      t.Union([t.Literal("success"), t.Literal("failure")])
    ),
  })
);
