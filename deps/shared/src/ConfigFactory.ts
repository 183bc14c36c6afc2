import { type StaticDecode, type TObject, Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";

type Env = Record<string, string | undefined>;

/**
 * 建立從環境變數讀取設定的工廠。
 * 只取 schema 中宣告的欄位，空字串視為未設定；不合法的值直接丟出錯誤。
 */
export function buildConfigFactoryEnv<T extends TObject>(schema: T) {
  return (env: Env = process.env): StaticDecode<T> => {
    const picked: Record<string, string> = {};
    for (const key of Object.keys(schema.properties)) {
      const value = env[key];
      if (value !== undefined && value !== "") picked[key] = value;
    }
    const withDefaults = Value.Default(schema, picked);
    const errors = [...Value.Errors(schema, withDefaults)];
    if (errors.length > 0) {
      const detail = errors
        .map((e) => `${e.path.replace(/^\//, "")}: ${e.message}`)
        .join("; ");
      throw new Error(`環境變數設定錯誤: ${detail}`);
    }
    return Value.Decode(schema, withDefaults);
  };
}

export function envBoolean() {
  return t
    .Transform(
      t.Union([t.Literal("true"), t.Literal("false"), t.Literal("1"), t.Literal("0")])
    )
    .Decode((value) => value === "true" || value === "1")
    .Encode((value): "true" | "false" => (value ? "true" : "false"));
}
