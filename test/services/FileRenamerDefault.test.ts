import { mkdir, readFile, readdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { describe, expect, test } from "vitest";

import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { FileRenamerDefault } from "@/services/FileRenamer";

const tmpDir = "test/tmp/renamer";

describe("FileRenamerDefault", () => {
  test("改名成功", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(join(tmpDir, "from.jpg"), "from");

    const renamer = new FileRenamerDefault();
    const result = await renamer.rename(
      join(tmpDir, "from.jpg"),
      join(tmpDir, "to.jpg")
    );

    expectOk(result);
    expect(await readdir(tmpDir)).toEqual(["to.jpg"]);
  });

  test("目標已存在時不覆蓋", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(join(tmpDir, "from.jpg"), "from");
    await writeFile(join(tmpDir, "to.jpg"), "to");

    const renamer = new FileRenamerDefault();
    const result = await renamer.rename(
      join(tmpDir, "from.jpg"),
      join(tmpDir, "to.jpg")
    );

    expectErr(result);
    expect(result.error.type).toBe("DESTINATION_EXISTS");
    expect(await readFile(join(tmpDir, "to.jpg"), "utf8")).toBe("to");
  });

  test("來源不存在 → RENAME_FAILED 並保留原因", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });

    const renamer = new FileRenamerDefault();
    const result = await renamer.rename(
      join(tmpDir, "missing.jpg"),
      join(tmpDir, "to.jpg")
    );

    expectErr(result);
    expect(result.error.type).toBe("RENAME_FAILED");
    expect(result.error.message).toContain("ENOENT");
  });

  test("exists 能判斷檔案與資料夾", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "dir"), { recursive: true });

    const renamer = new FileRenamerDefault();
    expect(await renamer.exists(join(tmpDir, "dir"))).toBe(true);
    expect(await renamer.exists(join(tmpDir, "nope"))).toBe(false);
  });
});
