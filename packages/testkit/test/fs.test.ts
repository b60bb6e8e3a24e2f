import { describe, it, expect } from "vitest";
import { readFile, stat } from "node:fs/promises";
import { join } from "node:path";
import { createTempDir, removeDir, withTempDir, writeFixture } from "../src/index.js";

describe("fs helpers", () => {
  it("should remove the temp directory after the callback", async () => {
    let seen = "";
    const result = await withTempDir(async (dir) => {
      seen = dir;
      await writeFixture(dir, "pairs.json", [["a", 1]]);
      return "done";
    });

    expect(result).toBe("done");
    await expect(stat(seen)).rejects.toThrow();
  });

  it("should remove the temp directory when the callback throws", async () => {
    let seen = "";
    await expect(
      withTempDir(async (dir) => {
        seen = dir;
        throw new Error("boom");
      })
    ).rejects.toThrow("boom");

    await expect(stat(seen)).rejects.toThrow();
  });

  it("should write JSON and raw text fixtures", async () => {
    const dir = await createTempDir();
    try {
      const json = await writeFixture(dir, "a.json", { a: 1 });
      const text = await writeFixture(dir, "b.json", "{not json");

      expect(json).toBe(join(dir, "a.json"));
      expect(await readFile(json, "utf8")).toBe('{\n  "a": 1\n}\n');
      expect(await readFile(text, "utf8")).toBe("{not json");
    } finally {
      await removeDir(dir);
    }
  });
});
