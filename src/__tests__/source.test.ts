import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { SourceNotFoundError, SourceReadError } from "../errors.js";
import { createSourceStore } from "../source.js";

describe("Source Store", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "linefix-source-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("should load the program text", async () => {
    const filePath = path.join(dir, "gcd.py");
    fs.writeFileSync(filePath, "def gcd(a, b):\n    pass\n", "utf8");
    await expect(createSourceStore().load(filePath)).resolves.toBe(
      "def gcd(a, b):\n    pass\n"
    );
  });

  it("should report a missing file as not found", async () => {
    const filePath = path.join(dir, "missing.py");
    const load = createSourceStore().load(filePath);
    await expect(load).rejects.toThrow(SourceNotFoundError);
    await expect(load).rejects.toThrow(`Could not find file: ${filePath}`);
  });

  it("should report other read failures as read errors", async () => {
    await expect(createSourceStore().load(dir)).rejects.toThrow(SourceReadError);
  });
});
