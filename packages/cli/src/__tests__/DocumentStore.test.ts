import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { DocumentStore, joinLines, splitLines } from "../documents/DocumentStore.js";

test("splitLines drops one trailing newline and joinLines restores it", () => {
  assert.deepEqual(splitLines("a\r\nb\n"), ["a", "b"]);
  assert.deepEqual(splitLines("a\n\n"), ["a", ""]);
  assert.deepEqual(splitLines(""), [""]);
  assert.equal(joinLines(["a", "b"]), "a\nb\n");
});

test("write keeps a timestamped backup of the previous content", async () => {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "reqforge-store-"));
  try {
    const store = new DocumentStore(dir, () => new Date("2026-03-04T09:30:00.000Z"));
    const first = await store.write("docs/req.md", ["first"]);
    assert.equal(first.path, path.join(dir, "docs", "req.md"));
    assert.equal(first.backupPath, undefined);

    const second = await store.write("docs/req.md", ["second"]);
    assert.equal(second.backupPath, path.join(dir, ".reqforge", "backups", "req.md.2026-03-04T09-30-00-000Z.bak"));
    assert.equal(await fs.readFile(second.backupPath ?? "", "utf8"), "first\n");
    assert.deepEqual(await store.read("docs/req.md"), ["second"]);

    const unbacked = await store.write("docs/req.md", ["third"], { backup: false });
    assert.equal(unbacked.backupPath, undefined);
    assert.equal(await store.exists("docs/other.md"), false);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
});
