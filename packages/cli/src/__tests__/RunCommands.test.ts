import test from "node:test";
import assert from "node:assert/strict";
import { promises as fs } from "node:fs";
import path from "node:path";
import { RunCommands, parseRunArgs } from "../commands/run/RunCommands.js";
import { SILENT_ENV, StubCompletion, captureLogs, fixedNow, withWorkspace } from "./CliTestUtils.js";

const REPAIR = "subsection:open_questions, table:open_questions in section 'risks_open_issues'";

const depsFor = (cwd: string) => ({
  cwd,
  env: SILENT_ENV,
  completion: new StubCompletion("Nightly imports fail for the ops team."),
  now: fixedNow,
});

test("parseRunArgs reads flags and rejects unknown ones", () => {
  const parsed = parseRunArgs(["--doc", "req.md", "--until-blocked", "--max-steps", "3", "--log-level", "debug"]);
  assert.equal(parsed.docPath, "req.md");
  assert.equal(parsed.untilBlocked, true);
  assert.equal(parsed.maxSteps, 3);
  assert.equal(parsed.logLevel, "debug");
  assert.throws(() => parseRunArgs(["--max-steps", "0"]), /Invalid --max-steps: expected a positive integer\./);
  assert.throws(() => parseRunArgs(["--frobnicate"]), /^Error: Unknown option for run: --frobnicate/);
});

test("run advances one step, writes the document and keeps a backup", async () => {
  await withWorkspace(async (dir) => {
    const original = await fs.readFile(path.join(dir, "requirements.md"), "utf8");
    const { result, logs } = await captureLogs(() => RunCommands.run(["--doc", "requirements.md"], depsFor(dir)));
    const backup = path.join(dir, ".reqforge", "backups", "requirements.md.2026-03-04T09-30-00-000Z.bak");
    const runLog = path.join(dir, ".reqforge", "logs", "run-2026-03-04T09-30-00-000Z.jsonl");
    assert.deepEqual(logs, [
      [
        "Document: requirements.md (requirements)",
        `Repaired: ${REPAIR}`,
        "- problem_statement: integration [changed]",
        "    Integrated 1 answer(s) into 'problem_statement'",
        "Wrote requirements.md",
        `Backup: ${backup}`,
        `Run log: ${runLog}`,
      ].join("\n"),
    ]);
    assert.equal(result?.blocked, false);
    assert.deepEqual(result?.repairs, [REPAIR]);
    assert.equal(await fs.readFile(backup, "utf8"), original);

    const updated = (await fs.readFile(path.join(dir, "requirements.md"), "utf8")).split("\n");
    assert.ok(updated.includes("Nightly imports fail for the ops team."));
    assert.ok(updated.includes("| problem_statement-Q1 | Who is affected? | 2026-01-05 | The ops team | Resolved |"));
    assert.ok(updated.includes("<!-- table:open_questions -->"));

    const events = (await fs.readFile(runLog, "utf8"))
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    assert.deepEqual(
      events.map((event) => (typeof event === "object" && event !== null && "type" in event ? event.type : undefined)),
      ["run_started", "repair", "workflow_step", "run_finished"],
    );
  });
});

test("dry runs until blocked report JSON and leave the file alone", async () => {
  await withWorkspace(async (dir) => {
    const docPath = path.join(dir, "requirements.md");
    const original = await fs.readFile(docPath, "utf8");
    const { result, logs } = await captureLogs(() =>
      RunCommands.run(["--doc", "requirements.md", "--until-blocked", "--dry-run", "--json"], depsFor(dir)),
    );
    assert.equal(logs.length, 1);
    assert.ok(logs[0]?.startsWith('{\n  "doc": "requirements.md",\n  "docType": "requirements",'));
    assert.deepEqual(
      result?.steps.map((step) => [step.action, step.blocked]),
      [
        ["integration", false],
        ["no_action", true],
      ],
    );
    assert.deepEqual(result?.steps[1]?.blockedReasons, ["Waiting for 1 questions to be answered"]);
    assert.equal(result?.blocked, true);
    assert.equal(result?.changed, true);
    assert.equal(result?.written, false);
    assert.equal(await fs.readFile(docPath, "utf8"), original);
  });
});

test("a missing document needs a template", async () => {
  await withWorkspace(async (dir) => {
    await assert.rejects(
      () => RunCommands.run(["--doc", "absent.md"], depsFor(dir)),
      (error: unknown) =>
        error instanceof Error &&
        error.message === `Document not found: ${path.join(dir, "absent.md")} (pass --template to create it)`,
    );

    await fs.copyFile(path.join(dir, "requirements.md"), path.join(dir, "template.md"));
    const { result, logs } = await captureLogs(() =>
      RunCommands.run(["--doc", "absent.md", "--template", "template.md"], depsFor(dir)),
    );
    assert.equal(result?.created, true);
    assert.equal(result?.written, true);
    assert.equal(result?.backupPath, undefined);
    assert.equal(logs[0]?.split("\n")[1], "Created from template");
    assert.ok((await fs.readFile(path.join(dir, "absent.md"), "utf8")).includes("Nightly imports fail for the ops team."));
  });
});
