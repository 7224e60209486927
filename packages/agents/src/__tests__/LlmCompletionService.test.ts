import test from "node:test";
import assert from "node:assert/strict";
import { Logger, type DraftRequest } from "@reqforge/shared";
import type { ChatAdapter, ChatRequest, ChatResult } from "../adapters/AdapterTypes.js";
import { AdapterError } from "../adapters/AdapterTypes.js";
import { LlmCompletionService } from "../CompletionService/LlmCompletionService.js";
import { ProfileLoader, defaultProfilesDir } from "../profiles/ProfileLoader.js";

class ScriptedAdapter implements ChatAdapter {
  readonly name = "scripted";
  readonly requests: ChatRequest[] = [];

  constructor(private readonly outputs: string[]) {}

  async complete(request: ChatRequest): Promise<ChatResult> {
    this.requests.push(request);
    const output = this.outputs.shift();
    if (output === undefined) throw new Error("no scripted output left");
    return { output, adapter: this.name, model: "test-model" };
  }
}

const request: DraftRequest = {
  sectionId: "problem_statement",
  docType: "requirements",
  currentBody: "",
  priorContext: {},
  profile: "requirements",
  outputFormat: "prose",
  subsections: [],
};

const serviceWith = (adapter: ScriptedAdapter) =>
  new LlmCompletionService({
    adapter,
    profiles: new ProfileLoader(defaultProfilesDir()),
    logger: Logger.silent(),
    maxTokens: 800,
  });

test("draft and integrate return adapter output as-is", async () => {
  const adapter = new ScriptedAdapter(["Imports fail nightly.", "Imports fail nightly for ops."]);
  const service = serviceWith(adapter);
  assert.equal(await service.draft(request), "Imports fail nightly.");
  assert.equal(
    await service.integrate({ ...request, targetId: "problem_statement", answeredQuestions: [] }),
    "Imports fail nightly for ops.",
  );
  assert.equal(adapter.requests[0]?.maxTokens, 800);
  const system = adapter.requests[0]?.messages[0];
  assert.equal(system?.role, "system");
  assert.ok(system?.content.startsWith("# Base Policy"));
  assert.ok(system?.content.includes("\n\n---\n\n# Requirements Authoring Profile"));
});

test("generateQuestions and review parse structured output", async () => {
  const adapter = new ScriptedAdapter([
    '```json\n{"questions": [{"question": "Who is affected?", "rationale": "scope"}]}\n```',
    '{"pass": true, "issues": [], "patches": [], "summary": "Fine"}',
  ]);
  const service = serviceWith(adapter);
  assert.deepEqual(await service.generateQuestions({ ...request, existingQuestions: [] }), [
    { question: "Who is affected?", target: "problem_statement", rationale: "scope" },
  ]);
  assert.deepEqual(
    await service.review({
      gateId: "review_gate:coherence_check",
      docType: "requirements",
      sectionContents: {},
      rules: [],
      profile: "requirements_review",
    }),
    { passed: true, issues: [], patches: [], summary: "Fine" },
  );
});

test("unparseable question output is an adapter error", async () => {
  const service = serviceWith(new ScriptedAdapter(["I cannot help with that."]));
  await assert.rejects(
    () => service.generateQuestions({ ...request, existingQuestions: [] }),
    (error: unknown) => error instanceof AdapterError && error.code === "invalid_response",
  );
});
