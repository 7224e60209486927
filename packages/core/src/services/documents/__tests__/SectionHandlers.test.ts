import test from "node:test";
import assert from "node:assert/strict";
import { buildGenericSectionPolicy } from "../../config/PolicyRegistry.js";
import { PLACEHOLDER_TOKEN } from "../markers/MarkerGrammar.js";
import { QuestionLedger } from "../questions/QuestionLedger.js";
import { handleSection } from "../workflow/SectionHandlers.js";
import { buildDocument, contentSection, documentControl, documentHeader, indexOfLine, questionRow } from "./DocumentFixtures.js";
import { FakeCompletion, stepContext } from "./FakeCompletion.js";

const policyFor = (sectionId: string) => buildGenericSectionPolicy("requirements", sectionId);

const blankProblem = (questions: string[] = []) =>
  buildDocument(["problem_statement"], contentSection("problem_statement", "1. Problem Statement", { questions }));

test("a blank section with no prior context asks questions instead of drafting", async () => {
  const completion = new FakeCompletion({
    questions: [
      { question: "Who is affected?", target: "", rationale: "scope" },
      { question: "How often does it fail?", target: "", rationale: "impact" },
    ],
  });
  const result = await handleSection(
    blankProblem(),
    "problem_statement",
    policyFor("problem_statement"),
    stepContext(completion, ["problem_statement"]),
  );
  assert.equal(completion.drafts.length, 0);
  assert.equal(result.action, "question_gen");
  assert.equal(result.changed, true);
  assert.equal(result.blocked, false);
  assert.equal(result.questionsGenerated, 2);
  assert.deepEqual(result.summaries, ["Generated 2 question(s) for 'problem_statement'"]);
  const questions = QuestionLedger.forSection("problem_statement").questionsOrEmpty(result.lines);
  assert.deepEqual(
    questions.map((question) => [question.questionId, question.question, question.date, question.status]),
    [
      ["problem_statement-Q1", "Who is affected?", "2026-03-04", "Open"],
      ["problem_statement-Q2", "How often does it fail?", "2026-03-04", "Open"],
    ],
  );
  assert.equal(completion.questionRequests[0]?.currentBody, "");
});

test("a blank section drafts from finished prior sections", async () => {
  const order = ["problem_statement", "goals_objectives"];
  const lines = buildDocument(
    order,
    contentSection("problem_statement", "1. Problem Statement", { body: ["Imports fail nightly."] }),
    contentSection("goals_objectives", "2. Goals and Objectives"),
  );
  const completion = new FakeCompletion({ draft: "Cut failed imports to zero." });
  const result = await handleSection(lines, "goals_objectives", policyFor("goals_objectives"), stepContext(completion, order));
  assert.equal(result.action, "draft");
  assert.equal(result.blocked, false);
  assert.deepEqual(result.summaries, ["Drafted 'goals_objectives' from 1 prior section(s)"]);
  assert.deepEqual(completion.drafts[0]?.priorContext, { problem_statement: "Imports fail nightly." });
  assert.equal(completion.drafts[0]?.currentBody, "");
  const heading = indexOfLine(result.lines, "## 2. Goals and Objectives");
  assert.equal(result.lines[heading + 1], "Cut failed imports to zero.");
  assert.equal(completion.questionRequests.length, 0);
});

test("a failed draft falls back to question generation", async () => {
  const order = ["problem_statement", "goals_objectives"];
  const lines = buildDocument(
    order,
    contentSection("problem_statement", "1. Problem Statement", { body: ["Imports fail nightly."] }),
    contentSection("goals_objectives", "2. Goals and Objectives"),
  );
  const completion = new FakeCompletion({
    draft: new Error("provider unavailable"),
    questions: [{ question: "What does success look like?", target: "", rationale: "" }],
  });
  const result = await handleSection(lines, "goals_objectives", policyFor("goals_objectives"), stepContext(completion, order));
  assert.equal(completion.drafts.length, 1);
  assert.equal(result.action, "question_gen");
  assert.deepEqual(result.summaries, ["Generated 1 question(s) for 'goals_objectives'"]);
});

test("answered questions are integrated and resolved", async () => {
  const lines = blankProblem([
    questionRow("problem_statement-Q1", "Who is affected?", "The ops team"),
  ]);
  const completion = new FakeCompletion({ integrate: "Nightly imports fail for the ops team." });
  const result = await handleSection(
    lines,
    "problem_statement",
    policyFor("problem_statement"),
    stepContext(completion, ["problem_statement"]),
  );
  assert.equal(result.action, "integration");
  assert.equal(result.blocked, false);
  assert.equal(result.questionsResolved, 1);
  assert.deepEqual(result.summaries, ["Integrated 1 answer(s) into 'problem_statement'"]);
  assert.equal(completion.integrations[0]?.targetId, "problem_statement");
  assert.deepEqual(
    completion.integrations[0]?.answeredQuestions.map((question) => question.questionId),
    ["problem_statement-Q1"],
  );
  const heading = indexOfLine(result.lines, "## 1. Problem Statement");
  assert.equal(result.lines[heading + 1], "Nightly imports fail for the ops team.");
  assert.equal(
    QuestionLedger.forSection("problem_statement").questionsOrEmpty(result.lines)[0]?.status,
    "Resolved",
  );
});

test("pending questions block the section", async () => {
  const completion = new FakeCompletion();
  const blank = await handleSection(
    blankProblem([questionRow("problem_statement-Q1", "Who?"), questionRow("problem_statement-Q2", "When?")]),
    "problem_statement",
    policyFor("problem_statement"),
    stepContext(completion, ["problem_statement"]),
  );
  assert.equal(blank.action, "no_action");
  assert.equal(blank.changed, false);
  assert.deepEqual(blank.blockedReasons, ["Waiting for 2 questions to be answered"]);

  const filled = await handleSection(
    buildDocument(
      ["problem_statement"],
      contentSection("problem_statement", "1. Problem Statement", {
        body: ["Imports fail nightly."],
        questions: [questionRow("problem_statement-Q1", "Who?")],
      }),
    ),
    "problem_statement",
    policyFor("problem_statement"),
    stepContext(completion, ["problem_statement"]),
  );
  assert.deepEqual(filled.blockedReasons, ["Waiting for 1 questions to be answered"]);
  assert.equal(completion.questionRequests.length, 0);
});

test("a blank section without any ledger is blocked", async () => {
  const lines = [
    ...documentHeader(["scope"]),
    ...documentControl(),
    "<!-- section:scope -->",
    "## 3. Scope",
    "",
    PLACEHOLDER_TOKEN,
    "",
    "---",
    "",
  ];
  const result = await handleSection(lines, "scope", policyFor("scope"), stepContext(new FakeCompletion(), ["scope"]));
  assert.deepEqual(result.blockedReasons, ["Section 'scope' is blank and has no question table"]);
});

test("no generated questions blocks with a reason", async () => {
  const result = await handleSection(
    blankProblem(),
    "problem_statement",
    policyFor("problem_statement"),
    stepContext(new FakeCompletion({ questions: [] }), ["problem_statement"]),
  );
  assert.equal(result.changed, false);
  assert.deepEqual(result.blockedReasons, ["No new questions generated for 'problem_statement'"]);
});

test("document ledger answers targeting a subsection rewrite only that subsection", async () => {
  const lines = [
    ...documentHeader(["constraints"]),
    ...documentControl(),
    "<!-- section:constraints -->",
    "## 6. Constraints",
    "",
    "Runs on existing infrastructure.",
    "",
    "<!-- subsection:technical_constraints -->",
    "### Technical Constraints",
    "",
    PLACEHOLDER_TOKEN,
    "",
    "<!-- section_lock:constraints lock=false -->",
    "---",
    "",
    "<!-- section:risks_open_issues -->",
    "## 10. Risks and Open Issues",
    "",
    "<!-- table:open_questions -->",
    "| Question ID | Question | Date | Answer | Section Target | Resolution Status |",
    "|---|---|---|---|---|---|",
    "| Q-001 | Runtime? | 2026-01-05 | Node 20 only | technical_constraints | Open |",
    "",
  ];
  const completion = new FakeCompletion({ integrate: "- Node 20 only" });
  const result = await handleSection(lines, "constraints", policyFor("constraints"), stepContext(completion, ["constraints"]));
  assert.equal(result.action, "integration");
  assert.equal(result.questionsResolved, 1);
  assert.deepEqual(result.summaries, ["Integrated 1 answer(s) into 'constraints'"]);
  assert.equal(completion.integrations[0]?.targetId, "technical_constraints");
  const start = indexOfLine(result.lines, "<!-- subsection:technical_constraints -->");
  assert.deepEqual(result.lines.slice(start, start + 5), [
    "<!-- subsection:technical_constraints -->",
    "### Technical Constraints",
    "- Node 20 only",
    "<!-- section_lock:constraints lock=false -->",
    "---",
  ]);
  assert.equal(result.lines[indexOfLine(result.lines, "## 6. Constraints") + 2], "Runs on existing infrastructure.");
  assert.equal(QuestionLedger.forDocument().questionsOrEmpty(result.lines)[0]?.status, "Resolved");
});
