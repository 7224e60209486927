import test from "node:test";
import assert from "node:assert/strict";
import { ParseFailure } from "@reqforge/shared";
import {
  QuestionLedger,
  canonicalTarget,
  isAnswered,
  isAnsweredPending,
  isOpenUnanswered,
} from "../questions/QuestionLedger.js";
import { SECTION_LEDGER_HEADER, buildDocument, contentSection, indexOfLine, questionRow } from "./DocumentFixtures.js";

const withQuestions = () =>
  buildDocument(
    ["problem_statement"],
    contentSection("problem_statement", "1. Problem Statement", {
      questions: [
        questionRow("problem_statement-Q1", "Who is affected?", "Ops team"),
        questionRow("problem_statement-Q2", "When did it start?", "", "Resolved"),
      ],
    }),
  );

test("section ledger parses rows and binds them to the section", () => {
  const questions = QuestionLedger.forSection("problem_statement").questionsOrEmpty(withQuestions());
  assert.deepEqual(questions, [
    {
      questionId: "problem_statement-Q1",
      question: "Who is affected?",
      date: "2026-01-05",
      answer: "Ops team",
      target: "problem_statement",
      status: "Open",
    },
    {
      questionId: "problem_statement-Q2",
      question: "When did it start?",
      date: "2026-01-05",
      answer: "",
      target: "problem_statement",
      status: "Resolved",
    },
  ]);
});

test("insert skips duplicates and numbers new rows after the highest id", () => {
  const lines = withQuestions();
  const ledger = QuestionLedger.forSection("problem_statement");
  const result = ledger.insert(lines, [
    { question: "Who is affected? ", date: "2026-02-01" },
    { question: "who   IS affected?", date: "2026-02-01" },
    { question: "Which systems | teams?", date: "2026-02-01" },
    { question: "   ", date: "2026-02-01" },
  ]);
  assert.equal(result.inserted, 1);
  assert.deepEqual(result.questionIds, ["problem_statement-Q1", "problem_statement-Q1", "problem_statement-Q3"]);
  const separator = indexOfLine(result.lines, SECTION_LEDGER_HEADER[1] ?? "");
  assert.equal(result.lines[separator + 1], "| problem_statement-Q3 | Which systems / teams? | 2026-02-01 |  | Open |");
  assert.equal(result.lines.length, lines.length + 1);
});

test("insert with nothing new returns an unchanged copy", () => {
  const lines = withQuestions();
  const result = QuestionLedger.forSection("problem_statement").insert(lines, [
    { question: "When did it start?", date: "2026-02-01" },
  ]);
  assert.equal(result.inserted, 0);
  assert.deepEqual(result.lines, lines);
  assert.notEqual(result.lines, lines);
});

test("answer fills a pending question and leaves resolved ones alone", () => {
  const ledger = QuestionLedger.forSection("problem_statement");
  const answered = ledger.answer(withQuestions(), "problem_statement-Q1", "Finance and ops");
  assert.equal(answered.resolved, 1);
  assert.equal(ledger.questionsOrEmpty(answered.lines)[0]?.answer, "Finance and ops");

  const untouched = ledger.answer(withQuestions(), "problem_statement-Q2", "Last year");
  assert.equal(untouched.resolved, 0);
});

test("resolve marks rows Resolved once", () => {
  const ledger = QuestionLedger.forSection("problem_statement");
  const result = ledger.resolve(withQuestions(), ["problem_statement-Q1", "problem_statement-Q2"]);
  assert.equal(result.resolved, 1);
  assert.deepEqual(
    ledger.questionsOrEmpty(result.lines).map((question) => question.status),
    ["Resolved", "Resolved"],
  );
});

test("resolving an already resolved question leaves the document byte-identical", () => {
  const ledger = QuestionLedger.forSection("problem_statement");
  const once = ledger.resolve(withQuestions(), ["problem_statement-Q1"]);
  const twice = ledger.resolve(once.lines, ["problem_statement-Q1"]);
  assert.equal(twice.resolved, 0);
  assert.equal(twice.lines.join("\n"), once.lines.join("\n"));
});

test("rows with an unrecognised status still reserve their id", () => {
  const lines = buildDocument(
    ["problem_statement"],
    contentSection("problem_statement", "1. Problem Statement", {
      questions: [questionRow("problem_statement-Q1", "Who is affected?", "", "open", "2026-01-01")],
    }),
  );
  const ledger = QuestionLedger.forSection("problem_statement");
  assert.deepEqual(ledger.questionsOrEmpty(lines), []);
  assert.equal(ledger.nextId(lines), "problem_statement-Q2");

  const result = ledger.insert(lines, [{ question: "Who is affected?", date: "2026-02-01" }]);
  assert.deepEqual(result.questionIds, ["problem_statement-Q2"]);
  const separator = indexOfLine(result.lines, SECTION_LEDGER_HEADER[1] ?? "");
  assert.equal(result.lines[separator + 1], "| problem_statement-Q2 | Who is affected? | 2026-02-01 |  | Open |");
  assert.equal(result.lines.filter((line) => line.startsWith("| problem_statement-Q1 |")).length, 1);
});

test("document ledger uses Q-NNN ids and treats targets as part of the duplicate key", () => {
  const lines = [
    "<!-- section:risks_open_issues -->",
    "<!-- table:open_questions -->",
    "| Question ID | Question | Date | Answer | Section Target | Resolution Status |",
    "|---|---|---|---|---|---|",
    "| Q-007 | Budget owner? | 2026-01-02 | | goals_objectives | Open |",
  ];
  const ledger = QuestionLedger.forDocument();
  assert.equal(ledger.nextId(lines), "Q-008");
  const result = ledger.insert(lines, [
    { question: "Budget owner?", date: "2026-01-03", target: "goals_objectives" },
    { question: "Budget owner?", date: "2026-01-03", target: "constraints" },
  ]);
  assert.equal(result.inserted, 1);
  assert.deepEqual(result.questionIds, ["Q-007", "Q-008"]);
  assert.equal(result.lines[4], "| Q-008 | Budget owner? | 2026-01-03 |  | constraints | Open |");
});

test("parse rejects a ledger with the wrong header", () => {
  const lines = ["<!-- table:goals_questions -->", "| ID | Question |", "|---|---|"];
  const ledger = QuestionLedger.forSection("goals");
  assert.throws(() => ledger.parse(lines), ParseFailure);
  assert.deepEqual(ledger.questionsOrEmpty(lines), []);
  assert.equal(QuestionLedger.forSection("absent").exists(lines), false);
});

test("answer state helpers treat Pending and dashes as unanswered", () => {
  const base = { questionId: "q", question: "?", date: "", target: "t" };
  assert.equal(isAnswered({ ...base, answer: "Pending", status: "Open" }), false);
  assert.equal(isOpenUnanswered({ ...base, answer: "-", status: "Deferred" }), true);
  assert.equal(isAnsweredPending({ ...base, answer: "Yes", status: "Open" }), true);
  assert.equal(isAnsweredPending({ ...base, answer: "Yes", status: "Resolved" }), false);
  assert.equal(canonicalTarget(" primary_goals "), "goals_objectives");
  assert.equal(canonicalTarget("constraints"), "constraints");
});
