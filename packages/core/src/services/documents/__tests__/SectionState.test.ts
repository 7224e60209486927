import test from "node:test";
import assert from "node:assert/strict";
import type { SectionState } from "@reqforge/shared";
import {
  classifySectionState,
  gatherPriorSections,
  getSectionState,
  isSectionComplete,
  questionsForSection,
  resolveSectionLedger,
} from "../workflow/SectionState.js";
import { PLACEHOLDER_TOKEN } from "../markers/MarkerGrammar.js";
import { buildDocument, contentSection, documentControl, documentHeader } from "./DocumentFixtures.js";

const ORDER = ["problem_statement", "goals_objectives", "review_gate:coherence_check", "constraints"];

const documentLedgerFixture = (): string[] => [
  ...documentHeader(ORDER),
  ...documentControl(),
  ...contentSection("problem_statement", "1. Problem Statement", { body: ["Imports fail nightly."] }),
  "<!-- section:goals_objectives -->",
  "## 2. Goals and Objectives",
  "",
  "Ship reliable imports.",
  "",
  "<!-- subsection:primary_goals -->",
  "### Primary Goals",
  "",
  "- Zero failed runs",
  "",
  "<!-- section_lock:goals_objectives lock=false -->",
  "---",
  "",
  "<!-- section:constraints -->",
  "## 6. Constraints",
  "",
  PLACEHOLDER_TOKEN,
  "",
  "---",
  "",
  "<!-- section:risks_open_issues -->",
  "## 10. Risks and Open Issues",
  "",
  "<!-- table:open_questions -->",
  "| Question ID | Question | Date | Answer | Section Target | Resolution Status |",
  "|---|---|---|---|---|---|",
  "| Q-001 | Which feeds matter? | 2026-01-05 |  | goals_objectives | Open |",
  "| Q-002 | Target success rate? | 2026-01-05 | 99.9% | primary_goals | Open |",
  "| Q-003 | Hosting limits? | 2026-01-05 |  | constraints | Open |",
  "",
];

test("document ledger questions are matched through the section and its subsections", () => {
  const lines = documentLedgerFixture();
  assert.equal(resolveSectionLedger(lines, "goals_objectives")?.kind, "document");
  assert.equal(resolveSectionLedger(lines, "problem_statement")?.kind, "section");
  assert.deepEqual(
    questionsForSection(lines, "goals_objectives").map((question) => question.questionId),
    ["Q-001", "Q-002"],
  );
  assert.deepEqual(
    questionsForSection(lines, "constraints").map((question) => question.questionId),
    ["Q-003"],
  );
});

test("getSectionState counts open and answered questions", () => {
  const state = getSectionState(documentLedgerFixture(), "goals_objectives");
  assert.deepEqual(state, {
    sectionId: "goals_objectives",
    exists: true,
    locked: false,
    isBlank: false,
    hasOpenQuestions: true,
    hasAnsweredQuestions: true,
    openQuestionCount: 1,
    answeredQuestionCount: 1,
    ledger: "document",
  });
  assert.equal(classifySectionState(state), "has_answered_questions");
  assert.equal(isSectionComplete(state), false);
});

test("missing and locked sections classify before anything else", () => {
  const missing = getSectionState(documentLedgerFixture(), "scope");
  assert.equal(missing.exists, false);
  assert.equal(classifySectionState(missing), "missing");

  const locked = buildDocument(
    ["problem_statement"],
    contentSection("problem_statement", "1. Problem Statement", { locked: true }),
  );
  assert.equal(classifySectionState(getSectionState(locked, "problem_statement")), "locked");
});

test("classifySectionState distinguishes blank and open states", () => {
  const base: SectionState = {
    sectionId: "scope",
    exists: true,
    locked: false,
    isBlank: true,
    hasOpenQuestions: false,
    hasAnsweredQuestions: false,
    openQuestionCount: 0,
    answeredQuestionCount: 0,
  };
  assert.equal(classifySectionState(base), "blank_no_questions");
  assert.equal(classifySectionState({ ...base, hasOpenQuestions: true }), "blank_open_questions");
  assert.equal(classifySectionState({ ...base, isBlank: false, hasOpenQuestions: true }), "open_questions");
  assert.equal(classifySectionState({ ...base, isBlank: false }), "complete");
  assert.equal(isSectionComplete({ ...base, isBlank: false }), true);
});

test("gatherPriorSections keeps finished earlier sections and skips gates", () => {
  assert.deepEqual(gatherPriorSections(documentLedgerFixture(), ORDER, "constraints"), {
    problem_statement: "Imports fail nightly.",
  });
  assert.deepEqual(gatherPriorSections(documentLedgerFixture(), ORDER, "problem_statement"), {});
  assert.deepEqual(gatherPriorSections(documentLedgerFixture(), ORDER, "not_in_order"), {});
});
