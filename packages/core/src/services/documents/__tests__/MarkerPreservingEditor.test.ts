import test from "node:test";
import assert from "node:assert/strict";
import { DuplicateSectionError, InvalidSpanError, MalformedMarkerError } from "@reqforge/shared";
import {
  applyPatch,
  markerInventory,
  replaceBody,
  replaceSectionBody,
  replacementEndBoundary,
  setSectionLock,
} from "../editing/MarkerPreservingEditor.js";
import { getSectionSpan } from "../markers/SpanParser.js";
import { buildDocument, contentSection, indexOfLine } from "./DocumentFixtures.js";

const problemDoc = () =>
  buildDocument(["problem_statement"], contentSection("problem_statement", "1. Problem Statement"));

test("replaceSectionBody rewrites the preamble and stops at the question ledger", () => {
  const lines = problemDoc();
  const start = indexOfLine(lines, "<!-- section:problem_statement -->");
  const next = replaceSectionBody(lines, "problem_statement", "Imports fail nightly.\n\n## Echoed heading");
  assert.deepEqual(next.slice(start, start + 6), [
    "<!-- section:problem_statement -->",
    "## 1. Problem Statement",
    "Imports fail nightly.",
    "",
    "<!-- subsection:questions_issues -->",
    "### Questions & Issues",
  ]);
  assert.equal(next.length, lines.length - 1);
  assert.deepEqual(next.slice(0, start), lines.slice(0, start));
});

test("replacementEndBoundary is the ledger subsection when present", () => {
  const lines = problemDoc();
  const span = getSectionSpan(lines, "problem_statement");
  assert.ok(span);
  assert.equal(replacementEndBoundary(lines, span), indexOfLine(lines, "<!-- subsection:questions_issues -->"));
});

const notes = [
  "<!-- section:notes -->",
  "## Notes",
  "<!-- PLACEHOLDER -->",
  "<!-- section_lock:notes lock=false -->",
  "---",
];

test("lock and divider in the preamble survive a rewrite", () => {
  assert.deepEqual(replaceSectionBody(notes, "notes", "Body"), [
    "<!-- section:notes -->",
    "## Notes",
    "Body",
    "<!-- section_lock:notes lock=false -->",
    "---",
  ]);
});

test("an empty body becomes a placeholder and echoed markers are dropped", () => {
  assert.equal(replaceSectionBody(notes, "notes", "   ")[2], "<!-- PLACEHOLDER -->");
  const cleaned = replaceSectionBody(notes, "notes", "Keep\n<!-- section:evil -->");
  assert.deepEqual(cleaned.slice(2, 4), ["Keep", "<!-- section_lock:notes lock=false -->"]);
});

test("tables directly in the preamble are carried after the new body", () => {
  const lines = [
    "<!-- section:approval_record -->",
    "## Approval",
    "<!-- table:approval_record -->",
    "| Field | Value |",
    "|---|---|",
    "| Current Status | Draft |",
  ];
  assert.deepEqual(replaceSectionBody(lines, "approval_record", "Signed off."), [
    "<!-- section:approval_record -->",
    "## Approval",
    "Signed off.",
    "",
    "<!-- table:approval_record -->",
    "| Field | Value |",
    "|---|---|",
    "| Current Status | Draft |",
  ]);
});

test("replaceBody rejects empty, inverted and out-of-range spans", () => {
  assert.throws(() => replaceBody(notes, 2, 2, "notes", "x"), /Empty span: start=2 equals end=2/);
  assert.throws(() => replaceBody(notes, 3, 1, "notes", "x"), /Invalid span: start=3 is greater than end=1/);
  assert.throws(() => replaceBody(notes, 0, 9, "notes", "x"), /Span out of bounds: start=0, end=9, len=5/);
});

test("edits refuse a document that is already corrupt", () => {
  const corrupt = ["<!-- section:notes -->", "text", "<!-- section:notes -->"];
  assert.throws(() => replaceSectionBody(corrupt, "notes", "Body"), DuplicateSectionError);
});

test("applyPatch checks the section and the suggestion", () => {
  assert.throws(() => applyPatch(notes, "missing", "text"), InvalidSpanError);
  assert.throws(() => applyPatch(notes, "notes", "Fine\n<!-- table:x -->"), MalformedMarkerError);
  assert.equal(applyPatch(notes, "notes", "Patched.")[2], "Patched.");
});

test("setSectionLock rewrites the existing marker or inserts one", () => {
  assert.equal(setSectionLock(notes, "notes", true)[3], "<!-- section_lock:notes lock=true -->");
  const unlocked = ["<!-- section:notes -->", "## Notes", "Body", "---"];
  assert.deepEqual(setSectionLock(unlocked, "notes", true), [
    "<!-- section:notes -->",
    "## Notes",
    "Body",
    "<!-- section_lock:notes lock=true -->",
    "---",
  ]);
  assert.deepEqual(setSectionLock(unlocked, "missing", true), unlocked);
});

test("replaceBody refuses a span that runs into the next section", () => {
  const lines = ["<!-- section:alpha -->", "## Alpha", "Old alpha", "<!-- section:beta -->", "## Beta", "Old beta"];
  assert.throws(
    () => replaceBody(lines, 0, lines.length, "alpha", "new alpha"),
    (error: unknown) =>
      error instanceof InvalidSpanError &&
      error.message === "Invalid span for 'alpha': Span crosses the section marker at line 4",
  );
});

test("gate results, meta markers and locks in the preamble survive a rewrite", () => {
  const lines = [
    "<!-- section:alpha -->",
    "## Alpha",
    "<!-- review_gate_result:coherence_check status=passed issues=0 warnings=1 -->",
    "Old alpha text",
    "<!-- meta:version -->",
    "- **Version:** 0.3",
    '<!-- meta:owner value="ops" -->',
    "<!-- section_lock:alpha lock=false -->",
  ];
  const next = replaceSectionBody(lines, "alpha", "New alpha");
  assert.deepEqual(next, [
    "<!-- section:alpha -->",
    "## Alpha",
    "New alpha",
    "<!-- review_gate_result:coherence_check status=passed issues=0 warnings=1 -->",
    "<!-- meta:version -->",
    "- **Version:** 0.3",
    '<!-- meta:owner value="ops" -->',
    "<!-- section_lock:alpha lock=false -->",
  ]);
  assert.deepEqual(markerInventory(next), markerInventory(lines));
});

test("a section rewrite keeps the document-wide marker set", () => {
  const lines = problemDoc();
  const next = replaceSectionBody(lines, "problem_statement", "Imports fail nightly.");
  assert.deepEqual(markerInventory(next), markerInventory(lines));
  assert.ok(markerInventory(lines).includes("table:problem_statement_questions"));
});

const goalsDoc = () =>
  buildDocument(
    ["goals_objectives"],
    contentSection("goals_objectives", "2. Goals and Objectives", {
      subsections: [
        "<!-- subsection:primary_goals -->",
        "### Primary Goals",
        "<!-- PLACEHOLDER -->",
        "",
        "<!-- subsection:success_metrics -->",
        "### Success Metrics",
        "",
        "<!-- table:success_metrics -->",
        "| Metric | Target |",
        "|---|---|",
        "| <!-- PLACEHOLDER --> | - |",
        "",
      ],
    }),
  );

const countLine = (lines: readonly string[], text: string): number => lines.filter((line) => line === text).length;

test("repeated rewrites never duplicate or lose sibling subsections and tables", () => {
  const original = goalsDoc();
  const inventory = markerInventory(original);

  const first = replaceSectionBody(original, "goals_objectives", "Grow adoption.");
  const second = replaceSectionBody(first, "goals_objectives", "Grow adoption and retention.");
  for (const pass of [first, second]) {
    assert.deepEqual(markerInventory(pass), inventory);
    assert.equal(countLine(pass, "<!-- subsection:primary_goals -->"), 1);
    assert.equal(countLine(pass, "<!-- subsection:success_metrics -->"), 1);
    assert.equal(countLine(pass, "<!-- table:success_metrics -->"), 1);
  }
  assert.equal(countLine(second, "Grow adoption."), 0);
  assert.equal(countLine(second, "Grow adoption and retention."), 1);

  let lines = second;
  for (const body of ["Measured monthly.", "Measured weekly."]) {
    const start = indexOfLine(lines, "<!-- subsection:success_metrics -->");
    const end = indexOfLine(lines, "<!-- subsection:questions_issues -->");
    lines = replaceBody(lines, start, end, "success_metrics", body);
    assert.deepEqual(markerInventory(lines), inventory);
    assert.equal(countLine(lines, "<!-- table:success_metrics -->"), 1);
    assert.equal(countLine(lines, "| Metric | Target |"), 1);
  }
  const metrics = indexOfLine(lines, "<!-- subsection:success_metrics -->");
  assert.deepEqual(lines.slice(metrics, metrics + 8), [
    "<!-- subsection:success_metrics -->",
    "### Success Metrics",
    "Measured weekly.",
    "",
    "<!-- table:success_metrics -->",
    "| Metric | Target |",
    "|---|---|",
    "| <!-- PLACEHOLDER --> | - |",
  ]);
});
