import { isReviewGateTarget, type DocumentLines, type OpenQuestion } from "@reqforge/shared";
import { extractAllSectionIds, extractReviewGateResults, getSectionSpan, sectionIsBlank } from "../markers/SpanParser.js";
import { QuestionLedger } from "../questions/QuestionLedger.js";
import { StructuralValidator } from "../validation/StructuralValidator.js";
import { getSectionState, isSectionComplete } from "../workflow/SectionState.js";

export type CompletionCriterion =
  | "no_placeholders_in_required_sections"
  | "no_open_questions"
  | "all_review_gates_pass"
  | "structure_valid"
  | "all_workflow_targets_complete";

export interface CompletionCheck {
  criterion: CompletionCriterion;
  passed: boolean;
  details: string;
  blocking: boolean;
}

export interface CompletionStatus {
  complete: boolean;
  checks: CompletionCheck[];
  blockingFailures: CompletionCriterion[];
  warnings: string[];
  summary: string;
}

export interface CompletionOptions {
  /** Deferred questions and gate warnings also count against completion. */
  strict?: boolean;
}

const SHOWN_QUESTION_IDS = 5;

const allQuestions = (lines: DocumentLines): OpenQuestion[] => [
  ...QuestionLedger.forDocument().questionsOrEmpty(lines),
  ...extractAllSectionIds(lines).flatMap((sectionId) => QuestionLedger.forSection(sectionId).questionsOrEmpty(lines)),
];

const checkNoPlaceholders = (lines: DocumentLines, sections: readonly string[]): CompletionCheck => {
  const withPlaceholders = sections.filter((sectionId) => {
    const span = getSectionSpan(lines, sectionId);
    return span !== undefined && sectionIsBlank(lines, span);
  });
  const passed = withPlaceholders.length === 0;
  return {
    criterion: "no_placeholders_in_required_sections",
    passed,
    details: passed ? "All required sections have content" : `Sections with PLACEHOLDER: ${withPlaceholders.join(", ")}`,
    blocking: true,
  };
};

const checkNoOpenQuestions = (lines: DocumentLines, strict: boolean): CompletionCheck => {
  const incomplete = allQuestions(lines).filter(
    (question) => question.status === "Open" || (strict && question.status === "Deferred"),
  );
  const passed = incomplete.length === 0;
  const ids = incomplete.slice(0, SHOWN_QUESTION_IDS).map((question) => question.questionId);
  const suffix =
    incomplete.length > SHOWN_QUESTION_IDS ? ` (showing first ${SHOWN_QUESTION_IDS} of ${incomplete.length})` : "";
  return {
    criterion: "no_open_questions",
    passed,
    details: passed ? "All questions resolved" : `${incomplete.length} questions remain: ${ids.join(", ")}${suffix}`,
    blocking: true,
  };
};

const checkReviewGates = (lines: DocumentLines, order: readonly string[], strict: boolean): CompletionCheck => {
  const gates = order.filter(isReviewGateTarget);
  if (gates.length === 0) {
    return { criterion: "all_review_gates_pass", passed: true, details: "No review gates in workflow", blocking: false };
  }
  const results = extractReviewGateResults(lines);
  const failed: string[] = [];
  for (const gateId of gates) {
    const result = results.get(gateId);
    if (!result) failed.push(`${gateId} (not executed)`);
    else if (result.status === "failed") failed.push(`${gateId} (failed)`);
    else if (strict && result.warnings > 0) failed.push(`${gateId} (${result.warnings} warnings)`);
  }
  const passed = failed.length === 0;
  return {
    criterion: "all_review_gates_pass",
    passed,
    details: passed ? `All ${gates.length} review gates passed` : `Failed gates: ${failed.join(", ")}`,
    blocking: true,
  };
};

const checkStructure = (lines: DocumentLines, sections: readonly string[]): CompletionCheck => {
  const problems: string[] = [];
  const existing = new Set(extractAllSectionIds(lines));
  const missing = sections.filter((sectionId) => !existing.has(sectionId));
  if (missing.length > 0) problems.push(`Missing sections: ${missing.join(", ")}`);
  const errors = new StructuralValidator(lines, { autoRepair: false }).validateAll();
  if (errors.length > 0) problems.push(`${errors.length} structural error(s): ${errors[0]?.message ?? ""}`);
  const passed = problems.length === 0;
  return {
    criterion: "structure_valid",
    passed,
    details: passed ? "Document structure valid" : problems.join("; "),
    blocking: true,
  };
};

const checkWorkflowComplete = (lines: DocumentLines, order: readonly string[]): CompletionCheck => {
  const results = extractReviewGateResults(lines);
  const incomplete = order.filter((target) => {
    if (isReviewGateTarget(target)) return results.get(target)?.status !== "passed";
    const state = getSectionState(lines, target);
    return !state.exists || !isSectionComplete(state);
  });
  const passed = incomplete.length === 0;
  return {
    criterion: "all_workflow_targets_complete",
    passed,
    details: passed ? "All workflow targets complete" : `Incomplete: ${incomplete.join(", ")}`,
    blocking: true,
  };
};

const buildSummary = (complete: boolean, checks: readonly CompletionCheck[]): string => {
  const lines: string[] = [`Document Completion Status: ${complete ? "COMPLETE" : "INCOMPLETE"}`, ""];
  for (const check of checks) lines.push(`${check.passed ? "[pass]" : "[fail]"} ${check.details}`);
  const blocking = checks.filter((check) => !check.passed && check.blocking);
  if (blocking.length > 0) {
    lines.push("", "Blocking Issues:");
    for (const check of blocking) lines.push(`  - ${check.criterion}: ${check.details}`);
  }
  return lines.join("\n");
};

/** Evaluates whether a document is finished enough to hand to downstream tooling. */
export const checkDocumentCompletion = (
  lines: DocumentLines,
  workflowOrder: readonly string[],
  options: CompletionOptions = {},
): CompletionStatus => {
  const strict = options.strict ?? false;
  const sections = workflowOrder.filter((target) => !isReviewGateTarget(target));
  const checks = [
    checkNoPlaceholders(lines, sections),
    checkNoOpenQuestions(lines, strict),
    checkReviewGates(lines, workflowOrder, strict),
    checkStructure(lines, sections),
    checkWorkflowComplete(lines, workflowOrder),
  ];
  const complete = checks.every((check) => check.passed || !check.blocking);
  return {
    complete,
    checks,
    blockingFailures: checks.filter((check) => !check.passed && check.blocking).map((check) => check.criterion),
    warnings: checks.filter((check) => !check.passed && !check.blocking).map((check) => check.details),
    summary: buildSummary(complete, checks),
  };
};
