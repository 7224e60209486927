import type { DocumentLines, GatePreCheck } from "@reqforge/shared";
import { findSections, findTableBlock } from "../markers/SpanParser.js";
import { isPlaceholderRow, parseTableRows } from "../tables/MarkdownTable.js";
import { questionsForSection } from "../workflow/SectionState.js";
import type { ReviewIssue } from "./ReviewTypes.js";

export const RISKS_TABLE_ID = "risks";

export const checkOpenQuestionsResolved = (lines: DocumentLines, scope: readonly string[]): ReviewIssue[] => {
  const issues: ReviewIssue[] = [];
  for (const sectionId of scope) {
    const open = questionsForSection(lines, sectionId).filter((question) => question.status === "Open");
    if (open.length === 0) continue;
    issues.push({
      severity: "blocker",
      section: sectionId,
      description: `${open.length} open question(s) must be resolved before review: ${open
        .map((question) => question.questionId)
        .join(", ")}`,
    });
  }
  return issues;
};

const isPlaceholderRisk = (description: string): boolean => {
  const text = description.trim();
  return !text || text === "-" || text.toLowerCase().includes("placeholder");
};

/** Every real row of the risks table must be rated Low probability and Low impact. */
export const checkRisksLow = (lines: DocumentLines): ReviewIssue[] => {
  const block = findTableBlock(lines, RISKS_TABLE_ID);
  if (!block) return [];
  const owner = findSections(lines).find((span) => span.startLine <= block.markerLine && block.markerLine < span.endLine);
  const issues: ReviewIssue[] = [];
  for (const cells of parseTableRows(lines.slice(block.startLine, block.endLine)).slice(2)) {
    if (cells.length < 4 || isPlaceholderRow(cells)) continue;
    const [riskId = "", description = "", probability = "", impact = ""] = cells;
    if (isPlaceholderRisk(description)) continue;
    if (probability.trim().toLowerCase() === "low" && impact.trim().toLowerCase() === "low") continue;
    issues.push({
      severity: "blocker",
      section: owner?.sectionId ?? RISKS_TABLE_ID,
      description: `Risk ${riskId} is rated ${probability}/${impact}; approval requires Low/Low`,
    });
  }
  return issues;
};

export const runPreChecks = (
  lines: DocumentLines,
  checks: readonly GatePreCheck[],
  scope: readonly string[],
): ReviewIssue[] =>
  checks.flatMap((check) => {
    switch (check) {
      case "open_questions_resolved":
        return checkOpenQuestionsResolved(lines, scope);
      case "risks_low":
        return checkRisksLow(lines);
    }
  });
