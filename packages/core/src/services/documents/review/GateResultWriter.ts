import type { DocumentLines, GateStatus } from "@reqforge/shared";
import { formatReviewGateResultMarker, tokenizeLine } from "../markers/MarkerGrammar.js";
import { findTableBlock } from "../markers/SpanParser.js";
import { QuestionLedger } from "../questions/QuestionLedger.js";
import { buildTableRow, parseTableRow } from "../tables/MarkdownTable.js";
import type { ReviewIssue } from "./ReviewTypes.js";

export const APPROVAL_RECORD_TABLE_ID = "approval_record";

/** Index just past the comment lines that open the document (metadata, workflow order). */
const headerCommentEnd = (lines: DocumentLines): number => {
  let insertAt = 0;
  let inComment = false;
  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    const trimmed = line.trim();
    if (inComment) {
      if (trimmed.includes("-->")) {
        inComment = false;
        insertAt = index + 1;
      }
      continue;
    }
    if (tokenizeLine(line, index)?.kind === "section") break;
    if (!trimmed) continue;
    if (!trimmed.startsWith("<!--")) break;
    if (!trimmed.includes("-->")) {
      inComment = true;
      continue;
    }
    insertAt = index + 1;
  }
  return insertAt;
};

/**
 * Persists one result marker per gate: the first existing marker is rewritten and
 * any later duplicates are dropped.
 */
export const writeReviewGateResult = (
  lines: DocumentLines,
  gateId: string,
  status: GateStatus,
  issues: number,
  warnings: number,
): string[] => {
  const marker = formatReviewGateResultMarker(gateId, status, issues, warnings);
  const next: string[] = [];
  let replaced = false;
  lines.forEach((line, index) => {
    const event = tokenizeLine(line, index);
    if (event?.kind !== "review_gate_result" || event.gateId !== gateId) {
      next.push(line);
      return;
    }
    if (!replaced) next.push(marker);
    replaced = true;
  });
  if (replaced) return next;
  const insertAt = headerCommentEnd(lines);
  return [...lines.slice(0, insertAt), marker, ...lines.slice(insertAt)];
};

/**
 * Records review findings as questions in the ledger of the section they concern.
 * Findings for sections without a per-section ledger are skipped.
 */
export const insertIssuesIntoSectionTables = (
  lines: DocumentLines,
  issues: readonly ReviewIssue[],
  date: string,
): { lines: string[]; inserted: number } => {
  let next = [...lines];
  let inserted = 0;
  for (const issue of issues) {
    const ledger = QuestionLedger.forSection(issue.section);
    if (!ledger.exists(next)) continue;
    const result = ledger.insert(next, [{ question: `[${issue.severity.toUpperCase()}] ${issue.description}`, date }]);
    next = result.lines;
    inserted += result.inserted;
  }
  return { lines: next, inserted };
};

export interface ApprovalUpdate {
  status: string;
  reviewer: string;
  date: string;
}

const APPROVAL_FIELDS: ReadonlyArray<[ReadonlySet<string>, keyof ApprovalUpdate]> = [
  [new Set(["current status", "status"]), "status"],
  [new Set(["recommended by", "reviewer"]), "reviewer"],
  [new Set(["recommendation date", "review date"]), "date"],
];

/** Fills the status, reviewer and date rows of the approval record table when present. */
export const updateApprovalRecord = (lines: DocumentLines, update: ApprovalUpdate): string[] => {
  const block = findTableBlock(lines, APPROVAL_RECORD_TABLE_ID);
  if (!block) return [...lines];
  const next = [...lines];
  for (let index = block.startLine + 2; index < block.endLine; index += 1) {
    const cells = parseTableRow(next[index] ?? "");
    if (cells.length < 2) continue;
    const field = (cells[0] ?? "").replace(/\*/g, "").trim().toLowerCase();
    const match = APPROVAL_FIELDS.find(([names]) => names.has(field));
    if (!match) continue;
    cells[1] = update[match[1]];
    next[index] = buildTableRow(cells);
  }
  return next;
};
