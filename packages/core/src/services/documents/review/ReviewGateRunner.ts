import type { DocumentLines, ReviewResponse, SectionPolicy } from "@reqforge/shared";
import { setSectionLock } from "../editing/MarkerPreservingEditor.js";
import { getSectionSpan, sectionBody } from "../markers/SpanParser.js";
import { AUTOMATION_ACTOR } from "../versioning/DocumentVersioning.js";
import { emptyResult, type StepContext, type WorkflowResult } from "../workflow/WorkflowTypes.js";
import { runPreChecks } from "./GatePreChecks.js";
import { insertIssuesIntoSectionTables, updateApprovalRecord, writeReviewGateResult } from "./GateResultWriter.js";
import { applyPatchesIfConfigured, validatePatches } from "./PatchValidator.js";
import { resolveReviewScope } from "./ReviewScope.js";
import { countBySeverity, isBlocking, sortIssues, type ReviewGateResult, type ReviewIssue } from "./ReviewTypes.js";

const DEFAULT_APPROVAL_STATUS = "Approved";

const collectSectionContents = (lines: DocumentLines, scope: readonly string[]): Record<string, string> => {
  const contents: Record<string, string> = {};
  for (const sectionId of scope) {
    const span = getSectionSpan(lines, sectionId);
    if (span) contents[sectionId] = sectionBody(lines, span);
  }
  return contents;
};

const preCheckResult = (gateId: string, scope: string[], issues: ReviewIssue[]): ReviewGateResult => ({
  gateId,
  passed: false,
  issues: sortIssues(issues),
  patches: [],
  scopeSections: scope,
  summary: `Pre-checks failed with ${issues.length} blocking issue(s); review not run.`,
  preChecksFailed: true,
});

const reviewedResult = (
  gateId: string,
  scope: string[],
  response: ReviewResponse,
  lines: DocumentLines,
): ReviewGateResult => ({
  gateId,
  passed: !isBlocking(response.issues),
  issues: sortIssues(response.issues),
  patches: validatePatches(response.patches, lines),
  scopeSections: scope,
  summary: response.summary,
  preChecksFailed: false,
});

/**
 * Executes one review gate against the current document and persists its outcome:
 * result marker, findings in section ledgers, patches and, on pass, locks and the
 * approval record.
 */
export const executeReviewGate = async (
  lines: DocumentLines,
  gateId: string,
  policy: SectionPolicy,
  context: StepContext,
): Promise<WorkflowResult> => {
  const logger = context.logger.child("review-gate");
  const scope = resolveReviewScope(gateId, policy.scope, context.workflowOrder, lines);
  logger.info(`${gateId}: reviewing ${scope.length} section(s): ${scope.join(", ") || "(none)"}`);

  const preCheckIssues = runPreChecks(lines, policy.preChecks, scope);
  let gate: ReviewGateResult;
  if (preCheckIssues.length > 0) {
    gate = preCheckResult(gateId, scope, preCheckIssues);
    logger.warn(`${gateId}: ${gate.summary}`);
  } else {
    const response = await context.completion.review({
      gateId,
      docType: context.docType,
      sectionContents: collectSectionContents(lines, scope),
      rules: policy.validationRules,
      profile: policy.llmProfile,
    });
    gate = reviewedResult(gateId, scope, response, lines);
  }

  const counts = countBySeverity(gate.issues);
  let next = writeReviewGateResult(lines, gateId, gate.passed ? "passed" : "failed", counts.blocker, counts.warning);
  // pre-check findings describe existing ledger rows, so they are not recorded again
  const recorded = gate.preChecksFailed
    ? { lines: next, inserted: 0 }
    : insertIssuesIntoSectionTables(next, gate.issues, context.today);
  next = recorded.lines;

  const patched = applyPatchesIfConfigured(gate.patches, policy.autoApplyPatches, next);
  next = patched.lines;

  const summaries = [`${gateId} ${gate.passed ? "passed" : "failed"}: ${counts.blocker} blocker(s), ${counts.warning} warning(s)`];
  if (recorded.inserted > 0) summaries.push(`Recorded ${recorded.inserted} finding(s) in section question tables`);
  if (patched.applied.length > 0) summaries.push(`Applied patches to: ${patched.applied.join(", ")}`);

  if (gate.passed && policy.lockScopeOnPass) {
    for (const sectionId of scope) next = setSectionLock(next, sectionId, true);
    summaries.push(`Locked ${scope.length} section(s)`);
  }
  if (gate.passed && policy.approvalStatusOnPass !== undefined) {
    next = updateApprovalRecord(next, {
      status: policy.approvalStatusOnPass || DEFAULT_APPROVAL_STATUS,
      reviewer: AUTOMATION_ACTOR,
      date: context.today,
    });
  }
  logger.info(summaries[0] ?? gateId);

  const blockers = gate.issues.filter((issue) => issue.severity === "blocker");
  return {
    ...emptyResult(next, "review_gate", gateId),
    changed: true,
    blocked: !gate.passed,
    blockedReasons: blockers.map((issue) => `[${issue.section}] ${issue.description}`),
    summaries,
    questionsGenerated: recorded.inserted,
    reviewGate: gate,
  };
};
