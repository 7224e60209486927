import type { ReviewGateResult } from "./ReviewTypes.js";
import { countBySeverity } from "./ReviewTypes.js";

const statusLabel = (passed: boolean): string => (passed ? "PASSED" : "FAILED");

export const renderReviewGateOutput = (result: ReviewGateResult): string => {
  const counts = countBySeverity(result.issues);
  const lines: string[] = [];

  lines.push(`# Review Gate: ${result.gateId}`);
  lines.push("");
  lines.push(`- Status: ${statusLabel(result.passed)}`);
  lines.push(`- Scope: ${result.scopeSections.join(", ") || "(none)"}`);
  lines.push(`- Issues: ${result.issues.length} (blocker: ${counts.blocker}, warning: ${counts.warning}, info: ${counts.info})`);
  if (result.preChecksFailed) lines.push("- Review skipped: pre-checks failed");
  lines.push("");

  lines.push("## Summary");
  lines.push(result.summary.trim() || "(no summary)");
  lines.push("");

  lines.push("## Issues");
  if (result.issues.length === 0) {
    lines.push("- None");
  } else {
    for (const issue of result.issues) {
      const fix = issue.suggestedFix ? ` -> ${issue.suggestedFix}` : "";
      lines.push(`- (${issue.severity}) [${issue.section}] ${issue.description}${fix}`);
    }
  }
  lines.push("");

  lines.push("## Patches");
  if (result.patches.length === 0) {
    lines.push("- None");
  } else {
    for (const patch of result.patches) {
      const state = patch.validated ? "valid" : `rejected: ${patch.rejection ?? "unknown reason"}`;
      lines.push(`- [${patch.section}] ${state}${patch.rationale ? ` (${patch.rationale})` : ""}`);
    }
  }

  return lines.join("\n").trimEnd() + "\n";
};
