import type { ReviewFinding, ReviewSeverity } from "@reqforge/shared";

export type ReviewIssue = ReviewFinding;

export interface ReviewPatch {
  section: string;
  suggestedText: string;
  rationale: string;
  validated: boolean;
  rejection?: string;
}

export interface ReviewGateResult {
  gateId: string;
  passed: boolean;
  issues: ReviewIssue[];
  patches: ReviewPatch[];
  scopeSections: string[];
  summary: string;
  /** Set when a declared pre-check failed and the completion service was never asked. */
  preChecksFailed: boolean;
}

const severityOrder: Record<ReviewSeverity, number> = {
  blocker: 0,
  warning: 1,
  info: 2,
};

export const emptySeverityCounts = (): Record<ReviewSeverity, number> => ({
  blocker: 0,
  warning: 0,
  info: 0,
});

export const countBySeverity = (issues: readonly ReviewIssue[]): Record<ReviewSeverity, number> => {
  const counts = emptySeverityCounts();
  for (const issue of issues) counts[issue.severity] += 1;
  return counts;
};

export const isBlocking = (issues: readonly ReviewIssue[]): boolean => issues.some((issue) => issue.severity === "blocker");

export const sortIssues = (issues: readonly ReviewIssue[]): ReviewIssue[] =>
  issues.slice().sort((a, b) => {
    const severity = severityOrder[a.severity] - severityOrder[b.severity];
    if (severity !== 0) return severity;
    return a.section.localeCompare(b.section);
  });
