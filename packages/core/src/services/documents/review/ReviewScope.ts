import { isReviewGateTarget, type DocumentLines, type ReviewScope } from "@reqforge/shared";
import { extractAllSectionIds } from "../markers/SpanParser.js";

/**
 * Ordered section ids a gate reviews. A gate missing from the workflow order
 * reviews every section of the document.
 */
export const resolveReviewScope = (
  gateId: string,
  scope: ReviewScope,
  workflowOrder: readonly string[],
  lines: DocumentLines,
): string[] => {
  const position = workflowOrder.indexOf(gateId);
  const prior = workflowOrder.slice(0, Math.max(position, 0)).filter((target) => !isReviewGateTarget(target));
  switch (scope.kind) {
    case "all_prior_sections":
      return position >= 0 ? prior : extractAllSectionIds(lines);
    case "entire_document":
      return extractAllSectionIds(lines);
    case "sections":
      return scope.sectionIds.map((id) => id.trim()).filter(Boolean);
    case "current_section": {
      const nearest = prior[prior.length - 1];
      return nearest ? [nearest] : [];
    }
  }
};
