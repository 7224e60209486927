import type { AutoApplyPolicy, DocumentLines, ReviewPatchProposal } from "@reqforge/shared";
import { applyPatch } from "../editing/MarkerPreservingEditor.js";
import { containsMarkers } from "../markers/MarkerGrammar.js";
import { getSectionSpan } from "../markers/SpanParser.js";
import type { ReviewPatch } from "./ReviewTypes.js";

const rejectionFor = (patch: ReviewPatchProposal, lines: DocumentLines): string | undefined => {
  if (!getSectionSpan(lines, patch.section)) return `Section '${patch.section}' not found`;
  if (!patch.suggestedText.trim()) return "Suggested text is empty";
  if (containsMarkers(patch.suggestedText)) return "Suggested text contains structure markers";
  return undefined;
};

export const validatePatches = (patches: readonly ReviewPatchProposal[], lines: DocumentLines): ReviewPatch[] =>
  patches.map((patch) => {
    const rejection = rejectionFor(patch, lines);
    return rejection ? { ...patch, validated: false, rejection } : { ...patch, validated: true };
  });

export interface AppliedPatches {
  lines: string[];
  applied: string[];
}

/** Applies validated patches according to the gate's auto-apply policy. */
export const applyPatchesIfConfigured = (
  patches: readonly ReviewPatch[],
  policy: AutoApplyPolicy,
  lines: DocumentLines,
): AppliedPatches => {
  if (policy === "never" || patches.length === 0) return { lines: [...lines], applied: [] };
  if (policy === "if_validation_passes" && !patches.every((patch) => patch.validated)) {
    return { lines: [...lines], applied: [] };
  }
  let next = [...lines];
  const applied: string[] = [];
  for (const patch of patches) {
    if (!patch.validated) continue;
    next = applyPatch(next, patch.section, patch.suggestedText);
    applied.push(patch.section);
  }
  return { lines: next, applied };
};
