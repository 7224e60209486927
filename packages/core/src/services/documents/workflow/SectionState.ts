import {
  isReviewGateTarget,
  type DocumentLines,
  type OpenQuestion,
  type SectionState,
  type TargetClassification,
} from "@reqforge/shared";
import {
  findSubsectionsWithin,
  getSectionSpan,
  sectionBody,
  sectionIsBlank,
  sectionIsLocked,
} from "../markers/SpanParser.js";
import { replacementEndBoundary } from "../editing/MarkerPreservingEditor.js";
import {
  QuestionLedger,
  canonicalTarget,
  isAnsweredPending,
  isOpenUnanswered,
} from "../questions/QuestionLedger.js";

/** Per-section ledger when present, otherwise the document-wide one. */
export const resolveSectionLedger = (lines: DocumentLines, sectionId: string): QuestionLedger | undefined => {
  const sectionLedger = QuestionLedger.forSection(sectionId);
  if (sectionLedger.exists(lines)) return sectionLedger;
  const documentLedger = QuestionLedger.forDocument();
  if (documentLedger.exists(lines)) return documentLedger;
  return undefined;
};

export const questionsForSection = (lines: DocumentLines, sectionId: string): OpenQuestion[] => {
  const ledger = resolveSectionLedger(lines, sectionId);
  if (!ledger) return [];
  const questions = ledger.questionsOrEmpty(lines);
  if (ledger.kind === "section") return questions;
  const span = getSectionSpan(lines, sectionId);
  const targets = new Set([sectionId, ...(span ? findSubsectionsWithin(lines, span).map((sub) => sub.subsectionId) : [])]);
  return questions.filter((question) => targets.has(canonicalTarget(question.target)));
};

export const getSectionState = (lines: DocumentLines, sectionId: string): SectionState => {
  const span = getSectionSpan(lines, sectionId);
  if (!span) {
    return {
      sectionId,
      exists: false,
      locked: false,
      isBlank: false,
      hasOpenQuestions: false,
      hasAnsweredQuestions: false,
      openQuestionCount: 0,
      answeredQuestionCount: 0,
    };
  }
  const ledger = resolveSectionLedger(lines, sectionId);
  const questions = questionsForSection(lines, sectionId);
  const openQuestionCount = questions.filter(isOpenUnanswered).length;
  const answeredQuestionCount = questions.filter(isAnsweredPending).length;
  return {
    sectionId,
    exists: true,
    locked: sectionIsLocked(lines, span),
    isBlank: sectionIsBlank(lines, span),
    hasOpenQuestions: openQuestionCount > 0,
    hasAnsweredQuestions: answeredQuestionCount > 0,
    openQuestionCount,
    answeredQuestionCount,
    ledger: ledger?.kind,
  };
};

export const classifySectionState = (state: SectionState): TargetClassification => {
  if (!state.exists) return "missing";
  if (state.locked) return "locked";
  if (state.hasAnsweredQuestions) return "has_answered_questions";
  if (state.isBlank) return state.hasOpenQuestions ? "blank_open_questions" : "blank_no_questions";
  if (state.hasOpenQuestions) return "open_questions";
  return "complete";
};

export const isSectionComplete = (state: SectionState): boolean =>
  !state.isBlank && !state.hasOpenQuestions && !state.hasAnsweredQuestions;

/**
 * Bodies of every earlier, finished section in workflow order, without their
 * question ledgers. Gates, missing, blank and question-bearing sections contribute nothing.
 */
export const gatherPriorSections = (
  lines: DocumentLines,
  workflowOrder: readonly string[],
  targetId: string,
): Record<string, string> => {
  const position = workflowOrder.indexOf(targetId);
  const prior = position >= 0 ? workflowOrder.slice(0, position) : [];
  const context: Record<string, string> = {};
  for (const candidate of prior) {
    if (isReviewGateTarget(candidate)) continue;
    const span = getSectionSpan(lines, candidate);
    if (!span) continue;
    const state = getSectionState(lines, candidate);
    if (state.isBlank || state.hasOpenQuestions) continue;
    const body = sectionBody(lines, { startLine: span.startLine, endLine: replacementEndBoundary(lines, span) }).trim();
    if (body) context[candidate] = body;
  }
  return context;
};
