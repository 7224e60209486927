import type { DocumentLines, DraftRequest, OpenQuestion, SectionPolicy } from "@reqforge/shared";
import type { SanitizeOptions } from "../editing/BodySanitizer.js";
import { replaceBody, replaceSectionBody, replacementEndBoundary } from "../editing/MarkerPreservingEditor.js";
import { describeSubsections, routeTableContent } from "../editing/TableRouting.js";
import { PLACEHOLDER_TOKEN } from "../markers/MarkerGrammar.js";
import { getSectionSpan, getSubsectionSpan, sectionBody } from "../markers/SpanParser.js";
import { canonicalTarget, isAnsweredPending, isOpenUnanswered, type QuestionLedger } from "../questions/QuestionLedger.js";
import { gatherPriorSections, getSectionState, questionsForSection, resolveSectionLedger } from "./SectionState.js";
import { emptyResult, waitingForAnswers, type StepContext, type WorkflowAction, type WorkflowResult } from "./WorkflowTypes.js";

interface HandlerState {
  lines: string[];
  actions: WorkflowAction[];
  summaries: string[];
  questionsResolved: number;
  questionsGenerated: number;
}

const sanitizeOptions = (policy: SectionPolicy): SanitizeOptions => ({
  preserveHeaders: policy.preserveHeaders,
  contentFilters: policy.contentFilters,
});

const groupByTarget = (
  questions: readonly OpenQuestion[],
  sectionId: string,
  ledger: QuestionLedger,
): Map<string, OpenQuestion[]> => {
  const groups = new Map<string, OpenQuestion[]>();
  for (const question of questions) {
    const target = ledger.kind === "section" ? sectionId : canonicalTarget(question.target) || sectionId;
    const bucket = groups.get(target) ?? [];
    bucket.push(question);
    groups.set(target, bucket);
  }
  return groups;
};

const requestBase = (
  lines: DocumentLines,
  sectionId: string,
  policy: SectionPolicy,
  context: StepContext,
  currentBody: string,
): DraftRequest => ({
  sectionId,
  docType: context.docType,
  currentBody: currentBody
    .split("\n")
    .filter((line) => !line.includes(PLACEHOLDER_TOKEN))
    .join("\n")
    .trim(),
  priorContext:
    policy.scope.kind === "all_prior_sections" ? gatherPriorSections(lines, context.workflowOrder, sectionId) : {},
  profile: policy.llmProfile,
  outputFormat: policy.outputFormat,
  subsections: describeSubsections(lines, sectionId),
});

/** Folds one target's answered questions into its region. False when the region is missing. */
const integrateTarget = async (
  state: HandlerState,
  sectionId: string,
  targetId: string,
  questions: OpenQuestion[],
  policy: SectionPolicy,
  context: StepContext,
): Promise<boolean> => {
  const span = getSectionSpan(state.lines, sectionId);
  if (!span) return false;
  const options = sanitizeOptions(policy);

  if (targetId === sectionId) {
    const boundary = replacementEndBoundary(state.lines, span);
    const currentBody = sectionBody(state.lines, { startLine: span.startLine, endLine: boundary });
    const output = await context.completion.integrate({
      ...requestBase(state.lines, sectionId, policy, context, currentBody),
      targetId,
      answeredQuestions: questions,
    });
    const routed = routeTableContent(state.lines, sectionId, output);
    const body = routed.preamble.trim() || (routed.routedRows > 0 ? currentBody : "");
    state.lines = replaceSectionBody(routed.lines, sectionId, body, options);
    if (routed.routedRows > 0) state.summaries.push(`Routed ${routed.routedRows} table row(s) in '${sectionId}'`);
    return true;
  }

  const subsection = getSubsectionSpan(state.lines, span, targetId);
  if (!subsection) {
    context.logger.warn(`No region '${targetId}' in section '${sectionId}'; leaving its answers pending`);
    return false;
  }
  const currentBody = sectionBody(state.lines, subsection);
  const output = await context.completion.integrate({
    ...requestBase(state.lines, sectionId, policy, context, currentBody),
    targetId,
    answeredQuestions: questions,
  });
  state.lines = replaceBody(state.lines, subsection.startLine, subsection.endLine, targetId, output, options);
  return true;
};

const integrateAnswers = async (
  state: HandlerState,
  sectionId: string,
  ledger: QuestionLedger,
  policy: SectionPolicy,
  context: StepContext,
): Promise<boolean> => {
  const answered = questionsForSection(state.lines, sectionId).filter(isAnsweredPending);
  if (answered.length === 0) return false;
  const integratedIds: string[] = [];
  for (const [targetId, questions] of groupByTarget(answered, sectionId, ledger)) {
    if (await integrateTarget(state, sectionId, targetId, questions, policy, context)) {
      integratedIds.push(...questions.map((question) => question.questionId));
    }
  }
  if (integratedIds.length === 0) return false;
  const resolved = ledger.resolve(state.lines, integratedIds);
  state.lines = resolved.lines;
  state.questionsResolved += resolved.resolved;
  state.actions.push("integration");
  state.summaries.push(`Integrated ${integratedIds.length} answer(s) into '${sectionId}'`);
  return true;
};

const draftFromContext = async (
  state: HandlerState,
  sectionId: string,
  policy: SectionPolicy,
  context: StepContext,
): Promise<void> => {
  const span = getSectionSpan(state.lines, sectionId);
  if (!span) return;
  const request = requestBase(
    state.lines,
    sectionId,
    policy,
    context,
    sectionBody(state.lines, { startLine: span.startLine, endLine: replacementEndBoundary(state.lines, span) }),
  );
  if (Object.keys(request.priorContext).length === 0) return;
  let output: string;
  try {
    output = await context.completion.draft(request);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    context.logger.warn(`Draft for '${sectionId}' failed, falling back to questions: ${message}`);
    return;
  }
  const routed = routeTableContent(state.lines, sectionId, output);
  state.lines = replaceSectionBody(routed.lines, sectionId, routed.preamble, sanitizeOptions(policy));
  state.actions.push("draft");
  state.summaries.push(`Drafted '${sectionId}' from ${Object.keys(request.priorContext).length} prior section(s)`);
};

const generateQuestions = async (
  state: HandlerState,
  sectionId: string,
  ledger: QuestionLedger,
  policy: SectionPolicy,
  context: StepContext,
): Promise<void> => {
  const span = getSectionSpan(state.lines, sectionId);
  if (!span) return;
  const existing = questionsForSection(state.lines, sectionId);
  const proposed = await context.completion.generateQuestions({
    ...requestBase(
      state.lines,
      sectionId,
      policy,
      context,
      sectionBody(state.lines, { startLine: span.startLine, endLine: replacementEndBoundary(state.lines, span) }),
    ),
    existingQuestions: existing.map((question) => question.question),
  });
  const inserted = ledger.insert(
    state.lines,
    proposed.map((entry) => ({
      question: entry.question,
      date: context.today,
      target: ledger.kind === "document" ? entry.target.trim() || sectionId : undefined,
    })),
  );
  state.lines = inserted.lines;
  state.questionsGenerated += inserted.inserted;
  if (inserted.inserted > 0) {
    state.actions.push("question_gen");
    state.summaries.push(`Generated ${inserted.inserted} question(s) for '${sectionId}'`);
  }
};

const finish = (state: HandlerState, sectionId: string, blockedReasons: string[]): WorkflowResult => ({
  ...emptyResult(state.lines, state.actions[0] ?? "no_action", sectionId),
  changed: state.actions.length > 0,
  blocked: blockedReasons.length > 0,
  blockedReasons,
  summaries: state.summaries,
  questionsGenerated: state.questionsGenerated,
  questionsResolved: state.questionsResolved,
});

/**
 * One processing step for a content section: integrate answers, draft from earlier
 * sections when still blank, then ask questions or wait for answers.
 */
export const handleSection = async (
  lines: DocumentLines,
  sectionId: string,
  policy: SectionPolicy,
  context: StepContext,
): Promise<WorkflowResult> => {
  const state: HandlerState = {
    lines: [...lines],
    actions: [],
    summaries: [],
    questionsResolved: 0,
    questionsGenerated: 0,
  };
  const ledger = resolveSectionLedger(state.lines, sectionId);
  const integrated = ledger ? await integrateAnswers(state, sectionId, ledger, policy, context) : false;

  if (
    getSectionState(state.lines, sectionId).isBlank &&
    !integrated &&
    policy.mode === "integrate_then_questions" &&
    policy.scope.kind === "all_prior_sections"
  ) {
    await draftFromContext(state, sectionId, policy, context);
  }

  const after = getSectionState(state.lines, sectionId);
  const pending = questionsForSection(state.lines, sectionId).filter(isOpenUnanswered).length;
  if (!after.isBlank) {
    return finish(state, sectionId, pending > 0 && !integrated ? [waitingForAnswers(pending)] : []);
  }
  if (pending > 0) return finish(state, sectionId, [waitingForAnswers(pending)]);
  if (!ledger) {
    return finish(state, sectionId, [`Section '${sectionId}' is blank and has no question table`]);
  }
  await generateQuestions(state, sectionId, ledger, policy, context);
  return finish(state, sectionId, state.questionsGenerated > 0 ? [] : [`No new questions generated for '${sectionId}'`]);
};
