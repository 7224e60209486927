import type { CompletionService, Logger } from "@reqforge/shared";
import type { ReviewGateResult } from "../review/ReviewTypes.js";

export type WorkflowAction = "integration" | "draft" | "question_gen" | "review_gate" | "no_action" | "complete";

export interface WorkflowResult {
  targetId?: string;
  action: WorkflowAction;
  changed: boolean;
  blocked: boolean;
  blockedReasons: string[];
  summaries: string[];
  questionsGenerated: number;
  questionsResolved: number;
  lines: string[];
  /** Version written by the milestone that followed this step. */
  version?: string;
  reviewGate?: ReviewGateResult;
}

/** Collaborators shared by section handlers and review gates for one step. */
export interface StepContext {
  docType: string;
  workflowOrder: readonly string[];
  completion: CompletionService;
  logger: Logger;
  /** Date stamped on new ledger rows and history entries, YYYY-MM-DD. */
  today: string;
}

export const toIsoDate = (date: Date): string => date.toISOString().slice(0, 10);

export const emptyResult = (lines: readonly string[], action: WorkflowAction, targetId?: string): WorkflowResult => ({
  targetId,
  action,
  changed: false,
  blocked: false,
  blockedReasons: [],
  summaries: [],
  questionsGenerated: 0,
  questionsResolved: 0,
  lines: [...lines],
});

export const waitingForAnswers = (count: number): string => `Waiting for ${count} questions to be answered`;
