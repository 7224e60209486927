export type DocumentLines = readonly string[];

export interface SectionSpan {
  sectionId: string;
  startLine: number;
  endLine: number;
}

export interface SubsectionSpan {
  subsectionId: string;
  parentSectionId: string;
  startLine: number;
  endLine: number;
}

export interface TableBlock {
  tableId: string;
  markerLine: number;
  startLine: number;
  endLine: number;
}

export type QuestionStatus = "Open" | "Resolved" | "Deferred";

export const QUESTION_STATUSES: readonly QuestionStatus[] = ["Open", "Resolved", "Deferred"];

export interface OpenQuestion {
  questionId: string;
  question: string;
  date: string;
  answer: string;
  target: string;
  status: QuestionStatus;
}

export type LedgerKind = "section" | "document";

export type DocType = "requirements" | "research" | "planning";

export const SUPPORTED_DOC_TYPES: readonly DocType[] = ["requirements", "research", "planning"];

export const DEFAULT_DOC_TYPE: DocType = "requirements";

export type MetadataKey = "doc_type" | "doc_format" | "version";

export type DocumentMetadata = Partial<Record<MetadataKey, string>>;

export type GateStatus = "passed" | "failed";

export interface ReviewGateResultMarker {
  gateId: string;
  status: GateStatus;
  issues: number;
  warnings: number;
  lineNumber: number;
}

export interface SectionState {
  sectionId: string;
  exists: boolean;
  locked: boolean;
  isBlank: boolean;
  hasOpenQuestions: boolean;
  hasAnsweredQuestions: boolean;
  openQuestionCount: number;
  answeredQuestionCount: number;
  ledger?: LedgerKind;
}

export type TargetClassification =
  | "missing"
  | "locked"
  | "blank_no_questions"
  | "blank_open_questions"
  | "has_answered_questions"
  | "open_questions"
  | "complete";

export const isReviewGateTarget = (targetId: string): boolean => targetId.startsWith("review_gate:");
