import type { OpenQuestion } from "../document/DocumentTypes.js";
import type { OutputFormat } from "../policy/SectionPolicy.js";

export interface SubsectionShape {
  subsectionId: string;
  title?: string;
  hasTable: boolean;
}

export interface DraftRequest {
  sectionId: string;
  docType: string;
  currentBody: string;
  priorContext: Record<string, string>;
  profile: string;
  outputFormat: OutputFormat;
  subsections: SubsectionShape[];
}

export interface QuestionRequest extends DraftRequest {
  existingQuestions: string[];
}

export interface IntegrateRequest extends DraftRequest {
  targetId: string;
  answeredQuestions: OpenQuestion[];
}

export interface ProposedQuestion {
  question: string;
  target: string;
  rationale: string;
}

export type ReviewSeverity = "blocker" | "warning" | "info";

export interface ReviewFinding {
  severity: ReviewSeverity;
  section: string;
  description: string;
  suggestedFix?: string;
}

export interface ReviewPatchProposal {
  section: string;
  suggestedText: string;
  rationale: string;
}

export interface ReviewRequest {
  gateId: string;
  docType: string;
  sectionContents: Record<string, string>;
  rules: string[];
  profile: string;
}

export interface ReviewResponse {
  passed: boolean;
  issues: ReviewFinding[];
  patches: ReviewPatchProposal[];
  summary: string;
}

/**
 * Text-completion collaborator used by the workflow runner and review gates.
 * Every method is awaited one call at a time.
 */
export interface CompletionService {
  draft(request: DraftRequest): Promise<string>;
  generateQuestions(request: QuestionRequest): Promise<ProposedQuestion[]>;
  integrate(request: IntegrateRequest): Promise<string>;
  review(request: ReviewRequest): Promise<ReviewResponse>;
}
