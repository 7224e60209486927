export type HandlerMode = "integrate_then_questions" | "questions_then_integrate" | "review_gate";

export type OutputFormat = "prose" | "bullets" | "subsections";

export type AutoApplyPolicy = "never" | "always" | "if_validation_passes";

export type ReviewScope =
  | { kind: "current_section" }
  | { kind: "all_prior_sections" }
  | { kind: "entire_document" }
  | { kind: "sections"; sectionIds: string[] };

export type ContentFilter =
  | { kind: "dedupe_items" }
  | { kind: "drop_matching"; pattern: string };

export type GatePreCheck = "open_questions_resolved" | "risks_low";

export interface SectionPolicy {
  docType: string;
  sectionId: string;
  mode: HandlerMode;
  outputFormat: OutputFormat;
  preserveHeaders: string[];
  llmProfile: string;
  scope: ReviewScope;
  autoApplyPatches: AutoApplyPolicy;
  contentFilters: ContentFilter[];
  validationRules: string[];
  preChecks: GatePreCheck[];
  lockScopeOnPass: boolean;
  approvalStatusOnPass?: string;
}

export const HANDLER_MODES: readonly HandlerMode[] = [
  "integrate_then_questions",
  "questions_then_integrate",
  "review_gate",
];

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["prose", "bullets", "subsections"];

export const AUTO_APPLY_POLICIES: readonly AutoApplyPolicy[] = ["never", "always", "if_validation_passes"];

export const GATE_PRE_CHECKS: readonly GatePreCheck[] = ["open_questions_resolved", "risks_low"];

const includes = <T extends string>(values: readonly T[], value: string): value is T =>
  values.some((candidate) => candidate === value);

export const isHandlerMode = (value: string): value is HandlerMode => includes(HANDLER_MODES, value);
export const isOutputFormat = (value: string): value is OutputFormat => includes(OUTPUT_FORMATS, value);
export const isAutoApplyPolicy = (value: string): value is AutoApplyPolicy => includes(AUTO_APPLY_POLICIES, value);
export const isGatePreCheck = (value: string): value is GatePreCheck => includes(GATE_PRE_CHECKS, value);

/**
 * Parses `current_section`, `all_prior_sections`, `entire_document` or
 * `sections:a,b,c`. Returns undefined for anything else.
 */
export const parseReviewScope = (raw: string): ReviewScope | undefined => {
  const value = raw.trim();
  switch (value) {
    case "current_section":
    case "all_prior_sections":
    case "entire_document":
      return { kind: value };
    default:
      break;
  }
  if (!value.startsWith("sections:")) return undefined;
  const sectionIds = value
    .slice("sections:".length)
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
  return { kind: "sections", sectionIds };
};

export const formatReviewScope = (scope: ReviewScope): string => {
  switch (scope.kind) {
    case "current_section":
    case "all_prior_sections":
    case "entire_document":
      return scope.kind;
    case "sections":
      return `sections:${scope.sectionIds.join(",")}`;
  }
};
