import type { ProposedQuestion, ReviewFinding, ReviewPatchProposal, ReviewResponse, ReviewSeverity } from "@reqforge/shared";
import { AdapterError } from "../adapters/AdapterTypes.js";

const FENCED_JSON_RE = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const invalid = (message: string, details?: Record<string, unknown>): AdapterError =>
  new AdapterError({ code: "invalid_response", message, details });

/** Pulls a JSON object out of model output: a fenced block, the whole text, or the outermost braces. */
export const extractJsonObject = (text: string): string => {
  const trimmed = text.trim();
  const fenced = FENCED_JSON_RE.exec(trimmed);
  if (fenced?.[1]) return fenced[1].trim();
  if (trimmed.startsWith("{") && trimmed.endsWith("}")) return trimmed;
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first !== -1 && last > first) return trimmed.slice(first, last + 1).trim();
  throw invalid("No JSON object found in model output");
};

export const parseJsonObject = (text: string): Record<string, unknown> => {
  const payload = extractJsonObject(text);
  let parsed: unknown;
  try {
    parsed = JSON.parse(payload);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw invalid(`Model output is not valid JSON: ${message}`);
  }
  if (!isRecord(parsed)) throw invalid("Model output JSON is not an object");
  return parsed;
};

const text = (value: unknown): string => (typeof value === "string" ? value.trim() : "");

/** Question proposals; entries without question text are dropped and the target defaults to the section. */
export const parseQuestionList = (raw: string, sectionId: string): ProposedQuestion[] => {
  const data = parseJsonObject(raw);
  if (!Array.isArray(data.questions)) throw invalid("Expected a 'questions' array in model output");
  const questions: ProposedQuestion[] = [];
  for (const entry of data.questions) {
    if (!isRecord(entry)) continue;
    const question = text(entry.question);
    if (!question) continue;
    questions.push({
      question,
      target: text(entry.section_target) || text(entry.target) || sectionId,
      rationale: text(entry.rationale),
    });
  }
  return questions;
};

const parseSeverity = (value: unknown): ReviewSeverity => {
  const normalized = text(value).toLowerCase();
  return normalized === "blocker" || normalized === "info" ? normalized : "warning";
};

const parseFinding = (entry: unknown, index: number): ReviewFinding => {
  if (!isRecord(entry)) throw invalid(`Review issue ${index} must be an object`, { index });
  const suggestedFix = text(entry.suggestion) || text(entry.suggested_fix);
  return {
    severity: parseSeverity(entry.severity),
    section: text(entry.section) || "unknown",
    description: text(entry.description),
    ...(suggestedFix ? { suggestedFix } : {}),
  };
};

const parsePatch = (entry: unknown, index: number): ReviewPatchProposal => {
  if (!isRecord(entry)) throw invalid(`Review patch ${index} must be an object`, { index });
  return {
    section: text(entry.section),
    suggestedText: typeof entry.suggestion === "string" ? entry.suggestion : text(entry.suggested_text),
    rationale: text(entry.rationale),
  };
};

/**
 * Validates a review payload. `issues` and `patches` must be arrays of objects and
 * `summary` a string; the pass flag is reported as given.
 */
export const parseReviewResponse = (raw: string): ReviewResponse => {
  const data = parseJsonObject(raw);
  const issues = data.issues ?? [];
  const patches = data.patches ?? [];
  if (!Array.isArray(issues)) throw invalid("Review 'issues' must be an array");
  if (!Array.isArray(patches)) throw invalid("Review 'patches' must be an array");
  const summary = data.summary ?? "";
  if (typeof summary !== "string") throw invalid("Review 'summary' must be a string");
  return {
    passed: data.pass === true || data.passed === true,
    issues: issues.map(parseFinding),
    patches: patches.map(parsePatch),
    summary: summary.trim(),
  };
};
