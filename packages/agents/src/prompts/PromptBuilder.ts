import type {
  DraftRequest,
  IntegrateRequest,
  OutputFormat,
  QuestionRequest,
  ReviewRequest,
  SubsectionShape,
} from "@reqforge/shared";
import type { ChatMessage } from "../adapters/AdapterTypes.js";

const FORMAT_GUIDANCE: Record<OutputFormat, string> = {
  prose: "Write the content as flowing prose paragraphs.",
  bullets: "Write the content as a bullet list (dash-prefixed, one item per line).",
  subsections: "Organize the content under subsection headers (###).",
};

const BODY_ONLY = "Output only the section body (no markers, no headers, no lock tags). Remove placeholder wording.";

export const formatPriorSections = (priorContext: Record<string, string>): string => {
  const entries = Object.entries(priorContext);
  if (entries.length === 0) return "";
  const lines = ["## Document Context (completed sections)"];
  for (const [sectionId, content] of entries) {
    lines.push(`### ${sectionId}`, content.trim());
  }
  return lines.join("\n");
};

/** Table subsections get a routing hint so rows land in the right table. */
export const formatSubsectionGuidance = (subsections: readonly SubsectionShape[]): string => {
  const tables = subsections.filter((sub) => sub.hasTable);
  if (tables.length === 0) return "";
  const lines = [
    "This section has table subsections. Put table rows under a `### <Title>` header matching one of:",
    ...tables.map((sub) => `- ${sub.title ?? sub.subsectionId}`),
    "Rows must have the same columns as the existing table header.",
  ];
  return lines.join("\n");
};

const messages = (profile: string, task: string): ChatMessage[] => [
  { role: "system", content: profile },
  { role: "user", content: task.trim() },
];

const contextBlock = (request: DraftRequest): string => {
  const context = formatPriorSections(request.priorContext);
  return context ? `${context}\n\n---\n\n` : "";
};

const quoted = (body: string): string => `"""${body}"""`;

export const buildQuestionsPrompt = (request: QuestionRequest, profile: string): ChatMessage[] => {
  const hasContext = Object.keys(request.priorContext).length > 0;
  const existing = request.existingQuestions.length
    ? `\nAlready asked (do not repeat):\n${request.existingQuestions.map((q) => `- ${q}`).join("\n")}\n`
    : "";
  return messages(
    profile,
    `${contextBlock(request)}## Task: Generate Clarifying Questions

Section ID: ${request.sectionId}

Current Section Content:
${quoted(request.currentBody)}
${existing}
${hasContext ? "Given the document context above, generate" : "Generate"} 2-5 clarifying questions to help complete this section.
Output JSON with this exact shape:

{
  "questions": [
    { "question": "string", "section_target": "string (a valid section id, default ${request.sectionId})", "rationale": "string (short)" }
  ]
}

Return JSON only. No prose.`,
  );
};

export const buildIntegratePrompt = (request: IntegrateRequest, profile: string): ChatMessage[] => {
  const qa = request.answeredQuestions
    .map((question) => `- ${question.questionId}: ${question.question}\n  Answer: ${question.answer}`)
    .join("\n");
  const region = request.targetId === request.sectionId ? request.sectionId : `${request.sectionId} / ${request.targetId}`;
  const guidance = formatSubsectionGuidance(request.subsections);
  return messages(
    profile,
    `${contextBlock(request)}## Task: Integrate Answers into Section

Section ID: ${region}
Output Format: ${FORMAT_GUIDANCE[request.outputFormat]}

Current Section Content:
${quoted(request.currentBody)}

Answered Questions:
${qa}
${guidance ? `\n${guidance}\n` : ""}
Rewrite the section incorporating the answers. ${BODY_ONLY}`,
  );
};

export const buildDraftPrompt = (request: DraftRequest, profile: string): ChatMessage[] => {
  const guidance = formatSubsectionGuidance(request.subsections);
  return messages(
    profile,
    `${contextBlock(request)}## Task: Draft Section Content from Prior Context

Section ID: ${request.sectionId}
Output Format: ${FORMAT_GUIDANCE[request.outputFormat]}

Current Section Content (for structural reference):
${quoted(request.currentBody)}
${guidance ? `\n${guidance}\n` : ""}
Based on the document context above, draft initial content for the ${request.sectionId} section.
Stay within what can be inferred from the completed sections and note anything that cannot be determined.
${BODY_ONLY}`,
  );
};

export const buildReviewPrompt = (request: ReviewRequest, profile: string): ChatMessage[] => {
  const sections = Object.entries(request.sectionContents)
    .map(([sectionId, content]) => `## Section: ${sectionId}\n${content}`)
    .join("\n\n");
  return messages(
    profile,
    `## Task: Review Document Sections

Gate ID: ${request.gateId}
Document Type: ${request.docType}
Validation Rules: ${request.rules.join(", ") || "(none)"}

Sections to Review:
${sections || "(no sections in scope)"}

Analyze the sections for completeness, consistency, clarity and feasibility.

Output JSON with format:
{
  "pass": boolean,
  "issues": [
    { "severity": "blocker|warning|info", "section": "section_id", "description": "...", "suggestion": "..." }
  ],
  "patches": [
    { "section": "section_id", "suggestion": "replacement section body", "rationale": "..." }
  ],
  "summary": "Brief overall assessment"
}

Return JSON only. No prose.`,
  );
};
