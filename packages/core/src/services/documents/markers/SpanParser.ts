import {
  ParseFailure,
  type DocumentLines,
  type DocumentMetadata,
  type MetadataKey,
  type ReviewGateResultMarker,
  type SectionSpan,
  type SubsectionSpan,
  type TableBlock,
} from "@reqforge/shared";
import {
  PLACEHOLDER_TOKEN,
  SECTION_MARKER_RE,
  eventsOfKind,
  isStructuralMarkerLine,
  tokenize,
  tokenizeLine,
  type MarkerEvent,
} from "./MarkerGrammar.js";

const SUPPORTED_METADATA_KEYS: ReadonlySet<string> = new Set(["doc_type", "doc_format"]);
const META_VALUE_LINE_RE = /^-\s*\*\*([^*:]+):?\*\*:?\s*(.+)$/;

export const LEDGER_SUBSECTION_IDS: ReadonlySet<string> = new Set(["questions_issues", "open_questions"]);

export const isLedgerRegionId = (id: string): boolean => LEDGER_SUBSECTION_IDS.has(id) || id.endsWith("_questions");

const pairStarts = <T>(
  starts: Array<{ id: string; line: number }>,
  end: number,
  build: (id: string, start: number, stop: number) => T,
): T[] =>
  starts.map((entry, idx) => build(entry.id, entry.line, starts[idx + 1]?.line ?? end));

export const findSections = (lines: DocumentLines, events: readonly MarkerEvent[] = tokenize(lines)): SectionSpan[] =>
  pairStarts(
    eventsOfKind(events, "section").map((event) => ({ id: event.id, line: event.line })),
    lines.length,
    (sectionId, startLine, endLine) => ({ sectionId, startLine, endLine }),
  );

export const getSectionSpan = (lines: DocumentLines, sectionId: string): SectionSpan | undefined =>
  findSections(lines).find((span) => span.sectionId === sectionId);

export const findSubsectionsWithin = (lines: DocumentLines, span: SectionSpan): SubsectionSpan[] => {
  const starts: Array<{ id: string; line: number }> = [];
  for (let index = span.startLine; index < span.endLine; index += 1) {
    const event = tokenizeLine(lines[index] ?? "", index);
    if (event?.kind === "subsection") starts.push({ id: event.id, line: index });
  }
  return pairStarts(starts, span.endLine, (subsectionId, startLine, endLine) => ({
    subsectionId,
    parentSectionId: span.sectionId,
    startLine,
    endLine,
  }));
};

export const getSubsectionSpan = (
  lines: DocumentLines,
  span: SectionSpan,
  subsectionId: string,
): SubsectionSpan | undefined =>
  findSubsectionsWithin(lines, span).find((sub) => sub.subsectionId === subsectionId);

export const extractAllSectionIds = (lines: DocumentLines): string[] =>
  findSections(lines).map((span) => span.sectionId);

const isPipeRow = (line: string | undefined): boolean => (line ?? "").trimStart().startsWith("|");

/**
 * Locates the pipe rows bound to a table marker. A section marker reached before
 * any pipe row means the table is absent.
 */
export const findTableBlock = (
  lines: DocumentLines,
  tableId: string,
  range: { startLine: number; endLine: number } = { startLine: 0, endLine: lines.length },
): TableBlock | undefined => {
  let markerLine: number | undefined;
  for (let index = range.startLine; index < range.endLine; index += 1) {
    const event = tokenizeLine(lines[index] ?? "", index);
    if (event?.kind === "table" && event.id === tableId) {
      markerLine = index;
      break;
    }
  }
  if (markerLine === undefined) return undefined;

  let startLine: number | undefined;
  for (let index = markerLine + 1; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    if (isPipeRow(line)) {
      startLine = index;
      break;
    }
    if (SECTION_MARKER_RE.test(line)) return undefined;
  }
  if (startLine === undefined) return undefined;

  let endLine = startLine;
  while (endLine < lines.length && isPipeRow(lines[endLine])) endLine += 1;
  return { tableId, markerLine, startLine, endLine };
};

export const extractWorkflowOrder = (lines: DocumentLines): string[] => {
  const block = eventsOfKind(tokenize(lines), "workflow_order")[0];
  if (!block) {
    throw new ParseFailure(
      "Workflow order block not found. Add one after the metadata comments, e.g. <!-- workflow:order\\nsection_id\\n-->",
    );
  }
  if (block.endLine === undefined) {
    throw new ParseFailure(`Workflow order block not terminated (started on line ${block.line + 1}).`, {
      line: block.line + 1,
    });
  }
  const seen = new Set<string>();
  const order: string[] = [];
  for (const entry of block.entries) {
    if (seen.has(entry.value)) {
      throw new ParseFailure(`Duplicate workflow target '${entry.value}' on line ${entry.lineNumber}.`, {
        target: entry.value,
        line: entry.lineNumber,
      });
    }
    seen.add(entry.value);
    order.push(entry.value);
  }
  if (order.length === 0) throw new ParseFailure("Workflow order block is empty.");
  return order;
};

const normalizeMetaLabel = (label: string): string => label.trim().toLowerCase().replace(/[\s-]+/g, "_");

const isMetadataKey = (key: string): key is MetadataKey =>
  key === "doc_type" || key === "doc_format" || key === "version";

export const extractMetadata = (lines: DocumentLines): DocumentMetadata => {
  const metadata: DocumentMetadata = {};
  for (const event of eventsOfKind(tokenize(lines), "meta")) {
    if (!SUPPORTED_METADATA_KEYS.has(event.key) || !isMetadataKey(event.key)) continue;
    const value = (event.value ?? "").trim();
    if (value) {
      metadata[event.key] = value;
    } else {
      const next = META_VALUE_LINE_RE.exec((lines[event.line + 1] ?? "").trim());
      if (next && normalizeMetaLabel(next[1] ?? "") === event.key) {
        metadata[event.key] = (next[2] ?? "").trim();
      }
    }
    const version = (event.version ?? "").trim();
    if (event.key === "doc_format" && version) metadata.version = version;
  }
  return metadata;
};

/** Last marker per gate id wins. */
export const extractReviewGateResults = (lines: DocumentLines): Map<string, ReviewGateResultMarker> => {
  const results = new Map<string, ReviewGateResultMarker>();
  for (const event of eventsOfKind(tokenize(lines), "review_gate_result")) {
    results.set(event.gateId, {
      gateId: event.gateId,
      status: event.status,
      issues: event.issues,
      warnings: event.warnings,
      lineNumber: event.line + 1,
    });
  }
  return results;
};

export const sectionText = (lines: DocumentLines, span: SectionSpan): string =>
  lines.slice(span.startLine, span.endLine).join("\n");

export const sectionBody = (lines: DocumentLines, span: { startLine: number; endLine: number }): string => {
  const body = lines
    .slice(span.startLine, span.endLine)
    .filter(
      (line) =>
        !isStructuralMarkerLine(line) &&
        !line.trimStart().startsWith("##") &&
        line.trim() !== "---",
    );
  return body.join("\n").replace(/^\n+|\n+$/g, "");
};

export const sectionIsLocked = (lines: DocumentLines, span: SectionSpan): boolean => {
  let locked = false;
  for (let index = span.startLine; index < span.endLine; index += 1) {
    const event = tokenizeLine(lines[index] ?? "", index);
    if (event?.kind === "lock") locked = event.locked;
  }
  return locked;
};

export const preambleEndLine = (lines: DocumentLines, span: SectionSpan): number =>
  findSubsectionsWithin(lines, span)[0]?.startLine ?? span.endLine;

/**
 * Lines of the span that count toward blankness: everything except question-ledger
 * subsections and ledger tables.
 */
const contentLineIndexes = (lines: DocumentLines, span: SectionSpan): number[] => {
  const excluded = new Set<number>();
  for (const sub of findSubsectionsWithin(lines, span)) {
    if (!isLedgerRegionId(sub.subsectionId)) continue;
    for (let index = sub.startLine; index < sub.endLine; index += 1) excluded.add(index);
  }
  for (let index = span.startLine; index < span.endLine; index += 1) {
    const event = tokenizeLine(lines[index] ?? "", index);
    if (event?.kind !== "table" || !isLedgerRegionId(event.id)) continue;
    let cursor = index + 1;
    while (cursor < span.endLine && !isPipeRow(lines[cursor]) && !(lines[cursor] ?? "").includes("<!--")) cursor += 1;
    while (cursor < span.endLine && isPipeRow(lines[cursor])) {
      excluded.add(cursor);
      cursor += 1;
    }
  }
  const indexes: number[] = [];
  for (let index = span.startLine; index < span.endLine; index += 1) {
    if (!excluded.has(index)) indexes.push(index);
  }
  return indexes;
};

export const sectionIsBlank = (lines: DocumentLines, span: SectionSpan): boolean =>
  contentLineIndexes(lines, span).some((index) => (lines[index] ?? "").includes(PLACEHOLDER_TOKEN));

export const spanHasPlaceholder = (lines: DocumentLines, span: { startLine: number; endLine: number }): boolean =>
  lines.slice(span.startLine, span.endLine).some((line) => line.includes(PLACEHOLDER_TOKEN));
