import {
  InvalidSpanError,
  MalformedMarkerError,
  type DocumentLines,
  type SectionSpan,
} from "@reqforge/shared";
import {
  PLACEHOLDER_TOKEN,
  containsMarkers,
  formatLockMarker,
  tokenize,
  tokenizeLine,
  type MarkerEvent,
} from "../markers/MarkerGrammar.js";
import { LEDGER_SUBSECTION_IDS, findSubsectionsWithin, getSectionSpan } from "../markers/SpanParser.js";
import { isTableRow } from "../tables/MarkdownTable.js";
import { StructuralValidator } from "../validation/StructuralValidator.js";
import { sanitizeBody, type SanitizeOptions } from "./BodySanitizer.js";

const HEADING_WINDOW = 8;

const isHeading = (line: string): boolean => {
  const trimmed = line.trimStart();
  return trimmed.startsWith("## ") || trimmed.startsWith("### ");
};

const assertValid = (lines: DocumentLines): void => {
  new StructuralValidator(lines, { autoRepair: false }).validateOrRaise();
};

const checkSpan = (lines: DocumentLines, start: number, end: number, regionId: string): void => {
  if (start === end) throw new InvalidSpanError(regionId, `Empty span: start=${start} equals end=${end}`);
  if (start > end) throw new InvalidSpanError(regionId, `Invalid span: start=${start} is greater than end=${end}`);
  if (start < 0 || end > lines.length) {
    throw new InvalidSpanError(regionId, `Span out of bounds: start=${start}, end=${end}, len=${lines.length}`);
  }
};

/**
 * Structural lines of a preamble in their original order: every marker, each table
 * with its pipe rows, and the value line under a `meta:` marker that has no inline value.
 */
const carriedStructure = (region: readonly string[]): string[] => {
  const carried: string[] = [];
  for (let index = 0; index < region.length; index += 1) {
    const line = region[index] ?? "";
    const event = tokenizeLine(line, index);
    if (!event || event.kind === "placeholder") continue;
    if (event.kind === "table") {
      const table = [line];
      let cursor = index + 1;
      while (cursor < region.length && !isTableRow(region[cursor]) && !(region[cursor] ?? "").trim()) cursor += 1;
      while (cursor < region.length && isTableRow(region[cursor])) {
        table.push(region[cursor] ?? "");
        cursor += 1;
      }
      carried.push("", ...table);
      index = cursor - 1;
      continue;
    }
    carried.push(line);
    const valueLine = region[index + 1];
    if (event.kind === "meta" && event.value === undefined && valueLine?.trim() && !tokenizeLine(valueLine, index + 1)) {
      carried.push(valueLine);
      index += 1;
    }
  }
  return carried;
};

const markerKey = (event: MarkerEvent): string | undefined => {
  switch (event.kind) {
    case "placeholder":
      return undefined;
    case "lock":
      return `lock:${event.id}:${event.locked}`;
    case "meta":
      return `meta:${event.key}:${event.value ?? ""}:${event.version ?? ""}`;
    case "review_gate_result":
      return `review_gate_result:${event.gateId}:${event.status}:${event.issues}:${event.warnings}`;
    case "workflow_order":
      return `workflow_order:${event.entries.map((entry) => entry.value).join(",")}`;
    case "malformed":
      return `malformed:${event.content.trim()}`;
    default:
      return `${event.kind}:${event.id}`;
  }
};

/** Sorted marker identities of a document, placeholders excluded. */
export const markerInventory = (lines: DocumentLines): string[] =>
  tokenize(lines)
    .map(markerKey)
    .filter((key): key is string => key !== undefined)
    .sort();

const trailingBlankCount = (region: readonly string[]): number => {
  let count = 0;
  for (let index = region.length - 1; index > 0 && !(region[index] ?? "").trim(); index -= 1) count += 1;
  return count;
};

/**
 * Rewrites the free-text body of `lines[start:end]` while keeping every structural
 * marker. Subsections in the block are carried over verbatim; only the preamble
 * before the first subsection is replaced.
 */
export const replaceBody = (
  lines: DocumentLines,
  start: number,
  end: number,
  regionId: string,
  newBody: string,
  options: SanitizeOptions = {},
): string[] => {
  assertValid(lines);
  checkSpan(lines, start, end, regionId);

  const block = lines.slice(start, end);
  const markerLine = block[0] ?? "";
  const crossed = block.findIndex((line, idx) => idx > 0 && tokenizeLine(line, idx)?.kind === "section");
  if (crossed > 0) {
    throw new InvalidSpanError(regionId, `Span crosses the section marker at line ${start + crossed + 1}`);
  }
  const firstSubsection = block.findIndex((line, idx) => idx > 0 && tokenizeLine(line, idx)?.kind === "subsection");
  const preamble = firstSubsection > 0 ? block.slice(0, firstSubsection) : block;
  const subsectionContent = firstSubsection > 0 ? block.slice(firstSubsection) : [];

  const heading = preamble.slice(1, HEADING_WINDOW).find(isHeading);
  const keepDivider = subsectionContent.length === 0 && block.slice(-3).some((line) => line.trim() === "---");
  const structure = carriedStructure(preamble.slice(1));

  const cleaned = sanitizeBody(newBody, options);
  const rebuilt: string[] = [markerLine];
  if (heading !== undefined) rebuilt.push(heading);
  rebuilt.push(...(cleaned ? cleaned.split("\n") : [PLACEHOLDER_TOKEN]));
  rebuilt.push(...structure);
  if (keepDivider) rebuilt.push("---");
  for (let count = trailingBlankCount(preamble); count > 0; count -= 1) rebuilt.push("");
  rebuilt.push(...subsectionContent);

  const next = [...lines.slice(0, start), ...rebuilt, ...lines.slice(end)];
  const [introduced] = new StructuralValidator(next, { autoRepair: false }).validateAll();
  if (introduced) {
    throw new InvalidSpanError(regionId, `Edit to '${regionId}' would corrupt structure: ${introduced.message}`);
  }
  const before = markerInventory(lines);
  const after = markerInventory(next);
  if (before.length !== after.length || before.some((key, idx) => key !== after[idx])) {
    throw new InvalidSpanError(regionId, `Edit to '${regionId}' would change the document's markers`);
  }
  return next;
};

/**
 * End line for body replacement: the start of a question-ledger subsection when the
 * section has one, otherwise the section end.
 */
export const replacementEndBoundary = (lines: DocumentLines, span: SectionSpan): number => {
  const ledger = findSubsectionsWithin(lines, span).find((sub) => LEDGER_SUBSECTION_IDS.has(sub.subsectionId));
  return ledger?.startLine ?? span.endLine;
};

export const replaceSectionBody = (
  lines: DocumentLines,
  sectionId: string,
  newBody: string,
  options: SanitizeOptions = {},
): string[] => {
  const span = getSectionSpan(lines, sectionId);
  if (!span) throw new InvalidSpanError(sectionId, "section not found");
  return replaceBody(lines, span.startLine, replacementEndBoundary(lines, span), sectionId, newBody, options);
};

export const applyPatch = (
  lines: DocumentLines,
  sectionId: string,
  suggestion: string,
  options: SanitizeOptions = {},
): string[] => {
  assertValid(lines);
  if (!getSectionSpan(lines, sectionId)) {
    throw new InvalidSpanError(sectionId, "Cannot apply patch - section not found");
  }
  if (containsMarkers(suggestion)) {
    throw new MalformedMarkerError(undefined, suggestion.split("\n")[0] ?? "", "Patch suggestion contains forbidden structure markers");
  }
  return replaceSectionBody(lines, sectionId, suggestion, options);
};

/**
 * Sets the authoritative (last) lock marker of a section, inserting one after the
 * section's last content line when it has none. Unknown sections are left alone.
 */
export const setSectionLock = (lines: DocumentLines, sectionId: string, locked: boolean): string[] => {
  const span = getSectionSpan(lines, sectionId);
  if (!span) return [...lines];
  const marker = formatLockMarker(sectionId, locked);
  const next = [...lines];
  for (let index = span.endLine - 1; index > span.startLine; index -= 1) {
    const event = tokenizeLine(next[index] ?? "", index);
    if (event?.kind === "lock" && event.id === sectionId) {
      next[index] = marker;
      return next;
    }
  }
  let insertAt = span.endLine;
  while (insertAt > span.startLine + 1) {
    const previous = (next[insertAt - 1] ?? "").trim();
    if (previous !== "" && previous !== "---") break;
    insertAt -= 1;
  }
  next.splice(insertAt, 0, marker);
  return next;
};
