import type { GateStatus } from "@reqforge/shared";

export const PLACEHOLDER_TOKEN = "<!-- PLACEHOLDER -->";

export const MARKER_ID_RE = /^[a-z0-9_]+$/;

export const SECTION_MARKER_RE = /<!--\s*section:([a-z0-9_]+)\s*-->/;
export const SUBSECTION_MARKER_RE = /<!--\s*subsection:([a-z0-9_]+)\s*-->/;
export const TABLE_MARKER_RE = /<!--\s*table:([a-z0-9_]+)\s*-->/;
export const LOCK_MARKER_RE = /<!--\s*section_lock:([a-z0-9_]+)\s+lock=(true|false)\s*-->/;
export const META_MARKER_RE = /<!--\s*meta:([a-z_]+)(?:\s+value="([^"]+)")?(?:\s+version="([^"]+)")?\s*-->/;
export const REVIEW_GATE_RESULT_RE =
  /<!--\s*review_gate_result:([a-z0-9_:]+)\s+status=(passed|failed)(?:\s+issues=(\d+))?(?:\s+warnings=(\d+))?\s*-->/;
export const WORKFLOW_ORDER_START_RE = /<!--\s*workflow:order\b/;

const SECTION_KEYWORD_RE = /<!--\s*section:/;
const SUBSECTION_KEYWORD_RE = /<!--\s*subsection:/;
const TABLE_KEYWORD_RE = /<!--\s*table:/;
const LOCK_KEYWORD_RE = /<!--\s*section_lock:/;
const META_KEYWORD_RE = /<!--\s*meta:/;
const GATE_RESULT_KEYWORD_RE = /<!--\s*review_gate_result:/;

export type RegionMarkerKind = "section" | "subsection" | "table";

export interface WorkflowOrderEntry {
  value: string;
  lineNumber: number;
}

export type MarkerEvent =
  | { kind: RegionMarkerKind; line: number; id: string }
  | { kind: "lock"; line: number; id: string; locked: boolean }
  | { kind: "meta"; line: number; key: string; value?: string; version?: string }
  | { kind: "review_gate_result"; line: number; gateId: string; status: GateStatus; issues: number; warnings: number }
  | { kind: "workflow_order"; line: number; endLine?: number; entries: WorkflowOrderEntry[] }
  | { kind: "placeholder"; line: number }
  | { kind: "malformed"; line: number; content: string; reason: string };

export type MarkerEventOf<K extends MarkerEvent["kind"]> = MarkerEvent extends infer E
  ? E extends { kind: infer EK }
    ? K extends EK
      ? E
      : never
    : never
  : never;

const describeBadId = (keyword: string, line: string): string => {
  const loose = new RegExp(`<!--\\s*${keyword}:(\\S*?)\\s*-->`).exec(line);
  if (!loose) return `Unterminated ${keyword} marker`;
  const id = loose[1] ?? "";
  if (!id) return `Missing ${keyword} ID`;
  return `Invalid ${keyword} ID format '${id}' (expected lowercase letters, digits and underscores)`;
};

const describeBadLock = (line: string): string => {
  const loose = /<!--\s*section_lock:(\S*)(?:\s+lock=(\S*?))?\s*-->/.exec(line);
  if (!loose) return "Unterminated section_lock marker";
  const id = loose[1] ?? "";
  if (!MARKER_ID_RE.test(id)) return `Invalid section_lock ID format '${id}'`;
  const value = loose[2];
  if (value === undefined) return "Lock marker is missing lock=true|false";
  return `Lock value must be 'true' or 'false', got '${value}'`;
};

const regionMatchers: Array<{ kind: RegionMarkerKind; strict: RegExp; keyword: RegExp; name: string }> = [
  { kind: "section", strict: SECTION_MARKER_RE, keyword: SECTION_KEYWORD_RE, name: "section" },
  { kind: "subsection", strict: SUBSECTION_MARKER_RE, keyword: SUBSECTION_KEYWORD_RE, name: "subsection" },
  { kind: "table", strict: TABLE_MARKER_RE, keyword: TABLE_KEYWORD_RE, name: "table" },
];

/**
 * Classifies a single line outside a workflow block. At most one event per line;
 * a line that names a marker keyword but fails its grammar yields a `malformed` event.
 */
export const tokenizeLine = (line: string, index: number): MarkerEvent | undefined => {
  for (const matcher of regionMatchers) {
    const strict = matcher.strict.exec(line);
    if (strict) return { kind: matcher.kind, line: index, id: strict[1] ?? "" };
    if (matcher.keyword.test(line)) {
      return { kind: "malformed", line: index, content: line, reason: describeBadId(matcher.name, line) };
    }
  }

  const lock = LOCK_MARKER_RE.exec(line);
  if (lock) return { kind: "lock", line: index, id: lock[1] ?? "", locked: lock[2] === "true" };
  if (LOCK_KEYWORD_RE.test(line)) {
    return { kind: "malformed", line: index, content: line, reason: describeBadLock(line) };
  }

  const meta = META_MARKER_RE.exec(line);
  if (meta) {
    return { kind: "meta", line: index, key: meta[1] ?? "", value: meta[2], version: meta[3] };
  }
  if (META_KEYWORD_RE.test(line)) {
    return { kind: "malformed", line: index, content: line, reason: "Invalid meta marker" };
  }

  const gate = REVIEW_GATE_RESULT_RE.exec(line);
  if (gate) {
    return {
      kind: "review_gate_result",
      line: index,
      gateId: gate[1] ?? "",
      status: gate[2] === "passed" ? "passed" : "failed",
      issues: Number(gate[3] ?? "0"),
      warnings: Number(gate[4] ?? "0"),
    };
  }
  if (GATE_RESULT_KEYWORD_RE.test(line)) {
    return {
      kind: "malformed",
      line: index,
      content: line,
      reason: "Review gate result marker requires status=passed|failed",
    };
  }

  if (line.includes(PLACEHOLDER_TOKEN)) return { kind: "placeholder", line: index };
  return undefined;
};

const pushWorkflowEntry = (entries: WorkflowOrderEntry[], raw: string, index: number): void => {
  const value = raw.trim();
  if (!value || value.startsWith("#")) return;
  entries.push({ value, lineNumber: index + 1 });
};

/**
 * Single pass over the document. The workflow block is consumed whole so its
 * target lines are never mistaken for other markers.
 */
export const tokenize = (lines: readonly string[]): MarkerEvent[] => {
  const events: MarkerEvent[] = [];
  let workflow: MarkerEventOf<"workflow_order"> | undefined;

  for (let index = 0; index < lines.length; index += 1) {
    const line = lines[index] ?? "";

    if (workflow && workflow.endLine === undefined) {
      const close = line.indexOf("-->");
      if (close >= 0) {
        pushWorkflowEntry(workflow.entries, line.slice(0, close), index);
        workflow.endLine = index;
      } else {
        pushWorkflowEntry(workflow.entries, line, index);
      }
      continue;
    }

    const start = workflow ? null : WORKFLOW_ORDER_START_RE.exec(line);
    if (start) {
      workflow = { kind: "workflow_order", line: index, entries: [] };
      events.push(workflow);
      const remainder = line.slice(start.index + start[0].length);
      const close = remainder.indexOf("-->");
      if (close >= 0) {
        pushWorkflowEntry(workflow.entries, remainder.slice(0, close), index);
        workflow.endLine = index;
      } else {
        pushWorkflowEntry(workflow.entries, remainder, index);
      }
      continue;
    }

    const event = tokenizeLine(line, index);
    if (event) events.push(event);
  }
  return events;
};

export const eventsOfKind = <K extends MarkerEvent["kind"]>(
  events: readonly MarkerEvent[],
  kind: K,
): MarkerEventOf<K>[] => events.filter((event): event is MarkerEventOf<K> => event.kind === kind);

export const isStructuralMarkerLine = (line: string): boolean =>
  SECTION_MARKER_RE.test(line) ||
  SUBSECTION_MARKER_RE.test(line) ||
  TABLE_MARKER_RE.test(line) ||
  LOCK_MARKER_RE.test(line) ||
  META_MARKER_RE.test(line) ||
  REVIEW_GATE_RESULT_RE.test(line) ||
  WORKFLOW_ORDER_START_RE.test(line);

/** True when the text carries any marker grammar or an HTML comment. */
export const containsMarkers = (text: string): boolean => {
  if (text.split(/\r?\n/).some((line) => isStructuralMarkerLine(line))) return true;
  return text.includes("<!--") && text.includes("-->");
};

export const formatLockMarker = (sectionId: string, locked: boolean): string =>
  `<!-- section_lock:${sectionId} lock=${locked ? "true" : "false"} -->`;

export const formatReviewGateResultMarker = (
  gateId: string,
  status: GateStatus,
  issues: number,
  warnings: number,
): string => `<!-- review_gate_result:${gateId} status=${status} issues=${issues} warnings=${warnings} -->`;
