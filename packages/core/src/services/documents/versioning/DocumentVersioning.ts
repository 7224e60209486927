import type { DocumentLines } from "@reqforge/shared";
import { PLACEHOLDER_TOKEN, tokenizeLine } from "../markers/MarkerGrammar.js";
import { buildTableRow, isTableRow, toCellText } from "../tables/MarkdownTable.js";

export const AUTOMATION_ACTOR = "reqforge";

const META_VERSION_RE = /<!--\s*meta:version\s*-->/;
const VERSION_VALUE_RE = /(-\s*\*\*Version:\*\*\s*)(\d+\.\d+)/;
const CURRENT_VERSION_ROW_RE = /(\|\s*Current Version\s*\|\s*)(\d+\.\d+)(\s*\|)/;
const VERSION_RE = /^(\d+)\.(\d+)$/;

export const parseVersion = (version: string): [number, number] | undefined => {
  const match = VERSION_RE.exec(version.trim());
  if (!match) return undefined;
  return [Number(match[1]), Number(match[2])];
};

/** Negative, zero or positive like a sort comparator. Unparseable versions sort first. */
export const compareVersions = (left: string, right: string): number => {
  const a = parseVersion(left);
  const b = parseVersion(right);
  if (!a || !b) return a ? 1 : b ? -1 : 0;
  return a[0] !== b[0] ? a[0] - b[0] : a[1] - b[1];
};

export const getCurrentVersion = (lines: DocumentLines): string => {
  const index = lines.findIndex((line) => META_VERSION_RE.test(line));
  if (index < 0) return "0.0";
  const match = VERSION_VALUE_RE.exec(lines[index + 1] ?? "");
  return match?.[2] ?? "0.0";
};

export const shouldIncrementVersion = (milestone: string | undefined, currentVersion: string): milestone is string =>
  milestone !== undefined && milestone !== "0.0" && compareVersions(milestone, currentVersion) > 0;

const updateMetaVersion = (lines: string[], version: string): void => {
  const index = lines.findIndex((line) => META_VERSION_RE.test(line));
  const valueLine = lines[index + 1];
  if (index < 0 || valueLine === undefined || !VERSION_VALUE_RE.test(valueLine)) return;
  lines[index + 1] = valueLine.replace(VERSION_VALUE_RE, `$1${version}`);
};

const updateDocumentControl = (lines: string[], version: string): void => {
  const start = lines.findIndex((line) => {
    const event = tokenizeLine(line, 0);
    return event?.kind === "table" && event.id === "document_control";
  });
  if (start < 0) return;
  for (let index = start + 1; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    if (tokenizeLine(line, index)?.kind === "section") return;
    if (CURRENT_VERSION_ROW_RE.test(line)) {
      lines[index] = line.replace(CURRENT_VERSION_ROW_RE, `$1${version}$3`);
      return;
    }
  }
};

const updateVersionHistory = (lines: string[], version: string, changes: string, date: string): void => {
  const start = lines.findIndex((line) => {
    const event = tokenizeLine(line, 0);
    return event?.kind === "subsection" && event.id === "version_history";
  });
  if (start < 0) return;
  const row = buildTableRow([version, date, AUTOMATION_ACTOR, toCellText(changes)]);
  let firstRow: number | undefined;
  let lastRow: number | undefined;
  for (let index = start + 1; index < lines.length; index += 1) {
    const line = lines[index] ?? "";
    const event = tokenizeLine(line, index);
    if (event?.kind === "section" || event?.kind === "subsection") break;
    if (!isTableRow(line)) {
      if (lastRow !== undefined) break;
      continue;
    }
    if (line.includes(PLACEHOLDER_TOKEN)) {
      lines[index] = row;
      return;
    }
    firstRow ??= index;
    lastRow = index;
  }
  // header and separator must both be present before a row can be appended
  if (firstRow !== undefined && lastRow !== undefined && lastRow > firstRow) lines.splice(lastRow + 1, 0, row);
};

/**
 * Writes a new version into the meta line, the document control table and the
 * version history table. Missing pieces are skipped.
 */
export const updateDocumentVersion = (
  lines: DocumentLines,
  version: string,
  changes: string,
  date: string,
): string[] => {
  const next = [...lines];
  updateMetaVersion(next, version);
  updateDocumentControl(next, version);
  updateVersionHistory(next, version, changes, date);
  return next;
};

export interface MilestoneResult {
  lines: string[];
  previousVersion: string;
  version?: string;
}

export const applyVersionMilestone = (
  lines: DocumentLines,
  targetId: string,
  milestone: string | undefined,
  date: string,
): MilestoneResult => {
  const previousVersion = getCurrentVersion(lines);
  if (!shouldIncrementVersion(milestone, previousVersion)) return { lines: [...lines], previousVersion };
  return {
    lines: updateDocumentVersion(lines, milestone, `Completed ${targetId}`, date),
    previousVersion,
    version: milestone,
  };
};
