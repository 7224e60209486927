import type { DocumentLines, SubsectionShape } from "@reqforge/shared";
import { tokenizeLine } from "../markers/MarkerGrammar.js";
import { findSubsectionsWithin, getSectionSpan, isLedgerRegionId } from "../markers/SpanParser.js";
import {
  buildTableRow,
  isPlaceholderRow,
  isSeparatorRow,
  isTableRow,
  parseTableRow,
  sameColumns,
} from "../tables/MarkdownTable.js";

const toSubsectionId = (title: string): string =>
  title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "_")
    .replace(/^_+|_+$/g, "");

interface TableLocation {
  subsectionId: string;
  headerLine: number;
  endLine: number;
}

const locateTable = (lines: DocumentLines, start: number, end: number, subsectionId: string): TableLocation | undefined => {
  let index = start;
  while (index < end && tokenizeLine(lines[index] ?? "", index)?.kind !== "table") index += 1;
  while (index < end && !isTableRow(lines[index])) index += 1;
  if (index >= end) return undefined;
  const headerLine = index;
  while (index < end && isTableRow(lines[index])) index += 1;
  if (index - headerLine < 2) return undefined;
  return { subsectionId, headerLine, endLine: index };
};

/** Content subsections of a section, with their heading and whether they hold a table. */
export const describeSubsections = (lines: DocumentLines, sectionId: string): SubsectionShape[] => {
  const span = getSectionSpan(lines, sectionId);
  if (!span) return [];
  return findSubsectionsWithin(lines, span)
    .filter((sub) => !isLedgerRegionId(sub.subsectionId))
    .map((sub) => {
      const heading = lines
        .slice(sub.startLine + 1, sub.endLine)
        .map((line) => line.trim())
        .find((line) => line.startsWith("#"));
      return {
        subsectionId: sub.subsectionId,
        title: heading?.replace(/^#+\s*/, ""),
        hasTable: locateTable(lines, sub.startLine, sub.endLine, sub.subsectionId) !== undefined,
      };
    });
};

const splitOutput = (output: string, tableIds: ReadonlySet<string>): { rows: Map<string, string[][]>; prose: string } => {
  const rows = new Map<string, string[][]>();
  const prose: string[] = [];
  let current: string | undefined;
  for (const line of output.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (trimmed.startsWith("###")) {
      const id = toSubsectionId(trimmed.replace(/^#+/, ""));
      current = tableIds.has(id) ? id : undefined;
      continue;
    }
    if (isTableRow(trimmed) && trimmed.endsWith("|")) {
      const cells = parseTableRow(trimmed);
      if (current && !isSeparatorRow(cells)) {
        const bucket = rows.get(current) ?? [];
        bucket.push(cells);
        rows.set(current, bucket);
      }
      continue;
    }
    prose.push(line);
  }
  return { rows, prose: prose.join("\n").replace(/\n{3,}/g, "\n\n").trim() };
};

/**
 * Moves table rows grouped under `### <Subsection Title>` headers into the matching
 * table subsections, dropping placeholder rows. The remaining text is returned as
 * the body for the section preamble.
 */
export const routeTableContent = (
  lines: DocumentLines,
  sectionId: string,
  output: string,
): { lines: string[]; preamble: string; routedRows: number } => {
  const tableIds = new Set(
    describeSubsections(lines, sectionId)
      .filter((sub) => sub.hasTable)
      .map((sub) => sub.subsectionId),
  );
  if (tableIds.size === 0) return { lines: [...lines], preamble: output, routedRows: 0 };

  const { rows, prose } = splitOutput(output, tableIds);
  if (rows.size === 0) return { lines: [...lines], preamble: output, routedRows: 0 };

  let next = [...lines];
  let routedRows = 0;
  for (const [subsectionId, incoming] of rows) {
    const span = getSectionSpan(next, sectionId);
    const sub = span ? findSubsectionsWithin(next, span).find((candidate) => candidate.subsectionId === subsectionId) : undefined;
    if (!sub) continue;
    const table = locateTable(next, sub.startLine, sub.endLine, subsectionId);
    if (!table) continue;
    const header = parseTableRow(next[table.headerLine] ?? "");
    const existing = next
      .slice(table.headerLine + 2, table.endLine)
      .map(parseTableRow)
      .filter((cells) => !isPlaceholderRow(cells));
    const accepted = incoming.filter((cells) => cells.length === header.length && !sameColumns(cells, header));
    if (accepted.length === 0) continue;
    routedRows += accepted.length;
    next = [
      ...next.slice(0, table.headerLine + 2),
      ...[...existing, ...accepted].map(buildTableRow),
      ...next.slice(table.endLine),
    ];
  }
  return { lines: next, preamble: prose, routedRows };
};
