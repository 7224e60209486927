import {
  DuplicateSectionError,
  InvalidSpanError,
  MalformedMarkerError,
  OrphanedLockError,
  TableSchemaError,
  type DocumentLines,
  type StructuralError,
} from "@reqforge/shared";
import { eventsOfKind, tokenize, tokenizeLine, type MarkerEvent } from "../markers/MarkerGrammar.js";
import { findSections, findSubsectionsWithin, findTableBlock } from "../markers/SpanParser.js";
import {
  DOCUMENT_QUESTION_COLUMNS,
  DOCUMENT_QUESTIONS_TABLE_ID,
  SECTION_QUESTION_COLUMNS,
} from "../questions/QuestionLedger.js";
import {
  buildSeparatorRow,
  buildTableRow,
  isSeparatorRow,
  parseTableRow,
  sameColumns,
} from "../tables/MarkdownTable.js";

/** A section that must always carry a particular subsection and ledger table. */
export interface LedgerAnchor {
  sectionId: string;
  subsectionId: string;
  tableId: string;
  heading: string;
  columns: readonly string[];
}

export const REQUIRED_LEDGER_ANCHORS: readonly LedgerAnchor[] = [
  {
    sectionId: "risks_open_issues",
    subsectionId: "open_questions",
    tableId: DOCUMENT_QUESTIONS_TABLE_ID,
    heading: "### Open Questions",
    columns: DOCUMENT_QUESTION_COLUMNS,
  },
];

export interface StructuralValidatorOptions {
  templateLines?: DocumentLines;
  autoRepair?: boolean;
  anchors?: readonly LedgerAnchor[];
}

const schemaColumnsFor = (tableId: string): readonly string[] | undefined => {
  if (tableId === DOCUMENT_QUESTIONS_TABLE_ID) return DOCUMENT_QUESTION_COLUMNS;
  if (tableId.endsWith("_questions")) return SECTION_QUESTION_COLUMNS;
  return undefined;
};

const isDividerOrBlank = (line: string | undefined): boolean => {
  const trimmed = (line ?? "").trim();
  return trimmed === "" || trimmed === "---";
};

const regionHasMarker = (
  lines: DocumentLines,
  region: { startLine: number; endLine: number },
  kind: "subsection" | "table",
  id: string,
): boolean => {
  for (let index = region.startLine; index < region.endLine; index += 1) {
    const event = tokenizeLine(lines[index] ?? "", index);
    if (event?.kind === kind && event.id === id) return true;
  }
  return false;
};

/**
 * Collects every structural violation in a document. Checks are independent and
 * cumulative; only the declared ledger anchors are ever repaired.
 */
export class StructuralValidator {
  readonly sourceLines: readonly string[];
  readonly templateLines?: DocumentLines;
  readonly autoRepair: boolean;
  readonly anchors: readonly LedgerAnchor[];
  lines: string[];
  errors: StructuralError[] = [];
  repairsMade: string[] = [];

  constructor(lines: DocumentLines, options: StructuralValidatorOptions = {}) {
    this.sourceLines = [...lines];
    this.lines = [...lines];
    this.templateLines = options.templateLines;
    this.autoRepair = options.autoRepair ?? true;
    this.anchors = options.anchors ?? REQUIRED_LEDGER_ANCHORS;
  }

  validateAll(): StructuralError[] {
    this.lines = [...this.sourceLines];
    this.errors = [];
    this.repairsMade = [];

    if (this.autoRepair) {
      for (const anchor of this.anchors) this.repairAnchor(anchor);
    }

    const events = tokenize(this.lines);
    this.validateSections(events);
    this.validateMalformed(events);
    this.validateLocks(events);
    this.validateSubsections(events);
    this.validateSchemaTables(events);
    if (this.templateLines) this.validateAgainstTemplate(events, this.templateLines);
    return this.errors;
  }

  validateOrRaise(): void {
    const [first] = this.validateAll();
    if (first) throw first;
  }

  private validateSections(events: readonly MarkerEvent[]): void {
    const byId = new Map<string, number[]>();
    for (const event of eventsOfKind(events, "section")) {
      const lines = byId.get(event.id) ?? [];
      lines.push(event.line + 1);
      byId.set(event.id, lines);
    }
    for (const [sectionId, lineNumbers] of byId) {
      if (lineNumbers.length > 1) this.errors.push(new DuplicateSectionError(sectionId, lineNumbers));
    }
  }

  private validateMalformed(events: readonly MarkerEvent[]): void {
    for (const event of eventsOfKind(events, "malformed")) {
      this.errors.push(new MalformedMarkerError(event.line + 1, event.content, event.reason));
    }
  }

  private validateLocks(events: readonly MarkerEvent[]): void {
    const sectionIds = new Set(eventsOfKind(events, "section").map((event) => event.id));
    for (const event of eventsOfKind(events, "lock")) {
      if (!sectionIds.has(event.id)) this.errors.push(new OrphanedLockError(event.id, event.line + 1));
    }
  }

  private validateSubsections(events: readonly MarkerEvent[]): void {
    const firstSection = eventsOfKind(events, "section")[0];
    for (const event of eventsOfKind(events, "subsection")) {
      if (!firstSection || event.line < firstSection.line) {
        this.errors.push(
          new InvalidSpanError(event.id, `subsection marker on line ${event.line + 1} is outside any section`),
        );
      }
    }
    for (const span of findSections(this.lines, events)) {
      const seen = new Set<string>();
      for (const sub of findSubsectionsWithin(this.lines, span)) {
        if (seen.has(sub.subsectionId)) {
          this.errors.push(
            new InvalidSpanError(
              sub.subsectionId,
              `subsection repeated inside section '${span.sectionId}' (line ${sub.startLine + 1})`,
            ),
          );
        }
        seen.add(sub.subsectionId);
      }
    }
  }

  private validateSchemaTables(events: readonly MarkerEvent[]): void {
    for (const event of eventsOfKind(events, "table")) {
      const columns = schemaColumnsFor(event.id);
      if (!columns) continue;
      const block = findTableBlock(this.lines, event.id, { startLine: event.line, endLine: this.lines.length });
      if (!block || block.markerLine !== event.line) {
        this.errors.push(new TableSchemaError(event.id, "marker is not followed by a table", event.line + 1));
        continue;
      }
      const header = parseTableRow(this.lines[block.startLine] ?? "");
      if (!sameColumns(header, columns)) {
        this.errors.push(
          new TableSchemaError(
            event.id,
            `header mismatch: expected [${columns.join(", ")}], got [${header.join(", ")}]`,
            block.startLine + 1,
          ),
        );
        continue;
      }
      const separatorLine = block.startLine + 1;
      if (separatorLine >= block.endLine || !isSeparatorRow(parseTableRow(this.lines[separatorLine] ?? ""))) {
        this.errors.push(new TableSchemaError(event.id, "missing separator row", block.startLine + 1));
        continue;
      }
      for (let index = separatorLine + 1; index < block.endLine; index += 1) {
        const cells = parseTableRow(this.lines[index] ?? "");
        if (cells.length !== columns.length) {
          this.errors.push(
            new TableSchemaError(
              event.id,
              `row has ${cells.length} cells, expected ${columns.length}`,
              index + 1,
            ),
          );
        }
      }
    }
  }

  private validateAgainstTemplate(events: readonly MarkerEvent[], templateLines: DocumentLines): void {
    const present = new Set(
      events.flatMap((event) =>
        event.kind === "section" || event.kind === "subsection" || event.kind === "table"
          ? [`${event.kind}:${event.id}`]
          : [],
      ),
    );
    const reported = new Set<string>();
    for (const event of tokenize(templateLines)) {
      if (event.kind !== "section" && event.kind !== "subsection" && event.kind !== "table") continue;
      const key = `${event.kind}:${event.id}`;
      if (present.has(key) || reported.has(key)) continue;
      reported.add(key);
      this.errors.push(
        new MalformedMarkerError(undefined, `<!-- ${key} -->`, `Missing ${event.kind} from template: <!-- ${key} -->`),
      );
    }
  }

  private repairAnchor(anchor: LedgerAnchor): void {
    const span = findSections(this.lines).find((candidate) => candidate.sectionId === anchor.sectionId);
    if (!span) return;
    const sub = findSubsectionsWithin(this.lines, span).find(
      (candidate) => candidate.subsectionId === anchor.subsectionId,
    );
    const hasTable = regionHasMarker(this.lines, span, "table", anchor.tableId);
    if (sub && hasTable) return;

    const region = sub ?? span;
    const tableBlock = hasTable
      ? []
      : [`<!-- table:${anchor.tableId} -->`, buildTableRow(anchor.columns), buildSeparatorRow(anchor.columns)];
    const block = sub
      ? tableBlock
      : [`<!-- subsection:${anchor.subsectionId} -->`, anchor.heading, "", ...tableBlock];

    let insertAt: number | undefined;
    for (let index = region.endLine - 1; index > region.startLine; index -= 1) {
      if (tokenizeLine(this.lines[index] ?? "", index)?.kind === "lock") {
        insertAt = index;
        break;
      }
    }
    if (insertAt === undefined) {
      insertAt = region.endLine;
      while (insertAt > region.startLine + 1 && isDividerOrBlank(this.lines[insertAt - 1])) insertAt -= 1;
    }

    const leading = (this.lines[insertAt - 1] ?? "").trim() === "" ? [] : [""];
    this.lines = [...this.lines.slice(0, insertAt), ...leading, ...block, "", ...this.lines.slice(insertAt)];

    const added = [
      ...(sub ? [] : [`subsection:${anchor.subsectionId}`]),
      ...(hasTable ? [] : [`table:${anchor.tableId}`]),
    ];
    this.repairsMade.push(`${added.join(", ")} in section '${anchor.sectionId}'`);
  }
}

export const renderStructuralReport = (
  errors: readonly StructuralError[],
  repairs: readonly string[] = [],
): string[] => {
  const output: string[] = [];
  if (repairs.length > 0) {
    output.push("Document structure repaired:");
    for (const repair of repairs) output.push(`  - Repaired: ${repair}`);
  }
  if (errors.length > 0) {
    output.push(`Document structure errors (${errors.length}):`);
    for (const error of errors) output.push(`  - ${error.message}`);
  }
  if (output.length === 0) output.push("Document structure valid");
  return output;
};
