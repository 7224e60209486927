import {
  ParseFailure,
  type DocumentLines,
  type LedgerKind,
  type OpenQuestion,
  type QuestionStatus,
} from "@reqforge/shared";
import { findTableBlock } from "../markers/SpanParser.js";
import {
  buildTableRow,
  isPlaceholderRow,
  isTableRow,
  parseTableRow,
  parseTableRows,
  sameColumns,
  toCellText,
} from "../tables/MarkdownTable.js";

export const SECTION_QUESTION_COLUMNS = ["Question ID", "Question", "Date", "Answer", "Status"] as const;

export const DOCUMENT_QUESTION_COLUMNS = [
  "Question ID",
  "Question",
  "Date",
  "Answer",
  "Section Target",
  "Resolution Status",
] as const;

export const DOCUMENT_QUESTIONS_TABLE_ID = "open_questions";

export const sectionQuestionsTableId = (sectionId: string): string => `${sectionId}_questions`;

/** Aliases that fold subsection-level targets into their owning section. */
export const TARGET_CANONICAL_MAP: Readonly<Record<string, string>> = {
  primary_goals: "goals_objectives",
  secondary_goals: "goals_objectives",
  non_goals: "goals_objectives",
};

export const canonicalTarget = (target: string): string => TARGET_CANONICAL_MAP[target.trim()] ?? target.trim();

const UNANSWERED_VALUES: ReadonlySet<string> = new Set(["", "-", "Pending"]);

export const isAnswered = (question: OpenQuestion): boolean => !UNANSWERED_VALUES.has(question.answer.trim());

export const isPending = (question: OpenQuestion): boolean =>
  question.status === "Open" || question.status === "Deferred";

export const isAnsweredPending = (question: OpenQuestion): boolean => isPending(question) && isAnswered(question);

export const isOpenUnanswered = (question: OpenQuestion): boolean => isPending(question) && !isAnswered(question);

export const normalizeQuestionText = (value: string): string => value.trim().toLowerCase().replace(/\s+/g, " ");

const parseStatus = (value: string): QuestionStatus | undefined => {
  switch (value.trim()) {
    case "Open":
      return "Open";
    case "Resolved":
      return "Resolved";
    case "Deferred":
      return "Deferred";
    default:
      return undefined;
  }
};

interface LedgerSchema {
  kind: LedgerKind;
  tableId: string;
  label: string;
  columns: readonly string[];
  statusColumn: number;
  answerColumn: number;
  toQuestion(cells: string[]): OpenQuestion | undefined;
  toCells(question: OpenQuestion): string[];
  nextId(ids: readonly string[]): string;
  duplicateKey(question: string, target: string): string;
}

const maxSuffix = (ids: readonly string[], pattern: RegExp): number =>
  ids.reduce((max, id) => {
    const match = pattern.exec(id.trim());
    return match ? Math.max(max, Number(match[1])) : max;
  }, 0);

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const sectionSchema = (sectionId: string): LedgerSchema => ({
  kind: "section",
  tableId: sectionQuestionsTableId(sectionId),
  label: `Section questions table for '${sectionId}'`,
  columns: SECTION_QUESTION_COLUMNS,
  statusColumn: 4,
  answerColumn: 3,
  toQuestion: (cells) => {
    const status = parseStatus(cells[4] ?? "");
    if (!status) return undefined;
    return {
      questionId: cells[0] ?? "",
      question: cells[1] ?? "",
      date: cells[2] ?? "",
      answer: cells[3] ?? "",
      target: sectionId,
      status,
    };
  },
  toCells: (q) => [q.questionId, q.question, q.date, q.answer, q.status],
  nextId: (ids) => `${sectionId}-Q${maxSuffix(ids, new RegExp(`^${escapeRegExp(sectionId)}-Q(\\d+)$`)) + 1}`,
  duplicateKey: (question) => normalizeQuestionText(question),
});

const documentSchema: LedgerSchema = {
  kind: "document",
  tableId: DOCUMENT_QUESTIONS_TABLE_ID,
  label: "Open Questions table",
  columns: DOCUMENT_QUESTION_COLUMNS,
  statusColumn: 5,
  answerColumn: 3,
  toQuestion: (cells) => {
    const status = parseStatus(cells[5] ?? "");
    if (!status) return undefined;
    return {
      questionId: cells[0] ?? "",
      question: cells[1] ?? "",
      date: cells[2] ?? "",
      answer: cells[3] ?? "",
      target: cells[4] ?? "",
      status,
    };
  },
  toCells: (q) => [q.questionId, q.question, q.date, q.answer, q.target, q.status],
  nextId: (ids) => `Q-${String(maxSuffix(ids, /^Q-(\d+)$/) + 1).padStart(3, "0")}`,
  duplicateKey: (question, target) => `${normalizeQuestionText(question)}\u0000${normalizeQuestionText(target)}`,
};

export interface ParsedLedger {
  questions: OpenQuestion[];
  /** Id cell of every data row, including rows whose status is not recognised. */
  rowIds: string[];
  startLine: number;
  endLine: number;
}

export interface NewQuestion {
  question: string;
  date: string;
  target?: string;
}

export interface InsertResult {
  lines: string[];
  inserted: number;
  questionIds: string[];
}

export interface ResolveResult {
  lines: string[];
  resolved: number;
}

/**
 * A question table bound to one schema. Every mutation returns a new line array
 * and never renumbers or deletes existing rows.
 */
export class QuestionLedger {
  private constructor(private readonly schema: LedgerSchema) {}

  static forSection(sectionId: string): QuestionLedger {
    return new QuestionLedger(sectionSchema(sectionId));
  }

  static forDocument(): QuestionLedger {
    return new QuestionLedger(documentSchema);
  }

  get kind(): LedgerKind {
    return this.schema.kind;
  }

  get tableId(): string {
    return this.schema.tableId;
  }

  exists(lines: DocumentLines): boolean {
    return findTableBlock(lines, this.schema.tableId) !== undefined;
  }

  parse(lines: DocumentLines): ParsedLedger {
    const block = findTableBlock(lines, this.schema.tableId);
    if (!block) {
      throw new ParseFailure(
        `${this.schema.label} not found (missing <!-- table:${this.schema.tableId} --> or table).`,
        { tableId: this.schema.tableId },
      );
    }
    const rows = parseTableRows(lines.slice(block.startLine, block.endLine));
    const header = rows[0];
    if (!header || rows.length < 2) {
      throw new ParseFailure(`${this.schema.label} malformed (missing header/separator).`, {
        tableId: this.schema.tableId,
      });
    }
    if (!sameColumns(header, this.schema.columns)) {
      throw new ParseFailure(
        `${this.schema.label} header mismatch. Expected [${this.schema.columns.join(", ")}], got [${header.join(", ")}]`,
        { tableId: this.schema.tableId },
      );
    }
    const questions: OpenQuestion[] = [];
    const rowIds: string[] = [];
    for (const cells of rows.slice(2)) {
      if (cells.length !== this.schema.columns.length || isPlaceholderRow(cells)) continue;
      if (cells[0]) rowIds.push(cells[0]);
      const question = this.schema.toQuestion(cells);
      if (question) questions.push(question);
    }
    return { questions, rowIds, startLine: block.startLine, endLine: block.endLine };
  }

  /** Questions for the table, or an empty list when the table is absent or unreadable. */
  questionsOrEmpty(lines: DocumentLines): OpenQuestion[] {
    if (!this.exists(lines)) return [];
    try {
      return this.parse(lines).questions;
    } catch (error) {
      if (error instanceof ParseFailure) return [];
      throw error;
    }
  }

  nextId(lines: DocumentLines): string {
    return this.schema.nextId(this.parse(lines).rowIds);
  }

  insert(lines: DocumentLines, entries: readonly NewQuestion[]): InsertResult {
    const ledger = this.parse(lines);
    const ids = [...ledger.rowIds];
    const known = new Map<string, string>();
    for (const question of ledger.questions) {
      known.set(this.schema.duplicateKey(question.question, question.target), question.questionId);
    }

    const rows: string[] = [];
    const questionIds: string[] = [];
    let inserted = 0;
    for (const entry of entries) {
      const text = toCellText(entry.question);
      if (!text) continue;
      const target = toCellText(entry.target ?? "");
      const key = this.schema.duplicateKey(text, target);
      const duplicate = known.get(key);
      if (duplicate) {
        questionIds.push(duplicate);
        continue;
      }
      const question: OpenQuestion = {
        questionId: this.schema.nextId(ids),
        question: text,
        date: toCellText(entry.date),
        answer: "",
        target,
        status: "Open",
      };
      ids.push(question.questionId);
      known.set(key, question.questionId);
      rows.push(buildTableRow(this.schema.toCells(question)));
      questionIds.push(question.questionId);
      inserted += 1;
    }

    if (inserted === 0) return { lines: [...lines], inserted, questionIds };
    const insertAt = ledger.startLine + 2;
    return {
      lines: [...lines.slice(0, insertAt), ...rows, ...lines.slice(insertAt)],
      inserted,
      questionIds,
    };
  }

  insertOne(lines: DocumentLines, entry: NewQuestion): { lines: string[]; questionId?: string } {
    const result = this.insert(lines, [entry]);
    return { lines: result.lines, questionId: result.questionIds[0] };
  }

  resolve(lines: DocumentLines, questionIds: readonly string[]): ResolveResult {
    const wanted = new Set(questionIds.map((id) => id.trim()));
    return this.rewriteRows(lines, (cells) => {
      if (!wanted.has((cells[0] ?? "").trim())) return undefined;
      if ((cells[this.schema.statusColumn] ?? "").trim() === "Resolved") return undefined;
      const next = [...cells];
      next[this.schema.statusColumn] = "Resolved";
      return next;
    });
  }

  /** Sets the answer of a question that is not yet Resolved. */
  answer(lines: DocumentLines, questionId: string, answer: string): ResolveResult {
    const id = questionId.trim();
    const text = toCellText(answer);
    return this.rewriteRows(lines, (cells) => {
      if ((cells[0] ?? "").trim() !== id) return undefined;
      if ((cells[this.schema.statusColumn] ?? "").trim() === "Resolved") return undefined;
      const next = [...cells];
      next[this.schema.answerColumn] = text;
      return next;
    });
  }

  private rewriteRows(
    lines: DocumentLines,
    rewrite: (cells: string[]) => string[] | undefined,
  ): ResolveResult {
    const ledger = this.parse(lines);
    const next = [...lines];
    let resolved = 0;
    for (let index = ledger.startLine + 2; index < ledger.endLine; index += 1) {
      const line = next[index];
      if (line === undefined || !isTableRow(line)) continue;
      const cells = parseTableRow(line);
      if (cells.length !== this.schema.columns.length || isPlaceholderRow(cells)) continue;
      const updated = rewrite(cells);
      if (!updated) continue;
      next[index] = buildTableRow(updated);
      resolved += 1;
    }
    return { lines: resolved > 0 ? next : [...lines], resolved };
  }
}
