import { PLACEHOLDER_TOKEN } from "../markers/MarkerGrammar.js";

export const isTableRow = (line: string | undefined): boolean => (line ?? "").trimStart().startsWith("|");

export const parseTableRow = (line: string): string[] =>
  line
    .trim()
    .replace(/^\|+/, "")
    .replace(/\|+$/, "")
    .split("|")
    .map((cell) => cell.trim());

export const parseTableRows = (lines: readonly string[]): string[][] =>
  lines.filter((line) => isTableRow(line)).map(parseTableRow);

export const buildTableRow = (cells: readonly string[]): string => `| ${cells.join(" | ")} |`;

export const buildSeparatorRow = (columns: readonly string[]): string =>
  `|${columns.map((column) => "-".repeat(column.length + 2)).join("|")}|`;

export const isSeparatorRow = (cells: readonly string[]): boolean =>
  cells.length > 0 && cells.every((cell) => /^:?-+:?$/.test(cell));

export const isPlaceholderRow = (cells: readonly string[]): boolean =>
  cells.some((cell) => cell.includes(PLACEHOLDER_TOKEN));

export const sameColumns = (left: readonly string[], right: readonly string[]): boolean =>
  left.length === right.length && left.every((cell, idx) => cell === right[idx]);

/** Flattens free text into something a single table cell can hold. */
export const toCellText = (value: string): string => value.replace(/\s+/g, " ").replace(/\|/g, "/").trim();
