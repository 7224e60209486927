import test from "node:test";
import assert from "node:assert/strict";
import {
  buildSeparatorRow,
  buildTableRow,
  isPlaceholderRow,
  isSeparatorRow,
  parseTableRow,
  parseTableRows,
  toCellText,
} from "../tables/MarkdownTable.js";

test("parseTableRow trims outer pipes and cell whitespace", () => {
  assert.deepEqual(parseTableRow("  | Q-001 |  Which API?  | |"), ["Q-001", "Which API?", ""]);
});

test("parseTableRows skips non-table lines", () => {
  assert.deepEqual(parseTableRows(["intro", "| a | b |", "", "| c | d |"]), [
    ["a", "b"],
    ["c", "d"],
  ]);
});

test("row builders emit pipe tables", () => {
  assert.equal(buildTableRow(["Q-001", "Why?", ""]), "| Q-001 | Why? |  |");
  assert.equal(buildSeparatorRow(["ID", "Status"]), "|----|--------|");
});

test("separator and placeholder rows are recognized", () => {
  assert.equal(isSeparatorRow(["---", ":---:", "--:"]), true);
  assert.equal(isSeparatorRow(["---", "text"]), false);
  assert.equal(isPlaceholderRow(["<!-- PLACEHOLDER -->", ""]), true);
  assert.equal(isPlaceholderRow(["R-1", "Data loss"]), false);
});

test("toCellText flattens whitespace and escapes pipes", () => {
  assert.equal(toCellText("  multi\nline | value  "), "multi line / value");
});
