import type { ContentFilter } from "@reqforge/shared";
import { isStructuralMarkerLine } from "../markers/MarkerGrammar.js";

export interface SanitizeOptions {
  preserveHeaders?: readonly string[];
  contentFilters?: readonly ContentFilter[];
}

const ITEM_PREFIX_RE = /^(?:[-*+]|\d+[.)])\s*/;

const normalizeItem = (line: string): string =>
  line.trim().replace(ITEM_PREFIX_RE, "").replace(/\s+/g, " ").trim().toLowerCase();

const isWholeLineComment = (line: string): boolean => {
  const trimmed = line.trim();
  return trimmed.startsWith("<!--") && trimmed.endsWith("-->");
};

const applyFilter = (lines: string[], filter: ContentFilter): string[] => {
  switch (filter.kind) {
    case "dedupe_items": {
      const seen = new Set<string>();
      return lines.filter((line) => {
        if (!line.trim()) return true;
        const key = normalizeItem(line);
        if (seen.has(key)) return false;
        seen.add(key);
        return true;
      });
    }
    case "drop_matching": {
      const pattern = new RegExp(filter.pattern, "i");
      return lines.filter((line) => !line.trim() || !pattern.test(line.trim()));
    }
  }
};

const collapseBlankRuns = (lines: readonly string[]): string[] => {
  const out: string[] = [];
  for (const line of lines) {
    if (!line.trim()) {
      if (out.length > 0 && out[out.length - 1] === "") continue;
      out.push("");
    } else {
      out.push(line);
    }
  }
  while (out.length > 0 && out[0] === "") out.shift();
  while (out.length > 0 && out[out.length - 1] === "") out.pop();
  return out;
};

/**
 * Normalizes generated text before it enters a document body: echoed markers,
 * comments, dividers and headings are dropped, then the section's content filters run.
 */
export const sanitizeBody = (body: string, options: SanitizeOptions = {}): string => {
  if (!body) return "";
  const preserved = new Set((options.preserveHeaders ?? []).map((header) => header.trim()));
  let lines: string[] = [];
  for (const raw of body.split(/\r?\n/)) {
    const line = raw.trimEnd();
    const trimmed = line.trim();
    if (!trimmed) {
      lines.push("");
      continue;
    }
    if (isStructuralMarkerLine(line) || isWholeLineComment(line) || trimmed === "---") continue;
    if (trimmed.startsWith("#")) {
      if (preserved.has(trimmed)) lines.push(trimmed);
      continue;
    }
    lines.push(line);
  }
  for (const filter of options.contentFilters ?? []) lines = applyFilter(lines, filter);
  return collapseBlankRuns(lines).join("\n");
};
