import type { NoteSection } from "../types/model/noteSection.model";

const HEADING = /^(#{1,6})\s+(.*?)\s*#*\s*$/;
const LIST_ITEM = /^\s*(?:[-*+]|\d+[.)])\s+(?:\[[ xX]\]\s+)?(.*)$/;
const EMPHASIS = /\*\*|__/g;
const RULE = /^\s*([-*_])(?:\s*\1){2,}\s*$/;
const FENCE = /^\s*(?:```|~~~)/;

export const stripEmphasis = (text: string): string =>
  text.replace(EMPHASIS, "").trim();

/**
 * Splits a Markdown note at its ATX headings. A section's entries are its
 * list items, or its non-empty lines when it has no list. Sections without
 * entries are dropped. Fenced code blocks are skipped.
 */
export function splitSections(markdown: string): NoteSection[] {
  const sections: NoteSection[] = [];
  let title = "";
  let level = 0;
  let items: string[] = [];
  let lines: string[] = [];
  let inFence = false;

  const flush = () => {
    const entries = items.length > 0 ? items : lines;
    if (entries.length > 0) {
      sections.push({ title, level, entries });
    }
  };

  for (const raw of markdown.split(/\r?\n/)) {
    if (FENCE.test(raw)) {
      inFence = !inFence;
      continue;
    }
    if (inFence) continue;

    const heading = HEADING.exec(raw);
    if (heading) {
      flush();
      level = heading[1].length;
      title = stripEmphasis(heading[2]);
      items = [];
      lines = [];
      continue;
    }

    if (RULE.test(raw)) continue;

    const item = LIST_ITEM.exec(raw);
    if (item) {
      const text = stripEmphasis(item[1]);
      if (text) items.push(text);
      continue;
    }

    const text = stripEmphasis(raw);
    if (text) lines.push(text);
  }
  flush();

  return sections;
}
