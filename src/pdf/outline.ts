// src/pdf/outline.ts
// Heading classification over lines, folded into the document outline.

import { lineText } from './lines';
import { resolveTitle } from './title';
import { SPAN_FLAG_BOLD } from './types';
import type { HeadingEntry, HeadingLevel, OutlineResult, PdfLayoutDocument, PdfLine, StyleProfile } from './types';
import { hasLetter, isNumeric, roundFontSize } from './utils';

const MIN_HEADING_LENGTH = 3;

export type LineStyle = {
  text: string;
  size: number;
  bold: boolean;
};

// A line's size/flags are its first span's.
export function lineStyle(line: PdfLine): LineStyle | null {
  const first = line.spans[0];
  if (!first) return null;
  return {
    text: lineText(line),
    size: roundFontSize(first.fontSize),
    bold: (first.flags & SPAN_FLAG_BOLD) !== 0,
  };
}

export function isHeadingCandidateText(text: string): boolean {
  if (text.length < MIN_HEADING_LENGTH) return false;
  if (isNumeric(text)) return false;
  return hasLetter(text);
}

/**
 * Threshold lookup, largest level first. H4 additionally needs the line to be
 * larger than body or bold. Profiles from `profileDocumentStyles` keep
 * H4 >= body + 1, so under them `size >= H4` already implies `size > body` and
 * bold never changes the result; it only matters for hand-built profiles.
 */
export function levelForStyle(style: Pick<LineStyle, 'size' | 'bold'>, profile: StyleProfile): HeadingLevel | null {
  const { size, bold } = style;
  if (size >= profile.H1) return 'H1';
  if (size >= profile.H2) return 'H2';
  if (size >= profile.H3) return 'H3';
  if (size >= profile.H4 && (size > profile.body || bold)) return 'H4';
  return null;
}

export function classifyLine(line: PdfLine, profile: StyleProfile): Omit<HeadingEntry, 'page'> | null {
  const style = lineStyle(line);
  if (!style || !isHeadingCandidateText(style.text)) return null;
  const level = levelForStyle(style, profile);
  return level ? { level, text: style.text } : null;
}

/**
 * Drops an entry only when both its text and page equal the previous entry's.
 * A running header repeated on the next page is therefore kept; this is a known
 * quirk of the heuristic, left as is.
 */
export function isRepeatOfPrevious(outline: readonly HeadingEntry[], entry: HeadingEntry): boolean {
  const last = outline[outline.length - 1];
  if (!last) return false;
  return last.text === entry.text && last.page === entry.page;
}

export function collectHeadings(doc: PdfLayoutDocument, profile: StyleProfile): HeadingEntry[] {
  const lines = doc.pages.flatMap((p) => p.lines.map((line) => ({ page: p.pageIndex, line })));

  return lines.reduce<HeadingEntry[]>((outline, { page, line }) => {
    const hit = classifyLine(line, profile);
    if (!hit) return outline;
    const entry: HeadingEntry = { level: hit.level, text: hit.text, page };
    if (!isRepeatOfPrevious(outline, entry)) outline.push(entry);
    return outline;
  }, []);
}

export function extractOutline(doc: PdfLayoutDocument, profile: StyleProfile): OutlineResult {
  return Object.freeze({
    title: resolveTitle(doc),
    outline: Object.freeze(collectHeadings(doc, profile)),
  });
}
