// src/pdf/lines.ts
// Convert raw text items into ordered lines of styled spans.

import type { PdfBBox, PdfLine, PdfSpan, PdfTextItem } from './types';
import { bboxUnion, stableSortBy } from './utils';

export type LineBuilderOpts = {
  pageHeightPx: number;
  bodyFontSize: number;
};

export function estimateSpaceThresholdPx(bodyFontSize: number): number {
  // Insert a space between adjacent text items when their x-gap exceeds this.
  if (!(bodyFontSize > 0) || !Number.isFinite(bodyFontSize)) return 2.5;
  return Math.min(10, Math.max(1.5, bodyFontSize * 0.33));
}

export function estimateLineYToleranceNorm(bodyFontSize: number, pageHeightPx: number): number {
  // Items whose y-mids are within this tolerance share a line.
  const h = (pageHeightPx > 0 && Number.isFinite(pageHeightPx)) ? pageHeightPx : 1000;
  const tolPx = (bodyFontSize > 0 && Number.isFinite(bodyFontSize))
    ? Math.min(12, Math.max(2.0, bodyFontSize * 0.45))
    : 3.5;
  const tolN = tolPx / h;
  // Clamp to avoid pathological grouping on very small/large pages.
  return Math.min(0.02, Math.max(0.001, tolN));
}

function mkBBoxFromItem(it: PdfTextItem): PdfBBox {
  return { x0: it.x0n, y0: it.y0n, x1: it.x1n, y1: it.y1n };
}

function toSpans(pageIndex: number, lineIndex: number, itemsSortedX: PdfTextItem[], spacePx: number): PdfSpan[] {
  const spans: PdfSpan[] = [];
  let prevX2 = Number.NEGATIVE_INFINITY;

  for (const it of itemsSortedX) {
    const s = it.str.replace(/\s+/g, ' ');
    if (!s.trim()) continue;

    const gapPx = it.x - prevX2;
    const prevText = spans.length ? spans[spans.length - 1].text : '';
    const needSpace = spans.length > 0
      && gapPx > spacePx
      && !/\s$/.test(prevText)
      && !/^\s/.test(s);

    spans.push({
      pageIndex,
      lineIndex,
      text: needSpace ? ` ${s}` : s,
      fontSize: it.fontSize,
      flags: it.flags,
      bbox: mkBBoxFromItem(it),
    });
    prevX2 = Math.max(prevX2, it.x2);
  }
  return spans;
}

export function buildLines(pageIndex: number, items: PdfTextItem[], opts: LineBuilderOpts): PdfLine[] {
  if (!items.length) return [];

  const yTol = estimateLineYToleranceNorm(opts.bodyFontSize, opts.pageHeightPx);
  const spacePx = estimateSpaceThresholdPx(opts.bodyFontSize);

  const sorted = stableSortBy(items, (it) => (it.y0n * 10_000) + it.x0n);

  type LineAcc = {
    items: PdfTextItem[];
    yMid: number;
  };

  const acc: LineAcc[] = [];

  for (const it of sorted) {
    const yMid = (it.y0n + it.y1n) / 2;

    // Deterministic placement: first matching line by insertion order.
    const ln = acc.find((l) => Math.abs(l.yMid - yMid) <= yTol);
    if (ln) {
      ln.items.push(it);
      ln.yMid = (ln.yMid + yMid) / 2;
    } else {
      acc.push({ items: [it], yMid });
    }
  }

  // Order lines top-to-bottom before numbering them.
  const ordered = acc
    .map((ln) => ({ ...ln, itemsX: stableSortBy(ln.items, (it) => it.x0n) }))
    .sort((a, b) => a.yMid - b.yMid || a.itemsX[0].x0n - b.itemsX[0].x0n);

  const out: PdfLine[] = [];
  for (const ln of ordered) {
    const lineIndex = out.length;
    const spans = toSpans(pageIndex, lineIndex, ln.itemsX, spacePx);
    if (!spans.length) continue;

    let bb = spans[0].bbox;
    for (let i = 1; i < spans.length; i++) bb = bboxUnion(bb, spans[i].bbox);

    out.push({ pageIndex, lineIndex, spans, bbox: bb, yMid: ln.yMid });
  }
  return out;
}

/** Merged text of a line, trimmed. */
export function lineText(line: PdfLine): string {
  return line.spans.map((s) => s.text).join('').trim();
}
