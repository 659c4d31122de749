import type { PdfLayoutDocument, PdfLine, PdfPage } from '../src/pdf/types';

export type SpanDef = { text: string; size: number; flags?: number };

export function s(text: string, size: number, flags = 0): SpanDef {
  return { text, size, flags };
}

export function makeLine(pageIndex: number, lineIndex: number, spans: SpanDef[]): PdfLine {
  const y0 = 0.05 + lineIndex * 0.03;
  const bbox = { x0: 0.1, y0, x1: 0.9, y1: y0 + 0.02 };
  return {
    pageIndex,
    lineIndex,
    bbox,
    yMid: y0 + 0.01,
    spans: spans.map((sp) => ({
      pageIndex,
      lineIndex,
      text: sp.text,
      fontSize: sp.size,
      flags: sp.flags ?? 0,
      bbox,
    })),
  };
}

export function makePage(pageIndex: number, lines: SpanDef[][]): PdfPage {
  return {
    pageIndex,
    width: 612,
    height: 792,
    lines: lines.map((spans, i) => makeLine(pageIndex, i, spans)),
  };
}

export function makeDoc(
  pages: SpanDef[][][],
  opts?: { metadataTitle?: string | null; sourceName?: string }
): PdfLayoutDocument {
  return {
    sourceName: opts?.sourceName ?? 'input/sample.pdf',
    pageCount: pages.length,
    pages: pages.map((lines, i) => makePage(i, lines)),
    metadataTitle: opts?.metadataTitle ?? null,
  };
}

export const BODY =
  'The committee reviewed the proposal in detail and agreed on the schedule for the next phase.';
