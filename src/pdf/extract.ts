// src/pdf/extract.ts
// PDF.js extraction + deterministic conversion into pages of styled lines.
//
// - Deterministic ordering.
// - Geometry and font metadata only; no vocabulary heuristics here.

import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import { PdfDecodeError } from '../errors';
import { createFontFlagResolver } from './fonts';
import { buildLines } from './lines';
import { clamp01, percentile, stableSortBy } from './utils';
import type { PdfDocLike, PdfLayoutDocument, PdfPage, PdfPageLike, PdfTextContentLike, PdfTextItem } from './types';

export type PdfPageRaw = {
  pageIndex: number;
  width: number;
  height: number;
  bodyFontSize: number;
  items: PdfTextItem[];
};

function asNum(n: unknown, fallback = 0): number {
  const v = Number(n);
  return Number.isFinite(v) ? v : fallback;
}

function parseTransform(t: unknown): [number, number, number, number, number, number] {
  const tr: unknown[] = Array.isArray(t) ? t : [];
  return [asNum(tr[0]), asNum(tr[1]), asNum(tr[2]), asNum(tr[3]), asNum(tr[4]), asNum(tr[5])];
}

function field(obj: unknown, key: string): unknown {
  if (typeof obj !== 'object' || obj === null) return undefined;
  return Reflect.get(obj, key);
}

export function parsePageTextItems(
  pageIndex: number,
  page: PdfPageLike,
  content: PdfTextContentLike,
  flagsFor: (fontName: string) => number = () => 0,
): PdfPageRaw {
  const rawItems: unknown[] = Array.isArray(content.items) ? content.items : [];

  const viewport = page.getViewport({ scale: 1 });
  const pageW = asNum(viewport.width, 1) || 1;
  const pageH = asNum(viewport.height, 1) || 1;

  const parsed: PdfTextItem[] = [];
  const fontSizes: number[] = [];

  for (const raw of rawItems) {
    // Marked-content entries carry no `str`.
    const str = field(raw, 'str');
    const s = typeof str === 'string' ? str : '';
    if (!s || !s.trim()) continue;

    const [a, b, c, d, x, y] = parseTransform(field(raw, 'transform'));

    // Approx font size (purely geometric, deterministic).
    const fontSize = Math.max(Math.hypot(a, b), Math.hypot(c, d), Math.abs(d), 0);
    if (Number.isFinite(fontSize) && fontSize > 0) fontSizes.push(fontSize);

    const w = asNum(field(raw, 'width'), 0);
    const h = asNum(field(raw, 'height'), 0);
    const x2 = x + w;
    const y2 = y + (h || fontSize);

    const fn = field(raw, 'fontName');
    const fontName = typeof fn === 'string' ? fn : '';

    parsed.push({
      pageIndex,
      str: s,
      fontName,
      x,
      y,
      x2,
      y2,
      fontSize,
      flags: flagsFor(fontName),
      x0n: clamp01(x / pageW),
      x1n: clamp01(x2 / pageW),
      // PDF origin bottom-left, so invert.
      y0n: clamp01(1 - (y2 / pageH)),
      y1n: clamp01(1 - (y / pageH)),
    });
  }

  const sortedFonts = fontSizes.filter((n) => n > 0 && Number.isFinite(n)).sort((p, q) => p - q);
  const bodyFontSize = percentile(sortedFonts, 0.5);

  return {
    pageIndex,
    width: pageW,
    height: pageH,
    bodyFontSize,
    items: stableSortBy(parsed, (p) => (p.y0n * 10_000) + p.x0n),
  };
}

export async function loadPdfDocument(data: Uint8Array, sourceName: string): Promise<PdfDocLike> {
  const loadingTask = getDocument({
    data,
    // Node has no FontFace/eval needs for text extraction.
    disableFontFace: true,
    isEvalSupported: false,
    useSystemFonts: false,
    verbosity: 0,
  });
  try {
    return await loadingTask.promise;
  } catch (err) {
    await loadingTask.destroy();
    throw new PdfDecodeError(sourceName, { cause: err });
  }
}

export async function readMetadataTitle(pdf: PdfDocLike): Promise<string | null> {
  if (!pdf.getMetadata) return null;
  const meta = await pdf.getMetadata();
  const title = field(meta.info, 'Title');
  return typeof title === 'string' ? title : null;
}

async function extractPage(pdf: PdfDocLike, pageNum: number): Promise<PdfPage> {
  const page = await pdf.getPage(pageNum);
  // Fonts land in commonObjs only once the operator list has been built.
  if (page.getOperatorList) await page.getOperatorList();
  const content = await page.getTextContent();

  const raw = parsePageTextItems(pageNum - 1, page, content, createFontFlagResolver(page.commonObjs));
  return {
    pageIndex: raw.pageIndex,
    width: raw.width,
    height: raw.height,
    lines: buildLines(raw.pageIndex, raw.items, {
      pageHeightPx: raw.height,
      bodyFontSize: raw.bodyFontSize,
    }),
  };
}

export async function extractPdfLayout(pdf: PdfDocLike, sourceName: string): Promise<PdfLayoutDocument> {
  const totalPages = Math.max(0, Math.floor(asNum(pdf.numPages, 0)));
  const pages: PdfPage[] = [];

  try {
    for (let pageNum = 1; pageNum <= totalPages; pageNum++) {
      pages.push(await extractPage(pdf, pageNum));
    }
    return {
      sourceName,
      pageCount: totalPages,
      pages,
      metadataTitle: await readMetadataTitle(pdf),
    };
  } catch (err) {
    // Never return a partial layout.
    throw new PdfDecodeError(sourceName, { cause: err, pageNum: pages.length + 1 });
  }
}
