// src/pdf/types.ts
// Layout + outline data model.
// NOTE: The outline core only sees `PdfLayoutDocument`; pdf.js objects stop at extract.ts.

export type PdfBBox = {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
};

// Style flag bits (bitmask carried on every span).
export const SPAN_FLAG_ITALIC = 1 << 1;
export const SPAN_FLAG_BOLD = 1 << 4;

export type PdfTextItem = {
  pageIndex: number;
  str: string;
  fontName: string;
  // PDF coordinates (origin bottom-left, from PDF.js transform)
  x: number;
  y: number;
  x2: number;
  y2: number;
  fontSize: number;
  flags: number;
  // Normalized [0..1] coordinates, origin top-left
  x0n: number;
  x1n: number;
  y0n: number;
  y1n: number;
};

export type PdfSpan = {
  pageIndex: number;
  lineIndex: number;
  text: string;
  // Unrounded; use roundFontSize() before comparing.
  fontSize: number;
  flags: number;
  bbox: PdfBBox;
};

export type PdfLine = {
  pageIndex: number;
  lineIndex: number;
  spans: PdfSpan[];
  bbox: PdfBBox;
  yMid: number;
};

export type PdfPage = {
  pageIndex: number;
  width: number;
  height: number;
  lines: PdfLine[]; // reading order
};

export type PdfLayoutDocument = {
  sourceName: string;
  pageCount: number;
  pages: PdfPage[];
  metadataTitle: string | null;
};

// ---- Minimal PDF.js-like surface types (avoid importing PDF.js types)
// Small enough that tests can hand in plain objects instead of a decoded file.

export type PdfTextContentLike = {
  items?: unknown;
};

export type PdfFontObjectsLike = {
  has(id: string): boolean;
  get(id: string): unknown;
};

export type PdfPageLike = {
  getViewport(opts: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PdfTextContentLike>;
  // Resolves fonts into commonObjs as a side effect.
  getOperatorList?(): Promise<unknown>;
  commonObjs?: PdfFontObjectsLike;
};

export type PdfDocLike = {
  numPages: number;
  getPage(pageNum: number): Promise<PdfPageLike>;
  getMetadata?(): Promise<{ info?: unknown }>;
  destroy?(): Promise<void>;
};

// ---- Outline model

export const HEADING_LEVELS = ['H1', 'H2', 'H3', 'H4'] as const;

export type HeadingLevel = (typeof HEADING_LEVELS)[number];

export type StyleProfile = Readonly<Record<HeadingLevel | 'body', number>>;

export type HeadingEntry = {
  level: HeadingLevel;
  text: string;
  // 0-indexed
  page: number;
};

export type OutlineResult = {
  title: string;
  outline: readonly HeadingEntry[];
};
