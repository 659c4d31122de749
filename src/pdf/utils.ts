// src/pdf/utils.ts
// Small, deterministic helpers used throughout the PDF pipeline.

import type { PdfBBox } from './types';

export function clamp01(n: number): number {
  if (!Number.isFinite(n)) return 0;
  if (n <= 0) return 0;
  if (n >= 1) return 1;
  return n;
}

export function bboxUnion(a: PdfBBox, b: PdfBBox): PdfBBox {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

export function percentile(sortedAsc: number[], p01: number): number {
  if (!sortedAsc.length) return 0;
  const p = Math.max(0, Math.min(1, p01));
  const idx = (sortedAsc.length - 1) * p;
  const lo = Math.floor(idx);
  const hi = Math.ceil(idx);
  if (lo === hi) return sortedAsc[lo];
  const w = idx - lo;
  return sortedAsc[lo] * (1 - w) + sortedAsc[hi] * w;
}

// Font sizes are compared as integers. Ties round to even (10.5 -> 10, 11.5 -> 12).
export function roundFontSize(size: number): number {
  if (!Number.isFinite(size)) return 0;
  const floor = Math.floor(size);
  const diff = size - floor;
  if (diff > 0.5) return floor + 1;
  if (diff < 0.5) return floor;
  return floor % 2 === 0 ? floor : floor + 1;
}

export function hasLetter(s: string): boolean {
  return /\p{L}/u.test(s);
}

// Digits only (any script), no separators.
export function isNumeric(s: string): boolean {
  return /^\p{N}+$/u.test(s);
}

export function stableSortBy<T>(arr: T[], key: (t: T) => number): T[] {
  return arr
    .map((v, i) => ({ v, i, k: key(v) }))
    .sort((a, b) => (a.k - b.k) || (a.i - b.i))
    .map((o) => o.v);
}
