// src/pdf/title.ts
// Document title: metadata, else the largest text on the first page, else the file name.

import path from 'node:path';

import { lineText } from './lines';
import type { PdfLayoutDocument, PdfPage } from './types';
import { roundFontSize } from './utils';

const MIN_METADATA_TITLE_LENGTH = 5;

// Sub-point rendering differences between title lines.
const TITLE_SIZE_TOLERANCE = 1;

// Length is checked before trimming, so padded short titles still count.
export function titleFromMetadata(raw: string | null): string | null {
  if (!raw || raw.length < MIN_METADATA_TITLE_LENGTH) return null;
  return raw.trim() || null;
}

/** Lines of the first page set at (or within a point of) its largest font, joined in reading order. */
export function titleFromFirstPage(page: PdfPage | undefined): string | null {
  if (!page) return null;

  let maxSize = 0;
  for (const line of page.lines) {
    for (const span of line.spans) {
      if (span.text.trim() && span.fontSize > maxSize) maxSize = span.fontSize;
    }
  }
  if (!(maxSize > 0)) return null;

  const parts: string[] = [];
  for (const line of page.lines) {
    const first = line.spans[0];
    if (!first) continue;
    if (roundFontSize(first.fontSize) < maxSize - TITLE_SIZE_TOLERANCE) continue;
    const text = lineText(line);
    if (text) parts.push(text);
  }

  const title = parts.join(' ');
  return title || null;
}

// Document-specific cleanup: RFP titles often repeat the "RFP:" tag before the full name.
export function cleanTitle(title: string): string {
  if (!title.toLowerCase().includes('request for proposal')) return title;
  return title.split('RFP:').join('').trim();
}

export function resolveTitle(doc: PdfLayoutDocument): string {
  const title = titleFromMetadata(doc.metadataTitle)
    ?? titleFromFirstPage(doc.pages[0])
    ?? path.basename(doc.sourceName);
  return cleanTitle(title);
}
