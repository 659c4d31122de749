// src/pdf/pipeline.ts
// Entry-point: PDF bytes → layout → style profile → outline.

import { PdfDecodeError } from '../errors';
import { extractPdfLayout, loadPdfDocument } from './extract';
import { extractOutline } from './outline';
import { profileDocumentStyles } from './style-profile';
import type { OutlineResult, PdfDocLike } from './types';

export type OutlinePipelineOpts = {
  // Pages sampled by the style profiler.
  profilePages?: number;
};

function logDecodeFailure(sourceName: string, err: unknown): void {
  const cause = err instanceof PdfDecodeError ? err.cause : err;
  console.error(`[pdf-outline][pdf-pipeline] error opening ${sourceName}`, {
    pageNum: err instanceof PdfDecodeError ? err.pageNum : null,
    err: cause instanceof Error ? cause.message : String(cause),
  });
}

async function destroyQuietly(pdf: PdfDocLike, sourceName: string): Promise<void> {
  try {
    await pdf.destroy?.();
  } catch (err) {
    console.warn('[pdf-outline][pdf-pipeline] failed to release document', { sourceName, err });
  }
}

export async function parsePdfDocumentToOutline(
  pdf: PdfDocLike,
  sourceName: string,
  opts?: OutlinePipelineOpts
): Promise<OutlineResult> {
  const layout = await extractPdfLayout(pdf, sourceName);
  const profile = profileDocumentStyles(layout.pages, { maxPages: opts?.profilePages });
  return extractOutline(layout, profile);
}

/** Resolves to null when the file cannot be opened or decoded; the error is logged. */
export async function parsePdfToOutline(
  data: Uint8Array,
  sourceName: string,
  opts?: OutlinePipelineOpts
): Promise<OutlineResult | null> {
  let pdf: PdfDocLike;
  try {
    pdf = await loadPdfDocument(data, sourceName);
  } catch (err) {
    logDecodeFailure(sourceName, err);
    return null;
  }

  try {
    return await parsePdfDocumentToOutline(pdf, sourceName, opts);
  } catch (err) {
    if (!(err instanceof PdfDecodeError)) throw err;
    logDecodeFailure(sourceName, err);
    return null;
  } finally {
    await destroyQuietly(pdf, sourceName);
  }
}

// UTF-8 JSON, 4-space indent; non-ASCII stays literal.
export function serializeOutline(result: OutlineResult): string {
  return JSON.stringify({ title: result.title, outline: result.outline }, null, 4);
}
