// src/pdf/index.ts
// Public entrypoints for the PDF outline pipeline.

export type {
  HeadingEntry,
  HeadingLevel,
  OutlineResult,
  PdfBBox,
  PdfDocLike,
  PdfLayoutDocument,
  PdfLine,
  PdfPage,
  PdfPageLike,
  PdfSpan,
  StyleProfile,
} from './types';
export { HEADING_LEVELS, SPAN_FLAG_BOLD, SPAN_FLAG_ITALIC } from './types';

export { parsePdfToOutline, parsePdfDocumentToOutline, serializeOutline } from './pipeline';
export type { OutlinePipelineOpts } from './pipeline';

export { extractPdfLayout, loadPdfDocument } from './extract';
export { profileDocumentStyles, FALLBACK_STYLE_PROFILE, DEFAULT_PROFILE_PAGES } from './style-profile';
export { extractOutline, classifyLine } from './outline';
export { resolveTitle, cleanTitle } from './title';
