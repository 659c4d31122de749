// src/pdf/fonts.ts
// Style flags for a text item, from the font object PDF.js resolved for it.

import { SPAN_FLAG_BOLD, SPAN_FLAG_ITALIC } from './types';
import type { PdfFontObjectsLike } from './types';

const BOLD_NAME_RE = /bold|black|heavy|semibold|demi/i;
const ITALIC_NAME_RE = /italic|oblique/i;

// Subset prefix ("ABCDEF+Calibri-Bold") is irrelevant to style.
function stripSubsetPrefix(name: string): string {
  return name.replace(/^[A-Z]{6}\+/, '');
}

export function flagsFromFontName(name: string): number {
  const base = stripSubsetPrefix(name);
  let flags = 0;
  if (BOLD_NAME_RE.test(base)) flags |= SPAN_FLAG_BOLD;
  if (ITALIC_NAME_RE.test(base)) flags |= SPAN_FLAG_ITALIC;
  return flags;
}

export function flagsFromFontObject(font: unknown): number {
  if (typeof font !== 'object' || font === null) return 0;

  let flags = 0;
  if ('bold' in font && font.bold === true) flags |= SPAN_FLAG_BOLD;
  if ('black' in font && font.black === true) flags |= SPAN_FLAG_BOLD;
  if ('italic' in font && font.italic === true) flags |= SPAN_FLAG_ITALIC;
  if ('name' in font && typeof font.name === 'string') flags |= flagsFromFontName(font.name);
  return flags;
}

/**
 * Resolve style flags for every font id, caching per page.
 * Font objects only exist in `commonObjs` after the page's operator list was built;
 * ids that were never resolved contribute no flags.
 */
export function createFontFlagResolver(objs: PdfFontObjectsLike | undefined): (fontName: string) => number {
  const cache = new Map<string, number>();
  return (fontName: string): number => {
    const hit = cache.get(fontName);
    if (hit !== undefined) return hit;

    let flags = 0;
    if (fontName && objs?.has(fontName)) {
      flags = flagsFromFontObject(objs.get(fontName));
    }
    cache.set(fontName, flags);
    return flags;
  };
}
