// src/pdf/style-profile.ts
// Document-wide font-size profile: body size + H1..H4 thresholds.

import { HEADING_LEVELS } from './types';
import type { HeadingLevel, PdfPage, StyleProfile } from './types';
import { hasLetter, roundFontSize } from './utils';

export const DEFAULT_PROFILE_PAGES = 20;

// Text at or below this size is footer/legal print, not body.
const MIN_PROFILE_FONT_SIZE = 6;

export const FALLBACK_STYLE_PROFILE: StyleProfile = Object.freeze({
  H1: 24,
  H2: 18,
  H3: 14,
  H4: 12,
  body: 10,
});

export type StyleProfileOpts = {
  maxPages?: number;
};

/**
 * Character-weighted histogram of rounded font sizes.
 * Weighting by length keeps one large heading from outvoting paragraphs of body text.
 * Map iteration order is first-seen order.
 */
export function buildFontSizeHistogram(pages: readonly PdfPage[], maxPages = DEFAULT_PROFILE_PAGES): Map<number, number> {
  const counts = new Map<number, number>();
  for (const page of pages.slice(0, Math.max(0, maxPages))) {
    for (const line of page.lines) {
      for (const span of line.spans) {
        const text = span.text.trim();
        if (!text || !hasLetter(text)) continue;
        const size = roundFontSize(span.fontSize);
        if (size <= MIN_PROFILE_FONT_SIZE) continue;
        counts.set(size, (counts.get(size) ?? 0) + text.length);
      }
    }
  }
  return counts;
}

export function pickBodySize(histogram: Map<number, number>): number {
  let best = FALLBACK_STYLE_PROFILE.body;
  let bestCount = -1;
  // Strict '>' keeps the first-seen size on ties.
  for (const [size, count] of histogram) {
    if (count > bestCount) {
      best = size;
      bestCount = count;
    }
  }
  return best;
}

/**
 * Assign H1..H4 from the sizes larger than body, largest first.
 *
 * Each level takes the next candidate strictly below the previous level, so two
 * levels never share a size. When candidates run out the level is placed one below
 * the previous one; a final pass lifts thresholds from H4 upward so that
 * H1 > H2 > H3 > H4 >= body + 1 holds for every document.
 */
export function deriveThresholds(sizesDesc: readonly number[], body: number): Record<HeadingLevel, number> {
  const candidates = sizesDesc.filter((s) => s > body);
  const out: number[] = [];
  let cursor = 0;

  for (let i = 0; i < HEADING_LEVELS.length; i++) {
    const prev = i === 0 ? Number.POSITIVE_INFINITY : out[i - 1];
    while (cursor < candidates.length && candidates[cursor] >= prev) cursor++;

    if (cursor < candidates.length) {
      out.push(candidates[cursor]);
      cursor++;
    } else {
      out.push(i === 0 ? body + 1 : prev - 1);
    }
  }

  // Lift from the bottom: H4 >= body + 1, each level >= the one below + 1.
  let floor = body + 1;
  for (let i = out.length - 1; i >= 0; i--) {
    out[i] = Math.max(out[i], floor);
    floor = out[i] + 1;
  }

  return { H1: out[0], H2: out[1], H3: out[2], H4: out[3] };
}

export function profileDocumentStyles(pages: readonly PdfPage[], opts?: StyleProfileOpts): StyleProfile {
  const histogram = buildFontSizeHistogram(pages, opts?.maxPages ?? DEFAULT_PROFILE_PAGES);
  if (!histogram.size) return FALLBACK_STYLE_PROFILE;

  const body = pickBodySize(histogram);
  const sizesDesc = [...histogram.keys()].sort((a, b) => b - a);

  return Object.freeze({ ...deriveThresholds(sizesDesc, body), body });
}
