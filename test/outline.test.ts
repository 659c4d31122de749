import { describe, expect, it } from 'vitest';

import {
  classifyLine,
  collectHeadings,
  extractOutline,
  isHeadingCandidateText,
  isRepeatOfPrevious,
  levelForStyle,
} from '../src/pdf/outline';
import { FALLBACK_STYLE_PROFILE, profileDocumentStyles } from '../src/pdf/style-profile';
import { HEADING_LEVELS, SPAN_FLAG_BOLD } from '../src/pdf/types';
import { BODY, makeDoc, makeLine, s } from './fixtures';

const profile = FALLBACK_STYLE_PROFILE; // H1 24, H2 18, H3 14, H4 12, body 10

describe('isHeadingCandidateText', () => {
  it('rejects short, numeric and letterless text', () => {
    expect(isHeadingCandidateText('Hi')).toBe(false);
    expect(isHeadingCandidateText('2024')).toBe(false);
    expect(isHeadingCandidateText('1.2.3')).toBe(false);
    expect(isHeadingCandidateText('— — —')).toBe(false);
    expect(isHeadingCandidateText('FAQ')).toBe(true);
    expect(isHeadingCandidateText('2. Scope')).toBe(true);
  });
});

describe('levelForStyle', () => {
  it('maps sizes onto the threshold table', () => {
    expect(levelForStyle({ size: 30, bold: false }, profile)).toBe('H1');
    expect(levelForStyle({ size: 24, bold: false }, profile)).toBe('H1');
    expect(levelForStyle({ size: 20, bold: false }, profile)).toBe('H2');
    expect(levelForStyle({ size: 14, bold: false }, profile)).toBe('H3');
    expect(levelForStyle({ size: 12, bold: false }, profile)).toBe('H4');
    expect(levelForStyle({ size: 11, bold: true }, profile)).toBeNull();
    expect(levelForStyle({ size: 10, bold: false }, profile)).toBeNull();
  });

  it('needs bold for H4 when the size equals body', () => {
    const flat = { H1: 24, H2: 18, H3: 14, H4: 12, body: 12 };
    expect(levelForStyle({ size: 12, bold: false }, flat)).toBeNull();
    expect(levelForStyle({ size: 12, bold: true }, flat)).toBe('H4');
  });
});

describe('levelForStyle with a derived profile', () => {
  it('gives bold no effect once H4 sits above body', () => {
    const derived = profileDocumentStyles(makeDoc([[[s(BODY, 10)]]]).pages);
    expect(derived).toEqual({ H1: 14, H2: 13, H3: 12, H4: 11, body: 10 });
    for (let size = 8; size <= 16; size++) {
      expect(levelForStyle({ size, bold: true }, derived)).toBe(levelForStyle({ size, bold: false }, derived));
    }
    expect(levelForStyle({ size: 10, bold: true }, derived)).toBeNull();
  });
});

describe('classifyLine', () => {
  it('merges spans and takes size from the first one', () => {
    const line = makeLine(0, 0, [s('1. ', 14), s('Introduction', 14)]);
    expect(classifyLine(line, profile)).toEqual({ level: 'H3', text: '1. Introduction' });
  });

  it('ignores larger spans after the first', () => {
    const line = makeLine(0, 0, [s('Intro', 10), s('duction', 24)]);
    expect(classifyLine(line, profile)).toBeNull();
  });

  it('reads bold from the first span flags', () => {
    const flat = { H1: 24, H2: 18, H3: 14, H4: 12, body: 12 };
    expect(classifyLine(makeLine(0, 0, [s('Key Terms', 12, SPAN_FLAG_BOLD)]), flat)).toEqual({
      level: 'H4',
      text: 'Key Terms',
    });
    expect(classifyLine(makeLine(0, 0, [s('Key Terms', 12), s(' bold tail', 12, SPAN_FLAG_BOLD)]), flat)).toBeNull();
  });

  it('trims merged text', () => {
    expect(classifyLine(makeLine(0, 0, [s('  Summary  ', 18)]), profile)).toEqual({ level: 'H2', text: 'Summary' });
  });

  it('returns null for a line without spans', () => {
    expect(classifyLine(makeLine(0, 0, []), profile)).toBeNull();
  });
});

describe('isRepeatOfPrevious', () => {
  it('only matches when text and page both equal the last entry', () => {
    const outline = [{ level: 'H1' as const, text: 'Notice', page: 2 }];
    expect(isRepeatOfPrevious([], { level: 'H1', text: 'Notice', page: 2 })).toBe(false);
    expect(isRepeatOfPrevious(outline, { level: 'H2', text: 'Notice', page: 2 })).toBe(true);
    expect(isRepeatOfPrevious(outline, { level: 'H1', text: 'Notice', page: 3 })).toBe(false);
    expect(isRepeatOfPrevious(outline, { level: 'H1', text: 'Other', page: 2 })).toBe(false);
  });
});

describe('collectHeadings', () => {
  it('drops a consecutive repeat on the same page', () => {
    const doc = makeDoc([[[s('Summary', 18)], [s('Summary', 18)], [s('Findings', 18)]]]);
    expect(collectHeadings(doc, profile)).toEqual([
      { level: 'H2', text: 'Summary', page: 0 },
      { level: 'H2', text: 'Findings', page: 0 },
    ]);
  });

  it('keeps non-consecutive repeats', () => {
    const doc = makeDoc([[[s('Summary', 18)], [s('Findings', 18)], [s('Summary', 18)]]]);
    expect(collectHeadings(doc, profile).map((h) => h.text)).toEqual(['Summary', 'Findings', 'Summary']);
  });

  it('keeps body lines out and preserves reading order across pages', () => {
    const doc = makeDoc([
      [[s('Background', 24)], [s(BODY, 10)], [s('Goals', 18)]],
      [[s(BODY, 10)], [s('Milestones', 14)], [s('Phase one', 12)]],
    ]);
    expect(collectHeadings(doc, profile)).toEqual([
      { level: 'H1', text: 'Background', page: 0 },
      { level: 'H2', text: 'Goals', page: 0 },
      { level: 'H3', text: 'Milestones', page: 1 },
      { level: 'H4', text: 'Phase one', page: 1 },
    ]);
  });
});

describe('extractOutline', () => {
  it('emits a single H1 for a large chapter line over body text', () => {
    const doc = makeDoc([[[s('CHAPTER ONE', 30)], [s(BODY, 10)], [s(BODY, 10)]]]);
    const result = extractOutline(doc, profileDocumentStyles(doc.pages));
    expect(result).toEqual({
      title: 'CHAPTER ONE',
      outline: [{ level: 'H1', text: 'CHAPTER ONE', page: 0 }],
    });
  });

  it('keeps a repeated notice on consecutive pages', () => {
    const doc = makeDoc([
      [[s('Confidentiality Notice', 18)], [s(BODY, 10)]],
      [[s('Confidentiality Notice', 18)], [s(BODY, 10)]],
    ]);
    const result = extractOutline(doc, profileDocumentStyles(doc.pages));
    expect(result.outline).toEqual([
      { level: 'H1', text: 'Confidentiality Notice', page: 0 },
      { level: 'H1', text: 'Confidentiality Notice', page: 1 },
    ]);
  });

  it('returns an empty outline and file-name title for a document without text', () => {
    const doc = makeDoc([[], []], { sourceName: 'scans/blank.pdf' });
    const result = extractOutline(doc, profileDocumentStyles(doc.pages));
    expect(result).toEqual({ title: 'blank.pdf', outline: [] });
  });

  it('only emits known levels and in-range pages', () => {
    const doc = makeDoc([
      [[s('Plan', 28)], [s('Scope', 16)], [s(BODY, 10)]],
      [[s('Budget', 16)], [s('Line items', 12, SPAN_FLAG_BOLD)], [s(BODY, 10)]],
      [[s('Risks', 13)], [s(BODY, 10)], [s('7', 20)]],
    ]);
    const result = extractOutline(doc, profileDocumentStyles(doc.pages));
    expect(result.outline.length).toBeGreaterThan(0);
    for (const entry of result.outline) {
      expect(HEADING_LEVELS).toContain(entry.level);
      expect(entry.page).toBeGreaterThanOrEqual(0);
      expect(entry.page).toBeLessThan(doc.pageCount);
    }
  });

  it('freezes the result', () => {
    const doc = makeDoc([[[s('Heading', 24)]]]);
    const result = extractOutline(doc, profile);
    expect(Object.isFrozen(result)).toBe(true);
    expect(Object.isFrozen(result.outline)).toBe(true);
  });
});
