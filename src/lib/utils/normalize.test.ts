import { describe, it, expect } from 'vitest';
import { normalizeLineEndings, normalizeSegment } from './normalize';

describe('normalizeSegment', () => {
  it('returns an empty string for empty and missing input', () => {
    expect(normalizeSegment('')).toBe('');
    expect(normalizeSegment(null)).toBe('');
    expect(normalizeSegment(undefined)).toBe('');
  });

  it('removes every whitespace character instead of collapsing runs', () => {
    expect(normalizeSegment('  Revenue \t grew\n10% ')).toBe('Revenuegrew10%');
  });

  it('removes ideographic, no-break and vertical-tab whitespace', () => {
    expect(normalizeSegment('营收　增长 10%\vQ1')).toBe('营收增长10%Q1');
  });

  it('never leaves whitespace behind', () => {
    const samples = ['a b', '\r\n\r\n', '   x   y ﻿', '\u001fz\u0085', 'plain'];
    for (const sample of samples) {
      expect(normalizeSegment(sample)).not.toMatch(/\s/u);
    }
  });
});

describe('normalizeLineEndings', () => {
  it('turns CRLF and CR into LF', () => {
    expect(normalizeLineEndings('a\r\nb\rc\nd')).toBe('a\nb\nc\nd');
  });
});
