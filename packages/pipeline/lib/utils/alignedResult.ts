/**
 * Aligned transcript helpers: shape checks for cached JSON, normalization and
 * the plain-text rendering written next to each cached transcript.
 */

import type { AlignedChar, AlignedResult, AlignedSegment, AlignedWord } from '@trackscribe/shared';

/**
 * Segment as it may arrive from an engine or an older cache file:
 * `words` and `chars` can be missing.
 */
export interface LooseSegment {
  start: number;
  end: number;
  text: string;
  words?: AlignedWord[];
  chars?: AlignedChar[] | null;
}

export interface LooseAlignedResult {
  languageCode: string;
  segments: LooseSegment[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOptionalNumber(value: unknown): boolean {
  return value === undefined || typeof value === 'number';
}

function isAlignedWord(value: unknown): value is AlignedWord {
  return isRecord(value)
    && typeof value.word === 'string'
    && isOptionalNumber(value.start)
    && isOptionalNumber(value.end)
    && isOptionalNumber(value.score);
}

function isAlignedChar(value: unknown): value is AlignedChar {
  return isRecord(value)
    && typeof value.char === 'string'
    && isOptionalNumber(value.start)
    && isOptionalNumber(value.end)
    && isOptionalNumber(value.score);
}

function isLooseSegment(value: unknown): value is LooseSegment {
  if (!isRecord(value)) return false;
  if (typeof value.start !== 'number' || typeof value.end !== 'number' || typeof value.text !== 'string') {
    return false;
  }
  if (value.words !== undefined && !(Array.isArray(value.words) && value.words.every(isAlignedWord))) {
    return false;
  }
  if (value.chars !== undefined && value.chars !== null
    && !(Array.isArray(value.chars) && value.chars.every(isAlignedChar))) {
    return false;
  }
  return true;
}

/**
 * Structural check for a parsed transcript cache file
 */
export function isAlignedResult(value: unknown): value is LooseAlignedResult {
  return isRecord(value)
    && typeof value.languageCode === 'string'
    && Array.isArray(value.segments)
    && value.segments.every(isLooseSegment);
}

/**
 * Every segment gets `words` ([] when absent) and `chars` (null when absent),
 * and segment text is trimmed.
 */
export function normalizeAlignedResult(result: LooseAlignedResult): AlignedResult {
  return {
    languageCode: result.languageCode,
    segments: result.segments.map(normalizeSegment)
  };
}

function normalizeSegment(segment: LooseSegment): AlignedSegment {
  return {
    start: segment.start,
    end: segment.end,
    text: segment.text.trim(),
    words: segment.words ?? [],
    chars: segment.chars ?? null
  };
}

/**
 * One line per non-empty segment, newline-terminated. Empty result renders as ''.
 */
export function renderPlainText(result: AlignedResult): string {
  const lines = result.segments
    .map((segment) => segment.text.trim())
    .filter((text) => text.length > 0);
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
