// services/fieldSplitterService.ts
import { OPTION_LETTERS, type OptionLetter, type QuestionFields, type QuestionOptions } from '../types';

/**
 * Splits one flushed question blob into number / stem / options / key / hint.
 *
 * Markers, in the order they are looked for (first occurrence wins):
 *   "N."        leading question number
 *   "Hint:"     everything after it is the hint (cut at the next "N.X")
 *   "Key:"      everything after it, up to the hint, is the key
 *   "a)".."d)"  option markers, each letter later in the alphabet than the last
 * Markers that fall inside a <math>...</math> region are ignored.
 */

const HINT_MARKER = 'Hint:';
const KEY_MARKER = 'Key:';

const LEADING_NUMBER = /^(\d+)\./;
const NEXT_QUESTION = /(?<!\d)\d+\.\s*[A-Z]/g;
const OPTION_MARKER = /(^|[\s>])([a-z])\)/g;
const MATH_REGION = /<math[\s>][\s\S]*?<\/math>/g;

type Range = [start: number, end: number];

function mathRegions(text: string): Range[] {
  const regions: Range[] = [];
  for (const match of text.matchAll(MATH_REGION)) {
    const start = match.index ?? 0;
    regions.push([start, start + match[0].length]);
  }
  return regions;
}

function insideMath(regions: Range[], index: number): boolean {
  return regions.some(([start, end]) => index >= start && index < end);
}

function indexOutsideMath(text: string, marker: string): number {
  const regions = mathRegions(text);
  let from = 0;
  while (from <= text.length) {
    const index = text.indexOf(marker, from);
    if (index === -1 || !insideMath(regions, index)) return index;
    from = index + 1;
  }
  return -1;
}

function splitOnce(text: string, marker: string): [before: string, after: string] | null {
  const index = indexOutsideMath(text, marker);
  if (index === -1) return null;
  return [text.slice(0, index), text.slice(index + marker.length)];
}

const emptyToNull = (text: string): string | null => (text ? text : null);

// ============================================================
// NUMBER
// ============================================================

export function parseLeadingNumber(text: string): number | null {
  const match = text.trim().match(LEADING_NUMBER);
  return match ? parseInt(match[1], 10) : null;
}

// ============================================================
// HINT
// ============================================================

/**
 * Index of the first "digits. Capital" sequence after the first character,
 * or -1. Used to keep a hint from swallowing the next question.
 */
export function findNextQuestionStart(text: string): number {
  const regions = mathRegions(text);
  for (const match of text.matchAll(NEXT_QUESTION)) {
    const index = match.index ?? 0;
    if (index > 0 && !insideMath(regions, index)) return index;
  }
  return -1;
}

function extractHint(rawHint: string): string | null {
  const hint = rawHint.trim();
  const boundary = findNextQuestionStart(hint);
  return emptyToNull(boundary === -1 ? hint : hint.slice(0, boundary).trim());
}

// ============================================================
// OPTIONS
// ============================================================

interface OptionMarker {
  letter: OptionLetter;
  start: number;
  end: number;
}

function findOptionMarkers(text: string): OptionMarker[] {
  const regions = mathRegions(text);
  const markers: OptionMarker[] = [];

  let lastIndex = -1;

  for (const match of text.matchAll(OPTION_MARKER)) {
    const index = OPTION_LETTERS.findIndex((letter) => letter === match[2]);
    if (index <= lastIndex) continue;

    const start = (match.index ?? 0) + match[1].length;
    if (insideMath(regions, start)) continue;

    markers.push({ letter: OPTION_LETTERS[index], start, end: start + 2 });
    lastIndex = index;
    if (lastIndex === OPTION_LETTERS.length - 1) break;
  }

  return markers;
}

export function splitOptions(text: string): { stem: string; options: QuestionOptions } {
  const markers = findOptionMarkers(text);
  if (markers.length === 0) return { stem: text.trim(), options: {} };

  const options: QuestionOptions = {};
  markers.forEach((marker, i) => {
    const next = markers[i + 1];
    options[marker.letter] = text.slice(marker.end, next ? next.start : text.length).trim();
  });

  return { stem: text.slice(0, markers[0].start).trim(), options };
}

// ============================================================
// MAIN EXPORT
// ============================================================

export function splitQuestionFields(blob: string): QuestionFields {
  const text = blob.trim();

  const numberMatch = text.match(LEADING_NUMBER);
  const number = numberMatch ? parseInt(numberMatch[1], 10) : null;
  const content = numberMatch ? text.slice(numberMatch[0].length).trim() : text;

  let main = content;
  let hint: string | null = null;
  const hintSplit = splitOnce(content, HINT_MARKER);
  if (hintSplit) {
    main = hintSplit[0];
    hint = extractHint(hintSplit[1]);
  }

  let optionText = main;
  let key: string | null = null;
  const keySplit = splitOnce(main, KEY_MARKER);
  if (keySplit) {
    optionText = keySplit[0];
    key = emptyToNull(keySplit[1].trim());
  }

  const { stem, options } = splitOptions(optionText);

  return { number, stem, options, key, hint };
}
