// services/runMergeService.ts
import type { RunFragment, VerticalAlign } from '../types';
import { NS, attr, childElements, descendants, escapeXml, firstChild, hasAncestor, isNamed } from './ooxmlHelpers';
import { lookupSymbol } from './symbolTableService';

// ============================================================
// TEXT NORMALIZATION
// ============================================================

function normalizeText(text: string): string {
  if (!text) return '';
  return text.normalize('NFC');
}

/**
 * Symbol-code path: unknown symbols stay visible as "[code]" instead of
 * disappearing from the question.
 */
export function symbolToText(code: string | null, font: string | null): string {
  if (!code) return '';
  return lookupSymbol(font, code) ?? `[${code}]`;
}

// ============================================================
// RUN CLASSIFIER
// ============================================================

function runAlignment(run: Element): VerticalAlign {
  const rPr = firstChild(run, NS.w, 'rPr');
  const vertAlign = rPr ? firstChild(rPr, NS.w, 'vertAlign') : null;
  const value = vertAlign ? attr(vertAlign, NS.w, 'val') : null;

  if (value === 'superscript') return 'superscript';
  if (value === 'subscript') return 'subscript';
  return 'normal';
}

function runTokens(run: Element): string[] {
  const tokens: string[] = [];

  for (const child of childElements(run)) {
    if (isNamed(child, NS.w, 't')) {
      tokens.push(child.textContent || '');
    } else if (isNamed(child, NS.w, 'sym')) {
      tokens.push(symbolToText(attr(child, NS.w, 'char'), attr(child, NS.w, 'font')));
    } else if (isNamed(child, NS.w, 'tab') || isNamed(child, NS.w, 'br')) {
      tokens.push(' ');
    }
  }

  return tokens.filter((token) => token.length > 0);
}

/**
 * One fragment per non-empty token, tagged with its run's vertical alignment.
 * Runs inside Office Math or markup-compatibility fallbacks are not prose.
 */
export function classifyParagraphRuns(paragraph: Element): RunFragment[] {
  const fragments: RunFragment[] = [];

  for (const run of descendants(paragraph, NS.w, 'r')) {
    if (hasAncestor(run, paragraph, NS.m, 'oMath') || hasAncestor(run, paragraph, NS.mc, 'Fallback')) continue;

    const kind = runAlignment(run);
    for (const text of runTokens(run)) fragments.push({ kind, text });
  }

  return fragments;
}

// ============================================================
// SCRIPT MERGER
// ============================================================

const TRAILING_DIGITS = /\d+$/;
const TRAILING_LETTERS = /[A-Za-z]+$/;

/** Alphabetic scripts are identifiers (v_x); anything else is a numeral (10^-19). */
function scriptToken(text: string): string {
  const escaped = escapeXml(text);
  return /^[A-Za-z]+$/.test(text) ? `<mi>${escaped}</mi>` : `<mn>${escaped}</mn>`;
}

function scriptMarkup(kind: 'superscript' | 'subscript', base: string, script: string): string {
  if (kind === 'superscript') {
    return `<math><msup><mn>${escapeXml(base)}</mn>${scriptToken(script)}</msup></math>`;
  }
  return `<math><msub><mi>${escapeXml(base)}</mi>${scriptToken(script)}</msub></math>`;
}

/**
 * Single left-to-right pass: a superscript following digits, or a subscript
 * following letters, takes that trailing run as its base. Anything else is
 * emitted literally.
 */
export function mergeScriptFragments(fragments: RunFragment[]): string {
  const out: string[] = [];

  fragments.forEach((fragment, i) => {
    const prev = i > 0 ? fragments[i - 1] : undefined;

    if (fragment.kind === 'normal' || !prev || prev.kind !== 'normal') {
      out.push(fragment.text);
      return;
    }

    const pattern = fragment.kind === 'superscript' ? TRAILING_DIGITS : TRAILING_LETTERS;
    const match = pattern.exec(prev.text);
    if (!match) {
      out.push(fragment.text);
      return;
    }

    // prev was a normal fragment, so it is the last thing emitted
    out.pop();
    const prefix = prev.text.slice(0, match.index);
    if (prefix) out.push(prefix);
    out.push(scriptMarkup(fragment.kind, match[0], fragment.text));
  });

  return out.join('');
}

export function extractParagraphText(paragraph: Element): string {
  return normalizeText(mergeScriptFragments(classifyParagraphRuns(paragraph))).trim();
}
