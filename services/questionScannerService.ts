// services/questionScannerService.ts
import type { QuestionRecord } from '../types';
import { NS, childElements, descendants } from './ooxmlHelpers';
import { relationshipIdOf } from './docxPackageService';
import { extractParagraphText } from './runMergeService';
import { convertOfficeMathToMathML } from './officeMathService';
import { isEquationProgId, normalizeEquationBlob, unavailableEquationConverter } from './equationBlobService';
import { bindImage, collectImageReferences, takeBoundImages } from './imageBinderService';
import { splitQuestionFields } from './fieldSplitterService';
import type { ExtractionContext } from './extractionContext';
import { ExtractionLogger } from '../utils/extractionLogger';

/**
 * ============================================================
 * QUESTION BOUNDARY SCANNER
 *
 * Idle ──"N.X…" paragraph──► Accumulating ──"N.X…"──► flush + Accumulating
 *                                  │
 *                                  └── end of document ──► flush
 *
 * Paragraphs before the first question (title, instructions) are dropped.
 * ============================================================
 */

const QUESTION_START = /^\d+\.\s*[A-Z]/;

export function isQuestionStart(text: string): boolean {
  const trimmed = text.trim();
  return trimmed.length > 0 && QUESTION_START.test(trimmed);
}

// ============================================================
// FLUSH
// ============================================================

function flushQuestion(context: ExtractionContext): QuestionRecord | null {
  const { buffer } = context;
  const text = buffer.chunks.join(' ').trim();
  if (!text) return null;

  const fields = splitQuestionFields(text);
  const record: QuestionRecord = Object.freeze({
    ...fields,
    options: Object.freeze({ ...fields.options }),
    images: takeBoundImages(context, fields.number)
  });

  buffer.chunks = [];
  ExtractionLogger.debug('Flushed question', {
    number: record.number,
    options: Object.keys(record.options).length,
    images: record.images.size
  });
  return record;
}

// ============================================================
// EMBEDDED CONTENT
// ============================================================

function equationChunks(paragraph: Element, context: ExtractionContext): string[] {
  const chunks: string[] = [];

  for (const ole of descendants(paragraph, NS.o, 'OLEObject')) {
    const progId = ole.getAttribute('ProgID');
    if (!isEquationProgId(progId)) {
      ExtractionLogger.debug('Skipping non-equation object', { progId });
      continue;
    }

    const relId = relationshipIdOf(ole, 'id');
    const partPath = relId ? context.pkg.resolveTarget(relId) : null;
    const blob = partPath ? context.pkg.readPart(partPath) : null;
    if (!blob) {
      ExtractionLogger.warn(`Equation object ${relId ?? '(no id)'} could not be resolved, skipped`);
      continue;
    }

    if (context.converter === unavailableEquationConverter && !context.warnedMissingConverter) {
      ExtractionLogger.warn('EQUATION_CONVERTER_COMMAND is not set; legacy equations will be omitted');
      context.warnedMissingConverter = true;
    }

    const mathml = normalizeEquationBlob(blob, context.converter);
    if (mathml) chunks.push(mathml);
  }

  return chunks;
}

function officeMathChunks(paragraph: Element): string[] {
  return descendants(paragraph, NS.m, 'oMath')
    .map(convertOfficeMathToMathML)
    .filter((mathml) => mathml.length > 0);
}

function embeddedChunks(paragraph: Element, context: ExtractionContext): string[] {
  const images = collectImageReferences(paragraph)
    .map((relId) => bindImage(relId, context))
    .filter((marker): marker is string => marker !== null);

  return [...images, ...equationChunks(paragraph, context), ...officeMathChunks(paragraph)];
}

// ============================================================
// SCAN
// ============================================================

export function scanParagraph(paragraph: Element, context: ExtractionContext, out: QuestionRecord[]): void {
  const { buffer } = context;
  const text = extractParagraphText(paragraph);

  if (isQuestionStart(text)) {
    if (buffer.insideQuestion) {
      const record = flushQuestion(context);
      if (record) out.push(record);
    }
    buffer.chunks = [text];
    buffer.insideQuestion = true;
  } else if (buffer.insideQuestion && text) {
    buffer.chunks.push(text);
  }

  if (buffer.insideQuestion) {
    buffer.chunks.push(...embeddedChunks(paragraph, context));
  }
}

export function scanParagraphs(paragraphs: Element[], context: ExtractionContext): QuestionRecord[] {
  const records: QuestionRecord[] = [];

  for (const paragraph of paragraphs) {
    scanParagraph(paragraph, context, records);
  }

  if (context.buffer.insideQuestion) {
    const record = flushQuestion(context);
    if (record) records.push(record);
    context.buffer.insideQuestion = false;
  }

  return records;
}

/** Direct w:p children of w:body; tables and section properties are not questions. */
export function bodyParagraphs(doc: Document): Element[] {
  const body = descendants(doc, NS.w, 'body')[0];
  return body ? childElements(body, NS.w, 'p') : [];
}
