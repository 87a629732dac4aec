// services/questionExtractorService.ts
import fs from 'fs/promises';
import path from 'path';
import type { ExtractionOptions, QuestionRecord, QuestionSetValidation } from '../types';
import { type DocxInput, loadDocxPackage } from './docxPackageService';
import { parseXml } from './ooxmlHelpers';
import { createExtractionContext } from './extractionContext';
import { bodyParagraphs, scanParagraphs } from './questionScannerService';
import { buildQuestionArchive, serializeQuestions } from './questionExportService';
import { ExtractionLogger } from '../utils/extractionLogger';

/**
 * ============================================================
 * DOCX QUESTION EXTRACTOR
 *
 * 1) Load the archive (all parts in memory)
 * 2) Parse word/document.xml
 * 3) Scan body paragraphs into question records
 * ============================================================
 */

// ============================================================
// MAIN EXPORT
// ============================================================

export const extractQuestions = async (data: DocxInput, options: ExtractionOptions = {}): Promise<QuestionRecord[]> => {
  const pkg = await loadDocxPackage(data);

  if (!pkg.documentXml) {
    ExtractionLogger.warn('word/document.xml not found, no questions extracted');
    return [];
  }
  if (!pkg.relationships) {
    ExtractionLogger.warn('word/_rels/document.xml.rels not found, no questions extracted');
    return [];
  }

  const doc = parseXml(pkg.documentXml);
  const paragraphs = bodyParagraphs(doc);
  ExtractionLogger.debug('Body paragraphs', { count: paragraphs.length });

  const context = createExtractionContext(pkg, options);
  const questions = scanParagraphs(paragraphs, context);

  ExtractionLogger.info(`✅ Extracted questions: ${questions.length}`);
  return questions;
};

export const extractQuestionsFromFile = async (
  filePath: string,
  options: ExtractionOptions = {}
): Promise<QuestionRecord[]> => {
  ExtractionLogger.info(`📄 Parsing Word file: ${path.basename(filePath)}`);
  const data = await fs.readFile(filePath);
  return extractQuestions(data, options);
};

export const extractQuestionsJson = async (data: DocxInput, options: ExtractionOptions = {}): Promise<string> => {
  return serializeQuestions(await extractQuestions(data, options));
};

export const extractQuestionArchive = async (data: DocxInput, options: ExtractionOptions = {}): Promise<Buffer> => {
  return buildQuestionArchive(await extractQuestions(data, options));
};

// ============================================================
// VALIDATE
// ============================================================

export const validateQuestionSet = (questions: readonly QuestionRecord[]): QuestionSetValidation => {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (questions.length === 0) {
    errors.push('No questions found in the document');
  }

  const seen = new Set<number>();
  let withKey = 0;

  questions.forEach((q, index) => {
    const label = q.number === null ? `Question #${index + 1}` : `Question ${q.number}`;

    if (!q.stem.trim()) errors.push(`${label}: missing question stem`);

    if (q.number !== null) {
      if (seen.has(q.number)) errors.push(`${label}: duplicated question number`);
      seen.add(q.number);
    }

    if (q.key) withKey++;
    else warnings.push(`${label}: no answer key`);

    if (Object.keys(q.options).length < 2) warnings.push(`${label}: fewer than two options`);
  });

  ExtractionLogger.info(`📊 Questions: ${questions.length}, with key: ${withKey}, without key: ${questions.length - withKey}`);

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
};
