#!/usr/bin/env tsx

/**
 * Extract exam questions from a .docx file.
 *
 * Usage:
 *   tsx scripts/extractQuestions.ts <input.docx> <output.json|output.zip|output.xlsx>
 *
 * Legacy (MathType) equations are converted only when EQUATION_CONVERTER_COMMAND
 * is set in the environment or in .env.local. Use EQUATION_CONVERTER_ARGS for the
 * arguments when the converter's path contains spaces.
 */

import fs from 'fs/promises';
import path from 'path';
import { extractQuestionsFromFile, validateQuestionSet } from '../services/questionExtractorService';
import { buildQuestionArchive, serializeQuestions } from '../services/questionExportService';
import { exportQuestionsToExcel } from '../services/excelExportService';
import type { QuestionRecord } from '../types';

const USAGE = 'Usage: extractQuestions.ts <input.docx> <output.json|output.zip|output.xlsx>';

function preview(text: string, max = 80): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length > max ? `${flat.slice(0, max - 3)}...` : flat;
}

function printSummary(questions: QuestionRecord[]): void {
  console.log('\nQuestion breakdown:');
  questions.forEach((q, i) => {
    const texts = [q.stem, ...Object.values(q.options), q.hint];
    const hasMath = texts.some((text) => !!text && text.includes('<math'));

    console.log(`  ${i + 1}. ${preview(q.stem) || 'No stem'}`);
    console.log(
      `     Options: ${Object.keys(q.options).length}, Answer: ${q.key ?? 'N/A'}, ` +
        `Hint: ${q.hint ? 'Yes' : 'No'}, Math: ${hasMath ? 'Yes' : 'No'}, Images: ${q.images.size}`
    );
  });
}

async function writeOutput(questions: QuestionRecord[], outputFile: string): Promise<void> {
  const ext = path.extname(outputFile).toLowerCase();

  if (ext === '.zip') {
    await fs.writeFile(outputFile, await buildQuestionArchive(questions));
  } else if (ext === '.xlsx') {
    await exportQuestionsToExcel(questions, outputFile);
  } else {
    await fs.writeFile(outputFile, serializeQuestions(questions), 'utf-8');
  }
}

async function main(): Promise<number> {
  const [inputFile, outputFile] = process.argv.slice(2);
  if (!inputFile || !outputFile) {
    console.error(USAGE);
    return 1;
  }

  try {
    await fs.access(inputFile);
  } catch {
    console.error(`❌ Input file '${inputFile}' does not exist.`);
    return 1;
  }

  try {
    const questions = await extractQuestionsFromFile(inputFile);
    await writeOutput(questions, outputFile);

    console.log(`💾 Successfully extracted ${questions.length} questions to ${outputFile}`);
    printSummary(questions);

    const validation = validateQuestionSet(questions);
    validation.errors.forEach((error) => console.error(`❌ ${error}`));
    validation.warnings.forEach((warning) => console.warn(`⚠️ ${warning}`));
    return 0;
  } catch (err) {
    console.error('❌ Error processing file:', err instanceof Error ? err.message : err);
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
