// services/questionExportService.ts
import JSZip from 'jszip';
import { QUESTION_SCHEMA_VERSION, type QuestionDocumentJson, type QuestionJson, type QuestionRecord } from '../types';

// ============================================================
// JSON
// ============================================================

export function toQuestionJson(record: QuestionRecord): QuestionJson {
  return {
    number: record.number,
    qstem: record.stem,
    optA: record.options.a ?? null,
    optB: record.options.b ?? null,
    optC: record.options.c ?? null,
    optD: record.options.d ?? null,
    key: record.key,
    hint: record.hint,
    images: Array.from(record.images.keys())
  };
}

export function toQuestionDocument(records: readonly QuestionRecord[]): QuestionDocumentJson {
  return {
    schemaVersion: QUESTION_SCHEMA_VERSION,
    questions: records.map(toQuestionJson)
  };
}

export function serializeQuestions(records: readonly QuestionRecord[]): string {
  return JSON.stringify(toQuestionDocument(records), null, 2);
}

// ============================================================
// ZIP (one folder per question)
// ============================================================

/**
 * question_<number>, or question_<index> (1-based) when the number is unknown.
 * A repeated name gets the index appended.
 */
export function questionFolderNames(records: readonly QuestionRecord[]): string[] {
  const used = new Set<string>();

  return records.map((record, i) => {
    const index = i + 1;
    let name = `question_${record.number ?? index}`;
    if (used.has(name)) name = `${name}_${index}`;
    used.add(name);
    return name;
  });
}

export const buildQuestionArchive = async (records: readonly QuestionRecord[]): Promise<Buffer> => {
  const zip = new JSZip();
  const folders = questionFolderNames(records);

  records.forEach((record, i) => {
    const folder = folders[i];
    zip.file(`${folder}/question.json`, JSON.stringify(toQuestionJson(record), null, 2));
    record.images.forEach((bytes, filename) => {
      zip.file(`${folder}/images/${filename}`, bytes);
    });
  });

  return zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
};
