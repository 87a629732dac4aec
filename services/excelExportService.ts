import fs from 'fs/promises';
import * as XLSX from 'xlsx';
import type { QuestionRecord } from '../types';

export const QUESTION_SHEET_NAME = 'Questions';

export const buildQuestionWorkbook = (questions: readonly QuestionRecord[]): XLSX.WorkBook => {
  // Prepare rows
  const data = questions.map((q, index) => ({
    'No.': q.number ?? index + 1,
    'Question': q.stem,
    'A': q.options.a ?? '',
    'B': q.options.b ?? '',
    'C': q.options.c ?? '',
    'D': q.options.d ?? '',
    'Key': q.key ?? '',
    'Hint': q.hint ?? '',
    'Images': Array.from(q.images.keys()).join(', ')
  }));

  // Create worksheet
  const ws = XLSX.utils.json_to_sheet(data);

  // Create workbook
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, ws, QUESTION_SHEET_NAME);

  return wb;
};

export const exportQuestionsToExcel = async (questions: readonly QuestionRecord[], filePath: string): Promise<void> => {
  const wb = buildQuestionWorkbook(questions);
  const buffer: Buffer = XLSX.write(wb, { type: 'buffer', bookType: 'xlsx' });
  await fs.writeFile(filePath, buffer);
};
