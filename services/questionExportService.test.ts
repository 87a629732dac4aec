import { describe, expect, it } from 'vitest';
import JSZip from 'jszip';
import {
  buildQuestionArchive,
  questionFolderNames,
  serializeQuestions,
  toQuestionDocument,
  toQuestionJson
} from './questionExportService';
import type { QuestionRecord } from '../types';

const GIF = new Uint8Array([0x47, 0x49, 0x46, 0x38]);

const record = (overrides: Partial<QuestionRecord>): QuestionRecord => ({
  number: 1,
  stem: 'What is 2 + 2?',
  options: { a: '3', b: '4' },
  key: 'b',
  hint: null,
  images: new Map<string, Uint8Array>(),
  ...overrides
});

describe('questionExportService', () => {
  describe('toQuestionJson', () => {
    it('maps options to optA..optD with null for missing ones', () => {
      const images = new Map([['image_1.gif', GIF]]);
      expect(toQuestionJson(record({ hint: 'count', images }))).toEqual({
        number: 1,
        qstem: 'What is 2 + 2?',
        optA: '3',
        optB: '4',
        optC: null,
        optD: null,
        key: 'b',
        hint: 'count',
        images: ['image_1.gif']
      });
    });
  });

  describe('serializeQuestions', () => {
    it('writes the schema version and parses back to the same document', () => {
      const records = [record({}), record({ number: 2, key: null })];
      const json = serializeQuestions(records);

      expect(json.startsWith('{\n  "schemaVersion": 1,')).toBe(true);
      expect(JSON.parse(json)).toEqual(toQuestionDocument(records));
    });

    it('serializes an empty set', () => {
      expect(JSON.parse(serializeQuestions([]))).toEqual({ schemaVersion: 1, questions: [] });
    });
  });

  describe('questionFolderNames', () => {
    it('falls back to the position and disambiguates repeats', () => {
      const names = questionFolderNames([record({ number: 1 }), record({ number: null }), record({ number: 1 })]);
      expect(names).toEqual(['question_1', 'question_2', 'question_1_3']);
    });
  });

  describe('buildQuestionArchive', () => {
    it('stores question.json and images under each folder', async () => {
      const records = [
        record({ number: 4, images: new Map([['image_1.gif', GIF]]) }),
        record({ number: 5, stem: 'No picture here' })
      ];

      const zip = await JSZip.loadAsync(await buildQuestionArchive(records));

      const first = await zip.file('question_4/question.json')?.async('string');
      expect(first).toBeDefined();
      expect(JSON.parse(first ?? '')).toEqual(toQuestionJson(records[0]));

      const second = await zip.file('question_5/question.json')?.async('string');
      expect(JSON.parse(second ?? '').qstem).toBe('No picture here');

      expect(await zip.file('question_4/images/image_1.gif')?.async('uint8array')).toEqual(GIF);
      expect(zip.file('question_5/images/image_1.gif')).toBeNull();
    });
  });
});
