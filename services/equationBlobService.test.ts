import { afterEach, describe, expect, it, vi } from 'vitest';
import fs from 'fs';
import os from 'os';
import {
  CommandEquationConverter,
  createEquationConverter,
  isEquationProgId,
  normalizeEquationBlob,
  unavailableEquationConverter
} from './equationBlobService';
import { getExtractionConfig } from '../config/extraction';

const BLOB = new Uint8Array([0xd0, 0xcf, 0x11, 0xe0]);

// Converter stand-ins run by the current node binary; the blob path arrives as argv[1].
const BYTE_COUNT_SCRIPT =
  "const size = require('fs').readFileSync(process.argv[1]).length;" +
  "process.stdout.write('<math>\\n  <mn>' + size + '</mn>\\n</math>\\n');";
const FAILING_SCRIPT = "process.stderr.write('unsupported equation format'); process.exit(2);";

const equationTempDirs = (): string[] =>
  fs.readdirSync(os.tmpdir()).filter((name) => name.startsWith('equation-'));

describe('equationBlobService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('normalizeEquationBlob', () => {
    it('keeps only the <math> element with whitespace collapsed', () => {
      const converter = {
        convert: vi.fn(
          () =>
            '<?xml version="1.0"?>\n<math xmlns="http://www.w3.org/1998/Math/MathML">\n  <mi>x</mi>\n</math>\n'
        )
      };

      expect(normalizeEquationBlob(BLOB, converter)).toBe(
        '<math xmlns="http://www.w3.org/1998/Math/MathML"><mi>x</mi></math>'
      );
      expect(converter.convert).toHaveBeenCalledWith(BLOB);
    });

    it('returns null when the converter throws', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const converter = {
        convert: (): string => {
          throw new Error('bad OLE header');
        }
      };

      expect(normalizeEquationBlob(BLOB, converter)).toBeNull();
      expect(warn).toHaveBeenCalledWith('⚠️ Equation conversion error:', 'bad OLE header');
    });

    it('returns null for empty or unusable output', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);

      expect(normalizeEquationBlob(BLOB, { convert: () => null })).toBeNull();
      expect(normalizeEquationBlob(BLOB, { convert: () => 'not mathml' })).toBeNull();
      expect(normalizeEquationBlob(BLOB, unavailableEquationConverter)).toBeNull();
    });
  });

  describe('isEquationProgId', () => {
    it('accepts equation editor objects and objects without a ProgID', () => {
      expect(isEquationProgId('Equation.DSMT4')).toBe(true);
      expect(isEquationProgId('Equation.3')).toBe(true);
      expect(isEquationProgId(null)).toBe(true);
      expect(isEquationProgId('')).toBe(true);
      expect(isEquationProgId('Excel.Sheet.12')).toBe(false);
    });
  });

  describe('createEquationConverter', () => {
    it('falls back to the unavailable converter without a command', () => {
      expect(createEquationConverter(getExtractionConfig({}))).toBe(unavailableEquationConverter);
    });

    it('builds a command converter when a command is configured', () => {
      const config = getExtractionConfig({ EQUATION_CONVERTER_COMMAND: 'mt2mml --stdout' });
      expect(createEquationConverter(config)).toBeInstanceOf(CommandEquationConverter);
    });

    it('rejects an empty command', () => {
      expect(() => new CommandEquationConverter('   ', [], 1000)).toThrow('Equation converter command is empty');
    });
  });

  describe('CommandEquationConverter', () => {
    it('returns the MathML printed by the command and removes its temp directory', () => {
      const before = equationTempDirs();
      const converter = new CommandEquationConverter(process.execPath, ['-e', BYTE_COUNT_SCRIPT], 10000);

      expect(normalizeEquationBlob(BLOB, converter)).toBe('<math><mn>4</mn></math>');
      expect(equationTempDirs().filter((name) => !before.includes(name))).toEqual([]);
    });

    it('yields null on a non-zero exit and still removes its temp directory', () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const before = equationTempDirs();
      const converter = new CommandEquationConverter(process.execPath, ['-e', FAILING_SCRIPT], 10000);

      expect(normalizeEquationBlob(BLOB, converter)).toBeNull();
      expect(warn).toHaveBeenCalledWith(
        '⚠️ Equation conversion error:',
        'Equation converter exited with 2: unsupported equation format'
      );
      expect(equationTempDirs().filter((name) => !before.includes(name))).toEqual([]);
    });
  });
});
