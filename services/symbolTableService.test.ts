import { describe, expect, it } from 'vitest';
import {
  getSupportedCodes,
  getSupportedFonts,
  getSymbolInfo,
  getSymbolStatistics,
  isFontSupported,
  lookupSymbol
} from './symbolTableService';

describe('symbolTableService', () => {
  describe('lookupSymbol', () => {
    it('maps Symbol font operators and Greek letters', () => {
      expect(lookupSymbol('Symbol', 'F0B4')).toBe('×');
      expect(lookupSymbol('Symbol', 'F0B8')).toBe('÷');
      expect(lookupSymbol('Symbol', 'F070')).toBe('π');
      expect(lookupSymbol('Symbol', 'F044')).toBe('Δ');
      expect(lookupSymbol('Symbol', 'F057')).toBe('Ω');
      expect(lookupSymbol('Symbol', 'F0A5')).toBe('∞');
      expect(lookupSymbol('Symbol', 'F0DE')).toBe('⇒');
      expect(lookupSymbol('Symbol', 'F0B0')).toBe('°');
    });

    it('maps Wingdings and Webdings', () => {
      expect(lookupSymbol('Wingdings', 'F021')).toBe('✁');
      expect(lookupSymbol('Webdings', 'F021')).toBe('♠');
    });

    it('is case-insensitive in both arguments for every supported pair', () => {
      for (const font of getSupportedFonts()) {
        for (const code of getSupportedCodes(font)) {
          const upperFont = lookupSymbol(font.toUpperCase(), code.toLowerCase());
          const lowerFont = lookupSymbol(font.toLowerCase(), code.toUpperCase());
          expect(upperFont).not.toBeNull();
          expect(upperFont).toBe(lowerFont);
        }
      }
    });

    it('returns null for unknown pairs instead of a placeholder', () => {
      expect(lookupSymbol('Symbol', 'F999')).toBeNull();
      expect(lookupSymbol('UnknownFont', 'F0B4')).toBeNull();
      expect(lookupSymbol(null, 'F0B4')).toBeNull();
      expect(lookupSymbol('Symbol', undefined)).toBeNull();
    });

    it('does not match code prefixes', () => {
      expect(lookupSymbol('Symbol', 'F0B')).toBeNull();
      expect(lookupSymbol('Symbol', 'F0B44')).toBeNull();
    });
  });

  describe('getSymbolInfo', () => {
    it('returns normalized details', () => {
      expect(getSymbolInfo('SYMBOL', 'f0b4')).toEqual({
        charCode: 'F0B4',
        font: 'symbol',
        unicode: '×',
        description: 'Multiplication operator'
      });
    });

    it('returns null for unknown symbols', () => {
      expect(getSymbolInfo('Symbol', 'F999')).toBeNull();
      expect(getSymbolInfo('UnknownFont', 'F0B4')).toBeNull();
    });
  });

  describe('coverage', () => {
    it('lists the supported fonts', () => {
      expect(getSupportedFonts()).toEqual(['symbol', 'wingdings', 'webdings']);
      expect(isFontSupported('WINGDINGS')).toBe(true);
      expect(isFontSupported('UnknownFont')).toBe(false);
    });

    it('lists codes per font', () => {
      const codes = getSupportedCodes('Symbol');
      expect(codes).toContain('F0B4');
      expect(codes).toContain('F070');
      expect(codes).toHaveLength(105);
      expect(getSupportedCodes('UnknownFont')).toEqual([]);
    });

    it('reports statistics', () => {
      expect(getSymbolStatistics()).toEqual({
        totalFonts: 3,
        totalSymbols: 109,
        fonts: { symbol: 105, wingdings: 2, webdings: 2 }
      });
    });
  });
});
