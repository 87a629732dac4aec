// services/symbolTableService.ts
import symbolFonts from '../data/symbolFonts.json';
import type { SymbolInfo, SymbolStatistics } from '../types';

/**
 * Symbol-font character codes (w:sym) -> Unicode.
 * Word stores symbols inserted from the Symbol/Wingdings/Webdings fonts as a
 * private-use code point plus a font name, e.g. <w:sym w:font="Symbol" w:char="F0B4"/>.
 */

interface SymbolEntry {
  unicode: string;
  description: string;
}

type FontTable = ReadonlyMap<string, SymbolEntry>;

function isSymbolEntry(value: unknown): value is SymbolEntry {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'unicode' in value &&
    typeof value.unicode === 'string' &&
    'description' in value &&
    typeof value.description === 'string'
  );
}

function buildFontTables(raw: Record<string, Record<string, unknown>>): ReadonlyMap<string, FontTable> {
  const tables = new Map<string, FontTable>();
  for (const [font, codes] of Object.entries(raw)) {
    const table = new Map<string, SymbolEntry>();
    for (const [code, entry] of Object.entries(codes)) {
      if (isSymbolEntry(entry)) table.set(code.toUpperCase(), entry);
    }
    tables.set(font.toLowerCase(), table);
  }
  return tables;
}

const FONT_TABLES = buildFontTables(symbolFonts);

const normalizeFont = (font: string): string => font.trim().toLowerCase();
const normalizeCode = (code: string): string => code.trim().toUpperCase();

function findEntry(font: string | null | undefined, code: string | null | undefined): SymbolEntry | null {
  if (!font || !code) return null;
  const table = FONT_TABLES.get(normalizeFont(font));
  if (!table) return null;
  return table.get(normalizeCode(code)) ?? null;
}

// ============================================================
// LOOKUP
// ============================================================

/**
 * Unicode text for a symbol-font character, or null when the pair is unknown.
 * Both arguments are matched case-insensitively; codes must match exactly.
 */
export function lookupSymbol(font: string | null | undefined, code: string | null | undefined): string | null {
  return findEntry(font, code)?.unicode ?? null;
}

export function getSymbolInfo(font: string | null | undefined, code: string | null | undefined): SymbolInfo | null {
  const entry = findEntry(font, code);
  if (!entry || !font || !code) return null;

  return {
    charCode: normalizeCode(code),
    font: normalizeFont(font),
    unicode: entry.unicode,
    description: entry.description
  };
}

// ============================================================
// COVERAGE
// ============================================================

export function getSupportedFonts(): string[] {
  return Array.from(FONT_TABLES.keys());
}

export function getSupportedCodes(font: string): string[] {
  const table = FONT_TABLES.get(normalizeFont(font));
  return table ? Array.from(table.keys()) : [];
}

export function isFontSupported(font: string): boolean {
  return FONT_TABLES.has(normalizeFont(font));
}

export function getSymbolStatistics(): SymbolStatistics {
  const fonts: Record<string, number> = {};
  let totalSymbols = 0;

  FONT_TABLES.forEach((table, font) => {
    fonts[font] = table.size;
    totalSymbols += table.size;
  });

  return { totalFonts: FONT_TABLES.size, totalSymbols, fonts };
}
