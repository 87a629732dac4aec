// types.ts

export const OPTION_LETTERS = ['a', 'b', 'c', 'd'] as const;
export type OptionLetter = (typeof OPTION_LETTERS)[number];

export type QuestionOptions = Partial<Record<OptionLetter, string>>;

export type VerticalAlign = 'normal' | 'superscript' | 'subscript';

export interface RunFragment {
  kind: VerticalAlign;
  text: string;
}

export interface SymbolInfo {
  charCode: string;
  font: string;
  unicode: string;
  description: string;
}

export interface SymbolStatistics {
  totalFonts: number;
  totalSymbols: number;
  fonts: Record<string, number>;
}

export interface Relationship {
  id: string;
  target: string;
  type: string;
  external: boolean;
}

export interface DocxPackage {
  /** word/document.xml, or null when the archive has no main body part */
  documentXml: string | null;
  /** null when word/_rels/document.xml.rels is missing */
  relationships: Map<string, Relationship> | null;
  readPart(path: string): Uint8Array | null;
  /** Archive path of a relationship's target, or null when it can't be resolved */
  resolveTarget(relId: string): string | null;
}

/** Fields peeled out of one flushed question blob. */
export interface QuestionFields {
  number: number | null;
  stem: string;
  options: QuestionOptions;
  key: string | null;
  hint: string | null;
}

export interface QuestionRecord extends Readonly<QuestionFields> {
  readonly options: Readonly<QuestionOptions>;
  readonly images: ReadonlyMap<string, Uint8Array>;
}

export interface EquationBlobConverter {
  /** MathML for one legacy equation blob; null or a throw means the equation is dropped. */
  convert(blob: Uint8Array): string | null;
}

export interface ExtractionOptions {
  equationConverter?: EquationBlobConverter;
  defaultImageExtension?: string;
}

export const QUESTION_SCHEMA_VERSION = 1;

export interface QuestionJson {
  number: number | null;
  qstem: string;
  optA: string | null;
  optB: string | null;
  optC: string | null;
  optD: string | null;
  key: string | null;
  hint: string | null;
  images: string[];
}

export interface QuestionDocumentJson {
  schemaVersion: typeof QUESTION_SCHEMA_VERSION;
  questions: QuestionJson[];
}

export interface QuestionSetValidation {
  valid: boolean;
  errors: string[];
  warnings: string[];
}
