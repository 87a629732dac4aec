// services/extractionContext.ts
import type { DocxPackage, EquationBlobConverter, ExtractionOptions } from '../types';
import { getExtractionConfig } from '../config/extraction';
import { createEquationConverter } from './equationBlobService';

export interface QuestionBuffer {
  chunks: string[];
  insideQuestion: boolean;
}

/**
 * Everything one extraction mutates. A fresh context is built per document,
 * so parallel extractions never share counters or image tables.
 */
export interface ExtractionContext {
  pkg: DocxPackage;
  converter: EquationBlobConverter;
  defaultImageExtension: string;
  buffer: QuestionBuffer;
  imageCounter: number;
  /** question number -> (filename -> bytes), merged into the record at flush */
  pendingImages: Map<number, Map<string, Uint8Array>>;
  warnedMissingConverter: boolean;
}

export function createExtractionContext(pkg: DocxPackage, options: ExtractionOptions = {}): ExtractionContext {
  const config = getExtractionConfig();

  return {
    pkg,
    converter: options.equationConverter ?? createEquationConverter(config),
    defaultImageExtension: options.defaultImageExtension ?? config.defaultImageExtension,
    buffer: { chunks: [], insideQuestion: false },
    imageCounter: 0,
    pendingImages: new Map(),
    warnedMissingConverter: false
  };
}
