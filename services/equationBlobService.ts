// services/equationBlobService.ts
import { spawnSync } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import type { EquationBlobConverter } from '../types';
import type { ExtractionConfig } from '../config/extraction';
import { ExtractionLogger } from '../utils/extractionLogger';

/**
 * Legacy equation-editor objects (MathType / Equation Editor 3.0) are stored
 * as OLE blobs under word/embeddings/. Turning those into MathML is delegated
 * to an EquationBlobConverter; this module only normalizes what comes back.
 */

const MATH_ELEMENT = /<math[\s>][\s\S]*?<\/math>/;

/** Only Equation.* ProgIDs (or objects without one) are treated as equations. */
export function isEquationProgId(progId: string | null): boolean {
  return !progId || /^Equation\./i.test(progId);
}

/**
 * Convert one blob, returning the first <math> element with whitespace
 * collapsed, or null. Never throws.
 */
export function normalizeEquationBlob(blob: Uint8Array, converter: EquationBlobConverter): string | null {
  let output: string | null;
  try {
    output = converter.convert(blob);
  } catch (err) {
    ExtractionLogger.warn('Equation conversion error', err);
    return null;
  }

  if (!output) return null;

  const match = output.match(MATH_ELEMENT);
  if (!match) {
    ExtractionLogger.warn('Equation converter returned no <math> element');
    return null;
  }

  return match[0].replace(/\s+/g, ' ').replace(/>\s+</g, '><').trim();
}

// ============================================================
// CONVERTERS
// ============================================================

/** Used when no converter command is configured: every equation is dropped. */
export const unavailableEquationConverter: EquationBlobConverter = {
  convert: () => null
};

/**
 * Runs an external command on a temporary copy of the blob and reads MathML
 * from its stdout. The blob path is appended as the last argument. The
 * temporary directory is removed on every exit path.
 */
export class CommandEquationConverter implements EquationBlobConverter {
  constructor(
    private readonly executable: string,
    private readonly args: readonly string[],
    private readonly timeoutMs: number
  ) {
    if (!executable.trim()) throw new Error('Equation converter command is empty');
  }

  convert(blob: Uint8Array): string | null {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'equation-'));
    try {
      const blobPath = path.join(tempDir, 'equation.bin');
      fs.writeFileSync(blobPath, blob);

      const result = spawnSync(this.executable, [...this.args, blobPath], {
        encoding: 'utf-8',
        timeout: this.timeoutMs
      });

      if (result.error) throw result.error;
      if (result.status !== 0) {
        throw new Error(`Equation converter exited with ${result.status}: ${result.stderr.trim()}`);
      }
      return result.stdout;
    } finally {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  }
}

export function createEquationConverter(config: ExtractionConfig): EquationBlobConverter {
  if (!config.equationConverterCommand) return unavailableEquationConverter;
  return new CommandEquationConverter(
    config.equationConverterCommand,
    config.equationConverterArgs,
    config.equationConverterTimeoutMs
  );
}
