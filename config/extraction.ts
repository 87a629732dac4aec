/**
 * Extraction Configuration
 * Settings for the equation converter, image naming and debug logging
 */

import path from 'path';
import dotenv from 'dotenv';

dotenv.config({ path: path.resolve(process.cwd(), '.env.local') });

export interface ExtractionConfig {
  // Legacy equation converter (MathType OLE -> MathML)
  equationConverterCommand: string | null;
  equationConverterArgs: string[];
  equationConverterTimeoutMs: number;

  // Image naming
  defaultImageExtension: string;

  // Logging
  debugLogging: boolean;
}

function readNumber(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

const splitWords = (value: string): string[] => value.split(/\s+/).filter(Boolean);

/**
 * EQUATION_CONVERTER_COMMAND is split on whitespace into executable + arguments.
 * When EQUATION_CONVERTER_ARGS is set, the command is taken verbatim as the
 * executable (so its path may contain spaces) and the arguments come from
 * EQUATION_CONVERTER_ARGS instead.
 */
function readConverterCommand(env: NodeJS.ProcessEnv): { command: string | null; args: string[] } {
  const raw = env.EQUATION_CONVERTER_COMMAND?.trim();
  if (!raw) return { command: null, args: [] };

  if (env.EQUATION_CONVERTER_ARGS !== undefined) {
    return { command: raw, args: splitWords(env.EQUATION_CONVERTER_ARGS) };
  }

  const [command, ...args] = splitWords(raw);
  return { command, args };
}

/**
 * Get extraction configuration from the environment
 */
export const getExtractionConfig = (env: NodeJS.ProcessEnv = process.env): ExtractionConfig => {
  const converter = readConverterCommand(env);

  return {
    equationConverterCommand: converter.command,
    equationConverterArgs: converter.args,
    equationConverterTimeoutMs: readNumber(env.EQUATION_CONVERTER_TIMEOUT_MS, 15000),
    defaultImageExtension: (env.DEFAULT_IMAGE_EXTENSION?.trim() || 'png').replace(/^\./, '').toLowerCase(),
    debugLogging: env.LOG_EXTRACTION_DEBUG === 'true'
  };
};
