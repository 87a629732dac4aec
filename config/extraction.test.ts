import { describe, expect, it } from 'vitest';
import { getExtractionConfig } from './extraction';

describe('getExtractionConfig', () => {
  it('uses defaults for an empty environment', () => {
    expect(getExtractionConfig({})).toEqual({
      equationConverterCommand: null,
      equationConverterArgs: [],
      equationConverterTimeoutMs: 15000,
      defaultImageExtension: 'png',
      debugLogging: false
    });
  });

  it('reads and normalizes configured values', () => {
    expect(
      getExtractionConfig({
        EQUATION_CONVERTER_COMMAND: '  mt2mml --stdout ',
        EQUATION_CONVERTER_TIMEOUT_MS: '3000',
        DEFAULT_IMAGE_EXTENSION: '.JPG',
        LOG_EXTRACTION_DEBUG: 'true'
      })
    ).toEqual({
      equationConverterCommand: 'mt2mml',
      equationConverterArgs: ['--stdout'],
      equationConverterTimeoutMs: 3000,
      defaultImageExtension: 'jpg',
      debugLogging: true
    });
  });

  it('takes the command verbatim when arguments are configured separately', () => {
    const config = getExtractionConfig({
      EQUATION_CONVERTER_COMMAND: '/opt/Math Tools/mt2mml',
      EQUATION_CONVERTER_ARGS: ' --stdout  --quiet'
    });
    expect(config.equationConverterCommand).toBe('/opt/Math Tools/mt2mml');
    expect(config.equationConverterArgs).toEqual(['--stdout', '--quiet']);
  });

  it('ignores an invalid timeout and a blank command', () => {
    const config = getExtractionConfig({ EQUATION_CONVERTER_COMMAND: '   ', EQUATION_CONVERTER_TIMEOUT_MS: '-5' });
    expect(config.equationConverterCommand).toBeNull();
    expect(config.equationConverterTimeoutMs).toBe(15000);
  });
});
