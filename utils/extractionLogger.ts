import { getExtractionConfig } from '../config/extraction';

/**
 * Console logging for the extraction pipeline.
 * Debug output is enabled via LOG_EXTRACTION_DEBUG.
 */
export class ExtractionLogger {
  private static isDebugEnabled(): boolean {
    return getExtractionConfig().debugLogging;
  }

  public static debug(message: string, data?: unknown): void {
    if (this.isDebugEnabled()) {
      const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
      const dataStr = data === undefined ? '' : ` | ${JSON.stringify(data)}`;
      console.log(`🔍 [${timestamp}][EXTRACT] ${message}${dataStr}`);
    }
  }

  public static info(message: string): void {
    console.log(message);
  }

  public static warn(message: string, error?: unknown): void {
    if (error === undefined) {
      console.warn(`⚠️ ${message}`);
      return;
    }
    console.warn(`⚠️ ${message}:`, error instanceof Error ? error.message : String(error));
  }
}
