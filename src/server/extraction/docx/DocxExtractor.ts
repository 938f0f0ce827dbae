/**
 * DocxExtractor - Extract text from Word documents with mammoth
 *
 * mammoth.extractRawText() ends every paragraph with a blank line; the
 * paragraphs are re-joined with single newlines in document order.
 */

import { getLogger } from '../../utils/logger.js';
import { memoizeLoader } from '../types.js';
import type { DocumentFormat, TextExtractionBackend } from '../types.js';

/** The part of mammoth this backend calls */
export type MammothApi = Pick<typeof import('mammoth'), 'extractRawText'>;

async function loadMammoth(): Promise<MammothApi> {
  return import('mammoth');
}

/**
 * DocxExtractor - mammoth backend
 */
export class DocxExtractor implements TextExtractionBackend {
  readonly name = 'mammoth';
  readonly format: DocumentFormat = 'docx';
  private readonly load: () => Promise<MammothApi>;

  constructor(config: { loader?: () => MammothApi | Promise<MammothApi> } = {}) {
    this.load = memoizeLoader(config.loader || loadMammoth);
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.load();
      return true;
    } catch (error) {
      getLogger().warn({ error, backend: this.name }, 'DOCX backend unavailable');
      return false;
    }
  }

  /**
   * Extract paragraph text from DOCX buffer
   *
   * @throws Error if the buffer is not a readable Word document
   */
  async extract(docxBuffer: Buffer): Promise<string> {
    const mammoth = await this.load();
    const result = await mammoth.extractRawText({ buffer: docxBuffer });

    const paragraphs = (result.value || '').split(/\n\n/);
    const fullText = paragraphs.join('\n').trim();

    const warnings = result.messages.filter((m) => m.type === 'warning');
    getLogger().debug(
      {
        backend: this.name,
        paragraphCount: paragraphs.length,
        textLength: fullText.length,
        warningCount: warnings.length,
      },
      'DOCX extraction completed'
    );

    return fullText;
  }
}
