/**
 * UnpdfExtractor - Secondary PDF backend on unpdf (serverless PDF.js build)
 *
 * unpdf is pulled in with a dynamic import the first time the backend is
 * checked, so a missing install only disables this backend.
 */

import { getLogger } from '../../utils/logger.js';
import { memoizeLoader } from '../types.js';
import type { DocumentFormat, TextExtractionBackend } from '../types.js';

/** Per-page text of a PDF, in page order */
export type PdfPageTextReader = (data: Uint8Array) => Promise<{ totalPages: number; text: string[] }>;

async function loadUnpdf(): Promise<PdfPageTextReader> {
  const { extractText } = await import('unpdf');
  return (data) => extractText(data, { mergePages: false });
}

export class UnpdfExtractor implements TextExtractionBackend {
  readonly name = 'unpdf';
  readonly format: DocumentFormat = 'pdf';
  private readonly load: () => Promise<PdfPageTextReader>;

  constructor(config: { loader?: () => PdfPageTextReader | Promise<PdfPageTextReader> } = {}) {
    this.load = memoizeLoader(config.loader || loadUnpdf);
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.load();
      return true;
    } catch (error) {
      getLogger().warn({ error, backend: this.name }, 'PDF backend unavailable');
      return false;
    }
  }

  async extract(pdfBuffer: Buffer): Promise<string> {
    const readPages = await this.load();
    const { totalPages, text } = await readPages(new Uint8Array(pdfBuffer));

    const fullText = text.join('\n').normalize('NFC').trim();

    getLogger().debug(
      { backend: this.name, pageCount: totalPages, textLength: fullText.length },
      'PDF extraction completed'
    );

    return fullText;
  }
}
