import { TextExtractor } from '../../../extraction/TextExtractor.js';
import type { DocumentFormat, TextExtractionBackend } from '../../../extraction/types.js';
import { ErrorCode, LegalDocumentError } from '../../../types/errors.js';
import type { LawSourceMetadata } from '../../../types/legal.js';
import { DocumentProcessor } from '../DocumentProcessor.js';
import type { DocumentProcessorDependencies } from '../DocumentProcessor.js';
import { LawSourceDetector } from '../LawSourceDetector.js';

const LABOUR_TEXT =
  'المادة الأولى: يحق للعامل الحصول على إجازة سنوية مدتها ثلاثون يوماً. المادة الثانية: يجب على صاحب العمل دفع الأجر في الموعد المحدد.';

const DOCUMENTS: Record<string, string> = {
  'labour.pdf': LABOUR_TEXT,
  'contract.docx': 'عقد عمل\nالمادة 1: يلتزم الطرف الأول بدفع الأجر الشهري',
  'blank.pdf': '  \n ',
};

/** Backend that treats the buffer as a key into DOCUMENTS */
function fakeBackend(name: string, format: DocumentFormat): TextExtractionBackend {
  return {
    name,
    format,
    isAvailable: async () => true,
    extract: (buffer) => {
      const key = buffer.toString();
      if (key === 'slow.pdf') {
        return new Promise<string>(() => undefined);
      }
      const text = DOCUMENTS[key];
      if (text === undefined) {
        return Promise.reject(new Error(`unreadable ${key}`));
      }
      return Promise.resolve(text);
    },
  };
}

function fakeExtractor(): TextExtractor {
  return new TextExtractor([fakeBackend('fake-pdf', 'pdf'), fakeBackend('fake-docx', 'docx')], {
    readFile: async (filePath) => Buffer.from(filePath),
  });
}

function createProcessor(dependencies: DocumentProcessorDependencies = {}): DocumentProcessor {
  return new DocumentProcessor({
    textExtractor: fakeExtractor(),
    defaults: { batchConcurrency: 2, documentTimeoutMs: 0, maxKeywords: 10 },
    ...dependencies,
  });
}

async function captureError(promise: Promise<unknown>): Promise<LegalDocumentError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof LegalDocumentError) {
      return error;
    }
    throw error;
  }
  throw new Error('Expected a LegalDocumentError');
}

describe('DocumentProcessor', () => {
  describe('process', () => {
    it('turns a two-article document into ordered articles', async () => {
      const result = await createProcessor().process('labour.pdf');

      expect(result.articles.map((article) => [article.articleNumber, article.content])).toEqual([
        ['المادة 1', 'يحق للعامل الحصول على إجازة سنوية مدتها ثلاثون يوماً.'],
        ['المادة 2', 'يجب على صاحب العمل دفع الأجر في الموعد المحدد.'],
      ]);
      expect(result.articles[0].keywords).toContain('إجازة');
      expect(result.lawSource).toEqual({
        name: 'وثيقة قانونية',
        type: 'law',
        jurisdiction: 'المملكة العربية السعودية',
        issuingAuthority: null,
        issueDate: null,
        lastUpdate: null,
        description: 'المادة الأولى: يحق للعامل الحصول على إجازة سنوية مدتها ثلاثون يوماً',
        sourceUrl: null,
      });
      expect(result.statistics.totalArticles).toBe(2);
      expect(result.statistics.totalCharacters).toBe(
        result.articles[0].content.length + result.articles[1].content.length
      );
      expect(result.statistics.filePath).toBe('labour.pdf');
      expect(result.statistics.processingTime).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
    });

    it('applies caller overrides over detected values', async () => {
      const result = await createProcessor().process('labour.pdf', {
        name: 'نظام العمل',
        issuingAuthority: null,
        sourceUrl: 'https://laws.example.test/labour',
      });

      expect(result.lawSource.name).toBe('نظام العمل');
      expect(result.lawSource.issuingAuthority).toBeNull();
      expect(result.lawSource.sourceUrl).toBe('https://laws.example.test/labour');
    });

    it('rejects invalid overrides before extracting text', async () => {
      const factory = jest.fn(async () => fakeExtractor());
      const processor = createProcessor({ textExtractor: factory });

      const error = await captureError(processor.process('labour.pdf', { issueDate: '2024/01/01' }));

      expect(error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(error.field).toBe('issueDate');
      expect(error.documentPath).toBe('labour.pdf');
      expect(factory).not.toHaveBeenCalled();
    });

    it('fails with EMPTY_TEXT for whitespace-only documents', async () => {
      const error = await captureError(createProcessor().process('blank.pdf'));

      expect(error.code).toBe(ErrorCode.EMPTY_TEXT);
      expect(error.message).toBe('No text extracted from document');
      expect(error.documentPath).toBe('blank.pdf');
    });

    it('passes extraction errors through unchanged', async () => {
      const error = await captureError(createProcessor().process('scan.tiff'));

      expect(error.code).toBe(ErrorCode.EXTRACTION_ERROR);
      expect(error.message).toBe('Unsupported file format: .tiff');
    });

    it('wraps unexpected failures as PROCESSING_ERROR', async () => {
      class ExplodingDetector extends LawSourceDetector {
        merge(): LawSourceMetadata {
          throw new Error('boom');
        }
      }

      const error = await captureError(
        createProcessor({ lawSourceDetector: new ExplodingDetector() }).process('labour.pdf')
      );

      expect(error.code).toBe(ErrorCode.PROCESSING_ERROR);
      expect(error.message).toBe('Failed to process document: boom');
      expect(error.documentPath).toBe('labour.pdf');
    });

    it('creates the text extractor once', async () => {
      const factory = jest.fn(async () => fakeExtractor());
      const processor = createProcessor({ textExtractor: factory });

      await processor.processBatch(['labour.pdf', 'contract.docx']);

      expect(factory).toHaveBeenCalledTimes(1);
    });
  });

  describe('processText', () => {
    it('runs the pipeline on text that is already extracted', () => {
      const result = createProcessor().processText(LABOUR_TEXT, { sourcePath: 'inline-labour' });

      expect(result.articles.map((article) => article.articleNumber)).toEqual(['المادة 1', 'المادة 2']);
      expect(result.statistics.filePath).toBe('inline-labour');
    });

    it('labels text without a source path', () => {
      expect(createProcessor().processText(LABOUR_TEXT).statistics.filePath).toBe('<text>');
    });

    it('rejects blank text', () => {
      expect(() => createProcessor().processText('   ')).toThrow('No text extracted from document');
    });
  });

  describe('processBatch', () => {
    it('isolates failures and keeps input order', async () => {
      const batch = await createProcessor().processBatch(['labour.pdf', 'contract.docx', 'notes.txt']);

      expect(batch.statistics).toEqual({ totalFiles: 3, successful: 2, failed: 1 });
      expect(batch.results.map((entry) => [entry.filePath, entry.success])).toEqual([
        ['labour.pdf', true],
        ['contract.docx', true],
        ['notes.txt', false],
      ]);
      expect(batch.results[2]).toEqual({
        filePath: 'notes.txt',
        success: false,
        data: null,
        error: 'Unsupported file format: .txt',
      });

      const contract = batch.results[1];
      expect(contract.success && contract.data.articles.map((article) => article.articleNumber)).toEqual([
        'المادة 1',
      ]);
    });

    it('records corrupt documents as failures', async () => {
      const batch = await createProcessor().processBatch(['broken.pdf'], null, { concurrency: 1 });

      expect(batch.results[0].error).toBe('Failed to extract text from PDF: unreadable broken.pdf');
      expect(batch.statistics).toEqual({ totalFiles: 1, successful: 0, failed: 1 });
    });

    it('fails documents that exceed the time limit', async () => {
      const batch = await createProcessor().processBatch(['slow.pdf', 'labour.pdf'], undefined, {
        documentTimeoutMs: 20,
      });

      expect(batch.results[0].error).toBe('Processing slow.pdf timed out after 20ms');
      expect(batch.results[1].success).toBe(true);
      expect(batch.statistics).toEqual({ totalFiles: 2, successful: 1, failed: 1 });
    });

    it('applies the same overrides to every document', async () => {
      const batch = await createProcessor().processBatch(['labour.pdf', 'contract.docx'], { jurisdiction: 'دولة قطر' });

      expect(batch.results.map((entry) => entry.data?.lawSource.jurisdiction)).toEqual(['دولة قطر', 'دولة قطر']);
    });

    it('handles an empty batch', async () => {
      await expect(createProcessor().processBatch([])).resolves.toEqual({
        results: [],
        statistics: { totalFiles: 0, successful: 0, failed: 0 },
      });
    });
  });
});
