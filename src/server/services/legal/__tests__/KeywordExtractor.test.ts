import type { ArabicTextUtility } from '../../../utils/arabicText.js';
import { KeywordExtractor } from '../KeywordExtractor.js';

describe('KeywordExtractor', () => {
  const extractor = new KeywordExtractor();

  it('puts dictionary terms before generic keywords', () => {
    expect(extractor.extract('يجب احترام العقد المبرم بين الطرفين')).toEqual([
      'عقد',
      'يجب',
      'احترام',
      'العقد',
      'المبرم',
      'بين',
      'الطرفين',
    ]);
  });

  it('truncates to maxKeywords', () => {
    expect(extractor.extract('يجب احترام العقد المبرم بين الطرفين', 2)).toEqual(['عقد', 'يجب']);
  });

  it('skips generic keywords already found in the dictionary', () => {
    const utility: ArabicTextUtility = {
      normalize: (text) => text,
      extractGenericKeywords: () => ['عقد', 'إضافي'],
    };

    expect(new KeywordExtractor(utility).extract('فسخ العقد')).toEqual(['عقد', 'إضافي']);
  });

  it('returns an empty list when the text utility fails', () => {
    const utility: ArabicTextUtility = {
      normalize: (text) => text,
      extractGenericKeywords: () => {
        throw new Error('tokenizer crashed');
      },
    };

    expect(new KeywordExtractor(utility).extract('عقد')).toEqual([]);
  });
});
