/**
 * ArticleExtractor - Segment legal text into numbered articles
 *
 * Articles headed by a spelled-out ordinal ("المادة الأولى") are tried first.
 * Numbered markers ("المادة 1", "مادة 1", "الفقرة 1", "البند 1") are only used
 * when no ordinal article survives.
 */

import type { Article } from '../../types/legal.js';
import { defaultArabicTextUtility, normalizeArabicDigits } from '../../utils/arabicText.js';
import type { ArabicTextUtility } from '../../utils/arabicText.js';
import { getLogger } from '../../utils/logger.js';
import { ARTICLE_NUMBER_PATTERN, NUMERIC_ARTICLE_PATTERNS, ORDINAL_ARTICLE_PATTERN } from './ArabicLegalPatterns.js';
import { ordinalToNumeral } from './arabicOrdinals.js';
import { KeywordExtractor } from './KeywordExtractor.js';
import { ReferenceExtractor } from './ReferenceExtractor.js';

/** Bodies this short (after trimming) are headings or noise */
const MIN_CONTENT_LENGTH = 11;

export interface ArticleExtractorDependencies {
  keywordExtractor?: KeywordExtractor;
  referenceExtractor?: ReferenceExtractor;
  textUtility?: ArabicTextUtility;
  maxKeywords?: number;
}

function articleSortKey(article: Article): number {
  const match = ARTICLE_NUMBER_PATTERN.exec(article.articleNumber);
  return match ? parseInt(match[1], 10) : 0;
}

export class ArticleExtractor {
  private readonly keywordExtractor: KeywordExtractor;
  private readonly referenceExtractor: ReferenceExtractor;
  private readonly textUtility: ArabicTextUtility;
  private readonly maxKeywords: number;

  constructor(dependencies: ArticleExtractorDependencies = {}) {
    this.textUtility = dependencies.textUtility || defaultArabicTextUtility;
    this.keywordExtractor = dependencies.keywordExtractor || new KeywordExtractor(this.textUtility);
    this.referenceExtractor = dependencies.referenceExtractor || new ReferenceExtractor();
    this.maxKeywords = dependencies.maxKeywords ?? 10;
  }

  /**
   * Extract articles ordered by article number. Never throws; returns [] on failure.
   */
  extract(text: string): Article[] {
    try {
      let articles = this.extractOrdinalArticles(text);
      if (articles.length === 0) {
        articles = this.extractNumberedArticles(text);
      }

      getLogger().debug({ articleCount: articles.length }, 'Articles extracted');

      // Array.prototype.sort is stable
      return articles.sort((a, b) => articleSortKey(a) - articleSortKey(b));
    } catch (error) {
      getLogger().error({ error }, 'Failed to extract articles');
      return [];
    }
  }

  private extractOrdinalArticles(text: string): Article[] {
    const articles: Article[] = [];

    for (const match of text.matchAll(ORDINAL_ARTICLE_PATTERN)) {
      const phrase = match[1];
      const body = match[2].trim();
      if (body.length < MIN_CONTENT_LENGTH) {
        continue;
      }

      let numeral = ordinalToNumeral(phrase);
      if (numeral === null) {
        numeral = phrase.trim().replace(/\s+/g, ' ');
        getLogger().warn({ phrase: numeral }, 'Ordinal not in table; keeping the phrase as the article number');
      }

      articles.push(this.buildArticle(numeral, body));
    }

    return articles;
  }

  private extractNumberedArticles(text: string): Article[] {
    const articles: Article[] = [];

    for (const pattern of NUMERIC_ARTICLE_PATTERNS) {
      for (const match of text.matchAll(pattern)) {
        const body = match[2].trim();
        if (body.length < MIN_CONTENT_LENGTH) {
          continue;
        }
        articles.push(this.buildArticle(normalizeArabicDigits(match[1]), body));
      }
    }

    return articles;
  }

  private buildArticle(numeral: string, body: string): Article {
    const content = this.textUtility.normalize(body);
    return {
      articleNumber: `المادة ${numeral}`,
      title: null,
      content,
      keywords: this.keywordExtractor.extract(content, this.maxKeywords),
      relatedReferences: this.referenceExtractor.extract(content),
    };
  }
}
