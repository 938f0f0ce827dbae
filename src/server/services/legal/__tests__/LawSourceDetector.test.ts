import { DEFAULT_JURISDICTION, DEFAULT_LAW_NAME, LawSourceDetector, defaultLawSource } from '../LawSourceDetector.js';

describe('LawSourceDetector', () => {
  const detector = new LawSourceDetector();

  describe('detect', () => {
    it('falls back to defaults for empty text', () => {
      expect(detector.detect('')).toEqual({
        name: DEFAULT_LAW_NAME,
        type: 'law',
        jurisdiction: DEFAULT_JURISDICTION,
        issuingAuthority: null,
        issueDate: null,
        lastUpdate: null,
        description: null,
        sourceUrl: null,
      });
    });

    it('reads name, authority, year and description', () => {
      const text =
        'نظام العمل رقم 51 لعام 1426\nصادر عن وزارة الموارد البشرية والتنمية الاجتماعية. يسري على جميع العاملين.';

      expect(detector.detect(text)).toEqual({
        ...defaultLawSource(),
        name: 'العمل',
        type: 'law',
        issuingAuthority: 'الموارد البشرية',
        issueDate: '1426-01-01',
        description: 'نظام العمل رقم 51 لعام 1426\nصادر عن وزارة الموارد البشرية والتنمية الاجتماعية',
      });
    });

    it('converts an Arabic-Indic year', () => {
      const detected = detector.detect('قرار وزاري لسنة ١٤٤٤');

      expect(detected.name).toBe('وزاري');
      expect(detected.type).toBe('directive');
      expect(detected.issueDate).toBe('1444-01-01');
      expect(detected.issuingAuthority).toBeNull();
    });

    it('recognizes decrees', () => {
      const detected = detector.detect('صدر مرسوم ملكي رقم م/3 بشأن التحكيم');

      expect(detected.name).toBe('ملكي');
      expect(detected.type).toBe('decree');
      expect(detected.issueDate).toBeNull();
    });

    it('lets pattern order decide over position in the text', () => {
      const detected = detector.detect('لائحة تنظيم العمل لعام 2020 الصادرة بناء على نظام العمل رقم 51');

      expect(detected.name).toBe('العمل');
      expect(detected.type).toBe('law');
      expect(detected.issueDate).toBe('2020-01-01');
    });
  });

  describe('merge', () => {
    it('prefers provided values that are not null', () => {
      const detected = detector.detect('نظام العمل رقم 51 لعام 1426');

      const merged = detector.merge(detected, {
        name: 'نظام العمل السعودي',
        issuingAuthority: null,
        sourceUrl: undefined,
        lastUpdate: '2024-03-01',
      });

      expect(merged).toEqual({ ...detected, name: 'نظام العمل السعودي', lastUpdate: '2024-03-01' });
    });

    it('keeps the detected name when the provided name is null', () => {
      const detected = detector.detect('نظام العمل رقم 51 لعام 1426');

      const merged = detector.merge(detected, { name: null, type: null, jurisdiction: 'دولة الكويت' });

      expect(merged.name).toBe('العمل');
      expect(merged.type).toBe('law');
      expect(merged.jurisdiction).toBe('دولة الكويت');
    });

    it('returns a copy when nothing is provided', () => {
      const detected = defaultLawSource();
      const merged = detector.merge(detected);

      expect(merged).toEqual(detected);
      expect(merged).not.toBe(detected);
    });
  });
});
