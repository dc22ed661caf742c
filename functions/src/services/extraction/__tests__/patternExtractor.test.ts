import {
  anchorMedicationName,
  extractMedicationsWithPatterns,
  isPlausibleMedicationName,
  normalizeFrequency,
  normalizeRoute,
  scorePatternMatch,
} from '../patternExtractor';
import { normalizePrescriptionText } from '../textNormalizer';

describe('patternExtractor', () => {
  describe('extractMedicationsWithPatterns', () => {
    it('extracts a fully specified medication from raw text', () => {
      expect(extractMedicationsWithPatterns('Aspirin 100mg OD for 7 days')).toEqual([
        {
          drugName: 'Aspirin',
          strength: '100mg',
          frequency: 'once daily',
          duration: '7 days',
          route: 'oral',
          confidence: 0.95,
        },
      ]);
    });

    it('extracts the same medication from normalized text', () => {
      const normalized = normalizePrescriptionText('Aspirin 100mg OD for 7 days');
      expect(normalized).toBe('Aspirin 100mg once daily for 7 days');

      const [medication, ...rest] = extractMedicationsWithPatterns(normalized);
      expect(rest).toHaveLength(0);
      expect(medication).toMatchObject({
        drugName: 'Aspirin',
        strength: '100mg',
        frequency: 'once daily',
        duration: '7 days',
        confidence: 0.95,
      });
    });

    it('extracts only the drug from a prescriber line', () => {
      expect(extractMedicationsWithPatterns('Dr. Smith prescribed Aspirin 100mg OD for 7 days')).toEqual([
        {
          drugName: 'Aspirin',
          strength: '100mg',
          frequency: 'once daily',
          duration: '7 days',
          route: 'oral',
          confidence: 0.95,
        },
      ]);
    });

    it('ignores clinical words around the prescription line', () => {
      const texts = [
        'Please give medicine: Aspirin 100mg OD for 7 days',
        'Aspirin 100mg OD for 7 days. Contact physician within 2 days if rash',
        'Dr. Smith\nAspirin 100mg OD for 7 days\nSignature',
      ];

      for (const text of texts) {
        const medications = extractMedicationsWithPatterns(text);
        expect(medications.map((medication) => medication.drugName)).toEqual(['Aspirin']);
        expect(medications[0]).toMatchObject({ strength: '100mg', duration: '7 days', confidence: 0.95 });
      }
    });

    it('extracts each drug line of a longer prescription', () => {
      const medications = extractMedicationsWithPatterns(
        'Dr. Smith\nAspirin 100mg OD for 7 days\nMetformin 500mg bd',
      );

      expect(medications).toEqual([
        {
          drugName: 'Aspirin',
          strength: '100mg',
          frequency: 'once daily',
          duration: '7 days',
          route: 'oral',
          confidence: 0.95,
        },
        {
          drugName: 'Metformin',
          strength: '500mg',
          frequency: 'twice daily',
          route: 'oral',
          confidence: 0.9,
        },
      ]);
    });

    it('detects a route token next to the match', () => {
      expect(extractMedicationsWithPatterns('Morphine 10mg IV bd')).toEqual([
        {
          drugName: 'Morphine',
          strength: '10mg',
          frequency: 'twice daily',
          route: 'intravenous',
          confidence: 0.9,
        },
      ]);
    });

    it('keeps the first, most specific match for a repeated name', () => {
      const medications = extractMedicationsWithPatterns('Ibuprofen 400mg tid. Ibuprofen as needed');

      expect(medications).toHaveLength(1);
      expect(medications[0]).toMatchObject({
        drugName: 'Ibuprofen',
        strength: '400mg',
        frequency: 'three times daily',
      });
    });

    it('falls back to a lexicon scan when no candidate is accepted', () => {
      expect(extractMedicationsWithPatterns('aspirin-tablet')).toEqual([
        { drugName: 'Aspirin', route: 'oral', confidence: 0.5 },
      ]);
    });

    it('returns nothing for instructions without a drug name', () => {
      expect(extractMedicationsWithPatterns('Take the tablet daily')).toEqual([]);
    });

    it('returns an empty list for empty input', () => {
      expect(extractMedicationsWithPatterns('')).toEqual([]);
      expect(extractMedicationsWithPatterns('   ')).toEqual([]);
    });
  });

  describe('isPlausibleMedicationName', () => {
    it('accepts lexicon names and pharmacological suffixes', () => {
      expect(isPlausibleMedicationName('Metformin')).toBe(true);
      expect(isPlausibleMedicationName('Zolmitriptan')).toBe(true);
    });

    it('rejects short names and non-drug words', () => {
      expect(isPlausibleMedicationName('Am')).toBe(false);
      expect(isPlausibleMedicationName('Daily')).toBe(false);
      expect(isPlausibleMedicationName('Warfarin sodium tablet')).toBe(false);
      expect(isPlausibleMedicationName('Xyz')).toBe(false);
      expect(isPlausibleMedicationName('Medicine')).toBe(false);
      expect(isPlausibleMedicationName('Physician')).toBe(false);
      expect(isPlausibleMedicationName('Within')).toBe(false);
    });
  });

  describe('anchorMedicationName', () => {
    it('keeps the last lexicon word of a multi-word match', () => {
      expect(anchorMedicationName('Smith Prescribed Aspirin')).toBe('Aspirin');
      expect(anchorMedicationName('Aspirin Smith')).toBe('Aspirin');
    });

    it('falls back to the last plausible word', () => {
      expect(anchorMedicationName('Brand Zolmitriptan')).toBe('Zolmitriptan');
    });

    it('rejects a phrase with no plausible word', () => {
      expect(anchorMedicationName('Smith Jones')).toBeNull();
    });
  });

  it('scores pattern matches between 0.6 and 0.95', () => {
    expect(scorePatternMatch({})).toBe(0.6);
    expect(scorePatternMatch({ strength: '5mg' })).toBe(0.8);
    expect(scorePatternMatch({ strength: '5mg', frequency: 'once daily', duration: '3 days' })).toBe(
      0.95,
    );
  });

  it('normalizes frequency and route tokens', () => {
    expect(normalizeFrequency('BID')).toBe('twice daily');
    expect(normalizeFrequency(' every other day ')).toBe('every other day');
    expect(normalizeRoute('By  Mouth')).toBe('oral');
    expect(normalizeRoute('SC')).toBe('subcutaneous');
  });
});
