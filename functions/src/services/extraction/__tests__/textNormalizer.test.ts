import {
  collapseWhitespace,
  expandAbbreviations,
  normalizePrescriptionText,
} from '../textNormalizer';

describe('textNormalizer', () => {
  it('expands a standalone abbreviation', () => {
    expect(expandAbbreviations('bid')).toBe('twice daily');
  });

  it('leaves abbreviations inside longer words untouched', () => {
    expect(expandAbbreviations('forbidding')).toBe('forbidding');
  });

  it('matches abbreviations case-insensitively', () => {
    expect(expandAbbreviations('Paracetamol 1g QID PRN')).toBe(
      'Paracetamol 1g four times daily as needed',
    );
  });

  it('collapses whitespace before expanding', () => {
    expect(normalizePrescriptionText('  Take  1 tab  BID\n po ')).toBe(
      'Take 1 tab twice daily by mouth',
    );
  });

  it('returns an empty string for empty input', () => {
    expect(normalizePrescriptionText('')).toBe('');
    expect(collapseWhitespace('   \n\t ')).toBe('');
  });
});
