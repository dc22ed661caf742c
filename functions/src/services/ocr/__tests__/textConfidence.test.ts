import { estimateTextConfidence } from '../textConfidence';

describe('estimateTextConfidence', () => {
  it('scores unit terms, phrases, digits and length', () => {
    expect(estimateTextConfidence('Amoxicillin 500mg three times daily for 7 days')).toBe(0.85);
  });

  it('starts from the base score for plain words', () => {
    expect(estimateTextConfidence('hello')).toBe(0.3);
  });

  it('caps the score at 0.9', () => {
    expect(
      estimateTextConfidence('1 tablet 10mg 5ml injection capsule 2 units daily twice as needed for 3 times'),
    ).toBe(0.9);
  });

  it('is zero for blank text', () => {
    expect(estimateTextConfidence('  ')).toBe(0);
  });
});
