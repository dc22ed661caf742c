const MEDICAL_UNIT_TERMS = ['mg', 'mcg', 'g', 'ml', 'units', 'tablet', 'capsule', 'injection'];
const PRESCRIPTION_PHRASES = ['daily', 'twice', 'three times', 'as needed', 'for'];

/**
 * Heuristic confidence for OCR text from a backend that reports none.
 * Terms are matched as substrings. Scored in hundredths, capped at 0.9.
 */
export const estimateTextConfidence = (text: string): number => {
  const trimmed = text.trim();
  if (!trimmed) return 0;

  const lower = trimmed.toLowerCase();
  let score = 30;
  score += 10 * MEDICAL_UNIT_TERMS.filter((term) => lower.includes(term)).length;
  score += 5 * PRESCRIPTION_PHRASES.filter((phrase) => lower.includes(phrase)).length;
  if (/\d/.test(trimmed)) score += 10;
  if (trimmed.split(/\s+/).length > 3) score += 10;

  return Math.min(score, 90) / 100;
};
