/**
 * Text Normalizer
 *
 * Cleans raw prescription text before extraction: collapses whitespace and
 * expands standalone clinical abbreviations ("bid" -> "twice daily").
 */

import { CLINICAL_ABBREVIATIONS } from '../../data/clinicalVocabulary';
import { escapeRegExp } from '../../utils/textUtils';

const ABBREVIATION_PATTERNS: Array<[RegExp, string]> = Object.entries(CLINICAL_ABBREVIATIONS).map(
  ([abbreviation, expansion]) => [new RegExp(`\\b${escapeRegExp(abbreviation)}\\b`, 'gi'), expansion],
);

export const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

export const expandAbbreviations = (text: string): string =>
  ABBREVIATION_PATTERNS.reduce(
    (current, [pattern, expansion]) => current.replace(pattern, expansion),
    text,
  );

export const normalizePrescriptionText = (text: string): string => {
  if (!text) return '';
  return expandAbbreviations(collapseWhitespace(text));
};
