/**
 * Pattern Extractor
 *
 * Rule-based medication extraction with no external dependency. Used when the
 * entity tagger is unavailable or finds nothing.
 */

import * as functions from 'firebase-functions';
import lexicon from '../../data/medicationLexicon.json';
import {
  DEFAULT_ROUTE,
  DOSAGE_FORM_WORDS,
  FREQUENCY_MAP,
  LEADING_DIRECTIVE_WORDS,
  ROUTE_MAP,
} from '../../data/clinicalVocabulary';
import type { ExtractedMedication } from '../../types/prescription';
import { buildPhraseAlternation, toTitleCase } from '../../utils/textUtils';

const KNOWN_MEDICATIONS: readonly string[] = lexicon.knownMedications;
const KNOWN_MEDICATION_SET = new Set(KNOWN_MEDICATIONS);

const MEDICATION_SUFFIXES: readonly string[] = lexicon.suffixes;
const MEDICATION_PREFIXES: readonly string[] = lexicon.prefixes;
const NON_MEDICATION_WORDS = new Set<string>(lexicon.nonMedicationWords);

// Suffix and prefix hints only apply to names at least this long ("Am", "In").
const MIN_HINTED_NAME_LENGTH = 4;
const ROUTE_WINDOW_CHARS = 24;

const FREQUENCY_TOKEN = `(?:${buildPhraseAlternation(Object.keys(FREQUENCY_MAP))})\\b`;
const ROUTE_TOKEN = `(?:${buildPhraseAlternation(Object.keys(ROUTE_MAP))})`;
const STRENGTH_TOKEN = String.raw`\d+(?:\.\d+)?\s*(?:mcg|mg|ml|units?|g)\b`;
const DURATION_TOKEN = String.raw`\d+\s*(?:days?|weeks?|months?|hours?)\b`;

// Words that never belong to a drug name; they end a name phrase.
const NAME_STOP_WORDS = Array.from(
  new Set([
    ...NON_MEDICATION_WORDS,
    ...LEADING_DIRECTIVE_WORDS,
    ...DOSAGE_FORM_WORDS,
    ...Object.keys(FREQUENCY_MAP).flatMap((key) => key.split(' ')),
    ...Object.keys(ROUTE_MAP).flatMap((key) => key.split(' ')),
  ]),
);
const NAME_WORD = `(?!(?:${buildPhraseAlternation(NAME_STOP_WORDS)})\\b)[a-z]+(?:-[a-z]+)*`;
const NAME_TOKEN = `${NAME_WORD}(?:\\s+${NAME_WORD})*`;
const OPTIONAL_ROUTE = `(?:\\s+${ROUTE_TOKEN}\\b)?`;

type PatternGroups = {
  name?: string;
  strength?: string;
  frequency?: string;
  duration?: string;
};

/**
 * Surface patterns, most specific first. Matching is case-insensitive.
 */
const MEDICATION_PATTERN_SOURCES: string[] = [
  // drug + strength + (frequency) + duration
  `\\b(?<name>${NAME_TOKEN})\\s+(?<strength>${STRENGTH_TOKEN})${OPTIONAL_ROUTE}\\s+(?:(?<frequency>${FREQUENCY_TOKEN})\\s+)?(?:for\\s+)?(?<duration>${DURATION_TOKEN})`,
  // drug + strength + frequency
  `\\b(?<name>${NAME_TOKEN})\\s+(?<strength>${STRENGTH_TOKEN})${OPTIONAL_ROUTE}\\s+(?<frequency>${FREQUENCY_TOKEN})`,
  // drug + strength
  `\\b(?<name>${NAME_TOKEN})\\s+(?<strength>${STRENGTH_TOKEN})`,
  // drug + frequency + duration
  `\\b(?<name>${NAME_TOKEN})\\s+(?<frequency>${FREQUENCY_TOKEN})\\s+(?:for\\s+)?(?<duration>${DURATION_TOKEN})`,
  // drug + frequency
  `\\b(?<name>${NAME_TOKEN})\\s+(?<frequency>${FREQUENCY_TOKEN})`,
  // bare name
  `\\b(?<name>${NAME_TOKEN})\\b`,
];

const routePattern = () => new RegExp(`\\b${ROUTE_TOKEN}\\b`, 'i');

export const normalizeFrequency = (value: string): string => {
  const key = value.trim().toLowerCase().replace(/\s+/g, ' ');
  return FREQUENCY_MAP[key] ?? value.trim();
};

export const normalizeRoute = (value: string): string => {
  const key = value.trim().toLowerCase().replace(/\s+/g, ' ');
  return ROUTE_MAP[key] ?? key;
};

/**
 * Medication plausibility test for a candidate drug name.
 * Any non-drug clinical word rejects the candidate outright.
 */
export const isPlausibleMedicationName = (candidate: string): boolean => {
  const lower = candidate.trim().toLowerCase();
  if (!lower) return false;

  const words = lower.split(/[\s-]+/);
  if (words.some((word) => NON_MEDICATION_WORDS.has(word))) {
    return false;
  }

  if (KNOWN_MEDICATIONS.some((med) => lower.includes(med))) {
    return true;
  }

  if (lower.length < MIN_HINTED_NAME_LENGTH) {
    return false;
  }

  return (
    MEDICATION_SUFFIXES.some((suffix) => lower.endsWith(suffix)) ||
    MEDICATION_PREFIXES.some((prefix) => lower.startsWith(prefix))
  );
};

/**
 * The drug word inside a multi-word name match ("Smith Aspirin" -> "Aspirin").
 * The last lexicon word wins; failing that, the last plausible word. Null when
 * no word of the candidate is a plausible drug name on its own.
 */
export const anchorMedicationName = (candidate: string): string | null => {
  const words = candidate.trim().split(/\s+/).filter((word) => word.length > 0);

  for (let i = words.length - 1; i >= 0; i--) {
    if (KNOWN_MEDICATION_SET.has(words[i].toLowerCase())) return words[i];
  }

  for (let i = words.length - 1; i >= 0; i--) {
    if (isPlausibleMedicationName(words[i])) return words[i];
  }

  return null;
};

/**
 * Confidence for a pattern match, in [0.6, 0.95].
 * Computed in hundredths so the sums stay exact.
 */
export const scorePatternMatch = (fields: {
  strength?: string;
  frequency?: string;
  duration?: string;
}): number => {
  let score = 60;
  if (fields.strength) score += 20;
  if (fields.frequency) score += 10;
  if (fields.duration) score += 10;
  return Math.min(score, 95) / 100;
};

const detectRoute = (text: string, matchStart: number, matchEnd: number): string => {
  let window = text.slice(matchStart, matchEnd + ROUTE_WINDOW_CHARS);
  const breakIndex = window.search(/[;\n]/);
  if (breakIndex !== -1) {
    window = window.slice(0, breakIndex);
  }

  const found = routePattern().exec(window);
  return found ? normalizeRoute(found[0]) : DEFAULT_ROUTE;
};

const buildMedication = (
  groups: PatternGroups,
  route: string,
): ExtractedMedication | null => {
  const rawName = groups.name ? anchorMedicationName(groups.name) : null;
  if (!rawName) {
    return null;
  }

  const strength = groups.strength?.trim() || undefined;
  const frequency = groups.frequency ? normalizeFrequency(groups.frequency) : undefined;
  const duration = groups.duration?.trim() || undefined;

  const medication: {
    drugName: string;
    strength?: string;
    frequency?: string;
    duration?: string;
    route: string;
    confidence: number;
  } = {
    drugName: toTitleCase(rawName),
    route,
    confidence: scorePatternMatch({ strength, frequency, duration }),
  };

  if (strength) medication.strength = strength;
  if (frequency) medication.frequency = frequency;
  if (duration) medication.duration = duration;

  return medication;
};

const extractWithLexicon = (text: string): ExtractedMedication[] => {
  const lower = text.toLowerCase();
  return KNOWN_MEDICATIONS.filter((med) => lower.includes(med)).map((med) => ({
    drugName: toTitleCase(med),
    route: DEFAULT_ROUTE,
    confidence: 0.5,
  }));
};

const matchPatterns = (text: string): ExtractedMedication[] => {
  const medications: ExtractedMedication[] = [];
  const seen = new Set<string>();

  for (const source of MEDICATION_PATTERN_SOURCES) {
    const pattern = new RegExp(source, 'gi');
    for (const match of text.matchAll(pattern)) {
      const groups: PatternGroups = match.groups ?? {};
      const matchStart = match.index ?? 0;
      const route = detectRoute(text, matchStart, matchStart + match[0].length);
      const medication = buildMedication(groups, route);
      if (!medication) continue;

      const key = medication.drugName.toLowerCase();
      if (seen.has(key)) continue;

      seen.add(key);
      medications.push(medication);
    }
  }

  return medications;
};

/**
 * Extract medications from prescription text using surface patterns, falling
 * back to a lexicon scan when no pattern candidate is accepted.
 * Never throws; returns an empty list on failure.
 */
export const extractMedicationsWithPatterns = (text: string): ExtractedMedication[] => {
  if (!text || !text.trim()) {
    return [];
  }

  try {
    const matched = matchPatterns(text);
    const medications = matched.length > 0 ? matched : extractWithLexicon(text);

    functions.logger.info(
      `[patternExtractor] Found ${medications.length} medications` +
        (matched.length === 0 ? ' via lexicon scan' : ''),
    );
    return medications;
  } catch (error) {
    functions.logger.error('[patternExtractor] Pattern extraction failed:', error);
    return [];
  }
};
