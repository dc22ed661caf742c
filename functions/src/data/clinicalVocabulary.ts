/**
 * Clinical Vocabulary
 *
 * Abbreviation, frequency and route tables shared by the text normalizer
 * and both extraction paths.
 */

/**
 * Standalone prescription abbreviations and their expansions.
 * Applied in insertion order.
 */
export const CLINICAL_ABBREVIATIONS: Record<string, string> = {
  od: 'once daily',
  bd: 'twice daily',
  bid: 'twice daily',
  tid: 'three times daily',
  qid: 'four times daily',
  qds: 'four times daily',
  prn: 'as needed',
  po: 'by mouth',
  iv: 'intravenous',
  im: 'intramuscular',
  sc: 'subcutaneous',
};

/**
 * Frequency tokens (lowercase) mapped to their canonical phrase.
 */
export const FREQUENCY_MAP: Record<string, string> = {
  od: 'once daily',
  bd: 'twice daily',
  bid: 'twice daily',
  tid: 'three times daily',
  qid: 'four times daily',
  qds: 'four times daily',
  prn: 'as needed',
  daily: 'once daily',
  twice: 'twice daily',
  thrice: 'three times daily',
  'once daily': 'once daily',
  'twice daily': 'twice daily',
  'three times daily': 'three times daily',
  'four times daily': 'four times daily',
  'as needed': 'as needed',
  weekly: 'once weekly',
  nightly: 'at night',
};

/**
 * Route tokens (lowercase) mapped to the route name, in detection priority order.
 */
export const ROUTE_MAP: Record<string, string> = {
  po: 'oral',
  'by mouth': 'oral',
  oral: 'oral',
  iv: 'intravenous',
  intravenous: 'intravenous',
  im: 'intramuscular',
  intramuscular: 'intramuscular',
  sc: 'subcutaneous',
  subcutaneous: 'subcutaneous',
  top: 'topical',
  topical: 'topical',
  inh: 'inhalation',
  inhalation: 'inhalation',
  inhaled: 'inhalation',
};

export const DEFAULT_ROUTE = 'oral';

/**
 * Words that may precede a drug name in a directive ("Take Aspirin", "Tab Amoxicillin").
 */
export const LEADING_DIRECTIVE_WORDS = new Set([
  'take',
  'takes',
  'start',
  'started',
  'begin',
  'give',
  'continue',
  'resume',
  'use',
  'apply',
  'inhale',
  'inject',
  'rx',
  'tab',
  'tabs',
  'cap',
  'caps',
  'inj',
  'syp',
]);

/**
 * Dosage-form words that may trail a drug name ("Ibuprofen Tablet").
 */
export const DOSAGE_FORM_WORDS = new Set([
  'tablet',
  'tablets',
  'capsule',
  'capsules',
  'syrup',
  'injection',
  'cream',
  'ointment',
  'suspension',
  'drops',
]);
