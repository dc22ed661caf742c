/**
 * Model Extractor
 *
 * Turns entity tagger spans into medications. A drug span opens a record; the
 * attribute spans that follow attach to it until the next drug span.
 */

import { DEFAULT_ROUTE } from '../../data/clinicalVocabulary';
import type { ExtractedMedication } from '../../types/prescription';
import { toTitleCase } from '../../utils/textUtils';
import type { EntityTagger, TaggedEntity } from './entityTagger';
import { normalizeFrequency, normalizeRoute } from './patternExtractor';

const DRUG_LABELS = new Set(['DRUG', 'MEDICATION', 'CHEMICAL']);

type AttributeField = 'strength' | 'frequency' | 'duration' | 'route';

const ATTRIBUTE_LABELS: Record<string, AttributeField> = {
  DOSAGE: 'strength',
  STRENGTH: 'strength',
  FREQUENCY: 'frequency',
  DURATION: 'duration',
  ROUTE: 'route',
  ADMINISTRATION: 'route',
};

type OpenRecord = {
  drugName: string;
  confidence: number;
} & Partial<Record<AttributeField, string>>;

const clampConfidence = (score: number): number => {
  if (!Number.isFinite(score)) return 0;
  return Math.min(Math.max(score, 0), 1);
};

// Sub-word pieces ("##mide") survive simple aggregation on some models.
const cleanSpanText = (text: string): string => text.replace(/\s*##/g, '').replace(/\s+/g, ' ').trim();

const toMedication = (record: OpenRecord): ExtractedMedication => {
  const medication: {
    drugName: string;
    strength?: string;
    frequency?: string;
    duration?: string;
    route: string;
    confidence: number;
  } = {
    drugName: toTitleCase(record.drugName),
    route: record.route ? normalizeRoute(record.route) : DEFAULT_ROUTE,
    confidence: clampConfidence(record.confidence),
  };

  if (record.strength) medication.strength = record.strength;
  if (record.frequency) medication.frequency = normalizeFrequency(record.frequency);
  if (record.duration) medication.duration = record.duration;

  return medication;
};

export const medicationsFromEntities = (entities: TaggedEntity[]): ExtractedMedication[] => {
  const records: OpenRecord[] = [];
  let current: OpenRecord | null = null;

  for (const entity of entities) {
    const label = entity.label.toUpperCase();
    const text = cleanSpanText(entity.text);
    if (!text) continue;

    if (DRUG_LABELS.has(label)) {
      current = { drugName: text, confidence: entity.score };
      records.push(current);
      continue;
    }

    const field = ATTRIBUTE_LABELS[label];
    if (field && current) {
      current[field] = text;
    }
  }

  const seen = new Set<string>();
  const medications: ExtractedMedication[] = [];
  for (const record of records) {
    const medication = toMedication(record);
    const key = medication.drugName.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    medications.push(medication);
  }

  return medications;
};

export class ModelExtractor {
  constructor(private readonly tagger: EntityTagger) {}

  async extract(text: string): Promise<ExtractedMedication[]> {
    if (!text.trim()) {
      return [];
    }

    const entities = await this.tagger.tag(text);
    return medicationsFromEntities(entities);
  }
}
