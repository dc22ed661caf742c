/**
 * Extraction Coordinator
 *
 * Model path first, pattern path otherwise. Results from the two paths are
 * never merged; the returned method says which one produced the list.
 */

import * as functions from 'firebase-functions';
import type { ExtractedMedication, ExtractionResult } from '../../types/prescription';
import type { ModelExtractor } from './modelExtractor';
import { extractMedicationsWithPatterns } from './patternExtractor';

export type PatternExtractFn = (text: string) => ExtractedMedication[];

export interface ExtractionCoordinatorDeps {
  /** Absent when the entity tagger could not be initialized. */
  modelExtractor?: ModelExtractor | null;
  patternExtract?: PatternExtractFn;
}

export class ExtractionCoordinator {
  private modelExtractor: ModelExtractor | null;
  private patternExtract: PatternExtractFn;

  constructor(deps: ExtractionCoordinatorDeps = {}) {
    this.modelExtractor = deps.modelExtractor ?? null;
    this.patternExtract = deps.patternExtract ?? extractMedicationsWithPatterns;
  }

  get modelAvailable(): boolean {
    return this.modelExtractor !== null;
  }

  async extract(text: string): Promise<ExtractionResult> {
    if (!text || !text.trim()) {
      return { method: 'none' };
    }

    const modelMedications = await this.tryModel(text);
    if (modelMedications.length > 0) {
      return { method: 'model', medications: modelMedications };
    }

    let patternMedications: ExtractedMedication[];
    try {
      patternMedications = this.patternExtract(text);
    } catch (error) {
      functions.logger.error('[extractionCoordinator] Pattern extraction failed:', error);
      patternMedications = [];
    }

    if (patternMedications.length === 0) {
      return { method: 'none' };
    }

    return { method: 'pattern', medications: patternMedications };
  }

  private async tryModel(text: string): Promise<ExtractedMedication[]> {
    if (!this.modelExtractor) {
      functions.logger.debug('[extractionCoordinator] Model extraction unavailable, using patterns');
      return [];
    }

    try {
      return await this.modelExtractor.extract(text);
    } catch (error) {
      functions.logger.warn('[extractionCoordinator] Model extraction failed, using patterns', {
        error: error instanceof Error ? error.message : String(error),
      });
      return [];
    }
  }
}
