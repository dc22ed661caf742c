import * as functions from 'firebase-functions';
import type {
  AnalysisOutcome,
  Attributed,
  ExtractedMedication,
  PatientProfile,
  PrescriptionAnalysis,
} from '../../../types/prescription';
import { suggestAlternatives } from '../../alternativeAdvisor';
import type { ExtractionCoordinator } from '../../extraction/extractionCoordinator';
import { normalizePrescriptionText } from '../../extraction/textNormalizer';
import type { InteractionChecker } from '../../rxnorm/interactionChecker';
import type { TerminologyMapper } from '../../rxnorm/terminologyMapper';
import { aggregateConfidence, evaluateMedicationSafety } from '../../safetyEvaluator';

const MAPPINGS_PER_MEDICATION = 3;

export type AnalyzeOptions = {
  includeAlternatives?: boolean;
};

export type PrescriptionAnalyzerDeps = {
  extractionCoordinator: ExtractionCoordinator;
  terminologyMapper: TerminologyMapper;
  interactionChecker: InteractionChecker;
  now?: () => number;
};

const attribute = <T extends object>(records: T[], medication: ExtractedMedication): Attributed<T>[] =>
  records.map((record) => ({ ...record, medication: medication.drugName }));

export class PrescriptionAnalyzer {
  private readonly extractionCoordinator: ExtractionCoordinator;
  private readonly terminologyMapper: TerminologyMapper;
  private readonly interactionChecker: InteractionChecker;
  private readonly now: () => number;

  constructor(deps: PrescriptionAnalyzerDeps) {
    this.extractionCoordinator = deps.extractionCoordinator;
    this.terminologyMapper = deps.terminologyMapper;
    this.interactionChecker = deps.interactionChecker;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Extract medications from prescription text and evaluate them for the
   * given patient. Lookup failures degrade to empty sections; only an
   * extraction that finds nothing is reported back as an outcome.
   */
  async analyze(
    text: string,
    patient: PatientProfile,
    options: AnalyzeOptions = {},
  ): Promise<AnalysisOutcome> {
    const startedAt = this.now();
    const includeAlternatives = options.includeAlternatives ?? true;

    const extraction = await this.extractionCoordinator.extract(normalizePrescriptionText(text));
    if (extraction.method === 'none') {
      functions.logger.info('[prescriptionAnalyzer] No medications found in text');
      return { status: 'no_medications' };
    }

    const { medications, method } = extraction;
    const perMedication = await Promise.all(
      medications.map(async (medication) => {
        const mappings = await this.terminologyMapper.search(medication.drugName, MAPPINGS_PER_MEDICATION);
        const alerts = evaluateMedicationSafety(medication, patient.age, patient.weightKg);
        const alternatives = includeAlternatives ? suggestAlternatives(medication, patient.allergies) : [];
        return { medication, mappings, alerts, alternatives };
      }),
    );

    // The best mapping of each medication stands in for it in the interaction check.
    const primaryRxcuis = perMedication.flatMap(({ mappings }) => (mappings.length > 0 ? [mappings[0].rxcui] : []));
    const interactions = await this.interactionChecker.getInteractions(primaryRxcuis);

    const result: PrescriptionAnalysis = {
      medications,
      mappings: perMedication.flatMap(({ medication, mappings }) => attribute(mappings, medication)),
      alerts: perMedication.flatMap(({ medication, alerts }) => attribute(alerts, medication)),
      interactions,
      alternatives: perMedication.flatMap(({ medication, alternatives }) => attribute(alternatives, medication)),
      aggregateConfidence: aggregateConfidence(medications),
      extractionMethod: method,
      processingTimeMs: this.now() - startedAt,
    };

    functions.logger.info(
      `[prescriptionAnalyzer] Analyzed ${medications.length} medications via ${method} extraction`,
      {
        mappings: result.mappings.length,
        alerts: result.alerts.length,
        interactions: interactions.length,
      },
    );

    return { status: 'analyzed', result };
  }
}
