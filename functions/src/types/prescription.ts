export type AlertSeverity = 'low' | 'medium' | 'high' | 'critical';

export type InteractionSeverity = 'low' | 'medium' | 'high';

/**
 * A medication mention detected in prescription text.
 * Created once per mention per analysis call and never mutated.
 */
export interface ExtractedMedication {
  readonly drugName: string;
  readonly strength?: string;
  readonly frequency?: string;
  readonly duration?: string;
  readonly route: string;
  readonly confidence: number;
}

export interface RxNormMapping {
  rxcui: string;
  name: string;
  synonym?: string;
  /** Mapping certainty, independent of extraction confidence. */
  confidence: number;
}

export interface SafetyAlert {
  severity: AlertSeverity;
  message: string;
  recommendation: string;
  reference?: string;
}

export interface DrugInteraction {
  drug1: string;
  drug2: string;
  severity: InteractionSeverity;
  description: string;
  recommendation: string;
  source?: string;
  rxcuis: string[];
}

export interface AlternativeMedication {
  drugName: string;
  reason: string;
  strength?: string;
  route?: string;
  notes?: string;
}

export interface PatientProfile {
  age: number;
  weightKg: number;
  allergies: string[];
  medicalConditions: string[];
}

/** Name of the extracted medication a derived record belongs to. */
export type Attributed<T> = T & { medication: string };

export type ExtractionMethod = 'model' | 'pattern';

export type ExtractionResult =
  | { method: ExtractionMethod; medications: ExtractedMedication[] }
  | { method: 'none' };

export interface PrescriptionAnalysis {
  medications: ExtractedMedication[];
  mappings: Attributed<RxNormMapping>[];
  alerts: Attributed<SafetyAlert>[];
  interactions: DrugInteraction[];
  alternatives: Attributed<AlternativeMedication>[];
  aggregateConfidence: number;
  extractionMethod: ExtractionMethod;
  processingTimeMs: number;
}

export type AnalysisOutcome =
  | { status: 'analyzed'; result: PrescriptionAnalysis }
  | { status: 'no_medications' };
