/**
 * Safety Evaluator
 *
 * Patient-attribute rules applied to each extracted medication, plus the
 * aggregate extraction confidence for an analysis.
 */

import type { ExtractedMedication, SafetyAlert } from '../types/prescription';

const PEDIATRIC_AGE_LIMIT = 18;
const LOW_WEIGHT_LIMIT_KG = 30;

const HIGH_RISK_MEDICATIONS = ['warfarin', 'digoxin', 'insulin', 'lithium', 'phenytoin'];

/**
 * Each rule is evaluated independently; a medication can raise all three.
 */
export const evaluateMedicationSafety = (
  medication: Pick<ExtractedMedication, 'drugName'>,
  age: number,
  weightKg: number,
): SafetyAlert[] => {
  const alerts: SafetyAlert[] = [];

  if (age < PEDIATRIC_AGE_LIMIT) {
    alerts.push({
      severity: 'medium',
      message: `Patient is under 18 years old (${age} years)`,
      recommendation: 'Verify age-appropriate dosing for this medication',
      reference: 'Pediatric dosing guidelines',
    });
  }

  if (weightKg < LOW_WEIGHT_LIMIT_KG) {
    alerts.push({
      severity: 'medium',
      message: `Patient weight is low (${weightKg} kg)`,
      recommendation: 'Consider weight-based dosing adjustments',
      reference: 'Weight-based dosing guidelines',
    });
  }

  const name = medication.drugName.toLowerCase();
  if (HIGH_RISK_MEDICATIONS.some((drug) => name.includes(drug))) {
    alerts.push({
      severity: 'high',
      message: `${medication.drugName} is a high-risk medication`,
      recommendation: 'Monitor closely and verify dosing',
      reference: 'High-risk medication protocols',
    });
  }

  return alerts;
};

export const aggregateConfidence = (medications: Array<Pick<ExtractedMedication, 'confidence'>>): number => {
  if (medications.length === 0) return 0;
  const total = medications.reduce((sum, medication) => sum + medication.confidence, 0);
  // Rounded to 4 places so 0.9 and 0.5 average to exactly 0.7.
  return Math.round((total / medications.length) * 10000) / 10000;
};
