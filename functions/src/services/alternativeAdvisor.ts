import type { AlternativeMedication, ExtractedMedication } from '../types/prescription';

/**
 * Allergy categories and substitutes that do not cross-react with them.
 */
const ALLERGY_ALTERNATIVES: Record<string, readonly string[]> = {
  penicillin: ['azithromycin', 'clindamycin', 'doxycycline'],
  sulfa: ['amoxicillin', 'cephalexin', 'doxycycline'],
  aspirin: ['acetaminophen', 'ibuprofen', 'naproxen'],
  codeine: ['tramadol', 'hydrocodone', 'oxycodone'],
};

export const ALTERNATIVE_NOTES = 'Consult healthcare provider for appropriate dosing';

export const suggestAlternatives = (
  medication: ExtractedMedication,
  allergies: string[],
): AlternativeMedication[] =>
  allergies.flatMap((allergy) => {
    const key = allergy.trim().toLowerCase();
    const substitutes = Object.prototype.hasOwnProperty.call(ALLERGY_ALTERNATIVES, key)
      ? ALLERGY_ALTERNATIVES[key]
      : [];

    return substitutes.map((drugName) => {
      const alternative: AlternativeMedication = {
        drugName,
        reason: `Alternative to ${medication.drugName} due to ${allergy} allergy`,
        route: medication.route,
        notes: ALTERNATIVE_NOTES,
      };
      if (medication.strength) alternative.strength = medication.strength;
      return alternative;
    });
  });
