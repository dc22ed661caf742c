import * as functions from 'firebase-functions';
import type { DrugInteraction, InteractionSeverity } from '../../types/prescription';
import type { TerminologyClient } from './rxnavClient';

const HIGH_SEVERITY_KEYWORDS = ['severe', 'serious', 'life-threatening', 'contraindicated'];
const MEDIUM_SEVERITY_KEYWORDS = ['moderate'];
const LOW_SEVERITY_KEYWORDS = ['mild', 'minor', 'minimal'];

const INTERACTION_RECOMMENDATION = 'Consult healthcare provider before combining these medications';
const INTERACTION_SOURCE = 'RxNorm';
const MISSING_DESCRIPTION = 'No description available';

/**
 * Severity tier from a keyword scan of the description. Descriptions with no
 * keyword are rated medium; this is a policy default, not a clinical rating.
 */
export const classifyInteractionSeverity = (description: string): InteractionSeverity => {
  const lower = description.toLowerCase();
  if (HIGH_SEVERITY_KEYWORDS.some((word) => lower.includes(word))) return 'high';
  if (MEDIUM_SEVERITY_KEYWORDS.some((word) => lower.includes(word))) return 'medium';
  if (LOW_SEVERITY_KEYWORDS.some((word) => lower.includes(word))) return 'low';
  return 'medium';
};

export class InteractionChecker {
  constructor(private readonly client: TerminologyClient) {}

  async getInteractions(rxcuis: string[]): Promise<DrugInteraction[]> {
    const ids = Array.from(new Set(rxcuis.map((id) => id.trim()).filter(Boolean)));
    if (ids.length < 2) {
      return [];
    }

    try {
      const records = await this.client.interactions(ids);
      const interactions = records.flatMap((record): DrugInteraction[] => {
        const [first, second] = record.concepts;
        if (!first || !second) return [];

        const description = record.description?.trim() || MISSING_DESCRIPTION;
        return [
          {
            drug1: first.name,
            drug2: second.name,
            severity: classifyInteractionSeverity(description),
            description,
            recommendation: INTERACTION_RECOMMENDATION,
            source: INTERACTION_SOURCE,
            rxcuis: [first.rxcui, second.rxcui].filter(Boolean),
          },
        ];
      });

      functions.logger.info(`[interactionChecker] Found ${interactions.length} interactions for ${ids.length} drugs`);
      return interactions;
    } catch (error) {
      functions.logger.error('[interactionChecker] Interaction check failed:', error);
      return [];
    }
  }
}
