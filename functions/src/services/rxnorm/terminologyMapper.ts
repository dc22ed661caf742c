/**
 * Terminology Mapper
 *
 * Maps a drug name to RxNorm concepts: exact identifier lookup first, fuzzy
 * search when nothing resolves.
 */

import * as functions from 'firebase-functions';
import type { RxNormMapping } from '../../types/prescription';
import { TerminologyRequestError } from './errors';
import type { ConceptDescription, ConceptSummary, TerminologyClient } from './rxnavClient';

const MAPPING_CONFIDENCE = {
  described: 0.9,
  identifierOnly: 0.7,
  drugSearch: 0.6,
  approximate: 0.5,
} as const;

const DEFAULT_MAX_RESULTS = 5;

/** Drop everything but letters, digits, underscores, whitespace and hyphens. */
export const sanitizeDrugName = (name: string): string =>
  name.replace(/[^\p{L}\p{N}_\s-]/gu, '').trim();

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

const toMapping = (
  rxcui: string,
  name: string,
  confidence: number,
  synonym?: string,
): RxNormMapping => (synonym ? { rxcui, name, synonym, confidence } : { rxcui, name, confidence });

export class TerminologyMapper {
  constructor(private readonly client: TerminologyClient) {}

  /**
   * RxCUIs for a drug name. A rejected (400) name is retried once in its
   * sanitized form; any other failure yields no identifiers.
   */
  async resolveIdentifiers(drugName: string): Promise<string[]> {
    const query = drugName.trim();
    const sanitized = sanitizeDrugName(drugName);
    if (!sanitized) {
      functions.logger.warn(`[terminologyMapper] Drug name "${drugName}" sanitized to empty string`);
      return [];
    }

    try {
      return await this.client.resolve(query);
    } catch (error) {
      const rejected = error instanceof TerminologyRequestError && error.status === 400;
      if (!rejected || sanitized === query) {
        functions.logger.error(`[terminologyMapper] Identifier lookup failed for ${query}:`, describeError(error));
        return [];
      }
    }

    functions.logger.warn(`[terminologyMapper] Identifier lookup rejected "${query}", retrying as "${sanitized}"`);
    try {
      return await this.client.resolve(sanitized);
    } catch (error) {
      functions.logger.error(`[terminologyMapper] Identifier retry failed for ${sanitized}:`, describeError(error));
      return [];
    }
  }

  async search(drugName: string, maxResults: number = DEFAULT_MAX_RESULTS): Promise<RxNormMapping[]> {
    const query = drugName.trim();
    if (!sanitizeDrugName(drugName)) {
      return [];
    }

    const rxcuis = await this.resolveIdentifiers(drugName);
    const mappings =
      rxcuis.length > 0
        ? await Promise.all(rxcuis.slice(0, maxResults).map((rxcui) => this.mapIdentifier(rxcui, query)))
        : await this.fuzzySearch(query, maxResults);

    functions.logger.info(`[terminologyMapper] Found ${mappings.length} mappings for ${query}`);
    return mappings;
  }

  private async mapIdentifier(rxcui: string, query: string): Promise<RxNormMapping> {
    let description: ConceptDescription | null = null;
    try {
      description = await this.client.describe(rxcui);
    } catch (error) {
      functions.logger.debug(`[terminologyMapper] Describe failed for ${rxcui}`, { error: describeError(error) });
    }

    return description
      ? toMapping(rxcui, description.name, MAPPING_CONFIDENCE.described, description.synonym)
      : toMapping(rxcui, query, MAPPING_CONFIDENCE.identifierOnly);
  }

  private async fuzzySearch(query: string, maxResults: number): Promise<RxNormMapping[]> {
    const mappings: RxNormMapping[] = [];
    const seen = new Set<string>();
    const add = (concepts: ConceptSummary[], confidence: number) => {
      for (const concept of concepts) {
        if (mappings.length >= maxResults) return;
        if (seen.has(concept.rxcui)) continue;
        seen.add(concept.rxcui);
        mappings.push(toMapping(concept.rxcui, concept.name ?? query, confidence, concept.synonym));
      }
    };

    try {
      add(await this.client.searchDrugs(query), MAPPING_CONFIDENCE.drugSearch);
    } catch (error) {
      functions.logger.debug(`[terminologyMapper] Drug search failed for ${query}`, { error: describeError(error) });
    }

    if (mappings.length < maxResults) {
      try {
        add(await this.client.approximateTerm(query, maxResults), MAPPING_CONFIDENCE.approximate);
      } catch (error) {
        functions.logger.debug(`[terminologyMapper] Approximate match failed for ${query}`, {
          error: describeError(error),
        });
      }
    }

    return mappings;
  }
}
