import axios, { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { rxnormConfig } from '../../config';
import { isTransientHttpError, withRetry } from '../../utils/retryUtils';
import { TerminologyRequestError } from './errors';
import {
  allRelatedResponseSchema,
  approximateTermResponseSchema,
  drugsResponseSchema,
  flattenConceptGroups,
  flattenInteractionGroups,
  interactionListResponseSchema,
  propertyResponseSchema,
  rxcuiResponseSchema,
} from './rxnavSchemas';

export interface ConceptDescription {
  name: string;
  synonym?: string;
}

export interface ConceptSummary {
  rxcui: string;
  name?: string;
  synonym?: string;
}

export interface InteractionRecord {
  description?: string;
  severity?: string;
  concepts: Array<{ rxcui: string; name: string }>;
}

/**
 * Terminology lookup service. Request failures reject with
 * TerminologyRequestError; malformed payloads resolve as empty.
 */
export interface TerminologyClient {
  resolve(name: string): Promise<string[]>;
  describe(rxcui: string): Promise<ConceptDescription | null>;
  searchDrugs(name: string): Promise<ConceptSummary[]>;
  approximateTerm(term: string, maxEntries: number): Promise<ConceptSummary[]>;
  interactions(rxcuis: string[]): Promise<InteractionRecord[]>;
}

export interface RxNavClientOptions {
  baseUrl: string;
  timeoutMs: number;
  retryDelayMs?: number;
}

const PROPERTY_NAME_LOOKUPS = ['RxNorm Name', 'Display Name'] as const;

const nonEmpty = (value: string | undefined): string | undefined => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

export class RxNavClient implements TerminologyClient {
  private client: AxiosInstance;
  private retryDelayMs: number;

  constructor(options: RxNavClientOptions = rxnormConfig) {
    if (!options.baseUrl) {
      throw new Error('RxNav base URL is not configured');
    }

    this.retryDelayMs = options.retryDelayMs ?? 500;
    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: { Accept: 'application/json' },
      timeout: options.timeoutMs,
    });
  }

  async resolve(name: string): Promise<string[]> {
    const data = await this.getJson('/rxcui.json', rxcuiResponseSchema, { name });
    const ids = data?.idGroup?.rxnormId ?? [];
    return ids.map((id) => id.trim()).filter((id) => id.length > 0);
  }

  /**
   * Display name for an identifier. Tries the related-concepts lookup, then
   * the "RxNorm Name" and "Display Name" properties, and takes the first
   * non-empty name.
   */
  async describe(rxcui: string): Promise<ConceptDescription | null> {
    const lookups: Array<() => Promise<ConceptDescription | null>> = [
      () => this.describeFromRelated(rxcui),
      ...PROPERTY_NAME_LOOKUPS.map((propName) => () => this.describeFromProperty(rxcui, propName)),
    ];

    for (const lookup of lookups) {
      try {
        const description = await lookup();
        if (description) {
          return description;
        }
      } catch (error) {
        functions.logger.debug(`[rxnav] Describe lookup failed for ${rxcui}`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return null;
  }

  async searchDrugs(name: string): Promise<ConceptSummary[]> {
    const data = await this.getJson('/drugs.json', drugsResponseSchema, { name });
    const concepts = flattenConceptGroups(data?.drugGroup?.conceptGroup ?? []);

    return concepts.flatMap((concept) => {
      const rxcui = nonEmpty(concept.rxcui);
      if (!rxcui) return [];
      return [{ rxcui, name: nonEmpty(concept.name), synonym: nonEmpty(concept.synonym) }];
    });
  }

  async approximateTerm(term: string, maxEntries: number): Promise<ConceptSummary[]> {
    const data = await this.getJson('/approximateTerm.json', approximateTermResponseSchema, {
      term,
      maxEntries,
    });

    const seen = new Set<string>();
    const candidates: ConceptSummary[] = [];
    for (const candidate of data?.approximateGroup?.candidate ?? []) {
      const rxcui = nonEmpty(candidate.rxcui);
      // Candidates repeat per matching atom.
      if (!rxcui || seen.has(rxcui)) continue;
      seen.add(rxcui);
      candidates.push({ rxcui, name: nonEmpty(candidate.name) });
    }

    return candidates;
  }

  async interactions(rxcuis: string[]): Promise<InteractionRecord[]> {
    const ids = rxcuis.map((id) => encodeURIComponent(id)).join('+');
    const data = await this.getJson(`/interaction/list.json?rxcuis=${ids}`, interactionListResponseSchema);
    if (!data) return [];

    const pairs = flattenInteractionGroups([
      ...data.fullInteractionTypeGroup,
      ...data.interactionTypeGroup,
    ]);

    return pairs.map((pair) => ({
      description: pair.description,
      severity: pair.severity,
      concepts: pair.interactionConcept.map((concept) => ({
        rxcui: concept.minConceptItem?.rxcui ?? '',
        name: concept.minConceptItem?.name ?? '',
      })),
    }));
  }

  private async describeFromRelated(rxcui: string): Promise<ConceptDescription | null> {
    const data = await this.getJson(
      `/rxcui/${encodeURIComponent(rxcui)}/allrelated.json`,
      allRelatedResponseSchema,
    );
    const concepts = flattenConceptGroups(data?.allRelatedGroup?.conceptGroup ?? []);
    const named = concepts.find((concept) => nonEmpty(concept.name));
    const name = nonEmpty(named?.name);
    if (!name) return null;

    const synonym = nonEmpty(named?.synonym);
    return synonym ? { name, synonym } : { name };
  }

  private async describeFromProperty(
    rxcui: string,
    propName: string,
  ): Promise<ConceptDescription | null> {
    const data = await this.getJson(
      `/rxcui/${encodeURIComponent(rxcui)}/property.json`,
      propertyResponseSchema,
      { propName },
    );
    const properties = data?.propConceptGroup?.propConcept ?? [];
    const name = properties.map((property) => nonEmpty(property.propValue)).find(Boolean);
    return name ? { name } : null;
  }

  /**
   * GET a JSON payload and validate it. Resolves null when the payload does
   * not match the schema; rejects with TerminologyRequestError on HTTP failure.
   */
  private async getJson<S extends z.ZodTypeAny>(
    path: string,
    schema: S,
    params?: Record<string, string | number>,
  ): Promise<z.output<S> | null> {
    let payload: unknown;
    try {
      const response = await withRetry(() => this.client.get<unknown>(path, { params }), {
        maxAttempts: 2,
        initialDelayMs: this.retryDelayMs,
        shouldRetry: isTransientHttpError,
      });
      payload = response.data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        throw new TerminologyRequestError(
          `RxNav request to ${path} failed: ${error.message}`,
          error.response?.status,
        );
      }
      throw error;
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      functions.logger.warn(`[rxnav] Unexpected response shape from ${path}`, {
        issues: parsed.error.errors.length,
      });
      return null;
    }

    return parsed.data;
  }
}
