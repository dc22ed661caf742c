import axios, { AxiosInstance } from 'axios';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { entityTaggerConfig } from '../../config';
import { withRetry } from '../../utils/retryUtils';

export interface TaggedEntity {
  label: string;
  text: string;
  score: number;
}

export interface EntityTagger {
  tag(text: string): Promise<TaggedEntity[]>;
}

export interface EntityTaggerOptions {
  baseUrl: string;
  model: string;
  apiToken: string;
  timeoutMs: number;
  retryDelayMs?: number;
}

const taggedSpanSchema = z.object({
  entity_group: z.string().optional(),
  entity: z.string().optional(),
  word: z.string(),
  score: z.number(),
});

const taggerResponseSchema = z.array(taggedSpanSchema);

// Token-level labels arrive as "B-Medication" / "I-Medication".
const stripBioPrefix = (label: string): string => label.replace(/^[BI]-/i, '');

/**
 * Entity tagger backed by a Hugging Face token-classification endpoint.
 */
export class HuggingFaceEntityTagger implements EntityTagger {
  private client: AxiosInstance;
  private model: string;
  private retryDelayMs: number;

  constructor(options: EntityTaggerOptions) {
    if (!options.baseUrl) {
      throw new Error('Entity tagger endpoint is not configured');
    }
    if (!options.apiToken) {
      throw new Error('Entity tagger API token is not configured');
    }

    this.model = options.model;
    this.retryDelayMs = options.retryDelayMs ?? 1000;

    this.client = axios.create({
      baseURL: options.baseUrl,
      headers: {
        Authorization: `Bearer ${options.apiToken}`,
        'Content-Type': 'application/json',
      },
      timeout: options.timeoutMs,
    });
  }

  async tag(text: string): Promise<TaggedEntity[]> {
    if (!text.trim()) {
      return [];
    }

    const response = await withRetry(
      () =>
        this.client.post<unknown>(`/models/${this.model}`, {
          inputs: text,
          parameters: { aggregation_strategy: 'simple' },
        }),
      {
        maxAttempts: 2,
        initialDelayMs: this.retryDelayMs,
        shouldRetry: (error) => axios.isAxiosError(error) && error.response?.status === 503,
      },
    );

    const parsed = taggerResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      functions.logger.warn('[entityTagger] Unexpected tagger response shape', {
        issues: parsed.error.errors.length,
      });
      throw new Error('Entity tagger returned a malformed response');
    }

    return parsed.data.map((span) => ({
      label: stripBioPrefix(span.entity_group ?? span.entity ?? '').toUpperCase(),
      text: span.word.trim(),
      score: span.score,
    }));
  }
}

export const createEntityTagger = (
  options: EntityTaggerOptions = entityTaggerConfig,
): EntityTagger => new HuggingFaceEntityTagger(options);
