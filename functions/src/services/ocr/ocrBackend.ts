import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { estimateTextConfidence } from './textConfidence';

export interface OcrReading {
  text: string;
  confidence: number;
}

export interface OcrBackend {
  readonly name: string;
  extract(image: Buffer): Promise<OcrReading>;
}

export interface HttpOcrBackendOptions {
  name: string;
  url: string;
  apiKey?: string;
  timeoutMs: number;
}

// Lines read below this confidence are dropped before averaging.
const MIN_LINE_CONFIDENCE = 0.3;

const confidenceSchema = z.number().min(0).max(1);

const ocrResponseSchema = z.union([
  z.object({
    text: z.string(),
    confidence: confidenceSchema.nullish(),
  }),
  z.object({
    lines: z.array(
      z.object({
        text: z.string(),
        confidence: confidenceSchema,
      }),
    ),
  }),
]);

type OcrResponse = z.infer<typeof ocrResponseSchema>;

const toReading = (payload: OcrResponse): OcrReading => {
  if ('lines' in payload) {
    const kept = payload.lines.filter((line) => line.text.trim() && line.confidence > MIN_LINE_CONFIDENCE);
    if (kept.length === 0) return { text: '', confidence: 0 };

    const total = kept.reduce((sum, line) => sum + line.confidence, 0);
    return {
      text: kept.map((line) => line.text.trim()).join(' '),
      confidence: total / kept.length,
    };
  }

  const text = payload.text.trim();
  return {
    text,
    confidence: payload.confidence ?? estimateTextConfidence(text),
  };
};

/**
 * OCR service reached over HTTP: POST { image: base64 } returning either
 * { text, confidence? } or { lines: [{ text, confidence }] }.
 */
export class HttpOcrBackend implements OcrBackend {
  readonly name: string;
  private client: AxiosInstance;
  private url: string;

  constructor(options: HttpOcrBackendOptions) {
    if (!options.url) {
      throw new Error(`OCR backend "${options.name}" URL is not configured`);
    }

    this.name = options.name;
    this.url = options.url;
    this.client = axios.create({
      headers: {
        'Content-Type': 'application/json',
        ...(options.apiKey ? { Authorization: `Bearer ${options.apiKey}` } : {}),
      },
      timeout: options.timeoutMs,
    });
  }

  async extract(image: Buffer): Promise<OcrReading> {
    const response = await this.client.post<unknown>(this.url, { image: image.toString('base64') });
    const parsed = ocrResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`OCR backend "${this.name}" returned a malformed response`);
    }

    return toReading(parsed.data);
  }
}
