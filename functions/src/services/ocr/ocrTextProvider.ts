/**
 * OCR Text Provider
 *
 * Preprocesses a prescription image and reads it with the configured backends
 * in fixed order: primary, secondary, then a low-confidence basic pass.
 */

import * as functions from 'firebase-functions';
import type { OcrBackend, OcrReading } from './ocrBackend';
import { ImagePreprocessor, preprocessPrescriptionImage } from './imagePreprocessor';

const PRIMARY_ACCEPT_CONFIDENCE = 0.5;
const SECONDARY_ACCEPT_CONFIDENCE = 0.3;
const BASIC_CONFIDENCE_CAP = 0.2;

export const SUPPORTED_IMAGE_FORMATS = ['png', 'jpg', 'jpeg', 'tiff', 'bmp'] as const;

const EMPTY_READING: OcrReading = { text: '', confidence: 0 };

export interface OcrTextProviderDeps {
  primary?: OcrBackend | null;
  secondary?: OcrBackend | null;
  preprocess?: ImagePreprocessor;
}

const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export class OcrTextProvider {
  private primary: OcrBackend | null;
  private secondary: OcrBackend | null;
  private preprocess: ImagePreprocessor;

  constructor(deps: OcrTextProviderDeps = {}) {
    this.primary = deps.primary ?? null;
    this.secondary = deps.secondary ?? null;
    this.preprocess = deps.preprocess ?? preprocessPrescriptionImage;
  }

  get availableBackends(): string[] {
    return [this.primary, this.secondary].flatMap((backend) => (backend ? [backend.name] : []));
  }

  /**
   * Never throws; an unreadable image yields empty text with zero confidence.
   */
  async extractText(image: Buffer): Promise<OcrReading> {
    if (image.length === 0) {
      return EMPTY_READING;
    }

    try {
      const processed = await this.preprocessOrOriginal(image);
      const readings: OcrReading[] = [];

      const primary = await this.read(this.primary, processed);
      if (primary) {
        if (primary.text && primary.confidence > PRIMARY_ACCEPT_CONFIDENCE) return primary;
        readings.push(primary);
      }

      const secondary = await this.read(this.secondary, processed);
      if (secondary) {
        if (secondary.text && secondary.confidence > SECONDARY_ACCEPT_CONFIDENCE) return secondary;
        readings.push(secondary);
      }

      return await this.basicExtraction(image, processed, readings);
    } catch (error) {
      functions.logger.error('[ocr] Text extraction failed:', error);
      return EMPTY_READING;
    }
  }

  private async preprocessOrOriginal(image: Buffer): Promise<Buffer> {
    try {
      return await this.preprocess(image);
    } catch (error) {
      functions.logger.warn('[ocr] Preprocessing failed, using original image', {
        error: describeError(error),
      });
      return image;
    }
  }

  private async read(backend: OcrBackend | null, image: Buffer): Promise<OcrReading | null> {
    if (!backend) return null;

    try {
      return await backend.extract(image);
    } catch (error) {
      functions.logger.warn(`[ocr] Backend ${backend.name} failed`, { error: describeError(error) });
      return null;
    }
  }

  /**
   * Best text seen so far, else one more pass over the unprocessed image.
   * Confidence is capped either way.
   */
  private async basicExtraction(
    original: Buffer,
    processed: Buffer,
    readings: OcrReading[],
  ): Promise<OcrReading> {
    const best = readings
      .filter((reading) => reading.text)
      .sort((a, b) => b.confidence - a.confidence)[0];

    let candidate: OcrReading | null = best ?? null;
    if (!candidate && processed !== original) {
      candidate = await this.read(this.secondary ?? this.primary, original);
    }

    if (!candidate || !candidate.text) {
      functions.logger.info('[ocr] No text extracted');
      return EMPTY_READING;
    }

    return {
      text: candidate.text,
      confidence: Math.min(candidate.confidence, BASIC_CONFIDENCE_CAP),
    };
  }
}

export const decodeImageData = (imageData: string): Buffer => Buffer.from(imageData, 'base64');
