/**
 * Configuration for the prescription safety API
 * Reads from environment variables (process.env)
 *
 * Optional environment variables:
 * - RXNORM_API_BASE_URL: RxNav REST base URL
 * - NER_API_URL / NER_MODEL_NAME / NER_API_TOKEN: entity tagger endpoint; the model
 *   extraction path stays unavailable without a token
 * - OCR_PRIMARY_URL / OCR_SECONDARY_URL / OCR_API_KEY: OCR backends, tried in that order
 * - ALLOWED_ORIGINS: Comma-separated list of allowed CORS origins
 *
 * For production, set secrets via Firebase Functions secrets:
 *   firebase functions:secrets:set NER_API_TOKEN
 */

const readInt = (value: string | undefined, fallback: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
};

export const appConfig = {
  name: 'Prescription Safety API',
  version: process.env.APP_VERSION || '1.0.0',
};

export const rxnormConfig = {
  baseUrl: process.env.RXNORM_API_BASE_URL || 'https://rxnav.nlm.nih.gov/REST',
  timeoutMs: readInt(process.env.RXNORM_TIMEOUT_MS, 10000),
};

export const entityTaggerConfig = {
  baseUrl: process.env.NER_API_URL || 'https://api-inference.huggingface.co',
  model: process.env.NER_MODEL_NAME || 'd4data/biomedical-ner-all',
  apiToken: process.env.NER_API_TOKEN || '',
  timeoutMs: readInt(process.env.NER_TIMEOUT_MS, 10000),
};

export const ocrConfig = {
  primaryUrl: process.env.OCR_PRIMARY_URL || '',
  secondaryUrl: process.env.OCR_SECONDARY_URL || '',
  apiKey: process.env.OCR_API_KEY || '',
  timeoutMs: readInt(process.env.OCR_TIMEOUT_MS, 10000),
  maxImageBytes: readInt(process.env.OCR_MAX_IMAGE_MB, 10) * 1024 * 1024,
};

export const analysisConfig = {
  maxTextLength: readInt(process.env.ANALYSIS_MAX_TEXT_LENGTH, 10000),
};

export const corsConfig = {
  // Comma-separated list of allowed origins for CORS
  allowedOrigins: process.env.ALLOWED_ORIGINS || '',
  // Allow development origins when NODE_ENV is not production
  isDevelopment: process.env.NODE_ENV !== 'production',
};
