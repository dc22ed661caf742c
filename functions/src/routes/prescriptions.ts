import { Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { analysisConfig, ocrConfig } from '../config';
import { requireAuth, AuthRequest } from '../middlewares/auth';
import { analysisLimiter } from '../middlewares/rateLimit';
import { getServiceContainer } from '../services/domain/serviceContainer';
import { SUPPORTED_IMAGE_FORMATS, decodeImageData } from '../services/ocr/ocrTextProvider';
import { normalizeTermList, sanitizePlainText } from '../utils/inputSanitization';
import { captureException } from '../utils/sentry';

export const prescriptionsRouter = Router();

// Resolved per request so the container is built after app initialization
const getServices = () => getServiceContainer();

const BASE64_REGEX = /^[A-Za-z0-9+/]+={0,2}$/;

const termListSchema = z
  .array(z.string())
  .max(50)
  .default([])
  .transform((values) => normalizeTermList(values));

const patientSchema = z.object({
  age: z.number().int().min(0).max(150),
  weightKg: z.number().min(0.5).max(500),
  allergies: termListSchema,
  medicalConditions: termListSchema,
});

const analyzeRequestSchema = z.object({
  text: z
    .string()
    .transform((value) => sanitizePlainText(value, analysisConfig.maxTextLength))
    .refine((value) => value.length > 0, { message: 'Prescription text is required' }),
  patient: patientSchema,
  includeAlternatives: z.boolean().default(true),
});

const ocrRequestSchema = z.object({
  imageData: z
    .string()
    .transform((value) => value.replace(/^data:[^;]+;base64,/, '').replace(/\s+/g, ''))
    .refine((value) => value.length > 0 && BASE64_REGEX.test(value), {
      message: 'Image data must be base64 encoded',
    }),
  imageFormat: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(SUPPORTED_IMAGE_FORMATS)),
});

/**
 * POST /v1/prescriptions/analyze
 * Extract medications from prescription text and check them for the patient
 */
prescriptionsRouter.post('/analyze', requireAuth, analysisLimiter, async (req: AuthRequest, res) => {
  try {
    const data = analyzeRequestSchema.parse(req.body);
    const outcome = await getServices().prescriptionAnalyzer.analyze(data.text, data.patient, {
      includeAlternatives: data.includeAlternatives,
    });

    if (outcome.status === 'no_medications') {
      res.status(400).json({
        code: 'no_medications_found',
        message: 'No medications found in the provided text',
      });
      return;
    }

    functions.logger.info(
      `[prescriptions] Analysis for user ${req.user?.uid ?? 'unknown'} found ${outcome.result.medications.length} medications`,
    );
    res.json(outcome.result);
  } catch (error) {
    if (error instanceof z.ZodError) {
      res.status(400).json({
        code: 'validation_failed',
        message: 'Invalid request body',
        details: error.errors,
      });
      return;
    }

    functions.logger.error('[prescriptions] Error analyzing prescription:', error);
    captureException(error, { route: req.path });
    res.status(500).json({
      code: 'server_error',
      message: 'Failed to analyze prescription',
    });
  }
});

/**
 * POST /v1/prescriptions/ocr
 * Read prescription text from a base64-encoded image
 */
prescriptionsRouter.post('/ocr', requireAuth, analysisLimiter, async (req: AuthRequest, res) => {
  try {
    const data = ocrRequestSchema.parse(req.body);
    const image = decodeImageData(data.imageData);

    if (image.length > ocrConfig.maxImageBytes) {
      res.status(413).json({
        code: 'payload_too_large',
        message: 'Image exceeds the maximum allowed size',
      });
      return;
    }

    const reading = await getServices().ocrTextProvider.extractText(image);
    if (!reading.text) {
      res.status(400).json({
        code: 'no_text_extracted',
        message: 'No text could be extracted from the image',
      });
      return;
    }

    res.json({
      text: reading.text,
      confidence: reading.confidence,
      imageFormat: data.imageFormat,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      res.status(400).json({
        code: 'validation_failed',
        message: 'Invalid request body',
        details: error.errors,
      });
      return;
    }

    functions.logger.error('[prescriptions] Error extracting image text:', error);
    captureException(error, { route: req.path });
    res.status(500).json({
      code: 'server_error',
      message: 'Failed to extract text from image',
    });
  }
});
