import * as functions from 'firebase-functions';
import { entityTaggerConfig, ocrConfig, rxnormConfig } from '../../config';
import { EntityTagger, createEntityTagger } from '../extraction/entityTagger';
import { ExtractionCoordinator } from '../extraction/extractionCoordinator';
import { ModelExtractor } from '../extraction/modelExtractor';
import type { ImagePreprocessor } from '../ocr/imagePreprocessor';
import { HttpOcrBackend, OcrBackend } from '../ocr/ocrBackend';
import { OcrTextProvider } from '../ocr/ocrTextProvider';
import { InteractionChecker } from '../rxnorm/interactionChecker';
import { RxNavClient, TerminologyClient } from '../rxnorm/rxnavClient';
import { TerminologyMapper } from '../rxnorm/terminologyMapper';
import { PrescriptionAnalyzer } from './prescriptions/PrescriptionAnalyzer';

export type ServiceCapabilities = {
  modelExtraction: boolean;
  ocrBackends: string[];
};

export type PrescriptionServiceContainer = {
  terminologyClient: TerminologyClient;
  terminologyMapper: TerminologyMapper;
  interactionChecker: InteractionChecker;
  extractionCoordinator: ExtractionCoordinator;
  ocrTextProvider: OcrTextProvider;
  prescriptionAnalyzer: PrescriptionAnalyzer;
  capabilities: ServiceCapabilities;
};

export type CreateServiceContainerOptions = {
  terminologyClient?: TerminologyClient;
  /** null disables model extraction. */
  entityTagger?: EntityTagger | null;
  primaryOcrBackend?: OcrBackend | null;
  secondaryOcrBackend?: OcrBackend | null;
  preprocessImage?: ImagePreprocessor;
};

/**
 * Build an optional capability; a construction failure leaves it unavailable.
 */
const createOptional = <T>(label: string, factory: () => T): T | null => {
  try {
    return factory();
  } catch (error) {
    functions.logger.warn(`[serviceContainer] ${label} unavailable`, {
      error: error instanceof Error ? error.message : String(error),
    });
    return null;
  }
};

const pick = <T>(override: T | null | undefined, label: string, factory: () => T): T | null =>
  override !== undefined ? override : createOptional(label, factory);

export function createServiceContainer(
  options: CreateServiceContainerOptions = {},
): PrescriptionServiceContainer {
  const terminologyClient = options.terminologyClient ?? new RxNavClient(rxnormConfig);
  const terminologyMapper = new TerminologyMapper(terminologyClient);
  const interactionChecker = new InteractionChecker(terminologyClient);

  const entityTagger = pick(options.entityTagger, 'Entity tagger', () =>
    createEntityTagger(entityTaggerConfig),
  );
  const extractionCoordinator = new ExtractionCoordinator({
    modelExtractor: entityTagger ? new ModelExtractor(entityTagger) : null,
  });

  const ocrTextProvider = new OcrTextProvider({
    primary: pick(options.primaryOcrBackend, 'Primary OCR backend', () =>
      new HttpOcrBackend({
        name: 'primary',
        url: ocrConfig.primaryUrl,
        apiKey: ocrConfig.apiKey,
        timeoutMs: ocrConfig.timeoutMs,
      }),
    ),
    secondary: pick(options.secondaryOcrBackend, 'Secondary OCR backend', () =>
      new HttpOcrBackend({
        name: 'secondary',
        url: ocrConfig.secondaryUrl,
        apiKey: ocrConfig.apiKey,
        timeoutMs: ocrConfig.timeoutMs,
      }),
    ),
    preprocess: options.preprocessImage,
  });

  const prescriptionAnalyzer = new PrescriptionAnalyzer({
    extractionCoordinator,
    terminologyMapper,
    interactionChecker,
  });

  return {
    terminologyClient,
    terminologyMapper,
    interactionChecker,
    extractionCoordinator,
    ocrTextProvider,
    prescriptionAnalyzer,
    capabilities: {
      modelExtraction: extractionCoordinator.modelAvailable,
      ocrBackends: ocrTextProvider.availableBackends,
    },
  };
}

let sharedContainer: PrescriptionServiceContainer | null = null;

/**
 * Process-wide container, created on first use.
 */
export function getServiceContainer(): PrescriptionServiceContainer {
  if (!sharedContainer) {
    sharedContainer = createServiceContainer();
  }
  return sharedContainer;
}
