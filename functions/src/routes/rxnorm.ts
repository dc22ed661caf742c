import { Response, Router } from 'express';
import * as functions from 'firebase-functions';
import { z } from 'zod';
import { requireAuth, AuthRequest } from '../middlewares/auth';
import { getServiceContainer } from '../services/domain/serviceContainer';
import { captureException } from '../utils/sentry';
import { sanitizePlainText } from '../utils/inputSanitization';

export const rxnormRouter = Router();

const getServices = () => getServiceContainer();

const drugQuerySchema = z
  .string()
  .transform((value) => sanitizePlainText(value, 200))
  .refine((value) => value.length > 0, { message: 'Query is required' });

const lookupQuerySchema = z.object({
  q: drugQuerySchema,
  maxResults: z.coerce.number().int().min(1).max(10).default(5),
});

const rxcuiQuerySchema = z.object({
  q: drugQuerySchema,
});

const interactionsRequestSchema = z.object({
  rxcuis: z.array(z.string().trim().regex(/^\d+$/, 'RxCUIs are numeric')).min(2).max(50),
});

const respondToValidationError = (res: Response, error: z.ZodError, message: string) => {
  res.status(400).json({
    code: 'validation_failed',
    message,
    details: error.errors,
  });
};

/**
 * GET /v1/rxnorm/lookup?q=&maxResults=
 * RxNorm concepts for a drug name
 */
rxnormRouter.get('/lookup', requireAuth, async (req: AuthRequest, res) => {
  try {
    const { q, maxResults } = lookupQuerySchema.parse(req.query);
    const candidates = await getServices().terminologyMapper.search(q, maxResults);

    res.json({
      query: q,
      candidates,
      totalResults: candidates.length,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      respondToValidationError(res, error, 'Invalid query parameters');
      return;
    }

    functions.logger.error('[rxnorm] Error looking up drug:', error);
    captureException(error, { route: req.path });
    res.status(500).json({
      code: 'server_error',
      message: 'Failed to look up drug',
    });
  }
});

/**
 * GET /v1/rxnorm/rxcui?q=
 * Exact identifier lookup, no fuzzy fallback
 */
rxnormRouter.get('/rxcui', requireAuth, async (req: AuthRequest, res) => {
  try {
    const { q } = rxcuiQuerySchema.parse(req.query);
    const rxcuis = await getServices().terminologyMapper.resolveIdentifiers(q);

    res.json({ query: q, rxcuis });
  } catch (error) {
    if (error instanceof z.ZodError) {
      respondToValidationError(res, error, 'Invalid query parameters');
      return;
    }

    functions.logger.error('[rxnorm] Error resolving identifiers:', error);
    captureException(error, { route: req.path });
    res.status(500).json({
      code: 'server_error',
      message: 'Failed to resolve identifiers',
    });
  }
});

/**
 * POST /v1/rxnorm/interactions
 * Pairwise interactions between RxCUIs
 */
rxnormRouter.post('/interactions', requireAuth, async (req: AuthRequest, res) => {
  try {
    const { rxcuis } = interactionsRequestSchema.parse(req.body);
    const interactions = await getServices().interactionChecker.getInteractions(rxcuis);

    res.json({
      interactions,
      totalResults: interactions.length,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      respondToValidationError(res, error, 'Invalid request body');
      return;
    }

    functions.logger.error('[rxnorm] Error checking interactions:', error);
    captureException(error, { route: req.path });
    res.status(500).json({
      code: 'server_error',
      message: 'Failed to check interactions',
    });
  }
});
