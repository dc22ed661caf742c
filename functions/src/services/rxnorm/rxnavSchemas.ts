/**
 * RxNav response schemas
 *
 * RxNav returns a single object where a list holds one entry, and omits empty
 * lists. Every list field is normalized to an array here so nothing past the
 * client sees the difference.
 */

import { z } from 'zod';

const listOf = <T extends z.ZodTypeAny>(item: T) =>
  z.preprocess((value) => {
    if (value === undefined || value === null) return [];
    return Array.isArray(value) ? value : [value];
  }, z.array(item));

const conceptSchema = z.object({
  rxcui: z.string().optional(),
  name: z.string().optional(),
  synonym: z.string().optional(),
  tty: z.string().optional(),
});

export type RxNavConcept = z.infer<typeof conceptSchema>;

const conceptGroupSchema = z.object({
  tty: z.string().optional(),
  conceptProperties: listOf(conceptSchema),
  // Older payloads name the list "concept".
  concept: listOf(conceptSchema),
});

export const rxcuiResponseSchema = z.object({
  idGroup: z
    .object({
      rxnormId: listOf(z.string()),
    })
    .optional(),
});

export const allRelatedResponseSchema = z.object({
  allRelatedGroup: z
    .object({
      conceptGroup: listOf(conceptGroupSchema),
    })
    .optional(),
});

export const propertyResponseSchema = z.object({
  propConceptGroup: z
    .object({
      propConcept: listOf(
        z.object({
          propName: z.string().optional(),
          propValue: z.string().optional(),
        }),
      ),
    })
    .nullable()
    .optional(),
});

export const drugsResponseSchema = z.object({
  drugGroup: z
    .object({
      conceptGroup: listOf(conceptGroupSchema),
    })
    .optional(),
});

export const approximateTermResponseSchema = z.object({
  approximateGroup: z
    .object({
      candidate: listOf(
        z.object({
          rxcui: z.string().optional(),
          name: z.string().optional(),
          score: z.union([z.string(), z.number()]).optional(),
        }),
      ),
    })
    .optional(),
});

const interactionPairSchema = z.object({
  interactionConcept: listOf(
    z.object({
      minConceptItem: z
        .object({
          rxcui: z.string().optional(),
          name: z.string().optional(),
        })
        .optional(),
    }),
  ),
  severity: z.string().optional(),
  description: z.string().optional(),
});

const interactionTypeSchema = z.object({
  interactionPair: listOf(interactionPairSchema),
});

const interactionGroupSchema = z.object({
  sourceName: z.string().optional(),
  fullInteractionType: listOf(interactionTypeSchema),
  interactionType: listOf(interactionTypeSchema),
});

export const interactionListResponseSchema = z.object({
  fullInteractionTypeGroup: listOf(interactionGroupSchema),
  interactionTypeGroup: listOf(interactionGroupSchema),
});

export type InteractionPair = z.infer<typeof interactionPairSchema>;
export type InteractionGroup = z.infer<typeof interactionGroupSchema>;

/** Concept entries of every group, in payload order. */
export const flattenConceptGroups = (
  groups: Array<z.infer<typeof conceptGroupSchema>>,
): RxNavConcept[] => groups.flatMap((group) => [...group.conceptProperties, ...group.concept]);

/** Interaction pairs of every group and type, in payload order. */
export const flattenInteractionGroups = (groups: InteractionGroup[]): InteractionPair[] =>
  groups.flatMap((group) =>
    [...group.fullInteractionType, ...group.interactionType].flatMap((type) => type.interactionPair),
  );
