import { z } from "zod";

const TimeBoundSchema = z.union([z.number().finite(), z.string().min(1)]);

export const WindowSpecSchema = z
  .object({
    basis: z.enum(["relative", "absolute"]),
    start: TimeBoundSchema.optional(),
    end: TimeBoundSchema.optional(),
    last: z.number().finite().nonnegative().optional(),
  })
  .strict();

export const OutcomeVocabularySchema = z
  .object({
    positive: z.array(z.string()).optional(),
    negative: z.array(z.string()).optional(),
    correctTokens: z.array(z.string()).optional(),
  })
  .strict();

export const MetricsConfigSchema = z
  .object({
    profile: z.string().optional(),
    rtMaxS: z.number().finite().optional(),
    baselineS: z.number().finite().nullable().optional(),
    includeWarnings: z.boolean().optional(),
    window: WindowSpecSchema.nullable().optional(),
    outcomeVocabulary: OutcomeVocabularySchema.optional(),
  })
  .strict();

/** Call-time options; the window is validated separately so it fails as a window error. */
export const ComputeOptionsSchema = MetricsConfigSchema.extend({
  window: z.unknown().optional(),
});
