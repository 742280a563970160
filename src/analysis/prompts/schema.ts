import { z } from "zod";

const looseNumber = z.union([z.number(), z.string(), z.null()]).optional();

/**
 * One indicator entry as the model returns it. Fields are deliberately loose;
 * the extractor decides what each shape means.
 */
export const IndicatorEntrySchema = z.object({
  score: z.union([z.number(), z.boolean(), z.string(), z.null()]).optional(),
  value: looseNumber,
  prior_value: looseNumber,
  evidence: z.string().nullable().optional(),
});

export const ExtractionPayloadSchema = z.record(z.string(), z.unknown());

export type IndicatorEntry = z.infer<typeof IndicatorEntrySchema>;
export type ExtractionPayload = z.infer<typeof ExtractionPayloadSchema>;
