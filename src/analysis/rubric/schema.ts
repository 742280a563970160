import { z } from "zod";

const points = z.number().int().min(0);

export const BandSchema = z
  .object({
    gt: z.number().optional(),
    gte: z.number().optional(),
    lt: z.number().optional(),
    lte: z.number().optional(),
    points,
    description: z.string().optional(),
  })
  .refine(b => b.gt === undefined || b.gte === undefined, {
    message: "band may set only one of gt/gte",
  })
  .refine(b => b.lt === undefined || b.lte === undefined, {
    message: "band may set only one of lt/lte",
  });

export const RangeRuleSchema = z.object({
  kind: z.literal("range"),
  unit: z.string().default(""),
  bands: z.array(BandSchema).min(1),
  otherwise: points,
  otherwiseDescription: z.string().optional(),
});

export const GreaterThanRuleSchema = z.object({
  kind: z.literal("greater-than"),
  unit: z.string().default(""),
  threshold: z.number(),
  points,
  description: z.string().optional(),
  improvement: z
    .object({
      points,
      description: z.string().optional(),
    })
    .optional(),
  otherwise: points,
  otherwiseDescription: z.string().optional(),
});

export const PresenceRuleSchema = z.object({
  kind: z.literal("presence-check"),
  points: z.number().int().positive(),
  description: z.string(),
});

export const RuleSchema = z.discriminatedUnion("kind", [
  RangeRuleSchema,
  GreaterThanRuleSchema,
  PresenceRuleSchema,
]);

export const IndicatorDefinitionSchema = z.object({
  key: z.string().regex(/^[a-z][a-z0-9_]*$/, "keys are snake_case"),
  label: z.string().min(1),
  maxPoints: z.number().int().positive(),
  /** What `value` means for numeric rules, e.g. "YoY revenue change in percent". */
  metric: z.string().optional(),
  guidance: z.string().min(1),
  rule: RuleSchema,
});

export const CategoryDefinitionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  ceiling: z.number().int().positive(),
  disclosure: z.enum(["completeness", "reliability"]).optional(),
  indicators: z.array(IndicatorDefinitionSchema).min(1),
});

export const TrackRubricSchema = z.object({
  label: z.string().min(1),
  ceiling: z.number().int().positive(),
  categories: z.array(CategoryDefinitionSchema).min(1),
});

export const RubricSchema = z.object({
  version: z.string().min(1),
  description: z.string().default(""),
  tracks: z.object({
    financial: TrackRubricSchema,
    sustainability: TrackRubricSchema,
  }),
});

export type Band = z.infer<typeof BandSchema>;
export type RangeRule = z.infer<typeof RangeRuleSchema>;
export type GreaterThanRule = z.infer<typeof GreaterThanRuleSchema>;
export type PresenceRule = z.infer<typeof PresenceRuleSchema>;
export type Rule = z.infer<typeof RuleSchema>;
export type NumericRule = RangeRule | GreaterThanRule;
export type IndicatorDefinition = z.infer<typeof IndicatorDefinitionSchema>;
export type CategoryDefinition = z.infer<typeof CategoryDefinitionSchema>;
export type TrackRubric = z.infer<typeof TrackRubricSchema>;
export type Rubric = z.infer<typeof RubricSchema>;
