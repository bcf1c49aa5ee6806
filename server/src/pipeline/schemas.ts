import { z } from "zod";

export const LOOP_STATES = ["INIT", "AUGMENTING", "GENERATING", "EVALUATING", "REVISING", "FALLBACK", "DONE"] as const;

export type LoopState = (typeof LOOP_STATES)[number];

// ------------------------------------------------------------
// Static tables (pipeline/assets/*.json). Arrays, not maps: declared order is the tie-break.
// ------------------------------------------------------------

export const KnowledgeBaseSchema = z.object({
  categories: z
    .array(
      z.object({
        name: z.string().min(1),
        keywords: z.array(z.string().min(1)),
        facts: z
          .array(
            z.object({
              topic: z.string().min(1),
              text: z.string().min(1)
            })
          )
          .min(1)
      })
    )
    .min(1),
  aliases: z.array(
    z.object({
      alias: z.string().min(1),
      topic: z.string().min(1)
    })
  )
});

export type KnowledgeBase = z.infer<typeof KnowledgeBaseSchema>;

const PromptOptionSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  description: z.string().min(1),
  prompt_addition: z.string().min(1)
});

export const PersonaSchema = z.object({
  key: z.string().min(1),
  name: z.string().min(1),
  description: z.string().min(1),
  storyteller_temperature: z.number().min(0).max(2),
  story_arc_type: z.enum(["hero_journey", "three_act", "simple_adventure"]),
  tone: z.string().min(1)
});

export const ParentOptionsSchema = z.object({
  personas: z.array(PersonaSchema).min(1),
  values: z.array(PromptOptionSchema),
  interests: z.array(PromptOptionSchema)
});

export type Persona = z.infer<typeof PersonaSchema>;
export type PromptOption = z.infer<typeof PromptOptionSchema>;
export type ParentOptions = z.infer<typeof ParentOptionsSchema>;

export const ParentSettingsSchema = z.object({
  persona: z.string().min(1),
  values: z.array(z.string().min(1)),
  interests: z.array(z.string().min(1)),
  child_name: z.string(),
  custom_elements: z.string()
});

export type ParentSettings = z.infer<typeof ParentSettingsSchema>;

export const ParentSettingsInputSchema = z
  .object({
    persona: z.string().trim().min(1).max(64).optional(),
    values: z.array(z.string().trim().min(1).max(64)).max(20).optional(),
    interests: z.array(z.string().trim().min(1).max(64)).max(20).optional(),
    child_name: z.string().trim().max(80).optional(),
    custom_elements: z.string().trim().max(1000).optional()
  })
  .strict();

export type ParentSettingsInput = z.infer<typeof ParentSettingsInputSchema>;

// ------------------------------------------------------------
// Records produced by a generation request
// ------------------------------------------------------------

export const VerificationRecordSchema = z.object({
  fact: z.string(),
  topic: z.string(),
  accuracy: z.enum(["true", "false", "partially_true", "unknown"]),
  score: z.number().min(0).max(10),
  age_appropriate: z.boolean(),
  concerns: z.string(),
  verdict: z.enum(["VERIFIED", "NEEDS_CORRECTION", "INACCURATE"]),
  is_verified: z.boolean(),
  ok: z.boolean(),
  error: z.string().optional(),
  raw_response: z.string().optional()
});

export type VerificationRecord = z.infer<typeof VerificationRecordSchema>;

export const ToolCallRecordSchema = z.object({
  function: z.literal("get_educational_fact"),
  arguments: z.object({ topic: z.string() }),
  result: z.string(),
  original_topic: z.string(),
  category: z.string().nullable(),
  expanded: z.boolean(),
  verification: VerificationRecordSchema.nullable()
});

export type ToolCallRecord = z.infer<typeof ToolCallRecordSchema>;

export const StyleSnapshotSchema = z.object({
  storyteller_temperature: z.number(),
  judge_temperature: z.number(),
  max_story_tokens: z.number().int(),
  quality_threshold: z.number(),
  max_revisions: z.number().int(),
  final_evaluation: z.enum(["when_stale", "always"])
});

export type StyleSnapshot = z.infer<typeof StyleSnapshotSchema>;

export const GenerationResultSchema = z.object({
  story: z.string(),
  user_request: z.string(),
  revision_count: z.number().int().min(0),
  judge_score: z.number().min(0).max(10),
  judge_feedback: z.string(),
  meets_quality_threshold: z.boolean(),
  tool_calls: z.array(ToolCallRecordSchema),
  model_used: z.string(),
  mcp_enabled: z.boolean(),
  fallback_used: z.boolean(),
  parent_settings: ParentSettingsSchema.nullable(),
  generation_config: StyleSnapshotSchema,
  evaluator_calls: z.number().int().min(0),
  state_trace: z.array(z.enum(LOOP_STATES)),
  error: z.string().optional()
});

export type GenerationResult = z.infer<typeof GenerationResultSchema>;

export const RunRecordSchema = z.object({
  timestamp: z.string(),
  user_request: z.string(),
  success: z.boolean(),
  model_used: z.string().nullable(),
  generation_time_seconds: z.number().min(0),
  mcp_enabled: z.boolean(),
  fallback_used: z.boolean(),
  error_message: z.string().nullable()
});

export type RunRecord = z.infer<typeof RunRecordSchema>;

export const StoredStorySchema = GenerationResultSchema.extend({
  id: z.string().min(1),
  timestamp: z.string()
});

export type StoredStory = z.infer<typeof StoredStorySchema>;

export const StoredRunSchema = RunRecordSchema.extend({
  id: z.string().min(1)
});

export type StoredRun = z.infer<typeof StoredRunSchema>;

// ------------------------------------------------------------
// Transient shapes
// ------------------------------------------------------------

export type GenerationAttempt = {
  story: string;
  is_valid: boolean;
  model: string;
  error?: string;
};

export type EvaluationRecord = {
  overall_score: number;
  verdict: "APPROVED" | "NEEDS_REVISION";
  meets_threshold: boolean;
  feedback: string;
  raw_response: string;
  ok: boolean;
  error?: string;
};
