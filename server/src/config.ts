import { z } from "zod";
import { DEFAULT_MODEL } from "./pipeline/agents.js";
import { DEFAULT_JUDGE_MAX_TOKENS, DEFAULT_JUDGE_TEMPERATURE, DEFAULT_QUALITY_THRESHOLD } from "./pipeline/judge.js";
import { DEFAULT_FALLBACK_MODEL, DEFAULT_OLLAMA_HOST } from "./pipeline/local_backup.js";
import { DEFAULT_MAX_STORY_TOKENS } from "./pipeline/storyteller.js";

export const GenerationConfigSchema = z
  .object({
    model: z.string().trim().min(1).default(DEFAULT_MODEL),
    /** Unset means the persona decides. */
    storyteller_temperature: z.number().min(0).max(2).optional(),
    judge_temperature: z.number().min(0).max(2).default(DEFAULT_JUDGE_TEMPERATURE),
    max_story_tokens: z.number().int().min(100).max(16000).default(DEFAULT_MAX_STORY_TOKENS),
    max_judge_tokens: z.number().int().min(100).max(8000).default(DEFAULT_JUDGE_MAX_TOKENS),
    quality_threshold: z.number().min(0).max(10).default(DEFAULT_QUALITY_THRESHOLD),
    max_revisions: z.number().int().min(1).max(10).default(3),
    enable_facts: z.boolean().default(true),
    verify_facts: z.boolean().default(true),
    final_evaluation: z.enum(["when_stale", "always"]).default("when_stale"),
    request_timeout_ms: z.number().int().min(1000).max(600_000).default(120_000),
    fallback_model: z.string().trim().min(1).default(DEFAULT_FALLBACK_MODEL),
    ollama_host: z.string().trim().url().default(DEFAULT_OLLAMA_HOST)
  })
  .strict();

export type GenerationConfig = z.infer<typeof GenerationConfigSchema>;
export type GenerationConfigInput = z.input<typeof GenerationConfigSchema>;

/** Per-request knobs the HTTP and CLI surfaces accept on top of the environment. */
export const GenerationOverridesSchema = z
  .object({
    storyteller_temperature: z.number().min(0).max(2).optional(),
    quality_threshold: z.number().min(0).max(10).optional(),
    max_revisions: z.number().int().min(1).max(10).optional(),
    enable_facts: z.boolean().optional(),
    verify_facts: z.boolean().optional(),
    final_evaluation: z.enum(["when_stale", "always"]).optional()
  })
  .strict();

export type GenerationOverrides = z.infer<typeof GenerationOverridesSchema>;

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

function envString(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

function envNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const v = envString(env, name);
  if (v === undefined) return undefined;
  const n = Number(v);
  if (!Number.isFinite(n)) throw new ConfigError(`${name} must be a number (got '${v}')`);
  return n;
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): GenerationConfigInput {
  return {
    model: envString(env, "BSS_MODEL"),
    quality_threshold: envNumber(env, "BSS_QUALITY_THRESHOLD"),
    max_revisions: envNumber(env, "BSS_MAX_REVISIONS"),
    fallback_model: envString(env, "BSS_FALLBACK_MODEL"),
    ollama_host: envString(env, "OLLAMA_HOST")
  };
}

/** Environment first, then per-request overrides; undefined entries never clobber. */
export function resolveGenerationConfig(
  overrides: GenerationOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): GenerationConfig {
  const merged: Record<string, unknown> = {};
  for (const layer of [configFromEnv(env), overrides]) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  const parsed = GenerationConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const details = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
    throw new ConfigError(`Invalid generation config: ${details}`);
  }
  return parsed.data;
}

export function portFromEnv(env: NodeJS.ProcessEnv = process.env): number {
  const port = env.PORT ? Number(env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}
