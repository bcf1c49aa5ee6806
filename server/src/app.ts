import express from "express";
import cors from "cors";
import { z } from "zod";
import { GenerationOverridesSchema, resolveGenerationConfig } from "./config.js";
import { OllamaBackup, type OllamaAvailability } from "./pipeline/local_backup.js";
import { DEFAULT_PERSONA, DEFAULT_VALUES, loadParentOptions } from "./pipeline/parent_settings.js";
import { ParentSettingsInputSchema } from "./pipeline/schemas.js";
import { errorMessage } from "./pipeline/utils.js";
import type { StoryService } from "./story_service.js";
import type { StoryStore } from "./story_store.js";

export type CreateAppOptions = {
  env?: NodeJS.ProcessEnv;
  /** Replaces the live Ollama probe behind /api/health. */
  checkFallback?: () => Promise<OllamaAvailability>;
};

const CreateStoryBodySchema = z
  .object({
    request: z.string().trim().min(3).max(2000),
    parent_settings: ParentSettingsInputSchema.optional(),
    overrides: GenerationOverridesSchema.optional()
  })
  .strict();

const ListStoriesQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).optional()
});

export function createApp(service: Pick<StoryService, "generate">, store: StoryStore, options: CreateAppOptions = {}) {
  const app = express();
  const env = options.env ?? process.env;

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  async function probeFallback(): Promise<OllamaAvailability> {
    if (options.checkFallback) return options.checkFallback();
    const config = resolveGenerationConfig({}, env);
    return new OllamaBackup({ model: config.fallback_model, host: config.ollama_host }).checkAvailable();
  }

  app.get("/api/health", async (_req, res) => {
    try {
      const config = resolveGenerationConfig({}, env);
      const fallback = await probeFallback();
      res.json({
        ok: true,
        has_openai_key: Boolean(env.OPENAI_API_KEY && env.OPENAI_API_KEY.trim().length > 0),
        model: config.model,
        fallback_model: config.fallback_model,
        ollama_host: config.ollama_host,
        ollama_available: fallback.available,
        ollama_models: fallback.models
      });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get("/api/options", (_req, res) => {
    const parentOptions = loadParentOptions();
    res.json({
      ...parentOptions,
      defaults: { persona: DEFAULT_PERSONA, values: [...DEFAULT_VALUES], interests: [] }
    });
  });

  app.post("/api/stories", async (req, res) => {
    const parsed = CreateStoryBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    try {
      const out = await service.generate(parsed.data);
      res.status(out.result.error ? 502 : 200).json(out);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  app.get("/api/stories", async (req, res) => {
    const parsed = ListStoriesQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }
    res.json(await store.listStories(parsed.data.limit));
  });

  app.get("/api/stories/stats", async (_req, res) => {
    res.json(await store.statistics());
  });

  app.get("/api/stories/:storyId", async (req, res) => {
    const story = await store.getStory(req.params.storyId);
    if (!story) {
      res.status(404).json({ error: "story not found" });
      return;
    }
    res.json(story);
  });

  app.delete("/api/stories/:storyId", async (req, res) => {
    const deleted = await store.deleteStory(req.params.storyId);
    if (!deleted) {
      res.status(404).json({ error: "story not found" });
      return;
    }
    res.json({ ok: true });
  });

  app.delete("/api/stories", async (_req, res) => {
    res.json({ ok: true, ...(await store.clearAll()) });
  });

  return app;
}
