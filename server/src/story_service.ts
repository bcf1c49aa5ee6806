import { resolveGenerationConfig, type GenerationConfig, type GenerationOverrides } from "./config.js";
import { GenerationLog, type GenerationLogEvent } from "./generation_log.js";
import { createStoryOrchestrator } from "./pipeline/orchestrator.js";
import { normalizeParentSettings } from "./pipeline/parent_settings.js";
import type { GenerationResult, ParentSettings, ParentSettingsInput, RunRecord } from "./pipeline/schemas.js";
import { nowIso } from "./pipeline/utils.js";
import type { StoryStore } from "./story_store.js";

export type StoryRequest = {
  request: string;
  parent_settings?: ParentSettingsInput;
  overrides?: GenerationOverrides;
};

export type StoryResponse = {
  result: GenerationResult;
  story_id: string | null;
  generation_time_seconds: number;
  events: GenerationLogEvent[];
};

export type OrchestratorLike = { generate(request: string): Promise<GenerationResult> };

export type OrchestratorFactory = (
  config: GenerationConfig,
  options: { parentSettings: ParentSettings; log: GenerationLog }
) => OrchestratorLike;

export type StoryServiceOptions = {
  /** Null disables persistence. */
  store: StoryStore | null;
  createOrchestrator?: OrchestratorFactory;
  env?: NodeJS.ProcessEnv;
};

/**
 * One request end to end: resolve config, run the orchestrator, persist best-effort.
 * Persistence failures are reported in `events`, never thrown.
 */
export class StoryService {
  private readonly store: StoryStore | null;
  private readonly createOrchestrator: OrchestratorFactory;
  private readonly env: NodeJS.ProcessEnv;

  constructor(options: StoryServiceOptions) {
    this.store = options.store;
    this.createOrchestrator = options.createOrchestrator ?? createStoryOrchestrator;
    this.env = options.env ?? process.env;
  }

  async generate(input: StoryRequest, onEvent?: (event: GenerationLogEvent) => void): Promise<StoryResponse> {
    const config = resolveGenerationConfig(input.overrides, this.env);
    const parentSettings = normalizeParentSettings(input.parent_settings);
    const log = new GenerationLog();
    const unsubscribe = onEvent ? log.subscribe(onEvent) : () => undefined;

    try {
      const startedAt = nowIso();
      const startMs = Date.now();
      const orchestrator = this.createOrchestrator(config, { parentSettings, log });
      const result = await orchestrator.generate(input.request);
      const seconds = Math.max(0, (Date.now() - startMs) / 1000);

      const storyId = await this.persist(result, startedAt, seconds, log);
      return { result, story_id: storyId, generation_time_seconds: seconds, events: log.entries() };
    } finally {
      unsubscribe();
    }
  }

  private async persist(
    result: GenerationResult,
    startedAt: string,
    seconds: number,
    log: GenerationLog
  ): Promise<string | null> {
    if (!this.store) return null;

    let storyId: string | null = null;
    if (!result.error) {
      const saved = await this.store.saveStory(result);
      if (saved.ok) storyId = saved.id;
      else log.error(`Story generated but could not be saved: ${saved.error}`);
    }

    const run: RunRecord = {
      timestamp: startedAt,
      user_request: result.user_request,
      success: !result.error,
      model_used: result.error ? null : result.model_used,
      generation_time_seconds: seconds,
      mcp_enabled: result.mcp_enabled,
      fallback_used: result.fallback_used,
      error_message: result.error ?? null
    };
    const savedRun = await this.store.saveRun(run);
    if (!savedRun.ok) log.error(`Run record could not be saved: ${savedRun.error}`);

    return storyId;
  }
}
