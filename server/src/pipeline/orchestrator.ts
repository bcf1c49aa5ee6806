import type { Tool } from "@openai/agents";
import type { GenerationConfig } from "../config.js";
import { GenerationLog } from "../generation_log.js";
import { FACT_TOOL_NAME, makeEducationalFactTool } from "./agents.js";
import { FactChecker } from "./fact_checker.js";
import { StoryJudge, buildRevisionPrompt } from "./judge.js";
import { OllamaBackup } from "./local_backup.js";
import { resolveStorytellerTemperature } from "./parent_settings.js";
import type {
  EvaluationRecord,
  GenerationAttempt,
  GenerationResult,
  LoopState,
  ParentSettings,
  StyleSnapshot,
  ToolCallRecord
} from "./schemas.js";
import { Storyteller } from "./storyteller.js";
import { createOpenAITextGenerator } from "./text_generator.js";
import { TopicResolver } from "./topic_resolver.js";
import { errorMessage } from "./utils.js";

export const FALLBACK_JUDGE_SCORE = 6.0;
export const FALLBACK_FEEDBACK = "Story generated using local Ollama fallback. Judge evaluation skipped.";
export const FAILURE_STORY = "Story generation failed. Please check your API keys and Ollama installation.";

export type PrimaryComponents = {
  storyteller: Storyteller;
  judge: StoryJudge;
  /** Null when verification is switched off. */
  factChecker: FactChecker | null;
};

export type PrimaryFactoryContext = {
  config: GenerationConfig;
  parentSettings: ParentSettings | null;
  resolver: TopicResolver;
  log: GenerationLog;
};

/** May throw (missing credential, bad model config); the orchestrator treats a throw as "primary unavailable". */
export type PrimaryFactory = (ctx: PrimaryFactoryContext) => PrimaryComponents;

export interface FallbackGenerator {
  readonly model: string;
  generateStory(request: string): Promise<GenerationAttempt>;
}

export type StoryOrchestratorDeps = {
  config: GenerationConfig;
  parentSettings?: ParentSettings | null;
  createPrimary: PrimaryFactory;
  fallback: FallbackGenerator;
  resolver?: TopicResolver;
  log?: GenerationLog;
};

export function buildAugmentedRequest(request: string, toolCalls: readonly ToolCallRecord[]): string {
  if (toolCalls.length === 0) return request;
  const facts = toolCalls.map((tc) =>
    tc.verification?.is_verified
      ? `✅ Verified fact about ${tc.arguments.topic}: ${tc.result}`
      : `Educational fact about ${tc.arguments.topic}: ${tc.result}`
  );
  return `${request}

IMPORTANT: Incorporate these educational facts naturally into the story:
${facts.join("\n\n")}

Make sure the story is educational while remaining engaging and age-appropriate. Use the verified facts (marked with ✅) as primary sources.`;
}

type PrimaryOutcome =
  | { kind: "done"; result: GenerationResult }
  | { kind: "fallback"; reason: string };

/**
 * Generation -> evaluation -> revision loop for one request.
 *
 * Never throws: every path ends in a GenerationResult. Only a failed fallback sets `error`.
 */
export class StoryOrchestrator {
  readonly config: GenerationConfig;
  readonly parentSettings: ParentSettings | null;
  readonly log: GenerationLog;
  private readonly createPrimary: PrimaryFactory;
  private readonly fallback: FallbackGenerator;
  private readonly resolver: TopicResolver;

  private trace: LoopState[] = [];
  private evaluatorCalls = 0;

  constructor(deps: StoryOrchestratorDeps) {
    this.config = deps.config;
    this.parentSettings = deps.parentSettings ?? null;
    this.createPrimary = deps.createPrimary;
    this.fallback = deps.fallback;
    this.resolver = deps.resolver ?? new TopicResolver();
    this.log = deps.log ?? new GenerationLog();
  }

  async generate(request: string): Promise<GenerationResult> {
    this.trace = [];
    this.evaluatorCalls = 0;
    this.enter("INIT");
    this.log.log(`User request: ${request}`, "INIT");

    let primary: PrimaryComponents;
    try {
      primary = this.createPrimary({
        config: this.config,
        parentSettings: this.parentSettings,
        resolver: this.resolver,
        log: this.log
      });
    } catch (err) {
      this.log.error(`Primary generator unavailable: ${errorMessage(err)}`, "INIT");
      return this.runFallback(request);
    }

    try {
      const outcome = await this.runPrimary(request, primary);
      if (outcome.kind === "done") return outcome.result;
      this.log.error(`Primary generation failed: ${outcome.reason}`, this.currentState());
    } catch (err) {
      this.log.error(`Primary path threw: ${errorMessage(err)}`, this.currentState());
    }
    return this.runFallback(request);
  }

  private async runPrimary(request: string, primary: PrimaryComponents): Promise<PrimaryOutcome> {
    const { storyteller, judge } = primary;

    let toolCalls: ToolCallRecord[] = [];
    if (this.config.enable_facts) {
      this.enter("AUGMENTING");
      toolCalls = await this.augment(request, primary.factChecker);
    }

    this.enter("GENERATING");
    const first = await storyteller.generate(buildAugmentedRequest(request, toolCalls));
    if (!first.is_valid) return { kind: "fallback", reason: first.error ?? "Invalid generation" };
    this.log.log(`Story generated (${first.story.length} characters)`, "GENERATING");

    let candidate = first.story;
    let model = first.model;
    let revisionCount = 0;

    let evaluation = await this.evaluate(judge, candidate, request);

    while (!evaluation.meets_threshold && revisionCount < this.config.max_revisions - 1) {
      this.enter("REVISING");
      const revisionPrompt = buildRevisionPrompt(candidate, evaluation.feedback, request);

      this.enter("GENERATING");
      const revised = await storyteller.generate(request, { revisionContext: revisionPrompt, toolCalls });
      if (!revised.is_valid) {
        this.log.error(`Revision failed (${revised.error ?? "invalid"}); keeping previous version`, "GENERATING");
        break;
      }
      candidate = revised.story;
      model = revised.model;
      revisionCount += 1;
      this.log.log(`Revision ${revisionCount} generated`, "GENERATING");

      evaluation = await this.evaluate(judge, candidate, request);
    }

    if (!evaluation.meets_threshold && revisionCount >= this.config.max_revisions - 1) {
      this.log.log("Maximum revisions reached. Using current version.", this.currentState());
    }

    // Every candidate is scored as soon as it exists, so the score already belongs to `candidate`.
    this.enter("DONE");
    if (this.config.final_evaluation === "always") {
      evaluation = await this.evaluate(judge, candidate, request, "DONE");
    }

    return {
      kind: "done",
      result: {
        story: candidate,
        user_request: request,
        revision_count: revisionCount,
        judge_score: evaluation.overall_score,
        judge_feedback: evaluation.feedback,
        meets_quality_threshold: evaluation.meets_threshold,
        tool_calls: toolCalls,
        model_used: model,
        mcp_enabled: this.config.enable_facts,
        fallback_used: false,
        parent_settings: this.parentSettings,
        generation_config: this.snapshot(storyteller.temperature),
        evaluator_calls: this.evaluatorCalls,
        state_trace: [...this.trace]
      }
    };
  }

  private async augment(request: string, checker: FactChecker | null): Promise<ToolCallRecord[]> {
    try {
      const topics = this.resolver.detectTopics(request);
      if (topics.length === 0) {
        this.log.log("No educational topics detected - generating standard story", "AUGMENTING");
        return [];
      }

      const records: ToolCallRecord[] = [];
      for (const topic of topics) {
        const resolved = this.resolver.resolveFactWithExpansion(topic);
        const verification = checker ? await checker.verify(resolved.fact, resolved.used_topic) : null;
        if (verification && !verification.ok) {
          this.log.error(`Fact verification failed for '${resolved.used_topic}': ${verification.error ?? "unknown"}`, "AUGMENTING");
        }
        records.push({
          function: FACT_TOOL_NAME,
          arguments: { topic: resolved.used_topic },
          result: resolved.fact,
          original_topic: resolved.original_topic,
          category: resolved.category,
          expanded: resolved.expanded,
          verification
        });
      }

      const verified = records.filter((r) => r.verification?.is_verified).length;
      this.log.log(`Fetched ${records.length} educational fact(s), ${verified} verified`, "AUGMENTING");
      return records;
    } catch (err) {
      this.log.error(`Fact augmentation failed: ${errorMessage(err)}`, "AUGMENTING");
      return [];
    }
  }

  private async evaluate(
    judge: StoryJudge,
    story: string,
    request: string,
    state: LoopState = "EVALUATING"
  ): Promise<EvaluationRecord> {
    if (state === "EVALUATING") this.enter("EVALUATING");
    const evaluation = await judge.evaluate(story, request);
    this.evaluatorCalls += 1;
    if (!evaluation.ok) this.log.error(evaluation.feedback, state);
    this.log.log(`Judge score: ${evaluation.overall_score.toFixed(1)}/10 (${evaluation.verdict})`, state);
    return evaluation;
  }

  private async runFallback(request: string): Promise<GenerationResult> {
    this.enter("FALLBACK");
    this.log.log(`Generating story with local fallback (${this.fallback.model})`, "FALLBACK");

    let attempt: GenerationAttempt;
    try {
      attempt = await this.fallback.generateStory(request);
    } catch (err) {
      attempt = { story: "", is_valid: false, model: this.fallback.model, error: errorMessage(err) };
    }

    this.enter("DONE");
    const base = {
      user_request: request,
      revision_count: 0,
      meets_quality_threshold: false,
      tool_calls: [],
      mcp_enabled: false,
      fallback_used: true,
      parent_settings: this.parentSettings,
      generation_config: this.snapshot(
        resolveStorytellerTemperature(this.parentSettings, this.config.storyteller_temperature)
      ),
      evaluator_calls: this.evaluatorCalls,
      state_trace: [...this.trace]
    };

    if (attempt.is_valid) {
      this.log.log(`Fallback story generated (${attempt.story.length} characters)`, "DONE");
      return {
        ...base,
        story: attempt.story,
        judge_score: FALLBACK_JUDGE_SCORE,
        judge_feedback: FALLBACK_FEEDBACK,
        model_used: attempt.model
      };
    }

    const reason = attempt.error ?? "Generation failed";
    this.log.error(`Fallback generation failed: ${reason}`, "DONE");
    return {
      ...base,
      story: FAILURE_STORY,
      judge_score: 0,
      judge_feedback: reason,
      model_used: "none",
      error: reason
    };
  }

  private snapshot(storytellerTemperature: number): StyleSnapshot {
    return {
      storyteller_temperature: storytellerTemperature,
      judge_temperature: this.config.judge_temperature,
      max_story_tokens: this.config.max_story_tokens,
      quality_threshold: this.config.quality_threshold,
      max_revisions: this.config.max_revisions,
      final_evaluation: this.config.final_evaluation
    };
  }

  private enter(state: LoopState): void {
    this.trace.push(state);
  }

  private currentState(): LoopState {
    return this.trace[this.trace.length - 1] ?? "INIT";
  }
}

/** OpenAI-backed storyteller, judge and (optionally) fact checker sharing one generator. */
export const defaultPrimaryFactory: PrimaryFactory = ({ config, parentSettings, resolver, log }) => {
  const generator = createOpenAITextGenerator(config.model, {
    timeoutMs: config.request_timeout_ms,
    log: (message) => log.log(message, "GENERATING")
  });
  const tools: Tool[] = config.enable_facts ? [makeEducationalFactTool(resolver)] : [];
  return {
    storyteller: new Storyteller(generator, {
      parentSettings,
      temperature: config.storyteller_temperature,
      maxOutputTokens: config.max_story_tokens,
      tools
    }),
    judge: new StoryJudge(generator, {
      threshold: config.quality_threshold,
      temperature: config.judge_temperature,
      maxOutputTokens: config.max_judge_tokens
    }),
    factChecker: config.verify_facts ? new FactChecker(generator) : null
  };
};

export type CreateStoryOrchestratorOptions = {
  parentSettings?: ParentSettings | null;
  log?: GenerationLog;
  createPrimary?: PrimaryFactory;
  fallback?: FallbackGenerator;
  fetchImpl?: typeof fetch;
};

export function createStoryOrchestrator(
  config: GenerationConfig,
  options: CreateStoryOrchestratorOptions = {}
): StoryOrchestrator {
  const log = options.log ?? new GenerationLog();
  const fallback =
    options.fallback ??
    new OllamaBackup({
      model: config.fallback_model,
      host: config.ollama_host,
      timeoutMs: config.request_timeout_ms,
      fetchImpl: options.fetchImpl,
      log: (message) => log.log(message, "FALLBACK")
    });
  return new StoryOrchestrator({
    config,
    parentSettings: options.parentSettings ?? null,
    createPrimary: options.createPrimary ?? defaultPrimaryFactory,
    fallback,
    log
  });
}
