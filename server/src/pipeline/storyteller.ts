import type { Tool } from "@openai/agents";
import { STORYTELLER_INSTRUCTIONS } from "./agents.js";
import { buildStyleInstructions, resolveStorytellerTemperature } from "./parent_settings.js";
import type { GenerationAttempt, ParentSettings, ToolCallRecord } from "./schemas.js";
import type { TextGenerator } from "./text_generator.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_MAX_STORY_TOKENS = 2000;

export type StorytellerOptions = {
  parentSettings?: ParentSettings | null;
  /** Wins over the persona's temperature. */
  temperature?: number;
  maxOutputTokens?: number;
  /** Declared to the model on every call; an empty list means plain generation. */
  tools?: Tool[];
};

export type GenerateOptions = {
  revisionContext?: string;
  toolCalls?: readonly ToolCallRecord[];
  signal?: AbortSignal;
};

export function buildStorytellerInstructions(settings: ParentSettings | null): string {
  if (!settings) return STORYTELLER_INSTRUCTIONS;
  return `${STORYTELLER_INSTRUCTIONS}\n\n${buildStyleInstructions(settings)}`;
}

/** Facts already fetched for this request, restated so a revision keeps them. */
export function formatToolContext(toolCalls: readonly ToolCallRecord[]): string {
  if (toolCalls.length === 0) return "";
  const lines = toolCalls.map((tc) => `- ${tc.arguments.topic}: ${tc.result}`);
  return `Educational facts already retrieved for this story:\n${lines.join("\n")}`;
}

export function buildStoryPrompt(request: string, options: Pick<GenerateOptions, "revisionContext" | "toolCalls"> = {}): string {
  let prompt = request;
  if (options.revisionContext) prompt += `\n\nRevision instructions: ${options.revisionContext}`;
  const context = formatToolContext(options.toolCalls ?? []);
  if (context) prompt += `\n\n${context}`;
  return prompt;
}

export class Storyteller {
  readonly instructions: string;
  readonly temperature: number;
  readonly maxOutputTokens: number;
  private readonly tools: Tool[];

  constructor(
    private readonly generator: TextGenerator,
    options: StorytellerOptions = {}
  ) {
    const settings = options.parentSettings ?? null;
    this.instructions = buildStorytellerInstructions(settings);
    this.temperature = resolveStorytellerTemperature(settings, options.temperature);
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_MAX_STORY_TOKENS;
    this.tools = options.tools ?? [];
  }

  get model(): string {
    return this.generator.model;
  }

  /** Never throws; every failure comes back as `is_valid: false`. */
  async generate(request: string, options: GenerateOptions = {}): Promise<GenerationAttempt> {
    const prompt = buildStoryPrompt(request, options);
    try {
      const res = await this.generator.invoke(prompt, {
        name: "Storyteller",
        instructions: this.instructions,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        tools: this.tools,
        signal: options.signal
      });
      if (!res.valid) {
        return { story: "", is_valid: false, model: this.model, error: res.error ?? "Empty response" };
      }
      return { story: res.text, is_valid: true, model: this.model };
    } catch (err) {
      return { story: "", is_valid: false, model: this.model, error: errorMessage(err) };
    }
  }
}
