import { Agent, Runner, setDefaultOpenAIKey, type Tool } from "@openai/agents";
import { errorMessage } from "./utils.js";

export type InvokeOptions = {
  /** Agent name, shown in SDK traces. */
  name?: string;
  instructions: string;
  temperature: number;
  maxOutputTokens: number;
  tools?: Tool[];
  signal?: AbortSignal;
};

export type InvokeResult = {
  text: string;
  valid: boolean;
  error?: string;
};

/**
 * Narrow contract every text back end is driven through. Implementations report failures
 * as `valid: false` instead of throwing.
 */
export interface TextGenerator {
  readonly model: string;
  invoke(prompt: string, options: InvokeOptions): Promise<InvokeResult>;
}

export class MissingCredentialError extends Error {
  envVar: string;
  constructor(envVar: string) {
    super(`Missing required env var: ${envVar}`);
    this.name = "MissingCredentialError";
    this.envVar = envVar;
  }
}

export function requireEnv(name: string): string {
  const v = process.env[name];
  if (!v || v.trim().length === 0) throw new MissingCredentialError(name);
  return v.trim();
}

export class GeneratorTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Generator call timed out after ${timeoutMs}ms`);
    this.name = "GeneratorTimeoutError";
  }
}

/**
 * Signal that aborts when `parent` aborts or after `timeoutMs`, whichever comes first.
 * Call `dispose` once the guarded call settles.
 */
export function timeoutSignal(timeoutMs: number, parent?: AbortSignal): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", onParentAbort, { once: true });

  const timer = setTimeout(() => controller.abort(new GeneratorTimeoutError(timeoutMs)), timeoutMs);
  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}

export type AgentsTextGeneratorOptions = {
  maxTurns?: number;
  timeoutMs?: number;
  log?: (message: string) => void;
};

const DEFAULT_MAX_TURNS = 6;
const DEFAULT_TIMEOUT_MS = 120_000;

export class AgentsTextGenerator implements TextGenerator {
  private readonly runner = new Runner();
  private readonly maxTurns: number;
  private readonly timeoutMs: number;

  constructor(
    readonly model: string,
    private readonly options: AgentsTextGeneratorOptions = {}
  ) {
    this.maxTurns = Math.max(1, options.maxTurns ?? DEFAULT_MAX_TURNS);
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
  }

  async invoke(prompt: string, options: InvokeOptions): Promise<InvokeResult> {
    const tools = options.tools ?? [];
    if (tools.length > 0) {
      try {
        return await this.runOnce(prompt, options, tools);
      } catch (err) {
        if (err instanceof GeneratorTimeoutError || options.signal?.aborted) {
          return { text: "", valid: false, error: errorMessage(err) };
        }
        // Tool calling is optional: repeat the same request without tools.
        this.options.log?.(`Tool-enabled generation failed (${errorMessage(err)}); retrying without tools`);
      }
    }

    try {
      return await this.runOnce(prompt, options, []);
    } catch (err) {
      return { text: "", valid: false, error: errorMessage(err) };
    }
  }

  private async runOnce(prompt: string, options: InvokeOptions, tools: Tool[]): Promise<InvokeResult> {
    const agent = new Agent({
      name: options.name ?? "Storyteller",
      instructions: options.instructions,
      model: this.model,
      modelSettings: { temperature: options.temperature, maxTokens: options.maxOutputTokens },
      tools
    });

    const guard = timeoutSignal(this.timeoutMs, options.signal);
    try {
      const result = await this.runner.run(agent, prompt, { maxTurns: this.maxTurns, signal: guard.signal });
      if (guard.signal.aborted) throw guard.signal.reason instanceof Error ? guard.signal.reason : new Error("Aborted");
      const text = typeof result.finalOutput === "string" ? result.finalOutput.trim() : "";
      if (!text) return { text: "", valid: false, error: "Empty response" };
      return { text, valid: true };
    } catch (err) {
      if (guard.signal.aborted && guard.signal.reason instanceof GeneratorTimeoutError) throw guard.signal.reason;
      throw err;
    } finally {
      guard.dispose();
    }
  }
}

/** Builds the OpenAI-backed generator; throws `MissingCredentialError` without `OPENAI_API_KEY`. */
export function createOpenAITextGenerator(model: string, options: AgentsTextGeneratorOptions = {}): AgentsTextGenerator {
  setDefaultOpenAIKey(requireEnv("OPENAI_API_KEY"));
  return new AgentsTextGenerator(model, options);
}
