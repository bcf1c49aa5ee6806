import { z } from "zod";
import { FALLBACK_INSTRUCTIONS } from "./agents.js";
import type { GenerationAttempt } from "./schemas.js";
import { timeoutSignal, type InvokeOptions, type InvokeResult, type TextGenerator } from "./text_generator.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_FALLBACK_MODEL = "llama3.2";
export const DEFAULT_OLLAMA_HOST = "http://127.0.0.1:11434";

const FALLBACK_TEMPERATURE = 0.8;
const FALLBACK_TOP_P = 0.95;
const FALLBACK_MAX_TOKENS = 2000;
const TAGS_TIMEOUT_MS = 5000;
const DEFAULT_TIMEOUT_MS = 120_000;

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()).default([])
});

const GenerateResponseSchema = z.object({
  response: z.string().default("")
});

export type OllamaBackupOptions = {
  model?: string;
  host?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  log?: (message: string) => void;
};

export type OllamaAvailability = {
  available: boolean;
  models: string[];
  error?: string;
};

/**
 * Local fallback over Ollama's HTTP API. Tool declarations are ignored; the fallback
 * writes from the plain request.
 */
export class OllamaBackup implements TextGenerator {
  readonly model: string;
  readonly host: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly log: (message: string) => void;

  constructor(options: OllamaBackupOptions = {}) {
    this.model = options.model ?? DEFAULT_FALLBACK_MODEL;
    this.host = (options.host ?? DEFAULT_OLLAMA_HOST).replace(/\/+$/, "");
    this.timeoutMs = Math.max(1, options.timeoutMs ?? DEFAULT_TIMEOUT_MS);
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.log = options.log ?? (() => undefined);
  }

  async checkAvailable(): Promise<OllamaAvailability> {
    const guard = timeoutSignal(TAGS_TIMEOUT_MS);
    try {
      const res = await this.fetchImpl(`${this.host}/api/tags`, { method: "GET", signal: guard.signal });
      if (!res.ok) return { available: false, models: [], error: `HTTP ${res.status}` };
      const parsed = TagsResponseSchema.safeParse(await res.json());
      const models = parsed.success ? parsed.data.models.map((m) => m.name) : [];
      if (!models.some((name) => name === this.model || name.startsWith(`${this.model}:`))) {
        this.log(`Model '${this.model}' not found in Ollama. Available models: ${models.slice(0, 5).join(", ") || "(none)"}`);
      }
      return { available: true, models };
    } catch (err) {
      return { available: false, models: [], error: errorMessage(err) };
    } finally {
      guard.dispose();
    }
  }

  async invoke(prompt: string, options: InvokeOptions): Promise<InvokeResult> {
    const guard = timeoutSignal(this.timeoutMs, options.signal);
    try {
      const res = await this.fetchImpl(`${this.host}/api/generate`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({
          model: this.model,
          prompt: options.instructions ? `${options.instructions}\n\n${prompt}` : prompt,
          stream: false,
          options: {
            temperature: options.temperature,
            top_p: FALLBACK_TOP_P,
            num_predict: options.maxOutputTokens
          }
        }),
        signal: guard.signal
      });
      if (!res.ok) {
        const body = await res.text();
        return { text: "", valid: false, error: `Ollama HTTP ${res.status}: ${body.slice(0, 200)}` };
      }
      const parsed = GenerateResponseSchema.safeParse(await res.json());
      if (!parsed.success) return { text: "", valid: false, error: "Malformed Ollama response" };
      const text = parsed.data.response.trim();
      if (!text) return { text: "", valid: false, error: "Empty response" };
      return { text, valid: true };
    } catch (err) {
      const reason = guard.signal.aborted && guard.signal.reason instanceof Error ? guard.signal.reason : err;
      return { text: "", valid: false, error: errorMessage(reason) };
    } finally {
      guard.dispose();
    }
  }

  /** Writes a story for the original, unaugmented request. */
  async generateStory(request: string, signal?: AbortSignal): Promise<GenerationAttempt> {
    const availability = await this.checkAvailable();
    if (!availability.available) {
      return { story: "", is_valid: false, model: this.model, error: "Ollama not available" };
    }

    this.log(`Using Ollama model: ${this.model}`);
    const res = await this.invoke(`Generate a bedtime story based on this request: ${request}`, {
      instructions: FALLBACK_INSTRUCTIONS,
      temperature: FALLBACK_TEMPERATURE,
      maxOutputTokens: FALLBACK_MAX_TOKENS,
      signal
    });
    if (!res.valid) return { story: "", is_valid: false, model: this.model, error: res.error ?? "Empty response" };
    return { story: res.text, is_valid: true, model: this.model };
  }
}
