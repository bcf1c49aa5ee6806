import { readFileSync } from "node:fs";
import path from "node:path";
import { assetsRootAbs } from "./utils.js";
import {
  ParentOptionsSchema,
  type ParentOptions,
  type ParentSettings,
  type ParentSettingsInput,
  type Persona
} from "./schemas.js";

export const DEFAULT_PERSONA = "balanced_storyteller";
export const DEFAULT_VALUES: readonly string[] = ["kindness", "friendship"];
export const DEFAULT_STORYTELLER_TEMPERATURE = 0.8;

let cached: ParentOptions | null = null;

export function parentOptionsPathAbs(): string {
  return path.join(assetsRootAbs(), "parent_options.json");
}

export function loadParentOptions(): ParentOptions {
  if (cached) return cached;
  const filePath = parentOptionsPathAbs();
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8")) as unknown;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Unable to read parent options at ${filePath} (${msg})`);
  }
  cached = ParentOptionsSchema.parse(raw);
  return cached;
}

export function getPersona(key: string, options: ParentOptions = loadParentOptions()): Persona {
  const hit = options.personas.find((p) => p.key === key);
  if (hit) return hit;
  const fallback = options.personas.find((p) => p.key === DEFAULT_PERSONA) ?? options.personas[0];
  if (!fallback) throw new Error("parent_options.json declares no personas");
  return fallback;
}

/** Prompt additions for known value keys, one per line, in the order given. Unknown keys are skipped. */
export function valuesPrompt(keys: readonly string[], options: ParentOptions = loadParentOptions()): string {
  return keys
    .map((key) => options.values.find((v) => v.key === key)?.prompt_addition)
    .filter((line): line is string => typeof line === "string")
    .join("\n");
}

export function interestsPrompt(keys: readonly string[], options: ParentOptions = loadParentOptions()): string {
  return keys
    .map((key) => options.interests.find((i) => i.key === key)?.prompt_addition)
    .filter((line): line is string => typeof line === "string")
    .join("\n");
}

export function normalizeParentSettings(input: ParentSettingsInput = {}): ParentSettings {
  return {
    persona: input.persona ?? DEFAULT_PERSONA,
    values: input.values ?? [...DEFAULT_VALUES],
    interests: input.interests ?? [],
    child_name: input.child_name ?? "",
    custom_elements: input.custom_elements ?? ""
  };
}

/**
 * Block appended to the storyteller's base instructions.
 * Order: persona, values, interests, child name, custom elements.
 */
export function buildStyleInstructions(settings: ParentSettings, options: ParentOptions = loadParentOptions()): string {
  const persona = getPersona(settings.persona, options);
  let out = `Story Style: ${persona.name} - ${persona.description}`;
  out += `\nTone: ${persona.tone}`;

  const values = valuesPrompt(settings.values, options);
  if (values) out += `\n\nValues to emphasize:\n${values}`;

  const interests = interestsPrompt(settings.interests, options);
  if (interests) out += `\n\nInterests to include:\n${interests}`;

  if (settings.child_name.trim()) {
    out += `\n\nConsider using the name '${settings.child_name.trim()}' for a character if appropriate.`;
  }
  if (settings.custom_elements.trim()) {
    out += `\n\nAdditional elements: ${settings.custom_elements.trim()}`;
  }
  return out;
}

export function resolveStorytellerTemperature(settings: ParentSettings | null, override?: number): number {
  if (typeof override === "number") return override;
  if (settings) return getPersona(settings.persona).storyteller_temperature;
  return DEFAULT_STORYTELLER_TEMPERATURE;
}
