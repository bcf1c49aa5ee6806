import { parseArgs } from "node:util";
import { ConfigError, GenerationOverridesSchema, type GenerationOverrides } from "./config.js";
import { formatLogEvent } from "./generation_log.js";
import { ParentSettingsInputSchema, type ParentSettingsInput } from "./pipeline/schemas.js";
import { errorMessage } from "./pipeline/utils.js";
import type { StoryRequest, StoryResponse, StoryService } from "./story_service.js";

export const USAGE = `Usage: bedtime-story "<request>" [options]

Options:
  --persona <key>         Storyteller persona (default: balanced_storyteller)
  --value <key>           Value to emphasize; repeatable (default: kindness, friendship)
  --interest <key>        Interest to include; repeatable
  --name <name>           Child's name to use for a character
  --custom <text>         Additional story elements
  --no-facts              Skip educational fact augmentation
  --no-verify             Use facts without verifying them
  --max-revisions <n>     Generation attempts including the first (default: 3)
  --threshold <x>         Judge score needed to accept a story (default: 7)
  --json                  Print the full result as JSON
  -h, --help              Show this help`;

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export type CliCommand = { kind: "help" } | { kind: "generate"; input: StoryRequest; json: boolean };

function numberFlag(name: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (raw.trim() === "" || !Number.isFinite(n)) throw new CliUsageError(`--${name} expects a number (got '${raw}')`);
  return n;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      allowPositionals: true,
      strict: true,
      options: {
        persona: { type: "string" },
        value: { type: "string", multiple: true },
        interest: { type: "string", multiple: true },
        name: { type: "string" },
        custom: { type: "string" },
        "no-facts": { type: "boolean" },
        "no-verify": { type: "boolean" },
        "max-revisions": { type: "string" },
        threshold: { type: "string" },
        json: { type: "boolean" },
        help: { type: "boolean", short: "h" }
      }
    });
  } catch (err) {
    throw new CliUsageError(errorMessage(err));
  }
}

export function parseCliArgs(argv: readonly string[]): CliCommand {
  const { values, positionals } = readArgs(argv);
  if (values.help) return { kind: "help" };

  const request = positionals.join(" ").trim();
  if (!request) throw new CliUsageError("A story request is required");

  const settings: ParentSettingsInput = {};
  if (values.persona !== undefined) settings.persona = values.persona;
  if (values.value !== undefined) settings.values = values.value;
  if (values.interest !== undefined) settings.interests = values.interest;
  if (values.name !== undefined) settings.child_name = values.name;
  if (values.custom !== undefined) settings.custom_elements = values.custom;
  const settingsParsed = ParentSettingsInputSchema.safeParse(settings);
  if (!settingsParsed.success) throw new CliUsageError(settingsParsed.error.issues.map((i) => i.message).join("; "));

  const overrides: GenerationOverrides = {};
  if (values["no-facts"]) overrides.enable_facts = false;
  if (values["no-verify"]) overrides.verify_facts = false;
  const maxRevisions = numberFlag("max-revisions", values["max-revisions"]);
  if (maxRevisions !== undefined) overrides.max_revisions = maxRevisions;
  const threshold = numberFlag("threshold", values.threshold);
  if (threshold !== undefined) overrides.quality_threshold = threshold;
  const overridesParsed = GenerationOverridesSchema.safeParse(overrides);
  if (!overridesParsed.success) {
    const details = overridesParsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new CliUsageError(details);
  }

  return {
    kind: "generate",
    input: { request, parent_settings: settingsParsed.data, overrides: overridesParsed.data },
    json: values.json ?? false
  };
}

export type CliIo = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

/** Returns the process exit code: 0 when a story came back, 1 on a failure, 2 on bad usage or configuration. */
export async function runCli(argv: readonly string[], service: Pick<StoryService, "generate">, io: CliIo): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv);
  } catch (err) {
    io.stderr(errorMessage(err));
    io.stderr(USAGE);
    return 2;
  }

  if (command.kind === "help") {
    io.stdout(USAGE);
    return 0;
  }

  let out: StoryResponse;
  try {
    out = await service.generate(command.input, (event) => io.stderr(formatLogEvent(event)));
  } catch (err) {
    io.stderr(errorMessage(err));
    return err instanceof ConfigError ? 2 : 1;
  }
  const { result } = out;

  if (command.json) {
    io.stdout(JSON.stringify(out, null, 2));
  } else {
    io.stdout(result.story);
    io.stdout("");
    io.stdout(
      `Judge score: ${result.judge_score.toFixed(1)}/10 | Revisions: ${result.revision_count} | Model: ${result.model_used} | Fallback: ${result.fallback_used ? "yes" : "no"}`
    );
    if (result.tool_calls.length > 0) {
      io.stdout(`Facts used: ${result.tool_calls.map((tc) => tc.arguments.topic).join(", ")}`);
    }
    if (out.story_id) io.stdout(`Saved as ${out.story_id}`);
  }

  return result.error ? 1 : 0;
}
