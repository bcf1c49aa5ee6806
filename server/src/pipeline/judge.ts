import { JUDGE_INSTRUCTIONS } from "./agents.js";
import { parseKeyValueLines, parseScore, trailingSection } from "./line_format.js";
import type { EvaluationRecord } from "./schemas.js";
import type { TextGenerator } from "./text_generator.js";
import { errorMessage } from "./utils.js";

export const DEFAULT_JUDGE_TEMPERATURE = 0.2;
export const DEFAULT_JUDGE_MAX_TOKENS = 1000;
export const DEFAULT_QUALITY_THRESHOLD = 7.0;

const UNPARSED_SCORE = 7.0;
const FAILURE_SCORE = 5.0;

export type StoryJudgeOptions = {
  threshold?: number;
  temperature?: number;
  maxOutputTokens?: number;
};

export function buildEvaluationPrompt(story: string, originalRequest: string): string {
  return `Evaluate this bedtime story:

User Request: ${originalRequest}

Story:
${story}

Please provide:
1. Overall score (1-10)
2. Scores for each criterion (age-appropriateness, educational value, narrative quality, safety, engagement, structure)
3. Detailed feedback
4. Verdict: "APPROVED" if overall score >= 7, "NEEDS_REVISION" otherwise

Format your response as:
OVERALL_SCORE: X/10
AGE_APPROPRIATENESS: X/10
EDUCATIONAL_VALUE: X/10
NARRATIVE_QUALITY: X/10
SAFETY: X/10
ENGAGEMENT: X/10
STRUCTURE: X/10
VERDICT: APPROVED/NEEDS_REVISION
FEEDBACK: [detailed feedback here]
`;
}

export function buildRevisionPrompt(story: string, feedback: string, originalRequest: string): string {
  return `Please revise this story based on the judge's feedback:

Original Request: ${originalRequest}

Current Story:
${story}

Judge Feedback:
${feedback}

Please improve the story while maintaining the core narrative and educational elements.`;
}

export function parseEvaluation(text: string, threshold: number): EvaluationRecord {
  const fields = parseKeyValueLines(text);
  const overall = parseScore(fields.OVERALL_SCORE, UNPARSED_SCORE);
  const verdictLine = (fields.VERDICT ?? "").toUpperCase().replace(/\s+/g, "_");
  return {
    overall_score: overall,
    verdict: verdictLine.includes("NEEDS_REVISION") ? "NEEDS_REVISION" : "APPROVED",
    meets_threshold: overall >= threshold,
    feedback: trailingSection(text, "FEEDBACK") ?? text,
    raw_response: text,
    ok: true
  };
}

export function failedEvaluation(reason: string): EvaluationRecord {
  return {
    overall_score: FAILURE_SCORE,
    verdict: "NEEDS_REVISION",
    meets_threshold: false,
    feedback: `Error during evaluation: ${reason}`,
    raw_response: "",
    ok: false,
    error: reason
  };
}

/**
 * Scores a story against the six-criterion rubric. `meets_threshold` is derived from the
 * numeric score only; the verdict line is informational.
 */
export class StoryJudge {
  readonly threshold: number;
  private readonly temperature: number;
  private readonly maxOutputTokens: number;

  constructor(
    private readonly generator: TextGenerator,
    options: StoryJudgeOptions = {}
  ) {
    this.threshold = options.threshold ?? DEFAULT_QUALITY_THRESHOLD;
    this.temperature = options.temperature ?? DEFAULT_JUDGE_TEMPERATURE;
    this.maxOutputTokens = options.maxOutputTokens ?? DEFAULT_JUDGE_MAX_TOKENS;
  }

  async evaluate(story: string, originalRequest: string, signal?: AbortSignal): Promise<EvaluationRecord> {
    try {
      const res = await this.generator.invoke(buildEvaluationPrompt(story, originalRequest), {
        name: "Story Judge",
        instructions: JUDGE_INSTRUCTIONS,
        temperature: this.temperature,
        maxOutputTokens: this.maxOutputTokens,
        signal
      });
      if (!res.valid) return failedEvaluation(res.error ?? "Empty response");
      return parseEvaluation(res.text, this.threshold);
    } catch (err) {
      return failedEvaluation(errorMessage(err));
    }
  }
}
