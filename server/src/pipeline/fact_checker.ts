import { FACT_CHECKER_INSTRUCTIONS } from "./agents.js";
import { parseKeyValueLines, parseScore } from "./line_format.js";
import type { VerificationRecord } from "./schemas.js";
import type { TextGenerator } from "./text_generator.js";
import { errorMessage } from "./utils.js";

const VERIFY_TEMPERATURE = 0.2;
const VERIFY_MAX_TOKENS = 500;
const DEFAULT_SCORE = 7.0;
const FAILURE_SCORE = 5.0;

export type FactToVerify = { fact: string; topic: string };

export function buildVerificationPrompt(fact: string, topic: string): string {
  return `Verify this educational fact for children (ages 5-10):

Topic: ${topic}
Fact: ${fact}

Please evaluate:
1. Is this fact accurate? (true/false/partially_true)
2. Accuracy score (1-10, where 10 is completely accurate)
3. Is it age-appropriate? (yes/no)
4. Any concerns or corrections needed?
5. Overall verdict: VERIFIED, NEEDS_CORRECTION, or INACCURATE

Format your response as:
ACCURACY: true/false/partially_true
SCORE: X/10
AGE_APPROPRIATE: yes/no
CONCERNS: [any concerns or corrections]
VERDICT: VERIFIED/NEEDS_CORRECTION/INACCURATE
`;
}

function parseAccuracy(value: string | undefined): VerificationRecord["accuracy"] {
  if (!value) return "unknown";
  const v = value.toUpperCase();
  // "partially_true" contains TRUE, so check it first.
  if (v.includes("PARTIAL")) return "partially_true";
  if (v.includes("FALSE")) return "false";
  if (v.includes("TRUE")) return "true";
  return "unknown";
}

function parseVerdict(value: string | undefined): VerificationRecord["verdict"] {
  const v = (value ?? "").toUpperCase().replace(/\s+/g, "_");
  if (v.includes("NEEDS_CORRECTION")) return "NEEDS_CORRECTION";
  if (v.includes("INACCURATE")) return "INACCURATE";
  return "VERIFIED";
}

export function parseVerification(fact: string, topic: string, text: string): VerificationRecord {
  const fields = parseKeyValueLines(text);
  const verdict = parseVerdict(fields.VERDICT);
  return {
    fact,
    topic,
    accuracy: parseAccuracy(fields.ACCURACY),
    score: parseScore(fields.SCORE, DEFAULT_SCORE),
    age_appropriate: !/\bno\b/i.test(fields.AGE_APPROPRIATE ?? ""),
    concerns: fields.CONCERNS ?? "",
    verdict,
    is_verified: verdict === "VERIFIED",
    ok: true,
    raw_response: text
  };
}

/** A verifier that cannot reach its model lets the fact through, flagged with `ok: false`. */
export function failedVerification(fact: string, topic: string, reason: string): VerificationRecord {
  return {
    fact,
    topic,
    accuracy: "unknown",
    score: FAILURE_SCORE,
    age_appropriate: true,
    concerns: `Verification failed: ${reason}`,
    verdict: "VERIFIED",
    is_verified: true,
    ok: false,
    error: reason
  };
}

export class FactChecker {
  constructor(private readonly generator: TextGenerator) {}

  async verify(fact: string, topic: string, signal?: AbortSignal): Promise<VerificationRecord> {
    try {
      const res = await this.generator.invoke(buildVerificationPrompt(fact, topic), {
        name: "Fact Checker",
        instructions: FACT_CHECKER_INSTRUCTIONS,
        temperature: VERIFY_TEMPERATURE,
        maxOutputTokens: VERIFY_MAX_TOKENS,
        signal
      });
      if (!res.valid) return failedVerification(fact, topic, res.error ?? "Empty response");
      return parseVerification(fact, topic, res.text);
    } catch (err) {
      return failedVerification(fact, topic, errorMessage(err));
    }
  }

  async verifyMany(facts: readonly FactToVerify[], signal?: AbortSignal): Promise<VerificationRecord[]> {
    const out: VerificationRecord[] = [];
    for (const item of facts) {
      out.push(await this.verify(item.fact, item.topic, signal));
    }
    return out;
  }
}
