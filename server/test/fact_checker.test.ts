import { describe, expect, it } from "vitest";
import { FACT_CHECKER_INSTRUCTIONS } from "../src/pipeline/agents.js";
import { FactChecker, buildVerificationPrompt } from "../src/pipeline/fact_checker.js";
import { ScriptedGenerator, VERIFIED_REPLY, invalid, ok } from "./fakes.js";

const FACT = "The Moon takes about 27.3 days to orbit Earth.";

describe("pipeline/fact_checker", () => {
  it("sends the verification prompt at low temperature", async () => {
    const gen = new ScriptedGenerator([VERIFIED_REPLY]);
    await new FactChecker(gen).verify(FACT, "moon");

    expect(gen.calls).toHaveLength(1);
    expect(gen.calls[0]?.prompt).toBe(buildVerificationPrompt(FACT, "moon"));
    expect(gen.calls[0]?.options).toMatchObject({
      instructions: FACT_CHECKER_INSTRUCTIONS,
      temperature: 0.2,
      maxOutputTokens: 500
    });
  });

  it("parses a verified response", async () => {
    const record = await new FactChecker(new ScriptedGenerator([VERIFIED_REPLY])).verify(FACT, "moon");
    expect(record).toMatchObject({
      fact: FACT,
      topic: "moon",
      accuracy: "true",
      score: 9,
      age_appropriate: true,
      concerns: "None",
      verdict: "VERIFIED",
      is_verified: true,
      ok: true
    });
  });

  it("reads partially_true before true", async () => {
    const gen = new ScriptedGenerator([
      ok("ACCURACY: partially_true\nSCORE: 6/10\nAGE_APPROPRIATE: no\nCONCERNS: Rounded figure\nVERDICT: NEEDS_CORRECTION")
    ]);
    const record = await new FactChecker(gen).verify(FACT, "moon");
    expect(record).toMatchObject({
      accuracy: "partially_true",
      score: 6,
      age_appropriate: false,
      concerns: "Rounded figure",
      verdict: "NEEDS_CORRECTION",
      is_verified: false
    });
  });

  it("detects an inaccurate verdict", async () => {
    const gen = new ScriptedGenerator([ok("ACCURACY: false\nVERDICT: INACCURATE")]);
    const record = await new FactChecker(gen).verify(FACT, "moon");
    expect(record.accuracy).toBe("false");
    expect(record.verdict).toBe("INACCURATE");
    expect(record.is_verified).toBe(false);
  });

  it("falls back to defaults for missing keys", async () => {
    const record = await new FactChecker(new ScriptedGenerator([ok("Looks fine to me.")])).verify(FACT, "moon");
    expect(record).toEqual({
      fact: FACT,
      topic: "moon",
      accuracy: "unknown",
      score: 7,
      age_appropriate: true,
      concerns: "",
      verdict: "VERIFIED",
      is_verified: true,
      ok: true,
      raw_response: "Looks fine to me."
    });
  });

  it("lets the fact through when the generator throws", async () => {
    const record = await new FactChecker(new ScriptedGenerator([new Error("network down")])).verify(FACT, "moon");
    expect(record).toEqual({
      fact: FACT,
      topic: "moon",
      accuracy: "unknown",
      score: 5,
      age_appropriate: true,
      concerns: "Verification failed: network down",
      verdict: "VERIFIED",
      is_verified: true,
      ok: false,
      error: "network down"
    });
  });

  it("treats an invalid result as a failure", async () => {
    const record = await new FactChecker(new ScriptedGenerator([invalid("quota exceeded")])).verify(FACT, "moon");
    expect(record.ok).toBe(false);
    expect(record.is_verified).toBe(true);
    expect(record.concerns).toBe("Verification failed: quota exceeded");
  });

  it("verifies many facts in order", async () => {
    const gen = new ScriptedGenerator([
      (prompt) => (prompt.includes("Topic: sharks") ? ok("VERDICT: INACCURATE") : ok("VERDICT: VERIFIED"))
    ]);
    const records = await new FactChecker(gen).verifyMany([
      { fact: "Sharks have no bones.", topic: "sharks" },
      { fact: FACT, topic: "moon" }
    ]);
    expect(records.map((r) => [r.topic, r.verdict])).toEqual([
      ["sharks", "INACCURATE"],
      ["moon", "VERIFIED"]
    ]);
  });
});
