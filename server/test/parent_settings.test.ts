import { describe, expect, it } from "vitest";
import {
  buildStyleInstructions,
  getPersona,
  interestsPrompt,
  loadParentOptions,
  normalizeParentSettings,
  resolveStorytellerTemperature,
  valuesPrompt
} from "../src/pipeline/parent_settings.js";

describe("pipeline/parent_settings", () => {
  it("loads the option tables in declared order", () => {
    const options = loadParentOptions();
    expect(options.personas.map((p) => p.key)).toEqual([
      "adventurous_explorer",
      "creative_dreamer",
      "gentle_friend",
      "curious_learner",
      "balanced_storyteller"
    ]);
    expect(options.values).toHaveLength(7);
    expect(options.interests).toHaveLength(8);
  });

  it("falls back to the balanced storyteller for an unknown persona", () => {
    expect(getPersona("pirate_captain").key).toBe("balanced_storyteller");
    expect(getPersona("creative_dreamer").tone).toBe("mystical but not scary");
  });

  it("fills defaults", () => {
    expect(normalizeParentSettings()).toEqual({
      persona: "balanced_storyteller",
      values: ["kindness", "friendship"],
      interests: [],
      child_name: "",
      custom_elements: ""
    });
  });

  it("joins known prompt fragments and skips unknown keys", () => {
    expect(valuesPrompt(["kindness", "made_up", "friendship"])).toBe(
      "The story should emphasize kindness, helping others, and being considerate.\nThe story should highlight the importance of friendship, working together, and supporting each other."
    );
    expect(interestsPrompt(["made_up"])).toBe("");
  });

  it("builds the style block as persona, values, interests, name, custom", () => {
    const block = buildStyleInstructions({
      persona: "curious_learner",
      values: ["courage", "made_up"],
      interests: ["space"],
      child_name: " Ada ",
      custom_elements: "a sleepy owl"
    });
    expect(block).toBe(
      [
        "Story Style: Curious Learner - Enjoys educational stories with lessons",
        "Tone: educational and fun",
        "",
        "Values to emphasize:",
        "The story should show characters being brave, facing fears, and overcoming challenges with courage.",
        "",
        "Interests to include:",
        "Incorporate space themes like stars, planets, rockets, or friendly astronauts. Keep it age-appropriate and not scary.",
        "",
        "Consider using the name 'Ada' for a character if appropriate.",
        "",
        "Additional elements: a sleepy owl"
      ].join("\n")
    );
  });

  it("omits empty sections", () => {
    const block = buildStyleInstructions(normalizeParentSettings({ values: [] }));
    expect(block).toBe("Story Style: Balanced Storyteller - A mix of adventure, friendship, and learning\nTone: uplifting");
  });

  it("resolves storyteller temperature from override, persona, then default", () => {
    const settings = normalizeParentSettings({ persona: "adventurous_explorer" });
    expect(resolveStorytellerTemperature(settings, 0.2)).toBe(0.2);
    expect(resolveStorytellerTemperature(settings)).toBe(0.85);
    expect(resolveStorytellerTemperature(null)).toBe(0.8);
  });
});
