import { describe, expect, it } from "vitest";
import { FactStore, loadFactStore, parseKnowledgeBase } from "../src/pipeline/fact_store.js";

const MARS_FACT =
  "Mars is the fourth planet from the Sun and is known as the Red Planet due to iron oxide on its surface. A day on Mars is about 24.6 hours, similar to Earth. Mars has two small moons: Phobos and Deimos.";

describe("pipeline/fact_store", () => {
  it("looks up facts by trimmed, case-insensitive topic", () => {
    const store = loadFactStore();
    expect(store.lookup("  MARS ")).toEqual({ category: "space", topic: "mars", text: MARS_FACT });
    expect(store.has("Mars")).toBe(true);
  });

  it("does not resolve aliases on its own", () => {
    const store = loadFactStore();
    expect(store.lookup("red planet")).toBeNull();
  });

  it("returns frozen facts", () => {
    const fact = loadFactStore().lookup("moon");
    expect(fact).not.toBeNull();
    expect(Object.isFrozen(fact)).toBe(true);
  });

  it("factText suggests the first ten topics on a miss", () => {
    const store = loadFactStore();
    expect(store.factText("unicorns")).toBe(
      "I don't have specific facts about 'unicorns' yet. Available topics include: mars, moon, sun, stars, planets, t-rex, triceratops, brachiosaurus, stegosaurus, elephants. I'll use general knowledge to make the story educational!"
    );
    expect(store.factText("Mars")).toBe(MARS_FACT);
  });

  it("keeps categories and topics in declared order", () => {
    const store = loadFactStore();
    expect(store.categories().map((c) => c.name)).toEqual(["space", "dinosaurs", "animals", "ocean"]);
    expect(store.topicsIn("ocean")).toEqual(["coral", "sharks", "octopus"]);
    expect(store.topicsIn("weather")).toEqual([]);
    expect(store.firstTopicOf("animals")).toBe("elephants");
    expect(store.firstTopicOf("weather")).toBeNull();
    expect(store.allTopics()).toHaveLength(17);
  });

  it("first declaration wins for a duplicated topic", () => {
    const store = new FactStore(
      parseKnowledgeBase({
        categories: [
          { name: "a", keywords: ["alpha"], facts: [{ topic: "Comet", text: "first" }] },
          { name: "b", keywords: ["beta"], facts: [{ topic: "comet", text: "second" }] }
        ],
        aliases: [{ alias: "Tail Star", topic: "COMET" }]
      })
    );
    expect(store.lookup("comet")?.text).toBe("first");
    expect(store.aliases()).toEqual([{ alias: "tail star", topic: "comet" }]);
  });

  it("rejects a knowledge base without categories", () => {
    expect(() => parseKnowledgeBase({ categories: [], aliases: [] })).toThrow();
  });
});
