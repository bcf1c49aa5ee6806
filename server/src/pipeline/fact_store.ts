import { readFileSync } from "node:fs";
import path from "node:path";
import { assetsRootAbs } from "./utils.js";
import { KnowledgeBaseSchema, type KnowledgeBase } from "./schemas.js";

const KNOWLEDGE_BASE_FILE = "knowledge_base.json";
const SUGGESTED_TOPICS_MAX = 10;

export type Fact = Readonly<{
  category: string;
  topic: string;
  text: string;
}>;

export type TopicAlias = Readonly<{
  alias: string;
  topic: string;
}>;

export type FactCategory = Readonly<{
  name: string;
  keywords: readonly string[];
  topics: readonly string[];
}>;

function normalizeTopic(topic: string): string {
  return topic.trim().toLowerCase();
}

/**
 * Read-only category -> topic -> fact table.
 *
 * Lookups are exact (case-insensitive, trimmed). Fuzzy matching lives in the topic resolver.
 */
export class FactStore {
  private readonly facts: readonly Fact[];
  private readonly byTopic: ReadonlyMap<string, Fact>;
  private readonly categoryList: readonly FactCategory[];
  private readonly aliasList: readonly TopicAlias[];

  constructor(kb: KnowledgeBase) {
    const facts: Fact[] = [];
    const categories: FactCategory[] = [];
    for (const category of kb.categories) {
      const topics: string[] = [];
      for (const entry of category.facts) {
        const topic = normalizeTopic(entry.topic);
        facts.push(Object.freeze({ category: category.name, topic, text: entry.text }));
        topics.push(topic);
      }
      categories.push(
        Object.freeze({
          name: category.name,
          keywords: Object.freeze(category.keywords.map((k) => k.toLowerCase())),
          topics: Object.freeze(topics)
        })
      );
    }

    const byTopic = new Map<string, Fact>();
    for (const fact of facts) {
      // First declaration wins if a topic is listed twice.
      if (!byTopic.has(fact.topic)) byTopic.set(fact.topic, fact);
    }

    this.facts = Object.freeze(facts);
    this.byTopic = byTopic;
    this.categoryList = Object.freeze(categories);
    this.aliasList = Object.freeze(
      kb.aliases.map((a) => Object.freeze({ alias: a.alias.toLowerCase(), topic: normalizeTopic(a.topic) }))
    );
  }

  lookup(topic: string): Fact | null {
    return this.byTopic.get(normalizeTopic(topic)) ?? null;
  }

  has(topic: string): boolean {
    return this.byTopic.has(normalizeTopic(topic));
  }

  /**
   * Text handed to the storyteller for a topic. A miss is not an error: it yields a
   * "did you mean" message listing known topics.
   */
  factText(topic: string): string {
    const hit = this.lookup(topic);
    if (hit) return hit.text;
    const suggestions = this.allTopics().slice(0, SUGGESTED_TOPICS_MAX);
    return `I don't have specific facts about '${topic}' yet. Available topics include: ${suggestions.join(", ")}. I'll use general knowledge to make the story educational!`;
  }

  allTopics(): string[] {
    return this.facts.map((f) => f.topic);
  }

  categories(): readonly FactCategory[] {
    return this.categoryList;
  }

  category(name: string): FactCategory | null {
    return this.categoryList.find((c) => c.name === name) ?? null;
  }

  topicsIn(category: string): readonly string[] {
    return this.category(category)?.topics ?? [];
  }

  firstTopicOf(category: string): string | null {
    return this.category(category)?.topics[0] ?? null;
  }

  aliases(): readonly TopicAlias[] {
    return this.aliasList;
  }
}

export function knowledgeBasePathAbs(): string {
  return path.join(assetsRootAbs(), KNOWLEDGE_BASE_FILE);
}

export function parseKnowledgeBase(raw: unknown): KnowledgeBase {
  return KnowledgeBaseSchema.parse(raw);
}

let cached: FactStore | null = null;

export function loadFactStore(): FactStore {
  if (cached) return cached;
  const filePath = knowledgeBasePathAbs();
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8")) as unknown;
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    throw new Error(`Unable to read knowledge base at ${filePath} (${msg})`);
  }
  cached = new FactStore(parseKnowledgeBase(raw));
  return cached;
}
