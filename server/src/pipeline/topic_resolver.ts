import { loadFactStore, type FactStore } from "./fact_store.js";

export type ResolvedFact = {
  original_topic: string;
  used_topic: string;
  category: string | null;
  fact: string;
  expanded: boolean;
  category_inferred: boolean;
};

function containsTerm(haystack: string, term: string): boolean {
  if (haystack.includes(term)) return true;
  const spaced = term.replace(/-/g, " ");
  return spaced !== term && haystack.includes(spaced);
}

/**
 * Maps free text onto canonical fact-store topics.
 *
 * Every "first match wins" rule below follows the declared order of the knowledge base
 * (aliases list, categories list, facts within a category). Reordering the JSON changes results.
 */
export class TopicResolver {
  constructor(private readonly store: FactStore = loadFactStore()) {}

  expandTopic(raw: string): string | null {
    const query = raw.trim().toLowerCase();
    if (!query) return null;

    const aliases = this.store.aliases();
    const exact = aliases.find((a) => a.alias === query);
    if (exact) return exact.topic;

    const contained = aliases.find((a) => query.includes(a.alias));
    if (contained) return contained.topic;

    if (this.store.has(query)) return query;
    return null;
  }

  inferCategory(raw: string): string | null {
    const query = raw.toLowerCase();
    for (const category of this.store.categories()) {
      if (category.keywords.some((keyword) => query.includes(keyword))) return category.name;
    }
    return null;
  }

  detectTopics(text: string): string[] {
    const haystack = text.toLowerCase();
    const detected: string[] = [];
    const add = (topic: string) => {
      if (!detected.includes(topic)) detected.push(topic);
    };

    for (const topic of this.store.allTopics()) {
      if (containsTerm(haystack, topic)) add(topic);
    }

    for (const { alias, topic } of this.store.aliases()) {
      if (haystack.includes(alias)) add(topic);
    }

    for (const category of this.store.categories()) {
      const hit = category.keywords.some((keyword) => haystack.includes(keyword));
      const representative = category.topics[0];
      if (hit && representative) add(representative);
    }

    return detected;
  }

  resolveFactWithExpansion(raw: string): ResolvedFact {
    const expanded = this.expandTopic(raw);
    const category = this.inferCategory(raw);

    let usedTopic = raw;
    if (expanded) {
      usedTopic = expanded;
    } else if (category) {
      usedTopic = this.store.firstTopicOf(category) ?? raw;
    }

    return {
      original_topic: raw,
      used_topic: usedTopic,
      category,
      fact: this.store.factText(usedTopic),
      expanded: expanded !== null,
      category_inferred: category !== null
    };
  }
}
