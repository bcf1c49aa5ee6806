import fs from "node:fs/promises";
import type { Dirent } from "node:fs";
import path from "node:path";
import { randomBytes } from "node:crypto";
import {
  StoredRunSchema,
  StoredStorySchema,
  type GenerationResult,
  type RunRecord,
  type StoredRun,
  type StoredStory
} from "./pipeline/schemas.js";
import { dataRootAbs, errorMessage, isSafeRecordId, nowIso, slug, tryReadJsonFile, writeJsonFile } from "./pipeline/utils.js";

export type Saved = { ok: true; id: string } | { ok: false; error: string };

export type StoryStatistics = {
  total_stories: number;
  total_runs: number;
  successful_runs: number;
  failed_runs: number;
  average_judge_score: number;
  stories_by_model: Record<string, number>;
  mcp_enabled_count: number;
  fallback_used_count: number;
};

export type ClearAllResult = { deleted_stories: number; deleted_runs: number };

/** Persistence sink. Writes report failure through `Saved` instead of throwing. */
export interface StoryStore {
  saveStory(result: GenerationResult, timestamp?: string): Promise<Saved>;
  saveRun(run: RunRecord): Promise<Saved>;
  listStories(limit?: number): Promise<StoredStory[]>;
  getStory(id: string): Promise<StoredStory | null>;
  deleteStory(id: string): Promise<boolean>;
  clearAll(): Promise<ClearAllResult>;
  statistics(): Promise<StoryStatistics>;
}

const ID_SLUG_MAX = 48;
const ID_SUFFIX_LEN = 8;
const ID_MAX_ATTEMPTS = 10;
const ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (const b of bytes) {
    out += ID_SUFFIX_ALPHABET[b % ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

function newestFirst<T extends { id: string; timestamp: string }>(a: T, b: T): number {
  if (a.timestamp !== b.timestamp) return a.timestamp < b.timestamp ? 1 : -1;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * One JSON file per record: `<root>/stories/<id>.json` and `<root>/runs/<id>.json`.
 * Unreadable or schema-invalid files are skipped on read.
 */
export class JsonStoryStore implements StoryStore {
  readonly rootDir: string;

  constructor(rootDir: string = dataRootAbs()) {
    this.rootDir = path.resolve(rootDir);
  }

  private storiesDir(): string {
    return path.join(this.rootDir, "stories");
  }

  private runsDir(): string {
    return path.join(this.rootDir, "runs");
  }

  private async nextId(dir: string, text: string): Promise<string> {
    const base = slug(text).slice(0, ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < ID_MAX_ATTEMPTS; attempt++) {
      const id = `${base}-${randomSuffix(ID_SUFFIX_LEN)}`;
      const exists = await fs
        .stat(path.join(dir, `${id}.json`))
        .then(() => true)
        .catch(() => false);
      if (!exists) return id;
    }
    throw new Error("Unable to allocate unique id after retries");
  }

  async saveStory(result: GenerationResult, timestamp: string = nowIso()): Promise<Saved> {
    try {
      const id = await this.nextId(this.storiesDir(), result.user_request);
      const record = StoredStorySchema.parse({ ...result, id, timestamp });
      await writeJsonFile(path.join(this.storiesDir(), `${id}.json`), record);
      return { ok: true, id };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  async saveRun(run: RunRecord): Promise<Saved> {
    try {
      const id = await this.nextId(this.runsDir(), run.user_request);
      const record = StoredRunSchema.parse({ ...run, id });
      await writeJsonFile(path.join(this.runsDir(), `${id}.json`), record);
      return { ok: true, id };
    } catch (err) {
      return { ok: false, error: errorMessage(err) };
    }
  }

  async listStories(limit?: number): Promise<StoredStory[]> {
    const stories = await this.readAll(this.storiesDir(), (raw) => {
      const parsed = StoredStorySchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    });
    stories.sort(newestFirst);
    return typeof limit === "number" ? stories.slice(0, Math.max(0, Math.floor(limit))) : stories;
  }

  async listRuns(): Promise<StoredRun[]> {
    return this.readAll(this.runsDir(), (raw) => {
      const parsed = StoredRunSchema.safeParse(raw);
      return parsed.success ? parsed.data : null;
    });
  }

  async getStory(id: string): Promise<StoredStory | null> {
    if (!isSafeRecordId(id)) return null;
    const raw = await tryReadJsonFile<unknown>(path.join(this.storiesDir(), `${id}.json`));
    if (raw === null) return null;
    const parsed = StoredStorySchema.safeParse(raw);
    return parsed.success ? parsed.data : null;
  }

  async deleteStory(id: string): Promise<boolean> {
    if (!isSafeRecordId(id)) return false;
    const filePath = path.join(this.storiesDir(), `${id}.json`);
    try {
      await fs.unlink(filePath);
      return true;
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return false;
      throw err;
    }
  }

  async clearAll(): Promise<ClearAllResult> {
    const deleted_stories = await this.clearDir(this.storiesDir());
    const deleted_runs = await this.clearDir(this.runsDir());
    return { deleted_stories, deleted_runs };
  }

  async statistics(): Promise<StoryStatistics> {
    const stories = await this.listStories();
    const runs = await this.listRuns();

    const successful = runs.filter((r) => r.success).length;
    const scoreSum = stories.reduce((sum, s) => sum + s.judge_score, 0);
    const average = stories.length > 0 ? scoreSum / stories.length : 0;

    const byModel: Record<string, number> = {};
    for (const s of stories) {
      byModel[s.model_used] = (byModel[s.model_used] ?? 0) + 1;
    }

    return {
      total_stories: stories.length,
      total_runs: runs.length,
      successful_runs: successful,
      failed_runs: runs.length - successful,
      average_judge_score: Math.round(average * 100) / 100,
      stories_by_model: byModel,
      mcp_enabled_count: stories.filter((s) => s.mcp_enabled).length,
      fallback_used_count: stories.filter((s) => s.fallback_used).length
    };
  }

  private async jsonFiles(dir: string): Promise<string[]> {
    const entries = await fs.readdir(dir, { withFileTypes: true }).catch((): Dirent[] => []);
    return entries.filter((e) => e.isFile() && e.name.endsWith(".json")).map((e) => path.join(dir, e.name));
  }

  private async readAll<T>(dir: string, parse: (raw: unknown) => T | null): Promise<T[]> {
    const out: T[] = [];
    for (const filePath of await this.jsonFiles(dir)) {
      const raw = await tryReadJsonFile<unknown>(filePath);
      if (raw === null) continue;
      const item = parse(raw);
      if (item) out.push(item);
    }
    return out;
  }

  private async clearDir(dir: string): Promise<number> {
    const files = await this.jsonFiles(dir);
    for (const filePath of files) {
      await fs.rm(filePath, { force: true });
    }
    return files.length;
  }
}
