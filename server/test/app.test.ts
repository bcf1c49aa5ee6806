import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import request from "supertest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { createApp } from "../src/app.js";
import type { StoryRequest, StoryResponse } from "../src/story_service.js";
import { JsonStoryStore } from "../src/story_store.js";
import { sampleResult } from "./fakes.js";

let tmpData: string | null = null;
let store: JsonStoryStore;

beforeEach(async () => {
  tmpData = await fs.mkdtemp(path.join(os.tmpdir(), "bss-data-"));
  store = new JsonStoryStore(tmpData);
});

afterEach(async () => {
  if (tmpData) await fs.rm(tmpData, { recursive: true, force: true }).catch(() => undefined);
  tmpData = null;
});

function makeService(response?: Partial<StoryResponse>) {
  const generate = vi.fn(async (input: StoryRequest): Promise<StoryResponse> => ({
    result: sampleResult({ user_request: input.request }),
    story_id: "a-fox-story-abcd1234",
    generation_time_seconds: 1.25,
    events: [],
    ...(response ?? {})
  }));
  return { generate };
}

const ENV = { OPENAI_API_KEY: "test-secret", BSS_MODEL: "gpt-test" };
const checkFallback = async () => ({ available: true, models: ["llama3.2:latest"] });

describe("server app", () => {
  it("GET /api/health", async () => {
    const app = createApp(makeService(), store, { env: ENV, checkFallback });
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      ok: true,
      has_openai_key: true,
      model: "gpt-test",
      fallback_model: "llama3.2",
      ollama_host: "http://127.0.0.1:11434",
      ollama_available: true,
      ollama_models: ["llama3.2:latest"]
    });
  });

  it("GET /api/health reports a missing key", async () => {
    const app = createApp(makeService(), store, { env: { OPENAI_API_KEY: "  " }, checkFallback });
    const res = await request(app).get("/api/health");
    expect(res.body).toHaveProperty("has_openai_key", false);
  });

  it("GET /api/health fails on a broken configuration", async () => {
    const app = createApp(makeService(), store, { env: { BSS_MAX_REVISIONS: "lots" }, checkFallback });
    const res = await request(app).get("/api/health");
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "BSS_MAX_REVISIONS must be a number (got 'lots')" });
  });

  it("GET /api/options", async () => {
    const app = createApp(makeService(), store, { env: ENV, checkFallback });
    const res = await request(app).get("/api/options");
    expect(res.status).toBe(200);
    expect(res.body.personas).toHaveLength(5);
    expect(res.body.defaults).toEqual({ persona: "balanced_storyteller", values: ["kindness", "friendship"], interests: [] });
  });

  it("POST /api/stories validates the body", async () => {
    const service = makeService();
    const app = createApp(service, store, { env: ENV, checkFallback });

    const short = await request(app).post("/api/stories").send({ request: " a " });
    const extra = await request(app).post("/api/stories").send({ request: "A fox story", mood: "happy" });

    expect(short.status).toBe(400);
    expect(extra.status).toBe(400);
    expect(service.generate).not.toHaveBeenCalled();
  });

  it("POST /api/stories generates a story", async () => {
    const service = makeService();
    const app = createApp(service, store, { env: ENV, checkFallback });

    const res = await request(app)
      .post("/api/stories")
      .send({ request: "  A fox story  ", parent_settings: { persona: "gentle_friend" }, overrides: { max_revisions: 2 } });

    expect(res.status).toBe(200);
    expect(res.body.story_id).toBe("a-fox-story-abcd1234");
    expect(res.body.result.user_request).toBe("A fox story");
    expect(service.generate).toHaveBeenCalledWith({
      request: "A fox story",
      parent_settings: { persona: "gentle_friend" },
      overrides: { max_revisions: 2 }
    });
  });

  it("POST /api/stories returns 502 when every generator failed", async () => {
    const failed = sampleResult({ error: "Ollama not available", model_used: "none" });
    const app = createApp(makeService({ result: failed, story_id: null }), store, { env: ENV, checkFallback });
    const res = await request(app).post("/api/stories").send({ request: "A fox story" });
    expect(res.status).toBe(502);
    expect(res.body.result.error).toBe("Ollama not available");
  });

  it("POST /api/stories returns 500 when the service throws", async () => {
    const generate = vi.fn(async (): Promise<StoryResponse> => {
      throw new Error("Invalid generation config: max_revisions: too small");
    });
    const app = createApp({ generate }, store, { env: ENV, checkFallback });
    const res = await request(app).post("/api/stories").send({ request: "A fox story" });
    expect(res.status).toBe(500);
    expect(res.body).toEqual({ error: "Invalid generation config: max_revisions: too small" });
  });

  it("lists, reads and deletes stored stories", async () => {
    const app = createApp(makeService(), store, { env: ENV, checkFallback });
    const first = await store.saveStory(sampleResult({ user_request: "first" }), "2026-01-01T00:00:00.000Z");
    await store.saveStory(sampleResult({ user_request: "second" }), "2026-01-02T00:00:00.000Z");
    if (!first.ok) throw new Error(first.error);

    const list = await request(app).get("/api/stories?limit=1");
    expect(list.status).toBe(200);
    expect(list.body.map((s: { user_request: string }) => s.user_request)).toEqual(["second"]);

    const bad = await request(app).get("/api/stories?limit=0");
    expect(bad.status).toBe(400);

    const one = await request(app).get(`/api/stories/${first.id}`);
    expect(one.status).toBe(200);
    expect(one.body.user_request).toBe("first");

    const del = await request(app).delete(`/api/stories/${first.id}`);
    expect(del.body).toEqual({ ok: true });

    const gone = await request(app).get(`/api/stories/${first.id}`);
    expect(gone.status).toBe(404);
    expect(gone.body).toEqual({ error: "story not found" });

    const again = await request(app).delete(`/api/stories/${first.id}`);
    expect(again.status).toBe(404);
  });

  it("GET /api/stories/stats and DELETE /api/stories", async () => {
    const app = createApp(makeService(), store, { env: ENV, checkFallback });
    await store.saveStory(sampleResult({ judge_score: 9 }));

    const stats = await request(app).get("/api/stories/stats");
    expect(stats.body).toMatchObject({ total_stories: 1, average_judge_score: 9 });

    const cleared = await request(app).delete("/api/stories");
    expect(cleared.body).toEqual({ ok: true, deleted_stories: 1, deleted_runs: 0 });
  });
});
