import { describe, expect, it, vi } from "vitest";
import { FALLBACK_INSTRUCTIONS } from "../src/pipeline/agents.js";
import { OllamaBackup } from "../src/pipeline/local_backup.js";

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function requestBody(init: RequestInit | undefined): unknown {
  return typeof init?.body === "string" ? JSON.parse(init.body) : null;
}

describe("pipeline/local_backup", () => {
  it("trims trailing slashes from the host", () => {
    expect(new OllamaBackup({ host: "http://ollama.test:11434//" }).host).toBe("http://ollama.test:11434");
  });

  it("reports installed models", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({ models: [{ name: "llama3.2:latest" }, { name: "mistral" }] }));
    const logs: string[] = [];
    const backup = new OllamaBackup({ host: "http://ollama.test", fetchImpl, log: (m) => logs.push(m) });

    expect(await backup.checkAvailable()).toEqual({ available: true, models: ["llama3.2:latest", "mistral"] });
    expect(fetchImpl.mock.calls[0]?.[0]).toBe("http://ollama.test/api/tags");
    expect(logs).toEqual([]);
  });

  it("warns when the configured model is not installed", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({ models: [{ name: "mistral" }] }));
    const logs: string[] = [];
    const backup = new OllamaBackup({ model: "llama3.2", fetchImpl, log: (m) => logs.push(m) });

    expect((await backup.checkAvailable()).available).toBe(true);
    expect(logs).toEqual(["Model 'llama3.2' not found in Ollama. Available models: mistral"]);
  });

  it("is unavailable when the server cannot be reached", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => {
      throw new Error("connect ECONNREFUSED");
    });
    expect(await new OllamaBackup({ fetchImpl }).checkAvailable()).toEqual({
      available: false,
      models: [],
      error: "connect ECONNREFUSED"
    });
  });

  it("posts a non-streaming generate request", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => json({ response: "  A calm story.  " }));
    const backup = new OllamaBackup({ host: "http://ollama.test", model: "llama-test", fetchImpl });

    const res = await backup.invoke("Tell a story", { instructions: "Be gentle.", temperature: 0.4, maxOutputTokens: 256 });

    expect(res).toEqual({ text: "A calm story.", valid: true });
    const [url, init] = fetchImpl.mock.calls[0] ?? [];
    expect(url).toBe("http://ollama.test/api/generate");
    expect(init?.method).toBe("POST");
    expect(requestBody(init)).toEqual({
      model: "llama-test",
      prompt: "Be gentle.\n\nTell a story",
      stream: false,
      options: { temperature: 0.4, top_p: 0.95, num_predict: 256 }
    });
  });

  it("maps HTTP errors and empty output to invalid results", async () => {
    const failing = new OllamaBackup({ fetchImpl: vi.fn<typeof fetch>(async () => new Response("model not loaded", { status: 500 })) });
    const empty = new OllamaBackup({ fetchImpl: vi.fn<typeof fetch>(async () => json({ response: "  " })) });
    const opts = { instructions: "", temperature: 0.8, maxOutputTokens: 100 };

    expect(await failing.invoke("x", opts)).toEqual({ text: "", valid: false, error: "Ollama HTTP 500: model not loaded" });
    expect(await empty.invoke("x", opts)).toEqual({ text: "", valid: false, error: "Empty response" });
  });

  it("generates a story from the plain request", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async (input) =>
      String(input).endsWith("/api/tags") ? json({ models: [{ name: "llama3.2" }] }) : json({ response: "Owl sang softly." })
    );
    const logs: string[] = [];
    const backup = new OllamaBackup({ fetchImpl, log: (m) => logs.push(m) });

    const attempt = await backup.generateStory("An owl story");

    expect(attempt).toEqual({ story: "Owl sang softly.", is_valid: true, model: "llama3.2" });
    expect(requestBody(fetchImpl.mock.calls[1]?.[1])).toMatchObject({
      prompt: `${FALLBACK_INSTRUCTIONS}\n\nGenerate a bedtime story based on this request: An owl story`,
      options: { temperature: 0.8, num_predict: 2000 }
    });
    expect(logs).toEqual(["Using Ollama model: llama3.2"]);
  });

  it("skips generation when Ollama is unavailable", async () => {
    const fetchImpl = vi.fn<typeof fetch>(async () => new Response("", { status: 503 }));
    const attempt = await new OllamaBackup({ fetchImpl }).generateStory("An owl story");
    expect(attempt).toEqual({ story: "", is_valid: false, model: "llama3.2", error: "Ollama not available" });
    expect(fetchImpl).toHaveBeenCalledTimes(1);
  });
});
