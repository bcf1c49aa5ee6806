#!/usr/bin/env node
import dotenv from "dotenv";
import path from "node:path";
import { repoRoot } from "./pipeline/utils.js";

dotenv.config({ path: path.join(repoRoot(), ".env") });

const { runCli } = await import("./story_cli.js");
const { StoryService } = await import("./story_service.js");
const { JsonStoryStore } = await import("./story_store.js");

const service = new StoryService({ store: new JsonStoryStore() });
process.exitCode = await runCli(process.argv.slice(2), service, {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line)
});
