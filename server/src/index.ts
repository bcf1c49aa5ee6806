import dotenv from "dotenv";
import path from "node:path";
import { repoRoot } from "./pipeline/utils.js";

dotenv.config({ path: path.join(repoRoot(), ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { createApp } = await import("./app.js");
const { portFromEnv } = await import("./config.js");
const { formatLogEvent } = await import("./generation_log.js");
const { StoryService } = await import("./story_service.js");
const { JsonStoryStore } = await import("./story_store.js");

const store = new JsonStoryStore();
const service = new StoryService({ store });
const app = createApp(
  {
    generate: (input) => service.generate(input, (event) => console.log(formatLogEvent(event)))
  },
  store
);

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port} (stories in ${store.rootDir})`);
});
