import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/ when run from sources, dist/src/ when built.
const repoRoot = path.basename(path.dirname(__dirname)) === "dist" ? path.resolve(__dirname, "../..") : path.resolve(__dirname, "..");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { loadConfig } = await import("./config.js");
const { createRuntime } = await import("./container.js");
const { createApp } = await import("./app.js");

const config = loadConfig();
const runtime = createRuntime(config);

if (config.generationMode === "stub") {
  console.log("server generation mode: stub (BRANDSMITH_GENERATION_MODE=stub)");
}
const unconfigured = runtime.health.providers.filter((p) => !p.configured).map((p) => p.id);
if (unconfigured.length > 0) {
  console.warn(`[providers] missing credentials for ${unconfigured.join(", ")}; those slots will use fallback designs`);
}

const app = createApp(runtime.service, { health: runtime.health, localBlobs: runtime.localBlobs });

app.listen(config.port, () => {
  console.log(`server listening on http://localhost:${config.port}`);
});
