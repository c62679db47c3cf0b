import "dotenv/config";
import { serve } from "@hono/node-server";
import { createApp } from "./app";
import { loadCategoryCatalog } from "./config/categories";
import { readConfig } from "./config/env";

async function main(): Promise<void> {
  const config = readConfig();
  const catalog = await loadCategoryCatalog(config.categoryCatalogPath);
  const app = createApp({ catalog, uploadRowLimit: config.uploadRowLimit });

  serve({
    fetch: app.fetch,
    port: config.port,
  });

  console.log(
    `🚀 Server listening on http://localhost:${config.port} (category catalog v${catalog.version}, ${catalog.categories.length} categories)`,
  );
}

main().catch((error) => {
  console.error("❌ Failed to start server:", error);
  process.exit(1);
});
