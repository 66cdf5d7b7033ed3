#!/usr/bin/env node
/**
 * HTTP front for the session pipeline.
 *
 * Usage:
 *   MESHSHARE_PORT=4310 npx tsx bin/meshshare-server.ts
 */

import { loadConfig } from "../src/common/config.js";
import { log } from "../src/common/logger.js";
import { createNarrator } from "../src/session/narrator.js";
import { createSessionServer } from "../src/session/server.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const app = createSessionServer({ config, sink: createNarrator() });
  await app.listen({ host: config.server.host, port: config.server.port });
  log.info("meshshare server listening", config.server);

  const shutdown = (): void => {
    app.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error("shutdown_failed", { error: err instanceof Error ? err.message : String(err) });
        process.exit(1);
      }
    );
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  log.error("server_start_failed", { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
