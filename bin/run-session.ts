#!/usr/bin/env node
/**
 * Runs one sharing session over a device registry file and prints its summary.
 *
 * Usage:
 *   npx tsx bin/run-session.ts [registry.json] [--session-id <id>]
 */

import { readFile } from "node:fs/promises";
import { fileURLToPath } from "node:url";
import { loadConfig } from "../src/common/config.js";
import { isSessionError } from "../src/common/errors.js";
import { log } from "../src/common/logger.js";
import { createNarrator } from "../src/session/narrator.js";
import { SessionOrchestrator } from "../src/session/orchestrator.js";
import { parseDeviceRegistry } from "../src/session/registry.js";
import { createDevice, createSession, summarizeSession } from "../src/session/session.js";

const DEFAULT_REGISTRY = fileURLToPath(new URL("../fixtures/demo-devices.json", import.meta.url));

function getFlag(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx !== -1 && args[idx + 1]) {
    return args[idx + 1];
  }
  return undefined;
}

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  if (args.includes("--help") || args.includes("-h")) {
    console.log(`Usage: run-session [registry.json] [--session-id <id>]

Defaults to ${DEFAULT_REGISTRY}.`);
    return 0;
  }

  const registryPath = args[0] && !args[0].startsWith("--") ? args[0] : DEFAULT_REGISTRY;
  const config = loadConfig();
  const raw: unknown = JSON.parse(await readFile(registryPath, "utf8"));
  const devices = parseDeviceRegistry(raw).map((input) => createDevice(input));

  const orchestrator = new SessionOrchestrator({
    sink: createNarrator(),
    settlement: config.settlement,
    allowEmptySession: config.allowEmptySession
  });
  const session = createSession(devices, { sessionId: getFlag(args, "--session-id") });
  const outcome = await orchestrator.run(session);
  if (outcome.status === "active") {
    orchestrator.endSession(session);
  }

  console.log(JSON.stringify(summarizeSession(outcome.session, outcome.payments), null, 2));
  return outcome.status === "active" ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((err: unknown) => {
    if (isSessionError(err)) {
      log.error(err.code, err.details);
    } else {
      log.error("run_session_failed", { error: err instanceof Error ? err.message : String(err) });
    }
    process.exitCode = 1;
  });
