// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import Fastify, { type FastifyInstance } from "fastify";
import { z } from "zod";
import type { MeshShareConfig } from "../common/config.js";
import { isSessionError } from "../common/errors.js";
import type { Clock, Device } from "../common/types.js";
import type { EntropySource } from "../consent/entropy.js";
import { noopSink, type SessionEventSink } from "./events.js";
import { SessionOrchestrator } from "./orchestrator.js";
import { parseDeviceRegistry } from "./registry.js";
import { createDevice, createSession, summarizeSession } from "./session.js";

const RunSessionSchema = z.object({
  sessionId: z.string().min(1).max(64).optional(),
  devices: z.unknown()
});

export interface SessionRouteDeps {
  config: MeshShareConfig;
  sink?: SessionEventSink;
  entropy?: EntropySource;
  clock?: Clock;
}

export function buildSessionRoutes(app: FastifyInstance, deps: SessionRouteDeps): void {
  const clock = deps.clock ?? Date.now;

  app.get("/health", async (_req, reply) => reply.send({ ok: true }));

  app.post("/sessions", async (req, reply) => {
    const body = RunSessionSchema.safeParse(req.body ?? {});
    if (!body.success) {
      return reply.code(400).send({ error: "invalid_request", issues: body.error.issues });
    }

    let devices: Device[];
    try {
      devices = parseDeviceRegistry(body.data.devices).map((input) => createDevice(input, clock));
    } catch (err) {
      if (isSessionError(err, "invalid_device_registry")) {
        return reply.code(400).send({ error: err.code, issues: err.details?.issues ?? [] });
      }
      throw err;
    }

    const orchestrator = new SessionOrchestrator({
      clock,
      sink: deps.sink ?? noopSink,
      entropy: deps.entropy,
      settlement: deps.config.settlement,
      allowEmptySession: deps.config.allowEmptySession
    });
    const session = createSession(devices, { sessionId: body.data.sessionId, clock });
    const outcome = await orchestrator.run(session);
    const summary = summarizeSession(outcome.session, outcome.payments);

    if (outcome.status === "aborted") {
      return reply.code(409).send({ error: outcome.reason, stage: outcome.stage, summary });
    }
    return reply.send(summary);
  });
}

export function createSessionServer(deps: SessionRouteDeps): FastifyInstance {
  const app = Fastify({ logger: false });
  buildSessionRoutes(app, deps);
  return app;
}
