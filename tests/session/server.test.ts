import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import { loadConfig } from "../../src/common/config.js";
import type { EntropySource } from "../../src/consent/entropy.js";
import { collectingSink } from "../../src/session/events.js";
import { createSessionServer } from "../../src/session/server.js";

const MB = 1024 * 1024;
const entropy: EntropySource = { sample: (size) => new Uint8Array(size).fill(51) };

function devices(relayRssi: number) {
  return [
    { deviceId: "host", name: "Host", role: "host", rssiDbm: -65, bandwidthMbps: 10, bytesSent: 5 * MB, bytesReceived: 2 * MB },
    { deviceId: "client-a", name: "Client A", role: "client", rssiDbm: -72, bytesSent: MB, bytesReceived: 10 * MB },
    { deviceId: "client-b", name: "Client B", role: "client", rssiDbm: -68, bytesSent: MB / 2, bytesReceived: 3 * MB },
    { deviceId: "relay", name: "Relay", role: "relay", rssiDbm: relayRssi, bytesSent: 2 * MB, bytesReceived: MB }
  ];
}

describe("session routes", () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  async function buildApp(sink = collectingSink().sink) {
    app = createSessionServer({ config: loadConfig({}), sink, entropy, clock: () => 1_700_000_000_000 });
    await app.ready();
    return app;
  }

  it("reports health", async () => {
    const server = await buildApp();
    const res = await server.inject({ method: "GET", url: "/health" });
    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
  });

  it("runs a session and returns its summary", async () => {
    const events = collectingSink();
    const server = await buildApp(events.sink);

    const res = await server.inject({
      method: "POST",
      url: "/sessions",
      payload: { sessionId: "s-http", devices: devices(-85) }
    });

    expect(res.statusCode).toBe(200);
    const body = res.json();
    expect(body).toMatchObject({
      sessionId: "s-http",
      active: true,
      topology: "bus",
      deviceCount: 4,
      totalBandwidthMbps: 10,
      fairShareMbps: 5,
      compliance: { transparencyVerified: true, fairnessVerified: true, privacyVerified: true }
    });
    expect(body.payments.map((p: { deviceId: string }) => p.deviceId)).toEqual(["client-a", "client-b"]);
    expect(events.ofType("session_activated")).toHaveLength(1);
  });

  it("returns 409 with the failed stage when consensus is vetoed", async () => {
    const server = await buildApp();
    const res = await server.inject({ method: "POST", url: "/sessions", payload: { devices: devices(-95) } });

    expect(res.statusCode).toBe(409);
    const body = res.json();
    expect(body.error).toBe("consensus_rejected");
    expect(body.stage).toBe("consensus");
    expect(body.summary.active).toBe(false);
    expect(body.summary.totalCostUsd).toBeNull();
  });

  it("rejects an invalid registry with 400", async () => {
    const server = await buildApp();
    const res = await server.inject({
      method: "POST",
      url: "/sessions",
      payload: { devices: [{ deviceId: "", name: "x", role: "host", rssiDbm: -60 }] }
    });
    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({
      error: "invalid_device_registry",
      issues: [expect.objectContaining({ path: "0.deviceId" })]
    });
  });
});
