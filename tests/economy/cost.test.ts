import { describe, expect, it } from "vitest";
import type { DeviceRole } from "../../src/common/types.js";
import { CostAllocator, WORK_PER_MB, costForUsage, megabytesUsed } from "../../src/economy/cost.js";
import { collectingSink } from "../../src/session/events.js";
import { createDevice, createSession } from "../../src/session/session.js";

const MB = 1024 * 1024;

function sessionWith(usage: Array<[DeviceRole, number, number]>) {
  const devices = usage.map(([role, bytesSent, bytesReceived], i) =>
    createDevice({ deviceId: `d${i}`, name: `d${i}`, role, rssiDbm: -60, bytesSent, bytesReceived }, () => 0)
  );
  return createSession(devices, { sessionId: "s-cost", clock: () => 0 });
}

describe("cost model", () => {
  it("derives work per megabyte from force, distance and angle", () => {
    expect(WORK_PER_MB).toBeCloseTo(16.2375, 12);
  });

  it("prices 5 MiB sent + 2 MiB received at about 0.001136 USD", () => {
    const mb = megabytesUsed({ bytesSent: 5_242_880, bytesReceived: 2_097_152 });
    expect(mb).toBe(7);
    expect(costForUsage(mb)).toBeCloseTo(0.001136625, 12);
  });
});

describe("CostAllocator", () => {
  it("assigns each device its own cost and averages the total", () => {
    const session = sessionWith([
      ["host", 5 * MB, 2 * MB],
      ["client", 1 * MB, 10 * MB],
      ["client", 0.5 * MB, 3 * MB],
      ["relay", 2 * MB, 1 * MB]
    ]);

    const allocation = new CostAllocator().allocateCosts(session);

    expect(session.devices.map((d) => d.balanceUsd)).toEqual([
      costForUsage(7),
      costForUsage(11),
      costForUsage(3.5),
      costForUsage(3)
    ]);
    expect(allocation.totalUsd).toBeCloseTo(0.0039781875, 12);
    expect(allocation.perDeviceUsd).toBeCloseTo(0.000994546875, 12);
    expect(session.cost).toEqual(allocation);
  });

  it("charges idle devices nothing", () => {
    const session = sessionWith([["observer", 0, 0]]);
    new CostAllocator().allocateCosts(session);
    expect(session.devices[0].balanceUsd).toBe(0);
    expect(session.cost).toEqual({ totalUsd: 0, perDeviceUsd: 0 });
  });

  it("sets the transparency flag", () => {
    const session = sessionWith([["client", MB, 0]]);
    new CostAllocator().allocateCosts(session);
    expect(session.compliance.transparencyVerified).toBe(true);
  });

  it("refuses an empty session", () => {
    const session = sessionWith([]);
    expect(() => new CostAllocator().allocateCosts(session)).toThrow("empty_session");
    expect(session.cost).toBeUndefined();
    expect(session.compliance.transparencyVerified).toBe(false);
  });

  it("emits one event per device then the aggregate", () => {
    const events = collectingSink();
    new CostAllocator(events.sink).allocateCosts(sessionWith([["client", MB, 0], ["host", 0, MB]]));
    expect(events.events.map((e) => e.type)).toEqual(["cost_assigned", "cost_assigned", "costs_allocated"]);
    expect(events.ofType("cost_assigned")[1]).toMatchObject({ deviceId: "d1", megabytesUsed: 1 });
  });
});
