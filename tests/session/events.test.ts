import { describe, expect, it } from "vitest";
import { collectingSink, emit, fanOut } from "../../src/session/events.js";

describe("session events", () => {
  it("stamps emitted events with an ISO timestamp", () => {
    const events = collectingSink();
    emit(events.sink, { type: "session_activated", sessionId: "s", deviceCount: 2 });
    expect(events.events).toHaveLength(1);
    expect(events.events[0]).toMatchObject({ type: "session_activated", sessionId: "s", deviceCount: 2 });
    expect(new Date(events.events[0].timestamp).toISOString()).toBe(events.events[0].timestamp);
  });

  it("takes the timestamp from the supplied clock", () => {
    const events = collectingSink();
    emit(events.sink, { type: "session_ended", sessionId: "s", durationMs: 5 }, () => 1_700_000_000_000);
    expect(events.events[0].timestamp).toBe("2023-11-14T22:13:20.000Z");
  });

  it("fans one event out to every sink", () => {
    const a = collectingSink();
    const b = collectingSink();
    emit(fanOut(a.sink, b.sink), { type: "session_ended", sessionId: "s", durationMs: 5 });
    expect(a.ofType("session_ended")).toHaveLength(1);
    expect(b.ofType("session_ended")[0].durationMs).toBe(5);
  });
});
