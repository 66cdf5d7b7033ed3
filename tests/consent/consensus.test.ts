import { describe, expect, it } from "vitest";
import { ConsensusAggregator, decideVerdict, tallyConsent } from "../../src/consent/consensus.js";
import type { ConsentState, Device } from "../../src/common/types.js";
import { collectingSink } from "../../src/session/events.js";
import { createDevice, createSession } from "../../src/session/session.js";

function withConsent(states: Array<ConsentState | null>): Device[] {
  return states.map((state, i) => {
    const device = createDevice({ deviceId: `dev-${i}`, name: `dev-${i}`, role: "client", rssiDbm: -60 }, () => 0);
    if (state === "ambiguous") {
      device.consent = { state, entropyBits: 12.5, capturedAtMs: 0 };
    } else if (state) {
      device.consent = { state, capturedAtMs: 0 };
    }
    return device;
  });
}

function sessionOf(states: Array<ConsentState | null>) {
  return createSession(withConsent(states), { sessionId: "s-consensus", clock: () => 0 });
}

describe("tallyConsent", () => {
  it("counts devices without a record only as missing", () => {
    expect(tallyConsent(withConsent(["accept", null, "ambiguous", "reject", null]))).toEqual({
      accept: 1,
      reject: 1,
      ambiguous: 1,
      missing: 2
    });
  });
});

describe("ConsensusAggregator", () => {
  it("lets a single reject veto any number of accepts", () => {
    const aggregator = new ConsensusAggregator();
    expect(aggregator.verify(sessionOf(["accept", "accept", "accept", "accept", "reject"]))).toBe(false);
    expect(aggregator.evaluate(sessionOf(["reject"]))).toBe("rejected");
  });

  it("rejects 2 accept + 1 reject + 1 ambiguous", () => {
    const aggregator = new ConsensusAggregator();
    const session = sessionOf(["accept", "accept", "reject", "ambiguous"]);
    expect(aggregator.evaluate(session)).toBe("rejected");
    expect(aggregator.verify(session)).toBe(false);
  });

  it("verifies 3 accept + 1 ambiguous", () => {
    expect(new ConsensusAggregator().verify(sessionOf(["accept", "accept", "accept", "ambiguous"]))).toBe(true);
  });

  it("verifies exactly floor(N/2) accepts", () => {
    expect(new ConsensusAggregator().evaluate(sessionOf(["accept", "accept", "ambiguous", "ambiguous", "ambiguous"]))).toBe(
      "verified"
    );
  });

  it("stays pending below floor(N/2) accepts", () => {
    expect(new ConsensusAggregator().evaluate(sessionOf(["accept", "ambiguous", "ambiguous", "ambiguous"]))).toBe("pending");
  });

  it("counts unanswered devices in N but not in any tally", () => {
    expect(new ConsensusAggregator().evaluate(sessionOf(["accept", null, null, null]))).toBe("pending");
    expect(new ConsensusAggregator().evaluate(sessionOf(["accept", "accept", null, null]))).toBe("verified");
  });

  it("keeps an empty session pending unless explicitly allowed", () => {
    expect(new ConsensusAggregator().evaluate(sessionOf([]))).toBe("pending");
    expect(new ConsensusAggregator({ allowEmpty: true }).evaluate(sessionOf([]))).toBe("verified");
  });

  it("emits the verdict with its tally", () => {
    const events = collectingSink();
    new ConsensusAggregator({ sink: events.sink }).evaluate(sessionOf(["accept", "ambiguous", "accept"]));
    const [event] = events.ofType("consensus_evaluated");
    expect(event).toMatchObject({
      sessionId: "s-consensus",
      verdict: "verified",
      accept: 2,
      reject: 0,
      ambiguous: 1,
      missing: 0
    });
  });
});

describe("decideVerdict", () => {
  it("checks reject before the majority rule", () => {
    expect(decideVerdict({ accept: 10, reject: 1, ambiguous: 0, missing: 0 }, 11)).toBe("rejected");
  });
});
