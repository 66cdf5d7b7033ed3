// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { SessionError } from "../common/errors.js";
import type { Clock, CostAllocation, Device, Session } from "../common/types.js";
import { emit, noopSink, type SessionEventSink } from "../session/events.js";

// Work = F * d * cos(theta), applied per megabyte moved.
export const FORCE_NEWTONS = 1.25;
export const DISTANCE_METERS = 15.0;
export const COSINE_THETA = 0.866; // cos(30deg)
export const WORK_PER_MB = FORCE_NEWTONS * DISTANCE_METERS * COSINE_THETA;
export const USD_PER_JOULE = 0.00001;
export const BYTES_PER_MB = 1024 * 1024;

export function megabytesUsed(device: Pick<Device, "bytesSent" | "bytesReceived">): number {
  return (device.bytesSent + device.bytesReceived) / BYTES_PER_MB;
}

export function costForUsage(megabytes: number): number {
  return megabytes * WORK_PER_MB * USD_PER_JOULE;
}

export class CostAllocator {
  constructor(
    private readonly sink: SessionEventSink = noopSink,
    private readonly clock: Clock = Date.now
  ) {}

  allocateCosts(session: Session): CostAllocation {
    const deviceCount = session.devices.length;
    if (deviceCount === 0) {
      throw new SessionError("empty_session", { sessionId: session.sessionId, stage: "cost" });
    }

    let totalUsd = 0;
    for (const device of session.devices) {
      const mb = megabytesUsed(device);
      const costUsd = costForUsage(mb);
      device.balanceUsd = costUsd;
      totalUsd += costUsd;
      emit(
        this.sink,
        {
          type: "cost_assigned",
          sessionId: session.sessionId,
          deviceId: device.deviceId,
          megabytesUsed: mb,
          costUsd
        },
        this.clock
      );
    }

    const allocation: CostAllocation = { totalUsd, perDeviceUsd: totalUsd / deviceCount };
    session.cost = allocation;
    session.compliance.transparencyVerified = true;

    emit(this.sink, { type: "costs_allocated", sessionId: session.sessionId, ...allocation }, this.clock);
    return allocation;
  }
}
