// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { Clock, ConsensusVerdict, Device, Session } from "../common/types.js";
import { emit, noopSink, type SessionEventSink } from "../session/events.js";

export interface ConsentTally {
  accept: number;
  reject: number;
  ambiguous: number;
  /** Devices that have not answered this round. */
  missing: number;
}

export function tallyConsent(devices: readonly Device[]): ConsentTally {
  const tally: ConsentTally = { accept: 0, reject: 0, ambiguous: 0, missing: 0 };
  for (const device of devices) {
    if (!device.consent) {
      tally.missing++;
      continue;
    }
    tally[device.consent.state]++;
  }
  return tally;
}

/**
 * Any reject vetoes. Otherwise accepts must reach floor(N/2) of all devices,
 * counting devices that have not answered in N.
 */
export function decideVerdict(tally: ConsentTally, deviceCount: number, allowEmpty = false): ConsensusVerdict {
  if (tally.reject > 0) return "rejected";
  if (deviceCount === 0 && !allowEmpty) return "pending";
  if (tally.accept >= Math.floor(deviceCount / 2)) return "verified";
  return "pending";
}

export interface ConsensusAggregatorOptions {
  sink?: SessionEventSink;
  clock?: Clock;
  /** Treat a session without devices as trivially verified. */
  allowEmpty?: boolean;
}

export class ConsensusAggregator {
  private readonly sink: SessionEventSink;
  private readonly clock: Clock;
  private readonly allowEmpty: boolean;

  constructor(options: ConsensusAggregatorOptions = {}) {
    this.sink = options.sink ?? noopSink;
    this.clock = options.clock ?? Date.now;
    this.allowEmpty = options.allowEmpty ?? false;
  }

  evaluate(session: Session): ConsensusVerdict {
    const tally = tallyConsent(session.devices);
    const verdict = decideVerdict(tally, session.devices.length, this.allowEmpty);
    emit(this.sink, { type: "consensus_evaluated", sessionId: session.sessionId, verdict, ...tally }, this.clock);
    return verdict;
  }

  verify(session: Session): boolean {
    return this.evaluate(session) === "verified";
  }
}
