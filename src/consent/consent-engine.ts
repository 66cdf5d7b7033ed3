// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type { Clock, ConsentRecord, ConsentState, Device } from "../common/types.js";
import { emit, noopSink, type SessionEventSink } from "../session/events.js";
import { cryptoEntropySource, measureChannelEntropy, type EntropySource } from "./entropy.js";

/** Strictly above this, a device accepts. */
export const ACCEPT_ABOVE_DBM = -70;
/** Strictly below this, a device rejects. */
export const REJECT_BELOW_DBM = -90;

export function classifySignal(rssiDbm: number): ConsentState {
  if (rssiDbm > ACCEPT_ABOVE_DBM) return "accept";
  if (rssiDbm < REJECT_BELOW_DBM) return "reject";
  return "ambiguous";
}

export interface ConsentEngineOptions {
  entropy?: EntropySource;
  clock?: Clock;
  sink?: SessionEventSink;
  sessionId?: string;
}

export class ConsentEngine {
  private readonly entropy: EntropySource;
  private readonly clock: Clock;
  private readonly sink: SessionEventSink;
  private readonly sessionId?: string;

  constructor(options: ConsentEngineOptions = {}) {
    this.entropy = options.entropy ?? cryptoEntropySource;
    this.clock = options.clock ?? Date.now;
    this.sink = options.sink ?? noopSink;
    this.sessionId = options.sessionId;
  }

  /**
   * Replaces the device's consent record. Entropy is drawn only for the
   * ambiguous band.
   */
  requestConsent(device: Device): ConsentState {
    const state = classifySignal(device.rssiDbm);
    const capturedAtMs = this.clock();

    let record: ConsentRecord;
    if (state === "ambiguous") {
      record = Object.freeze({ state, entropyBits: measureChannelEntropy(this.entropy), capturedAtMs });
    } else {
      record = Object.freeze({ state, capturedAtMs });
    }

    device.consent = record;
    device.lastSeenMs = capturedAtMs;

    emit(
      this.sink,
      {
        type: "consent_recorded",
        sessionId: this.sessionId,
        deviceId: device.deviceId,
        rssiDbm: device.rssiDbm,
        state,
        entropyBits: record.state === "ambiguous" ? record.entropyBits : undefined
      },
      this.clock
    );
    return state;
  }

  /**
   * Requests consent from every device concurrently. Each request only touches
   * its own device, so the results are independent of completion order.
   */
  async requestAll(devices: readonly Device[]): Promise<ConsentState[]> {
    return Promise.all(devices.map(async (device) => this.requestConsent(device)));
  }
}
