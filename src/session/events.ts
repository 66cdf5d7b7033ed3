// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import type {
  Clock,
  ConsensusVerdict,
  ConsentState,
  PaymentStatus,
  Topology
} from "../common/types.js";
import type { PipelineStage } from "../common/errors.js";

interface EventBase {
  timestamp: string;
  sessionId?: string;
}

export type SessionEvent = EventBase &
  (
    | {
        type: "consent_recorded";
        deviceId: string;
        rssiDbm: number;
        state: ConsentState;
        entropyBits?: number;
      }
    | {
        type: "consensus_evaluated";
        verdict: ConsensusVerdict;
        accept: number;
        reject: number;
        ambiguous: number;
        missing: number;
      }
    | { type: "topology_selected"; topology: Topology; deviceCount: number; hostCount: number }
    | { type: "bandwidth_allocated"; totalMbps: number; fairShareMbps: number }
    | { type: "cost_assigned"; deviceId: string; megabytesUsed: number; costUsd: number }
    | { type: "costs_allocated"; totalUsd: number; perDeviceUsd: number }
    | {
        type: "payment_settled";
        deviceId: string;
        invoice: string;
        amountSats: number;
        amountUsd: number;
        status: PaymentStatus;
      }
    | {
        type: "compliance_checked";
        transparency: boolean;
        fairness: boolean;
        privacy: boolean;
        accessibility: boolean;
        passed: boolean;
      }
    | { type: "session_aborted"; stage: PipelineStage; reason: string }
    | { type: "session_activated"; deviceCount: number }
    | { type: "session_ended"; durationMs: number }
  );

export type SessionEventType = SessionEvent["type"];

/** Distributes an event type over the union so payloads keep their discriminant. */
type WithoutTimestamp<T> = T extends unknown ? Omit<T, "timestamp"> : never;

export type SessionEventInput = WithoutTimestamp<SessionEvent>;

export type SessionEventSink = (event: SessionEvent) => void;

export const noopSink: SessionEventSink = () => {};

/** Stamps the event with the caller's clock and hands it to the sink. */
export function emit(sink: SessionEventSink, event: SessionEventInput, clock: Clock = Date.now): void {
  sink({ ...event, timestamp: new Date(clock()).toISOString() });
}

export interface CollectingSink {
  sink: SessionEventSink;
  events: SessionEvent[];
  ofType<T extends SessionEventType>(type: T): Array<Extract<SessionEvent, { type: T }>>;
}

export function collectingSink(): CollectingSink {
  const events: SessionEvent[] = [];
  return {
    sink: (event) => {
      events.push(event);
    },
    events,
    ofType<T extends SessionEventType>(type: T): Array<Extract<SessionEvent, { type: T }>> {
      return events.filter((event): event is Extract<SessionEvent, { type: T }> => event.type === type);
    }
  };
}

export function fanOut(...sinks: SessionEventSink[]): SessionEventSink {
  return (event) => {
    for (const sink of sinks) sink(event);
  };
}
