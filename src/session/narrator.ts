// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createLogger, type Logger } from "../common/logger.js";
import type { SessionEvent, SessionEventSink } from "./events.js";

function describe(event: SessionEvent): { level: "info" | "warn"; message: string } {
  switch (event.type) {
    case "consent_recorded":
      return { level: event.state === "reject" ? "warn" : "info", message: `consent ${event.state} from ${event.deviceId}` };
    case "consensus_evaluated":
      return { level: event.verdict === "verified" ? "info" : "warn", message: `consensus ${event.verdict}` };
    case "topology_selected":
      return { level: "info", message: `topology ${event.topology}` };
    case "bandwidth_allocated":
      return { level: "info", message: "bandwidth allocated" };
    case "cost_assigned":
      return { level: "info", message: `cost assigned to ${event.deviceId}` };
    case "costs_allocated":
      return { level: "info", message: "costs allocated" };
    case "payment_settled":
      return { level: "info", message: `payment ${event.status} for ${event.deviceId}` };
    case "compliance_checked":
      return { level: event.passed ? "info" : "warn", message: event.passed ? "compliance verified" : "compliance violation" };
    case "session_aborted":
      return { level: "warn", message: `session aborted at ${event.stage}: ${event.reason}` };
    case "session_activated":
      return { level: "info", message: "session active" };
    case "session_ended":
      return { level: "info", message: "session ended" };
  }
}

/** Presentation layer: turns pipeline events into structured log lines. */
export function createNarrator(logger: Logger = createLogger("session")): SessionEventSink {
  return (event) => {
    const { level, message } = describe(event);
    const { type: _type, timestamp: _timestamp, ...meta } = event;
    logger[level](message, meta);
  };
}
