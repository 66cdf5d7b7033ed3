// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type SessionErrorCode =
  | "invalid_topology_input"
  | "empty_session"
  | "stage_order_violation"
  | "invalid_payment_transition"
  | "invalid_device_registry"
  | "session_already_run";

export type PipelineStage =
  | "consent"
  | "consensus"
  | "topology"
  | "bandwidth"
  | "cost"
  | "settlement"
  | "compliance";

export interface SessionErrorOptions {
  sessionId?: string;
  stage?: PipelineStage;
  details?: Record<string, unknown>;
}

export class SessionError extends Error {
  readonly code: SessionErrorCode;
  readonly sessionId?: string;
  readonly stage?: PipelineStage;
  readonly details?: Record<string, unknown>;

  constructor(code: SessionErrorCode, options: SessionErrorOptions = {}) {
    super(code);
    this.name = "SessionError";
    this.code = code;
    this.sessionId = options.sessionId;
    this.stage = options.stage;
    this.details = options.details;
  }
}

export function isSessionError(err: unknown, code?: SessionErrorCode): err is SessionError {
  if (!(err instanceof SessionError)) return false;
  return code === undefined || err.code === code;
}
