// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { DEFAULT_SETTLEMENT_CONFIG, type SettlementConfig } from "../common/config.js";
import { isSessionError, SessionError, type PipelineStage, type SessionErrorCode } from "../common/errors.js";
import type {
  Clock,
  ConsensusVerdict,
  PaymentLedger,
  Session,
  Topology
} from "../common/types.js";
import { ComplianceGate, type ComplianceReport } from "../compliance/gate.js";
import { ConsensusAggregator } from "../consent/consensus.js";
import { ConsentEngine } from "../consent/consent-engine.js";
import type { EntropySource } from "../consent/entropy.js";
import { CostAllocator } from "../economy/cost.js";
import { PaymentSettler } from "../economy/settlement.js";
import { BandwidthAllocator } from "../network/bandwidth.js";
import { TopologySelector } from "../network/topology.js";
import { emit, noopSink, type SessionEventSink } from "./events.js";
import { closeSession } from "./session.js";

export type AbortReason =
  | "consensus_rejected"
  | "consensus_pending"
  | "compliance_failed"
  | SessionErrorCode;

export type SessionOutcome =
  | {
      status: "active";
      session: Session;
      verdict: ConsensusVerdict;
      topology: Topology;
      payments: PaymentLedger;
      compliance: ComplianceReport;
    }
  | {
      status: "aborted";
      session: Session;
      stage: PipelineStage;
      reason: AbortReason;
      verdict?: ConsensusVerdict;
      payments: PaymentLedger;
      compliance?: ComplianceReport;
    };

export interface SessionOrchestratorOptions {
  entropy?: EntropySource;
  clock?: Clock;
  sink?: SessionEventSink;
  settlement?: SettlementConfig;
  allowEmptySession?: boolean;
}

/**
 * Drives one session through consent, consensus, topology, bandwidth, cost,
 * settlement and compliance. Each stage finishes before the next reads the
 * session; an abort only ever happens between stages. A session runs at most
 * once: after activation or an abort it is refused with `session_already_run`.
 */
export class SessionOrchestrator {
  private readonly clock: Clock;
  private readonly sink: SessionEventSink;
  private readonly entropy?: EntropySource;
  private readonly consensus: ConsensusAggregator;
  private readonly topology: TopologySelector;
  private readonly bandwidth: BandwidthAllocator;
  private readonly cost: CostAllocator;
  private readonly settler: PaymentSettler;
  private readonly gate: ComplianceGate;

  constructor(options: SessionOrchestratorOptions = {}) {
    this.clock = options.clock ?? Date.now;
    this.sink = options.sink ?? noopSink;
    this.entropy = options.entropy;
    this.consensus = new ConsensusAggregator({
      sink: this.sink,
      clock: this.clock,
      allowEmpty: options.allowEmptySession
    });
    this.topology = new TopologySelector(this.sink, this.clock);
    this.bandwidth = new BandwidthAllocator(this.sink, this.clock);
    this.cost = new CostAllocator(this.sink, this.clock);
    this.settler = new PaymentSettler({
      config: options.settlement ?? DEFAULT_SETTLEMENT_CONFIG,
      clock: this.clock,
      sink: this.sink
    });
    this.gate = new ComplianceGate(this.sink, this.clock);
  }

  async run(session: Session): Promise<SessionOutcome> {
    if (session.active || session.endedAtMs !== undefined) {
      throw new SessionError("session_already_run", {
        sessionId: session.sessionId,
        details: { active: session.active, endedAtMs: session.endedAtMs }
      });
    }

    const consent = new ConsentEngine({
      entropy: this.entropy,
      clock: this.clock,
      sink: this.sink,
      sessionId: session.sessionId
    });
    await consent.requestAll(session.devices);

    const verdict = this.consensus.evaluate(session);
    if (verdict !== "verified") {
      return this.abort(session, "consensus", verdict === "rejected" ? "consensus_rejected" : "consensus_pending", {
        verdict
      });
    }

    let stage: PipelineStage = "topology";
    let topology: Topology;
    let payments: PaymentLedger = new Map();
    try {
      topology = this.topology.apply(session);
      stage = "bandwidth";
      this.bandwidth.allocate(session);
      stage = "cost";
      this.cost.allocateCosts(session);
      stage = "settlement";
      payments = this.settler.settle(session);
    } catch (err) {
      if (isSessionError(err)) {
        return this.abort(session, err.stage ?? stage, err.code, { verdict, payments });
      }
      throw err;
    }

    const compliance = this.gate.evaluate(session);
    if (!compliance.passed) {
      return this.abort(session, "compliance", "compliance_failed", { verdict, payments, compliance });
    }

    session.active = true;
    emit(this.sink, { type: "session_activated", sessionId: session.sessionId, deviceCount: session.devices.length }, this.clock);
    return { status: "active", session, verdict, topology, payments, compliance };
  }

  endSession(session: Session): void {
    if (session.endedAtMs !== undefined) return;
    const durationMs = closeSession(session, this.clock);
    emit(this.sink, { type: "session_ended", sessionId: session.sessionId, durationMs }, this.clock);
  }

  private abort(
    session: Session,
    stage: PipelineStage,
    reason: AbortReason,
    extra: { verdict?: ConsensusVerdict; payments?: PaymentLedger; compliance?: ComplianceReport }
  ): SessionOutcome {
    closeSession(session, this.clock);
    emit(this.sink, { type: "session_aborted", sessionId: session.sessionId, stage, reason }, this.clock);
    return {
      status: "aborted",
      session,
      stage,
      reason,
      verdict: extra.verdict,
      payments: extra.payments ?? new Map(),
      compliance: extra.compliance
    };
  }
}
