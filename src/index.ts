// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export * from "./common/types.js";
export * from "./common/errors.js";
export { loadConfig, DEFAULT_SETTLEMENT_CONFIG } from "./common/config.js";
export type { MeshShareConfig, SettlementConfig } from "./common/config.js";
export { log, createLogger } from "./common/logger.js";
export type { Logger } from "./common/logger.js";

export {
  ENTROPY_SAMPLE_SIZE,
  MAX_ENTROPY_BITS,
  assertEntropyInRange,
  cryptoEntropySource,
  measureChannelEntropy,
  shannonEntropy
} from "./consent/entropy.js";
export type { EntropySource } from "./consent/entropy.js";
export { ConsentEngine, classifySignal } from "./consent/consent-engine.js";
export { ConsensusAggregator, decideVerdict, tallyConsent } from "./consent/consensus.js";
export type { ConsentTally } from "./consent/consensus.js";

export { TopologySelector, buildTopologyLinks, selectTopology } from "./network/topology.js";
export { BandwidthAllocator, FAIR_SHARE_FACTOR } from "./network/bandwidth.js";

export { CostAllocator, costForUsage, megabytesUsed, WORK_PER_MB, USD_PER_JOULE } from "./economy/cost.js";
export { PaymentSettler, isSettlementEligible } from "./economy/settlement.js";
export { SATS_PER_BTC, satsToUsd, usdToSats } from "./economy/pricing.js";
export { advancePayment, canAdvancePayment, derivePaymentHash, formatInvoice } from "./economy/lightning.js";

export { ComplianceGate } from "./compliance/gate.js";
export type { ComplianceReport } from "./compliance/gate.js";

export { SessionOrchestrator } from "./session/orchestrator.js";
export type { SessionOutcome, AbortReason } from "./session/orchestrator.js";
export { closeSession, createDevice, createSession, summarizeSession } from "./session/session.js";
export type { DeviceInput, SessionSummary } from "./session/session.js";
export { collectingSink, fanOut, noopSink } from "./session/events.js";
export type { SessionEvent, SessionEventSink } from "./session/events.js";
export { createNarrator } from "./session/narrator.js";
export { parseDeviceRegistry } from "./session/registry.js";
export { buildSessionRoutes, createSessionServer } from "./session/server.js";
