// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type DeviceRole = "host" | "client" | "relay" | "observer";

/** Per-device admission outcome. Only these three values take part in consensus. */
export type ConsentState = "accept" | "reject" | "ambiguous";

export type ConsentRecord =
  | Readonly<{ state: "accept" | "reject"; capturedAtMs: number }>
  | Readonly<{ state: "ambiguous"; entropyBits: number; capturedAtMs: number }>;

export type ConsensusVerdict = "verified" | "rejected" | "pending";

export type Topology = "star" | "bus" | "mesh" | "hybrid";

export type PaymentStatus = "pending" | "authorized" | "processing" | "settled" | "failed";

/** Epoch milliseconds. */
export type Clock = () => number;

export interface Device {
  readonly deviceId: string;
  readonly name: string;
  readonly role: DeviceRole;
  rssiDbm: number;
  mtu: number;
  bytesSent: number;
  bytesReceived: number;
  /** Advertised uplink capacity; only read for hosts. */
  bandwidthMbps: number;
  balanceUsd: number;
  paymentStatus: PaymentStatus;
  consent?: ConsentRecord;
  lastSeenMs: number;
}

/** Undirected adjacency list keyed by device id. */
export type TopologyLinks = Record<string, string[]>;

export interface BandwidthAllocation {
  totalMbps: number;
  fairShareMbps: number;
}

export interface CostAllocation {
  totalUsd: number;
  perDeviceUsd: number;
}

export interface ComplianceFlags {
  transparencyVerified: boolean;
  fairnessVerified: boolean;
  privacyVerified: boolean;
}

export interface Session {
  readonly sessionId: string;
  readonly devices: Device[];
  topology?: Topology;
  links: TopologyLinks;
  bandwidth?: BandwidthAllocation;
  cost?: CostAllocation;
  compliance: ComplianceFlags;
  startedAtMs: number;
  endedAtMs?: number;
  active: boolean;
}

export interface PaymentRecord {
  readonly deviceId: string;
  readonly invoice: string;
  readonly amountSats: number;
  readonly amountUsd: number;
  readonly paymentHash: string;
  readonly createdAtMs: number;
  readonly expiresAtMs: number;
  status: PaymentStatus;
}

export type PaymentLedger = Map<string, PaymentRecord>;
