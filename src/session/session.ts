// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomUUID } from "node:crypto";
import type { Clock, Device, DeviceRole, PaymentLedger, Session } from "../common/types.js";
import { megabytesUsed } from "../economy/cost.js";

export const DEFAULT_MTU = 512;

export interface DeviceInput {
  deviceId: string;
  name: string;
  role: DeviceRole;
  rssiDbm: number;
  mtu?: number;
  bytesSent?: number;
  bytesReceived?: number;
  bandwidthMbps?: number;
}

export function createDevice(input: DeviceInput, clock: Clock = Date.now): Device {
  return {
    deviceId: input.deviceId,
    name: input.name,
    role: input.role,
    rssiDbm: input.rssiDbm,
    mtu: input.mtu ?? DEFAULT_MTU,
    bytesSent: input.bytesSent ?? 0,
    bytesReceived: input.bytesReceived ?? 0,
    bandwidthMbps: input.bandwidthMbps ?? 0,
    balanceUsd: 0,
    paymentStatus: "pending",
    lastSeenMs: clock()
  };
}

export function createSession(
  devices: Device[],
  options: { sessionId?: string; clock?: Clock } = {}
): Session {
  const clock = options.clock ?? Date.now;
  return {
    sessionId: options.sessionId ?? randomUUID(),
    devices,
    links: {},
    compliance: {
      transparencyVerified: false,
      fairnessVerified: false,
      privacyVerified: false
    },
    startedAtMs: clock(),
    active: false
  };
}

export function closeSession(session: Session, clock: Clock = Date.now): number {
  const endedAtMs = clock();
  session.endedAtMs = endedAtMs;
  session.active = false;
  return endedAtMs - session.startedAtMs;
}

export interface DeviceSummary {
  deviceId: string;
  name: string;
  role: DeviceRole;
  consent: string;
  entropyBits?: number;
  megabytesUsed: number;
  balanceUsd: number;
  paymentStatus: string;
  links: string[];
}

export interface PaymentSummary {
  deviceId: string;
  invoice: string;
  amountSats: number;
  amountUsd: number;
  paymentHash: string;
  expiresAt: string;
  status: string;
}

export interface SessionSummary {
  sessionId: string;
  active: boolean;
  topology: string | null;
  deviceCount: number;
  totalBandwidthMbps: number | null;
  fairShareMbps: number | null;
  totalCostUsd: number | null;
  costPerDeviceUsd: number | null;
  compliance: Session["compliance"];
  startedAt: string;
  endedAt: string | null;
  devices: DeviceSummary[];
  payments: PaymentSummary[];
}

/** JSON-ready view. Aggregates are null until their stage has run. */
export function summarizeSession(session: Session, payments: PaymentLedger = new Map()): SessionSummary {
  return {
    sessionId: session.sessionId,
    active: session.active,
    topology: session.topology ?? null,
    deviceCount: session.devices.length,
    totalBandwidthMbps: session.bandwidth?.totalMbps ?? null,
    fairShareMbps: session.bandwidth?.fairShareMbps ?? null,
    totalCostUsd: session.cost?.totalUsd ?? null,
    costPerDeviceUsd: session.cost?.perDeviceUsd ?? null,
    compliance: { ...session.compliance },
    startedAt: new Date(session.startedAtMs).toISOString(),
    endedAt: session.endedAtMs === undefined ? null : new Date(session.endedAtMs).toISOString(),
    devices: session.devices.map((device) => ({
      deviceId: device.deviceId,
      name: device.name,
      role: device.role,
      consent: device.consent?.state ?? "none",
      entropyBits: device.consent?.state === "ambiguous" ? device.consent.entropyBits : undefined,
      megabytesUsed: megabytesUsed(device),
      balanceUsd: device.balanceUsd,
      paymentStatus: device.paymentStatus,
      links: session.links[device.deviceId] ?? []
    })),
    payments: [...payments.values()].map((payment) => ({
      deviceId: payment.deviceId,
      invoice: payment.invoice,
      amountSats: payment.amountSats,
      amountUsd: payment.amountUsd,
      paymentHash: payment.paymentHash,
      expiresAt: new Date(payment.expiresAtMs).toISOString(),
      status: payment.status
    }))
  };
}
