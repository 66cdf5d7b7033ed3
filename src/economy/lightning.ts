// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { createHash, randomBytes } from "node:crypto";
import { SessionError } from "../common/errors.js";
import type { PaymentRecord, PaymentStatus } from "../common/types.js";

const PAYMENT_TRANSITIONS: Record<PaymentStatus, readonly PaymentStatus[]> = {
  pending: ["authorized", "failed"],
  authorized: ["processing", "settled", "failed"],
  processing: ["settled", "failed"],
  settled: [],
  failed: []
};

export function canAdvancePayment(from: PaymentStatus, to: PaymentStatus): boolean {
  return PAYMENT_TRANSITIONS[from].includes(to);
}

export function advancePayment(record: PaymentRecord, next: PaymentStatus): PaymentRecord {
  if (!canAdvancePayment(record.status, next)) {
    throw new SessionError("invalid_payment_transition", {
      stage: "settlement",
      details: { deviceId: record.deviceId, from: record.status, to: next }
    });
  }
  record.status = next;
  return record;
}

/**
 * sha256 over amount, creation time and a random nonce. The nonce keeps two
 * equal amounts created in the same millisecond apart.
 */
export function derivePaymentHash(amountUsd: number, createdAtMs: number, nonce: string = randomBytes(16).toString("hex")): string {
  return createHash("sha256").update(`${amountUsd}:${createdAtMs}:${nonce}`).digest("hex");
}

/** Invoice-shaped token; not a decodable BOLT11 string. */
export function formatInvoice(amountSats: number, paymentHash: string, prefix = "lnbc"): string {
  return `${prefix}${amountSats}u1p${paymentHash.slice(0, 10)}`;
}
