// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { DEFAULT_SETTLEMENT_CONFIG, type SettlementConfig } from "../common/config.js";
import type { Clock, Device, PaymentLedger, PaymentRecord, Session } from "../common/types.js";
import { emit, noopSink, type SessionEventSink } from "../session/events.js";
import { advancePayment, derivePaymentHash, formatInvoice } from "./lightning.js";
import { usdToSats } from "./pricing.js";

export function isSettlementEligible(device: Device): boolean {
  return device.role === "client" && device.balanceUsd > 0;
}

export interface PaymentSettlerOptions {
  config?: SettlementConfig;
  clock?: Clock;
  sink?: SessionEventSink;
}

export class PaymentSettler {
  private readonly config: SettlementConfig;
  private readonly clock: Clock;
  private readonly sink: SessionEventSink;

  constructor(options: PaymentSettlerOptions = {}) {
    this.config = options.config ?? DEFAULT_SETTLEMENT_CONFIG;
    this.clock = options.clock ?? Date.now;
    this.sink = options.sink ?? noopSink;
  }

  createPayment(device: Device): PaymentRecord {
    const createdAtMs = this.clock();
    const amountUsd = device.balanceUsd;
    const amountSats = usdToSats(amountUsd, this.config.btcUsdReferencePrice);
    const paymentHash = derivePaymentHash(amountUsd, createdAtMs);
    return {
      deviceId: device.deviceId,
      invoice: formatInvoice(amountSats, paymentHash, this.config.invoicePrefix),
      amountSats,
      amountUsd,
      paymentHash,
      createdAtMs,
      expiresAtMs: createdAtMs + this.config.invoiceExpirySeconds * 1000,
      status: "authorized"
    };
  }

  /**
   * Settles every client with a positive balance. Settlement is modelled as
   * instantaneous: authorized then settled, with no confirmation wait.
   */
  settle(session: Session): PaymentLedger {
    const ledger: PaymentLedger = new Map();
    for (const device of session.devices) {
      if (!isSettlementEligible(device)) continue;

      const record = this.createPayment(device);
      advancePayment(record, "settled");
      device.paymentStatus = record.status;
      ledger.set(device.deviceId, record);

      emit(
        this.sink,
        {
          type: "payment_settled",
          sessionId: session.sessionId,
          deviceId: device.deviceId,
          invoice: record.invoice,
          amountSats: record.amountSats,
          amountUsd: record.amountUsd,
          status: record.status
        },
        this.clock
      );
    }
    return ledger;
  }
}
