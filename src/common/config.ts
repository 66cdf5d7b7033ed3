// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .default("false")
  .transform((value) => value === "true" || value === "1");

const EnvSchema = z.object({
  BTC_USD_REFERENCE_PRICE: z.coerce.number().positive().default(40_000),
  INVOICE_EXPIRY_SECONDS: z.coerce.number().int().positive().default(600),
  INVOICE_NETWORK_PREFIX: z.string().regex(/^ln[a-z]+$/).default("lnbc"),
  MESHSHARE_HOST: z.string().min(1).default("127.0.0.1"),
  MESHSHARE_PORT: z.coerce.number().int().min(1).max(65_535).default(4310),
  SESSION_ALLOW_EMPTY: booleanFlag
});

export interface SettlementConfig {
  btcUsdReferencePrice: number;
  invoiceExpirySeconds: number;
  invoicePrefix: string;
}

export interface MeshShareConfig {
  settlement: SettlementConfig;
  allowEmptySession: boolean;
  server: { host: string; port: number };
}

export const DEFAULT_SETTLEMENT_CONFIG: SettlementConfig = {
  btcUsdReferencePrice: 40_000,
  invoiceExpirySeconds: 600,
  invoicePrefix: "lnbc"
};

export function loadConfig(env: Record<string, string | undefined> = process.env): MeshShareConfig {
  const parsed = EnvSchema.parse(env);
  return {
    settlement: {
      btcUsdReferencePrice: parsed.BTC_USD_REFERENCE_PRICE,
      invoiceExpirySeconds: parsed.INVOICE_EXPIRY_SECONDS,
      invoicePrefix: parsed.INVOICE_NETWORK_PREFIX
    },
    allowEmptySession: parsed.SESSION_ALLOW_EMPTY,
    server: { host: parsed.MESHSHARE_HOST, port: parsed.MESHSHARE_PORT }
  };
}
