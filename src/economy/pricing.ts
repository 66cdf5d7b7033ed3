// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export const SATS_PER_BTC = 100_000_000;

/** Scaled amounts are rounded to a millionth before truncation. */
const MICRO_UNITS = 1_000_000;

/**
 * Truncates toward zero; a fraction of a sat is never billed. The scaled amount
 * is rounded to micro-units first so decimal inputs such as 0.29 USD are not
 * pushed just under a whole sat by binary representation error.
 */
export function usdToSats(amountUsd: number, btcUsdPrice: number): number {
  if (btcUsdPrice <= 0 || amountUsd <= 0) return 0;
  const scaled = Math.round(amountUsd * SATS_PER_BTC * MICRO_UNITS) / MICRO_UNITS;
  return Math.floor(scaled / btcUsdPrice);
}

export function satsToUsd(amountSats: number, btcUsdPrice: number): number {
  if (btcUsdPrice <= 0 || amountSats <= 0) return 0;
  return (amountSats * btcUsdPrice) / SATS_PER_BTC;
}

export function usdPerSat(btcUsdPrice: number): number {
  return satsToUsd(1, btcUsdPrice);
}
