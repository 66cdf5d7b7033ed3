// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { randomBytes } from "node:crypto";

export const ENTROPY_SAMPLE_SIZE = 64;

/**
 * Upper bound of {@link shannonEntropy} over a full sample. Each term -p*log2(p)
 * peaks at p = 1/e, giving 1/(e*ln 2) bits per sample.
 */
export const MAX_ENTROPY_BITS = ENTROPY_SAMPLE_SIZE / (Math.E * Math.LN2);

export interface EntropySource {
  /** Returns `size` independent bytes, each uniform over [0, 255]. */
  sample(size: number): Uint8Array;
}

export const cryptoEntropySource: EntropySource = {
  sample(size: number): Uint8Array {
    return new Uint8Array(randomBytes(size));
  }
};

/**
 * Sums -p*log2(p) with p = s/255 for every sample byte s. This is a tie-break
 * signal for marginal links, not a channel capacity estimate.
 */
export function shannonEntropy(samples: ArrayLike<number>): number {
  let bits = 0;
  for (let i = 0; i < samples.length; i++) {
    const p = samples[i] / 255;
    if (p > 0) {
      bits -= p * Math.log2(p);
    }
  }
  return bits;
}

export function assertEntropyInRange(bits: number): number {
  if (!(bits >= 0 && bits <= MAX_ENTROPY_BITS)) {
    throw new Error(`entropy_out_of_range:${bits}`);
  }
  return bits;
}

export function measureChannelEntropy(source: EntropySource = cryptoEntropySource): number {
  const samples = source.sample(ENTROPY_SAMPLE_SIZE);
  if (samples.length !== ENTROPY_SAMPLE_SIZE) {
    throw new Error(`entropy_sample_size_mismatch:${samples.length}`);
  }
  return assertEntropyInRange(shannonEntropy(samples));
}
