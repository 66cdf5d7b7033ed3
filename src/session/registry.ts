// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

import { z } from "zod";
import { SessionError } from "../common/errors.js";
import { DEFAULT_MTU, type DeviceInput } from "./session.js";

export const DeviceInputSchema = z.object({
  deviceId: z.string().min(1).max(64),
  name: z.string().min(1).max(128),
  role: z.enum(["host", "client", "relay", "observer"]),
  rssiDbm: z.number().finite(),
  mtu: z.number().int().positive().default(DEFAULT_MTU),
  bytesSent: z.number().int().nonnegative().default(0),
  bytesReceived: z.number().int().nonnegative().default(0),
  bandwidthMbps: z.number().nonnegative().default(0)
});

export const DeviceRegistrySchema = z.array(DeviceInputSchema);

export interface RegistryIssue {
  path: string;
  message: string;
}

export function parseDeviceRegistry(raw: unknown): DeviceInput[] {
  const result = DeviceRegistrySchema.safeParse(raw);
  if (!result.success) {
    const issues: RegistryIssue[] = result.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message
    }));
    throw new SessionError("invalid_device_registry", { details: { issues } });
  }

  const seen = new Set<string>();
  for (const [index, device] of result.data.entries()) {
    if (seen.has(device.deviceId)) {
      throw new SessionError("invalid_device_registry", {
        details: { issues: [{ path: `${index}.deviceId`, message: `duplicate device id ${device.deviceId}` }] }
      });
    }
    seen.add(device.deviceId);
  }
  return result.data;
}
