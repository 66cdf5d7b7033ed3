// Copyright (c) 2025 EdgeCoder, LLC
// SPDX-License-Identifier: BUSL-1.1

export type LogLevel = "info" | "warn" | "error";

export interface Logger {
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function write(level: LogLevel, scope: string | undefined, message: string, meta: unknown): void {
  const line = JSON.stringify({ level, scope, message, meta, ts: Date.now() });
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope?: string): Logger {
  return {
    info(message: string, meta?: unknown): void {
      write("info", scope, message, meta);
    },
    warn(message: string, meta?: unknown): void {
      write("warn", scope, message, meta);
    },
    error(message: string, meta?: unknown): void {
      write("error", scope, message, meta);
    }
  };
}

export const log = createLogger();
