/**
 * Client settings from SIGNER_* env vars.
 */

import {
  DEFAULT_CLIENT_TIMEOUT_MS,
  DEFAULT_CONFIG_TIMEOUT_MS,
  DEFAULT_TASK_TIMEOUT_MS,
} from "./types.js";
import { parseLevel, type LogLevel } from "./logger.js";

export interface ClientSettings {
  configServerAddress: string;
  configTimeoutMs: number;
  taskTimeoutMs: number;
  clientTimeoutMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_CONFIG_SERVER_ADDRESS = "localhost:50052";

export function loadSettings(env: NodeJS.ProcessEnv = process.env): ClientSettings {
  return {
    configServerAddress: env.SIGNER_CONFIG_SERVER || DEFAULT_CONFIG_SERVER_ADDRESS,
    configTimeoutMs: envInt(env, "SIGNER_CONFIG_TIMEOUT_MS", DEFAULT_CONFIG_TIMEOUT_MS),
    taskTimeoutMs: envInt(env, "SIGNER_TASK_TIMEOUT_MS", DEFAULT_TASK_TIMEOUT_MS),
    clientTimeoutMs: envInt(env, "SIGNER_CLIENT_TIMEOUT_MS", DEFAULT_CLIENT_TIMEOUT_MS),
    logLevel: parseLevel(env.SIGNER_LOG_LEVEL),
  };
}

function envInt(env: NodeJS.ProcessEnv, key: string, defaultVal: number): number {
  const value = env[key];
  if (value) {
    const parsed = parseInt(value, 10);
    if (!isNaN(parsed) && parsed > 0) return parsed;
  }
  return defaultVal;
}
