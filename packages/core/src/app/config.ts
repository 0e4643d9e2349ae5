/**
 * packages/core/src/app/config.ts — Application config resolution.
 */

import { invalidArgument } from "../errors.js";
import type { AppConfig, AutoRefreshSetting, ResolvedAppConfig } from "./types.js";

export const DEFAULT_AUTO_REFRESH_MS = 100;
export const DEFAULT_QUIT_KEYS: readonly string[] = Object.freeze(["q", "Q", "escape", "ctrl+c"]);

const DEFAULT_CONFIG: ResolvedAppConfig = Object.freeze({
  autoRefresh: 0,
  autoRefreshDefaultMs: DEFAULT_AUTO_REFRESH_MS,
  fpsCap: 60,
  quitKeys: DEFAULT_QUIT_KEYS,
});

function requirePositiveInt(name: string, v: number): number {
  if (!Number.isInteger(v) || v <= 0) invalidArgument(`${name} must be a positive integer`);
  return v;
}

function validateAutoRefresh(value: AutoRefreshSetting): AutoRefreshSetting {
  if (typeof value === "number" && !Number.isFinite(value)) {
    invalidArgument("autoRefresh must be a finite number");
  }
  return value;
}

export function resolveAppConfig(config: AppConfig | undefined): ResolvedAppConfig {
  if (!config) return DEFAULT_CONFIG;
  const autoRefreshDefaultMs =
    config.autoRefreshDefaultMs === undefined
      ? DEFAULT_CONFIG.autoRefreshDefaultMs
      : requirePositiveInt("autoRefreshDefaultMs", config.autoRefreshDefaultMs);
  const fpsCap =
    config.fpsCap === undefined ? DEFAULT_CONFIG.fpsCap : requirePositiveInt("fpsCap", config.fpsCap);
  const autoRefresh =
    config.autoRefresh === undefined
      ? DEFAULT_CONFIG.autoRefresh
      : validateAutoRefresh(config.autoRefresh);
  let quitKeys = DEFAULT_CONFIG.quitKeys;
  if (config.quitKeys !== undefined) {
    for (const key of config.quitKeys) {
      if (typeof key !== "string" || key.length === 0) {
        invalidArgument("quitKeys must contain non-empty strings");
      }
    }
    quitKeys = Object.freeze([...config.quitKeys]);
  }
  return Object.freeze({ autoRefresh, autoRefreshDefaultMs, fpsCap, quitKeys });
}

/**
 * Maps an auto-refresh setting to an interval in ms; 0 means disabled.
 * `true` selects `defaultMs`.
 */
export function normalizeAutoRefresh(value: AutoRefreshSetting, defaultMs: number): number {
  if (value === true) return defaultMs;
  if (value === false || value === null) return 0;
  if (!Number.isFinite(value)) invalidArgument("autoRefresh must be a finite number");
  return value > 0 ? value : 0;
}
