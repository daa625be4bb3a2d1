import {
  defaultLoaderConfig,
  loaderCaps,
  type LoaderConfig,
  validateLoaderConfig
} from "../../application/bulk-load/loader.config";

export const runtimeCaps = {
  timeoutMs: { min: 1000, max: 120000 }
} as const;

export const stagingModes = ["memory", "tempfile"] as const;
export type StagingMode = (typeof stagingModes)[number];

export type RuntimeConfig = {
  loaderConfig: LoaderConfig;
  timeoutMs: number;
  staging: StagingMode;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

const parseStagingMode = (env: NodeJS.ProcessEnv): StagingMode => {
  const raw = env.BULK_STAGING?.trim().toLowerCase();
  if (!raw) return "memory";
  const mode = stagingModes.find((candidate) => candidate === raw);
  if (!mode) {
    throw new Error(`BULK_STAGING=${raw} must be one of ${stagingModes.join(", ")}`);
  }
  return mode;
};

export const loadRuntimeConfigFromEnv = (env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const loaderConfig = validateLoaderConfig({
    maxBytes: parseOptionalIntInRange(env, "BULK_MAX_BYTES", loaderCaps.maxBytes) ?? defaultLoaderConfig.maxBytes,
    maxRows: parseOptionalIntInRange(env, "BULK_MAX_ROWS", loaderCaps.maxRows) ?? defaultLoaderConfig.maxRows,
    concurrency: parseOptionalIntInRange(env, "BULK_CONCURRENCY", loaderCaps.concurrency) ?? defaultLoaderConfig.concurrency,
    pollIntervalMs:
      parseOptionalIntInRange(env, "BULK_POLL_INTERVAL_MS", loaderCaps.pollIntervalMs) ?? defaultLoaderConfig.pollIntervalMs,
    maxPollFailures:
      parseOptionalIntInRange(env, "BULK_MAX_POLL_FAILURES", loaderCaps.maxPollFailures) ?? defaultLoaderConfig.maxPollFailures
  });

  const maxWaitMs = parseOptionalIntInRange(env, "BULK_MAX_WAIT_MS", loaderCaps.maxWaitMs);
  if (maxWaitMs !== undefined) loaderConfig.maxWaitMs = maxWaitMs;

  const timeoutMs =
    parseOptionalIntInRange(env, "BULK_TIMEOUT_MS", {
      min: runtimeCaps.timeoutMs.min,
      max: runtimeCaps.timeoutMs.max
    }) ?? 30000;

  return { loaderConfig, timeoutMs, staging: parseStagingMode(env) };
};
