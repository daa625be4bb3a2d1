export type LoaderConfig = {
  maxBytes: number;
  maxRows: number;
  concurrency: number;
  pollIntervalMs: number;
  maxWaitMs?: number; // unset: wait until every batch is terminal
  maxPollFailures: number;
};

export type LoaderConfigInput = Partial<LoaderConfig>;

export const defaultLoaderConfig: LoaderConfig = {
  maxBytes: 10_000_000,
  maxRows: 10_000,
  concurrency: 1,
  pollIntervalMs: 10_000,
  maxPollFailures: 3
};

export const loaderCaps = {
  maxBytes: { min: 1, max: 10_000_000 },
  maxRows: { min: 1, max: 10_000 },
  concurrency: { min: 1, max: 50 },
  pollIntervalMs: { min: 0, max: 600_000 },
  maxWaitMs: { min: 1, max: 7 * 24 * 60 * 60 * 1000 },
  maxPollFailures: { min: 0, max: 100 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

export const validateLoaderConfig = (config: LoaderConfig): LoaderConfig => {
  assertIntegerInRange("maxBytes", config.maxBytes, loaderCaps.maxBytes);
  assertIntegerInRange("maxRows", config.maxRows, loaderCaps.maxRows);
  assertIntegerInRange("concurrency", config.concurrency, loaderCaps.concurrency);
  assertIntegerInRange("pollIntervalMs", config.pollIntervalMs, loaderCaps.pollIntervalMs);
  if (config.maxWaitMs !== undefined) {
    assertIntegerInRange("maxWaitMs", config.maxWaitMs, loaderCaps.maxWaitMs);
  }
  assertIntegerInRange("maxPollFailures", config.maxPollFailures, loaderCaps.maxPollFailures);
  return config;
};

export const resolveLoaderConfig = (input: LoaderConfigInput = {}): LoaderConfig => {
  const config: LoaderConfig = {
    maxBytes: input.maxBytes ?? defaultLoaderConfig.maxBytes,
    maxRows: input.maxRows ?? defaultLoaderConfig.maxRows,
    concurrency: input.concurrency ?? defaultLoaderConfig.concurrency,
    pollIntervalMs: input.pollIntervalMs ?? defaultLoaderConfig.pollIntervalMs,
    maxPollFailures: input.maxPollFailures ?? defaultLoaderConfig.maxPollFailures
  };
  if (input.maxWaitMs !== undefined) config.maxWaitMs = input.maxWaitMs;
  return validateLoaderConfig(config);
};
