export type Env = {
  BULK_INSTANCE_URL: string;
  BULK_SESSION_ID: string;
  BULK_API_VERSION: string;
};

const validateHttpUrl = (name: string, value: string): string => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    throw new Error(`${name} must be a valid absolute http/https URL. Received: ${value}`);
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new Error(`${name} must use http or https scheme. Received: ${value}`);
  }

  return value;
};

const validateApiVersion = (name: string, value: string): string => {
  if (!/^\d+\.\d$/.test(value)) {
    throw new Error(`${name} must look like 45.0. Received: ${value}`);
  }
  return value;
};

export const loadEnv = (env: NodeJS.ProcessEnv = process.env): Env => {
  const BULK_INSTANCE_URL = validateHttpUrl("BULK_INSTANCE_URL", env.BULK_INSTANCE_URL ?? "http://localhost:3998");
  const BULK_SESSION_ID = env.BULK_SESSION_ID ?? "";
  const BULK_API_VERSION = validateApiVersion("BULK_API_VERSION", env.BULK_API_VERSION?.trim() || "45.0");

  return { BULK_INSTANCE_URL, BULK_SESSION_ID, BULK_API_VERSION };
};
