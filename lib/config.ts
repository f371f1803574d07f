import { z } from "zod";
import { ConfigurationError } from "./infrastructure/cvcue/errors";
import { DEFAULT_SESSION_FILE } from "./infrastructure/cvcue/client/session-store";

/**
 * Client settings and the environment variables that back them.
 * Explicit values passed to resolveClientConfig always win over the environment.
 */
export const CONFIG_DEFINITIONS = {
  keyId: { envVar: "CV_CUE_KEY_ID", description: "CV-CUE API key ID" },
  keyValue: { envVar: "CV_CUE_KEY_VALUE", description: "CV-CUE API key value" },
  clientId: { envVar: "CV_CUE_CLIENT_ID", description: "CV-CUE client ID" },
  baseUrl: { envVar: "CV_CUE_BASE_URL", description: "CV-CUE base URL" },
  sessionFile: { envVar: "CV_CUE_SESSION_FILE", description: "Session cache file" },
  timeoutMs: { envVar: "CV_CUE_TIMEOUT_MS", description: "Request timeout in milliseconds" },
} as const;

export type ConfigKey = keyof typeof CONFIG_DEFINITIONS;

export interface ClientConfigInput {
  keyId?: string;
  keyValue?: string;
  clientId?: string;
  baseUrl?: string;
  sessionFile?: string;
  timeoutMs?: number;
}

export interface ClientConfig {
  keyId: string;
  keyValue: string;
  clientId: string;
  baseUrl: string;
  sessionFile: string;
  timeoutMs?: number;
}

const REQUIRED_KEYS = ["keyId", "keyValue", "clientId", "baseUrl"] as const;

const ClientConfigSchema = z.object({
  keyId: z.string().min(1),
  keyValue: z.string().min(1),
  clientId: z.string().min(1),
  baseUrl: z
    .string()
    .url({ message: "CV-CUE base URL must be an absolute URL" })
    .transform((url) => url.replace(/\/+$/, "")),
  sessionFile: z.string().min(1).default(DEFAULT_SESSION_FILE),
  timeoutMs: z.number().int().positive().optional(),
});

type Env = Record<string, string | undefined>;

/**
 * Resolve client configuration from explicit values, falling back to the environment.
 * Empty strings count as missing.
 *
 * @throws ConfigurationError when a required value is missing or malformed
 */
export function resolveClientConfig(input: ClientConfigInput = {}, env: Env = process.env): ClientConfig {
  const pick = (key: Exclude<ConfigKey, "timeoutMs">): string | undefined =>
    nonEmpty(input[key]) ?? nonEmpty(env[CONFIG_DEFINITIONS[key].envVar]);

  for (const key of REQUIRED_KEYS) {
    if (!pick(key)) {
      const { description, envVar } = CONFIG_DEFINITIONS[key];
      throw new ConfigurationError(`${description} must be provided or set in ${envVar} environment variable`);
    }
  }

  const result = ClientConfigSchema.safeParse({
    keyId: pick("keyId"),
    keyValue: pick("keyValue"),
    clientId: pick("clientId"),
    baseUrl: pick("baseUrl"),
    sessionFile: pick("sessionFile"),
    timeoutMs: input.timeoutMs ?? parseTimeout(env[CONFIG_DEFINITIONS.timeoutMs.envVar]),
  });

  if (!result.success) {
    const message = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid CV-CUE configuration: ${message}`);
  }

  return result.data;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value === "" ? undefined : value;
}

/**
 * A timeout from the environment that is not a positive integer is ignored with a
 * warning; an explicit `timeoutMs` argument is validated by the schema instead.
 */
function parseTimeout(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    console.warn(`[Config] Invalid positive integer for ${CONFIG_DEFINITIONS.timeoutMs.envVar}: ${raw}. Ignoring.`);
    return undefined;
  }
  return parsed;
}
