import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigurationError } from "./errors.js";
import { BACKOFF_STRATEGIES } from "./resilience/backoff.js";
import { DEFAULT_CIRCUIT_OPTIONS } from "./resilience/circuit-breaker.js";
import { ERROR_KINDS } from "./resilience/error-classifier.js";

const DEFAULT_CONFIG_PATH = "harness.config.json";

export const ROTATION_STRATEGIES = [
  "provider_first",
  "model_first",
  "cost_optimized",
  "performance_optimized",
  "quota_aware",
] as const;

export type RotationStrategy = (typeof ROTATION_STRATEGIES)[number];

const ModelObjectSchema = z.object({
  id: z.string().min(1).regex(/^\S+$/, "model ids may not contain spaces"),
  weight: z.number().min(0).default(1),
  timeoutMs: z.number().int().positive().optional(),
  maxTokens: z.number().int().positive().optional(),
  costPerToken: z.number().min(0).optional(),
  flags: z.array(z.string()).default([]),
});

const ModelSchema = z.union([
  z
    .string()
    .min(1)
    .regex(/^\S+$/, "model ids may not contain spaces")
    .transform((id): z.infer<typeof ModelObjectSchema> => ({ id, weight: 1, flags: [] })),
  ModelObjectSchema,
]);

const ProviderSchema = z.object({
  type: z.enum(["subscription", "usage_based", "passthrough"]).default("usage_based"),
  priority: z.number().int().default(100),
  weight: z.number().min(0).default(1),
  models: z.array(ModelSchema).min(1),
  costPerToken: z.number().min(0).optional(),
  quotaLimit: z.number().int().positive().optional(),
});

const ProvidersSchema = z.object({
  default: z.string().min(1).optional(),
  fallback: z.array(z.string().min(1)).optional(),
  items: z
    .record(z.string().regex(/^[^:\s]+$/, "provider names may not contain ':' or spaces"), ProviderSchema)
    .refine((items) => Object.keys(items).length > 0, {
      message: "providers.items must configure at least one provider",
    }),
});

const RotationSchema = z
  .object({
    strategy: z.enum(ROTATION_STRATEGIES).default("provider_first"),
    historyLimit: z.number().int().positive().default(1000),
    loadBalancing: z.boolean().default(false),
    modelSwitching: z.boolean().default(true),
  })
  .default({});

const CircuitBreakerSchema = z
  .object({
    failureThreshold: z.number().int().positive().default(DEFAULT_CIRCUIT_OPTIONS.failureThreshold),
    timeoutMs: z.number().int().positive().default(DEFAULT_CIRCUIT_OPTIONS.timeoutMs),
    historyLimit: z.number().int().positive().default(100),
  })
  .default({});

const RateLimitSchema = z
  .object({
    defaultResetMs: z.number().int().positive().default(1_800_000),
    waitForReset: z.boolean().default(false),
    maxWaitMs: z.number().int().positive().default(3_600_000),
    tickMs: z.number().int().positive().default(1000),
  })
  .default({});

const QuotaSchema = z
  .object({
    defaultLimit: z.number().int().positive().default(1000),
  })
  .default({});

const RetryPolicySchema = z.object({
  strategy: z.enum(BACKOFF_STRATEGIES).optional(),
  maxRetries: z.number().int().min(0).optional(),
  baseDelayMs: z.number().min(0).optional(),
  maxDelayMs: z.number().min(0).optional(),
  exponentialBase: z.number().min(1).optional(),
});

const RetrySchema = z
  .object({
    jitter: z.boolean().default(false),
    jitterFraction: z.number().min(0).max(1).default(0.1),
    policies: z.record(z.enum(ERROR_KINDS), RetryPolicySchema).default({}),
  })
  .default({});

const StateSchema = z
  .object({
    lockTimeoutMs: z.number().int().positive().default(30_000),
    lockPollMs: z.number().int().positive().default(100),
    staleLockMs: z.number().int().positive().default(600_000),
    retentionDays: z.number().int().positive().default(7),
  })
  .default({});

const LoggingSchema = z
  .object({
    level: z.enum(["trace", "debug", "info", "warn", "error", "silent"]).default("info"),
    filePath: z.string().optional(),
    fileLevel: z.enum(["trace", "debug", "info", "warn", "error"]).optional(),
  })
  .default({});

const ConfigSchema = z.object({
  projectDir: z.string().default("."),
  mode: z
    .string()
    .regex(/^[A-Za-z0-9_-]+$/, "mode may only contain letters, digits, '-' and '_'")
    .default("default"),
  stateDir: z.string().optional(),
  providers: ProvidersSchema,
  rotation: RotationSchema,
  circuitBreaker: CircuitBreakerSchema,
  rateLimit: RateLimitSchema,
  quota: QuotaSchema,
  retry: RetrySchema,
  state: StateSchema,
  logging: LoggingSchema,
});

export type ConfigInput = z.input<typeof ConfigSchema>;
export type ProviderDefinition = z.infer<typeof ProviderSchema> & { name: string };
export type ModelDefinition = z.infer<typeof ModelObjectSchema>;

export type HarnessConfig = z.infer<typeof ConfigSchema> & {
  resolved: {
    projectDir: string;
    stateDir: string;
    defaultProvider: string;
    /** Provider names ordered by priority, then name */
    providerOrder: string[];
    fallbackChain: string[];
    providers: Record<string, ProviderDefinition>;
    logFilePath?: string;
  };
};

export async function loadConfig(explicitPath?: string): Promise<HarnessConfig> {
  const configPath = resolveConfigPath(explicitPath);
  let raw: string;
  try {
    raw = await fs.readFile(configPath, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Cannot read config file: ${configPath}`, {
      details: { error: err instanceof Error ? err.message : String(err) },
      suggestion: `Create ${DEFAULT_CONFIG_PATH} or pass --config`,
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    throw new ConfigurationError(`Config file is not valid JSON: ${configPath}`, {
      details: { error: err instanceof Error ? err.message : String(err) },
    });
  }

  const cfg = parseConfig(parsed, path.dirname(configPath));
  return cfg;
}

export function resolveConfigPath(explicitPath?: string): string {
  const envPath = process.env.HARNESS_CONFIG?.trim();
  const pathToUse = explicitPath?.trim() || envPath || DEFAULT_CONFIG_PATH;
  return resolveUserPath(pathToUse);
}

/**
 * Validate a raw config object and resolve derived values.
 * Relative directories resolve against `baseDir` (the cwd by default).
 */
export function parseConfig(raw: unknown, baseDir?: string): HarnessConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join("; ")}`, {
      details: { issues },
    });
  }
  return resolveConfig(result.data, baseDir);
}

function resolveConfig(base: z.infer<typeof ConfigSchema>, baseDir?: string): HarnessConfig {
  const projectDir = resolveUserPath(base.projectDir, baseDir);
  const stateDir = resolveUserPath(base.stateDir?.trim() || path.join(projectDir, ".harness"), projectDir);
  const logFilePath = base.logging.filePath?.trim()
    ? resolveUserPath(base.logging.filePath, projectDir)
    : undefined;

  const providers: Record<string, ProviderDefinition> = {};
  for (const [name, item] of Object.entries(base.providers.items)) {
    const seen = new Set<string>();
    for (const model of item.models) {
      if (seen.has(model.id)) {
        throw new ConfigurationError(`Provider ${name} declares model ${model.id} twice`);
      }
      seen.add(model.id);
    }
    providers[name] = { ...item, name };
  }

  const providerOrder = Object.values(providers)
    .sort((a, b) => a.priority - b.priority || a.name.localeCompare(b.name))
    .map((p) => p.name);

  const defaultProvider = base.providers.default ?? providerOrder[0];
  if (!defaultProvider || !providers[defaultProvider]) {
    throw new ConfigurationError(`Default provider is not configured: ${String(defaultProvider)}`, {
      suggestion: `Use one of: ${providerOrder.join(", ")}`,
    });
  }

  const fallbackChain = normalizeFallback(base.providers.fallback, providerOrder, providers);

  return {
    ...base,
    resolved: {
      projectDir,
      stateDir,
      defaultProvider,
      providerOrder,
      fallbackChain,
      providers,
      logFilePath,
    },
  };
}

function normalizeFallback(
  fallback: string[] | undefined,
  providerOrder: string[],
  providers: Record<string, ProviderDefinition>,
): string[] {
  if (!fallback || fallback.length === 0) return [...providerOrder];
  const unknown = fallback.filter((name) => !providers[name]);
  if (unknown.length > 0) {
    throw new ConfigurationError(`Fallback chain names unknown providers: ${unknown.join(", ")}`);
  }
  const chain = Array.from(new Set(fallback));
  // Providers left out of the explicit chain are still reachable, after it.
  for (const name of providerOrder) {
    if (!chain.includes(name)) chain.push(name);
  }
  return chain;
}

function resolveUserPath(value: string, baseDir?: string): string {
  const trimmed = value.trim();
  if (!trimmed) return trimmed;
  if (trimmed === "~") return os.homedir();
  if (trimmed.startsWith("~/")) {
    return path.join(os.homedir(), trimmed.slice(2));
  }
  if (path.isAbsolute(trimmed)) {
    return path.normalize(trimmed);
  }
  if (baseDir) {
    return path.resolve(baseDir, trimmed);
  }
  return path.resolve(trimmed);
}
