/**
 * Configuration loader and validator for the gateway.
 * Loads YAML config and validates with Zod schemas.
 */

import { readFileSync } from "fs";
import { parse } from "yaml";
import { z } from "zod";
import { GatewayError } from "./errors.js";
import { CreateVirtualKeySchema, type VirtualKeyStore } from "./governance/virtual-keys.js";

const ProviderTypeSchema = z.enum(["openai", "anthropic"]);

const ProviderSettingsSchema = z.object({
  type: ProviderTypeSchema,
  base_url: z.string().url(),
  api_key_env: z.string().min(1).optional(),
  headers: z.record(z.string(), z.string()).default({}),
  models: z.array(z.string().min(1)).default([]),
});

const SeedVirtualKeySchema = CreateVirtualKeySchema.extend({
  value: z.string().trim().min(1).optional(),
});

const GovernanceConfigSchema = z.object({
  invalid_key_policy: z.enum(["reject", "allow"]).default("reject"),
  enforce_virtual_key: z.boolean().default(false),
  admin_token_env: z.string().min(1).optional(),
  virtual_keys: z
    .array(SeedVirtualKeySchema)
    .superRefine((seeds, ctx) => {
      const values = new Set<string>();
      seeds.forEach((seed, index) => {
        if (seed.value === undefined) {
          return;
        }
        if (values.has(seed.value)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [index, "value"], message: "duplicate virtual key value" });
        }
        values.add(seed.value);
      });
    })
    .default([]),
});

const FileLoggingSchema = z.object({
  enabled: z.boolean().default(true),
  dirname: z.string().default("logs"),
  filename: z.string().default("gateway.log"),
  max_size: z.number().int().positive().default(5 * 1024 * 1024),
  max_files: z.number().int().positive().default(5),
});

const ConfigSchema = z.object({
  timeout_ms: z.number().positive().default(30000),
  providers: z.record(z.string().regex(/^[^/\s]+$/, "provider names cannot contain '/'"), ProviderSettingsSchema),
  governance: GovernanceConfigSchema.default({}),
  logging: z
    .object({
      level: z.enum(["debug", "info", "warn", "error"]).default("info"),
      file: FileLoggingSchema.default({}),
    })
    .default({}),
});

export type ProviderType = z.infer<typeof ProviderTypeSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type GovernanceConfig = z.infer<typeof GovernanceConfigSchema>;
export type SeedVirtualKey = z.infer<typeof SeedVirtualKeySchema>;
export type Config = z.infer<typeof ConfigSchema>;
export type InvalidKeyPolicy = GovernanceConfig["invalid_key_policy"];

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

let config: Config | undefined;

/**
 * Validate an already-parsed config document.
 * Provider API keys must be present in `env` for every provider that names one.
 */
export function parseConfig(raw: unknown, env: NodeJS.ProcessEnv = process.env): Config {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const parsed = result.data;
  const missing: string[] = [];
  for (const [providerName, settings] of Object.entries(parsed.providers)) {
    if (settings.api_key_env && !env[settings.api_key_env]) {
      missing.push(`${settings.api_key_env} for provider ${providerName}`);
    }
  }
  if (missing.length > 0) {
    throw new ConfigError(`Missing API key: ${missing.join(", ")}`);
  }

  return parsed;
}

export function loadConfig(configPath = "config.yaml", env: NodeJS.ProcessEnv = process.env): Config {
  let rawConfig: unknown;
  try {
    rawConfig = parse(readFileSync(configPath, "utf8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to read configuration from ${configPath}: ${reason}`);
  }

  config = parseConfig(rawConfig, env);
  return config;
}

/**
 * Create the configured virtual keys. Store rejections surface as ConfigError.
 */
export function seedVirtualKeys(store: VirtualKeyStore, governance: GovernanceConfig): void {
  for (const [index, seed] of governance.virtual_keys.entries()) {
    const { value, ...input } = seed;
    try {
      store.create(input, { value });
    } catch (error) {
      if (error instanceof GatewayError) {
        throw new ConfigError(`Invalid configuration: governance.virtual_keys.${index}: ${error.message}`);
      }
      throw error;
    }
  }
}

export function getConfig(): Config {
  if (!config) {
    throw new Error("Configuration not loaded. Call loadConfig() first.");
  }
  return config;
}

export function resolveApiKey(settings: ProviderSettings, env: NodeJS.ProcessEnv = process.env): string | undefined {
  return settings.api_key_env ? env[settings.api_key_env] : undefined;
}

export function resolveAdminToken(
  governance: GovernanceConfig,
  env: NodeJS.ProcessEnv = process.env,
): string | null {
  if (!governance.admin_token_env) {
    return null;
  }
  const token = env[governance.admin_token_env]?.trim();
  return token ? token : null;
}
