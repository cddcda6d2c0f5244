/**
 * Provider registry: the configured upstream providers, their adapters and
 * the model catalog they expose as `provider/model` identifiers.
 */

import { resolveApiKey, type Config, type ProviderSettings } from "../config.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAIProvider } from "./openai.js";
import type { ChatProvider } from "./types.js";

export interface Model {
  id: string;
  object: "model";
  created: number;
  owned_by: string;
}

export interface ProviderEntry {
  name: string;
  models: string[];
  provider: ChatProvider;
}

export class ProviderRegistry {
  private entries = new Map<string, ProviderEntry>();
  private catalog: readonly Model[];

  constructor(entries: ProviderEntry[], createdAt: number = Math.floor(Date.now() / 1000)) {
    const catalog: Model[] = [];
    for (const entry of entries) {
      if (this.entries.has(entry.name)) {
        throw new Error(`Provider ${entry.name} is registered twice`);
      }
      const models = [...new Set(entry.models)];
      this.entries.set(entry.name, { ...entry, models });
      for (const model of models) {
        catalog.push(
          Object.freeze({
            id: `${entry.name}/${model}`,
            object: "model" as const,
            created: createdAt,
            owned_by: entry.name,
          }),
        );
      }
    }
    this.catalog = Object.freeze(catalog);
  }

  /** Every model of every provider, in configuration order. */
  listAllModels(): readonly Model[] {
    return this.catalog;
  }

  listModelsForProvider(provider: string): string[] {
    return [...(this.entries.get(provider)?.models ?? [])];
  }

  getProvider(name: string): ChatProvider | undefined {
    return this.entries.get(name)?.provider;
  }

  hasProvider(name: string): boolean {
    return this.entries.has(name);
  }

  providerNames(): string[] {
    return [...this.entries.keys()];
  }

  /** Providers whose catalog lists the bare model name. */
  providersListing(model: string): string[] {
    return [...this.entries.values()]
      .filter((entry) => entry.models.includes(model))
      .map((entry) => entry.name);
  }
}

export function createProvider(
  name: string,
  settings: ProviderSettings,
  timeoutMs: number,
  env: NodeJS.ProcessEnv = process.env,
): ChatProvider {
  const options = {
    name,
    baseUrl: settings.base_url,
    apiKey: resolveApiKey(settings, env),
    headers: settings.headers,
    timeoutMs,
  };
  return settings.type === "anthropic" ? new AnthropicProvider(options) : new OpenAIProvider(options);
}

export function createProviderRegistry(config: Config, env: NodeJS.ProcessEnv = process.env): ProviderRegistry {
  return new ProviderRegistry(
    Object.entries(config.providers).map(([name, settings]) => ({
      name,
      models: settings.models,
      provider: createProvider(name, settings, config.timeout_ms, env),
    })),
  );
}
