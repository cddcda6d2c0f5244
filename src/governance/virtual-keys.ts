/**
 * In-memory virtual key store.
 *
 * Records are frozen and swapped whole on every write, and the credential
 * index is updated in the same synchronous step, so a reader sees either the
 * old record or the new one.
 */

import { randomUUID } from "crypto";
import { z } from "zod";
import { NotFoundError, ValidationError } from "../errors.js";
import { parseInput } from "../utils/validation.js";

export interface ProviderConfig {
  provider: string;
  /** Empty means every model of the provider. */
  allowed_models: string[];
  weight: number;
}

export interface VirtualKey {
  id: string;
  name: string;
  description?: string;
  value: string;
  is_active: boolean;
  /** Empty means unrestricted. */
  provider_configs: ProviderConfig[];
  created_at: string;
  updated_at: string;
}

const ProviderConfigSchema = z.object({
  provider: z.string({ required_error: "provider is required" }).trim().min(1, "provider is required"),
  allowed_models: z.array(z.string().trim().min(1)).default([]),
  weight: z.number().nonnegative().default(1),
});

export const CreateVirtualKeySchema = z.object({
  name: z.string({ required_error: "name is required" }).trim().min(1, "name is required").max(200),
  description: z.string().max(1000).optional(),
  is_active: z.boolean().default(true),
  provider_configs: z.array(ProviderConfigSchema).default([]),
});

export const UpdateVirtualKeySchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    description: z.string().max(1000),
    is_active: z.boolean(),
    provider_configs: z.array(ProviderConfigSchema),
  })
  .partial();

export type CreateVirtualKeyInput = z.input<typeof CreateVirtualKeySchema>;
export type UpdateVirtualKeyInput = z.input<typeof UpdateVirtualKeySchema>;

export interface CreateVirtualKeyOptions {
  /** Use a known credential instead of generating one (config seeding). */
  value?: string;
}

/**
 * Merge entries naming the same provider: allow-lists are unioned (an empty
 * list wins as "all models"), the first entry's weight and position are kept.
 */
export function mergeProviderConfigs(configs: readonly ProviderConfig[]): ProviderConfig[] {
  const merged = new Map<string, ProviderConfig>();
  for (const config of configs) {
    const existing = merged.get(config.provider);
    if (!existing) {
      merged.set(config.provider, {
        provider: config.provider,
        allowed_models: [...new Set(config.allowed_models)],
        weight: config.weight,
      });
      continue;
    }
    const allowAll = existing.allowed_models.length === 0 || config.allowed_models.length === 0;
    existing.allowed_models = allowAll
      ? []
      : [...new Set([...existing.allowed_models, ...config.allowed_models])];
  }
  return [...merged.values()];
}

function freezeKey(key: VirtualKey): VirtualKey {
  for (const config of key.provider_configs) {
    Object.freeze(config.allowed_models);
    Object.freeze(config);
  }
  Object.freeze(key.provider_configs);
  return Object.freeze(key);
}

export const generateVirtualKeyValue = (): string => `sk-bf-${randomUUID()}`;

export class VirtualKeyStore {
  private byId = new Map<string, VirtualKey>();
  private idByValue = new Map<string, string>();

  constructor(private now: () => Date = () => new Date()) {}

  /** `input` is validated against CreateVirtualKeySchema. */
  create(input: unknown, options: CreateVirtualKeyOptions = {}): VirtualKey {
    const parsed = parseInput(CreateVirtualKeySchema, input, "virtual key");
    const value = options.value ?? generateVirtualKeyValue();
    if (this.idByValue.has(value)) {
      throw new ValidationError("A virtual key with this value already exists", { param: "value" });
    }

    const timestamp = this.now().toISOString();
    const key = freezeKey({
      id: randomUUID(),
      name: parsed.name,
      ...(parsed.description !== undefined ? { description: parsed.description } : {}),
      value,
      is_active: parsed.is_active,
      provider_configs: mergeProviderConfigs(parsed.provider_configs),
      created_at: timestamp,
      updated_at: timestamp,
    });

    this.byId.set(key.id, key);
    this.idByValue.set(key.value, key.id);
    return key;
  }

  get(id: string): VirtualKey | undefined {
    return this.byId.get(id);
  }

  getOrThrow(id: string): VirtualKey {
    const key = this.byId.get(id);
    if (!key) {
      throw new NotFoundError(`Virtual key ${id} was not found`);
    }
    return key;
  }

  getByCredential(value: string): VirtualKey | undefined {
    const id = this.idByValue.get(value);
    return id === undefined ? undefined : this.byId.get(id);
  }

  /** All keys in creation order. */
  list(): VirtualKey[] {
    return [...this.byId.values()];
  }

  /** `patch` is validated against UpdateVirtualKeySchema. */
  update(id: string, patch: unknown): VirtualKey {
    const existing = this.getOrThrow(id);
    const parsed = parseInput(UpdateVirtualKeySchema, patch, "virtual key update");

    const updated = freezeKey({
      ...existing,
      ...(parsed.name !== undefined ? { name: parsed.name } : {}),
      ...(parsed.description !== undefined ? { description: parsed.description } : {}),
      ...(parsed.is_active !== undefined ? { is_active: parsed.is_active } : {}),
      provider_configs:
        parsed.provider_configs !== undefined
          ? mergeProviderConfigs(parsed.provider_configs)
          : existing.provider_configs.map((config) => ({
              ...config,
              allowed_models: [...config.allowed_models],
            })),
      updated_at: this.now().toISOString(),
    });

    this.byId.set(id, updated);
    return updated;
  }

  delete(id: string): void {
    const existing = this.getOrThrow(id);
    this.byId.delete(id);
    this.idByValue.delete(existing.value);
  }
}
