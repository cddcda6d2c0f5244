import { describe, it, expect } from "vitest";
import { NotFoundError, ValidationError } from "../errors.js";
import { mergeProviderConfigs, VirtualKeyStore } from "./virtual-keys.js";

const fixedNow = () => new Date("2024-05-01T12:00:00.000Z");

describe("VirtualKeyStore", () => {
  it("creates keys with defaults and a generated credential", () => {
    const store = new VirtualKeyStore(fixedNow);
    const key = store.create({ name: "team-a" });

    expect(key.name).toBe("team-a");
    expect(key.is_active).toBe(true);
    expect(key.provider_configs).toEqual([]);
    expect(key.value).toMatch(/^sk-bf-[0-9a-f-]{36}$/);
    expect(key.created_at).toBe("2024-05-01T12:00:00.000Z");
    expect(key.updated_at).toBe("2024-05-01T12:00:00.000Z");
    expect(store.get(key.id)).toBe(key);
    expect(store.getByCredential(key.value)).toBe(key);
  });

  it("uses a supplied credential value", () => {
    const store = new VirtualKeyStore(fixedNow);
    const key = store.create({ name: "seeded" }, { value: "sk-bf-seeded" });
    expect(store.getByCredential("sk-bf-seeded")?.id).toBe(key.id);
  });

  it("rejects a duplicate credential value", () => {
    const store = new VirtualKeyStore(fixedNow);
    store.create({ name: "one" }, { value: "sk-bf-dup" });
    expect(() => store.create({ name: "two" }, { value: "sk-bf-dup" })).toThrow(ValidationError);
  });

  it("fills provider config defaults", () => {
    const store = new VirtualKeyStore(fixedNow);
    const key = store.create({ name: "k", provider_configs: [{ provider: "openai" }] });
    expect(key.provider_configs).toEqual([{ provider: "openai", allowed_models: [], weight: 1 }]);
  });

  it("reports the first invalid field", () => {
    const store = new VirtualKeyStore(fixedNow);
    let caught: unknown;
    try {
      store.create({ name: "k", provider_configs: [{ allowed_models: ["gpt-4"] }] });
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught instanceof ValidationError && caught.message).toBe(
      "Invalid virtual key: provider_configs.0.provider: provider is required",
    );
    expect(caught instanceof ValidationError && caught.param).toBe("provider_configs.0.provider");
  });

  it("rejects a missing name and a negative weight", () => {
    const store = new VirtualKeyStore(fixedNow);
    expect(() => store.create({})).toThrow("name is required");
    expect(() => store.create({ name: "k", provider_configs: [{ provider: "openai", weight: -1 }] })).toThrow(
      ValidationError,
    );
  });

  it("merges duplicate provider configs at create time", () => {
    const store = new VirtualKeyStore(fixedNow);
    const key = store.create({
      name: "k",
      provider_configs: [
        { provider: "openai", allowed_models: ["gpt-4"], weight: 2 },
        { provider: "anthropic", allowed_models: ["claude"] },
        { provider: "openai", allowed_models: ["gpt-4o", "gpt-4"], weight: 5 },
      ],
    });
    expect(key.provider_configs).toEqual([
      { provider: "openai", allowed_models: ["gpt-4", "gpt-4o"], weight: 2 },
      { provider: "anthropic", allowed_models: ["claude"], weight: 1 },
    ]);
  });

  it("updates fields and swaps the record", () => {
    let tick = 0;
    const store = new VirtualKeyStore(() => new Date(Date.UTC(2024, 0, 1, 0, 0, tick++)));
    const original = store.create({ name: "k", description: "first" });
    const updated = store.update(original.id, {
      is_active: false,
      provider_configs: [{ provider: "openai", allowed_models: ["gpt-4"] }],
    });

    expect(updated).not.toBe(original);
    expect(original.is_active).toBe(true);
    expect(updated.is_active).toBe(false);
    expect(updated.description).toBe("first");
    expect(updated.value).toBe(original.value);
    expect(updated.created_at).toBe("2024-01-01T00:00:00.000Z");
    expect(updated.updated_at).toBe("2024-01-01T00:00:01.000Z");
    expect(store.getByCredential(original.value)).toBe(updated);
  });

  it("keeps provider configs when an update omits them", () => {
    const store = new VirtualKeyStore(fixedNow);
    const key = store.create({ name: "k", provider_configs: [{ provider: "openai", allowed_models: ["gpt-4"] }] });
    expect(store.update(key.id, { name: "renamed" }).provider_configs).toEqual(key.provider_configs);
  });

  it("returns frozen records", () => {
    const store = new VirtualKeyStore(fixedNow);
    const key = store.create({ name: "k", provider_configs: [{ provider: "openai", allowed_models: ["gpt-4"] }] });
    expect(Object.isFrozen(key)).toBe(true);
    expect(Object.isFrozen(key.provider_configs)).toBe(true);
    expect(Object.isFrozen(key.provider_configs[0]?.allowed_models)).toBe(true);
  });

  it("lists keys in creation order and deletes them", () => {
    const store = new VirtualKeyStore(fixedNow);
    const a = store.create({ name: "a" });
    const b = store.create({ name: "b" });
    expect(store.list().map((key) => key.name)).toEqual(["a", "b"]);

    store.delete(a.id);
    expect(store.list()).toEqual([b]);
    expect(store.getByCredential(a.value)).toBeUndefined();
  });

  it("throws NotFoundError for unknown ids", () => {
    const store = new VirtualKeyStore(fixedNow);
    expect(() => store.update("missing", { name: "x" })).toThrow(NotFoundError);
    expect(() => store.delete("missing")).toThrow("Virtual key missing was not found");
    expect(() => store.getOrThrow("missing")).toThrow(NotFoundError);
  });
});

describe("mergeProviderConfigs", () => {
  it("lets an empty allow-list win as all models", () => {
    expect(
      mergeProviderConfigs([
        { provider: "openai", allowed_models: ["gpt-4"], weight: 1 },
        { provider: "openai", allowed_models: [], weight: 3 },
      ]),
    ).toEqual([{ provider: "openai", allowed_models: [], weight: 1 }]);
  });

  it("de-duplicates a single entry's allow-list", () => {
    expect(mergeProviderConfigs([{ provider: "openai", allowed_models: ["a", "a", "b"], weight: 1 }])).toEqual([
      { provider: "openai", allowed_models: ["a", "b"], weight: 1 },
    ]);
  });
});
