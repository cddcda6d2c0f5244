import { describe, expect, it } from "vitest";
import { parseConfig } from "../config.js";
import { FakeProvider } from "../testing/fake-provider.js";
import { AnthropicProvider } from "./anthropic.js";
import { OpenAIProvider } from "./openai.js";
import { createProviderRegistry, ProviderRegistry } from "./registry.js";

describe("ProviderRegistry", () => {
  const registry = new ProviderRegistry(
    [
      { name: "openai", models: ["gpt-4o", "gpt-4o-mini", "gpt-4o"], provider: new FakeProvider("openai") },
      { name: "anthropic", models: ["claude-3-5-sonnet"], provider: new FakeProvider("anthropic") },
      { name: "mirror", models: ["gpt-4o"], provider: new FakeProvider("mirror") },
    ],
    1700000000,
  );

  it("lists prefixed models in configuration order without duplicates", () => {
    expect(registry.listAllModels()).toEqual([
      { id: "openai/gpt-4o", object: "model", created: 1700000000, owned_by: "openai" },
      { id: "openai/gpt-4o-mini", object: "model", created: 1700000000, owned_by: "openai" },
      { id: "anthropic/claude-3-5-sonnet", object: "model", created: 1700000000, owned_by: "anthropic" },
      { id: "mirror/gpt-4o", object: "model", created: 1700000000, owned_by: "mirror" },
    ]);
  });

  it("returns a frozen catalog snapshot", () => {
    expect(Object.isFrozen(registry.listAllModels())).toBe(true);
    expect(registry.listAllModels()).toBe(registry.listAllModels());
  });

  it("answers per-provider lookups", () => {
    expect(registry.listModelsForProvider("openai")).toEqual(["gpt-4o", "gpt-4o-mini"]);
    expect(registry.listModelsForProvider("missing")).toEqual([]);
    expect(registry.hasProvider("anthropic")).toBe(true);
    expect(registry.getProvider("missing")).toBeUndefined();
    expect(registry.providerNames()).toEqual(["openai", "anthropic", "mirror"]);
    expect(registry.providersListing("gpt-4o")).toEqual(["openai", "mirror"]);
  });

  it("refuses to register a provider twice", () => {
    expect(
      () =>
        new ProviderRegistry([
          { name: "openai", models: [], provider: new FakeProvider("openai") },
          { name: "openai", models: [], provider: new FakeProvider("openai") },
        ]),
    ).toThrow("Provider openai is registered twice");
  });
});

describe("createProviderRegistry", () => {
  it("builds an adapter per configured provider type", () => {
    const config = parseConfig(
      {
        providers: {
          openai: { type: "openai", base_url: "https://upstream.test/v1", models: ["gpt-4o"] },
          anthropic: { type: "anthropic", base_url: "https://upstream.test/anthropic/v1", models: ["claude"] },
        },
      },
      {},
    );
    const registry = createProviderRegistry(config, {});

    expect(registry.getProvider("openai")).toBeInstanceOf(OpenAIProvider);
    expect(registry.getProvider("anthropic")).toBeInstanceOf(AnthropicProvider);
    expect(registry.getProvider("anthropic")?.name).toBe("anthropic");
    expect(registry.listAllModels().map((model) => model.id)).toEqual(["openai/gpt-4o", "anthropic/claude"]);
  });
});
