/**
 * End-to-end tests for the gateway app with in-process providers
 */

import { describe, it, expect } from "vitest";
import { parseConfig, type InvalidKeyPolicy } from "./config.js";
import { UpstreamProviderError } from "./errors.js";
import { createGateway } from "./gateway.js";
import { VirtualKeyStore, type VirtualKey } from "./governance/virtual-keys.js";
import type { LogEntry } from "./middleware/log/index.js";
import { ProviderRegistry } from "./providers/registry.js";
import { FakeProvider, textChunk } from "./testing/fake-provider.js";

const ALL_MODELS = ["openai/gpt-4o", "openai/gpt-4o-mini", "anthropic/claude-3-5-sonnet", "local/llama3"];

interface SetupOptions {
  policy?: InvalidKeyPolicy;
  enforce?: boolean;
  adminToken?: string | null;
}

function setup(options: SetupOptions = {}) {
  const config = parseConfig(
    {
      providers: {},
      governance: {
        invalid_key_policy: options.policy ?? "reject",
        enforce_virtual_key: options.enforce ?? false,
      },
      logging: { level: "error", file: { enabled: false } },
    },
    {},
  );
  const openai = new FakeProvider("openai");
  const anthropic = new FakeProvider("anthropic");
  const local = new FakeProvider("local");
  const registry = new ProviderRegistry(
    [
      { name: "openai", models: ["gpt-4o", "gpt-4o-mini"], provider: openai },
      { name: "anthropic", models: ["claude-3-5-sonnet"], provider: anthropic },
      { name: "local", models: ["llama3"], provider: local },
    ],
    1700000000,
  );
  const store = new VirtualKeyStore();
  const entries: LogEntry[] = [];
  const app = createGateway({
    config,
    registry,
    store,
    adminToken: options.adminToken ?? null,
    log: (entry) => entries.push(entry),
  });

  const restricted = store.create(
    { name: "restricted", provider_configs: [{ provider: "openai", allowed_models: ["gpt-4o"] }] },
    { value: "sk-bf-restricted" },
  );
  const unrestricted = store.create({ name: "unrestricted" }, { value: "sk-bf-unrestricted" });
  const inactive = store.create(
    { name: "inactive", is_active: false, provider_configs: [{ provider: "openai", allowed_models: ["gpt-4o"] }] },
    { value: "sk-bf-inactive" },
  );

  return { app, store, openai, anthropic, entries, keys: { restricted, unrestricted, inactive } };
}

const readJson = async (response: Response) => JSON.parse(await response.text());

const vkHeaders = (value?: string): Record<string, string> => (value ? { "x-bf-vk": value } : {});

async function modelIds(response: Response): Promise<string[]> {
  const body: { object: string; data: Array<{ id: string }> } = await readJson(response);
  expect(body.object).toBe("list");
  return body.data.map((model) => model.id);
}

function chatRequest(body: Record<string, unknown>, headers: Record<string, string> = {}) {
  return {
    method: "POST",
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify({ messages: [{ role: "user", content: "Hello" }], ...body }),
  };
}

async function readEvents(response: Response): Promise<string[]> {
  const text = await response.text();
  return text
    .split("\n")
    .filter((line) => line.startsWith("data: "))
    .map((line) => line.slice("data: ".length));
}

describe("GET /v1/models", () => {
  it("lists every model without a virtual key", async () => {
    const { app } = setup();
    const response = await app.request("/v1/models");
    expect(response.status).toBe(200);
    expect(await modelIds(response)).toEqual(ALL_MODELS);
  });

  it("filters by the virtual key allow-list", async () => {
    const { app } = setup();
    const response = await app.request("/v1/models", { headers: vkHeaders("sk-bf-restricted") });
    expect(await modelIds(response)).toEqual(["openai/gpt-4o"]);
  });

  it("returns the full catalog for a key without provider configs", async () => {
    const { app } = setup();
    const response = await app.request("/v1/models", { headers: vkHeaders("sk-bf-unrestricted") });
    expect(await modelIds(response)).toEqual(ALL_MODELS);
  });

  it("narrows to one provider with ?provider=", async () => {
    const { app } = setup();
    const response = await app.request("/v1/models?provider=anthropic");
    expect(await modelIds(response)).toEqual(["anthropic/claude-3-5-sonnet"]);
  });

  it("returns an empty list for a key naming only an unknown provider", async () => {
    const { app, store } = setup();
    store.create(
      { name: "ghost", provider_configs: [{ provider: "nonexistent-provider-xyz-123" }] },
      { value: "sk-bf-ghost" },
    );
    const response = await app.request("/v1/models", { headers: vkHeaders("sk-bf-ghost") });
    expect(await modelIds(response)).toEqual([]);
  });

  it("rejects unknown keys with 401 and inactive keys with 403 under the reject policy", async () => {
    const { app } = setup({ policy: "reject" });

    const unknown = await app.request("/v1/models", { headers: vkHeaders("sk-bf-nope") });
    expect(unknown.status).toBe(401);
    expect(await readJson(unknown)).toEqual({
      error: { message: "Invalid virtual key", type: "authentication_error", code: "INVALID_VIRTUAL_KEY" },
    });

    const inactive = await app.request("/v1/models", { headers: vkHeaders("sk-bf-inactive") });
    expect(inactive.status).toBe(403);
  });

  it("serves the full catalog to unknown and inactive keys under the allow policy", async () => {
    const { app } = setup({ policy: "allow" });
    for (const value of ["sk-bf-nope", "sk-bf-inactive"]) {
      const response = await app.request("/v1/models", { headers: vkHeaders(value) });
      expect(response.status).toBe(200);
      expect(await modelIds(response)).toEqual(ALL_MODELS);
    }
  });

  it("requires a key when enforcement is on", async () => {
    const { app } = setup({ enforce: true });
    const response = await app.request("/v1/models");
    expect(response.status).toBe(401);
    expect((await app.request("/v1/models", { headers: vkHeaders("sk-bf-unrestricted") })).status).toBe(200);
  });

  it("sees key updates on the next request", async () => {
    const { app, store, keys } = setup();
    store.update(keys.restricted.id, {
      provider_configs: [{ provider: "anthropic" }, { provider: "openai", allowed_models: ["gpt-4o-mini"] }],
    });
    const response = await app.request("/v1/models", { headers: vkHeaders("sk-bf-restricted") });
    expect(await modelIds(response)).toEqual(["openai/gpt-4o-mini", "anthropic/claude-3-5-sonnet"]);
  });
});

describe("POST /v1/chat/completions", () => {
  it("routes to the provider and tags the response", async () => {
    const { app, openai, entries, keys } = setup();
    const response = await app.request(
      "/v1/chat/completions",
      chatRequest({ model: "openai/gpt-4o" }, vkHeaders("sk-bf-restricted")),
    );

    expect(response.status).toBe(200);
    const body = await readJson(response);
    expect(body.choices[0].message.content).toBe("hello from openai");
    expect(body.extra_fields).toEqual({ provider: "openai", model_requested: "gpt-4o" });
    expect(openai.chatRequests[0]?.model).toBe("gpt-4o");

    const entry = entries[entries.length - 1];
    expect(entry?.model).toBe("openai/gpt-4o");
    expect(entry?.provider).toBe("openai");
    expect(entry?.virtualKeyId).toBe(keys.restricted.id);
    expect(entry?.headers["x-bf-vk"]).toBe("[redacted]");
    expect(response.headers.get("x-request-id")).toBe(entry?.requestId);
  });

  it("returns 403 for a model the key does not allow", async () => {
    const { app, anthropic } = setup();
    const response = await app.request(
      "/v1/chat/completions",
      chatRequest({ model: "anthropic/claude-3-5-sonnet" }, vkHeaders("sk-bf-restricted")),
    );

    expect(response.status).toBe(403);
    expect(await readJson(response)).toEqual({
      error: {
        message: "Model anthropic/claude-3-5-sonnet is not allowed for this virtual key",
        type: "permission_error",
        code: "MODEL_NOT_ALLOWED",
        param: "model",
      },
      extra_fields: { provider: "anthropic", model_requested: "claude-3-5-sonnet" },
    });
    expect(anthropic.chatRequests).toHaveLength(0);
  });

  it("returns 403 for a model outside the key's visible catalog", async () => {
    const { app, store, openai } = setup();
    store.create(
      { name: "uncataloged", provider_configs: [{ provider: "openai", allowed_models: ["gpt-5"] }] },
      { value: "sk-bf-uncataloged" },
    );
    store.create({ name: "openai-only", provider_configs: [{ provider: "openai" }] }, { value: "sk-bf-openai-only" });

    const listed = await app.request("/v1/models", { headers: vkHeaders("sk-bf-uncataloged") });
    expect(await modelIds(listed)).toEqual([]);

    const allowListed = await app.request(
      "/v1/chat/completions",
      chatRequest({ model: "openai/gpt-5" }, vkHeaders("sk-bf-uncataloged")),
    );
    expect(allowListed.status).toBe(403);

    const unlisted = await app.request(
      "/v1/chat/completions",
      chatRequest({ model: "openai/gpt-unlisted" }, vkHeaders("sk-bf-openai-only")),
    );
    expect(unlisted.status).toBe(403);
    expect(openai.chatRequests).toHaveLength(0);
  });

  it("validates the body", async () => {
    const { app } = setup();

    const missingModel = await app.request("/v1/chat/completions", chatRequest({}));
    expect(missingModel.status).toBe(400);
    expect(await readJson(missingModel)).toEqual({
      error: { message: "Model is required", type: "invalid_request_error", code: "MISSING_MODEL", param: "model" },
    });

    const badJson = await app.request("/v1/chat/completions", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(badJson.status).toBe(400);
    expect((await readJson(badJson)).error.code).toBe("INVALID_JSON");
  });

  it("falls back when the primary provider fails", async () => {
    const { app, openai } = setup();
    openai.behavior.failWith = new UpstreamProviderError("Service unavailable", {
      provider: "openai",
      model: "gpt-4o",
      status: 503,
    });

    const response = await app.request(
      "/v1/chat/completions",
      chatRequest({ model: "openai/gpt-4o", fallbacks: ["anthropic/claude-3-5-sonnet"] }),
    );
    expect(response.status).toBe(200);
    expect((await readJson(response)).extra_fields.provider).toBe("anthropic");
  });

  it("returns the upstream status when every provider fails", async () => {
    const { app, openai } = setup();
    openai.behavior.failWith = new UpstreamProviderError("Service unavailable", {
      provider: "openai",
      model: "gpt-4o",
      status: 503,
    });

    const response = await app.request("/v1/chat/completions", chatRequest({ model: "openai/gpt-4o" }));
    expect(response.status).toBe(503);
    expect(await readJson(response)).toEqual({
      error: { message: "Service unavailable", type: "provider_error", code: "PROVIDER_ERROR" },
      extra_fields: { provider: "openai", model_requested: "gpt-4o" },
    });
  });

  it("streams chunks as server-sent events ending with [DONE]", async () => {
    const { app } = setup();
    const response = await app.request("/v1/chat/completions", chatRequest({ model: "openai/gpt-4o", stream: true }));

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/event-stream");
    const events = await readEvents(response);
    expect(events[events.length - 1]).toBe("[DONE]");
    const chunks = events.slice(0, -1).map((data) => JSON.parse(data));
    expect(chunks.map((chunk) => chunk.choices[0].delta.content)).toEqual(["hi", "!"]);
    expect(chunks[0].extra_fields).toEqual({ provider: "openai", model_requested: "gpt-4o" });
  });

  it("aborts the upstream call when the client disconnects mid-stream", async () => {
    const { app, openai } = setup();
    openai.behavior.chunks = [textChunk("partial")];
    openai.behavior.holdOpen = true;

    const response = await app.request("/v1/chat/completions", chatRequest({ model: "openai/gpt-4o", stream: true }));
    expect(response.status).toBe(200);
    const reader = response.body?.getReader();
    expect(reader).toBeDefined();
    const first = await reader?.read();
    expect(new TextDecoder().decode(first?.value)).toContain('"content":"partial"');
    expect(openai.signals[0]?.aborted).toBe(false);

    await reader?.cancel();
    expect(openai.signals[0]?.aborted).toBe(true);
  });

  it("reports a failure before the first chunk as an HTTP error", async () => {
    const { app, openai } = setup();
    openai.behavior.failWith = new UpstreamProviderError("Bad gateway", { provider: "openai", model: "gpt-4o" });

    const response = await app.request("/v1/chat/completions", chatRequest({ model: "openai/gpt-4o", stream: true }));
    expect(response.status).toBe(502);
    expect((await readJson(response)).error.message).toBe("Bad gateway");
  });

  it("writes a mid-stream failure as an error event before [DONE]", async () => {
    const { app, openai } = setup();
    openai.behavior.chunks = [textChunk("partial")];
    openai.behavior.failMidStreamWith = new UpstreamProviderError("connection reset", {
      provider: "openai",
      model: "gpt-4o",
    });

    const response = await app.request("/v1/chat/completions", chatRequest({ model: "openai/gpt-4o", stream: true }));
    expect(response.status).toBe(200);
    const events = await readEvents(response);
    expect(events).toHaveLength(3);
    expect(JSON.parse(events[0] ?? "").choices[0].delta.content).toBe("partial");
    expect(JSON.parse(events[1] ?? "")).toEqual({
      error: { message: "connection reset", type: "provider_error", code: "PROVIDER_ERROR" },
      extra_fields: { provider: "openai", model_requested: "gpt-4o" },
    });
    expect(events[2]).toBe("[DONE]");
  });
});

describe("POST /v1/embeddings", () => {
  it("returns embeddings from the routed provider", async () => {
    const { app } = setup();
    const response = await app.request("/v1/embeddings", {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ model: "openai/gpt-4o-mini", input: ["a", "b"] }),
    });

    expect(response.status).toBe(200);
    const body = await readJson(response);
    expect(body.data).toHaveLength(2);
    expect(body.extra_fields).toEqual({ provider: "openai", model_requested: "gpt-4o-mini" });
  });
});

describe("virtual key management", () => {
  const json = (method: string, body: unknown, headers: Record<string, string> = {}) => ({
    method,
    headers: { "Content-Type": "application/json", ...headers },
    body: JSON.stringify(body),
  });

  it("creates, reads, updates and deletes keys", async () => {
    const { app } = setup();

    const created = await app.request(
      "/api/governance/virtual-keys",
      json("POST", { name: "ci", provider_configs: [{ provider: "anthropic" }] }),
    );
    expect(created.status).toBe(200);
    const createdBody: { message: string; virtual_key: VirtualKey } = await readJson(created);
    expect(createdBody.message).toBe("Virtual key created successfully");
    const id = createdBody.virtual_key.id;

    const listed = await app.request("/api/governance/virtual-keys");
    const listBody: { virtual_keys: VirtualKey[]; count: number } = await readJson(listed);
    expect(listBody.count).toBe(4);
    expect(listBody.virtual_keys.map((key) => key.name)).toEqual(["restricted", "unrestricted", "inactive", "ci"]);

    const models = await app.request("/v1/models", { headers: vkHeaders(createdBody.virtual_key.value) });
    expect(await modelIds(models)).toEqual(["anthropic/claude-3-5-sonnet"]);

    const updated = await app.request(`/api/governance/virtual-keys/${id}`, json("PUT", { is_active: false }));
    expect(updated.status).toBe(200);
    expect((await readJson(updated)).virtual_key.is_active).toBe(false);

    const fetched = await app.request(`/api/governance/virtual-keys/${id}`);
    expect((await readJson(fetched)).virtual_key.is_active).toBe(false);

    const deleted = await app.request(`/api/governance/virtual-keys/${id}`, { method: "DELETE" });
    expect(await readJson(deleted)).toEqual({ message: "Virtual key deleted successfully" });

    const missing = await app.request(`/api/governance/virtual-keys/${id}`);
    expect(missing.status).toBe(404);
  });

  it("rejects invalid keys with 400", async () => {
    const { app } = setup();
    const response = await app.request(
      "/api/governance/virtual-keys",
      json("POST", { name: "bad", provider_configs: [{ allowed_models: ["gpt-4o"] }] }),
    );
    expect(response.status).toBe(400);
    expect(await readJson(response)).toEqual({
      error: {
        message: "Invalid virtual key: provider_configs.0.provider: provider is required",
        type: "invalid_request_error",
        code: "VALIDATION_ERROR",
        param: "provider_configs.0.provider",
      },
    });
  });

  it("requires the admin token when one is configured", async () => {
    const { app } = setup({ adminToken: "test-admin" });

    const anonymous = await app.request("/api/governance/virtual-keys");
    expect(anonymous.status).toBe(401);
    expect((await readJson(anonymous)).error.code).toBe("UNAUTHORIZED");

    const wrong = await app.request("/api/governance/virtual-keys", {
      headers: { Authorization: "Bearer wrong" },
    });
    expect(wrong.status).toBe(401);

    const authorized = await app.request("/api/governance/virtual-keys", {
      headers: { Authorization: "Bearer test-admin" },
    });
    expect(authorized.status).toBe(200);
    expect(authorized.headers.get("cache-control")).toBe("no-store");
  });
});

describe("GET /health", () => {
  it("reports healthy", async () => {
    const { app } = setup();
    const response = await app.request("/health");
    expect(response.status).toBe(200);
    expect((await readJson(response)).status).toBe("healthy");
  });
});
