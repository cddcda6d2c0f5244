/**
 * OpenAI-compatible upstream adapter.
 * Requests are passed through; responses and stream chunks are re-shaped into
 * the gateway's normalized types so that non-standard upstreams look the same.
 */

import { z } from "zod";
import { UpstreamProviderError } from "../errors.js";
import { postJson, sendUpstream } from "./http.js";
import { readSSE } from "./sse.js";
import type {
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatProvider,
  EmbeddingRequest,
  EmbeddingResponse,
  ProviderCallOptions,
  Usage,
} from "./types.js";

export interface ProviderOptions {
  name: string;
  baseUrl: string;
  apiKey?: string;
  headers?: Record<string, string>;
  timeoutMs: number;
}

const UsageSchema = z.object({
  prompt_tokens: z.number().default(0),
  completion_tokens: z.number().default(0),
  total_tokens: z.number().optional(),
});

const ToolCallSchema = z.object({
  id: z.string(),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(""),
  }),
});

const ChatResponseSchema = z.object({
  id: z.string().default(""),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      index: z.number().default(0),
      message: z.object({
        content: z.string().nullish(),
        tool_calls: z.array(ToolCallSchema).nullish(),
      }),
      finish_reason: z.string().nullish(),
    }),
  ),
  usage: UsageSchema.nullish(),
});

const ChunkSchema = z.object({
  id: z.string().default(""),
  created: z.number().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        index: z.number().default(0),
        delta: z
          .object({
            role: z.string().nullish(),
            content: z.string().nullish(),
            tool_calls: z
              .array(
                z.object({
                  index: z.number(),
                  id: z.string().nullish(),
                  function: z
                    .object({
                      name: z.string().nullish(),
                      arguments: z.string().nullish(),
                    })
                    .nullish(),
                }),
              )
              .nullish(),
          })
          .default({}),
        finish_reason: z.string().nullish(),
      }),
    )
    .default([]),
  usage: UsageSchema.nullish(),
});

const EmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number(),
      embedding: z.union([z.array(z.number()), z.string()]),
    }),
  ),
  model: z.string().optional(),
  usage: z
    .object({
      prompt_tokens: z.number().default(0),
      total_tokens: z.number().optional(),
    })
    .nullish(),
});

const nowSeconds = () => Math.floor(Date.now() / 1000);

export function toUsage(usage: z.infer<typeof UsageSchema>): Usage {
  return {
    prompt_tokens: usage.prompt_tokens,
    completion_tokens: usage.completion_tokens,
    total_tokens: usage.total_tokens ?? usage.prompt_tokens + usage.completion_tokens,
  };
}

export class OpenAIProvider implements ChatProvider {
  readonly name: string;
  private baseUrl: string;
  private headers: Record<string, string>;
  private timeoutMs: number;

  constructor(options: ProviderOptions) {
    this.name = options.name;
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.headers = { ...options.headers };
    if (options.apiKey) {
      this.headers.Authorization = `Bearer ${options.apiKey}`;
    }
  }

  private parse<T extends z.ZodTypeAny>(schema: T, value: unknown, model: string): z.infer<T> {
    const result = schema.safeParse(value);
    if (!result.success) {
      throw new UpstreamProviderError(
        `Provider ${this.name} returned an unexpected response: ${result.error.issues[0]?.message ?? "invalid shape"}`,
        { provider: this.name, model },
      );
    }
    return result.data;
  }

  private normalizeResponse(raw: z.infer<typeof ChatResponseSchema>, model: string): ChatCompletionResponse {
    return {
      id: raw.id,
      object: "chat.completion",
      created: raw.created ?? nowSeconds(),
      model: raw.model ?? model,
      choices: raw.choices.map((choice) => ({
        index: choice.index,
        message: {
          role: "assistant",
          content: choice.message.content ?? null,
          ...(choice.message.tool_calls?.length
            ? {
                tool_calls: choice.message.tool_calls.map((call) => ({
                  id: call.id,
                  type: "function" as const,
                  function: { name: call.function.name, arguments: call.function.arguments },
                })),
              }
            : {}),
        },
        finish_reason: choice.finish_reason ?? null,
      })),
      ...(raw.usage ? { usage: toUsage(raw.usage) } : {}),
    };
  }

  private normalizeChunk(raw: z.infer<typeof ChunkSchema>, model: string): ChatCompletionChunk {
    return {
      id: raw.id,
      object: "chat.completion.chunk",
      created: raw.created ?? nowSeconds(),
      model: raw.model ?? model,
      choices: raw.choices.map((choice) => {
        const delta: ChatCompletionChunk["choices"][number]["delta"] = {};
        if (choice.delta.role === "assistant") {
          delta.role = "assistant";
        }
        if (choice.delta.content !== undefined && choice.delta.content !== null) {
          delta.content = choice.delta.content;
        }
        if (choice.delta.tool_calls?.length) {
          delta.tool_calls = choice.delta.tool_calls.map((call) => ({
            index: call.index,
            ...(call.id ? { id: call.id, type: "function" as const } : {}),
            ...(call.function
              ? {
                  function: {
                    ...(call.function.name ? { name: call.function.name } : {}),
                    ...(call.function.arguments ? { arguments: call.function.arguments } : {}),
                  },
                }
              : {}),
          }));
        }
        return { index: choice.index, delta, finish_reason: choice.finish_reason ?? null };
      }),
      ...(raw.usage ? { usage: toUsage(raw.usage) } : {}),
    };
  }

  private upstream(path: string, model: string, body: unknown, options: ProviderCallOptions) {
    return {
      provider: this.name,
      model,
      url: `${this.baseUrl}${path}`,
      headers: this.headers,
      body,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    };
  }

  async chatCompletion(
    request: ChatCompletionRequest,
    options: ProviderCallOptions = {},
  ): Promise<ChatCompletionResponse> {
    const body = { ...request, stream: false };
    delete body.stream_options;
    const raw = await postJson(this.upstream("/chat/completions", request.model, body, options));
    return this.normalizeResponse(this.parse(ChatResponseSchema, raw, request.model), request.model);
  }

  async *chatCompletionStream(
    request: ChatCompletionRequest,
    options: ProviderCallOptions = {},
  ): AsyncGenerator<ChatCompletionChunk> {
    const body = {
      ...request,
      stream: true,
      stream_options: request.stream_options ?? { include_usage: true },
    };
    const call = await sendUpstream(this.upstream("/chat/completions", request.model, body, options));

    try {
      if (!call.response.body) {
        return;
      }
      for await (const event of readSSE(call.response.body, call.guardRead)) {
        const data = event.data.trim();
        if (data === "[DONE]") {
          return;
        }
        let parsed: unknown;
        try {
          parsed = JSON.parse(data);
        } catch (error) {
          throw new UpstreamProviderError(`Provider ${this.name} sent a malformed stream event`, {
            provider: this.name,
            model: request.model,
            cause: error,
          });
        }
        if (typeof parsed === "object" && parsed !== null && "error" in parsed) {
          const failure = this.parse(
            z.object({ error: z.object({ message: z.string() }) }),
            parsed,
            request.model,
          );
          throw new UpstreamProviderError(failure.error.message, {
            provider: this.name,
            model: request.model,
          });
        }
        yield this.normalizeChunk(this.parse(ChunkSchema, parsed, request.model), request.model);
      }
    } catch (error) {
      throw call.toError(error);
    } finally {
      call.done();
    }
  }

  async embeddings(request: EmbeddingRequest, options: ProviderCallOptions = {}): Promise<EmbeddingResponse> {
    const raw = await postJson(this.upstream("/embeddings", request.model, request, options));
    const parsed = this.parse(EmbeddingResponseSchema, raw, request.model);
    return {
      object: "list",
      data: parsed.data.map((item) => ({
        object: "embedding",
        index: item.index,
        embedding: item.embedding,
      })),
      model: parsed.model ?? request.model,
      ...(parsed.usage
        ? {
            usage: {
              prompt_tokens: parsed.usage.prompt_tokens,
              total_tokens: parsed.usage.total_tokens ?? parsed.usage.prompt_tokens,
            },
          }
        : {}),
    };
  }
}
