/**
 * Anthropic Messages API adapter.
 * Handles request/response translation between OpenAI and Anthropic formats,
 * including tool calls, image inputs and streaming events.
 */

import { z } from "zod";
import { UpstreamProviderError, ValidationError } from "../errors.js";
import { parseImageSource } from "../utils/image-url.js";
import { postJson, sendUpstream } from "./http.js";
import type { ProviderOptions } from "./openai.js";
import { readSSE } from "./sse.js";
import type {
  AssistantMessage,
  ChatCompletionChunk,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatMessage,
  ChatProvider,
  ContentPart,
  EmbeddingRequest,
  EmbeddingResponse,
  ProviderCallOptions,
  TextContentPart,
  ToolCall,
  ToolChoice,
  ToolDefinition,
} from "./types.js";

const ANTHROPIC_VERSION = "2023-06-01";
const DEFAULT_MAX_TOKENS = 1024;

export type AnthropicContentBlock =
  | { type: "text"; text: string }
  | {
      type: "image";
      source: { type: "url"; url: string } | { type: "base64"; media_type: string; data: string };
    }
  | { type: "tool_use"; id: string; name: string; input: unknown }
  | { type: "tool_result"; tool_use_id: string; content: string };

export interface AnthropicMessage {
  role: "user" | "assistant";
  content: string | AnthropicContentBlock[];
}

export interface AnthropicTool {
  name: string;
  description?: string;
  input_schema: Record<string, unknown>;
}

export type AnthropicToolChoice =
  | { type: "auto"; disable_parallel_tool_use?: boolean }
  | { type: "any"; disable_parallel_tool_use?: boolean }
  | { type: "tool"; name: string; disable_parallel_tool_use?: boolean };

export interface AnthropicRequest {
  model: string;
  max_tokens: number;
  messages: AnthropicMessage[];
  system?: string;
  temperature?: number;
  top_p?: number;
  stop_sequences?: string[];
  stream?: boolean;
  tools?: AnthropicTool[];
  tool_choice?: AnthropicToolChoice;
}

const AnthropicResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  content: z.array(
    z.object({
      type: z.string(),
      text: z.string().optional(),
      id: z.string().optional(),
      name: z.string().optional(),
      input: z.unknown(),
    }),
  ),
  stop_reason: z.string().nullable(),
  usage: z.object({
    input_tokens: z.number(),
    output_tokens: z.number(),
  }),
});

export type AnthropicResponse = z.infer<typeof AnthropicResponseSchema>;

const StreamEventSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("message_start"),
    message: z.object({
      id: z.string(),
      model: z.string(),
      usage: z.object({ input_tokens: z.number().default(0) }).default({}),
    }),
  }),
  z.object({
    type: z.literal("content_block_start"),
    index: z.number(),
    content_block: z.object({
      type: z.string(),
      id: z.string().optional(),
      name: z.string().optional(),
      text: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("content_block_delta"),
    index: z.number(),
    delta: z.object({
      type: z.string(),
      text: z.string().optional(),
      partial_json: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal("message_delta"),
    delta: z.object({ stop_reason: z.string().nullish() }),
    usage: z.object({ output_tokens: z.number().default(0) }).default({}),
  }),
  z.object({ type: z.literal("content_block_stop") }),
  z.object({ type: z.literal("message_stop") }),
  z.object({ type: z.literal("ping") }),
  z.object({
    type: z.literal("error"),
    error: z.object({ type: z.string(), message: z.string() }),
  }),
]);

type StreamEvent = z.infer<typeof StreamEventSchema>;

const ERROR_TYPE_STATUS: Record<string, number> = {
  invalid_request_error: 400,
  authentication_error: 401,
  permission_error: 403,
  not_found_error: 404,
  rate_limit_error: 429,
  api_error: 500,
  overloaded_error: 529,
};

export function mapFinishReason(stopReason: string | null | undefined): string | null {
  if (!stopReason) {
    return null;
  }
  const reasonMap: Record<string, string> = {
    end_turn: "stop",
    max_tokens: "length",
    stop_sequence: "stop",
    tool_use: "tool_calls",
  };
  return reasonMap[stopReason] ?? stopReason;
}

function textOf(content: string | TextContentPart[] | null | undefined): string {
  if (!content) {
    return "";
  }
  if (typeof content === "string") {
    return content;
  }
  return content.map((part) => part.text).join("");
}

function toBlocks(content: string | AnthropicContentBlock[]): AnthropicContentBlock[] {
  if (typeof content !== "string") {
    return content;
  }
  return content ? [{ type: "text", text: content }] : [];
}

function parseToolArguments(call: ToolCall): unknown {
  if (!call.function.arguments.trim()) {
    return {};
  }
  try {
    return JSON.parse(call.function.arguments);
  } catch (error) {
    throw new ValidationError(`Tool call ${call.id} arguments must be valid JSON`, {
      param: "messages",
      cause: error,
    });
  }
}

/**
 * Per-stream translation state: Anthropic addresses tool calls by content
 * block index, OpenAI by a dense tool-call index.
 */
class StreamTranslator {
  private id = "";
  private model: string;
  private created = Math.floor(Date.now() / 1000);
  private inputTokens = 0;
  private toolIndexByBlock = new Map<number, number>();

  constructor(
    private provider: string,
    requestedModel: string,
  ) {
    this.model = requestedModel;
  }

  private chunk(
    delta: ChatCompletionChunk["choices"][number]["delta"],
    finishReason: string | null = null,
  ): ChatCompletionChunk {
    return {
      id: `chatcmpl-${this.id}`,
      object: "chat.completion.chunk",
      created: this.created,
      model: this.model,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }

  translate(event: StreamEvent): ChatCompletionChunk | null {
    switch (event.type) {
      case "message_start":
        this.id = event.message.id;
        this.model = event.message.model;
        this.inputTokens = event.message.usage.input_tokens;
        return this.chunk({ role: "assistant", content: "" });
      case "content_block_start":
        if (event.content_block.type === "tool_use") {
          const toolIndex = this.toolIndexByBlock.size;
          this.toolIndexByBlock.set(event.index, toolIndex);
          return this.chunk({
            tool_calls: [
              {
                index: toolIndex,
                id: event.content_block.id,
                type: "function",
                function: { name: event.content_block.name ?? "", arguments: "" },
              },
            ],
          });
        }
        if (event.content_block.type === "text" && event.content_block.text) {
          return this.chunk({ content: event.content_block.text });
        }
        return null;
      case "content_block_delta": {
        if (event.delta.type === "text_delta" && event.delta.text !== undefined) {
          return this.chunk({ content: event.delta.text });
        }
        const toolIndex = this.toolIndexByBlock.get(event.index);
        if (event.delta.type === "input_json_delta" && toolIndex !== undefined) {
          return this.chunk({
            tool_calls: [{ index: toolIndex, function: { arguments: event.delta.partial_json ?? "" } }],
          });
        }
        return null;
      }
      case "message_delta": {
        const completionTokens = event.usage.output_tokens;
        return {
          ...this.chunk({}, mapFinishReason(event.delta.stop_reason) ?? "stop"),
          usage: {
            prompt_tokens: this.inputTokens,
            completion_tokens: completionTokens,
            total_tokens: this.inputTokens + completionTokens,
          },
        };
      }
      case "error":
        throw new UpstreamProviderError(event.error.message, {
          provider: this.provider,
          model: this.model,
          status: ERROR_TYPE_STATUS[event.error.type] ?? 502,
        });
      default:
        return null;
    }
  }
}

export class AnthropicProvider implements ChatProvider {
  readonly name: string;
  private endpoint: string;
  private headers: Record<string, string>;
  private timeoutMs: number;

  constructor(options: ProviderOptions) {
    this.name = options.name;
    this.endpoint = `${options.baseUrl.replace(/\/+$/, "")}/messages`;
    this.timeoutMs = options.timeoutMs;
    this.headers = {
      "anthropic-version": ANTHROPIC_VERSION,
      ...options.headers,
    };
    if (options.apiKey) {
      this.headers["x-api-key"] = options.apiKey;
    }
  }

  private convertUserContent(content: string | ContentPart[]): string | AnthropicContentBlock[] {
    if (typeof content === "string") {
      return content;
    }
    return content.map((part): AnthropicContentBlock => {
      if (part.type === "text") {
        return { type: "text", text: part.text };
      }
      const source = parseImageSource(part.image_url.url);
      if (!source) {
        throw new ValidationError("Image content must be an http(s) URL or base64 data", {
          param: "messages",
          code: "INVALID_IMAGE",
        });
      }
      return source.type === "url"
        ? { type: "image", source: { type: "url", url: source.url } }
        : { type: "image", source: { type: "base64", media_type: source.mediaType, data: source.data } };
    });
  }

  private convertAssistant(message: AssistantMessage): AnthropicContentBlock[] {
    const blocks: AnthropicContentBlock[] = [];
    const text = textOf(message.content);
    if (text) {
      blocks.push({ type: "text", text });
    }
    for (const call of message.tool_calls ?? []) {
      blocks.push({
        type: "tool_use",
        id: call.id,
        name: call.function.name,
        input: parseToolArguments(call),
      });
    }
    return blocks;
  }

  /**
   * Convert OpenAI messages to Anthropic messages plus a system prompt.
   * Consecutive messages with the same role are merged since Anthropic
   * requires alternating turns.
   */
  private convertMessages(messages: ChatMessage[]): { system?: string; messages: AnthropicMessage[] } {
    const systemParts: string[] = [];
    const converted: AnthropicMessage[] = [];

    const push = (role: AnthropicMessage["role"], content: string | AnthropicContentBlock[]) => {
      const previous = converted[converted.length - 1];
      if (previous && previous.role === role) {
        previous.content = [...toBlocks(previous.content), ...toBlocks(content)];
        return;
      }
      converted.push({ role, content });
    };

    for (const message of messages) {
      switch (message.role) {
        case "system":
        case "developer":
          systemParts.push(textOf(message.content));
          break;
        case "user":
          push("user", this.convertUserContent(message.content));
          break;
        case "assistant": {
          const blocks = this.convertAssistant(message);
          if (blocks.length > 0) {
            push("assistant", blocks);
          }
          break;
        }
        case "tool":
          push("user", [
            { type: "tool_result", tool_use_id: message.tool_call_id, content: textOf(message.content) },
          ]);
          break;
      }
    }

    const system = systemParts.filter(Boolean).join("\n\n");
    return system ? { system, messages: converted } : { messages: converted };
  }

  private convertTools(tools: ToolDefinition[]): AnthropicTool[] {
    return tools.map((tool) => ({
      name: tool.function.name,
      ...(tool.function.description ? { description: tool.function.description } : {}),
      input_schema: tool.function.parameters ?? { type: "object", properties: {} },
    }));
  }

  private convertToolChoice(
    choice: ToolChoice | undefined,
    parallelToolCalls: boolean | undefined,
  ): AnthropicToolChoice | undefined {
    let converted: AnthropicToolChoice | undefined;
    if (choice === "auto") {
      converted = { type: "auto" };
    } else if (choice === "required") {
      converted = { type: "any" };
    } else if (typeof choice === "object") {
      converted = { type: "tool", name: choice.function.name };
    }
    if (parallelToolCalls === false) {
      converted = { ...(converted ?? { type: "auto" }), disable_parallel_tool_use: true };
    }
    return converted;
  }

  /**
   * Convert OpenAI format to Anthropic format
   */
  convertRequest(request: ChatCompletionRequest): AnthropicRequest {
    const { system, messages } = this.convertMessages(request.messages);

    const anthropicRequest: AnthropicRequest = {
      model: request.model,
      max_tokens: request.max_completion_tokens ?? request.max_tokens ?? DEFAULT_MAX_TOKENS,
      messages,
    };

    if (system) {
      anthropicRequest.system = system;
    }
    if (request.temperature !== undefined) {
      anthropicRequest.temperature = request.temperature;
    }
    if (request.top_p !== undefined) {
      anthropicRequest.top_p = request.top_p;
    }
    if (request.stop !== undefined) {
      anthropicRequest.stop_sequences = typeof request.stop === "string" ? [request.stop] : request.stop;
    }
    if (request.tools?.length && request.tool_choice !== "none") {
      anthropicRequest.tools = this.convertTools(request.tools);
      const toolChoice = this.convertToolChoice(request.tool_choice, request.parallel_tool_calls);
      if (toolChoice) {
        anthropicRequest.tool_choice = toolChoice;
      }
    }
    if (request.stream !== undefined) {
      anthropicRequest.stream = request.stream;
    }

    return anthropicRequest;
  }

  /**
   * Convert Anthropic response to OpenAI format
   */
  convertResponse(response: AnthropicResponse): ChatCompletionResponse {
    let content = "";
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === "text" && block.text !== undefined) {
        content += block.text;
      } else if (block.type === "tool_use" && block.id && block.name) {
        toolCalls.push({
          id: block.id,
          type: "function",
          function: { name: block.name, arguments: JSON.stringify(block.input ?? {}) },
        });
      }
    }

    return {
      id: `chatcmpl-${response.id}`,
      object: "chat.completion",
      created: Math.floor(Date.now() / 1000),
      model: response.model,
      choices: [
        {
          index: 0,
          message: {
            role: "assistant",
            content: content || (toolCalls.length > 0 ? null : ""),
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: mapFinishReason(response.stop_reason) ?? "stop",
        },
      ],
      usage: {
        prompt_tokens: response.usage.input_tokens,
        completion_tokens: response.usage.output_tokens,
        total_tokens: response.usage.input_tokens + response.usage.output_tokens,
      },
    };
  }

  private upstream(body: AnthropicRequest, options: ProviderCallOptions) {
    return {
      provider: this.name,
      model: body.model,
      url: this.endpoint,
      headers: this.headers,
      body,
      timeoutMs: this.timeoutMs,
      signal: options.signal,
    };
  }

  private unexpected(model: string, detail: string): UpstreamProviderError {
    return new UpstreamProviderError(`Provider ${this.name} returned an unexpected response: ${detail}`, {
      provider: this.name,
      model,
    });
  }

  async chatCompletion(
    request: ChatCompletionRequest,
    options: ProviderCallOptions = {},
  ): Promise<ChatCompletionResponse> {
    const body = this.convertRequest({ ...request, stream: false });
    const raw = await postJson(this.upstream(body, options));
    const parsed = AnthropicResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw this.unexpected(request.model, parsed.error.issues[0]?.message ?? "invalid shape");
    }
    return this.convertResponse(parsed.data);
  }

  async *chatCompletionStream(
    request: ChatCompletionRequest,
    options: ProviderCallOptions = {},
  ): AsyncGenerator<ChatCompletionChunk> {
    const body = this.convertRequest({ ...request, stream: true });
    const call = await sendUpstream(this.upstream(body, options));
    const translator = new StreamTranslator(this.name, request.model);

    try {
      if (!call.response.body) {
        return;
      }
      for await (const event of readSSE(call.response.body, call.guardRead)) {
        let payload: unknown;
        try {
          payload = JSON.parse(event.data);
        } catch {
          throw this.unexpected(request.model, "malformed stream event");
        }
        const parsed = StreamEventSchema.safeParse(payload);
        if (!parsed.success) {
          // Event types this adapter does not know about are skipped.
          continue;
        }
        if (parsed.data.type === "message_stop") {
          return;
        }
        const chunk = translator.translate(parsed.data);
        if (chunk) {
          yield chunk;
        }
      }
    } catch (error) {
      throw call.toError(error);
    } finally {
      call.done();
    }
  }

  async embeddings(request: EmbeddingRequest): Promise<EmbeddingResponse> {
    throw new ValidationError(`Provider ${this.name} does not support embeddings`, {
      code: "UNSUPPORTED_OPERATION",
      param: "model",
      extraFields: { provider: this.name, model_requested: request.model },
    });
  }
}
