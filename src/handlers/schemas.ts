/**
 * Request body schemas for the OpenAI-compatible endpoints.
 */
import type { Context } from "hono";
import { z } from "zod";
import { ValidationError } from "../errors.js";
import { parseInput } from "../utils/validation.js";

const TextPartSchema = z.object({ type: z.literal("text"), text: z.string() });

const ImagePartSchema = z.object({
  type: z.literal("image_url"),
  image_url: z.object({
    url: z.string(),
    detail: z.enum(["auto", "low", "high"]).optional(),
  }),
});

const ContentPartSchema = z.discriminatedUnion("type", [TextPartSchema, ImagePartSchema]);

const ToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string().default(""),
  }),
});

const MessageSchema = z.union([
  z.object({
    role: z.enum(["system", "developer"]),
    content: z.union([z.string(), z.array(TextPartSchema)]),
    name: z.string().optional(),
  }),
  z.object({
    role: z.literal("user"),
    content: z.union([z.string(), z.array(ContentPartSchema)]),
    name: z.string().optional(),
  }),
  z.object({
    role: z.literal("assistant"),
    content: z.union([z.string(), z.array(TextPartSchema)]).nullish(),
    tool_calls: z.array(ToolCallSchema).optional(),
    name: z.string().optional(),
  }),
  z.object({
    role: z.literal("tool"),
    content: z.union([z.string(), z.array(TextPartSchema)]),
    tool_call_id: z.string(),
  }),
]);

const ToolSchema = z.object({
  type: z.literal("function"),
  function: z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    parameters: z.record(z.unknown()).optional(),
  }),
});

const ToolChoiceSchema = z.union([
  z.enum(["none", "auto", "required"]),
  z.object({
    type: z.literal("function"),
    function: z.object({ name: z.string() }),
  }),
]);

const FallbacksSchema = z.array(z.string().min(1)).optional();

export const ChatCompletionRequestSchema = z
  .object({
    model: z.string({ required_error: "Model is required" }).trim().min(1, "Model is required"),
    messages: z
      .array(MessageSchema, { required_error: "Messages array is required" })
      .min(1, "Messages array is required"),
    temperature: z.number().min(0).max(2).optional(),
    top_p: z.number().min(0).max(1).optional(),
    max_tokens: z.number().int().positive().optional(),
    max_completion_tokens: z.number().int().positive().optional(),
    stop: z.union([z.string(), z.array(z.string())]).optional(),
    stream: z.boolean().optional(),
    stream_options: z.object({ include_usage: z.boolean().optional() }).optional(),
    tools: z.array(ToolSchema).optional(),
    tool_choice: ToolChoiceSchema.optional(),
    parallel_tool_calls: z.boolean().optional(),
    user: z.string().optional(),
    fallbacks: FallbacksSchema,
  })
  .passthrough();

export const EmbeddingRequestSchema = z.object({
  model: z.string({ required_error: "Model is required" }).trim().min(1, "Model is required"),
  input: z.union([z.string(), z.array(z.string()).min(1)]),
  encoding_format: z.enum(["float", "base64"]).optional(),
  dimensions: z.number().int().positive().optional(),
  user: z.string().optional(),
  fallbacks: FallbacksSchema,
});

export type ChatCompletionBody = z.infer<typeof ChatCompletionRequestSchema>;
export type EmbeddingBody = z.infer<typeof EmbeddingRequestSchema>;

/**
 * Read a JSON body; malformed JSON is a ValidationError like any other bad
 * input.
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json<unknown>();
  } catch (error) {
    throw new ValidationError("Request body must be valid JSON", { code: "INVALID_JSON", cause: error });
  }
}

const MISSING_CODES: Record<string, string> = {
  "Model is required": "MISSING_MODEL",
  "Messages array is required": "MISSING_MESSAGES",
};

export function parseRequest<T extends z.ZodTypeAny>(schema: T, body: unknown, what: string): z.infer<T> {
  try {
    return parseInput(schema, body, what);
  } catch (error) {
    const first = error instanceof ValidationError ? error.issues[0] : undefined;
    const code = first ? MISSING_CODES[first.message] : undefined;
    if (first && code) {
      throw new ValidationError(first.message, { code, param: first.path, issues: [first] });
    }
    throw error;
  }
}
