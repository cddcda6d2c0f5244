/**
 * Reassembles a chat completion stream into the non-streaming response shape.
 */

import type { ChatCompletionChunk, ChatCompletionResponse, ToolCall } from "../providers/types.js";

interface ChoiceState {
  content: string;
  sawContent: boolean;
  toolCalls: Map<number, ToolCall>;
  finishReason: string | null;
}

export async function accumulateChatStream(
  chunks: AsyncIterable<ChatCompletionChunk> | Iterable<ChatCompletionChunk>,
): Promise<ChatCompletionResponse> {
  const choices = new Map<number, ChoiceState>();
  let last: ChatCompletionChunk | undefined;
  let usage: ChatCompletionResponse["usage"];

  for await (const chunk of chunks) {
    last = chunk;
    if (chunk.usage) {
      usage = chunk.usage;
    }
    for (const choice of chunk.choices) {
      let state = choices.get(choice.index);
      if (!state) {
        state = { content: "", sawContent: false, toolCalls: new Map(), finishReason: null };
        choices.set(choice.index, state);
      }
      if (typeof choice.delta.content === "string" && choice.delta.content !== "") {
        state.content += choice.delta.content;
        state.sawContent = true;
      }
      for (const delta of choice.delta.tool_calls ?? []) {
        const call = state.toolCalls.get(delta.index) ?? {
          id: "",
          type: "function" as const,
          function: { name: "", arguments: "" },
        };
        if (delta.id) call.id = delta.id;
        if (delta.function?.name) call.function.name = delta.function.name;
        call.function.arguments += delta.function?.arguments ?? "";
        state.toolCalls.set(delta.index, call);
      }
      if (choice.finish_reason) {
        state.finishReason = choice.finish_reason;
      }
    }
  }

  return {
    id: last?.id ?? "",
    object: "chat.completion",
    created: last?.created ?? Math.floor(Date.now() / 1000),
    model: last?.model ?? "",
    choices: [...choices.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, state]) => {
        const toolCalls = [...state.toolCalls.entries()].sort(([a], [b]) => a - b).map(([, call]) => call);
        return {
          index,
          message: {
            role: "assistant" as const,
            content: state.sawContent ? state.content : null,
            ...(toolCalls.length > 0 ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: state.finishReason,
        };
      }),
    ...(usage ? { usage } : {}),
    ...(last?.extra_fields ? { extra_fields: last.extra_fields } : {}),
  };
}
