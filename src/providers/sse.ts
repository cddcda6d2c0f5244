/**
 * Incremental Server-Sent Events reader for upstream streaming bodies.
 */

export interface SSEEvent {
  event?: string;
  data: string;
}

/** Wraps each pending body read, e.g. to bound how long it may wait. */
export type ReadGuard = <T>(read: Promise<T>) => Promise<T>;

export async function* readSSE(
  body: ReadableStream<Uint8Array>,
  guard: ReadGuard = (read) => read,
): AsyncGenerator<SSEEvent> {
  const reader = body.getReader();
  const decoder = new TextDecoder();
  let buffer = "";
  let event: string | undefined;
  let dataLines: string[] = [];
  let finished = false;

  function* drain(lines: string[]): Generator<SSEEvent> {
    for (const rawLine of lines) {
      const line = rawLine.endsWith("\r") ? rawLine.slice(0, -1) : rawLine;
      if (line === "") {
        if (dataLines.length > 0) {
          yield { event, data: dataLines.join("\n") };
        }
        event = undefined;
        dataLines = [];
        continue;
      }
      if (line.startsWith(":")) {
        continue;
      }
      const colon = line.indexOf(":");
      const field = colon === -1 ? line : line.slice(0, colon);
      let value = colon === -1 ? "" : line.slice(colon + 1);
      if (value.startsWith(" ")) {
        value = value.slice(1);
      }
      if (field === "data") {
        dataLines.push(value);
      } else if (field === "event") {
        event = value;
      }
    }
  }

  try {
    while (true) {
      const { done, value } = await guard(reader.read());
      if (done) {
        finished = true;
        break;
      }
      buffer += decoder.decode(value, { stream: true });
      const lines = buffer.split("\n");
      buffer = lines.pop() ?? "";
      yield* drain(lines);
    }

    buffer += decoder.decode();
    yield* drain(buffer ? [buffer, ""] : [""]);
  } finally {
    if (!finished) {
      await reader.cancel();
    }
    reader.releaseLock();
  }
}
