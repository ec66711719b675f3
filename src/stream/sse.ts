export type ByteChunk = Uint8Array | string;

/**
 * Incremental splitter for `text/event-stream` bodies. Text goes in as it
 * arrives; complete event payloads (the joined `data:` lines of one event) come out.
 */
export class SseFrameBuffer {
  private buffer = "";

  push(text: string): string[] {
    this.buffer = normalizeLineEndings(this.buffer + text);

    const frames = this.buffer.split("\n\n");
    this.buffer = frames.pop() ?? "";
    return collectPayloads(frames);
  }

  /** Emits a trailing event that was not followed by a blank line. */
  flush(): string[] {
    const rest = this.buffer.replace(/\r$/, "");
    this.buffer = "";
    return collectPayloads([rest]);
  }
}

export async function* readSseData(chunks: AsyncIterable<ByteChunk>): AsyncGenerator<string> {
  const decoder = new TextDecoder();
  const frames = new SseFrameBuffer();

  for await (const chunk of chunks) {
    const text = typeof chunk === "string" ? chunk : decoder.decode(chunk, { stream: true });
    for (const payload of frames.push(text)) {
      yield payload;
    }
  }

  const tail = decoder.decode();
  const pending = tail ? frames.push(tail) : [];
  for (const payload of [...pending, ...frames.flush()]) {
    yield payload;
  }
}

/**
 * Returns the `data:` payload of one event, or null for events that carry none
 * (comments, keep-alives, `event:`-only blocks).
 */
export function parseSseFrame(frame: string): string | null {
  const dataLines: string[] = [];
  for (const line of frame.split("\n")) {
    if (!line.startsWith("data:")) {
      continue;
    }
    // one optional space after the colon; the rest of the value is kept verbatim
    dataLines.push(line.startsWith("data: ") ? line.slice(6) : line.slice(5));
  }
  return dataLines.length > 0 ? dataLines.join("\n") : null;
}

function collectPayloads(frames: string[]): string[] {
  const payloads: string[] = [];
  for (const frame of frames) {
    const payload = parseSseFrame(frame);
    if (payload !== null) {
      payloads.push(payload);
    }
  }
  return payloads;
}

// A trailing "\r" is left alone until the next chunk shows whether "\n" follows.
function normalizeLineEndings(text: string): string {
  return text.replace(/\r\n/g, "\n").replace(/\r(?!$)/g, "\n");
}
