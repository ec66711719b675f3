import { describe, expect, it, vi } from "vitest";
import { buildResponseRequest } from "../api/request.js";
import type { ResponseTransport } from "../api/transport.js";
import { DecodeError, StreamEndedError, TransportError } from "../errors.js";
import type { Logger } from "../logger.js";
import { collectUpdates, streamResponse } from "./runner.js";
import { ConversationSession } from "./session.js";
import type { ByteChunk } from "./sse.js";
import type { StreamUpdate } from "./types.js";

const request = buildResponseRequest({
  model: "test-model",
  input: [{ type: "message", role: "user", content: "hi" }],
});

const address = { item_id: "msg_1", output_index: 0, content_index: 0 };

function frame(payload: unknown): string {
  return `data: ${typeof payload === "string" ? payload : JSON.stringify(payload)}\n\n`;
}

const created = frame({ type: "response.created", response: { id: "r1", status: "in_progress" } });
const deltaFrame = (text: string) => frame({ type: "response.output_text.delta", ...address, delta: text });
const completed = frame({
  type: "response.completed",
  response: { id: "r1", status: "completed", output_text: "Hello" },
});

function transportOf(chunks: ByteChunk[]): ResponseTransport & { returned: () => boolean } {
  let returned = false;
  const transport = async () => {
    async function* body(): AsyncGenerator<ByteChunk> {
      try {
        for (const chunk of chunks) {
          yield chunk;
        }
      } finally {
        returned = true;
      }
    }
    return body();
  };
  return Object.assign(transport, { returned: () => returned });
}

function recordingLogger(): Logger & { warnings: string[] } {
  const warnings: string[] = [];
  return {
    warnings,
    debug: () => {},
    warn: (message) => {
      warnings.push(message);
    },
    error: () => {},
  };
}

describe("streamResponse", () => {
  it("streams a response from created to completed", async () => {
    const session = new ConversationSession();
    const updates = await collectUpdates(
      streamResponse(request, {
        transport: transportOf([created, deltaFrame("Hel"), deltaFrame("lo"), completed]),
        session,
      }),
    );
    expect(updates).toEqual([
      { type: "started", responseId: "r1" },
      { type: "delta", text: "Hel" },
      { type: "delta", text: "lo" },
      { type: "completed", text: "Hello", responseId: "r1" },
    ]);
    expect(session.previousResponseId).toBe("r1");
  });

  it("handles frames split across chunks", async () => {
    const all = created + deltaFrame("Hi") + completed;
    const chunks = [all.slice(0, 17), all.slice(17, 60), all.slice(60)];
    const updates = await collectUpdates(streamResponse(request, { transport: transportOf(chunks) }));
    expect(updates.map((update) => update.type)).toEqual(["started", "delta", "completed"]);
  });

  it("emits exactly one cancelled after an abort and stops reading", async () => {
    const transport = transportOf([
      created,
      deltaFrame("a"),
      deltaFrame("b"),
      deltaFrame("c"),
      deltaFrame("d"),
      completed,
    ]);
    const controller = new AbortController();
    const updates: StreamUpdate[] = [];
    let deltas = 0;

    for await (const update of streamResponse(request, { transport, signal: controller.signal })) {
      updates.push(update);
      if (update.type === "delta") {
        deltas += 1;
        if (deltas === 2) {
          controller.abort();
        }
      }
    }

    expect(updates).toEqual([
      { type: "started", responseId: "r1" },
      { type: "delta", text: "a" },
      { type: "delta", text: "b" },
      { type: "cancelled" },
    ]);
    expect(transport.returned()).toBe(true);
  });

  it("cancels a read that is still waiting for data", async () => {
    const controller = new AbortController();
    const transport: ResponseTransport = async (_request, signal) => {
      async function* body(): AsyncGenerator<ByteChunk> {
        yield created;
        await new Promise<void>((resolve) => signal.addEventListener("abort", () => resolve(), { once: true }));
      }
      return body();
    };

    const updates: StreamUpdate[] = [];
    for await (const update of streamResponse(request, { transport, signal: controller.signal })) {
      updates.push(update);
      if (update.type === "started") {
        setTimeout(() => controller.abort(), 0);
      }
    }
    expect(updates).toEqual([{ type: "started", responseId: "r1" }, { type: "cancelled" }]);
  });

  it("cancels without calling the transport when already aborted", async () => {
    const transport = vi.fn<ResponseTransport>();
    const updates = await collectUpdates(streamResponse(request, { transport, signal: AbortSignal.abort() }));
    expect(updates).toEqual([{ type: "cancelled" }]);
    expect(transport).not.toHaveBeenCalled();
  });

  it("finishes with failed when [DONE] arrives before a terminal event", async () => {
    const updates = await collectUpdates(
      streamResponse(request, { transport: transportOf([created, deltaFrame("x"), frame("[DONE]"), completed]) }),
    );
    const last = updates.at(-1);
    expect(last).toMatchObject({ type: "failed", message: "stream ended before the response completed" });
    expect(last?.type === "failed" && last.error).toBeInstanceOf(StreamEndedError);
    expect(updates.filter((update) => update.type === "completed")).toEqual([]);
  });

  it("finishes with failed when the body ends early", async () => {
    const updates = await collectUpdates(streamResponse(request, { transport: transportOf([created]) }));
    expect(updates.map((update) => update.type)).toEqual(["started", "failed"]);
  });

  it("reports transport errors as failed", async () => {
    const error = new TransportError("status code 401 bad key", 401);
    const transport: ResponseTransport = async () => {
      throw error;
    };
    const updates = await collectUpdates(streamResponse(request, { transport }));
    expect(updates).toEqual([{ type: "failed", message: "status code 401 bad key", error }]);
  });

  it("wraps errors thrown while reading the body", async () => {
    const transport: ResponseTransport = async () => {
      async function* body(): AsyncGenerator<ByteChunk> {
        yield created;
        throw new Error("socket hang up");
      }
      return body();
    };
    const updates = await collectUpdates(streamResponse(request, { transport }));
    const last = updates.at(-1);
    expect(last).toMatchObject({ type: "failed", message: "stream read failed: socket hang up" });
    expect(last?.type === "failed" && last.error).toBeInstanceOf(TransportError);
  });

  it("fails on an undecodable event when decoding is strict", async () => {
    const updates = await collectUpdates(
      streamResponse(request, { transport: transportOf([created, frame("{oops"), completed]) }),
    );
    expect(updates).toHaveLength(2);
    const last = updates.at(-1);
    expect(last?.type === "failed" && last.error).toBeInstanceOf(DecodeError);
  });

  it("skips an undecodable event when decoding is lenient", async () => {
    const logger = recordingLogger();
    const updates = await collectUpdates(
      streamResponse(request, {
        transport: transportOf([created, frame({ type: "response.output_text.delta" }), completed]),
        strictDecoding: false,
        logger,
      }),
    );
    expect(updates.map((update) => update.type)).toEqual(["started", "completed"]);
    expect(logger.warnings).toEqual(["skipping undecodable event: missing field `item_id` at item_id"]);
  });

  it("continues past unknown event types", async () => {
    const updates = await collectUpdates(
      streamResponse(request, {
        transport: transportOf([created, frame({ type: "response.mcp_call.completed" }), deltaFrame("x"), completed]),
      }),
    );
    expect(updates.map((update) => update.type)).toEqual(["started", "delta", "completed"]);
  });

  it("releases a body that arrives after the run was cancelled", async () => {
    const release = vi.fn(async (): Promise<IteratorResult<ByteChunk>> => ({ done: true, value: undefined }));
    const lateBody: AsyncIterable<ByteChunk> = {
      [Symbol.asyncIterator]: () => ({
        next: async (): Promise<IteratorResult<ByteChunk>> => ({ done: true, value: undefined }),
        return: release,
      }),
    };
    // ignores the abort signal on purpose
    const transport: ResponseTransport = async () => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      return lateBody;
    };

    const controller = new AbortController();
    const run = collectUpdates(streamResponse(request, { transport, signal: controller.signal }));
    controller.abort();

    expect(await run).toEqual([{ type: "cancelled" }]);
    await vi.waitFor(() => expect(release).toHaveBeenCalledTimes(1));
  });

  it("reports a transport that throws synchronously as failed", async () => {
    const transport: ResponseTransport = () => {
      throw new TransportError("no route", null);
    };
    const updates = await collectUpdates(streamResponse(request, { transport }));
    expect(updates).toMatchObject([{ type: "failed", message: "no route" }]);
  });
});
