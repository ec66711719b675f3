import { describe, expect, it } from "vitest";
import { ErrorCodes, ResponseFailedError, TransportError } from "../errors.js";
import { ResponseAccumulator } from "./accumulator.js";
import { ConversationSession } from "./session.js";
import type { StreamEvent, StreamUpdate } from "./types.js";

const address = { itemId: "msg_1", outputIndex: 0, contentIndex: 0 };

function delta(text: string): StreamEvent {
  return { kind: "delta", ...address, text };
}

function applyAll(accumulator: ResponseAccumulator, events: StreamEvent[]): StreamUpdate[] {
  const updates: StreamUpdate[] = [];
  for (const event of events) {
    const update = accumulator.apply(event);
    if (update) {
      updates.push(update);
    }
  }
  return updates;
}

describe("ResponseAccumulator", () => {
  it("folds a normal response into started, deltas, snapshot and completed", () => {
    const accumulator = new ResponseAccumulator();
    const updates = applyAll(accumulator, [
      { kind: "created", responseId: "r1", status: "in_progress" },
      delta("Hel"),
      delta("lo"),
      { kind: "text_done", ...address, text: "Hello" },
      { kind: "completed", responseId: "r1", status: "completed", outputText: "Hello" },
    ]);

    expect(updates).toEqual([
      { type: "started", responseId: "r1" },
      { type: "delta", text: "Hel" },
      { type: "delta", text: "lo" },
      { type: "snapshot", text: "Hello" },
      { type: "completed", text: "Hello", responseId: "r1" },
    ]);
    expect(accumulator.state()).toEqual({
      responseId: "r1",
      accumulatedText: "Hello",
      status: "completed",
      previousResponseId: "r1",
    });
  });

  it("treats ignored events as no-ops and keeps going", () => {
    const accumulator = new ResponseAccumulator();
    const updates = applyAll(accumulator, [
      { kind: "created", responseId: "r1", status: "in_progress" },
      { kind: "ignored", rawType: "response.mcp_call.completed" },
      delta("ok"),
    ]);
    expect(updates).toEqual([
      { type: "started", responseId: "r1" },
      { type: "delta", text: "ok" },
    ]);
    expect(accumulator.state().accumulatedText).toBe("ok");
  });

  it("completes from accumulated deltas when no output text is sent", () => {
    const accumulator = new ResponseAccumulator();
    const updates = applyAll(accumulator, [
      delta("par"),
      delta("tial"),
      { kind: "completed", responseId: "r9", status: "completed" },
    ]);
    expect(updates.at(-1)).toEqual({ type: "completed", text: "partial", responseId: "r9" });
  });

  it("emits started only once", () => {
    const accumulator = new ResponseAccumulator();
    const updates = applyAll(accumulator, [
      { kind: "created", responseId: "r1", status: "in_progress" },
      { kind: "created", responseId: "r2", status: "in_progress" },
    ]);
    expect(updates).toEqual([{ type: "started", responseId: "r1" }]);
  });

  it("does not emit empty deltas", () => {
    const accumulator = new ResponseAccumulator();
    expect(accumulator.apply(delta(""))).toBeNull();
    expect(accumulator.state().status).toBe("streaming");
  });

  it("reports incomplete responses as completed with a reason", () => {
    const accumulator = new ResponseAccumulator();
    const updates = applyAll(accumulator, [
      delta("cut"),
      { kind: "incomplete", responseId: "r1", reason: "max_output_tokens" },
    ]);
    expect(updates.at(-1)).toEqual({
      type: "completed",
      text: "cut",
      responseId: "r1",
      incompleteReason: "max_output_tokens",
    });
  });

  it("turns failed and error events into failed updates", () => {
    const failed = new ResponseAccumulator().apply({ kind: "failed", responseId: "r1", message: "boom" });
    expect(failed).toMatchObject({ type: "failed", message: "boom" });
    expect(failed?.type === "failed" && failed.error).toBeInstanceOf(ResponseFailedError);

    const errored = new ResponseAccumulator().apply({ kind: "error", code: "rate_limit", message: "slow down" });
    expect(errored).toMatchObject({ type: "failed", message: "slow down" });
  });

  it("ignores everything after a terminal update", () => {
    const accumulator = new ResponseAccumulator();
    applyAll(accumulator, [{ kind: "completed", responseId: "r1", status: "completed", outputText: "done" }]);

    expect(accumulator.apply(delta("late"))).toBeNull();
    expect(accumulator.cancel()).toBeNull();
    expect(accumulator.finish()).toBeNull();
    expect(accumulator.state().accumulatedText).toBe("done");
  });

  it("cancels once and clears the text", () => {
    const accumulator = new ResponseAccumulator();
    applyAll(accumulator, [delta("a"), delta("b")]);

    expect(accumulator.cancel()).toEqual({ type: "cancelled" });
    expect(accumulator.cancel()).toBeNull();
    expect(accumulator.state()).toMatchObject({ status: "cancelled", accumulatedText: "" });
  });

  it("fails when the stream ends without a terminal event", () => {
    const accumulator = new ResponseAccumulator();
    applyAll(accumulator, [delta("half")]);

    const update = accumulator.finish();
    expect(update).toMatchObject({ type: "failed", message: "stream ended before the response completed" });
    expect(update?.type === "failed" && update.error?.code).toBe(ErrorCodes.STREAM_ENDED);
  });

  it("keeps the error passed to failWith", () => {
    const error = new TransportError("status code 500", 500);
    expect(new ResponseAccumulator().failWith(error)).toEqual({ type: "failed", message: "status code 500", error });
  });

  it("advances the session on completion", () => {
    const session = new ConversationSession({ previousResponseId: "r0" });
    const accumulator = new ResponseAccumulator(session);
    expect(accumulator.state().previousResponseId).toBe("r0");

    applyAll(accumulator, [{ kind: "completed", responseId: "r1", status: "completed", outputText: "x" }]);
    expect(session.previousResponseId).toBe("r1");
  });

  it("leaves the session alone on failure", () => {
    const session = new ConversationSession({ previousResponseId: "r0" });
    new ResponseAccumulator(session).apply({ kind: "failed", message: "boom" });
    expect(session.previousResponseId).toBe("r0");
  });
});

describe("ConversationSession", () => {
  it("defaults and trims ids", () => {
    const session = new ConversationSession({ previousResponseId: "  " });
    expect(session.conversationId).toBe("default");
    expect(session.previousResponseId).toBeNull();

    session.advance("  r1 ");
    expect(session.previousResponseId).toBe("r1");
    session.advance("");
    expect(session.previousResponseId).toBe("r1");
    session.reset();
    expect(session.previousResponseId).toBeNull();
  });
});
