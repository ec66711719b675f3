import { ResponseFailedError, StreamEndedError, type ChatStreamError } from "../errors.js";
import { ConversationSession } from "./session.js";
import {
  isTerminalStatus,
  type ResponseState,
  type ResponseStatus,
  type StreamEvent,
  type StreamUpdate,
} from "./types.js";

/**
 * Folds decoded stream events into one running assistant message.
 *
 * Deltas are appended; `output_text.done` / `content_part.done` replace the text
 * with the server's authoritative copy. Completed, failed and cancelled are
 * terminal: each instance emits exactly one of them, and drops every event after it.
 */
export class ResponseAccumulator {
  private responseId: string | null = null;
  private accumulatedText = "";
  private status: ResponseStatus = "idle";
  private previousResponseId: string | null;

  constructor(private readonly session: ConversationSession = new ConversationSession()) {
    this.previousResponseId = session.previousResponseId;
  }

  state(): ResponseState {
    return {
      responseId: this.responseId,
      accumulatedText: this.accumulatedText,
      status: this.status,
      previousResponseId: this.previousResponseId,
    };
  }

  isTerminal(): boolean {
    return isTerminalStatus(this.status);
  }

  apply(event: StreamEvent): StreamUpdate | null {
    if (this.isTerminal()) {
      return null;
    }

    switch (event.kind) {
      case "created":
        return this.start(event.responseId);
      case "delta":
        return this.append(event.text);
      case "text_done":
        return this.replace(event.text);
      case "content_part_done":
        return event.text === undefined ? null : this.replace(event.text);
      case "completed":
        return this.complete({
          responseId: event.responseId,
          outputText: event.outputText,
        });
      case "incomplete":
        return this.complete({
          responseId: event.responseId,
          outputText: event.outputText,
          incompleteReason: event.reason ?? "unknown",
        });
      case "failed":
        return this.fail(
          event.message,
          new ResponseFailedError(event.message, { responseId: event.responseId ?? this.responseId }),
        );
      case "error":
        return this.fail(
          event.message,
          new ResponseFailedError(event.message, { code: event.code, param: event.param }),
        );
      case "in_progress":
      case "queued":
      case "ignored":
        return null;
    }
  }

  /** External cancellation. Partial text is discarded; keeping it is the caller's call. */
  cancel(): StreamUpdate | null {
    if (this.isTerminal()) {
      return null;
    }
    this.status = "cancelled";
    this.accumulatedText = "";
    return { type: "cancelled" };
  }

  /** End of transport without a terminal event from the server. */
  finish(): StreamUpdate | null {
    return this.failWith(new StreamEndedError());
  }

  /** Transport or decode failure outside the event stream itself. */
  failWith(error: ChatStreamError): StreamUpdate | null {
    if (this.isTerminal()) {
      return null;
    }
    return this.fail(error.message, error);
  }

  private start(responseId: string): StreamUpdate | null {
    if (this.responseId !== null) {
      return null;
    }
    this.responseId = responseId;
    if (this.status === "idle") {
      this.status = "created";
    }
    return { type: "started", responseId };
  }

  private append(text: string): StreamUpdate | null {
    this.status = "streaming";
    if (!text) {
      return null;
    }
    this.accumulatedText += text;
    return { type: "delta", text };
  }

  private replace(text: string): StreamUpdate {
    this.status = "streaming";
    this.accumulatedText = text;
    return { type: "snapshot", text };
  }

  // Without a done event or output_text this finalizes from deltas alone: best effort only.
  private complete(params: {
    responseId: string | undefined;
    outputText: string | undefined;
    incompleteReason?: string;
  }): StreamUpdate {
    const responseId = params.responseId || this.responseId;
    if (responseId) {
      this.responseId = responseId;
      this.previousResponseId = responseId;
      this.session.advance(responseId);
    }

    this.accumulatedText = params.outputText ?? this.accumulatedText;
    this.status = "completed";

    return {
      type: "completed",
      text: this.accumulatedText,
      responseId: responseId ?? null,
      ...(params.incompleteReason !== undefined ? { incompleteReason: params.incompleteReason } : {}),
    };
  }

  private fail(message: string, error: ChatStreamError): StreamUpdate {
    this.status = "failed";
    return { type: "failed", message, error };
  }
}
