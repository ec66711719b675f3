import type { ChatStreamError } from "../errors.js";

type BaseEvent<K extends string> = {
  kind: K;
  sequenceNumber?: number;
};

export type ResponseCreatedEvent = BaseEvent<"created"> & {
  responseId: string;
  status: string;
};

export type ResponseInProgressEvent = BaseEvent<"in_progress"> & {
  responseId?: string;
};

export type OutputTextDeltaEvent = BaseEvent<"delta"> & {
  itemId: string;
  outputIndex: number;
  contentIndex: number;
  text: string;
};

export type OutputTextDoneEvent = BaseEvent<"text_done"> & {
  itemId: string;
  outputIndex: number;
  contentIndex: number;
  text: string;
};

export type ContentPartDoneEvent = BaseEvent<"content_part_done"> & {
  itemId: string;
  outputIndex: number;
  contentIndex: number;
  text?: string;
};

export type ResponseCompletedEvent = BaseEvent<"completed"> & {
  responseId: string;
  status: string;
  outputText?: string;
};

export type ResponseFailedEvent = BaseEvent<"failed"> & {
  responseId?: string;
  message: string;
};

export type ResponseIncompleteEvent = BaseEvent<"incomplete"> & {
  responseId?: string;
  reason?: string;
  outputText?: string;
};

export type ResponseQueuedEvent = BaseEvent<"queued"> & {
  responseId?: string;
};

export type ErrorEvent = BaseEvent<"error"> & {
  code?: string;
  message: string;
  param?: string;
};

/** Any wire `type` this decoder does not know. Kept so new API events never abort a stream. */
export type IgnoredEvent = BaseEvent<"ignored"> & {
  rawType: string;
};

export type StreamEvent =
  | ResponseCreatedEvent
  | ResponseInProgressEvent
  | OutputTextDeltaEvent
  | OutputTextDoneEvent
  | ContentPartDoneEvent
  | ResponseCompletedEvent
  | ResponseFailedEvent
  | ResponseIncompleteEvent
  | ResponseQueuedEvent
  | ErrorEvent
  | IgnoredEvent;

export type StreamEventKind = StreamEvent["kind"];

export type ResponseStatus = "idle" | "created" | "streaming" | "completed" | "failed" | "cancelled";

export type ResponseState = {
  responseId: string | null;
  accumulatedText: string;
  status: ResponseStatus;
  previousResponseId: string | null;
};

export type StreamUpdate =
  | { type: "started"; responseId: string }
  | { type: "delta"; text: string }
  | { type: "snapshot"; text: string }
  | { type: "completed"; text: string; responseId: string | null; incompleteReason?: string }
  | { type: "failed"; message: string; error?: ChatStreamError }
  | { type: "cancelled" };

export type TerminalStreamUpdate = Extract<StreamUpdate, { type: "completed" | "failed" | "cancelled" }>;

export function isTerminalUpdate(update: StreamUpdate): update is TerminalStreamUpdate {
  return update.type === "completed" || update.type === "failed" || update.type === "cancelled";
}

export function isTerminalStatus(status: ResponseStatus): boolean {
  return status === "completed" || status === "failed" || status === "cancelled";
}
