import type { MessageAttachment, MessageRole } from "../chat-types.js";

export type TextSegment = { kind: "text"; text: string };
export type CodeSegment = { kind: "code"; code: string; language: string };
/** Text of a message still streaming; more may follow. */
export type StreamingTextSegment = { kind: "streaming_text"; text: string };
/** An open fence at the end of a streaming message, raw text from the opening backticks on. */
export type PartialCodeSegment = { kind: "partial_code"; raw: string; language: string };
export type AttachmentsSegment = { kind: "attachments"; attachments: MessageAttachment[] };
export type GeneratedImagesSegment = { kind: "generated_images"; images: Uint8Array[] };

export type ContentSegment =
  | TextSegment
  | CodeSegment
  | StreamingTextSegment
  | PartialCodeSegment
  | AttachmentsSegment
  | GeneratedImagesSegment;

export type ContentSegmentKind = ContentSegment["kind"];

export type MessageContent = {
  segments: ContentSegment[];
  isStreaming: boolean;
  messageId: string;
  role: MessageRole;
};

export type ContentChange =
  | { type: "no_change" }
  | { type: "append_to_last_segment"; index: number }
  | { type: "segment_update"; index: number }
  | { type: "full_update" };

export type ContentDiff = {
  change: ContentChange;
  affectedSegments: Set<number>;
};
