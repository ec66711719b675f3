import type { MessageAttachment, MessageRole } from "../chat-types.js";
import { contentFingerprint, diffMessageContent, messageContentEqual } from "./diff.js";
import { parseContentSegments } from "./parser.js";
import type { ContentDiff, MessageContent } from "./types.js";

export type MessageContentTrackerOptions = {
  messageId: string;
  role: MessageRole;
  text?: string;
  attachments?: MessageAttachment[];
  generatedImages?: Uint8Array[];
  isStreaming?: boolean;
};

export type ContentUpdate = {
  content: MessageContent;
  diff: ContentDiff;
};

/**
 * Holds the parsed content of one message and reports what changed on every
 * new text snapshot, so a renderer only redraws the affected segments.
 */
export class MessageContentTracker {
  private content: MessageContent;
  private fingerprint: string;
  private readonly attachments: MessageAttachment[];
  private generatedImages: Uint8Array[];

  constructor(options: MessageContentTrackerOptions) {
    this.attachments = [...(options.attachments ?? [])];
    this.generatedImages = [...(options.generatedImages ?? [])];
    this.content = this.parse(options.messageId, options.role, options.text ?? "", options.isStreaming ?? false);
    this.fingerprint = contentFingerprint(this.content);
  }

  current(): MessageContent {
    return this.content;
  }

  /** Keeps the previous value when the new snapshot parses to the same content. */
  updateStreaming(text: string): ContentUpdate {
    const next = this.parse(this.content.messageId, this.content.role, text, true);
    const fingerprint = contentFingerprint(next);
    // equal fingerprints can still hide a change; confirm before skipping
    if (fingerprint === this.fingerprint && messageContentEqual(this.content, next)) {
      return { content: this.content, diff: { change: { type: "no_change" }, affectedSegments: new Set() } };
    }
    return this.assign(next, fingerprint);
  }

  /** Always publishes the final parse. */
  finalize(text: string, generatedImages?: Uint8Array[]): ContentUpdate {
    if (generatedImages) {
      this.generatedImages = [...generatedImages];
    }
    const next = this.parse(this.content.messageId, this.content.role, text, false);
    return this.assign(next, contentFingerprint(next));
  }

  private assign(next: MessageContent, fingerprint: string): ContentUpdate {
    const diff = diffMessageContent(this.content, next);
    this.content = next;
    this.fingerprint = fingerprint;
    return { content: next, diff };
  }

  private parse(messageId: string, role: MessageRole, text: string, isStreaming: boolean): MessageContent {
    return {
      segments: parseContentSegments(text, {
        attachments: this.attachments,
        generatedImages: this.generatedImages,
        isStreaming,
      }),
      isStreaming,
      messageId,
      role,
    };
  }
}
