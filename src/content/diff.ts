import type { MessageAttachment } from "../chat-types.js";
import type { ContentDiff, ContentSegment, MessageContent } from "./types.js";

/**
 * Picks the cheapest re-render that takes `old` to `next`. Every answer other
 * than `full_update` is an optimization and renders the same as a full update.
 */
export function diffMessageContent(old: MessageContent, next: MessageContent): ContentDiff {
  if (messageContentEqual(old, next)) {
    return { change: { type: "no_change" }, affectedSegments: new Set() };
  }

  const count = old.segments.length;
  if (count === next.segments.length && count > 0) {
    const lastIndex = count - 1;
    const oldLast = old.segments[lastIndex];
    const nextLast = next.segments[lastIndex];
    if (
      oldLast &&
      nextLast &&
      segmentListsEqual(old.segments.slice(0, lastIndex), next.segments.slice(0, lastIndex)) &&
      canIncrementallyUpdate(oldLast, nextLast)
    ) {
      return {
        change: { type: "append_to_last_segment", index: lastIndex },
        affectedSegments: new Set([lastIndex]),
      };
    }
  }

  if (count === next.segments.length) {
    const changed: number[] = [];
    for (let index = 0; index < count; index += 1) {
      const before = old.segments[index];
      const after = next.segments[index];
      if (!before || !after || !segmentsEqual(before, after)) {
        changed.push(index);
      }
    }
    const [only] = changed;
    if (changed.length === 1 && only !== undefined) {
      return {
        change: { type: "segment_update", index: only },
        affectedSegments: new Set([only]),
      };
    }
  }

  return {
    change: { type: "full_update" },
    affectedSegments: new Set(next.segments.map((_, index) => index)),
  };
}

/**
 * True when `next` only extends `current`: same kind, text grown by suffix,
 * and for code the fence language unchanged.
 */
export function canIncrementallyUpdate(current: ContentSegment, next: ContentSegment): boolean {
  switch (current.kind) {
    case "text":
    case "streaming_text":
      return next.kind === current.kind && next.text.startsWith(current.text);
    case "code":
      return next.kind === "code" && next.language === current.language && next.code.startsWith(current.code);
    case "partial_code":
      return (
        next.kind === "partial_code" && next.language === current.language && next.raw.startsWith(current.raw)
      );
    case "attachments":
    case "generated_images":
      return false;
  }
}

export function messageContentEqual(left: MessageContent, right: MessageContent): boolean {
  return (
    left.isStreaming === right.isStreaming &&
    left.messageId === right.messageId &&
    left.role === right.role &&
    segmentListsEqual(left.segments, right.segments)
  );
}

export function segmentListsEqual(left: ContentSegment[], right: ContentSegment[]): boolean {
  if (left.length !== right.length) {
    return false;
  }
  return left.every((segment, index) => {
    const other = right[index];
    return other !== undefined && segmentsEqual(segment, other);
  });
}

export function segmentsEqual(left: ContentSegment, right: ContentSegment): boolean {
  switch (left.kind) {
    case "text":
    case "streaming_text":
      return right.kind === left.kind && right.text === left.text;
    case "code":
      return right.kind === "code" && right.code === left.code && right.language === left.language;
    case "partial_code":
      return right.kind === "partial_code" && right.raw === left.raw && right.language === left.language;
    case "attachments":
      return (
        right.kind === "attachments" &&
        right.attachments.length === left.attachments.length &&
        left.attachments.every((attachment, index) => {
          const other = right.attachments[index];
          return other !== undefined && attachmentsEqual(attachment, other);
        })
      );
    case "generated_images":
      return (
        right.kind === "generated_images" &&
        right.images.length === left.images.length &&
        left.images.every((image, index) => {
          const other = right.images[index];
          return other !== undefined && bytesEqual(image, other);
        })
      );
  }
}

/** True when nothing visible would render: no segments, or only blank text and empty collections. */
export function isMessageContentEmpty(content: MessageContent): boolean {
  return content.segments.every((segment) => {
    switch (segment.kind) {
      case "text":
      case "streaming_text":
        return !segment.text.trim();
      case "code":
        return !segment.code.trim();
      case "partial_code":
        return !segment.raw.trim();
      case "attachments":
        return segment.attachments.length === 0;
      case "generated_images":
        return segment.images.length === 0;
    }
  });
}

/**
 * Cheap identity string for a content value. Equal content always yields equal
 * fingerprints; used to skip publishing a re-parse that changed nothing.
 */
export function contentFingerprint(content: MessageContent): string {
  const parts = [`role:${content.role}`, `streaming:${content.isStreaming}`];
  for (const segment of content.segments) {
    switch (segment.kind) {
      case "text":
      case "streaming_text":
        parts.push(`${segment.kind}:${segment.text.length}:${hashString(segment.text)}`);
        break;
      case "code":
        parts.push(`code:${segment.language}:${segment.code.length}:${hashString(segment.code)}`);
        break;
      case "partial_code":
        parts.push(`partial_code:${segment.language}:${segment.raw.length}:${hashString(segment.raw)}`);
        break;
      case "attachments":
        parts.push(
          `attachments:${segment.attachments.map((item) => `${item.filename}:${item.data.byteLength}`).join(",")}`,
        );
        break;
      case "generated_images":
        parts.push(`images:${segment.images.map((image) => image.byteLength).join(",")}`);
        break;
    }
  }
  return parts.join("|");
}

function attachmentsEqual(left: MessageAttachment, right: MessageAttachment): boolean {
  return (
    left.id === right.id &&
    left.filename === right.filename &&
    left.mimeType === right.mimeType &&
    bytesEqual(left.data, right.data)
  );
}

function bytesEqual(left: Uint8Array, right: Uint8Array): boolean {
  if (left === right) {
    return true;
  }
  if (left.byteLength !== right.byteLength) {
    return false;
  }
  for (let index = 0; index < left.byteLength; index += 1) {
    if (left[index] !== right[index]) {
      return false;
    }
  }
  return true;
}

// FNV-1a over UTF-16 code units
function hashString(value: string): string {
  let hash = 0x811c9dc5;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 0x01000193);
  }
  return (hash >>> 0).toString(16).padStart(8, "0");
}
