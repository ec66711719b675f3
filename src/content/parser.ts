import type { MessageAttachment } from "../chat-types.js";
import type { ContentSegment } from "./types.js";

export const CODE_FENCE = "```";

export type ParseContentOptions = {
  attachments?: MessageAttachment[];
  generatedImages?: Uint8Array[];
  isStreaming?: boolean;
};

/**
 * Splits a full text snapshot into renderable segments. Stateless: callers pass
 * the whole current text every time, never a delta.
 *
 * Attachments (when any) come first and generated images (when given) last;
 * everything in between follows document order. Both lists are copied, so a
 * later change to the caller's arrays never reaches a parsed segment.
 */
export function parseContentSegments(text: string, options: ParseContentOptions = {}): ContentSegment[] {
  const segments: ContentSegment[] = [];
  const isStreaming = options.isStreaming ?? false;

  if (options.attachments && options.attachments.length > 0) {
    segments.push({ kind: "attachments", attachments: [...options.attachments] });
  }

  if (text) {
    if (isStreaming && !text.includes(CODE_FENCE)) {
      segments.push({ kind: "streaming_text", text });
    } else {
      segments.push(...scanFences(text, isStreaming));
    }
  }

  if (options.generatedImages && options.generatedImages.length > 0) {
    segments.push({ kind: "generated_images", images: [...options.generatedImages] });
  }

  return segments;
}

function scanFences(text: string, isStreaming: boolean): ContentSegment[] {
  const segments: ContentSegment[] = [];
  let cursor = 0;
  let seenFence = false;

  while (cursor < text.length) {
    const open = text.indexOf(CODE_FENCE, cursor);
    if (open === -1) {
      const rest = text.slice(cursor);
      // prose after the last closed block may still grow while streaming
      segments.push(isStreaming && seenFence ? { kind: "streaming_text", text: rest } : { kind: "text", text: rest });
      break;
    }

    if (open > cursor) {
      segments.push({ kind: "text", text: text.slice(cursor, open) });
    }
    seenFence = true;

    const headerStart = open + CODE_FENCE.length;
    const newline = text.indexOf("\n", headerStart);
    if (newline === -1) {
      segments.push(unterminated(text.slice(open), text.slice(headerStart).trim(), isStreaming));
      break;
    }

    const language = text.slice(headerStart, newline).trim();
    const bodyStart = newline + 1;
    const close = text.indexOf(CODE_FENCE, bodyStart);
    if (close === -1) {
      segments.push(unterminated(text.slice(open), language, isStreaming));
      break;
    }

    segments.push({ kind: "code", code: trimClosingNewline(text.slice(bodyStart, close)), language });
    cursor = close + CODE_FENCE.length;
  }

  return segments;
}

// Finalized text with an open fence keeps the raw fence text rather than guessing where it ends.
function unterminated(raw: string, language: string, isStreaming: boolean): ContentSegment {
  return isStreaming ? { kind: "partial_code", raw, language } : { kind: "text", text: raw };
}

function trimClosingNewline(body: string): string {
  if (body.endsWith("\r\n")) {
    return body.slice(0, -2);
  }
  if (body.endsWith("\n")) {
    return body.slice(0, -1);
  }
  return body;
}

export type ContentComplexity = "low" | "medium" | "high";

export type ContentAnalysis = {
  hasCodeBlocks: boolean;
  lineCount: number;
  characterCount: number;
  complexity: ContentComplexity;
};

const MEDIUM_COMPLEXITY_LINES = 50;

/** Rough cost estimate a renderer can use to pick a parsing/rendering strategy. */
export function analyzeContent(text: string): ContentAnalysis {
  const hasCodeBlocks = text.includes(CODE_FENCE);
  const lineCount = text.split(/\r\n|\r|\n/).length;
  return {
    hasCodeBlocks,
    lineCount,
    characterCount: Array.from(text).length,
    complexity: hasCodeBlocks ? "high" : lineCount > MEDIUM_COMPLEXITY_LINES ? "medium" : "low",
  };
}
