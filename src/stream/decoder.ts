import { z } from "zod";
import { DecodeError } from "../errors.js";
import { isRecord, safeJsonParse } from "../json.js";
import type { StreamEvent } from "./types.js";

export type DecodeResult = { ok: true; event: StreamEvent } | { ok: false; error: DecodeError };

export const DONE_SENTINEL = "[DONE]";

const responseObjectSchema = z.object({
  id: z.string(),
  status: z.string(),
  output_text: z.string().nullish(),
  output: z.array(z.unknown()).nullish(),
  error: z
    .object({
      code: z.string().nullish(),
      message: z.string().nullish(),
    })
    .nullish(),
  incomplete_details: z
    .object({
      reason: z.string().nullish(),
    })
    .nullish(),
});

// Lifecycle events other than created/completed only need the id, and tolerate a missing object.
const looseResponseObjectSchema = responseObjectSchema.partial({ id: true, status: true });

const baseEventSchema = z.object({
  type: z.string(),
  sequence_number: z.number().int().nullish(),
});

const textAddressSchema = baseEventSchema.extend({
  item_id: z.string(),
  output_index: z.number().int(),
  content_index: z.number().int(),
});

const wireSchemas = {
  "response.created": baseEventSchema.extend({ response: responseObjectSchema }),
  "response.in_progress": baseEventSchema.extend({ response: looseResponseObjectSchema.nullish() }),
  "response.completed": baseEventSchema.extend({ response: responseObjectSchema }),
  "response.failed": baseEventSchema.extend({ response: looseResponseObjectSchema.nullish() }),
  "response.incomplete": baseEventSchema.extend({ response: looseResponseObjectSchema.nullish() }),
  "response.queued": baseEventSchema.extend({ response: looseResponseObjectSchema.nullish() }),
  "response.output_text.delta": textAddressSchema.extend({ delta: z.string() }),
  "response.output_text.done": textAddressSchema.extend({ text: z.string() }),
  "response.content_part.done": textAddressSchema.extend({
    part: z.object({
      type: z.string(),
      text: z.string().nullish(),
    }),
  }),
  error: baseEventSchema.extend({
    code: z.string().nullish(),
    message: z.string(),
    param: z.string().nullish(),
  }),
} as const;

type WireType = keyof typeof wireSchemas;
type ResponseObject = z.infer<typeof looseResponseObjectSchema>;

/**
 * Decodes one SSE data payload (with the `data:` prefix already stripped).
 * The `[DONE]` sentinel is end-of-stream and must be handled by the caller.
 */
export function decodeStreamEvent(payload: string): DecodeResult {
  const parsed = safeJsonParse(payload);
  if (!parsed.ok) {
    return { ok: false, error: DecodeError.malformed(parsed.error.message) };
  }

  const root = parsed.value;
  if (!isRecord(root)) {
    return { ok: false, error: DecodeError.malformed("expected a JSON object") };
  }

  if (!("type" in root) || root.type === undefined) {
    return { ok: false, error: DecodeError.missingField("type", "type") };
  }
  if (typeof root.type !== "string") {
    return { ok: false, error: DecodeError.invalidField("type", "type", "expected string") };
  }

  const rawType = root.type;
  if (!isKnownWireType(rawType)) {
    return {
      ok: true,
      event: {
        kind: "ignored",
        rawType,
        sequenceNumber: readSequenceNumber(root.sequence_number),
      },
    };
  }

  return decodeKnown(rawType, root);
}

function decodeKnown(type: WireType, root: Record<string, unknown>): DecodeResult {
  switch (type) {
    case "response.created": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const { response } = result.value;
      return ok({
        kind: "created",
        responseId: response.id,
        status: response.status,
        sequenceNumber: sequenceOf(result.value),
      });
    }
    case "response.in_progress": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      return ok({
        kind: "in_progress",
        responseId: result.value.response?.id ?? undefined,
        sequenceNumber: sequenceOf(result.value),
      });
    }
    case "response.queued": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      return ok({
        kind: "queued",
        responseId: result.value.response?.id ?? undefined,
        sequenceNumber: sequenceOf(result.value),
      });
    }
    case "response.completed": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const { response } = result.value;
      return ok({
        kind: "completed",
        responseId: response.id,
        status: response.status,
        outputText: extractOutputText(response),
        sequenceNumber: sequenceOf(result.value),
      });
    }
    case "response.failed": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const response = result.value.response;
      return ok({
        kind: "failed",
        responseId: response?.id ?? undefined,
        message: response?.error?.message?.trim() || "response failed",
        sequenceNumber: sequenceOf(result.value),
      });
    }
    case "response.incomplete": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const response = result.value.response;
      return ok({
        kind: "incomplete",
        responseId: response?.id ?? undefined,
        reason: response?.incomplete_details?.reason ?? undefined,
        outputText: response ? extractOutputText(response) : undefined,
        sequenceNumber: sequenceOf(result.value),
      });
    }
    case "response.output_text.delta": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const value = result.value;
      return ok({
        kind: "delta",
        itemId: value.item_id,
        outputIndex: value.output_index,
        contentIndex: value.content_index,
        text: value.delta,
        sequenceNumber: sequenceOf(value),
      });
    }
    case "response.output_text.done": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const value = result.value;
      return ok({
        kind: "text_done",
        itemId: value.item_id,
        outputIndex: value.output_index,
        contentIndex: value.content_index,
        text: value.text,
        sequenceNumber: sequenceOf(value),
      });
    }
    case "response.content_part.done": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const value = result.value;
      return ok({
        kind: "content_part_done",
        itemId: value.item_id,
        outputIndex: value.output_index,
        contentIndex: value.content_index,
        text: value.part.text ?? undefined,
        sequenceNumber: sequenceOf(value),
      });
    }
    case "error": {
      const result = validate(wireSchemas[type], root);
      if (!result.ok) {
        return result;
      }
      const value = result.value;
      return ok({
        kind: "error",
        code: value.code ?? undefined,
        message: value.message,
        param: value.param ?? undefined,
        sequenceNumber: sequenceOf(value),
      });
    }
  }
}

function validate<S extends z.ZodTypeAny>(
  schema: S,
  root: Record<string, unknown>,
): { ok: true; value: z.infer<S> } | { ok: false; error: DecodeError } {
  const result = schema.safeParse(root);
  if (result.success) {
    return { ok: true, value: result.data };
  }
  return { ok: false, error: toDecodeError(result.error) };
}

function toDecodeError(error: z.ZodError): DecodeError {
  const issue = error.issues[0];
  if (!issue) {
    return DecodeError.malformed("payload failed validation");
  }
  const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
  const field = String(issue.path.at(-1) ?? "(root)");
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return DecodeError.missingField(field, path);
  }
  return DecodeError.invalidField(field, path, issue.message);
}

/**
 * Prefers the aggregated `output_text`; otherwise joins the `output_text` parts of
 * every message item in `output`.
 */
export function extractOutputText(response: ResponseObject): string | undefined {
  if (typeof response.output_text === "string") {
    return response.output_text;
  }
  if (!Array.isArray(response.output)) {
    return undefined;
  }

  const parts: string[] = [];
  for (const item of response.output) {
    if (!isRecord(item) || item.type !== "message" || !Array.isArray(item.content)) {
      continue;
    }
    for (const part of item.content) {
      if (isRecord(part) && part.type === "output_text" && typeof part.text === "string") {
        parts.push(part.text);
      }
    }
  }
  return parts.length > 0 ? parts.join("\n\n") : undefined;
}

function isKnownWireType(value: string): value is WireType {
  return Object.prototype.hasOwnProperty.call(wireSchemas, value);
}

function sequenceOf(value: { sequence_number?: number | null }): number | undefined {
  return value.sequence_number ?? undefined;
}

function readSequenceNumber(value: unknown): number | undefined {
  return typeof value === "number" && Number.isInteger(value) ? value : undefined;
}

function ok(event: StreamEvent): DecodeResult {
  return { ok: true, event };
}
